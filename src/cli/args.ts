/**
 * Command-line argument parsing for tmrun.
 */
import { DEFAULT_CLI_MAX_STEPS } from '../core/constants';

export interface CliOptions {
  programPath: string;
  tapePattern: string;
  maxSteps: number;
  timeoutMs?: number;
  ascii: boolean;
  pointer: boolean;
  unary: boolean;
  json: boolean;
  quiet: boolean;
}

export interface CliParseResult {
  options: CliOptions | null;
  errors: string[];
}

export const USAGE = [
  'tmrun — binary Turing machine runner',
  '',
  'Usage: tmrun <program.tm> [tape] [options]',
  '',
  '  tape              Initial tape of o/x symbols (default: o)',
  '',
  'Options:',
  `  --max-steps N     Stop after N steps (default ${DEFAULT_CLI_MAX_STEPS})`,
  '  --timeout MS      Stop after MS milliseconds',
  '  --ascii           Plain ASCII table instead of box drawing',
  '  --no-pointer      Do not mark the scanned cell',
  '  --unary           Label input/output rows with their unary numbers',
  '  --json            Output the trace as JSON',
  '  --quiet           Only print the outcome line',
].join('\n');

const BOOLEAN_FLAGS = new Set(['--ascii', '--no-pointer', '--unary', '--json', '--quiet']);
const VALUE_FLAGS = new Set(['--max-steps', '--timeout']);

function parseCount(flag: string, raw: string | undefined, errors: string[]): number | undefined {
  if (raw === undefined || raw.startsWith('--')) {
    errors.push(`${flag} needs a value`);
    return undefined;
  }
  if (!/^\d+$/.test(raw)) {
    errors.push(`${flag} expects a non-negative integer, got '${raw}'`);
    return undefined;
  }
  return parseInt(raw, 10);
}

export function parseArgs(argv: readonly string[]): CliParseResult {
  const errors: string[] = [];
  const flags = new Set<string>();
  const values = new Map<string, number>();
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (BOOLEAN_FLAGS.has(arg)) {
      flags.add(arg);
    } else if (VALUE_FLAGS.has(arg)) {
      const raw = argv[i + 1];
      if (raw !== undefined && !raw.startsWith('--')) i++;
      const value = parseCount(arg, raw, errors);
      if (value !== undefined) values.set(arg, value);
    } else if (arg.startsWith('--')) {
      errors.push(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  if (positional.length === 0) errors.push('Missing program file');
  if (positional.length > 2) errors.push(`Unexpected argument: ${positional[2]}`);

  if (errors.length > 0) return { options: null, errors };

  return {
    options: {
      programPath: positional[0],
      tapePattern: positional[1] ?? 'o',
      maxSteps: values.get('--max-steps') ?? DEFAULT_CLI_MAX_STEPS,
      timeoutMs: values.get('--timeout'),
      ascii: flags.has('--ascii'),
      pointer: !flags.has('--no-pointer'),
      unary: flags.has('--unary'),
      json: flags.has('--json'),
      quiet: flags.has('--quiet'),
    },
    errors,
  };
}
