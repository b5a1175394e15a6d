/**
 * tmrun: run a binary Turing machine program and print its trace.
 * Returns the process exit code: 0 halted, 2 stopped at a bound, 1 error.
 */
import { readFileSync } from 'fs';
import { parseArgs, USAGE } from './args';
import { Machine } from '../core/machine';
import { recordTrace } from '../core/trace';
import { RunOutcome } from '../core/types';
import type { Trace } from '../core/types';
import { parseTape, parseProgramSource, formatTape } from '../core/notation';
import { NotationError } from '../core/errors';
import { renderTrace } from '../ui/trace/traceTable';
import { unaryHeader } from '../ui/trace/unary';

export interface CliOutput {
  log: (line: string) => void;
  error: (line: string) => void;
}

const CONSOLE: CliOutput = {
  log: line => console.log(line),
  error: line => console.error(line),
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function runTmrun(argv: readonly string[], out: CliOutput = CONSOLE): number {
  const { options, errors: argErrors } = parseArgs(argv);
  if (!options) {
    for (const err of argErrors) out.error(`Error: ${err}`);
    out.error('');
    out.error(USAGE);
    return 1;
  }

  // ---- Load program and tape ----

  const filePath = options.programPath;
  let source: string;
  try {
    source = readFileSync(filePath, 'utf-8');
  } catch (err) {
    out.error(`Error: cannot read file '${filePath}': ${errorMessage(err)}`);
    return 1;
  }

  const { program, errors } = parseProgramSource(source);
  if (errors.length > 0) {
    out.error(`\x1b[31m✗ ${filePath}: ${errors.length} error(s)\x1b[0m`);
    for (const err of errors) {
      out.error(`  ${filePath}:${err.line}:${err.col}: ${err.message}`);
    }
    return 1;
  }

  let machine: Machine;
  try {
    machine = new Machine(parseTape(options.tapePattern), program);
  } catch (err) {
    if (!(err instanceof NotationError)) throw err;
    out.error(`\x1b[31m✗ tape '${options.tapePattern}':${err.col}: ${err.message}\x1b[0m`);
    return 1;
  }

  // ---- Run ----

  let trace: Trace;
  try {
    trace = recordTrace(machine, { maxSteps: options.maxSteps, timeoutMs: options.timeoutMs });
  } catch (err) {
    out.error(`\x1b[31m✗ ${filePath}: step ${machine.steps + 1}: ${errorMessage(err)}\x1b[0m`);
    return 1;
  }

  const exitCode = trace.outcome === RunOutcome.HALTED ? 0 : 2;

  if (options.json) {
    const json = {
      file: filePath,
      outcome: trace.outcome,
      steps: trace.moves.length,
      input: formatTape(trace.input),
      output: formatTape(trace.output),
      moves: trace.moves.map(m => ({
        tape: formatTape(m.symbols),
        fromSquare: m.fromSquare,
        toSquare: m.toSquare,
        fromState: m.fromState,
        toState: m.toState,
        extended: m.extended,
      })),
    };
    out.log(JSON.stringify(json, null, 2));
    return exitCode;
  }

  // ---- Outcome ----

  const summary = `${trace.moves.length} step(s), ${formatTape(trace.input)} → ${formatTape(trace.output)}`;
  if (trace.outcome === RunOutcome.HALTED) {
    out.log(`\x1b[32m✓ ${filePath}\x1b[0m — halted after ${summary}`);
  } else {
    const bound = trace.outcome === RunOutcome.TIMEOUT ? `${options.timeoutMs} ms` : `${options.maxSteps} steps`;
    out.log(`\x1b[33m⚠ ${filePath}\x1b[0m — did not halt within ${bound} (${summary})`);
  }

  if (!options.quiet) {
    out.log('');
    out.log(renderTrace(trace, {
      fancy: !options.ascii,
      pointer: options.pointer,
      header: options.unary ? unaryHeader : undefined,
    }));
  }

  return exitCode;
}
