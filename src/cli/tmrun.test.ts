import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { runTmrun } from './tmrun';
import type { CliOutput } from './tmrun';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const SAMPLES = join(__dirname, '../../samples');
const ADDER = join(SAMPLES, 'adder.tm');
const PING_PONG = join(SAMPLES, 'ping-pong.tm');

function capture() {
  const logs: string[] = [];
  const errors: string[] = [];
  const out: CliOutput = { log: line => logs.push(line), error: line => errors.push(line) };
  return { logs, errors, out };
}

describe('tmrun', () => {
  it('stops a non-halting sample at the default bound', () => {
    const { logs, errors, out } = capture();
    expect(runTmrun([PING_PONG], out)).toBe(2);
    expect(errors).toEqual([]);
    expect(logs[0]).toBe(
      `\x1b[33m⚠ ${PING_PONG}\x1b[0m — did not halt within 1000 steps (1000 step(s), o → ${'o'.repeat(1001)})`,
    );
    const table = logs[2].split('\n');
    expect(table).toHaveLength(1006);
    expect(table[1004]).toBe('Stopped │' + 'o│'.repeat(1001));
  });

  it('reports a halting run', () => {
    const { logs, out } = capture();
    expect(runTmrun([ADDER, 'xxoxx', '--quiet'], out)).toBe(0);
    expect(logs).toEqual([`\x1b[32m✓ ${ADDER}\x1b[0m — halted after 6 step(s), xxoxx → ooxxx`]);
  });

  it('prints the trace as JSON', () => {
    const { logs, out } = capture();
    expect(runTmrun([ADDER, 'xxoxx', '--json'], out)).toBe(0);
    const json: unknown = JSON.parse(logs[0]);
    expect(json).toMatchObject({
      file: ADDER,
      outcome: 'halted',
      steps: 6,
      input: 'xxoxx',
      output: 'ooxxx',
    });
    expect(json).toHaveProperty('moves.0', {
      tape: 'oxoxx', fromSquare: 0, toSquare: 1, fromState: 1, toState: 2, extended: null,
    });
  });

  it('rejects a bad tape pattern', () => {
    const { errors, out } = capture();
    expect(runTmrun([ADDER, 'xq'], out)).toBe(1);
    expect(errors).toEqual([`\x1b[31m✗ tape 'xq':2: Unexpected tape symbol 'q'\x1b[0m`]);
  });

  it('prints usage when the program file is missing', () => {
    const { errors, out } = capture();
    expect(runTmrun([], out)).toBe(1);
    expect(errors[0]).toBe('Error: Missing program file');
    expect(errors[2]).toMatch(/^tmrun — binary Turing machine runner/);
  });

  it('reports an unreadable program file', () => {
    const { errors, out } = capture();
    const missing = join(SAMPLES, 'missing.tm');
    expect(runTmrun([missing], out)).toBe(1);
    expect(errors).toHaveLength(1);
    expect(errors[0].startsWith(`Error: cannot read file '${missing}': `)).toBe(true);
  });
});
