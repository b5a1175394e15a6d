/**
 * Run records: input tape, ordered moves, output tape.
 */
import { Machine } from './machine';
import { Program } from './program';
import { Tape } from './tape';
import { RunOutcome } from './types';
import type { Move, RunOptions, TapeSymbol, Trace } from './types';

/**
 * First point where a replay disagrees with a trace. `step` is the 0-based
 * index into `trace.moves`; for `outcome` and `output` it is the move count.
 */
export type TraceMismatch =
  | { kind: 'move'; step: number; expected: Move; actual: Move | null }
  | { kind: 'outcome'; step: number; expected: RunOutcome; halted: boolean }
  | { kind: 'output'; step: number; expected: readonly TapeSymbol[]; actual: TapeSymbol[] };

/** Run the machine from its current position and record everything. */
export function recordTrace(machine: Machine, options?: RunOptions): Trace {
  const input = Object.freeze(machine.getTape().toArray());
  const { outcome, moves } = machine.runToHalt(options);
  const output = Object.freeze(machine.getTape().toArray());
  return Object.freeze({ input, moves: Object.freeze(moves), output, outcome });
}

function sameSymbols(a: readonly TapeSymbol[], b: readonly TapeSymbol[]): boolean {
  return a.length === b.length && a.every((s, i) => s === b[i]);
}

function sameMove(a: Move, b: Move): boolean {
  return a.fromSquare === b.fromSquare
    && a.toSquare === b.toSquare
    && a.fromState === b.fromState
    && a.toState === b.toState
    && a.extended === b.extended
    && sameSymbols(a.symbols, b.symbols);
}

/**
 * Re-run `program` from the trace's input tape and compare move by move,
 * then check the final halt status against `trace.outcome` and the final
 * tape against `trace.output`. Returns the first divergence, or null if the
 * trace is reproduced exactly.
 */
export function replayTrace(program: Program, trace: Trace): TraceMismatch | null {
  const machine = new Machine(Tape.fromSymbols(trace.input), program);
  const count = trace.moves.length;
  for (let i = 0; i < count; i++) {
    const actual = machine.step();
    if (actual === null || !sameMove(trace.moves[i], actual)) {
      return { kind: 'move', step: i, expected: trace.moves[i], actual };
    }
  }

  const halted = machine.isHalted();
  if (halted !== (trace.outcome === RunOutcome.HALTED)) {
    return { kind: 'outcome', step: count, expected: trace.outcome, halted };
  }

  const output = machine.getTape().toArray();
  if (!sameSymbols(trace.output, output)) {
    return { kind: 'output', step: count, expected: trace.output, actual: output };
  }
  return null;
}
