/**
 * Pattern notation serializer, the inverse of parser.ts.
 * parseX(formatX(v)) is structurally equal to v.
 */
import { BLANK_CHAR, MARK_CHAR, SOURCE_STATE_SEPARATOR, STATE_SEPARATOR } from '../constants';
import type { Program } from '../program';
import type { Behavior, State, TapeSymbol } from '../types';

export function formatSymbol(symbol: TapeSymbol): string {
  return symbol ? MARK_CHAR : BLANK_CHAR;
}

export function formatTape(symbols: readonly TapeSymbol[]): string {
  return symbols.map(formatSymbol).join('');
}

export function formatBehavior(behavior: Behavior): string {
  return `${formatSymbol(behavior.write)}${behavior.direction}${behavior.next}`;
}

export function formatState(state: State): string {
  return `${formatBehavior(state.onBlank)}${STATE_SEPARATOR}${formatBehavior(state.onMarked)}`;
}

/** One state pattern per entry, in table order. */
export function formatProgram(program: Program): string[] {
  return program.states.map(formatState);
}

/** Program as `.tm` source text: one state per line. */
export function formatProgramSource(program: Program): string {
  return formatProgram(program).join('\n') + '\n';
}

/** Program on one line, e.g. `oR0,oR2 ; xL3,xR2`. */
export function formatProgramInline(program: Program): string {
  return formatProgram(program).join(` ${SOURCE_STATE_SEPARATOR} `);
}
