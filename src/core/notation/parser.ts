/**
 * Pattern notation parser.
 *
 *   symbol    ::= 'o' | 'x'
 *   behavior  ::= symbol ('L' | 'R') digit+        e.g. xR2, oL0
 *   state     ::= behavior ',' behavior            (on blank, on marked)
 *   program   ::= state*                           list index i → state i+1
 *   tape      ::= symbol+
 */
import { BLANK_CHAR, MARK_CHAR, STATE_SEPARATOR } from '../constants';
import { NotationError } from '../errors';
import { Machine } from '../machine';
import { Program, createBehavior, createState } from '../program';
import { Tape } from '../tape';
import { Direction } from '../types';
import type { Behavior, State, TapeSymbol } from '../types';

export function parseSymbol(pattern: string): TapeSymbol {
  if (pattern === MARK_CHAR) return true;
  if (pattern === BLANK_CHAR) return false;
  throw new NotationError(`Symbol should be either '${BLANK_CHAR}' or '${MARK_CHAR}', got '${pattern}'`);
}

export function parseTape(pattern: string): Tape {
  if (pattern.length === 0) {
    throw new NotationError('Tape pattern is empty');
  }
  const symbols: TapeSymbol[] = [];
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch !== BLANK_CHAR && ch !== MARK_CHAR) {
      throw new NotationError(`Unexpected tape symbol '${ch}'`, i + 1);
    }
    symbols.push(ch === MARK_CHAR);
  }
  return Tape.fromSymbols(symbols);
}

export function parseBehavior(pattern: string): Behavior {
  const c1 = pattern.charAt(0);
  const c2 = pattern.charAt(1);
  const rest = pattern.slice(2);
  if (c1 !== BLANK_CHAR && c1 !== MARK_CHAR) {
    throw new NotationError(`First character should be either '${BLANK_CHAR}' or '${MARK_CHAR}' in '${pattern}'`, 1);
  }
  if (c2 !== Direction.LEFT && c2 !== Direction.RIGHT) {
    throw new NotationError(`Second character should be either 'L' or 'R' in '${pattern}'`, 2);
  }
  if (!/^\d+$/.test(rest)) {
    throw new NotationError(`Expected a state number after '${c1}${c2}' in '${pattern}'`, 3);
  }
  return createBehavior(c1 === MARK_CHAR, c2, parseInt(rest, 10));
}

export function parseState(pattern: string): State {
  const parts = pattern.split(STATE_SEPARATOR);
  if (parts.length !== 2) {
    throw new NotationError(`State should be two behaviors separated by '${STATE_SEPARATOR}', got '${pattern}'`);
  }
  const [blankPart, markedPart] = parts;
  const onBlank = parseBehavior(blankPart);
  let onMarked: Behavior;
  try {
    onMarked = parseBehavior(markedPart);
  } catch (err) {
    // Report the column within the whole state pattern
    if (err instanceof NotationError) {
      throw new NotationError(err.message, blankPart.length + 1 + err.col);
    }
    throw err;
  }
  return createState(onBlank, onMarked);
}

export function parseProgram(patterns: readonly string[]): Program {
  return new Program(patterns.map(parseState));
}

export function machineFromPatterns(tapePattern: string, programPatterns: readonly string[]): Machine {
  return new Machine(parseTape(tapePattern), parseProgram(programPatterns));
}
