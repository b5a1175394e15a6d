/**
 * Transition table. States are addressed 1..stateCount; index 0 is the halt
 * signal and is never looked up here. There is no up-front check that every
 * `next` index exists: a bad index fails when the machine reaches it.
 */
import { InvalidArgumentError, StateIndexError } from './errors';
import type { Behavior, Direction, State, TapeSymbol } from './types';

export function createBehavior(write: TapeSymbol, direction: Direction, next: number): Behavior {
  if (!Number.isInteger(next) || next < 0) {
    throw new InvalidArgumentError('next state', next, 'a non-negative integer');
  }
  return Object.freeze({ write, direction, next });
}

export function createState(onBlank: Behavior, onMarked: Behavior): State {
  return Object.freeze({ onBlank, onMarked });
}

export class Program {
  readonly states: readonly State[];

  constructor(states: readonly State[] = []) {
    this.states = Object.freeze([...states]);
  }

  get stateCount(): number {
    return this.states.length;
  }

  /** State by 1-based index. */
  state(index: number): State {
    if (!Number.isInteger(index) || index < 1 || index > this.states.length) {
      throw new StateIndexError(index, this.states.length);
    }
    return this.states[index - 1];
  }

  lookup(index: number, scanned: TapeSymbol): Behavior {
    const state = this.state(index);
    return scanned ? state.onMarked : state.onBlank;
  }
}
