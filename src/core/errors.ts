/** Tape access outside 0..length-1. Indicates an engine or caller bug. */
export class TapeRangeError extends Error {
  readonly position: number;
  readonly length: number;
  constructor(position: number, length: number) {
    super(`Tape position ${position} out of range 0..${length - 1}`);
    this.name = 'TapeRangeError';
    this.position = position;
    this.length = length;
  }
}

/** Lookup of a state index the program does not have. Program is 1-based. */
export class StateIndexError extends Error {
  readonly index: number;
  readonly stateCount: number;
  constructor(index: number, stateCount: number) {
    super(
      index === 0
        ? 'State 0 is out of range: program states are 1-based (0 means halt)'
        : `State ${index} is out of range 1..${stateCount}`,
    );
    this.name = 'StateIndexError';
    this.index = index;
    this.stateCount = stateCount;
  }
}

/** Malformed symbol/behavior/state/tape pattern. `col` is 1-based. */
export class NotationError extends Error {
  readonly col: number;
  constructor(message: string, col: number = 1) {
    super(message);
    this.name = 'NotationError';
    this.col = col;
  }
}

/** A numeric argument outside what the call accepts. */
export class InvalidArgumentError extends RangeError {
  readonly argument: string;
  readonly value: number;
  constructor(argument: string, value: number, expected: string) {
    super(`Invalid ${argument}: ${value} (expected ${expected})`);
    this.name = 'InvalidArgumentError';
    this.argument = argument;
    this.value = value;
  }
}
