export { Tape } from './tape';
export { Program, createBehavior, createState } from './program';
export { Machine } from './machine';
export { recordTrace, replayTrace } from './trace';
export type { TraceMismatch } from './trace';
export { TapeRangeError, StateIndexError, NotationError, InvalidArgumentError } from './errors';
export { BLANK, MARK, HALT_STATE, INITIAL_STATE } from './constants';
export { Direction, RunOutcome } from './types';
export type {
  TapeSymbol, Behavior, State, MachineStatus, TapeExtension, Move,
  RunOptions, RunResult, MachineSnapshot, Trace, SourceError,
} from './types';
export * from './notation';
