// One tape cell: false = blank ('o'), true = marked ('x')
export type TapeSymbol = boolean;

export const Direction = {
  LEFT: 'L',
  RIGHT: 'R',
} as const;
export type Direction = typeof Direction[keyof typeof Direction];

export interface Behavior {
  readonly write: TapeSymbol;
  readonly direction: Direction;
  /** Next state index, 1-based. 0 halts the machine. */
  readonly next: number;
}

export interface State {
  readonly onBlank: Behavior;
  readonly onMarked: Behavior;
}

export type MachineStatus =
  | { readonly kind: 'running'; readonly state: number }
  | { readonly kind: 'halted' };

/** Edge a step grew the tape at, if any. */
export type TapeExtension = 'left' | 'right' | null;

export interface Move {
  /** Tape contents after the step. */
  readonly symbols: readonly TapeSymbol[];
  readonly fromSquare: number;
  readonly toSquare: number;
  readonly fromState: number;
  readonly toState: number;
  readonly extended: TapeExtension;
}

export const RunOutcome = {
  HALTED: 'halted',
  STEP_LIMIT: 'step-limit',
  TIMEOUT: 'timeout',
} as const;
export type RunOutcome = typeof RunOutcome[keyof typeof RunOutcome];

export interface RunOptions {
  maxSteps?: number;
  timeoutMs?: number;
  onStep?: (move: Move) => void;
}

export interface RunResult {
  outcome: RunOutcome;
  moves: Move[];
  steps: number;
}

export interface MachineSnapshot {
  symbols: TapeSymbol[];
  head: number;
  state: number;
  halted: boolean;
  steps: number;
}

export interface Trace {
  readonly input: readonly TapeSymbol[];
  readonly moves: readonly Move[];
  readonly output: readonly TapeSymbol[];
  readonly outcome: RunOutcome;
}

export interface SourceError {
  line: number;
  col: number;
  message: string;
}
