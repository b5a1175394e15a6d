import type { TapeSymbol } from './types';

export const BLANK: TapeSymbol = false;
export const MARK: TapeSymbol = true;

export const HALT_STATE = 0;
export const INITIAL_STATE = 1;

// Notation characters
export const BLANK_CHAR = 'o';
export const MARK_CHAR = 'x';
export const STATE_SEPARATOR = ',';
export const SOURCE_STATE_SEPARATOR = ';';
export const SOURCE_COMMENT = '--';

/** Steps between wall-clock checks in a bounded run. */
export const TIMEOUT_CHECK_INTERVAL = 1024;

/** Initial tape buffer capacity (cells). */
export const TAPE_MIN_CAPACITY = 16;

/** Step bound the command-line runner applies unless told otherwise. */
export const DEFAULT_CLI_MAX_STEPS = 1000;
