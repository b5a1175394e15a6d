/**
 * `.tm` program source reader.
 *
 * One or more state patterns per line, separated by ';'. Whitespace around
 * patterns is ignored, '--' starts a comment, blank lines are skipped.
 * Errors are collected with line/col instead of thrown.
 */
import { SOURCE_COMMENT, SOURCE_STATE_SEPARATOR } from '../constants';
import { NotationError } from '../errors';
import { Program } from '../program';
import type { SourceError, State } from '../types';
import { parseState } from './parser';

export interface ProgramSourceResult {
  program: Program;
  errors: SourceError[];
}

export function parseProgramSource(source: string): ProgramSourceResult {
  const states: State[] = [];
  const errors: SourceError[] = [];
  const lines = source.split('\n');

  for (let lineNum = 0; lineNum < lines.length; lineNum++) {
    let line = lines[lineNum];
    const commentAt = line.indexOf(SOURCE_COMMENT);
    if (commentAt >= 0) line = line.substring(0, commentAt);

    let col = 0;
    for (const chunk of line.split(SOURCE_STATE_SEPARATOR)) {
      const lead = chunk.length - chunk.trimStart().length;
      const pattern = chunk.trim();
      const startCol = col + lead + 1;
      col += chunk.length + 1;
      if (pattern.length === 0) continue;

      try {
        states.push(parseState(pattern));
      } catch (err) {
        if (!(err instanceof NotationError)) throw err;
        errors.push({ line: lineNum + 1, col: startCol + err.col - 1, message: err.message });
      }
    }
  }

  if (states.length === 0 && errors.length === 0) {
    errors.push({ line: 1, col: 1, message: 'Program has no states' });
  }

  return { program: new Program(states), errors };
}
