/**
 * Text table of a trace: one row per tape snapshot, with a header column.
 *
 *         ┌─┬─┐
 * Input   │x│o│
 *         ├─┼─┤
 * State 1 ├x┤o│      ← pointer marks the cell scanned in that step
 *         ├─┼─┤
 * Output  │x│o│
 *         └─┴─┘
 */
import { formatSymbol } from '../../core/notation/serializer';
import { RunOutcome } from '../../core/types';
import type { Move, TapeSymbol, Trace } from '../../core/types';

export type HeaderFn = (symbols: readonly TapeSymbol[], isInput: boolean) => string;

export interface TraceTableOptions {
  /** Box-drawing characters (default) or plain ASCII. */
  fancy?: boolean;
  /** Mark the scanned cell on move rows (default true). */
  pointer?: boolean;
  header?: HeaderFn;
}

export interface TapeRowOptions {
  fancy?: boolean;
  /** Cell index to mark, if any. */
  pointer?: number | null;
}

const FANCY = { sep: '│', left: '├', right: '┤' } as const;
const ASCII = { sep: '|', left: '>', right: '|' } as const;

/** The last row reads `Stopped` when the run hit a bound instead of halting. */
function defaultHeader(outcome: RunOutcome): HeaderFn {
  return (_symbols, isInput) => {
    if (isInput) return 'Input';
    return outcome === RunOutcome.HALTED ? 'Output' : 'Stopped';
  };
}

export function renderTapeRow(symbols: readonly TapeSymbol[], options: TapeRowOptions = {}): string {
  const chars = options.fancy === false ? ASCII : FANCY;
  const row: string[] = [chars.sep];
  for (const symbol of symbols) {
    row.push(formatSymbol(symbol), chars.sep);
  }
  const pointer = options.pointer ?? null;
  if (pointer !== null && pointer >= 0 && pointer < symbols.length) {
    row[pointer * 2] = chars.left;
    row[pointer * 2 + 2] = chars.right;
  }
  return row.join('');
}

/** Index of the scanned cell in the move's post-step tape. */
export function scannedCell(move: Move): number {
  return move.extended === 'left' ? move.fromSquare + 1 : move.fromSquare;
}

/** Horizontal rule matching a rendered row's cell layout. */
function border(row: string, ends: [string, string], joint: string): string {
  const cells = row.replace(/[^│├┤]/g, '─').replace(/[├┤]/g, '│').split('');
  cells[0] = ends[0];
  cells[cells.length - 1] = ends[1];
  return cells.join('').replace(/│/g, joint);
}

export function renderTrace(trace: Trace, options: TraceTableOptions = {}): string {
  const fancy = options.fancy !== false;
  const showPointer = options.pointer !== false;
  const header = options.header ?? defaultHeader(trace.outcome);

  const headers = [
    header(trace.input, true),
    ...trace.moves.map(move => `State ${move.fromState}`),
    header(trace.output, false),
  ];
  const rows = [
    renderTapeRow(trace.input, { fancy }),
    ...trace.moves.map(move => renderTapeRow(move.symbols, {
      fancy,
      pointer: showPointer ? scannedCell(move) : null,
    })),
    renderTapeRow(trace.output, { fancy }),
  ];

  const headerSize = Math.max(...headers.map(h => h.length)) + 1;
  const lines = headers.map((h, i) => h.padEnd(headerSize) + rows[i]);

  if (fancy) {
    const indent = ' '.repeat(headerSize);
    const first = rows[0];
    const last = rows[rows.length - 1];
    lines.unshift(indent + border(first, ['┌', '┐'], '┬'));
    lines.splice(2, 0, indent + border(first, ['├', '┤'], '┼'));
    lines.splice(lines.length - 1, 0, indent + border(last, ['├', '┤'], '┼'));
    lines.push(indent + border(last, ['└', '┘'], '┴'));
  }

  return lines.join('\n');
}
