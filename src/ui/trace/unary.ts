import { InvalidArgumentError } from '../../core/errors';
import type { TapeSymbol } from '../../core/types';

/** Unary numbers on a tape: n is a run of n+1 marks, runs split by blanks. */
export function decodeUnary(symbols: readonly TapeSymbol[]): number[] {
  const numbers: number[] = [];
  let run = 0;
  for (const symbol of symbols) {
    if (symbol) {
      run++;
    } else if (run > 0) {
      numbers.push(run - 1);
      run = 0;
    }
  }
  if (run > 0) numbers.push(run - 1);
  return numbers;
}

export function encodeUnary(numbers: readonly number[]): TapeSymbol[] {
  const symbols: TapeSymbol[] = [];
  numbers.forEach((n, i) => {
    if (!Number.isInteger(n) || n < 0) {
      throw new InvalidArgumentError('unary number', n, 'a non-negative integer');
    }
    if (i > 0) symbols.push(false);
    for (let k = 0; k <= n; k++) symbols.push(true);
  });
  return symbols;
}

/** Header function for renderTrace: the decoded numbers, space separated. */
export function unaryHeader(symbols: readonly TapeSymbol[]): string {
  return decodeUnary(symbols).join(' ');
}
