/**
 * Two-way growable tape of binary symbols.
 *
 * Cells live in a byte buffer with free room on both sides. `origin` is the
 * buffer slot of logical position 0, so extending left only moves the origin
 * back by one; the buffer is re-centred (capacity doubled) when a side runs
 * out. Logical positions still shift by +1 on every left extension.
 */
import { BLANK, TAPE_MIN_CAPACITY } from './constants';
import { TapeRangeError } from './errors';
import type { TapeSymbol } from './types';

export class Tape {
  private cells: Uint8Array;
  private origin: number;
  private size: number;

  constructor(symbols: readonly TapeSymbol[] = [BLANK]) {
    // An empty tape is still one blank cell
    const initial = symbols.length > 0 ? symbols : [BLANK];
    const capacity = Math.max(TAPE_MIN_CAPACITY, initial.length * 2);
    this.cells = new Uint8Array(capacity);
    this.size = initial.length;
    this.origin = (capacity - this.size) >> 1;
    for (let i = 0; i < initial.length; i++) {
      this.cells[this.origin + i] = initial[i] ? 1 : 0;
    }
  }

  static fromSymbols(symbols: readonly TapeSymbol[]): Tape {
    return new Tape(symbols);
  }

  get length(): number {
    return this.size;
  }

  read(position: number): TapeSymbol {
    this.checkPosition(position);
    return this.cells[this.origin + position] === 1;
  }

  write(position: number, symbol: TapeSymbol): void {
    this.checkPosition(position);
    this.cells[this.origin + position] = symbol ? 1 : 0;
  }

  /** Prepend a blank cell. Existing positions move up by one. */
  extendLeft(): void {
    if (this.origin === 0) this.grow();
    this.origin--;
    this.cells[this.origin] = 0;
    this.size++;
  }

  /** Append a blank cell. */
  extendRight(): void {
    if (this.origin + this.size === this.cells.length) this.grow();
    this.cells[this.origin + this.size] = 0;
    this.size++;
  }

  toArray(): TapeSymbol[] {
    const result: TapeSymbol[] = new Array(this.size);
    for (let i = 0; i < this.size; i++) {
      result[i] = this.cells[this.origin + i] === 1;
    }
    return result;
  }

  clone(): Tape {
    return new Tape(this.toArray());
  }

  private checkPosition(position: number): void {
    if (!Number.isInteger(position) || position < 0 || position >= this.size) {
      throw new TapeRangeError(position, this.size);
    }
  }

  private grow(): void {
    const capacity = this.cells.length * 2;
    const origin = (capacity - this.size) >> 1;
    const cells = new Uint8Array(capacity);
    cells.set(this.cells.subarray(this.origin, this.origin + this.size), origin);
    this.cells = cells;
    this.origin = origin;
  }
}
