export type CellWidth = 8 | 16 | 32;

export type Cells = Int8Array | Int16Array | Int32Array;

export const CELL_WIDTHS: readonly CellWidth[] = [8, 16, 32];

export const isCellWidth = (n: number): n is CellWidth =>
  n === 8 || n === 16 || n === 32;

// Typed-array stores truncate to the element width, which gives two's
// complement wrapping on `+`/`-` and sign extension on `,` for free.
export function allocateCells(width: CellWidth, length: number): Cells {
  switch (width) {
    case 8:
      return new Int8Array(length);
    case 16:
      return new Int16Array(length);
    case 32:
      return new Int32Array(length);
  }
}

/**
 * Fixed-length cell memory plus the data pointer.
 * The pointer never leaves [0, length); moves that would are refused.
 */
export class Tape {
  private readonly cells: Cells;
  private pointer = 0;

  constructor(readonly length: number, readonly width: CellWidth) {
    this.cells = allocateCells(width, length);
  }

  get position(): number {
    return this.pointer;
  }

  get current(): number {
    return this.cells[this.pointer];
  }

  cellAt(index: number): number {
    return this.cells[index];
  }

  moveRight(): boolean {
    if (this.pointer === this.length - 1) return false;
    this.pointer++;
    return true;
  }

  moveLeft(): boolean {
    if (this.pointer === 0) return false;
    this.pointer--;
    return true;
  }

  increment(): void {
    this.cells[this.pointer] += 1;
  }

  decrement(): void {
    this.cells[this.pointer] -= 1;
  }

  store(value: number): void {
    this.cells[this.pointer] = value;
  }

  /** Low 8 bits of the current cell's bit pattern. */
  outputByte(): number {
    return this.cells[this.pointer] & 0xff;
  }
}
