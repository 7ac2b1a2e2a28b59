import { InvalidDimensionsError, OutOfBoundsError } from './life-errors';
import { seededRandom, systemRandom } from './random-source';
import type { RandomSource } from './random-source';

export interface Cell {
  x: number;
  y: number;
}

/**
 * How neighbour counting treats the grid edge.
 * - `toroidal`: coordinates wrap, so the left edge touches the right edge.
 * - `bounded`: anything off the grid counts as dead.
 */
export type EdgePolicy = 'toroidal' | 'bounded';

/** Grid contents indexed `[y][x]`; `true` is alive. */
export type LifePattern = boolean[][];

export interface LifeOptions {
  edgePolicy?: EdgePolicy;
  /** Makes the random initial fill reproducible. */
  seed?: number | string;
  /** Overrides `seed` when both are present. */
  random?: RandomSource;
  /** Explicit initial state. Rows may be shorter than the grid; missing cells are dead. */
  pattern?: LifePattern;
  /** Explicit live cells, applied on top of `pattern`. */
  cells?: Cell[];
}

export const DEFAULT_EDGE_POLICY: EdgePolicy = 'toroidal';

/**
 * Conway's Game of Life (B3/S23) on a fixed-size grid.
 *
 * The grid is double-buffered: `step()` reads only the current generation and
 * writes the next one, then swaps them, so `alive()` never sees a half-updated
 * grid.
 */
export class Life {
  readonly cols: number;
  readonly rows: number;
  readonly edgePolicy: EdgePolicy;

  private current: Uint8Array;
  private next: Uint8Array;
  private generationCount = 0;

  constructor(cols: number, rows: number, options: LifeOptions = {}) {
    if (!isPositiveInteger(cols) || !isPositiveInteger(rows)) {
      throw new InvalidDimensionsError(cols, rows);
    }
    this.cols = cols;
    this.rows = rows;
    this.edgePolicy = options.edgePolicy ?? DEFAULT_EDGE_POLICY;
    this.current = new Uint8Array(cols * rows);
    this.next = new Uint8Array(cols * rows);

    if (options.pattern || options.cells) {
      this.seedPattern(options.pattern ?? []);
      this.seedCells(options.cells ?? []);
    } else {
      this.seedRandom(options.random ?? (options.seed !== undefined ? seededRandom(options.seed) : systemRandom));
    }
  }

  /** Builds an engine sized to the pattern: width is its longest row. */
  static fromPattern(pattern: LifePattern, options: Omit<LifeOptions, 'pattern'> = {}): Life {
    const rows = pattern.length;
    const cols = pattern.reduce((widest, row) => Math.max(widest, row.length), 0);
    return new Life(cols, rows, { ...options, pattern });
  }

  get generation() {
    return this.generationCount;
  }

  alive(x: number, y: number): boolean {
    this.assertInBounds(x, y);
    return this.current[y * this.cols + x] === 1;
  }

  step(): void {
    const { cols, rows, current, next } = this;
    const wrap = this.edgePolicy === 'toroidal';
    for (let y = 0; y < rows; y++) {
      for (let x = 0; x < cols; x++) {
        const index = y * cols + x;
        const neighbors = this.countNeighbors(x, y, wrap);
        next[index] = neighbors === 3 || (neighbors === 2 && current[index] === 1) ? 1 : 0;
      }
    }
    this.current = next;
    this.next = current;
    this.generationCount++;
  }

  steps(generations: number): void {
    if (!Number.isSafeInteger(generations) || generations < 0) {
      throw new RangeError(`Generation count must be a non-negative integer, got ${generations}.`);
    }
    for (let i = 0; i < generations; i++) {
      this.step();
    }
  }

  liveCount(): number {
    let count = 0;
    for (const cell of this.current) {
      count += cell;
    }
    return count;
  }

  liveCells(): Cell[] {
    const cells: Cell[] = [];
    for (let y = 0; y < this.rows; y++) {
      for (let x = 0; x < this.cols; x++) {
        if (this.current[y * this.cols + x] === 1) {
          cells.push({ x, y });
        }
      }
    }
    return cells;
  }

  snapshot(): LifePattern {
    return Array.from({ length: this.rows }, (_, y) =>
      Array.from({ length: this.cols }, (_, x) => this.current[y * this.cols + x] === 1)
    );
  }

  equals(other: Life): boolean {
    if (other.cols !== this.cols || other.rows !== this.rows) return false;
    for (let i = 0; i < this.current.length; i++) {
      if (other.current[i] !== this.current[i]) return false;
    }
    return true;
  }

  /** Plaintext rendering: `O` alive, `.` dead, one line per row. */
  toString(): string {
    return this.snapshot()
      .map(row => row.map(alive => (alive ? 'O' : '.')).join(''))
      .join('\n');
  }

  private countNeighbors(x: number, y: number, wrap: boolean): number {
    const { cols, rows, current } = this;
    let count = 0;
    for (let dy = -1; dy <= 1; dy++) {
      for (let dx = -1; dx <= 1; dx++) {
        if (dx === 0 && dy === 0) continue;
        let nx = x + dx;
        let ny = y + dy;
        if (wrap) {
          nx = (nx + cols) % cols;
          ny = (ny + rows) % rows;
        } else if (nx < 0 || nx >= cols || ny < 0 || ny >= rows) {
          continue;
        }
        count += current[ny * cols + nx];
      }
    }
    return count;
  }

  // One draw per four cells; draws may land on the same cell.
  private seedRandom(random: RandomSource) {
    const draws = Math.floor((this.cols * this.rows) / 4);
    for (let i = 0; i < draws; i++) {
      const x = Math.min(this.cols - 1, Math.floor(random() * this.cols));
      const y = Math.min(this.rows - 1, Math.floor(random() * this.rows));
      this.current[y * this.cols + x] = 1;
    }
  }

  private seedPattern(pattern: LifePattern) {
    pattern.forEach((row, y) => {
      row.forEach((alive, x) => {
        if (!alive) return;
        this.assertInBounds(x, y);
        this.current[y * this.cols + x] = 1;
      });
    });
  }

  private seedCells(cells: Cell[]) {
    for (const cell of cells) {
      this.assertInBounds(cell.x, cell.y);
      this.current[cell.y * this.cols + cell.x] = 1;
    }
  }

  private assertInBounds(x: number, y: number) {
    if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= this.cols || y >= this.rows) {
      throw new OutOfBoundsError(x, y, this.cols, this.rows);
    }
  }
}

export function newLife(cols: number, rows: number, options: LifeOptions = {}): Life {
  return new Life(cols, rows, options);
}

function isPositiveInteger(value: number) {
  return Number.isSafeInteger(value) && value > 0;
}
