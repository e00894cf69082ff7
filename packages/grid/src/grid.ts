/**
 * Grid<T> - Rectangular, row-major grids of cell values
 *
 * Grids are immutable: every operation returns a new grid. Any value that
 * exposes a row/column count and indexed cell access (`GridLike<T>`) can be
 * adopted, so callers may hand in their own numeric matrix types.
 *
 * @example
 * ```typescript
 * const g = fromRows([
 *   [1, 2, 3],
 *   [4, 5, 6],
 * ]);
 * transpose(g);        // 3x2
 * flatten(g);          // 1x6: [[1, 2, 3, 4, 5, 6]]
 * reshape(g, 3, 2);    // [[1, 2], [3, 4], [5, 6]]
 * ```
 */

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * The provider contract: a shape plus indexed access in row-major order.
 */
export interface GridLike<T> {
  readonly rows: number;
  readonly cols: number;
  get(row: number, col: number): T;
}

/**
 * A dense grid backed by a row-major array.
 */
export interface Grid<T> extends GridLike<T> {
  readonly data: readonly T[];
}

/**
 * Anything that can be turned into a grid: a provider, an array of rows,
 * or a flat array (taken as a single row).
 */
export type GridSource<T> = GridLike<T> | readonly (readonly T[])[] | readonly T[];

class DenseGrid<T> implements Grid<T> {
  constructor(
    readonly rows: number,
    readonly cols: number,
    readonly data: readonly T[]
  ) {}

  get(row: number, col: number): T {
    if (row < 0 || row >= this.rows || col < 0 || col >= this.cols) {
      throw new RangeError(`Cell (${row}, ${col}) is outside a ${this.rows}x${this.cols} grid`);
    }
    return this.data[row * this.cols + col];
  }
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a grid from dimensions and row-major data.
 *
 * @throws RangeError if data length doesn't match dimensions
 */
export function grid<T>(rows: number, cols: number, data: readonly T[]): Grid<T> {
  if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows < 0 || cols < 0) {
    throw new RangeError(`Invalid grid dimensions ${rows}x${cols}`);
  }
  const expectedLength = rows * cols;
  if (data.length !== expectedLength) {
    throw new RangeError(
      `Grid data length ${data.length} doesn't match dimensions ${rows}x${cols} (expected ${expectedLength})`
    );
  }
  return new DenseGrid(rows, cols, Object.freeze([...data]));
}

/**
 * Create a grid from row arrays.
 */
export function fromRows<T>(rowList: readonly (readonly T[])[]): Grid<T> {
  if (rowList.length === 0) {
    return grid<T>(0, 0, []);
  }
  const c = rowList[0].length;
  const data: T[] = [];
  for (const r of rowList) {
    if (r.length !== c) {
      throw new RangeError("All rows must have the same length");
    }
    data.push(...r);
  }
  return grid(rowList.length, c, data);
}

/**
 * Create a single-row grid from a flat list of values.
 */
export function fromValues<T>(values: readonly T[]): Grid<T> {
  return grid(values.length === 0 ? 0 : 1, values.length, values);
}

/**
 * Copy any provider into a dense grid.
 */
export function fromGridLike<T>(source: GridLike<T>): Grid<T> {
  if (source instanceof DenseGrid) {
    return source;
  }
  const data: T[] = [];
  for (let i = 0; i < source.rows; i++) {
    for (let j = 0; j < source.cols; j++) {
      data.push(source.get(i, j));
    }
  }
  return grid(source.rows, source.cols, data);
}

function isArraySource<T>(
  source: GridSource<T>
): source is readonly (readonly T[])[] | readonly T[] {
  return Array.isArray(source);
}

export function isGridLike<T>(source: GridSource<T>): source is GridLike<T> {
  return !isArraySource(source);
}

function isRowList<T>(
  source: readonly (readonly T[])[] | readonly T[]
): source is readonly (readonly T[])[] {
  return source.length > 0 && source.every((r) => Array.isArray(r));
}

/**
 * Normalize any grid source into a dense grid.
 *
 * @throws RangeError for ragged rows, or a mix of rows and bare cells
 */
export function toGrid<T>(source: GridSource<T>): Grid<T> {
  if (!isArraySource(source)) {
    return fromGridLike(source);
  }
  if (isRowList(source)) {
    return fromRows(source);
  }
  if (source.some((cell) => Array.isArray(cell))) {
    throw new RangeError("Grid source mixes rows and single cells");
  }
  return fromValues(source);
}

// ============================================================================
// Element Access
// ============================================================================

/** Total number of cells. */
export function size<T>(g: GridLike<T>): number {
  return g.rows * g.cols;
}

export function isSquare<T>(g: GridLike<T>): boolean {
  return g.rows === g.cols;
}

/**
 * Get a row as an array.
 */
export function row<T>(g: GridLike<T>, i: number): T[] {
  const result: T[] = [];
  for (let j = 0; j < g.cols; j++) {
    result.push(g.get(i, j));
  }
  return result;
}

/**
 * Get a column as an array.
 */
export function col<T>(g: GridLike<T>, j: number): T[] {
  const result: T[] = [];
  for (let i = 0; i < g.rows; i++) {
    result.push(g.get(i, j));
  }
  return result;
}

/**
 * Convert to a nested array of rows.
 */
export function toArray<T>(g: GridLike<T>): T[][] {
  const result: T[][] = [];
  for (let i = 0; i < g.rows; i++) {
    result.push(row(g, i));
  }
  return result;
}

/** A cell together with its position. */
export interface GridEntry<T> {
  readonly row: number;
  readonly col: number;
  readonly value: T;
}

/**
 * Enumerate cells in row-major order.
 */
export function* entries<T>(g: GridLike<T>): Generator<GridEntry<T>> {
  for (let i = 0; i < g.rows; i++) {
    for (let j = 0; j < g.cols; j++) {
      yield { row: i, col: j, value: g.get(i, j) };
    }
  }
}

// ============================================================================
// Shape Operations
// ============================================================================

/**
 * Transpose a grid.
 */
export function transpose<T>(g: GridLike<T>): Grid<T> {
  const r = g.rows;
  const c = g.cols;
  const data: T[] = new Array<T>(r * c);
  for (let i = 0; i < r; i++) {
    for (let j = 0; j < c; j++) {
      data[j * r + i] = g.get(i, j);
    }
  }
  return grid(c, r, data);
}

/**
 * Reinterpret the cells (row-major) under a new shape.
 *
 * @throws RangeError if the cell count changes
 */
export function reshape<T>(g: GridLike<T>, rows: number, cols: number): Grid<T> {
  const dense = fromGridLike(g);
  if (rows * cols !== dense.data.length) {
    throw new RangeError(
      `Cannot reshape a ${g.rows}x${g.cols} grid into ${rows}x${cols}`
    );
  }
  return grid(rows, cols, dense.data);
}

/**
 * Flatten to a single row of `rows * cols` cells.
 */
export function flatten<T>(g: GridLike<T>): Grid<T> {
  return reshape(g, 1, size(g));
}

/**
 * Apply a function to every cell.
 */
export function map<T, U>(g: GridLike<T>, f: (value: T, row: number, col: number) => U): Grid<U> {
  const data: U[] = [];
  for (const { row: i, col: j, value } of entries(g)) {
    data.push(f(value, i, j));
  }
  return grid(g.rows, g.cols, data);
}
