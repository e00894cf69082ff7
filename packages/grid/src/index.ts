/**
 * @texforge/grid: rectangular grids of cell values
 *
 * The grid provider consumed by the matrix composites in @texforge/markup:
 * any `GridLike<T>` can be adopted, and the shape operations (flatten,
 * transpose, reshape) always return fresh immutable grids.
 *
 * @packageDocumentation
 */

export {
  type GridLike,
  type Grid,
  type GridSource,
  type GridEntry,
  grid,
  fromRows,
  fromValues,
  fromGridLike,
  isGridLike,
  toGrid,
  size,
  isSquare,
  row,
  col,
  toArray,
  entries,
  transpose,
  reshape,
  flatten,
  map,
} from "./grid.js";
