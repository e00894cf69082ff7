import { describe, it, expect } from "vitest";
import {
  grid,
  fromRows,
  fromValues,
  fromGridLike,
  toGrid,
  isGridLike,
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
} from "../src/index.js";
import type { GridLike } from "../src/index.js";

describe("Grid", () => {
  describe("constructors", () => {
    it("creates grid from data", () => {
      const g = grid(2, 3, [1, 2, 3, 4, 5, 6]);
      expect(g.rows).toBe(2);
      expect(g.cols).toBe(3);
      expect(g.get(0, 0)).toBe(1);
      expect(g.get(0, 2)).toBe(3);
      expect(g.get(1, 0)).toBe(4);
    });

    it("throws for mismatched dimensions", () => {
      expect(() => grid(2, 3, [1, 2, 3])).toThrow(RangeError);
      expect(() => grid(-1, 0, [])).toThrow(RangeError);
    });

    it("does not share the caller's array", () => {
      const data = [1, 2];
      const g = grid(1, 2, data);
      data[0] = 9;
      expect(g.get(0, 0)).toBe(1);
    });

    it("creates from rows", () => {
      const g = fromRows([
        ["a", "b", "c"],
        ["d", "e", "f"],
      ]);
      expect(g.rows).toBe(2);
      expect(g.cols).toBe(3);
      expect(g.get(1, 2)).toBe("f");
    });

    it("rejects ragged rows", () => {
      expect(() => fromRows([[1, 2], [3]])).toThrow("All rows must have the same length");
    });

    it("creates an empty grid from no rows", () => {
      const g = fromRows<number>([]);
      expect(g.rows).toBe(0);
      expect(g.cols).toBe(0);
    });

    it("treats a flat list as a single row", () => {
      const g = fromValues([1, 2, 3]);
      expect(g.rows).toBe(1);
      expect(g.cols).toBe(3);
    });

    it("copies any GridLike provider", () => {
      const provider: GridLike<number> = {
        rows: 2,
        cols: 2,
        get: (r, c) => r * 10 + c,
      };
      expect(toArray(fromGridLike(provider))).toEqual([
        [0, 1],
        [10, 11],
      ]);
    });
  });

  describe("toGrid", () => {
    it("accepts rows, flat lists and providers", () => {
      expect(toArray(toGrid([[1, 2], [3, 4]]))).toEqual([
        [1, 2],
        [3, 4],
      ]);
      expect(toArray(toGrid([1, 2]))).toEqual([[1, 2]]);
      const g = grid(1, 1, ["x"]);
      expect(toGrid(g)).toBe(g);
    });

    it("rejects a mix of rows and cells", () => {
      const mixed: (number | number[])[] = [1, [2, 3]];
      expect(() => toGrid(mixed)).toThrow(RangeError);
    });
  });

  describe("element access", () => {
    const g = grid(2, 3, [1, 2, 3, 4, 5, 6]);

    it("gets row", () => {
      expect(row(g, 0)).toEqual([1, 2, 3]);
      expect(row(g, 1)).toEqual([4, 5, 6]);
    });

    it("gets column", () => {
      expect(col(g, 0)).toEqual([1, 4]);
      expect(col(g, 2)).toEqual([3, 6]);
    });

    it("rejects out-of-range cells", () => {
      expect(() => g.get(2, 0)).toThrow(RangeError);
      expect(() => g.get(0, 3)).toThrow(RangeError);
    });

    it("enumerates cells in row-major order", () => {
      const seen = [...entries(grid(2, 2, ["a", "b", "c", "d"]))];
      expect(seen).toEqual([
        { row: 0, col: 0, value: "a" },
        { row: 0, col: 1, value: "b" },
        { row: 1, col: 0, value: "c" },
        { row: 1, col: 1, value: "d" },
      ]);
    });

    it("reports size and squareness", () => {
      expect(size(g)).toBe(6);
      expect(isSquare(g)).toBe(false);
      expect(isSquare(grid(2, 2, [1, 2, 3, 4]))).toBe(true);
    });
  });

  describe("transpose", () => {
    it("transposes grid", () => {
      const t = transpose(grid(2, 3, [1, 2, 3, 4, 5, 6]));
      expect(t.rows).toBe(3);
      expect(t.cols).toBe(2);
      expect(toArray(t)).toEqual([
        [1, 4],
        [2, 5],
        [3, 6],
      ]);
    });

    it("transpose of transpose is original", () => {
      const g = grid(2, 3, [1, 2, 3, 4, 5, 6]);
      expect(toArray(transpose(transpose(g)))).toEqual(toArray(g));
    });
  });

  describe("reshape", () => {
    it("keeps row-major order", () => {
      expect(toArray(reshape(grid(2, 3, [1, 2, 3, 4, 5, 6]), 3, 2))).toEqual([
        [1, 2],
        [3, 4],
        [5, 6],
      ]);
    });

    it("rejects a different cell count", () => {
      expect(() => reshape(grid(2, 2, [1, 2, 3, 4]), 3, 1)).toThrow(
        "Cannot reshape a 2x2 grid into 3x1"
      );
    });

    it("flattens any shape to one row", () => {
      const flat = flatten(grid(3, 2, [1, 2, 3, 4, 5, 6]));
      expect(flat.rows).toBe(1);
      expect(flat.cols).toBe(6);
      expect(flat.data).toEqual([1, 2, 3, 4, 5, 6]);
    });
  });

  it("maps cells with their position", () => {
    const g = map(grid(2, 2, [1, 2, 3, 4]), (v, r, c) => `${r}${c}:${v}`);
    expect(toArray(g)).toEqual([
      ["00:1", "01:2"],
      ["10:3", "11:4"],
    ]);
  });
});

describe("isGridLike", () => {
  it("tells providers from arrays", () => {
    const provider: GridLike<number> = { rows: 1, cols: 1, get: () => 7 };
    expect(isGridLike(provider)).toBe(true);
    expect(isGridLike([1, 2])).toBe(false);
    expect(isGridLike([[1], [2]])).toBe(false);
  });
});
