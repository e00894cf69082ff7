/**
 * Math: inline and display math blocks, aligned equations and matrices.
 *
 * @example
 * ```typescript
 * dollar("c_B").render();                     // "$c_B$"
 * vector([1, 2]).render();
 * // "\\begin{pmatrix}%\n1&2%\n\\end{pmatrix}"
 * determinant([[1, 2], [3, 4]]).render();
 * // "\\begin{vmatrix}%\n1&2\\\\%\n3&4%\n\\end{vmatrix}"
 * ```
 */

import { config, debug, eqStructural, hashStructural, uniqueBy } from "@texforge/core";
import {
  entries,
  flatten,
  isSquare,
  toGrid,
  transpose,
  type Grid,
  type GridSource,
} from "@texforge/grid";
import { Command } from "./base/command.js";
import {
  Container,
  Environment,
  EnvironmentFrame,
  type ContentItem,
} from "./base/containers.js";
import { MarkupObject, renderValue, type Stringifiable } from "./base/markup-object.js";
import { ShapeError, TypeMismatchError } from "./errors.js";
import { Package } from "./package.js";

// ============================================================================
// Math Blocks
// ============================================================================

export interface MathOptions {
  /** Content of the math block */
  data?: ContentItem | readonly ContentItem[];
  /** Inline `$...$` instead of display math */
  inline?: boolean;
  /** Display math as `$$...$$` instead of `\[...\]` */
  dollar?: boolean;
  /** Escape plain-string content (off by default) */
  escape?: boolean;
}

/**
 * A math block. `inline` wins over `dollar`:
 *
 * | inline | dollar | output            |
 * |--------|--------|-------------------|
 * | true   | any    | `$...$`           |
 * | false  | true   | `$$\n...\n$$`     |
 * | false  | false  | `\[%\n...%\n\]`   |
 */
export class MathBlock extends Container {
  readonly inline: boolean;
  readonly dollar: boolean;
  protected contentSeparator = " ";

  constructor({ data, inline = false, dollar = false, escape }: MathOptions = {}) {
    super({ data, escape, packages: [new Package("amsmath")] });
    this.inline = inline;
    this.dollar = dollar;
  }

  protected defaultEscape(): boolean {
    return false;
  }

  render(): string {
    const content = this.renderContent();
    if (this.inline) {
      return `$${content}$`;
    }
    if (this.dollar) {
      return `$$\n${content}\n$$`;
    }
    return `\\[%\n${content}%\n\\]`;
  }
}

/**
 * Inline math: `$math expression$`.
 */
export function dollar(
  data: ContentItem | readonly ContentItem[],
  options: Omit<MathOptions, "data" | "inline" | "dollar"> = {}
): MathBlock {
  return new MathBlock({ ...options, data, inline: true });
}

/**
 * Display math with double dollars: `$$\nmath expression\n$$`.
 */
export function ddollar(
  data: ContentItem | readonly ContentItem[],
  options: Omit<MathOptions, "data" | "inline" | "dollar"> = {}
): MathBlock {
  return new MathBlock({ ...options, data, dollar: true });
}

// ============================================================================
// Alignat
// ============================================================================

export interface AlignatOptions {
  /** Number of alignment columns */
  aligns?: number;
  /** Number the equations; off selects `alignat*` */
  numbering?: boolean;
  escape?: boolean;
  data?: ContentItem | readonly ContentItem[];
}

/**
 * An `alignat` environment. It is left out entirely when empty, since an
 * empty `alignat` does not compile.
 */
export class Alignat extends Environment {
  readonly aligns: number;
  readonly numbering: boolean;

  /**
   * @throws TypeMismatchError if `aligns` is not a finite number
   */
  constructor({ aligns = 2, numbering = true, escape, data }: AlignatOptions = {}) {
    if (!Number.isFinite(aligns)) {
      throw new TypeMismatchError("aligns", "a finite number", String(aligns));
    }
    super("alignat", {
      data,
      escape,
      startArguments: [String(Math.trunc(aligns))],
      star: !numbering,
      omitIfEmpty: true,
      packages: [new Package("amsmath")],
    });
    this.aligns = aligns;
    this.numbering = numbering;
  }

  protected defaultEscape(): boolean {
    return false;
  }
}

/**
 * A bold vector name: `\mathbf{name}`.
 */
export class VectorName extends Command {
  constructor(name: string) {
    super("mathbf", name);
  }
}

// ============================================================================
// Matrices
// ============================================================================

export type Cell = Stringifiable;

/** Bracket styles: p = ( ), b = [ ], B = { }, v = | |, V = || || */
export type BracketStyle = "p" | "b" | "B" | "v" | "V";

export const BRACKET_STYLES: readonly BracketStyle[] = ["p", "b", "B", "v", "V"];

export function isBracketStyle(value: string): value is BracketStyle {
  return BRACKET_STYLES.some((style) => style === value);
}

/** A construction step applied once to the supplied grid. */
export type GridStep = <T>(g: Grid<T>) => Grid<T>;

/**
 * Reject non-square grids.
 *
 * @throws ShapeError
 */
export const requireSquare: GridStep = (g) => {
  if (!isSquare(g)) {
    throw new ShapeError(g.rows, g.cols, `Expected a square grid, got ${g.rows}x${g.cols}`);
  }
  return g;
};

/** Row-major flatten to a single row. */
export const flattenToRow: GridStep = (g) => flatten(g);

export const transposeGrid: GridStep = (g) => transpose(g);

export type MatrixVariant = "matrix" | "determinant" | "vector" | "column-vector";

interface VariantSpec {
  readonly steps: readonly GridStep[];
  /** Fixed bracket style, overriding any requested one */
  readonly mtype?: BracketStyle;
}

const VARIANTS: Readonly<Record<MatrixVariant, VariantSpec>> = {
  matrix: { steps: [] },
  determinant: { steps: [requireSquare], mtype: "v" },
  vector: { steps: [flattenToRow] },
  "column-vector": { steps: [flattenToRow, transposeGrid] },
};

export interface MatrixOptions {
  /** Bracket style; defaults to `config.matrix.type` */
  mtype?: BracketStyle;
  /**
   * Cell alignment (e.g. `"r"`). Selects the starred environment, which
   * comes from `mathtools`.
   */
  alignment?: string;
}

function resolveBracketStyle(requested: string | undefined): BracketStyle {
  const mtype = requested ?? config.defaultMatrixType();
  if (!isBracketStyle(mtype)) {
    throw new TypeMismatchError("mtype", `one of ${BRACKET_STYLES.join(", ")}`, JSON.stringify(mtype));
  }
  return mtype;
}

/**
 * A matrix environment (`pmatrix`, `bmatrix`, ...). The variant's steps
 * run once, at construction; the grid never changes afterwards.
 */
export class Matrix extends MarkupObject {
  readonly frame: EnvironmentFrame;
  readonly grid: Grid<Cell>;
  readonly mtype: BracketStyle;
  readonly alignment: string | undefined;
  readonly variant: MatrixVariant;

  constructor(source: GridSource<Cell>, options: MatrixOptions = {}, variant: MatrixVariant = "matrix") {
    const spec = VARIANTS[variant];
    const mtype = spec.mtype ?? resolveBracketStyle(options.mtype);
    const packages = [new Package("amsmath")];
    if (options.alignment !== undefined) {
      packages.push(new Package("mathtools"));
    }

    super({ packages });

    const supplied = toGrid(source);
    let shaped = supplied;
    for (const step of spec.steps) {
      shaped = step(shaped);
    }
    if (shaped.rows !== supplied.rows || shaped.cols !== supplied.cols) {
      debug(
        "matrix",
        () => `${variant}: ${supplied.rows}x${supplied.cols} -> ${shaped.rows}x${shaped.cols}`,
        this.tracing
      );
    }

    this.frame = new EnvironmentFrame(`${mtype}matrix`, {
      arguments: options.alignment,
      star: options.alignment !== undefined,
    });
    this.grid = shaped;
    this.mtype = mtype;
    this.alignment = options.alignment;
    this.variant = variant;
  }

  get latexName(): string {
    return this.frame.latexName;
  }

  get environmentName(): string {
    return this.frame.environmentName;
  }

  /**
   * Cells joined by `&`, every row but the last ended by `\\` and a line
   * continuation.
   */
  renderContent(): string {
    let content = "";
    const lastCol = this.grid.cols - 1;
    const lastRow = this.grid.rows - 1;

    for (const { row, col, value } of entries(this.grid)) {
      if (col) {
        content += "&";
      }
      content += renderValue(value);

      if (col === lastCol && row !== lastRow) {
        content += "\\\\%\n";
      }
    }

    return content;
  }

  render(): string {
    return this.frame.wrap(this.renderContent(), "%\n", this.tracing);
  }

  /**
   * Packages of the matrix itself and of any markup objects among its cells.
   */
  collectPackages(): Package[] {
    const all: Package[] = [...this.packages];
    for (const cell of this.grid.data) {
      if (cell instanceof MarkupObject) {
        all.push(...cell.collectPackages());
      }
    }
    return uniqueBy<Package>(all, eqStructural, hashStructural);
  }
}

export function matrix(source: GridSource<Cell>, options: MatrixOptions = {}): Matrix {
  return new Matrix(source, options, "matrix");
}

/**
 * The determinant of a square grid, written with single bars.
 *
 * @throws ShapeError if the grid is not square
 */
export function determinant(
  source: GridSource<Cell>,
  options: Omit<MatrixOptions, "mtype"> = {}
): Matrix {
  return new Matrix(source, options, "determinant");
}

/**
 * A row vector. Any grid is flattened (row-major) to one row.
 */
export function vector(source: GridSource<Cell>, options: MatrixOptions = {}): Matrix {
  return new Matrix(source, options, "vector");
}

/**
 * A column vector: the transpose of {@link vector}.
 */
export function columnVector(source: GridSource<Cell>, options: MatrixOptions = {}): Matrix {
  return new Matrix(source, options, "column-vector");
}
