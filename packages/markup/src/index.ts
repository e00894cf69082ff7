/**
 * @texforge/markup: build LaTeX as an object graph, then render it.
 *
 * ```typescript
 * import { Command, Options, matrix, dollar } from "@texforge/markup";
 *
 * new Command("documentclass", "article", Options.of("12pt", "a4paper")).render();
 * // "\\documentclass[12pt,a4paper]{article}"
 * ```
 *
 * @packageDocumentation
 */

export * from "./base/index.js";

export {
  MarkupError,
  ShapeError,
  TypeMismatchError,
  DefinitionError,
  type MarkupErrorKind,
} from "./errors.js";
export { escapeLatex, NoEscape, renderList, type RenderListOptions } from "./escape.js";
export { Package } from "./package.js";

export {
  MathBlock,
  dollar,
  ddollar,
  Alignat,
  VectorName,
  Matrix,
  matrix,
  determinant,
  vector,
  columnVector,
  requireSquare,
  flattenToRow,
  transposeGrid,
  isBracketStyle,
  BRACKET_STYLES,
  type MathOptions,
  type AlignatOptions,
  type Cell,
  type BracketStyle,
  type GridStep,
  type MatrixVariant,
  type MatrixOptions,
} from "./math.js";

export {
  slash,
  newcommand,
  NewCommand,
  countMacroParameters,
  type CommandFactory,
  type NewCommandOptions,
} from "./commands.js";
