/**
 * Package requirements: `\usepackage[options]{name}`.
 */

import { Command, type OptionsInput } from "./base/command.js";

/**
 * A LaTeX package. Packages are commands, so two requirements with the same
 * name and options are equal and collapse when collected.
 *
 * @example
 * ```typescript
 * new Package("geometry", new Options(null, { margin: "2cm" })).render();
 * // "\\usepackage[margin=2cm]{geometry}"
 * ```
 */
export class Package extends Command {
  readonly packageName: string;

  constructor(name: string, options?: OptionsInput) {
    super("usepackage", name, options);
    this.packageName = name;
  }
}
