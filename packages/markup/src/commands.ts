/**
 * Shorthands for building commands.
 */

import type { KeyTuple } from "@texforge/core";
import { Command } from "./base/command.js";
import { renderValue } from "./base/markup-object.js";
import { Options, type ParameterValue } from "./base/parameters.js";
import { DefinitionError } from "./errors.js";

export type CommandFactory = (...args: ParameterValue[]) => Command;

/**
 * Any property is a command of that name taking its call arguments.
 *
 * @example
 * ```typescript
 * slash.frac("x", "y").render(); // "\\frac{x}{y}"
 * slash.alpha().render();        // "\\alpha"
 * ```
 */
export const slash: Readonly<Record<string, CommandFactory>> = new Proxy(
  {},
  {
    get(_target, name) {
      if (typeof name !== "string") return undefined;
      const factory: CommandFactory = (...args) => new Command(name, args);
      return factory;
    },
  }
);

/** Highest `#n` parameter reference in a macro body. */
export function countMacroParameters(definition: string): number {
  let count = 0;
  for (const match of definition.matchAll(/#(\d)/g)) {
    count = Math.max(count, Number(match[1]));
  }
  return count;
}

export interface NewCommandOptions {
  /** Default for the first parameter, making it optional */
  default?: ParameterValue;
}

/**
 * `\newcommand{\name}[n][default]{definition}`. The parameter count is the
 * highest `#n` in the definition; the block is left out when it is zero.
 */
export class NewCommand extends Command {
  readonly defaultValue: Options | undefined;

  /**
   * @throws DefinitionError if a default is given but the definition uses no parameters
   */
  constructor(name: string, definition: ParameterValue, options: NewCommandOptions = {}) {
    const count = countMacroParameters(renderValue(definition));
    if (count === 0 && options.default !== undefined) {
      throw new DefinitionError(name, `\\${name} has a default value but no #1 parameter`);
    }
    super("newcommand", `\\${name}`, count > 0 ? count : undefined, definition);
    this.defaultValue = options.default === undefined ? undefined : new Options(options.default);
  }

  render(): string {
    const defaultValue = this.defaultValue?.render() ?? "";
    const definition = this.extraArguments?.render() ?? "";
    return `\\${this.name}${this.arguments.render()}${this.options.render()}${defaultValue}${definition}`;
  }

  protected key(): KeyTuple {
    return [...super.key(), this.defaultValue ?? null];
  }
}

/**
 * @example
 * ```typescript
 * newcommand("mycmd", "#1+#2", { default: "lala" }).render();
 * // "\\newcommand{\\mycmd}[2][lala]{#1+#2}"
 * ```
 */
export function newcommand(
  name: string,
  definition: ParameterValue,
  options: NewCommandOptions = {}
): NewCommand {
  return new NewCommand(name, definition, options);
}
