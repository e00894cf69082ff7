/**
 * LaTeX commands: a name followed by option and argument blocks.
 */

import { keyEquals, keyHash, type KeyTuple, type Structural } from "@texforge/core";
import { TypeMismatchError } from "../errors.js";
import type { Package } from "../package.js";
import { MarkupObject } from "./markup-object.js";
import {
  Arguments,
  Options,
  Parameters,
  type KeyedValues,
  type ParameterInput,
} from "./parameters.js";

// ============================================================================
// Slot Normalization
// ============================================================================

/** What a command accepts for its `arguments`/`extraArguments`. */
export type ArgumentsInput = Arguments | ParameterInput | null | undefined;

/** What a command accepts for its `options`. */
export type OptionsInput = Options | ParameterInput | null | undefined;

type ParametersClass<P extends Parameters> = new (
  input?: ParameterInput | null,
  keyed?: KeyedValues
) => P;

function toParameters<P extends Parameters>(
  input: P | ParameterInput | null | undefined,
  kind: ParametersClass<P>,
  slot: string
): P {
  if (input === undefined || input === null) {
    return new kind();
  }
  if (input instanceof kind) {
    return input;
  }
  if (input instanceof Parameters) {
    throw new TypeMismatchError(slot, kind.name, input.constructor.name);
  }
  return new kind(input);
}

/**
 * Coerce a slot value into `Arguments`. Absent becomes empty; a container
 * of another kind is rejected.
 *
 * @throws TypeMismatchError when given `Options` or another non-`Arguments` container
 */
export function toArguments(input: ArgumentsInput, slot = "arguments"): Arguments {
  return toParameters(input, Arguments, slot);
}

/**
 * Coerce a slot value into `Options`.
 *
 * @throws TypeMismatchError when given `Arguments` or another non-`Options` container
 */
export function toOptions(input: OptionsInput, slot = "options"): Options {
  return toParameters(input, Options, slot);
}

// ============================================================================
// Command
// ============================================================================

/**
 * A LaTeX command.
 *
 * Options come before the arguments unless extra arguments are given; then
 * the order is arguments, options, extra arguments, which allows one or
 * more arguments in front of the options.
 *
 * @example
 * ```typescript
 * new Command("documentclass", "article", ["12pt", "a4paper", "twoside"]).render();
 * // "\\documentclass[12pt,a4paper,twoside]{article}"
 * new Command("com").render();                          // "\\com"
 * new Command("com", "first").render();                 // "\\com{first}"
 * new Command("com", "first", "option").render();       // "\\com[option]{first}"
 * new Command("com", "first", "option", "second").render();
 * // "\\com{first}[option]{second}"
 * ```
 */
export class Command extends MarkupObject implements Structural {
  readonly name: string;
  readonly arguments: Arguments;
  readonly options: Options;
  /** Absent is distinct from present-but-empty: it selects the layout. */
  readonly extraArguments: Arguments | undefined;

  constructor(
    name: string,
    args?: ArgumentsInput,
    options?: OptionsInput,
    extraArguments?: ArgumentsInput,
    packages?: readonly Package[]
  ) {
    super({ packages });
    this.name = name;
    this.arguments = toArguments(args);
    this.options = toOptions(options);
    this.extraArguments =
      extraArguments === undefined || extraArguments === null
        ? undefined
        : toArguments(extraArguments, "extraArguments");
  }

  render(): string {
    if (this.extraArguments === undefined) {
      return `\\${this.name}${this.options.render()}${this.arguments.render()}`;
    }
    return `\\${this.name}${this.arguments.render()}${this.options.render()}${this.extraArguments.render()}`;
  }

  protected key(): KeyTuple {
    return [this.name, this.arguments, this.options, this.extraArguments ?? null];
  }

  equals(other: unknown): boolean {
    return other instanceof Command && keyEquals(this.key(), other.key());
  }

  hash(): number {
    return keyHash(this.key());
  }
}
