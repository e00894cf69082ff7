/**
 * Parameter containers: the bracketed blocks that follow a command name.
 *
 * Both kinds hold ordered positional values followed by `key=value` pairs:
 *
 * ```typescript
 * Options.of("a", "b", "c").render();          // "[a,b,c]"
 * new Options("clip", { width: 50 }).render(); // "[clip,width=50]"
 * Arguments.of("a", "b", "c").render();        // "{a}{b}{c}"
 * ```
 *
 * Values are not quoted or escaped here. A value containing `,` or `]`
 * must be escaped by the caller, as LaTeX itself has no quoting for
 * bracket contents.
 */

import { keyEquals, keyHash, type KeyTuple, type Structural } from "@texforge/core";
import { MarkupObject, renderValue, type Renderable, type Stringifiable } from "./markup-object.js";

// ============================================================================
// Types
// ============================================================================

export type ParameterValue = Stringifiable;

/** Keyed values, rendered as `key=value` after the positional ones. */
export type KeyedValues = Readonly<Record<string, ParameterValue>>;

/**
 * Positional input: a single value, or a non-string iterable of values
 * which is flattened into the positional list.
 */
export type ParameterInput = ParameterValue | Iterable<ParameterValue>;

function isIterable(
  value: Renderable | Iterable<ParameterValue>
): value is Iterable<ParameterValue> {
  return Symbol.iterator in value;
}

function toPositional(input: ParameterInput | null | undefined): ParameterValue[] {
  if (input === undefined || input === null) {
    return [];
  }
  if (
    typeof input === "string" ||
    typeof input === "number" ||
    typeof input === "boolean" ||
    typeof input === "bigint"
  ) {
    return [input];
  }
  if (isIterable(input)) {
    return [...input];
  }
  return [input];
}

// ============================================================================
// Parameters
// ============================================================================

/**
 * Base class of {@link Options} and {@link Arguments}. Immutable once built;
 * to change a parameter set, build a new one.
 */
export abstract class Parameters extends MarkupObject implements Structural {
  readonly positional: readonly ParameterValue[];
  readonly keyed: ReadonlyMap<string, ParameterValue>;

  /**
   * @param input - nothing, a single value, an iterable of values, or a
   *   container of the same kind (whose values are copied)
   * @param keyed - `key=value` pairs; on a copy these are added to the
   *   copied pairs
   */
  constructor(input?: ParameterInput | null, keyed: KeyedValues = {}) {
    super();
    if (input instanceof Parameters && input.constructor === new.target) {
      this.positional = input.positional;
      this.keyed = new Map([...input.keyed, ...Object.entries(keyed)]);
    } else {
      this.positional = Object.freeze(toPositional(input));
      this.keyed = new Map(Object.entries(keyed));
    }
  }

  get isEmpty(): boolean {
    return this.positional.length === 0 && this.keyed.size === 0;
  }

  /**
   * Every parameter as text, positional values first.
   */
  listParameters(): string[] {
    const params = this.positional.map(renderValue);
    for (const [k, v] of this.keyed) {
      params.push(`${k}=${renderValue(v)}`);
    }
    return params;
  }

  /**
   * Wrap the parameters in `prefix`/`suffix`, joined by `separator`.
   * An empty set renders as the empty string.
   */
  protected formatContents(prefix: string, separator: string, suffix: string): string {
    if (this.isEmpty) {
      return "";
    }
    return prefix + this.listParameters().join(separator) + suffix;
  }

  protected key(): KeyTuple {
    const pairs = [...this.keyed].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return [this.positional, pairs];
  }

  equals(other: unknown): boolean {
    return (
      other instanceof Parameters &&
      other.constructor === this.constructor &&
      keyEquals(this.key(), other.key())
    );
  }

  hash(): number {
    return keyHash(this.key());
  }
}

// ============================================================================
// Options
// ============================================================================

/**
 * The square-bracket block of a command: `[a,b,key=value]`.
 *
 * Positional values come first in order, then the key-value pairs in the
 * order they were given.
 */
export class Options extends Parameters {
  static of(...values: ParameterValue[]): Options {
    return new Options(values);
  }

  render(): string {
    return this.formatContents("[", ",", "]");
  }
}

// ============================================================================
// Arguments
// ============================================================================

/**
 * The curly-brace blocks of a command: `{a}{b}{key=value}`.
 */
export class Arguments extends Parameters {
  static of(...values: ParameterValue[]): Arguments {
    return new Arguments(values);
  }

  render(): string {
    return this.formatContents("{", "}{", "}");
  }
}
