/**
 * The root of the markup object graph.
 */

import { config, eqStructural, hashStructural, uniqueBy } from "@texforge/core";
import type { Package } from "../package.js";

/**
 * Anything that knows how to write itself as markup.
 */
export interface Renderable {
  render(): string;
}

/**
 * A value that can appear as a parameter or a cell: a scalar, or any
 * renderable object.
 */
export type Stringifiable = string | number | boolean | bigint | Renderable;

/**
 * Render a scalar with `String()`, an object through its own `render()`.
 */
export function renderValue(value: Stringifiable): string {
  return typeof value === "object" ? value.render() : String(value);
}

export interface MarkupObjectOptions {
  /** Packages required to compile this object */
  packages?: readonly Package[];
  /** Escape plain-string content; unset takes the class default at construction */
  escape?: boolean;
}

export abstract class MarkupObject implements Renderable {
  readonly packages: readonly Package[];
  /** Escape policy, fixed when the object is built. */
  readonly escape: boolean;
  /** Whether debug tracing was on when the object was built. */
  protected readonly tracing: boolean;

  constructor(options: MarkupObjectOptions = {}) {
    this.packages = options.packages ?? [];
    this.escape = options.escape ?? this.defaultEscape();
    this.tracing = config.isDebugEnabled();
  }

  /**
   * Escape policy when none is given. Called from the constructor, so
   * overrides must not read instance fields.
   */
  protected defaultEscape(): boolean {
    return config.escapeByDefault();
  }

  abstract render(): string;

  /**
   * Packages this object needs, without duplicates.
   */
  collectPackages(): Package[] {
    return uniqueBy<Package>(this.packages, eqStructural, hashStructural);
  }

  toString(): string {
    return this.render();
  }
}
