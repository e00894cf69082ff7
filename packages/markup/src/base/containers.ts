/**
 * Containers hold an ordered list of child items; environments wrap that
 * content in `\begin{name}` / `\end{name}`.
 */

import { debug, eqStructural, hashStructural, uniqueBy } from "@texforge/core";
import { renderList } from "../escape.js";
import type { Package } from "../package.js";
import { Command, toArguments, toOptions, type ArgumentsInput, type OptionsInput } from "./command.js";
import {
  MarkupObject,
  type MarkupObjectOptions,
  type Stringifiable,
} from "./markup-object.js";
import { Arguments, type Options, type ParameterValue } from "./parameters.js";

export type ContentItem = Stringifiable;

// ============================================================================
// Container
// ============================================================================

export interface ContainerOptions extends MarkupObjectOptions {
  /** Initial content: one item or a list of items */
  data?: ContentItem | readonly ContentItem[];
}

function isItemList(data: ContentItem | readonly ContentItem[]): data is readonly ContentItem[] {
  return Array.isArray(data);
}

function toItems(data: ContentItem | readonly ContentItem[] | undefined): ContentItem[] {
  if (data === undefined) return [];
  if (isItemList(data)) return [...data];
  return [data];
}

export class Container extends MarkupObject {
  protected readonly data: ContentItem[];
  /** Written between items, and around the content of environments. */
  protected contentSeparator = "%\n";

  constructor(options: ContainerOptions = {}) {
    super(options);
    this.data = toItems(options.data);
  }

  get items(): readonly ContentItem[] {
    return this.data;
  }

  append(item: ContentItem): this {
    this.data.push(item);
    return this;
  }

  extend(items: Iterable<ContentItem>): this {
    for (const item of items) {
      this.data.push(item);
    }
    return this;
  }

  /**
   * The children joined by the content separator. Plain strings are escaped
   * when the container's escape policy says so.
   */
  renderContent(): string {
    return renderList(this.data, { escape: this.escape, separator: this.contentSeparator });
  }

  render(): string {
    return this.renderContent();
  }

  /**
   * Packages required by this container and everything inside it.
   */
  collectPackages(): Package[] {
    const all: Package[] = [...this.packages];
    for (const item of this.data) {
      if (item instanceof MarkupObject) {
        all.push(...item.collectPackages());
      }
    }
    return uniqueBy<Package>(all, eqStructural, hashStructural);
  }
}

// ============================================================================
// Environment
// ============================================================================

export interface EnvironmentFrameOptions {
  options?: OptionsInput;
  arguments?: ArgumentsInput;
  /** Arguments written directly after the environment name */
  startArguments?: readonly ParameterValue[];
  /** Use the starred variant, e.g. `alignat*` */
  star?: boolean;
  /** Render nothing at all when the content is blank */
  omitIfEmpty?: boolean;
}

export interface EnvironmentOptions extends ContainerOptions, EnvironmentFrameOptions {}

/**
 * The begin/end wrapping of an environment, whatever supplies its content:
 *
 * ```latex
 * \begin{name}{start arguments}[options]{arguments}%
 * content%
 * \end{name}
 * ```
 */
export class EnvironmentFrame {
  readonly latexName: string;
  readonly options: Options;
  readonly arguments: Arguments | undefined;
  readonly startArguments: readonly ParameterValue[];
  readonly star: boolean;
  readonly omitIfEmpty: boolean;
  readonly begin: Command;
  readonly end: Command;

  constructor(latexName: string, options: EnvironmentFrameOptions = {}) {
    this.latexName = latexName;
    this.options = toOptions(options.options);
    this.arguments =
      options.arguments === undefined || options.arguments === null
        ? undefined
        : toArguments(options.arguments);
    this.startArguments = Object.freeze([...(options.startArguments ?? [])]);
    this.star = options.star ?? false;
    this.omitIfEmpty = options.omitIfEmpty ?? false;

    // Passing extra arguments, even empty ones, puts the options after the
    // environment name and start arguments.
    this.begin = new Command(
      "begin",
      new Arguments([this.environmentName, ...this.startArguments]),
      this.options,
      this.arguments ?? new Arguments()
    );
    this.end = new Command("end", this.environmentName);
  }

  /** The name used in `\begin`/`\end`, starred when requested. */
  get environmentName(): string {
    return this.star ? `${this.latexName}*` : this.latexName;
  }

  wrap(content: string, separator: string, tracing: boolean): string {
    if (this.omitIfEmpty && content.trim() === "") {
      debug("environment", () => `omitted empty ${this.environmentName}`, tracing);
      return "";
    }

    debug("environment", () => `rendered ${this.environmentName} (${content.length} chars)`, tracing);
    return this.begin.render() + separator + content + separator + this.end.render();
  }
}

/**
 * A LaTeX environment around a list of children. Subclasses may override
 * {@link Container.renderContent} to supply the content.
 */
export class Environment extends Container {
  readonly frame: EnvironmentFrame;

  constructor(latexName: string, options: EnvironmentOptions = {}) {
    super(options);
    this.frame = new EnvironmentFrame(latexName, options);
  }

  get latexName(): string {
    return this.frame.latexName;
  }

  get environmentName(): string {
    return this.frame.environmentName;
  }

  render(): string {
    return this.frame.wrap(this.renderContent(), this.contentSeparator, this.tracing);
  }
}
