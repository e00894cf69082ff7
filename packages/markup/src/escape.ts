/**
 * Escaping of plain text for LaTeX output.
 */

import { hashString, type Structural } from "@texforge/core";
import { renderValue, type Renderable, type Stringifiable } from "./base/markup-object.js";

const SPECIAL_CHARS: Readonly<Record<string, string>> = {
  "&": "\\&",
  "%": "\\%",
  $: "\\$",
  "#": "\\#",
  _: "\\_",
  "{": "\\{",
  "}": "\\}",
  "~": "\\textasciitilde{}",
  "^": "\\^{}",
  "\\": "\\textbackslash{}",
  "\n": "\\newline%\n",
  "-": "{-}",
  "\u00a0": "~",
  "[": "{[}",
  "]": "{]}",
};

const SPECIAL_CHARS_PATTERN = /[&%$#_{}~^\\\n\-\u00a0[\]]/g;

/**
 * Escape characters that LaTeX treats specially.
 *
 * @example
 * ```typescript
 * escapeLatex("50% off_now"); // "50\\% off\\_now"
 * ```
 */
export function escapeLatex(text: string): string {
  return text.replace(SPECIAL_CHARS_PATTERN, (ch) => SPECIAL_CHARS[ch] ?? ch);
}

/**
 * Raw markup that is written out as is, even inside escaping containers.
 */
export class NoEscape implements Renderable, Structural {
  constructor(readonly text: string) {}

  render(): string {
    return this.text;
  }

  equals(other: unknown): boolean {
    return other instanceof NoEscape && other.text === this.text;
  }

  hash(): number {
    return hashString.hash(this.text);
  }

  toString(): string {
    return this.text;
  }
}

export interface RenderListOptions {
  escape: boolean;
  separator: string;
}

/**
 * Join content items. Renderable items write themselves; scalars are
 * stringified and, when `escape` is set, escaped.
 */
export function renderList(
  items: Iterable<Stringifiable>,
  { escape, separator }: RenderListOptions
): string {
  const parts: string[] = [];
  for (const item of items) {
    if (typeof item === "object") {
      parts.push(item.render());
    } else {
      const text = renderValue(item);
      parts.push(escape ? escapeLatex(text) : text);
    }
  }
  return parts.join(separator);
}
