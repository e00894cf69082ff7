/**
 * Debug tracing, enabled by `config.debug` (or `TEXFORGE_DEBUG=1`).
 */

import { config } from "./config.js";

export type DebugWriter = (line: string) => void;

const defaultWriter: DebugWriter = (line) => console.log(line);

let writer: DebugWriter = defaultWriter;

/**
 * Redirect debug output. Pass nothing to restore `console.log`.
 */
export function setDebugWriter(next?: DebugWriter): void {
  writer = next ?? defaultWriter;
}

/**
 * Write `[texforge:<scope>] <message>` when debug tracing is on.
 *
 * `message` may be a thunk so that callers do not build strings that are
 * never written. Objects that captured the flag when they were built pass
 * it as `enabled`; otherwise the current config decides.
 */
export function debug(
  scope: string,
  message: string | (() => string),
  enabled: boolean = config.isDebugEnabled()
): void {
  if (!enabled) return;
  const text = typeof message === "function" ? message() : message;
  writer(`[texforge:${scope}] ${text}`);
}
