/**
 * Core module exports for @texforge/core
 *
 * This package provides:
 * - The configuration system shared by every texforge package
 * - Structural equality and hashing over canonical key tuples
 * - Debug tracing
 */

// Configuration System
export { config, defineConfig, type TexforgeConfig, type MatrixConfig } from "./config.js";

// Structural Equality
export {
  type Eq,
  type Hash,
  type Structural,
  type KeyPart,
  type KeyTuple,
  isStructural,
  makeEq,
  hashString,
  hashNumber,
  hashBoolean,
  hashBigint,
  hashArray,
  identityHash,
  eqKeyPart,
  hashKeyPart,
  keyEquals,
  keyHash,
  uniqueBy,
  eqStructural,
  hashStructural,
} from "./structural.js";

// Debug Tracing
export { debug, setDebugWriter, type DebugWriter } from "./debug.js";
