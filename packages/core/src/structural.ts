/**
 * Structural Equality and Hashing
 *
 * Value types in texforge (parameter sets, commands, packages) define a
 * canonical key tuple of their identifying fields. Equality and hashing are
 * derived mechanically from that tuple:
 *
 * ```typescript
 * class Point implements Structural {
 *   constructor(readonly x: number, readonly y: number) {}
 *   key(): KeyTuple { return [this.x, this.y]; }
 *   equals(other: unknown) { return other instanceof Point && keyEquals(this.key(), other.key()); }
 *   hash() { return keyHash(this.key()); }
 * }
 * ```
 *
 * Laws:
 * - Reflexivity: `equals(x, x) === true`
 * - Symmetry: `equals(x, y) === equals(y, x)`
 * - Hash consistency: `equals(x, y) => hash(x) === hash(y)`
 */

// ============================================================================
// Typeclasses
// ============================================================================

/**
 * Eq typeclass - equality comparison.
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean;
  notEquals(a: A, b: A): boolean;
}

/**
 * Hash typeclass - a 32-bit hash consistent with some Eq.
 */
export interface Hash<A> {
  hash(a: A): number;
}

/**
 * A value that carries its own equality and hash.
 */
export interface Structural {
  equals(other: unknown): boolean;
  hash(): number;
}

/**
 * One component of a key tuple. Objects that are not `Structural` and not
 * arrays compare by identity.
 */
export type KeyPart = string | number | boolean | bigint | null | undefined | object;

/** A canonical key tuple. */
export type KeyTuple = readonly KeyPart[];

export function isStructural(value: unknown): value is Structural {
  return (
    typeof value === "object" &&
    value !== null &&
    "equals" in value &&
    typeof value.equals === "function" &&
    "hash" in value &&
    typeof value.hash === "function"
  );
}

/**
 * Create an Eq instance from a custom equality function.
 */
export function makeEq<A>(eq: (a: A, b: A) => boolean): Eq<A> {
  return {
    equals: eq,
    notEquals: (a, b) => !eq(a, b),
  };
}

// ============================================================================
// Hash Instances
// ============================================================================

// Simple hash functions (not cryptographic, just for bucketing)

export const hashString: Hash<string> = {
  hash: (a) => {
    // djb2
    let hash = 5381;
    for (let i = 0; i < a.length; i++) {
      hash = ((hash << 5) + hash) ^ a.charCodeAt(i);
    }
    return hash >>> 0;
  },
};

export const hashNumber: Hash<number> = {
  hash: (a) => {
    if (Number.isNaN(a)) return 0x7fc00000;
    if (!Number.isFinite(a)) return a > 0 ? 0x7f800000 : 0xff800000;
    if (Number.isInteger(a) && Math.abs(a) < 2 ** 31) {
      return a >>> 0;
    }
    return hashString.hash(String(a));
  },
};

export const hashBoolean: Hash<boolean> = {
  hash: (a) => (a ? 1 : 0),
};

export const hashBigint: Hash<bigint> = {
  hash: (a) => hashString.hash(a.toString()),
};

export function hashArray<A>(element: Hash<A>): Hash<readonly A[]> {
  return {
    hash: (arr) => {
      let hash = arr.length;
      for (const x of arr) {
        hash = ((hash << 5) + hash) ^ element.hash(x);
      }
      return hash >>> 0;
    },
  };
}

// Identity hashes for objects without structure of their own.
const identityHashes = new WeakMap<object, number>();
let nextIdentityHash = 1;

export function identityHash(obj: object): number {
  let h = identityHashes.get(obj);
  if (h === undefined) {
    h = nextIdentityHash++;
    identityHashes.set(obj, h);
  }
  return h;
}

// ============================================================================
// Key Tuples
// ============================================================================

export const eqKeyPart: Eq<KeyPart> = makeEq(function equalsPart(a: KeyPart, b: KeyPart): boolean {
  if (Array.isArray(a)) {
    return (
      Array.isArray(b) &&
      a.length === b.length &&
      a.every((x: KeyPart, i) => equalsPart(x, b[i]))
    );
  }
  if (isStructural(a)) return a.equals(b);
  return a === b;
});

export const hashKeyPart: Hash<KeyPart> = {
  hash(a) {
    switch (typeof a) {
      case "string":
        return hashString.hash(a);
      case "number":
        return hashNumber.hash(a);
      case "boolean":
        return hashBoolean.hash(a);
      case "bigint":
        return hashBigint.hash(a);
      case "undefined":
        return 1;
    }
    if (a === null) return 0;
    if (Array.isArray(a)) return hashArray(hashKeyPart).hash(a);
    if (isStructural(a)) return a.hash();
    return identityHash(a);
  },
};

/** Element-wise equality of two key tuples. */
export function keyEquals(a: KeyTuple, b: KeyTuple): boolean {
  return eqKeyPart.equals(a, b);
}

/** Hash of a key tuple, consistent with {@link keyEquals}. */
export function keyHash(key: KeyTuple): number {
  return hashKeyPart.hash(key);
}

/**
 * Drop later duplicates, keeping first-seen order.
 */
export function uniqueBy<A>(items: Iterable<A>, eq: Eq<A>, hash: Hash<A>): A[] {
  const buckets = new Map<number, A[]>();
  const result: A[] = [];
  for (const item of items) {
    const h = hash.hash(item);
    const bucket = buckets.get(h);
    if (!bucket) {
      buckets.set(h, [item]);
      result.push(item);
    } else if (!bucket.some((seen) => eq.equals(seen, item))) {
      bucket.push(item);
      result.push(item);
    }
  }
  return result;
}

/**
 * Eq/Hash pair for any `Structural` value.
 */
export const eqStructural: Eq<Structural> = makeEq((a, b) => a.equals(b));
export const hashStructural: Hash<Structural> = { hash: (a) => a.hash() };
