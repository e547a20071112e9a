/***
 * Hashing — Ready-made hash and equality functions for HashTable.
 *
 * Any deterministic key → integer function works; these cover the common
 * number and string keys. hash_string and combine_hashes return unsigned
 * 32-bit values.
 *
 ***/

import {
  FNV_OFFSET_BASIS,
  FNV_PRIME,
  HASH_GOLDEN_RATIO,
  HASH_SECONDARY_PRIME,
} from "utils/constants";

export type HashFn<K> = (key: K) => number;
export type KeyEquals<K> = (a: K, b: K) => boolean;

/** Identity for safe integers. Other numbers are truncated, NaN and ±Infinity hash to 0. */
export function hash_int(n: number): number {
  if (Number.isSafeInteger(n)) return n;
  const t = Math.trunc(n);
  return Number.isSafeInteger(t) ? t : 0;
}

/** FNV-1a over UTF-16 code units. */
export function hash_string(s: string): number {
  let h = FNV_OFFSET_BASIS;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, FNV_PRIME);
  }
  return h >>> 0;
}

/** Order-dependent mix of two hashes, e.g. for tuple keys. */
export function combine_hashes(a: number, b: number): number {
  const h = Math.imul(a, HASH_GOLDEN_RATIO) ^ Math.imul(b, HASH_SECONDARY_PRIME);
  return h >>> 0;
}

export function strict_equals<K>(a: K, b: K): boolean {
  return a === b;
}
