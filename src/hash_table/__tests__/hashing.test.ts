import { describe, expect, it } from "vitest";
import { combine_hashes, hash_int, hash_string, strict_equals } from "../hashing";

describe("hashing", () => {
  //=========================================================
  // hash_int
  //=========================================================

  it("hash_int is the identity on safe integers", () => {
    expect(hash_int(0)).toBe(0);
    expect(hash_int(42)).toBe(42);
    expect(hash_int(-3)).toBe(-3);
  });

  it("hash_int truncates fractions", () => {
    expect(hash_int(2.7)).toBe(2);
    expect(hash_int(-2.7)).toBe(-2);
  });

  it("hash_int maps unrepresentable numbers to 0", () => {
    expect(hash_int(NaN)).toBe(0);
    expect(hash_int(Infinity)).toBe(0);
    expect(hash_int(2 ** 60)).toBe(0);
  });

  //=========================================================
  // hash_string
  //=========================================================

  it("hash_string of the empty string is the FNV offset basis", () => {
    expect(hash_string("")).toBe(0x811c9dc5);
  });

  it("hash_string matches FNV-1a reference values", () => {
    expect(hash_string("a")).toBe(0xe40c292c);
    expect(hash_string("foobar")).toBe(0xbf9cf968);
  });

  it("hash_string is deterministic and unsigned", () => {
    const h = hash_string("bucket");
    expect(hash_string("bucket")).toBe(h);
    expect(h).toBeGreaterThanOrEqual(0);
    expect(Number.isSafeInteger(h)).toBe(true);
  });

  //=========================================================
  // combine_hashes
  //=========================================================

  it("combine_hashes depends on argument order", () => {
    expect(combine_hashes(1, 2)).toBe(0x3ccefad7);
    expect(combine_hashes(2, 1)).toBe(0x6d1232c5);
  });

  //=========================================================
  // strict_equals
  //=========================================================

  it("strict_equals uses ===", () => {
    expect(strict_equals(1, 1)).toBe(true);
    expect(strict_equals("a", "b")).toBe(false);
    expect(strict_equals({}, {})).toBe(false);
    expect(strict_equals(NaN, NaN)).toBe(false);
  });
});
