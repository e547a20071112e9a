import { bench, describe } from "vitest";
import { HashTable } from "../hash_table/hash_table";
import { hash_string, strict_equals } from "../hash_table/hashing";
import { LinkedList } from "../list/linked_list";
import { Vec } from "../vec/vec";
import { unwrap } from "../type_primitives/result";

//=========================================================
// Helpers
//=========================================================

const identity = (k: number): number => k;

function xorshift32(seed: number) {
  let state = seed;
  return () => {
    state ^= state << 13;
    state ^= state >> 17;
    state ^= state << 5;
    return (state >>> 0) / 0x100000000;
  };
}

const WORDS = Array.from({ length: 10_000 }, (_, i) => `key-${i}`);

//=========================================================
// HashTable
//=========================================================

describe("hash table", () => {
  bench("put_10k_int_with_resizes", () => {
    const t = unwrap(HashTable.with_capacity<number, number>(identity, strict_equals, 16));
    for (let i = 0; i < 10_000; i++) t.put(i, i);
    t.free();
  });

  bench("put_get_10k_string", () => {
    const t = unwrap(HashTable.create<string, number>(hash_string, strict_equals));
    for (let i = 0; i < WORDS.length; i++) t.put(WORDS[i], i);
    for (let i = 0; i < WORDS.length; i++) t.get(WORDS[i]);
    t.free();
  });

  bench("random_put_remove_10k", () => {
    const rand = xorshift32(12345);
    const t = unwrap(HashTable.create<number, number>(identity, strict_equals));
    for (let i = 0; i < 10_000; i++) {
      const k = Math.floor(rand() * 2_000);
      if (rand() < 0.5) t.put(k, i);
      else t.remove(k);
    }
    t.free();
  });
});

//=========================================================
// LinkedList / Vec
//=========================================================

describe("sequences", () => {
  bench("list_push_pop_front_10k", () => {
    const l = new LinkedList<number>();
    for (let i = 0; i < 10_000; i++) l.push_front(i);
    while (l.pop_front().present);
    l.free();
  });

  bench("vec_push_10k", () => {
    const v = unwrap(Vec.create<number>());
    for (let i = 0; i < 10_000; i++) v.push(i);
    v.free();
  });
});
