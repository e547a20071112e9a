/***
 *
 * HashTable — Separately-chained hash table over caller-supplied hashing.
 *
 * Keys can be any type. The caller provides, once and for good:
 *   1. hash(key) → integer. Deterministic; ideally well distributed.
 *   2. equals(a, b) → boolean. Keys are compared only through this.
 *
 * Layout: a BucketArray of `capacity` LinkedLists. An entry lives in
 * bucket hash(key) mod capacity; a new entry is appended at the bucket's
 * tail, so each bucket keeps insertion order until the next resize.
 *
 * Growth: when an insert makes size === capacity + 1 the table rehashes
 * into floor(2 * capacity) buckets. The test is strict equality:
 * size moves by at most one per put, so it fires exactly once
 * per threshold. A resize moves each entry from the front of its old
 * bucket to the front of its new one, which reverses the order of
 * entries that collide again. Capacity never shrinks.
 *
 * Storage: every node and bucket array is reserved from the Allocator.
 * A refused reservation is returned as OUT_OF_MEMORY and leaves the table
 * as it was before the failed step. free() must be called exactly once;
 * see scoped() for a try/finally wrapper.
 *
 ***/

import type { ListNode } from "list/linked_list";
import { system_allocator, type Allocator } from "memory/allocator";
import { assert, is_safe_integer } from "type_primitives/assertions";
import {
  NONE,
  OK_VOID,
  err,
  ok,
  some,
  type Option,
  type Result,
} from "type_primitives/result";
import {
  DEFAULT_HASH_TABLE_CAPACITY,
  HASH_TABLE_GROWTH_FACTOR,
} from "utils/constants";
import {
  modified_during_iteration,
  out_of_memory,
  use_after_free,
  type ContainerError,
} from "utils/error";
import { default_logger, type Logger } from "utils/logger";
import {
  allocate_buckets,
  free_buckets,
  type Bucket,
  type BucketArray,
  type Entry,
} from "./bucket_array";
import type { HashFn, KeyEquals } from "./hashing";

export interface HashTableOptions {
  allocator?: Allocator;
  logger?: Logger;
}

export class HashTable<K, V> {
  private _buckets: BucketArray<K, V>;
  private _capacity: number;
  private _size = 0;
  private _freed = false;

  private constructor(
    private readonly _hash: HashFn<K>,
    private readonly _equals: KeyEquals<K>,
    buckets: BucketArray<K, V>,
    private readonly _allocator: Allocator,
    private readonly _logger: Logger,
  ) {
    this._buckets = buckets;
    this._capacity = buckets.length;
  }

  /** Table with the default 100 buckets. */
  static create<K, V>(
    hash: HashFn<K>,
    equals: KeyEquals<K>,
    options: HashTableOptions = {},
  ): Result<HashTable<K, V>, ContainerError> {
    return HashTable.with_capacity<K, V>(
      hash,
      equals,
      DEFAULT_HASH_TABLE_CAPACITY,
      options,
    );
  }

  /**
   * Table with `capacity` empty buckets. The capacity is not validated
   * here: one the allocator cannot provide, 0 included, is OUT_OF_MEMORY.
   */
  static with_capacity<K, V>(
    hash: HashFn<K>,
    equals: KeyEquals<K>,
    capacity: number,
    options: HashTableOptions = {},
  ): Result<HashTable<K, V>, ContainerError> {
    const allocator = options.allocator ?? system_allocator;
    const logger = options.logger ?? default_logger;
    const buckets = allocate_buckets<K, V>(allocator, capacity);
    if (buckets === null) {
      logger.warn("hash table bucket allocation failed", { capacity });
      return err(
        out_of_memory("could not allocate hash table buckets", { capacity }),
      );
    }
    return ok(new HashTable<K, V>(hash, equals, buckets, allocator, logger));
  }

  get size(): number {
    return this._size;
  }

  get capacity(): number {
    return this._capacity;
  }

  get load_factor(): number {
    return this._size / this._capacity;
  }

  get is_freed(): boolean {
    return this._freed;
  }

  /**
   * Insert or overwrite. An overwrite never allocates and never fails.
   *
   * OUT_OF_MEMORY with context.stage "insert": the table is unchanged.
   * OUT_OF_MEMORY with context.stage "resize": the entry WAS inserted, only
   * the growth failed; the table keeps its old capacity and stays usable.
   */
  put(key: K, value: V): Result<void, ContainerError> {
    this._ensure_live();
    const bucket = this._buckets[this._index_of(key, this._capacity)];

    for (let curr = bucket.head; curr !== null; curr = curr.next) {
      if (this._equals(curr.data.key, key)) {
        curr.data.value = value;
        return OK_VOID;
      }
    }

    const pushed = bucket.push_back({ key, value });
    if (!pushed.ok) {
      this._logger.warn("hash table entry allocation failed", {
        size: this._size,
        capacity: this._capacity,
      });
      return err(
        out_of_memory("could not allocate hash table entry", {
          stage: "insert",
          size: this._size,
        }),
      );
    }
    this._size++;

    if (this._size === this._capacity + 1) return this._resize();
    return OK_VOID;
  }

  get(key: K): Option<V> {
    const entry = this._find(key);
    return entry === null ? NONE : some(entry.value);
  }

  has(key: K): boolean {
    return this._find(key) !== null;
  }

  remove(key: K): Option<V> {
    this._ensure_live();
    const bucket = this._buckets[this._index_of(key, this._capacity)];

    let prev: ListNode<Entry<K, V>> | null = null;
    let curr = bucket.head;
    while (curr !== null && !this._equals(curr.data.key, key)) {
      prev = curr;
      curr = curr.next;
    }
    if (curr === null) return NONE;

    const value = curr.data.value;
    bucket.remove(curr, prev);
    this._size--;
    return some(value);
  }

  /**
   * Visit every entry. Order is unspecified and changes across resizes.
   * `fn` may remove the entry it is visiting. A put that resizes the table
   * throws MODIFIED_DURING_ITERATION at the next step.
   */
  for_each(fn: (key: K, value: V) => void): void {
    this._ensure_live();
    const capacity = this._capacity;
    for (let b = 0; b < capacity; b++) {
      let curr = this._buckets[b].head;
      while (curr !== null) {
        const next = curr.next;
        fn(curr.data.key, curr.data.value);
        this._ensure_not_resized(capacity);
        curr = next;
      }
    }
  }

  keys(): K[] {
    const out: K[] = [];
    this.for_each((key) => out.push(key));
    return out;
  }

  values(): V[] {
    const out: V[] = [];
    this.for_each((_key, value) => out.push(value));
    return out;
  }

  /** Same rules as for_each. */
  [Symbol.iterator](): Iterator<[K, V]> {
    this._ensure_live();
    const capacity = this._capacity;
    let b = 0;
    let curr: ListNode<Entry<K, V>> | null = null;
    return {
      next: (): IteratorResult<[K, V]> => {
        this._ensure_not_resized(capacity);
        while (curr === null && b < capacity) curr = this._buckets[b++].head;
        if (curr === null) return { value: undefined, done: true };
        const entry = curr.data;
        curr = curr.next;
        return { value: [entry.key, entry.value], done: false };
      },
    };
  }

  /** Release every bucket's nodes and the bucket array. Terminal. */
  free(): void {
    this._ensure_live();
    free_buckets(this._allocator, this._buckets);
    this._buckets = [];
    this._size = 0;
    this._freed = true;
  }

  //=========================================================
  // Internal
  //=========================================================

  private _find(key: K): Entry<K, V> | null {
    this._ensure_live();
    const bucket = this._buckets[this._index_of(key, this._capacity)];
    for (let curr = bucket.head; curr !== null; curr = curr.next) {
      if (this._equals(curr.data.key, key)) return curr.data;
    }
    return null;
  }

  private _index_of(key: K, capacity: number): number {
    const h = this._hash(key);
    assert(h, is_safe_integer, "hash function must return a safe integer");
    const index = h % capacity;
    return index < 0 ? index + capacity : index;
  }

  private _resize(): Result<void, ContainerError> {
    const old_buckets = this._buckets;
    const old_capacity = this._capacity;
    const new_capacity = Math.floor(HASH_TABLE_GROWTH_FACTOR * old_capacity);

    const new_buckets = allocate_buckets<K, V>(this._allocator, new_capacity);
    if (new_buckets === null) {
      this._logger.warn("hash table resize failed, keeping old capacity", {
        capacity: old_capacity,
        new_capacity,
      });
      return err(
        out_of_memory("could not allocate buckets for resize", {
          stage: "resize",
          capacity: old_capacity,
          new_capacity,
        }),
      );
    }

    for (let b = 0; b < old_capacity; b++) {
      const bucket: Bucket<K, V> = old_buckets[b];
      let head = bucket.head;
      while (head !== null) {
        const target = new_buckets[this._index_of(head.data.key, new_capacity)];
        bucket.move_front_to(target);
        head = bucket.head;
      }
    }
    free_buckets(this._allocator, old_buckets);

    this._buckets = new_buckets;
    this._capacity = new_capacity;
    this._logger.debug("hash table resized", {
      size: this._size,
      capacity: new_capacity,
      previous_capacity: old_capacity,
    });
    return OK_VOID;
  }

  private _ensure_live(): void {
    if (this._freed) throw use_after_free("HashTable");
  }

  private _ensure_not_resized(capacity: number): void {
    this._ensure_live();
    if (this._capacity !== capacity) {
      throw modified_during_iteration("HashTable", {
        capacity,
        new_capacity: this._capacity,
      });
    }
  }
}
