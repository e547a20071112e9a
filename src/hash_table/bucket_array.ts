/***
 * BucketArray — Fixed-length array of chained buckets.
 *
 * One LinkedList per slot, every slot valid (possibly empty). The array
 * is reserved from the allocator as `length` slots and released as a
 * whole; the buckets' nodes are released by freeing each list.
 *
 ***/

import { allocate_array, type Allocator } from "memory/allocator";
import { LinkedList } from "list/linked_list";

export interface Entry<K, V> {
  readonly key: K;
  value: V;
}

export type Bucket<K, V> = LinkedList<Entry<K, V>>;
export type BucketArray<K, V> = Bucket<K, V>[];

/** Null when the allocator refuses `length` slots. */
export function allocate_buckets<K, V>(
  allocator: Allocator,
  length: number,
): BucketArray<K, V> | null {
  return allocate_array(
    allocator,
    length,
    () => new LinkedList<Entry<K, V>>({ allocator }),
  );
}

export function free_buckets<K, V>(
  allocator: Allocator,
  buckets: BucketArray<K, V>,
): void {
  for (let i = 0; i < buckets.length; i++) buckets[i].free();
  allocator.release_slots(buckets.length);
}
