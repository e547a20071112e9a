import { describe, expect, it } from "vitest";
import { TrackingAllocator } from "memory/allocator";
import { allocate_buckets, free_buckets } from "../bucket_array";

describe("BucketArray", () => {
  it("allocates one empty list per slot", () => {
    const allocator = new TrackingAllocator();
    const buckets = allocate_buckets<number, string>(allocator, 3);
    expect(buckets).not.toBeNull();
    expect(buckets?.length).toBe(3);
    expect(buckets?.every((b) => b.length === 0)).toBe(true);
    expect(allocator.live_slots).toBe(3);
  });

  it("buckets share the array's allocator", () => {
    const allocator = new TrackingAllocator();
    const buckets = allocate_buckets<number, string>(allocator, 2);
    buckets?.[1].push_back({ key: 1, value: "one" });
    expect(allocator.live_nodes).toBe(1);
  });

  it("returns null when the slots are refused", () => {
    const allocator = new TrackingAllocator({ max_slots: 2 });
    expect(allocate_buckets(allocator, 3)).toBeNull();
    expect(allocate_buckets(allocator, 0)).toBeNull();
  });

  it("free_buckets releases nodes and slots and frees every list", () => {
    const allocator = new TrackingAllocator();
    const buckets = allocate_buckets<number, number>(allocator, 4);
    if (buckets === null) throw new Error("allocation failed");
    for (let i = 0; i < 10; i++) buckets[i % 4].push_back({ key: i, value: i });

    free_buckets(allocator, buckets);
    expect(allocator.live_nodes).toBe(0);
    expect(allocator.live_slots).toBe(0);
    expect(buckets.every((b) => b.is_freed)).toBe(true);
  });
});
