import { describe, expect, it } from "vitest";
import { TrackingAllocator } from "memory/allocator";
import { unwrap } from "type_primitives/result";
import { CONTAINER_ERROR } from "utils/error";
import { Vec } from "../vec";

describe("Vec", () => {
  //=========================================================
  // create
  //=========================================================

  it("defaults to capacity 100", () => {
    const v = unwrap(Vec.create<number>());
    expect(v.capacity).toBe(100);
    expect(v.length).toBe(0);
  });

  it("rejects capacity 0 with BAD_ARGUMENT", () => {
    const r = Vec.create<number>(0);
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error.category).toBe(CONTAINER_ERROR.BAD_ARGUMENT);
  });

  it("reports OUT_OF_MEMORY when the buffer is refused", () => {
    const r = Vec.create<number>(10, { allocator: new TrackingAllocator({ max_slots: 5 }) });
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error.category).toBe(CONTAINER_ERROR.OUT_OF_MEMORY);
  });

  //=========================================================
  // push / growth
  //=========================================================

  it("grows by 1.5x: 1000 pushes from 100 end at capacity 1135", () => {
    const v = unwrap(Vec.create<number>(100));
    for (let i = 0; i < 1000; i++) expect(v.push(i).ok).toBe(true);
    expect(v.length).toBe(1000);
    expect(v.capacity).toBe(1135);
    for (let i = 0; i < 1000; i++) expect(v.at(i)).toEqual({ present: true, value: i });
  });

  it("a capacity-1 vec still grows", () => {
    const v = unwrap(Vec.create<string>(1));
    v.push("a");
    v.push("b");
    expect(v.capacity).toBe(2);
    expect(v.to_array()).toEqual(["a", "b"]);
  });

  it("failed growth leaves the vec unchanged", () => {
    const allocator = new TrackingAllocator({ max_slots: 5 });
    const v = unwrap(Vec.create<number>(2, { allocator }));
    v.push(1);
    v.push(2);
    expect(v.push(3).ok).toBe(true); // 2 -> 3
    expect(v.capacity).toBe(3);

    const r = v.push(4); // 3 -> 4 needs 7 live slots
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.error.category).toBe(CONTAINER_ERROR.OUT_OF_MEMORY);
      expect(r.error.context).toEqual({ capacity: 3, requested: 4 });
    }
    expect(v.length).toBe(3);
    expect(v.capacity).toBe(3);
    expect(v.to_array()).toEqual([1, 2, 3]);
    expect(allocator.live_slots).toBe(3);
  });

  //=========================================================
  // pop / at
  //=========================================================

  it("pop returns items last-in first-out", () => {
    const v = unwrap(Vec.create<number>(4));
    for (let i = 0; i < 4; i++) v.push(i);
    for (let i = 3; i >= 0; i--) {
      expect(v.pop()).toEqual({ present: true, value: i });
      expect(v.length).toBe(i);
    }
  });

  it("pop on an empty vec is absent", () => {
    const v = unwrap(Vec.create<number>(4));
    for (let i = 0; i < 10; i++) {
      expect(v.pop().present).toBe(false);
      expect(v.length).toBe(0);
    }
  });

  it("at is absent outside 0..length-1", () => {
    const v = unwrap(Vec.create<number>(4));
    v.push(7);
    expect(v.at(0)).toEqual({ present: true, value: 7 });
    expect(v.at(1).present).toBe(false);
    expect(v.at(-1).present).toBe(false);
    expect(v.at(0.5).present).toBe(false);
  });

  it("holds structs", () => {
    const v = unwrap(Vec.create<{ x: number; y: number }>(1000));
    for (let i = 0; i < 1000; i++) v.push({ x: i, y: 2 * i });
    expect(v.at(500)).toEqual({ present: true, value: { x: 500, y: 1000 } });
  });

  //=========================================================
  // shrink
  //=========================================================

  it("shrink sets capacity to length", () => {
    const allocator = new TrackingAllocator();
    const v = unwrap(Vec.create<number>(100, { allocator }));
    for (let i = 0; i < 1000; i++) v.push(i);
    expect(v.shrink().ok).toBe(true);
    expect(v.capacity).toBe(1000);
    expect(allocator.live_slots).toBe(1000);
    for (let i = 999; i >= 0; i--) expect(v.pop()).toEqual({ present: true, value: i });
  });

  it("shrink succeeds with the allocator at its limit", () => {
    const allocator = new TrackingAllocator({ max_slots: 10 });
    const v = unwrap(Vec.create<number>(10, { allocator }));
    for (let i = 0; i < 4; i++) v.push(i);
    expect(v.shrink().ok).toBe(true);
    expect(v.capacity).toBe(4);
    expect(allocator.live_slots).toBe(4);
    expect(allocator.refused).toBe(0);
    expect(v.to_array()).toEqual([0, 1, 2, 3]);
    expect(v.push(4).ok).toBe(true);
    expect(v.capacity).toBe(6);
  });

  it("shrink of an empty vec is BAD_ARGUMENT", () => {
    const v = unwrap(Vec.create<number>(10));
    const r = v.shrink();
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error.category).toBe(CONTAINER_ERROR.BAD_ARGUMENT);
    expect(v.capacity).toBe(10);
  });

  //=========================================================
  // iteration / free
  //=========================================================

  it("for..of visits items in index order", () => {
    const v = unwrap(Vec.create<string>(2));
    v.push("x");
    v.push("y");
    v.push("z");
    expect([...v]).toEqual(["x", "y", "z"]);
  });

  it("free releases the buffer and blocks later use", () => {
    const allocator = new TrackingAllocator();
    const v = unwrap(Vec.create<number>(10, { allocator }));
    v.push(1);
    v.free();
    expect(allocator.live_slots).toBe(0);
    expect(v.is_freed).toBe(true);
    expect(() => v.push(2)).toThrow("Vec used after free()");
  });
});
