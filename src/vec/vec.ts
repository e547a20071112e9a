/***
 * Vec — Growable array with an explicit capacity.
 *
 * Like GrowableTypedArray's logical length over a larger backing buffer,
 * but generic and fallible: the buffer is reserved from an Allocator and
 * a push that needs more room grows it to floor(1.5 * capacity). Capacity
 * only shrinks when shrink() is called.
 *
 ***/

import { allocate_array, system_allocator, type Allocator } from "memory/allocator";
import {
  NONE,
  OK_VOID,
  err,
  ok,
  some,
  type Option,
  type Result,
} from "type_primitives/result";
import { DEFAULT_VEC_CAPACITY, VEC_GROWTH_FACTOR } from "utils/constants";
import {
  CONTAINER_ERROR,
  ContainerError,
  out_of_memory,
  use_after_free,
} from "utils/error";

export interface VecOptions {
  allocator?: Allocator;
}

export class Vec<T> {
  private _len = 0;
  private _freed = false;

  private constructor(
    private _buf: T[],
    private readonly _allocator: Allocator,
  ) {}

  /** Empty vec with room for `capacity` items. Capacity 0 is BAD_ARGUMENT. */
  static create<T>(
    capacity = DEFAULT_VEC_CAPACITY,
    options: VecOptions = {},
  ): Result<Vec<T>, ContainerError> {
    if (capacity === 0) {
      return err(
        new ContainerError(CONTAINER_ERROR.BAD_ARGUMENT, "vec capacity must be non-zero", {
          capacity,
        }),
      );
    }
    const allocator = options.allocator ?? system_allocator;
    const buf = allocate_array<T>(allocator, capacity);
    if (buf === null) {
      return err(out_of_memory("could not allocate vec buffer", { capacity }));
    }
    return ok(new Vec<T>(buf, allocator));
  }

  get length(): number {
    return this._len;
  }

  get capacity(): number {
    return this._buf.length;
  }

  get is_freed(): boolean {
    return this._freed;
  }

  /** Amortised O(1). On failure the vec is unchanged. */
  push(item: T): Result<void, ContainerError> {
    this._ensure_live();
    if (this._len === this._buf.length) {
      const cap = this._buf.length;
      const grown = this._reallocate(Math.max(Math.floor(VEC_GROWTH_FACTOR * cap), cap + 1));
      if (!grown.ok) return grown;
    }
    this._buf[this._len++] = item;
    return OK_VOID;
  }

  pop(): Option<T> {
    this._ensure_live();
    if (this._len === 0) return NONE;
    const item = this._buf[--this._len];
    delete this._buf[this._len];
    return some(item);
  }

  at(index: number): Option<T> {
    this._ensure_live();
    if (!Number.isInteger(index) || index < 0 || index >= this._len) return NONE;
    return some(this._buf[index]);
  }

  /**
   * Drop spare capacity so capacity === length. The buffer is truncated in
   * place and only the dropped slots are released, so this never needs a
   * new reservation. An empty vec cannot shrink, there is no zero-length
   * buffer.
   */
  shrink(): Result<void, ContainerError> {
    this._ensure_live();
    if (this._len === 0) {
      return err(
        new ContainerError(CONTAINER_ERROR.BAD_ARGUMENT, "cannot shrink an empty vec"),
      );
    }
    const dropped = this._buf.length - this._len;
    if (dropped === 0) return OK_VOID;
    this._buf.length = this._len;
    this._allocator.release_slots(dropped);
    return OK_VOID;
  }

  to_array(): T[] {
    const out: T[] = [];
    for (const item of this) out.push(item);
    return out;
  }

  [Symbol.iterator](): Iterator<T> {
    this._ensure_live();
    let i = 0;
    const buf = this._buf;
    const len = this._len;
    return {
      next(): IteratorResult<T> {
        if (i < len) return { value: buf[i++], done: false };
        return { value: undefined, done: true };
      },
    };
  }

  free(): void {
    this._ensure_live();
    this._allocator.release_slots(this._buf.length);
    this._buf = [];
    this._len = 0;
    this._freed = true;
  }

  //=========================================================
  // Internal
  //=========================================================

  private _reallocate(capacity: number): Result<void, ContainerError> {
    const old = this._buf;
    const next = allocate_array<T>(this._allocator, capacity);
    if (next === null) {
      return err(
        out_of_memory("could not reallocate vec buffer", {
          capacity: old.length,
          requested: capacity,
        }),
      );
    }
    for (let i = 0; i < this._len; i++) next[i] = old[i];
    this._allocator.release_slots(old.length);
    this._buf = next;
    return OK_VOID;
  }

  private _ensure_live(): void {
    if (this._freed) throw use_after_free("Vec");
  }
}
