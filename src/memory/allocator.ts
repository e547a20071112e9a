/***
 *
 * Allocator — Storage accounting for every container in the package.
 *
 * Containers never assume an allocation succeeds. A list reserves one
 * node per push and releases it on pop/remove/free; a bucket array or vec
 * buffer reserves one slot per element. A refused reservation becomes an
 * OUT_OF_MEMORY result at the call site.
 *
 * SystemAllocator only refuses what the runtime cannot represent (an array
 * length outside 1..2^32-1). TrackingAllocator counts live storage and can
 * be given hard limits.
 *
 ***/

import { MAX_ARRAY_LENGTH } from "utils/constants";

export interface Allocator {
  /** Reserve storage for `count` list nodes. False if refused. */
  reserve_nodes(count: number): boolean;
  release_nodes(count: number): void;
  /** Reserve one contiguous run of `count` array slots. False if refused. */
  reserve_slots(count: number): boolean;
  release_slots(count: number): void;
}

export const is_valid_array_length = (count: number): boolean =>
  Number.isInteger(count) && count >= 1 && count <= MAX_ARRAY_LENGTH;

export class SystemAllocator implements Allocator {
  reserve_nodes(count: number): boolean {
    return Number.isInteger(count) && count >= 0;
  }

  release_nodes(_count: number): void {}

  reserve_slots(count: number): boolean {
    return is_valid_array_length(count);
  }

  release_slots(_count: number): void {}
}

export const system_allocator: Allocator = new SystemAllocator();

export interface AllocatorLimits {
  /** Most list nodes that may be live at once. */
  max_nodes?: number;
  /** Most array slots that may be live at once, summed over all buffers. */
  max_slots?: number;
}

/**
 * Counts live nodes and slots. Reservations past a limit are refused,
 * which lets tests drive every out-of-memory path.
 */
export class TrackingAllocator implements Allocator {
  private _live_nodes = 0;
  private _live_slots = 0;
  private _peak_slots = 0;
  private _refused = 0;
  private _limits: AllocatorLimits;

  constructor(limits: AllocatorLimits = {}) {
    this._limits = { ...limits };
  }

  get live_nodes(): number {
    return this._live_nodes;
  }

  get live_slots(): number {
    return this._live_slots;
  }

  get peak_slots(): number {
    return this._peak_slots;
  }

  /** Number of reservations refused so far. */
  get refused(): number {
    return this._refused;
  }

  set_limits(limits: AllocatorLimits): void {
    this._limits = { ...limits };
  }

  reserve_nodes(count: number): boolean {
    const max = this._limits.max_nodes ?? Infinity;
    if (!Number.isInteger(count) || count < 0 || this._live_nodes + count > max) {
      this._refused++;
      return false;
    }
    this._live_nodes += count;
    return true;
  }

  release_nodes(count: number): void {
    this._live_nodes -= count;
  }

  reserve_slots(count: number): boolean {
    const max = this._limits.max_slots ?? Infinity;
    if (!is_valid_array_length(count) || this._live_slots + count > max) {
      this._refused++;
      return false;
    }
    this._live_slots += count;
    if (this._live_slots > this._peak_slots) this._peak_slots = this._live_slots;
    return true;
  }

  release_slots(count: number): void {
    this._live_slots -= count;
  }
}

/**
 * Allocate a JS array of `length` slots once the allocator has accepted
 * the reservation. With `init` every slot is filled, without it the slots
 * are left as holes for the caller to fill. Returns null when the
 * reservation is refused or the runtime rejects the length.
 */
export function allocate_array<T>(
  allocator: Allocator,
  length: number,
  init?: (index: number) => T,
): T[] | null {
  if (!allocator.reserve_slots(length)) return null;
  let out: T[];
  try {
    out = new Array<T>(length);
  } catch (e) {
    allocator.release_slots(length);
    if (e instanceof RangeError) return null;
    throw e;
  }
  if (init !== undefined) {
    for (let i = 0; i < length; i++) out[i] = init(i);
  }
  return out;
}
