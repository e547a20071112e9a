/***
 *
 * LinkedList — Singly-linked list, usable as a stack, queue, or deque.
 *
 * Nodes are reserved from the list's Allocator when pushed and released
 * when popped, removed, or freed. Push and pop at the front are O(1),
 * push at the back is O(1), pop at the back is O(n): there is no
 * predecessor pointer, so unlinking the tail walks from the head.
 * If you only need to pop from one end, pop from the front.
 *
 * free() must be called exactly once when the list is no longer needed;
 * every later call throws USE_AFTER_FREE.
 *
 ***/

import { system_allocator, type Allocator } from "memory/allocator";
import { assert, is_non_null } from "type_primitives/assertions";
import {
  NONE,
  OK_VOID,
  err,
  some,
  type Option,
  type Result,
} from "type_primitives/result";
import { out_of_memory, use_after_free, type ContainerError } from "utils/error";

export class ListNode<T> {
  constructor(
    public data: T,
    public next: ListNode<T> | null = null,
  ) {}
}

export interface ListOptions {
  allocator?: Allocator;
}

export class LinkedList<T> {
  private _head: ListNode<T> | null = null;
  private _tail: ListNode<T> | null = null;
  private _length = 0;
  private _freed = false;
  private readonly _allocator: Allocator;

  constructor(options: ListOptions = {}) {
    this._allocator = options.allocator ?? system_allocator;
  }

  get length(): number {
    return this._length;
  }

  /** First node, or null when empty. Do not relink nodes by hand. */
  get head(): ListNode<T> | null {
    return this._head;
  }

  /** Last node, or null when empty. */
  get tail(): ListNode<T> | null {
    return this._tail;
  }

  get is_freed(): boolean {
    return this._freed;
  }

  push_back(item: T): Result<void, ContainerError> {
    this._ensure_live();
    if (!this._allocator.reserve_nodes(1)) {
      return err(out_of_memory("list node allocation refused", { op: "push_back" }));
    }
    const node = new ListNode(item);
    if (this._tail === null) {
      this._head = node;
    } else {
      this._tail.next = node;
    }
    this._tail = node;
    this._length++;
    return OK_VOID;
  }

  push_front(item: T): Result<void, ContainerError> {
    this._ensure_live();
    if (!this._allocator.reserve_nodes(1)) {
      return err(out_of_memory("list node allocation refused", { op: "push_front" }));
    }
    this._link_front(new ListNode(item, this._head));
    return OK_VOID;
  }

  pop_front(): Option<T> {
    this._ensure_live();
    const node = this._unlink_front();
    if (node === null) return NONE;
    this._allocator.release_nodes(1);
    return some(node.data);
  }

  /** O(n). */
  pop_back(): Option<T> {
    this._ensure_live();
    const head = this._head;
    if (head === null) return NONE;

    if (head === this._tail) {
      this._head = null;
      this._tail = null;
      this._length = 0;
      this._allocator.release_nodes(1);
      return some(head.data);
    }

    let prev = head;
    let last = head.next;
    while (last !== null && last !== this._tail) {
      prev = last;
      last = last.next;
    }
    assert(last, is_non_null, "tail must be reachable from head");

    prev.next = null;
    this._tail = prev;
    this._length--;
    this._allocator.release_nodes(1);
    return some(last.data);
  }

  /** Best case O(1), worst case O(n). */
  includes(equals: (a: T, b: T) => boolean, item: T): boolean {
    this._ensure_live();
    for (let curr = this._head; curr !== null; curr = curr.next) {
      if (equals(curr.data, item)) return true;
    }
    return false;
  }

  /**
   * Unlink `node` given the node directly before it (null for the head).
   *
   * The head and tail take the pop_front / pop_back paths. An interior node
   * is only unlinked when `prev.next === node`; a predecessor that does not
   * precede `node` (or a null one for an interior node) leaves the list
   * untouched. Returns true if a node was unlinked.
   */
  remove(node: ListNode<T>, prev: ListNode<T> | null): boolean {
    this._ensure_live();
    if (this._head === null) return false;

    if (node === this._head) {
      this.pop_front();
      return true;
    }

    if (node === this._tail) {
      // The pop_back walk finds the predecessor itself
      this.pop_back();
      return true;
    }

    if (prev !== null && prev.next === node) {
      prev.next = node.next;
      node.next = null;
      this._length--;
      this._allocator.release_nodes(1);
      return true;
    }

    return false;
  }

  /**
   * Detach the head node and link it in as the head of `target`. O(1).
   * The node changes owner without being released or reserved, so this
   * cannot fail. Returns the moved item, or NONE if this list is empty.
   */
  move_front_to(target: LinkedList<T>): Option<T> {
    this._ensure_live();
    target._ensure_live();
    const node = this._unlink_front();
    if (node === null) return NONE;
    node.next = target._head;
    target._link_front(node);
    return some(node.data);
  }

  /** `fn` may remove the node it is visiting; other removals are unsupported. */
  for_each(fn: (item: T) => void): void {
    this._ensure_live();
    let curr = this._head;
    while (curr !== null) {
      const next = curr.next;
      fn(curr.data);
      curr = next;
    }
  }

  to_array(): T[] {
    const out: T[] = [];
    this.for_each((item) => out.push(item));
    return out;
  }

  [Symbol.iterator](): Iterator<T> {
    this._ensure_live();
    let curr = this._head;
    return {
      next(): IteratorResult<T> {
        if (curr === null) return { value: undefined, done: true };
        const data = curr.data;
        curr = curr.next;
        return { value: data, done: false };
      },
    };
  }

  /** Release every remaining node. O(n). */
  free(): void {
    this._ensure_live();
    let curr = this._head;
    while (curr !== null) {
      const next = curr.next;
      curr.next = null;
      this._allocator.release_nodes(1);
      curr = next;
    }
    this._head = null;
    this._tail = null;
    this._length = 0;
    this._freed = true;
  }

  //=========================================================
  // Internal
  //=========================================================

  private _link_front(node: ListNode<T>): void {
    if (this._head === null) this._tail = node;
    this._head = node;
    this._length++;
  }

  private _unlink_front(): ListNode<T> | null {
    const head = this._head;
    if (head === null) return null;
    this._head = head.next;
    if (this._head === null) this._tail = null;
    head.next = null;
    this._length--;
    return head;
  }

  private _ensure_live(): void {
    if (this._freed) throw use_after_free("LinkedList");
  }
}
