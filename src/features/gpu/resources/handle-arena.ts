/**
 * Handle Arena
 *
 * Sparse set mapping integer handles to values. Lookups go through a sparse
 * array of dense indices; removal swaps the last dense element into the freed
 * slot so the dense arrays stay contiguous.
 */

import { CapacityExceededError } from './errors';

export type ElementHandle = number;

export class HandleArena<T> {
  private sparse: number[];
  private dense: ElementHandle[] = [];
  private denseValues: T[] = [];
  private readonly tombstone: number;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Arena capacity must be a positive integer, got ${capacity}`);
    }
    this.tombstone = capacity;
    this.sparse = new Array<number>(capacity + 1).fill(this.tombstone);
  }

  get size(): number {
    return this.dense.length;
  }

  /**
   * Insert a value. Inserting an existing handle keeps the stored value and
   * returns it.
   */
  insert(handle: ElementHandle, value: T): T {
    this.assertInRange(handle);
    if (!this.contains(handle)) {
      this.sparse[handle] = this.dense.length;
      this.dense.push(handle);
      this.denseValues.push(value);
      return value;
    }
    return this.denseValues[this.sparse[handle]];
  }

  remove(handle: ElementHandle): T | undefined {
    if (!this.contains(handle)) return undefined;

    const index = this.sparse[handle];
    const lastIndex = this.dense.length - 1;
    const lastHandle = this.dense[lastIndex];
    const value = this.denseValues[index];

    this.dense[index] = lastHandle;
    this.denseValues[index] = this.denseValues[lastIndex];
    this.sparse[lastHandle] = index;

    this.dense.pop();
    this.denseValues.pop();
    this.sparse[handle] = this.tombstone;

    return value;
  }

  contains(handle: ElementHandle): boolean {
    if (!Number.isInteger(handle) || handle < 0 || handle >= this.tombstone) return false;
    const index = this.sparse[handle];
    return index !== this.tombstone && index < this.dense.length && this.dense[index] === handle;
  }

  get(handle: ElementHandle): T | undefined {
    if (!this.contains(handle)) return undefined;
    return this.denseValues[this.sparse[handle]];
  }

  /**
   * Replace the value stored under a handle. Returns the new value, or
   * undefined when the handle is not live.
   */
  update(handle: ElementHandle, fn: (value: T) => T): T | undefined {
    if (!this.contains(handle)) return undefined;
    const index = this.sparse[handle];
    const next = fn(this.denseValues[index]);
    this.denseValues[index] = next;
    return next;
  }

  handles(): ElementHandle[] {
    return [...this.dense];
  }

  values(): T[] {
    return [...this.denseValues];
  }

  *entries(): IterableIterator<[ElementHandle, T]> {
    for (let i = 0; i < this.dense.length; i++) {
      yield [this.dense[i], this.denseValues[i]];
    }
  }

  clear(): void {
    this.dense = [];
    this.denseValues = [];
    this.sparse.fill(this.tombstone);
  }

  private assertInRange(handle: ElementHandle): void {
    if (!Number.isInteger(handle) || handle < 0 || handle >= this.tombstone) {
      throw new CapacityExceededError(handle, this.capacity);
    }
  }
}
