/**
 * Checked-out resource references.
 *
 * A `ResourceRef` holds one reference on a handle in a lifetime cache for as
 * long as it is live. JavaScript has no destructors, so references are
 * released explicitly with `release()`; a reference that is garbage
 * collected without being released is released by a finalizer and reported
 * as a leak. Until collection, a forgotten reference keeps its resource alive.
 */

import { createLogger } from '@/lib/logger';
import type { ElementHandle } from './handle-arena';

const logger = createLogger('ResourceRef');

export interface ReferenceCounter {
  /** Changes whenever the counter drops every reference at once */
  readonly generation: number;
  activate(handle: ElementHandle): void;
  deactivate(handle: ElementHandle): void;
  has(handle: ElementHandle): boolean;
}

export interface LeakRecord {
  counter: ReferenceCounter;
  handle: ElementHandle;
  generation: number;
}

/**
 * Give back the reference of a token that was collected without being
 * released. Returns false when the counter was cleared since the token was
 * taken, since the handle may belong to another resource by now.
 */
export function releaseLeakedReference({ counter, handle, generation }: LeakRecord): boolean {
  logger.warn(`Resource ${handle} was garbage collected without being released`);
  if (counter.generation !== generation || !counter.has(handle)) return false;
  counter.deactivate(handle);
  return true;
}

const leakRegistry = new FinalizationRegistry<LeakRecord>((record) => {
  releaseLeakedReference(record);
});

export class ResourceRef {
  private released = false;

  constructor(
    readonly handle: ElementHandle,
    private readonly counter: ReferenceCounter
  ) {
    counter.activate(handle);
    leakRegistry.register(this, { counter, handle, generation: counter.generation }, this);
  }

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * Take another reference on the same resource.
   */
  clone(): ResourceRef {
    if (this.released) {
      throw new Error(`Cannot clone released reference to resource ${this.handle}`);
    }
    return new ResourceRef(this.handle, this.counter);
  }

  /**
   * Give the reference back. Returns false if it was already released.
   */
  release(): boolean {
    if (this.released) return false;
    this.released = true;
    leakRegistry.unregister(this);
    this.counter.deactivate(this.handle);
    return true;
  }

  equals(other: ResourceRef): boolean {
    return this.handle === other.handle;
  }
}

/**
 * Run `fn` with a reference and release it afterwards, including when `fn`
 * throws or its promise rejects.
 */
export function withResource<T>(ref: ResourceRef, fn: (ref: ResourceRef) => Promise<T>): Promise<T>;
export function withResource<T>(ref: ResourceRef, fn: (ref: ResourceRef) => T): T;
export function withResource<T>(
  ref: ResourceRef,
  fn: (ref: ResourceRef) => T | Promise<T>
): T | Promise<T> {
  let result: T | Promise<T>;
  try {
    result = fn(ref);
  } catch (error) {
    ref.release();
    throw error;
  }

  if (result instanceof Promise) {
    return result.finally(() => {
      ref.release();
    });
  }

  ref.release();
  return result;
}
