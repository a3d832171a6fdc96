/**
 * Lifetime Cache
 *
 * Reference counting with delayed, rate-limited destruction. A reference
 * that drops to zero is queued with a deletion time derived from its
 * lifetime class; `upkeep` hands back expired handles, at most
 * `destroyPerUpkeep` per call, buffering the rest for later calls.
 */

import { config } from '@/lib/config';
import { createLogger } from '@/lib/logger';
import { MinHeap } from '@/lib/min-heap';
import type { ElementHandle } from './handle-arena';
import { deletionTimeFor, type ResourceLifetime } from './lifetime';
import { ReferenceUnderflowError, UnknownResourceError } from './errors';

const logger = createLogger('LifetimeCache');

export interface ResourceReference {
  readonly handle: ElementHandle;
  referenceCount: number;
  readonly lifetime: ResourceLifetime;
  /** Set only while inactive; null for inactive `forever` references. */
  deletionTime: number | null;
}

export interface EvictionEntry {
  handle: ElementHandle;
  deletionTime: number | null;
  /** Insertion counter; equal deletion times pop in release order */
  sequence: number;
}

/**
 * Entries without a deletion time always sort after ones with a deletion
 * time.
 */
export function compareEvictionEntries(a: EvictionEntry, b: EvictionEntry): number {
  if (a.deletionTime !== b.deletionTime) {
    if (a.deletionTime === null) return 1;
    if (b.deletionTime === null) return -1;
    return a.deletionTime - b.deletionTime;
  }
  return a.sequence - b.sequence;
}

export interface LifetimeCacheOptions {
  /** Maximum handles returned by a single `upkeep` call */
  destroyPerUpkeep?: number;
  /** Time source in milliseconds */
  now?: () => number;
}

export class LifetimeCache {
  private references = new Map<ElementHandle, ResourceReference>();
  private active = new Set<ElementHandle>();
  private queue = new MinHeap<EvictionEntry>(compareEvictionEntries);
  private pendingDestruction: EvictionEntry[] = [];
  private sequence = 0;
  private clears = 0;

  readonly destroyPerUpkeep: number;
  private readonly clock: () => number;

  constructor(options: LifetimeCacheOptions = {}) {
    this.destroyPerUpkeep = options.destroyPerUpkeep ?? config.resources.destroyPerUpkeep;
    this.clock = options.now ?? (() => performance.now());
    if (!Number.isInteger(this.destroyPerUpkeep) || this.destroyPerUpkeep <= 0) {
      throw new RangeError(`destroyPerUpkeep must be a positive integer, got ${this.destroyPerUpkeep}`);
    }
  }

  now(): number {
    return this.clock();
  }

  /** Bumped by `clear()`; references taken before a clear belong to an older generation. */
  get generation(): number {
    return this.clears;
  }

  /**
   * Register a handle (if unseen) and activate it.
   */
  create(handle: ElementHandle, lifetime: ResourceLifetime): void {
    if (!this.references.has(handle)) {
      this.references.set(handle, {
        handle,
        referenceCount: 0,
        lifetime,
        deletionTime: null,
      });
    }
    this.activate(handle);
  }

  activate(handle: ElementHandle): void {
    const reference = this.references.get(handle);
    if (!reference) {
      throw new UnknownResourceError(handle, 'it is activated');
    }

    reference.referenceCount += 1;
    reference.deletionTime = null;
    this.active.add(handle);
  }

  deactivate(handle: ElementHandle): void {
    const reference = this.references.get(handle);
    if (!reference) {
      throw new UnknownResourceError(handle, 'its reference can be released');
    }
    if (reference.referenceCount === 0) {
      throw new ReferenceUnderflowError(handle);
    }

    reference.referenceCount -= 1;
    if (reference.referenceCount > 0) return;

    this.active.delete(handle);
    reference.deletionTime = deletionTimeFor(reference.lifetime, this.clock());
    // `forever` references are never queued
    if (reference.deletionTime === null) return;
    this.queue.push({ handle, deletionTime: reference.deletionTime, sequence: this.sequence++ });
  }

  /**
   * Collect handles whose deletion time has elapsed and return at most
   * `destroyPerUpkeep` of them. Returned handles are unregistered; the
   * caller destroys the underlying objects.
   */
  upkeep(now: number = this.clock()): ElementHandle[] {
    let next = this.queue.peek();
    while (next && next.deletionTime !== null && next.deletionTime <= now) {
      this.queue.pop();
      if (this.isCurrent(next)) {
        this.pendingDestruction.push(next);
      }
      next = this.queue.peek();
    }

    const destroyed: ElementHandle[] = [];
    while (destroyed.length < this.destroyPerUpkeep && this.pendingDestruction.length > 0) {
      const entry = this.pendingDestruction.shift();
      if (entry === undefined) break;
      // Reactivated while waiting in the buffer
      if (!this.isCurrent(entry)) continue;
      this.references.delete(entry.handle);
      destroyed.push(entry.handle);
    }

    if (destroyed.length > 0) {
      logger.debug(`Evicting ${destroyed.length} resource(s)`);
    }
    if (this.pendingDestruction.length > 0) {
      logger.debug(`${this.pendingDestruction.length} eviction(s) deferred to the next upkeep`);
    }

    return destroyed;
  }

  has(handle: ElementHandle): boolean {
    return this.references.has(handle);
  }

  isActive(handle: ElementHandle): boolean {
    return this.active.has(handle);
  }

  referenceCount(handle: ElementHandle): number {
    return this.references.get(handle)?.referenceCount ?? 0;
  }

  deletionTime(handle: ElementHandle): number | null {
    return this.references.get(handle)?.deletionTime ?? null;
  }

  get activeCount(): number {
    return this.active.size;
  }

  /** Queued evictions plus handles waiting in the destruction buffer. */
  get pendingCount(): number {
    return this.queue.size + this.pendingDestruction.length;
  }

  /**
   * Drop a handle without going through eviction. Used at manager teardown.
   */
  forget(handle: ElementHandle): void {
    this.references.delete(handle);
    this.active.delete(handle);
  }

  clear(): void {
    this.clears += 1;
    this.references.clear();
    this.active.clear();
    this.queue.clear();
    this.pendingDestruction = [];
  }

  // A queue entry is stale once the reference was reactivated, re-queued
  // with a later deletion time, or forgotten.
  private isCurrent(entry: EvictionEntry): boolean {
    const reference = this.references.get(entry.handle);
    if (!reference) return false;
    if (this.active.has(entry.handle) || reference.referenceCount > 0) return false;
    return reference.deletionTime === entry.deletionTime;
  }
}
