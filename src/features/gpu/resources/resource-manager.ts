/**
 * Resource Manager
 *
 * Owns materialized resources: stores them in a fixed-capacity arena,
 * indexes them by uuid, name and source path, and destroys them once the
 * lifetime cache evicts them. Callers hold `ResourceRef`s, never the
 * resources themselves.
 */

import { config } from '@/lib/config';
import { createLogger } from '@/lib/logger';
import { HandleArena, type ElementHandle } from './handle-arena';
import { LifetimeCache, type LifetimeCacheOptions } from './lifetime-cache';
import { ResourceRef } from './resource-handle';
import type { ResourceLifetime } from './lifetime';
import { CapacityExceededError } from './errors';

const logger = createLogger('ResourceManager');

export interface ResourceMetadata {
  readonly uuid: string;
  readonly lifetime: ResourceLifetime;
  readonly name?: string;
  readonly path?: string;
}

export function createResourceMetadata(
  lifetime: ResourceLifetime,
  options: { name?: string; path?: string; uuid?: string } = {}
): ResourceMetadata {
  return {
    uuid: options.uuid ?? crypto.randomUUID(),
    lifetime,
    name: options.name,
    path: options.path,
  };
}

/**
 * Creates and destroys the backing objects for a manager.
 */
export interface ResourceHandler<R, D = void> {
  create(metadata: ResourceMetadata, descriptor: D): R;
  destroy(resource: R): void;
}

interface StoredResource<R> {
  metadata: ResourceMetadata;
  resource: R;
}

export interface ResourceManagerOptions extends LifetimeCacheOptions {
  /** Maximum number of live resources */
  maxResources?: number;
}

export class ResourceManager<R, D = void> {
  private lastHandle: ElementHandle = -1;
  private readonly resources: HandleArena<StoredResource<R>>;
  private readonly cache: LifetimeCache;
  private readonly uuidMap = new Map<string, ElementHandle>();
  private readonly nameMap = new Map<string, string>();
  private readonly pathMap = new Map<string, string>();

  constructor(
    readonly handler: ResourceHandler<R, D>,
    options: ResourceManagerOptions = {}
  ) {
    this.resources = new HandleArena(options.maxResources ?? config.resources.maxResources);
    this.cache = new LifetimeCache(options);
  }

  get size(): number {
    return this.resources.size;
  }

  get lifetimes(): LifetimeCache {
    return this.cache;
  }

  /**
   * Materialize a resource and check out the first reference to it.
   *
   * Names and paths are unique: registering a name or path that is already
   * taken moves it to the new resource (last write wins). The displaced
   * resource stays reachable by uuid.
   */
  create(metadata: ResourceMetadata, descriptor: D): ResourceRef {
    if (this.uuidMap.has(metadata.uuid)) {
      throw new Error(`Resource ${metadata.uuid} is already registered`);
    }

    const handle = this.nextHandle();
    const resource = this.handler.create(metadata, descriptor);
    this.resources.insert(handle, { metadata, resource });
    this.uuidMap.set(metadata.uuid, handle);

    if (metadata.name !== undefined) {
      this.claim(this.nameMap, metadata.name, metadata.uuid, 'name');
    }
    if (metadata.path !== undefined) {
      this.claim(this.pathMap, metadata.path, metadata.uuid, 'path');
    }

    this.cache.create(handle, metadata.lifetime);
    const ref = new ResourceRef(handle, this.cache);
    // The cache's creation reference is handed over to `ref`
    this.cache.deactivate(handle);
    return ref;
  }

  getFromUuid(uuid: string): ResourceRef | undefined {
    const handle = this.uuidMap.get(uuid);
    if (handle === undefined) return undefined;
    return new ResourceRef(handle, this.cache);
  }

  getFromName(name: string): ResourceRef | undefined {
    const uuid = this.nameMap.get(name);
    return uuid === undefined ? undefined : this.getFromUuid(uuid);
  }

  getFromPath(path: string): ResourceRef | undefined {
    const uuid = this.pathMap.get(path);
    return uuid === undefined ? undefined : this.getFromUuid(uuid);
  }

  get(metadata: ResourceMetadata): ResourceRef | undefined {
    return this.getFromUuid(metadata.uuid);
  }

  hasName(name: string): boolean {
    return this.nameMap.has(name);
  }

  resource(ref: ResourceRef): R {
    const stored = this.resources.get(ref.handle);
    if (!stored) {
      throw new Error(`Resource ${ref.handle} is not live in this manager`);
    }
    return stored.resource;
  }

  metadata(ref: ResourceRef): ResourceMetadata | undefined {
    return this.resources.get(ref.handle)?.metadata;
  }

  /**
   * Destroy resources evicted by the lifetime cache. Returns how many were
   * destroyed.
   */
  upkeep(now?: number): number {
    const evicted = this.cache.upkeep(now);
    for (const handle of evicted) {
      const stored = this.resources.remove(handle);
      if (!stored) continue;
      this.unindex(stored.metadata);
      this.handler.destroy(stored.resource);
    }
    return evicted.length;
  }

  /**
   * Destroy every live resource, `forever` ones included.
   */
  dispose(): void {
    for (const [handle, stored] of this.resources.entries()) {
      this.cache.forget(handle);
      this.handler.destroy(stored.resource);
    }
    logger.debug(`Disposed ${this.resources.size} resource(s)`);
    this.resources.clear();
    this.cache.clear();
    this.uuidMap.clear();
    this.nameMap.clear();
    this.pathMap.clear();
  }

  private nextHandle(): ElementHandle {
    // Handles are never reused while the previous holder is live
    for (let attempt = 0; attempt < this.resources.capacity; attempt++) {
      this.lastHandle = (this.lastHandle + 1) % this.resources.capacity;
      if (!this.resources.contains(this.lastHandle) && !this.cache.has(this.lastHandle)) {
        return this.lastHandle;
      }
    }
    throw new CapacityExceededError(this.resources.capacity, this.resources.capacity);
  }

  private claim(map: Map<string, string>, key: string, uuid: string, kind: 'name' | 'path'): void {
    const previous = map.get(key);
    if (previous !== undefined && previous !== uuid) {
      logger.warn(`Resource ${kind} "${key}" moved from ${previous} to ${uuid}`);
    }
    map.set(key, uuid);
  }

  private unindex(metadata: ResourceMetadata): void {
    this.uuidMap.delete(metadata.uuid);
    if (metadata.name !== undefined && this.nameMap.get(metadata.name) === metadata.uuid) {
      this.nameMap.delete(metadata.name);
    }
    if (metadata.path !== undefined && this.pathMap.get(metadata.path) === metadata.uuid) {
      this.pathMap.delete(metadata.path);
    }
  }
}
