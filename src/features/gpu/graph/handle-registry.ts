/**
 * Handle Registry
 *
 * Handle-keyed storage for long-lived graph objects with secondary lookup
 * by generated id, by user-supplied name and by source path.
 */

import { createLogger } from '@/lib/logger';
import type { Handle, HandleKind } from './types';

const logger = createLogger('HandleRegistry');

export function createHandle<K extends HandleKind>(kind: K): Handle<K> {
  return Object.freeze({ kind, id: crypto.randomUUID() });
}

export interface RegistryKeys {
  name?: string;
  path?: string;
}

interface Entry<K extends HandleKind, T> {
  handle: Handle<K>;
  value: T;
  name?: string;
  path?: string;
}

/**
 * Names and paths are unique within a registry. Registering a taken name or
 * path moves it to the newer handle (last write wins); the older handle
 * keeps its value and stays reachable by handle.
 */
export class HandleRegistry<K extends HandleKind, T> {
  private entries = new Map<Handle<K>, Entry<K, T>>();
  private byId = new Map<string, Handle<K>>();
  private byName = new Map<string, Handle<K>>();
  private byPath = new Map<string, Handle<K>>();

  constructor(readonly kind: K) {}

  get size(): number {
    return this.entries.size;
  }

  add(value: T, keys: RegistryKeys = {}): Handle<K> {
    return this.register(() => value, keys);
  }

  /**
   * Add a value that needs its own handle to be built.
   */
  register(create: (handle: Handle<K>) => T, keys: RegistryKeys = {}): Handle<K> {
    const handle = createHandle(this.kind);
    this.entries.set(handle, { handle, value: create(handle) });
    this.byId.set(handle.id, handle);
    if (keys.name !== undefined) this.setName(handle, keys.name);
    if (keys.path !== undefined) this.setPath(handle, keys.path);
    return handle;
  }

  has(handle: Handle<K>): boolean {
    return this.entries.has(handle);
  }

  get(handle: Handle<K>): T | undefined {
    return this.entries.get(handle)?.value;
  }

  /** Resolve the id shown in labels, DOT output and errors */
  getById(id: string): T | undefined {
    const handle = this.byId.get(id);
    return handle ? this.get(handle) : undefined;
  }

  handleById(id: string): Handle<K> | undefined {
    return this.byId.get(id);
  }

  getByName(name: string): T | undefined {
    const handle = this.byName.get(name);
    return handle ? this.get(handle) : undefined;
  }

  getByPath(path: string): T | undefined {
    const handle = this.byPath.get(path);
    return handle ? this.get(handle) : undefined;
  }

  handleByName(name: string): Handle<K> | undefined {
    return this.byName.get(name);
  }

  handleByPath(path: string): Handle<K> | undefined {
    return this.byPath.get(path);
  }

  nameOf(handle: Handle<K>): string | undefined {
    return this.entries.get(handle)?.name;
  }

  setName(handle: Handle<K>, name: string): void {
    const entry = this.requireEntry(handle);
    this.rekey(this.byName, entry, 'name', name);
  }

  setPath(handle: Handle<K>, path: string): void {
    const entry = this.requireEntry(handle);
    this.rekey(this.byPath, entry, 'path', path);
  }

  remove(handle: Handle<K>): T | undefined {
    const entry = this.entries.get(handle);
    if (!entry) return undefined;
    if (entry.name !== undefined) this.byName.delete(entry.name);
    if (entry.path !== undefined) this.byPath.delete(entry.path);
    this.byId.delete(handle.id);
    this.entries.delete(handle);
    return entry.value;
  }

  *values(): IterableIterator<[Handle<K>, T]> {
    for (const entry of this.entries.values()) {
      yield [entry.handle, entry.value];
    }
  }

  private requireEntry(handle: Handle<K>): Entry<K, T> {
    const entry = this.entries.get(handle);
    if (!entry) {
      throw new Error(`Unknown ${this.kind} handle ${handle.id}`);
    }
    return entry;
  }

  private rekey(
    index: Map<string, Handle<K>>,
    entry: Entry<K, T>,
    field: 'name' | 'path',
    key: string
  ): void {
    const previousKey = entry[field];
    if (previousKey !== undefined && index.get(previousKey) === entry.handle) {
      index.delete(previousKey);
    }

    const displaced = index.get(key);
    if (displaced && displaced !== entry.handle) {
      const displacedEntry = this.entries.get(displaced);
      if (displacedEntry) displacedEntry[field] = undefined;
      logger.warn(`${this.kind} ${field} "${key}" reassigned from ${displaced.id} to ${entry.handle.id}`);
    }

    entry[field] = key;
    index.set(key, entry.handle);
  }
}
