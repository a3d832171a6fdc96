export { HandleArena } from './handle-arena';
export type { ElementHandle } from './handle-arena';
export { LifetimeCache, compareEvictionEntries } from './lifetime-cache';
export type { ResourceReference, EvictionEntry, LifetimeCacheOptions } from './lifetime-cache';
export { ResourceRef, withResource, releaseLeakedReference } from './resource-handle';
export type { ReferenceCounter, LeakRecord } from './resource-handle';
export { ResourceManager, createResourceMetadata } from './resource-manager';
export type { ResourceMetadata, ResourceHandler, ResourceManagerOptions } from './resource-manager';
export { RESOURCE_LIFETIMES, LIFETIME_DELAYS, deletionTimeFor } from './lifetime';
export type { ResourceLifetime } from './lifetime';
export { CapacityExceededError, UnknownResourceError, ReferenceUnderflowError } from './errors';
