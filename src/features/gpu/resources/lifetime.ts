/**
 * How long a resource lasts after its last reference is released.
 */
export type ResourceLifetime =
  /** Destroyed at the next upkeep */
  | 'none'
  /** Unlikely to be loaded again */
  | 'short'
  /** May be loaded again */
  | 'medium'
  /** Expected to be loaded again */
  | 'long'
  /** Only destroyed when the owning manager is disposed */
  | 'forever';

export const RESOURCE_LIFETIMES: readonly ResourceLifetime[] = [
  'none',
  'short',
  'medium',
  'long',
  'forever',
];

/** Destruction delay in milliseconds; `null` means never. */
export const LIFETIME_DELAYS: Readonly<Record<ResourceLifetime, number | null>> = {
  none: 0,
  short: 3_000,
  medium: 60_000,
  long: 5 * 60_000,
  forever: null,
};

export function deletionTimeFor(lifetime: ResourceLifetime, now: number): number | null {
  const delay = LIFETIME_DELAYS[lifetime];
  return delay === null ? null : now + delay;
}
