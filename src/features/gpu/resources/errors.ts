/**
 * Resource layer programmer errors. These indicate misuse of the arena or
 * the lifetime cache and are never expected at runtime.
 */

export class CapacityExceededError extends Error {
  constructor(
    readonly handle: number,
    readonly capacity: number
  ) {
    super(`Handle ${handle} is outside the arena capacity of ${capacity}`);
    this.name = 'CapacityExceededError';
  }
}

export class UnknownResourceError extends Error {
  constructor(
    readonly handle: number,
    readonly operation: string
  ) {
    super(`Resource ${handle} must be created before ${operation}`);
    this.name = 'UnknownResourceError';
  }
}

export class ReferenceUnderflowError extends Error {
  constructor(readonly handle: number) {
    super(`Resource ${handle} has no active references to release`);
    this.name = 'ReferenceUnderflowError';
  }
}
