/**
 * Frame Graph Errors
 *
 * Every error carries a `code` so callers can react without matching on
 * messages.
 */

import type { Handle, HandleKind, VertexId } from './types';

export type FrameGraphErrorCode =
  | 'resource-not-found'
  | 'pass-not-found'
  | 'pipeline-not-found'
  | 'shader-not-found'
  | 'cycle'
  | 'unsatisfied-dependency'
  | 'graph-frozen'
  | 'surface-out-of-memory';

export abstract class FrameGraphError extends Error {
  abstract readonly code: FrameGraphErrorCode;
}

function describe(target: Handle<HandleKind> | string): string {
  return typeof target === 'string' ? `"${target}"` : target.id;
}

export class ResourceNotFoundError extends FrameGraphError {
  readonly code = 'resource-not-found';

  constructor(readonly resource: Handle<'resource'> | string) {
    super(`Resource ${describe(resource)} was not created as a vertex`);
    this.name = 'ResourceNotFoundError';
  }
}

export class PassNotFoundError extends FrameGraphError {
  readonly code = 'pass-not-found';

  constructor(readonly pass: Handle<'pass'> | string) {
    super(`Pass ${describe(pass)} was not created as a vertex`);
    this.name = 'PassNotFoundError';
  }
}

export class PipelineNotFoundError extends FrameGraphError {
  readonly code = 'pipeline-not-found';

  constructor(readonly pipeline: Handle<'pipeline'> | string) {
    super(`Pipeline ${describe(pipeline)} is not registered`);
    this.name = 'PipelineNotFoundError';
  }
}

export class ShaderNotFoundError extends FrameGraphError {
  readonly code = 'shader-not-found';

  constructor(readonly shader: Handle<'shader'> | string) {
    super(`Shader ${describe(shader)} is not registered`);
    this.name = 'ShaderNotFoundError';
  }
}

export class GraphCycleError extends FrameGraphError {
  readonly code = 'cycle';

  constructor(readonly unordered: VertexId[]) {
    super(`Cycle detected in graph involving vertices ${unordered.join(', ')}`);
    this.name = 'GraphCycleError';
  }
}

export class UnsatisfiedDependencyError extends FrameGraphError {
  readonly code = 'unsatisfied-dependency';

  constructor(
    readonly resource: Handle<'resource'>,
    readonly label: string
  ) {
    super(`Resource "${label}" has no producer and no external binding`);
    this.name = 'UnsatisfiedDependencyError';
  }
}

export class GraphFrozenError extends FrameGraphError {
  readonly code = 'graph-frozen';

  constructor() {
    super('Frame graph is compiled and can no longer be modified');
    this.name = 'GraphFrozenError';
  }
}

export class SurfaceOutOfMemoryError extends FrameGraphError {
  readonly code = 'surface-out-of-memory';

  constructor() {
    super('Presentation surface ran out of memory');
    this.name = 'SurfaceOutOfMemoryError';
  }
}
