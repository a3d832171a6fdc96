/**
 * Graphics Backend Types
 *
 * The compiler only needs "given a descriptor, produce an opaque backend
 * object" and "given a compiled frame, encode and submit it". Each backend
 * names its object types through `BackendObjects`.
 */

import type { CompiledFrame } from '../graph/compiler';
import type { PipelineDescriptor, ResourceDesc, ShaderDescriptor, TextureFormat } from '../graph/types';
import type { ResourceHandler, ResourceMetadata } from '../resources/resource-manager';

export type BackendName = 'webgpu' | 'headless';

export interface BackendObjects {
  shaderModule: unknown;
  pipelineLayout: unknown;
  pipeline: unknown;
  resource: unknown;
}

export interface RenderPipelineInput<T extends BackendObjects> {
  descriptor: PipelineDescriptor;
  layout: T['pipelineLayout'];
  vertexModule: T['shaderModule'];
  fragmentModule?: T['shaderModule'];
}

/**
 * Creation and destruction of frame graph resources.
 */
export interface ResourceBackend<R> {
  createResource(metadata: ResourceMetadata, desc: ResourceDesc): R;
  destroyResource(resource: R): void;
}

export interface GraphicsBackend<T extends BackendObjects = BackendObjects> extends ResourceBackend<T['resource']> {
  readonly name: BackendName;

  createShaderModule(descriptor: ShaderDescriptor): T['shaderModule'];
  createPipelineLayout(descriptor: PipelineDescriptor): T['pipelineLayout'];
  createRenderPipeline(input: RenderPipelineInput<T>): T['pipeline'];

  /** Encode every executed pass of the frame and submit the commands */
  execute(frame: CompiledFrame<T>): void;
}

/**
 * Adapt a backend to the resource manager's handler interface.
 */
export function backendResourceHandler<R>(backend: ResourceBackend<R>): ResourceHandler<R, ResourceDesc> {
  return {
    create: (metadata, desc) => backend.createResource(metadata, desc),
    destroy: (resource) => backend.destroyResource(resource),
  };
}

// === Presentation ===

export interface SurfaceSize {
  width: number;
  height: number;
}

export type SurfaceFailure = 'lost' | 'outdated' | 'timeout' | 'out-of-memory';

export type SurfaceAcquireResult<I> = { status: 'ok'; image: I } | { status: SurfaceFailure };

/**
 * Owner of the presentable images. Lost and outdated surfaces are
 * reconfigured by the frame driver; out-of-memory ends rendering.
 */
export interface PresentationSurface<I> {
  readonly format: TextureFormat;
  readonly size: SurfaceSize;
  configure(size: SurfaceSize): void;
  acquire(): SurfaceAcquireResult<I>;
  present(image: I): void;
}
