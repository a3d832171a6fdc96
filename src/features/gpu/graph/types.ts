/**
 * Frame Graph Types
 */

import type { ResourceLifetime } from '../resources/lifetime';

// === Handles ===

export type HandleKind = 'resource' | 'pass' | 'pipeline' | 'shader';

/**
 * Opaque identity of a registered graph object. Handles are compared by
 * identity; `id` is a uuid used for display and serialization.
 */
export interface Handle<K extends HandleKind> {
  readonly kind: K;
  readonly id: string;
}

export type ResourceHandle = Handle<'resource'>;
export type PassHandle = Handle<'pass'>;
export type PipelineHandle = Handle<'pipeline'>;
export type ShaderHandle = Handle<'shader'>;

/** Dense vertex index into a dependency graph */
export type VertexId = number;

// === Resources ===

export type TextureFormat = 'rgba8unorm' | 'rgba16float' | 'rgba32float' | 'bgra8unorm';

export interface ResourceDesc {
  width: number;
  height: number;
  format: TextureFormat;
}

interface ResourceDescriptorBase {
  /** Destruction delay class once the frame releases it */
  lifetime?: ResourceLifetime;
  /** Allocation parameters; the compiler's default applies when omitted */
  desc?: ResourceDesc;
}

export interface PersistentResourceDescriptor extends ResourceDescriptorBase {
  type: 'persistent';
  name: string;
}

export interface DynamicResourceDescriptor extends ResourceDescriptorBase {
  type: 'dynamic';
}

export type ResourceDescriptor = PersistentResourceDescriptor | DynamicResourceDescriptor;

export interface ResourceDeclaration {
  readonly handle: ResourceHandle;
  readonly type: 'persistent' | 'dynamic';
  /** Name of a persistent resource */
  readonly name?: string;
  /** Derived name a dynamic output is registered under */
  readonly promotedName?: string;
  readonly lifetime: ResourceLifetime;
  readonly desc?: ResourceDesc;
}

// === Shaders and pipelines ===

export type ShaderVisibility = 'vertex' | 'fragment' | 'compute';

export type BindingType = 'texture' | 'sampler' | 'uniform-buffer' | 'storage-buffer';

export interface BindingLayoutEntry {
  visibility: ShaderVisibility[];
  type: BindingType;
}

export interface BindGroupLayoutDesc {
  label?: string;
  entries: BindingLayoutEntry[];
}

export interface ShaderDescriptor {
  label?: string;
  /** WGSL source text */
  code: string;
  /** File the source was loaded from */
  path?: string;
}

export interface ShaderStageDesc {
  shader: ShaderHandle;
  entryPoint?: string;
}

export interface PipelineDescriptor {
  label?: string;
  vertex: ShaderStageDesc;
  fragment?: ShaderStageDesc & { targets: TextureFormat[] };
  bindGroups?: BindGroupLayoutDesc[];
}

// === Passes ===

export interface OnlyInputAttachment {
  type: 'input';
  resource: ResourceHandle;
}

export interface OnlyOutputAttachment {
  type: 'output';
  /** Omit to allocate a new resource for this output */
  resource?: ResourceHandle;
}

export interface InputAndOutputAttachment {
  type: 'input-output';
  resource: ResourceHandle;
}

export type PassAttachment = OnlyInputAttachment | OnlyOutputAttachment | InputAndOutputAttachment;

export const onlyInput = (resource: ResourceHandle): OnlyInputAttachment => ({ type: 'input', resource });

export const onlyOutput = (resource?: ResourceHandle): OnlyOutputAttachment =>
  resource ? { type: 'output', resource } : { type: 'output' };

export const inputAndOutput = (resource: ResourceHandle): InputAndOutputAttachment => ({
  type: 'input-output',
  resource,
});

export interface PassDescriptor {
  pipeline: PipelineHandle;
  attachments: PassAttachment[];
  label?: string;
}

export interface ResolvedAttachment {
  readonly type: PassAttachment['type'];
  readonly resource: ResourceHandle;
  /** True when the builder allocated the resource for this attachment */
  readonly allocated: boolean;
}

export interface PassDeclaration {
  readonly handle: PassHandle;
  readonly pipeline: PipelineHandle;
  readonly label?: string;
  readonly attachments: readonly ResolvedAttachment[];
}

// === Vertices ===

export interface ResourceVertex {
  kind: 'resource';
  resource: ResourceHandle;
}

export interface PassVertex {
  kind: 'pass';
  pass: PassHandle;
}

export type GraphVertex = ResourceVertex | PassVertex;

export interface AddedResource {
  handle: ResourceHandle;
  vertex: VertexId;
}

export interface AddedPass {
  handle: PassHandle;
  vertex: VertexId;
  /** Output resources in attachment order */
  outputs: ResourceHandle[];
}

/** String-labelled projection of a graph, for diagnostics */
export interface StringGraph {
  vertices: { id: VertexId; label: string; kind: GraphVertex['kind'] }[];
  edges: [VertexId, VertexId][];
}
