/**
 * Frame Graph Module
 *
 * Declarative per-frame graph of passes and resources, its dependency
 * ordering, and the compiler that materializes it on a graphics backend.
 */

// Types
export type {
  Handle,
  HandleKind,
  ResourceHandle,
  PassHandle,
  PipelineHandle,
  ShaderHandle,
  VertexId,
  TextureFormat,
  ResourceDesc,
  ResourceDescriptor,
  PersistentResourceDescriptor,
  DynamicResourceDescriptor,
  ResourceDeclaration,
  ShaderVisibility,
  BindingType,
  BindingLayoutEntry,
  BindGroupLayoutDesc,
  ShaderDescriptor,
  ShaderStageDesc,
  PipelineDescriptor,
  PassAttachment,
  OnlyInputAttachment,
  OnlyOutputAttachment,
  InputAndOutputAttachment,
  PassDescriptor,
  ResolvedAttachment,
  PassDeclaration,
  GraphVertex,
  ResourceVertex,
  PassVertex,
  AddedResource,
  AddedPass,
  StringGraph,
} from './types';
export { onlyInput, onlyOutput, inputAndOutput } from './types';

// Errors
export {
  FrameGraphError,
  ResourceNotFoundError,
  PassNotFoundError,
  PipelineNotFoundError,
  ShaderNotFoundError,
  GraphCycleError,
  UnsatisfiedDependencyError,
  GraphFrozenError,
  SurfaceOutOfMemoryError,
} from './errors';
export type { FrameGraphErrorCode } from './errors';

// Registry
export { HandleRegistry, createHandle } from './handle-registry';
export type { RegistryKeys } from './handle-registry';

// Dependency graph
export { DependencyGraph } from './dependency-graph';
export type { Edge, EdgeOptions, GraphStorage } from './dependency-graph';

// Builder
export { FrameGraph, createPipelineLibrary } from './frame-graph';
export type { PipelineLibrary, FrameGraphOptions } from './frame-graph';

// Compiler
export { FrameGraphCompiler, DEFAULT_RESOURCE_DESC } from './compiler';
export type {
  CompiledFrame,
  CompileError,
  CompileOptions,
  CompileResult,
  FrameOperation,
} from './compiler';

// Diagnostics
export { toDot } from './graph-dot';
