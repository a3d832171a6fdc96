/**
 * Frame Graph Compiler
 *
 * Orders a finished frame graph and materializes what it needs: pipelines
 * (with their shader modules and layouts) are created once per handle and
 * memoized across compiles; resources are bound from the caller, reused
 * from the resource manager by persistent name, or allocated.
 */

import { createLogger } from '@/lib/logger';
import type { BackendObjects, GraphicsBackend } from '../backend/types';
import { createResourceMetadata, type ResourceManager } from '../resources/resource-manager';
import type { ResourceRef } from '../resources/resource-handle';
import { GraphCycleError, PipelineNotFoundError, ShaderNotFoundError, UnsatisfiedDependencyError } from './errors';
import type { FrameGraph } from './frame-graph';
import type {
  PassHandle,
  PipelineHandle,
  ResourceDesc,
  ResourceHandle,
  ShaderHandle,
  VertexId,
} from './types';

const logger = createLogger('FrameGraphCompiler');

export const DEFAULT_RESOURCE_DESC: ResourceDesc = {
  width: 1,
  height: 1,
  format: 'rgba8unorm',
};

export type FrameOperation<T extends BackendObjects> =
  | { type: 'bind-external'; resource: ResourceHandle; label: string; object: T['resource'] }
  | { type: 'create-resource'; resource: ResourceHandle; label: string; object: T['resource']; ref: ResourceRef }
  | { type: 'reuse-resource'; resource: ResourceHandle; label: string; object: T['resource']; ref: ResourceRef }
  | {
      type: 'execute-pass';
      pass: PassHandle;
      label: string;
      pipeline: T['pipeline'];
      inputs: T['resource'][];
      outputs: T['resource'][];
    };

export interface CompiledFrame<T extends BackendObjects> {
  /** Passes in execution order */
  readonly order: PassHandle[];
  readonly operations: FrameOperation<T>[];
  /** Resources allocated for this frame */
  readonly allocated: ResourceHandle[];
  /** Release the frame's references to created and reused resources */
  release(): void;
}

export type CompileError = GraphCycleError | UnsatisfiedDependencyError;

export type CompileResult<T extends BackendObjects> =
  | { ok: true; frame: CompiledFrame<T> }
  | { ok: false; error: CompileError };

export interface CompileOptions<T extends BackendObjects> {
  /** Caller-owned objects for graph sources and externally supplied resources */
  bindings?: ReadonlyMap<ResourceHandle, T['resource']>;
  /** Allocation parameters for resources declared without a `desc` */
  defaultDesc?: ResourceDesc;
}

interface Memo<V> {
  value: V;
}

function memoize<K, V>(cache: Map<K, Memo<V>>, key: K, create: () => V): V {
  const hit = cache.get(key);
  if (hit) return hit.value;
  const value = create();
  cache.set(key, { value });
  return value;
}

export class FrameGraphCompiler<T extends BackendObjects> {
  private shaderModules = new Map<ShaderHandle, Memo<T['shaderModule']>>();
  private pipelineLayouts = new Map<PipelineHandle, Memo<T['pipelineLayout']>>();
  private pipelines = new Map<PipelineHandle, Memo<T['pipeline']>>();

  constructor(
    private readonly backend: GraphicsBackend<T>,
    private readonly resources: ResourceManager<T['resource'], ResourceDesc>
  ) {}

  /**
   * Compile a graph. On success the graph is frozen. Cycles and missing
   * external resources are returned as errors before anything is
   * materialized, so the caller can fix the bindings and compile again.
   * A backend or capacity failure during materialization is rethrown after
   * the references taken so far are released; the graph stays unfrozen.
   */
  compile(graph: FrameGraph, options: CompileOptions<T> = {}): CompileResult<T> {
    let order: VertexId[];
    try {
      // Consumers-first order of the reversed graph, read back to front
      order = graph.dependencyGraph.reversed().topologicalSort().reverse();
    } catch (error) {
      if (error instanceof GraphCycleError) {
        logger.warn(error.message);
        return { ok: false, error };
      }
      throw error;
    }

    const bindings = new Map<ResourceHandle, Memo<T['resource']>>();
    for (const [resource, object] of options.bindings ?? []) {
      bindings.set(resource, { value: object });
    }

    const unsatisfied = this.findUnsatisfied(graph, order, bindings);
    if (unsatisfied) {
      logger.warn(unsatisfied.message);
      return { ok: false, error: unsatisfied };
    }

    const frame = this.materialize(graph, order, bindings, options.defaultDesc ?? DEFAULT_RESOURCE_DESC);
    graph.freeze();
    logger.debug(`Compiled ${frame.order.length} pass(es), allocated ${frame.allocated.length} resource(s)`);
    return { ok: true, frame };
  }

  /** Number of memoized shader modules, pipeline layouts and pipelines */
  get cachedObjectCount(): number {
    return this.shaderModules.size + this.pipelineLayouts.size + this.pipelines.size;
  }

  clearCache(): void {
    this.shaderModules.clear();
    this.pipelineLayouts.clear();
    this.pipelines.clear();
  }

  // === Planning ===

  private findUnsatisfied(
    graph: FrameGraph,
    order: VertexId[],
    bindings: ReadonlyMap<ResourceHandle, Memo<T['resource']>>
  ): UnsatisfiedDependencyError | undefined {
    const check = (resource: ResourceHandle): UnsatisfiedDependencyError | undefined =>
      this.isAvailable(graph, resource, bindings)
        ? undefined
        : new UnsatisfiedDependencyError(resource, graph.resourceLabel(resource));

    const scheduled = new Set<PassHandle>();
    for (const id of order) {
      const vertex = graph.vertex(id);
      if (!vertex) continue;

      if (vertex.kind === 'resource') {
        const isSource = graph.producers(vertex.resource).length === 0;
        if (isSource && graph.consumers(vertex.resource).length > 0) {
          const error = check(vertex.resource);
          if (error) return error;
        }
        continue;
      }

      // A read-write attachment needs earlier contents from a writer
      // scheduled before it or from outside the graph
      for (const attachment of graph.getPass(vertex.pass)?.attachments ?? []) {
        if (attachment.type !== 'input-output') continue;
        const earlierWriters = graph.producers(attachment.resource).filter((p) => scheduled.has(p));
        if (earlierWriters.length === 0) {
          const error = check(attachment.resource);
          if (error) return error;
        }
      }
      scheduled.add(vertex.pass);
    }

    return undefined;
  }

  private isAvailable(
    graph: FrameGraph,
    resource: ResourceHandle,
    bindings: ReadonlyMap<ResourceHandle, Memo<T['resource']>>
  ): boolean {
    if (bindings.has(resource)) return true;
    const declaration = graph.getResource(resource);
    return declaration?.type === 'persistent' && declaration.name !== undefined
      ? this.resources.hasName(declaration.name)
      : false;
  }

  // === Materialization ===

  private materialize(
    graph: FrameGraph,
    order: VertexId[],
    bindings: ReadonlyMap<ResourceHandle, Memo<T['resource']>>,
    defaultDesc: ResourceDesc
  ): CompiledFrame<T> {
    const operations: FrameOperation<T>[] = [];
    const passOrder: PassHandle[] = [];
    const allocated: ResourceHandle[] = [];
    const refs: ResourceRef[] = [];
    const resolved = new Map<ResourceHandle, Memo<T['resource']>>();

    const resolveResource = (resource: ResourceHandle): T['resource'] =>
      memoize(resolved, resource, () => {
        const label = graph.resourceLabel(resource);

        const bound = bindings.get(resource);
        if (bound) {
          operations.push({ type: 'bind-external', resource, label, object: bound.value });
          return bound.value;
        }

        const declaration = graph.getResource(resource);
        const name = declaration?.type === 'persistent' ? declaration.name : undefined;

        const retained = name !== undefined ? this.resources.getFromName(name) : undefined;
        if (retained) {
          const object = this.resources.resource(retained);
          refs.push(retained);
          operations.push({ type: 'reuse-resource', resource, label, object, ref: retained });
          return object;
        }

        const metadata = createResourceMetadata(declaration?.lifetime ?? 'none', { name });
        const ref = this.resources.create(metadata, declaration?.desc ?? defaultDesc);
        const object = this.resources.resource(ref);
        refs.push(ref);
        allocated.push(resource);
        operations.push({ type: 'create-resource', resource, label, object, ref });
        return object;
      });

    try {
      for (const id of order) {
        const vertex = graph.vertex(id);
        if (!vertex) continue;

        if (vertex.kind === 'resource') {
          const isSource = graph.producers(vertex.resource).length === 0;
          if (isSource && graph.consumers(vertex.resource).length > 0) {
            resolveResource(vertex.resource);
          }
          continue;
        }

        const declaration = graph.getPass(vertex.pass);
        if (!declaration) continue;

        const pipeline = this.resolvePipeline(graph, declaration.pipeline);
        const inputs: T['resource'][] = [];
        const outputs: T['resource'][] = [];
        for (const attachment of declaration.attachments) {
          const object = resolveResource(attachment.resource);
          if (attachment.type !== 'output') inputs.push(object);
          if (attachment.type !== 'input') outputs.push(object);
        }

        passOrder.push(vertex.pass);
        operations.push({
          type: 'execute-pass',
          pass: vertex.pass,
          label: graph.passLabel(vertex.pass),
          pipeline,
          inputs,
          outputs,
        });
      }
    } catch (error) {
      for (const ref of refs) ref.release();
      throw error;
    }

    let released = false;
    return {
      order: passOrder,
      operations,
      allocated,
      release: () => {
        if (released) return;
        released = true;
        for (const ref of refs) ref.release();
      },
    };
  }

  private resolvePipeline(graph: FrameGraph, handle: PipelineHandle): T['pipeline'] {
    return memoize(this.pipelines, handle, () => {
      const descriptor = graph.library.pipelines.get(handle);
      if (!descriptor) throw new PipelineNotFoundError(handle);

      const vertexModule = this.resolveShader(graph, descriptor.vertex.shader);
      const fragmentModule = descriptor.fragment
        ? this.resolveShader(graph, descriptor.fragment.shader)
        : undefined;
      const layout = memoize(this.pipelineLayouts, handle, () =>
        this.backend.createPipelineLayout(descriptor)
      );

      return this.backend.createRenderPipeline({ descriptor, layout, vertexModule, fragmentModule });
    });
  }

  private resolveShader(graph: FrameGraph, handle: ShaderHandle): T['shaderModule'] {
    return memoize(this.shaderModules, handle, () => {
      const descriptor = graph.library.shaders.get(handle);
      if (!descriptor) throw new ShaderNotFoundError(handle);
      return this.backend.createShaderModule(descriptor);
    });
  }
}
