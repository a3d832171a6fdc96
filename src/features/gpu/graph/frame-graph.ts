/**
 * Frame Graph Builder
 *
 * Append-only authoring surface for one frame: resources, passes and the
 * edges between them. Shaders and pipelines live in a `PipelineLibrary`
 * that can be shared by the graphs of successive frames.
 */

import { DependencyGraph } from './dependency-graph';
import { HandleRegistry } from './handle-registry';
import {
  GraphFrozenError,
  PassNotFoundError,
  PipelineNotFoundError,
  ResourceNotFoundError,
  ShaderNotFoundError,
} from './errors';
import type {
  AddedPass,
  AddedResource,
  GraphVertex,
  PassDeclaration,
  PassDescriptor,
  PassHandle,
  PipelineDescriptor,
  PipelineHandle,
  ResolvedAttachment,
  ResourceDeclaration,
  ResourceDescriptor,
  ResourceHandle,
  ShaderDescriptor,
  ShaderHandle,
  StringGraph,
  VertexId,
} from './types';
import type { ResourceLifetime } from '../resources/lifetime';

export interface PipelineLibrary {
  shaders: HandleRegistry<'shader', ShaderDescriptor>;
  pipelines: HandleRegistry<'pipeline', PipelineDescriptor>;
}

export function createPipelineLibrary(): PipelineLibrary {
  return {
    shaders: new HandleRegistry('shader'),
    pipelines: new HandleRegistry('pipeline'),
  };
}

const DEFAULT_LIFETIMES: Record<ResourceDescriptor['type'], ResourceLifetime> = {
  persistent: 'long',
  dynamic: 'none',
};

export interface FrameGraphOptions {
  library?: PipelineLibrary;
}

export class FrameGraph {
  readonly library: PipelineLibrary;

  private graph = new DependencyGraph<GraphVertex>();
  private resources = new HandleRegistry<'resource', ResourceDeclaration>('resource');
  private passes = new HandleRegistry<'pass', PassDeclaration>('pass');
  private resourceVertices = new Map<ResourceHandle, VertexId>();
  private passVertices = new Map<PassHandle, VertexId>();
  private passAttachments = new Map<PassHandle, ResolvedAttachment[]>();
  private passOrder: PassHandle[] = [];
  private frozen = false;

  constructor(options: FrameGraphOptions = {}) {
    this.library = options.library ?? createPipelineLibrary();
  }

  // === Shaders and Pipelines ===

  addShader(descriptor: ShaderDescriptor, name?: string): ShaderHandle {
    this.assertMutable();
    return this.library.shaders.add({ ...descriptor }, { name, path: descriptor.path });
  }

  addPipeline(descriptor: PipelineDescriptor, name?: string): PipelineHandle {
    this.assertMutable();
    const stages = descriptor.fragment ? [descriptor.vertex, descriptor.fragment] : [descriptor.vertex];
    for (const stage of stages) {
      if (!this.library.shaders.has(stage.shader)) {
        throw new ShaderNotFoundError(stage.shader);
      }
    }
    return this.library.pipelines.add({ ...descriptor }, { name });
  }

  // === Resources ===

  addResource(descriptor: ResourceDescriptor): AddedResource {
    this.assertMutable();
    return this.createResource(descriptor);
  }

  getResource(handle: ResourceHandle): ResourceDeclaration | undefined {
    return this.resources.get(handle);
  }

  /**
   * Find a persistent resource, or a promoted pass output, by name.
   */
  findResource(name: string): ResourceHandle | undefined {
    return this.resources.handleByName(name);
  }

  getResources(): ResourceDeclaration[] {
    return Array.from(this.resources.values(), ([, declaration]) => declaration);
  }

  resourceVertex(handle: ResourceHandle): VertexId | undefined {
    return this.resourceVertices.get(handle);
  }

  resourceLabel(handle: ResourceHandle): string {
    const declaration = this.resources.get(handle);
    return declaration?.name ?? declaration?.promotedName ?? handle.id;
  }

  // === Passes ===

  /**
   * Register a pass. Attachments are processed in declaration order: outputs
   * without a resource get a new dynamic resource, every other attachment
   * reuses the vertex of the resource it names. Inputs gain a
   * `resource -> pass` edge and outputs a `pass -> resource` edge.
   *
   * New outputs are also registered under `<label or pass id>/output-<n>`,
   * where `n` counts the pass's outputs, so later passes can find them by
   * name.
   */
  addPass(descriptor: PassDescriptor): AddedPass {
    this.assertMutable();
    if (!this.library.pipelines.has(descriptor.pipeline)) {
      throw new PipelineNotFoundError(descriptor.pipeline);
    }
    for (const attachment of descriptor.attachments) {
      if (attachment.resource && !this.resourceVertices.has(attachment.resource)) {
        throw new ResourceNotFoundError(attachment.resource);
      }
    }

    const attachments: ResolvedAttachment[] = [];
    const handle = this.passes.register((h) => ({
      handle: h,
      pipeline: descriptor.pipeline,
      label: descriptor.label,
      attachments,
    }));
    const vertex = this.graph.addVertex({ kind: 'pass', pass: handle });
    this.passVertices.set(handle, vertex);
    this.passAttachments.set(handle, attachments);
    this.passOrder.push(handle);

    const outputs: ResourceHandle[] = [];
    const promotions: { resource: ResourceHandle; name: string }[] = [];

    for (const attachment of descriptor.attachments) {
      let resource = attachment.resource;
      let allocated = false;

      if (!resource) {
        const added = this.createResource({ type: 'dynamic' }, `${descriptor.label ?? handle.id}/output-${outputs.length}`);
        resource = added.handle;
        allocated = true;
        const promotedName = this.resources.get(resource)?.promotedName;
        if (promotedName !== undefined) promotions.push({ resource, name: promotedName });
      }

      const resourceVertex = this.requireResourceVertex(resource);
      switch (attachment.type) {
        case 'input':
          this.graph.addEdge(resourceVertex, vertex);
          break;
        case 'output':
          this.graph.addEdge(vertex, resourceVertex);
          outputs.push(resource);
          break;
        case 'input-output':
          this.graph.addEdge(resourceVertex, vertex, { readWrite: true });
          this.graph.addEdge(vertex, resourceVertex);
          outputs.push(resource);
          break;
      }

      attachments.push({ type: attachment.type, resource, allocated });
    }

    for (const { resource, name } of promotions) {
      this.resources.setName(resource, name);
    }

    return { handle, vertex, outputs };
  }

  getPass(handle: PassHandle): PassDeclaration | undefined {
    return this.passes.get(handle);
  }

  /** Passes in registration order */
  getPasses(): PassDeclaration[] {
    const declarations: PassDeclaration[] = [];
    for (const handle of this.passOrder) {
      const declaration = this.passes.get(handle);
      if (declaration) declarations.push(declaration);
    }
    return declarations;
  }

  passVertex(handle: PassHandle): VertexId | undefined {
    return this.passVertices.get(handle);
  }

  passLabel(handle: PassHandle): string {
    return this.passes.get(handle)?.label ?? handle.id;
  }

  // === Edges ===

  /**
   * Add `resource -> pass` edges: the pass consumes each resource.
   */
  linkResourceToPass(pass: PassHandle, resources: ResourceHandle[]): void {
    this.assertMutable();
    const passVertex = this.requirePassVertex(pass);
    const vertices = resources.map((resource) => this.requireResourceVertex(resource));
    const attachments = this.requireAttachments(pass);

    vertices.forEach((resourceVertex, i) => {
      this.graph.addEdge(resourceVertex, passVertex);
      attachments.push({ type: 'input', resource: resources[i], allocated: false });
    });
  }

  /**
   * Add `pass -> resource` edges: each pass produces the resource.
   */
  linkPassToResource(resource: ResourceHandle, passes: PassHandle[]): void {
    this.assertMutable();
    const resourceVertex = this.requireResourceVertex(resource);
    const vertices = passes.map((pass) => this.requirePassVertex(pass));

    vertices.forEach((passVertex, i) => {
      this.graph.addEdge(passVertex, resourceVertex);
      this.requireAttachments(passes[i]).push({ type: 'output', resource, allocated: false });
    });
  }

  /** Passes with an edge into the resource */
  producers(resource: ResourceHandle): PassHandle[] {
    return this.neighbourPasses(resource, 'predecessors');
  }

  /** Passes with an edge out of the resource */
  consumers(resource: ResourceHandle): PassHandle[] {
    return this.neighbourPasses(resource, 'successors');
  }

  // === Graph ===

  get dependencyGraph(): DependencyGraph<GraphVertex> {
    return this.graph;
  }

  vertex(id: VertexId): GraphVertex | undefined {
    return this.graph.vertex(id);
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Stop accepting changes. Called by the compiler; there is no way back.
   */
  freeze(): void {
    this.frozen = true;
  }

  toStringGraph(): StringGraph {
    return {
      vertices: this.graph.vertices().map((vertex, id) => ({
        id,
        kind: vertex.kind,
        label: vertex.kind === 'resource' ? this.resourceLabel(vertex.resource) : this.passLabel(vertex.pass),
      })),
      edges: this.graph.edges().map((edge): [VertexId, VertexId] => [edge.from, edge.to]),
    };
  }

  // === Internals ===

  private createResource(descriptor: ResourceDescriptor, promotedName?: string): AddedResource {
    const name = descriptor.type === 'persistent' ? descriptor.name : undefined;
    const handle = this.resources.register(
      (h) => ({
        handle: h,
        type: descriptor.type,
        name,
        promotedName,
        lifetime: descriptor.lifetime ?? DEFAULT_LIFETIMES[descriptor.type],
        desc: descriptor.desc,
      }),
      { name }
    );
    const vertex = this.graph.addVertex({ kind: 'resource', resource: handle });
    this.resourceVertices.set(handle, vertex);
    return { handle, vertex };
  }

  private neighbourPasses(resource: ResourceHandle, direction: 'predecessors' | 'successors'): PassHandle[] {
    const vertex = this.requireResourceVertex(resource);
    const passes: PassHandle[] = [];
    for (const id of this.graph[direction](vertex)) {
      const neighbour = this.graph.vertex(id);
      if (neighbour?.kind === 'pass' && !passes.includes(neighbour.pass)) passes.push(neighbour.pass);
    }
    return passes;
  }

  private requireResourceVertex(resource: ResourceHandle): VertexId {
    const vertex = this.resourceVertices.get(resource);
    if (vertex === undefined) throw new ResourceNotFoundError(resource);
    return vertex;
  }

  private requirePassVertex(pass: PassHandle): VertexId {
    const vertex = this.passVertices.get(pass);
    if (vertex === undefined) throw new PassNotFoundError(pass);
    return vertex;
  }

  private requireAttachments(pass: PassHandle): ResolvedAttachment[] {
    const attachments = this.passAttachments.get(pass);
    if (!attachments) throw new PassNotFoundError(pass);
    return attachments;
  }

  private assertMutable(): void {
    if (this.frozen) throw new GraphFrozenError();
  }
}
