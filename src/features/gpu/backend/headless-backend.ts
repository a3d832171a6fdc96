/**
 * Headless Graphics Backend
 *
 * Records what a frame would do instead of talking to a GPU. Used where no
 * device is available and to observe compiled frames in tests.
 */

import type { CompiledFrame } from '../graph/compiler';
import type { BindGroupLayoutDesc, PipelineDescriptor, ResourceDesc, ShaderDescriptor, TextureFormat } from '../graph/types';
import type { ResourceMetadata } from '../resources/resource-manager';
import type {
  BackendObjects,
  GraphicsBackend,
  PresentationSurface,
  RenderPipelineInput,
  SurfaceAcquireResult,
  SurfaceFailure,
  SurfaceSize,
} from './types';

export interface HeadlessShaderModule {
  id: number;
  label?: string;
  code: string;
}

export interface HeadlessPipelineLayout {
  id: number;
  bindGroups: BindGroupLayoutDesc[];
}

export interface HeadlessPipeline {
  id: number;
  label?: string;
  layout: HeadlessPipelineLayout;
  vertex: HeadlessShaderModule;
  fragment?: HeadlessShaderModule;
}

export interface HeadlessResource {
  id: number;
  label: string;
  desc: ResourceDesc;
  destroyed: boolean;
}

export interface HeadlessObjects extends BackendObjects {
  shaderModule: HeadlessShaderModule;
  pipelineLayout: HeadlessPipelineLayout;
  pipeline: HeadlessPipeline;
  resource: HeadlessResource;
}

export interface RecordedPass {
  label: string;
  pipeline: string;
  inputs: string[];
  outputs: string[];
}

export class HeadlessBackend implements GraphicsBackend<HeadlessObjects> {
  readonly name = 'headless' as const;

  /** Passes of every executed frame, in submission order */
  readonly submissions: RecordedPass[][] = [];
  readonly counts = { shaderModules: 0, pipelineLayouts: 0, pipelines: 0, resources: 0, destroyed: 0 };

  private nextId = 0;

  createShaderModule(descriptor: ShaderDescriptor): HeadlessShaderModule {
    this.counts.shaderModules++;
    return { id: this.nextId++, label: descriptor.label, code: descriptor.code };
  }

  createPipelineLayout(descriptor: PipelineDescriptor): HeadlessPipelineLayout {
    this.counts.pipelineLayouts++;
    return { id: this.nextId++, bindGroups: descriptor.bindGroups ?? [] };
  }

  createRenderPipeline(input: RenderPipelineInput<HeadlessObjects>): HeadlessPipeline {
    this.counts.pipelines++;
    return {
      id: this.nextId++,
      label: input.descriptor.label,
      layout: input.layout,
      vertex: input.vertexModule,
      fragment: input.fragmentModule,
    };
  }

  createResource(metadata: ResourceMetadata, desc: ResourceDesc): HeadlessResource {
    this.counts.resources++;
    return { id: this.nextId++, label: metadata.name ?? metadata.uuid, desc, destroyed: false };
  }

  destroyResource(resource: HeadlessResource): void {
    if (resource.destroyed) {
      throw new Error(`Resource ${resource.label} was destroyed twice`);
    }
    resource.destroyed = true;
    this.counts.destroyed++;
  }

  execute(frame: CompiledFrame<HeadlessObjects>): void {
    const passes: RecordedPass[] = [];

    for (const operation of frame.operations) {
      if (operation.type !== 'execute-pass') continue;

      for (const resource of [...operation.inputs, ...operation.outputs]) {
        if (resource.destroyed) {
          throw new Error(`Pass ${operation.label} uses destroyed resource ${resource.label}`);
        }
      }

      passes.push({
        label: operation.label,
        pipeline: operation.pipeline.label ?? String(operation.pipeline.id),
        inputs: operation.inputs.map((resource) => resource.label),
        outputs: operation.outputs.map((resource) => resource.label),
      });
    }

    this.submissions.push(passes);
  }
}

/**
 * Surface whose acquisitions can be scripted to fail.
 */
export class HeadlessSurface implements PresentationSurface<HeadlessResource> {
  readonly presented: HeadlessResource[] = [];
  private currentSize: SurfaceSize;
  private failures: SurfaceFailure[] = [];
  private nextImage = 0;
  configureCount = 0;

  constructor(
    size: SurfaceSize,
    readonly format: TextureFormat = 'bgra8unorm'
  ) {
    this.currentSize = { ...size };
  }

  get size(): SurfaceSize {
    return { ...this.currentSize };
  }

  /** Make the next acquisitions fail, in order */
  failNext(...failures: SurfaceFailure[]): void {
    this.failures.push(...failures);
  }

  configure(size: SurfaceSize): void {
    this.currentSize = { ...size };
    this.configureCount++;
  }

  acquire(): SurfaceAcquireResult<HeadlessResource> {
    const failure = this.failures.shift();
    if (failure) return { status: failure };

    return {
      status: 'ok',
      image: {
        id: this.nextImage++,
        label: 'surface',
        desc: { ...this.currentSize, format: this.format },
        destroyed: false,
      },
    };
  }

  present(image: HeadlessResource): void {
    this.presented.push(image);
  }
}
