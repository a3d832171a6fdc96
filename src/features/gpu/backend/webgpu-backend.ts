/**
 * WebGPU Graphics Backend
 *
 * Materializes frame graph objects on a GPUDevice and encodes compiled
 * frames: one command encoder per frame, one render pass per executed
 * pass drawing a fullscreen triangle.
 */

import { createLogger } from '@/lib/logger';
import type { CompiledFrame } from '../graph/compiler';
import type {
  BindingLayoutEntry,
  PipelineDescriptor,
  ResourceDesc,
  ShaderDescriptor,
  ShaderVisibility,
  TextureFormat,
} from '../graph/types';
import type { ResourceMetadata } from '../resources/resource-manager';
import type { BackendObjects, GraphicsBackend, RenderPipelineInput } from './types';

const logger = createLogger('WebGPUBackend');

export const DEFAULT_VERTEX_ENTRY_POINT = 'vs_main';
export const DEFAULT_FRAGMENT_ENTRY_POINT = 'fs_main';

/** Cleared into outputs that the pass does not also read */
export const CLEAR_COLOR: GPUColorDict = { r: 1, g: 0, b: 1, a: 1 };

export interface WebGPUResource {
  texture: GPUTexture;
  view: GPUTextureView;
  desc: ResourceDesc;
  label: string;
}

export interface WebGPUObjects extends BackendObjects {
  shaderModule: GPUShaderModule;
  pipelineLayout: GPUPipelineLayout;
  pipeline: GPURenderPipeline;
  resource: WebGPUResource;
}

function toGPUFormat(format: TextureFormat): GPUTextureFormat {
  switch (format) {
    case 'rgba8unorm':
      return 'rgba8unorm';
    case 'rgba16float':
      return 'rgba16float';
    case 'rgba32float':
      return 'rgba32float';
    case 'bgra8unorm':
      return 'bgra8unorm';
  }
}

function toShaderStages(visibility: ShaderVisibility[]): GPUShaderStageFlags {
  let flags = 0;
  for (const stage of visibility) {
    switch (stage) {
      case 'vertex':
        flags |= GPUShaderStage.VERTEX;
        break;
      case 'fragment':
        flags |= GPUShaderStage.FRAGMENT;
        break;
      case 'compute':
        flags |= GPUShaderStage.COMPUTE;
        break;
    }
  }
  return flags;
}

function toLayoutEntry(entry: BindingLayoutEntry, binding: number): GPUBindGroupLayoutEntry {
  const visibility = toShaderStages(entry.visibility);
  switch (entry.type) {
    case 'texture':
      return { binding, visibility, texture: { sampleType: 'float' } };
    case 'sampler':
      return { binding, visibility, sampler: { type: 'filtering' } };
    case 'uniform-buffer':
      return { binding, visibility, buffer: { type: 'uniform' } };
    case 'storage-buffer':
      return { binding, visibility, buffer: { type: 'read-only-storage' } };
  }
}

export interface WebGPUBackendOptions {
  powerPreference?: GPUPowerPreference;
}

export class WebGPUBackend implements GraphicsBackend<WebGPUObjects> {
  readonly name = 'webgpu' as const;

  private sampler: GPUSampler | null = null;
  private pipelineDescriptors = new WeakMap<GPURenderPipeline, PipelineDescriptor>();

  constructor(readonly device: GPUDevice) {}

  /**
   * Request an adapter and device from `navigator.gpu`.
   */
  static async create(options: WebGPUBackendOptions = {}): Promise<WebGPUBackend> {
    if (typeof navigator === 'undefined' || !navigator.gpu) {
      throw new Error('WebGPU not supported');
    }

    const adapter = await navigator.gpu.requestAdapter({
      powerPreference: options.powerPreference ?? 'high-performance',
    });

    if (!adapter) {
      throw new Error('No WebGPU adapter found');
    }

    const device = await adapter.requestDevice();
    logger.info(`Device acquired (max texture size ${device.limits.maxTextureDimension2D})`);
    return new WebGPUBackend(device);
  }

  // === Pipelines ===

  createShaderModule(descriptor: ShaderDescriptor): GPUShaderModule {
    return this.device.createShaderModule({ label: descriptor.label, code: descriptor.code });
  }

  createPipelineLayout(descriptor: PipelineDescriptor): GPUPipelineLayout {
    const bindGroupLayouts = (descriptor.bindGroups ?? []).map((group) =>
      this.device.createBindGroupLayout({
        label: group.label,
        entries: group.entries.map(toLayoutEntry),
      })
    );
    return this.device.createPipelineLayout({ label: descriptor.label, bindGroupLayouts });
  }

  createRenderPipeline(input: RenderPipelineInput<WebGPUObjects>): GPURenderPipeline {
    const { descriptor, layout, vertexModule, fragmentModule } = input;

    const fragment: GPUFragmentState | undefined =
      descriptor.fragment && fragmentModule
        ? {
            module: fragmentModule,
            entryPoint: descriptor.fragment.entryPoint ?? DEFAULT_FRAGMENT_ENTRY_POINT,
            targets: descriptor.fragment.targets.map((format) => ({ format: toGPUFormat(format) })),
          }
        : undefined;

    const pipeline = this.device.createRenderPipeline({
      label: descriptor.label,
      layout,
      vertex: {
        module: vertexModule,
        entryPoint: descriptor.vertex.entryPoint ?? DEFAULT_VERTEX_ENTRY_POINT,
      },
      fragment,
      primitive: {
        topology: 'triangle-list',
        frontFace: 'ccw',
        cullMode: 'back',
      },
    });

    this.pipelineDescriptors.set(pipeline, descriptor);
    return pipeline;
  }

  // === Resources ===

  createResource(metadata: ResourceMetadata, desc: ResourceDesc): WebGPUResource {
    const label = metadata.name ?? metadata.uuid;
    const texture = this.device.createTexture({
      label,
      size: { width: desc.width, height: desc.height },
      format: toGPUFormat(desc.format),
      usage:
        GPUTextureUsage.TEXTURE_BINDING |
        GPUTextureUsage.COPY_DST |
        GPUTextureUsage.COPY_SRC |
        GPUTextureUsage.RENDER_ATTACHMENT,
    });

    return { texture, view: texture.createView(), desc, label };
  }

  destroyResource(resource: WebGPUResource): void {
    resource.texture.destroy();
  }

  // === Execution ===

  execute(frame: CompiledFrame<WebGPUObjects>): void {
    const commandEncoder = this.device.createCommandEncoder();

    for (const operation of frame.operations) {
      if (operation.type !== 'execute-pass') continue;

      const { pipeline, inputs, outputs } = operation;
      const renderPass = commandEncoder.beginRenderPass({
        label: operation.label,
        colorAttachments: outputs.map((output): GPURenderPassColorAttachment => {
          const preserve = inputs.includes(output);
          return {
            view: output.view,
            loadOp: preserve ? 'load' : 'clear',
            storeOp: 'store',
            clearValue: preserve ? undefined : CLEAR_COLOR,
          };
        }),
      });

      renderPass.setPipeline(pipeline);
      // Read-write targets are attachments, not bindings
      const sampled = inputs.filter((input) => !outputs.includes(input));
      this.createBindGroups(pipeline, sampled).forEach((bindGroup, index) => {
        renderPass.setBindGroup(index, bindGroup);
      });
      renderPass.draw(3);
      renderPass.end();
    }

    this.device.queue.submit([commandEncoder.finish()]);
  }

  destroy(): void {
    this.device.destroy();
    this.sampler = null;
  }

  private createBindGroups(pipeline: GPURenderPipeline, inputs: WebGPUResource[]): GPUBindGroup[] {
    const descriptor = this.pipelineDescriptors.get(pipeline);
    if (!descriptor?.bindGroups) return [];

    let next = 0;
    return descriptor.bindGroups.map((group, index) =>
      this.device.createBindGroup({
        layout: pipeline.getBindGroupLayout(index),
        entries: group.entries.map((entry, binding): GPUBindGroupEntry => {
          switch (entry.type) {
            case 'sampler':
              return { binding, resource: this.getSampler() };
            case 'texture': {
              const input = inputs[next++];
              if (!input) {
                throw new Error(`Pipeline ${descriptor.label ?? 'unnamed'} expects more texture inputs`);
              }
              return { binding, resource: input.view };
            }
            default:
              throw new Error(`Binding type ${entry.type} is not supplied by the frame graph`);
          }
        }),
      })
    );
  }

  private getSampler(): GPUSampler {
    if (!this.sampler) {
      this.sampler = this.device.createSampler({
        magFilter: 'linear',
        minFilter: 'linear',
        addressModeU: 'clamp-to-edge',
        addressModeV: 'clamp-to-edge',
      });
    }
    return this.sampler;
  }
}
