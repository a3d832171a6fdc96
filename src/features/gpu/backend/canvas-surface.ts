/**
 * Canvas Presentation Surface
 *
 * Presents frames through a WebGPU canvas context.
 */

import { createLogger } from '@/lib/logger';
import type { TextureFormat } from '../graph/types';
import type { PresentationSurface, SurfaceAcquireResult, SurfaceSize } from './types';
import type { WebGPUResource } from './webgpu-backend';

const logger = createLogger('CanvasSurface');

export interface CanvasSurfaceOptions {
  format?: Extract<TextureFormat, 'bgra8unorm' | 'rgba8unorm'>;
  size?: SurfaceSize;
}

export class CanvasSurface implements PresentationSurface<WebGPUResource> {
  readonly format: TextureFormat;
  private currentSize: SurfaceSize;

  constructor(
    private readonly context: GPUCanvasContext,
    private readonly device: GPUDevice,
    options: CanvasSurfaceOptions = {}
  ) {
    this.format = options.format ?? 'bgra8unorm';
    this.currentSize = options.size ?? { width: context.canvas.width, height: context.canvas.height };
    this.configure(this.currentSize);
  }

  get size(): SurfaceSize {
    return { ...this.currentSize };
  }

  configure(size: SurfaceSize): void {
    this.currentSize = { ...size };
    this.context.canvas.width = size.width;
    this.context.canvas.height = size.height;
    this.context.configure({
      device: this.device,
      format: this.format,
      alphaMode: 'premultiplied',
    });
    logger.debug(`Configured ${size.width}x${size.height} ${this.format}`);
  }

  acquire(): SurfaceAcquireResult<WebGPUResource> {
    const { canvas } = this.context;
    if (canvas.width !== this.currentSize.width || canvas.height !== this.currentSize.height) {
      return { status: 'outdated' };
    }

    let texture: GPUTexture;
    try {
      texture = this.context.getCurrentTexture();
    } catch (error) {
      logger.warn('Failed to acquire canvas texture', error);
      return { status: 'lost' };
    }

    return {
      status: 'ok',
      image: {
        texture,
        view: texture.createView(),
        desc: { ...this.currentSize, format: this.format },
        label: 'surface',
      },
    };
  }

  present(_image: WebGPUResource): void {
    // The canvas presents its current texture once the frame's commands are submitted
  }
}
