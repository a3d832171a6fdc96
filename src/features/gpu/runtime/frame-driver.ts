/**
 * Frame Driver
 *
 * Runs one frame at a time: acquires the surface image, lets the caller
 * build a fresh graph around it, compiles and executes the graph, presents
 * and then runs resource upkeep.
 */

import { createLogger } from '@/lib/logger';
import {
  backendResourceHandler,
  type BackendObjects,
  type GraphicsBackend,
  type PresentationSurface,
  type SurfaceSize,
} from '../backend/types';
import { FrameGraphCompiler, type CompileError, type CompiledFrame } from '../graph/compiler';
import { SurfaceOutOfMemoryError } from '../graph/errors';
import { createPipelineLibrary, FrameGraph, type PipelineLibrary } from '../graph/frame-graph';
import type { ResourceDesc, ResourceHandle } from '../graph/types';
import { ResourceManager } from '../resources/resource-manager';
import { createFrameStatsStore, type FrameStats, type FrameStatsStore } from '../stores/frame-stats-store';

const logger = createLogger('FrameDriver');

export const DEFAULT_SURFACE_NAME = 'surface';

export type BuildFrame = (graph: FrameGraph, surface: ResourceHandle) => void;

export type FrameOutcome =
  | { status: 'rendered'; stats: FrameStats }
  | { status: 'skipped'; reason: 'lost' | 'outdated' | 'timeout' }
  | { status: 'failed'; error: CompileError };

export interface FrameDriverOptions<T extends BackendObjects> {
  backend: GraphicsBackend<T>;
  surface: PresentationSurface<T['resource']>;
  resources?: ResourceManager<T['resource'], ResourceDesc>;
  library?: PipelineLibrary;
  stats?: FrameStatsStore;
  /** Name of the persistent resource the surface image is bound to */
  surfaceName?: string;
}

export class FrameDriver<T extends BackendObjects> {
  readonly backend: GraphicsBackend<T>;
  readonly surface: PresentationSurface<T['resource']>;
  readonly resources: ResourceManager<T['resource'], ResourceDesc>;
  readonly library: PipelineLibrary;
  readonly stats: FrameStatsStore;
  readonly compiler: FrameGraphCompiler<T>;

  private readonly surfaceName: string;
  private pendingSize: SurfaceSize | null = null;
  private frameIndex = 0;

  constructor(options: FrameDriverOptions<T>) {
    this.backend = options.backend;
    this.surface = options.surface;
    this.resources = options.resources ?? new ResourceManager(backendResourceHandler(options.backend));
    this.library = options.library ?? createPipelineLibrary();
    this.stats = options.stats ?? createFrameStatsStore();
    this.surfaceName = options.surfaceName ?? DEFAULT_SURFACE_NAME;
    this.compiler = new FrameGraphCompiler<T>(this.backend, this.resources);
  }

  /** Frames rendered so far */
  get frameCount(): number {
    return this.frameIndex;
  }

  /**
   * Reconfigure the surface before the next frame.
   */
  resize(width: number, height: number): void {
    this.pendingSize = { width, height };
  }

  renderFrame(build: BuildFrame): FrameOutcome {
    if (this.pendingSize) {
      this.surface.configure(this.pendingSize);
      this.pendingSize = null;
    }

    const acquired = this.surface.acquire();
    switch (acquired.status) {
      case 'lost':
      case 'outdated':
        logger.warn(`Surface ${acquired.status}, reconfiguring`);
        this.surface.configure(this.surface.size);
        this.stats.getState().recordSkip();
        return { status: 'skipped', reason: acquired.status };
      case 'timeout':
        logger.debug('Surface acquisition timed out');
        this.stats.getState().recordSkip();
        return { status: 'skipped', reason: 'timeout' };
      case 'out-of-memory': {
        const error = new SurfaceOutOfMemoryError();
        logger.error(error.message);
        this.stats.getState().recordError(error.code);
        throw error;
      }
      case 'ok':
        break;
    }

    const graph = new FrameGraph({ library: this.library });
    const surface = graph.addResource({ type: 'persistent', name: this.surfaceName, lifetime: 'none' });
    build(graph, surface.handle);

    const result = this.compiler.compile(graph, {
      bindings: new Map([[surface.handle, acquired.image]]),
      defaultDesc: { ...this.surface.size, format: this.surface.format },
    });
    if (!result.ok) {
      this.stats.getState().recordError(result.error.code);
      return { status: 'failed', error: result.error };
    }

    const { frame } = result;
    try {
      this.backend.execute(frame);
      this.surface.present(acquired.image);
    } finally {
      frame.release();
    }

    const stats = this.summarize(frame, this.resources.upkeep());
    this.frameIndex++;
    this.stats.getState().recordFrame(stats);
    return { status: 'rendered', stats };
  }

  /**
   * Destroy every resource and drop memoized pipelines.
   */
  dispose(): void {
    this.resources.dispose();
    this.compiler.clearCache();
  }

  private summarize(frame: CompiledFrame<T>, destroyed: number): FrameStats {
    const count = (type: CompiledFrame<T>['operations'][number]['type']) =>
      frame.operations.filter((operation) => operation.type === type).length;

    return {
      frame: this.frameIndex,
      passes: frame.order.length,
      allocated: count('create-resource'),
      reused: count('reuse-resource'),
      bound: count('bind-external'),
      destroyed,
    };
  }
}
