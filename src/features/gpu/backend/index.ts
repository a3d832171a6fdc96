export { backendResourceHandler } from './types';
export type {
  BackendName,
  BackendObjects,
  GraphicsBackend,
  ResourceBackend,
  RenderPipelineInput,
  PresentationSurface,
  SurfaceAcquireResult,
  SurfaceFailure,
  SurfaceSize,
} from './types';

export { detectWebGPUSupport, detectBestBackend, getAvailableBackends } from './capabilities';

export {
  WebGPUBackend,
  CLEAR_COLOR,
  DEFAULT_VERTEX_ENTRY_POINT,
  DEFAULT_FRAGMENT_ENTRY_POINT,
} from './webgpu-backend';
export type { WebGPUObjects, WebGPUResource, WebGPUBackendOptions } from './webgpu-backend';

export { CanvasSurface } from './canvas-surface';
export type { CanvasSurfaceOptions } from './canvas-surface';

export { HeadlessBackend, HeadlessSurface } from './headless-backend';
export type {
  HeadlessObjects,
  HeadlessResource,
  HeadlessShaderModule,
  HeadlessPipeline,
  HeadlessPipelineLayout,
  RecordedPass,
} from './headless-backend';
