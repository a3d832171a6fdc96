import { describe, it, expect, beforeEach } from 'vitest';
import { HeadlessBackend, HeadlessSurface } from './headless-backend';
import { createHandle } from '../graph/handle-registry';
import { createResourceMetadata } from '../resources/resource-manager';

describe('HeadlessBackend', () => {
  let backend: HeadlessBackend;

  beforeEach(() => {
    backend = new HeadlessBackend();
  });

  it('should count created objects', () => {
    const shader = createHandle('shader');
    const module = backend.createShaderModule({ code: 'fn vs_main() {}' });
    const layout = backend.createPipelineLayout({ vertex: { shader } });
    backend.createRenderPipeline({ descriptor: { vertex: { shader } }, layout, vertexModule: module });

    expect(backend.counts).toEqual({ shaderModules: 1, pipelineLayouts: 1, pipelines: 1, resources: 0, destroyed: 0 });
  });

  it('should reject destroying a resource twice', () => {
    const resource = backend.createResource(createResourceMetadata('none', { uuid: 'uuid-1' }), {
      width: 2,
      height: 2,
      format: 'rgba8unorm',
    });

    backend.destroyResource(resource);

    expect(resource.destroyed).toBe(true);
    expect(() => backend.destroyResource(resource)).toThrow('Resource uuid-1 was destroyed twice');
  });

  it('should reject passes that use destroyed resources', () => {
    const shader = createHandle('shader');
    const module = backend.createShaderModule({ code: '' });
    const pipeline = backend.createRenderPipeline({
      descriptor: { label: 'blit', vertex: { shader } },
      layout: backend.createPipelineLayout({ vertex: { shader } }),
      vertexModule: module,
    });
    const resource = backend.createResource(createResourceMetadata('none', { name: 'scene' }), {
      width: 2,
      height: 2,
      format: 'rgba8unorm',
    });
    backend.destroyResource(resource);

    expect(() =>
      backend.execute({
        order: [],
        operations: [
          { type: 'execute-pass', pass: createHandle('pass'), label: 'draw', pipeline, inputs: [resource], outputs: [] },
        ],
        allocated: [],
        release: () => {},
      })
    ).toThrow('Pass draw uses destroyed resource scene');
  });
});

describe('HeadlessSurface', () => {
  it('should hand out fresh images until told to fail', () => {
    const surface = new HeadlessSurface({ width: 4, height: 3 });
    surface.failNext('lost', 'timeout');

    expect(surface.acquire()).toEqual({ status: 'lost' });
    expect(surface.acquire()).toEqual({ status: 'timeout' });
    expect(surface.acquire()).toEqual({
      status: 'ok',
      image: { id: 0, label: 'surface', desc: { width: 4, height: 3, format: 'bgra8unorm' }, destroyed: false },
    });
  });

  it('should record presented images and configuration', () => {
    const surface = new HeadlessSurface({ width: 4, height: 3 });
    const acquired = surface.acquire();
    if (acquired.status !== 'ok') throw new Error('expected an image');

    surface.present(acquired.image);
    surface.configure({ width: 8, height: 6 });

    expect(surface.presented).toEqual([acquired.image]);
    expect(surface.size).toEqual({ width: 8, height: 6 });
    expect(surface.configureCount).toBe(1);
  });
});
