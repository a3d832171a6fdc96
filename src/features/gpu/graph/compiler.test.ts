import { describe, it, expect, beforeEach, vi } from 'vitest';
import { FrameGraphCompiler, type CompileResult, type CompiledFrame } from './compiler';
import { createPipelineLibrary, FrameGraph, type PipelineLibrary } from './frame-graph';
import { GraphCycleError, GraphFrozenError, UnsatisfiedDependencyError } from './errors';
import { inputAndOutput, onlyInput, onlyOutput, type PipelineHandle } from './types';
import { HeadlessBackend, type HeadlessObjects, type HeadlessResource } from '../backend/headless-backend';
import { backendResourceHandler } from '../backend/types';
import { ResourceManager } from '../resources/resource-manager';
import type { ResourceDesc } from './types';

function expectFrame(result: CompileResult<HeadlessObjects>): CompiledFrame<HeadlessObjects> {
  if (!result.ok) throw result.error;
  return result.frame;
}

function surfaceImage(): HeadlessResource {
  return { id: -1, label: 'surface', desc: { width: 640, height: 480, format: 'bgra8unorm' }, destroyed: false };
}

describe('FrameGraphCompiler', () => {
  let backend: HeadlessBackend;
  let resources: ResourceManager<HeadlessResource, ResourceDesc>;
  let compiler: FrameGraphCompiler<HeadlessObjects>;
  let library: PipelineLibrary;
  let graph: FrameGraph;
  let pipeline: PipelineHandle;

  beforeEach(() => {
    backend = new HeadlessBackend();
    resources = new ResourceManager(backendResourceHandler(backend), {
      maxResources: 16,
      destroyPerUpkeep: 10,
      now: () => 0,
    });
    compiler = new FrameGraphCompiler<HeadlessObjects>(backend, resources);
    library = createPipelineLibrary();
    graph = new FrameGraph({ library });
    const shader = graph.addShader({ label: 'fullscreen', code: 'fn vs_main() {} fn fs_main() {}' });
    pipeline = graph.addPipeline({
      label: 'blit',
      vertex: { shader },
      fragment: { shader, targets: ['bgra8unorm'] },
    });
  });

  describe('ordering', () => {
    it('should run a single pass drawing into a bound surface without allocating', () => {
      const surface = graph.addResource({ type: 'persistent', name: 'surface' });
      const pass = graph.addPass({ pipeline, attachments: [inputAndOutput(surface.handle)], label: 'present' });

      const frame = expectFrame(compiler.compile(graph, { bindings: new Map([[surface.handle, surfaceImage()]]) }));

      expect(frame.order).toEqual([pass.handle]);
      expect(frame.allocated).toEqual([]);
      expect(frame.operations.map((op) => op.type)).toEqual(['bind-external', 'execute-pass']);
      expect(backend.counts.resources).toBe(0);
    });

    it('should bind every source of a pass reading a texture into the surface', () => {
      const surface = graph.addResource({ type: 'persistent', name: 'surface' });
      const texture = graph.addResource({ type: 'persistent', name: 'texture' });
      const pass = graph.addPass({
        pipeline,
        attachments: [onlyInput(texture.handle), inputAndOutput(surface.handle)],
        label: 'P',
      });
      const image = surfaceImage();
      const bindings = new Map([
        [surface.handle, image],
        [texture.handle, { ...image, id: -2, label: 'texture' }],
      ]);

      const frame = expectFrame(compiler.compile(graph, { bindings }));

      expect(frame.order).toEqual([pass.handle]);
      expect(frame.allocated).toEqual([]);
      expect(frame.operations.map((op) => [op.type, op.label])).toEqual([
        ['bind-external', 'texture'],
        ['bind-external', 'surface'],
        ['execute-pass', 'P'],
      ]);
    });

    it('should order a producer before its consumer and allocate the intermediate', () => {
      const a = graph.addPass({ pipeline, attachments: [onlyOutput()], label: 'A' });
      const [x] = a.outputs;
      const b = graph.addPass({ pipeline, attachments: [onlyInput(x)], label: 'B' });

      const frame = expectFrame(compiler.compile(graph));

      expect(frame.order).toEqual([a.handle, b.handle]);
      expect(frame.allocated).toEqual([x]);
      expect(frame.operations.map((op) => op.type)).toEqual(['create-resource', 'execute-pass', 'execute-pass']);
      expect(frame.operations[0]).toMatchObject({ type: 'create-resource', resource: x, label: 'A/output-0' });
    });

    it('should follow a chain of passes', () => {
      const first = graph.addPass({ pipeline, attachments: [onlyOutput()], label: 'first' });
      const second = graph.addPass({
        pipeline,
        attachments: [onlyInput(first.outputs[0]), onlyOutput()],
        label: 'second',
      });
      const third = graph.addPass({ pipeline, attachments: [onlyInput(second.outputs[0])], label: 'third' });

      const frame = expectFrame(compiler.compile(graph));

      expect(frame.order).toEqual([first.handle, second.handle, third.handle]);
      expect(frame.allocated).toEqual([first.outputs[0], second.outputs[0]]);
    });

    it('should report a cycle without materializing anything', () => {
      const p1 = graph.addPass({ pipeline, attachments: [onlyOutput()], label: 'p1' });
      const p2 = graph.addPass({ pipeline, attachments: [onlyInput(p1.outputs[0]), onlyOutput()], label: 'p2' });
      graph.linkResourceToPass(p1.handle, [p2.outputs[0]]);

      const result = compiler.compile(graph);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(GraphCycleError);
      expect(backend.counts).toEqual({ shaderModules: 0, pipelineLayouts: 0, pipelines: 0, resources: 0, destroyed: 0 });
      expect(resources.size).toBe(0);
      expect(graph.isFrozen).toBe(false);
    });
  });

  describe('unsatisfied dependencies', () => {
    it('should name a consumed resource that has no producer and no binding', () => {
      const history = graph.addResource({ type: 'persistent', name: 'history' });
      graph.addPass({ pipeline, attachments: [onlyInput(history.handle), onlyOutput()], label: 'blend' });

      const result = compiler.compile(graph);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(UnsatisfiedDependencyError);
      expect(result.error.message).toBe('Resource "history" has no producer and no external binding');
      expect(backend.counts.resources).toBe(0);
      expect(backend.counts.pipelines).toBe(0);
    });

    it('should require a binding for a read-write target with no other writer', () => {
      const surface = graph.addResource({ type: 'persistent', name: 'surface' });
      graph.addPass({ pipeline, attachments: [inputAndOutput(surface.handle)] });

      const result = compiler.compile(graph);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(UnsatisfiedDependencyError);
      expect(result.error.message).toBe('Resource "surface" has no producer and no external binding');
    });

    it('should compile once the missing binding is supplied', () => {
      const surface = graph.addResource({ type: 'persistent', name: 'surface' });
      graph.addPass({ pipeline, attachments: [inputAndOutput(surface.handle)] });

      expect(compiler.compile(graph).ok).toBe(false);
      const result = compiler.compile(graph, { bindings: new Map([[surface.handle, surfaceImage()]]) });

      expect(result.ok).toBe(true);
    });

    it('should not require a binding for a read-write target written earlier in the frame', () => {
      const canvas = graph.addResource({ type: 'persistent', name: 'canvas' });
      graph.addPass({ pipeline, attachments: [onlyOutput(canvas.handle)], label: 'clear' });
      graph.addPass({ pipeline, attachments: [inputAndOutput(canvas.handle)], label: 'overlay' });

      const frame = expectFrame(compiler.compile(graph));

      expect(frame.order.map((pass) => graph.passLabel(pass))).toEqual(['clear', 'overlay']);
      expect(frame.allocated).toEqual([canvas.handle]);
    });

    it('should run read-write passes on one target in the order they were added', () => {
      const surface = graph.addResource({ type: 'persistent', name: 'surface' });
      graph.addPass({ pipeline, attachments: [inputAndOutput(surface.handle)], label: 'scene' });
      graph.addPass({ pipeline, attachments: [inputAndOutput(surface.handle)], label: 'ui' });

      const frame = expectFrame(compiler.compile(graph, { bindings: new Map([[surface.handle, surfaceImage()]]) }));

      expect(frame.order.map((pass) => graph.passLabel(pass))).toEqual(['scene', 'ui']);
      expect(frame.operations.map((op) => [op.type, op.label])).toEqual([
        ['bind-external', 'surface'],
        ['execute-pass', 'scene'],
        ['execute-pass', 'ui'],
      ]);
    });

    it('should not move a read-write pass after a writer added later', () => {
      const canvas = graph.addResource({ type: 'persistent', name: 'canvas' });
      graph.addPass({ pipeline, attachments: [inputAndOutput(canvas.handle)], label: 'overlay' });
      graph.addPass({ pipeline, attachments: [onlyOutput(canvas.handle)], label: 'clear' });

      const frame = expectFrame(compiler.compile(graph, { bindings: new Map([[canvas.handle, surfaceImage()]]) }));

      expect(frame.order.map((pass) => graph.passLabel(pass))).toEqual(['overlay', 'clear']);
      expect(frame.allocated).toEqual([]);
    });

    it('should require a binding for a read-write target whose only other writer comes later', () => {
      const canvas = graph.addResource({ type: 'persistent', name: 'canvas' });
      graph.addPass({ pipeline, attachments: [inputAndOutput(canvas.handle)], label: 'overlay' });
      graph.addPass({ pipeline, attachments: [onlyOutput(canvas.handle)], label: 'clear' });

      const result = compiler.compile(graph);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(UnsatisfiedDependencyError);
      expect(result.error.message).toBe('Resource "canvas" has no producer and no external binding');
    });
  });

  describe('materialization', () => {
    it('should create each pipeline once across compiles', () => {
      graph.addPass({ pipeline, attachments: [onlyOutput()] });
      expectFrame(compiler.compile(graph)).release();

      const next = new FrameGraph({ library });
      next.addPass({ pipeline, attachments: [onlyOutput()] });
      next.addPass({ pipeline, attachments: [onlyOutput()] });
      expectFrame(compiler.compile(next));

      expect(backend.counts.shaderModules).toBe(1);
      expect(backend.counts.pipelineLayouts).toBe(1);
      expect(backend.counts.pipelines).toBe(1);
      expect(compiler.cachedObjectCount).toBe(3);
    });

    it('should rebuild pipelines after the cache is cleared', () => {
      graph.addPass({ pipeline, attachments: [onlyOutput()] });
      expectFrame(compiler.compile(graph));

      compiler.clearCache();
      const next = new FrameGraph({ library });
      next.addPass({ pipeline, attachments: [onlyOutput()] });
      expectFrame(compiler.compile(next));

      expect(backend.counts.pipelines).toBe(2);
    });

    it('should allocate with the default description unless the resource has its own', () => {
      const sized = graph.addResource({
        type: 'dynamic',
        desc: { width: 64, height: 32, format: 'rgba16float' },
      });
      graph.addPass({ pipeline, attachments: [onlyOutput(sized.handle), onlyOutput()] });

      const frame = expectFrame(
        compiler.compile(graph, { defaultDesc: { width: 800, height: 600, format: 'rgba8unorm' } })
      );
      const descs = frame.operations.flatMap((op) => (op.type === 'create-resource' ? [op.object.desc] : []));

      expect(descs).toEqual([
        { width: 64, height: 32, format: 'rgba16float' },
        { width: 800, height: 600, format: 'rgba8unorm' },
      ]);
    });

    it('should reuse a retained persistent resource in a later frame', () => {
      const history = graph.addResource({ type: 'persistent', name: 'history' });
      graph.addPass({ pipeline, attachments: [onlyOutput(history.handle)], label: 'record' });
      const first = expectFrame(compiler.compile(graph));
      first.release();

      const next = new FrameGraph({ library });
      const retained = next.addResource({ type: 'persistent', name: 'history' });
      next.addPass({ pipeline, attachments: [inputAndOutput(retained.handle)], label: 'accumulate' });
      const second = expectFrame(compiler.compile(next));

      expect(second.allocated).toEqual([]);
      expect(second.operations.map((op) => op.type)).toEqual(['reuse-resource', 'execute-pass']);
      expect(backend.counts.resources).toBe(1);
    });

    it('should leave dynamic resources to be destroyed after the frame is released', () => {
      graph.addPass({ pipeline, attachments: [onlyOutput()] });
      const frame = expectFrame(compiler.compile(graph));

      expect(resources.upkeep()).toBe(0);

      frame.release();
      frame.release();

      expect(resources.upkeep()).toBe(1);
      expect(backend.counts.destroyed).toBe(1);
    });

    it('should freeze the graph it compiled', () => {
      graph.addPass({ pipeline, attachments: [onlyOutput()] });
      expectFrame(compiler.compile(graph));

      expect(graph.isFrozen).toBe(true);
      expect(() => graph.addResource({ type: 'dynamic' })).toThrow(GraphFrozenError);
    });

    it('should release what it took and stay unfrozen when allocation fails', () => {
      const first = graph.addPass({ pipeline, attachments: [onlyOutput()], label: 'first' });
      graph.addPass({ pipeline, attachments: [onlyInput(first.outputs[0]), onlyOutput()], label: 'second' });
      const createResource = backend.createResource.bind(backend);
      let calls = 0;
      const spy = vi.spyOn(backend, 'createResource').mockImplementation((metadata, desc) => {
        calls++;
        if (calls === 2) throw new Error('out of device memory');
        return createResource(metadata, desc);
      });

      expect(() => compiler.compile(graph)).toThrow('out of device memory');
      expect(resources.lifetimes.activeCount).toBe(0);
      expect(graph.isFrozen).toBe(false);
      expect(resources.upkeep()).toBe(1);
      expect(backend.counts.destroyed).toBe(1);

      spy.mockRestore();
      expect(compiler.compile(graph).ok).toBe(true);
      expect(graph.isFrozen).toBe(true);
    });

    it('should hand the resolved objects of each pass to the backend', () => {
      const surface = graph.addResource({ type: 'persistent', name: 'surface' });
      const scene = graph.addPass({ pipeline, attachments: [onlyOutput()], label: 'scene' });
      graph.addPass({
        pipeline,
        attachments: [onlyInput(scene.outputs[0]), inputAndOutput(surface.handle)],
        label: 'composite',
      });

      const frame = expectFrame(compiler.compile(graph, { bindings: new Map([[surface.handle, surfaceImage()]]) }));
      backend.execute(frame);

      const intermediate = resources.getFromName('scene/output-0');
      expect(intermediate).toBeUndefined();
      const [sceneLabel] = backend.submissions[0][0].outputs;
      expect(backend.submissions[0]).toEqual([
        { label: 'scene', pipeline: 'blit', inputs: [], outputs: [sceneLabel] },
        { label: 'composite', pipeline: 'blit', inputs: [sceneLabel, 'surface'], outputs: ['surface'] },
      ]);
    });
  });
});
