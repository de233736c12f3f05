/**
 * @file webgpu-pipeline.ts
 * @description `PipelineBackend` for a real `GPUDevice`: shader module, bind
 * group layouts, pipeline layout and render or compute pipeline for one
 * compiled shader.
 *
 * @external-interactions
 * - Called by `PipelineCache` once per fingerprint; everything it creates is
 *   labelled with that fingerprint.
 *
 * @pitfalls
 * - A binding no stage reads still needs a visibility; it is made visible to
 *   every stage that may bind it, so the layout stays valid.
 */
import { ModuleBinding, ShaderModule, StageVisibility } from '../ir/module';
import { toVertexBufferLayouts } from './binding-resolver';
import type { CompiledShader, PipelineBackend, ResolvedTarget } from './gpu-cache';

// GPUShaderStage flag values; the global is only defined in browsers.
const STAGE_FLAGS: Record<keyof StageVisibility, number> = { vertex: 1, fragment: 2, compute: 4 };
const STAGES = ['vertex', 'fragment', 'compute'] as const;

const SAMPLE_TYPES = { f32: 'float', i32: 'sint', u32: 'uint' } as const;

export interface WebGpuPipeline {
  fingerprint: string;
  bindGroupLayouts: GPUBindGroupLayout[];
  render?: GPURenderPipeline;
  compute?: GPUComputePipeline;
}

export async function createShaderModule(device: GPUDevice, code: string, label: string): Promise<GPUShaderModule> {
  const module = device.createShaderModule({ code, label });

  const info = await module.getCompilationInfo();
  if (info.messages.length === 0) return module;

  let hasError = false;
  const formatted = info.messages.map(m => {
    if (m.type === 'error') hasError = true;
    return `[${m.type.toUpperCase()}] line ${m.lineNum}:${m.linePos} - ${m.message}`;
  }).join('\n');

  if (hasError) {
    console.error(`[Shader Compilation Error]\n${formatted}`);
    const codeView = code.split('\n').map((l, i) => `${(i + 1).toString().padStart(4, ' ')}| ${l}`).join('\n');
    console.error(`[Source Code]\n${codeView}`);
    throw new Error(`[WebGpuPipeline] shader ${label} failed to compile`);
  }
  console.warn(`[Shader Compilation Warning]\n${formatted}`);
  return module;
}

export function bindingVisibility(binding: ModuleBinding, module: ShaderModule): number {
  const used = STAGES
    .filter(stage => binding.visibility[stage])
    .reduce((flags, stage) => flags | STAGE_FLAGS[stage], 0);
  if (used !== 0) return used;

  let fallback = 0;
  if (module.stages.fragment) fallback |= STAGE_FLAGS.fragment;
  if (module.stages.compute) fallback |= STAGE_FLAGS.compute;
  if (module.stages.vertex && binding.access !== 'read_write') fallback |= STAGE_FLAGS.vertex;
  return fallback;
}

export function bindGroupLayoutEntry(binding: ModuleBinding, module: ShaderModule): GPUBindGroupLayoutEntry {
  const entry = { binding: binding.binding, visibility: bindingVisibility(binding, module) };
  switch (binding.kind) {
    case 'uniform':
      return { ...entry, buffer: { type: 'uniform', minBindingSize: binding.minBindingSize } };
    case 'storage':
      return { ...entry, buffer: { type: binding.access === 'read_write' ? 'storage' : 'read-only-storage' } };
    case 'texture': {
      const t = binding.type;
      if (t.kind !== 'texture') throw new Error(`[WebGpuPipeline] binding ${binding.name} is not a texture`);
      return { ...entry, texture: { sampleType: SAMPLE_TYPES[t.sampled], viewDimension: t.dimension } };
    }
    case 'sampler':
      return { ...entry, sampler: { type: 'filtering' } };
  }
}

export function createWebGpuBackend(device: GPUDevice): PipelineBackend<WebGpuPipeline> {
  return {
    async createPipeline(shader: CompiledShader, target: ResolvedTarget): Promise<WebGpuPipeline> {
      const { module, fingerprint } = shader;
      const label = `shader-${fingerprint}`;
      const code = await createShaderModule(device, shader.code, label);

      const bindGroupLayouts = module.layout.groups.map(g => device.createBindGroupLayout({
        label: `${label}-group${g.group}`,
        entries: module.bindings.filter(b => b.group === g.group).map(b => bindGroupLayoutEntry(b, module)),
      }));
      const layout = device.createPipelineLayout({ label, bindGroupLayouts });
      const result: WebGpuPipeline = { fingerprint, bindGroupLayouts };

      const { vertex, fragment, compute } = module.stages;
      if (vertex) {
        result.render = await device.createRenderPipelineAsync({
          label,
          layout,
          vertex: { module: code, entryPoint: vertex.name, buffers: toVertexBufferLayouts(module.layout) },
          fragment: fragment
            ? { module: code, entryPoint: fragment.name, targets: [{ format: target.colorFormat }] }
            : undefined,
          primitive: { topology: target.topology },
          multisample: { count: target.sampleCount },
          depthStencil: target.depthFormat
            ? { format: target.depthFormat, depthWriteEnabled: true, depthCompare: 'less' }
            : undefined,
        });
      }
      if (compute) {
        result.compute = await device.createComputePipelineAsync({
          label,
          layout,
          compute: { module: code, entryPoint: compute.name },
        });
      }
      return result;
    },
  };
}
