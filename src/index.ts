export * from './ir/types';
export * from './ir/errors';
export * from './ir/aggregates';
export { validateDescriptor, assertValidDescriptors } from './ir/schema';
export type { ValidationError, ValidationResult } from './ir/schema';
export type { BinaryOperator, UnaryOperator, BuiltinFunction } from './ir/signatures';
export { ShaderBuilder, Expr, Store, WhenChain, DISCARD } from './ir/builder';
export type { Discard, Operand, ArmOperand, StageScope } from './ir/builder';
export type * from './ir/module';
export { canonicalGraph } from './ir/utils';

export { compile, compileOrThrow, emit } from './compiler/compile';
export type { CompileResult } from './compiler/compile';
export { resolveOptions } from './compiler/options';
export type { CompileOptions, ResolvedOptions } from './compiler/options';
export type { ShaderSource } from './compiler/lowering';

export {
  resolveBindings, toVertexBufferLayouts, packUniforms, packStorage, attributesOf, globalOf,
} from './webgpu/binding-resolver';
export type {
  ResolvedLayout, BindingSlot, BindingKind, VertexAttribute, VertexBufferInfo, GroupLayout, UniformBlock,
} from './webgpu/binding-resolver';
export type { HostValue } from './webgpu/shader-layout';
export { WgslGenerator } from './webgpu/wgsl-generator';
export { PipelineCache, cacheKey, hashString } from './webgpu/gpu-cache';
export type { PipelineTarget, PipelineBackend, CacheEntry, CompiledShader, ResolvedTarget } from './webgpu/gpu-cache';
export { createWebGpuBackend } from './webgpu/webgpu-pipeline';
export type { WebGpuPipeline } from './webgpu/webgpu-pipeline';
export { DEFAULT_LIMITS, DEFAULT_WORKGROUP_SIZE, ENTRY_POINTS } from './constants';
export type { TargetLimits } from './constants';
