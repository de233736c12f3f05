/**
 * @file constants.ts
 * @description Target defaults for the compiler.
 *
 * @external-interactions
 * - `DEFAULT_LIMITS` mirrors the WebGPU default device limits; `resolveOptions` in
 *   `compiler/options.ts` merges caller overrides on top.
 * - `ENTRY_POINTS` names the generated entry functions. The WebGPU backend reads
 *   them back from the module, so renaming here is safe.
 *
 * @pitfalls
 * - Raising a limit above what the device actually grants only moves the failure
 *   from `compile` to pipeline creation.
 */

export interface TargetLimits {
  maxBindGroups: number;
  maxBindingsPerBindGroup: number;
  maxVertexAttributes: number;
  maxVertexBuffers: number;
  maxUniformBufferBindingSize: number;
}

export const DEFAULT_LIMITS: TargetLimits = {
  maxBindGroups: 4,
  maxBindingsPerBindGroup: 1000,
  maxVertexAttributes: 16,
  maxVertexBuffers: 8,
  maxUniformBufferBindingSize: 65536,
};

export const DEFAULT_WORKGROUP_SIZE: [number, number, number] = [64, 1, 1];

export const ENTRY_POINTS = {
  vertex: 'vs',
  fragment: 'fs',
  compute: 'cs',
} as const;

// Names used inside generated code.
export const VERTEX_OUTPUT_STRUCT = 'VertexOutput';
export const POSITION_MEMBER = 'place';
export const TRANSFER_MEMBER_PREFIX = 'transfer_';
export const FRAGMENT_INPUT_PARAM = 'input';
export const BUILTIN_PARAM_NAMES = {
  vertex_index: 'vertex_index',
  instance_index: 'instance_index',
  global_invocation_id: 'global_id',
} as const;
