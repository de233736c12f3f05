import { describe, it, expect } from 'vitest';
import { compile, emit } from '../../compiler/compile';
import { ShaderSource } from '../../compiler/lowering';
import { ShaderBuilder } from '../../ir/builder';
import { defineVertex } from '../../ir/aggregates';
import { Types } from '../../ir/types';

const Vert = defineVertex('Vert', { pos: Types.vec2f, col: Types.vec3f });

const triangle = (): ShaderSource => {
  const b = new ShaderBuilder();
  const v = b.inVertex(Vert);
  return {
    vertex: b.concat(v.pos, b.vec2(0, 1)),
    fragment: b.vec4With(b.fragment(v.col), 1),
  };
};

describe('Compliance: Triangle', () => {
  it('should emit a vertex-colored triangle', () => {
    const result = compile(triangle());
    if (!result.success) throw result.error;

    expect(emit(result.module)).toBe(`struct VertexOutput {
  @builtin(position) place : vec4<f32>,
  @location(0) transfer_0 : vec3<f32>,
}

@vertex
fn vs(@location(0) vert_pos : vec2<f32>, @location(1) vert_col : vec3<f32>) -> VertexOutput {
  return VertexOutput(vec4<f32>(vert_pos, vec2<f32>(0.0, 1.0)), vert_col);
}

@fragment
fn fs(input : VertexOutput) -> @location(0) vec4<f32> {
  return vec4<f32>(input.transfer_0, 1.0);
}
`);
  });

  it('should describe the vertex buffer the host has to provide', () => {
    const result = compile(triangle());
    if (!result.success) throw result.error;

    expect(result.module.layout.buffers).toEqual([{
      aggregate: 'Vert',
      stepMode: 'vertex',
      arrayStride: 20,
      attributes: [
        { location: 0, type: Types.vec2f, format: 'float32x2', offset: 0, stride: 20, buffer: 0, aggregate: 'Vert', field: 'pos', column: undefined, name: 'vert_pos' },
        { location: 1, type: Types.vec3f, format: 'float32x3', offset: 8, stride: 20, buffer: 0, aggregate: 'Vert', field: 'col', column: undefined, name: 'vert_col' },
      ],
    }]);
    expect(result.module.bindings).toEqual([]);
  });

  it('should produce identical text for identical graphs', () => {
    const a = compile(triangle());
    const b = compile(triangle());
    if (!a.success || !b.success) throw new Error('compile failed');
    expect(emit(a.module)).toBe(emit(b.module));
  });

  it('should honour custom entry point names', () => {
    const result = compile(triangle(), { entryPoints: { vertex: 'main_vs', fragment: 'main_fs' } });
    if (!result.success) throw result.error;
    const code = emit(result.module);
    expect(code).toContain('\nfn main_vs(@location(0) vert_pos');
    expect(code).toContain('\nfn main_fs(input : VertexOutput)');
  });

  it('should report aggregates missing from the declared list', () => {
    const result = compile({ ...triangle(), aggregates: [] });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.kind).toBe('InvalidDescriptor');
    expect(result.error.message).toBe("InvalidDescriptor in 'compile': aggregate Vert is read but not part of the shader's aggregates");
  });
});
