import { describe, it, expect } from 'vitest';
import { compile, emit } from '../../compiler/compile';
import { ShaderSource } from '../../compiler/lowering';
import { ShaderBuilder } from '../../ir/builder';
import { defineGroup, defineVertex, storage } from '../../ir/aggregates';
import { packUniforms } from '../../webgpu/binding-resolver';
import { Types, struct } from '../../ir/types';

const Vert = defineVertex('Vert', { pos: Types.vec2f, uv: Types.vec2f });
const Scene = defineGroup('Scene', 0, {
  tint: Types.vec4f,
  scale: Types.f32,
  tex: Types.texture2d,
  samp: Types.sampler,
});

const texturedQuad = (): ShaderSource => {
  const b = new ShaderBuilder();
  const v = b.inVertex(Vert);
  const s = b.group(Scene);
  return {
    vertex: b.concat(v.pos.mul(s.scale), b.vec2(0, 1)),
    fragment: b.textureSample(s.tex, s.samp, b.fragment(v.uv)).mul(s.tint),
  };
};

const Extra = defineGroup('Extra', 1, { gain: Types.f32 });

const twoGroups = (order: 'forward' | 'reverse'): ShaderSource => {
  const b = new ShaderBuilder();
  const v = b.inVertex(Vert);
  const s = b.group(Scene);
  const e = b.group(Extra);
  return {
    vertex: b.concat(v.pos.mul(s.scale), b.vec2(0, 1)),
    fragment: b.mul(s.tint, e.gain),
    aggregates: order === 'forward' ? [Vert, Scene, Extra] : [Extra, Scene, Vert],
  };
};

describe('Compliance: Bind Groups', () => {
  it('should declare the uniform struct, texture and sampler of a group', () => {
    const result = compile(texturedQuad());
    if (!result.success) throw result.error;

    expect(emit(result.module)).toBe(`struct Group0 {
  tint : vec4<f32>,
  scale : f32,
}

@group(0) @binding(0) var<uniform> group0 : Group0;
@group(0) @binding(1) var group0_tex : texture_2d<f32>;
@group(0) @binding(2) var group0_samp : sampler;

struct VertexOutput {
  @builtin(position) place : vec4<f32>,
  @location(0) transfer_0 : vec2<f32>,
}

@vertex
fn vs(@location(0) vert_pos : vec2<f32>, @location(1) vert_uv : vec2<f32>) -> VertexOutput {
  return VertexOutput(vec4<f32>(vert_pos * group0.scale, vec2<f32>(0.0, 1.0)), vert_uv);
}

@fragment
fn fs(input : VertexOutput) -> @location(0) vec4<f32> {
  return textureSample(group0_tex, group0_samp, input.transfer_0) * group0.tint;
}
`);
  });

  it('should track which stages read each binding', () => {
    const result = compile(texturedQuad());
    if (!result.success) throw result.error;

    expect(result.module.bindings.map(b => [b.name, b.visibility])).toEqual([
      ['group0', { vertex: true, fragment: true, compute: false }],
      ['group0_tex', { vertex: false, fragment: true, compute: false }],
      ['group0_samp', { vertex: false, fragment: true, compute: false }],
    ]);
  });

  it('should pack uniform values to match the emitted struct', () => {
    const result = compile(texturedQuad());
    if (!result.success) throw result.error;

    const buffer = packUniforms(result.module.layout.groups[0], { tint: [1, 0.5, 0.25, 1], scale: 2 });
    expect(Array.from(new Float32Array(buffer))).toEqual([1, 0.5, 0.25, 1, 2, 0, 0, 0]);
  });

  it('should reject a group that overflows the binding limit', () => {
    const result = compile(texturedQuad(), { limits: { maxBindingsPerBindGroup: 2 } });
    if (result.success) throw new Error('expected a failure');
    expect(result.error.message).toBe(
      "LayoutOverflow in 'group Scene.samp': binding 2 exceeds the per-group limit; expected < 2; got 2",
    );
  });

  it('should emit the same text whatever order the groups are declared in', () => {
    const forward = compile(twoGroups('forward'));
    const reverse = compile(twoGroups('reverse'));
    if (!forward.success) throw forward.error;
    if (!reverse.success) throw reverse.error;

    const code = emit(forward.module);
    expect(emit(reverse.module)).toBe(code);
    expect(code).toContain('@group(1) @binding(0) var<uniform> group1 : Group1;');
  });

  it('should refuse a storage struct that reuses a generated name', () => {
    const Particles = defineGroup('Particles', 0, {
      count: Types.u32,
      items: storage(struct('VertexOutput', [{ name: 'a', type: Types.f32 }]), { capacity: 8, length: 'count' }),
    });
    const b = new ShaderBuilder();
    const items = b.group(Particles).items;
    const result = compile({ vertex: b.vec4(b.member(items.at(0), 'a'), 0, 0, 1) });
    if (result.success) throw new Error('expected a failure');
    expect(result.error.message).toBe(
      "InvalidDescriptor in 'group Particles.items': generated name 'VertexOutput' clashes with the vertex output struct",
    );
  });
});
