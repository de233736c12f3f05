import { describe, it, expect } from 'vitest';
import { analyzeStage, checkVertexRoot, checkFragmentRoot } from './analyzer';
import { ShaderBuilder, DISCARD } from './builder';
import { defineGroup, defineVertex, storage } from './aggregates';
import { Types } from './types';

const Vert = defineVertex('Vert', { pos: Types.vec2f, col: Types.vec3f });
const Style = defineGroup('Style', 0, { tint: Types.vec4f });
const Data = defineGroup('Data', 1, {
  count: Types.u32,
  values: storage(Types.f32, { capacity: 8, length: 'count' }),
});
const Out = defineGroup('Out', 2, {
  count: Types.u32,
  data: storage(Types.f32, { capacity: 8, length: 'count', access: 'read_write' }),
});

describe('Stage Analyzer', () => {
  it('should collect transfers and globals of the fragment stage', () => {
    const b = new ShaderBuilder();
    const v = b.inVertex(Vert);
    const s = b.group(Style);
    const color = b.mul(b.vec4With(b.fragment(v.col), 1), s.tint);

    const analysis = analyzeStage(b, 'fragment', [color.id]);
    expect(analysis.transfers).toEqual([v.col.id]);
    expect(analysis.globals).toEqual([{ aggregate: Style, field: 'tint' }]);
    expect(analysis.aggregates).toEqual([Style]);
    expect(analysis.builtins.size).toBe(0);
    expect(analysis.uses.get(color.id)).toBe(1);
  });

  it('should count the length member of a folded storage field as read', () => {
    const b = new ShaderBuilder();
    const d = b.group(Data);
    const sum = b.fold(d.values, 0, (acc, x) => acc.add(x));

    const analysis = analyzeStage(b, 'fragment', [sum.id]);
    expect(analysis.globals).toEqual([
      { aggregate: Data, field: 'values' },
      { aggregate: Data, field: 'count' },
    ]);
  });

  it('should record builtins', () => {
    const b = new ShaderBuilder();
    const i = b.convert(Types.f32, b.vertexIndex());
    const place = b.vec4(i, 0, 0, 1);
    expect([...analyzeStage(b, 'vertex', [place.id]).builtins]).toEqual(['vertex_index']);
  });

  it('should reject writable storage in the vertex stage', () => {
    const b = new ShaderBuilder();
    const o = b.group(Out);
    const sum = b.fold(o.data, 0, (acc, x) => acc.add(x));
    const place = b.vec4(sum, 0, 0, 1);
    expect(() => analyzeStage(b, 'vertex', [place.id])).toThrow(
      "StageViolation in 'read Out.data': writable storage cannot be bound in the vertex stage; expected access 'read'; got 'read_write'",
    );
  });

  describe('Root checks', () => {
    it('should require a vec4<f32> position', () => {
      const b = new ShaderBuilder();
      const v = b.inVertex(Vert);
      expect(() => checkVertexRoot(b, b.vec3With(v.pos, 0))).toThrow(
        "TypeMismatch in 'vertex place': vertex position must be a vec4<f32>; expected vec4<f32>; got vec3<f32>",
      );
      expect(() => checkVertexRoot(b, b.concat(v.pos, b.vec2(0, 1)))).not.toThrow();
    });

    it('should reject vertex values reaching the fragment color directly', () => {
      const b = new ShaderBuilder();
      const v = b.inVertex(Vert);
      expect(() => checkFragmentRoot(b, b.vec4With(v.col, 1))).toThrow(
        "StageScopeError in 'fragment color': vertex value used in the fragment stage without fragment(); expected fragment; got vertex",
      );
    });

    it('should accept a bare discard', () => {
      expect(() => checkFragmentRoot(new ShaderBuilder(), DISCARD)).not.toThrow();
    });

    it('should reject roots from another builder', () => {
      const a = new ShaderBuilder();
      const color = a.vec4(1, 0, 0, 1);
      expect(() => checkFragmentRoot(new ShaderBuilder(), color)).toThrow(
        "StageScopeError in 'fragment color': value belongs to a different shader builder",
      );
    });
  });
});
