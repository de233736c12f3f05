import { describe, it, expect } from 'vitest';
import {
  resolveBindings, globalOf, attributesOf, toVertexBufferLayouts, packUniforms, packStorage, toSnakeCase,
} from '../../webgpu/binding-resolver';
import { attribute, defineGroup, defineInstance, defineVertex, storage } from '../../ir/aggregates';
import { Types, ValueType, struct } from '../../ir/types';
import { InternalConsistencyError } from '../../ir/errors';
import { DEFAULT_LIMITS } from '../../constants';

const Vert = defineVertex('Vert', { pos: Types.vec2f, col: Types.vec3f });
const InstanceData = defineInstance('InstanceData', { offset: Types.vec2f, transform: Types.mat3x3f });
const Scene = defineGroup('Scene', 0, {
  tex: Types.texture2d,
  time: Types.f32,
  samp: Types.sampler,
  color: Types.vec4f,
  count: Types.u32,
  lights: storage(Types.vec4f, { capacity: 4, length: 'count' }),
});

describe('Unit: Binding Resolver', () => {

  describe('Vertex attributes', () => {
    it('should assign consecutive locations and tightly packed offsets', () => {
      const layout = resolveBindings([Vert]);
      expect(layout.vertexLayout.map(a => [a.name, a.location, a.format, a.offset, a.stride])).toEqual([
        ['vert_pos', 0, 'float32x2', 0, 20],
        ['vert_col', 1, 'float32x3', 8, 20],
      ]);
      expect(layout.instanceLayout).toEqual([]);
    });

    it('should continue locations into instance buffers and split matrices into columns', () => {
      const layout = resolveBindings([Vert, InstanceData]);
      expect(layout.instanceLayout.map(a => [a.name, a.location, a.offset, a.column, a.buffer])).toEqual([
        ['instance_data_offset', 2, 0, undefined, 1],
        ['instance_data_transform_0', 3, 8, 0, 1],
        ['instance_data_transform_1', 4, 20, 1, 1],
        ['instance_data_transform_2', 5, 32, 2, 1],
      ]);
      expect(layout.buffers.map(b => [b.aggregate, b.stepMode, b.arrayStride])).toEqual([
        ['Vert', 'vertex', 20],
        ['InstanceData', 'instance', 44],
      ]);
    });

    it('should honour explicit locations', () => {
      const V = defineVertex('V', { a: attribute(Types.f32, { location: 3 }), b: Types.f32 });
      expect(resolveBindings([V]).vertexLayout.map(a => a.location)).toEqual([3, 4]);
    });

    it('should reject two attributes at one location', () => {
      const V = defineVertex('V', { a: Types.f32, b: attribute(Types.f32, { location: 0 }) });
      expect(() => resolveBindings([V])).toThrow(
        "DuplicateLocation in 'attribute V.b': location 0 is already taken by V.a; expected a free location; got 0",
      );
    });

    it('should enforce the attribute limit', () => {
      const V = defineVertex('V', { a: Types.f32, b: Types.f32, c: Types.f32 });
      expect(() => resolveBindings([V], { ...DEFAULT_LIMITS, maxVertexAttributes: 2 })).toThrow(
        "LayoutOverflow in 'attribute V.c': location 2 exceeds the vertex attribute limit; expected < 2; got 2",
      );
    });

    it('should reject bool attributes', () => {
      const V = defineVertex('V', { flag: Types.bool });
      expect(() => resolveBindings([V])).toThrow(
        "TypeMismatch in 'attribute V.flag': type cannot be a vertex attribute; expected f32/i32/u32 scalar or vector, or an f32 matrix; got bool",
      );
    });

    it('should build WebGPU vertex buffer layouts', () => {
      expect(toVertexBufferLayouts(resolveBindings([Vert]))).toEqual([{
        arrayStride: 20,
        stepMode: 'vertex',
        attributes: [
          { shaderLocation: 0, offset: 0, format: 'float32x2' },
          { shaderLocation: 1, offset: 8, format: 'float32x3' },
        ],
      }]);
    });
  });

  describe('Bind groups', () => {
    it('should give the uniform struct the binding of its first member', () => {
      const layout = resolveBindings([Scene]);
      expect(layout.bindings.map(s => [s.binding, s.kind, s.name])).toEqual([
        [0, 'texture', 'group0_tex'],
        [1, 'uniform', 'group0'],
        [2, 'sampler', 'group0_samp'],
        [3, 'storage', 'group0_lights'],
      ]);
      expect(layout.groups[0].bindings.map(b => [b.field, b.binding])).toEqual([
        ['tex', 0], ['time', 1], ['samp', 2], ['color', 1], ['count', 1], ['lights', 3],
      ]);
    });

    it('should lay out the uniform block with std140-style offsets', () => {
      const layout = resolveBindings([Scene]);
      const uniform = layout.bindings.find(s => s.kind === 'uniform');
      expect(uniform?.fields).toEqual(['time', 'color', 'count']);
      expect(uniform?.minBindingSize).toBe(48);
      expect(layout.groups[0].uniform?.block.fields.map(f => f.offset)).toEqual([0, 16, 32]);
    });

    it('should look up globals by field', () => {
      const layout = resolveBindings([Scene]);
      const color = globalOf(layout, 0, 'color');
      expect(color.slot.name).toBe('group0');
      expect(color.member).toBe('color');
      const lights = globalOf(layout, 0, 'lights');
      expect(lights.slot.access).toBe('read');
      expect(lights.member).toBeUndefined();
      expect(() => globalOf(layout, 1, 'color')).toThrow(InternalConsistencyError);
      expect(() => attributesOf(layout, 'Vert', 'pos')).toThrow(InternalConsistencyError);
    });

    it('should require contiguous group indices', () => {
      const A = defineGroup('A', 0, { x: Types.f32 });
      const B = defineGroup('B', 2, { y: Types.f32 });
      expect(() => resolveBindings([A, B])).toThrow(
        "InvalidDescriptor in 'group B': group indices must be contiguous from 0; expected 1; got group(2)",
      );
    });

    it('should reject two aggregates on one group index', () => {
      const A = defineGroup('A', 0, { x: Types.f32 });
      const B = defineGroup('B', 0, { y: Types.f32 });
      expect(() => resolveBindings([A, B])).toThrow("DuplicateLocation in 'group B': group index 0 is already used by A");
    });

    it('should reject a non-u32 length member', () => {
      const G = defineGroup('G', 0, { n: Types.f32, data: storage(Types.f32, { capacity: 4, length: 'n' }) });
      expect(() => resolveBindings([G])).toThrow(
        "TypeMismatch in 'group G.data': length field 'n' must be a u32 uniform; expected u32; got f32",
      );
    });

    it('should enforce the uniform size limit', () => {
      const G = defineGroup('G', 0, { a: Types.vec4f, b: Types.f32 });
      expect(() => resolveBindings([G], { ...DEFAULT_LIMITS, maxUniformBufferBindingSize: 16 })).toThrow(
        "LayoutOverflow in 'group G': uniform block is larger than the binding size limit; expected <= 16 bytes; got 32 bytes",
      );
    });

    it('should reject aggregates whose generated names clash', () => {
      const A = defineVertex('MyVerts', { x: Types.f32 });
      const B = defineGroup('my_verts', 0, { y: Types.f32 });
      expect(toSnakeCase('MyVerts')).toBe('my_verts');
      expect(() => resolveBindings([A, B])).toThrow(
        "InvalidDescriptor in 'aggregate my_verts': name clashes with aggregate 'MyVerts'",
      );
    });
  });

  describe('Generated names', () => {
    const grouped = (element: ValueType, more: ValueType = element) =>
      defineGroup('G', 0, {
        n: Types.u32,
        xs: storage(element, { capacity: 4, length: 'n' }),
        ys: storage(more, { capacity: 4, length: 'n' }),
      });

    it('should reject attribute names taken by builtin parameters', () => {
      const V = defineVertex('Vertex', { index: Types.f32 });
      expect(() => resolveBindings([V])).toThrow(
        "InvalidDescriptor in 'attribute Vertex.index': generated name 'vertex_index' clashes with the vertex_index builtin",
      );
    });

    it('should reject attribute names taken by globals', () => {
      const V = defineVertex('Group0', { xs: Types.f32 });
      expect(() => resolveBindings([V, grouped(Types.f32)])).toThrow(
        "InvalidDescriptor in 'attribute Group0.xs': generated name 'group0_xs' clashes with group G",
      );
    });

    it('should reserve the names of generated structs', () => {
      const a = [{ name: 'a', type: Types.f32 }];
      expect(() => resolveBindings([grouped(struct('VertexOutput', a))])).toThrow(
        "InvalidDescriptor in 'group G.xs': generated name 'VertexOutput' clashes with the vertex output struct",
      );
      expect(() => resolveBindings([grouped(struct('Group0', a))])).toThrow(
        "InvalidDescriptor in 'group G.xs': struct name 'Group0' is reserved",
      );
      expect(() => resolveBindings([grouped(struct('vec4f', a))])).toThrow(
        "InvalidDescriptor in 'group G.xs': struct name 'vec4f' is reserved",
      );
    });

    it('should require one member list per struct name', () => {
      const first = struct('P', [{ name: 'a', type: Types.f32 }]);
      const second = struct('P', [{ name: 'b', type: Types.vec4f }]);
      expect(() => resolveBindings([grouped(first, second)])).toThrow(
        "InvalidDescriptor in 'group G.ys': struct P is declared with two different member lists; expected a: f32; got b: vec4<f32>",
      );
      expect(resolveBindings([grouped(first, struct('P', [{ name: 'a', type: Types.f32 }]))]).bindings).toHaveLength(3);
    });
  });

  describe('Host packing', () => {
    it('should pack uniform values at their offsets', () => {
      const layout = resolveBindings([Scene]);
      const view = new DataView(packUniforms(layout.groups[0], { time: 0.5, color: [1, 0, 0, 1], count: 3 }));
      expect(view.byteLength).toBe(48);
      expect(view.getFloat32(0, true)).toBe(0.5);
      expect([16, 20, 24, 28].map(o => view.getFloat32(o, true))).toEqual([1, 0, 0, 1]);
      expect(view.getUint32(32, true)).toBe(3);
    });

    it('should pack storage elements with storage strides', () => {
      const layout = resolveBindings([Scene]);
      const slot = globalOf(layout, 0, 'lights').slot;
      const buffer = packStorage(slot, [[1, 2, 3, 4], [5, 6, 7, 8]]);
      expect(Array.from(new Float32Array(buffer))).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    });

    it('should refuse to pack uniforms for a group without any', () => {
      const G = defineGroup('Textures', 0, { tex: Types.texture2d });
      expect(() => packUniforms(resolveBindings([G]).groups[0], {})).toThrow(
        "InvalidDescriptor in 'group Textures': group has no uniform fields",
      );
    });
  });
});
