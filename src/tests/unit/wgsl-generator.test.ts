import { describe, it, expect } from 'vitest';
import { WgslGenerator } from '../../webgpu/wgsl-generator';
import { resolveBindings } from '../../webgpu/binding-resolver';
import { IRExpr, IRFunction, ShaderModule, StructDecl, ref } from '../../ir/module';
import { Types, struct } from '../../ir/types';
import { InternalConsistencyError } from '../../ir/errors';

const lit = (value: number): IRExpr => ({ kind: 'literal', type: Types.f32, value });

const moduleOf = (partial: Partial<ShaderModule>): ShaderModule => ({
  layout: resolveBindings([]),
  bindings: [],
  structs: [],
  globals: [],
  stages: {},
  ...partial,
});

const vertexOutput: StructDecl = {
  name: 'VertexOutput',
  role: { kind: 'vertex_output' },
  members: [{ name: 'place', type: Types.vec4f, io: { kind: 'builtin', builtin: 'position' } }],
};

describe('Unit: WgslGenerator', () => {
  const gen = new WgslGenerator();

  describe('Literals', () => {
    it('should always give floats a decimal point or exponent', () => {
      expect(gen.formatLiteral(1, Types.f32)).toBe('1.0');
      expect(gen.formatLiteral(0.5, Types.f32)).toBe('0.5');
      expect(gen.formatLiteral(-2, Types.f32)).toBe('-2.0');
      expect(gen.formatLiteral(1e21, Types.f32)).toBe('1e+21');
    });

    it('should suffix integers', () => {
      expect(gen.formatLiteral(-3, Types.i32)).toBe('-3i');
      expect(gen.formatLiteral(7, Types.u32)).toBe('7u');
      expect(gen.formatLiteral(-2147483648, Types.i32)).toBe('i32(-2147483648)');
      expect(gen.formatLiteral(true, Types.bool)).toBe('true');
    });
  });

  describe('Expressions', () => {
    const sum: IRExpr = { kind: 'binary', op: 'add', lhs: ref('a'), rhs: ref('b') };

    it('should parenthesize nested binary operands', () => {
      expect(gen.expr({ kind: 'binary', op: 'mul', lhs: sum, rhs: ref('c') })).toBe('(a + b) * c');
      expect(gen.expr({
        kind: 'binary', op: 'and',
        lhs: { kind: 'binary', op: 'lt', lhs: ref('x'), rhs: lit(0) },
        rhs: { kind: 'unary', op: 'not', operand: ref('f') },
      })).toBe('(x < 0.0) && !f');
    });

    it('should parenthesize unary operands and postfix bases that need it', () => {
      expect(gen.expr({ kind: 'unary', op: 'neg', operand: lit(-2) })).toBe('-(-2.0)');
      expect(gen.expr({ kind: 'unary', op: 'neg', operand: sum })).toBe('-(a + b)');
      expect(gen.expr({ kind: 'swizzle', base: sum, components: 'xy' })).toBe('(a + b).xy');
      expect(gen.expr({ kind: 'index', base: ref('m'), index: 2 })).toBe('m[2]');
      expect(gen.expr({ kind: 'member', base: ref('group0'), member: 'tint' })).toBe('group0.tint');
    });

    it('should spell constructors and calls', () => {
      expect(gen.expr({ kind: 'construct', type: Types.vec4f, args: [ref('rgb'), lit(1)] })).toBe('vec4<f32>(rgb, 1.0)');
      expect(gen.expr({ kind: 'call', fn: 'clamp', args: [ref('x'), lit(0), lit(1)] })).toBe('clamp(x, 0.0, 1.0)');
      expect(() => gen.expr({ kind: 'construct', type: Types.sampler, args: [] })).toThrow(InternalConsistencyError);
    });
  });

  describe('Modules', () => {
    it('should print statements with two-space indentation', () => {
      const fs: IRFunction = {
        stage: 'fragment',
        name: 'fs',
        params: [{ name: 'input', type: struct('VertexOutput', [{ name: 'place', type: Types.vec4f }]) }],
        output: { type: Types.vec4f, io: { kind: 'location', location: 0 } },
        body: [
          { kind: 'let', name: 'e0', type: Types.f32, value: { kind: 'swizzle', base: { kind: 'member', base: ref('input'), member: 'place' }, components: 'x' } },
          { kind: 'var', name: 'e1', type: Types.vec4f },
          {
            kind: 'if',
            cond: { kind: 'binary', op: 'lt', lhs: ref('e0'), rhs: lit(0) },
            then: [{ kind: 'discard' }],
            else: [{ kind: 'assign', target: ref('e1'), value: { kind: 'construct', type: Types.vec4f, args: [ref('e0')] } }],
          },
          { kind: 'var', name: 'e2', type: Types.f32, value: lit(0) },
          {
            kind: 'loop',
            index: 'i0',
            bound: {
              kind: 'call', fn: 'min', args: [
                { kind: 'member', base: ref('group0'), member: 'count' },
                { kind: 'literal', type: Types.u32, value: 8 },
              ],
            },
            body: [{
              kind: 'assign',
              target: ref('e2'),
              value: { kind: 'binary', op: 'add', lhs: ref('e2'), rhs: { kind: 'index', base: ref('group0_values'), index: ref('i0') } },
            }],
          },
          { kind: 'return', value: { kind: 'binary', op: 'mul', lhs: ref('e1'), rhs: ref('e2') } },
        ],
      };

      expect(gen.generate(moduleOf({ structs: [vertexOutput], stages: { fragment: fs } }))).toBe([
        'struct VertexOutput {',
        '  @builtin(position) place : vec4<f32>,',
        '}',
        '',
        '@fragment',
        'fn fs(input : VertexOutput) -> @location(0) vec4<f32> {',
        '  let e0 : f32 = input.place.x;',
        '  var e1 : vec4<f32>;',
        '  if (e0 < 0.0) {',
        '    discard;',
        '  } else {',
        '    e1 = vec4<f32>(e0);',
        '  }',
        '  var e2 : f32 = 0.0;',
        '  for (var i0 : u32 = 0u; i0 < min(group0.count, 8u); i0++) {',
        '    e2 = e2 + group0_values[i0];',
        '  }',
        '  return e1 * e2;',
        '}',
        '',
      ].join('\n'));
    });

    it('should default the workgroup size of a compute entry', () => {
      const cs: IRFunction = {
        stage: 'compute',
        name: 'cs',
        params: [],
        body: [{ kind: 'assign', target: { kind: 'index', base: ref('out'), index: ref('i') }, value: lit(1) }],
      };
      expect(gen.generate(moduleOf({ stages: { compute: cs } }))).toBe(
        '@compute @workgroup_size(1, 1, 1)\nfn cs() {\n  out[i] = 1.0;\n}\n',
      );
    });
  });

  describe('Consistency checks', () => {
    const failure = (module: ShaderModule) => {
      try {
        gen.generate(module);
      } catch (e) {
        if (e instanceof InternalConsistencyError) return e.message;
        throw e;
      }
      return null;
    };
    const userStruct = (name: string, fields = 1): StructDecl => ({
      name,
      role: { kind: 'user' },
      members: Array.from({ length: fields }, (_, i) => ({ name: `m${i}`, type: Types.f32 })),
    });

    it('should reject duplicate declarations', () => {
      expect(failure(moduleOf({ structs: [userStruct('A'), userStruct('A')] }))).toBe(
        "InternalConsistency in wgsl emitter: 'A' is declared twice",
      );
    });

    it('should reject empty structs', () => {
      expect(failure(moduleOf({ structs: [userStruct('B', 0)] }))).toBe(
        'InternalConsistency in wgsl emitter: struct B has no members',
      );
    });

    it('should reject globals outside the declared groups', () => {
      expect(failure(moduleOf({
        globals: [{ group: 1, binding: 0, name: 'g', type: Types.f32, address: { space: 'uniform' } }],
      }))).toBe('InternalConsistency in wgsl emitter: global g is in group 1, which the layout does not declare');
    });

    it('should require the position member first in the vertex output', () => {
      const bad: StructDecl = { ...vertexOutput, members: [{ name: 'transfer_0', type: Types.f32, io: { kind: 'location', location: 0 } }] };
      expect(failure(moduleOf({ structs: [bad] }))).toBe(
        'InternalConsistency in wgsl emitter: VertexOutput does not start with the position member',
      );
    });

    it('should require entry points with an output to return a value', () => {
      const fs: IRFunction = { stage: 'fragment', name: 'fs', params: [], output: { type: Types.vec4f }, body: [] };
      expect(failure(moduleOf({ stages: { fragment: fs } }))).toBe(
        'InternalConsistency in wgsl emitter: entry point fs does not end in a return',
      );
      const cs: IRFunction = { stage: 'compute', name: 'cs', params: [], body: [] };
      expect(failure(moduleOf({ stages: { compute: cs } }))).toBe(
        'InternalConsistency in wgsl emitter: entry point cs has an empty body',
      );
    });
  });
});
