import { describe, it, expect } from 'vitest';
import {
  inferBinary, inferUnary, inferConstruct, inferSwizzle, swizzleIndices, inferIndex, inferCall, inferConversion,
} from './signatures';
import { Types, arrayOf, texture, matrix, vector } from './types';
import { CompileError } from './errors';

const kindOf = (fn: () => unknown): string | null => {
  try {
    fn();
    return null;
  } catch (e) {
    return e instanceof CompileError ? e.kind : 'other';
  }
};

describe('Type rules', () => {

  describe('Binary operators', () => {
    it('should keep the operand type for matching arithmetic', () => {
      expect(inferBinary('add', Types.vec3f, Types.vec3f)).toEqual(Types.vec3f);
      expect(inferBinary('sub', Types.mat2x2f, Types.mat2x2f)).toEqual(Types.mat2x2f);
      expect(inferBinary('rem', Types.u32, Types.u32)).toEqual(Types.u32);
    });

    it('should reject mixed scalar kinds', () => {
      expect(() => inferBinary('add', Types.f32, Types.i32)).toThrow(
        "TypeMismatch in 'add': operands must have identical numeric shapes; expected matching scalar, vector or matrix operands; got f32, i32",
      );
    });

    it('should support scaling and linear algebra in mul', () => {
      expect(inferBinary('mul', Types.vec3f, Types.f32)).toEqual(Types.vec3f);
      expect(inferBinary('mul', Types.i32, Types.vec2i)).toEqual(Types.vec2i);
      expect(inferBinary('mul', Types.mat4x4f, Types.vec4f)).toEqual(Types.vec4f);
      expect(inferBinary('mul', matrix(3, 2), Types.vec3f)).toEqual(Types.vec2f);
      expect(inferBinary('mul', Types.vec2f, matrix(3, 2))).toEqual(Types.vec3f);
      expect(inferBinary('mul', matrix(3, 2), matrix(4, 3))).toEqual(matrix(4, 2));
      expect(kindOf(() => inferBinary('mul', Types.mat3x3f, Types.vec4f))).toBe('TypeMismatch');
    });

    it('should allow vector / scalar but not scalar / vector', () => {
      expect(inferBinary('div', Types.vec4f, Types.f32)).toEqual(Types.vec4f);
      expect(kindOf(() => inferBinary('div', Types.f32, Types.vec4f))).toBe('TypeMismatch');
    });

    it('should produce bool shapes from comparisons', () => {
      expect(inferBinary('lt', Types.f32, Types.f32)).toEqual(Types.bool);
      expect(inferBinary('ge', Types.vec3u, Types.vec3u)).toEqual(Types.vec3b);
      expect(inferBinary('eq', Types.bool, Types.bool)).toEqual(Types.bool);
      expect(kindOf(() => inferBinary('lt', Types.bool, Types.bool))).toBe('TypeMismatch');
    });

    it('should only combine bool scalars with and/or', () => {
      expect(inferBinary('and', Types.bool, Types.bool)).toEqual(Types.bool);
      expect(kindOf(() => inferBinary('or', Types.vec2b, Types.vec2b))).toBe('TypeMismatch');
    });
  });

  describe('Unary operators', () => {
    it('should negate signed values only', () => {
      expect(inferUnary('neg', Types.vec2i)).toEqual(Types.vec2i);
      expect(inferUnary('neg', Types.mat3x3f)).toEqual(Types.mat3x3f);
      expect(kindOf(() => inferUnary('neg', Types.u32))).toBe('TypeMismatch');
    });

    it('should apply not to booleans', () => {
      expect(inferUnary('not', Types.vec4b)).toEqual(Types.vec4b);
      expect(kindOf(() => inferUnary('not', Types.f32))).toBe('TypeMismatch');
    });
  });

  describe('Construction', () => {
    it('should build zero values, splats and conversions', () => {
      expect(inferConstruct(Types.vec3f, [])).toEqual(Types.vec3f);
      expect(inferConstruct(Types.vec3f, [Types.f32])).toEqual(Types.vec3f);
      expect(inferConstruct(Types.vec2f, [Types.vec2i])).toEqual(Types.vec2f);
      expect(inferConstruct(Types.f32, [Types.u32])).toEqual(Types.f32);
    });

    it('should concatenate components up to the target size', () => {
      expect(inferConstruct(Types.vec4f, [Types.vec2f, Types.vec2f])).toEqual(Types.vec4f);
      expect(inferConstruct(Types.vec4f, [Types.vec3f, Types.f32])).toEqual(Types.vec4f);
      expect(() => inferConstruct(Types.vec4f, [Types.vec2f, Types.f32])).toThrow(
        "TypeMismatch in 'construct vec4<f32>': component count must equal 4; expected 4 f32 components; got 3 components from vec2<f32>, f32",
      );
    });

    it('should build matrices from columns or scalars', () => {
      expect(inferConstruct(Types.mat2x2f, [Types.vec2f, Types.vec2f])).toEqual(Types.mat2x2f);
      expect(inferConstruct(Types.mat2x2f, [Types.f32, Types.f32, Types.f32, Types.f32])).toEqual(Types.mat2x2f);
      expect(kindOf(() => inferConstruct(Types.mat2x2f, [Types.vec3f, Types.vec3f]))).toBe('TypeMismatch');
    });

    it('should not construct resources', () => {
      expect(kindOf(() => inferConstruct(Types.sampler, []))).toBe('TypeMismatch');
      expect(kindOf(() => inferConstruct(arrayOf(Types.f32, 'dynamic'), []))).toBe('TypeMismatch');
    });
  });

  describe('Access', () => {
    it('should size swizzles by their mask', () => {
      expect(inferSwizzle(Types.vec4f, 'x')).toEqual(Types.f32);
      expect(inferSwizzle(Types.vec4f, 'zyx')).toEqual(Types.vec3f);
      expect(inferSwizzle(Types.vec2u, 'rgrg')).toEqual(Types.vec4u);
    });

    it('should reject out-of-range and mixed swizzles', () => {
      expect(() => inferSwizzle(Types.vec2f, 'z')).toThrow(
        "TypeMismatch in 'swizzle .z': component 'z' out of bounds; expected a component of vec2<f32>; got z",
      );
      expect(kindOf(() => inferSwizzle(Types.vec4f, 'xg'))).toBe('TypeMismatch');
      expect(kindOf(() => inferSwizzle(Types.f32, 'x'))).toBe('TypeMismatch');
    });

    it('should map swizzle masks to indices', () => {
      expect(swizzleIndices('zy')).toEqual([2, 1]);
      expect(swizzleIndices('bgr')).toEqual([2, 1, 0]);
    });

    it('should index vectors, matrices and arrays', () => {
      expect(inferIndex(Types.vec3f, Types.u32)).toEqual(Types.f32);
      expect(inferIndex(Types.mat4x4f, Types.i32)).toEqual(Types.vec4f);
      expect(inferIndex(arrayOf(Types.vec2f, 'dynamic'), Types.u32)).toEqual(Types.vec2f);
    });

    it('should bounds-check constant indices', () => {
      expect(() => inferIndex(Types.mat3x3f, Types.u32, 3)).toThrow(
        "TypeMismatch in 'index': index 3 out of bounds; expected 0..2; got 3",
      );
      expect(inferIndex(arrayOf(Types.f32, 'dynamic'), Types.u32, 100)).toEqual(Types.f32);
      expect(kindOf(() => inferIndex(Types.vec2f, Types.f32))).toBe('TypeMismatch');
    });
  });

  describe('Builtin calls', () => {
    it('should resolve geometric functions', () => {
      expect(inferCall('dot', [Types.vec3f, Types.vec3f])).toEqual(Types.f32);
      expect(inferCall('length', [Types.vec2f])).toEqual(Types.f32);
      expect(inferCall('cross', [Types.vec3f, Types.vec3f])).toEqual(Types.vec3f);
      expect(inferCall('transpose', [matrix(3, 2)])).toEqual(matrix(2, 3));
    });

    it('should accept a scalar factor in mix', () => {
      expect(inferCall('mix', [Types.vec3f, Types.vec3f, Types.f32])).toEqual(Types.vec3f);
      expect(inferCall('mix', [Types.vec3f, Types.vec3f, Types.vec3f])).toEqual(Types.vec3f);
    });

    it('should check arity', () => {
      expect(() => inferCall('clamp', [Types.f32, Types.f32])).toThrow(
        "TypeMismatch in 'clamp': expects 3 arguments; expected three matching numeric scalars or vectors; got 2 arguments",
      );
    });

    it('should match texture coordinates to the texture dimension', () => {
      expect(inferCall('textureSample', [Types.texture2d, Types.sampler, Types.vec2f])).toEqual(Types.vec4f);
      expect(inferCall('textureSampleLevel', [texture('cube'), Types.sampler, Types.vec3f, Types.f32])).toEqual(Types.vec4f);
      expect(kindOf(() => inferCall('textureSample', [Types.texture2d, Types.sampler, Types.vec3f]))).toBe('TypeMismatch');
    });
  });

  describe('Conversion', () => {
    it('should convert between scalars and equally sized vectors', () => {
      expect(inferConversion(Types.f32, Types.u32)).toEqual(Types.f32);
      expect(inferConversion(Types.vec3i, Types.vec3f)).toEqual(vector(3, 'i32'));
      expect(() => inferConversion(Types.vec3f, Types.vec2f)).toThrow(
        "TypeMismatch in 'convert vec3<f32>': conversion needs matching shapes; expected scalar to scalar or vectors of equal size; got vec2<f32>",
      );
    });
  });
});
