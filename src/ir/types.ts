// ------------------------------------------------------------------
// Value Types
// ------------------------------------------------------------------
export type ScalarKind = 'f32' | 'i32' | 'u32' | 'bool';
export type VectorSize = 2 | 3 | 4;
export type TextureDimension = '1d' | '2d' | '3d' | 'cube';
export type SampledKind = 'f32' | 'i32' | 'u32';

export interface ScalarType {
  kind: 'scalar';
  scalar: ScalarKind;
}

export interface VectorType {
  kind: 'vector';
  size: VectorSize;
  scalar: ScalarKind;
}

// Matrices are always f32 and stored as an array of column vectors.
export interface MatrixType {
  kind: 'matrix';
  columns: VectorSize;
  rows: VectorSize;
}

export interface ArrayType {
  kind: 'array';
  element: ValueType;
  length: number | 'dynamic';
}

export interface TextureType {
  kind: 'texture';
  dimension: TextureDimension;
  sampled: SampledKind;
}

export interface SamplerType {
  kind: 'sampler';
}

export interface StructField {
  name: string;
  type: ValueType;
}

export interface StructType {
  kind: 'struct';
  name: string;
  fields: StructField[];
}

export type ValueType =
  | ScalarType
  | VectorType
  | MatrixType
  | ArrayType
  | TextureType
  | SamplerType
  | StructType;

export const scalar = (s: ScalarKind): ScalarType => ({ kind: 'scalar', scalar: s });
export const vector = (size: VectorSize, s: ScalarKind = 'f32'): VectorType => ({ kind: 'vector', size, scalar: s });
export const matrix = (columns: VectorSize, rows: VectorSize): MatrixType => ({ kind: 'matrix', columns, rows });
export const arrayOf = (element: ValueType, length: number | 'dynamic'): ArrayType => ({ kind: 'array', element, length });
export const texture = (dimension: TextureDimension = '2d', sampled: SampledKind = 'f32'): TextureType => ({ kind: 'texture', dimension, sampled });
export const samplerType = (): SamplerType => ({ kind: 'sampler' });
export const struct = (name: string, fields: StructField[]): StructType => ({ kind: 'struct', name, fields });

export const Types = {
  f32: scalar('f32'),
  i32: scalar('i32'),
  u32: scalar('u32'),
  bool: scalar('bool'),
  vec2f: vector(2, 'f32'),
  vec3f: vector(3, 'f32'),
  vec4f: vector(4, 'f32'),
  vec2i: vector(2, 'i32'),
  vec3i: vector(3, 'i32'),
  vec4i: vector(4, 'i32'),
  vec2u: vector(2, 'u32'),
  vec3u: vector(3, 'u32'),
  vec4u: vector(4, 'u32'),
  vec2b: vector(2, 'bool'),
  vec3b: vector(3, 'bool'),
  vec4b: vector(4, 'bool'),
  mat2x2f: matrix(2, 2),
  mat3x3f: matrix(3, 3),
  mat4x4f: matrix(4, 4),
  texture2d: texture('2d', 'f32'),
  sampler: samplerType(),
} as const;

// ------------------------------------------------------------------
// Type Queries
// ------------------------------------------------------------------

export function typeEquals(a: ValueType, b: ValueType): boolean {
  switch (a.kind) {
    case 'scalar':
      return b.kind === 'scalar' && a.scalar === b.scalar;
    case 'vector':
      return b.kind === 'vector' && a.size === b.size && a.scalar === b.scalar;
    case 'matrix':
      return b.kind === 'matrix' && a.columns === b.columns && a.rows === b.rows;
    case 'array':
      return b.kind === 'array' && a.length === b.length && typeEquals(a.element, b.element);
    case 'texture':
      return b.kind === 'texture' && a.dimension === b.dimension && a.sampled === b.sampled;
    case 'sampler':
      return b.kind === 'sampler';
    case 'struct':
      return b.kind === 'struct' && a.name === b.name && a.fields.length === b.fields.length &&
        a.fields.every((f, i) => f.name === b.fields[i].name && typeEquals(f.type, b.fields[i].type));
  }
}

/**
 * Number of scalar components. Scalars count 1; non-composite kinds have none.
 */
export function componentCount(t: ValueType): number {
  switch (t.kind) {
    case 'scalar': return 1;
    case 'vector': return t.size;
    case 'matrix': return t.columns * t.rows;
    default: return 0;
  }
}

/** Scalar kind of a scalar or vector, f32 for matrices. */
export function scalarKindOf(t: ValueType): ScalarKind | null {
  if (t.kind === 'scalar' || t.kind === 'vector') return t.scalar;
  if (t.kind === 'matrix') return 'f32';
  return null;
}

export const isScalarOrVector = (t: ValueType): t is ScalarType | VectorType =>
  t.kind === 'scalar' || t.kind === 'vector';

export const isNumeric = (t: ValueType): boolean =>
  (isScalarOrVector(t) && t.scalar !== 'bool') || t.kind === 'matrix';

export const isFloat = (t: ValueType): boolean =>
  isScalarOrVector(t) && t.scalar === 'f32';

export const isBool = (t: ValueType): boolean =>
  isScalarOrVector(t) && t.scalar === 'bool';

/**
 * Types that may live in a uniform or storage buffer (WGSL "host-shareable"),
 * restricted to what aggregate records can declare.
 */
export function isHostShareable(t: ValueType): boolean {
  switch (t.kind) {
    case 'scalar':
    case 'vector':
      return t.scalar !== 'bool';
    case 'matrix':
      return true;
    case 'array':
      return isHostShareable(t.element) && t.element.kind !== 'array';
    case 'struct':
      return t.fields.every(f => isHostShareable(f.type));
    default:
      return false;
  }
}

// ------------------------------------------------------------------
// WGSL spelling
// ------------------------------------------------------------------

export function formatType(t: ValueType): string {
  switch (t.kind) {
    case 'scalar':
      return t.scalar;
    case 'vector':
      return `vec${t.size}<${t.scalar}>`;
    case 'matrix':
      return `mat${t.columns}x${t.rows}<f32>`;
    case 'array':
      return t.length === 'dynamic'
        ? `array<${formatType(t.element)}>`
        : `array<${formatType(t.element)}, ${t.length}>`;
    case 'texture':
      return `texture_${t.dimension}<${t.sampled}>`;
    case 'sampler':
      return 'sampler';
    case 'struct':
      return t.name;
  }
}
