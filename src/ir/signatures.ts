/**
 * Type rules for every operation the expression builder can create.
 *
 * Each `infer*` function is pure: it returns the result type or throws a
 * `TypeMismatch` naming the operation and the conflicting shapes.
 */
import {
  ValueType, Types, scalar, vector, matrix,
  typeEquals, componentCount, formatType, isScalarOrVector, isFloat, isNumeric,
} from './types';
import { typeMismatch } from './errors';

export type BinaryOperator =
  | 'add' | 'sub' | 'mul' | 'div' | 'rem'
  | 'eq' | 'ne' | 'lt' | 'le' | 'gt' | 'ge'
  | 'and' | 'or';

export type UnaryOperator = 'neg' | 'not';

const shapes = (...types: ValueType[]) => types.map(formatType).join(', ');

const boolShape = (t: ValueType): ValueType =>
  t.kind === 'vector' ? vector(t.size, 'bool') : Types.bool;

const isNumericScalarOrVector = (t: ValueType) => isScalarOrVector(t) && t.scalar !== 'bool';

// ------------------------------------------------------------------
// Binary / Unary
// ------------------------------------------------------------------

export function inferBinary(op: BinaryOperator, lhs: ValueType, rhs: ValueType): ValueType {
  const same = typeEquals(lhs, rhs);

  switch (op) {
    case 'add':
    case 'sub':
      if (same && isNumeric(lhs)) return lhs;
      throw typeMismatch(op, 'operands must have identical numeric shapes', 'matching scalar, vector or matrix operands', shapes(lhs, rhs));

    case 'rem':
      if (same && isNumericScalarOrVector(lhs)) return lhs;
      throw typeMismatch(op, 'operands must have identical numeric shapes', 'matching scalar or vector operands', shapes(lhs, rhs));

    case 'div':
      if (same && isNumericScalarOrVector(lhs)) return lhs;
      if (lhs.kind === 'vector' && rhs.kind === 'scalar' && lhs.scalar === rhs.scalar && lhs.scalar !== 'bool') return lhs;
      throw typeMismatch(op, 'cannot divide these shapes', 'matching operands or vector / scalar', shapes(lhs, rhs));

    case 'mul':
      return inferMul(lhs, rhs);

    case 'lt':
    case 'le':
    case 'gt':
    case 'ge':
      if (same && isNumericScalarOrVector(lhs)) return boolShape(lhs);
      throw typeMismatch(op, 'comparison needs identical numeric shapes', 'matching scalar or vector operands', shapes(lhs, rhs));

    case 'eq':
    case 'ne':
      if (same && isScalarOrVector(lhs)) return boolShape(lhs);
      throw typeMismatch(op, 'comparison needs identical shapes', 'matching scalar or vector operands', shapes(lhs, rhs));

    case 'and':
    case 'or':
      if (same && lhs.kind === 'scalar' && lhs.scalar === 'bool') return Types.bool;
      throw typeMismatch(op, 'logical operators take booleans', 'bool, bool', shapes(lhs, rhs));
  }
}

function inferMul(lhs: ValueType, rhs: ValueType): ValueType {
  if (typeEquals(lhs, rhs) && isNumericScalarOrVector(lhs)) return lhs;

  // Scaling
  if (lhs.kind === 'vector' && rhs.kind === 'scalar' && lhs.scalar === rhs.scalar && lhs.scalar !== 'bool') return lhs;
  if (lhs.kind === 'scalar' && rhs.kind === 'vector' && lhs.scalar === rhs.scalar && lhs.scalar !== 'bool') return rhs;
  if (lhs.kind === 'matrix' && typeEquals(rhs, Types.f32)) return lhs;
  if (typeEquals(lhs, Types.f32) && rhs.kind === 'matrix') return rhs;

  // Linear algebra
  if (lhs.kind === 'matrix' && rhs.kind === 'vector' && rhs.scalar === 'f32' && rhs.size === lhs.columns) {
    return vector(lhs.rows, 'f32');
  }
  if (lhs.kind === 'vector' && rhs.kind === 'matrix' && lhs.scalar === 'f32' && lhs.size === rhs.rows) {
    return vector(rhs.columns, 'f32');
  }
  if (lhs.kind === 'matrix' && rhs.kind === 'matrix' && rhs.rows === lhs.columns) {
    return matrix(rhs.columns, lhs.rows);
  }

  throw typeMismatch('mul', 'cannot multiply these shapes', 'matching operands, a scaling or a matrix product', shapes(lhs, rhs));
}

export function inferUnary(op: UnaryOperator, operand: ValueType): ValueType {
  if (op === 'neg') {
    if (operand.kind === 'matrix') return operand;
    if (isScalarOrVector(operand) && (operand.scalar === 'f32' || operand.scalar === 'i32')) return operand;
    throw typeMismatch(op, 'negation needs a signed numeric value', 'f32/i32 scalar, vector or matrix', formatType(operand));
  }
  if (isScalarOrVector(operand) && operand.scalar === 'bool') return operand;
  throw typeMismatch(op, 'logical not needs booleans', 'bool scalar or vector', formatType(operand));
}

// ------------------------------------------------------------------
// Construction & Access
// ------------------------------------------------------------------

export function inferConstruct(target: ValueType, args: ValueType[]): ValueType {
  const op = `construct ${formatType(target)}`;
  if (args.length === 0 && target.kind !== 'texture' && target.kind !== 'sampler' && !(target.kind === 'array' && target.length === 'dynamic')) {
    return target; // zero value
  }

  switch (target.kind) {
    case 'scalar': {
      // Conversion
      if (args.length === 1 && args[0].kind === 'scalar') return target;
      throw typeMismatch(op, 'scalar construction takes one scalar', 'one scalar', shapes(...args));
    }
    case 'vector': {
      if (args.length === 1) {
        const [a] = args;
        if (a.kind === 'scalar' && a.scalar === target.scalar) return target; // splat
        if (a.kind === 'vector' && a.size === target.size) return target; // conversion
      }
      const total = args.reduce((n, a) => n + componentCount(a), 0);
      const kindsMatch = args.every(a => isScalarOrVector(a) && a.scalar === target.scalar);
      if (kindsMatch && total === target.size) return target;
      throw typeMismatch(op, `component count must equal ${target.size}`, `${target.size} ${target.scalar} components`, `${total} components from ${shapes(...args)}`);
    }
    case 'matrix': {
      const column = vector(target.rows, 'f32');
      if (args.length === target.columns && args.every(a => typeEquals(a, column))) return target;
      if (args.length === target.columns * target.rows && args.every(a => typeEquals(a, Types.f32))) return target;
      throw typeMismatch(op, 'matrix construction takes column vectors or scalars', `${target.columns} x ${formatType(column)} or ${target.columns * target.rows} x f32`, shapes(...args));
    }
    case 'array': {
      if (target.length !== 'dynamic' && args.length === target.length && args.every(a => typeEquals(a, target.element))) return target;
      throw typeMismatch(op, 'array construction needs one value per element', `${target.length} x ${formatType(target.element)}`, shapes(...args));
    }
    default:
      throw typeMismatch(op, 'type cannot be constructed', 'scalar, vector, matrix or fixed array', formatType(target));
  }
}

const SWIZZLE_SETS = ['xyzw', 'rgba'];

export function inferSwizzle(base: ValueType, components: string): ValueType {
  const op = `swizzle .${components}`;
  if (base.kind !== 'vector') {
    throw typeMismatch(op, 'only vectors can be swizzled', 'vector', formatType(base));
  }
  const set = SWIZZLE_SETS.find(s => components.length > 0 && [...components].every(c => s.includes(c)));
  if (!set || components.length > 4) {
    throw typeMismatch(op, 'invalid swizzle mask', '1-4 components from xyzw or rgba', components);
  }
  for (const c of components) {
    if (set.indexOf(c) >= base.size) {
      throw typeMismatch(op, `component '${c}' out of bounds`, `a component of ${formatType(base)}`, c);
    }
  }
  const n = components.length;
  return n === 2 || n === 3 || n === 4 ? vector(n, base.scalar) : scalar(base.scalar);
}

/** Converts a swizzle mask to component indices, e.g. 'zy' -> [2, 1]. */
export function swizzleIndices(components: string): number[] {
  const set = SWIZZLE_SETS.find(s => [...components].every(c => s.includes(c))) ?? SWIZZLE_SETS[0];
  return [...components].map(c => set.indexOf(c));
}

export function inferIndex(base: ValueType, index: ValueType, literal?: number): ValueType {
  const op = 'index';
  if (!(index.kind === 'scalar' && (index.scalar === 'i32' || index.scalar === 'u32'))) {
    throw typeMismatch(op, 'index must be an integer', 'i32 or u32', formatType(index));
  }

  let bound: number | null = null;
  let result: ValueType;
  switch (base.kind) {
    case 'vector':
      bound = base.size;
      result = scalar(base.scalar);
      break;
    case 'matrix':
      bound = base.columns;
      result = vector(base.rows, 'f32');
      break;
    case 'array':
      bound = base.length === 'dynamic' ? null : base.length;
      result = base.element;
      break;
    default:
      throw typeMismatch(op, 'value cannot be indexed', 'vector, matrix or array', formatType(base));
  }

  if (literal !== undefined && bound !== null && (literal < 0 || literal >= bound)) {
    throw typeMismatch(op, `index ${literal} out of bounds`, `0..${bound - 1}`, String(literal));
  }
  return result;
}

// ------------------------------------------------------------------
// Builtin Functions
// ------------------------------------------------------------------

export type BuiltinFunction =
  | 'sin' | 'cos' | 'tan' | 'asin' | 'acos' | 'atan'
  | 'sinh' | 'cosh' | 'tanh'
  | 'exp' | 'exp2' | 'log' | 'log2' | 'sqrt' | 'inverseSqrt'
  | 'floor' | 'ceil' | 'round' | 'fract' | 'trunc' | 'saturate' | 'degrees' | 'radians'
  | 'abs' | 'sign'
  | 'min' | 'max' | 'pow' | 'step' | 'atan2'
  | 'clamp' | 'smoothstep' | 'mix'
  | 'dot' | 'length' | 'distance' | 'normalize' | 'cross' | 'reflect'
  | 'transpose' | 'determinant'
  | 'textureSample' | 'textureSampleLevel';

export interface BuiltinSignature {
  arity: number;
  /** Human-readable parameter shapes for error messages. */
  expects: string;
  /** Returns the result type, or null if the arguments do not fit. */
  rule: (args: ValueType[]) => ValueType | null;
  /** Only valid in the fragment stage (implicit derivatives). */
  fragmentOnly?: boolean;
}

const sameAll = (args: ValueType[]) => args.every(a => typeEquals(a, args[0]));

const unaryFloat: BuiltinSignature = {
  arity: 1, expects: 'f32 scalar or vector',
  rule: ([a]) => isFloat(a) ? a : null,
};

const binaryFloat: BuiltinSignature = {
  arity: 2, expects: 'two matching f32 scalars or vectors',
  rule: (args) => sameAll(args) && isFloat(args[0]) ? args[0] : null,
};

const binaryNumeric: BuiltinSignature = {
  arity: 2, expects: 'two matching numeric scalars or vectors',
  rule: (args) => sameAll(args) && isNumericScalarOrVector(args[0]) ? args[0] : null,
};

const textureCoords = (t: ValueType): ValueType | null => {
  if (t.kind !== 'texture' || t.sampled !== 'f32') return null;
  switch (t.dimension) {
    case '1d': return Types.f32;
    case '2d': return Types.vec2f;
    default: return Types.vec3f;
  }
};

export const BUILTIN_SIGNATURES: Record<BuiltinFunction, BuiltinSignature> = {
  sin: unaryFloat, cos: unaryFloat, tan: unaryFloat,
  asin: unaryFloat, acos: unaryFloat, atan: unaryFloat,
  sinh: unaryFloat, cosh: unaryFloat, tanh: unaryFloat,
  exp: unaryFloat, exp2: unaryFloat, log: unaryFloat, log2: unaryFloat,
  sqrt: unaryFloat, inverseSqrt: unaryFloat,
  floor: unaryFloat, ceil: unaryFloat, round: unaryFloat, fract: unaryFloat, trunc: unaryFloat,
  saturate: unaryFloat, degrees: unaryFloat, radians: unaryFloat,

  abs: {
    arity: 1, expects: 'numeric scalar or vector',
    rule: ([a]) => isNumericScalarOrVector(a) ? a : null,
  },
  sign: {
    arity: 1, expects: 'f32 or i32 scalar or vector',
    rule: ([a]) => isScalarOrVector(a) && (a.scalar === 'f32' || a.scalar === 'i32') ? a : null,
  },

  min: binaryNumeric, max: binaryNumeric,
  pow: binaryFloat, step: binaryFloat, atan2: binaryFloat,

  clamp: {
    arity: 3, expects: 'three matching numeric scalars or vectors',
    rule: (args) => sameAll(args) && isNumericScalarOrVector(args[0]) ? args[0] : null,
  },
  smoothstep: {
    arity: 3, expects: 'three matching f32 scalars or vectors',
    rule: (args) => sameAll(args) && isFloat(args[0]) ? args[0] : null,
  },
  mix: {
    arity: 3, expects: 'two matching f32 values and a matching or f32 factor',
    rule: ([a, b, t]) => {
      if (!typeEquals(a, b) || !isFloat(a)) return null;
      return typeEquals(t, a) || typeEquals(t, Types.f32) ? a : null;
    },
  },

  dot: {
    arity: 2, expects: 'two matching numeric vectors',
    rule: ([a, b]) => a.kind === 'vector' && a.scalar !== 'bool' && typeEquals(a, b) ? scalar(a.scalar) : null,
  },
  length: {
    arity: 1, expects: 'f32 scalar or vector',
    rule: ([a]) => isFloat(a) ? Types.f32 : null,
  },
  distance: {
    arity: 2, expects: 'two matching f32 scalars or vectors',
    rule: ([a, b]) => isFloat(a) && typeEquals(a, b) ? Types.f32 : null,
  },
  normalize: {
    arity: 1, expects: 'f32 vector',
    rule: ([a]) => a.kind === 'vector' && a.scalar === 'f32' ? a : null,
  },
  cross: {
    arity: 2, expects: 'two vec3<f32>',
    rule: ([a, b]) => typeEquals(a, Types.vec3f) && typeEquals(b, Types.vec3f) ? Types.vec3f : null,
  },
  reflect: {
    arity: 2, expects: 'two matching f32 vectors',
    rule: ([a, b]) => a.kind === 'vector' && a.scalar === 'f32' && typeEquals(a, b) ? a : null,
  },

  transpose: {
    arity: 1, expects: 'matrix',
    rule: ([a]) => a.kind === 'matrix' ? matrix(a.rows, a.columns) : null,
  },
  determinant: {
    arity: 1, expects: 'square matrix',
    rule: ([a]) => a.kind === 'matrix' && a.columns === a.rows ? Types.f32 : null,
  },

  textureSample: {
    arity: 3, expects: 'texture<f32>, sampler, coordinates matching the texture dimension',
    fragmentOnly: true,
    rule: ([t, s, c]) => {
      const coords = textureCoords(t);
      return coords && s.kind === 'sampler' && typeEquals(c, coords) ? Types.vec4f : null;
    },
  },
  textureSampleLevel: {
    arity: 4, expects: 'texture<f32>, sampler, coordinates matching the texture dimension, f32 level',
    rule: ([t, s, c, level]) => {
      const coords = textureCoords(t);
      return coords && s.kind === 'sampler' && typeEquals(c, coords) && typeEquals(level, Types.f32) ? Types.vec4f : null;
    },
  },
};

export function inferCall(fn: BuiltinFunction, args: ValueType[]): ValueType {
  const sig = BUILTIN_SIGNATURES[fn];
  if (args.length !== sig.arity) {
    throw typeMismatch(fn, `expects ${sig.arity} arguments`, sig.expects, `${args.length} arguments`);
  }
  const result = sig.rule(args);
  if (!result) {
    throw typeMismatch(fn, 'argument types do not fit', sig.expects, shapes(...args));
  }
  return result;
}

/** Numeric/bool conversion between scalars or equally sized vectors, e.g. `f32(u)`. */
export function inferConversion(target: ValueType, value: ValueType): ValueType {
  const op = `convert ${formatType(target)}`;
  if (target.kind === 'scalar' && value.kind === 'scalar') return target;
  if (target.kind === 'vector' && value.kind === 'vector' && target.size === value.size) return target;
  if (typeEquals(target, value)) return target;
  throw typeMismatch(op, 'conversion needs matching shapes', 'scalar to scalar or vectors of equal size', formatType(value));
}
