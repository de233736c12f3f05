/**
 * @file builder.ts
 * @description Arena-backed expression builder. Every operation validates its
 * operands through the type rules in `signatures.ts`, appends one node and
 * returns an immutable `Expr` handle to it.
 *
 * @external-interactions
 * - `compile()` walks the arena from the stage roots; the arena itself is never
 *   mutated after a node is appended.
 * - Handles remember their builder, so expressions from two builders cannot be
 *   mixed.
 *
 * @pitfalls
 * - Stage scope is tracked per node and checked as soon as two values are
 *   combined. A vertex value reaches the fragment stage only through `fragment()`.
 * - Loop placeholders handed to a `fold` body are only valid inside that body.
 */
import {
  ValueType, ScalarKind, ScalarType, VectorType, MatrixType, VectorSize,
  Types, scalar, vector, formatType, typeEquals, isScalarOrVector, isBool, scalarKindOf,
} from './types';
import {
  BinaryOperator, UnaryOperator, BuiltinFunction, BUILTIN_SIGNATURES,
  inferBinary, inferUnary, inferConstruct, inferSwizzle, inferIndex, inferCall, inferConversion,
} from './signatures';
import { AggregateDescriptor, AggregateField, StorageField, findField, roleLabel } from './aggregates';
import { CompileError, typeMismatch } from './errors';

// ------------------------------------------------------------------
// Nodes
// ------------------------------------------------------------------

export type StageScope = 'any' | 'vertex' | 'fragment' | 'compute';

export type BuiltinInput = 'vertex_index' | 'instance_index' | 'global_invocation_id' | 'position';

export interface ExprInfo {
  scope: StageScope;
  /** Some path through this value executes `discard`. */
  discards: boolean;
  /** Folds whose placeholders this value depends on. */
  loopVars: readonly number[];
}

export type InputSource =
  | { source: 'attribute'; aggregate: AggregateDescriptor; field: string }
  | { source: 'builtin'; builtin: BuiltinInput };

export type ComposeAccess =
  | { kind: 'swizzle'; components: string }
  | { kind: 'index'; index: number }
  | { kind: 'member'; name: string };

export type BranchArm = number | 'discard';

export type LoopRole = 'accumulator' | 'element' | 'index';

export type ExprNode =
  | { op: 'literal'; type: ScalarType; value: number | boolean }
  | { op: 'read_input'; type: ValueType; input: InputSource }
  | { op: 'read_global'; type: ValueType; aggregate: AggregateDescriptor; field: AggregateField }
  | { op: 'construct'; type: ValueType; args: number[] }
  | { op: 'compose'; type: ValueType; base: number; access: ComposeAccess }
  | { op: 'dynamic_index'; type: ValueType; base: number; index: number }
  | { op: 'stage_transfer'; type: ValueType; value: number }
  | { op: 'binary'; type: ValueType; operator: BinaryOperator; lhs: number; rhs: number }
  | { op: 'unary'; type: ValueType; operator: UnaryOperator; operand: number }
  | { op: 'call'; type: ValueType; fn: BuiltinFunction; args: number[] }
  | { op: 'branch'; type: ValueType; cond: number; then: BranchArm; else: BranchArm }
  | { op: 'loop'; type: ValueType; fold: number; array: number; init: number; body: number }
  | { op: 'loop_var'; type: ValueType; fold: number; role: LoopRole };

/** Terminal marker for a fragment that produces no color. */
export const DISCARD = Object.freeze({ kind: 'discard' as const });
export type Discard = typeof DISCARD;

export type Operand = Expr | number | boolean;
export type ArmOperand = Operand | Discard;

const isDiscard = (v: ArmOperand): v is Discard => typeof v === 'object' && !(v instanceof Expr);

/**
 * Handle to a node in a builder's arena. Handles are cheap, immutable and may
 * be reused freely; reuse shares the node.
 */
export class Expr {
  constructor(
    public readonly builder: ShaderBuilder,
    public readonly id: number,
    public readonly type: ValueType,
    public readonly info: ExprInfo,
  ) { }

  add(rhs: Operand): Expr { return this.builder.add(this, rhs); }
  sub(rhs: Operand): Expr { return this.builder.sub(this, rhs); }
  mul(rhs: Operand): Expr { return this.builder.mul(this, rhs); }
  div(rhs: Operand): Expr { return this.builder.div(this, rhs); }
  neg(): Expr { return this.builder.neg(this); }

  get x(): Expr { return this.builder.swizzle(this, 'x'); }
  get y(): Expr { return this.builder.swizzle(this, 'y'); }
  get z(): Expr { return this.builder.swizzle(this, 'z'); }
  get w(): Expr { return this.builder.swizzle(this, 'w'); }
  swizzle(components: string): Expr { return this.builder.swizzle(this, components); }
  at(index: Operand): Expr { return this.builder.index(this, index); }
}

/** A compute-stage write into a `read_write` storage field. */
export class Store {
  constructor(
    public readonly builder: ShaderBuilder,
    public readonly target: number,
    public readonly index: number,
    public readonly value: number,
    public readonly info: ExprInfo,
  ) { }
}

// ------------------------------------------------------------------
// Builder
// ------------------------------------------------------------------

const I32_MIN = -2147483648;
const I32_MAX = 2147483647;
const U32_MAX = 4294967295;
const F32_MAX = 3.4028234663852886e38;

const ANY: ExprInfo = Object.freeze({ scope: 'any', discards: false, loopVars: [] });

export function mapFields<K extends string, V>(keys: readonly K[], fn: (key: K) => V): Record<K, V> {
  return keys.reduce((acc, key) => {
    acc[key] = fn(key);
    return acc;
  }, {} as Record<K, V>);
}

export class ShaderBuilder {
  private readonly arena: ExprNode[] = [];
  private readonly infos: ExprInfo[] = [];
  private readonly reads = new Map<string, Expr>();
  private readonly descriptors: AggregateDescriptor[] = [];
  private readonly closedFolds = new Set<number>();
  private nextFold = 0;

  get size(): number {
    return this.arena.length;
  }

  node(id: number): ExprNode {
    const n = this.arena[id];
    if (!n) throw new CompileError('StageScopeError', 'node', `node ${id} does not belong to this builder`);
    return n;
  }

  infoOf(id: number): ExprInfo {
    return this.infos[id] ?? ANY;
  }

  /** Aggregates read so far, in first-use order. */
  get aggregates(): readonly AggregateDescriptor[] {
    return this.descriptors;
  }

  get discard(): Discard {
    return DISCARD;
  }

  private push(node: ExprNode, info: ExprInfo): Expr {
    const id = this.arena.length;
    this.arena.push(node);
    this.infos.push(info);
    return new Expr(this, id, node.type, info);
  }

  // ------------------------------------------------------------------
  // Scope tracking
  // ------------------------------------------------------------------

  private combine(op: string, parts: readonly ExprInfo[], own: StageScope = 'any'): ExprInfo {
    const scopes = new Set<StageScope>();
    if (own !== 'any') scopes.add(own);
    const loopVars = new Set<number>();
    let discards = false;

    for (const p of parts) {
      if (p.scope !== 'any') scopes.add(p.scope);
      discards ||= p.discards;
      for (const k of p.loopVars) {
        if (this.closedFolds.has(k)) {
          throw new CompileError('StageScopeError', op, 'loop placeholder used outside of its fold body');
        }
        loopVars.add(k);
      }
    }

    if (discards && (scopes.has('vertex') || scopes.has('compute'))) {
      throw new CompileError('StageViolation', op, 'discard is only allowed in the fragment stage', {
        actual: [...scopes].join(', '),
      });
    }
    if (scopes.size > 1) {
      throw new CompileError('StageScopeError', op, 'values from different stages cannot be combined', {
        expected: 'values of a single stage (wrap vertex values with fragment())',
        actual: [...scopes].sort().join(', '),
      });
    }

    const [scope = 'any'] = scopes;
    return { scope, discards, loopVars: [...loopVars].sort((a, b) => a - b) };
  }

  private own(op: string, e: Expr): Expr {
    if (e.builder !== this) {
      throw new CompileError('StageScopeError', op, 'value belongs to a different shader builder');
    }
    return e;
  }

  private lift(op: string, v: Operand, hint?: ScalarKind): Expr {
    if (v instanceof Expr) return this.own(op, v);
    if (typeof v === 'boolean') return this.literal(v, 'bool');
    return this.literal(v, hint === 'i32' || hint === 'u32' ? hint : 'f32');
  }

  private liftPair(op: string, a: Operand, b: Operand): [Expr, Expr] {
    if (a instanceof Expr) {
      const lhs = this.own(op, a);
      return [lhs, this.lift(op, b, hintOf(lhs.type))];
    }
    const rhs = this.lift(op, b);
    return [this.lift(op, a, hintOf(rhs.type)), rhs];
  }

  // ------------------------------------------------------------------
  // Literals
  // ------------------------------------------------------------------

  literal(value: number | boolean, kind: ScalarKind = typeof value === 'boolean' ? 'bool' : 'f32'): Expr {
    const op = `literal ${kind}`;
    if (kind === 'bool') {
      if (typeof value !== 'boolean') throw typeMismatch(op, 'bool literal needs a boolean', 'boolean', String(value));
    } else {
      if (typeof value !== 'number') throw typeMismatch(op, 'numeric literal needs a number', 'number', String(value));
      if (!Number.isFinite(value)) throw typeMismatch(op, 'literal must be finite', 'finite number', String(value));
      if (kind === 'f32' && Math.abs(value) > F32_MAX) {
        throw typeMismatch(op, 'literal out of f32 range', `|x| <= ${F32_MAX}`, String(value));
      }
      if (kind === 'i32' && !(Number.isInteger(value) && value >= I32_MIN && value <= I32_MAX)) {
        throw typeMismatch(op, 'literal is not a valid i32', `integer in ${I32_MIN}..${I32_MAX}`, String(value));
      }
      if (kind === 'u32' && !(Number.isInteger(value) && value >= 0 && value <= U32_MAX)) {
        throw typeMismatch(op, 'literal is not a valid u32', `integer in 0..${U32_MAX}`, String(value));
      }
    }
    return this.push({ op: 'literal', type: scalar(kind), value }, ANY);
  }

  f32(value: number): Expr { return this.literal(value, 'f32'); }
  i32(value: number): Expr { return this.literal(value, 'i32'); }
  u32(value: number): Expr { return this.literal(value, 'u32'); }
  bool(value: boolean): Expr { return this.literal(value, 'bool'); }

  // ------------------------------------------------------------------
  // Inputs & Globals
  // ------------------------------------------------------------------

  private remember(desc: AggregateDescriptor) {
    if (!this.descriptors.includes(desc)) this.descriptors.push(desc);
  }

  private cached(key: string, make: () => Expr): Expr {
    const hit = this.reads.get(key);
    if (hit) return hit;
    const e = make();
    this.reads.set(key, e);
    return e;
  }

  private attributeRead(desc: AggregateDescriptor, role: 'vertex' | 'instance', name: string): Expr {
    const op = `read ${desc.name}.${name}`;
    if (desc.role.kind !== role) {
      throw new CompileError('InvalidDescriptor', op, `aggregate is declared as ${roleLabel(desc.role)}`, { expected: role });
    }
    const field = findField(desc, name);
    if (!field || field.class !== 'attribute') {
      throw new CompileError('InvalidDescriptor', op, `no attribute '${name}' in ${desc.name}`);
    }
    this.remember(desc);
    return this.cached(`${role}:${desc.name}:${name}`, () => this.push(
      { op: 'read_input', type: field.type, input: { source: 'attribute', aggregate: desc, field: name } },
      { scope: 'vertex', discards: false, loopVars: [] },
    ));
  }

  readVertexField(desc: AggregateDescriptor, name: string): Expr {
    return this.attributeRead(desc, 'vertex', name);
  }

  readInstanceField(desc: AggregateDescriptor, name: string): Expr {
    return this.attributeRead(desc, 'instance', name);
  }

  inVertex<K extends string>(desc: AggregateDescriptor<K>): Record<K, Expr> {
    return mapFields(desc.keys, k => this.readVertexField(desc, k));
  }

  inInstance<K extends string>(desc: AggregateDescriptor<K>): Record<K, Expr> {
    return mapFields(desc.keys, k => this.readInstanceField(desc, k));
  }

  readGroupField(desc: AggregateDescriptor, name: string): Expr {
    const op = `read ${desc.name}.${name}`;
    if (desc.role.kind !== 'group') {
      throw new CompileError('InvalidDescriptor', op, `aggregate is declared as ${roleLabel(desc.role)}`, { expected: 'group' });
    }
    const field = findField(desc, name);
    if (!field || field.class === 'attribute') {
      throw new CompileError('InvalidDescriptor', op, `no resource '${name}' in ${desc.name}`);
    }
    this.remember(desc);
    return this.cached(`group:${desc.name}:${name}`, () =>
      this.push({ op: 'read_global', type: field.type, aggregate: desc, field }, ANY));
  }

  group<K extends string>(desc: AggregateDescriptor<K>): Record<K, Expr> {
    return mapFields(desc.keys, k => this.readGroupField(desc, k));
  }

  private builtin(builtin: BuiltinInput, type: ValueType, scope: StageScope): Expr {
    return this.cached(`builtin:${builtin}`, () =>
      this.push({ op: 'read_input', type, input: { source: 'builtin', builtin } }, { scope, discards: false, loopVars: [] }));
  }

  vertexIndex(): Expr { return this.builtin('vertex_index', Types.u32, 'vertex'); }
  instanceIndex(): Expr { return this.builtin('instance_index', Types.u32, 'vertex'); }
  globalInvocationId(): Expr { return this.builtin('global_invocation_id', Types.vec3u, 'compute'); }
  fragCoord(): Expr { return this.builtin('position', Types.vec4f, 'fragment'); }

  // ------------------------------------------------------------------
  // Construction
  // ------------------------------------------------------------------

  construct(target: ValueType, ...args: Operand[]): Expr {
    const op = `construct ${formatType(target)}`;
    const hint = target.kind === 'scalar' || target.kind === 'vector' ? target.scalar : 'f32';
    const lifted = args.map(a => this.lift(op, a, hint));
    const type = inferConstruct(target, lifted.map(e => e.type));
    return this.push(
      { op: 'construct', type, args: lifted.map(e => e.id) },
      this.combine(op, lifted.map(e => e.info)),
    );
  }

  constructVector(type: VectorType, ...args: Operand[]): Expr {
    return this.construct(type, ...args);
  }

  constructMatrix(type: MatrixType, ...args: Operand[]): Expr {
    return this.construct(type, ...args);
  }

  private vectorOf(size: VectorSize, args: Operand[]): Expr {
    const first = args.find((a): a is Expr => a instanceof Expr);
    const kind = first && isScalarOrVector(first.type) ? first.type.scalar : 'f32';
    return this.construct(vector(size, kind), ...args);
  }

  vec2(...args: Operand[]): Expr { return this.vectorOf(2, args); }
  vec3(...args: Operand[]): Expr { return this.vectorOf(3, args); }
  vec4(...args: Operand[]): Expr { return this.vectorOf(4, args); }

  splat(value: Operand, size: VectorSize): Expr {
    const v = this.lift('splat', value);
    if (v.type.kind !== 'scalar') {
      throw typeMismatch('splat', 'only scalars can be splatted', 'scalar', formatType(v.type));
    }
    return this.construct(vector(size, v.type.scalar), v);
  }

  zero(type: ValueType): Expr {
    return this.construct(type);
  }

  /** Joins two values into a four-component vector, e.g. vec2 + vec2. */
  concat(a: Operand, b: Operand): Expr {
    return this.vectorOf(4, [a, b]);
  }

  vec3With(xy: Operand, z: Operand): Expr { return this.vectorOf(3, [xy, z]); }
  vec4With(xyz: Operand, w: Operand): Expr { return this.vectorOf(4, [xyz, w]); }

  convert(target: ValueType, value: Operand): Expr {
    const v = this.lift(`convert ${formatType(target)}`, value);
    const type = inferConversion(target, v.type);
    if (typeEquals(type, v.type)) return v;
    return this.push({ op: 'construct', type, args: [v.id] }, v.info);
  }

  // ------------------------------------------------------------------
  // Access
  // ------------------------------------------------------------------

  swizzle(base: Expr, components: string): Expr {
    const b = this.own(`swizzle .${components}`, base);
    const type = inferSwizzle(b.type, components);
    return this.push({ op: 'compose', type, base: b.id, access: { kind: 'swizzle', components } }, b.info);
  }

  x(v: Expr): Expr { return this.swizzle(v, 'x'); }
  y(v: Expr): Expr { return this.swizzle(v, 'y'); }
  z(v: Expr): Expr { return this.swizzle(v, 'z'); }
  w(v: Expr): Expr { return this.swizzle(v, 'w'); }

  index(base: Expr, index: Operand): Expr {
    const b = this.own('index', base);
    if (typeof index === 'number') {
      const type = inferIndex(b.type, Types.u32, index);
      if (!Number.isInteger(index)) throw typeMismatch('index', 'index must be an integer', 'integer', String(index));
      return this.push({ op: 'compose', type, base: b.id, access: { kind: 'index', index } }, b.info);
    }
    const i = this.lift('index', index, 'u32');
    const type = inferIndex(b.type, i.type);
    return this.push({ op: 'dynamic_index', type, base: b.id, index: i.id }, this.combine('index', [b.info, i.info]));
  }

  member(base: Expr, name: string): Expr {
    const b = this.own(`member .${name}`, base);
    if (b.type.kind !== 'struct') {
      throw typeMismatch(`member .${name}`, 'only structs have members', 'struct', formatType(b.type));
    }
    const field = b.type.fields.find(f => f.name === name);
    if (!field) throw typeMismatch(`member .${name}`, `no member '${name}'`, b.type.fields.map(f => f.name).join(', '), name);
    return this.push({ op: 'compose', type: field.type, base: b.id, access: { kind: 'member', name } }, b.info);
  }

  // ------------------------------------------------------------------
  // Arithmetic & Logic
  // ------------------------------------------------------------------

  binary(operator: BinaryOperator, a: Operand, b: Operand): Expr {
    const [lhs, rhs] = this.liftPair(operator, a, b);
    const type = inferBinary(operator, lhs.type, rhs.type);
    return this.push(
      { op: 'binary', type, operator, lhs: lhs.id, rhs: rhs.id },
      this.combine(operator, [lhs.info, rhs.info]),
    );
  }

  add(a: Operand, b: Operand): Expr { return this.binary('add', a, b); }
  sub(a: Operand, b: Operand): Expr { return this.binary('sub', a, b); }
  mul(a: Operand, b: Operand): Expr { return this.binary('mul', a, b); }
  div(a: Operand, b: Operand): Expr { return this.binary('div', a, b); }
  rem(a: Operand, b: Operand): Expr { return this.binary('rem', a, b); }
  eq(a: Operand, b: Operand): Expr { return this.binary('eq', a, b); }
  ne(a: Operand, b: Operand): Expr { return this.binary('ne', a, b); }
  lt(a: Operand, b: Operand): Expr { return this.binary('lt', a, b); }
  le(a: Operand, b: Operand): Expr { return this.binary('le', a, b); }
  gt(a: Operand, b: Operand): Expr { return this.binary('gt', a, b); }
  ge(a: Operand, b: Operand): Expr { return this.binary('ge', a, b); }
  and(a: Operand, b: Operand): Expr { return this.binary('and', a, b); }
  or(a: Operand, b: Operand): Expr { return this.binary('or', a, b); }

  unary(operator: UnaryOperator, value: Operand): Expr {
    const v = this.lift(operator, value);
    const type = inferUnary(operator, v.type);
    return this.push({ op: 'unary', type, operator, operand: v.id }, v.info);
  }

  neg(v: Operand): Expr { return this.unary('neg', v); }
  not(v: Operand): Expr { return this.unary('not', v); }

  // ------------------------------------------------------------------
  // Builtin Calls
  // ------------------------------------------------------------------

  call(fn: BuiltinFunction, ...args: Operand[]): Expr {
    const first = args.find((a): a is Expr => a instanceof Expr);
    const hint = first ? hintOf(first.type) : undefined;
    const lifted = args.map(a => this.lift(fn, a, hint));
    const type = inferCall(fn, lifted.map(e => e.type));
    const own = BUILTIN_SIGNATURES[fn].fragmentOnly ? 'fragment' : 'any';
    return this.push(
      { op: 'call', type, fn, args: lifted.map(e => e.id) },
      this.combine(fn, lifted.map(e => e.info), own),
    );
  }

  sin(x: Operand): Expr { return this.call('sin', x); }
  cos(x: Operand): Expr { return this.call('cos', x); }
  tan(x: Operand): Expr { return this.call('tan', x); }
  asin(x: Operand): Expr { return this.call('asin', x); }
  acos(x: Operand): Expr { return this.call('acos', x); }
  atan(x: Operand): Expr { return this.call('atan', x); }
  sinh(x: Operand): Expr { return this.call('sinh', x); }
  cosh(x: Operand): Expr { return this.call('cosh', x); }
  tanh(x: Operand): Expr { return this.call('tanh', x); }
  exp(x: Operand): Expr { return this.call('exp', x); }
  exp2(x: Operand): Expr { return this.call('exp2', x); }
  log(x: Operand): Expr { return this.call('log', x); }
  log2(x: Operand): Expr { return this.call('log2', x); }
  sqrt(x: Operand): Expr { return this.call('sqrt', x); }
  inverseSqrt(x: Operand): Expr { return this.call('inverseSqrt', x); }
  floor(x: Operand): Expr { return this.call('floor', x); }
  ceil(x: Operand): Expr { return this.call('ceil', x); }
  round(x: Operand): Expr { return this.call('round', x); }
  fract(x: Operand): Expr { return this.call('fract', x); }
  trunc(x: Operand): Expr { return this.call('trunc', x); }
  saturate(x: Operand): Expr { return this.call('saturate', x); }
  degrees(x: Operand): Expr { return this.call('degrees', x); }
  radians(x: Operand): Expr { return this.call('radians', x); }
  abs(x: Operand): Expr { return this.call('abs', x); }
  sign(x: Operand): Expr { return this.call('sign', x); }
  min(a: Operand, b: Operand): Expr { return this.call('min', a, b); }
  max(a: Operand, b: Operand): Expr { return this.call('max', a, b); }
  pow(a: Operand, b: Operand): Expr { return this.call('pow', a, b); }
  step(edge: Operand, x: Operand): Expr { return this.call('step', edge, x); }
  atan2(y: Operand, x: Operand): Expr { return this.call('atan2', y, x); }
  clamp(x: Operand, lo: Operand, hi: Operand): Expr { return this.call('clamp', x, lo, hi); }
  smoothstep(lo: Operand, hi: Operand, x: Operand): Expr { return this.call('smoothstep', lo, hi, x); }
  mix(a: Operand, b: Operand, t: Operand): Expr { return this.call('mix', a, b, t); }
  dot(a: Operand, b: Operand): Expr { return this.call('dot', a, b); }
  length(v: Operand): Expr { return this.call('length', v); }
  distance(a: Operand, b: Operand): Expr { return this.call('distance', a, b); }
  normalize(v: Operand): Expr { return this.call('normalize', v); }
  cross(a: Operand, b: Operand): Expr { return this.call('cross', a, b); }
  reflect(v: Operand, n: Operand): Expr { return this.call('reflect', v, n); }
  transpose(m: Operand): Expr { return this.call('transpose', m); }
  determinant(m: Operand): Expr { return this.call('determinant', m); }

  textureSample(texture: Expr, sampler: Expr, coords: Operand): Expr {
    return this.call('textureSample', texture, sampler, coords);
  }

  textureSampleLevel(texture: Expr, sampler: Expr, coords: Operand, level: Operand): Expr {
    return this.call('textureSampleLevel', texture, sampler, coords, level);
  }

  // ------------------------------------------------------------------
  // Stage Transfer
  // ------------------------------------------------------------------

  /** Computes `value` in the vertex stage and interpolates it into the fragment stage. */
  fragment(value: Operand): Expr {
    const op = 'fragment';
    const v = this.lift(op, value);
    if (v.info.scope === 'fragment' || v.info.scope === 'compute') {
      throw new CompileError('StageScopeError', op, 'only vertex values can be transferred', { expected: 'vertex', actual: v.info.scope });
    }
    if (v.info.discards) {
      throw new CompileError('StageViolation', op, 'a transferred value cannot discard');
    }
    if (v.info.loopVars.length > 0) {
      throw new CompileError('StageScopeError', op, 'loop placeholders cannot be transferred');
    }
    if (!isScalarOrVector(v.type) || isBool(v.type)) {
      throw typeMismatch(op, 'only numeric scalars and vectors can be interpolated', 'f32/i32/u32 scalar or vector', formatType(v.type));
    }
    this.combine(op, [v.info]);
    return this.push({ op: 'stage_transfer', type: v.type, value: v.id }, { scope: 'fragment', discards: false, loopVars: [] });
  }

  // ------------------------------------------------------------------
  // Control Flow
  // ------------------------------------------------------------------

  branch(cond: Operand, then: ArmOperand, otherwise: ArmOperand): Expr {
    const op = 'branch';
    const c = this.lift(op, cond);
    if (!typeEquals(c.type, Types.bool)) {
      throw typeMismatch(op, 'condition must be a bool', 'bool', formatType(c.type));
    }

    let thenArm: Expr | null = null;
    let elseArm: Expr | null = null;
    if (!isDiscard(then) && !isDiscard(otherwise)) {
      [thenArm, elseArm] = this.liftPair(op, then, otherwise);
    } else if (!isDiscard(then)) {
      thenArm = this.lift(op, then);
    } else if (!isDiscard(otherwise)) {
      elseArm = this.lift(op, otherwise);
    } else {
      throw typeMismatch(op, 'both arms discard, so the branch has no value', 'at least one value arm', 'discard, discard');
    }

    if (thenArm && elseArm && !typeEquals(thenArm.type, elseArm.type)) {
      throw typeMismatch(op, 'arms must have the same type', formatType(thenArm.type), formatType(elseArm.type));
    }
    const valueArm = thenArm ?? elseArm;
    if (!valueArm) throw typeMismatch(op, 'branch has no value arm');

    const parts = [c.info, ...[thenArm, elseArm].flatMap(a => a ? [a.info] : [])];
    if (!thenArm || !elseArm) parts.push({ scope: 'any', discards: true, loopVars: [] });

    return this.push(
      { op: 'branch', type: valueArm.type, cond: c.id, then: thenArm ? thenArm.id : 'discard', else: elseArm ? elseArm.id : 'discard' },
      this.combine(op, parts),
    );
  }

  /** `value`, unless `cond` holds, in which case the fragment is discarded. */
  discardIf(cond: Operand, value: Operand): Expr {
    return this.branch(cond, DISCARD, value);
  }

  when(cond: Operand, value: ArmOperand): WhenChain {
    return new WhenChain(this, [{ cond, value }]);
  }

  /**
   * Folds over the valid elements of a storage field. The loop runs
   * `min(length, capacity)` times, reading the length from the field's paired
   * uniform member.
   */
  fold(array: Expr, init: Operand, body: (acc: Expr, element: Expr, index: Expr) => Operand): Expr {
    const op = 'fold';
    const arr = this.own(op, array);
    const target = storageFieldOf(this.node(arr.id));
    if (!target) {
      throw typeMismatch(op, 'fold iterates over a storage field of a group', 'storage(...) field', formatType(arr.type));
    }
    const start = this.lift(op, init);

    const k = this.nextFold++;
    const placeholder = (role: LoopRole, type: ValueType) =>
      this.push({ op: 'loop_var', type, fold: k, role }, { scope: 'any', discards: false, loopVars: [k] });

    const acc = placeholder('accumulator', start.type);
    const element = placeholder('element', target.type.element);
    const index = placeholder('index', Types.u32);

    const next = this.lift(op, body(acc, element, index), hintOf(start.type));
    this.closedFolds.add(k);
    if (!typeEquals(next.type, start.type)) {
      throw typeMismatch(op, 'fold body must return the accumulator type', formatType(start.type), formatType(next.type));
    }

    const bodyInfo: ExprInfo = { ...next.info, loopVars: next.info.loopVars.filter(v => v !== k) };
    return this.push(
      { op: 'loop', type: start.type, fold: k, array: arr.id, init: start.id, body: next.id },
      this.combine(op, [arr.info, start.info, bodyInfo]),
    );
  }

  /** Writes `value` into `target[index]` from the compute stage. */
  store(target: Expr, index: Operand, value: Operand): Store {
    const op = 'store';
    const t = this.own(op, target);
    const field = storageFieldOf(this.node(t.id));
    if (!field) {
      throw typeMismatch(op, 'stores target a storage field of a group', 'storage(...) field', formatType(t.type));
    }
    if (field.access !== 'read_write') {
      throw new CompileError('StageViolation', op, `storage field '${field.name}' is read-only`, { expected: 'read_write', actual: field.access });
    }
    const i = this.lift(op, index, 'u32');
    inferIndex(t.type, i.type);
    const v = this.lift(op, value, hintOf(field.type.element));
    if (!typeEquals(v.type, field.type.element)) {
      throw typeMismatch(op, 'value does not match the element type', formatType(field.type.element), formatType(v.type));
    }
    const info = this.combine(op, [t.info, i.info, v.info], 'compute');
    if (info.loopVars.length > 0) {
      throw new CompileError('StageScopeError', op, 'loop placeholder used outside of its fold body');
    }
    return new Store(this, t.id, i.id, v.id, info);
  }
}

export class WhenChain {
  constructor(
    private readonly builder: ShaderBuilder,
    private readonly cases: readonly { cond: Operand; value: ArmOperand }[],
  ) { }

  when(cond: Operand, value: ArmOperand): WhenChain {
    return new WhenChain(this.builder, [...this.cases, { cond, value }]);
  }

  /** Builds nested branches, first matching case wins. */
  otherwise(fallback: ArmOperand): Expr {
    let result: ArmOperand = fallback;
    for (let i = this.cases.length - 1; i >= 0; i--) {
      result = this.builder.branch(this.cases[i].cond, this.cases[i].value, result);
    }
    if (!(result instanceof Expr)) {
      throw typeMismatch('when', 'chain has no cases', 'at least one when()', 'none');
    }
    return result;
  }
}

function hintOf(t: ValueType): ScalarKind | undefined {
  return scalarKindOf(t) ?? undefined;
}

export function storageFieldOf(node: ExprNode): StorageField | null {
  if (node.op === 'read_global' && node.field.class === 'storage') return node.field;
  return null;
}
