/**
 * @file lowering.ts
 * @description Lowers the expression graph of each stage plus a resolved
 * layout into a `ShaderModule`: typed globals, entry functions and structured
 * statements.
 *
 * @external-interactions
 * - Consumes `analyzeStage` results (post-order, use counts, transfers) and the
 *   `ResolvedLayout` from the binding resolver.
 * - Produces the only input the WGSL emitter reads.
 *
 * @pitfalls
 * - Memoization is block scoped. A value first computed inside an `if` arm or a
 *   loop body is invisible after the block closes, so shared values are hoisted
 *   into the enclosing block before the arm or body is lowered.
 * - Constant conditions are lowered as real branches; nothing is folded.
 */
import { ShaderBuilder, Expr, Store, Discard, ExprNode, BranchArm, storageFieldOf } from '../ir/builder';
import { AggregateDescriptor } from '../ir/aggregates';
import { ValueType, StructType, StructField, Types, struct } from '../ir/types';
import { CompileError, InternalConsistencyError, assertConsistent } from '../ir/errors';
import { StageAnalysis, analyzeStage, checkVertexRoot, checkFragmentRoot } from '../ir/analyzer';
import { nodeChildren } from '../ir/utils';
import {
  IRExpr, Statement, IRFunction, FunctionParam, ShaderModule, StructDecl, GlobalDecl,
  ModuleBinding, StructMember, ref,
} from '../ir/module';
import { ResolvedLayout, attributesOf, globalOf } from '../webgpu/binding-resolver';
import {
  ENTRY_POINTS, DEFAULT_WORKGROUP_SIZE, VERTEX_OUTPUT_STRUCT, POSITION_MEMBER, TRANSFER_MEMBER_PREFIX, FRAGMENT_INPUT_PARAM,
  BUILTIN_PARAM_NAMES,
} from '../constants';

export interface ShaderSource {
  /** Clip-space position computed by the vertex stage. */
  vertex?: Expr;
  /** Fragment color, or `DISCARD` for a fragment that never writes. */
  fragment?: Expr | Discard;
  compute?: Store | readonly Store[];
  /** Defaults to every aggregate the expressions read, in first-use order. */
  aggregates?: readonly AggregateDescriptor[];
}

export interface LoweringOptions {
  entryPoints: { vertex: string; fragment: string; compute: string };
  workgroupSize: [number, number, number];
}

export const DEFAULT_LOWERING_OPTIONS: LoweringOptions = {
  entryPoints: { ...ENTRY_POINTS },
  workgroupSize: DEFAULT_WORKGROUP_SIZE,
};

const BUILTIN_PARAMS = {
  vertex_index: { name: BUILTIN_PARAM_NAMES.vertex_index, type: Types.u32 },
  instance_index: { name: BUILTIN_PARAM_NAMES.instance_index, type: Types.u32 },
  global_invocation_id: { name: BUILTIN_PARAM_NAMES.global_invocation_id, type: Types.vec3u },
} as const;

export const transferMember = (slot: number) => `${TRANSFER_MEMBER_PREFIX}${slot}`;

const computeStores = (source: ShaderSource): readonly Store[] =>
  source.compute === undefined ? [] : source.compute instanceof Store ? [source.compute] : source.compute;

/** The builder every root of `source` belongs to. */
export function builderOf(source: ShaderSource): ShaderBuilder {
  const owners: ShaderBuilder[] = [];
  if (source.vertex) owners.push(source.vertex.builder);
  if (source.fragment instanceof Expr) owners.push(source.fragment.builder);
  for (const s of computeStores(source)) owners.push(s.builder);

  const [first] = owners;
  if (!first) {
    throw new CompileError('InvalidDescriptor', 'compile', 'a shader needs a vertex or a compute stage');
  }
  if (owners.some(b => b !== first)) {
    throw new CompileError('StageScopeError', 'compile', 'stage roots were built by different shader builders');
  }
  return first;
}

export interface StageRoots {
  vertex?: StageAnalysis;
  fragment?: StageAnalysis;
  compute?: StageAnalysis;
}

/**
 * Checks the stage roots and analyzes each stage. Everything a user can get
 * wrong surfaces here as a `CompileError`.
 */
export function analyzeSource(builder: ShaderBuilder, source: ShaderSource): StageRoots {
  if (source.fragment !== undefined && !source.vertex) {
    throw new CompileError('InvalidDescriptor', 'compile', 'a fragment stage needs a vertex stage');
  }
  if (!source.vertex && source.compute === undefined) {
    throw new CompileError('InvalidDescriptor', 'compile', 'a shader needs a vertex or a compute stage');
  }

  const roots: StageRoots = {};

  if (source.fragment !== undefined) {
    checkFragmentRoot(builder, source.fragment);
    roots.fragment = analyzeStage(builder, 'fragment', source.fragment instanceof Expr ? [source.fragment.id] : []);
  }
  if (source.vertex) {
    checkVertexRoot(builder, source.vertex);
    roots.vertex = analyzeStage(builder, 'vertex', [source.vertex.id, ...(roots.fragment?.transfers ?? [])]);
  }
  const stores = computeStores(source);
  if (source.compute !== undefined) {
    roots.compute = analyzeStage(builder, 'compute', stores.flatMap(s => [s.target, s.index, s.value]));
  }
  return roots;
}

// ------------------------------------------------------------------
// Module
// ------------------------------------------------------------------

export function lowerModule(
  builder: ShaderBuilder,
  source: ShaderSource,
  roots: StageRoots,
  layout: ResolvedLayout,
  options: LoweringOptions = DEFAULT_LOWERING_OPTIONS,
): ShaderModule {
  const bindings: ModuleBinding[] = layout.bindings.map(slot => ({
    ...slot, visibility: { vertex: false, fragment: false, compute: false },
  }));
  for (const analysis of [roots.vertex, roots.fragment, roots.compute]) {
    if (!analysis) continue;
    for (const g of analysis.globals) {
      const { slot } = globalOf(layout, groupIndexOf(g.aggregate), g.field);
      const target = bindings.find(b => b.group === slot.group && b.binding === slot.binding);
      if (target) target.visibility[analysis.stage] = true;
    }
  }

  const vertexOutput = roots.vertex ? vertexOutputStruct(builder, roots.vertex, roots.fragment) : null;

  const stages: ShaderModule['stages'] = {};
  if (source.vertex && roots.vertex && vertexOutput) {
    stages.vertex = new FunctionLowering(builder, layout, roots.vertex).vertex(options.entryPoints.vertex, source.vertex, vertexOutput);
  }
  if (source.fragment !== undefined && roots.fragment && vertexOutput) {
    stages.fragment = new FunctionLowering(builder, layout, roots.fragment).fragment(options.entryPoints.fragment, source.fragment, vertexOutput);
  }
  if (roots.compute) {
    stages.compute = new FunctionLowering(builder, layout, roots.compute).compute(options.entryPoints.compute, computeStores(source), options.workgroupSize);
  }

  return {
    layout,
    bindings,
    structs: collectStructs(layout, vertexOutput),
    globals: layout.bindings.map(toGlobal),
    stages,
  };
}

function groupIndexOf(desc: AggregateDescriptor): number {
  if (desc.role.kind !== 'group') throw new InternalConsistencyError('lowering', `${desc.name} is not a group`);
  return desc.role.index;
}

function toGlobal(slot: ResolvedLayout['bindings'][number]): GlobalDecl {
  const base = { group: slot.group, binding: slot.binding, name: slot.name, type: slot.type };
  switch (slot.kind) {
    case 'uniform':
      return { ...base, address: { space: 'uniform' } };
    case 'storage':
      return { ...base, address: { space: 'storage', access: slot.access ?? 'read' } };
    default:
      return { ...base, address: { space: 'handle' } };
  }
}

function vertexOutputStruct(builder: ShaderBuilder, vertex: StageAnalysis, fragment?: StageAnalysis): StructType {
  const members: StructField[] = [{ name: POSITION_MEMBER, type: Types.vec4f }];
  (fragment?.transfers ?? []).forEach((id, slot) => {
    assertConsistent(vertex.order.includes(id), 'lowering', `transfer ${slot} is not computed by the vertex stage`);
    members.push({ name: transferMember(slot), type: builder.node(id).type });
  });
  return struct(VERTEX_OUTPUT_STRUCT, members);
}

function collectStructs(layout: ResolvedLayout, vertexOutput: StructType | null): StructDecl[] {
  const out: StructDecl[] = [];
  const seen = new Set<string>();

  const visitUser = (t: ValueType) => {
    if (t.kind === 'array') visitUser(t.element);
    if (t.kind !== 'struct' || seen.has(t.name)) return;
    seen.add(t.name);
    t.fields.forEach(f => visitUser(f.type));
    out.push({ name: t.name, role: { kind: 'user' }, members: t.fields.map(f => ({ name: f.name, type: f.type })) });
  };
  for (const slot of layout.bindings) {
    if (slot.kind === 'storage') visitUser(slot.type);
  }

  for (const g of layout.groups) {
    if (!g.uniform) continue;
    out.push({
      name: g.uniform.struct.name,
      role: { kind: 'group', group: g.group },
      members: g.uniform.struct.fields.map(f => ({ name: f.name, type: f.type })),
    });
  }

  if (vertexOutput) {
    const members: StructMember[] = vertexOutput.fields.map((f, i) => {
      if (i === 0) return { name: f.name, type: f.type, io: { kind: 'builtin', builtin: 'position' } };
      const flat = (f.type.kind === 'scalar' || f.type.kind === 'vector') && f.type.scalar !== 'f32';
      return { name: f.name, type: f.type, io: { kind: 'location', location: i - 1, flat } };
    });
    out.push({ name: vertexOutput.name, role: { kind: 'vertex_output' }, members });
  }
  return out;
}

// ------------------------------------------------------------------
// Functions
// ------------------------------------------------------------------

interface Block {
  statements: Statement[];
  memo: Map<number, IRExpr>;
}

interface FoldFrame {
  acc: string;
  index: string;
  array: IRExpr;
}

class FunctionLowering {
  private blocks: Block[] = [{ statements: [], memo: new Map() }];
  private folds = new Map<number, FoldFrame>();
  private temps = 0;
  private loops = 0;

  constructor(
    private readonly builder: ShaderBuilder,
    private readonly layout: ResolvedLayout,
    private readonly analysis: StageAnalysis,
  ) { }

  // --- Entry functions ---

  vertex(name: string, place: Expr, output: StructType): IRFunction {
    const params: FunctionParam[] = [...this.layout.vertexLayout, ...this.layout.instanceLayout].map(a => ({
      name: a.name, type: a.type, io: { kind: 'location', location: a.location },
    }));
    for (const b of ['vertex_index', 'instance_index'] as const) {
      if (this.analysis.builtins.has(b)) params.push({ ...BUILTIN_PARAMS[b], io: { kind: 'builtin', builtin: b } });
    }

    const values = [this.lower(place.id), ...this.analysis.roots.slice(1).map(id => this.lower(id))];
    this.emit({ kind: 'return', value: { kind: 'construct', type: output, args: values } });
    return { stage: 'vertex', name, params, output: { type: output }, body: this.body };
  }

  fragment(name: string, color: Expr | Discard, input: StructType): IRFunction {
    const params: FunctionParam[] = [{ name: FRAGMENT_INPUT_PARAM, type: input }];
    if (color instanceof Expr) {
      this.emit({ kind: 'return', value: this.lower(color.id) });
    } else {
      this.emit({ kind: 'discard' });
      this.emit({ kind: 'return', value: { kind: 'construct', type: Types.vec4f, args: [] } });
    }
    return {
      stage: 'fragment', name, params,
      output: { type: Types.vec4f, io: { kind: 'location', location: 0 } },
      body: this.body,
    };
  }

  compute(name: string, stores: readonly Store[], workgroupSize: [number, number, number]): IRFunction {
    const params: FunctionParam[] = [];
    if (this.analysis.builtins.has('global_invocation_id')) {
      params.push({ ...BUILTIN_PARAMS.global_invocation_id, io: { kind: 'builtin', builtin: 'global_invocation_id' } });
    }
    for (const s of stores) {
      const target = this.lower(s.target);
      const index = this.lower(s.index);
      const value = this.lower(s.value);
      this.emit({ kind: 'assign', target: { kind: 'index', base: target, index }, value });
    }
    return { stage: 'compute', name, params, workgroupSize, body: this.body };
  }

  // --- Blocks ---

  private get body(): Statement[] {
    return this.blocks[0].statements;
  }

  private get current(): Block {
    return this.blocks[this.blocks.length - 1];
  }

  private emit(s: Statement) {
    this.current.statements.push(s);
  }

  private lookup(id: number): IRExpr | undefined {
    for (let i = this.blocks.length - 1; i >= 0; i--) {
      const hit = this.blocks[i].memo.get(id);
      if (hit) return hit;
    }
    return undefined;
  }

  private withBlock(fn: () => void): Statement[] {
    const block: Block = { statements: [], memo: new Map() };
    this.blocks.push(block);
    fn();
    this.blocks.pop();
    return block.statements;
  }

  private temp(): string {
    return `e${this.temps++}`;
  }

  /**
   * Lowers, in the current block, every node below `root` that `pick` selects
   * and that does not depend on anything local to the block about to open.
   */
  private hoist(root: number, pick: (id: number, node: ExprNode) => boolean) {
    const visited = new Set<number>();
    const visit = (id: number) => {
      if (visited.has(id) || this.lookup(id)) return;
      visited.add(id);
      const node = this.builder.node(id);
      const info = this.builder.infoOf(id);
      const inScope = info.loopVars.every(k => this.folds.has(k));
      if (!info.discards && inScope && pick(id, node)) {
        this.lower(id);
        return;
      }
      nodeChildren(node).forEach(visit);
    };
    visit(root);
  }

  // --- Expressions ---

  private uses(id: number): number {
    return this.analysis.uses.get(id) ?? 0;
  }

  lower(id: number): IRExpr {
    const hit = this.lookup(id);
    if (hit) return hit;

    const node = this.builder.node(id);
    let expr = this.lowerNode(node);
    if (isComputation(node) && this.uses(id) > 1) {
      const name = this.temp();
      this.emit({ kind: 'let', name, type: node.type, value: expr });
      expr = ref(name);
    }
    this.current.memo.set(id, expr);
    return expr;
  }

  private lowerNode(node: ExprNode): IRExpr {
    switch (node.op) {
      case 'literal':
        return { kind: 'literal', type: node.type, value: node.value };

      case 'read_input': {
        const input = node.input;
        if (input.source === 'builtin') {
          if (input.builtin === 'position') return { kind: 'member', base: ref(FRAGMENT_INPUT_PARAM), member: POSITION_MEMBER };
          return ref(BUILTIN_PARAMS[input.builtin].name);
        }
        const attrs = attributesOf(this.layout, input.aggregate.name, input.field);
        if (attrs.length === 1) return ref(attrs[0].name);
        return { kind: 'construct', type: node.type, args: attrs.map(a => ref(a.name)) };
      }

      case 'read_global': {
        const { slot, member } = globalOf(this.layout, groupIndexOf(node.aggregate), node.field.name);
        return member ? { kind: 'member', base: ref(slot.name), member } : ref(slot.name);
      }

      case 'construct':
        return { kind: 'construct', type: node.type, args: node.args.map(a => this.lower(a)) };

      case 'compose':
        return this.lowerCompose(node);

      case 'dynamic_index':
        return { kind: 'index', base: this.lower(node.base), index: this.lower(node.index) };

      case 'stage_transfer': {
        const slot = this.analysis.transfers.indexOf(node.value);
        assertConsistent(this.analysis.stage === 'fragment' && slot >= 0, 'lowering', 'stage transfer outside of the fragment stage');
        return { kind: 'member', base: ref(FRAGMENT_INPUT_PARAM), member: transferMember(slot) };
      }

      case 'binary':
        return { kind: 'binary', op: node.operator, lhs: this.lower(node.lhs), rhs: this.lower(node.rhs) };

      case 'unary':
        return { kind: 'unary', op: node.operator, operand: this.lower(node.operand) };

      case 'call':
        return { kind: 'call', fn: node.fn, args: node.args.map(a => this.lower(a)) };

      case 'branch':
        return this.lowerBranch(node);

      case 'loop':
        return this.lowerLoop(node);

      case 'loop_var':
        return this.lowerPlaceholder(node);
    }
  }

  private lowerCompose(node: Extract<ExprNode, { op: 'compose' }>): IRExpr {
    const base = this.lower(node.base);
    const a = node.access;
    switch (a.kind) {
      case 'swizzle': return { kind: 'swizzle', base, components: a.components };
      case 'member': return { kind: 'member', base, member: a.name };
      case 'index': return { kind: 'index', base, index: a.index };
    }
  }

  private lowerPlaceholder(node: Extract<ExprNode, { op: 'loop_var' }>): IRExpr {
    const frame = this.folds.get(node.fold);
    assertConsistent(frame !== undefined, 'lowering', `loop placeholder of fold ${node.fold} outside its loop`);
    switch (node.role) {
      case 'accumulator': return ref(frame.acc);
      case 'index': return ref(frame.index);
      case 'element': return { kind: 'index', base: frame.array, index: ref(frame.index) };
    }
  }

  private lowerBranch(node: Extract<ExprNode, { op: 'branch' }>): IRExpr {
    const cond = this.lower(node.cond);
    // Anything shared must outlive the arm that reaches it first.
    const shared = (id: number, n: ExprNode) =>
      (isComputation(n) || n.op === 'branch' || n.op === 'loop') && this.uses(id) > 1;
    for (const arm of [node.then, node.else]) {
      if (arm !== 'discard') this.hoist(arm, shared);
    }

    const name = this.temp();
    this.emit({ kind: 'var', name, type: node.type });
    const lowerArm = (a: BranchArm) => this.withBlock(() => {
      if (a === 'discard') {
        this.emit({ kind: 'discard' });
      } else {
        this.emit({ kind: 'assign', target: ref(name), value: this.lower(a) });
      }
    });
    const thenBody = lowerArm(node.then);
    const elseBody = lowerArm(node.else);
    this.emit({ kind: 'if', cond, then: thenBody, else: elseBody });
    return ref(name);
  }

  private lowerLoop(node: Extract<ExprNode, { op: 'loop' }>): IRExpr {
    const arrayNode = this.builder.node(node.array);
    const field = storageFieldOf(arrayNode);
    if (!field || arrayNode.op !== 'read_global') {
      throw new InternalConsistencyError('lowering', 'fold over a value that is not a storage field');
    }
    const group = groupIndexOf(arrayNode.aggregate);
    const length = globalOf(this.layout, group, field.length);
    assertConsistent(length.member !== undefined, 'lowering', `length field ${field.length} is not a uniform member`);

    const init = this.lower(node.init);
    const array = this.lower(node.array);
    // Shared values and control flow that do not read this loop's placeholders run once, before it.
    this.hoist(node.body, (id, n) => n.op === 'branch' || n.op === 'loop' || (isComputation(n) && this.uses(id) > 1));

    const name = this.temp();
    const index = `i${this.loops++}`;
    this.emit({ kind: 'var', name, type: node.type, value: init });

    this.folds.set(node.fold, { acc: name, index, array });
    const body = this.withBlock(() => {
      this.emit({ kind: 'assign', target: ref(name), value: this.lower(node.body) });
    });
    this.folds.delete(node.fold);

    const bound: IRExpr = {
      kind: 'call', fn: 'min', args: [
        { kind: 'member', base: ref(length.slot.name), member: length.member },
        { kind: 'literal', type: Types.u32, value: field.capacity },
      ],
    };
    this.emit({ kind: 'loop', index, bound, body });
    return ref(name);
  }
}

/**
 * Nodes that compute something and may be bound to a `let` when shared.
 * Reads, literals, placeholders and transfers are always re-spelled in place;
 * branches and loops bind themselves to a `var`.
 */
function isComputation(node: ExprNode): boolean {
  switch (node.op) {
    case 'construct':
    case 'compose':
    case 'dynamic_index':
    case 'binary':
    case 'unary':
    case 'call':
      return true;
    case 'read_input':
      return node.type.kind === 'matrix';
    default:
      return false;
  }
}
