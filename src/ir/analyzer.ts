import { ShaderBuilder, Expr, Discard, BuiltinInput, ExprInfo, storageFieldOf } from './builder';
import { AggregateDescriptor } from './aggregates';
import { Stage } from './module';
import { CompileError, typeMismatch } from './errors';
import { Types, typeEquals, formatType } from './types';
import { postOrder, useCounts } from './utils';

export interface GlobalRead {
  aggregate: AggregateDescriptor;
  field: string;
}

export interface StageAnalysis {
  stage: Stage;
  roots: number[];
  /** Reachable nodes in post-order; transfers are leaves. */
  order: number[];
  uses: Map<number, number>;
  /** Transferred vertex values in first-encounter order; slot k is `transfer_k`. */
  transfers: number[];
  builtins: Set<BuiltinInput>;
  globals: GlobalRead[];
  aggregates: AggregateDescriptor[];
}

export function analyzeStage(builder: ShaderBuilder, stage: Stage, roots: readonly number[]): StageAnalysis {
  const order = postOrder(builder, roots);
  const transfers: number[] = [];
  const builtins = new Set<BuiltinInput>();
  const globals: GlobalRead[] = [];
  const aggregates: AggregateDescriptor[] = [];

  const noteAggregate = (a: AggregateDescriptor) => {
    if (!aggregates.includes(a)) aggregates.push(a);
  };
  const noteGlobal = (aggregate: AggregateDescriptor, field: string) => {
    noteAggregate(aggregate);
    if (!globals.some(g => g.aggregate === aggregate && g.field === field)) globals.push({ aggregate, field });
  };

  for (const id of order) {
    const n = builder.node(id);
    switch (n.op) {
      case 'stage_transfer':
        if (!transfers.includes(n.value)) transfers.push(n.value);
        break;
      case 'read_input':
        if (n.input.source === 'builtin') builtins.add(n.input.builtin);
        else noteAggregate(n.input.aggregate);
        break;
      case 'read_global':
        if (stage === 'vertex' && n.field.class === 'storage' && n.field.access === 'read_write') {
          throw new CompileError('StageViolation', `read ${n.aggregate.name}.${n.field.name}`, 'writable storage cannot be bound in the vertex stage', {
            expected: "access 'read'", actual: "'read_write'",
          });
        }
        noteGlobal(n.aggregate, n.field.name);
        break;
      case 'loop': {
        const array = builder.node(n.array);
        const field = storageFieldOf(array);
        if (field && array.op === 'read_global') noteGlobal(array.aggregate, field.length);
        break;
      }
      default:
        break;
    }
  }

  return {
    stage,
    roots: [...roots],
    order,
    uses: useCounts(builder, order, roots),
    transfers,
    builtins,
    globals,
    aggregates,
  };
}

// ------------------------------------------------------------------
// Root Checks
// ------------------------------------------------------------------

function checkCommon(op: string, info: ExprInfo) {
  if (info.loopVars.length > 0) {
    throw new CompileError('StageScopeError', op, 'loop placeholder used outside of its fold body');
  }
}

export function checkVertexRoot(builder: ShaderBuilder, place: Expr) {
  const op = 'vertex place';
  if (place.builder !== builder) throw new CompileError('StageScopeError', op, 'value belongs to a different shader builder');
  if (!typeEquals(place.type, Types.vec4f)) {
    throw typeMismatch(op, 'vertex position must be a vec4<f32>', 'vec4<f32>', formatType(place.type));
  }
  checkCommon(op, place.info);
  if (place.info.discards) {
    throw new CompileError('StageViolation', op, 'discard is only allowed in the fragment stage');
  }
  if (place.info.scope === 'fragment' || place.info.scope === 'compute') {
    throw new CompileError('StageScopeError', op, `${place.info.scope} value used in the vertex stage`, { expected: 'vertex', actual: place.info.scope });
  }
}

export function checkFragmentRoot(builder: ShaderBuilder, color: Expr | Discard) {
  if (!(color instanceof Expr)) return;
  const op = 'fragment color';
  if (color.builder !== builder) throw new CompileError('StageScopeError', op, 'value belongs to a different shader builder');
  if (!typeEquals(color.type, Types.vec4f)) {
    throw typeMismatch(op, 'fragment color must be a vec4<f32>', 'vec4<f32>', formatType(color.type));
  }
  checkCommon(op, color.info);
  if (color.info.scope === 'vertex' || color.info.scope === 'compute') {
    throw new CompileError('StageScopeError', op, `${color.info.scope} value used in the fragment stage without fragment()`, {
      expected: 'fragment', actual: color.info.scope,
    });
  }
}
