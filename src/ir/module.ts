import { ValueType, ScalarType } from './types';
import { BinaryOperator, UnaryOperator } from './signatures';
import { StorageAccess } from './aggregates';
import type { BindingSlot, ResolvedLayout } from '../webgpu/binding-resolver';

// ------------------------------------------------------------------
// Lowered Shader Module
// ------------------------------------------------------------------
// Everything the emitter needs is spelled out here; it makes no decisions of
// its own beyond formatting.

export type Stage = 'vertex' | 'fragment' | 'compute';

export type IRExpr =
  | { kind: 'literal'; type: ScalarType; value: number | boolean }
  | { kind: 'ref'; name: string }
  | { kind: 'member'; base: IRExpr; member: string }
  | { kind: 'index'; base: IRExpr; index: IRExpr | number }
  | { kind: 'swizzle'; base: IRExpr; components: string }
  | { kind: 'construct'; type: ValueType; args: IRExpr[] }
  | { kind: 'binary'; op: BinaryOperator; lhs: IRExpr; rhs: IRExpr }
  | { kind: 'unary'; op: UnaryOperator; operand: IRExpr }
  | { kind: 'call'; fn: string; args: IRExpr[] };

export type Statement =
  | { kind: 'let'; name: string; type: ValueType; value: IRExpr }
  | { kind: 'var'; name: string; type: ValueType; value?: IRExpr }
  | { kind: 'assign'; target: IRExpr; value: IRExpr }
  | { kind: 'if'; cond: IRExpr; then: Statement[]; else: Statement[] }
  | { kind: 'loop'; index: string; bound: IRExpr; body: Statement[] }
  | { kind: 'discard' }
  | { kind: 'return'; value?: IRExpr };

export type BuiltinName = 'position' | 'vertex_index' | 'instance_index' | 'global_invocation_id';

export type IOAttribute =
  | { kind: 'location'; location: number; flat?: boolean }
  | { kind: 'builtin'; builtin: BuiltinName };

export interface FunctionParam {
  name: string;
  type: ValueType;
  io?: IOAttribute;
}

export interface IRFunction {
  stage: Stage;
  name: string;
  params: FunctionParam[];
  output?: { type: ValueType; io?: IOAttribute };
  workgroupSize?: [number, number, number];
  body: Statement[];
}

export interface StructMember {
  name: string;
  type: ValueType;
  io?: IOAttribute;
}

export type StructRole =
  | { kind: 'user' }
  | { kind: 'group'; group: number }
  | { kind: 'vertex_output' };

export interface StructDecl {
  name: string;
  role: StructRole;
  members: StructMember[];
}

export type AddressSpaceDecl =
  | { space: 'uniform' }
  | { space: 'storage'; access: StorageAccess }
  | { space: 'handle' };

export interface GlobalDecl {
  group: number;
  binding: number;
  name: string;
  type: ValueType;
  address: AddressSpaceDecl;
}

export interface StageVisibility {
  vertex: boolean;
  fragment: boolean;
  compute: boolean;
}

export interface ModuleBinding extends BindingSlot {
  visibility: StageVisibility;
}

export interface ShaderModule {
  layout: ResolvedLayout;
  bindings: ModuleBinding[];
  structs: StructDecl[];
  globals: GlobalDecl[];
  stages: {
    vertex?: IRFunction;
    fragment?: IRFunction;
    compute?: IRFunction;
  };
}

export const ref = (name: string): IRExpr => ({ kind: 'ref', name });
