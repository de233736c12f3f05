import { ShaderBuilder, ExprNode, BranchArm } from './builder';
import { formatType } from './types';

const armIds = (...arms: BranchArm[]): number[] => arms.filter((a): a is number => a !== 'discard');

/**
 * Operand edges of a node, in evaluation order. Stage transfers are opaque
 * unless `throughTransfers` is set: their operand lives in the vertex stage.
 */
export function nodeChildren(node: ExprNode, throughTransfers = false): number[] {
  switch (node.op) {
    case 'literal':
    case 'read_input':
    case 'read_global':
    case 'loop_var':
      return [];
    case 'construct':
    case 'call':
      return node.args;
    case 'compose':
      return [node.base];
    case 'dynamic_index':
      return [node.base, node.index];
    case 'stage_transfer':
      return throughTransfers ? [node.value] : [];
    case 'binary':
      return [node.lhs, node.rhs];
    case 'unary':
      return [node.operand];
    case 'branch':
      return [node.cond, ...armIds(node.then, node.else)];
    case 'loop':
      return [node.array, node.init, node.body];
  }
}

/** Reachable nodes in post-order, each listed once. */
export function postOrder(builder: ShaderBuilder, roots: readonly number[], throughTransfers = false): number[] {
  const order: number[] = [];
  const seen = new Set<number>();

  const visit = (id: number) => {
    if (seen.has(id)) return;
    seen.add(id);
    for (const child of nodeChildren(builder.node(id), throughTransfers)) visit(child);
    order.push(id);
  };
  roots.forEach(visit);
  return order;
}

/** Number of incoming edges per reachable node; roots count one use each. */
export function useCounts(builder: ShaderBuilder, order: readonly number[], roots: readonly number[]): Map<number, number> {
  const uses = new Map<number, number>();
  const bump = (id: number) => uses.set(id, (uses.get(id) ?? 0) + 1);
  roots.forEach(bump);
  for (const id of order) {
    nodeChildren(builder.node(id)).forEach(bump);
  }
  return uses;
}

/**
 * Serializes the graph reachable from `roots` so that two builders describing
 * the same computation produce the same string, whatever their arena numbering.
 * Shared nodes appear once; later uses are back references `#n` into the
 * post-order listing.
 */
export function canonicalGraph(builder: ShaderBuilder, roots: readonly { label: string; id: number }[]): string {
  const order = postOrder(builder, roots.map(r => r.id), true);
  const position = new Map(order.map((id, i) => [id, i]));
  const ref = (id: number) => `#${position.get(id)}`;
  const arm = (a: BranchArm) => a === 'discard' ? 'discard' : ref(a);

  // Placeholders name the loop that binds them, which comes later in post-order.
  const loops = new Map<number, number>();
  order.forEach((id, i) => {
    const n = builder.node(id);
    if (n.op === 'loop') loops.set(n.fold, i);
  });

  const lines = order.map(id => {
    const n = builder.node(id);
    const t = formatType(n.type);
    switch (n.op) {
      case 'literal':
        return `literal ${t} ${String(n.value)}`;
      case 'read_input':
        return n.input.source === 'builtin'
          ? `builtin ${n.input.builtin}`
          : `attribute ${n.input.aggregate.role.kind} ${n.input.aggregate.name}.${n.input.field} ${t}`;
      case 'read_global':
        return `global ${n.aggregate.name}.${n.field.name} ${n.field.class} ${t}`;
      case 'construct':
        return `construct ${t} ${n.args.map(ref).join(' ')}`;
      case 'compose': {
        const a = n.access;
        const path = a.kind === 'swizzle' ? `.${a.components}` : a.kind === 'member' ? `.${a.name}` : `[${a.index}]`;
        return `compose ${ref(n.base)}${path}`;
      }
      case 'dynamic_index':
        return `index ${ref(n.base)} ${ref(n.index)}`;
      case 'stage_transfer':
        return `transfer ${ref(n.value)}`;
      case 'binary':
        return `${n.operator} ${ref(n.lhs)} ${ref(n.rhs)}`;
      case 'unary':
        return `${n.operator} ${ref(n.operand)}`;
      case 'call':
        return `call ${n.fn} ${n.args.map(ref).join(' ')}`;
      case 'branch':
        return `branch ${ref(n.cond)} ${arm(n.then)} ${arm(n.else)}`;
      case 'loop':
        return `loop ${ref(n.array)} ${ref(n.init)} ${ref(n.body)}`;
      case 'loop_var':
        return `${n.role} of #${loops.get(n.fold) ?? '?'} ${t}`;
    }
  });

  return [...roots.map(r => `${r.label} ${ref(r.id)}`), ...lines].join('\n');
}
