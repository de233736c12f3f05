import { ScalarType, ValueType, formatType } from '../ir/types';
import { BinaryOperator, UnaryOperator } from '../ir/signatures';
import { InternalConsistencyError } from '../ir/errors';
import {
  ShaderModule, IRExpr, Statement, IRFunction, StructDecl, GlobalDecl, IOAttribute, FunctionParam,
} from '../ir/module';

/**
 * WGSL Generator
 * Prints a lowered `ShaderModule` as WGSL text. Declarations come out in a
 * fixed order: user structs, then each bind group's struct and variables, then
 * the vertex output struct, then the vertex, fragment and compute entry points.
 */

const BINARY_SYMBOLS: Record<BinaryOperator, string> = {
  add: '+', sub: '-', mul: '*', div: '/', rem: '%',
  eq: '==', ne: '!=', lt: '<', le: '<=', gt: '>', ge: '>=',
  and: '&&', or: '||',
};

const UNARY_SYMBOLS: Record<UnaryOperator, string> = { neg: '-', not: '!' };

const I32_MIN = -2147483648;
const INDENT = '  ';

export class WgslGenerator {

  generate(module: ShaderModule): string {
    this.checkModule(module);
    const sections: string[][] = [];

    for (const s of module.structs) {
      if (s.role.kind === 'user') sections.push(this.emitStruct(s));
    }

    for (const g of module.layout.groups) {
      const groupStruct = module.structs.find(s => s.role.kind === 'group' && s.role.group === g.group);
      if (groupStruct) sections.push(this.emitStruct(groupStruct));
      const globals = module.globals
        .filter(v => v.group === g.group)
        .sort((a, b) => a.binding - b.binding)
        .map(v => this.emitGlobal(v));
      if (globals.length > 0) sections.push(globals);
    }

    for (const s of module.structs) {
      if (s.role.kind === 'vertex_output') sections.push(this.emitStruct(s));
    }

    const { vertex, fragment, compute } = module.stages;
    for (const fn of [vertex, fragment, compute]) {
      if (fn) sections.push(this.emitFunction(fn));
    }

    return sections.map(lines => lines.join('\n')).join('\n\n') + '\n';
  }

  // ------------------------------------------------------------------
  // Declarations
  // ------------------------------------------------------------------

  private checkModule(module: ShaderModule) {
    const fail = (message: string): never => {
      throw new InternalConsistencyError('wgsl emitter', message);
    };

    const names = new Set<string>();
    for (const name of [...module.structs.map(s => s.name), ...module.globals.map(g => g.name)]) {
      if (names.has(name)) fail(`'${name}' is declared twice`);
      names.add(name);
    }

    const slots = new Set<string>();
    for (const g of module.globals) {
      const key = `${g.group}:${g.binding}`;
      if (slots.has(key)) fail(`group ${g.group} binding ${g.binding} is declared twice`);
      slots.add(key);
      if (!module.layout.groups.some(l => l.group === g.group)) {
        fail(`global ${g.name} is in group ${g.group}, which the layout does not declare`);
      }
    }
    module.layout.groups.forEach((g, i) => {
      if (g.group !== i) fail(`bind groups are not contiguous at index ${i}`);
    });

    for (const s of module.structs) {
      if (s.members.length === 0) fail(`struct ${s.name} has no members`);
      const io = s.members[0].io;
      if (s.role.kind === 'vertex_output' && !(io?.kind === 'builtin' && io.builtin === 'position')) {
        fail(`${s.name} does not start with the position member`);
      }
    }

    for (const fn of [module.stages.vertex, module.stages.fragment, module.stages.compute]) {
      if (!fn) continue;
      const last = fn.body[fn.body.length - 1];
      if (fn.output && (last?.kind !== 'return' || !last.value)) fail(`entry point ${fn.name} does not end in a return`);
      if (fn.stage === 'compute' && fn.body.length === 0) fail(`entry point ${fn.name} has an empty body`);
    }
  }

  private emitStruct(s: StructDecl): string[] {
    return [
      `struct ${s.name} {`,
      ...s.members.map(m => `${INDENT}${this.formatIO(m.io)}${m.name} : ${formatType(m.type)},`),
      '}',
    ];
  }

  private emitGlobal(g: GlobalDecl): string {
    const address = g.address;
    let qualifier = '';
    if (address.space === 'uniform') qualifier = '<uniform>';
    else if (address.space === 'storage') qualifier = `<storage, ${address.access}>`;
    return `@group(${g.group}) @binding(${g.binding}) var${qualifier} ${g.name} : ${formatType(g.type)};`;
  }

  private formatIO(io?: IOAttribute): string {
    if (!io) return '';
    if (io.kind === 'builtin') return `@builtin(${io.builtin}) `;
    return io.flat ? `@location(${io.location}) @interpolate(flat) ` : `@location(${io.location}) `;
  }

  // ------------------------------------------------------------------
  // Functions
  // ------------------------------------------------------------------

  private emitFunction(fn: IRFunction): string[] {
    const lines: string[] = [];
    if (fn.stage === 'compute') {
      const [x, y, z] = fn.workgroupSize ?? [1, 1, 1];
      lines.push(`@compute @workgroup_size(${x}, ${y}, ${z})`);
    } else {
      lines.push(`@${fn.stage}`);
    }

    const params = fn.params.map((p: FunctionParam) => `${this.formatIO(p.io)}${p.name} : ${formatType(p.type)}`).join(', ');
    const output = fn.output ? ` -> ${this.formatIO(fn.output.io)}${formatType(fn.output.type)}` : '';
    lines.push(`fn ${fn.name}(${params})${output} {`);
    this.emitBlock(fn.body, 1, lines);
    lines.push('}');
    return lines;
  }

  private emitBlock(body: readonly Statement[], depth: number, lines: string[]) {
    for (const s of body) this.emitStatement(s, depth, lines);
  }

  private emitStatement(s: Statement, depth: number, lines: string[]) {
    const pad = INDENT.repeat(depth);
    switch (s.kind) {
      case 'let':
        lines.push(`${pad}let ${s.name} : ${formatType(s.type)} = ${this.expr(s.value)};`);
        return;
      case 'var':
        lines.push(s.value
          ? `${pad}var ${s.name} : ${formatType(s.type)} = ${this.expr(s.value)};`
          : `${pad}var ${s.name} : ${formatType(s.type)};`);
        return;
      case 'assign':
        lines.push(`${pad}${this.expr(s.target)} = ${this.expr(s.value)};`);
        return;
      case 'if':
        lines.push(`${pad}if (${this.expr(s.cond)}) {`);
        this.emitBlock(s.then, depth + 1, lines);
        if (s.else.length > 0) {
          lines.push(`${pad}} else {`);
          this.emitBlock(s.else, depth + 1, lines);
        }
        lines.push(`${pad}}`);
        return;
      case 'loop':
        lines.push(`${pad}for (var ${s.index} : u32 = 0u; ${s.index} < ${this.expr(s.bound)}; ${s.index}++) {`);
        this.emitBlock(s.body, depth + 1, lines);
        lines.push(`${pad}}`);
        return;
      case 'discard':
        lines.push(`${pad}discard;`);
        return;
      case 'return':
        lines.push(s.value ? `${pad}return ${this.expr(s.value)};` : `${pad}return;`);
        return;
    }
  }

  // ------------------------------------------------------------------
  // Expressions
  // ------------------------------------------------------------------

  expr(e: IRExpr): string {
    switch (e.kind) {
      case 'literal':
        return this.formatLiteral(e.value, e.type);
      case 'ref':
        return e.name;
      case 'member':
        return `${this.postfixBase(e.base)}.${e.member}`;
      case 'swizzle':
        return `${this.postfixBase(e.base)}.${e.components}`;
      case 'index':
        return `${this.postfixBase(e.base)}[${typeof e.index === 'number' ? e.index : this.expr(e.index)}]`;
      case 'construct':
        return `${this.constructorName(e.type)}(${e.args.map(a => this.expr(a)).join(', ')})`;
      case 'binary':
        return `${this.binaryOperand(e.lhs)} ${BINARY_SYMBOLS[e.op]} ${this.binaryOperand(e.rhs)}`;
      case 'unary': {
        const operand = this.expr(e.operand);
        const wrap = e.operand.kind === 'binary' || e.operand.kind === 'unary' || isNegativeLiteral(e.operand);
        return `${UNARY_SYMBOLS[e.op]}${wrap ? `(${operand})` : operand}`;
      }
      case 'call':
        return `${e.fn}(${e.args.map(a => this.expr(a)).join(', ')})`;
    }
  }

  // Nested binary expressions are always parenthesized; WGSL rejects mixing
  // `&&` with `||` and chained comparisons without them.
  private binaryOperand(e: IRExpr): string {
    const s = this.expr(e);
    return e.kind === 'binary' ? `(${s})` : s;
  }

  private postfixBase(e: IRExpr): string {
    const s = this.expr(e);
    return e.kind === 'binary' || e.kind === 'unary' || isNegativeLiteral(e) ? `(${s})` : s;
  }

  private constructorName(t: ValueType): string {
    if (t.kind === 'texture' || t.kind === 'sampler' || (t.kind === 'array' && t.length === 'dynamic')) {
      throw new InternalConsistencyError('wgsl emitter', `${formatType(t)} has no constructor`);
    }
    return formatType(t);
  }

  formatLiteral(val: number | boolean, type: ScalarType): string {
    if (typeof val === 'boolean') return val.toString();
    switch (type.scalar) {
      case 'i32':
        // 2147483648i is out of range, so the minimum is spelled as a conversion.
        return val === I32_MIN ? `i32(${val})` : `${val}i`;
      case 'u32':
        return `${val}u`;
      case 'f32': {
        const s = val.toString();
        if (s.toLowerCase().includes('e')) return s;
        return s.includes('.') ? s : s + '.0';
      }
      case 'bool':
        throw new InternalConsistencyError('wgsl emitter', `bool literal holds ${val}`);
    }
  }
}

const isNegativeLiteral = (e: IRExpr) => e.kind === 'literal' && typeof e.value === 'number' && e.value < 0;

export function emitWgsl(module: ShaderModule): string {
  return new WgslGenerator().generate(module);
}
