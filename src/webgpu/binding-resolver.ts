/**
 * @file binding-resolver.ts
 * @description Turns host aggregate descriptors into vertex attribute layouts
 * and bind group slots.
 *
 * @external-interactions
 * - Lowering reads the result through `attributesOf` / `globalOf` to name
 *   shader parameters and module-scope variables.
 * - `toVertexBufferLayouts` and `packUniforms` are what a WebGPU host needs to
 *   create pipelines and fill uniform buffers.
 *
 * @pitfalls
 * - A `matCxR` attribute occupies C consecutive locations; WebGPU has no
 *   matrix vertex formats.
 * - The uniform struct of a group takes the binding of its first uniform field,
 *   so a texture declared before it shifts every later binding by one.
 * - Every name the generated code declares (parameters, globals, user structs)
 *   shares one namespace and is checked here, so emission never sees a clash.
 */
import {
  ValueType, StructType, ScalarKind, struct, formatType, isHostShareable, vector, componentCount, scalarKindOf, typeEquals,
} from '../ir/types';
import { AggregateDescriptor, AggregateField, StorageAccess, roleLabel } from '../ir/aggregates';
import { assertValidDescriptors } from '../ir/schema';
import { CompileError, InternalConsistencyError, typeMismatch } from '../ir/errors';
import { TargetLimits, DEFAULT_LIMITS, VERTEX_OUTPUT_STRUCT, FRAGMENT_INPUT_PARAM, BUILTIN_PARAM_NAMES } from '../constants';
import { ShaderLayout, BufferBlockLayout, HostValue, packBuffer } from './shader-layout';

export type BindingKind = 'uniform' | 'storage' | 'texture' | 'sampler';

export interface BindingSlot {
  group: number;
  binding: number;
  kind: BindingKind;
  access?: StorageAccess;
  type: ValueType;
  /** Module-scope variable name. */
  name: string;
  aggregate: string;
  /** Source fields; every uniform member for the uniform slot. */
  fields: string[];
  minBindingSize?: number;
}

export interface VertexAttribute {
  location: number;
  type: ValueType;
  format: GPUVertexFormat;
  offset: number;
  stride: number;
  buffer: number;
  aggregate: string;
  field: string;
  /** Column index for attributes split from a matrix. */
  column?: number;
  /** Shader parameter name. */
  name: string;
}

export interface VertexBufferInfo {
  aggregate: string;
  stepMode: GPUVertexStepMode;
  arrayStride: number;
  attributes: VertexAttribute[];
}

export interface UniformBlock {
  binding: number;
  name: string;
  struct: StructType;
  block: BufferBlockLayout;
}

export interface GroupLayout {
  group: number;
  aggregate: string;
  uniform?: UniformBlock;
  bindings: { field: string; binding: number; kind: BindingKind }[];
}

export interface ResolvedLayout {
  vertexLayout: VertexAttribute[];
  instanceLayout: VertexAttribute[];
  buffers: VertexBufferInfo[];
  bindings: BindingSlot[];
  groups: GroupLayout[];
}

export const toSnakeCase = (name: string) =>
  name.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toLowerCase();

export const groupStructName = (group: number) => `Group${group}`;
export const groupVarName = (group: number) => `group${group}`;

// Generated structs and function-local temporaries.
const RESERVED_STRUCT_NAMES = /^(Group\d+|[ei]\d+)$/;
const WGSL_TYPE_NAMES = /^(bool|f16|f32|i32|u32|vec[234][fiuh]?|mat[234]x[234][fh]?|array|atomic|ptr|sampler|sampler_comparison|texture_\w+)$/;

const VERTEX_FORMATS: Record<Exclude<ScalarKind, 'bool'>, readonly GPUVertexFormat[]> = {
  f32: ['float32', 'float32x2', 'float32x3', 'float32x4'],
  i32: ['sint32', 'sint32x2', 'sint32x3', 'sint32x4'],
  u32: ['uint32', 'uint32x2', 'uint32x3', 'uint32x4'],
};

// ------------------------------------------------------------------
// Resolution
// ------------------------------------------------------------------

export function resolveBindings(descs: readonly AggregateDescriptor[], limits: TargetLimits = DEFAULT_LIMITS): ResolvedLayout {
  assertValidDescriptors(descs);

  const seen = new Map<string, string>();
  for (const d of descs) {
    const key = toSnakeCase(d.name);
    const other = seen.get(key);
    if (other !== undefined) {
      throw new CompileError('InvalidDescriptor', `aggregate ${d.name}`, `name clashes with aggregate '${other}'`);
    }
    seen.set(key, d.name);
  }

  const vertexDescs = descs.filter(d => d.role.kind === 'vertex');
  const instanceDescs = descs.filter(d => d.role.kind === 'instance');
  const groupDescs = descs.filter(d => d.role.kind === 'group');

  const attributes = resolveAttributes([...vertexDescs, ...instanceDescs], limits);
  const { bindings, groups } = resolveGroups(groupDescs, limits);
  checkGeneratedNames(attributes.buffers, bindings);

  return {
    vertexLayout: attributes.buffers.filter(b => b.stepMode === 'vertex').flatMap(b => b.attributes),
    instanceLayout: attributes.buffers.filter(b => b.stepMode === 'instance').flatMap(b => b.attributes),
    buffers: attributes.buffers,
    bindings,
    groups,
  };
}

function resolveAttributes(descs: readonly AggregateDescriptor[], limits: TargetLimits) {
  if (descs.length > limits.maxVertexBuffers) {
    throw new CompileError('LayoutOverflow', 'vertex buffers', `${descs.length} vertex/instance aggregates exceed the limit`, {
      expected: `at most ${limits.maxVertexBuffers}`, actual: String(descs.length),
    });
  }

  const owners = new Map<number, string>();
  const buffers: VertexBufferInfo[] = [];
  let cursor = 0;

  descs.forEach((desc, bufferIndex) => {
    const prefix = toSnakeCase(desc.name);
    const placed: VertexAttribute[] = [];
    let offset = 0;

    for (const field of desc.fields) {
      if (field.class !== 'attribute') continue;
      const op = `attribute ${desc.name}.${field.name}`;
      const columns = attributeColumns(op, field.type);
      if (field.location !== undefined) cursor = field.location;

      columns.forEach((column, c) => {
        const location = cursor + c;
        const label = columns.length > 1 ? `${desc.name}.${field.name}[${c}]` : `${desc.name}.${field.name}`;
        if (location >= limits.maxVertexAttributes) {
          throw new CompileError('LayoutOverflow', op, `location ${location} exceeds the vertex attribute limit`, {
            expected: `< ${limits.maxVertexAttributes}`, actual: String(location),
          });
        }
        const owner = owners.get(location);
        if (owner !== undefined) {
          throw new CompileError('DuplicateLocation', op, `location ${location} is already taken by ${owner}`, {
            expected: 'a free location', actual: String(location),
          });
        }
        owners.set(location, label);

        const scalarKind = scalarKindOf(column) ?? 'f32';
        const kind = scalarKind === 'bool' ? 'f32' : scalarKind;
        placed.push({
          location,
          type: column,
          format: VERTEX_FORMATS[kind][componentCount(column) - 1],
          offset,
          stride: 0,
          buffer: bufferIndex,
          aggregate: desc.name,
          field: field.name,
          column: columns.length > 1 ? c : undefined,
          name: columns.length > 1 ? `${prefix}_${field.name}_${c}` : `${prefix}_${field.name}`,
        });
        offset += componentCount(column) * 4;
      });
      cursor += columns.length;
    }

    for (const a of placed) a.stride = offset;
    buffers.push({
      aggregate: desc.name,
      stepMode: desc.role.kind === 'instance' ? 'instance' : 'vertex',
      arrayStride: offset,
      attributes: placed,
    });
  });

  return { buffers };
}

/** The per-location types an attribute occupies. */
function attributeColumns(op: string, type: ValueType): ValueType[] {
  if ((type.kind === 'scalar' || type.kind === 'vector') && type.scalar !== 'bool') return [type];
  if (type.kind === 'matrix') return Array.from({ length: type.columns }, () => vector(type.rows, 'f32'));
  throw typeMismatch(op, 'type cannot be a vertex attribute', 'f32/i32/u32 scalar or vector, or an f32 matrix', formatType(type));
}

function resolveGroups(descs: readonly AggregateDescriptor[], limits: TargetLimits) {
  const indexOf = (d: AggregateDescriptor) => d.role.kind === 'group' ? d.role.index : -1;
  const sorted = [...descs].sort((a, b) => indexOf(a) - indexOf(b));

  for (let i = 1; i < sorted.length; i++) {
    if (indexOf(sorted[i]) === indexOf(sorted[i - 1])) {
      throw new CompileError('DuplicateLocation', `group ${sorted[i].name}`, `group index ${indexOf(sorted[i])} is already used by ${sorted[i - 1].name}`);
    }
  }
  if (sorted.length > limits.maxBindGroups) {
    throw new CompileError('LayoutOverflow', 'bind groups', `${sorted.length} groups exceed the limit`, {
      expected: `at most ${limits.maxBindGroups}`, actual: String(sorted.length),
    });
  }
  sorted.forEach((d, i) => {
    if (indexOf(d) !== i) {
      throw new CompileError('InvalidDescriptor', `group ${d.name}`, 'group indices must be contiguous from 0', {
        expected: String(i), actual: roleLabel(d.role),
      });
    }
  });

  const bindings: BindingSlot[] = [];
  const groups = sorted.map(d => resolveGroup(d, indexOf(d), limits, bindings));
  return { bindings, groups };
}

function resolveGroup(desc: AggregateDescriptor, group: number, limits: TargetLimits, out: BindingSlot[]): GroupLayout {
  const uniformFields = desc.fields.filter(f => f.class === 'uniform');
  const layout: GroupLayout = { group, aggregate: desc.name, bindings: [] };
  let next = 0;

  const take = (op: string) => {
    const binding = next++;
    if (binding >= limits.maxBindingsPerBindGroup) {
      throw new CompileError('LayoutOverflow', op, `binding ${binding} exceeds the per-group limit`, {
        expected: `< ${limits.maxBindingsPerBindGroup}`, actual: String(binding),
      });
    }
    return binding;
  };

  for (const field of desc.fields) {
    const op = `group ${desc.name}.${field.name}`;
    checkGroupField(op, desc, field);

    if (field.class === 'uniform') {
      if (!layout.uniform) {
        const s = struct(groupStructName(group), uniformFields.map(f => ({ name: f.name, type: f.type })));
        const block = new ShaderLayout('uniform').calculateBlockLayout(s.fields);
        if (block.totalSize > limits.maxUniformBufferBindingSize) {
          throw new CompileError('LayoutOverflow', `group ${desc.name}`, 'uniform block is larger than the binding size limit', {
            expected: `<= ${limits.maxUniformBufferBindingSize} bytes`, actual: `${block.totalSize} bytes`,
          });
        }
        const binding = take(op);
        layout.uniform = { binding, name: groupVarName(group), struct: s, block };
        out.push({
          group, binding, kind: 'uniform', type: s, name: groupVarName(group), aggregate: desc.name,
          fields: uniformFields.map(f => f.name), minBindingSize: block.totalSize,
        });
      }
      layout.bindings.push({ field: field.name, binding: layout.uniform.binding, kind: 'uniform' });
      continue;
    }
    if (field.class === 'attribute') continue;

    const binding = take(op);
    const slot: BindingSlot = {
      group, binding, kind: field.class, type: field.type,
      name: `${groupVarName(group)}_${field.name}`, aggregate: desc.name, fields: [field.name],
    };
    if (field.class === 'storage') slot.access = field.access;
    out.push(slot);
    layout.bindings.push({ field: field.name, binding, kind: field.class });
  }

  return layout;
}

function checkGroupField(op: string, desc: AggregateDescriptor, field: AggregateField) {
  switch (field.class) {
    case 'uniform':
      if (!isHostShareable(field.type)) {
        throw typeMismatch(op, 'type cannot be stored in a uniform buffer', 'non-bool scalar, vector, matrix or fixed array', formatType(field.type));
      }
      return;
    case 'texture':
      if (field.type.kind !== 'texture') throw typeMismatch(op, 'texture field must have a texture type', 'texture', formatType(field.type));
      return;
    case 'sampler':
      if (field.type.kind !== 'sampler') throw typeMismatch(op, 'sampler field must have the sampler type', 'sampler', formatType(field.type));
      return;
    case 'storage': {
      const element = field.type.element;
      if (field.type.length !== 'dynamic' || !isHostShareable(element) || element.kind === 'array') {
        throw typeMismatch(op, 'storage field must be a runtime array of host-shareable elements', 'array<T>', formatType(field.type));
      }
      const length = desc.fields.find(f => f.name === field.length);
      if (!length || length.type.kind !== 'scalar' || length.type.scalar !== 'u32') {
        throw typeMismatch(op, `length field '${field.length}' must be a u32 uniform`, 'u32', length ? formatType(length.type) : 'missing');
      }
      return;
    }
    case 'attribute':
      throw new CompileError('InvalidDescriptor', op, 'attributes cannot appear in a group');
  }
}

// ------------------------------------------------------------------
// Names
// ------------------------------------------------------------------

const memberList = (s: StructType) => s.fields.map(f => `${f.name}: ${formatType(f.type)}`).join(', ');

/**
 * Claims every module-scope and entry-parameter name the generated code will
 * declare. User structs reachable from storage fields must not reuse a
 * generated name, and one name must always denote one struct.
 */
function checkGeneratedNames(buffers: readonly VertexBufferInfo[], bindings: readonly BindingSlot[]) {
  const owners = new Map<string, string>();
  for (const [builtin, name] of Object.entries(BUILTIN_PARAM_NAMES)) owners.set(name, `the ${builtin} builtin`);
  owners.set(FRAGMENT_INPUT_PARAM, 'the fragment input');
  owners.set(VERTEX_OUTPUT_STRUCT, 'the vertex output struct');

  const claim = (op: string, name: string, owner: string) => {
    const other = owners.get(name);
    if (other !== undefined) {
      throw new CompileError('InvalidDescriptor', op, `generated name '${name}' clashes with ${other}`);
    }
    owners.set(name, owner);
  };

  for (const slot of bindings) {
    claim(`group ${slot.aggregate}`, slot.name, `group ${slot.aggregate}`);
  }
  for (const a of buffers.flatMap(b => b.attributes)) {
    const op = `attribute ${a.aggregate}.${a.field}`;
    claim(op, a.name, op);
  }

  const structs = new Map<string, StructType>();
  const visit = (op: string, t: ValueType): void => {
    if (t.kind === 'array') return visit(op, t.element);
    if (t.kind !== 'struct') return;

    const prior = structs.get(t.name);
    if (prior) {
      if (!typeEquals(prior, t)) {
        throw new CompileError('InvalidDescriptor', op, `struct ${t.name} is declared with two different member lists`, {
          expected: memberList(prior), actual: memberList(t),
        });
      }
      return;
    }
    if (RESERVED_STRUCT_NAMES.test(t.name) || WGSL_TYPE_NAMES.test(t.name)) {
      throw new CompileError('InvalidDescriptor', op, `struct name '${t.name}' is reserved`);
    }
    claim(op, t.name, `struct ${t.name}`);
    structs.set(t.name, t);
    t.fields.forEach(f => visit(op, f.type));
  };
  for (const slot of bindings) {
    if (slot.kind === 'storage') visit(`group ${slot.aggregate}.${slot.fields[0]}`, slot.type);
  }
}

// ------------------------------------------------------------------
// Lookups
// ------------------------------------------------------------------

export function attributesOf(layout: ResolvedLayout, aggregate: string, field: string): VertexAttribute[] {
  const attrs = [...layout.vertexLayout, ...layout.instanceLayout].filter(a => a.aggregate === aggregate && a.field === field);
  if (attrs.length === 0) throw new InternalConsistencyError('binding resolver', `no attribute for ${aggregate}.${field}`);
  return attrs;
}

/** The slot backing a group field; uniform fields also name their struct member. */
export function globalOf(layout: ResolvedLayout, group: number, field: string): { slot: BindingSlot; member?: string } {
  const g = layout.groups.find(x => x.group === group);
  const entry = g?.bindings.find(b => b.field === field);
  const slot = entry && layout.bindings.find(s => s.group === group && s.binding === entry.binding);
  if (!entry || !slot) throw new InternalConsistencyError('binding resolver', `no binding for group ${group} field ${field}`);
  return entry.kind === 'uniform' ? { slot, member: field } : { slot };
}

// ------------------------------------------------------------------
// Host helpers
// ------------------------------------------------------------------

export function toVertexBufferLayouts(layout: ResolvedLayout): GPUVertexBufferLayout[] {
  return layout.buffers.map(b => ({
    arrayStride: b.arrayStride,
    stepMode: b.stepMode,
    attributes: b.attributes.map(a => ({ shaderLocation: a.location, offset: a.offset, format: a.format })),
  }));
}

/** Writes a group's uniform values at the offsets computed for its struct. */
export function packUniforms(group: GroupLayout, values: Readonly<Record<string, HostValue>>): ArrayBuffer {
  if (!group.uniform) {
    throw new CompileError('InvalidDescriptor', `group ${group.aggregate}`, 'group has no uniform fields');
  }
  return packBuffer(group.uniform.block, values, new ShaderLayout('uniform'));
}

/** Packs the elements of a storage field with storage-buffer strides. */
export function packStorage(slot: BindingSlot, elements: readonly HostValue[]): ArrayBuffer {
  if (slot.kind !== 'storage' || slot.type.kind !== 'array') {
    throw new CompileError('InvalidDescriptor', `binding ${slot.name}`, 'slot is not a storage buffer');
  }
  const helpers = new ShaderLayout('storage');
  const block = helpers.calculateBlockLayout([{ name: 'data', type: slot.type }]);
  return packBuffer(block, { data: elements }, helpers);
}
