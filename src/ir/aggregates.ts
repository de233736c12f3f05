import { ValueType, ArrayType, TextureType, SamplerType, arrayOf } from './types';

// ------------------------------------------------------------------
// Host Aggregate Descriptors
// ------------------------------------------------------------------
// An aggregate is a host-side record the shader reads from: per-vertex data,
// per-instance data, or a bind group of resources.

export type AggregateRole =
  | { kind: 'vertex' }
  | { kind: 'instance' }
  | { kind: 'group'; index: number };

export type StorageAccess = 'read' | 'read_write';

export interface AttributeField {
  class: 'attribute';
  name: string;
  type: ValueType;
  location?: number; // auto-assigned if missing
}

export interface UniformField {
  class: 'uniform';
  name: string;
  type: ValueType;
}

export interface TextureField {
  class: 'texture';
  name: string;
  type: TextureType;
}

export interface SamplerField {
  class: 'sampler';
  name: string;
  type: SamplerType;
}

/**
 * A runtime-sized array bound as a storage buffer. `length` names the u32
 * uniform member of the same group holding the number of valid elements, and
 * `capacity` is the host-side upper bound on that number.
 */
export interface StorageField {
  class: 'storage';
  name: string;
  type: ArrayType;
  capacity: number;
  length: string;
  access: StorageAccess;
}

export type AggregateField = AttributeField | UniformField | TextureField | SamplerField | StorageField;

export interface AggregateDescriptor<K extends string = string> {
  readonly name: string;
  readonly role: AggregateRole;
  readonly fields: readonly AggregateField[];
  readonly keys: readonly K[];
}

// ------------------------------------------------------------------
// Field Declarations
// ------------------------------------------------------------------

export interface AttributeDecl {
  decl: 'attribute';
  type: ValueType;
  location: number;
}

export interface StorageDecl {
  decl: 'storage';
  element: ValueType;
  capacity: number;
  length: string;
  access: StorageAccess;
}

export type VertexFieldDecl = ValueType | AttributeDecl;
export type GroupFieldDecl = ValueType | StorageDecl;

/** Pins an attribute to an explicit shader location. */
export const attribute = (type: ValueType, options: { location: number }): AttributeDecl => ({
  decl: 'attribute', type, location: options.location,
});

export const storage = (
  element: ValueType,
  options: { capacity: number; length: string; access?: StorageAccess },
): StorageDecl => ({
  decl: 'storage',
  element,
  capacity: options.capacity,
  length: options.length,
  access: options.access ?? 'read',
});

const isAttributeDecl = (d: VertexFieldDecl): d is AttributeDecl => 'decl' in d;
const isStorageDecl = (d: GroupFieldDecl): d is StorageDecl => 'decl' in d;

const toAttributeField = (name: string, d: VertexFieldDecl): AttributeField =>
  isAttributeDecl(d)
    ? { class: 'attribute', name, type: d.type, location: d.location }
    : { class: 'attribute', name, type: d };

function toGroupField(name: string, d: GroupFieldDecl): AggregateField {
  if (isStorageDecl(d)) {
    return {
      class: 'storage', name,
      type: arrayOf(d.element, 'dynamic'),
      capacity: d.capacity, length: d.length, access: d.access,
    };
  }
  if (d.kind === 'texture') return { class: 'texture', name, type: d };
  if (d.kind === 'sampler') return { class: 'sampler', name, type: d };
  return { class: 'uniform', name, type: d };
}

// ------------------------------------------------------------------
// Descriptor Constructors
// ------------------------------------------------------------------

export function defineVertex<F extends Record<string, VertexFieldDecl>>(name: string, fields: F): AggregateDescriptor<Extract<keyof F, string>> {
  return describe(name, { kind: 'vertex' }, fields, toAttributeField);
}

export function defineInstance<F extends Record<string, VertexFieldDecl>>(name: string, fields: F): AggregateDescriptor<Extract<keyof F, string>> {
  return describe(name, { kind: 'instance' }, fields, toAttributeField);
}

export function defineGroup<F extends Record<string, GroupFieldDecl>>(name: string, index: number, fields: F): AggregateDescriptor<Extract<keyof F, string>> {
  return describe(name, { kind: 'group', index }, fields, toGroupField);
}

function describe<F extends Record<string, D>, D>(
  name: string,
  role: AggregateRole,
  fields: F,
  convert: (name: string, decl: D) => AggregateField,
): AggregateDescriptor<Extract<keyof F, string>> {
  const keys: Extract<keyof F, string>[] = [];
  const converted: AggregateField[] = [];
  for (const key in fields) {
    keys.push(key);
    converted.push(convert(key, fields[key]));
  }
  return Object.freeze({ name, role, fields: converted, keys });
}

export const findField = (desc: AggregateDescriptor, name: string): AggregateField | undefined =>
  desc.fields.find(f => f.name === name);

export const roleLabel = (role: AggregateRole): string =>
  role.kind === 'group' ? `group(${role.index})` : role.kind;
