import { ValueType, StructField, StructType, formatType } from '../ir/types';
import { typeMismatch } from '../ir/errors';

export type AddressSpace = 'uniform' | 'storage';

/**
 * Represents the memory layout of a single field within a struct or buffer.
 */
export interface FieldLayout {
  name: string;
  type: ValueType;
  offset: number; // Byte offset relative to container
  size: number; // Size in bytes
  align: number; // Alignment requirement
}

export interface StructLayoutInfo {
  size: number;
  alignment: number;
  members: FieldLayout[];
}

/**
 * Represents the layout of a complete uniform/storage buffer block.
 */
export interface BufferBlockLayout {
  fields: FieldLayout[];
  totalSize: number; // Static size (excluding runtime array dependent part)
  alignment: number; // Base alignment
  hasRuntimeArray: boolean; // True if the last field is a runtime array
}

const roundUp = (k: number, n: number) => Math.ceil(n / k) * k;

// Structs are cached by shape; two structs may share a name.
function structKey(t: ValueType): string {
  if (t.kind === 'struct') return `${t.name}{${t.fields.map(f => `${f.name}:${structKey(f.type)}`).join(',')}}`;
  if (t.kind === 'array') return `array<${structKey(t.element)},${t.length}>`;
  return formatType(t);
}

/**
 * WGSL host-shareable layout rules. Members keep their declared order. The
 * uniform address space only takes arrays of 16-byte aligned elements and no
 * nested structs, so its offsets never need explicit `@align` attributes.
 */
export class ShaderLayout {
  private structLayoutCache = new Map<string, StructLayoutInfo>();

  constructor(public readonly space: AddressSpace) { }

  public calculateBlockLayout(inputs: readonly StructField[]): BufferBlockLayout {
    let offset = 0;
    let maxAlign = 1;
    const fields: FieldLayout[] = [];

    for (const input of inputs) {
      const align = this.getAlignment(input.type);
      const size = this.getSize(input.type);

      offset = roundUp(align, offset);
      fields.push({ name: input.name, type: input.type, offset, size, align });

      offset += size;
      maxAlign = Math.max(maxAlign, align);
    }

    const last = inputs[inputs.length - 1];
    return {
      fields,
      totalSize: roundUp(maxAlign, offset),
      alignment: maxAlign,
      hasRuntimeArray: last !== undefined && this.isRuntimeArray(last.type),
    };
  }

  public getStructLayout(s: StructType): StructLayoutInfo {
    const key = structKey(s);
    const cached = this.structLayoutCache.get(key);
    if (cached) return cached;

    const block = this.calculateBlockLayout(s.fields);
    const info = { size: block.totalSize, alignment: block.alignment, members: block.fields };
    this.structLayoutCache.set(key, info);
    return info;
  }

  public getAlignment(type: ValueType): number {
    switch (type.kind) {
      case 'scalar':
        return 4;
      case 'vector':
        return type.size === 2 ? 8 : 16;
      case 'matrix':
        // Matrices are arrays of column vectors.
        return type.rows === 2 ? 8 : 16;
      case 'array':
        return this.getAlignment(type.element);
      case 'struct':
        if (this.space === 'uniform') {
          throw typeMismatch('uniform layout', 'structs cannot be nested in a uniform group', 'scalar, vector, matrix or array member', type.name);
        }
        return this.getStructLayout(type).alignment;
      default:
        throw typeMismatch('layout', 'type is not host-shareable', 'scalar, vector, matrix, array or struct', formatType(type));
    }
  }

  public getSize(type: ValueType): number {
    switch (type.kind) {
      case 'scalar':
        return 4;
      case 'vector':
        return type.size * 4;
      case 'matrix':
        return type.columns * roundUp(type.rows === 2 ? 8 : 16, type.rows * 4);
      case 'array':
        // Runtime-sized arrays contribute no static size.
        return type.length === 'dynamic' ? 0 : type.length * this.getArrayStride(type.element);
      case 'struct':
        return this.getStructLayout(type).size;
      default:
        throw typeMismatch('layout', 'type is not host-shareable', 'scalar, vector, matrix, array or struct', formatType(type));
    }
  }

  /** Element stride: size rounded up to the element alignment. */
  public getArrayStride(element: ValueType): number {
    const align = this.getAlignment(element);
    if (this.space === 'uniform' && align % 16 !== 0) {
      throw typeMismatch('uniform layout', 'uniform array elements must be 16-byte aligned', 'vec3, vec4 or a matrix with 3 or 4 rows', formatType(element));
    }
    return roundUp(align, this.getSize(element));
  }

  public isRuntimeArray(type: ValueType): boolean {
    return type.kind === 'array' && type.length === 'dynamic';
  }
}

// ------------------------------------------------------------------
// Packing
// ------------------------------------------------------------------

/**
 * Host-side value for a buffer field: a number for scalars, a flat component
 * list for vectors and column-major matrices, a list for arrays and a record
 * for structs.
 */
export type HostValue = number | boolean | readonly HostValue[] | { readonly [member: string]: HostValue };

const isList = (v: HostValue | undefined): v is readonly HostValue[] => Array.isArray(v);

/**
 * Packs host values into an ArrayBuffer based on a layout. For a block ending in
 * a runtime array, the buffer grows to hold every supplied element.
 */
export function packBuffer(layout: BufferBlockLayout, values: Readonly<Record<string, HostValue>>, layoutHelpers: ShaderLayout): ArrayBuffer {
  // 1. Calculate dynamic size if needed
  let bufferSize = layout.totalSize;
  const lastField = layout.fields[layout.fields.length - 1];

  if (layout.hasRuntimeArray && lastField && lastField.type.kind === 'array') {
    const val = values[lastField.name];
    if (isList(val)) {
      const stride = layoutHelpers.getArrayStride(lastField.type.element);
      bufferSize = Math.max(bufferSize, lastField.offset + val.length * stride);
    }
  }

  const buffer = new ArrayBuffer(bufferSize);
  const view = new DataView(buffer);

  for (const field of layout.fields) {
    const val = values[field.name];
    if (val === undefined) continue;
    writeField(view, field.offset, val, field.type, layoutHelpers, field.name);
  }

  return buffer;
}

function components(val: HostValue, count: number, path: string, shape: string): readonly number[] {
  if (!isList(val) || val.length !== count || !val.every((c): c is number => typeof c === 'number')) {
    throw typeMismatch('packBuffer', `field '${path}' has the wrong shape`, `${count} numbers for ${shape}`, JSON.stringify(val));
  }
  return val;
}

function writeScalar(view: DataView, offset: number, val: HostValue, kind: string, path: string) {
  if (typeof val === 'boolean') {
    view.setUint32(offset, val ? 1 : 0, true);
    return;
  }
  if (typeof val !== 'number') {
    throw typeMismatch('packBuffer', `field '${path}' must be a number`, kind, JSON.stringify(val));
  }
  if (kind === 'i32') view.setInt32(offset, val, true);
  else if (kind === 'u32' || kind === 'bool') view.setUint32(offset, val, true);
  else view.setFloat32(offset, val, true);
}

function writeField(view: DataView, offset: number, val: HostValue, type: ValueType, layout: ShaderLayout, path: string) {
  switch (type.kind) {
    case 'scalar':
      writeScalar(view, offset, val, type.scalar, path);
      return;

    case 'vector': {
      const comps = components(val, type.size, path, formatType(type));
      comps.forEach((c, i) => writeScalar(view, offset + i * 4, c, type.scalar, path));
      return;
    }

    case 'matrix': {
      // Column-major; each column starts at its aligned offset.
      const comps = components(val, type.columns * type.rows, path, formatType(type));
      const columnStride = type.rows === 2 ? 8 : 16;
      for (let c = 0; c < type.columns; c++) {
        for (let r = 0; r < type.rows; r++) {
          view.setFloat32(offset + c * columnStride + r * 4, comps[c * type.rows + r], true);
        }
      }
      return;
    }

    case 'array': {
      if (!isList(val)) {
        throw typeMismatch('packBuffer', `field '${path}' must be a list`, formatType(type), JSON.stringify(val));
      }
      const stride = layout.getArrayStride(type.element);
      val.forEach((item: HostValue, i: number) => writeField(view, offset + i * stride, item, type.element, layout, `${path}[${i}]`));
      return;
    }

    case 'struct': {
      if (typeof val !== 'object' || isList(val)) {
        throw typeMismatch('packBuffer', `field '${path}' must be a record`, type.name, JSON.stringify(val));
      }
      const info = layout.getStructLayout(type);
      for (const member of info.members) {
        const m = val[member.name];
        if (m !== undefined) writeField(view, offset + member.offset, m, member.type, layout, `${path}.${member.name}`);
      }
      return;
    }

    default:
      throw typeMismatch('packBuffer', `field '${path}' is not host-shareable`, 'buffer data', formatType(type));
  }
}
