import { z } from 'zod';
import { ValueType } from './types';
import { AggregateDescriptor } from './aggregates';
import { CompileError } from './errors';

// ------------------------------------------------------------------
// Validation Types
// ------------------------------------------------------------------

export interface ValidationError {
  path: string[];
  message: string;
  code: string;
}

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] };

// ------------------------------------------------------------------
// Zod Schemas
// ------------------------------------------------------------------

export const IdentifierSchema = z.string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a valid identifier')
  .refine(s => !s.startsWith('__'), 'identifiers starting with "__" are reserved');

const ScalarKindSchema = z.enum(['f32', 'i32', 'u32', 'bool']);
const VectorSizeSchema = z.union([z.literal(2), z.literal(3), z.literal(4)]);
const IndexSchema = z.number().int().nonnegative();

export const ValueTypeSchema: z.ZodType<ValueType> = z.lazy(() => z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('scalar'), scalar: ScalarKindSchema }),
  z.object({ kind: z.literal('vector'), size: VectorSizeSchema, scalar: ScalarKindSchema }),
  z.object({ kind: z.literal('matrix'), columns: VectorSizeSchema, rows: VectorSizeSchema }),
  z.object({
    kind: z.literal('array'),
    element: ValueTypeSchema,
    length: z.union([z.number().int().positive(), z.literal('dynamic')]),
  }),
  z.object({
    kind: z.literal('texture'),
    dimension: z.enum(['1d', '2d', '3d', 'cube']),
    sampled: z.enum(['f32', 'i32', 'u32']),
  }),
  z.object({ kind: z.literal('sampler') }),
  z.object({
    kind: z.literal('struct'),
    name: IdentifierSchema,
    fields: z.array(z.object({ name: IdentifierSchema, type: ValueTypeSchema })).min(1),
  }),
]));

const AggregateFieldSchema = z.discriminatedUnion('class', [
  z.object({ class: z.literal('attribute'), name: IdentifierSchema, type: ValueTypeSchema, location: IndexSchema.optional() }),
  z.object({ class: z.literal('uniform'), name: IdentifierSchema, type: ValueTypeSchema }),
  z.object({ class: z.literal('texture'), name: IdentifierSchema, type: ValueTypeSchema }),
  z.object({ class: z.literal('sampler'), name: IdentifierSchema, type: ValueTypeSchema }),
  z.object({
    class: z.literal('storage'),
    name: IdentifierSchema,
    type: ValueTypeSchema,
    capacity: z.number().int().positive(),
    length: IdentifierSchema,
    access: z.enum(['read', 'read_write']),
  }),
]);

const AggregateRoleSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('vertex') }),
  z.object({ kind: z.literal('instance') }),
  z.object({ kind: z.literal('group'), index: IndexSchema }),
]);

export const AggregateDescriptorSchema = z.object({
  name: IdentifierSchema,
  role: AggregateRoleSchema,
  fields: z.array(AggregateFieldSchema).min(1, 'aggregate declares no fields'),
});

// ------------------------------------------------------------------
// Validator Function
// ------------------------------------------------------------------

export function validateDescriptor(desc: AggregateDescriptor): ValidationResult<AggregateDescriptor> {
  const result = AggregateDescriptorSchema.safeParse(desc);

  // 1. Structural Validation (Zod)
  if (!result.success) {
    const errors: ValidationError[] = result.error.issues.map(err => ({
      path: err.path.map(String),
      message: err.message,
      code: err.code,
    }));
    return { success: false, errors };
  }

  // 2. Semantic Validation
  const semanticErrors: ValidationError[] = [];
  const isGroup = desc.role.kind === 'group';
  const names = new Set<string>();

  desc.fields.forEach((field, idx) => {
    const path = ['fields', idx.toString()];
    if (names.has(field.name)) {
      semanticErrors.push({ path: [...path, 'name'], message: `Duplicate field '${field.name}'.`, code: 'semantic_error' });
    }
    names.add(field.name);

    if (isGroup === (field.class === 'attribute')) {
      semanticErrors.push({
        path: [...path, 'class'],
        message: `Field '${field.name}' of class '${field.class}' cannot appear in a ${desc.role.kind} aggregate.`,
        code: 'semantic_error',
      });
    }

    if (field.class === 'storage') {
      const lengthField = desc.fields.find(f => f.name === field.length);
      if (!lengthField || lengthField.class !== 'uniform') {
        semanticErrors.push({
          path: [...path, 'length'],
          message: `Storage field '${field.name}' names '${field.length}' as its length, which is not a uniform field of '${desc.name}'.`,
          code: 'semantic_error',
        });
      }
    }

    if (field.class === 'uniform' && field.type.kind === 'array' && field.type.length === 'dynamic') {
      semanticErrors.push({
        path: [...path, 'type'],
        message: `Runtime-sized field '${field.name}' must be declared with storage().`,
        code: 'semantic_error',
      });
    }
  });

  if (semanticErrors.length > 0) {
    return { success: false, errors: semanticErrors };
  }
  return { success: true, data: desc };
}

/**
 * Validates every descriptor and throws a single `InvalidDescriptor` error
 * listing all issues of the first offending aggregate.
 */
export function assertValidDescriptors(descs: readonly AggregateDescriptor[]): void {
  for (const desc of descs) {
    const result = validateDescriptor(desc);
    if (!result.success) {
      const reason = result.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('; ');
      throw new CompileError('InvalidDescriptor', `aggregate ${desc.name}`, reason);
    }
  }
}
