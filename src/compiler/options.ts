import { z } from 'zod';
import { IdentifierSchema, ValidationError, ValidationResult } from '../ir/schema';
import { CompileError } from '../ir/errors';
import { TargetLimits, DEFAULT_LIMITS, DEFAULT_WORKGROUP_SIZE, ENTRY_POINTS } from '../constants';
import { LoweringOptions } from './lowering';

const PositiveInt = z.number().int().positive();

export const CompileOptionsSchema = z.object({
  limits: z.object({
    maxBindGroups: PositiveInt,
    maxBindingsPerBindGroup: PositiveInt,
    maxVertexAttributes: PositiveInt,
    maxVertexBuffers: PositiveInt,
    maxUniformBufferBindingSize: PositiveInt,
  }).partial().strict().optional(),
  workgroupSize: z.tuple([PositiveInt, PositiveInt, PositiveInt]).optional(),
  entryPoints: z.object({
    vertex: IdentifierSchema,
    fragment: IdentifierSchema,
    compute: IdentifierSchema,
  }).partial().strict().optional(),
  debug: z.boolean().optional(),
}).strict();

export type CompileOptions = z.infer<typeof CompileOptionsSchema>;

export interface ResolvedOptions {
  limits: TargetLimits;
  lowering: LoweringOptions;
  debug: boolean;
}

export function validateOptions(options: unknown): ValidationResult<CompileOptions> {
  const result = CompileOptionsSchema.safeParse(options);
  if (!result.success) {
    const errors: ValidationError[] = result.error.issues.map(err => ({
      path: err.path.map(String),
      message: err.message,
      code: err.code,
    }));
    return { success: false, errors };
  }

  const entryPoints = { ...ENTRY_POINTS, ...result.data.entryPoints };
  const names = Object.values(entryPoints);
  if (new Set(names).size !== names.length) {
    return {
      success: false,
      errors: [{ path: ['entryPoints'], message: `Entry point names must be distinct, got ${names.join(', ')}.`, code: 'semantic_error' }],
    };
  }
  return { success: true, data: result.data };
}

/** Merges caller options over the target defaults. */
export function resolveOptions(options: CompileOptions = {}): ResolvedOptions {
  const result = validateOptions(options);
  if (!result.success) {
    const reason = result.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`).join('; ');
    throw new CompileError('InvalidDescriptor', 'compile options', reason);
  }
  const data = result.data;
  return {
    limits: { ...DEFAULT_LIMITS, ...data.limits },
    lowering: {
      entryPoints: { ...ENTRY_POINTS, ...data.entryPoints },
      workgroupSize: data.workgroupSize ?? DEFAULT_WORKGROUP_SIZE,
    },
    debug: data.debug ?? false,
  };
}
