export type CompileErrorKind =
  | 'TypeMismatch'
  | 'StageScopeError'
  | 'StageViolation'
  | 'DuplicateLocation'
  | 'LayoutOverflow'
  | 'InvalidDescriptor';

export interface CompileErrorDetail {
  expected?: string;
  actual?: string;
}

/**
 * A user-facing compilation failure. Raised eagerly while building expressions
 * or resolving layouts; `compile` turns it into a failed result.
 */
export class CompileError extends Error {
  constructor(
    public readonly kind: CompileErrorKind,
    public readonly operation: string,
    public readonly reason: string,
    public readonly detail: CompileErrorDetail = {},
  ) {
    const parts = [`${kind} in '${operation}': ${reason}`];
    if (detail.expected !== undefined) parts.push(`expected ${detail.expected}`);
    if (detail.actual !== undefined) parts.push(`got ${detail.actual}`);
    super(parts.join('; '));
    this.name = 'CompileError';

    // Set the prototype explicitly.
    Object.setPrototypeOf(this, CompileError.prototype);
  }
}

/**
 * An invariant that an earlier compiler stage should have guaranteed was broken.
 * Always a defect in the compiler itself.
 */
export class InternalConsistencyError extends Error {
  public readonly kind = 'InternalConsistency';

  constructor(public readonly stage: string, message: string) {
    super(`InternalConsistency in ${stage}: ${message}`);
    this.name = 'InternalConsistencyError';

    // Set the prototype explicitly.
    Object.setPrototypeOf(this, InternalConsistencyError.prototype);
  }
}

export const typeMismatch = (operation: string, reason: string, expected?: string, actual?: string) =>
  new CompileError('TypeMismatch', operation, reason, { expected, actual });

export function assertConsistent(condition: boolean, stage: string, message: string): asserts condition {
  if (!condition) throw new InternalConsistencyError(stage, message);
}
