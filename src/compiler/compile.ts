/**
 * @file compile.ts
 * @description Public compiler entry points: stage roots in, `ShaderModule`
 * and WGSL out.
 *
 * @external-interactions
 * - `PipelineCache` calls `compileOrThrow` once per distinct fingerprint.
 *
 * @pitfalls
 * - `CompileError`s become a failed result; an `InternalConsistencyError` is a
 *   compiler defect and is rethrown after logging.
 */
import { AggregateDescriptor } from '../ir/aggregates';
import { CompileError, InternalConsistencyError } from '../ir/errors';
import { ShaderModule } from '../ir/module';
import { resolveBindings } from '../webgpu/binding-resolver';
import { emitWgsl } from '../webgpu/wgsl-generator';
import { ShaderSource, builderOf, analyzeSource, lowerModule } from './lowering';
import { CompileOptions, resolveOptions } from './options';

export type CompileResult =
  | { success: true; module: ShaderModule }
  | { success: false; error: CompileError };

export function compileOrThrow(source: ShaderSource, options: CompileOptions = {}): ShaderModule {
  const resolved = resolveOptions(options);
  const builder = builderOf(source);
  const roots = analyzeSource(builder, source);

  const used: AggregateDescriptor[] = [];
  for (const analysis of [roots.vertex, roots.fragment, roots.compute]) {
    for (const a of analysis?.aggregates ?? []) {
      if (!used.includes(a)) used.push(a);
    }
  }
  const aggregates = source.aggregates ?? builder.aggregates;
  for (const a of used) {
    if (!aggregates.includes(a)) {
      throw new CompileError('InvalidDescriptor', 'compile', `aggregate ${a.name} is read but not part of the shader's aggregates`);
    }
  }

  const layout = resolveBindings(aggregates, resolved.limits);
  const module = lowerModule(builder, source, roots, layout, resolved.lowering);

  if (resolved.debug) {
    console.debug(`[WgslCompiler] ${builder.size} nodes, ${layout.bindings.length} bindings, ${layout.vertexLayout.length + layout.instanceLayout.length} attributes`);
  }
  return module;
}

export function compile(source: ShaderSource, options: CompileOptions = {}): CompileResult {
  try {
    return { success: true, module: compileOrThrow(source, options) };
  } catch (e) {
    if (e instanceof CompileError) return { success: false, error: e };
    if (e instanceof InternalConsistencyError) {
      console.error(`[WgslCompiler] ${e.message}`);
    }
    throw e;
  }
}

export function emit(module: ShaderModule): string {
  try {
    return emitWgsl(module);
  } catch (e) {
    if (e instanceof InternalConsistencyError) {
      console.error(`[WgslCompiler] ${e.message}`);
    }
    throw e;
  }
}
