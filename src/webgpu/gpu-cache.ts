import { Expr, Store } from '../ir/builder';
import { ShaderModule } from '../ir/module';
import { canonicalGraph } from '../ir/utils';
import { ShaderSource, builderOf } from '../compiler/lowering';
import { CompileOptions, resolveOptions } from '../compiler/options';
import { compileOrThrow, emit } from '../compiler/compile';
import { resolveBindings } from './binding-resolver';

export interface PipelineTarget {
  colorFormat: GPUTextureFormat;
  sampleCount?: number;
  depthFormat?: GPUTextureFormat;
  topology?: GPUPrimitiveTopology;
}

export type ResolvedTarget = Required<Omit<PipelineTarget, 'depthFormat'>> & Pick<PipelineTarget, 'depthFormat'>;

export interface CompiledShader {
  module: ShaderModule;
  code: string;
  /** Short hash of the cache key, for labels and logs. */
  fingerprint: string;
}

export interface PipelineBackend<T> {
  createPipeline(shader: CompiledShader, target: ResolvedTarget): Promise<T>;
}

export interface CacheEntry<T> extends CompiledShader {
  pipeline: T;
}

/**
 * Simple hash function for cache keys
 */
export function hashString(str: string): string {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    hash = ((hash << 5) - hash) + str.charCodeAt(i);
    hash |= 0; // Convert to 32-bit integer
  }
  return (hash >>> 0).toString(36);
}

export function resolveTarget(target: PipelineTarget): ResolvedTarget {
  return {
    colorFormat: target.colorFormat,
    sampleCount: target.sampleCount ?? 1,
    depthFormat: target.depthFormat,
    topology: target.topology ?? 'triangle-list',
  };
}

/**
 * Structural key of a shader: its canonical expression graph, the resolved
 * layout of its aggregates, the compile options and the render target. Two
 * sources built separately but describing the same shader share a key.
 */
export function cacheKey(source: ShaderSource, target: PipelineTarget, options: CompileOptions = {}): string {
  const builder = builderOf(source);
  const roots: { label: string; id: number }[] = [];
  if (source.vertex) roots.push({ label: 'vertex', id: source.vertex.id });
  if (source.fragment instanceof Expr) roots.push({ label: 'fragment', id: source.fragment.id });
  const stores = source.compute instanceof Store ? [source.compute] : source.compute ?? [];
  stores.forEach((s, i) => {
    roots.push({ label: `store${i} target`, id: s.target }, { label: `store${i} index`, id: s.index }, { label: `store${i} value`, id: s.value });
  });

  const resolved = resolveOptions(options);
  const graph = canonicalGraph(builder, roots);
  const discards = source.fragment !== undefined && !(source.fragment instanceof Expr) ? 'fragment discard\n' : '';
  const layout = resolveBindings(source.aggregates ?? builder.aggregates, resolved.limits);

  return [
    `${discards}${graph}`,
    JSON.stringify(layout),
    JSON.stringify(resolved),
    JSON.stringify(resolveTarget(target)),
  ].join('\n--\n');
}

/**
 * Caches compiled shaders and backend pipelines by structural key. The
 * in-flight promise is stored as soon as it is created, so concurrent requests
 * for the same shader share one compile and one pipeline. Failed entries are
 * dropped so a later request can retry. Entries are never evicted.
 */
export class PipelineCache<T> {
  private entries = new Map<string, Promise<CacheEntry<T>>>();

  constructor(
    private readonly backend: PipelineBackend<T>,
    private readonly options: CompileOptions = {},
  ) { }

  get size(): number {
    return this.entries.size;
  }

  get(source: ShaderSource, target: PipelineTarget): Promise<CacheEntry<T>> {
    let key: string;
    try {
      key = cacheKey(source, target, this.options);
    } catch (e) {
      return Promise.reject(e);
    }

    const cached = this.entries.get(key);
    if (cached) return cached;

    const fingerprint = hashString(key);
    const pending = this.build(source, resolveTarget(target), fingerprint);
    this.entries.set(key, pending);
    void pending.catch((e: unknown) => {
      this.entries.delete(key);
      console.warn(`[PipelineCache] dropping ${fingerprint}: ${e instanceof Error ? e.message : String(e)}`);
    });
    return pending;
  }

  has(source: ShaderSource, target: PipelineTarget): boolean {
    return this.entries.has(cacheKey(source, target, this.options));
  }

  clear() {
    this.entries.clear();
  }

  private async build(source: ShaderSource, target: ResolvedTarget, fingerprint: string): Promise<CacheEntry<T>> {
    const module = compileOrThrow(source, this.options);
    const code = emit(module);
    if (this.options.debug) {
      console.debug(`[PipelineCache] compiled ${fingerprint} (${code.length} chars)`);
    }
    const shader: CompiledShader = { module, code, fingerprint };
    const pipeline = await this.backend.createPipeline(shader, target);
    return { ...shader, pipeline };
  }
}
