/**
 * StylesheetCompiler - orchestrates one compilation request:
 *
 *   unchecked → validating → (skipped | compiling) → (committed | failed)
 *
 * `compile()` never throws for request-level problems. Every failure is reported and
 * returned as a CompileFailure naming the artifact (if any) the caller should fall back to.
 * Requests for the same key are serialized per instance and re-validated once they hold the
 * lock, so a queued duplicate finds the fresh artifact and skips.
 */
import * as path from 'node:path';
import {
  CacheStoreError,
  CompileError,
  ErrorCodes,
  MissingSourceFileError,
  SonarError,
  toSonarError,
} from '../../utils/errors.js';
import { fileExists } from '../../utils/file-system.js';
import { KeyedLock } from '../../utils/keyed-lock.js';
import { logger } from '../../utils/logger.js';
import { withTimeout } from '../../utils/timeout.js';
import { createDefaultRegistry, type AdapterRegistry } from '../adapters/registry.js';
import type { CompilerAdapter } from '../adapters/types.js';
import { createCacheStore, type CacheStore } from '../cache/store.js';
import type { CacheRecord } from '../cache/types.js';
import { checkRecompile } from '../cache/validator.js';
import type { Config } from '../config/schema.js';
import { normalize, validateFragments } from '../fragments/normalizer.js';
import { computeKey } from '../identity/key.js';
import { getArtifactPaths } from '../output/paths.js';
import {
  commitArtifact,
  ensureDestination,
  removeTempSource,
  writeTempSource,
} from '../output/writer.js';
import { ErrorReporter, type ErrorAudience, type NoticeSink } from '../reporting/reporter.js';
import type { CompilationRequest } from '../request/request.js';
import type {
  CompileFailure,
  CompileOutcome,
  CompileState,
  CompileStatus,
  DiagnosticSink,
  PipelineContext,
  PostCompileHook,
} from './types.js';

const log = logger.child('compile');

/**
 * Default diagnostic sink: writes through the logger.
 */
export const logDiagnostics: DiagnosticSink = (record) => {
  log.info(`${record.stage === 'source' ? 'Normalized source' : 'Compiled output'} for ${record.key}`, {
    theme: record.theme,
    content: record.content,
  });
};

export interface StylesheetCompilerOptions {
  projectRoot: string;
  config: Config;
  /** Use this adapter instead of resolving `config.backend` through the registry */
  adapter?: CompilerAdapter;
  registry?: AdapterRegistry;
  /** Defaults to the store named by `config.cache` */
  store?: CacheStore;
  hooks?: PostCompileHook[];
  audience?: ErrorAudience;
  notices?: NoticeSink;
  diagnostics?: DiagnosticSink;
  /** Share a lock between compilers that write to the same destination */
  lock?: KeyedLock;
}

export class StylesheetCompiler {
  readonly adapter: CompilerAdapter;
  readonly store: CacheStore;
  private readonly config: Config;
  private readonly destinationRoot: string;
  private readonly baseDir: string;
  private readonly hooks: PostCompileHook[];
  private readonly reporter: ErrorReporter;
  private readonly diagnostics: DiagnosticSink;
  private readonly lock: KeyedLock;

  constructor(options: StylesheetCompilerOptions) {
    const { projectRoot, config } = options;
    this.config = config;
    this.destinationRoot = path.resolve(projectRoot, config.destination);
    this.baseDir = path.resolve(projectRoot, config.base_dir);
    this.adapter =
      options.adapter ?? (options.registry ?? createDefaultRegistry()).resolve({ config, projectRoot });
    this.store = options.store ?? createCacheStore(config.cache, projectRoot);
    this.hooks = [...(options.hooks ?? [])];
    this.reporter = new ErrorReporter(options.audience, options.notices);
    this.diagnostics = options.diagnostics ?? logDiagnostics;
    this.lock = options.lock ?? new KeyedLock();
  }

  /**
   * Register a hook that may rewrite compiled CSS before it is written.
   * Hooks run in registration order.
   */
  addPostCompileHook(hook: PostCompileHook): void {
    this.hooks.push(hook);
  }

  /**
   * Derive key and artifact locations for a request without touching the filesystem.
   */
  locate(request: CompilationRequest): PipelineContext {
    const key = computeKey(request.theme, request.fragments.keys(), this.config.key_prefix);
    return Object.freeze({
      request,
      key,
      paths: getArtifactPaths(this.destinationRoot, request.theme, key, request.requestedAt),
      liveMode: request.liveMode ?? this.config.live_mode,
      baseDir: this.baseDir,
    });
  }

  /**
   * Report whether a request would recompile, without compiling.
   */
  async status(request: CompilationRequest): Promise<CompileStatus> {
    const context = this.locate(request);
    const record = await this.readRecord(context.key);
    const [decision, validation] = await Promise.all([
      checkRecompile({
        key: context.key,
        outputPath: context.paths.outputPath,
        fragments: request.fragments,
        record,
        liveMode: context.liveMode,
        baseDir: context.baseDir,
      }),
      validateFragments(request.fragments, context.baseDir),
    ]);

    return {
      key: context.key,
      outputPath: context.paths.outputPath,
      decision,
      missing: validation.missing,
    };
  }

  /**
   * Make sure an up-to-date artifact exists for the request.
   */
  async compile(request: CompilationRequest): Promise<CompileOutcome> {
    const context = this.locate(request);
    const states: CompileState[] = ['unchecked'];

    try {
      return await this.lock.run(context.key, () => this.run(context, states));
    } catch (error) {
      return this.fail(
        context,
        states,
        toSonarError(error, (message) => new SonarError(ErrorCodes.COMPILE_FAILED, message))
      );
    }
  }

  private async run(context: PipelineContext, states: CompileState[]): Promise<CompileOutcome> {
    const { request, key, paths } = context;

    states.push('validating');
    const record = await this.readRecord(key);
    const [decision, validation] = await Promise.all([
      checkRecompile({
        key,
        outputPath: paths.outputPath,
        fragments: request.fragments,
        record,
        liveMode: context.liveMode,
        baseDir: context.baseDir,
      }),
      validateFragments(request.fragments, context.baseDir),
    ]);

    if (validation.missing.length > 0) {
      const [first, ...rest] = validation.missing.map(
        (m) => new MissingSourceFileError(m.id, m.path)
      );
      // The outcome carries the first error; the rest are reported alongside it
      for (const error of rest) {
        this.reporter.report(error);
      }
      return this.fail(context, states, first);
    }

    if (!decision.recompile && record) {
      states.push('skipped');
      log.debug('Artifact is current', { key });
      return {
        ok: true,
        state: 'skipped',
        key,
        theme: request.theme,
        outputPath: paths.outputPath,
        states,
        compiledAt: record.lastCompiledAt,
      };
    }

    states.push('compiling');
    log.debug('Compiling', { key, reason: decision.reason, modified: decision.modified });

    try {
      const compiledAt = await this.compileAndCommit(context);
      states.push('committed');
      return {
        ok: true,
        state: 'committed',
        key,
        theme: request.theme,
        outputPath: paths.outputPath,
        states,
        compiledAt,
      };
    } catch (error) {
      return this.fail(
        context,
        states,
        toSonarError(error, (message) => new CompileError(ErrorCodes.COMPILE_FAILED, message))
      );
    }
  }

  private async compileAndCommit(context: PipelineContext): Promise<number> {
    const { request, key, paths } = context;

    await ensureDestination(paths.directory);

    const source = normalize(request.fragments, context.baseDir);
    await writeTempSource(paths.tempPath, source);
    this.emit('source', context, source);

    const abandon = new AbortController();
    const output = await withTimeout(
      this.adapter.compile(source, {
        key,
        theme: request.theme,
        baseDir: context.baseDir,
        sourcePath: paths.tempPath,
        signal: abandon.signal,
      }),
      this.config.compile_timeout_ms,
      () => {
        const error = new CompileError(
          ErrorCodes.COMPILE_TIMEOUT,
          `Compiler backend "${this.adapter.id}" did not finish within ${this.config.compile_timeout_ms}ms`,
          { key, timeoutMs: this.config.compile_timeout_ms }
        );
        abandon.abort(error);
        return error;
      }
    );

    await removeTempSource(paths.tempPath);

    let css = output.css;
    for (const hook of this.hooks) {
      css = await hook(css, { key, theme: request.theme, request });
    }
    this.emit('compiled', context, css);

    await commitArtifact(paths.outputPath, css);

    const record: CacheRecord = { key, lastCompiledAt: request.requestedAt, expiresAt: null };
    try {
      await this.store.set(record);
    } catch (error) {
      throw toSonarError(error, (message) => new CacheStoreError(message, { key }));
    }

    log.debug('Committed artifact', { key, outputPath: paths.outputPath });
    return record.lastCompiledAt;
  }

  private async readRecord(key: string): Promise<CacheRecord | null> {
    try {
      return await this.store.get(key);
    } catch (error) {
      throw toSonarError(error, (message) => new CacheStoreError(message, { key }));
    }
  }

  private emit(stage: 'source' | 'compiled', context: PipelineContext, content: string): void {
    if (!this.config.debug) return;
    this.diagnostics({ stage, key: context.key, theme: context.request.theme, content });
  }

  private async fail(
    context: PipelineContext,
    states: CompileState[],
    error: SonarError
  ): Promise<CompileFailure> {
    states.push('failed');
    this.reporter.report(error);

    const outputPath = context.paths.outputPath;
    return {
      ok: false,
      state: 'failed',
      key: context.key,
      theme: context.request.theme,
      outputPath,
      states,
      error,
      fallbackPath: (await fileExists(outputPath)) ? outputPath : null,
    };
  }
}
