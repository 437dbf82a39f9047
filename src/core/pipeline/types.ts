/**
 * Types for the compile orchestrator.
 */
import type { SonarError } from '../../utils/errors.js';
import type { RecompileDecision } from '../cache/validator.js';
import type { MissingFragment } from '../fragments/types.js';
import type { ArtifactPaths } from '../output/paths.js';
import type { CompilationRequest } from '../request/request.js';

/**
 * unchecked → validating → (skipped | compiling) → (committed | failed)
 */
export type CompileState =
  | 'unchecked'
  | 'validating'
  | 'skipped'
  | 'compiling'
  | 'committed'
  | 'failed';

/**
 * Everything derived once from a request. Never mutated after creation.
 */
export interface PipelineContext {
  readonly request: CompilationRequest;
  readonly key: string;
  readonly paths: ArtifactPaths;
  readonly liveMode: boolean;
  /** Absolute directory for resolving relative file fragments */
  readonly baseDir: string;
}

interface OutcomeBase {
  key: string;
  theme: string;
  outputPath: string;
  /** States visited, in order */
  states: CompileState[];
}

export interface CompileSuccess extends OutcomeBase {
  ok: true;
  state: 'skipped' | 'committed';
  /** Timestamp of the compile that produced the artifact */
  compiledAt: number;
}

export interface CompileFailure extends OutcomeBase {
  ok: false;
  state: 'failed';
  error: SonarError;
  /** Existing (possibly stale) artifact to serve instead, or null when there is none */
  fallbackPath: string | null;
}

export type CompileOutcome = CompileSuccess | CompileFailure;

export interface CompileStatus {
  key: string;
  outputPath: string;
  decision: RecompileDecision;
  missing: MissingFragment[];
}

export interface PostCompileContext {
  key: string;
  theme: string;
  request: CompilationRequest;
}

/**
 * Receives the compiled CSS before it is written and returns the text to write.
 */
export type PostCompileHook = (css: string, context: PostCompileContext) => string | Promise<string>;

export interface DiagnosticRecord {
  stage: 'source' | 'compiled';
  key: string;
  theme: string;
  content: string;
}

export type DiagnosticSink = (record: DiagnosticRecord) => void;
