/**
 * Compiler Adapter contract.
 * A backend converts normalized stylesheet source into CSS, failing with CompileError.
 */
import type { Config } from '../config/schema.js';

export interface CompileContext {
  key: string;
  theme: string;
  /** Absolute directory relative file fragments were resolved against */
  baseDir: string;
  /** Absolute path of the temporary source file written for this request */
  sourcePath: string;
  /** Aborted once the compile has been abandoned, with the failure as its reason */
  signal?: AbortSignal;
}

export interface CompiledOutput {
  css: string;
  /** Files the backend read while compiling, when it reports them */
  loadedFiles?: string[];
}

export interface CompilerAdapter {
  readonly id: string;
  compile(source: string, context: CompileContext): Promise<CompiledOutput>;
}

export interface AdapterFactoryOptions {
  config: Config;
  projectRoot: string;
}

export type AdapterFactory = (options: AdapterFactoryOptions) => CompilerAdapter;
