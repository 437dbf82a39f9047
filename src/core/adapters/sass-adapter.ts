/**
 * SCSS backend built on Dart Sass. Each compile runs on its own worker thread
 * and stops when the context's signal aborts.
 */
import * as path from 'node:path';
import { CompileError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { SassSettings } from '../config/schema.js';
import type { CompileContext, CompiledOutput, CompilerAdapter } from './types.js';
import { runSassWorker, type SassWorkerFailure, type SassWorkerReply } from './sass-worker.js';

const log = logger.child('sass');

function formatLocation(failure: SassWorkerFailure, fallback: string): string {
  // Sass spans are zero-based
  return `${failure.file ?? fallback}:${(failure.line ?? 0) + 1}:${(failure.column ?? 0) + 1}`;
}

function inlineSourceMap(map: string): string {
  const encoded = Buffer.from(map).toString('base64');
  return `\n\n/*# sourceMappingURL=data:application/json;charset=utf-8;base64,${encoded} */`;
}

export class SassAdapter implements CompilerAdapter {
  readonly id = 'sass';
  private readonly loadPaths: string[];

  constructor(
    private readonly settings: SassSettings,
    projectRoot: string
  ) {
    this.loadPaths = settings.load_paths.map((p) => path.resolve(projectRoot, p));
  }

  async compile(source: string, context: CompileContext): Promise<CompiledOutput> {
    let reply: SassWorkerReply;
    try {
      reply = await runSassWorker(
        {
          source,
          style: this.settings.style,
          charset: this.settings.charset,
          sourceMap: this.settings.source_map,
          // Relative loads resolve next to the temporary source file, then through load paths
          sourcePath: context.sourcePath,
          loadPaths: [context.baseDir, ...this.loadPaths],
        },
        context.signal
      );
    } catch (error) {
      if (context.signal?.aborted && error === context.signal.reason) throw error;
      throw new CompileError(
        ErrorCodes.COMPILE_FAILED,
        `Sass compilation failed for ${context.key}: ${error instanceof Error ? error.message : String(error)}`,
        { key: context.key }
      );
    }

    for (const warning of reply.warnings) {
      log.debug(warning, { key: context.key });
    }

    if (!reply.ok) {
      if (reply.sassMessage === null) {
        throw new CompileError(
          ErrorCodes.COMPILE_FAILED,
          `Sass compilation failed for ${context.key}: ${reply.message}`,
          { key: context.key }
        );
      }
      const location = formatLocation(reply, context.sourcePath);
      throw new CompileError(
        ErrorCodes.COMPILE_FAILED,
        `Sass compilation failed for ${context.key}\n\n${location} - error: ${reply.sassMessage}`,
        { key: context.key, location, sassMessage: reply.sassMessage }
      );
    }

    const css = reply.sourceMap ? reply.css + inlineSourceMap(reply.sourceMap) : reply.css;
    return { css, loadedFiles: reply.loadedFiles };
  }
}
