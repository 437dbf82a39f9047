/**
 * Runs one Dart Sass compile on a worker thread.
 *
 * Sass compiles synchronously, so the calling thread cannot time it out. The
 * worker is terminated when the caller's signal aborts, which stops the compile.
 */
import { createRequire } from 'node:module';
import { Worker } from 'node:worker_threads';
import { logger } from '../../utils/logger.js';

const log = logger.child('sass');

export interface SassJob {
  source: string;
  style: 'expanded' | 'compressed';
  charset: boolean;
  sourceMap: boolean;
  /** Absolute path the source is compiled as, for relative loads and error spans */
  sourcePath: string;
  loadPaths: string[];
}

export interface SassWorkerSuccess {
  ok: true;
  css: string;
  /** Serialized source map, when one was requested */
  sourceMap: string | null;
  loadedFiles: string[];
  warnings: string[];
}

export interface SassWorkerFailure {
  ok: false;
  message: string;
  sassMessage: string | null;
  /** Zero-based span of a Sass exception */
  file: string | null;
  line: number | null;
  column: number | null;
  warnings: string[];
}

export type SassWorkerReply = SassWorkerSuccess | SassWorkerFailure;

// The worker loads the CommonJS build of sass by absolute path, so it needs no resolution of its own.
const SASS_ENTRY = createRequire(import.meta.url).resolve('sass');

const WORKER_SOURCE = `
const { parentPort, workerData } = require('node:worker_threads');
const { pathToFileURL, fileURLToPath } = require('node:url');
const sass = require(workerData.sassEntry);
const job = workerData.job;
const warnings = [];

try {
  const result = sass.compileString(job.source, {
    syntax: 'scss',
    style: job.style,
    charset: job.charset,
    sourceMap: job.sourceMap,
    url: pathToFileURL(job.sourcePath),
    loadPaths: job.loadPaths,
    logger: {
      warn: (message) => warnings.push(message),
      debug: (message) => warnings.push(message),
    },
  });
  parentPort.postMessage({
    ok: true,
    css: result.css,
    sourceMap: result.sourceMap ? JSON.stringify(result.sourceMap) : null,
    loadedFiles: result.loadedUrls.filter((url) => url.protocol === 'file:').map((url) => fileURLToPath(url)),
    warnings,
  });
} catch (error) {
  const span = error && error.span;
  const url = span && span.url;
  parentPort.postMessage({
    ok: false,
    message: error instanceof Error ? error.message : String(error),
    sassMessage: error && typeof error.sassMessage === 'string' ? error.sassMessage : null,
    file: url && url.protocol === 'file:' ? fileURLToPath(url) : null,
    line: span ? span.start.line : null,
    column: span ? span.start.column : null,
    warnings,
  });
}
`;

/**
 * Compile `job` on a fresh worker. Rejects with the signal's reason when it
 * aborts first.
 */
export function runSassWorker(job: SassJob, signal?: AbortSignal): Promise<SassWorkerReply> {
  return new Promise<SassWorkerReply>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const worker = new Worker(WORKER_SOURCE, {
      eval: true,
      workerData: { sassEntry: SASS_ENTRY, job },
    });
    let settled = false;

    const settle = (done: () => void): void => {
      if (settled) return;
      settled = true;
      signal?.removeEventListener('abort', onAbort);
      done();
    };

    const onAbort = (): void => {
      settle(() => reject(abortReason(signal)));
      worker.terminate().then(
        () => log.debug('Stopped Sass worker', { sourcePath: job.sourcePath }),
        (error: unknown) => log.warn('Could not stop Sass worker', { error: String(error) })
      );
    };

    signal?.addEventListener('abort', onAbort, { once: true });
    worker.once('message', (reply: SassWorkerReply) => settle(() => resolve(reply)));
    worker.once('error', (error: Error) => settle(() => reject(error)));
    worker.once('exit', (code: number) =>
      settle(() => reject(new Error(`Sass worker exited with code ${code} before replying`)))
    );
  });
}

function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof Error ? reason : new Error('Sass compile was cancelled');
}
