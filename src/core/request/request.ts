/**
 * CompilationRequest - the immutable per-request value threaded through every pipeline stage.
 */
import { z } from 'zod';
import { RequestError, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';
import type { Fragment, FragmentSet } from '../fragments/types.js';

/** A theme names a directory, so it must be one safe path segment. */
export const ThemeSchema = z
  .string()
  .regex(/^[A-Za-z0-9_.-]+$/, 'Theme may only contain letters, digits, ".", "_" and "-"')
  .refine((theme) => theme !== '.' && theme !== '..', 'Theme may not be "." or ".."');

export const FragmentSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('inline'), payload: z.string() }),
  z.object({ kind: z.literal('file'), payload: z.string().min(1, 'File fragment path is empty') }),
]);

const RequestOptionsSchema = z.object({
  theme: ThemeSchema,
  liveMode: z.boolean().optional(),
  requestedAt: z.number().int().nonnegative().optional(),
});

export interface CompilationRequest {
  readonly theme: string;
  /** Ordered by insertion; the order is both the key input and the aggregation order */
  readonly fragments: FragmentSet;
  /** Overrides the configured live mode for this request */
  readonly liveMode?: boolean;
  /** Epoch ms; names the temporary source and becomes the record timestamp */
  readonly requestedAt: number;
}

export interface CompilationRequestInput {
  theme: string;
  fragments: Iterable<readonly [string, Fragment]>;
  liveMode?: boolean;
  requestedAt?: number;
}

function invalid(message: string, details?: Record<string, unknown>): RequestError {
  return new RequestError(ErrorCodes.INVALID_REQUEST, message, details);
}

/**
 * Validate input and build a frozen request.
 * Fragment identifiers must be non-empty and unique.
 */
export function createCompilationRequest(
  input: CompilationRequestInput,
  now: () => number = Date.now
): CompilationRequest {
  const options = RequestOptionsSchema.safeParse({
    theme: input.theme,
    liveMode: input.liveMode,
    requestedAt: input.requestedAt,
  });
  if (!options.success) {
    throw invalid(`Invalid compilation request: ${formatZodError(options.error)}`);
  }

  const fragments = new Map<string, Fragment>();
  for (const [id, fragment] of input.fragments) {
    if (id.length === 0) {
      throw invalid('Fragment identifiers must not be empty');
    }
    if (fragments.has(id)) {
      throw invalid(`Duplicate fragment identifier "${id}"`, { id });
    }
    const parsed = FragmentSchema.safeParse(fragment);
    if (!parsed.success) {
      throw invalid(`Invalid fragment "${id}": ${formatZodError(parsed.error)}`, { id });
    }
    fragments.set(id, Object.freeze(parsed.data));
  }

  return Object.freeze({
    theme: options.data.theme,
    fragments,
    liveMode: options.data.liveMode,
    requestedAt: options.data.requestedAt ?? now(),
  });
}
