/**
 * Error types and codes for Sonar.
 * Every error the pipeline produces extends SonarError so callers can branch on `code`.
 */

/**
 * Base error class for all Sonar errors.
 */
export class SonarError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SonarError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration errors (loading, parsing, validation).
 */
export class ConfigError extends SonarError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Malformed compilation requests or manifests.
 */
export class RequestError extends SonarError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'RequestError';
  }
}

/**
 * A file fragment points at a path that does not exist.
 */
export class MissingSourceFileError extends SonarError {
  constructor(
    public readonly fragmentId: string,
    public readonly sourcePath: string
  ) {
    super(
      ErrorCodes.MISSING_SOURCE_FILE,
      `Stylesheet source not found: ${sourcePath} (fragment "${fragmentId}")`,
      { fragmentId, sourcePath }
    );
    this.name = 'MissingSourceFileError';
  }
}

/**
 * The destination directory could not be created or is not writable.
 */
export class DirectoryError extends SonarError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.DIRECTORY_ERROR, message, details);
    this.name = 'DirectoryError';
  }
}

/**
 * The temporary source file could not be written.
 */
export class TempWriteError extends SonarError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.TEMP_WRITE_ERROR, message, details);
    this.name = 'TempWriteError';
  }
}

/**
 * The compiled artifact could not be written to its final location.
 */
export class OutputWriteError extends SonarError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.OUTPUT_WRITE_ERROR, message, details);
    this.name = 'OutputWriteError';
  }
}

/**
 * The cache record store failed to read or persist a record.
 */
export class CacheStoreError extends SonarError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.CACHE_STORE_ERROR, message, details);
    this.name = 'CacheStoreError';
  }
}

/**
 * Backend compilation failure (syntax error, crash, timeout).
 */
export class CompileError extends SonarError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'CompileError';
  }
}

/**
 * Raised by the fallback adapter when no backend is registered.
 */
export class NoBackendConfiguredError extends CompileError {
  constructor(requested?: string) {
    super(
      ErrorCodes.NO_BACKEND_CONFIGURED,
      requested
        ? `No stylesheet compiler backend registered for "${requested}"`
        : 'No stylesheet compiler backend configured',
      requested ? { requested } : undefined
    );
    this.name = 'NoBackendConfiguredError';
  }
}

export const ErrorCodes = {
  // Source errors
  MISSING_SOURCE_FILE: 'F001',

  // Output errors
  DIRECTORY_ERROR: 'W001',
  TEMP_WRITE_ERROR: 'W002',
  OUTPUT_WRITE_ERROR: 'W003',
  CACHE_STORE_ERROR: 'W004',

  // Compile errors
  COMPILE_FAILED: 'C001',
  NO_BACKEND_CONFIGURED: 'C002',
  COMPILE_TIMEOUT: 'C003',

  // Config / request errors
  CONFIG_LOAD_ERROR: 'S001',
  PARSE_ERROR: 'S002',
  INVALID_REQUEST: 'S003',
  INVALID_MANIFEST: 'S004',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Coerce anything thrown into a SonarError, keeping SonarErrors as they are.
 */
export function toSonarError(
  error: unknown,
  wrap: (message: string, cause: unknown) => SonarError
): SonarError {
  if (error instanceof SonarError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return wrap(message, error);
}
