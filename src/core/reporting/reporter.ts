/**
 * Routes compile failures: always to the log, and as a visible notice only to callers
 * allowed to see error detail.
 */
import { logger } from '../../utils/logger.js';
import type { SonarError } from '../../utils/errors.js';

const log = logger.child('compile');

/**
 * Permission check for showing error detail to the current caller.
 */
export interface ErrorAudience {
  canViewErrors(): boolean;
}

export type NoticeSeverity = 'error' | 'warning';

export interface Notice {
  severity: NoticeSeverity;
  message: string;
  code: string;
}

/**
 * User-visible transient notices (e.g. a flash message on the next page).
 */
export interface NoticeSink {
  notify(notice: Notice): void;
}

/** Nobody sees error detail. */
export const ANONYMOUS_AUDIENCE: ErrorAudience = { canViewErrors: () => false };

/** Notices are dropped. */
export const SILENT_NOTICES: NoticeSink = { notify: () => {} };

/**
 * Collects notices in memory; the CLI prints them after a run.
 */
export class BufferedNoticeSink implements NoticeSink {
  readonly notices: Notice[] = [];

  notify(notice: Notice): void {
    this.notices.push(notice);
  }
}

export class ErrorReporter {
  constructor(
    private readonly audience: ErrorAudience = ANONYMOUS_AUDIENCE,
    private readonly notices: NoticeSink = SILENT_NOTICES
  ) {}

  report(error: SonarError, severity: NoticeSeverity = 'error'): void {
    log.warn(error.message, { code: error.code, ...error.details });

    if (!this.audience.canViewErrors()) return;
    try {
      this.notices.notify({ severity, message: error.message, code: error.code });
    } catch (notifyError) {
      log.warn('Could not deliver notice', {
        code: error.code,
        reason: notifyError instanceof Error ? notifyError.message : String(notifyError),
      });
    }
  }
}
