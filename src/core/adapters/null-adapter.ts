/**
 * Fallback adapter used when no backend is registered for the configured id.
 */
import { NoBackendConfiguredError } from '../../utils/errors.js';
import type { CompiledOutput, CompilerAdapter } from './types.js';

export class NullAdapter implements CompilerAdapter {
  readonly id = 'none';

  constructor(private readonly requested?: string) {}

  async compile(): Promise<CompiledOutput> {
    throw new NoBackendConfiguredError(this.requested);
  }
}
