/**
 * Explicit backend registry: backend id → adapter factory.
 * The adapter is resolved once, when a compiler is constructed.
 */
import { logger } from '../../utils/logger.js';
import { NullAdapter } from './null-adapter.js';
import { SassAdapter } from './sass-adapter.js';
import type { AdapterFactory, AdapterFactoryOptions, CompilerAdapter } from './types.js';

const log = logger.child('adapters');

export class AdapterRegistry {
  private factories = new Map<string, AdapterFactory>();

  register(id: string, factory: AdapterFactory): this {
    this.factories.set(id, factory);
    return this;
  }

  has(id: string): boolean {
    return this.factories.has(id);
  }

  ids(): string[] {
    return [...this.factories.keys()];
  }

  /**
   * Build the adapter named by `config.backend`.
   * Unknown ids resolve to the NullAdapter so compiles fail instead of the caller crashing.
   */
  resolve(options: AdapterFactoryOptions): CompilerAdapter {
    const id = options.config.backend;
    const factory = this.factories.get(id);

    if (!factory) {
      log.warn(`No compiler backend registered as "${id}"`, { available: this.ids() });
      return new NullAdapter(id);
    }

    return factory(options);
  }
}

/**
 * Registry with the built-in backends.
 */
export function createDefaultRegistry(): AdapterRegistry {
  return new AdapterRegistry()
    .register('none', () => new NullAdapter())
    .register('sass', ({ config, projectRoot }) => new SassAdapter(config.backends.sass, projectRoot));
}
