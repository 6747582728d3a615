import type { SessionManager, StorageProvider } from '../types/storage.js';
import { ProviderError } from '../errors.js';

/**
 * Creates an authenticated provider handle. May be called once per sync run.
 */
export type ProviderFactory = (providerId: string) => StorageProvider | Promise<StorageProvider>;

/**
 * Session manager backed by registered provider factories.
 */
export class ProviderRegistry implements SessionManager {
  private readonly factories = new Map<string, ProviderFactory>();

  /**
   * Register a provider implementation. Replaces any earlier factory for the id.
   */
  register(providerId: string, factory: ProviderFactory): this {
    this.factories.set(providerId, factory);
    return this;
  }

  unregister(providerId: string): boolean {
    return this.factories.delete(providerId);
  }

  /**
   * Get a provider handle by id.
   * Throws a non-retryable ProviderError if the provider is not registered.
   */
  async acquire(providerId: string): Promise<StorageProvider> {
    const factory = this.factories.get(providerId);
    if (!factory) {
      const available = this.getRegisteredProviders().join(', ');
      throw new ProviderError(
        `Provider "${providerId}" is not registered. Available: ${available || 'none'}`,
        false,
      );
    }
    return factory(providerId);
  }

  getRegisteredProviders(): string[] {
    return Array.from(this.factories.keys());
  }
}
