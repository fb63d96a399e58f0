import type { MeshFlavor } from '@fleetstat/shared';
import type { MeshProvider } from './types';
import { smartstackProvider } from './smartstack';
import { envoyProvider } from './envoy';
import logger from '../lib/logger';

// Re-export types
export * from './types';

/**
 * Mesh Provider Registry
 * Static registry of the supported mesh flavors
 */
class MeshProviderRegistry {
  private providers: Map<MeshFlavor, MeshProvider> = new Map();

  constructor() {
    // Register built-in providers
    this.register(smartstackProvider);
    this.register(envoyProvider);
  }

  /**
   * Register a provider in the registry
   */
  register(provider: MeshProvider): void {
    if (this.providers.has(provider.id)) {
      logger.warn({ providerId: provider.id }, `Mesh provider '${provider.id}' is already registered. Overwriting.`);
    }
    this.providers.set(provider.id, provider);
  }

  /**
   * Get a provider by ID
   * @throws Error if provider not found
   */
  getProvider(id: MeshFlavor): MeshProvider {
    const provider = this.providers.get(id);
    if (!provider) {
      throw new Error(`Mesh provider '${id}' not found`);
    }
    return provider;
  }
}

// Export singleton registry
export const meshProviderRegistry = new MeshProviderRegistry();
