/**
 * Adapter registry
 *
 * Maps adapter identifiers to adapter modules. An adapter module exposes its
 * concrete `Gateway` class. Adapter packages register themselves when they
 * are imported; a loader registered with `registerLoader()` is called the
 * first time its identifier is resolved.
 *
 * @example
 * ```typescript
 * import { adapters } from '@tuplet/core';
 *
 * adapters.register('memory', { Gateway: MemoryGateway });
 * adapters.resolve('memory').Gateway; // MemoryGateway
 * ```
 */

import { AdapterLoadError, ConfigurationError, ErrorCode, toError } from './errors.js';
import type { GatewayClass } from './gateway.js';

// =============================================================================
// Types
// =============================================================================

export interface AdapterModule {
  readonly Gateway: GatewayClass;
}

/**
 * Called on first resolution of an identifier that has no module yet.
 */
export type AdapterLoader = () => AdapterModule;

// =============================================================================
// Registry
// =============================================================================

export class AdapterRegistry {
  private readonly modules = new Map<string, AdapterModule>();
  private readonly loaders = new Map<string, AdapterLoader>();

  /**
   * Register an adapter module. Registering the same module twice is a no-op.
   *
   * @throws ConfigurationError if another module is registered under `id`
   */
  register(id: string, module: AdapterModule): this {
    const existing = this.modules.get(id);
    if (existing && existing.Gateway !== module.Gateway) {
      throw new ConfigurationError(
        `Adapter "${id}" is already registered`,
        ErrorCode.ADAPTER_ALREADY_REGISTERED,
        { adapter: id },
        `Call adapters.unregister('${id}') first to replace it`
      );
    }
    this.modules.set(id, module);
    return this;
  }

  registerLoader(id: string, loader: AdapterLoader): this {
    this.loaders.set(id, loader);
    return this;
  }

  /**
   * Adapter module for `id`, running its loader when needed.
   *
   * @throws AdapterLoadError when `id` is unknown or its loader fails
   */
  resolve(id: string): AdapterModule {
    const module = this.modules.get(id);
    if (module) {
      return module;
    }

    const loader = this.loaders.get(id);
    if (!loader) {
      throw new AdapterLoadError(id);
    }

    let loaded: AdapterModule;
    try {
      loaded = loader();
    } catch (error) {
      throw new AdapterLoadError(id, toError(error));
    }
    this.loaders.delete(id);
    this.modules.set(id, loaded);
    return loaded;
  }

  gatewayClass(id: string): GatewayClass {
    return this.resolve(id).Gateway;
  }

  /**
   * True when `id` has a module or a pending loader.
   */
  has(id: string): boolean {
    return this.modules.has(id) || this.loaders.has(id);
  }

  list(): string[] {
    return [...new Set([...this.modules.keys(), ...this.loaders.keys()])].sort();
  }

  unregister(id: string): boolean {
    const removedModule = this.modules.delete(id);
    const removedLoader = this.loaders.delete(id);
    return removedModule || removedLoader;
  }
}

/**
 * Process-wide registry consulted by `Gateway.setup` unless another one is given.
 */
export const adapters = new AdapterRegistry();
