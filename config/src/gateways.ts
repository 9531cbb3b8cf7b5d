/**
 * @tuplet/config - Gateway Setup
 *
 * Builds every configured gateway through the adapter registry and hands
 * each one a logger carrying its gateway name.
 *
 * @packageDocumentation
 */

import {
  adapters,
  ConfigurationError,
  createConsoleLogger,
  createNoopLogger,
  setupGateway,
  withContext,
  type AdapterRegistry,
  type Gateway,
  type Logger,
} from '@tuplet/core';
import type { LoggingConfig, TupletConfig } from './types.js';
import { validateConfig } from './validation.js';

export interface SetupGatewaysOptions {
  /** Registry resolving adapter identifiers (default: the process-wide one) */
  registry?: AdapterRegistry;
  /** Logger shared by every gateway (default: built from `config.logging`) */
  logger?: Logger;
}

/**
 * Logger described by a logging section: the no-op logger when disabled,
 * a console logger otherwise.
 */
export function createLoggerFromConfig(logging: LoggingConfig): Logger {
  if (!logging.enabled) {
    return createNoopLogger();
  }
  return createConsoleLogger({ minLevel: logging.level, format: logging.format });
}

/**
 * Set up every gateway of `config`, keyed by gateway name.
 *
 * @throws ConfigurationError when the configuration does not validate
 * @throws AdapterLoadError when a gateway's adapter cannot be resolved
 *
 * @example
 * ```typescript
 * import '@tuplet/memory';
 *
 * const gateways = setupGateways(createConfig());
 * gateways.default.adapter; // 'memory'
 * ```
 */
export function setupGateways(
  config: TupletConfig,
  options: SetupGatewaysOptions = {}
): Record<string, Gateway> {
  const result = validateConfig(config);
  if (!result.valid) {
    throw new ConfigurationError(
      `Invalid configuration: ${result.errors.map(error => `${error.path}: ${error.message}`).join('; ')}`,
      undefined,
      { errors: result.errors.map(error => error.path) }
    );
  }

  const registry = options.registry ?? adapters;
  const logger = options.logger ?? createLoggerFromConfig(config.logging);
  const gateways: Record<string, Gateway> = {};

  for (const [name, gatewayConfig] of Object.entries(config.gateways)) {
    const gateway = setupGateway(registry, gatewayConfig.adapter, ...gatewayConfig.args);
    gateway.useLogger(withContext(logger, { gateway: name, adapter: gateway.adapter }));
    logger.debug('Gateway ready', { gateway: name, adapter: gateway.adapter });
    gateways[name] = gateway;
  }

  return gateways;
}
