/**
 * @tuplet/config - Configuration for Tuplet gateways and logging
 *
 * - Deep partial overrides with createConfig() and mergeConfigs()
 * - Environment variable support with getConfigFromEnv()
 * - Validation with path, message and suggestion per problem
 * - setupGateways() to build every configured gateway
 *
 * @example
 * ```typescript
 * import { createConfig, setupGateways, validateConfig } from '@tuplet/config';
 * import '@tuplet/memory';
 *
 * const config = createConfig({ logging: { format: 'pretty' } });
 * const result = validateConfig(config);
 * if (!result.valid) {
 *   console.error('Config errors:', result.errors);
 * }
 * const { default: gateway } = setupGateways(config);
 * ```
 *
 * @packageDocumentation
 * @module @tuplet/config
 */

// =============================================================================
// Types
// =============================================================================

export type {
  GatewayConfig,
  LogFormat,
  LoggingConfig,
  TupletConfig,
  TupletConfigOverrides,
  ValidationError,
  ValidationWarning,
  ValidationResult,
  EnvConfigOptions,
} from './types.js';

// =============================================================================
// Defaults
// =============================================================================

export { DEFAULT_CONFIG, DEFAULT_ADAPTER, DEFAULT_GATEWAY } from './defaults.js';

// =============================================================================
// Config Functions
// =============================================================================

export { createConfig, mergeConfigs, getConfigFromEnv } from './config.js';

// =============================================================================
// Validation
// =============================================================================

export { validateConfig, type ValidateConfigOptions } from './validation.js';

// =============================================================================
// Gateways
// =============================================================================

export { setupGateways, createLoggerFromConfig, type SetupGatewaysOptions } from './gateways.js';
