/**
 * @tuplet/config - Configuration Factory Functions
 *
 * Provides functions to create, merge, and load configurations.
 *
 * @packageDocumentation
 */

import { ConfigurationError, LogLevels } from '@tuplet/core';
import { DEFAULT_ADAPTER, DEFAULT_CONFIG, DEFAULT_GATEWAY, freezeConfig } from './defaults.js';
import type {
  EnvConfigOptions,
  GatewayConfig,
  LogFormat,
  LoggingConfig,
  TupletConfig,
  TupletConfigOverrides,
} from './types.js';

// =============================================================================
// Merging
// =============================================================================

/**
 * Fields of `source` that are not undefined, over `target`.
 */
function mergeGatewayOverride(
  target: Partial<GatewayConfig> = {},
  source: Partial<GatewayConfig> = {}
): Partial<GatewayConfig> {
  return {
    ...target,
    ...(source.adapter !== undefined && { adapter: source.adapter }),
    ...(source.args !== undefined && { args: source.args }),
  };
}

function mergeLoggingOverride(
  target: Partial<LoggingConfig> = {},
  source: Partial<LoggingConfig> = {}
): Partial<LoggingConfig> {
  return {
    ...target,
    ...(source.level !== undefined && { level: source.level }),
    ...(source.format !== undefined && { format: source.format }),
    ...(source.enabled !== undefined && { enabled: source.enabled }),
  };
}

function mergeOverrides(
  target: TupletConfigOverrides,
  source: TupletConfigOverrides
): TupletConfigOverrides {
  const result: TupletConfigOverrides = { ...target };

  if (source.gateways) {
    const gateways = { ...target.gateways };
    for (const [name, gateway] of Object.entries(source.gateways)) {
      gateways[name] = mergeGatewayOverride(gateways[name], gateway);
    }
    result.gateways = gateways;
  }

  if (source.logging) {
    result.logging = mergeLoggingOverride(target.logging, source.logging);
  }

  return result;
}

/**
 * Create a complete TupletConfig with optional overrides.
 *
 * Gateways named in `overrides` are merged with the base gateway of the same
 * name; a new gateway without an adapter uses the memory adapter.
 *
 * @param overrides - Partial configuration to merge with defaults
 * @param base - Optional base configuration (defaults to DEFAULT_CONFIG)
 * @returns Frozen TupletConfig with all values filled in
 *
 * @example
 * ```typescript
 * const config = createConfig({
 *   gateways: { archive: { adapter: 'memory' } },
 *   logging: { level: 'debug' },
 * });
 * Object.keys(config.gateways); // ['default', 'archive']
 * ```
 */
export function createConfig(
  overrides: TupletConfigOverrides = {},
  base: TupletConfig = DEFAULT_CONFIG
): TupletConfig {
  const gateways: Record<string, GatewayConfig> = {};
  for (const [name, gateway] of Object.entries(base.gateways)) {
    gateways[name] = { adapter: gateway.adapter, args: [...gateway.args] };
  }
  for (const [name, override] of Object.entries(overrides.gateways ?? {})) {
    const merged = mergeGatewayOverride(gateways[name], override);
    gateways[name] = {
      adapter: merged.adapter ?? DEFAULT_ADAPTER,
      args: [...(merged.args ?? [])],
    };
  }

  return freezeConfig({
    gateways,
    logging: { ...base.logging, ...mergeLoggingOverride({}, overrides.logging) },
  });
}

/**
 * Merge multiple partial configurations.
 *
 * Later configurations take precedence over earlier ones; undefined values
 * never override.
 *
 * @example
 * ```typescript
 * const merged = mergeConfigs(
 *   { logging: { level: 'warn' } },
 *   { logging: { format: 'pretty' } }
 * );
 * // merged.logging => { level: 'warn', format: 'pretty' }
 * ```
 */
export function mergeConfigs(
  ...configs: Array<TupletConfigOverrides | null | undefined>
): TupletConfigOverrides {
  let result: TupletConfigOverrides = {};

  for (const config of configs) {
    if (config) {
      result = mergeOverrides(result, config);
    }
  }

  return result;
}

// =============================================================================
// Environment
// =============================================================================

function getEnvVar(
  env: Record<string, string | undefined>,
  prefix: string,
  ...parts: string[]
): string | undefined {
  const key = [prefix, ...parts].join('_').toUpperCase();
  return env[key];
}

function parseBoolean(value: string): boolean {
  return value.toLowerCase() === 'true' || value === '1';
}

function isLogFormat(value: string): value is LogFormat {
  return value === 'json' || value === 'pretty';
}

function invalidEnvValue(name: string, value: string, expected: readonly string[]): ConfigurationError {
  return new ConfigurationError(
    `Invalid value "${value}" for ${name}`,
    undefined,
    { variable: name, value },
    `Use one of: ${expected.join(', ')}`
  );
}

/**
 * Create configuration from environment variables.
 *
 * Environment variables follow the pattern: TUPLET_<SECTION>_<FIELD>
 * - TUPLET_LOGGING_LEVEL=debug
 * - TUPLET_LOGGING_FORMAT=pretty
 * - TUPLET_LOGGING_ENABLED=false
 * - TUPLET_DEFAULT_ADAPTER=memory (adapter of the `default` gateway)
 *
 * @throws ConfigurationError for a level or format that does not exist
 *
 * @example
 * ```typescript
 * const config = getConfigFromEnv({ prefix: 'MYAPP', env: { MYAPP_LOGGING_LEVEL: 'warn' } });
 * config.logging.level; // 'warn'
 * ```
 */
export function getConfigFromEnv(options: EnvConfigOptions = {}): TupletConfig {
  const prefix = options.prefix ?? 'TUPLET';
  const env = options.env ?? process.env;
  const overrides: TupletConfigOverrides = {};

  const logging: Partial<LoggingConfig> = {};

  const level = getEnvVar(env, prefix, 'LOGGING', 'LEVEL');
  if (level !== undefined) {
    if (!LogLevels.isLevel(level)) {
      throw invalidEnvValue(`${prefix}_LOGGING_LEVEL`, level, ['debug', 'info', 'warn', 'error']);
    }
    logging.level = level;
  }

  const format = getEnvVar(env, prefix, 'LOGGING', 'FORMAT');
  if (format !== undefined) {
    if (!isLogFormat(format)) {
      throw invalidEnvValue(`${prefix}_LOGGING_FORMAT`, format, ['json', 'pretty']);
    }
    logging.format = format;
  }

  const enabled = getEnvVar(env, prefix, 'LOGGING', 'ENABLED');
  if (enabled !== undefined) {
    logging.enabled = parseBoolean(enabled);
  }

  if (Object.keys(logging).length > 0) {
    overrides.logging = logging;
  }

  const adapter = getEnvVar(env, prefix, 'DEFAULT', 'ADAPTER');
  if (adapter !== undefined) {
    overrides.gateways = { [DEFAULT_GATEWAY]: { adapter } };
  }

  return createConfig(overrides);
}
