/**
 * @tuplet/config - Configuration Types
 *
 * One `TupletConfig` describes every gateway of an application plus its
 * logging. Overrides are partial at every level and merged onto defaults.
 *
 * @packageDocumentation
 */

import type { LogLevel } from '@tuplet/core';

// =============================================================================
// Gateways
// =============================================================================

/**
 * A named gateway: the adapter that builds it and the arguments its
 * constructor receives.
 */
export interface GatewayConfig {
  /**
   * Adapter identifier registered with the adapter registry
   * @example 'memory'
   */
  adapter: string;

  /**
   * Positional constructor arguments. Ignored by gateways whose constructor
   * declares no parameters.
   * @default []
   */
  args: unknown[];
}

// =============================================================================
// Logging
// =============================================================================

export type LogFormat = 'json' | 'pretty';

export interface LoggingConfig {
  /**
   * Minimum level written
   * @default 'info'
   */
  level: LogLevel;

  /**
   * Line format of the console logger
   * @default 'json'
   */
  format: LogFormat;

  /**
   * When false every gateway gets the no-op logger
   * @default true
   */
  enabled: boolean;
}

// =============================================================================
// Main Configuration
// =============================================================================

export interface TupletConfig {
  /** Gateways by name; `default` is the one relations use unless told otherwise */
  gateways: Record<string, GatewayConfig>;
  logging: LoggingConfig;
}

/**
 * Partial configuration accepted by `createConfig` and `mergeConfigs`.
 */
export interface TupletConfigOverrides {
  gateways?: Record<string, Partial<GatewayConfig>>;
  logging?: Partial<LoggingConfig>;
}

// =============================================================================
// Validation Types
// =============================================================================

export interface ValidationError {
  /** Dotted path of the offending value, e.g. 'gateways.default.adapter' */
  path: string;
  message: string;
  value?: unknown;
  suggestion?: string;
}

export interface ValidationWarning {
  path: string;
  message: string;
  value?: unknown;
  recommendation?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

// =============================================================================
// Environment
// =============================================================================

export interface EnvConfigOptions {
  /**
   * Variable name prefix
   * @default 'TUPLET'
   */
  prefix?: string;

  /**
   * Variables to read
   * @default process.env
   */
  env?: Record<string, string | undefined>;
}
