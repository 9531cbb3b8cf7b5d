/**
 * @tuplet/config - Configuration Validation
 *
 * Validates configuration values and provides clear error messages.
 * Configurations loaded from JSON bypass the type checker, so every field is
 * checked at run time as well.
 *
 * @packageDocumentation
 */

import { isAdapterIdentifier, LogLevels, type AdapterRegistry } from '@tuplet/core';
import type {
  TupletConfig,
  ValidationError,
  ValidationResult,
  ValidationWarning,
} from './types.js';

export interface ValidateConfigOptions {
  /** When given, every gateway's adapter must be registered here */
  registry?: AdapterRegistry;
}

/**
 * Validate a complete TupletConfig.
 *
 * @example
 * ```typescript
 * const result = validateConfig(config, { registry: adapters });
 * if (!result.valid) {
 *   console.error('Config errors:', result.errors);
 * }
 * ```
 */
export function validateConfig(
  config: TupletConfig,
  options: ValidateConfigOptions = {}
): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  validateGateways(config.gateways, options.registry, errors, warnings);
  validateLogging(config.logging, errors, warnings);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

function validateGateways(
  gateways: TupletConfig['gateways'],
  registry: AdapterRegistry | undefined,
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  const entries = Object.entries(gateways);

  if (entries.length === 0) {
    warnings.push({
      path: 'gateways',
      message: 'No gateways are configured',
      recommendation: 'Add a gateway, e.g. { default: { adapter: "memory" } }',
    });
  }

  for (const [name, gateway] of entries) {
    const path = `gateways.${name}`;

    if (typeof gateway.adapter !== 'string' || !isAdapterIdentifier(gateway.adapter)) {
      errors.push({
        path: `${path}.adapter`,
        message: 'Adapter must be a bare identifier such as "memory"',
        value: gateway.adapter,
        suggestion: 'Pass connection details through args, e.g. { adapter: "sql", args: ["postgres://..."] }',
      });
    } else if (registry && !registry.has(gateway.adapter)) {
      errors.push({
        path: `${path}.adapter`,
        message: `Adapter "${gateway.adapter}" is not registered`,
        value: gateway.adapter,
        suggestion: `Import the adapter package, or register it with adapters.register('${gateway.adapter}', ...)`,
      });
    }

    if (!Array.isArray(gateway.args)) {
      errors.push({
        path: `${path}.args`,
        message: 'Gateway args must be an array',
        value: gateway.args,
      });
    }
  }
}

function validateLogging(
  logging: TupletConfig['logging'],
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  const validLogLevels = ['debug', 'info', 'warn', 'error'];
  if (typeof logging.level !== 'string' || !LogLevels.isLevel(logging.level)) {
    errors.push({
      path: 'logging.level',
      message: `Log level must be one of: ${validLogLevels.join(', ')}`,
      value: logging.level,
    });
  }

  const validLogFormats = ['json', 'pretty'];
  if (!validLogFormats.includes(logging.format)) {
    errors.push({
      path: 'logging.format',
      message: `Log format must be one of: ${validLogFormats.join(', ')}`,
      value: logging.format,
    });
  }

  if (typeof logging.enabled !== 'boolean') {
    errors.push({
      path: 'logging.enabled',
      message: 'Logging enabled must be a boolean',
      value: logging.enabled,
    });
  }

  if (logging.enabled && logging.level === 'debug') {
    warnings.push({
      path: 'logging.level',
      message: 'Debug logging writes an entry for every dataset and transaction',
      value: logging.level,
      recommendation: 'Use "info" or higher outside development',
    });
  }
}
