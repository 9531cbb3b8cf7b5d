/**
 * @tuplet/config - Default Configuration Values
 *
 * @packageDocumentation
 */

import type { TupletConfig } from './types.js';

/**
 * Adapter used by gateways whose configuration names none.
 */
export const DEFAULT_ADAPTER = 'memory';

/**
 * Name of the gateway relations use unless told otherwise.
 */
export const DEFAULT_GATEWAY = 'default';

/**
 * Freeze a configuration and everything it owns. Gateway arguments are
 * frozen as a list; the argument values themselves belong to the caller.
 */
export function freezeConfig(config: TupletConfig): TupletConfig {
  for (const gateway of Object.values(config.gateways)) {
    Object.freeze(gateway.args);
    Object.freeze(gateway);
  }
  Object.freeze(config.gateways);
  Object.freeze(config.logging);
  return Object.freeze(config);
}

/**
 * One in-memory `default` gateway, JSON logging at info level.
 */
export const DEFAULT_CONFIG: TupletConfig = freezeConfig({
  gateways: {
    [DEFAULT_GATEWAY]: { adapter: DEFAULT_ADAPTER, args: [] },
  },
  logging: {
    level: 'info',
    format: 'json',
    enabled: true,
  },
});
