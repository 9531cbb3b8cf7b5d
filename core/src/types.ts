/**
 * Core value types shared by every Tuplet package.
 */

/**
 * A raw or decoded row: field name to value.
 */
export type Tuple = Record<string, unknown>;

/**
 * A tuple processing function (write or read coercion).
 */
export type TupleFn = (tuple: Tuple) => Tuple;

/**
 * Restriction criteria understood by `restrict()`.
 *
 * - an array matches when the field value is one of its elements
 * - a RegExp matches string field values
 * - anything else matches by strict equality
 */
export type Criteria = Record<string, unknown>;

/**
 * Read coercion used when no attribute declares a read type.
 */
export const NOOP_READ_SCHEMA: TupleFn = Object.freeze((tuple: Tuple): Tuple => tuple);

/**
 * Write coercion used when a relation has no schema: a shallow copy, no coercion.
 */
export function createTuple(tuple: Tuple): Tuple {
  return { ...tuple };
}

/**
 * Type guard for plain tuple objects.
 */
export function isTuple(value: unknown): value is Tuple {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Exhaustiveness helper for switch statements over tagged unions.
 */
export function assertNever(value: never, message = 'Unexpected value'): never {
  throw new Error(`${message}: ${JSON.stringify(value)}`);
}
