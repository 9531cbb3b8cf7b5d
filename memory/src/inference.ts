/**
 * Schema inference from stored tuples
 *
 * Reads the first tuple of the dataset handed to `finalize()` and derives a
 * zod type per field. Fields holding null or undefined are reported missing.
 *
 * @example
 * ```typescript
 * const users = defineRelation({
 *   name: 'users',
 *   schemaOptions: { inferrer: inferSchema },
 * });
 * gateway.relation(users).schema.names(); // ['id', 'name']
 * ```
 */

import { z, type ZodTypeAny } from 'zod';
import { Attribute, firstOf, type InferenceResult, type SchemaInferrer } from '@tuplet/core';

export const inferSchema: SchemaInferrer = (_schemaName, context): InferenceResult => {
  const sample = context.dataset ? firstOf(context.dataset) : undefined;
  if (!sample) {
    return { attributes: [], missing: [] };
  }

  const attributes: Attribute[] = [];
  const missing: string[] = [];
  for (const [name, value] of Object.entries(sample)) {
    const type = inferType(value);
    if (type) {
      attributes.push(new Attribute(name, type));
    } else {
      missing.push(name);
    }
  }
  return { attributes, missing };
};

export function inferType(value: unknown): ZodTypeAny | undefined {
  if (value === null || value === undefined) return undefined;
  if (value instanceof Date) return z.date();
  if (Array.isArray(value)) return z.array(z.unknown());

  switch (typeof value) {
    case 'string':
      return z.string();
    case 'number':
      return z.number();
    case 'boolean':
      return z.boolean();
    case 'bigint':
      return z.bigint();
    case 'object':
      return z.record(z.unknown());
    default:
      return z.unknown();
  }
}
