/**
 * Capability interfaces shared by the relation variants, and the tagged
 * union over them.
 */

import { TupleCountMismatchError } from '../errors.js';
import type { Mapper } from '../mappers.js';
import type { Tuple } from '../types.js';
import type { Composite } from './composite.js';
import type { Curried } from './curried.js';
import type { Graph } from './graph.js';
import type { Loaded } from './loaded.js';
import type { Relation } from './relation.js';

/**
 * Anything that can be loaded into a `Loaded` snapshot.
 */
export interface Materializable<T = Tuple> {
  call(...args: unknown[]): Loaded<T>;
  toArray(): T[];
}

/**
 * Anything that can be piped into a mapper without being evaluated.
 */
export interface Composable<T = Tuple> {
  pipe<O>(mapper: Mapper<T, O>): Composite<T, O>;
}

/**
 * Every relation-shaped value, discriminated by `kind`.
 */
export type RelationLike = Relation | Curried | Graph | Composite<unknown, unknown>;

// =============================================================================
// Single-tuple helpers
// =============================================================================

export function firstOf<T>(tuples: Iterable<T>): T | undefined {
  for (const tuple of tuples) {
    return tuple;
  }
  return undefined;
}

/**
 * The only tuple, or undefined when there is none.
 *
 * @throws TupleCountMismatchError when there is more than one
 */
export function oneOf<T>(tuples: Iterable<T>): T | undefined {
  const [first, ...rest] = tuples;
  if (rest.length > 0) {
    throw new TupleCountMismatchError('has more than one tuple', rest.length + 1);
  }
  return first;
}

/**
 * @throws TupleCountMismatchError unless there is exactly one tuple
 */
export function oneOrFailOf<T>(tuples: Iterable<T>): T {
  const all = [...tuples];
  if (all.length !== 1) {
    throw new TupleCountMismatchError('must have exactly one tuple', all.length);
  }
  return all[0];
}
