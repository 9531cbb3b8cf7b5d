/**
 * Dataset contracts
 *
 * A Dataset is the physical tuple collection a Relation wraps. The only thing
 * a Relation requires is ordered iteration; every other ability is a separate
 * capability interface that an adapter's dataset may implement. Operations on
 * a Relation check the capability and fall back to lazy iteration when it is
 * missing.
 *
 * A plain array of tuples is a valid Dataset.
 */

import type { Criteria, Tuple } from './types.js';

export interface Dataset extends Iterable<Tuple> {}

export interface WritableDataset extends Dataset {
  /** Append a tuple. No deduplication. */
  insert(tuple: Tuple): this;
  /** Remove tuples equal to `tuple`. */
  delete(tuple: Tuple): this;
}

export interface RestrictableDataset extends Dataset {
  restrict(criteria: Criteria): Dataset;
}

export interface ProjectableDataset extends Dataset {
  project(...names: string[]): Dataset;
}

export interface OrderableDataset extends Dataset {
  order(...names: string[]): Dataset;
}

function hasMethod(value: object, name: string): boolean {
  return name in value && typeof Reflect.get(value, name) === 'function';
}

export function isWritableDataset(dataset: Dataset): dataset is WritableDataset {
  return !Array.isArray(dataset) && hasMethod(dataset, 'insert') && hasMethod(dataset, 'delete');
}

export function isRestrictableDataset(dataset: Dataset): dataset is RestrictableDataset {
  return hasMethod(dataset, 'restrict');
}

export function isProjectableDataset(dataset: Dataset): dataset is ProjectableDataset {
  return hasMethod(dataset, 'project');
}

export function isOrderableDataset(dataset: Dataset): dataset is OrderableDataset {
  return hasMethod(dataset, 'order');
}

// =============================================================================
// Criteria / projection helpers
// =============================================================================

/**
 * Test a tuple against restriction criteria.
 */
export function matchesCriteria(tuple: Tuple, criteria: Criteria): boolean {
  return Object.entries(criteria).every(([key, expected]) => {
    const actual = tuple[key];
    if (Array.isArray(expected)) {
      return expected.includes(actual);
    }
    if (expected instanceof RegExp) {
      return typeof actual === 'string' && expected.test(actual);
    }
    return actual === expected;
  });
}

/**
 * Copy of `tuple` holding only `names`, in the order given.
 */
export function pick(tuple: Tuple, names: readonly string[]): Tuple {
  const result: Tuple = {};
  for (const name of names) {
    if (name in tuple) {
      result[name] = tuple[name];
    }
  }
  return result;
}

/**
 * Compare two field values for ordering. `undefined` and `null` sort last.
 */
export function compareValues(a: unknown, b: unknown): number {
  if (a === b) return 0;
  if (a === undefined || a === null) return 1;
  if (b === undefined || b === null) return -1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'bigint' && typeof b === 'bigint') return a < b ? -1 : 1;
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  return String(a).localeCompare(String(b));
}

/**
 * Comparator over several fields, earlier fields taking precedence.
 */
export function compareBy(names: readonly string[]): (a: Tuple, b: Tuple) => number {
  return (a, b) => {
    for (const name of names) {
      const result = compareValues(a[name], b[name]);
      if (result !== 0) return result;
    }
    return 0;
  };
}

// =============================================================================
// Lazy fallbacks
// =============================================================================

/**
 * Restartable iterable that re-runs `source` on every iteration.
 */
export function lazyDataset(source: () => Iterable<Tuple>): Dataset {
  return {
    [Symbol.iterator](): Iterator<Tuple> {
      return source()[Symbol.iterator]();
    },
  };
}

export function restrictDataset(dataset: Dataset, criteria: Criteria): Dataset {
  if (isRestrictableDataset(dataset)) {
    return dataset.restrict(criteria);
  }
  return lazyDataset(function* () {
    for (const tuple of dataset) {
      if (matchesCriteria(tuple, criteria)) yield tuple;
    }
  });
}

export function projectDataset(dataset: Dataset, names: readonly string[]): Dataset {
  if (isProjectableDataset(dataset)) {
    return dataset.project(...names);
  }
  return lazyDataset(function* () {
    for (const tuple of dataset) {
      yield pick(tuple, names);
    }
  });
}

export function orderDataset(dataset: Dataset, names: readonly string[]): Dataset {
  if (isOrderableDataset(dataset)) {
    return dataset.order(...names);
  }
  return lazyDataset(() => [...dataset].sort(compareBy(names)));
}
