/**
 * In-memory dataset
 *
 * An ordered array of tuples. `insert` appends without deduplication and the
 * read operations (`restrict`, `project`, `order`, `join`) answer with new
 * datasets over copies, leaving this one untouched. Stored tuples are frozen
 * copies of what was given. No schema awareness:
 * coercion belongs to the relation wrapping the dataset.
 */

import {
  compareBy,
  matchesCriteria,
  pick,
  type Criteria,
  type OrderableDataset,
  type ProjectableDataset,
  type RestrictableDataset,
  type Tuple,
  type WritableDataset,
} from '@tuplet/core';

/**
 * Join condition: left attribute name to right attribute name.
 */
export type JoinKeys = Record<string, string>;

export class MemoryDataset
  implements WritableDataset, RestrictableDataset, ProjectableDataset, OrderableDataset
{
  private data: Tuple[];

  constructor(data: Iterable<Tuple> = []) {
    this.data = [...data].map(freezeTuple);
  }

  [Symbol.iterator](): Iterator<Tuple> {
    return this.data[Symbol.iterator]();
  }

  get length(): number {
    return this.data.length;
  }

  count(): number {
    return this.data.length;
  }

  toArray(): Tuple[] {
    return [...this.data];
  }

  insert(tuple: Tuple): this {
    this.data.push(freezeTuple(tuple));
    return this;
  }

  /**
   * Remove every tuple with the same keys and strictly equal values.
   */
  delete(tuple: Tuple): this {
    this.data = this.data.filter(existing => !tuplesEqual(existing, tuple));
    return this;
  }

  restrict(criteria: Criteria): MemoryDataset {
    return new MemoryDataset(this.data.filter(tuple => matchesCriteria(tuple, criteria)));
  }

  project(...names: string[]): MemoryDataset {
    return new MemoryDataset(this.data.map(tuple => pick(tuple, names)));
  }

  order(...names: string[]): MemoryDataset {
    return new MemoryDataset([...this.data].sort(compareBy(names)));
  }

  /**
   * Inner join. Each left tuple is merged with every right tuple whose
   * attributes match under `on`; right values win on key clashes.
   */
  join(other: Iterable<Tuple>, on: JoinKeys): MemoryDataset {
    const keys = Object.entries(on);
    const right = [...other];
    const joined: Tuple[] = [];

    for (const left of this.data) {
      for (const candidate of right) {
        if (keys.every(([leftKey, rightKey]) => left[leftKey] === candidate[rightKey])) {
          joined.push({ ...left, ...candidate });
        }
      }
    }
    return new MemoryDataset(joined);
  }

  /**
   * Swap in `tuples` as the whole content. Used by transaction rollback so
   * relations holding this dataset see the restored data.
   */
  reset(tuples: Iterable<Tuple> = []): this {
    this.data = [...tuples].map(freezeTuple);
    return this;
  }
}

function freezeTuple(tuple: Tuple): Tuple {
  return Object.isFrozen(tuple) ? tuple : Object.freeze({ ...tuple });
}

function tuplesEqual(a: Tuple, b: Tuple): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every(key => key in b && a[key] === b[key]);
}
