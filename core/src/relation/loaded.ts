/**
 * Materialised relation snapshot
 *
 * A Loaded holds decoded tuples that have already been read. Every operation
 * answers from that frozen collection; the source is kept for inspection
 * only and is never asked to load again.
 */

import { isTuple, type Tuple } from '../types.js';
import { firstOf, oneOf, oneOrFailOf, type RelationLike } from './materializable.js';

export class Loaded<T = Tuple> implements Iterable<T> {
  readonly collection: readonly T[];

  constructor(
    collection: readonly T[],
    readonly source?: RelationLike
  ) {
    this.collection = Object.isFrozen(collection) ? collection : Object.freeze([...collection]);
  }

  get length(): number {
    return this.collection.length;
  }

  isEmpty(): boolean {
    return this.collection.length === 0;
  }

  each(): Iterable<T> {
    return this.collection;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.collection[Symbol.iterator]();
  }

  /** Already loaded: returns itself */
  call(): this {
    return this;
  }

  toArray(): T[] {
    return [...this.collection];
  }

  first(): T | undefined {
    return firstOf(this.collection);
  }

  one(): T | undefined {
    return oneOf(this.collection);
  }

  oneOrFail(): T {
    return oneOrFailOf(this.collection);
  }

  /**
   * Values of `key` across the collection, in order. Non-tuple elements yield undefined.
   */
  pluck(key: string): unknown[] {
    return this.collection.map(element => (isTuple(element) ? element[key] : undefined));
  }

  /**
   * Values of the source relation's primary key. Empty when the source is not
   * a relation with a single-attribute primary key.
   */
  primaryKeys(): unknown[] {
    if (this.source?.kind !== 'relation') return [];
    const [key, ...rest] = this.source.schema.primaryKey();
    if (!key || rest.length > 0) return [];
    return this.pluck(key.name);
  }
}
