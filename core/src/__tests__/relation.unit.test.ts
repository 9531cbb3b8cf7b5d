/**
 * Tests for Relation: coercion, copies, laziness and dataset operations
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import type { WritableDataset } from '../dataset.js';
import {
  AttributeNotFoundError,
  RegistryLookupError,
  TupleCountMismatchError,
  TupleValidationError,
  UnsupportedOperationError,
} from '../errors.js';
import { Loaded } from '../relation/loaded.js';
import { Relation } from '../relation/relation.js';
import { Schema } from '../schema.js';
import { createTuple, NOOP_READ_SCHEMA, type Tuple } from '../types.js';

class ListDataset implements WritableDataset {
  constructor(readonly rows: Tuple[] = []) {}

  [Symbol.iterator](): Iterator<Tuple> {
    return this.rows[Symbol.iterator]();
  }

  insert(tuple: Tuple): this {
    this.rows.push(tuple);
    return this;
  }

  delete(tuple: Tuple): this {
    const index = this.rows.indexOf(tuple);
    if (index >= 0) this.rows.splice(index, 1);
    return this;
  }
}

const readSchema = (): Schema =>
  Schema.define('users', {
    id: { type: z.string(), read: z.coerce.number().int(), primaryKey: true },
    name: z.string(),
  });

const plainSchema = (): Schema =>
  Schema.define('users', {
    id: z.number(),
    name: z.string(),
  });

describe('Relation coercion', () => {
  it('decodes every tuple through the read schema', () => {
    const users = new Relation([{ id: '1', name: 'Jane' }], { schema: readSchema() });
    expect(users.toArray()).toEqual([{ id: 1, name: 'Jane' }]);
  });

  it('uses the shared identity read function when no attribute declares a read type', () => {
    const stored = { id: 1, name: 'Jane' };
    const users = new Relation([stored], { schema: plainSchema() });

    expect(users.readSchema).toBe(NOOP_READ_SCHEMA);
    expect(users.toArray()[0]).toBe(stored);
  });

  it('falls back to a shallow copy for writes without a schema', () => {
    const relation = new Relation([]);
    expect(relation.hasSchema()).toBe(false);
    expect(relation.schemaHash).toBe(createTuple);
  });

  it('computes coercions once, at construction', () => {
    const schema = readSchema();
    const users = new Relation([], { schema });
    expect(users.readSchema).toBe(schema.toRelationHash());
    expect(users.schemaHash).toBe(schema.toCommandHash());
  });

  it('surfaces read failures while iterating', () => {
    const users = new Relation([{ id: 'x', name: 'Jane' }], { schema: readSchema() });
    expect(() => users.toArray()).toThrow(TupleValidationError);
  });
});

describe('Relation identity', () => {
  it('takes its name from the options, then the schema', () => {
    expect(new Relation([], { schema: plainSchema() }).name).toBe('users');
    expect(new Relation([], { schema: plainSchema(), name: 'people' }).name).toBe('people');
  });

  it('is neither curried nor a graph', () => {
    const relation = new Relation([]);
    expect(relation.isCurried()).toBe(false);
    expect(relation.isGraph()).toBe(false);
    expect(relation.kind).toBe('relation');
  });

  it('looks attributes up in its schema', () => {
    const users = new Relation([], { schema: plainSchema() });
    expect(users.attribute('name').name).toBe('name');
    expect(() => users.attribute('email')).toThrow(AttributeNotFoundError);
  });

  it('lists its own schema when it has no definition', () => {
    const schema = plainSchema();
    const users = new Relation([], { schema });
    expect([...users.schemas()]).toEqual([['users', schema]]);
    expect(users.associations()).toBe(schema.associations);
  });

  it('freezes its options', () => {
    expect(Object.isFrozen(new Relation([], { name: 'x' }).options)).toBe(true);
  });
});

describe('Relation copies', () => {
  it('withDataset shares options and leaves the original alone', () => {
    const users = new Relation([{ id: 1 }], { schema: plainSchema() });
    const copy = users.withDataset([{ id: 2 }]);

    expect(copy).not.toBe(users);
    expect(copy.options).toBe(users.options);
    expect(copy.schema).toBe(users.schema);
    expect(copy.toArray()).toEqual([{ id: 2 }]);
    expect(users.toArray()).toEqual([{ id: 1 }]);
    expect(users.call().collection).toEqual(users.toArray());
  });

  it('withDataset merges extra options into a new option object', () => {
    const users = new Relation([], { schema: plainSchema() });
    const copy = users.withDataset([], { name: 'people' });

    expect(copy.name).toBe('people');
    expect(copy.schema).toBe(users.schema);
    expect(users.name).toBe('users');
  });

  it('with keeps the dataset and overrides options', () => {
    const dataset = [{ id: 1 }];
    const users = new Relation(dataset, { name: 'users' });
    const renamed = users.with({ name: 'people' });

    expect(renamed.dataset).toBe(dataset);
    expect(renamed.name).toBe('people');
    expect(users.name).toBe('users');
  });
});

describe('Relation reading', () => {
  it('each() is lazy and re-reads the dataset on every pass', () => {
    const rows: Tuple[] = [{ id: 1 }];
    const relation = new Relation(rows);
    const tuples = relation.each();

    rows.push({ id: 2 });
    expect([...tuples]).toEqual([{ id: 1 }, { id: 2 }]);
    rows.push({ id: 3 });
    expect([...tuples]).toHaveLength(3);
  });

  it('is iterable itself', () => {
    expect([...new Relation([{ id: 1 }])]).toEqual([{ id: 1 }]);
  });

  it('call() loads a frozen snapshot tagged with the relation', () => {
    const rows: Tuple[] = [{ id: 1 }];
    const relation = new Relation(rows);
    const loaded = relation.call();

    rows.push({ id: 2 });
    expect(loaded).toBeInstanceOf(Loaded);
    expect(loaded.source).toBe(relation);
    expect(loaded.toArray()).toEqual([{ id: 1 }]);
    expect(Object.isFrozen(loaded.collection)).toBe(true);
  });

  it('first, one and oneOrFail', () => {
    const empty = new Relation([]);
    const single = new Relation([{ id: 1 }]);
    const many = new Relation([{ id: 1 }, { id: 2 }]);

    expect(empty.first()).toBeUndefined();
    expect(many.first()).toEqual({ id: 1 });

    expect(empty.one()).toBeUndefined();
    expect(single.one()).toEqual({ id: 1 });
    expect(() => many.one()).toThrow('The relation has more than one tuple but it has 2');

    expect(single.oneOrFail()).toEqual({ id: 1 });
    expect(() => empty.oneOrFail()).toThrow(TupleCountMismatchError);
    expect(() => many.oneOrFail()).toThrow('The relation must have exactly one tuple but it has 2');
  });
});

describe('Relation dataset operations', () => {
  const rows = [
    { id: 2, name: 'Joe' },
    { id: 1, name: 'Jane' },
    { id: 3, name: 'Jill' },
  ];

  it('restrict, project and order return new relations', () => {
    const users = new Relation(rows, { schema: plainSchema() });

    expect(users.restrict({ id: [1, 3] }).toArray()).toEqual([
      { id: 1, name: 'Jane' },
      { id: 3, name: 'Jill' },
    ]);
    expect(users.project('name').toArray()).toEqual([{ name: 'Joe' }, { name: 'Jane' }, { name: 'Jill' }]);
    expect(users.order('id').toArray().map(tuple => tuple.id)).toEqual([1, 2, 3]);
    expect(users.toArray()).toEqual(rows);
  });

  it('keeps coercing after an operation', () => {
    const users = new Relation([{ id: '2', name: 'Joe' }, { id: '1', name: 'Jane' }], {
      schema: readSchema(),
    });
    expect(users.restrict({ name: 'Jane' }).toArray()).toEqual([{ id: 1, name: 'Jane' }]);
  });

  it('insert writes through the write schema', () => {
    const dataset = new ListDataset();
    const users = new Relation(dataset, { schema: plainSchema() });

    expect(users.insert({ id: 1, name: 'Jane', extra: true })).toBe(users);
    expect(dataset.rows).toEqual([{ id: 1, name: 'Jane' }]);
  });

  it('insert rejects tuples the schema does not accept', () => {
    const dataset = new ListDataset();
    const users = new Relation(dataset, { schema: plainSchema() });

    expect(() => users.insert({ id: 'one', name: 'Jane' })).toThrow(TupleValidationError);
    expect(dataset.rows).toEqual([]);
  });

  it('delete hands the tuple to the dataset', () => {
    const jane = { id: 1, name: 'Jane' };
    const dataset = new ListDataset([jane]);
    new Relation(dataset).delete(jane);
    expect(dataset.rows).toEqual([]);
  });

  it('insert and delete need a writable dataset', () => {
    const users = new Relation([], { schema: plainSchema() });
    expect(() => users.insert({ id: 1, name: 'Jane' })).toThrow(UnsupportedOperationError);
    expect(() => users.insert({ id: 1, name: 'Jane' })).toThrow(
      'Dataset of relation "users" does not support insert'
    );
    expect(() => users.delete({ id: 1 })).toThrow('Dataset of relation "users" does not support delete');
  });

  it('has no views without a definition', () => {
    expect(() => new Relation([]).view('all')).toThrow(RegistryLookupError);
  });
});
