/**
 * Tests for relation definitions, views and partial application
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ErrorCode, InvalidArgumentError, RegistryLookupError } from '../errors.js';
import { Curried } from '../relation/curried.js';
import { defineRelation, RelationDefinition } from '../relation/definition.js';
import { Relation } from '../relation/relation.js';
import { Schema } from '../schema.js';

const rows = [
  { id: 2, name: 'Joe', email: 'joe@example.com' },
  { id: 1, name: 'Jane', email: 'jane@example.com' },
];

const usersDefinition = (): RelationDefinition =>
  defineRelation({
    name: 'users',
    schema: {
      id: { type: z.number(), primaryKey: true },
      name: z.string(),
      email: z.string(),
    },
    views: {
      names: {
        schema: schema => schema.project('name'),
        relation: relation => relation.order('name'),
      },
      byName: {
        relation: (relation, name: unknown) => relation.restrict({ name }),
      },
      idsFor: {
        schema: schema => schema.project('id'),
        relation: (relation, name: unknown, email: unknown) => relation.restrict({ name, email }),
      },
    },
  });

function asRelation(value: Relation | Curried): Relation {
  if (value instanceof Curried) {
    throw new Error(`expected a relation, got ${value.name}#${value.view}`);
  }
  return value;
}

function asCurried(value: Relation | Curried): Curried {
  if (!(value instanceof Curried)) {
    throw new Error(`expected a curried view of ${value.name}`);
  }
  return value;
}

describe('RelationDefinition', () => {
  it('builds a schema from attribute declarations', () => {
    const definition = usersDefinition();
    expect(definition.schema.names()).toEqual(['id', 'name', 'email']);
    expect(definition.schema.name).toBe('users');
  });

  it('accepts a built schema as is', () => {
    const schema = Schema.define('people', { id: z.number() });
    expect(defineRelation({ name: 'people', schema }).schema).toBe(schema);
  });

  it('counts view arity from the parameters after the relation', () => {
    const definition = usersDefinition();
    expect(definition.view('names').arity).toBe(0);
    expect(definition.view('byName').arity).toBe(1);
    expect(definition.view('idsFor').arity).toBe(2);
  });

  it('rejects unknown views, listing the known ones', () => {
    const definition = usersDefinition();
    expect(definition.hasView('nope')).toBe(false);
    try {
      definition.view('nope');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(RegistryLookupError);
      if (error instanceof RegistryLookupError) {
        expect(error.code).toBe(ErrorCode.VIEW_NOT_FOUND);
        expect(error.message).toBe('No view named "nope"');
        expect(error.details?.known).toEqual(['names', 'byName', 'idsFor']);
      }
    }
  });

  it('derives each view schema once', () => {
    const definition = usersDefinition();
    const names = definition.viewSchema('names');
    expect(names?.names()).toEqual(['name']);
    expect(definition.viewSchema('names')).toBe(names);
    expect(definition.viewSchema('byName')).toBeUndefined();
  });

  it('lists the base schema and every view schema', () => {
    const definition = usersDefinition();
    expect([...definition.schemas().keys()]).toEqual(['users', 'names', 'idsFor']);
    expect(definition.schemas().get('users')).toBe(definition.schema);
  });

  it('builds relations carrying the definition', () => {
    const definition = usersDefinition();
    const users = definition.build(rows);

    expect(users.name).toBe('users');
    expect(users.schema).toBe(definition.schema);
    expect(users.options.definition).toBe(definition);
    expect(users.schemas()).toBe(definition.schemas());
  });
});

describe('Relation views', () => {
  it('runs a view without arguments and projects through its schema', () => {
    const users = usersDefinition().build(rows);
    const names = asRelation(users.view('names'));

    expect(names.toArray()).toEqual([{ name: 'Jane' }, { name: 'Joe' }]);
    expect(names.schema.names()).toEqual(['name']);
    expect(names.name).toBe('users');
  });

  it('returns the view relation as is when the view has no schema', () => {
    const users = usersDefinition().build(rows);
    expect(asRelation(users.view('byName', 'Jane')).toArray()).toEqual([
      { id: 1, name: 'Jane', email: 'jane@example.com' },
    ]);
  });

  it('keeps the views available on view results', () => {
    const users = usersDefinition().build(rows);
    const jane = asRelation(users.view('byName', 'Jane'));
    expect(asRelation(jane.view('idsFor', 'Jane', 'jane@example.com')).toArray()).toEqual([{ id: 1 }]);
  });

  it('rejects unknown view names', () => {
    const users = usersDefinition().build(rows);
    expect(() => users.view('nope')).toThrow(RegistryLookupError);
  });
});

describe('Curried', () => {
  it('is returned while arguments are missing', () => {
    const users = usersDefinition().build(rows);
    const byName = asCurried(users.view('byName'));

    expect(byName.isCurried()).toBe(true);
    expect(byName.isGraph()).toBe(false);
    expect(byName.kind).toBe('curried');
    expect(byName.name).toBe('users');
    expect(byName.arity).toBe(1);
    expect(byName.curryArgs).toEqual([]);
  });

  it('runs the view once the last argument arrives', () => {
    const users = usersDefinition().build(rows);
    const byName = asCurried(users.view('byName'));

    expect(asRelation(byName.call('Joe')).toArray()).toEqual([
      { id: 2, name: 'Joe', email: 'joe@example.com' },
    ]);
  });

  it('collects arguments over several calls', () => {
    const users = usersDefinition().build(rows);
    const idsFor = asCurried(users.view('idsFor', 'Jane'));
    expect(idsFor.curryArgs).toEqual(['Jane']);

    const partial = asCurried(asCurried(users.view('idsFor')).call('Jane'));
    expect(partial.curryArgs).toEqual(['Jane']);

    expect(asRelation(idsFor.call('jane@example.com')).toArray()).toEqual([{ id: 1 }]);
    expect(asRelation(partial.call('jane@example.com')).toArray()).toEqual([{ id: 1 }]);
  });

  it('loads the completed view', () => {
    const users = usersDefinition().build(rows);
    const loaded = asCurried(users.view('byName')).load('Jane');
    expect(loaded.pluck('id')).toEqual([1]);
  });

  it('cannot be materialised before it has every argument', () => {
    const users = usersDefinition().build(rows);
    const byName = asCurried(users.view('byName'));

    expect(() => byName.toArray()).toThrow(InvalidArgumentError);
    expect(() => byName.toArray()).toThrow('users#byName arity is 1 (0 args given)');
  });

  it('load fails while arguments are still missing', () => {
    const users = usersDefinition().build(rows);
    const idsFor = asCurried(users.view('idsFor'));

    try {
      idsFor.load('Jane');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidArgumentError);
      if (error instanceof InvalidArgumentError) {
        expect(error.code).toBe(ErrorCode.CURRIED_ARITY);
        expect(error.message).toBe('users#idsFor arity is 2 (1 args given)');
      }
    }
  });

  it('does not change when more arguments are supplied', () => {
    const users = usersDefinition().build(rows);
    const idsFor = asCurried(users.view('idsFor'));
    idsFor.call('Jane');
    expect(idsFor.curryArgs).toEqual([]);
  });
});
