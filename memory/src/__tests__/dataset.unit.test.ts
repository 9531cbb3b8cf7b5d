/**
 * Tests for MemoryDataset
 */

import { describe, it, expect } from 'vitest';
import {
  isOrderableDataset,
  isProjectableDataset,
  isRestrictableDataset,
  isWritableDataset,
} from '@tuplet/core';
import { MemoryDataset } from '../dataset.js';

const users = () =>
  new MemoryDataset([
    { id: 2, name: 'Joe' },
    { id: 1, name: 'Jane' },
  ]);

describe('MemoryDataset', () => {
  it('supports every dataset capability', () => {
    const dataset = new MemoryDataset();
    expect(isWritableDataset(dataset)).toBe(true);
    expect(isRestrictableDataset(dataset)).toBe(true);
    expect(isProjectableDataset(dataset)).toBe(true);
    expect(isOrderableDataset(dataset)).toBe(true);
  });

  it('copies its initial data', () => {
    const rows = [{ id: 1 }];
    const dataset = new MemoryDataset(rows);
    rows.push({ id: 2 });
    expect(dataset.count()).toBe(1);
  });

  it('stores frozen copies of the tuples it is given', () => {
    const seed = { id: 1 };
    const inserted = { id: 2 };
    const restored = { id: 3 };
    const dataset = new MemoryDataset([seed]).insert(inserted);

    const [first, second] = dataset.toArray();
    expect(first).not.toBe(seed);
    expect(second).not.toBe(inserted);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(second)).toBe(true);
    expect(Object.isFrozen(seed)).toBe(false);
    expect(Object.isFrozen(inserted)).toBe(false);

    inserted.id = 20;
    expect(dataset.toArray()).toEqual([{ id: 1 }, { id: 2 }]);

    dataset.reset([restored]);
    expect(Object.isFrozen(dataset.toArray()[0])).toBe(true);
    expect(Object.isFrozen(restored)).toBe(false);
  });

  it('appends on insert without deduplicating', () => {
    const dataset = new MemoryDataset();
    dataset.insert({ id: 1 }).insert({ id: 1 });

    expect(dataset.length).toBe(2);
    expect([...dataset]).toEqual([{ id: 1 }, { id: 1 }]);
  });

  it('deletes every tuple equal to the given one', () => {
    const dataset = new MemoryDataset([{ id: 1, name: 'Jane' }, { id: 1 }, { id: 1, name: 'Jane' }]);
    dataset.delete({ id: 1, name: 'Jane' });
    expect(dataset.toArray()).toEqual([{ id: 1 }]);
  });

  it('does not delete tuples with extra or missing keys', () => {
    const dataset = new MemoryDataset([{ id: 1, name: 'Jane' }]);
    dataset.delete({ id: 1 });
    dataset.delete({ id: 1, name: 'Jane', email: undefined });
    expect(dataset.count()).toBe(1);
  });

  it('answers read operations with new datasets', () => {
    const dataset = users();

    const restricted = dataset.restrict({ name: 'Jane' });
    const projected = dataset.project('name');
    const ordered = dataset.order('id');

    expect(restricted).toBeInstanceOf(MemoryDataset);
    expect(restricted.toArray()).toEqual([{ id: 1, name: 'Jane' }]);
    expect(projected.toArray()).toEqual([{ name: 'Joe' }, { name: 'Jane' }]);
    expect(ordered.toArray()).toEqual([
      { id: 1, name: 'Jane' },
      { id: 2, name: 'Joe' },
    ]);
    expect(dataset.toArray()).toEqual(users().toArray());
  });

  it('toArray returns a copy', () => {
    const dataset = users();
    dataset.toArray().pop();
    expect(dataset.count()).toBe(2);
  });

  it('joins on matching attributes, right values winning', () => {
    const tasks = [
      { taskId: 10, userId: 1, name: 'Write' },
      { taskId: 11, userId: 1, name: 'Review' },
      { taskId: 12, userId: 3, name: 'Orphan' },
    ];
    const joined = users().join(tasks, { id: 'userId' });

    expect(joined.toArray()).toEqual([
      { id: 1, name: 'Write', taskId: 10, userId: 1 },
      { id: 1, name: 'Review', taskId: 11, userId: 1 },
    ]);
  });

  it('reset swaps the whole content in place', () => {
    const dataset = users();
    expect(dataset.reset([{ id: 9 }])).toBe(dataset);
    expect(dataset.toArray()).toEqual([{ id: 9 }]);
    expect(dataset.reset().count()).toBe(0);
  });
});
