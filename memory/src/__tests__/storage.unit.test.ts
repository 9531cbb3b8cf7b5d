/**
 * Tests for the named dataset storage
 */

import { describe, it, expect } from 'vitest';
import { Storage } from '../storage.js';

describe('Storage', () => {
  it('creates, finds and lists datasets', () => {
    const storage = new Storage();
    const users = storage.createDataset('users');
    storage.createDataset('tasks');

    expect(storage.get('users')).toBe(users);
    expect(storage.get('posts')).toBeUndefined();
    expect(storage.has('tasks')).toBe(true);
    expect(storage.names()).toEqual(['users', 'tasks']);
    expect(storage.size).toBe(2);
  });

  it('replaces a dataset created twice', () => {
    const storage = new Storage();
    const first = storage.createDataset('users');
    first.insert({ id: 1 });
    const second = storage.createDataset('users');

    expect(second).not.toBe(first);
    expect(second.count()).toBe(0);
    expect(storage.get('users')).toBe(second);
    expect(storage.size).toBe(1);
  });

  it('clear drops every dataset', () => {
    const storage = new Storage();
    storage.createDataset('users');
    storage.clear();
    expect(storage.size).toBe(0);
  });

  it('snapshots copies of the content', () => {
    const storage = new Storage();
    const users = storage.createDataset('users');
    users.insert({ id: 1 });

    const snapshot = storage.snapshot();
    users.insert({ id: 2 });

    expect(snapshot.get('users')?.tuples).toEqual([{ id: 1 }]);
    expect(snapshot.get('users')?.dataset).toBe(users);
  });

  it('restores content in place and drops datasets created since', () => {
    const storage = new Storage();
    const users = storage.createDataset('users');
    users.insert({ id: 1 });
    const snapshot = storage.snapshot();

    users.insert({ id: 2 });
    storage.createDataset('tasks');
    storage.restore(snapshot);

    expect(storage.get('users')).toBe(users);
    expect(users.toArray()).toEqual([{ id: 1 }]);
    expect(storage.has('tasks')).toBe(false);
  });

  it('recreates datasets removed since the snapshot', () => {
    const storage = new Storage();
    storage.createDataset('users').insert({ id: 1 });
    const snapshot = storage.snapshot();

    storage.clear();
    storage.restore(snapshot);

    expect(storage.get('users')?.toArray()).toEqual([{ id: 1 }]);
  });

  it('puts back the original dataset object for a name replaced since', () => {
    const storage = new Storage();
    const users = storage.createDataset('users');
    users.insert({ id: 1 });
    const snapshot = storage.snapshot();

    users.insert({ id: 2 });
    const replacement = storage.createDataset('users');
    replacement.insert({ id: 3 });
    storage.restore(snapshot);

    expect(storage.get('users')).toBe(users);
    expect(users.toArray()).toEqual([{ id: 1 }]);
  });
});
