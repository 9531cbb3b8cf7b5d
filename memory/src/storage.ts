/**
 * Named registry of in-memory datasets
 *
 * Node runs JavaScript on a single thread and every operation here is
 * synchronous, so no locking is needed for concurrent callers.
 */

import type { Tuple } from '@tuplet/core';
import { MemoryDataset } from './dataset.js';

/**
 * Dataset objects and their contents by name, as captured by `Storage#snapshot`.
 */
export type StorageSnapshot = ReadonlyMap<
  string,
  { readonly dataset: MemoryDataset; readonly tuples: readonly Tuple[] }
>;

export class Storage {
  private readonly datasets = new Map<string, MemoryDataset>();

  /**
   * Create an empty dataset under `name`, replacing any existing one.
   */
  createDataset(name: string): MemoryDataset {
    const dataset = new MemoryDataset();
    this.datasets.set(name, dataset);
    return dataset;
  }

  /** Dataset named `name`, or undefined */
  get(name: string): MemoryDataset | undefined {
    return this.datasets.get(name);
  }

  has(name: string): boolean {
    return this.datasets.has(name);
  }

  get size(): number {
    return this.datasets.size;
  }

  names(): string[] {
    return [...this.datasets.keys()];
  }

  clear(): void {
    this.datasets.clear();
  }

  snapshot(): StorageSnapshot {
    const snapshot = new Map<string, { dataset: MemoryDataset; tuples: Tuple[] }>();
    for (const [name, dataset] of this.datasets) {
      snapshot.set(name, { dataset, tuples: dataset.toArray() });
    }
    return snapshot;
  }

  /**
   * Put every dataset back to its snapshot content. Datasets created after
   * the snapshot are dropped; names replaced since get their original
   * dataset object back, reset in place.
   */
  restore(snapshot: StorageSnapshot): void {
    for (const name of this.names()) {
      if (!snapshot.has(name)) this.datasets.delete(name);
    }
    for (const [name, { dataset, tuples }] of snapshot) {
      this.datasets.set(name, dataset);
      dataset.reset(tuples);
    }
  }
}
