/**
 * Memory gateway
 *
 * Reference adapter keeping every dataset in a process-local `Storage`.
 * Registered under the `memory` adapter identifier when `@tuplet/memory` is
 * imported.
 *
 * @example
 * ```typescript
 * import { Gateway } from '@tuplet/core';
 * import '@tuplet/memory';
 *
 * const gateway = Gateway.setup('memory');
 * gateway.dataset('users').insert({ id: 1, name: 'Jane' });
 * ```
 */

import {
  createNoopLogger,
  Gateway,
  type Logger,
  type Tuple,
  type TransactionOptions,
  type TransactionRunner,
} from '@tuplet/core';
import type { MemoryDataset } from './dataset.js';
import { Storage } from './storage.js';
import { MemoryTransactionRunner } from './transaction.js';

export interface MemoryGatewayOptions {
  /** Initial dataset contents by name */
  datasets?: Record<string, Iterable<Tuple>>;
  logger?: Logger;
}

export class MemoryGateway extends Gateway {
  static override readonly adapter = 'memory';

  readonly storage = new Storage();
  private currentLogger: Logger;

  constructor(options?: MemoryGatewayOptions) {
    super();
    this.currentLogger = options?.logger ?? createNoopLogger();
    for (const [name, tuples] of Object.entries(options?.datasets ?? {})) {
      const dataset = this.storage.createDataset(name);
      for (const tuple of tuples) {
        dataset.insert(tuple);
      }
    }
  }

  override get connection(): Storage {
    return this.storage;
  }

  override get logger(): Logger {
    return this.currentLogger;
  }

  override useLogger(logger: Logger): void {
    this.currentLogger = logger;
  }

  /**
   * Dataset named `name`, created empty on first use.
   */
  dataset(name: string): MemoryDataset {
    const existing = this.storage.get(name);
    if (existing) return existing;

    this.currentLogger.debug('Dataset created', { adapter: 'memory', dataset: name });
    return this.storage.createDataset(name);
  }

  hasDataset(name: string): boolean {
    return this.storage.has(name);
  }

  override schema(): string[] {
    return this.storage.names();
  }

  override disconnect(): void {
    this.storage.clear();
  }

  protected override transactionRunner(_options: TransactionOptions): TransactionRunner {
    return new MemoryTransactionRunner(this.storage, this.currentLogger);
  }
}
