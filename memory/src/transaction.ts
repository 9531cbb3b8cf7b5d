/**
 * Snapshot transactions for the memory gateway
 *
 * `begin` copies every dataset's tuples, `rollback` puts them back. There is
 * no isolation: writes are visible to everyone while the block runs.
 */

import {
  TransactionRunnerBase,
  type LogContext,
  type Logger,
  type TransactionOptions,
} from '@tuplet/core';
import type { Storage, StorageSnapshot } from './storage.js';

const LOG_CONTEXT: LogContext = { adapter: 'memory', operation: 'transaction' };

export class MemoryTransactionRunner extends TransactionRunnerBase<StorageSnapshot> {
  constructor(
    private readonly storage: Storage,
    private readonly logger: Logger
  ) {
    super();
  }

  protected begin(_options: TransactionOptions): StorageSnapshot {
    this.logger.debug('Transaction started', LOG_CONTEXT);
    return this.storage.snapshot();
  }

  protected commit(_snapshot: StorageSnapshot, _options: TransactionOptions): void {
    this.logger.debug('Transaction committed', LOG_CONTEXT);
  }

  protected rollback(snapshot: StorageSnapshot, _options: TransactionOptions, cause?: Error): void {
    this.storage.restore(snapshot);
    if (cause) {
      this.logger.warn(`Transaction rolled back: ${cause.message}`, LOG_CONTEXT);
    } else {
      this.logger.debug('Transaction rolled back', LOG_CONTEXT);
    }
  }
}
