/**
 * Transaction runners
 *
 * `Gateway#transaction` hands its block to a runner. The runner decides what
 * a transaction means; the relation layer imposes nothing.
 *
 * - `NOOP_TRANSACTION_RUNNER` is the default. It calls the block once and
 *   returns its value. It gives no atomicity and no isolation, and it cannot
 *   roll back: `tx.rollback()` throws.
 * - `TransactionRunnerBase` is the template for real runners: subclasses
 *   implement `begin`, `commit` and `rollback`. `tx.rollback()` unwinds to
 *   the runner, which rolls back and returns `ROLLBACK`. A block that throws
 *   is rolled back and the error re-thrown.
 *
 * Runners are synchronous. A block returning a promise is committed before
 * the promise settles.
 *
 * @example
 * ```typescript
 * const result = gateway.transaction(tx => {
 *   users.insert({ id: 1, name: 'Jane' });
 *   if (!valid) tx.rollback();
 *   return 'done';
 * });
 * // 'done', or undefined when rolled back
 * ```
 */

import { ErrorCode, toError, TransactionError } from './errors.js';

// =============================================================================
// Types and Interfaces
// =============================================================================

/**
 * Returned by a runner whose transaction was rolled back.
 */
export const ROLLBACK: unique symbol = Symbol('tuplet.transaction.rollback');

export type TransactionResult<T> = T | typeof ROLLBACK;

export enum TransactionState {
  /** Block is running */
  Active = 'active',
  Committed = 'committed',
  RolledBack = 'rolled_back',
}

/**
 * Adapter-defined transaction options (isolation level, savepoint, ...).
 */
export type TransactionOptions = Record<string, unknown>;

/**
 * Handle passed to the transaction block.
 */
export interface TransactionHandle {
  readonly options: Readonly<TransactionOptions>;
  readonly state: TransactionState;
  /** Abort the transaction. Never returns. */
  rollback(): never;
}

export type TransactionBlock<T> = (tx: TransactionHandle) => T;

export interface TransactionRunner {
  run<T>(options: TransactionOptions, block: TransactionBlock<T>): TransactionResult<T>;
}

// =============================================================================
// No-op runner
// =============================================================================

class NoOpTransactionRunner implements TransactionRunner {
  run<T>(options: TransactionOptions, block: TransactionBlock<T>): TransactionResult<T> {
    const handle: TransactionHandle = {
      options,
      state: TransactionState.Active,
      rollback(): never {
        throw new TransactionError(
          'The default transaction runner cannot roll back; use an adapter that provides transactions',
          ErrorCode.ROLLBACK_UNSUPPORTED
        );
      },
    };
    return block(handle);
  }
}

/**
 * Default runner: calls the block once and returns its value.
 */
export const NOOP_TRANSACTION_RUNNER: TransactionRunner = new NoOpTransactionRunner();

// =============================================================================
// Runner template
// =============================================================================

/**
 * Thrown by `tx.rollback()` and caught by the runner that issued `tx`.
 */
class RollbackSignal extends Error {
  constructor(readonly handle: TransactionHandle) {
    super('Transaction rolled back');
    this.name = 'RollbackSignal';
  }
}

class RunnerHandle implements TransactionHandle {
  state: TransactionState = TransactionState.Active;

  constructor(readonly options: Readonly<TransactionOptions>) {}

  rollback(): never {
    if (this.state !== TransactionState.Active) {
      throw new TransactionError(
        `Cannot roll back a ${this.state} transaction`,
        ErrorCode.TRANSACTION_ERROR,
        { state: this.state }
      );
    }
    throw new RollbackSignal(this);
  }
}

/**
 * Base class for runners with begin/commit/rollback semantics.
 *
 * `S` is whatever `begin` needs to hand to `commit` or `rollback`, such as a
 * snapshot or a connection-level transaction object.
 */
export abstract class TransactionRunnerBase<S> implements TransactionRunner {
  protected abstract begin(options: TransactionOptions): S;
  protected abstract commit(state: S, options: TransactionOptions): void;
  protected abstract rollback(state: S, options: TransactionOptions, cause?: Error): void;

  run<T>(options: TransactionOptions, block: TransactionBlock<T>): TransactionResult<T> {
    const handle = new RunnerHandle(options);
    const state = this.begin(options);

    let result: T;
    try {
      result = block(handle);
    } catch (error) {
      handle.state = TransactionState.RolledBack;
      if (error instanceof RollbackSignal && error.handle === handle) {
        this.rollback(state, options);
        return ROLLBACK;
      }
      this.rollback(state, options, toError(error));
      throw error;
    }

    this.commit(state, options);
    handle.state = TransactionState.Committed;
    return result;
  }
}
