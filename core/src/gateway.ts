/**
 * Gateway
 *
 * A gateway owns the connection to a backend and hands out its datasets.
 * Concrete gateways declare their adapter identifier once, on the class:
 *
 * ```typescript
 * class MemoryGateway extends Gateway {
 *   static override readonly adapter = 'memory';
 *   ...
 * }
 * ```
 *
 * `Gateway.setup('memory')` resolves the identifier through the adapter
 * registry and constructs the registered class.
 *
 * Every hook other than `dataset` and `hasDataset` has a safe default:
 * `schema()` lists nothing, `useLogger()` ignores its logger and
 * `transaction()` runs the block once with no transactional guarantees.
 */

import { adapters, type AdapterRegistry } from './adapters.js';
import type { Dataset } from './dataset.js';
import { AdapterLoadError, InvalidArgumentError, MissingAdapterIdentifierError } from './errors.js';
import { createNoopLogger, type Logger } from './logging.js';
import type { RelationDefinition } from './relation/definition.js';
import type { Relation } from './relation/relation.js';
import {
  NOOP_TRANSACTION_RUNNER,
  ROLLBACK,
  type TransactionBlock,
  type TransactionOptions,
  type TransactionRunner,
} from './transactions.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Concrete gateway constructor as stored in the adapter registry. Its
 * parameter types are the adapter's own business, so `setupGateway` checks
 * what it built instead.
 */
export type GatewayClass<G extends Gateway = Gateway> = (new (...args: never[]) => G) & {
  readonly adapter?: string;
};

/**
 * Adapter identifiers are bare words such as `memory` or `sql_server`.
 * Anything else, e.g. `postgres://localhost/app`, is a connection string.
 */
const ADAPTER_IDENTIFIER = /^[a-z][a-z0-9_-]*$/i;

export function isAdapterIdentifier(value: string): boolean {
  return ADAPTER_IDENTIFIER.test(value);
}

// =============================================================================
// Setup
// =============================================================================

/**
 * Build a gateway from an adapter identifier, or pass an instance through.
 *
 * Constructors receive `args` as given; one declaring no parameters ignores them.
 *
 * @throws InvalidArgumentError for a connection string, or for an instance given with `args`
 * @throws AdapterLoadError when the identifier does not resolve
 */
export function setupGateway(
  registry: AdapterRegistry,
  gatewayOrAdapter: Gateway | string,
  ...args: unknown[]
): Gateway {
  if (gatewayOrAdapter instanceof Gateway) {
    if (args.length > 0) {
      throw InvalidArgumentError.instanceWithArguments(args.length);
    }
    return gatewayOrAdapter;
  }

  if (!isAdapterIdentifier(gatewayOrAdapter)) {
    throw InvalidArgumentError.connectionString(gatewayOrAdapter);
  }

  const GatewayCtor = registry.gatewayClass(gatewayOrAdapter);
  const gateway: unknown = Reflect.construct(GatewayCtor, args);
  if (!(gateway instanceof Gateway)) {
    throw new AdapterLoadError(
      gatewayOrAdapter,
      new Error(`${GatewayCtor.name} does not extend Gateway`)
    );
  }
  return gateway;
}

// =============================================================================
// Gateway
// =============================================================================

export abstract class Gateway {
  /** Adapter identifier, declared by each concrete gateway class */
  static readonly adapter?: string;

  /**
   * `setupGateway` against the process-wide adapter registry.
   */
  static setup(gatewayOrAdapter: Gateway | string, ...args: unknown[]): Gateway {
    return setupGateway(adapters, gatewayOrAdapter, ...args);
  }

  /**
   * Adapter identifier of the concrete class.
   *
   * @throws MissingAdapterIdentifierError when the class declares none
   */
  get adapter(): string {
    const ctor: { readonly adapter?: unknown; readonly name: string } = this.constructor;
    if (typeof ctor.adapter !== 'string') {
      throw new MissingAdapterIdentifierError(ctor.name);
    }
    return ctor.adapter;
  }

  /**
   * Backend connection handle. Opaque to everything but the adapter.
   */
  get connection(): unknown {
    return undefined;
  }

  /**
   * Dataset named `name`.
   */
  abstract dataset(name: string): Dataset;

  abstract hasDataset(name: string): boolean;

  /**
   * Relation built from `definition` over this gateway's dataset of the same
   * name. The definition's schema is finalised first.
   */
  relation(definition: RelationDefinition): Relation {
    const dataset = this.dataset(definition.name);
    return definition.finalize({ dataset, gateway: this }).build(dataset);
  }

  // ===========================================================================
  // Extension points
  // ===========================================================================

  /**
   * Hook for adapters that specialise command classes per dataset.
   */
  extendCommandClass<C>(klass: C, _dataset: Dataset): C {
    return klass;
  }

  /**
   * Names of the datasets the backend knows about.
   */
  schema(): string[] {
    return [];
  }

  useLogger(_logger: Logger): void {}

  get logger(): Logger {
    return createNoopLogger();
  }

  disconnect(): void {}

  // ===========================================================================
  // Transactions
  // ===========================================================================

  /**
   * Run `block` through this gateway's transaction runner.
   *
   * @returns the block's value, or `undefined` when the transaction was rolled back
   */
  transaction<T>(block: TransactionBlock<T>, options: TransactionOptions = {}): T | undefined {
    const result = this.transactionRunner(options).run(options, block);
    return result === ROLLBACK ? undefined : result;
  }

  /**
   * The default runner calls the block once. Adapters with real transactions
   * override this.
   */
  protected transactionRunner(_options: TransactionOptions): TransactionRunner {
    return NOOP_TRANSACTION_RUNNER;
  }
}
