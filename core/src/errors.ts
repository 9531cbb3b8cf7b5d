/**
 * Typed exception classes for Tuplet
 *
 * Error hierarchy:
 * - TupletError: Base class for every error raised by Tuplet packages
 *   - ConfigurationError: Gateway/adapter setup problems
 *     - MissingAdapterIdentifierError: Gateway class declares no adapter
 *     - AdapterLoadError: Adapter identifier cannot be resolved or loaded
 *   - InvalidArgumentError: Ambiguous or unsupported call arguments
 *   - AttributeNotFoundError: Schema attribute lookup miss
 *   - TupleValidationError: Write/read coercion rejected a tuple
 *   - TupleCountMismatchError: `one()` / `oneOrFail()` saw the wrong count
 *   - RegistryLookupError: Missing mapper, view or association
 *   - UnsupportedOperationError: Dataset lacks a required capability
 *   - TransactionError: Transaction runner misuse
 *
 * Every error is raised synchronously at the call site. Nothing is retried.
 *
 * @example
 * ```typescript
 * import { AdapterLoadError, ErrorCode, Gateway } from '@tuplet/core';
 *
 * try {
 *   Gateway.setup('sqlite');
 * } catch (error) {
 *   if (error instanceof AdapterLoadError) {
 *     logger.error('Adapter missing', error, { errorCode: error.code });
 *   }
 * }
 * ```
 */

import { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard error codes for programmatic error handling.
 */
export enum ErrorCode {
  UNKNOWN = 'UNKNOWN',

  // Configuration
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  MISSING_ADAPTER_IDENTIFIER = 'MISSING_ADAPTER_IDENTIFIER',
  ADAPTER_LOAD_ERROR = 'ADAPTER_LOAD_ERROR',

  // Arguments
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  CONNECTION_STRING_UNSUPPORTED = 'CONNECTION_STRING_UNSUPPORTED',
  CURRIED_ARITY = 'CURRIED_ARITY',

  // Schema and tuples
  ATTRIBUTE_NOT_FOUND = 'ATTRIBUTE_NOT_FOUND',
  TUPLE_VALIDATION_ERROR = 'TUPLE_VALIDATION_ERROR',
  TUPLE_COUNT_MISMATCH = 'TUPLE_COUNT_MISMATCH',

  // Registries
  MAPPER_NOT_FOUND = 'MAPPER_NOT_FOUND',
  VIEW_NOT_FOUND = 'VIEW_NOT_FOUND',
  ASSOCIATION_NOT_FOUND = 'ASSOCIATION_NOT_FOUND',
  ADAPTER_ALREADY_REGISTERED = 'ADAPTER_ALREADY_REGISTERED',

  // Datasets
  UNSUPPORTED_OPERATION = 'UNSUPPORTED_OPERATION',

  // Transactions
  TRANSACTION_ERROR = 'TRANSACTION_ERROR',
  ROLLBACK_UNSUPPORTED = 'ROLLBACK_UNSUPPORTED',
}

/**
 * Type guard to check if a string is a valid ErrorCode.
 */
export function isErrorCode(code: string): code is ErrorCode {
  return ERROR_CODES.has(code);
}

const ERROR_CODES: ReadonlySet<string> = new Set<string>(Object.values(ErrorCode));

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all Tuplet errors
 *
 * Carries a `code` for programmatic checks, optional structured `details`,
 * and an optional `suggestion` for the person reading the log.
 */
export class TupletError extends Error {
  /** Error code (an ErrorCode value) */
  public readonly code: string;

  /** Structured details for debugging */
  public readonly details?: Record<string, unknown>;

  /** Suggestion for resolving the error, when there is one */
  public readonly suggestion?: string;

  /** Creation time, milliseconds since epoch */
  public readonly timestamp: number;

  constructor(
    message: string,
    code: string = ErrorCode.UNKNOWN,
    details?: Record<string, unknown>,
    suggestion?: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'TupletError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
    this.timestamp = Date.now();
    captureStackTrace(this, TupletError);
  }

  /**
   * Structured form for JSON logging.
   */
  toLogContext(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
      ...(this.suggestion && { suggestion: this.suggestion }),
      timestamp: this.timestamp,
    };
  }

  toDetailedString(): string {
    const parts = [`[${this.code}] ${this.message}`];
    if (this.details) {
      const ctx = Object.entries(this.details)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(', ');
      parts.push(`Details: ${ctx}`);
    }
    if (this.suggestion) {
      parts.push(`Suggestion: ${this.suggestion}`);
    }
    return parts.join('\n  ');
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when gateways or adapters are set up incorrectly
 */
export class ConfigurationError extends TupletError {
  constructor(
    message: string,
    code: string = ErrorCode.CONFIGURATION_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string,
    options?: ErrorOptions
  ) {
    super(message, code, details, suggestion, options);
    this.name = 'ConfigurationError';
    captureStackTrace(this, ConfigurationError);
  }
}

/**
 * Error thrown when a gateway class never declared its adapter identifier
 *
 * @example
 * ```typescript
 * class SuperGateway extends Gateway {}
 * new SuperGateway().adapter; // throws MissingAdapterIdentifierError
 * ```
 */
export class MissingAdapterIdentifierError extends ConfigurationError {
  constructor(gatewayName: string) {
    super(
      `gateway class ${gatewayName} is missing the adapter identifier`,
      ErrorCode.MISSING_ADAPTER_IDENTIFIER,
      { gateway: gatewayName },
      `Declare it on the class: static override readonly adapter = 'my_adapter';`
    );
    this.name = 'MissingAdapterIdentifierError';
    captureStackTrace(this, MissingAdapterIdentifierError);
  }
}

/**
 * Error thrown when an adapter identifier cannot be resolved to a gateway class
 */
export class AdapterLoadError extends ConfigurationError {
  /** Adapter identifier that failed to load */
  public readonly adapter: string;

  constructor(adapter: string, cause?: Error) {
    super(
      `Failed to load adapter ${adapter}${cause ? `: ${cause.message}` : ''}`,
      ErrorCode.ADAPTER_LOAD_ERROR,
      { adapter, ...(cause && { cause: cause.message }) },
      `Register the adapter first, e.g. adapters.register('${adapter}', { Gateway: MyGateway })`,
      cause ? { cause } : undefined
    );
    this.name = 'AdapterLoadError';
    this.adapter = adapter;
    captureStackTrace(this, AdapterLoadError);
  }
}

// =============================================================================
// Argument Errors
// =============================================================================

/**
 * Error thrown for ambiguous or unsupported call arguments
 */
export class InvalidArgumentError extends TupletError {
  constructor(
    message: string,
    code: string = ErrorCode.INVALID_ARGUMENT,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'InvalidArgumentError';
    captureStackTrace(this, InvalidArgumentError);
  }

  /**
   * A gateway instance was passed to `Gateway.setup` together with constructor arguments
   */
  static instanceWithArguments(argCount: number): InvalidArgumentError {
    return new InvalidArgumentError(
      "Can't accept arguments when passing an instance",
      ErrorCode.INVALID_ARGUMENT,
      { operation: 'setup', argCount }
    );
  }

  /**
   * A connection string without an adapter identifier was passed to `Gateway.setup`
   */
  static connectionString(value: string): InvalidArgumentError {
    return new InvalidArgumentError(
      'Connection strings without an explicit adapter identifier are not supported',
      ErrorCode.CONNECTION_STRING_UNSUPPORTED,
      { operation: 'setup', value },
      "Pass the adapter identifier and its options, e.g. Gateway.setup('sql', uri)"
    );
  }
}

// =============================================================================
// Schema / Tuple Errors
// =============================================================================

/**
 * Error thrown when a schema attribute is looked up by a name it does not have
 */
export class AttributeNotFoundError extends TupletError {
  public readonly attribute: string;

  constructor(attribute: string, schema: string, known: readonly string[] = []) {
    super(
      `Attribute "${attribute}" not found in schema "${schema}"`,
      ErrorCode.ATTRIBUTE_NOT_FOUND,
      { attribute, schema, known: [...known] },
      known.length > 0 ? `Known attributes: ${known.join(', ')}` : undefined
    );
    this.name = 'AttributeNotFoundError';
    this.attribute = attribute;
    captureStackTrace(this, AttributeNotFoundError);
  }
}

/**
 * A single coercion failure inside a tuple
 */
export interface TupleIssue {
  path: (string | number)[];
  message: string;
}

/**
 * Error thrown when schema coercion rejects a tuple
 */
export class TupleValidationError extends TupletError {
  public readonly issues: TupleIssue[];

  constructor(schema: string, direction: 'read' | 'write', issues: TupleIssue[]) {
    const summary = issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    super(
      `Tuple rejected by ${direction} coercion of schema "${schema}": ${summary}`,
      ErrorCode.TUPLE_VALIDATION_ERROR,
      { schema, direction, issues }
    );
    this.name = 'TupleValidationError';
    this.issues = issues;
    captureStackTrace(this, TupleValidationError);
  }
}

/**
 * Error thrown when a single tuple was expected
 */
export class TupleCountMismatchError extends TupletError {
  constructor(expected: string, actual: number) {
    super(
      `The relation ${expected} but it has ${actual}`,
      ErrorCode.TUPLE_COUNT_MISMATCH,
      { expected, actual }
    );
    this.name = 'TupleCountMismatchError';
    captureStackTrace(this, TupleCountMismatchError);
  }
}

// =============================================================================
// Registry Errors
// =============================================================================

/**
 * Error thrown when a mapper, view or association is missing from its registry
 */
export class RegistryLookupError extends TupletError {
  constructor(kind: 'mapper' | 'view' | 'association', name: string, known: readonly string[]) {
    const code = kind === 'mapper'
      ? ErrorCode.MAPPER_NOT_FOUND
      : kind === 'view'
        ? ErrorCode.VIEW_NOT_FOUND
        : ErrorCode.ASSOCIATION_NOT_FOUND;
    super(
      `No ${kind} named "${name}"`,
      code,
      { kind, name, known: [...known] }
    );
    this.name = 'RegistryLookupError';
    captureStackTrace(this, RegistryLookupError);
  }
}

// =============================================================================
// Dataset / Transaction Errors
// =============================================================================

/**
 * Error thrown when a dataset does not implement a capability an operation needs
 */
export class UnsupportedOperationError extends TupletError {
  constructor(operation: string, target: string) {
    super(
      `${target} does not support ${operation}`,
      ErrorCode.UNSUPPORTED_OPERATION,
      { operation, target }
    );
    this.name = 'UnsupportedOperationError';
    captureStackTrace(this, UnsupportedOperationError);
  }
}

/**
 * Error thrown when a transaction runner is misused
 */
export class TransactionError extends TupletError {
  constructor(message: string, code: string = ErrorCode.TRANSACTION_ERROR, details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'TransactionError';
    captureStackTrace(this, TransactionError);
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function isTupletError(error: unknown): error is TupletError {
  return error instanceof TupletError;
}

/**
 * Check an unknown error against an error code.
 */
export function hasErrorCode(error: unknown, code: ErrorCode | string): boolean {
  return isTupletError(error) && error.code === code;
}

/**
 * Normalise anything thrown into an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
