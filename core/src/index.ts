// @tuplet/core
// Relations over pluggable datasets: schemas, composition, gateways

// =============================================================================
// Errors
// =============================================================================

export {
  ErrorCode,
  isErrorCode,
  TupletError,
  ConfigurationError,
  MissingAdapterIdentifierError,
  AdapterLoadError,
  InvalidArgumentError,
  AttributeNotFoundError,
  TupleValidationError,
  TupleCountMismatchError,
  RegistryLookupError,
  UnsupportedOperationError,
  TransactionError,
  isTupletError,
  hasErrorCode,
  toError,
  type TupleIssue,
} from './errors.js';

export { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Logging
// =============================================================================

export {
  LogLevels,
  createLogger,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  withContext,
  type LogLevel,
  type LogContextValue,
  type LogContext,
  type LogEntry,
  type Logger,
  type LoggerConfig,
  type ConsoleLoggerConfig,
  type TestLogger,
} from './logging.js';

// =============================================================================
// Tuples and Datasets
// =============================================================================

export {
  NOOP_READ_SCHEMA,
  createTuple,
  isTuple,
  assertNever,
  type Tuple,
  type TupleFn,
  type Criteria,
} from './types.js';

export {
  isWritableDataset,
  isRestrictableDataset,
  isProjectableDataset,
  isOrderableDataset,
  matchesCriteria,
  pick,
  compareValues,
  compareBy,
  lazyDataset,
  restrictDataset,
  projectDataset,
  orderDataset,
  type Dataset,
  type WritableDataset,
  type RestrictableDataset,
  type ProjectableDataset,
  type OrderableDataset,
} from './dataset.js';

// =============================================================================
// Schema, Associations, Mappers
// =============================================================================

export {
  Attribute,
  Schema,
  type AttributeOptions,
  type AttributeInput,
  type InferenceContext,
  type InferenceResult,
  type SchemaInferrer,
  type SchemaOptions,
} from './schema.js';

export {
  AssociationSet,
  type AssociationKind,
  type AssociationDescriptor,
} from './associations.js';

export {
  MapperRegistry,
  toMapperObject,
  type MapperObject,
  type MapperFn,
  type Mapper,
  type RegisteredMapper,
} from './mappers.js';

// =============================================================================
// Relations
// =============================================================================

export { Relation, type RelationOptions } from './relation/relation.js';
export { Curried } from './relation/curried.js';
export { Composite } from './relation/composite.js';
export { Graph, LoadedGraph, type GraphRoot, type GraphNode } from './relation/graph.js';
export { Loaded } from './relation/loaded.js';
export {
  firstOf,
  oneOf,
  oneOrFailOf,
  type Materializable,
  type Composable,
  type RelationLike,
} from './relation/materializable.js';
export {
  RelationDefinition,
  defineRelation,
  type ViewDefinition,
  type RelationDefinitionInput,
  type CompiledView,
} from './relation/definition.js';

// =============================================================================
// Gateways and Transactions
// =============================================================================

export {
  Gateway,
  setupGateway,
  isAdapterIdentifier,
  type GatewayClass,
} from './gateway.js';

export {
  AdapterRegistry,
  adapters,
  type AdapterModule,
  type AdapterLoader,
} from './adapters.js';

export {
  ROLLBACK,
  TransactionState,
  NOOP_TRANSACTION_RUNNER,
  TransactionRunnerBase,
  type TransactionResult,
  type TransactionOptions,
  type TransactionHandle,
  type TransactionBlock,
  type TransactionRunner,
} from './transactions.js';
