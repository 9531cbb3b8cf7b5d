/**
 * Base relation
 *
 * A Relation wraps a dataset together with a schema and a mapper registry.
 * Reading goes through the schema's read coercion, writing through its write
 * coercion; both functions are computed once, when the relation is built, and
 * do not change when the dataset does.
 *
 * Relations are never mutated. `withDataset()` and `with()` return copies
 * sharing the schema and mappers.
 *
 * @example
 * ```typescript
 * const schema = Schema.define('users', {
 *   id: { type: z.string(), read: z.coerce.number().int() },
 *   name: z.string(),
 * });
 * const users = new Relation([{ id: '1', name: 'Jane' }], { schema });
 *
 * users.toArray(); // [{ id: 1, name: 'Jane' }]
 * ```
 */

import type { AssociationSet } from '../associations.js';
import {
  isWritableDataset,
  orderDataset,
  projectDataset,
  restrictDataset,
  type Dataset,
} from '../dataset.js';
import { InvalidArgumentError, RegistryLookupError, UnsupportedOperationError } from '../errors.js';
import { MapperRegistry, type Mapper } from '../mappers.js';
import { Schema, type Attribute } from '../schema.js';
import { createTuple, NOOP_READ_SCHEMA, type Criteria, type Tuple, type TupleFn } from '../types.js';
import { Composite } from './composite.js';
import { Curried } from './curried.js';
import type { RelationDefinition } from './definition.js';
import { Graph, type GraphNode } from './graph.js';
import { Loaded } from './loaded.js';
import { firstOf, oneOf, oneOrFailOf, type Composable, type Materializable } from './materializable.js';

export interface RelationOptions {
  /** Relation name; defaults to the schema name */
  name?: string;
  /** Canonical schema; an empty one when absent */
  schema?: Schema;
  /** Output transforms available to `mapWith()` */
  mappers?: MapperRegistry;
  /** Definition supplying views and view schemas */
  definition?: RelationDefinition;
}

const EMPTY_MAPPERS = new MapperRegistry();

export class Relation implements Materializable<Tuple>, Composable<Tuple>, Iterable<Tuple> {
  readonly kind = 'relation' as const;

  readonly dataset: Dataset;
  readonly options: Readonly<RelationOptions>;
  readonly schema: Schema;
  readonly mappers: MapperRegistry;

  /** Write coercion, applied to tuples handed to dataset mutators */
  readonly schemaHash: TupleFn;
  /** Read coercion, applied to every tuple the dataset yields */
  readonly readSchema: TupleFn;

  private schemaMap?: ReadonlyMap<string, Schema>;
  private associationSet?: AssociationSet;

  constructor(dataset: Dataset, options: RelationOptions = {}) {
    this.dataset = dataset;
    this.options = Object.isFrozen(options) ? options : Object.freeze({ ...options });
    this.schema = options.schema ?? Schema.empty(options.name);
    this.mappers = options.mappers ?? EMPTY_MAPPERS;
    this.schemaHash = this.hasSchema() ? this.schema.toCommandHash() : createTuple;
    this.readSchema = this.schema.hasReadTypes() ? this.schema.toRelationHash() : NOOP_READ_SCHEMA;
  }

  get name(): string {
    return this.options.name ?? this.schema.name;
  }

  // ===========================================================================
  // Schema access
  // ===========================================================================

  /**
   * Schema attribute by name.
   *
   * @throws AttributeNotFoundError when the schema has no such attribute
   */
  attribute(name: string): Attribute {
    return this.schema.attribute(name);
  }

  hasSchema(): boolean {
    return !this.schema.isEmpty();
  }

  isCurried(): false {
    return false;
  }

  isGraph(): false {
    return false;
  }

  /**
   * Base and view schemas of the relation's definition, keyed by name.
   */
  schemas(): ReadonlyMap<string, Schema> {
    if (!this.schemaMap) {
      this.schemaMap = this.options.definition?.schemas() ?? new Map([[this.name, this.schema]]);
    }
    return this.schemaMap;
  }

  associations(): AssociationSet {
    if (!this.associationSet) {
      this.associationSet = this.schema.associations;
    }
    return this.associationSet;
  }

  // ===========================================================================
  // Reading
  // ===========================================================================

  /**
   * Lazy sequence of decoded tuples. Every iteration reads the dataset again.
   */
  each(): Iterable<Tuple> {
    const { dataset, readSchema } = this;
    return {
      *[Symbol.iterator](): Iterator<Tuple> {
        for (const tuple of dataset) {
          yield readSchema(tuple);
        }
      },
    };
  }

  [Symbol.iterator](): Iterator<Tuple> {
    return this.each()[Symbol.iterator]();
  }

  /**
   * Every decoded tuple, read now.
   */
  toArray(): Tuple[] {
    return [...this.each()];
  }

  call(): Loaded<Tuple> {
    return new Loaded(this.toArray(), this);
  }

  first(): Tuple | undefined {
    return firstOf(this.each());
  }

  one(): Tuple | undefined {
    return oneOf(this.each());
  }

  oneOrFail(): Tuple {
    return oneOrFailOf(this.each());
  }

  // ===========================================================================
  // Copies
  // ===========================================================================

  /**
   * Same-shaped relation over `dataset`. With no extra options the option
   * object itself is shared.
   */
  withDataset(dataset: Dataset, extraOptions: RelationOptions = {}): Relation {
    const options = Object.keys(extraOptions).length === 0
      ? this.options
      : { ...this.options, ...extraOptions };
    return new Relation(dataset, options);
  }

  with(extraOptions: RelationOptions): Relation {
    return this.withDataset(this.dataset, { ...this.options, ...extraOptions });
  }

  // ===========================================================================
  // Dataset operations
  // ===========================================================================

  restrict(criteria: Criteria): Relation {
    return this.withDataset(restrictDataset(this.dataset, criteria));
  }

  project(...names: string[]): Relation {
    return this.withDataset(projectDataset(this.dataset, names));
  }

  order(...names: string[]): Relation {
    return this.withDataset(orderDataset(this.dataset, names));
  }

  /**
   * Coerce `tuple` through the write schema and append it to the dataset.
   *
   * @throws UnsupportedOperationError when the dataset is not writable
   * @throws TupleValidationError when the schema rejects the tuple
   */
  insert(tuple: Tuple): this {
    const { dataset } = this;
    if (!isWritableDataset(dataset)) {
      throw new UnsupportedOperationError('insert', `Dataset of relation "${this.name}"`);
    }
    dataset.insert(this.schemaHash(tuple));
    return this;
  }

  delete(tuple: Tuple): this {
    const { dataset } = this;
    if (!isWritableDataset(dataset)) {
      throw new UnsupportedOperationError('delete', `Dataset of relation "${this.name}"`);
    }
    dataset.delete(tuple);
    return this;
  }

  // ===========================================================================
  // Composition
  // ===========================================================================

  /**
   * Graph rooted at this relation. Nothing is read until the graph is called.
   */
  combine(...others: GraphNode[]): Graph {
    return Graph.build(this, others);
  }

  /**
   * Compose with a mapper, or with a curried view that receives this
   * relation's loaded tuples. Nothing is read until the composite is called.
   */
  pipe(next: Curried): Composite<Tuple, Tuple>;
  pipe<O>(next: Mapper<Tuple, O>): Composite<Tuple, O>;
  pipe<O>(next: Curried | Mapper<Tuple, O>): Composite<Tuple, O> | Composite<Tuple, Tuple> {
    if (next instanceof Curried) {
      return new Composite<Tuple, Tuple>(this, next.toMapper());
    }
    return new Composite(this, next);
  }

  /**
   * Pipe through registered mappers, in order.
   *
   * @throws RegistryLookupError for an unknown mapper name
   */
  mapWith(...names: string[]): Composite<unknown, unknown> {
    const [first, ...rest] = names.map(name => this.mappers.get(name));
    if (!first) {
      throw new InvalidArgumentError('mapWith() needs at least one mapper name', undefined, {
        relation: this.name,
      });
    }
    return rest.reduce<Composite<unknown, unknown>>(
      (composite, mapper) => composite.pipe(mapper),
      new Composite<Tuple, unknown>(this, first)
    );
  }

  // ===========================================================================
  // Views
  // ===========================================================================

  /**
   * Run a view of the relation's definition. Given fewer arguments than the
   * view takes, returns a Curried waiting for the rest.
   *
   * @throws RegistryLookupError for an unknown view
   */
  view(name: string, ...args: unknown[]): Relation | Curried {
    const { arity } = this.requireDefinition(name).view(name);
    if (args.length < arity) {
      return new Curried(this, name, arity, args);
    }
    return this.applyView(name, args);
  }

  /**
   * Run a view with all its arguments and auto-project the result through
   * the view's schema, when it has one.
   */
  applyView(name: string, args: readonly unknown[]): Relation {
    const definition = this.requireDefinition(name);
    const result = definition.view(name).definition.relation(this, ...args);
    const schema = definition.viewSchema(name);
    return schema ? schema.call(result) : result;
  }

  private requireDefinition(view: string): RelationDefinition {
    const { definition } = this.options;
    if (!definition) {
      throw new RegistryLookupError('view', view, []);
    }
    return definition;
  }
}
