/**
 * Relation definitions
 *
 * A definition is a value: a name, a schema and named views. Relation
 * instances are built from it with `build(dataset)`; no class is generated
 * per relation.
 *
 * @example
 * ```typescript
 * const users = defineRelation({
 *   name: 'users',
 *   schema: { id: z.number(), name: z.string() },
 *   views: {
 *     names: {
 *       schema: schema => schema.project('name'),
 *       relation: relation => relation,
 *     },
 *     idsForNames: {
 *       schema: schema => schema.project('id'),
 *       relation: (relation, names: string[]) => relation.restrict({ name: names }),
 *     },
 *   },
 * });
 *
 * const relation = users.build(gateway.dataset('users'));
 * relation.view('idsForNames', ['Jane']).toArray(); // [{ id: 2 }]
 * ```
 */

import { RegistryLookupError } from '../errors.js';
import { MapperRegistry } from '../mappers.js';
import type { Dataset } from '../dataset.js';
import { Schema, type AttributeInput, type InferenceContext, type SchemaOptions } from '../schema.js';
import { Relation, type RelationOptions } from './relation.js';

export interface ViewDefinition {
  /** Derive the view's schema from the relation's schema, usually by `project()` */
  schema?(schema: Schema): Schema;
  /**
   * Build the view's relation. Parameters after the first are the view's
   * arguments; the view's arity is counted from them, so declare them without
   * defaults or rest parameters.
   */
  relation(relation: Relation, ...args: unknown[]): Relation;
}

export interface RelationDefinitionInput {
  name: string;
  /** A built schema, or attribute declarations for `Schema.define` */
  schema?: Schema | Record<string, AttributeInput>;
  /** Options for a schema given as attribute declarations */
  schemaOptions?: SchemaOptions;
  views?: Record<string, ViewDefinition>;
  mappers?: MapperRegistry;
}

export interface CompiledView {
  readonly name: string;
  readonly arity: number;
  readonly definition: ViewDefinition;
}

export class RelationDefinition {
  readonly name: string;
  readonly schema: Schema;
  readonly mappers: MapperRegistry;

  private readonly views: ReadonlyMap<string, CompiledView>;
  private readonly viewSchemas = new Map<string, Schema | undefined>();
  private schemaMap?: ReadonlyMap<string, Schema>;

  constructor(input: RelationDefinitionInput) {
    this.name = input.name;
    this.schema = input.schema instanceof Schema
      ? input.schema
      : Schema.define(input.name, input.schema ?? {}, input.schemaOptions);
    this.mappers = input.mappers ?? new MapperRegistry();
    this.views = new Map(
      Object.entries(input.views ?? {}).map(([name, definition]) => [
        name,
        { name, arity: Math.max(definition.relation.length - 1, 0), definition },
      ])
    );
  }

  /**
   * @throws RegistryLookupError for an unknown view name
   */
  view(name: string): CompiledView {
    const view = this.views.get(name);
    if (!view) {
      throw new RegistryLookupError('view', name, this.viewNames());
    }
    return view;
  }

  hasView(name: string): boolean {
    return this.views.has(name);
  }

  viewNames(): string[] {
    return [...this.views.keys()];
  }

  /**
   * Schema of a view, derived on first use from the (finalised) base schema.
   */
  viewSchema(name: string): Schema | undefined {
    const view = this.view(name);
    if (!this.viewSchemas.has(name)) {
      this.viewSchemas.set(name, view.definition.schema?.(this.schema));
    }
    return this.viewSchemas.get(name);
  }

  /**
   * The base schema under the relation name, plus every view that declares one.
   */
  schemas(): ReadonlyMap<string, Schema> {
    if (!this.schemaMap) {
      const map = new Map<string, Schema>([[this.name, this.schema]]);
      for (const name of this.views.keys()) {
        const schema = this.viewSchema(name);
        if (schema) map.set(name, schema);
      }
      this.schemaMap = map;
    }
    return this.schemaMap;
  }

  /**
   * Finalise the base schema (running inference when configured).
   */
  finalize(context: InferenceContext = {}): this {
    this.schema.finalize(context);
    return this;
  }

  build(dataset: Dataset, options: RelationOptions = {}): Relation {
    return new Relation(dataset, {
      name: this.name,
      schema: this.schema,
      mappers: this.mappers,
      definition: this,
      ...options,
    });
  }
}

export function defineRelation(input: RelationDefinitionInput): RelationDefinition {
  return new RelationDefinition(input);
}
