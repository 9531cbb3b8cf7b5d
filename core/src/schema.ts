/**
 * Relation schemas
 *
 * A Schema is an ordered set of uniquely named attributes. Attribute types are
 * zod schemas: the canonical `type` normalises tuples on the write path, the
 * optional `read` type decodes them on the read path.
 *
 * @example
 * ```typescript
 * import { z } from 'zod';
 *
 * const users = Schema.define('users', {
 *   id: { type: z.string(), read: z.coerce.number().int(), primaryKey: true },
 *   name: z.string(),
 * });
 *
 * users.toRelationHash()({ id: '1', name: 'Jane' }); // { id: 1, name: 'Jane' }
 * ```
 */

import { z, type ZodTypeAny } from 'zod';
import { AssociationSet } from './associations.js';
import type { Dataset } from './dataset.js';
import { projectDataset } from './dataset.js';
import {
  AttributeNotFoundError,
  InvalidArgumentError,
  TupleValidationError,
  type TupleIssue,
} from './errors.js';
import type { Relation } from './relation/relation.js';
import type { Tuple, TupleFn } from './types.js';

// =============================================================================
// Attributes
// =============================================================================

export interface AttributeOptions {
  /** Decode-time type; when absent the value is read as stored */
  read?: ZodTypeAny;
  /** Name of the schema this attribute was projected from */
  source?: string;
  primaryKey?: boolean;
}

/**
 * Attribute declaration accepted by `Schema.define`: a bare zod type or a
 * type plus options.
 */
export type AttributeInput = ZodTypeAny | ({ type: ZodTypeAny } & AttributeOptions);

export class Attribute {
  readonly readType?: ZodTypeAny;
  readonly source?: string;
  readonly primaryKey: boolean;

  constructor(
    readonly name: string,
    readonly type: ZodTypeAny,
    options: AttributeOptions = {}
  ) {
    this.readType = options.read;
    this.source = options.source;
    this.primaryKey = options.primaryKey ?? false;
  }

  /** True when the attribute declares a distinct read type */
  isRead(): boolean {
    return this.readType !== undefined;
  }

  toReadType(): ZodTypeAny {
    return this.readType ?? this.type;
  }

  withSource(source: string): Attribute {
    return new Attribute(this.name, this.type, {
      read: this.readType,
      source,
      primaryKey: this.primaryKey,
    });
  }
}

function toAttribute(name: string, input: AttributeInput): Attribute {
  if (input instanceof z.ZodType) {
    return new Attribute(name, input);
  }
  const { type, ...options } = input;
  return new Attribute(name, type, options);
}

// =============================================================================
// Inference
// =============================================================================

export interface InferenceContext {
  /** Dataset the schema describes, when the gateway can hand it over */
  dataset?: Dataset;
  /** Owning gateway, opaque to the schema */
  gateway?: unknown;
}

export interface InferenceResult {
  attributes: Attribute[];
  /** Attribute names the inferrer could not determine */
  missing: string[];
}

export type SchemaInferrer = (schemaName: string, context: InferenceContext) => InferenceResult;

export interface SchemaOptions {
  associations?: AssociationSet;
  /** When set, `finalize()` runs it and merges its attributes under the declared ones */
  inferrer?: SchemaInferrer;
}

// =============================================================================
// Schema
// =============================================================================

export class Schema implements Iterable<Attribute> {
  readonly name: string;
  readonly associations: AssociationSet;

  private attributeList: Attribute[];
  private attributeIndex: Map<string, Attribute>;
  private readonly inferrer?: SchemaInferrer;
  private finalized = false;
  private missingAttributes: string[] = [];
  private commandHash?: TupleFn;
  private relationHash?: TupleFn;

  constructor(name: string, attributes: readonly Attribute[] = [], options: SchemaOptions = {}) {
    this.name = name;
    this.associations = options.associations ?? AssociationSet.empty();
    this.inferrer = options.inferrer;
    this.attributeList = [];
    this.attributeIndex = new Map();
    this.replaceAttributes(attributes);
  }

  static define(
    name: string,
    shape: Record<string, AttributeInput>,
    options: SchemaOptions = {}
  ): Schema {
    return new Schema(
      name,
      Object.entries(shape).map(([attrName, input]) => toAttribute(attrName, input)),
      options
    );
  }

  static empty(name = 'anonymous'): Schema {
    return new Schema(name);
  }

  get attributes(): readonly Attribute[] {
    return this.attributeList;
  }

  /** Names reported missing by the inferrer during `finalize()` */
  get missing(): readonly string[] {
    return this.missingAttributes;
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  /**
   * @throws AttributeNotFoundError when the schema has no such attribute
   */
  attribute(name: string): Attribute {
    const attribute = this.attributeIndex.get(name);
    if (!attribute) {
      throw new AttributeNotFoundError(name, this.name, this.names());
    }
    return attribute;
  }

  has(name: string): boolean {
    return this.attributeIndex.has(name);
  }

  names(): string[] {
    return this.attributeList.map(attribute => attribute.name);
  }

  isEmpty(): boolean {
    return this.attributeList.length === 0;
  }

  hasReadTypes(): boolean {
    return this.attributeList.some(attribute => attribute.isRead());
  }

  primaryKey(): Attribute[] {
    return this.attributeList.filter(attribute => attribute.primaryKey);
  }

  [Symbol.iterator](): Iterator<Attribute> {
    return this.attributeList[Symbol.iterator]();
  }

  /**
   * Sub-schema holding `names`, each tagged with this schema as its source.
   */
  project(...names: string[]): Schema {
    const attributes = names.map(name => this.attribute(name).withSource(this.name));
    return new Schema(this.name, attributes, { associations: this.associations }).finalize();
  }

  /**
   * Complete inference (when an inferrer is configured) and freeze the schema.
   * Declared attributes win over inferred ones of the same name. Calling it
   * again is a no-op.
   */
  finalize(context: InferenceContext = {}): this {
    if (this.finalized) return this;

    if (this.inferrer) {
      const inferred = this.inferrer(this.name, context);
      const declared = new Set(this.names());
      this.replaceAttributes([
        ...inferred.attributes.filter(attribute => !declared.has(attribute.name)),
        ...this.attributeList,
      ]);
      this.missingAttributes = inferred.missing.filter(name => !declared.has(name));
    }

    this.finalized = true;
    Object.freeze(this.attributeList);
    return this;
  }

  /**
   * Write-path coercion: validates every attribute and returns the canonical
   * tuple. Keys the schema does not declare are dropped.
   */
  toCommandHash(): TupleFn {
    if (!this.commandHash) {
      const shape: Record<string, ZodTypeAny> = {};
      for (const attribute of this.attributeList) {
        shape[attribute.name] = attribute.type;
      }
      const objectType = z.object(shape);
      const schemaName = this.name;

      this.commandHash = (tuple: Tuple): Tuple => {
        const result = objectType.safeParse(tuple);
        if (!result.success) {
          throw new TupleValidationError(schemaName, 'write', toIssues(result.error.issues));
        }
        return result.data;
      };
    }
    return this.commandHash;
  }

  /**
   * Read-path coercion: decodes attributes that declare a read type. Every
   * other field, declared or not, passes through unchanged.
   */
  toRelationHash(): TupleFn {
    if (!this.relationHash) {
      const readers = this.attributeList
        .filter(attribute => attribute.isRead())
        .map(attribute => [attribute.name, attribute.toReadType()] as const);
      const schemaName = this.name;

      this.relationHash = (tuple: Tuple): Tuple => {
        const decoded: Tuple = { ...tuple };
        const issues: TupleIssue[] = [];

        for (const [name, type] of readers) {
          if (!(name in tuple)) continue;
          const result = type.safeParse(tuple[name]);
          if (result.success) {
            decoded[name] = result.data;
          } else {
            issues.push(...toIssues(result.error.issues, name));
          }
        }

        if (issues.length > 0) {
          throw new TupleValidationError(schemaName, 'read', issues);
        }
        return decoded;
      };
    }
    return this.relationHash;
  }

  /**
   * Auto-project `relation` through this schema: the dataset is projected to
   * this schema's attribute names and the schema is swapped in.
   */
  call(relation: Relation): Relation {
    return relation.withDataset(projectDataset(relation.dataset, this.names()), { schema: this });
  }

  private replaceAttributes(attributes: readonly Attribute[]): void {
    const index = new Map<string, Attribute>();
    for (const attribute of attributes) {
      if (index.has(attribute.name)) {
        throw new InvalidArgumentError(
          `Attribute "${attribute.name}" is defined more than once in schema "${this.name}"`,
          undefined,
          { schema: this.name, attribute: attribute.name }
        );
      }
      index.set(attribute.name, attribute);
    }
    this.attributeList = [...attributes];
    this.attributeIndex = index;
    this.commandHash = undefined;
    this.relationHash = undefined;
  }
}

function toIssues(issues: readonly z.ZodIssue[], prefix?: string): TupleIssue[] {
  return issues.map(issue => ({
    path: prefix === undefined ? [...issue.path] : [prefix, ...issue.path],
    message: issue.message,
  }));
}
