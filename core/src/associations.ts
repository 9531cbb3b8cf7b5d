/**
 * Association set attached to every Schema.
 *
 * Resolving an association (building the key-equality join between two
 * relations) is left to the caller. This module only stores descriptors by name.
 */

import { RegistryLookupError } from './errors.js';

export type AssociationKind = 'one_to_one' | 'one_to_many' | 'many_to_one' | 'many_to_many';

export interface AssociationDescriptor {
  /** Association name, e.g. `tasks` */
  readonly name: string;
  readonly kind: AssociationKind;
  /** Name of the relation the association starts from */
  readonly source: string;
  /** Name of the related relation */
  readonly target: string;
  /** Relation to join through, for many-to-many */
  readonly through?: string;
  /** Key on the target (one-to-many) or source (many-to-one) side */
  readonly foreignKey?: string;
  /** View on the target used to load it, e.g. `forUsers` */
  readonly view?: string;
}

export class AssociationSet implements Iterable<AssociationDescriptor> {
  private readonly elements: ReadonlyMap<string, AssociationDescriptor>;

  constructor(descriptors: Iterable<AssociationDescriptor> = []) {
    const elements = new Map<string, AssociationDescriptor>();
    for (const descriptor of descriptors) {
      elements.set(descriptor.name, Object.freeze({ ...descriptor }));
    }
    this.elements = elements;
  }

  static empty(): AssociationSet {
    return EMPTY_ASSOCIATIONS;
  }

  get(name: string): AssociationDescriptor {
    const descriptor = this.elements.get(name);
    if (!descriptor) {
      throw new RegistryLookupError('association', name, this.names());
    }
    return descriptor;
  }

  has(name: string): boolean {
    return this.elements.has(name);
  }

  names(): string[] {
    return [...this.elements.keys()];
  }

  get size(): number {
    return this.elements.size;
  }

  isEmpty(): boolean {
    return this.elements.size === 0;
  }

  [Symbol.iterator](): Iterator<AssociationDescriptor> {
    return this.elements.values();
  }
}

const EMPTY_ASSOCIATIONS = new AssociationSet();
