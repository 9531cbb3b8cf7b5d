/**
 * Mappers and the mapper registry
 *
 * A mapper turns a loaded relation into an array of output values. It can be
 * a plain function or an object with a `call` method. The registry is
 * immutable: `with()` returns a new registry, so relations sharing one never
 * observe a change.
 *
 * Registered mappers take `Loaded<unknown>`: in a `mapWith()` chain each one
 * receives whatever the previous mapper produced.
 */

import { RegistryLookupError } from './errors.js';
import type { Loaded } from './relation/loaded.js';
import type { Tuple } from './types.js';

export interface MapperObject<I = Tuple, O = unknown> {
  call(input: Loaded<I>): readonly O[];
}

export type MapperFn<I = Tuple, O = unknown> = (input: Loaded<I>) => readonly O[];

export type Mapper<I = Tuple, O = unknown> = MapperObject<I, O> | MapperFn<I, O>;

export type RegisteredMapper = Mapper<unknown, unknown>;

/**
 * Normalise either form of mapper to the object form.
 */
export function toMapperObject<I, O>(mapper: Mapper<I, O>): MapperObject<I, O> {
  return typeof mapper === 'function' ? { call: mapper } : mapper;
}

type MapperEntries = Iterable<readonly [string, RegisteredMapper]>;

function isEntries(value: MapperEntries | Record<string, RegisteredMapper>): value is MapperEntries {
  return Symbol.iterator in value;
}

export class MapperRegistry {
  private readonly elements: ReadonlyMap<string, RegisteredMapper>;

  constructor(elements: MapperEntries | Record<string, RegisteredMapper> = []) {
    this.elements = new Map(isEntries(elements) ? elements : Object.entries(elements));
  }

  /**
   * @throws RegistryLookupError when no mapper is registered under `name`
   */
  get(name: string): RegisteredMapper {
    const mapper = this.elements.get(name);
    if (!mapper) {
      throw new RegistryLookupError('mapper', name, this.names());
    }
    return mapper;
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

  /**
   * New registry with `mapper` added under `name` (replacing any previous one).
   */
  with(name: string, mapper: RegisteredMapper): MapperRegistry {
    return new MapperRegistry([...this.elements, [name, mapper] as const]);
  }
}
