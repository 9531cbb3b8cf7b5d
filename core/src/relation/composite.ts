/**
 * Pipelines: a materialisable left side feeding a mapper.
 *
 * `relation.pipe(mapper)` builds a Composite and evaluates nothing. Calling
 * the composite loads the left side once and hands the `Loaded` result to the
 * mapper. Composites pipe further, so chains of any length stay lazy.
 */

import { toMapperObject, type Mapper, type MapperObject } from '../mappers.js';
import { Loaded } from './loaded.js';
import type { Materializable } from './materializable.js';

export class Composite<I = unknown, O = unknown> implements Materializable<O> {
  readonly kind = 'composite' as const;

  readonly right: MapperObject<I, O>;

  constructor(
    readonly left: Materializable<I>,
    right: Mapper<I, O>
  ) {
    this.right = toMapperObject(right);
  }

  isCurried(): false {
    return false;
  }

  isGraph(): false {
    return false;
  }

  call(...args: unknown[]): Loaded<O> {
    const input = this.left.call(...args);
    return new Loaded(this.right.call(input), this);
  }

  toArray(): O[] {
    return this.call().toArray();
  }

  pipe<N>(mapper: Mapper<O, N>): Composite<O, N> {
    return new Composite(this, mapper);
  }
}
