/**
 * A parametrised view waiting for its arguments.
 *
 * `relation.view('byName')` on a view taking one argument returns a Curried
 * instead of running the view. Arguments may arrive in several calls; once the
 * view's arity is reached the view runs and the resulting Relation comes back.
 * Graph nodes rely on this: a Curried node receives the loaded parent set as
 * its last argument.
 */

import { ErrorCode, InvalidArgumentError } from '../errors.js';
import type { Mapper } from '../mappers.js';
import type { Tuple } from '../types.js';
import { Composite } from './composite.js';
import type { Loaded } from './loaded.js';
import type { Relation } from './relation.js';

export class Curried {
  readonly kind = 'curried' as const;

  constructor(
    readonly relation: Relation,
    readonly view: string,
    readonly arity: number,
    readonly curryArgs: readonly unknown[] = []
  ) {}

  isCurried(): true {
    return true;
  }

  isGraph(): false {
    return false;
  }

  get name(): string {
    return this.relation.name;
  }

  /**
   * Supply more arguments. Runs the view once all of them are present.
   */
  call(...args: unknown[]): Relation | Curried {
    const all = [...this.curryArgs, ...args];
    if (all.length < this.arity) {
      return new Curried(this.relation, this.view, this.arity, all);
    }
    return this.relation.applyView(this.view, all);
  }

  /**
   * Supply the remaining arguments and load the resulting relation.
   *
   * @throws InvalidArgumentError when arguments are still missing afterwards
   */
  load(...args: unknown[]): Loaded<Tuple> {
    const result = this.call(...args);
    if (result.kind === 'curried') {
      throw result.arityError();
    }
    return result.call();
  }

  /**
   * A Curried cannot be materialised before it has all its arguments.
   *
   * @throws InvalidArgumentError always
   */
  toArray(): never {
    throw this.arityError();
  }

  /**
   * Pipe the loaded input of a composite into this view, loading the result.
   */
  toMapper(): Mapper<unknown, Tuple> {
    return (input: Loaded<unknown>) => this.load(input).collection;
  }

  arityError(): InvalidArgumentError {
    return new InvalidArgumentError(
      `${this.name}#${this.view} arity is ${this.arity} (${this.curryArgs.length} args given)`,
      ErrorCode.CURRIED_ARITY,
      { relation: this.name, view: this.view, arity: this.arity, given: this.curryArgs.length }
    );
  }

  /**
   * Compose with a mapper; the composite's call arguments complete this view.
   */
  pipe<O>(mapper: Mapper<Tuple, O>): Composite<Tuple, O> {
    return new Composite({ call: (...args: unknown[]) => this.load(...args), toArray: () => this.toArray() }, mapper);
  }
}
