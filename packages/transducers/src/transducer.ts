/**
 * Transducer Abstraction & Composition
 *
 * A transducer turns a reducing function over `Out` into a reducing function
 * over `In`. It knows nothing about where elements come from or what the
 * accumulator is, so one description can drive arrays, generators or any
 * other iterable into any terminal result.
 *
 * Transducers form a category:
 *   - Left identity:  identity().compose(t) ≡ t
 *   - Right identity: t.compose(identity()) ≡ t
 *   - Associativity:  a.compose(b).compose(c) ≡ a.compose(b.compose(c))
 *
 * @example
 * ```typescript
 * const xf = map((x: number) => x * 2)
 *   .compose(filter((x: number) => x % 3 === 0))
 *   .compose(take<number>(5));
 *
 * toArray(xf, range(1, 100)); // [6, 12, 18, 24, 30]
 * ```
 */

import type { Step } from "./step.js";

// ============================================================================
// Types
// ============================================================================

/**
 * One fold step: combine the accumulator with an element and say whether to
 * keep going.
 */
export type Reducer<Acc, T> = (acc: Acc, value: T) => Step<Acc>;

/**
 * A transformer of reducing functions.
 *
 * `apply` is generic in the accumulator, so the same transducer can feed an
 * array builder, a counter or a user fold without being rebuilt.
 */
export interface Transducer<In, Out> {
  /** Short name used in diagnostics */
  readonly name: string;

  /**
   * Wrap a downstream reducer. Each call builds one independent driver;
   * stateful transducers allocate their per-drive state here.
   */
  apply<Acc>(reducer: Reducer<Acc, Out>): Reducer<Acc, In>;

  /** Feed this transducer's output into `next` */
  compose<Next>(next: Transducer<Out, Next>): Transducer<In, Next>;
}

// ============================================================================
// Base Class
// ============================================================================

/**
 * Shared `compose` for every concrete transducer.
 */
export abstract class BaseTransducer<In, Out> implements Transducer<In, Out> {
  abstract readonly name: string;

  abstract apply<Acc>(reducer: Reducer<Acc, Out>): Reducer<Acc, In>;

  compose<Next>(next: Transducer<Out, Next>): Transducer<In, Next> {
    return new Compose(this, next);
  }

  toString(): string {
    return this.name;
  }
}

// ============================================================================
// Identity & Compose
// ============================================================================

/**
 * Passes the downstream reducer through untouched.
 */
export class Identity<T> extends BaseTransducer<T, T> {
  readonly name = "identity";

  apply<Acc>(reducer: Reducer<Acc, T>): Reducer<Acc, T> {
    return reducer;
  }
}

/**
 * `first` then `second`. Applying it wraps the terminal reducer with
 * `second` and the result with `first`, so elements flow through `first`
 * before reaching `second`.
 */
export class Compose<In, Mid, Out> extends BaseTransducer<In, Out> {
  readonly name: string;

  constructor(
    readonly first: Transducer<In, Mid>,
    readonly second: Transducer<Mid, Out>,
  ) {
    super();
    this.name = `${first.name} -> ${second.name}`;
  }

  apply<Acc>(reducer: Reducer<Acc, Out>): Reducer<Acc, In> {
    return this.first.apply(this.second.apply(reducer));
  }
}

/** The identity transducer */
export function identity<T>(): Transducer<T, T> {
  return new Identity<T>();
}

/** `first.compose(second)` as a free function */
export function compose<A, B, C>(
  first: Transducer<A, B>,
  second: Transducer<B, C>,
): Transducer<A, C> {
  return first.compose(second);
}
