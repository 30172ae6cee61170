/**
 * Fluent pipeline builder
 *
 * Chained stages (.map, .filter, .take, ...) compose into one transducer.
 * Terminal operations take the source and drive it through that transducer
 * in a single pass, so a pipeline is built once and reused over any number
 * of sources.
 *
 * Every stage method returns a new pipeline; the receiver is never changed.
 */

import {
  Continue,
  identity,
  map,
  filter,
  reject,
  take,
  takeWhile,
  drop,
  dropWhile,
  tap,
  flatMap,
  scan,
  unique,
  uniqueBy,
  chunk,
  interpose,
  when,
  reduce,
  toArray,
  first,
  last,
  count,
  find,
  some,
  every,
  sum,
  createLogger,
} from "@foldline/transducers";
import type { Transducer } from "@foldline/transducers";
import { sumNumbers } from "@foldline/kernels";

const log = createLogger("pipeline");

// Plain number arrays and non-bigint typed arrays
function isNumericArray(source: unknown): source is ArrayLike<number> {
  if (Array.isArray(source)) return source.every((x: unknown) => typeof x === "number");
  return (
    ArrayBuffer.isView(source) &&
    !(source instanceof DataView) &&
    !(source instanceof BigInt64Array) &&
    !(source instanceof BigUint64Array)
  );
}

/**
 * A reusable chain of stages from `In` to `Out`.
 *
 * @example
 * ```typescript
 * const firstEvenSquares = pipeline<number>()
 *   .filter((x) => x % 2 === 0)
 *   .map((x) => x * x)
 *   .take(3);
 *
 * firstEvenSquares.toArray([1, 2, 3, 4, 5, 6, 7, 8]); // [4, 16, 36]
 * firstEvenSquares.toArray(range(10, Infinity));       // [100, 144, 196]
 * ```
 */
export class Pipeline<In, Out> {
  private constructor(
    private readonly xf: Transducer<In, Out>,
    /** Stage names, in order */
    readonly stages: readonly string[],
  ) {}

  /** An empty pipeline over `T` */
  static of<T>(): Pipeline<T, T> {
    return new Pipeline(identity<T>(), []);
  }

  private chain<Next>(next: Transducer<Out, Next>): Pipeline<In, Next> {
    return new Pipeline(this.xf.compose(next), [...this.stages, next.name]);
  }

  /** The composed transducer, for use with the collectors directly */
  transducer(): Transducer<In, Out> {
    return this.xf;
  }

  toString(): string {
    return this.stages.length === 0 ? "pipeline()" : `pipeline(${this.stages.join(" -> ")})`;
  }

  // ---------------------------------------------------------------------------
  // Stages
  // ---------------------------------------------------------------------------

  map<Next>(f: (value: Out) => Next): Pipeline<In, Next> {
    return this.chain(map(f));
  }

  filter(predicate: (value: Out) => boolean): Pipeline<In, Out> {
    return this.chain(filter(predicate));
  }

  reject(predicate: (value: Out) => boolean): Pipeline<In, Out> {
    return this.chain(reject(predicate));
  }

  take(n: number): Pipeline<In, Out> {
    return this.chain(take<Out>(n));
  }

  takeWhile(predicate: (value: Out) => boolean): Pipeline<In, Out> {
    return this.chain(takeWhile(predicate));
  }

  drop(n: number): Pipeline<In, Out> {
    return this.chain(drop<Out>(n));
  }

  dropWhile(predicate: (value: Out) => boolean): Pipeline<In, Out> {
    return this.chain(dropWhile(predicate));
  }

  tap(f: (value: Out) => void): Pipeline<In, Out> {
    return this.chain(tap(f));
  }

  flatMap<Next>(f: (value: Out) => Iterable<Next>): Pipeline<In, Next> {
    return this.chain(flatMap(f));
  }

  scan<S>(seed: S, f: (state: S, value: Out) => S): Pipeline<In, S> {
    return this.chain(scan(seed, f));
  }

  /** Drop consecutive repeats */
  unique(equals?: (a: Out, b: Out) => boolean): Pipeline<In, Out> {
    return this.chain(unique<Out>(equals));
  }

  /** Drop every repeat of a key seen before */
  uniqueBy<K>(key: (value: Out) => K): Pipeline<In, Out> {
    return this.chain(uniqueBy(key));
  }

  chunk(size: number): Pipeline<In, Out[]> {
    return this.chain(chunk<Out>(size));
  }

  interpose(separator: Out): Pipeline<In, Out> {
    return this.chain(interpose<Out>(separator));
  }

  /** Read one property of every element */
  pluck<K extends keyof Out>(key: K): Pipeline<In, Out[K]> {
    return this.chain(map((value: Out) => value[key]));
  }

  when(predicate: (value: Out) => boolean, f: (value: Out) => Out): Pipeline<In, Out> {
    return this.chain(when(predicate, f));
  }

  /** Append any transducer as a stage */
  through<Next>(next: Transducer<Out, Next>): Pipeline<In, Next> {
    return this.chain(next);
  }

  // ---------------------------------------------------------------------------
  // Terminal operations
  // ---------------------------------------------------------------------------

  toArray(source: Iterable<In>): Out[] {
    log.debug(`toArray: ${this}`);
    return toArray(this.xf, source);
  }

  /** Fold left-to-right with a plain accumulator function */
  reduce<Acc>(source: Iterable<In>, f: (acc: Acc, value: Out) => Acc, initial: Acc): Acc {
    log.debug(`reduce: ${this}`);
    return reduce(this.xf, source, initial, (acc, value) => Continue(f(acc, value)));
  }

  first(source: Iterable<In>): Out | undefined {
    return first(this.xf, source);
  }

  last(source: Iterable<In>): Out | undefined {
    return last(this.xf, source);
  }

  count(source: Iterable<In>): number {
    return count(this.xf, source);
  }

  find(source: Iterable<In>, predicate: (value: Out) => boolean): Out | undefined {
    return find(this.xf, source, predicate);
  }

  some(source: Iterable<In>, predicate: (value: Out) => boolean): boolean {
    return some(this.xf, source, predicate);
  }

  every(source: Iterable<In>, predicate: (value: Out) => boolean): boolean {
    return every(this.xf, source, predicate);
  }

  /**
   * Sum of the output. A pipeline with no stages over a numeric array hands
   * the array to the numeric kernels.
   */
  sum(this: Pipeline<In, number>, source: Iterable<In>): number {
    if (this.stages.length === 0 && isNumericArray(source)) {
      log.debug(`sum: ${source.length} elements to kernels`);
      return sumNumbers(source);
    }
    log.debug(`sum: ${this}`);
    return sum(this.xf, source);
  }
}

/** Start a pipeline over elements of type `T` */
export function pipeline<T>(): Pipeline<T, T> {
  return Pipeline.of<T>();
}
