/**
 * Standard Transform Library
 *
 * Concrete transducers. Each class wraps a downstream reducer in `apply`;
 * the lowercase factories are the usual way to build them.
 *
 * Stateful transforms (take, drop, dropWhile, unique, uniqueBy, scan, chunk,
 * interpose, aperture) create their counters and buffers inside `apply`, so
 * every driver built from the same instance starts from a clean slate.
 *
 * Transforms that can end a drive early return Stop; rejection (filter,
 * drop, ...) is Continue with the accumulator untouched.
 */

import { Continue, Stop, isStop, toStop } from "./step.js";
import { BaseTransducer } from "./transducer.js";
import type { Reducer, Transducer } from "./transducer.js";
import { sameValueZero } from "./equality.js";
import { requireCount, requireSize } from "./errors.js";

// ============================================================================
// Stateless element transforms
// ============================================================================

/** Forward `f(value)` */
export class MapTransducer<In, Out> extends BaseTransducer<In, Out> {
  readonly name = "map";

  constructor(readonly f: (value: In) => Out) {
    super();
  }

  apply<Acc>(reducer: Reducer<Acc, Out>): Reducer<Acc, In> {
    const f = this.f;
    return (acc, value) => reducer(acc, f(value));
  }
}

/** Forward elements that satisfy the predicate */
export class FilterTransducer<T> extends BaseTransducer<T, T> {
  readonly name = "filter";

  constructor(readonly predicate: (value: T) => boolean) {
    super();
  }

  apply<Acc>(reducer: Reducer<Acc, T>): Reducer<Acc, T> {
    const predicate = this.predicate;
    return (acc, value) => (predicate(value) ? reducer(acc, value) : Continue(acc));
  }
}

/** Forward elements that fail the predicate */
export class RejectTransducer<T> extends BaseTransducer<T, T> {
  readonly name = "reject";

  constructor(readonly predicate: (value: T) => boolean) {
    super();
  }

  apply<Acc>(reducer: Reducer<Acc, T>): Reducer<Acc, T> {
    const predicate = this.predicate;
    return (acc, value) => (predicate(value) ? Continue(acc) : reducer(acc, value));
  }
}

/** Run a side effect, forward the element unchanged */
export class TapTransducer<T> extends BaseTransducer<T, T> {
  readonly name = "tap";

  constructor(readonly f: (value: T) => void) {
    super();
  }

  apply<Acc>(reducer: Reducer<Acc, T>): Reducer<Acc, T> {
    const f = this.f;
    return (acc, value) => {
      f(value);
      return reducer(acc, value);
    };
  }
}

/**
 * Expand each element into a finite iterable and forward its items in order.
 * A Stop from downstream ends the expansion at once; the rest of the
 * iterable is never pulled.
 */
export class FlatMapTransducer<In, Out> extends BaseTransducer<In, Out> {
  readonly name = "flatMap";

  constructor(readonly f: (value: In) => Iterable<Out>) {
    super();
  }

  apply<Acc>(reducer: Reducer<Acc, Out>): Reducer<Acc, In> {
    const f = this.f;
    return (acc, value) => {
      let current = acc;
      for (const item of f(value)) {
        const step = reducer(current, item);
        if (isStop(step)) return step;
        current = step.value;
      }
      return Continue(current);
    };
  }
}

// ============================================================================
// Early termination
// ============================================================================

/** Forward the first `count` elements, stopping on the last one */
export class TakeTransducer<T> extends BaseTransducer<T, T> {
  readonly name = "take";
  readonly count: number;

  constructor(count: number) {
    super();
    this.count = requireCount("take", "count", count);
  }

  apply<Acc>(reducer: Reducer<Acc, T>): Reducer<Acc, T> {
    const limit = this.count;
    let taken = 0;
    return (acc, value) => {
      if (taken >= limit) return Stop(acc);
      taken++;
      const step = reducer(acc, value);
      return taken >= limit ? toStop(step) : step;
    };
  }
}

/** Forward while the predicate holds; stop, without forwarding, on the first failure */
export class TakeWhileTransducer<T> extends BaseTransducer<T, T> {
  readonly name = "takeWhile";

  constructor(readonly predicate: (value: T) => boolean) {
    super();
  }

  apply<Acc>(reducer: Reducer<Acc, T>): Reducer<Acc, T> {
    const predicate = this.predicate;
    return (acc, value) => (predicate(value) ? reducer(acc, value) : Stop(acc));
  }
}

// ============================================================================
// Skipping
// ============================================================================

/** Absorb the first `count` elements, forward the rest */
export class DropTransducer<T> extends BaseTransducer<T, T> {
  readonly name = "drop";
  readonly count: number;

  constructor(count: number) {
    super();
    this.count = requireCount("drop", "count", count);
  }

  apply<Acc>(reducer: Reducer<Acc, T>): Reducer<Acc, T> {
    const limit = this.count;
    let dropped = 0;
    return (acc, value) => {
      if (dropped < limit) {
        dropped++;
        return Continue(acc);
      }
      return reducer(acc, value);
    };
  }
}

/**
 * Absorb while the predicate holds. The first element that fails it flips a
 * one-way latch: from then on everything is forwarded and the predicate is
 * not consulted again.
 */
export class DropWhileTransducer<T> extends BaseTransducer<T, T> {
  readonly name = "dropWhile";

  constructor(readonly predicate: (value: T) => boolean) {
    super();
  }

  apply<Acc>(reducer: Reducer<Acc, T>): Reducer<Acc, T> {
    const predicate = this.predicate;
    let dropping = true;
    return (acc, value) => {
      if (dropping) {
        if (predicate(value)) return Continue(acc);
        dropping = false;
      }
      return reducer(acc, value);
    };
  }
}

// ============================================================================
// Deduplication
// ============================================================================

/**
 * Drop consecutive repeats: an element is forwarded unless it equals the
 * previously forwarded one. Non-adjacent repeats pass (see UniqueBy for
 * global dedup).
 */
export class UniqueTransducer<T> extends BaseTransducer<T, T> {
  readonly name = "unique";

  constructor(readonly equals: (a: T, b: T) => boolean = sameValueZero) {
    super();
  }

  apply<Acc>(reducer: Reducer<Acc, T>): Reducer<Acc, T> {
    const equals = this.equals;
    // boxed so that an undefined element still counts as "seen"
    let previous: { readonly value: T } | undefined;
    return (acc, value) => {
      if (previous !== undefined && equals(previous.value, value)) return Continue(acc);
      previous = { value };
      return reducer(acc, value);
    };
  }
}

/** Global dedup by key; the first element seen for each key wins */
export class UniqueByTransducer<T, K> extends BaseTransducer<T, T> {
  readonly name = "uniqueBy";

  constructor(readonly key: (value: T) => K) {
    super();
  }

  apply<Acc>(reducer: Reducer<Acc, T>): Reducer<Acc, T> {
    const key = this.key;
    const seen = new Set<K>();
    return (acc, value) => {
      const k = key(value);
      if (seen.has(k)) return Continue(acc);
      seen.add(k);
      return reducer(acc, value);
    };
  }
}

// ============================================================================
// Stateful emitters
// ============================================================================

/** Running fold: forward every intermediate state */
export class ScanTransducer<In, S> extends BaseTransducer<In, S> {
  readonly name = "scan";

  constructor(
    readonly seed: S,
    readonly f: (state: S, value: In) => S,
  ) {
    super();
  }

  apply<Acc>(reducer: Reducer<Acc, S>): Reducer<Acc, In> {
    const f = this.f;
    let state = this.seed;
    return (acc, value) => {
      state = f(state, value);
      return reducer(acc, state);
    };
  }
}

/** Group into arrays of `size`; a trailing partial group is discarded */
export class ChunkTransducer<T> extends BaseTransducer<T, T[]> {
  readonly name = "chunk";
  readonly size: number;

  constructor(size: number) {
    super();
    this.size = requireSize("chunk", "size", size);
  }

  apply<Acc>(reducer: Reducer<Acc, T[]>): Reducer<Acc, T> {
    const size = this.size;
    let buffer: T[] = [];
    return (acc, value) => {
      buffer.push(value);
      if (buffer.length < size) return Continue(acc);
      const full = buffer;
      buffer = [];
      return reducer(acc, full);
    };
  }
}

/** Sliding window: every input after the first `size - 1` emits the last `size` elements */
export class ApertureTransducer<T> extends BaseTransducer<T, T[]> {
  readonly name = "aperture";
  readonly size: number;

  constructor(size: number) {
    super();
    this.size = requireSize("aperture", "size", size);
  }

  apply<Acc>(reducer: Reducer<Acc, T[]>): Reducer<Acc, T> {
    const size = this.size;
    const window: T[] = [];
    return (acc, value) => {
      window.push(value);
      if (window.length > size) window.shift();
      return window.length === size ? reducer(acc, window.slice()) : Continue(acc);
    };
  }
}

/** Forward `separator` between consecutive elements */
export class InterposeTransducer<T> extends BaseTransducer<T, T> {
  readonly name = "interpose";

  constructor(readonly separator: T) {
    super();
  }

  apply<Acc>(reducer: Reducer<Acc, T>): Reducer<Acc, T> {
    const separator = this.separator;
    let first = true;
    return (acc, value) => {
      if (first) {
        first = false;
        return reducer(acc, value);
      }
      const step = reducer(acc, separator);
      return isStop(step) ? step : reducer(step.value, value);
    };
  }
}

/** Forward every element `times` times */
export class RepeatEachTransducer<T> extends BaseTransducer<T, T> {
  readonly name = "repeatEach";
  readonly times: number;

  constructor(times: number) {
    super();
    this.times = requireCount("repeatEach", "times", times);
  }

  apply<Acc>(reducer: Reducer<Acc, T>): Reducer<Acc, T> {
    const times = this.times;
    return (acc, value) => {
      let current = acc;
      for (let i = 0; i < times; i++) {
        const step = reducer(current, value);
        if (isStop(step)) return step;
        current = step.value;
      }
      return Continue(current);
    };
  }
}

// ============================================================================
// Factories
// ============================================================================

export function map<In, Out>(f: (value: In) => Out): Transducer<In, Out> {
  return new MapTransducer(f);
}

export function filter<T>(predicate: (value: T) => boolean): Transducer<T, T> {
  return new FilterTransducer(predicate);
}

export function reject<T>(predicate: (value: T) => boolean): Transducer<T, T> {
  return new RejectTransducer(predicate);
}

export function tap<T>(f: (value: T) => void): Transducer<T, T> {
  return new TapTransducer(f);
}

export function flatMap<In, Out>(f: (value: In) => Iterable<Out>): Transducer<In, Out> {
  return new FlatMapTransducer(f);
}

/** @throws TransducerConfigError unless `count` is a non-negative integer */
export function take<T>(count: number): Transducer<T, T> {
  return new TakeTransducer<T>(count);
}

export function takeWhile<T>(predicate: (value: T) => boolean): Transducer<T, T> {
  return new TakeWhileTransducer(predicate);
}

/** @throws TransducerConfigError unless `count` is a non-negative integer */
export function drop<T>(count: number): Transducer<T, T> {
  return new DropTransducer<T>(count);
}

export function dropWhile<T>(predicate: (value: T) => boolean): Transducer<T, T> {
  return new DropWhileTransducer(predicate);
}

export function unique<T>(equals?: (a: T, b: T) => boolean): Transducer<T, T> {
  return new UniqueTransducer<T>(equals);
}

export function uniqueBy<T, K>(key: (value: T) => K): Transducer<T, T> {
  return new UniqueByTransducer(key);
}

export function scan<In, S>(seed: S, f: (state: S, value: In) => S): Transducer<In, S> {
  return new ScanTransducer(seed, f);
}

/** @throws TransducerConfigError unless `size` is a positive integer */
export function chunk<T>(size: number): Transducer<T, T[]> {
  return new ChunkTransducer<T>(size);
}

/** @throws TransducerConfigError unless `size` is a positive integer */
export function aperture<T>(size: number): Transducer<T, T[]> {
  return new ApertureTransducer<T>(size);
}

export function interpose<T>(separator: T): Transducer<T, T> {
  return new InterposeTransducer(separator);
}

/** @throws TransducerConfigError unless `times` is a non-negative integer */
export function repeatEach<T>(times: number): Transducer<T, T> {
  return new RepeatEachTransducer<T>(times);
}
