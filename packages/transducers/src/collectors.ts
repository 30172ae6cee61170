/**
 * Collectors
 *
 * Terminal operations that drive a source through a transducer. `reduce` is
 * the one driver; every other collector is `reduce` with its own seed and
 * reducer.
 *
 * The driver pulls one source element per iteration and halts on the first
 * Stop, so the element after the stopping one is never pulled. Breaking out
 * of the loop also closes the source iterator, which lets infinite sources
 * and generators with cleanup feed any collector.
 *
 * @example
 * ```typescript
 * const evens = filter((x: number) => x % 2 === 0);
 *
 * toArray(evens, [1, 2, 3, 4]);          // [2, 4]
 * first(evens, range(1, Infinity));      // 2
 * groupBy(identity<number>(), [1, 2, 3], (x) => x % 2);
 * // Map { 1 => [1, 3], 0 => [2] }
 * ```
 */

import { Continue, Stop, isStop } from "./step.js";
import type { Reducer, Transducer } from "./transducer.js";
import { sameValueZero } from "./equality.js";
import { requireCount, requireFraction } from "./errors.js";

/** Values ordered by the built-in relational operators */
export type Comparable = number | string | bigint | Date;

/** Ascending comparison with `<` and `>` */
export function naturalOrder<T extends Comparable>(a: T, b: T): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// A found value, boxed so that a forwarded `undefined` is still "found"
interface Found<T> {
  readonly value: T;
}

// ============================================================================
// The driver
// ============================================================================

/**
 * Drive `source` through `transducer` into `reducer`, starting from `initial`.
 */
export function reduce<In, Out, Acc>(
  transducer: Transducer<In, Out>,
  source: Iterable<In>,
  initial: Acc,
  reducer: Reducer<Acc, Out>,
): Acc {
  const step = transducer.apply(reducer);
  let acc = initial;
  for (const value of source) {
    const result = step(acc, value);
    acc = result.value;
    if (isStop(result)) break;
  }
  return acc;
}

// ============================================================================
// Materialisation
// ============================================================================

/** Collect every forwarded value, in order */
export function toArray<In, Out>(transducer: Transducer<In, Out>, source: Iterable<In>): Out[] {
  return reduce<In, Out, Out[]>(transducer, source, [], (acc, value) => {
    acc.push(value);
    return Continue(acc);
  });
}

/** Split into `[pass, fail]` by the predicate */
export function partition<In, Out>(
  transducer: Transducer<In, Out>,
  source: Iterable<In>,
  predicate: (value: Out) => boolean,
): [pass: Out[], fail: Out[]] {
  const initial: [Out[], Out[]] = [[], []];
  return reduce(transducer, source, initial, (acc, value) => {
    acc[predicate(value) ? 0 : 1].push(value);
    return Continue(acc);
  });
}

/** Group by key; keys keep first-seen order, groups keep arrival order */
export function groupBy<In, Out, K>(
  transducer: Transducer<In, Out>,
  source: Iterable<In>,
  key: (value: Out) => K,
): Map<K, Out[]> {
  return reduce(transducer, source, new Map<K, Out[]>(), (groups, value) => {
    const k = key(value);
    const group = groups.get(k);
    if (group) {
      group.push(value);
    } else {
      groups.set(k, [value]);
    }
    return Continue(groups);
  });
}

/** Occurrence count per distinct value, in first-seen order */
export function frequencies<In, Out>(
  transducer: Transducer<In, Out>,
  source: Iterable<In>,
): Map<Out, number> {
  return reduce(transducer, source, new Map<Out, number>(), (counts, value) => {
    counts.set(value, (counts.get(value) ?? 0) + 1);
    return Continue(counts);
  });
}

/** Split into runs of consecutive values with the same key */
export function partitionBy<In, Out, K>(
  transducer: Transducer<In, Out>,
  source: Iterable<In>,
  key: (value: Out) => K,
): Out[][] {
  let lastKey: Found<K> | undefined;
  return reduce<In, Out, Out[][]>(transducer, source, [], (runs, value) => {
    const k = key(value);
    const current = runs[runs.length - 1];
    if (lastKey !== undefined && current !== undefined && sameValueZero(lastKey.value, k)) {
      current.push(value);
    } else {
      runs.push([value]);
    }
    lastKey = { value: k };
    return Continue(runs);
  });
}

/** The last `count` forwarded values */
export function takeLast<In, Out>(
  transducer: Transducer<In, Out>,
  source: Iterable<In>,
  count: number,
): Out[] {
  const limit = requireCount("takeLast", "count", count);
  return reduce<In, Out, Out[]>(transducer, source, [], (acc, value) => {
    if (limit === 0) return Continue(acc);
    acc.push(value);
    if (acc.length > limit) acc.shift();
    return Continue(acc);
  });
}

/** The `k` greatest values, greatest first */
export function topK<In, Out>(
  transducer: Transducer<In, Out>,
  source: Iterable<In>,
  k: number,
  compare: (a: Out, b: Out) => number,
): Out[] {
  const limit = requireCount("topK", "k", k);
  return toArray(transducer, source)
    .sort((a, b) => compare(b, a))
    .slice(0, limit);
}

/** Every forwarded value except the last `count` */
export function dropLast<In, Out>(
  transducer: Transducer<In, Out>,
  source: Iterable<In>,
  count: number,
): Out[] {
  const limit = requireCount("dropLast", "count", count);
  const all = toArray(transducer, source);
  return all.slice(0, Math.max(0, all.length - limit));
}

/** Forwarded values, last first */
export function reverse<In, Out>(transducer: Transducer<In, Out>, source: Iterable<In>): Out[] {
  return reduce<In, Out, Out[]>(transducer, source, [], (acc, value) => {
    acc.unshift(value);
    return Continue(acc);
  });
}

/** Forwarded values sorted ascending by `key`; equal keys keep arrival order */
export function sortBy<In, Out, K extends Comparable>(
  transducer: Transducer<In, Out>,
  source: Iterable<In>,
  key: (value: Out) => K,
): Out[] {
  return toArray(transducer, source)
    .map((value, index) => ({ value, index, key: key(value) }))
    .sort((a, b) => naturalOrder(a.key, b.key) || a.index - b.index)
    .map((entry) => entry.value);
}

/** Forwarded values sorted by `compare`; ties keep arrival order */
export function sortWith<In, Out>(
  transducer: Transducer<In, Out>,
  source: Iterable<In>,
  compare: (a: Out, b: Out) => number,
): Out[] {
  return toArray(transducer, source).sort(compare);
}

/**
 * Up to `k` forwarded values chosen uniformly at random (reservoir sampling).
 *
 * `random` must return values in `[0, 1)`; pass a seeded generator for
 * repeatable samples.
 */
export function reservoirSample<In, Out>(
  transducer: Transducer<In, Out>,
  source: Iterable<In>,
  k: number,
  random: () => number = Math.random,
): Out[] {
  const size = requireCount("reservoirSample", "k", k);
  let seen = 0;
  return reduce<In, Out, Out[]>(transducer, source, [], (sample, value) => {
    seen++;
    if (sample.length < size) {
      sample.push(value);
    } else {
      const slot = Math.floor(random() * seen);
      if (slot < size) sample[slot] = value;
    }
    return Continue(sample);
  });
}

// ============================================================================
// Folds
// ============================================================================

export function sum<In>(transducer: Transducer<In, number>, source: Iterable<In>): number {
  return reduce(transducer, source, 0, (acc, value) => Continue(acc + value));
}

export function product<In>(transducer: Transducer<In, number>, source: Iterable<In>): number {
  return reduce(transducer, source, 1, (acc, value) => Continue(acc * value));
}

export function count<In, Out>(transducer: Transducer<In, Out>, source: Iterable<In>): number {
  return reduce(transducer, source, 0, (acc) => Continue(acc + 1));
}

/** Arithmetic mean, or undefined when nothing was forwarded */
export function mean<In>(transducer: Transducer<In, number>, source: Iterable<In>): number | undefined {
  const [total, n] = reduce<In, number, [number, number]>(transducer, source, [0, 0], (acc, value) =>
    Continue<[number, number]>([acc[0] + value, acc[1] + 1]),
  );
  return n === 0 ? undefined : total / n;
}

/** Population variance, or undefined when nothing was forwarded */
export function variance<In>(transducer: Transducer<In, number>, source: Iterable<In>): number | undefined {
  // Welford's running mean and sum of squared deviations
  const [n, , m2] = reduce<In, number, [number, number, number]>(
    transducer,
    source,
    [0, 0, 0],
    ([seen, avg, sq], value) => {
      const next = seen + 1;
      const delta = value - avg;
      const nextAvg = avg + delta / next;
      return Continue<[number, number, number]>([next, nextAvg, sq + delta * (value - nextAvg)]);
    },
  );
  return n === 0 ? undefined : m2 / n;
}

/** Population standard deviation, or undefined when nothing was forwarded */
export function stdDev<In>(transducer: Transducer<In, number>, source: Iterable<In>): number | undefined {
  const v = variance(transducer, source);
  return v === undefined ? undefined : Math.sqrt(v);
}

/**
 * The `q` quantile (0 ≤ q ≤ 1), interpolating linearly between the two
 * nearest ranks; undefined when nothing was forwarded.
 */
export function quantile<In>(
  transducer: Transducer<In, number>,
  source: Iterable<In>,
  q: number,
): number | undefined {
  const fraction = requireFraction("quantile", "q", q);
  const sorted = toArray(transducer, source).sort((a, b) => a - b);
  if (sorted.length === 0) return undefined;
  const position = fraction * (sorted.length - 1);
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const below = sorted[lower];
  const above = sorted[upper];
  return below + (above - below) * (position - lower);
}

/** The middle value; the mean of the two middle values for an even count */
export function median<In>(transducer: Transducer<In, number>, source: Iterable<In>): number | undefined {
  return quantile(transducer, source, 0.5);
}

/** The most frequent value; the first seen wins a tie */
export function mode<In, Out>(transducer: Transducer<In, Out>, source: Iterable<In>): Out | undefined {
  let best: Found<Out> | undefined;
  let bestCount = 0;
  for (const [value, n] of frequencies(transducer, source)) {
    if (n > bestCount) {
      best = { value };
      bestCount = n;
    }
  }
  return best?.value;
}

/** The least value by `compare`; the earliest wins a tie */
export function minBy<In, Out>(
  transducer: Transducer<In, Out>,
  source: Iterable<In>,
  compare: (a: Out, b: Out) => number,
): Out | undefined {
  const best = reduce<In, Out, Found<Out> | undefined>(transducer, source, undefined, (acc, value) =>
    Continue(acc === undefined || compare(value, acc.value) < 0 ? { value } : acc),
  );
  return best?.value;
}

/** The greatest value by `compare`; the earliest wins a tie */
export function maxBy<In, Out>(
  transducer: Transducer<In, Out>,
  source: Iterable<In>,
  compare: (a: Out, b: Out) => number,
): Out | undefined {
  const best = reduce<In, Out, Found<Out> | undefined>(transducer, source, undefined, (acc, value) =>
    Continue(acc === undefined || compare(value, acc.value) > 0 ? { value } : acc),
  );
  return best?.value;
}

export function min<In, Out extends Comparable>(
  transducer: Transducer<In, Out>,
  source: Iterable<In>,
): Out | undefined {
  return minBy(transducer, source, naturalOrder);
}

export function max<In, Out extends Comparable>(
  transducer: Transducer<In, Out>,
  source: Iterable<In>,
): Out | undefined {
  return maxBy(transducer, source, naturalOrder);
}

// ============================================================================
// Short-circuiting queries
// ============================================================================

/** The first forwarded value; stops the drive as soon as there is one */
export function first<In, Out>(transducer: Transducer<In, Out>, source: Iterable<In>): Out | undefined {
  const found = reduce<In, Out, Found<Out> | undefined>(transducer, source, undefined, (_acc, value) =>
    Stop({ value }),
  );
  return found?.value;
}

/** The last forwarded value */
export function last<In, Out>(transducer: Transducer<In, Out>, source: Iterable<In>): Out | undefined {
  const found = reduce<In, Out, Found<Out> | undefined>(transducer, source, undefined, (_acc, value) =>
    Continue({ value }),
  );
  return found?.value;
}

/** The first forwarded value that satisfies the predicate */
export function find<In, Out>(
  transducer: Transducer<In, Out>,
  source: Iterable<In>,
  predicate: (value: Out) => boolean,
): Out | undefined {
  const found = reduce<In, Out, Found<Out> | undefined>(transducer, source, undefined, (acc, value) =>
    predicate(value) ? Stop({ value }) : Continue(acc),
  );
  return found?.value;
}

export function every<In, Out>(
  transducer: Transducer<In, Out>,
  source: Iterable<In>,
  predicate: (value: Out) => boolean,
): boolean {
  return reduce(transducer, source, true, (_acc, value) =>
    predicate(value) ? Continue(true) : Stop(false),
  );
}

export function some<In, Out>(
  transducer: Transducer<In, Out>,
  source: Iterable<In>,
  predicate: (value: Out) => boolean,
): boolean {
  return reduce(transducer, source, false, (_acc, value) =>
    predicate(value) ? Stop(true) : Continue(false),
  );
}

export function none<In, Out>(
  transducer: Transducer<In, Out>,
  source: Iterable<In>,
  predicate: (value: Out) => boolean,
): boolean {
  return reduce(transducer, source, true, (_acc, value) =>
    predicate(value) ? Stop(false) : Continue(true),
  );
}

/** True once a forwarded value equals `target` (SameValueZero) */
export function contains<In, Out>(
  transducer: Transducer<In, Out>,
  source: Iterable<In>,
  target: Out,
): boolean {
  return reduce(transducer, source, false, (_acc, value) =>
    sameValueZero(value, target) ? Stop(true) : Continue(false),
  );
}
