/**
 * Lazy sources for collectors.
 *
 * Every source is re-iterable: each `for...of` starts a fresh generator.
 * Infinite ones are safe to hand to any collector whose chain eventually
 * stops (take, takeWhile, first, find...).
 */

import { TransducerConfigError, requireCount } from "./errors.js";

/**
 * Numbers over `[start, end)` by `step`; a negative step counts down.
 *
 * @throws TransducerConfigError when `step` is zero
 */
export function range(start: number, end: number, step: number = 1): Iterable<number> {
  if (step === 0) {
    throw new TransducerConfigError("range", "step", "zero_step", "range: step must not be zero");
  }
  return reiterable(() => rangeIterable(start, end, step));
}

/** `seed`, `f(seed)`, `f(f(seed))`, ... forever */
export function iterate<T>(seed: T, f: (value: T) => T): Iterable<T> {
  return reiterable(() => iterateIterable(seed, f));
}

/** `value` repeated `times` times, or forever when `times` is omitted */
export function repeat<T>(value: T, times?: number): Iterable<T> {
  const limit = times === undefined ? Infinity : requireCount("repeat", "times", times);
  return reiterable(() => repeatIterable(value, limit));
}

/** `f()` called once per element, forever */
export function generate<T>(f: () => T): Iterable<T> {
  return reiterable(() => generateIterable(f));
}

/** Loop over `values` forever; empty when `values` is empty */
export function cycle<T>(values: readonly T[]): Iterable<T> {
  const snapshot = values.slice();
  return reiterable(() => cycleIterable(snapshot));
}

/**
 * Grow a sequence from a seed. `f` returns the next value with the seed
 * after it, or `undefined` to end.
 */
export function unfold<S, T>(seed: S, f: (seed: S) => readonly [T, S] | undefined): Iterable<T> {
  return reiterable(() => unfoldIterable(seed, f));
}

// ---------------------------------------------------------------------------
// Generators
// ---------------------------------------------------------------------------

function reiterable<T>(start: () => Iterator<T>): Iterable<T> {
  return { [Symbol.iterator]: start };
}

function* rangeIterable(start: number, end: number, step: number): Generator<number> {
  if (step > 0) {
    for (let i = start; i < end; i += step) yield i;
  } else {
    for (let i = start; i > end; i += step) yield i;
  }
}

function* iterateIterable<T>(seed: T, f: (value: T) => T): Generator<T> {
  let current = seed;
  while (true) {
    yield current;
    current = f(current);
  }
}

function* repeatIterable<T>(value: T, times: number): Generator<T> {
  for (let i = 0; i < times; i++) yield value;
}

function* generateIterable<T>(f: () => T): Generator<T> {
  while (true) yield f();
}

function* cycleIterable<T>(values: readonly T[]): Generator<T> {
  if (values.length === 0) return;
  while (true) yield* values;
}

function* unfoldIterable<S, T>(seed: S, f: (seed: S) => readonly [T, S] | undefined): Generator<T> {
  let state = seed;
  while (true) {
    const next = f(state);
    if (next === undefined) return;
    yield next[0];
    state = next[1];
  }
}
