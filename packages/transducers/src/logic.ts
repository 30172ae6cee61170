/**
 * Predicate combinators and conditional transforms.
 *
 * The combinators build plain predicates to hand to filter, takeWhile and
 * friends. `when`, `unless` and `ifElse` are transducers that rewrite an
 * element depending on a predicate, always forwarding exactly one value.
 */

import { BaseTransducer } from "./transducer.js";
import type { Reducer, Transducer } from "./transducer.js";

export type Predicate<T> = (value: T) => boolean;

// ============================================================================
// Predicate combinators
// ============================================================================

export function both<T>(p: Predicate<T>, q: Predicate<T>): Predicate<T> {
  return (value) => p(value) && q(value);
}

export function either<T>(p: Predicate<T>, q: Predicate<T>): Predicate<T> {
  return (value) => p(value) || q(value);
}

export function complement<T>(p: Predicate<T>): Predicate<T> {
  return (value) => !p(value);
}

/** True when every predicate holds (vacuously true for none) */
export function allPass<T>(predicates: readonly Predicate<T>[]): Predicate<T> {
  return (value) => predicates.every((p) => p(value));
}

/** True when some predicate holds (false for none) */
export function anyPass<T>(predicates: readonly Predicate<T>[]): Predicate<T> {
  return (value) => predicates.some((p) => p(value));
}

// ============================================================================
// Conditional transducers
// ============================================================================

/** Forward `onTrue(value)` when the predicate holds, `onFalse(value)` otherwise */
export class IfElseTransducer<T> extends BaseTransducer<T, T> {
  readonly name: string;

  constructor(
    readonly predicate: Predicate<T>,
    readonly onTrue: (value: T) => T,
    readonly onFalse: (value: T) => T,
    name = "ifElse",
  ) {
    super();
    this.name = name;
  }

  apply<Acc>(reducer: Reducer<Acc, T>): Reducer<Acc, T> {
    const { predicate, onTrue, onFalse } = this;
    return (acc, value) => reducer(acc, predicate(value) ? onTrue(value) : onFalse(value));
  }
}

const unchanged = <T>(value: T): T => value;

/** Transform elements that satisfy the predicate, pass the rest through */
export function when<T>(predicate: Predicate<T>, f: (value: T) => T): Transducer<T, T> {
  return new IfElseTransducer(predicate, f, unchanged, "when");
}

/** Transform elements that fail the predicate, pass the rest through */
export function unless<T>(predicate: Predicate<T>, f: (value: T) => T): Transducer<T, T> {
  return new IfElseTransducer(predicate, unchanged, f, "unless");
}

export function ifElse<T>(
  predicate: Predicate<T>,
  onTrue: (value: T) => T,
  onFalse: (value: T) => T,
): Transducer<T, T> {
  return new IfElseTransducer(predicate, onTrue, onFalse);
}
