/**
 * Helpers over two (or more) sequences.
 *
 * These consume whole inputs eagerly and return arrays, except that `zip`
 * and `zipWith` stop pulling as soon as the shorter input ends. Set
 * operations test membership with a `Set`, so equality is SameValueZero.
 */

// ============================================================================
// Zipping & merging
// ============================================================================

/** Pairs `[a[i], b[i]]`, as many as the shorter input has */
export function zip<A, B>(a: Iterable<A>, b: Iterable<B>): [A, B][] {
  return zipWith(a, b, (x, y): [A, B] => [x, y]);
}

/** `f(a[i], b[i])`, as many as the shorter input has */
export function zipWith<A, B, C>(a: Iterable<A>, b: Iterable<B>, f: (a: A, b: B) => C): C[] {
  const left = a[Symbol.iterator]();
  const right = b[Symbol.iterator]();
  const out: C[] = [];
  try {
    while (true) {
      const x = left.next();
      if (x.done) break;
      const y = right.next();
      if (y.done) break;
      out.push(f(x.value, y.value));
    }
  } finally {
    left.return?.();
    right.return?.();
  }
  return out;
}

/** Pairs up to the longer input, filling the shorter side */
export function zipLongest<A, B>(a: Iterable<A>, b: Iterable<B>, fillA: A, fillB: B): [A, B][] {
  const left = Array.from(a);
  const right = Array.from(b);
  const length = Math.max(left.length, right.length);
  const out: [A, B][] = [];
  for (let i = 0; i < length; i++) {
    out.push([i < left.length ? left[i] : fillA, i < right.length ? right[i] : fillB]);
  }
  return out;
}

/**
 * Round-robin interleave: one element from each input in turn, skipping
 * inputs that have run out, until all are exhausted.
 */
export function merge<T>(sequences: readonly Iterable<T>[]): T[] {
  let active = sequences.map((s) => s[Symbol.iterator]());
  const out: T[] = [];
  while (active.length > 0) {
    const remaining: Iterator<T>[] = [];
    for (const it of active) {
      const next = it.next();
      if (!next.done) {
        out.push(next.value);
        remaining.push(it);
      }
    }
    active = remaining;
  }
  return out;
}

/** Every `[x, y]` with `x` from `a` and `y` from `b`, `a`-major */
export function cartesianProduct<A, B>(a: Iterable<A>, b: Iterable<B>): [A, B][] {
  const right = Array.from(b);
  const out: [A, B][] = [];
  for (const x of a) {
    for (const y of right) out.push([x, y]);
  }
  return out;
}

// ============================================================================
// Set operations
// ============================================================================

/** Elements of `a` that occur in `b`; order and duplicates of `a` kept */
export function intersection<T>(a: Iterable<T>, b: Iterable<T>): T[] {
  const inB = new Set(b);
  return Array.from(a).filter((x) => inB.has(x));
}

/** Elements of `a` that do not occur in `b`; order and duplicates of `a` kept */
export function difference<T>(a: Iterable<T>, b: Iterable<T>): T[] {
  const inB = new Set(b);
  return Array.from(a).filter((x) => !inB.has(x));
}

/** Distinct elements of `a`, then distinct elements of `b` not yet seen */
export function union<T>(a: Iterable<T>, b: Iterable<T>): T[] {
  const seen = new Set<T>();
  for (const x of a) seen.add(x);
  for (const y of b) seen.add(y);
  return Array.from(seen);
}

/** Distinct elements of `a` absent from `b`, then of `b` absent from `a` */
export function symmetricDifference<T>(a: Iterable<T>, b: Iterable<T>): T[] {
  const left = new Set(a);
  const right = new Set(b);
  const out: T[] = [];
  for (const x of left) if (!right.has(x)) out.push(x);
  for (const y of right) if (!left.has(y)) out.push(y);
  return out;
}
