/**
 * Numeric batch kernels
 *
 * Stateless operations over `ArrayLike<number>` (plain arrays and typed
 * arrays alike). Each kernel picks one of two paths per call:
 *
 * - scalar: one element per loop iteration
 * - batch: the loop body unrolled four wide, with independent partial
 *   accumulators for reductions
 *
 * The batch path is taken when kernels are enabled and the input has at
 * least `kernels.threshold` elements (64 unless configured). Integer results
 * are identical on both paths; float sums may differ by reassociation.
 *
 * @example
 * ```typescript
 * sumNumbers([1, 2, 3]);                  // 6
 * mapNumbers(new Float64Array(100), (x) => x + 1);
 * dotNumbers([1, 2, 3], [4, 5, 6]);       // 32
 * ```
 */

import { config, createLogger } from "@foldline/transducers";
import { KernelError } from "./errors.js";

const log = createLogger("kernels");

const DEFAULT_THRESHOLD = 64;

export type KernelPath = "batch" | "scalar";

/** Minimum input length for the batch path */
export function kernelThreshold(): number {
  const threshold = config.get("kernels.threshold");
  return typeof threshold === "number" && threshold >= 0 ? threshold : DEFAULT_THRESHOLD;
}

/** The path a kernel takes for an input of `length` elements */
export function kernelPath(length: number): KernelPath {
  return config.get("kernels.enabled") !== false && length >= kernelThreshold() ? "batch" : "scalar";
}

function selectPath(kernel: string, length: number): KernelPath {
  const path = kernelPath(length);
  log.debug(`${kernel}: ${path} path for ${length} elements`);
  return path;
}

function requireSameLength(kernel: string, a: ArrayLike<number>, b: ArrayLike<number>): void {
  if (a.length !== b.length) {
    throw new KernelError(
      kernel,
      "length_mismatch",
      `${kernel}: inputs must have equal lengths, got ${a.length} and ${b.length}`,
    );
  }
}

// ---------------------------------------------------------------------------
// Element-wise
// ---------------------------------------------------------------------------

/** Apply `f` to every element */
export function mapNumbers(data: ArrayLike<number>, f: (value: number) => number): number[] {
  const len = data.length;
  const result = new Array<number>(len);
  let i = 0;
  if (selectPath("mapNumbers", len) === "batch") {
    for (; i + 3 < len; i += 4) {
      result[i] = f(data[i]);
      result[i + 1] = f(data[i + 1]);
      result[i + 2] = f(data[i + 2]);
      result[i + 3] = f(data[i + 3]);
    }
  }
  for (; i < len; i++) {
    result[i] = f(data[i]);
  }
  return result;
}

/** Keep the elements that satisfy `p`, in order */
export function filterNumbers(data: ArrayLike<number>, p: (value: number) => boolean): number[] {
  const len = data.length;
  const result: number[] = [];
  let i = 0;
  if (selectPath("filterNumbers", len) === "batch") {
    for (; i + 3 < len; i += 4) {
      const a = data[i];
      const b = data[i + 1];
      const c = data[i + 2];
      const d = data[i + 3];
      if (p(a)) result.push(a);
      if (p(b)) result.push(b);
      if (p(c)) result.push(c);
      if (p(d)) result.push(d);
    }
  }
  for (; i < len; i++) {
    if (p(data[i])) result.push(data[i]);
  }
  return result;
}

/** Element-wise product of two equal-length inputs */
export function multiplyNumbers(a: ArrayLike<number>, b: ArrayLike<number>): number[] {
  requireSameLength("multiplyNumbers", a, b);
  const len = a.length;
  const result = new Array<number>(len);
  let i = 0;
  if (selectPath("multiplyNumbers", len) === "batch") {
    for (; i + 3 < len; i += 4) {
      result[i] = a[i] * b[i];
      result[i + 1] = a[i + 1] * b[i + 1];
      result[i + 2] = a[i + 2] * b[i + 2];
      result[i + 3] = a[i + 3] * b[i + 3];
    }
  }
  for (; i < len; i++) {
    result[i] = a[i] * b[i];
  }
  return result;
}

// ---------------------------------------------------------------------------
// Reductions
// ---------------------------------------------------------------------------

/** Sum of all elements; 0 for an empty input */
export function sumNumbers(data: ArrayLike<number>): number {
  const len = data.length;
  let total = 0;
  let i = 0;
  if (selectPath("sumNumbers", len) === "batch") {
    let s0 = 0;
    let s1 = 0;
    let s2 = 0;
    let s3 = 0;
    for (; i + 3 < len; i += 4) {
      s0 += data[i];
      s1 += data[i + 1];
      s2 += data[i + 2];
      s3 += data[i + 3];
    }
    total = s0 + s1 + (s2 + s3);
  }
  for (; i < len; i++) {
    total += data[i];
  }
  return total;
}

/** Dot product of two equal-length inputs */
export function dotNumbers(a: ArrayLike<number>, b: ArrayLike<number>): number {
  requireSameLength("dotNumbers", a, b);
  const len = a.length;
  let total = 0;
  let i = 0;
  if (selectPath("dotNumbers", len) === "batch") {
    let s0 = 0;
    let s1 = 0;
    let s2 = 0;
    let s3 = 0;
    for (; i + 3 < len; i += 4) {
      s0 += a[i] * b[i];
      s1 += a[i + 1] * b[i + 1];
      s2 += a[i + 2] * b[i + 2];
      s3 += a[i + 3] * b[i + 3];
    }
    total = s0 + s1 + (s2 + s3);
  }
  for (; i < len; i++) {
    total += a[i] * b[i];
  }
  return total;
}
