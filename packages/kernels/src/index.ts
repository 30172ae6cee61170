/**
 * @foldline/kernels — Numeric batch kernels
 *
 * Unrolled loops for large numeric arrays, with a scalar fallback below a
 * configurable length threshold.
 */

export type { KernelPath } from "./kernels.js";
export {
  kernelThreshold,
  kernelPath,
  mapNumbers,
  filterNumbers,
  multiplyNumbers,
  sumNumbers,
  dotNumbers,
} from "./kernels.js";

export type { KernelErrorReason } from "./errors.js";
export { KernelError } from "./errors.js";
