/**
 * @foldline/transducers — Composable, early-terminating reductions
 *
 * A transducer rewrites a reducing function, so one description of
 * "map, then filter, then take five" can drive any source into any result
 * in a single pass. Reducers return a Step; a Stop ends the drive without
 * pulling another source element.
 *
 * @example
 * ```typescript
 * import { map, filter, take, toArray, range } from "@foldline/transducers";
 *
 * const xf = map((x: number) => x * 2)
 *   .compose(filter((x: number) => x % 3 === 0))
 *   .compose(take<number>(5));
 *
 * toArray(xf, range(1, Infinity)); // [6, 12, 18, 24, 30]
 * ```
 */

// Step: constructors and guards at the top level, the rest under `Steps`
export type { Step } from "./step.js";
export { Continue, Stop, cont, stop, isContinue, isStop, unwrap } from "./step.js";
export * as Steps from "./step.js";

export type { Reducer, Transducer } from "./transducer.js";
export { BaseTransducer, Identity, Compose, identity, compose } from "./transducer.js";

export {
  MapTransducer,
  FilterTransducer,
  RejectTransducer,
  TapTransducer,
  FlatMapTransducer,
  TakeTransducer,
  TakeWhileTransducer,
  DropTransducer,
  DropWhileTransducer,
  UniqueTransducer,
  UniqueByTransducer,
  ScanTransducer,
  ChunkTransducer,
  ApertureTransducer,
  InterposeTransducer,
  RepeatEachTransducer,
  map,
  filter,
  reject,
  tap,
  flatMap,
  take,
  takeWhile,
  drop,
  dropWhile,
  unique,
  uniqueBy,
  scan,
  chunk,
  aperture,
  interpose,
  repeatEach,
} from "./transforms.js";

export type { Predicate } from "./logic.js";
export {
  both,
  either,
  complement,
  allPass,
  anyPass,
  IfElseTransducer,
  when,
  unless,
  ifElse,
} from "./logic.js";

export type { Comparable } from "./collectors.js";
export {
  naturalOrder,
  reduce,
  toArray,
  partition,
  groupBy,
  frequencies,
  partitionBy,
  takeLast,
  dropLast,
  topK,
  reverse,
  sortBy,
  sortWith,
  reservoirSample,
  sum,
  product,
  count,
  mean,
  median,
  mode,
  quantile,
  variance,
  stdDev,
  min,
  max,
  minBy,
  maxBy,
  first,
  last,
  find,
  every,
  some,
  none,
  contains,
} from "./collectors.js";

export {
  zip,
  zipWith,
  zipLongest,
  merge,
  cartesianProduct,
  intersection,
  difference,
  union,
  symmetricDifference,
} from "./sequences.js";

export { range, iterate, repeat, generate, cycle, unfold } from "./sources.js";

export { sameValueZero } from "./equality.js";

export type { TransducerConfigErrorReason } from "./errors.js";
export { TransducerConfigError, requireCount, requireSize, requireFraction } from "./errors.js";

export type { FoldlineConfig, KernelsConfig } from "./config.js";
export { config, defineConfig } from "./config.js";

export type { Logger } from "./logger.js";
export { createLogger } from "./logger.js";
