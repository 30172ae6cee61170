/**
 * @foldline/pipeline — Fluent, reusable transducer pipelines
 *
 * @example
 * ```typescript
 * import { pipeline } from "@foldline/pipeline";
 *
 * const shout = pipeline<string>()
 *   .map((s) => s.trim())
 *   .reject((s) => s === "")
 *   .map((s) => s.toUpperCase());
 *
 * shout.toArray([" a ", "", "b"]); // ["A", "B"]
 * ```
 */

export { Pipeline, pipeline } from "./pipeline.js";
