/**
 * Step Result
 *
 * Every reducing function returns a Step: either Continue (keep folding with
 * this accumulator) or Stop (this accumulator is final, pull nothing more).
 * The tag is a control signal only. Stop is never an error.
 *
 * Step forms a monad:
 *   - Left identity:  flatMap(Continue(a), f) === f(a)
 *   - Right identity: flatMap(m, Continue) === m
 *   - Associativity:  flatMap(flatMap(m, f), g) === flatMap(m, a => flatMap(f(a), g))
 */

// ============================================================================
// Step Type Definition
// ============================================================================

/**
 * Step data type - either Continue or Stop, each carrying one payload
 */
export type Step<T> = Continue<T> | Stop<T>;

/**
 * Continue variant - keep reducing
 */
export interface Continue<T> {
  readonly _tag: "Continue";
  readonly value: T;
}

/**
 * Stop variant - reduction is finished
 */
export interface Stop<T> {
  readonly _tag: "Stop";
  readonly value: T;
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a Continue step
 */
export function Continue<T>(value: T): Step<T> {
  return { _tag: "Continue", value };
}

/**
 * Create a Stop step
 */
export function Stop<T>(value: T): Step<T> {
  return { _tag: "Stop", value };
}

/**
 * Create a Continue step (alias)
 */
export function cont<T>(value: T): Step<T> {
  return { _tag: "Continue", value };
}

/**
 * Create a Stop step (alias)
 */
export function stop<T>(value: T): Step<T> {
  return { _tag: "Stop", value };
}

// ============================================================================
// Type Guards
// ============================================================================

export function isContinue<T>(step: Step<T>): step is Continue<T> {
  return step._tag === "Continue";
}

export function isStop<T>(step: Step<T>): step is Stop<T> {
  return step._tag === "Stop";
}

// ============================================================================
// Operations
// ============================================================================

/**
 * The payload, whichever the tag
 */
export function unwrap<T>(step: Step<T>): T {
  return step.value;
}

/**
 * Transform the payload, keeping the tag
 */
export function map<A, B>(step: Step<A>, f: (a: A) => B): Step<B> {
  return isContinue(step) ? Continue(f(step.value)) : Stop(f(step.value));
}

/**
 * Monadic bind. Continue hands its payload to `f`; Stop short-circuits and
 * keeps its own payload, which is why the result may carry either type.
 */
export function flatMap<A, B>(step: Step<A>, f: (a: A) => Step<B>): Step<A | B> {
  return isContinue(step) ? f(step.value) : step;
}

/**
 * Fold over Step - provide handlers for both cases
 */
export function fold<A, B>(
  step: Step<A>,
  onContinue: (a: A) => B,
  onStop: (a: A) => B,
): B {
  return isContinue(step) ? onContinue(step.value) : onStop(step.value);
}

/**
 * The payload of a Continue, or undefined for a Stop
 */
export function continueValue<A>(step: Step<A>): A | undefined {
  return isContinue(step) ? step.value : undefined;
}

/**
 * Force a step to Stop, keeping its payload
 */
export function toStop<A>(step: Step<A>): Step<A> {
  return isStop(step) ? step : Stop(step.value);
}

/**
 * Structural equality on steps, with a payload comparison
 */
export function equals<A>(
  x: Step<A>,
  y: Step<A>,
  eq: (a: A, b: A) => boolean = Object.is,
): boolean {
  return x._tag === y._tag && eq(x.value, y.value);
}

/**
 * Render as `Continue(v)` / `Stop(v)`
 */
export function show<A>(step: Step<A>, showValue: (a: A) => string = String): string {
  return `${step._tag}(${showValue(step.value)})`;
}
