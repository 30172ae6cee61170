import { describe, it, expect } from "vitest";
import { range, iterate, repeat, generate, cycle, unfold } from "../sources.js";
import { take } from "../transforms.js";
import { toArray } from "../collectors.js";
import { TransducerConfigError } from "../errors.js";

const firstN = <T>(n: number, source: Iterable<T>): T[] => toArray(take<T>(n), source);

describe("range", () => {
  it("counts up over a half-open interval", () => {
    expect([...range(0, 5)]).toEqual([0, 1, 2, 3, 4]);
    expect([...range(0, 10, 3)]).toEqual([0, 3, 6, 9]);
  });

  it("counts down with a negative step", () => {
    expect([...range(5, 0, -2)]).toEqual([5, 3, 1]);
  });

  it("is empty when start is past end", () => {
    expect([...range(5, 5)]).toEqual([]);
    expect([...range(5, 1)]).toEqual([]);
  });

  it("rejects a zero step when called", () => {
    expect(() => range(0, 10, 0)).toThrow(TransducerConfigError);
    expect(() => range(0, 10, 0)).toThrow("range: step must not be zero");
  });

  it("can be iterated more than once", () => {
    const r = range(1, 3);
    expect([...r]).toEqual([1, 2]);
    expect([...r]).toEqual([1, 2]);
  });
});

describe("infinite sources", () => {
  it("iterate applies f repeatedly", () => {
    expect(firstN(5, iterate(1, (x) => x * 2))).toEqual([1, 2, 4, 8, 16]);
  });

  it("repeat without a count never ends", () => {
    expect(firstN(3, repeat("z"))).toEqual(["z", "z", "z"]);
  });

  it("generate calls its factory per element", () => {
    let n = 0;
    expect(firstN(3, generate(() => ++n))).toEqual([1, 2, 3]);
  });

  it("cycle loops over its values", () => {
    expect(firstN(7, cycle(["a", "b", "c"]))).toEqual(["a", "b", "c", "a", "b", "c", "a"]);
  });
});

describe("finite sources", () => {
  it("repeat with a count", () => {
    expect([...repeat(0, 3)]).toEqual([0, 0, 0]);
    expect([...repeat(0, 0)]).toEqual([]);
    expect(() => repeat(0, -1)).toThrow("repeat: times must not be negative, got -1");
  });

  it("cycle of nothing is empty", () => {
    expect([...cycle([])]).toEqual([]);
  });

  it("cycle ignores later changes to its input", () => {
    const values = [1, 2];
    const looped = cycle(values);
    values.push(3);
    expect(firstN(4, looped)).toEqual([1, 2, 1, 2]);
  });

  it("unfold grows until f returns undefined", () => {
    const countdown = unfold(3, (n): [string, number] | undefined =>
      n === 0 ? undefined : [`t-${n}`, n - 1],
    );
    expect([...countdown]).toEqual(["t-3", "t-2", "t-1"]);
  });

  it("unfold builds fibonacci", () => {
    const fib = unfold<[number, number], number>([0, 1], ([a, b]) => [a, [b, a + b]]);
    expect(firstN(8, fib)).toEqual([0, 1, 1, 2, 3, 5, 8, 13]);
  });
});
