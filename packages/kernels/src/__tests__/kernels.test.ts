import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { config } from "@foldline/transducers";
import {
  kernelThreshold,
  kernelPath,
  mapNumbers,
  filterNumbers,
  multiplyNumbers,
  sumNumbers,
  dotNumbers,
} from "../kernels.js";
import { KernelError } from "../errors.js";

const ints = (n: number): number[] => Array.from({ length: n }, (_, i) => i + 1);

beforeEach(() => {
  config.reset();
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  config.reset();
});

// ===========================================================================
// Path selection
// ===========================================================================

describe("kernel path selection", () => {
  it("defaults to a threshold of 64", () => {
    expect(kernelThreshold()).toBe(64);
    expect(kernelPath(63)).toBe("scalar");
    expect(kernelPath(64)).toBe("batch");
  });

  it("follows the configured threshold", () => {
    config.set({ kernels: { threshold: 8 } });
    expect(kernelPath(7)).toBe("scalar");
    expect(kernelPath(8)).toBe("batch");
  });

  it("reads thresholds of 0 and 1 from the environment", () => {
    vi.stubEnv("FOLDLINE_KERNELS_THRESHOLD", "0");
    config.load();
    expect(kernelThreshold()).toBe(0);
    expect(kernelPath(0)).toBe("batch");

    vi.stubEnv("FOLDLINE_KERNELS_THRESHOLD", "1");
    config.load();
    expect(kernelThreshold()).toBe(1);
    expect(kernelPath(0)).toBe("scalar");
    expect(kernelPath(1)).toBe("batch");
  });

  it("ignores an invalid threshold", () => {
    config.set({ kernels: { threshold: -5 } });
    expect(kernelThreshold()).toBe(64);
  });

  it("stays scalar when kernels are disabled", () => {
    config.set({ kernels: { enabled: false } });
    expect(kernelPath(10_000)).toBe("scalar");
  });

  it("logs the chosen path once per call in debug mode", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    config.set({ debug: true });
    sumNumbers(ints(100));
    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith("[foldline:kernels] sumNumbers: batch path for 100 elements");
  });
});

// ===========================================================================
// Results agree on both paths
// ===========================================================================

describe("kernels — both paths", () => {
  const sizes = [0, 1, 3, 63, 64, 65, 1001];

  it("sumNumbers", () => {
    for (const n of sizes) {
      expect(sumNumbers(ints(n))).toBe((n * (n + 1)) / 2);
    }
  });

  it("mapNumbers", () => {
    for (const n of sizes) {
      expect(mapNumbers(ints(n), (x) => x * 2)).toEqual(ints(n).map((x) => x * 2));
    }
  });

  it("filterNumbers keeps order", () => {
    for (const n of sizes) {
      expect(filterNumbers(ints(n), (x) => x % 3 === 0)).toEqual(ints(n).filter((x) => x % 3 === 0));
    }
  });

  it("multiplyNumbers", () => {
    for (const n of sizes) {
      const a = ints(n);
      expect(multiplyNumbers(a, a)).toEqual(a.map((x) => x * x));
    }
  });

  it("dotNumbers", () => {
    expect(dotNumbers([1, 2, 3], [4, 5, 6])).toBe(32);
    const a = ints(100);
    expect(dotNumbers(a, a)).toBe((100 * 101 * 201) / 6);
  });

  it("scalar and batch float sums agree within tolerance", () => {
    const data = Array.from({ length: 1000 }, (_, i) => 1 / (i + 1));
    const batch = sumNumbers(data);
    config.set({ kernels: { enabled: false } });
    const scalar = sumNumbers(data);
    expect(batch).toBeCloseTo(scalar, 10);
  });

  it("accepts typed arrays", () => {
    const data = Float64Array.from(ints(128));
    expect(sumNumbers(data)).toBe(8256);
    expect(mapNumbers(data, (x) => x - 1)[127]).toBe(127);
  });
});

// ===========================================================================
// Errors
// ===========================================================================

describe("kernel errors", () => {
  it("rejects inputs of different lengths", () => {
    expect(() => multiplyNumbers([1, 2], [1])).toThrow(KernelError);
    expect(() => dotNumbers([1], [1, 2])).toThrow(
      "dotNumbers: inputs must have equal lengths, got 1 and 2",
    );
  });

  it("carries the reason code", () => {
    try {
      multiplyNumbers([1], []);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(KernelError);
      if (error instanceof KernelError) {
        expect(error.reason).toBe("length_mismatch");
        expect(error.kernel).toBe("multiplyNumbers");
        expect(error.name).toBe("KernelError");
      }
    }
  });

  it("propagates callback failures", () => {
    expect(() =>
      mapNumbers(ints(100), (x) => {
        if (x === 50) throw new Error("boom");
        return x;
      }),
    ).toThrow("boom");
  });
});
