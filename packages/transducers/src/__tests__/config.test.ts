/**
 * Tests for configuration loading
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { config, defineConfig } from "../config.js";
import { createLogger } from "../logger.js";

// ============================================================================
// config.get / config.set
// ============================================================================

describe("config.get and config.set", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    config.reset();
  });

  it("should return default values", () => {
    expect(config.get("debug")).toBe(false);
    expect(config.get("kernels.enabled")).toBe(true);
    expect(config.get("kernels.threshold")).toBe(64);
  });

  it("should set simple values", () => {
    config.set({ debug: true });
    expect(config.get("debug")).toBe(true);
    expect(config.has("debug")).toBe(true);
  });

  it("should merge nested values", () => {
    config.set({ kernels: { threshold: 8 } });
    expect(config.get("kernels.threshold")).toBe(8);
    expect(config.get("kernels.enabled")).toBe(true);
  });

  it("should return undefined for non-existent paths", () => {
    expect(config.get("nonexistent")).toBeUndefined();
    expect(config.get("kernels.threshold.deeper")).toBeUndefined();
    expect(config.has("nonexistent")).toBe(false);
  });

  it("should keep custom keys", () => {
    config.set({ app: { label: "demo" } });
    expect(config.get("app.label")).toBe("demo");
    expect(config.getAll()).toMatchObject({ debug: false, app: { label: "demo" } });
  });

  it("reset discards programmatic values", () => {
    config.set({ debug: true });
    config.reset();
    expect(config.get("debug")).toBe(false);
  });

  it("defineConfig returns its argument", () => {
    const values = { debug: true, kernels: { threshold: 32 } };
    expect(defineConfig(values)).toBe(values);
  });
});

// ============================================================================
// Environment variables
// ============================================================================

describe("environment variables", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  it("should parse booleans and integers", () => {
    vi.stubEnv("FOLDLINE_DEBUG", "true");
    vi.stubEnv("FOLDLINE_KERNELS_ENABLED", "false");
    vi.stubEnv("FOLDLINE_KERNELS__THRESHOLD", "128");
    expect(config.get("debug")).toBe(true);
    expect(config.get("kernels.enabled")).toBe(false);
    expect(config.get("kernels.threshold")).toBe(128);
  });

  it("should keep 0 and 1 as numbers", () => {
    vi.stubEnv("FOLDLINE_KERNELS_THRESHOLD", "1");
    config.load();
    expect(config.get("kernels.threshold")).toBe(1);

    vi.stubEnv("FOLDLINE_KERNELS_THRESHOLD", "0");
    config.load();
    expect(config.get("kernels.threshold")).toBe(0);
  });

  it("should treat FOLDLINE_DEBUG=1 as on and 0 as off", () => {
    vi.stubEnv("FOLDLINE_DEBUG", "1");
    config.load();
    expect(config.get("debug")).toBe(1);
    expect(config.has("debug")).toBe(true);

    vi.stubEnv("FOLDLINE_DEBUG", "0");
    config.load();
    expect(config.has("debug")).toBe(false);
  });

  it("should let config.set override the environment until the next load", () => {
    vi.stubEnv("FOLDLINE_KERNELS_THRESHOLD", "16");
    config.set({ kernels: { threshold: 8 } });
    expect(config.get("kernels.threshold")).toBe(8);

    config.load();
    expect(config.get("kernels.threshold")).toBe(16);
  });

  it("should keep other values as strings", () => {
    vi.stubEnv("FOLDLINE_APP_MODE", "strict");
    expect(config.get("app.mode")).toBe("strict");
  });

  it("should ignore variables without the prefix", () => {
    vi.stubEnv("OTHER_DEBUG", "1");
    expect(config.get("debug")).toBe(false);
  });
});

// ============================================================================
// Config files
// ============================================================================

describe("config files", () => {
  let dir: string;

  beforeEach(() => {
    config.reset();
    dir = mkdtempSync(join(tmpdir(), "foldline-config-"));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    config.reset();
    rmSync(dir, { recursive: true, force: true });
  });

  it("should load an rc file over the defaults", () => {
    writeFileSync(join(dir, ".foldlinerc.json"), JSON.stringify({ kernels: { threshold: 256 } }));
    config.load(dir);
    expect(config.get("kernels.threshold")).toBe(256);
    expect(config.get("kernels.enabled")).toBe(true);
    expect(config.getConfigFilePath()).toBe(join(dir, ".foldlinerc.json"));
  });

  it("should read the package.json key", () => {
    writeFileSync(
      join(dir, "package.json"),
      JSON.stringify({ name: "demo", foldline: { debug: true } }),
    );
    config.load(dir);
    expect(config.get("debug")).toBe(true);
    expect(config.getConfigFilePath()).toBe(join(dir, "package.json"));
  });

  it("should let the environment override the file", () => {
    writeFileSync(join(dir, ".foldlinerc.json"), JSON.stringify({ kernels: { threshold: 256 } }));
    vi.stubEnv("FOLDLINE_KERNELS_THRESHOLD", "16");
    config.load(dir);
    expect(config.getConfigFilePath()).toBe(join(dir, ".foldlinerc.json"));
    expect(config.get("kernels.threshold")).toBe(16);
  });

  it("should load a yaml rc file", () => {
    writeFileSync(join(dir, ".foldlinerc.yaml"), "kernels:\n  enabled: false\n");
    config.load(dir);
    expect(config.getConfigFilePath()).toBe(join(dir, ".foldlinerc.yaml"));
    expect(config.get("kernels.enabled")).toBe(false);
  });

  it("should fall back to defaults when the file is broken", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    writeFileSync(join(dir, ".foldlinerc.json"), "{ not json");
    config.load(dir);
    expect(config.get("kernels.threshold")).toBe(64);
    expect(config.getConfigFilePath()).toBeUndefined();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      "[foldline:config] Failed to load config file:",
      expect.any(Error),
    );
  });

  it("should ignore a file that is not an object", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    writeFileSync(join(dir, ".foldlinerc.json"), "[1, 2]");
    config.load(dir);
    expect(config.get("debug")).toBe(false);
    expect(config.getConfigFilePath()).toBeUndefined();
    expect(warn).toHaveBeenCalledWith(
      `[foldline:config] Ignoring ${join(dir, ".foldlinerc.json")}: config must be an object`,
    );
  });
});

// ============================================================================
// Logger
// ============================================================================

describe("createLogger", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    config.reset();
  });

  it("should stay quiet at debug level unless debug is on", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const log = createLogger("test");
    log.debug("hidden");
    expect(debug).not.toHaveBeenCalled();

    config.set({ debug: true });
    log.debug("shown", 1);
    expect(debug).toHaveBeenCalledWith("[foldline:test] shown", 1);
  });

  it("should always print warnings", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    createLogger("kernels").warn("careful");
    expect(warn).toHaveBeenCalledWith("[foldline:kernels] careful");
  });
});
