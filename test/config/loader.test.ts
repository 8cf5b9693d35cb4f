import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, writeFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { randomUUID } from "node:crypto";
import {
  parseConfig,
  loadConfig,
  resolveCheckerOptions,
  DEFAULT_OPTIONS,
  DEFAULT_FILTERED_PREFIXES,
} from "../../src/config/index.js";

describe("parseConfig", () => {
  it("parses an empty document as an empty config", () => {
    expect(parseConfig("")).toEqual({});
  });

  it("parses all supported keys", () => {
    const yaml = `
umbrellaPrefix: Acme
frameworkName: AcmeComponents
filteredPrefixes:
  - Vendor/
filteredSuffixes:
  - Generated.h
extensions:
  - .h
`;
    expect(parseConfig(yaml)).toEqual({
      umbrellaPrefix: "Acme",
      frameworkName: "AcmeComponents",
      filteredPrefixes: ["Vendor/"],
      filteredSuffixes: ["Generated.h"],
      extensions: [".h"],
    });
  });

  it("rejects unknown keys", () => {
    expect(() => parseConfig("umbrellaPrefixes: Acme\n")).toThrow();
  });

  it("rejects extensions without a leading dot", () => {
    expect(() => parseConfig("extensions:\n  - h\n")).toThrow();
  });

  it("rejects a non-list filter", () => {
    expect(() => parseConfig("filteredPrefixes: Vendor/\n")).toThrow();
  });
});

describe("loadConfig", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `umbrella-check-config-test-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("returns an empty config when the default file is absent", async () => {
    expect(await loadConfig(testDir)).toEqual({});
  });

  it("reads the default file from the component directory", async () => {
    await writeFile(join(testDir, ".umbrella-check.yaml"), "umbrellaPrefix: Acme\n");

    expect(await loadConfig(testDir)).toEqual({ umbrellaPrefix: "Acme" });
  });

  it("prefers an explicit file", async () => {
    await writeFile(join(testDir, ".umbrella-check.yaml"), "umbrellaPrefix: Acme\n");
    const explicit = join(testDir, "ci.yaml");
    await writeFile(explicit, "frameworkName: AcmeKit\n");

    expect(await loadConfig(testDir, explicit)).toEqual({ frameworkName: "AcmeKit" });
  });

  it("rejects when an explicit file is missing", async () => {
    await expect(loadConfig(testDir, join(testDir, "missing.yaml"))).rejects.toThrow(/ENOENT/);
  });
});

describe("resolveCheckerOptions", () => {
  it("uses the defaults for an empty config", () => {
    expect(resolveCheckerOptions({})).toEqual(DEFAULT_OPTIONS);
  });

  it("appends extra filters to the built-in lists", () => {
    const options = resolveCheckerOptions({
      filteredPrefixes: ["Vendor/"],
      filteredSuffixes: ["Generated.h"],
    });

    expect(options.filteredPrefixes).toEqual([...DEFAULT_FILTERED_PREFIXES, "Vendor/"]);
    expect(options.filteredSuffixes).toEqual(["Themer.h", "Generated.h"]);
  });

  it("overrides the umbrella naming", () => {
    const options = resolveCheckerOptions({ umbrellaPrefix: "Acme", frameworkName: "AcmeKit" });

    expect(options.umbrellaPrefix).toBe("Acme");
    expect(options.frameworkName).toBe("AcmeKit");
  });

  it("returns frozen options", () => {
    expect(Object.isFrozen(resolveCheckerOptions({}))).toBe(true);
  });
});
