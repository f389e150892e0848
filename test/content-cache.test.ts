import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, mkdirSync, rmSync, utimesSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { tmpdir } from "node:os";
import { ContentCache, computeCacheKey, isCacheable, NO_HASH } from "../src/content-cache.js";
import { analyzeContentRelationships } from "../src/index.js";
import { nodeFileReader } from "../src/file-reader.js";
import { DEFAULT_CONFIG, type FileReader, type Warning } from "../src/types.js";

describe("ContentCache", () => {
  it("computes once and serves later calls from storage", async () => {
    const cache = new ContentCache<number>();
    const compute = vi.fn(async () => 42);
    expect(await cache.getOrCompute("k", compute)).toBe(42);
    expect(await cache.getOrCompute("k", compute)).toBe(42);
    expect(compute).toHaveBeenCalledTimes(1);
    expect(cache.has("k")).toBe(true);
    expect(cache.stats()).toEqual({ entries: 1, hits: 1, misses: 1 });
  });

  it("shares one computation between concurrent callers", async () => {
    const cache = new ContentCache<string>();
    let release: (value: string) => void = () => {};
    const compute = vi.fn(() => new Promise<string>((r) => (release = r)));
    const first = cache.getOrCompute("k", compute);
    const second = cache.getOrCompute("k", compute);
    expect(cache.has("k")).toBe(false);
    release("done");
    expect(await Promise.all([first, second])).toEqual(["done", "done"]);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it("stores nothing when the computation fails", async () => {
    const cache = new ContentCache<number>();
    await expect(cache.getOrCompute("k", async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(cache.has("k")).toBe(false);
    expect(await cache.getOrCompute("k", async () => 7)).toBe(7);
  });

  it("clear() empties storage and resets counters", async () => {
    const cache = new ContentCache<number>();
    await cache.getOrCompute("a", async () => 1);
    cache.clear();
    expect(cache.has("a")).toBe(false);
    expect(cache.stats()).toEqual({ entries: 0, hits: 0, misses: 0 });
  });

  it("writes through injected storage", async () => {
    const storage = new Map<string, number>();
    const cache = new ContentCache<number>(storage);
    await cache.getOrCompute("x", async () => 3);
    expect(storage.get("x")).toBe(3);
  });
});

describe("computeCacheKey", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "docmap-cache-"));
    writeFileSync(join(root, "README.md"), "# Readme\n");
    mkdirSync(join(root, "docs"));
    writeFileSync(join(root, "docs", "guide.md"), "# Guide\n");
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("is stable for an unchanged tree", () => {
    const key = computeCacheKey(root, "relationships", DEFAULT_CONFIG);
    expect(key).toMatch(new RegExp(`^relationships:.+:[0-9a-f]{32}$`));
    expect(key.startsWith(`relationships:${resolve(root)}:`)).toBe(true);
    expect(computeCacheKey(root, "relationships", DEFAULT_CONFIG)).toBe(key);
    expect(isCacheable(key)).toBe(true);
  });

  it("changes when a file's mtime changes", () => {
    const before = computeCacheKey(root, "relationships", DEFAULT_CONFIG);
    const past = new Date("2020-01-01T00:00:00Z");
    utimesSync(join(root, "docs", "guide.md"), past, past);
    expect(computeCacheKey(root, "relationships", DEFAULT_CONFIG)).not.toBe(before);
  });

  it("changes when a file is added", () => {
    const before = computeCacheKey(root, "relationships", DEFAULT_CONFIG);
    writeFileSync(join(root, "new.md"), "# New\n");
    expect(computeCacheKey(root, "relationships", DEFAULT_CONFIG)).not.toBe(before);
  });

  it("includes the analysis type", () => {
    const a = computeCacheKey(root, "relationships", DEFAULT_CONFIG);
    const b = computeCacheKey(root, "concepts", DEFAULT_CONFIG);
    expect(a.slice(a.indexOf(":"))).toBe(b.slice(b.indexOf(":")));
    expect(a).not.toBe(b);
  });

  it("degrades to no_hash for a missing root", () => {
    const key = computeCacheKey(join(root, "missing"), "relationships", DEFAULT_CONFIG);
    expect(key.endsWith(`:${NO_HASH}`)).toBe(true);
    expect(isCacheable(key)).toBe(false);
  });
});

describe("analyzeContentRelationships with a cache", () => {
  let root: string;
  let reads: number;
  const countingReader: FileReader = {
    async readFile(absPath: string) {
      reads++;
      return nodeFileReader.readFile(absPath);
    },
  };

  beforeEach(() => {
    reads = 0;
    root = mkdtempSync(join(tmpdir(), "docmap-cached-"));
    writeFileSync(join(root, "README.md"), "See [Setup](setup.md).\n");
    writeFileSync(join(root, "setup.md"), "# Setup\n");
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("performs no reads on a clean second call", async () => {
    const cache = new ContentCache();
    const first = await analyzeContentRelationships(root, { cache, reader: countingReader });
    expect(reads).toBe(2);
    const second = await analyzeContentRelationships(root, { cache, reader: countingReader });
    expect(reads).toBe(2);
    expect(second).toEqual(first);
    expect(cache.stats()).toEqual({ entries: 1, hits: 1, misses: 1 });
  });

  it("recomputes after a file's mtime changes", async () => {
    const cache = new ContentCache();
    await analyzeContentRelationships(root, { cache, reader: countingReader });
    const past = new Date("2020-01-01T00:00:00Z");
    utimesSync(join(root, "setup.md"), past, past);
    await analyzeContentRelationships(root, { cache, reader: countingReader });
    expect(reads).toBe(4);
    expect(cache.stats().entries).toBe(2);
  });

  it("bypasses the cache for a missing root", async () => {
    const cache = new ContentCache();
    const warnings: Warning[] = [];
    const result = await analyzeContentRelationships(join(root, "missing"), { cache, warnings });
    expect(result.file_dependencies).toEqual({});
    expect(cache.stats().entries).toBe(0);
    expect(warnings.some((w) => w.module === "file-discovery")).toBe(true);
  });

  it("reads every time without a cache", async () => {
    await analyzeContentRelationships(root, { reader: countingReader });
    await analyzeContentRelationships(root, { reader: countingReader });
    expect(reads).toBe(4);
  });
});
