// src/content-cache.ts — Fingerprint-keyed memoization of relationship reports
// Keys embed a hash over every discovered Markdown file's path and mtime, so any
// edit, addition or removal produces a new key. Entries live until clear().

import { createHash } from "node:crypto";
import { statSync } from "node:fs";
import { resolve } from "node:path";
import type { AnalyzerConfig, RelationshipReport, Warning } from "./types.js";
import { discoverMarkdownFiles, isDirectory } from "./file-discovery.js";

export const NO_HASH = "no_hash";

/** Injectable backing store; a Map satisfies it. */
export interface CacheStorage<T> {
  get(key: string): T | undefined;
  set(key: string, value: T): unknown;
  has(key: string): boolean;
  clear(): void;
  readonly size: number;
}

export interface CacheStats {
  entries: number;
  hits: number;
  misses: number;
}

export class ContentCache<T = RelationshipReport> {
  private readonly inflight = new Map<string, Promise<T>>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly storage: CacheStorage<T> = new Map<string, T>()) {}

  /**
   * Return the stored value for `key`, or run `compute` once and store its result.
   * Concurrent callers with the same key share one computation; nothing is
   * stored until it resolves, and a rejected computation stores nothing.
   */
  async getOrCompute(key: string, compute: () => Promise<T>): Promise<T> {
    const stored = this.storage.get(key);
    if (stored !== undefined) {
      this.hits++;
      return stored;
    }

    const pending = this.inflight.get(key);
    if (pending) {
      this.hits++;
      return pending;
    }

    this.misses++;
    const promise = compute().then(
      (value) => {
        this.storage.set(key, value);
        this.inflight.delete(key);
        return value;
      },
      (err: unknown) => {
        this.inflight.delete(key);
        throw err;
      },
    );
    this.inflight.set(key, promise);
    return promise;
  }

  has(key: string): boolean {
    return this.storage.has(key);
  }

  clear(): void {
    this.storage.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): CacheStats {
    return { entries: this.storage.size, hits: this.hits, misses: this.misses };
  }
}

/**
 * `<analysisType>:<root>:<md5>` where the hash covers each Markdown file's
 * relative path and mtime in walk order. A file that cannot be stat'ed
 * contributes "0"; a missing root or any other failure yields the `no_hash`
 * key, which callers treat as uncacheable.
 */
export function computeCacheKey(
  root: string,
  analysisType: string,
  config: Pick<AnalyzerConfig, "skipDirs" | "exclude" | "markdownExtensions">,
  warnings: Warning[] = [],
): string {
  const absRoot = resolve(root);
  try {
    if (!isDirectory(absRoot)) {
      return `${analysisType}:${absRoot}:${NO_HASH}`;
    }
    const hash = createHash("md5");
    for (const file of discoverMarkdownFiles(absRoot, config, warnings)) {
      hash.update(file.rel);
      hash.update("\0");
      hash.update(mtimeOf(file.absPath));
    }
    return `${analysisType}:${absRoot}:${hash.digest("hex")}`;
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "content-cache",
      message: `Error generating cache key: ${msg}`,
      file: absRoot,
    });
    return `${analysisType}:${absRoot}:${NO_HASH}`;
  }
}

export function isCacheable(key: string): boolean {
  return !key.endsWith(`:${NO_HASH}`);
}

function mtimeOf(absPath: string): string {
  try {
    return String(statSync(absPath).mtimeMs);
  } catch {
    return "0";
  }
}
