// src/file-reader.ts — Strict UTF-8 reads and the per-file read stage

import { readFile } from "node:fs/promises";
import type { FileReader, Warning } from "./types.js";
import { AnalysisAbortedError } from "./types.js";
import type { DiscoveredFile } from "./file-discovery.js";
import { throwIfAborted } from "./abort.js";

const decoder = new TextDecoder("utf-8", { fatal: true });

/** Reads from disk; undecodable bytes are an error rather than replacement characters. */
export const nodeFileReader: FileReader = {
  async readFile(absPath: string): Promise<string> {
    const bytes = await readFile(absPath);
    return decoder.decode(bytes);
  },
};

/** Upper bound on reads in flight, well under common open-file limits. */
export const READ_CONCURRENCY = 16;

/**
 * Read files with at most `READ_CONCURRENCY` in flight. Unreadable files become
 * warnings and are left out; the result keeps discovery order.
 */
export async function readDiscoveredFiles(
  files: readonly DiscoveredFile[],
  reader: FileReader,
  warnings: Warning[],
  signal?: AbortSignal,
): Promise<Map<string, string>> {
  const contents: (string | null)[] = new Array<string | null>(files.length).fill(null);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < files.length) {
      const i = next++;
      const file = files[i];
      throwIfAborted(signal);
      try {
        contents[i] = await reader.readFile(file.absPath);
      } catch (err: unknown) {
        if (err instanceof AnalysisAbortedError) throw err;
        const msg = err instanceof Error ? err.message : String(err);
        warnings.push({
          level: "warn",
          module: "file-reader",
          message: `Could not read file: ${msg}`,
          file: file.rel,
        });
      }
    }
  };

  const workerCount = Math.min(READ_CONCURRENCY, files.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  const map = new Map<string, string>();
  files.forEach((file, i) => {
    const content = contents[i];
    if (content !== null) map.set(file.rel, content);
  });
  return map;
}
