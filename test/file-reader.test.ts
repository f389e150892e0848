import { describe, it, expect } from "vitest";
import { READ_CONCURRENCY, readDiscoveredFiles } from "../src/file-reader.js";
import type { DiscoveredFile } from "../src/file-discovery.js";
import type { FileReader, Warning } from "../src/types.js";

function discovered(count: number): DiscoveredFile[] {
  return Array.from({ length: count }, (_, i) => ({ absPath: `/repo/f${i}.md`, rel: `f${i}.md` }));
}

describe("readDiscoveredFiles", () => {
  it("keeps at most READ_CONCURRENCY reads in flight", async () => {
    let inFlight = 0;
    let peak = 0;
    const reader: FileReader = {
      async readFile(absPath) {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((r) => setTimeout(r, 1));
        inFlight--;
        return absPath;
      },
    };
    const files = discovered(100);
    const contents = await readDiscoveredFiles(files, reader, []);
    expect(peak).toBe(READ_CONCURRENCY);
    expect(contents.size).toBe(100);
    expect([...contents.keys()]).toEqual(files.map((f) => f.rel));
  });

  it("keeps empty files and drops failed reads with a warning", async () => {
    const reader: FileReader = {
      async readFile(absPath) {
        if (absPath.endsWith("f1.md")) throw new Error("denied");
        return "";
      },
    };
    const warnings: Warning[] = [];
    const contents = await readDiscoveredFiles(discovered(3), reader, warnings);
    expect([...contents.entries()]).toEqual([
      ["f0.md", ""],
      ["f2.md", ""],
    ]);
    expect(warnings).toEqual([
      { level: "warn", module: "file-reader", message: "Could not read file: denied", file: "f1.md" },
    ]);
  });
});
