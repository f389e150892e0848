import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { analyzeContentRelationships, analyzeRepository } from "../src/index.js";
import { AnalysisAbortedError, type Warning } from "../src/types.js";

let root: string;

function write(rel: string, content: string | Buffer): void {
  const abs = join(root, rel);
  mkdirSync(join(abs, ".."), { recursive: true });
  writeFileSync(abs, content);
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), "docmap-integration-"));
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

describe("integration: analyzeRepository()", () => {
  beforeEach(() => {
    write(
      "README.md",
      "## Overview\n\nThis project rocks.\n\n## Installation\n\n1. Run pip install -r requirements.txt\n",
    );
    write("docs/api.md", "```python\ndef f(): pass\n```\n");
  });

  it("analyzes a two-file repository end-to-end", async () => {
    const result = await analyzeRepository(root);
    expect(result).toEqual({
      concepts: [
        {
          name: "Overview",
          description: "This project rocks.",
          importance: 7,
          related_files: ["README.md"],
          prerequisites: [],
        },
      ],
      setup_steps: [
        {
          title: "Run pip install -r requirements.txt",
          description: "Run pip install -r requirements.txt",
          commands: ["pip install -r requirements.txt"],
          prerequisites: [],
          order: 0,
        },
      ],
      code_examples: [
        {
          title: "Code Example",
          code: "def f(): pass",
          language: "python",
          description: "Code example from documentation",
          file_path: "docs/api.md",
        },
      ],
      file_structure: {
        _files: ["README.md"],
        docs: { _files: ["api.md"] },
      },
      dependencies: [],
    });
  });

  it("is idempotent on an unchanged tree", async () => {
    const first = JSON.stringify(await analyzeRepository(root));
    const second = JSON.stringify(await analyzeRepository(root));
    expect(second).toBe(first);
  });
});

describe("integration: setup step order", () => {
  it("numbers steps across files in discovery order", async () => {
    write("a.md", "## Setup\n- Run the tests\n- Install tools\n");
    write("b.md", "## Install\n- Configure it\n");
    const result = await analyzeRepository(root);
    expect(result.setup_steps.map((s) => [s.title, s.order])).toEqual([
      ["Run the tests", 0],
      ["Install tools", 1],
      ["Configure it", 2],
    ]);
  });
});

describe("integration: manifest dependencies", () => {
  beforeEach(() => {
    write("README.md", "Install with pip install requests==2.28.0\n");
    write("requirements.txt", "requests\nflask>=2.0\n");
  });

  it("ignores manifests by default", async () => {
    const result = await analyzeRepository(root);
    expect(result.dependencies.map((d) => [d.name, d.version])).toEqual([["requests", "==2.28.0"]]);
  });

  it("merges manifests behind Markdown-derived records when enabled", async () => {
    const result = await analyzeRepository(root, { config: { manifestDependencies: true } });
    expect(result.dependencies).toEqual([
      {
        name: "requests",
        version: "==2.28.0",
        type: "runtime",
        description: "Dependency found in README.md",
      },
      {
        name: "flask",
        version: ">=2.0",
        type: "runtime",
        description: "Python dependency from requirements.txt",
      },
    ]);
  });
});

describe("integration: degraded input", () => {
  it("returns an empty analysis with a warning for a missing root", async () => {
    const warnings: Warning[] = [];
    const result = await analyzeRepository(join(root, "missing"), { warnings });
    expect(result).toEqual({
      concepts: [],
      setup_steps: [],
      code_examples: [],
      file_structure: {},
      dependencies: [],
    });
    expect(warnings.map((w) => [w.level, w.module])).toEqual([["warn", "file-discovery"]]);
  });

  it("treats a path below a regular file as a missing root", async () => {
    write("file.txt", "plain");
    const badRoot = join(root, "file.txt", "sub");
    const warnings: Warning[] = [];
    const result = await analyzeRepository(badRoot, { warnings });
    expect(result.concepts).toEqual([]);
    expect(result.file_structure).toEqual({});
    expect(warnings.map((w) => [w.level, w.module])).toEqual([["warn", "file-discovery"]]);

    const report = await analyzeContentRelationships(badRoot);
    expect(report.file_dependencies).toEqual({});
    expect(report.content_hierarchy).toEqual({});
  });

  it("skips files that are not valid UTF-8", async () => {
    write("good.md", "## Overview\n\nFine.\n");
    write("bad.md", Buffer.from([0x23, 0x20, 0xff, 0xfe, 0x0a]));
    const warnings: Warning[] = [];
    const result = await analyzeRepository(root, { warnings });
    expect(result.concepts.map((c) => c.name)).toEqual(["Overview"]);
    expect(warnings.map((w) => [w.module, w.file])).toEqual([["file-reader", "bad.md"]]);
  });

  it("uses an injected reader", async () => {
    write("a.md", "placeholder");
    const result = await analyzeRepository(root, {
      reader: { readFile: async () => "## Architecture\n\nInjected.\n" },
    });
    expect(result.concepts.map((c) => c.description)).toEqual(["Injected."]);
  });

  it("stops when aborted", async () => {
    write("a.md", "# A\n");
    const controller = new AbortController();
    controller.abort();
    await expect(analyzeRepository(root, { signal: controller.signal })).rejects.toBeInstanceOf(
      AnalysisAbortedError,
    );
  });
});

describe("integration: analyzeContentRelationships()", () => {
  it("reports a link between README.md and setup.md", async () => {
    write("README.md", "Start here. Then follow [Setup](setup.md).\n");
    write("setup.md", "# Setup\n\nInstall things.\n");
    const report = await analyzeContentRelationships(root);
    expect(report.file_dependencies["README.md"]).toEqual(["setup.md"]);
    expect(Object.keys(report.content_hierarchy)).toEqual(["README.md", "setup.md"]);
    expect(report.cross_references["README.md"].map((r) => r.target)).toEqual(["setup.md"]);
  });
});
