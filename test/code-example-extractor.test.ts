import { describe, it, expect } from "vitest";
import {
  DEFAULT_DESCRIPTION,
  DEFAULT_TITLE,
  extractCodeExamples,
} from "../src/code-example-extractor.js";

describe("extractCodeExamples", () => {
  const doc = [
    "# Usage",
    "",
    "```python",
    "import os",
    "```",
    "",
    "Short intro line:",
    "",
    "```",
    "const x = 1;",
    "```",
    "",
    "```js",
    "   ",
    "```",
    "",
  ].join("\n");

  it("creates one example per non-empty fence", () => {
    const examples = extractCodeExamples(doc, "docs/usage.md");
    expect(examples).toEqual([
      {
        title: "Usage",
        code: "import os",
        language: "python",
        description: DEFAULT_DESCRIPTION,
        file_path: "docs/usage.md",
      },
      {
        title: "Short intro line:",
        code: "const x = 1;",
        language: "javascript",
        description: "Short intro line:",
        file_path: "docs/usage.md",
      },
    ]);
  });

  it("falls back to defaults without context", () => {
    const [example] = extractCodeExamples("```\necho hi\n```\n");
    expect(example.title).toBe(DEFAULT_TITLE);
    expect(example.description).toBe(DEFAULT_DESCRIPTION);
    expect(example.language).toBe("bash");
    expect(example.file_path).toBe("<inline>");
  });

  it("does not take context from an earlier fence", () => {
    const examples = extractCodeExamples("```sql\nSELECT 1\n```\n```\nls -la\n```\n", "a.md");
    expect(examples.map((e) => [e.title, e.language])).toEqual([
      [DEFAULT_TITLE, "sql"],
      [DEFAULT_TITLE, "bash"],
    ]);
  });

  it("labels unrecognised code as text", () => {
    const [example] = extractCodeExamples("```\nhello world\n```\n");
    expect(example.language).toBe("text");
  });
});
