import { describe, it, expect } from "vitest";
import {
  classify,
  detectLanguage,
  FILENAME_IMPORTANCE,
  INSTALLER_PATTERNS,
  isConceptHeading,
  isSetupHeading,
  looksLikeCommand,
  STEP_MARKERS,
  stepPriority,
  type Rule,
} from "../src/heuristics.js";

describe("classify", () => {
  it("returns the first matching row, else the fallback", () => {
    const rules: Rule<string>[] = [
      [(t) => t.includes("a"), "first"],
      [(t) => t.includes("b"), "second"],
    ];
    expect(classify(rules, "ab", "none")).toBe("first");
    expect(classify(rules, "b", "none")).toBe("second");
    expect(classify(rules, "c", "none")).toBe("none");
  });
});

describe("detectLanguage", () => {
  it.each([
    ["import os\ndef main(): pass", "python"],
    ["const x = 1;", "javascript"],
    ["function f() {}", "javascript"],
    ["public class App {}", "java"],
    ["import java.util.List;", "java"],
    ["#include <stdio.h>", "c"],
    ["int main(void) { return 0; }", "c"],
    ["echo hello", "bash"],
    ["cd build", "bash"],
    ["select * from users", "sql"],
    ["hello world", "text"],
  ])("%j is %s", (code, language) => {
    expect(detectLanguage(code)).toBe(language);
  });

  it("needs both def and import for python", () => {
    expect(detectLanguage("def f(): pass")).toBe("text");
  });

  it("lets earlier rows win", () => {
    expect(detectLanguage("import java.util.List;\nconst int x = 1;")).toBe("javascript");
    expect(detectLanguage("#include <x.h>\necho done")).toBe("c");
  });
});

describe("stepPriority", () => {
  it.each([
    ["Install Node", 1],
    ["Download the archive", 2],
    ["Setup the env", 3],
    ["Configure the proxy", 4],
    ["Run the server", 5],
    ["Test it", 6],
    ["Deploy", 10],
  ])("%s has priority %i", (title, priority) => {
    expect(stepPriority(title)).toBe(priority);
  });

  it("uses the first matching keyword", () => {
    expect(stepPriority("Run the install script")).toBe(1);
  });
});

describe("STEP_MARKERS", () => {
  const stepText = (line: string): string | undefined => {
    for (const marker of STEP_MARKERS) {
      const m = marker.exec(line);
      if (m) return m[1];
    }
    return undefined;
  };

  it("accepts numbered, bulleted and Step N lines", () => {
    expect(stepText("1. Clone it")).toBe("Clone it");
    expect(stepText("* Install tools")).toBe("Install tools");
    expect(stepText("Step 2: Build")).toBe("Build");
    expect(stepText("Plain prose")).toBeUndefined();
  });
});

describe("INSTALLER_PATTERNS", () => {
  const firstRow = (text: string): [number, string | undefined] => {
    const row = INSTALLER_PATTERNS.findIndex(([pattern]) => [...text.matchAll(pattern)].length > 0);
    const match = row === -1 ? undefined : [...text.matchAll(INSTALLER_PATTERNS[row][0])][0];
    return [row, match?.[1]];
  };

  it.each([
    ["pip install requests", 0, "requests"],
    ["npm install express", 1, "express"],
    ["yarn add lodash", 2, "lodash"],
    ["gem install rails", 3, "rails"],
    ["sudo apt-get install curl", 4, "curl"],
    ["brew install wget", 5, "wget"],
  ])("%s matches row %i", (text, row, spec) => {
    expect(firstRow(text)).toEqual([row, spec]);
  });

  it("marks every installer as a runtime dependency", () => {
    expect(INSTALLER_PATTERNS.map(([, type]) => type)).toEqual([
      "runtime",
      "runtime",
      "runtime",
      "runtime",
      "runtime",
      "runtime",
    ]);
  });
});

describe("FILENAME_IMPORTANCE", () => {
  it.each([
    ["readme.md", 5],
    ["getting_started.md", 4],
    ["setup.md", 3],
    ["install.md", 3],
    ["user-guide.md", 3],
    ["api.md", 2],
    ["reference.md", 2],
    ["notes.md", 0],
  ])("%s scores %i", (name, score) => {
    expect(classify(FILENAME_IMPORTANCE, name, 0)).toBe(score);
  });

  it("prefers readme over later rows", () => {
    expect(classify(FILENAME_IMPORTANCE, "readme-setup.md", 0)).toBe(5);
  });
});

describe("heading and command keywords", () => {
  it("classifies headings case-insensitively", () => {
    expect(isConceptHeading("What is docmap?")).toBe(true);
    expect(isSetupHeading("Getting Started")).toBe(true);
    expect(isConceptHeading("Changelog")).toBe(false);
  });

  it("recognizes command indicators", () => {
    expect(looksLikeCommand("brew install jq")).toBe(true);
    expect(looksLikeCommand("open the settings page")).toBe(false);
  });
});
