// src/code-example-extractor.ts — One CodeExample per fenced block
// Title and description come from the nearest heading or short prose line above the fence.

import type { CodeExample, DocumentOutline, FencedBlock, Warning } from "./types.js";
import { ValidationError } from "./types.js";
import { createCodeExample } from "./entities.js";
import { detectLanguage } from "./heuristics.js";
import { clip, HEADING_LINE, isInsideFence, parseOutline } from "./markdown-outline.js";

export const DEFAULT_TITLE = "Code Example";
export const DEFAULT_DESCRIPTION = "Code example from documentation";

const MAX_CONTEXT_LINE = 100;
const TITLE_LENGTH = 50;

export function extractCodeExamples(
  source: string | DocumentOutline,
  filePath: string = "",
  warnings: Warning[] = [],
): CodeExample[] {
  const outline = typeof source === "string" ? parseOutline(source) : source;
  const examples: CodeExample[] = [];

  for (const fence of outline.fences) {
    const code = fence.code.trim();
    if (!code) continue;
    const { title, description } = codeContext(outline, fence);
    try {
      examples.push(
        createCodeExample({
          title,
          code,
          language: (fence.lang || detectLanguage(fence.code)).toLowerCase(),
          description,
          filePath: filePath || "<inline>",
        }),
      );
    } catch (err: unknown) {
      if (!(err instanceof ValidationError)) throw err;
      warnings.push({
        level: "warn",
        module: "code-example-extractor",
        message: `Dropped code example "${title}": ${err.message}`,
        file: filePath || undefined,
      });
    }
  }

  return examples;
}

/**
 * Walk backward from the fence: the first heading becomes the title; a short
 * prose line first becomes both description and (clipped) title.
 * Lines belonging to earlier fences are skipped.
 */
function codeContext(
  outline: DocumentOutline,
  fence: FencedBlock,
): { title: string; description: string } {
  const lines = outline.content.slice(0, fence.start).split("\n");
  const offsets: number[] = [];
  let offset = 0;
  for (const line of lines) {
    offsets.push(offset);
    offset += line.length + 1;
  }

  for (let i = lines.length - 1; i >= 0; i--) {
    if (isInsideFence(outline.fences, offsets[i])) continue;
    const line = lines[i].trim();
    if (!line) continue;

    const heading = line.match(HEADING_LINE);
    if (heading) return { title: heading[2].trim(), description: DEFAULT_DESCRIPTION };
    if (line.length < MAX_CONTEXT_LINE && !line.startsWith("```")) {
      return { title: clip(line, TITLE_LENGTH), description: line };
    }
  }

  return { title: DEFAULT_TITLE, description: DEFAULT_DESCRIPTION };
}
