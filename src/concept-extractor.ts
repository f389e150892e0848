// src/concept-extractor.ts — Concepts from explanatory headings
// A heading is concept-bearing when it names an overview/architecture/design topic;
// its section (up to the next heading of any level) supplies description and prerequisites.

import type { Concept, DocumentOutline, Warning } from "./types.js";
import { ValidationError } from "./types.js";
import { createConcept } from "./entities.js";
import { isConceptHeading, KEY_TERMS, PREREQUISITE_PATTERNS } from "./heuristics.js";
import { parseOutline, sectionText, stripInlineMarkup, truncate } from "./markdown-outline.js";

export const NO_DESCRIPTION = "No description available";

const DESCRIPTION_LIMIT = 200;
const LONG_SECTION = 500;
const MAX_PREREQUISITE_LENGTH = 100;

export function extractConcepts(
  source: string | DocumentOutline,
  filePath: string = "",
  warnings: Warning[] = [],
): Concept[] {
  const outline = typeof source === "string" ? parseOutline(source) : source;
  const concepts: Concept[] = [];

  for (const heading of outline.headings) {
    if (!isConceptHeading(heading.text)) continue;
    const section = sectionText(outline, heading);
    try {
      concepts.push(
        createConcept({
          name: heading.text,
          description: describeSection(section),
          importance: conceptImportance(heading.level, heading.text, section),
          relatedFiles: filePath ? [filePath] : [],
          prerequisites: extractPrerequisites(section),
        }),
      );
    } catch (err: unknown) {
      if (!(err instanceof ValidationError)) throw err;
      warnings.push({
        level: "warn",
        module: "concept-extractor",
        message: `Dropped concept "${heading.text}": ${err.message}`,
        file: filePath || undefined,
      });
    }
  }

  return concepts;
}

/**
 * Importance: deeper headings matter less; key terms add 2, long sections add 1.
 * Always within 1–10.
 */
export function conceptImportance(level: number, heading: string, section: string): number {
  let importance = Math.max(1, 7 - level);
  const lower = heading.toLowerCase();
  if (KEY_TERMS.some((t) => lower.includes(t))) {
    importance = Math.min(10, importance + 2);
  }
  if (section.length > LONG_SECTION) {
    importance = Math.min(10, importance + 1);
  }
  return importance;
}

/** First non-blank paragraph, markup stripped, cut to 200 characters. */
export function describeSection(section: string): string {
  const paragraphs = section
    .split(/\n[ \t\r]*\n/)
    .map((p) => p.trim())
    .filter(Boolean);
  if (paragraphs.length === 0) return NO_DESCRIPTION;
  const description = stripInlineMarkup(paragraphs[0]).trim();
  return description ? truncate(description, DESCRIPTION_LIMIT) : NO_DESCRIPTION;
}

/**
 * Prerequisite phrases ("Requirements: Node 20, git", "make sure you have ...").
 * Returned as a sorted set.
 */
export function extractPrerequisites(text: string): string[] {
  const found = new Set<string>();
  for (const pattern of PREREQUISITE_PATTERNS) {
    for (const m of text.matchAll(pattern)) {
      const phrase = m[1] ?? m[0];
      for (const part of phrase.split(/[,;]|\sand\s/)) {
        const item = part.trim().replace(/\.+$/, "");
        if (item && item.length < MAX_PREREQUISITE_LENGTH) found.add(item);
      }
    }
  }
  return [...found].sort();
}
