// src/markdown-outline.ts — Markdown primitives and the per-file outline
// The outline is built once per file and shared by every extractor, so a
// heading's section and a code block's position always come from the same spans.

import type {
  DocumentOutline,
  FencedBlock,
  HeadingNode,
  MarkdownLink,
  TextualReference,
} from "./types.js";

// ─── Primitive matchers ─────────────────────────────────────────────────────

export const HEADING_LINE = /^(#{1,6})[ \t]+(.+)$/;
const HEADING_PATTERN = /^(#{1,6})[ \t]+(.+)$/gm;
const FENCE_PATTERN = /^ {0,3}(`{3,}|~{3,})([^\n]*)\n(?:([\s\S]*?)\n)?? {0,3}\1[ \t]*\r?$/gm;
const LINK_PATTERN = /\[([^\]]+)\]\(([^)]+)\)/g;
const REFERENCE_PATTERN = /\b(?:see|refer to|check|read|visit)\s+([^\s.]+)/gi;

// ─── Outline ────────────────────────────────────────────────────────────────

export function parseOutline(content: string): DocumentOutline {
  const fences = findFences(content);
  const headings: HeadingNode[] = [];

  for (const m of content.matchAll(HEADING_PATTERN)) {
    const start = m.index ?? 0;
    if (isInsideFence(fences, start)) continue;
    const text = m[2].trim();
    if (!text) continue;
    headings.push({
      level: m[1].length,
      text,
      start,
      bodyStart: Math.min(content.length, start + m[0].length + 1),
      sectionEnd: content.length,
    });
  }

  for (let i = 0; i < headings.length - 1; i++) {
    headings[i].sectionEnd = headings[i + 1].start;
  }

  return { content, headings, fences };
}

/** Text between a heading line and the next heading at any level. */
export function sectionText(outline: DocumentOutline, heading: HeadingNode): string {
  return outline.content.slice(heading.bodyStart, heading.sectionEnd);
}

function findFences(content: string): FencedBlock[] {
  const fences: FencedBlock[] = [];
  for (const m of content.matchAll(FENCE_PATTERN)) {
    const start = m.index ?? 0;
    const info = m[2].trim();
    fences.push({
      lang: info ? info.split(/\s+/)[0].toLowerCase() : "",
      code: m[3] ?? "",
      start,
      end: start + m[0].length,
    });
  }
  return fences;
}

export function isInsideFence(fences: readonly FencedBlock[], offset: number): boolean {
  return fences.some((f) => offset >= f.start && offset < f.end);
}

// ─── Links & references ─────────────────────────────────────────────────────

export function findLinks(outline: DocumentOutline): MarkdownLink[] {
  const links: MarkdownLink[] = [];
  for (const m of outline.content.matchAll(LINK_PATTERN)) {
    const index = m.index ?? 0;
    if (isInsideFence(outline.fences, index)) continue;
    links.push({ text: m[1], target: m[2].trim(), index, length: m[0].length });
  }
  return links;
}

export function findTextualReferences(outline: DocumentOutline): TextualReference[] {
  const refs: TextualReference[] = [];
  for (const m of outline.content.matchAll(REFERENCE_PATTERN)) {
    const index = m.index ?? 0;
    if (isInsideFence(outline.fences, index)) continue;
    refs.push({ token: m[1], index: index + m[0].length - m[1].length });
  }
  return refs;
}

// ─── Text helpers ───────────────────────────────────────────────────────────

/** Cut to `max` characters, replacing the tail with "..." when cut. */
export function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max - 3) + "..." : text;
}

/** Keep the first `keep` characters and append "..." when anything was dropped. */
export function clip(text: string, keep: number): string {
  return text.length > keep ? text.slice(0, keep) + "..." : text;
}

/** Strip emphasis/code markers and reduce links to their text. */
export function stripInlineMarkup(text: string): string {
  return text.replace(/[*_`]/g, "").replace(/\[([^\]]+)\]\([^)]+\)/g, "$1");
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Case-insensitive match of `needle` in `haystack` on word boundaries. */
export function containsWord(haystack: string, needle: string): boolean {
  const pattern = new RegExp(`(?<!\\w)${escapeRegExp(needle)}(?!\\w)`, "i");
  return pattern.test(haystack);
}
