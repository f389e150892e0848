// src/relationship-engine.ts — Cross-document relationship report
// Works over the whole { relative path → content } map at once: file dependency
// edges, the concept graph, per-file outline/importance, cross-references and
// prerequisite chains. Every file is parsed once; its outline and concepts are reused.

import { posix } from "node:path";
import type {
  Concept,
  ConceptRelations,
  CrossReference,
  DocumentOutline,
  FileHierarchy,
  MarkdownLink,
  RelationshipReport,
  Warning,
} from "./types.js";
import { canonicalName } from "./entities.js";
import { extractConcepts, extractPrerequisites } from "./concept-extractor.js";
import {
  classify,
  DEPENDENCY_PHRASES,
  FILENAME_IMPORTANCE,
  isConceptHeading,
  isSetupHeading,
} from "./heuristics.js";
import {
  containsWord,
  escapeRegExp,
  findLinks,
  findTextualReferences,
  parseOutline,
} from "./markdown-outline.js";
import { throwIfAborted } from "./abort.js";

/** Shortest file stem or concept name a prerequisite may resolve to. */
export const MIN_CHAIN_MATCH_LENGTH = 3;

const CONTEXT_RADIUS = 50;

export interface RelationshipOptions {
  warnings?: Warning[];
  signal?: AbortSignal;
}

interface ParsedDocument {
  path: string;
  content: string;
  lower: string;
  outline: DocumentOutline;
  concepts: Concept[];
}

export function buildRelationshipReport(
  contentMap: ReadonlyMap<string, string>,
  options: RelationshipOptions = {},
): RelationshipReport {
  const warnings = options.warnings ?? [];
  const docs: ParsedDocument[] = [];
  for (const [path, content] of contentMap) {
    throwIfAborted(options.signal);
    const outline = parseOutline(content);
    docs.push({
      path,
      content,
      lower: content.toLowerCase(),
      outline,
      concepts: extractConcepts(outline, path, warnings),
    });
  }

  throwIfAborted(options.signal);
  return {
    file_dependencies: identifyFileDependencies(docs),
    concept_relationships: identifyConceptRelationships(docs),
    content_hierarchy: buildContentHierarchy(docs),
    cross_references: findCrossReferences(docs),
    prerequisite_chains: buildPrerequisiteChains(docs),
  };
}

// ─── File dependencies ──────────────────────────────────────────────────────

function identifyFileDependencies(docs: ParsedDocument[]): Record<string, string[]> {
  const known = new Set(docs.map((d) => d.path));
  const result: Record<string, string[]> = {};

  for (const doc of docs) {
    const deps = new Set<string>();

    for (const other of docs) {
      if (other.path === doc.path) continue;
      if (doc.lower.includes(posix.basename(other.path).toLowerCase()) || doc.content.includes(other.path)) {
        deps.add(other.path);
      }
    }

    for (const link of findLinks(doc.outline)) {
      const target = resolveLinkTarget(doc.path, link.target);
      if (target && target !== doc.path && known.has(target)) deps.add(target);
    }

    result[doc.path] = [...deps].sort();
  }

  return result;
}

/**
 * Resolve a link target to a root-relative path. External URLs, pure anchors
 * and targets escaping the root resolve to undefined.
 */
export function resolveLinkTarget(fromFile: string, target: string): string | undefined {
  const bare = target.split(/[#?]/)[0].trim();
  if (!bare || /^[a-z][a-z0-9+.-]*:/i.test(bare)) return undefined;
  const joined = bare.startsWith("/")
    ? posix.normalize(bare.slice(1))
    : posix.normalize(posix.join(posix.dirname(fromFile), bare));
  if (joined === ".." || joined.startsWith("../")) return undefined;
  return joined;
}

// ─── Concept relationships ──────────────────────────────────────────────────

interface ConceptGroup {
  key: string;
  name: string;
  lowerName: string;
  files: string[];
}

function identifyConceptRelationships(docs: ParsedDocument[]): Record<string, ConceptRelations> {
  const groups = new Map<string, ConceptGroup>();
  for (const doc of docs) {
    for (const concept of doc.concepts) {
      const key = canonicalName(concept.name);
      const group = groups.get(key);
      if (group) {
        if (!group.files.includes(doc.path)) group.files.push(doc.path);
      } else {
        groups.set(key, { key, name: concept.name, lowerName: concept.name.toLowerCase(), files: [doc.path] });
      }
    }
  }

  const byPath = new Map(docs.map((d) => [d.path, d]));
  const result: Record<string, ConceptRelations> = {};

  for (const group of groups.values()) {
    const relations: ConceptRelations = {
      mentions_in_other_files: [],
      related_concepts: [],
      prerequisite_for: [],
      depends_on: [],
    };

    for (const doc of docs) {
      if (group.files.includes(doc.path)) continue;
      if (doc.lower.includes(group.lowerName)) relations.mentions_in_other_files.push(doc.path);
    }

    for (const file of group.files) {
      const doc = byPath.get(file);
      if (!doc) continue;

      for (const other of groups.values()) {
        if (other.key === group.key) continue;
        if (doc.lower.includes(other.lowerName) && !relations.related_concepts.includes(other.name)) {
          relations.related_concepts.push(other.name);
        }
      }

      for (const phrase of DEPENDENCY_PHRASES) {
        if (!doc.lower.includes(phrase)) continue;
        const pattern = new RegExp(`\\b${escapeRegExp(phrase)}\\s+([^.!?\\n]+)`, "gi");
        for (const m of doc.content.matchAll(pattern)) {
          const clause = m[1].toLowerCase();
          for (const other of groups.values()) {
            if (other.key === group.key) continue;
            if (clause.includes(other.lowerName) && !relations.depends_on.includes(other.name)) {
              relations.depends_on.push(other.name);
            }
          }
        }
      }
    }

    result[group.name] = relations;
  }

  for (const [name, relations] of Object.entries(result)) {
    for (const dependency of relations.depends_on) {
      const target = result[dependency];
      if (target && !target.prerequisite_for.includes(name)) target.prerequisite_for.push(name);
    }
  }

  return result;
}

// ─── Content hierarchy ──────────────────────────────────────────────────────

function buildContentHierarchy(docs: ParsedDocument[]): Record<string, FileHierarchy> {
  const result: Record<string, FileHierarchy> = {};
  for (const doc of docs) {
    result[doc.path] = {
      headings: doc.outline.headings.map((h) => ({
        level: h.level,
        title: h.text,
        is_concept: isConceptHeading(h.text),
        is_setup: isSetupHeading(h.text),
      })),
      importance: fileImportance(doc.path, doc.outline),
      word_count: doc.content.split(/\s+/).filter(Boolean).length,
      has_code_examples: doc.outline.fences.length > 0,
    };
  }
  return result;
}

/**
 * 1 + filename bonus (readme 5, getting-started 4, setup/install/guide 3,
 * api/reference/docs 2) + size, code block and heading bonuses, capped at 10.
 */
export function fileImportance(filePath: string, outline: DocumentOutline): number {
  let importance = 1 + classify(FILENAME_IMPORTANCE, posix.basename(filePath).toLowerCase(), 0);

  const length = outline.content.length;
  if (length > 2000) importance += 2;
  else if (length > 1000) importance += 1;

  const blocks = outline.fences.length;
  if (blocks > 3) importance += 2;
  else if (blocks > 0) importance += 1;

  if (outline.headings.length > 5) importance += 1;

  return Math.min(importance, 10);
}

// ─── Cross-references ───────────────────────────────────────────────────────

function findCrossReferences(docs: ParsedDocument[]): Record<string, CrossReference[]> {
  const result: Record<string, CrossReference[]> = {};
  for (const doc of docs) {
    const refs: CrossReference[] = findLinks(doc.outline).map((link) => ({
      type: "link",
      text: link.text,
      target: link.target,
      context: linkContext(doc.content, link),
    }));
    for (const ref of findTextualReferences(doc.outline)) {
      refs.push({
        type: "textual_reference",
        text: ref.token,
        target: ref.token,
        context: sentenceAround(doc.content, ref.index, ref.token.length),
      });
    }
    result[doc.path] = refs;
  }
  return result;
}

/** Up to 50 characters either side of the link, whitespace collapsed. */
export function linkContext(content: string, link: MarkdownLink): string {
  const start = Math.max(0, link.index - CONTEXT_RADIUS);
  const end = Math.min(content.length, link.index + link.length + CONTEXT_RADIUS);
  return content.slice(start, end).trim().replace(/\s+/g, " ");
}

/** The sentence (delimited by . ! ?) containing the span at `index`. */
export function sentenceAround(content: string, index: number, length: number): string {
  let start = index;
  while (start > 0 && !".!?".includes(content[start - 1])) start--;
  let end = index + length;
  while (end < content.length && !".!?".includes(content[end])) end++;
  return content.slice(start, end).trim().replace(/\s+/g, " ");
}

// ─── Prerequisite chains ────────────────────────────────────────────────────

function buildPrerequisiteChains(docs: ParsedDocument[]): Record<string, string[]> {
  const stems = new Map(docs.map((d) => [d.path, humanizeStem(d.path)]));
  const result: Record<string, string[]> = {};

  for (const doc of docs) {
    const chain: string[] = [];
    const add = (entry: string) => {
      if (!chain.includes(entry)) chain.push(entry);
    };

    for (const prereq of extractPrerequisites(doc.content)) {
      for (const other of docs) {
        if (other.path === doc.path) continue;
        const stem = stems.get(other.path) ?? "";
        if (stem.length >= MIN_CHAIN_MATCH_LENGTH && containsWord(prereq, stem)) {
          add(other.path);
          break;
        }
      }

      for (const other of docs) {
        if (other.path === doc.path) continue;
        const concept = other.concepts.find(
          (c) => c.name.length >= MIN_CHAIN_MATCH_LENGTH && containsWord(prereq, c.name),
        );
        if (concept) add(`concept:${concept.name}`);
      }
    }

    result[doc.path] = chain;
  }

  return result;
}

/** "docs/getting_started.md" → "getting started" */
export function humanizeStem(filePath: string): string {
  const base = posix.basename(filePath);
  const stem = base.slice(0, base.length - posix.extname(base).length);
  return stem.replace(/[_-]/g, " ").toLowerCase();
}
