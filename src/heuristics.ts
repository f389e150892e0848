// src/heuristics.ts — Keyword and pattern tables behind every classification
// Each table is an ordered list; the first matching row wins.

import type { DependencyType } from "./types.js";

export type Rule<T> = readonly [predicate: (text: string) => boolean, result: T];

/** First result whose predicate accepts `text`, else `fallback`. */
export function classify<T>(rules: readonly Rule<T>[], text: string, fallback: T): T {
  for (const [predicate, result] of rules) {
    if (predicate(text)) return result;
  }
  return fallback;
}

const includes = (needle: string) => (text: string) => text.includes(needle);

// ─── Headings ───────────────────────────────────────────────────────────────

export const CONCEPT_KEYWORDS = [
  "overview",
  "architecture",
  "design",
  "concepts",
  "introduction",
  "about",
  "what is",
] as const;

export const SETUP_KEYWORDS = [
  "install",
  "setup",
  "configuration",
  "getting started",
  "prerequisites",
  "requirements",
  "dependencies",
] as const;

/** Heading terms that earn a concept +2 importance. */
export const KEY_TERMS = ["architecture", "overview", "getting started", "introduction"] as const;

export function isConceptHeading(text: string): boolean {
  const lower = text.toLowerCase();
  return CONCEPT_KEYWORDS.some((k) => lower.includes(k));
}

export function isSetupHeading(text: string): boolean {
  const lower = text.toLowerCase();
  return SETUP_KEYWORDS.some((k) => lower.includes(k));
}

// ─── Setup step ordering ────────────────────────────────────────────────────

export const STEP_PRIORITY: readonly Rule<number>[] = [
  [includes("install"), 1],
  [includes("download"), 2],
  [includes("setup"), 3],
  [includes("configure"), 4],
  [includes("run"), 5],
  [includes("test"), 6],
];

export const DEFAULT_STEP_PRIORITY = 10;

export function stepPriority(title: string): number {
  return classify(STEP_PRIORITY, title.toLowerCase(), DEFAULT_STEP_PRIORITY);
}

/** Lines that open a new setup step; group 1 is the step text. */
export const STEP_MARKERS: readonly RegExp[] = [
  /^\d+\.\s+(.+)$/,
  /^[-*]\s+(.+)$/i,
  /^Step\s+\d+:?\s+(.+)$/i,
];

// ─── Commands ───────────────────────────────────────────────────────────────

export const COMMAND_INDICATORS = [
  "pip install",
  "npm install",
  "git clone",
  "cd ",
  "mkdir",
  "python ",
  "node ",
  "java ",
  "make",
  "cmake",
  "docker",
  "apt-get",
  "yum install",
  "brew install",
] as const;

export function looksLikeCommand(text: string): boolean {
  const lower = text.toLowerCase();
  return COMMAND_INDICATORS.some((i) => lower.includes(i));
}

/** Prose lead-ins that introduce a command; group 1 is the command. */
export const COMMAND_LEADINS: readonly RegExp[] = [
  /\b(?:run|execute|type):?\s+(.+)/gi,
  /\$\s*(.+)/g,
  />\s*(.+)/g,
];

// ─── Languages ──────────────────────────────────────────────────────────────

export const LANGUAGE_SNIFFERS: readonly Rule<string>[] = [
  [(c) => c.includes("def ") && c.includes("import "), "python"],
  [(c) => c.includes("function ") || c.includes("const ") || c.includes("let "), "javascript"],
  [(c) => c.includes("public class ") || c.includes("import java"), "java"],
  [(c) => c.includes("#include") || c.includes("int main("), "c"],
  [(c) => c.includes("echo ") || c.includes("ls ") || c.includes("cd "), "bash"],
  [(c) => c.toUpperCase().includes("SELECT ") || c.toUpperCase().includes("FROM "), "sql"],
];

export function detectLanguage(code: string): string {
  return classify(LANGUAGE_SNIFFERS, code, "text");
}

// ─── Dependencies ───────────────────────────────────────────────────────────

/** Installer invocations in prose; group 1 is the first package spec. */
export const INSTALLER_PATTERNS: readonly (readonly [pattern: RegExp, type: DependencyType])[] = [
  [/pip install[ \t]+(\S+)/gi, "runtime"],
  [/npm install[ \t]+(\S+)/gi, "runtime"],
  [/yarn add[ \t]+(\S+)/gi, "runtime"],
  [/gem install[ \t]+(\S+)/gi, "runtime"],
  [/apt-get install[ \t]+(\S+)/gi, "runtime"],
  [/brew install[ \t]+(\S+)/gi, "runtime"],
];

/** Comparators split off a package spec, in lookup order. */
export const VERSION_COMPARATORS = ["==", ">=", "<="] as const;

// ─── Prerequisites & relationships ──────────────────────────────────────────

/** Phrases that state a prerequisite; when a pattern has no group the whole match is used. */
export const PREREQUISITE_PATTERNS: readonly RegExp[] = [
  /\b(?:prerequisite|requirement|need|require)s?:?\s*(.+)/gi,
  /\bbefore\s+(?:you\s+)?(?:can\s+)?(?:start|begin|use)/gi,
  /\bmake sure\s+(?:you\s+)?(?:have|install)/gi,
];

export const DEPENDENCY_PHRASES = [
  "depends on",
  "requires",
  "needs",
  "prerequisite",
  "before",
  "after",
  "following",
] as const;

// ─── File importance ────────────────────────────────────────────────────────

export const FILENAME_IMPORTANCE: readonly Rule<number>[] = [
  [includes("readme"), 5],
  [(name) => name.includes("getting") && name.includes("started"), 4],
  [(name) => ["setup", "install", "guide"].some((k) => name.includes(k)), 3],
  [(name) => ["api", "reference", "docs"].some((k) => name.includes(k)), 2],
];
