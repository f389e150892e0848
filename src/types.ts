// src/types.ts — Shared types for the documentation analysis engine
// Wire-facing records keep snake_case field names: downstream generators read them as-is.

// ─── Warnings (passed to every module that can degrade) ─────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Configuration ──────────────────────────────────────────────────────────

export interface AnalyzerConfig {
  readonly skipDirs: readonly string[];
  readonly markdownExtensions: readonly string[];
  /** picomatch globs, matched against root-relative POSIX paths */
  readonly exclude: readonly string[];
  /** Merge dependencies declared in manifests (package.json, requirements.txt, ...) */
  readonly manifestDependencies: boolean;
  readonly verbose: boolean;
}

export const DEFAULT_SKIP_DIRS = [
  ".git",
  ".kiro",
  "__pycache__",
  "node_modules",
  ".pytest_cache",
  ".venv",
  "dist",
  "build",
  ".cache",
] as const;

export const MARKDOWN_EXTENSIONS = [".md", ".markdown", ".mdown", ".mkd"] as const;

export const DEFAULT_CONFIG: AnalyzerConfig = {
  skipDirs: DEFAULT_SKIP_DIRS,
  markdownExtensions: MARKDOWN_EXTENSIONS,
  exclude: [],
  manifestDependencies: false,
  verbose: false,
};

// ─── Entities ───────────────────────────────────────────────────────────────

export interface Concept {
  readonly name: string;
  readonly description: string;
  /** 1–10 */
  readonly importance: number;
  readonly related_files: readonly string[];
  readonly prerequisites: readonly string[];
}

export interface SetupStep {
  readonly title: string;
  readonly description: string;
  readonly commands: readonly string[];
  readonly prerequisites: readonly string[];
  readonly order: number;
}

export interface CodeExample {
  readonly title: string;
  readonly code: string;
  readonly language: string;
  readonly description: string;
  readonly file_path: string;
}

export type DependencyType = "runtime" | "dev" | "optional" | "peer" | "build";

export const DEPENDENCY_TYPES: readonly DependencyType[] = [
  "runtime",
  "dev",
  "optional",
  "peer",
  "build",
];

export interface Dependency {
  readonly name: string;
  readonly version: string | null;
  readonly type: DependencyType;
  readonly description: string;
}

/** Directory name → subtree; the `_files` key holds the directory's own file names. */
export interface FileStructure {
  [entry: string]: FileStructure | string[];
}

export interface RepositoryAnalysis {
  concepts: Concept[];
  setup_steps: SetupStep[];
  code_examples: CodeExample[];
  file_structure: FileStructure;
  dependencies: Dependency[];
}

// ─── Document outline ───────────────────────────────────────────────────────

export interface HeadingNode {
  /** 1–6 */
  level: number;
  text: string;
  /** Offset of the `#` that opens the heading line */
  start: number;
  /** Offset just past the heading line (start of its section body) */
  bodyStart: number;
  /** Offset of the next heading at any level, or content length */
  sectionEnd: number;
}

export interface FencedBlock {
  /** Lowercased first word of the info string, or "" */
  lang: string;
  code: string;
  /** Offset of the opening fence */
  start: number;
  /** Offset just past the closing fence */
  end: number;
}

export interface MarkdownLink {
  text: string;
  target: string;
  index: number;
  length: number;
}

export interface TextualReference {
  token: string;
  index: number;
}

export interface DocumentOutline {
  content: string;
  headings: HeadingNode[];
  fences: FencedBlock[];
}

// ─── Relationship report ────────────────────────────────────────────────────

export interface ConceptRelations {
  mentions_in_other_files: string[];
  related_concepts: string[];
  prerequisite_for: string[];
  depends_on: string[];
}

export interface HierarchyHeading {
  level: number;
  title: string;
  is_concept: boolean;
  is_setup: boolean;
}

export interface FileHierarchy {
  headings: HierarchyHeading[];
  importance: number;
  word_count: number;
  has_code_examples: boolean;
}

export interface CrossReference {
  type: "link" | "textual_reference";
  text: string;
  target: string;
  context: string;
}

export interface RelationshipReport {
  file_dependencies: Record<string, string[]>;
  concept_relationships: Record<string, ConceptRelations>;
  content_hierarchy: Record<string, FileHierarchy>;
  cross_references: Record<string, CrossReference[]>;
  prerequisite_chains: Record<string, string[]>;
}

// ─── I/O seams ──────────────────────────────────────────────────────────────

/** Reads one file as UTF-8. Injected so tests can count or fake reads. */
export interface FileReader {
  readFile(absPath: string): Promise<string>;
}

// ─── Errors ─────────────────────────────────────────────────────────────────

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

export class AnalysisAbortedError extends Error {
  constructor(message = "Analysis aborted") {
    super(message);
    this.name = "AnalysisAbortedError";
  }
}

export const ENGINE_VERSION = "0.1.0";
