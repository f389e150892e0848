// src/index.ts — Library API
// Two entry points: analyzeRepository() and analyzeContentRelationships()

import type { RelationshipReport, RepositoryAnalysis } from "./types.js";
import {
  runRelationshipAnalysis,
  runRepositoryAnalysis,
  type AnalyzeOptions,
  type RelationshipAnalyzeOptions,
} from "./pipeline.js";

// Re-export all public types
export type {
  Warning,
  AnalyzerConfig,
  Concept,
  SetupStep,
  CodeExample,
  Dependency,
  DependencyType,
  FileStructure,
  RepositoryAnalysis,
  ConceptRelations,
  HierarchyHeading,
  FileHierarchy,
  CrossReference,
  RelationshipReport,
  FileReader,
  DocumentOutline,
  HeadingNode,
  FencedBlock,
} from "./types.js";
export type { AnalyzeOptions, RelationshipAnalyzeOptions } from "./pipeline.js";
export type { CacheStats, CacheStorage } from "./content-cache.js";
export type { ConceptInput, SetupStepInput, CodeExampleInput, DependencyInput } from "./entities.js";

export {
  ValidationError,
  AnalysisAbortedError,
  DEFAULT_CONFIG,
  DEFAULT_SKIP_DIRS,
  MARKDOWN_EXTENSIONS,
  ENGINE_VERSION,
} from "./types.js";
export {
  createConcept,
  createSetupStep,
  createCodeExample,
  createDependency,
  canonicalName,
  mergeConcepts,
  mergeDependencies,
} from "./entities.js";
export { parseOutline } from "./markdown-outline.js";
export { extractConcepts } from "./concept-extractor.js";
export { extractSetupSteps } from "./setup-step-extractor.js";
export { extractCodeExamples } from "./code-example-extractor.js";
export { extractDependencies } from "./dependency-extractor.js";
export { extractCommands } from "./command-extractor.js";
export { dedupeConcepts, dedupeDependencies, orderSetupSteps } from "./deduplicator.js";
export { discoverMarkdownFiles, buildFileStructure } from "./file-discovery.js";
export { buildRelationshipReport } from "./relationship-engine.js";
export { analyzeManifestDependencies } from "./dependency-analyzer.js";
export { ContentCache, computeCacheKey, NO_HASH } from "./content-cache.js";

/**
 * Analyze every Markdown file under `path` into concepts, setup steps, code
 * examples, dependencies and the file structure tree.
 * A missing root yields an empty analysis plus a warning; it never throws.
 */
export async function analyzeRepository(
  path: string,
  options: AnalyzeOptions = {},
): Promise<RepositoryAnalysis> {
  return runRepositoryAnalysis(path, options);
}

/**
 * Cross-document relationship report for `path`. Pass a ContentCache to skip
 * re-reading an unchanged tree on later calls.
 */
export async function analyzeContentRelationships(
  path: string,
  options: RelationshipAnalyzeOptions = {},
): Promise<RelationshipReport> {
  return runRelationshipAnalysis(path, options);
}
