// src/pipeline.ts — Pipeline orchestrator
// Repository analysis: discover → read (concurrent) → extract per file → merge.
// Relationship analysis: fingerprint → cache lookup → discover → read → relationship report.

import { resolve } from "node:path";
import type {
  AnalyzerConfig,
  FileReader,
  RelationshipReport,
  RepositoryAnalysis,
  Warning,
} from "./types.js";
import { AnalysisAbortedError, DEFAULT_CONFIG } from "./types.js";
import { buildFileStructure, discoverMarkdownFiles, isDirectory } from "./file-discovery.js";
import { nodeFileReader, readDiscoveredFiles } from "./file-reader.js";
import { parseOutline } from "./markdown-outline.js";
import { extractConcepts } from "./concept-extractor.js";
import { extractSetupSteps } from "./setup-step-extractor.js";
import { extractCodeExamples } from "./code-example-extractor.js";
import { extractDependencies } from "./dependency-extractor.js";
import { analyzeManifestDependencies } from "./dependency-analyzer.js";
import { buildRepositoryAnalysis, emptyAnalysis, type FileExtraction } from "./analysis-builder.js";
import { buildRelationshipReport } from "./relationship-engine.js";
import { computeCacheKey, isCacheable, type ContentCache } from "./content-cache.js";
import { throwIfAborted } from "./abort.js";

export interface AnalyzeOptions {
  config?: Partial<AnalyzerConfig>;
  /** Sink for diagnostics; created per call when omitted. */
  warnings?: Warning[];
  reader?: FileReader;
  signal?: AbortSignal;
}

export interface RelationshipAnalyzeOptions extends AnalyzeOptions {
  /** Memoizes reports by fingerprint; without one every call recomputes. */
  cache?: ContentCache<RelationshipReport>;
}

/** Verbose logger — writes to stderr only when verbose is enabled. */
function vlog(verbose: boolean, msg: string): void {
  if (verbose) process.stderr.write(`[INFO] ${msg}\n`);
}

export function resolveAnalyzerConfig(overrides: Partial<AnalyzerConfig> = {}): AnalyzerConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

export async function runRepositoryAnalysis(
  repoPath: string,
  options: AnalyzeOptions = {},
): Promise<RepositoryAnalysis> {
  const config = resolveAnalyzerConfig(options.config);
  const warnings = options.warnings ?? [];
  const reader = options.reader ?? nodeFileReader;
  const root = resolve(repoPath);
  const startTime = performance.now();

  // A missing root is reported by discovery itself
  const files = discoverMarkdownFiles(root, config, warnings);
  if (!isDirectory(root)) return emptyAnalysis();
  vlog(config.verbose, `Analyzing ${root}: ${files.length} Markdown files`);

  const contents = await readDiscoveredFiles(files, reader, warnings, options.signal);

  const extractions: FileExtraction[] = [];
  for (const [filePath, content] of contents) {
    throwIfAborted(options.signal);
    try {
      const outline = parseOutline(content);
      extractions.push({
        filePath,
        concepts: extractConcepts(outline, filePath, warnings),
        setupSteps: extractSetupSteps(outline, filePath, warnings),
        codeExamples: extractCodeExamples(outline, filePath, warnings),
        dependencies: extractDependencies(outline, filePath, warnings),
      });
    } catch (err: unknown) {
      if (err instanceof AnalysisAbortedError) throw err;
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({
        level: "error",
        module: "pipeline",
        message: `Error processing file: ${msg}`,
        file: filePath,
      });
    }
  }

  throwIfAborted(options.signal);
  const manifestDeps = config.manifestDependencies
    ? analyzeManifestDependencies(root, warnings)
    : [];
  const analysis = buildRepositoryAnalysis(
    extractions,
    buildFileStructure(root, config, warnings),
    manifestDeps,
  );

  vlog(config.verbose, `  Concepts: ${analysis.concepts.length}`);
  vlog(config.verbose, `  Setup steps: ${analysis.setup_steps.length}`);
  vlog(config.verbose, `  Code examples: ${analysis.code_examples.length}`);
  vlog(config.verbose, `  Dependencies: ${analysis.dependencies.length}`);
  vlog(config.verbose, `Total analysis time: ${Math.round(performance.now() - startTime)}ms`);
  return analysis;
}

export async function runRelationshipAnalysis(
  repoPath: string,
  options: RelationshipAnalyzeOptions = {},
): Promise<RelationshipReport> {
  const config = resolveAnalyzerConfig(options.config);
  const warnings = options.warnings ?? [];
  const reader = options.reader ?? nodeFileReader;
  const root = resolve(repoPath);

  const compute = async (): Promise<RelationshipReport> => {
    const startTime = performance.now();
    vlog(config.verbose, `Analyzing content relationships in ${root}`);
    const files = discoverMarkdownFiles(root, config, warnings);
    const contents = await readDiscoveredFiles(files, reader, warnings, options.signal);
    const report = buildRelationshipReport(contents, { warnings, signal: options.signal });
    vlog(config.verbose, `  Files: ${contents.size}, concepts: ${Object.keys(report.concept_relationships).length}`);
    vlog(config.verbose, `Relationship analysis time: ${Math.round(performance.now() - startTime)}ms`);
    return report;
  };

  const cache = options.cache;
  if (!cache) return compute();

  const key = computeCacheKey(root, "relationships", config, warnings);
  if (!isCacheable(key)) return compute();
  if (cache.has(key)) vlog(config.verbose, `Using cached relationship analysis for ${root}`);
  return cache.getOrCompute(key, compute);
}
