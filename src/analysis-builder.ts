// src/analysis-builder.ts — Reduce per-file extraction results into a RepositoryAnalysis

import type {
  CodeExample,
  Concept,
  Dependency,
  FileStructure,
  RepositoryAnalysis,
  SetupStep,
} from "./types.js";
import { dedupeConcepts, dedupeDependencies, orderSetupSteps } from "./deduplicator.js";
import { withOrder } from "./setup-step-extractor.js";

/** Everything extracted from one Markdown file. */
export interface FileExtraction {
  filePath: string;
  concepts: Concept[];
  /** Orders are local to the file, starting at 0 */
  setupSteps: SetupStep[];
  codeExamples: CodeExample[];
  dependencies: Dependency[];
}

export function emptyAnalysis(): RepositoryAnalysis {
  return {
    concepts: [],
    setup_steps: [],
    code_examples: [],
    file_structure: {},
    dependencies: [],
  };
}

/**
 * Merge extractions (in discovery order) into the final analysis.
 * Step orders are re-based onto one global counter so steps from earlier
 * files come first; `extraDependencies` join the dependency dedup after the
 * Markdown-derived ones.
 */
export function buildRepositoryAnalysis(
  extractions: readonly FileExtraction[],
  fileStructure: FileStructure,
  extraDependencies: readonly Dependency[] = [],
): RepositoryAnalysis {
  const concepts: Concept[] = [];
  const steps: SetupStep[] = [];
  const examples: CodeExample[] = [];
  const dependencies: Dependency[] = [];

  for (const extraction of extractions) {
    concepts.push(...extraction.concepts);
    const offset = steps.length;
    for (const step of extraction.setupSteps) {
      steps.push(offset === 0 ? step : withOrder(step, step.order + offset));
    }
    examples.push(...extraction.codeExamples);
    dependencies.push(...extraction.dependencies);
  }
  dependencies.push(...extraDependencies);

  return {
    concepts: dedupeConcepts(concepts),
    setup_steps: orderSetupSteps(steps),
    code_examples: examples,
    file_structure: fileStructure,
    dependencies: dedupeDependencies(dependencies),
  };
}
