// src/deduplicator.ts — Cross-file merge of concepts and dependencies, setup step ordering

import type { Concept, Dependency, SetupStep } from "./types.js";
import { canonicalName, mergeConcepts, mergeDependencies } from "./entities.js";
import { stepPriority } from "./heuristics.js";

/**
 * Collapse concepts sharing a canonical name, then sort by importance
 * (highest first; ties keep first-seen order).
 */
export function dedupeConcepts(concepts: readonly Concept[]): Concept[] {
  const unique = new Map<string, Concept>();
  for (const concept of concepts) {
    const key = canonicalName(concept.name);
    const existing = unique.get(key);
    unique.set(key, existing ? mergeConcepts(existing, concept) : concept);
  }
  return [...unique.values()].sort((a, b) => b.importance - a.importance);
}

export function dedupeDependencies(dependencies: readonly Dependency[]): Dependency[] {
  const unique = new Map<string, Dependency>();
  for (const dep of dependencies) {
    const key = canonicalName(dep.name);
    const existing = unique.get(key);
    unique.set(key, existing ? mergeDependencies(existing, dep) : dep);
  }
  return [...unique.values()];
}

/**
 * Stable sort by (order, keyword priority). Priority comes from the first
 * keyword of install → download → setup → configure → run → test in the title.
 */
export function orderSetupSteps(steps: readonly SetupStep[]): SetupStep[] {
  return [...steps].sort(
    (a, b) => a.order - b.order || stepPriority(a.title) - stepPriority(b.title),
  );
}
