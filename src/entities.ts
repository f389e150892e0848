// src/entities.ts — Validated constructors for the extracted records
// Every factory fails fast with ValidationError; nothing is coerced.

import {
  ValidationError,
  DEPENDENCY_TYPES,
  type Concept,
  type SetupStep,
  type CodeExample,
  type Dependency,
  type DependencyType,
} from "./types.js";

const VERSION_PATTERN = /^(?:==|>=|<=|~=|!=|>|<)?[\w.\-+]+$/;

export interface ConceptInput {
  name: string;
  description: string;
  importance: number;
  relatedFiles?: Iterable<string>;
  prerequisites?: Iterable<string>;
}

export function createConcept(input: ConceptInput): Concept {
  requireText(input.name, "name");
  requireText(input.description, "description");
  if (!Number.isInteger(input.importance) || input.importance < 1 || input.importance > 10) {
    throw new ValidationError(
      `importance must be an integer between 1 and 10, got ${input.importance}`,
      "importance",
    );
  }
  return {
    name: input.name,
    description: input.description,
    importance: input.importance,
    related_files: toSortedSet(input.relatedFiles ?? [], "related_files"),
    prerequisites: toSortedSet(input.prerequisites ?? [], "prerequisites"),
  };
}

export interface SetupStepInput {
  title: string;
  description: string;
  commands?: readonly string[];
  prerequisites?: readonly string[];
  order?: number;
}

export function createSetupStep(input: SetupStepInput): SetupStep {
  requireText(input.title, "title");
  requireText(input.description, "description");
  const order = input.order ?? 0;
  if (!Number.isInteger(order) || order < 0) {
    throw new ValidationError(`order must be a non-negative integer, got ${order}`, "order");
  }
  const commands = [...(input.commands ?? [])];
  for (const cmd of commands) requireText(cmd, "commands");
  return {
    title: input.title,
    description: input.description,
    commands,
    prerequisites: [...(input.prerequisites ?? [])],
    order,
  };
}

export interface CodeExampleInput {
  title: string;
  code: string;
  language: string;
  description: string;
  filePath: string;
}

export function createCodeExample(input: CodeExampleInput): CodeExample {
  requireText(input.title, "title");
  requireText(input.code, "code");
  requireText(input.language, "language");
  requireText(input.description, "description");
  requireText(input.filePath, "file_path");
  return {
    title: input.title,
    code: input.code,
    language: input.language,
    description: input.description,
    file_path: input.filePath,
  };
}

export interface DependencyInput {
  name: string;
  version?: string | null;
  type?: DependencyType;
  description?: string;
}

export function createDependency(input: DependencyInput): Dependency {
  requireText(input.name, "name");
  const type = input.type ?? "runtime";
  if (!DEPENDENCY_TYPES.includes(type)) {
    throw new ValidationError(
      `type must be one of ${DEPENDENCY_TYPES.join(", ")}, got ${type}`,
      "type",
    );
  }
  const version = input.version ?? null;
  if (version !== null && !VERSION_PATTERN.test(version)) {
    throw new ValidationError(`version format is invalid: ${version}`, "version");
  }
  return {
    name: input.name,
    version,
    type,
    description: input.description ?? "",
  };
}

// ─── Identity & merge ───────────────────────────────────────────────────────

/** Identity key shared by concepts and dependencies. */
export function canonicalName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Merge two records for the same concept into a new one: union of files and
 * prerequisites, the longer description, the higher importance.
 * The incumbent's name and description win ties.
 */
export function mergeConcepts(incumbent: Concept, incoming: Concept): Concept {
  return createConcept({
    name: incumbent.name,
    description:
      incoming.description.length > incumbent.description.length
        ? incoming.description
        : incumbent.description,
    importance: Math.max(incumbent.importance, incoming.importance),
    relatedFiles: [...incumbent.related_files, ...incoming.related_files],
    prerequisites: [...incumbent.prerequisites, ...incoming.prerequisites],
  });
}

/** Keep the incumbent unless only the incoming record knows the version. */
export function mergeDependencies(incumbent: Dependency, incoming: Dependency): Dependency {
  if (incumbent.version === null && incoming.version !== null) return incoming;
  return incumbent;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function requireText(value: string, field: string): void {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError(`${field} must be a non-empty string`, field);
  }
}

function toSortedSet(values: Iterable<string>, field: string): string[] {
  const set = new Set<string>();
  for (const v of values) {
    if (typeof v !== "string") {
      throw new ValidationError(`all ${field} must be strings`, field);
    }
    set.add(v);
  }
  return [...set].sort();
}
