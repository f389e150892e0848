// src/dependency-analyzer.ts — Dependencies declared in manifest files at the repository root
// requirements.txt, setup.py, package.json, Gemfile, go.mod and composer.json.

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import type { Dependency, DependencyType, Warning } from "./types.js";
import { ValidationError } from "./types.js";
import { createDependency, type DependencyInput } from "./entities.js";

const MODULE = "dependency-analyzer";

type ManifestParser = (content: string, fileName: string, warnings: Warning[]) => Dependency[];

const MANIFESTS: readonly (readonly [fileName: string, parse: ManifestParser])[] = [
  ["requirements.txt", parseRequirementsTxt],
  ["setup.py", parseSetupPy],
  ["package.json", parsePackageJson],
  ["Gemfile", parseGemfile],
  ["go.mod", parseGoMod],
  ["composer.json", parseComposerJson],
];

/**
 * Collect dependencies from every known manifest present at `repoDir`.
 * Unparseable manifests and invalid entries become warnings.
 */
export function analyzeManifestDependencies(
  repoDir: string,
  warnings: Warning[] = [],
): Dependency[] {
  const result: Dependency[] = [];
  for (const [fileName, parse] of MANIFESTS) {
    const path = join(repoDir, fileName);
    if (!existsSync(path)) continue;
    try {
      result.push(...parse(readFileSync(path, "utf-8"), fileName, warnings));
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({
        level: "warn",
        module: MODULE,
        message: `Failed to parse ${fileName}: ${msg}`,
        file: path,
      });
    }
  }
  return result;
}

// ─── Python ─────────────────────────────────────────────────────────────────

const PY_REQUIREMENT = /^([A-Za-z0-9_.\-[\]]+)\s*((?:==|>=|<=|~=|!=|>|<)\s*[^\s,;#]+)?/;

export function parseRequirementsTxt(content: string, fileName: string, warnings: Warning[]): Dependency[] {
  const deps: Dependency[] = [];
  for (const raw of content.split("\n")) {
    const line = raw.trim();
    if (!line || line.startsWith("#") || line.startsWith("-")) continue;
    pushRequirement(line, fileName, "Python", deps, warnings);
  }
  return deps;
}

export function parseSetupPy(content: string, fileName: string, warnings: Warning[]): Dependency[] {
  const deps: Dependency[] = [];
  const block = content.match(/install_requires\s*=\s*\[([\s\S]*?)\]/);
  if (!block) return deps;
  for (const m of block[1].matchAll(/["']([^"']+)["']/g)) {
    pushRequirement(m[1].trim(), fileName, "Python", deps, warnings);
  }
  return deps;
}

function pushRequirement(
  spec: string,
  fileName: string,
  ecosystem: string,
  deps: Dependency[],
  warnings: Warning[],
): void {
  const m = spec.match(PY_REQUIREMENT);
  if (!m) return;
  const name = m[1].replace(/\[.*\]$/, "");
  const version = m[2] ? m[2].replace(/\s+/g, "") : null;
  pushValidated(deps, warnings, fileName, { name, version, type: "runtime", description: `${ecosystem} dependency from ${fileName}` });
}

// ─── JavaScript ─────────────────────────────────────────────────────────────

const PACKAGE_JSON_SECTIONS: readonly (readonly [section: string, type: DependencyType])[] = [
  ["dependencies", "runtime"],
  ["devDependencies", "dev"],
  ["peerDependencies", "peer"],
  ["optionalDependencies", "optional"],
];

export function parsePackageJson(content: string, fileName: string, warnings: Warning[]): Dependency[] {
  return parseJsonSections(content, fileName, PACKAGE_JSON_SECTIONS, "JavaScript", warnings);
}

// ─── PHP ────────────────────────────────────────────────────────────────────

const COMPOSER_SECTIONS: readonly (readonly [section: string, type: DependencyType])[] = [
  ["require", "runtime"],
  ["require-dev", "dev"],
];

export function parseComposerJson(content: string, fileName: string, warnings: Warning[]): Dependency[] {
  return parseJsonSections(content, fileName, COMPOSER_SECTIONS, "PHP", warnings);
}

function parseJsonSections(
  content: string,
  fileName: string,
  sections: readonly (readonly [string, DependencyType])[],
  ecosystem: string,
  warnings: Warning[],
): Dependency[] {
  const parsed: unknown = JSON.parse(content);
  if (!isRecord(parsed)) return [];
  const deps: Dependency[] = [];
  for (const [section, type] of sections) {
    const entries = parsed[section];
    if (!isRecord(entries)) continue;
    for (const [name, version] of Object.entries(entries)) {
      if (typeof version !== "string") continue;
      pushValidated(deps, warnings, fileName, {
        name,
        version: normalizeVersion(version),
        type,
        description: `${ecosystem} dependency from ${fileName}`,
      });
    }
  }
  return deps;
}

// ─── Ruby ───────────────────────────────────────────────────────────────────

export function parseGemfile(content: string, fileName: string, warnings: Warning[]): Dependency[] {
  const deps: Dependency[] = [];
  for (const raw of content.split("\n")) {
    const m = raw.trim().match(/^gem\s+['"]([^'"]+)['"](?:\s*,\s*['"]([^'"]+)['"])?/);
    if (!m) continue;
    pushValidated(deps, warnings, fileName, {
      name: m[1],
      version: m[2] ? normalizeVersion(m[2]) : null,
      type: "runtime",
      description: `Ruby dependency from ${fileName}`,
    });
  }
  return deps;
}

// ─── Go ─────────────────────────────────────────────────────────────────────

export function parseGoMod(content: string, fileName: string, warnings: Warning[]): Dependency[] {
  const deps: Dependency[] = [];
  let inRequire = false;
  for (const raw of content.split("\n")) {
    let line = raw.trim();
    if (line === "require (") {
      inRequire = true;
      continue;
    }
    if (line === ")" && inRequire) {
      inRequire = false;
      continue;
    }
    if (!inRequire && !line.startsWith("require ")) continue;
    if (line.startsWith("require ")) line = line.slice("require ".length);
    const [name, version] = line.split(/\s+/);
    if (!name || !version) continue;
    pushValidated(deps, warnings, fileName, {
      name,
      version: normalizeVersion(version),
      type: "runtime",
      description: `Go dependency from ${fileName}`,
    });
  }
  return deps;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

/**
 * Fit a manifest range to the Dependency version pattern.
 * "^18.2.0" → "18.2.0", "~5.4" → "5.4", ">= 2.0" → ">=2.0", "*" → null
 */
export function normalizeVersion(range: string): string | null {
  const compact = range.trim().replace(/\s+/g, "");
  const cleaned = compact.replace(/^[\^~](?!=)/, "").replace(/^workspace:\*?/, "");
  if (!cleaned || cleaned === "*" || cleaned === "latest") return null;
  return cleaned;
}

function pushValidated(
  deps: Dependency[],
  warnings: Warning[],
  fileName: string,
  input: DependencyInput,
): void {
  try {
    deps.push(createDependency(input));
  } catch (err: unknown) {
    if (!(err instanceof ValidationError)) throw err;
    warnings.push({
      level: "info",
      module: MODULE,
      message: `Skipped ${input.name} in ${fileName}: ${err.message}`,
      file: fileName,
    });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
