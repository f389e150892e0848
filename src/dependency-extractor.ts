// src/dependency-extractor.ts — Dependencies named by installer commands in prose

import type { Dependency, DocumentOutline, Warning } from "./types.js";
import { ValidationError } from "./types.js";
import { createDependency } from "./entities.js";
import { INSTALLER_PATTERNS, VERSION_COMPARATORS } from "./heuristics.js";

/**
 * Apply the installer table (pip, npm, yarn, gem, apt-get, brew) to raw text.
 * Installer flags ("-r", "-g", "--save-dev") are not packages and are skipped.
 */
export function extractDependencies(
  source: string | DocumentOutline,
  filePath: string = "",
  warnings: Warning[] = [],
): Dependency[] {
  const content = typeof source === "string" ? source : source.content;
  const dependencies: Dependency[] = [];

  for (const [pattern, type] of INSTALLER_PATTERNS) {
    for (const m of content.matchAll(pattern)) {
      const spec = cleanSpec(m[1]);
      if (!spec || spec.startsWith("-")) continue;
      const { name, version } = splitPackageSpec(spec);
      try {
        dependencies.push(
          createDependency({
            name,
            version,
            type,
            description: `Dependency found in ${filePath}`,
          }),
        );
      } catch (err: unknown) {
        if (!(err instanceof ValidationError)) throw err;
        warnings.push({
          level: "warn",
          module: "dependency-extractor",
          message: `Dropped dependency "${spec}": ${err.message}`,
          file: filePath || undefined,
        });
      }
    }
  }

  return dependencies;
}

/**
 * "requests==2.28.0" → { name: "requests", version: "==2.28.0" }.
 * The comparator stays on the version; anything after a comma is dropped.
 */
export function splitPackageSpec(spec: string): { name: string; version: string | null } {
  for (const comparator of VERSION_COMPARATORS) {
    const idx = spec.indexOf(comparator);
    if (idx === -1) continue;
    const name = trimAtComparators(spec.slice(0, idx));
    const rest = spec.slice(idx + comparator.length).split(",")[0].trim();
    return { name, version: rest ? comparator + rest : null };
  }
  return { name: spec, version: null };
}

function trimAtComparators(name: string): string {
  let result = name;
  for (const comparator of VERSION_COMPARATORS) {
    result = result.split(comparator)[0];
  }
  return result.trim();
}

/** Drop quoting and trailing punctuation picked up from surrounding prose. */
function cleanSpec(raw: string): string {
  return raw.replace(/^[`'"(]+/, "").replace(/[`'",;:).]+$/, "");
}
