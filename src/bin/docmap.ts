#!/usr/bin/env node
// CLI entry point for docmap-engine

import { writeFileSync, mkdirSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { analyzeContentRelationships, analyzeRepository, ENGINE_VERSION } from "../index.js";
import { parseCliArgs, resolveConfig } from "../config.js";
import type { Warning } from "../types.js";

const HELP_TEXT = `
docmap-engine v${ENGINE_VERSION}

Usage:
  docmap [path]                  Analyze the Markdown documentation under path
  docmap [path] --relationships  Build the cross-document relationship report

Arguments:
  path                 Repository root (default: current directory)

Options:
  --relationships, -r  Output the relationship report instead of the repository analysis
  --output, -o         Write JSON to this file instead of stdout
  --config, -c         Path to config file (default: docmap.config.json or "docmap" in package.json)
  --manifests          Merge dependencies declared in package.json, requirements.txt, ...
  --quiet, -q          Suppress warnings
  --verbose, -v        Print progress and timing to stderr
  --help, -h           Show this help text

Examples:
  docmap ./my-project
  docmap ./my-project --relationships -o relationships.json
  docmap . --manifests --quiet
`.trim();

async function main(): Promise<number> {
  const args = await parseCliArgs(process.argv.slice(2));

  if (args.help) {
    process.stdout.write(HELP_TEXT + "\n");
    return 0;
  }

  const warnings: Warning[] = [];
  const config = resolveConfig(args, warnings);

  const result = args.relationships
    ? await analyzeContentRelationships(config.root, { config: config.analyzer, warnings })
    : await analyzeRepository(config.root, { config: config.analyzer, warnings });

  if (!args.quiet) {
    for (const w of warnings) {
      const where = w.file ? ` (${w.file})` : "";
      process.stderr.write(`[${w.level}] ${w.module}: ${w.message}${where}\n`);
    }
  }

  const json = JSON.stringify(result, null, 2);
  if (args.output) {
    const outputPath = resolve(args.output);
    writeFileSafe(outputPath, json + "\n");
    if (!args.quiet) process.stderr.write(`Written to ${outputPath}\n`);
  } else {
    process.stdout.write(json + "\n");
  }
  return 0;
}

function writeFileSafe(filePath: string, content: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`Fatal error: ${msg}\n`);
    process.exitCode = 1;
  },
);
