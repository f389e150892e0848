// src/config.ts — Config Resolver
// defaults ← config file (docmap.config.json, "docmap" key in package.json, or --config) ← CLI args

import { existsSync, readFileSync } from "node:fs";
import { resolve, join } from "node:path";
import type { AnalyzerConfig, Warning } from "./types.js";
import { DEFAULT_CONFIG } from "./types.js";

export interface ParsedArgs {
  /** Repository root; first positional argument (default: current directory) */
  path?: string;
  relationships: boolean;
  output?: string;
  config?: string;
  quiet: boolean;
  verbose: boolean;
  manifests: boolean;
  help: boolean;
}

export interface ResolvedConfig {
  root: string;
  analyzer: AnalyzerConfig;
}

type ConfigFile = Partial<Pick<AnalyzerConfig, "skipDirs" | "markdownExtensions" | "exclude" | "manifestDependencies">>;

const CONFIG_FILE_NAME = "docmap.config.json";
const PACKAGE_JSON_KEY = "docmap";

/**
 * Resolve config from CLI args, config file, and defaults.
 */
export function resolveConfig(
  args: ParsedArgs,
  warnings: Warning[] = [],
  cwd: string = process.cwd(),
): ResolvedConfig {
  const fileConfig = loadConfigFile(args.config, cwd, warnings) ?? {};

  return {
    root: resolve(cwd, args.path ?? "."),
    analyzer: {
      ...DEFAULT_CONFIG,
      ...fileConfig,
      manifestDependencies:
        args.manifests || (fileConfig.manifestDependencies ?? DEFAULT_CONFIG.manifestDependencies),
      verbose: args.verbose,
    },
  };
}

function loadConfigFile(
  configPath: string | undefined,
  cwd: string,
  warnings: Warning[],
): ConfigFile | null {
  if (configPath) {
    const absPath = resolve(cwd, configPath);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file not found: ${configPath}`,
      });
      return null;
    }
    return parseConfigFile(absPath, warnings, (parsed) => parsed);
  }

  const jsonConfig = join(cwd, CONFIG_FILE_NAME);
  if (existsSync(jsonConfig)) {
    return parseConfigFile(jsonConfig, warnings, (parsed) => parsed);
  }

  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    return parseConfigFile(pkgJson, warnings, (parsed) =>
      isRecord(parsed) ? parsed[PACKAGE_JSON_KEY] : undefined,
    );
  }

  return null;
}

function parseConfigFile(
  filePath: string,
  warnings: Warning[],
  select: (parsed: unknown) => unknown,
): ConfigFile | null {
  let section: unknown;
  try {
    section = select(JSON.parse(readFileSync(filePath, "utf-8")));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${msg}`,
    });
    return null;
  }
  if (section === undefined) return null;
  return validateConfigFile(section, filePath, warnings);
}

/**
 * Keep the recognised, well-typed fields; anything else is reported and ignored.
 */
export function validateConfigFile(
  value: unknown,
  source: string,
  warnings: Warning[] = [],
): ConfigFile | null {
  if (!isRecord(value)) {
    warnings.push({
      level: "warn",
      module: "config",
      message: `Config in ${source} must be an object — using defaults`,
    });
    return null;
  }

  const config: {
    skipDirs?: string[];
    markdownExtensions?: string[];
    exclude?: string[];
    manifestDependencies?: boolean;
  } = {};

  for (const [key, raw] of Object.entries(value)) {
    switch (key) {
      case "skipDirs":
      case "markdownExtensions":
      case "exclude":
        if (isStringArray(raw)) config[key] = raw;
        else invalid(key, "an array of strings");
        break;
      case "manifestDependencies":
        if (typeof raw === "boolean") config.manifestDependencies = raw;
        else invalid(key, "a boolean");
        break;
      default:
        warnings.push({
          level: "info",
          module: "config",
          message: `Unknown config key "${key}" in ${source} — ignored`,
        });
    }
  }

  return config;

  function invalid(key: string, expected: string): void {
    warnings.push({
      level: "warn",
      module: "config",
      message: `Config key "${key}" in ${source} must be ${expected} — ignored`,
    });
  }
}

/**
 * Parse CLI args using mri.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: { r: "relationships", o: "output", c: "config", q: "quiet", v: "verbose", h: "help" },
    boolean: ["relationships", "quiet", "verbose", "manifests", "help"],
    string: ["output", "config"],
  });

  const positional = args._.map(String);
  return {
    path: positional[0],
    relationships: args.relationships === true,
    output: stringOption(args.output),
    config: stringOption(args.config),
    quiet: args.quiet === true,
    verbose: args.verbose === true,
    manifests: args.manifests === true,
    help: args.help === true,
  };
}

function stringOption(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
