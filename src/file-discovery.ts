// src/file-discovery.ts — Repository walk, Markdown discovery, file structure tree
// Skips configured directories, applies picomatch excludes, and follows symlinks
// only within the root with inode-based cycle detection.

import { readdirSync, realpathSync, statSync, type Dirent } from "node:fs";
import { extname, join, relative, resolve, sep, isAbsolute } from "node:path";
import picomatch from "picomatch";
import type { AnalyzerConfig, FileStructure, Warning } from "./types.js";

const MODULE = "file-discovery";

export interface WalkVisitor {
  /** Called for every regular file; `rel` is the root-relative POSIX path. */
  file(absPath: string, rel: string): void;
  /** Called for every directory entered below the root. */
  directory?(rel: string): void;
}

/**
 * Walk `root`, skipping `config.skipDirs` and files matching `config.exclude`.
 * Entries are visited in sorted order so every walk of an unchanged tree is identical.
 * Returns false (with a warning) when the root does not exist.
 */
export function walkRepository(
  root: string,
  config: Pick<AnalyzerConfig, "skipDirs" | "exclude">,
  visitor: WalkVisitor,
  warnings: Warning[] = [],
): boolean {
  const absRoot = resolve(root);
  if (!isDirectory(absRoot)) {
    warnings.push({
      level: "warn",
      module: MODULE,
      message: `Repository path does not exist or is not a directory: ${absRoot}`,
      file: absRoot,
    });
    return false;
  }

  const realRoot = realpathSync(absRoot);
  const skip = new Set(config.skipDirs);
  const isExcluded =
    config.exclude.length > 0 ? picomatch([...config.exclude], { dot: true }) : () => false;
  const visitedInodes = new Set<number>([statSync(realRoot).ino]);

  walkDirectory(absRoot, "", {
    realRoot,
    skip,
    isExcluded,
    visitor,
    visitedInodes,
    warnings,
  });
  return true;
}

/** True when `path` is a readable directory; any stat failure counts as "no". */
export function isDirectory(path: string): boolean {
  try {
    return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && typeof err.code === "string") return false;
    throw err;
  }
}

interface WalkState {
  realRoot: string;
  skip: Set<string>;
  isExcluded: (rel: string) => boolean;
  visitor: WalkVisitor;
  visitedInodes: Set<number>;
  warnings: Warning[];
}

function walkDirectory(dir: string, relDir: string, state: WalkState): void {
  let entries: Dirent[];
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    state.warnings.push({
      level: "warn",
      module: MODULE,
      message: `Cannot read directory: ${msg}`,
      file: dir,
    });
    return;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    const rel = relDir ? `${relDir}/${entry.name}` : entry.name;

    if (entry.isDirectory()) {
      if (state.skip.has(entry.name)) continue;
      enterDirectory(fullPath, rel, state);
    } else if (entry.isSymbolicLink()) {
      followSymlink(fullPath, entry.name, rel, state);
    } else if (entry.isFile()) {
      if (!state.isExcluded(rel)) state.visitor.file(fullPath, rel);
    }
  }
}

function enterDirectory(fullPath: string, rel: string, state: WalkState): void {
  let ino: number;
  try {
    ino = statSync(fullPath).ino;
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    state.warnings.push({ level: "warn", module: MODULE, message: `Cannot stat directory: ${msg}`, file: fullPath });
    return;
  }
  if (state.visitedInodes.has(ino)) return;
  state.visitedInodes.add(ino);
  state.visitor.directory?.(rel);
  walkDirectory(fullPath, rel, state);
}

function followSymlink(fullPath: string, name: string, rel: string, state: WalkState): void {
  try {
    const realPath = realpathSync(fullPath);
    const fromRoot = relative(state.realRoot, realPath);
    if (fromRoot === ".." || fromRoot.startsWith(".." + sep) || isAbsolute(fromRoot)) {
      state.warnings.push({
        level: "info",
        module: MODULE,
        message: `Symlink ${rel} points outside the repository — skipped`,
        file: fullPath,
      });
      return;
    }

    const stat = statSync(realPath);
    if (stat.isDirectory()) {
      if (state.skip.has(name)) return;
      if (state.visitedInodes.has(stat.ino)) {
        state.warnings.push({
          level: "info",
          module: MODULE,
          message: `Symlink cycle detected at ${rel} — skipped`,
          file: fullPath,
        });
        return;
      }
      state.visitedInodes.add(stat.ino);
      state.visitor.directory?.(rel);
      walkDirectory(fullPath, rel, state);
    } else if (stat.isFile()) {
      if (!state.isExcluded(rel)) state.visitor.file(fullPath, rel);
    }
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    state.warnings.push({
      level: "warn",
      module: MODULE,
      message: `Cannot resolve symlink: ${msg}`,
      file: fullPath,
    });
  }
}

// ─── Markdown discovery ─────────────────────────────────────────────────────

export interface DiscoveredFile {
  absPath: string;
  /** Root-relative POSIX path */
  rel: string;
}

/**
 * All Markdown files under `root`, in walk order. Missing roots yield [] and a warning.
 */
export function discoverMarkdownFiles(
  root: string,
  config: Pick<AnalyzerConfig, "skipDirs" | "exclude" | "markdownExtensions">,
  warnings: Warning[] = [],
): DiscoveredFile[] {
  const extensions = new Set(config.markdownExtensions.map((e) => e.toLowerCase()));
  const files: DiscoveredFile[] = [];
  walkRepository(
    root,
    config,
    {
      file(absPath, rel) {
        if (extensions.has(extname(rel).toLowerCase())) files.push({ absPath, rel });
      },
    },
    warnings,
  );
  return files;
}

// ─── File structure ─────────────────────────────────────────────────────────

interface DirectoryNode {
  dirs: Map<string, DirectoryNode>;
  files: string[];
}

/** Own enumerable key, so names such as `__proto__` stay plain entries. */
function defineEntry(target: FileStructure, key: string, value: FileStructure | string[]): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

function toFileStructure(node: DirectoryNode): FileStructure {
  const out: FileStructure = {};
  if (node.files.length > 0) defineEntry(out, "_files", node.files);
  for (const [name, child] of node.dirs) defineEntry(out, name, toFileStructure(child));
  return out;
}

/**
 * Nested directory tree: each directory maps subdirectory names to subtrees
 * and lists its own file names (sorted) under `_files`.
 */
export function buildFileStructure(
  root: string,
  config: Pick<AnalyzerConfig, "skipDirs" | "exclude">,
  warnings: Warning[] = [],
): FileStructure {
  const tree: DirectoryNode = { dirs: new Map(), files: [] };

  const nodeFor = (relDir: string): DirectoryNode => {
    let current = tree;
    if (!relDir) return current;
    for (const part of relDir.split("/")) {
      let next = current.dirs.get(part);
      if (next === undefined) {
        next = { dirs: new Map(), files: [] };
        current.dirs.set(part, next);
      }
      current = next;
    }
    return current;
  };

  walkRepository(
    root,
    config,
    {
      directory(rel) {
        nodeFor(rel);
      },
      file(_absPath, rel) {
        const slash = rel.lastIndexOf("/");
        const node = nodeFor(slash === -1 ? "" : rel.slice(0, slash));
        node.files.push(slash === -1 ? rel : rel.slice(slash + 1));
      },
    },
    warnings,
  );

  return toFileStructure(tree);
}
