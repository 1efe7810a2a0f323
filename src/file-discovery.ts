// src/file-discovery.ts — Source discovery for projects without a tsconfig
// Uses git ls-files when available (respects .gitignore), falls back to a
// filesystem walk with symlink cycle detection.

import { readdirSync, statSync, realpathSync } from "node:fs";
import { resolve, relative, join, sep } from "node:path";
import { execSync } from "node:child_process";
import picomatch from "picomatch";
import {
  type Warning,
  DEFAULT_EXCLUDE_DIRS,
  SOURCE_EXTENSIONS,
  GENERATED_EXTENSION,
} from "./types.js";

export interface DiscoveryOptions {
  /** Try `git ls-files` first. Defaults to true. */
  git?: boolean;
}

/**
 * Discover the TypeScript sources under a directory, sorted, without
 * generated `.g.ts` files or user-excluded paths.
 */
export function discoverFiles(
  rootDir: string,
  excludePatterns: string[],
  warnings: Warning[] = [],
  options: DiscoveryOptions = {},
): string[] {
  const absRootDir = resolve(rootDir);

  const gitFiles = options.git === false ? null : tryGitLsFiles(absRootDir);
  if (gitFiles !== null) {
    return filterAndSort(gitFiles, absRootDir, excludePatterns);
  }

  const visited = new Set<number>(); // inode set for symlink cycle detection
  const files: string[] = [];
  walkDirectory(absRootDir, absRootDir, files, visited, warnings);
  return filterAndSort(files, absRootDir, excludePatterns);
}

function isSourceFile(name: string): boolean {
  return SOURCE_EXTENSIONS.test(name) && !GENERATED_EXTENSION.test(name);
}

function isExcludedDir(name: string): boolean {
  return (DEFAULT_EXCLUDE_DIRS as readonly string[]).includes(name);
}

/**
 * Returns null if git is not available or rootDir is not in a git repo.
 */
function tryGitLsFiles(rootDir: string): string[] | null {
  try {
    const output = execSync("git ls-files --cached --others --exclude-standard", {
      cwd: rootDir,
      encoding: "utf-8",
      timeout: 5000,
      stdio: ["pipe", "pipe", "pipe"],
    });

    const files: string[] = [];
    for (const line of output.split("\n")) {
      const trimmed = line.trim();
      if (!trimmed || !isSourceFile(trimmed)) continue;
      if (trimmed.split("/").some(isExcludedDir)) continue;
      files.push(resolve(rootDir, trimmed));
    }
    return files;
  } catch {
    // not a git checkout, or git missing: caller walks the filesystem instead
    return null;
  }
}

function walkDirectory(
  dir: string,
  rootDir: string,
  results: string[],
  visitedInodes: Set<number>,
  warnings: Warning[],
): void {
  let entries;
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "file-discovery",
      message: `Cannot read directory: ${msg}`,
      file: dir,
    });
    return;
  }

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (isExcludedDir(entry.name)) continue;
      walkDirectory(fullPath, rootDir, results, visitedInodes, warnings);
    } else if (entry.isSymbolicLink()) {
      followSymlink(fullPath, entry.name, rootDir, results, visitedInodes, warnings);
    } else if (entry.isFile() && isSourceFile(entry.name)) {
      results.push(fullPath);
    }
  }
}

function followSymlink(
  fullPath: string,
  name: string,
  rootDir: string,
  results: string[],
  visitedInodes: Set<number>,
  warnings: Warning[],
): void {
  try {
    const realPath = realpathSync(fullPath);
    const stat = statSync(realPath);

    if (realPath !== rootDir && !realPath.startsWith(rootDir + sep)) {
      warnings.push({
        level: "info",
        module: "file-discovery",
        message: `Symlink ${relative(rootDir, fullPath)} points outside ${rootDir}; skipped`,
        file: fullPath,
      });
      return;
    }

    if (stat.isDirectory()) {
      if (visitedInodes.has(stat.ino)) {
        warnings.push({
          level: "info",
          module: "file-discovery",
          message: `Symlink cycle detected at ${relative(rootDir, fullPath)}; skipped`,
          file: fullPath,
        });
        return;
      }
      visitedInodes.add(stat.ino);
      if (!isExcludedDir(name)) {
        walkDirectory(fullPath, rootDir, results, visitedInodes, warnings);
      }
    } else if (stat.isFile() && isSourceFile(name)) {
      results.push(fullPath);
    }
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "file-discovery",
      message: `Cannot resolve symlink: ${msg}`,
      file: fullPath,
    });
  }
}

/**
 * Predicate over absolute file names: true unless a user exclude glob
 * matches the path relative to rootDir.
 */
export function createIncludeFilter(
  rootDir: string,
  excludePatterns: string[],
): (fileName: string) => boolean {
  if (excludePatterns.length === 0) return () => true;
  const isExcluded = picomatch(excludePatterns, { dot: true });
  const absRootDir = resolve(rootDir);
  return (fileName) => !isExcluded(relative(absRootDir, fileName).split(sep).join("/"));
}

function filterAndSort(files: string[], rootDir: string, excludePatterns: string[]): string[] {
  const include = createIncludeFilter(rootDir, excludePatterns);
  return files.filter(include).sort();
}
