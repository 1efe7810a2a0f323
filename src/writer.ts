// src/writer.ts — Writes a pass's output units to disk
// Files whose content already matches are left alone so watchers and build
// tools downstream see no spurious modifications.

import { existsSync, mkdirSync, readFileSync, readdirSync, unlinkSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import type { PassResult, Warning } from "./types.js";
import { GENERATED_FILE_EXTENSION, OUTPUT_UNIT_SUFFIX } from "./types.js";

export interface WriteSummary {
  written: string[];
  deleted: string[];
  skipped: string[];
}

export interface WriteOptions {
  /**
   * Delete generated files in outDir that this pass no longer produces,
   * including those left by earlier runs.
   */
  clean?: boolean;
}

const GENERATED_SUFFIX = `${OUTPUT_UNIT_SUFFIX}${GENERATED_FILE_EXTENSION}`;

/**
 * Write the units of a completed pass to outDir. A cancelled pass writes nothing.
 */
export function writeOutputUnits(
  result: PassResult,
  outDir: string,
  warnings: Warning[] = [],
  options: WriteOptions = {},
): WriteSummary {
  const summary: WriteSummary = { written: [], deleted: [], skipped: [] };
  if (result.cancelled) return summary;

  const absOutDir = resolve(outDir);
  mkdirSync(absOutDir, { recursive: true });

  for (const unit of result.units) {
    const filePath = join(absOutDir, unit.fileName);
    if (readIfExists(filePath) === unit.text) {
      summary.skipped.push(filePath);
      continue;
    }
    writeFileSync(filePath, unit.text);
    summary.written.push(filePath);
  }

  if (options.clean) {
    const current = new Set(result.units.map((u) => u.fileName));
    for (const fileName of readdirSync(absOutDir)) {
      if (!fileName.endsWith(GENERATED_SUFFIX) || current.has(fileName)) continue;
      const filePath = join(absOutDir, fileName);
      try {
        unlinkSync(filePath);
        summary.deleted.push(filePath);
      } catch (err: unknown) {
        const msg = err instanceof Error ? err.message : String(err);
        warnings.push({
          level: "warn",
          module: "writer",
          message: `Could not delete stale output: ${msg}`,
          file: filePath,
        });
      }
    }
  }

  return summary;
}

function readIfExists(filePath: string): string | undefined {
  return existsSync(filePath) ? readFileSync(filePath, "utf-8") : undefined;
}
