// src/orchestrator.ts — Stage 5: Orchestrator
// One pass: syntax candidates → semantic resolution → extraction →
// cache reconciliation → emission of added/changed records.

import ts from "typescript";
import type {
  EnumToGenerate,
  OutputUnit,
  PassChanges,
  PassResult,
  ProgramSnapshot,
  Warning,
} from "./types.js";
import {
  GENERATED_EXTENSION,
  GENERATED_FILE_EXTENSION,
  OUTPUT_UNIT_SUFFIX,
  PassCancelledError,
} from "./types.js";
import { collectCandidates } from "./candidate-filter.js";
import { resolveCandidate } from "./semantic-resolver.js";
import { extractEnum } from "./metadata-extractor.js";
import {
  DescriptionCache,
  recordKey,
  type DescriptionEntry,
  type RenderedEntry,
} from "./description-cache.js";
import { renderExtensions, importPathFor, type EmitContext } from "./emitter.js";
import { MARKER_FILE_NAME } from "./markers.js";

export type Emitter = (record: EnumToGenerate, context: EmitContext) => string;

export interface PassOptions {
  /** Directory generated files land in; import paths are relative to it. */
  outDir: string;
  verbose?: boolean;
  /** Defaults to renderExtensions. */
  emit?: Emitter;
  /** Extra filter over source file names, e.g. user exclude globs. */
  includeFile?: (fileName: string) => boolean;
}

/** Verbose logger — writes to stderr only when verbose is enabled. */
function vlog(verbose: boolean | undefined, msg: string): void {
  if (verbose) process.stderr.write(`[INFO] ${msg}\n`);
}

export function unitNameFor(record: EnumToGenerate): string {
  return `${record.outputName}${OUTPUT_UNIT_SUFFIX}`;
}

function checkCancelled(token: ts.CancellationToken | undefined, processed: number): void {
  if (token?.isCancellationRequested()) {
    throw new PassCancelledError(processed);
  }
}

/**
 * Run one pass over a program snapshot. Throws PassCancelledError when the
 * snapshot's token requests cancellation; the cache is then left untouched.
 */
export function runPass(
  snapshot: ProgramSnapshot,
  cache: DescriptionCache,
  options: PassOptions,
): PassResult {
  const startTime = performance.now();
  const warnings: Warning[] = [];
  const { program, cancellationToken } = snapshot;
  const emit = options.emit ?? renderExtensions;

  // Stage 1: syntax candidates, memoized per SourceFile
  const sourceFiles = program
    .getSourceFiles()
    .filter((sf) => isAnalyzableFile(program, sf, options));
  const candidates = new Set<ts.EnumDeclaration>();
  for (const sourceFile of sourceFiles) {
    const found = cache.candidatesFor(sourceFile, collectCandidates);
    if (found.length === 0) continue;
    reportSyntaxErrors(program, sourceFile, warnings);
    for (const node of found) candidates.add(node);
  }
  vlog(options.verbose, `Candidates: ${candidates.size} in ${sourceFiles.length} file(s)`);

  // Stages 2 + 3: resolve and extract, checking for cancellation between candidates
  const checker = program.getTypeChecker();
  const entries: DescriptionEntry[] = [];
  const keyCounts = new Map<string, number>();
  let processed = 0;
  for (const node of candidates) {
    checkCancelled(cancellationToken, processed);
    processed++;

    if (!resolveCandidate(node, checker)) continue;
    const record = extractEnum(node, checker, warnings);
    if (!record) continue;

    const sourceFile = node.getSourceFile().fileName;
    // Same-named enums in different function bodies of one file share a
    // qualified name; later ones are numbered in source order
    const baseKey = recordKey(sourceFile, record);
    const count = (keyCounts.get(baseKey) ?? 0) + 1;
    keyCounts.set(baseKey, count);
    const key = count === 1 ? baseKey : `${baseKey}~${count}`;
    entries.push({ key, sourceFile, record });
  }
  checkCancelled(cancellationToken, processed);

  // Stage 4: coalesce and compare with the previous pass
  const reconciliation = cache.reconcile(entries, warnings);

  const units: OutputUnit[] = [];
  const rendered: RenderedEntry[] = [];
  const changes: PassChanges = { added: [], changed: [], unchanged: [], removed: [] };

  for (const entry of reconciliation.entries) {
    const name = unitNameFor(entry.record);
    const text =
      entry.change === "unchanged" && entry.previousText !== undefined
        ? entry.previousText
        : emit(entry.record, { importPath: importPathFor(entry.sourceFile, options.outDir) });

    units.push({
      name,
      fileName: `${name}${GENERATED_FILE_EXTENSION}`,
      sourceFile: entry.sourceFile,
      record: entry.record,
      text,
      change: entry.change,
    });
    rendered.push({ key: entry.key, record: entry.record, unitName: name, text });
    changes[entry.change].push(name);

    // A renamed output leaves the old unit behind
    const previousName = cache.previousUnitName(entry.key);
    if (previousName !== undefined && previousName !== name) {
      changes.removed.push(previousName);
    }
  }

  for (const key of reconciliation.removed) {
    const previousName = cache.previousUnitName(key);
    if (previousName !== undefined) changes.removed.push(previousName);
  }
  // A unit may have moved to another enum (e.g. the enum moved files)
  const emitted = new Set(units.map((u) => u.name));
  changes.removed = [...new Set(changes.removed)].filter((name) => !emitted.has(name));

  cache.commit(rendered, reconciliation.entries);

  vlog(
    options.verbose,
    `Units: ${units.length} (added ${changes.added.length}, changed ${changes.changed.length}, ` +
      `unchanged ${changes.unchanged.length}, removed ${changes.removed.length})`,
  );

  return {
    units,
    changes,
    warnings,
    cancelled: false,
    timingMs: Math.round(performance.now() - startTime),
  };
}

function isAnalyzableFile(
  program: ts.Program,
  sourceFile: ts.SourceFile,
  options: PassOptions,
): boolean {
  const fileName = sourceFile.fileName;
  if (program.isSourceFileDefaultLibrary(sourceFile)) return false;
  if (program.isSourceFileFromExternalLibrary(sourceFile)) return false;
  if (fileName.endsWith(MARKER_FILE_NAME)) return false;
  if (GENERATED_EXTENSION.test(fileName)) return false;
  return options.includeFile ? options.includeFile(fileName) : true;
}

function reportSyntaxErrors(
  program: ts.Program,
  sourceFile: ts.SourceFile,
  warnings: Warning[],
): void {
  const errors = program
    .getSyntacticDiagnostics(sourceFile)
    .filter((d) => d.category === ts.DiagnosticCategory.Error);
  if (errors.length === 0) return;
  warnings.push({
    level: "warn",
    module: "orchestrator",
    code: "ENUMGEN003",
    message: `File has ${errors.length} syntax error(s); generated helpers may be incomplete.`,
    file: sourceFile.fileName,
  });
}

// ─── Pull-based generator ────────────────────────────────────────────────────

export type GeneratorOptions = PassOptions;

/**
 * Holds the description cache across passes. Each call to supply() runs one
 * pass over the given snapshot.
 */
export class EnumExtensionsGenerator {
  readonly cache = new DescriptionCache();

  constructor(private readonly options: GeneratorOptions) {}

  supply(snapshot: ProgramSnapshot): PassResult {
    const startTime = performance.now();
    try {
      return runPass(snapshot, this.cache, this.options);
    } catch (err: unknown) {
      if (!(err instanceof PassCancelledError)) throw err;
      vlog(this.options.verbose, err.message);
      return {
        units: [],
        changes: { added: [], changed: [], unchanged: [], removed: [] },
        warnings: [
          {
            level: "info",
            module: "orchestrator",
            message: `${err.message}; previous output is still current.`,
          },
        ],
        cancelled: true,
        timingMs: Math.round(performance.now() - startTime),
      };
    }
  }
}
