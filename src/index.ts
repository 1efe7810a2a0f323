// src/index.ts — Library API
// generate() runs one pass over a project and writes the helpers;
// EnumExtensionsGenerator and the stage functions are exported for hosts that
// drive passes themselves.

import type { PassResult, ResolvedConfig, Warning } from "./types.js";
import { ProjectHost } from "./project-host.js";
import { EnumExtensionsGenerator } from "./orchestrator.js";
import { discoverFiles, createIncludeFilter } from "./file-discovery.js";
import { writeOutputUnits, type WriteSummary } from "./writer.js";

export type {
  EnumToGenerate,
  EnumMember,
  EnumValue,
  UnderlyingType,
  Warning,
  DiagnosticCode,
  ProgramSnapshot,
  OutputUnit,
  ChangeKind,
  PassChanges,
  PassResult,
  ResolvedConfig,
} from "./types.js";
export {
  ENGINE_VERSION,
  OUTPUT_UNIT_SUFFIX,
  ConfigError,
  FileNotFoundError,
  PassCancelledError,
} from "./types.js";

export { isCandidateNode, collectCandidates, getEnumDecorators } from "./candidate-filter.js";
export { resolveCandidate, resolveCandidates, resolveDecoratorIdentity } from "./semantic-resolver.js";
export { extractEnum, isImportable, DEFAULT_UNDERLYING_TYPE } from "./metadata-extractor.js";
export { DescriptionCache, recordsEqual, recordKey } from "./description-cache.js";
export { EnumExtensionsGenerator, runPass, unitNameFor } from "./orchestrator.js";
export type { Emitter, PassOptions, GeneratorOptions } from "./orchestrator.js";
export { renderExtensions, importPathFor } from "./emitter.js";
export type { EmitContext } from "./emitter.js";
export { ProjectHost } from "./project-host.js";
export type { ProjectHostOptions } from "./project-host.js";
export { MARKER_MODULE, MARKER_SOURCE, MarkerIdentity } from "./markers.js";
export { watchProject } from "./watch.js";
export { writeOutputUnits } from "./writer.js";
export type { WriteSummary } from "./writer.js";

export interface GenerateResult {
  result: PassResult;
  /** Absent for dry runs. */
  summary?: WriteSummary;
}

/**
 * Host over the configured tsconfig.json, or over the sources discovered
 * under rootDir when there is none.
 */
export function createProjectHost(config: ResolvedConfig, warnings: Warning[] = []): ProjectHost {
  if (config.project) {
    return ProjectHost.fromTsConfig(config.project, warnings);
  }
  const files = discoverFiles(config.rootDir, config.exclude, warnings);
  return new ProjectHost({ rootNames: files, currentDirectory: config.rootDir });
}

export function createGenerator(config: ResolvedConfig): EnumExtensionsGenerator {
  return new EnumExtensionsGenerator({
    outDir: config.outDir,
    verbose: config.verbose,
    includeFile: createIncludeFilter(config.rootDir, config.exclude),
  });
}

/**
 * Run one pass over the configured project and write its output.
 */
export function generate(config: ResolvedConfig): GenerateResult {
  const warnings: Warning[] = [];
  const host = createProjectHost(config, warnings);
  const result = createGenerator(config).supply(host.snapshot());
  result.warnings.unshift(...warnings);

  if (config.dryRun) return { result };

  const summary = writeOutputUnits(result, config.outDir, result.warnings, { clean: config.clean });
  return { result, summary };
}
