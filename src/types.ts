// src/types.ts — Shared types for the enum extensions generator

// ─── Description record ──────────────────────────────────────────────────────

export type EnumValue = number | string;

export interface EnumMember {
  readonly name: string;
  readonly value: EnumValue;
}

/**
 * Normalized, value-comparable summary of one opted-in enum declaration.
 * Created fresh on every pass and frozen; equality is structural (see recordsEqual).
 */
export interface EnumToGenerate {
  /** Name of the generated helper object. Defaults to `<Enum>Extensions`. */
  readonly outputName: string;
  /** Namespace-qualified name of the source enum, e.g. `Billing.Status`. */
  readonly declaredQualifiedName: string;
  /** Namespace the helpers are emitted into; empty at module level. */
  readonly outputNamespace: string;
  readonly isPublic: boolean;
  readonly hasFlags: boolean;
  /** `"number"`, `"string"` or `"number | string"`. */
  readonly underlyingType: UnderlyingType;
  /** Source order, constant members only. */
  readonly members: readonly EnumMember[];
}

export type UnderlyingType = "number" | "string" | "number | string";

// ─── Warnings (passed to all stages) ─────────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  code?: DiagnosticCode;
  file?: string;
}

export type DiagnosticCode =
  | "ENUMGEN001" // declared symbol could not be resolved
  | "ENUMGEN002" // two different records share an output name
  | "ENUMGEN003"; // syntax errors in a file carrying candidates

// ─── Pass input / output ─────────────────────────────────────────────────────

export interface ProgramSnapshot {
  program: import("typescript").Program;
  /** Checked between candidates; a requested cancellation abandons the pass. */
  cancellationToken?: import("typescript").CancellationToken;
}

export type ChangeKind = "added" | "changed" | "unchanged";

export interface OutputUnit {
  /** `<outputName>_EnumExtensions` */
  name: string;
  /** `<name>.g.ts` */
  fileName: string;
  /** Declaring source file of the enum. */
  sourceFile: string;
  record: EnumToGenerate;
  text: string;
  change: ChangeKind;
}

export interface PassChanges {
  added: string[];
  changed: string[];
  unchanged: string[];
  /** Unit names emitted by the previous pass and gone from this one. */
  removed: string[];
}

export interface PassResult {
  units: OutputUnit[];
  changes: PassChanges;
  warnings: Warning[];
  cancelled: boolean;
  timingMs: number;
}

// ─── Configuration ───────────────────────────────────────────────────────────

export interface ResolvedConfig {
  /** Directory scanned when no tsconfig is used. */
  rootDir: string;
  /** tsconfig.json path; when absent, sources are discovered under rootDir. */
  project?: string;
  exclude: string[];
  outDir: string;
  verbose: boolean;
  watch: boolean;
  dryRun: boolean;
  /** Delete generated files whose enums disappeared. */
  clean: boolean;
}

// ─── Errors ──────────────────────────────────────────────────────────────────

export class FileNotFoundError extends Error {
  constructor(
    public readonly filePath: string,
    cause?: unknown,
  ) {
    super(`File not found: ${filePath}`);
    this.name = "FileNotFoundError";
    this.cause = cause;
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export class PassCancelledError extends Error {
  constructor(public readonly processed: number) {
    super(`Pass cancelled after ${processed} candidate(s)`);
    this.name = "PassCancelledError";
  }
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const ENGINE_VERSION = "0.3.0";

export const OUTPUT_UNIT_SUFFIX = "_EnumExtensions";
export const GENERATED_FILE_EXTENSION = ".g.ts";

export const DEFAULT_EXCLUDE_DIRS = [
  "node_modules",
  "dist",
  "build",
  "out",
  "coverage",
  ".git",
  "__fixtures__",
] as const;

export const SOURCE_EXTENSIONS = /\.(ts|tsx|mts|cts)$/;
export const GENERATED_EXTENSION = /\.g\.ts$/;
