// src/project-host.ts — Program snapshots
// Builds successive ts.Program snapshots over disk files and an in-memory
// overlay. SourceFile objects are cached by text and the previous program is
// passed as oldProgram, so unchanged files are reused by identity.

import { dirname, join, resolve } from "node:path";
import ts from "typescript";
import type { ProgramSnapshot, Warning } from "./types.js";
import { ConfigError } from "./types.js";
import { MARKER_FILE_NAME, MARKER_MODULE, MARKER_SOURCE } from "./markers.js";

export interface ProjectHostOptions {
  compilerOptions?: ts.CompilerOptions;
  /** Files read from disk. */
  rootNames?: readonly string[];
  /** In-memory files keyed by path; they shadow disk files of the same path. */
  files?: Readonly<Record<string, string>>;
  currentDirectory?: string;
}

export const DEFAULT_COMPILER_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ESNext,
  moduleResolution: ts.ModuleResolutionKind.Bundler,
  lib: ["lib.es2022.d.ts"],
  types: [],
  skipLibCheck: true,
};

/**
 * Module resolver that leaves the marker module unresolved. Imports of it bind
 * to the injected ambient declarations, and an installed package of the same
 * name (or the package's own self-reference) is never loaded.
 */
export function createMarkerAwareResolver(
  host: ts.ModuleResolutionHost,
  cache?: ts.ModuleResolutionCache,
): NonNullable<ts.CompilerHost["resolveModuleNameLiterals"]> {
  return (moduleLiterals, containingFile, redirectedReference, options, containingSourceFile) =>
    moduleLiterals.map((literal) =>
      literal.text === MARKER_MODULE
        ? { resolvedModule: undefined }
        : ts.resolveModuleName(
            literal.text,
            containingFile,
            options,
            host,
            cache,
            redirectedReference,
            ts.getModeForUsageLocation(containingSourceFile, literal, options),
          ),
    );
}

interface CachedSourceFile {
  text: string;
  sourceFile: ts.SourceFile;
}

export class ProjectHost {
  private overlay = new Map<string, string>();
  private rootNames = new Set<string>();
  private sourceFiles = new Map<string, CachedSourceFile>();
  private program: ts.Program | undefined;
  private readonly compilerOptions: ts.CompilerOptions;
  private readonly currentDirectory: string;
  private readonly markerPath: string;
  private readonly baseHost: ts.CompilerHost;
  private readonly host: ts.CompilerHost;

  constructor(options: ProjectHostOptions = {}) {
    this.currentDirectory = resolve(options.currentDirectory ?? process.cwd());
    this.compilerOptions = {
      ...DEFAULT_COMPILER_OPTIONS,
      ...options.compilerOptions,
      noEmit: true,
    };
    this.markerPath = join(this.currentDirectory, MARKER_FILE_NAME);

    for (const fileName of options.rootNames ?? []) {
      this.rootNames.add(this.toPath(fileName));
    }
    for (const [fileName, text] of Object.entries(options.files ?? {})) {
      this.update(fileName, text);
    }

    this.baseHost = ts.createCompilerHost(this.compilerOptions, true);
    const resolutionCache = ts.createModuleResolutionCache(
      this.currentDirectory,
      (fileName) => this.baseHost.getCanonicalFileName(fileName),
      this.compilerOptions,
    );
    this.host = {
      ...this.baseHost,
      getCurrentDirectory: () => this.currentDirectory,
      fileExists: (fileName) =>
        this.readOverlay(fileName) !== undefined || this.baseHost.fileExists(fileName),
      readFile: (fileName) => this.readOverlay(fileName) ?? this.baseHost.readFile(fileName),
      getSourceFile: (fileName, languageVersionOrOptions, onError) =>
        this.getSourceFile(fileName, languageVersionOrOptions, onError),
      writeFile: () => {
        // snapshots are never emitted
      },
      resolveModuleNameLiterals: createMarkerAwareResolver(
        {
          fileExists: (fileName) => this.host.fileExists(fileName),
          readFile: (fileName) => this.host.readFile(fileName),
          realpath: this.baseHost.realpath,
          directoryExists: this.baseHost.directoryExists,
          getCurrentDirectory: () => this.currentDirectory,
          getDirectories: this.baseHost.getDirectories,
        },
        resolutionCache,
      ),
    };
  }

  /**
   * Host for the projects described by a tsconfig.json. Config diagnostics
   * become warnings; an unreadable config throws ConfigError.
   */
  static fromTsConfig(configPath: string, warnings: Warning[] = []): ProjectHost {
    const absPath = resolve(configPath);
    const read = ts.readConfigFile(absPath, ts.sys.readFile);
    if (read.error) {
      throw new ConfigError(
        ts.flattenDiagnosticMessageText(read.error.messageText, "\n"),
        absPath,
      );
    }

    const parsed = ts.parseJsonConfigFileContent(
      read.config,
      ts.sys,
      dirname(absPath),
      undefined,
      absPath,
    );
    for (const diagnostic of parsed.errors) {
      warnings.push({
        level: "warn",
        module: "project-host",
        message: ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n"),
        file: absPath,
      });
    }

    return new ProjectHost({
      compilerOptions: parsed.options,
      rootNames: parsed.fileNames,
      currentDirectory: dirname(absPath),
    });
  }

  /** Add or replace an in-memory file. */
  update(fileName: string, text: string): void {
    const path = this.toPath(fileName);
    this.overlay.set(path, text);
    this.rootNames.add(path);
  }

  /** Drop a file from the overlay and the root set. */
  remove(fileName: string): void {
    const path = this.toPath(fileName);
    this.overlay.delete(path);
    this.rootNames.delete(path);
    this.sourceFiles.delete(path);
  }

  /**
   * Build the next program. The marker declarations are always part of it.
   */
  snapshot(cancellationToken?: ts.CancellationToken): ProgramSnapshot {
    this.program = ts.createProgram({
      rootNames: [...this.rootNames, this.markerPath],
      options: this.compilerOptions,
      host: this.host,
      oldProgram: this.program,
    });
    return { program: this.program, cancellationToken };
  }

  private toPath(fileName: string): string {
    return resolve(this.currentDirectory, fileName);
  }

  private readOverlay(fileName: string): string | undefined {
    const path = this.toPath(fileName);
    return path === this.markerPath ? MARKER_SOURCE : this.overlay.get(path);
  }

  private getSourceFile(
    fileName: string,
    languageVersionOrOptions: ts.ScriptTarget | ts.CreateSourceFileOptions,
    onError?: (message: string) => void,
  ): ts.SourceFile | undefined {
    const path = this.toPath(fileName);
    const text = this.readOverlay(fileName) ?? this.baseHost.readFile(fileName);
    if (text === undefined) {
      onError?.(`File not found: ${fileName}`);
      return undefined;
    }

    const cached = this.sourceFiles.get(path);
    if (cached && cached.text === text) return cached.sourceFile;

    const sourceFile = ts.createSourceFile(fileName, text, languageVersionOrOptions, true);
    this.sourceFiles.set(path, { text, sourceFile });
    return sourceFile;
  }
}
