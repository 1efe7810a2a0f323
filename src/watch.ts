// src/watch.ts — Watch mode
// Drives the generator from a ts watch program: every rebuilt program is one
// pass, and the generator's cache carries over between them.

import { dirname, join, resolve } from "node:path";
import ts from "typescript";
import type { PassResult } from "./types.js";
import type { EnumExtensionsGenerator } from "./orchestrator.js";
import { MARKER_FILE_NAME, MARKER_SOURCE } from "./markers.js";
import { createMarkerAwareResolver } from "./project-host.js";

export interface WatchCallbacks {
  onResult: (result: PassResult) => void;
  onStatus?: (message: string) => void;
}

/**
 * Watch the project described by a tsconfig.json. Program diagnostics are not
 * reported; only the generator's results reach the callbacks.
 */
export function watchProject(
  configPath: string,
  generator: EnumExtensionsGenerator,
  callbacks: WatchCallbacks,
): ts.WatchOfConfigFile<ts.SemanticDiagnosticsBuilderProgram> {
  const absConfigPath = resolve(configPath);
  const markerPath = join(dirname(absConfigPath), MARKER_FILE_NAME);
  const isMarker = (fileName: string) => resolve(fileName) === markerPath;

  const host = ts.createWatchCompilerHost(
    absConfigPath,
    { noEmit: true },
    ts.sys,
    ts.createSemanticDiagnosticsBuilderProgram,
    () => {
      // type errors belong to the user's build, not to this tool
    },
    (diagnostic) => {
      callbacks.onStatus?.(ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n"));
    },
  );

  // Inject the marker declarations as an extra root file
  const origReadFile = host.readFile;
  host.readFile = (fileName, encoding) =>
    isMarker(fileName) ? MARKER_SOURCE : origReadFile(fileName, encoding);
  const origFileExists = host.fileExists;
  host.fileExists = (fileName) => isMarker(fileName) || origFileExists(fileName);

  host.resolveModuleNameLiterals = createMarkerAwareResolver(host);

  const origCreateProgram = host.createProgram;
  host.createProgram = (rootNames, options, compilerHost, oldProgram, configDiagnostics, references) =>
    origCreateProgram(
      [...(rootNames ?? []), markerPath],
      options,
      compilerHost,
      oldProgram,
      configDiagnostics,
      references,
    );

  host.afterProgramCreate = (builderProgram) => {
    callbacks.onResult(generator.supply({ program: builderProgram.getProgram() }));
  };

  return ts.createWatchProgram(host);
}
