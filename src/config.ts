// src/config.ts — Config Resolver
// Precedence: CLI args > environment > config file > defaults.

import { existsSync, readFileSync } from "node:fs";
import { resolve, join } from "node:path";
import type { ResolvedConfig, Warning } from "./types.js";
import { ConfigError, FileNotFoundError } from "./types.js";

export const CONFIG_FILE_NAME = "enumgen.config.json";
export const PACKAGE_JSON_KEY = "enumgen";

export interface ParsedArgs {
  paths: string[];
  project?: string;
  out?: string;
  exclude: string[];
  config?: string;
  clean?: boolean;
  quiet: boolean;
  verbose: boolean;
  watch: boolean;
  dryRun: boolean;
  help: boolean;
}

/** Shape accepted in enumgen.config.json and under "enumgen" in package.json. */
export interface FileConfig {
  rootDir?: string;
  project?: string;
  exclude?: string[];
  outDir?: string;
  verbose?: boolean;
  clean?: boolean;
}

const DEFAULTS = {
  outDir: "generated",
  exclude: [] as string[],
  clean: true,
  verbose: false,
};

/**
 * Resolve config from CLI args, environment, config file, and defaults.
 * Throws FileNotFoundError when the root directory doesn't exist.
 */
export function resolveConfig(
  args: ParsedArgs,
  warnings: Warning[] = [],
  cwd: string = process.cwd(),
): ResolvedConfig {
  const fileConfig = loadConfigFile(args.config, warnings, cwd) ?? {};

  const rootDir = resolve(cwd, args.paths[0] ?? fileConfig.rootDir ?? ".");
  if (!existsSync(rootDir)) {
    throw new FileNotFoundError(rootDir);
  }
  const project = args.project ?? fileConfig.project;
  const defaultProject = join(rootDir, "tsconfig.json");

  return {
    rootDir,
    project: project
      ? resolve(cwd, project)
      : existsSync(defaultProject)
        ? defaultProject
        : undefined,
    exclude: args.exclude.length > 0 ? args.exclude : fileConfig.exclude ?? DEFAULTS.exclude,
    outDir: resolve(rootDir, args.out ?? fileConfig.outDir ?? DEFAULTS.outDir),
    verbose: args.verbose || envFlag("ENUMGEN_VERBOSE") || (fileConfig.verbose ?? DEFAULTS.verbose),
    watch: args.watch,
    dryRun: args.dryRun,
    clean: args.clean ?? fileConfig.clean ?? DEFAULTS.clean,
  };
}

function envFlag(name: string): boolean {
  const value = process.env[name];
  return value === "1" || value === "true";
}

function loadConfigFile(
  configPath: string | undefined,
  warnings: Warning[],
  cwd: string,
): FileConfig | null {
  if (configPath) {
    const absPath = resolve(cwd, configPath);
    if (!existsSync(absPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, absPath);
    }
    return validateFileConfig(parseJsonFile(absPath), absPath);
  }

  const jsonConfig = join(cwd, CONFIG_FILE_NAME);
  if (existsSync(jsonConfig)) {
    return validateFileConfig(parseJsonFile(jsonConfig), jsonConfig);
  }

  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    let pkg: unknown;
    try {
      pkg = parseJsonFile(pkgJson);
    } catch (err: unknown) {
      if (!(err instanceof ConfigError)) throw err;
      // a broken package.json is not ours to reject
      warnings.push({
        level: "warn",
        module: "config",
        message: err.message,
        file: pkgJson,
      });
      return null;
    }
    if (isRecord(pkg) && PACKAGE_JSON_KEY in pkg) {
      return validateFileConfig(pkg[PACKAGE_JSON_KEY], pkgJson);
    }
  }

  return null;
}

function parseJsonFile(filePath: string): unknown {
  try {
    return JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse config file ${filePath}: ${msg}`, filePath);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check field types; unknown keys are ignored, wrong types are rejected.
 */
export function validateFileConfig(raw: unknown, filePath: string): FileConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`Config in ${filePath} must be an object`, filePath);
  }

  const config: FileConfig = {};
  for (const key of ["rootDir", "project", "outDir"] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== "string") {
      throw new ConfigError(`"${key}" in ${filePath} must be a string`, filePath);
    }
    config[key] = value;
  }
  for (const key of ["verbose", "clean"] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== "boolean") {
      throw new ConfigError(`"${key}" in ${filePath} must be a boolean`, filePath);
    }
    config[key] = value;
  }
  if (raw.exclude !== undefined) {
    const exclude = raw.exclude;
    if (!Array.isArray(exclude) || !exclude.every((p): p is string => typeof p === "string")) {
      throw new ConfigError(`"exclude" in ${filePath} must be an array of glob strings`, filePath);
    }
    config.exclude = exclude;
  }
  return config;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function stringList(value: unknown): string[] {
  if (typeof value === "string") return [value];
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === "string");
  return [];
}

/**
 * Parse CLI args using mri.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: { p: "project", o: "out", c: "config", q: "quiet", v: "verbose", w: "watch", h: "help" },
    boolean: ["dry-run", "quiet", "verbose", "help", "watch", "clean"],
    string: ["project", "out", "config", "exclude"],
  });

  return {
    paths: args._,
    project: optionalString(args.project),
    out: optionalString(args.out),
    exclude: stringList(args.exclude),
    config: optionalString(args.config),
    clean: argv.some((a) => a === "--clean" || a === "--no-clean") ? args.clean === true : undefined,
    quiet: args.quiet === true,
    verbose: args.verbose === true,
    watch: args.watch === true,
    dryRun: args["dry-run"] === true,
    help: args.help === true,
  };
}
