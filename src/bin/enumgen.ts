#!/usr/bin/env node
// CLI entry point for enumgen

import { relative } from "node:path";
import {
  generate,
  createGenerator,
  watchProject,
  writeOutputUnits,
  ENGINE_VERSION,
  ConfigError,
  FileNotFoundError,
} from "../index.js";
import { parseCliArgs, resolveConfig } from "../config.js";
import type { PassResult, ResolvedConfig, Warning } from "../types.js";

const HELP_TEXT = `
enumgen v${ENGINE_VERSION}

Generates fast name/value helpers for enums decorated with @EnumExtensions.

Usage:
  enumgen [dir] [options]

Arguments:
  dir                  Project directory (default: current directory)

Options:
  --project, -p        tsconfig.json to analyze (default: <dir>/tsconfig.json if present)
  --out, -o            Output directory for generated files (default: <dir>/generated)
  --exclude <glob>     Skip matching source files (repeatable)
  --config, -c         Path to config file (default: enumgen.config.json)
  --clean / --no-clean Delete generated files whose enums are gone (default: on)
  --watch, -w          Regenerate on file changes (requires a tsconfig.json)
  --dry-run            Print generated files to stdout instead of writing them
  --quiet, -q          Suppress warnings
  --verbose, -v        Print progress and cache statistics
  --help, -h           Show this help text

Marking an enum:
  import { EnumExtensions, Flags } from "enumgen";

  @EnumExtensions({ extensionClassName: "StatusHelpers" })
  export enum Status { Open, Closed }
`.trim();

function printWarnings(warnings: Warning[], quiet: boolean): void {
  if (quiet) return;
  for (const w of warnings) {
    const where = w.file ? ` (${relative(process.cwd(), w.file)})` : "";
    const code = w.code ? ` ${w.code}` : "";
    process.stderr.write(`[${w.level}]${code} ${w.module}: ${w.message}${where}\n`);
  }
}

function printDryRun(result: PassResult): void {
  for (const unit of result.units) {
    process.stdout.write(`// ----- ${unit.fileName} (${unit.change}) -----\n${unit.text}\n`);
  }
}

function runWatch(config: ResolvedConfig, quiet: boolean): void {
  if (!config.project) {
    throw new ConfigError("--watch needs a tsconfig.json; pass one with --project");
  }
  const generator = createGenerator(config);
  watchProject(config.project, generator, {
    onStatus: (message) => {
      if (!quiet) process.stderr.write(`[enumgen] ${message}\n`);
    },
    onResult: (result) => {
      printWarnings(result.warnings, quiet);
      if (config.dryRun) {
        printDryRun(result);
        return;
      }
      const summary = writeOutputUnits(result, config.outDir, result.warnings, { clean: config.clean });
      if (!quiet) {
        process.stderr.write(
          `[enumgen] ${summary.written.length} written, ${summary.deleted.length} deleted, ` +
            `${summary.skipped.length} up to date (${result.timingMs}ms)\n`,
        );
      }
      if (config.verbose) {
        const { hits, misses, syntaxReuse } = generator.cache.stats;
        process.stderr.write(`[INFO] Cache: ${hits} hits, ${misses} misses, ${syntaxReuse} files reused\n`);
      }
    },
  });
}

async function main() {
  const args = await parseCliArgs(process.argv.slice(2));

  if (args.help) {
    process.stdout.write(HELP_TEXT + "\n");
    process.exit(0);
  }

  const warnings: Warning[] = [];
  const config = resolveConfig(args, warnings);
  printWarnings(warnings, args.quiet);

  if (config.watch) {
    runWatch(config, args.quiet);
    return;
  }

  const { result, summary } = generate(config);
  printWarnings(result.warnings, args.quiet);

  if (config.dryRun) {
    printDryRun(result);
    process.exit(0);
  }

  if (summary && !args.quiet) {
    for (const file of summary.written) {
      process.stderr.write(`  wrote ${relative(process.cwd(), file)}\n`);
    }
    for (const file of summary.deleted) {
      process.stderr.write(`  deleted ${relative(process.cwd(), file)}\n`);
    }
    process.stderr.write(
      `[enumgen] ${result.units.length} enum(s), ${summary.written.length} file(s) written (${result.timingMs}ms)\n`,
    );
  }
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    process.stderr.write(`[error] config: ${err.message}\n`);
    process.exit(1);
  }
  if (err instanceof FileNotFoundError) {
    process.stderr.write(`[error] ${err.message}\n`);
    process.exit(1);
  }
  const msg = err instanceof Error ? (err.stack ?? err.message) : String(err);
  process.stderr.write(`[error] ${msg}\n`);
  process.exit(2);
});
