import { describe, it, expect, afterAll } from "vitest";
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { writeOutputUnits } from "../src/writer.js";
import type { OutputUnit, PassResult } from "../src/types.js";
import { cleanupTrees, writeTree } from "./helpers.js";

afterAll(() => cleanupTrees());

function unit(name: string, text: string): OutputUnit {
  return {
    name,
    fileName: `${name}.g.ts`,
    sourceFile: "/virtual/src/status.ts",
    record: {
      outputName: name.replace("_EnumExtensions", ""),
      declaredQualifiedName: "Status",
      outputNamespace: "",
      isPublic: true,
      hasFlags: false,
      underlyingType: "number",
      members: [],
    },
    text,
    change: "added",
  };
}

function pass(units: OutputUnit[], cancelled = false): PassResult {
  return {
    units,
    changes: { added: units.map((u) => u.name), changed: [], unchanged: [], removed: [] },
    warnings: [],
    cancelled,
    timingMs: 0,
  };
}

describe("writeOutputUnits", () => {
  it("creates the output directory and writes each unit", () => {
    const outDir = join(writeTree({}), "generated");

    const summary = writeOutputUnits(pass([unit("StatusExtensions_EnumExtensions", "// a\n")]), outDir);

    const file = join(outDir, "StatusExtensions_EnumExtensions.g.ts");
    expect(summary.written).toEqual([file]);
    expect(readFileSync(file, "utf-8")).toBe("// a\n");
  });

  it("skips files whose content is already current", () => {
    const outDir = writeTree({ "StatusExtensions_EnumExtensions.g.ts": "// a\n" });

    const summary = writeOutputUnits(pass([unit("StatusExtensions_EnumExtensions", "// a\n")]), outDir);

    expect(summary.written).toEqual([]);
    expect(summary.skipped).toEqual([join(outDir, "StatusExtensions_EnumExtensions.g.ts")]);
  });

  it("deletes stale generated files when cleaning", () => {
    const outDir = writeTree({
      "OldExtensions_EnumExtensions.g.ts": "// old\n",
      "handwritten.ts": "export {};\n",
    });

    const summary = writeOutputUnits(
      pass([unit("StatusExtensions_EnumExtensions", "// a\n")]),
      outDir,
      [],
      { clean: true },
    );

    expect(summary.deleted).toEqual([join(outDir, "OldExtensions_EnumExtensions.g.ts")]);
    expect(existsSync(join(outDir, "handwritten.ts"))).toBe(true);
  });

  it("leaves stale files alone without clean", () => {
    const outDir = writeTree({ "OldExtensions_EnumExtensions.g.ts": "// old\n" });

    const summary = writeOutputUnits(pass([]), outDir);

    expect(summary.deleted).toEqual([]);
    expect(existsSync(join(outDir, "OldExtensions_EnumExtensions.g.ts"))).toBe(true);
  });

  it("writes nothing for a cancelled pass", () => {
    const outDir = writeTree({ "OldExtensions_EnumExtensions.g.ts": "// old\n" });

    const summary = writeOutputUnits(pass([], true), outDir, [], { clean: true });

    expect(summary).toEqual({ written: [], deleted: [], skipped: [] });
    expect(existsSync(join(outDir, "OldExtensions_EnumExtensions.g.ts"))).toBe(true);
  });
});
