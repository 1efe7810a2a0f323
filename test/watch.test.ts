import { describe, it, expect, afterAll } from "vitest";
import { join } from "node:path";
import { watchProject } from "../src/watch.js";
import { EnumExtensionsGenerator } from "../src/orchestrator.js";
import type { PassResult } from "../src/types.js";
import { cleanupTrees, writeTree, MARKER_IMPORT } from "./helpers.js";

afterAll(() => cleanupTrees());

function writeProject(): string {
  return writeTree({
    "tsconfig.json": JSON.stringify({
      compilerOptions: { target: "ES2022", module: "ESNext", moduleResolution: "Bundler", types: [] },
      include: ["src"],
    }),
    "src/status.ts": `${MARKER_IMPORT}\n@EnumExtensions()\nexport enum Status { Open, Closed }\n`,
    "src/plain.ts": "export enum Plain { A }\n",
  });
}

describe("watchProject", () => {
  it("runs a pass for the initial program", () => {
    const dir = writeProject();
    const generator = new EnumExtensionsGenerator({ outDir: join(dir, "generated") });
    const results: PassResult[] = [];

    const watch = watchProject(join(dir, "tsconfig.json"), generator, {
      onResult: (result) => results.push(result),
    });
    watch.close();

    expect(results).toHaveLength(1);
    expect(results[0].units.map((u) => u.name)).toEqual(["StatusExtensions_EnumExtensions"]);
    expect(results[0].units[0].sourceFile).toBe(join(dir, "src", "status.ts"));
    expect(results[0].cancelled).toBe(false);
  });

  it("reports watch status messages", () => {
    const dir = writeProject();
    const generator = new EnumExtensionsGenerator({ outDir: join(dir, "generated") });
    const messages: string[] = [];

    const watch = watchProject(join(dir, "tsconfig.json"), generator, {
      onResult: () => {},
      onStatus: (message) => messages.push(message),
    });
    watch.close();

    expect(messages.length).toBeGreaterThan(0);
  });

  it("keeps the generator's cache across programs of the same watch", () => {
    const dir = writeProject();
    const generator = new EnumExtensionsGenerator({ outDir: join(dir, "generated") });

    watchProject(join(dir, "tsconfig.json"), generator, { onResult: () => {} }).close();
    const results: PassResult[] = [];
    watchProject(join(dir, "tsconfig.json"), generator, {
      onResult: (result) => results.push(result),
    }).close();

    expect(results[0].changes.unchanged).toEqual(["StatusExtensions_EnumExtensions"]);
  });
});
