import { describe, it, expect } from "vitest";
import ts from "typescript";
import {
  DescriptionCache,
  recordsEqual,
  recordKey,
  type DescriptionEntry,
} from "../src/description-cache.js";
import type { EnumToGenerate, Warning } from "../src/types.js";

function record(overrides: Partial<EnumToGenerate> = {}): EnumToGenerate {
  return {
    outputName: "StatusExtensions",
    declaredQualifiedName: "Status",
    outputNamespace: "",
    isPublic: true,
    hasFlags: false,
    underlyingType: "number",
    members: [
      { name: "Open", value: 0 },
      { name: "Closed", value: 1 },
    ],
    ...overrides,
  };
}

function entry(rec: EnumToGenerate, sourceFile = "/virtual/src/status.ts"): DescriptionEntry {
  return { key: recordKey(sourceFile, rec), sourceFile, record: rec };
}

describe("recordsEqual", () => {
  it("compares records structurally", () => {
    expect(recordsEqual(record(), record())).toBe(true);
  });

  it("detects a changed member value", () => {
    const changed = record({
      members: [
        { name: "Open", value: 0 },
        { name: "Closed", value: 2 },
      ],
    });
    expect(recordsEqual(record(), changed)).toBe(false);
  });

  it("treats member order as significant", () => {
    const reordered = record({
      members: [
        { name: "Closed", value: 1 },
        { name: "Open", value: 0 },
      ],
    });
    expect(recordsEqual(record(), reordered)).toBe(false);
  });

  it("distinguishes every scalar field", () => {
    expect(recordsEqual(record(), record({ hasFlags: true }))).toBe(false);
    expect(recordsEqual(record(), record({ isPublic: false }))).toBe(false);
    expect(recordsEqual(record(), record({ outputNamespace: "App" }))).toBe(false);
    expect(recordsEqual(record(), record({ underlyingType: "string" }))).toBe(false);
  });
});

describe("recordKey", () => {
  it("combines the declaring file and qualified name", () => {
    expect(recordKey("/virtual/a.ts", record({ declaredQualifiedName: "Billing.Status" }))).toBe(
      "/virtual/a.ts#Billing.Status",
    );
  });
});

describe("DescriptionCache.reconcile", () => {
  it("classifies everything as added on the first pass", () => {
    const cache = new DescriptionCache();
    const { entries, removed } = cache.reconcile([entry(record())]);

    expect(entries.map((e) => e.change)).toEqual(["added"]);
    expect(removed).toEqual([]);
  });

  it("reports unchanged records with their previous text", () => {
    const cache = new DescriptionCache();
    const first = entry(record());
    cache.commit(
      [{ key: first.key, record: first.record, unitName: "StatusExtensions_EnumExtensions", text: "// v1\n" }],
      cache.reconcile([first]).entries,
    );

    const { entries } = cache.reconcile([entry(record())]);
    expect(entries).toHaveLength(1);
    expect(entries[0].change).toBe("unchanged");
    expect(entries[0].previousText).toBe("// v1\n");
  });

  it("reports changed records without previous text", () => {
    const cache = new DescriptionCache();
    const first = entry(record());
    cache.commit(
      [{ key: first.key, record: first.record, unitName: "StatusExtensions_EnumExtensions", text: "// v1\n" }],
      cache.reconcile([first]).entries,
    );

    const { entries } = cache.reconcile([entry(record({ hasFlags: true }))]);
    expect(entries[0].change).toBe("changed");
    expect(entries[0].previousText).toBeUndefined();
  });

  it("lists keys that disappeared since the last commit", () => {
    const cache = new DescriptionCache();
    const first = entry(record());
    cache.commit(
      [{ key: first.key, record: first.record, unitName: "StatusExtensions_EnumExtensions", text: "" }],
      cache.reconcile([first]).entries,
    );

    const { entries, removed } = cache.reconcile([]);
    expect(entries).toEqual([]);
    expect(removed).toEqual(["/virtual/src/status.ts#Status"]);
    expect(cache.previousUnitName(first.key)).toBe("StatusExtensions_EnumExtensions");
  });

  it("coalesces repeated entries for the same enum", () => {
    const cache = new DescriptionCache();
    const { entries } = cache.reconcile([entry(record()), entry(record())]);
    expect(entries).toHaveLength(1);
  });

  it("keeps the first of two different records that share an output name", () => {
    const cache = new DescriptionCache();
    const warnings: Warning[] = [];
    const a = entry(record({ declaredQualifiedName: "A.Status", outputNamespace: "A" }), "/virtual/a.ts");
    const b = entry(record({ declaredQualifiedName: "B.Status", outputNamespace: "B" }), "/virtual/b.ts");

    const { entries } = cache.reconcile([a, b], warnings);

    expect(entries.map((e) => e.sourceFile)).toEqual(["/virtual/a.ts"]);
    expect(warnings).toHaveLength(1);
    expect(warnings[0].code).toBe("ENUMGEN002");
    expect(warnings[0].file).toBe("/virtual/b.ts");
  });

  it("does not change state until commit", () => {
    const cache = new DescriptionCache();
    cache.reconcile([entry(record())]);
    expect(cache.reconcile([entry(record())]).entries[0].change).toBe("added");
  });
});

describe("DescriptionCache.commit", () => {
  it("counts hits and misses", () => {
    const cache = new DescriptionCache();
    const first = entry(record());
    const rendered = [{ key: first.key, record: first.record, unitName: "S", text: "" }];

    cache.commit(rendered, cache.reconcile([first]).entries);
    cache.commit(rendered, cache.reconcile([first]).entries);

    expect(cache.stats.misses).toBe(1);
    expect(cache.stats.hits).toBe(1);
  });

  it("clear() forgets previous passes", () => {
    const cache = new DescriptionCache();
    const first = entry(record());
    cache.commit(
      [{ key: first.key, record: first.record, unitName: "S", text: "" }],
      cache.reconcile([first]).entries,
    );

    cache.clear();

    expect(cache.reconcile([first]).entries[0].change).toBe("added");
    expect(cache.stats).toEqual({ hits: 0, misses: 0, syntaxReuse: 0 });
  });
});

describe("DescriptionCache.candidatesFor", () => {
  it("computes candidates once per source file object", () => {
    const cache = new DescriptionCache();
    const sourceFile = ts.createSourceFile("/virtual/a.ts", "enum A { X }", ts.ScriptTarget.Latest, true);
    let calls = 0;
    const compute = () => {
      calls++;
      return [];
    };

    cache.candidatesFor(sourceFile, compute);
    cache.candidatesFor(sourceFile, compute);

    expect(calls).toBe(1);
    expect(cache.stats.syntaxReuse).toBe(1);
  });

  it("recomputes for a reparsed file with the same text", () => {
    const cache = new DescriptionCache();
    const parse = () => ts.createSourceFile("/virtual/a.ts", "enum A { X }", ts.ScriptTarget.Latest, true);
    let calls = 0;
    const compute = () => {
      calls++;
      return [];
    };

    cache.candidatesFor(parse(), compute);
    cache.candidatesFor(parse(), compute);

    expect(calls).toBe(2);
  });
});
