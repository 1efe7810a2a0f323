// src/description-cache.ts — Stage 4: Description Cache / Dedup
// The only state that survives between passes. Records are compared by value;
// a record equal to the previous pass's record for the same enum keeps its
// previously rendered text and is not re-emitted.

import type ts from "typescript";
import type { ChangeKind, EnumToGenerate, Warning } from "./types.js";

/** One extracted record, tagged with the identity of the enum it came from. */
export interface DescriptionEntry {
  /** Declaring file + qualified enum name; see recordKey. */
  key: string;
  sourceFile: string;
  record: EnumToGenerate;
}

export interface ReconciledEntry extends DescriptionEntry {
  change: ChangeKind;
  /** Output of the previous pass, present when change is "unchanged". */
  previousText?: string;
}

export interface Reconciliation {
  entries: ReconciledEntry[];
  /** Keys seen in the previous pass and absent from this one. */
  removed: string[];
}

interface CachedDescription {
  record: EnumToGenerate;
  unitName: string;
  text: string;
}

/** A rendered entry handed back to the cache once its pass completes. */
export interface RenderedEntry {
  key: string;
  record: EnumToGenerate;
  unitName: string;
  text: string;
}

/**
 * Structural equality over every record field, element-wise over members.
 */
export function recordsEqual(a: EnumToGenerate, b: EnumToGenerate): boolean {
  if (a === b) return true;
  if (
    a.outputName !== b.outputName ||
    a.declaredQualifiedName !== b.declaredQualifiedName ||
    a.outputNamespace !== b.outputNamespace ||
    a.isPublic !== b.isPublic ||
    a.hasFlags !== b.hasFlags ||
    a.underlyingType !== b.underlyingType ||
    a.members.length !== b.members.length
  ) {
    return false;
  }
  return a.members.every(
    (m, i) => m.name === b.members[i].name && m.value === b.members[i].value,
  );
}

export function recordKey(sourceFile: string, record: EnumToGenerate): string {
  return `${sourceFile}#${record.declaredQualifiedName}`;
}

export class DescriptionCache {
  /** Syntax-stage results per SourceFile object; reused files hit by identity. */
  private candidates = new WeakMap<ts.SourceFile, readonly ts.EnumDeclaration[]>();
  private previous = new Map<string, CachedDescription>();

  public stats = {
    /** Records found equal to the previous pass. */
    hits: 0,
    /** Records added or changed. */
    misses: 0,
    /** Files whose candidate scan was skipped. */
    syntaxReuse: 0,
  };

  /**
   * Candidates of a file, computed at most once per SourceFile object.
   */
  candidatesFor(
    sourceFile: ts.SourceFile,
    compute: (sourceFile: ts.SourceFile) => readonly ts.EnumDeclaration[],
  ): readonly ts.EnumDeclaration[] {
    const cached = this.candidates.get(sourceFile);
    if (cached) {
      this.stats.syntaxReuse++;
      return cached;
    }
    const found = compute(sourceFile);
    this.candidates.set(sourceFile, found);
    return found;
  }

  /**
   * Coalesce equal records and classify each against the previous pass.
   * Does not modify the cache; see commit.
   */
  reconcile(entries: readonly DescriptionEntry[], warnings: Warning[] = []): Reconciliation {
    const kept: DescriptionEntry[] = [];
    for (const entry of entries) {
      if (kept.some((k) => k.key === entry.key || recordsEqual(k.record, entry.record))) {
        continue;
      }
      // Unit names derive from outputName alone, so namespaces don't disambiguate
      const clash = kept.find((k) => k.record.outputName === entry.record.outputName);
      if (clash) {
        warnings.push({
          level: "warn",
          module: "description-cache",
          code: "ENUMGEN002",
          message: `Enums "${clash.record.declaredQualifiedName}" and "${entry.record.declaredQualifiedName}" both generate "${entry.record.outputName}"; keeping the first.`,
          file: entry.sourceFile,
        });
        continue;
      }
      kept.push(entry);
    }

    const reconciled = kept.map((entry): ReconciledEntry => {
      const prior = this.previous.get(entry.key);
      if (!prior) return { ...entry, change: "added" };
      if (recordsEqual(prior.record, entry.record)) {
        return { ...entry, change: "unchanged", previousText: prior.text };
      }
      return { ...entry, change: "changed" };
    });

    const current = new Set(kept.map((e) => e.key));
    const removed = [...this.previous.keys()].filter((key) => !current.has(key));

    return { entries: reconciled, removed };
  }

  /** Unit name the previous pass emitted for a key. */
  previousUnitName(key: string): string | undefined {
    return this.previous.get(key)?.unitName;
  }

  /**
   * Replace the previous pass's state. Only called for completed passes, so a
   * cancelled pass leaves the last good state in place.
   */
  commit(rendered: readonly RenderedEntry[], changes: readonly ReconciledEntry[]): void {
    for (const entry of changes) {
      if (entry.change === "unchanged") this.stats.hits++;
      else this.stats.misses++;
    }
    this.previous = new Map(
      rendered.map((r) => [r.key, { record: r.record, unitName: r.unitName, text: r.text }]),
    );
  }

  clear(): void {
    this.candidates = new WeakMap();
    this.previous.clear();
    this.stats = { hits: 0, misses: 0, syntaxReuse: 0 };
  }
}
