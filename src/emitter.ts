// src/emitter.ts — Extension emitter
// Renders one EnumToGenerate into a TypeScript module. Output depends only on
// the record and the import path, so equal records render to equal text.

import { relative, sep } from "node:path";
import ts from "typescript";
import type { EnumMember, EnumToGenerate } from "./types.js";
import { ENGINE_VERSION } from "./types.js";

export interface EmitContext {
  /**
   * Module specifier the generated file imports the enum from.
   * Only used for exported enums.
   */
  importPath: string;
}

const INDENT = "  ";

/**
 * Local name of the source module's namespace import. Referring to the enum
 * through it keeps the import apart from an output namespace of the same name.
 */
export const SOURCE_ALIAS = "__source";

/**
 * Render the helper module for a record.
 */
export function renderExtensions(record: EnumToGenerate, context: EmitContext): string {
  const out: string[] = [];
  out.push(`// <auto-generated by enumgen v${ENGINE_VERSION} />`);
  out.push(`// Helpers for enum ${record.declaredQualifiedName}. Do not edit.`);
  out.push("");

  if (record.isPublic) {
    out.push(`import * as ${SOURCE_ALIAS} from ${JSON.stringify(context.importPath)};`);
    out.push("");
  }

  const body = renderHelperObject(record);
  if (record.outputNamespace) {
    out.push(`export namespace ${record.outputNamespace} {`);
    out.push(...body.map((line) => (line ? INDENT + line : line)));
    out.push("}");
  } else {
    out.push(...body);
  }

  return out.join("\n") + "\n";
}

function renderHelperObject(record: EnumToGenerate): string[] {
  const valueType = record.isPublic ? sourceRef(record) : record.underlyingType;
  const ref = (m: EnumMember) => memberRef(record, m);
  const lines: string[] = [];

  lines.push(`/**`);
  lines.push(` * Fast name and value helpers for ${record.declaredQualifiedName}.`);
  if (!record.isPublic) lines.push(` * @internal`);
  lines.push(` */`);
  lines.push(`export const ${record.outputName} = {`);
  lines.push(`${INDENT}length: ${record.members.length},`);
  lines.push("");

  // toStringFast
  lines.push(`${INDENT}toStringFast(value: ${valueType}): string {`);
  lines.push(...renderSwitch("value", record.members.map((m): [string, string] => [ref(m), JSON.stringify(m.name)]), "String(value)"));
  lines.push(`${INDENT}},`);
  lines.push("");

  // isDefined
  lines.push(`${INDENT}isDefined(value: ${valueType}): boolean {`);
  const range = contiguousRange(record.members);
  if (range !== undefined) {
    lines.push(`${INDENT}${INDENT}return Number.isInteger(value) && value >= 0 && value <= ${range};`);
  } else {
    lines.push(...renderMembership("value", record.members.map(ref)));
  }
  lines.push(`${INDENT}},`);
  lines.push("");

  // isDefinedName
  lines.push(`${INDENT}isDefinedName(name: string): boolean {`);
  lines.push(...renderMembership("name", record.members.map((m) => JSON.stringify(m.name))));
  lines.push(`${INDENT}},`);
  lines.push("");

  // tryParse
  lines.push(`${INDENT}tryParse(name: string): ${valueType} | undefined {`);
  lines.push(...renderSwitch("name", record.members.map((m): [string, string] => [JSON.stringify(m.name), ref(m)]), "undefined"));
  lines.push(`${INDENT}},`);
  lines.push("");

  lines.push(`${INDENT}getValues(): ${valueType}[] {`);
  lines.push(`${INDENT}${INDENT}return [${record.members.map(ref).join(", ")}];`);
  lines.push(`${INDENT}},`);
  lines.push("");

  lines.push(`${INDENT}getNames(): string[] {`);
  lines.push(`${INDENT}${INDENT}return [${record.members.map((m) => JSON.stringify(m.name)).join(", ")}];`);
  lines.push(`${INDENT}},`);

  if (record.hasFlags && record.underlyingType === "number") {
    lines.push("");
    lines.push(`${INDENT}hasFlagFast(value: ${valueType}, flag: ${valueType}): boolean {`);
    lines.push(`${INDENT}${INDENT}return (value & flag) === flag;`);
    lines.push(`${INDENT}},`);
  }

  lines.push(`};`);
  return lines;
}

/** `switch (subject) { case a: return b; ... default: return fallback; }` */
function renderSwitch(subject: string, cases: Array<[string, string]>, fallback: string): string[] {
  const pad = INDENT.repeat(2);
  const lines = [`${pad}switch (${subject}) {`];
  for (const [label, result] of cases) {
    lines.push(`${pad}${INDENT}case ${label}:`);
    lines.push(`${pad}${INDENT}${INDENT}return ${result};`);
  }
  lines.push(`${pad}${INDENT}default:`);
  lines.push(`${pad}${INDENT}${INDENT}return ${fallback};`);
  lines.push(`${pad}}`);
  return lines;
}

function renderMembership(subject: string, labels: string[]): string[] {
  const pad = INDENT.repeat(2);
  if (labels.length === 0) return [`${pad}return false;`];
  const lines = [`${pad}switch (${subject}) {`];
  for (const label of labels) lines.push(`${pad}${INDENT}case ${label}:`);
  lines.push(`${pad}${INDENT}${INDENT}return true;`);
  lines.push(`${pad}${INDENT}default:`);
  lines.push(`${pad}${INDENT}${INDENT}return false;`);
  lines.push(`${pad}}`);
  return lines;
}

/**
 * Highest value when members are exactly 0..N-1 in source order, else undefined.
 */
export function contiguousRange(members: readonly EnumMember[]): number | undefined {
  if (members.length === 0) return undefined;
  const contiguous = members.every((m, i) => m.value === i);
  return contiguous ? members.length - 1 : undefined;
}

function sourceRef(record: EnumToGenerate): string {
  return `${SOURCE_ALIAS}.${record.declaredQualifiedName}`;
}

function memberRef(record: EnumToGenerate, member: EnumMember): string {
  if (!record.isPublic) return JSON.stringify(member.value);
  return ts.isIdentifierText(member.name, ts.ScriptTarget.Latest)
    ? `${sourceRef(record)}.${member.name}`
    : `${sourceRef(record)}[${JSON.stringify(member.name)}]`;
}

/**
 * Specifier for importing `sourceFile` from a generated file in `outDir`,
 * using the emitted JavaScript extension.
 */
export function importPathFor(sourceFile: string, outDir: string): string {
  const rel = relative(outDir, sourceFile)
    .split(sep)
    .join("/")
    .replace(/\.d\.(m|c)?ts$/, ".$1ts")
    .replace(/\.(m|c)?tsx?$/, ".$1js");
  return rel.startsWith(".") ? rel : `./${rel}`;
}
