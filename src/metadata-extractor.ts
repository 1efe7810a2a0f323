// src/metadata-extractor.ts — Stage 3: Metadata Extractor
// Reduces a resolved enum declaration to an EnumToGenerate record. Everything
// read here is a plain value, so re-extracting an unchanged enum against a new
// program yields an equal record.

import ts from "typescript";
import type { EnumMember, EnumToGenerate, UnderlyingType, Warning } from "./types.js";
import { getEnumDecorators } from "./candidate-filter.js";
import { resolveMarker } from "./semantic-resolver.js";
import { OPTION_EXTENSION_CLASS_NAME, OPTION_EXTENSION_CLASS_NAMESPACE } from "./markers.js";

/** Matches TypeScript's own default: enum members without initializers are numbers. */
export const DEFAULT_UNDERLYING_TYPE: UnderlyingType = "number";

interface DecorationFold {
  outputName: string;
  outputNamespace: string;
  hasFlags: boolean;
}

/**
 * Extract the description record for a resolved candidate.
 * Returns undefined (and pushes an ENUMGEN001 warning) when the declared
 * symbol can't be obtained from the checker.
 */
export function extractEnum(
  node: ts.EnumDeclaration,
  checker: ts.TypeChecker,
  warnings: Warning[] = [],
): EnumToGenerate | undefined {
  const symbol = checker.getSymbolAtLocation(node.name);
  if (!symbol || !(symbol.flags & ts.SymbolFlags.Enum)) {
    warnings.push({
      level: "warn",
      module: "metadata-extractor",
      code: "ENUMGEN001",
      message: `Could not resolve the declared symbol of enum "${node.name.text}"; no helpers generated for it.`,
      file: node.getSourceFile().fileName,
    });
    return undefined;
  }

  const declarations = enumDeclarationsOf(symbol, node);
  const primary = declarations[0];
  const name = symbol.getName();
  const namespace = enclosingNamespace(primary);

  // Decorators from every merged declaration, not only the one that was found
  const initial: DecorationFold = {
    outputName: `${name}Extensions`,
    outputNamespace: namespace,
    hasFlags: false,
  };
  const folded = declarations
    .flatMap(getEnumDecorators)
    .reduce((fold, decorator) => applyDecoration(fold, decorator, checker), initial);

  const members = collectMembers(declarations, checker);

  return Object.freeze({
    outputName: folded.outputName,
    declaredQualifiedName: namespace ? `${namespace}.${name}` : name,
    outputNamespace: folded.outputNamespace,
    isPublic: isImportable(primary),
    hasFlags: folded.hasFlags,
    underlyingType: inferUnderlyingType(members),
    members: Object.freeze(members),
  });
}

function enumDeclarationsOf(
  symbol: ts.Symbol,
  fallback: ts.EnumDeclaration,
): [ts.EnumDeclaration, ...ts.EnumDeclaration[]] {
  const declarations = (symbol.declarations ?? []).filter(ts.isEnumDeclaration);
  const [first, ...rest] = declarations;
  return first ? [first, ...rest] : [fallback];
}

/**
 * Dotted path of the namespaces enclosing a declaration; empty at module or
 * global level. Stops at `declare module "x"` blocks and ignores `declare global`.
 */
export function enclosingNamespace(node: ts.Node): string {
  const names: string[] = [];
  for (let current: ts.Node | undefined = node.parent; current; current = current.parent) {
    if (!ts.isModuleDeclaration(current)) continue;
    if (ts.isStringLiteral(current.name)) break;
    if (current.flags & ts.NodeFlags.GlobalAugmentation) break;
    names.unshift(current.name.text);
  }
  return names.join(".");
}

function hasExportModifier(node: ts.Declaration): boolean {
  return (ts.getCombinedModifierFlags(node) & ts.ModifierFlags.Export) !== 0;
}

/**
 * True when another module can import the enum by its qualified name: it and
 * every enclosing namespace are exported, up to the top of an ES module.
 * Enums in functions, in `declare module "x"` blocks, under `declare global`
 * or in script files are not importable.
 */
export function isImportable(declaration: ts.EnumDeclaration): boolean {
  if (!hasExportModifier(declaration)) return false;
  for (let current: ts.Node = declaration.parent; ; current = current.parent) {
    if (ts.isSourceFile(current)) return ts.isExternalModule(current);
    if (ts.isModuleBlock(current)) continue;
    if (!ts.isModuleDeclaration(current)) return false;
    if (ts.isStringLiteral(current.name)) return false;
    if (current.flags & ts.NodeFlags.GlobalAugmentation) return false;
    // `B` in `namespace A.B` carries no modifiers of its own
    if (current.flags & ts.NodeFlags.NestedNamespace) continue;
    if (!hasExportModifier(current)) return false;
  }
}

// ─── Decorator fold ──────────────────────────────────────────────────────────

function applyDecoration(
  fold: DecorationFold,
  decorator: ts.Decorator,
  checker: ts.TypeChecker,
): DecorationFold {
  switch (resolveMarker(decorator, checker)) {
    case "flags":
      return { ...fold, hasFlags: true };
    case "enumExtensions":
      return applyOverrides(fold, decorator, checker);
    default:
      return fold;
  }
}

/** Later properties win; values that don't convert to a string are ignored. */
function applyOverrides(
  fold: DecorationFold,
  decorator: ts.Decorator,
  checker: ts.TypeChecker,
): DecorationFold {
  const options = markerOptions(decorator);
  if (!options) return fold;

  return options.properties.reduce<DecorationFold>((acc, property) => {
    const value = propertyValue(property, checker);
    if (value === undefined) return acc;

    switch (propertyKey(property)) {
      case OPTION_EXTENSION_CLASS_NAMESPACE:
        return { ...acc, outputNamespace: value };
      case OPTION_EXTENSION_CLASS_NAME:
        return { ...acc, outputName: value };
      default:
        return acc;
    }
  }, fold);
}

function markerOptions(decorator: ts.Decorator): ts.ObjectLiteralExpression | undefined {
  const expr = decorator.expression;
  if (!ts.isCallExpression(expr)) return undefined;
  const [first] = expr.arguments;
  return first && ts.isObjectLiteralExpression(first) ? first : undefined;
}

function propertyKey(property: ts.ObjectLiteralElementLike): string | undefined {
  if (!ts.isPropertyAssignment(property) && !ts.isShorthandPropertyAssignment(property)) {
    return undefined;
  }
  const name = property.name;
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNoSubstitutionTemplateLiteral(name)) {
    return name.text;
  }
  if (ts.isComputedPropertyName(name) && ts.isStringLiteralLike(name.expression)) {
    return name.expression.text;
  }
  return undefined;
}

function propertyValue(
  property: ts.ObjectLiteralElementLike,
  checker: ts.TypeChecker,
): string | undefined {
  if (ts.isPropertyAssignment(property)) {
    return constantToString(property.initializer, checker);
  }
  if (ts.isShorthandPropertyAssignment(property)) {
    const valueSymbol = checker.getShorthandAssignmentValueSymbol(property);
    return valueSymbol
      ? literalText(checker.getTypeOfSymbolAtLocation(valueSymbol, property))
      : undefined;
  }
  return undefined;
}

function constantToString(expr: ts.Expression, checker: ts.TypeChecker): string | undefined {
  if (ts.isStringLiteral(expr) || ts.isNoSubstitutionTemplateLiteral(expr)) return expr.text;
  if (ts.isNumericLiteral(expr)) return String(Number(expr.text));
  // const references, `as const`, parenthesized literals
  return literalText(checker.getTypeAtLocation(expr));
}

function literalText(type: ts.Type): string | undefined {
  if (type.isStringLiteral()) return type.value;
  if (type.isNumberLiteral()) return String(type.value);
  return undefined;
}

// ─── Members ─────────────────────────────────────────────────────────────────

function collectMembers(
  declarations: readonly ts.EnumDeclaration[],
  checker: ts.TypeChecker,
): EnumMember[] {
  const members: EnumMember[] = [];
  for (const declaration of declarations) {
    for (const member of declaration.members) {
      const value = checker.getConstantValue(member);
      if (value === undefined) continue; // computed member
      members.push(Object.freeze({ name: memberName(member), value }));
    }
  }
  return members;
}

function memberName(member: ts.EnumMember): string {
  const name = member.name;
  if (!ts.isComputedPropertyName(name)) return name.text;
  // ["a b"] and [`a b`] name the member "a b"
  return ts.isStringLiteralLike(name.expression) ? name.expression.text : name.getText();
}

function inferUnderlyingType(members: readonly EnumMember[]): UnderlyingType {
  const hasString = members.some((m) => typeof m.value === "string");
  const hasNumber = members.some((m) => typeof m.value === "number");
  if (hasString && hasNumber) return "number | string";
  if (hasString) return "string";
  return DEFAULT_UNDERLYING_TYPE;
}
