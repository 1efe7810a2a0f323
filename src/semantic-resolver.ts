// src/semantic-resolver.ts — Stage 2: Semantic Resolver
// Confirms a syntactic candidate really carries the opt-in marker by resolving
// its decorators against the program's checker.

import ts from "typescript";
import { getEnumDecorators } from "./candidate-filter.js";
import { identifyMarker, type MarkerKind } from "./markers.js";

/**
 * The expression naming the decorator: `X` for `@X`, `@X(...)`, and the
 * trailing name for `@ns.X(...)`.
 */
function decoratorCallee(decorator: ts.Decorator): ts.Expression {
  const expr = decorator.expression;
  return ts.isCallExpression(expr) ? expr.expression : expr;
}

/**
 * Resolve a decorator to the fully-qualified name of the symbol it refers to,
 * following import aliases. Returns undefined when the checker can't resolve it.
 */
export function resolveDecoratorIdentity(
  decorator: ts.Decorator,
  checker: ts.TypeChecker,
): string | undefined {
  const callee = decoratorCallee(decorator);
  const location = ts.isPropertyAccessExpression(callee) ? callee.name : callee;

  let symbol = checker.getSymbolAtLocation(location);
  if (!symbol) return undefined;

  if (symbol.flags & ts.SymbolFlags.Alias) {
    // Aliases to missing exports resolve to the checker's "unknown" symbol,
    // whose name never matches a marker identity
    symbol = checker.getAliasedSymbol(symbol);
  }

  return checker.getFullyQualifiedName(symbol);
}

/** Marker kind of a decorator, if it resolves to one of the recognized markers. */
export function resolveMarker(
  decorator: ts.Decorator,
  checker: ts.TypeChecker,
): MarkerKind | undefined {
  return identifyMarker(resolveDecoratorIdentity(decorator, checker));
}

/**
 * Returns the candidate unchanged if one of its decorators is the opt-in
 * marker, else undefined. Unresolvable decorators are skipped.
 */
export function resolveCandidate(
  node: ts.EnumDeclaration,
  checker: ts.TypeChecker,
): ts.EnumDeclaration | undefined {
  for (const decorator of getEnumDecorators(node)) {
    if (resolveMarker(decorator, checker) === "enumExtensions") {
      return node;
    }
  }
  return undefined;
}

/**
 * Resolve a list of candidates, dropping repeated nodes first. The same node
 * can be reached more than once when files are visited through several paths.
 */
export function resolveCandidates(
  nodes: readonly ts.EnumDeclaration[],
  checker: ts.TypeChecker,
): ts.EnumDeclaration[] {
  const resolved: ts.EnumDeclaration[] = [];
  for (const node of new Set(nodes)) {
    const target = resolveCandidate(node, checker);
    if (target) resolved.push(target);
  }
  return resolved;
}
