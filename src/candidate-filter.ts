// src/candidate-filter.ts — Stage 1: Candidate Filter
// Syntax only. Runs on every node of every file, so it never touches the checker.

import ts from "typescript";

/**
 * True iff the node is an enum declaration carrying at least one decorator.
 * False positives are expected and filtered by the semantic resolver.
 */
export function isCandidateNode(node: ts.Node): node is ts.EnumDeclaration {
  return ts.isEnumDeclaration(node) && getEnumDecorators(node).length > 0;
}

/**
 * Decorators written on an enum declaration, in source order.
 * The parser keeps them in `modifiers`; `ts.getDecorators` only serves
 * declarations where decorators are legal, so it can't be used here.
 */
export function getEnumDecorators(node: ts.EnumDeclaration): ts.Decorator[] {
  const decorators: ts.Decorator[] = [];
  for (const modifier of node.modifiers ?? []) {
    if (ts.isDecorator(modifier)) decorators.push(modifier);
  }
  return decorators;
}

/**
 * Collect all candidate enums in a file, including those nested in
 * namespaces and function bodies.
 */
export function collectCandidates(sourceFile: ts.SourceFile): ts.EnumDeclaration[] {
  const candidates: ts.EnumDeclaration[] = [];

  function visit(node: ts.Node): void {
    if (isCandidateNode(node)) {
      candidates.push(node);
    }
    ts.forEachChild(node, visit);
  }

  visit(sourceFile);
  return candidates;
}
