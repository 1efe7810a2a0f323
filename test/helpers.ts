import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import ts from "typescript";
import { ProjectHost } from "../src/project-host.js";

/** Root of the in-memory test projects. */
export const ROOT = "/virtual";

export const MARKER_IMPORT = `import { EnumExtensions, Flags } from "enumgen";`;

export function createHost(files: Record<string, string>): ProjectHost {
  return new ProjectHost({ files, currentDirectory: ROOT });
}

export function createChecked(files: Record<string, string>) {
  const host = createHost(files);
  const snapshot = host.snapshot();
  return { host, program: snapshot.program, checker: snapshot.program.getTypeChecker() };
}

/** First enum declaration named `name` in the given file. */
export function findEnum(program: ts.Program, fileName: string, name: string): ts.EnumDeclaration {
  const sourceFile = program.getSourceFile(`${ROOT}/${fileName}`);
  if (!sourceFile) throw new Error(`No source file ${fileName}`);

  let found: ts.EnumDeclaration | undefined;
  const visit = (node: ts.Node): void => {
    if (!found && ts.isEnumDeclaration(node) && node.name.text === name) found = node;
    ts.forEachChild(node, visit);
  };
  visit(sourceFile);
  if (!found) throw new Error(`No enum ${name} in ${fileName}`);
  return found;
}

/** Checker whose declared-symbol lookup fails for the named enums. */
export function withUnresolvableEnums(checker: ts.TypeChecker, names: string[]): ts.TypeChecker {
  return {
    ...checker,
    getSymbolAtLocation: (node: ts.Node) => {
      if (
        ts.isIdentifier(node) &&
        ts.isEnumDeclaration(node.parent) &&
        node.parent.name === node &&
        names.includes(node.text)
      ) {
        return undefined;
      }
      return checker.getSymbolAtLocation(node);
    },
  };
}

/** Program whose checker fails declared-symbol lookup for the named enums. */
export function withUnresolvableProgram(program: ts.Program, names: string[]): ts.Program {
  const checker = withUnresolvableEnums(program.getTypeChecker(), names);
  return { ...program, getTypeChecker: () => checker };
}

/** Cancellation token that trips after `allowed` checks. */
export function cancelAfter(allowed: number): ts.CancellationToken {
  let checks = 0;
  return {
    isCancellationRequested: () => checks++ >= allowed,
    throwIfCancellationRequested: () => {
      if (checks++ >= allowed) throw new ts.OperationCanceledException();
    },
  };
}

const tempDirs: string[] = [];

/** Write files into a fresh temp directory and return its path. */
export function writeTree(files: Record<string, string>): string {
  const dir = mkdtempSync(join(tmpdir(), "enumgen-test-"));
  tempDirs.push(dir);
  for (const [path, content] of Object.entries(files)) {
    const fullPath = join(dir, path);
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, content);
  }
  return dir;
}

export function cleanupTrees(): void {
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
}
