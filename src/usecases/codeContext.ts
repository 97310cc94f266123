import type { CodeContext } from "../interfaces/index.js";

export const DEFAULT_CONTEXT_LINES = 10;

const METHOD_PATTERN =
  /^\s*(?:(?:@\w+(?:\([^)]*\))?|public|private|protected|static|final|abstract|synchronized|native|default)\s+)*(?:<[^>]+>\s*)?(\w+(?:<(?:[^<>]|<[^<>]*>)*>)?(?:\[\])*)\s+(\w+)\s*\(/;
const CLASS_PATTERN =
  /^\s*(?:(?:public|private|protected|static|final|abstract|sealed|non-sealed|strictfp)\s+)*(?:class|interface|enum|record)\s+(\w+)/;
const IMPORT_PATTERN = /^\s*import\s+(?:static\s+)?[\w.]+(?:\.\*)?;\s*$/;
const INITIALIZER_PATTERN = /^\s*static\s*\{/;
const ANONYMOUS_CLASS_PATTERN = /\bnew\s+[\w.$]+(?:<[^>]*>)?\s*\([^)]*\)\s*\{/;
const FIELD_PATTERN =
  /^\s*(?:(?:public|private|protected|static|final|volatile|transient)\s+)*\w+(?:<[^>]+>)?(?:\[\])*\s+\w+\s*[;=]/;

// Statement keywords that METHOD_PATTERN would otherwise read as a return type.
const NON_TYPE_KEYWORDS: ReadonlySet<string> = new Set([
  "return",
  "new",
  "throw",
  "else",
  "case",
  "yield",
  "assert",
  "goto",
  "package",
  "import",
  "record",
]);

type MethodBounds = {
  methodName: string;
  startLine: number;
  endLine: number;
};

function countChar(line: string, char: string): number {
  let count = 0;
  for (const current of line) {
    if (current === char) count++;
  }
  return count;
}

function braceDelta(line: string): number {
  return countChar(line, "{") - countChar(line, "}");
}

export function matchMethodDeclaration(line: string): string | undefined {
  const match = METHOD_PATTERN.exec(line);
  if (!match || NON_TYPE_KEYWORDS.has(match[1])) return undefined;
  return match[2];
}

export function matchClassDeclaration(line: string): string | undefined {
  return CLASS_PATTERN.exec(line)?.[1];
}

export function extractImports(lines: ReadonlyArray<string>): string[] {
  const imports: string[] = [];
  for (const line of lines) {
    if (IMPORT_PATTERN.test(line)) imports.push(line.trim());
    if (matchClassDeclaration(line) !== undefined) break;
  }
  return imports;
}

export function findEnclosingClass(lines: ReadonlyArray<string>, targetLine: number): string | null {
  let current: string | null = null;
  for (let index = 0; index < lines.length && index < targetLine; index++) {
    current = matchClassDeclaration(lines[index]) ?? current;
  }
  return current;
}

function findMethodEnd(lines: ReadonlyArray<string>, startLine: number): number {
  let balance = 0;
  let opened = false;

  for (let index = startLine - 1; index < lines.length; index++) {
    const line = lines[index];
    const opening = countChar(line, "{");
    if (opening > 0) opened = true;
    balance += opening - countChar(line, "}");
    if (opened && balance <= 0) return index + 1;
  }

  return lines.length;
}

// First line of the statement ending at `index`: a wrapped signature or a brace on its own line belongs to it.
function statementStart(lines: ReadonlyArray<string>, index: number): number {
  let start = index;
  while (start > 0) {
    const previous = lines[start - 1].trim();
    if (previous.length === 0 || /[;{}]$/.test(previous)) break;
    start--;
  }
  return start;
}

function opensTypeScope(statement: ReadonlyArray<string>): boolean {
  if (statement.length === 1 && statement[0].trim() === "{") return true;
  return statement.some(
    (line) =>
      matchClassDeclaration(line) !== undefined || INITIALIZER_PATTERN.test(line) || ANONYMOUS_CLASS_PATTERN.test(line),
  );
}

function methodBounds(lines: ReadonlyArray<string>, methodName: string, startLine: number): MethodBounds {
  return { methodName, startLine, endLine: findMethodEnd(lines, startLine) };
}

export function findEnclosingMethod(
  lines: ReadonlyArray<string>,
  targetLine: number,
): MethodBounds | undefined {
  const targetIndex = targetLine - 1;
  const target = lines[targetIndex] ?? "";
  const targetName = matchMethodDeclaration(target);
  if (targetName !== undefined) return methodBounds(lines, targetName, targetLine);

  // A closing brace on a line that opens nothing still belongs to the scope it ends.
  const closing = countChar(target, "}");
  let balance = countChar(target, "{") > 0 ? closing : Math.max(0, closing - 1);
  let lowest = 0;

  for (let index = targetIndex - 1; index >= 0; index--) {
    balance -= braceDelta(lines[index]);
    if (balance >= lowest) continue;
    lowest = balance;

    const start = statementStart(lines, index);
    const statement = lines.slice(start, index + 1);
    for (let offset = 0; offset < statement.length; offset++) {
      const methodName = matchMethodDeclaration(statement[offset]);
      if (methodName !== undefined) return methodBounds(lines, methodName, start + offset + 1);
    }
    if (opensTypeScope(statement)) return undefined;
  }

  return undefined;
}

export function extractClassFields(lines: ReadonlyArray<string>, className: string | null): string[] {
  if (!className) return [];

  const fields: string[] = [];
  let inClass = false;
  let opened = false;
  let depth = 0;

  for (const line of lines) {
    if (!inClass) {
      if (matchClassDeclaration(line) !== className) continue;
      inClass = true;
    }

    const opening = countChar(line, "{");
    if (opening > 0) opened = true;
    depth += opening - countChar(line, "}");

    if (depth === 1 && FIELD_PATTERN.test(line)) fields.push(line.trim());

    if (opened && depth <= 0) break;
  }

  return fields;
}

export function splitSourceLines(content: string): string[] {
  const lines = content.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export function extractCodeContext(
  filePath: string,
  lines: ReadonlyArray<string>,
  targetLine: number,
  contextLines = DEFAULT_CONTEXT_LINES,
): CodeContext | undefined {
  if (!Number.isInteger(targetLine) || targetLine < 1 || targetLine > lines.length) return undefined;

  const window = Math.max(0, Math.trunc(contextLines));
  const startLine = Math.max(1, targetLine - window);
  const endLine = Math.min(lines.length, targetLine + window);
  const className = findEnclosingClass(lines, targetLine);
  const method = findEnclosingMethod(lines, targetLine);

  return {
    filePath,
    targetLine,
    className,
    methodName: method?.methodName ?? null,
    methodBody: method ? lines.slice(method.startLine - 1, method.endLine).join("\n") : null,
    surroundingLines: lines.slice(startLine - 1, endLine),
    startLine,
    endLine,
    imports: extractImports(lines),
    classFields: extractClassFields(lines, className),
  };
}

export function formatCodeContext(context: CodeContext): string {
  return context.surroundingLines
    .map((line, index) => {
      const lineNumber = context.startLine + index;
      const marker = lineNumber === context.targetLine ? " >>> " : "     ";
      return `${marker}${String(lineNumber).padStart(4, " ")} | ${line}`;
    })
    .join("\n");
}
