import { readdir, readFile, stat } from "node:fs/promises";
import { join, resolve } from "node:path";

import { splitSourceLines } from "../../usecases/codeContext.js";

export class SourceReadError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed to read source path ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = "SourceReadError";
    this.path = path;
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  return typeof error.code === "string" ? error.code : undefined;
}

function isNotFound(error: unknown): boolean {
  const code = errorCode(error);
  return code === "ENOENT" || code === "ENOTDIR";
}

async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (isNotFound(error)) return false;
    throw new SourceReadError(path, error);
  }
}

export function classNameToRelativePaths(className: string, extensions: readonly string[]): string[] {
  const outerClass = className.includes("$") ? className.slice(0, className.indexOf("$")) : className;
  const base = join(...outerClass.split(".").filter((segment) => segment.length > 0));
  return extensions.map((extension) => `${base}${extension}`);
}

export async function findSourceFileByClass(
  className: string,
  sourceRoots: readonly string[],
  extensions: readonly string[],
): Promise<string | undefined> {
  if (!className) return undefined;
  const relativePaths = classNameToRelativePaths(className, extensions);

  for (const root of sourceRoots) {
    for (const relativePath of relativePaths) {
      const candidate = resolve(root, relativePath);
      if (await isRegularFile(candidate)) return candidate;
    }
  }

  return undefined;
}

async function searchDirectory(directory: string, fileName: string): Promise<string | undefined> {
  const entries = await readdir(directory, { withFileTypes: true }).catch((error: unknown) => {
    if (isNotFound(error)) return undefined;
    throw new SourceReadError(directory, error);
  });
  if (!entries) return undefined;

  entries.sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    const fullPath = join(directory, entry.name);
    if (entry.isFile() && entry.name === fileName) return fullPath;
    if (entry.isDirectory()) {
      const found = await searchDirectory(fullPath, fileName);
      if (found) return found;
    }
  }

  return undefined;
}

export async function findSourceFileByName(
  fileName: string,
  sourceRoots: readonly string[],
): Promise<string | undefined> {
  if (!fileName) return undefined;

  for (const root of sourceRoots) {
    const found = await searchDirectory(resolve(root), fileName);
    if (found) return found;
  }

  return undefined;
}

export async function readSourceLines(path: string): Promise<string[] | undefined> {
  try {
    return splitSourceLines(await readFile(path, "utf8"));
  } catch (error) {
    if (isNotFound(error)) return undefined;
    throw new SourceReadError(path, error);
  }
}
