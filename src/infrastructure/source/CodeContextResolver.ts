import { resolve } from "node:path";

import type { CodeContext, SourceLocation } from "../../interfaces/index.js";

import { DEFAULT_CONTEXT_LINES, extractCodeContext } from "../../usecases/codeContext.js";
import { createLogger, type Logger } from "../frameworks/log.js";
import { findSourceFileByClass, findSourceFileByName, readSourceLines } from "./sourceFiles.js";

export type CodeContextResolverOptions = {
  sourceRoots: readonly string[];
  contextLines?: number;
  sourceExtensions?: readonly string[];
  logger?: Logger;
};

export const DEFAULT_SOURCE_EXTENSIONS: readonly string[] = [".java"];

export class CodeContextResolver {
  private readonly sourceRoots: string[];
  private readonly contextLines: number;
  private readonly sourceExtensions: readonly string[];
  private readonly logger: Logger;

  constructor(options: CodeContextResolverOptions) {
    this.sourceRoots = options.sourceRoots.map((root) => resolve(root));
    this.contextLines = options.contextLines ?? DEFAULT_CONTEXT_LINES;
    this.sourceExtensions =
      options.sourceExtensions && options.sourceExtensions.length > 0
        ? options.sourceExtensions
        : DEFAULT_SOURCE_EXTENSIONS;
    this.logger = options.logger ?? createLogger("code-context");
  }

  async resolveByClass(className: string, lineNumber: number): Promise<CodeContext | undefined> {
    const path = await findSourceFileByClass(className, this.sourceRoots, this.sourceExtensions);
    if (!path) {
      this.logger.debug("source file not found for class", { className });
      return undefined;
    }
    return this.resolveFromFile(path, lineNumber);
  }

  async resolveByFileName(fileName: string, lineNumber: number): Promise<CodeContext | undefined> {
    const path = await findSourceFileByName(fileName, this.sourceRoots);
    if (!path) {
      this.logger.debug("source file not found", { fileName });
      return undefined;
    }
    return this.resolveFromFile(path, lineNumber);
  }

  async resolveLocation(location: SourceLocation): Promise<CodeContext | undefined> {
    if (location.lineNumber === null || location.lineNumber < 1) return undefined;

    if (location.className) {
      const byClass = await this.resolveByClass(location.className, location.lineNumber);
      if (byClass) return byClass;
    }
    if (location.fileName) return this.resolveByFileName(location.fileName, location.lineNumber);
    return undefined;
  }

  async resolveFromFile(path: string, lineNumber: number): Promise<CodeContext | undefined> {
    const lines = await readSourceLines(path);
    if (!lines) return undefined;

    const context = extractCodeContext(path, lines, lineNumber, this.contextLines);
    if (!context) {
      this.logger.warn("line number out of range", { path, lineNumber, lineCount: lines.length });
    }
    return context;
  }
}
