import type { FrameLike, ParsedTrace, StackFrame, ThrowableLike } from "../interfaces/index.js";

import type { FrameClassifier } from "./frameClassification.js";

export type TraceParseOptions = {
  maxCauseDepth?: number;
};

export const DEFAULT_MAX_CAUSE_DEPTH = 64;

const EXCEPTION_PATTERN = /^([\w.$]+(?:Exception|Error|Throwable))(?::\s*(.*))?$/;
// Tolerates module/classloader segments (java.base/, app//) and logback packaging hints (~[app.jar:1.0]).
const FRAME_PATTERN = /^\s*at\s+(?:[\w.$@-]*\/)*([\w.$]+)\.([\w$<>]+)\(([^)]+)\)(?:\s+~?\[[^\]]*\])?\s*$/;
const CAUSED_BY_PATTERN = /^\s*Caused by:\s*(.+)$/;
const MORE_PATTERN = /^\s*\.\.\.\s*\d+\s+more\s*$/;
const LINE_NUMBER_PATTERN = /^\d+$/;

type TraceHeader = {
  exceptionType: string;
  exceptionMessage: string | null;
};

function resolveMaxCauseDepth(options: TraceParseOptions): number {
  const value = options.maxCauseDepth;
  if (value === undefined || !Number.isFinite(value) || value < 0) return DEFAULT_MAX_CAUSE_DEPTH;
  return Math.trunc(value);
}

function parseHeader(line: string): TraceHeader {
  const trimmed = line.trim();
  const match = EXCEPTION_PATTERN.exec(trimmed);
  if (match) {
    return { exceptionType: match[1], exceptionMessage: match[2] ?? null };
  }

  const colonIndex = trimmed.indexOf(":");
  if (colonIndex > 0) {
    return {
      exceptionType: trimmed.slice(0, colonIndex).trim(),
      exceptionMessage: trimmed.slice(colonIndex + 1).trim(),
    };
  }

  return { exceptionType: trimmed, exceptionMessage: null };
}

function parseLocation(location: string): Pick<StackFrame, "fileName" | "lineNumber" | "nativeMethod"> {
  if (location === "Native Method") return { fileName: null, lineNumber: -1, nativeMethod: true };
  if (location === "Unknown Source") return { fileName: null, lineNumber: -1, nativeMethod: false };

  const colonIndex = location.lastIndexOf(":");
  if (colonIndex <= 0) return { fileName: location, lineNumber: -1, nativeMethod: false };

  const lineText = location.slice(colonIndex + 1).trim();
  return {
    fileName: location.slice(0, colonIndex),
    lineNumber: LINE_NUMBER_PATTERN.test(lineText) ? Number.parseInt(lineText, 10) : -1,
    nativeMethod: false,
  };
}

export function parseFrameLine(line: string): StackFrame | undefined {
  const match = FRAME_PATTERN.exec(line);
  if (!match) return undefined;

  return {
    className: match[1],
    methodName: match[2],
    ...parseLocation(match[3].trim()),
  };
}

function linkChain(nodes: ParsedTrace[], truncated: boolean): ParsedTrace | undefined {
  for (let index = nodes.length - 1; index > 0; index--) {
    nodes[index - 1].cause = nodes[index];
  }
  const deepest = nodes[nodes.length - 1];
  if (truncated && deepest) deepest.causeTruncated = true;
  return nodes[0];
}

export function parseStackTrace(
  text: string | null | undefined,
  options: TraceParseOptions = {},
): ParsedTrace | undefined {
  if (!text || text.trim().length === 0) return undefined;

  const maxCauseDepth = resolveMaxCauseDepth(options);
  const lines = text.split(/\r?\n/);
  let index = lines.findIndex((line) => line.trim().length > 0);
  let header: string | undefined = lines[index];
  index++;

  const nodes: ParsedTrace[] = [];
  let truncated = false;

  while (header !== undefined) {
    if (nodes.length > maxCauseDepth) {
      truncated = true;
      break;
    }

    const node: ParsedTrace = { ...parseHeader(header), frames: [], cause: null };
    nodes.push(node);
    header = undefined;

    while (index < lines.length) {
      const line = lines[index];

      const causedBy = CAUSED_BY_PATTERN.exec(line);
      if (causedBy) {
        header = causedBy[1];
        index++;
        break;
      }

      if (MORE_PATTERN.test(line)) {
        index++;
        continue;
      }

      const frame = parseFrameLine(line);
      if (!frame) break;
      node.frames.push(frame);
      index++;
    }
  }

  return linkChain(nodes, truncated);
}

function toStackFrame(frame: FrameLike): StackFrame {
  const lineNumber = frame.lineNumber;
  return {
    className: frame.className,
    methodName: frame.methodName,
    fileName: frame.fileName ?? null,
    lineNumber: typeof lineNumber === "number" && Number.isInteger(lineNumber) ? lineNumber : -1,
    nativeMethod: frame.nativeMethod === true,
  };
}

export function parseThrowable(
  throwable: ThrowableLike | null | undefined,
  options: TraceParseOptions = {},
): ParsedTrace | undefined {
  if (!throwable) return undefined;

  const maxCauseDepth = resolveMaxCauseDepth(options);
  const visited = new Set<ThrowableLike>();
  const nodes: ParsedTrace[] = [];
  let truncated = false;
  let current: ThrowableLike | null | undefined = throwable;

  while (current && !visited.has(current)) {
    if (nodes.length > maxCauseDepth) {
      truncated = true;
      break;
    }
    visited.add(current);
    nodes.push({
      exceptionType: current.type,
      exceptionMessage: current.message ?? null,
      frames: current.frames.map(toStackFrame),
      cause: null,
    });
    current = current.cause;
  }

  return linkChain(nodes, truncated || Boolean(current));
}

export function extractExceptionLine(text: string | null | undefined): string | undefined {
  if (!text) return undefined;
  const line = text.split(/\r?\n/).find((candidate) => candidate.trim().length > 0);
  return line?.trim();
}

export function extractExceptionType(text: string | null | undefined): string | undefined {
  const line = extractExceptionLine(text);
  if (line === undefined) return undefined;
  return parseHeader(line).exceptionType;
}

export function causeChain(trace: ParsedTrace): ParsedTrace[] {
  const chain: ParsedTrace[] = [];
  let current: ParsedTrace | null = trace;
  while (current) {
    chain.push(current);
    current = current.cause;
  }
  return chain;
}

export function rootCause(trace: ParsedTrace): ParsedTrace {
  const chain = causeChain(trace);
  return chain[chain.length - 1];
}

export function userFrames(trace: ParsedTrace, classifier: FrameClassifier): StackFrame[] {
  return trace.frames.filter((frame) => !classifier.isFrameworkFrame(frame.className));
}

export function topUserFrames(
  trace: ParsedTrace,
  classifier: FrameClassifier,
  count: number,
): StackFrame[] {
  return userFrames(trace, classifier).slice(0, Math.max(0, count));
}

export function firstUserFrame(
  trace: ParsedTrace,
  classifier: FrameClassifier,
): StackFrame | undefined {
  return trace.frames.find((frame) => !classifier.isFrameworkFrame(frame.className));
}

export function frameKey(frame: Pick<StackFrame, "className" | "methodName" | "lineNumber">): string {
  return `${frame.className}.${frame.methodName}:${frame.lineNumber}`;
}

export function formatFrame(frame: StackFrame): string {
  const target = `${frame.className}.${frame.methodName}`;
  if (frame.nativeMethod) return `${target}(Native Method)`;
  if (frame.fileName && frame.lineNumber >= 0) return `${target}(${frame.fileName}:${frame.lineNumber})`;
  if (frame.fileName) return `${target}(${frame.fileName})`;
  return `${target}(Unknown Source)`;
}

export function formatStackTrace(trace: ParsedTrace): string {
  return causeChain(trace)
    .map((node, index) => {
      const header =
        node.exceptionMessage !== null
          ? `${node.exceptionType}: ${node.exceptionMessage}`
          : node.exceptionType;
      const frames = node.frames.map((frame) => `\tat ${formatFrame(frame)}`);
      return [index === 0 ? header : `Caused by: ${header}`, ...frames].join("\n");
    })
    .join("\n");
}
