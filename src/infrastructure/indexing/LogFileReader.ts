import { createReadStream } from "node:fs";
import { readdir } from "node:fs/promises";
import { extname, join, resolve } from "node:path";
import readline from "node:readline";

import type {
  FrameLike,
  JsonValue,
  LogRecord,
  RawLogRecord,
  ReadReport,
  ThrowableLike,
  TimeWindow,
} from "../../interfaces/index.js";

import { compareTimestamps } from "../../usecases/clustering.js";
import { parseLogLevel } from "../../usecases/logLevels.js";

export type LogReadResult = {
  records: LogRecord[];
  report: ReadReport;
};

const LOG_FILE_EXTENSIONS: ReadonlySet<string> = new Set([".ndjson", ".jsonl"]);
const MAX_THROWABLE_DEPTH = 64;
const DURATION_PATTERN = /^(\d+)\s*([smhd])$/i;
const DURATION_UNITS_MS: Readonly<Record<string, number>> = {
  s: 1_000,
  m: 60_000,
  h: 60 * 60_000,
  d: 24 * 60 * 60_000,
};

export function parseDuration(value: string): number {
  const match = DURATION_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid duration "${value}". Expected a number followed by s, m, h or d.`);
  }
  return Number.parseInt(match[1], 10) * DURATION_UNITS_MS[match[2].toLowerCase()];
}

export function windowForLast(duration: string, now = new Date()): TimeWindow {
  return {
    from: new Date(now.getTime() - parseDuration(duration)).toISOString(),
    to: now.toISOString(),
  };
}

function isRecordObject(value: JsonValue | undefined): value is { [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function firstString(record: RawLogRecord, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string" && value.length > 0) return value;
  }
  return undefined;
}

function firstInteger(record: RawLogRecord, keys: readonly string[]): number | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string" && value.trim().length === 0) continue;
    const parsed = typeof value === "string" ? Number(value.trim()) : value;
    if (typeof parsed === "number" && Number.isInteger(parsed)) return parsed;
  }
  return undefined;
}

function normalizeMessage(record: RawLogRecord): string {
  const value = record.message ?? record.msg;
  if (typeof value === "string") return value;
  if (value === undefined || value === null) return "";
  return JSON.stringify(value);
}

function normalizeTimestamp(value: JsonValue | undefined): string {
  if (typeof value === "string" && value.length > 0) return value;
  if (typeof value === "number" && Number.isFinite(value)) return new Date(value).toISOString();
  return new Date().toISOString();
}

function toFrameLike(value: JsonValue): FrameLike | undefined {
  if (!isRecordObject(value)) return undefined;
  const className = firstString(value, ["className", "class"]);
  const methodName = firstString(value, ["methodName", "method"]);
  if (!className || !methodName) return undefined;

  return {
    className,
    methodName,
    fileName: firstString(value, ["fileName", "file"]) ?? null,
    lineNumber: firstInteger(value, ["lineNumber", "line"]) ?? null,
    nativeMethod: value.nativeMethod === true,
  };
}

function toThrowableLike(value: JsonValue | undefined, depth = 0): ThrowableLike | undefined {
  if (!isRecordObject(value) || depth > MAX_THROWABLE_DEPTH) return undefined;
  const type = firstString(value, ["type", "className"]);
  const frames = value.frames;
  if (!type || !Array.isArray(frames)) return undefined;

  const message = value.message;
  return {
    type,
    message: typeof message === "string" ? message : null,
    frames: frames.map(toFrameLike).filter((frame): frame is FrameLike => frame !== undefined),
    cause: toThrowableLike(value.cause, depth + 1) ?? null,
  };
}

export function toLogRecord(raw: RawLogRecord): LogRecord {
  return {
    timestamp: normalizeTimestamp(raw.timestamp ?? raw.time ?? raw["@timestamp"]),
    level: parseLogLevel(raw.level ?? raw.severity),
    logger: firstString(raw, ["logger", "loggerName"]),
    message: normalizeMessage(raw),
    stackTrace: firstString(raw, ["stackTrace", "stack_trace", "exception", "stack"]),
    throwable: toThrowableLike(raw.throwable),
    className: firstString(raw, ["className", "class"]),
    methodName: firstString(raw, ["methodName", "method"]),
    fileName: firstString(raw, ["fileName", "file"]),
    lineNumber: firstInteger(raw, ["lineNumber", "line"]),
    correlationId: firstString(raw, ["correlationId", "traceId", "requestId"]),
  };
}

function isWithinWindow(timestamp: string, window: TimeWindow): boolean {
  if (window.from && compareTimestamps(timestamp, window.from) < 0) return false;
  if (window.to && compareTimestamps(timestamp, window.to) > 0) return false;
  return true;
}

async function listLogFiles(rootPath: string): Promise<string[]> {
  const files: string[] = [];
  const stack = [resolve(rootPath)];

  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) continue;
    const entries = await readdir(current, { withFileTypes: true }).catch((error: unknown) => {
      if (typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT") {
        return [];
      }
      throw error;
    });

    for (const entry of entries) {
      const fullPath = join(current, entry.name);
      if (entry.isDirectory()) {
        stack.push(fullPath);
      } else if (entry.isFile() && LOG_FILE_EXTENSIONS.has(extname(entry.name).toLowerCase())) {
        files.push(fullPath);
      }
    }
  }

  files.sort((a, b) => a.localeCompare(b));
  return files;
}

function createReport(): ReadReport {
  return {
    filesScanned: 0,
    linesScanned: 0,
    recordsRead: 0,
    recordsOutsideWindow: 0,
    parseErrors: 0,
    startedAt: new Date().toISOString(),
    finishedAt: "",
  };
}

export class LogFileReader {
  async readDirectory(logsPath: string, window: TimeWindow = {}): Promise<LogReadResult> {
    const report = createReport();
    const records: LogRecord[] = [];

    const files = await listLogFiles(logsPath);
    report.filesScanned = files.length;

    for (const filePath of files) {
      await this.readFile(filePath, window, records, report);
    }

    report.finishedAt = new Date().toISOString();
    return { records, report };
  }

  private async readFile(
    filePath: string,
    window: TimeWindow,
    records: LogRecord[],
    report: ReadReport,
  ): Promise<void> {
    const stream = createReadStream(filePath, { encoding: "utf8" });
    const reader = readline.createInterface({ input: stream, crlfDelay: Infinity });

    for await (const line of reader) {
      report.linesScanned++;
      const record = this.processLine(line, report);
      if (!record) continue;

      if (!isWithinWindow(record.timestamp, window)) {
        report.recordsOutsideWindow++;
        continue;
      }

      records.push(record);
      report.recordsRead++;
    }
  }

  private processLine(line: string, report: ReadReport): LogRecord | undefined {
    const trimmed = line.trim();
    if (!trimmed) return undefined;

    let parsed: JsonValue;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      report.parseErrors++;
      return undefined;
    }

    if (!isRecordObject(parsed)) {
      report.parseErrors++;
      return undefined;
    }
    return toLogRecord(parsed);
  }
}
