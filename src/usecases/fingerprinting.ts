import type { LogRecord, ParsedTrace, RecordFingerprint } from "../interfaces/index.js";

import { createFrameClassifier, type FrameClassifier } from "./frameClassification.js";
import {
  frameKey,
  parseStackTrace,
  parseThrowable,
  type TraceParseOptions,
  topUserFrames,
} from "./traceParsing.js";

export type FingerprintOptions = TraceParseOptions & {
  classifier?: FrameClassifier;
  frameCount?: number;
};

export type FingerprintEngine = {
  readonly classifier: FrameClassifier;
  readonly frameCount: number;
  describeRecord(record: LogRecord): RecordFingerprint;
  fingerprint(record: LogRecord): string;
  fingerprintTrace(trace: ParsedTrace): string | undefined;
  parseRecordTrace(record: LogRecord): ParsedTrace | undefined;
};

export const DEFAULT_FINGERPRINT_FRAMES = 5;
export const EMPTY_MESSAGE_FINGERPRINT = "<EMPTY>";

// Applied in order on the evolving string: later patterns must not re-match earlier placeholders.
const MESSAGE_SUBSTITUTIONS: ReadonlyArray<[RegExp, string]> = [
  [/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi, "<UUID>"],
  [/\b\d{6,}\b/g, "<ID>"],
  [/\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}:\d{2}(?:[.,]\d+)?(?:Z|[+-]\d{2}:?\d{2})?/g, "<TIMESTAMP>"],
  [/\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/g, "<IP>"],
  [/[\w.+-]+@[\w.-]+\.[a-zA-Z]{2,}/g, "<EMAIL>"],
  [/"[^"]+"/g, '"<STRING>"'],
  [/'[^']+'/g, "'<STRING>'"],
];

export function normalizeMessage(message: string | null | undefined): string {
  if (!message) return "";
  let normalized = message;
  for (const [pattern, placeholder] of MESSAGE_SUBSTITUTIONS) {
    normalized = normalized.replace(pattern, placeholder);
  }
  return normalized.trim();
}

export function computeShortId(fingerprint: string): string {
  let hash = 0;
  for (let index = 0; index < fingerprint.length; index++) {
    hash = (Math.imul(31, hash) + fingerprint.charCodeAt(index)) | 0;
  }
  return `ERR-${(hash >>> 0).toString(16).toUpperCase().padStart(8, "0")}`;
}

function locationFingerprint(record: LogRecord): string {
  let fingerprint = record.className ?? "";
  if (record.methodName) fingerprint += `.${record.methodName}`;
  if (record.lineNumber !== undefined) fingerprint += `:${record.lineNumber}`;
  return fingerprint;
}

export function createFingerprintEngine(options: FingerprintOptions = {}): FingerprintEngine {
  const classifier = options.classifier ?? createFrameClassifier();
  const frameCount =
    options.frameCount !== undefined && Number.isFinite(options.frameCount) && options.frameCount > 0
      ? Math.trunc(options.frameCount)
      : DEFAULT_FINGERPRINT_FRAMES;
  const parseOptions: TraceParseOptions = { maxCauseDepth: options.maxCauseDepth };

  const parseRecordTrace = (record: LogRecord): ParsedTrace | undefined => {
    if (record.throwable) return parseThrowable(record.throwable, parseOptions);
    return parseStackTrace(record.stackTrace, parseOptions);
  };

  const fingerprintTrace = (trace: ParsedTrace): string | undefined => {
    const frames = topUserFrames(trace, classifier, frameCount);
    if (frames.length === 0) return undefined;
    return [trace.exceptionType || "Unknown", ...frames.map(frameKey)].join("|");
  };

  const describeRecord = (record: LogRecord): RecordFingerprint => {
    const trace = parseRecordTrace(record);

    const fromTrace = trace ? fingerprintTrace(trace) : undefined;
    if (fromTrace) return { fingerprint: fromTrace, tier: "trace", trace };

    const fromLocation = locationFingerprint(record);
    if (fromLocation.length > 0) return { fingerprint: fromLocation, tier: "location", trace };

    const template = normalizeMessage(record.message);
    return {
      fingerprint: template.length > 0 ? template : EMPTY_MESSAGE_FINGERPRINT,
      tier: "message",
      trace,
    };
  };

  return {
    classifier,
    frameCount,
    describeRecord,
    fingerprint: (record) => describeRecord(record).fingerprint,
    fingerprintTrace,
    parseRecordTrace,
  };
}
