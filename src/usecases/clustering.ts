import type {
  ClusterSeverity,
  ErrorCluster,
  LogRecord,
  ParsedTrace,
  SourceLocation,
} from "../interfaces/index.js";

import { computeShortId, type FingerprintEngine, normalizeMessage } from "./fingerprinting.js";
import type { FrameClassifier } from "./frameClassification.js";
import { isErrorLevel } from "./logLevels.js";
import { firstUserFrame } from "./traceParsing.js";

export type ClusterEngine = {
  cluster(records: ReadonlyArray<LogRecord>): ErrorCluster[];
};

export type RecordContribution = {
  exceptionType?: string;
  messageTemplate?: string;
  location?: SourceLocation;
};

const SEVERITY_THRESHOLDS: ReadonlyArray<[number, ClusterSeverity]> = [
  [100, "CRITICAL"],
  [50, "HIGH"],
  [10, "MEDIUM"],
];

export function classifySeverity(occurrenceCount: number): ClusterSeverity {
  for (const [threshold, severity] of SEVERITY_THRESHOLDS) {
    if (occurrenceCount >= threshold) return severity;
  }
  return "LOW";
}

export function compareTimestamps(a: string, b: string): number {
  const left = Date.parse(a);
  const right = Date.parse(b);
  if (Number.isNaN(left) || Number.isNaN(right)) return a.localeCompare(b);
  return left - right;
}

export function createEmptyCluster(fingerprint: string): ErrorCluster {
  return {
    id: computeShortId(fingerprint),
    fingerprint,
    exceptionType: null,
    messageTemplate: null,
    primaryLocation: null,
    records: [],
    firstSeen: "",
    lastSeen: "",
    occurrenceCount: 0,
    severity: "LOW",
  };
}

export function applyRecord(
  cluster: ErrorCluster,
  record: LogRecord,
  contribution: RecordContribution = {},
): ErrorCluster {
  cluster.records.push(record);
  cluster.occurrenceCount = cluster.records.length;

  if (!cluster.firstSeen || compareTimestamps(record.timestamp, cluster.firstSeen) < 0) {
    cluster.firstSeen = record.timestamp;
  }
  if (!cluster.lastSeen || compareTimestamps(record.timestamp, cluster.lastSeen) > 0) {
    cluster.lastSeen = record.timestamp;
  }

  if (cluster.exceptionType === null && contribution.exceptionType) {
    cluster.exceptionType = contribution.exceptionType;
  }
  if (cluster.messageTemplate === null && contribution.messageTemplate) {
    cluster.messageTemplate = contribution.messageTemplate;
  }
  if (cluster.primaryLocation === null && contribution.location) {
    cluster.primaryLocation = contribution.location;
  }

  return cluster;
}

export function resolveRecordLocation(
  record: LogRecord,
  trace: ParsedTrace | undefined,
  classifier: FrameClassifier,
): SourceLocation | undefined {
  if (record.className || record.fileName) {
    return {
      className: record.className ?? null,
      methodName: record.methodName ?? null,
      fileName: record.fileName ?? null,
      lineNumber: record.lineNumber ?? null,
    };
  }

  const frame = trace ? firstUserFrame(trace, classifier) : undefined;
  if (!frame) return undefined;
  return {
    className: frame.className,
    methodName: frame.methodName,
    fileName: frame.fileName,
    lineNumber: frame.lineNumber >= 0 ? frame.lineNumber : null,
  };
}

export function finalizeClusters(clusters: Iterable<ErrorCluster>): ErrorCluster[] {
  const finalized = [...clusters];
  for (const cluster of finalized) {
    cluster.severity = classifySeverity(cluster.occurrenceCount);
  }
  return finalized.sort((a, b) => b.occurrenceCount - a.occurrenceCount);
}

export function createClusterEngine(fingerprinter: FingerprintEngine): ClusterEngine {
  return {
    cluster(records) {
      const clusters = new Map<string, ErrorCluster>();

      for (const record of records) {
        if (!isErrorLevel(record.level)) continue;

        const { fingerprint, trace } = fingerprinter.describeRecord(record);
        const cluster = clusters.get(fingerprint) ?? createEmptyCluster(fingerprint);
        const template = normalizeMessage(record.message);

        clusters.set(
          fingerprint,
          applyRecord(cluster, record, {
            exceptionType: trace?.exceptionType,
            messageTemplate: template.length > 0 ? template : undefined,
            location: resolveRecordLocation(record, trace, fingerprinter.classifier),
          }),
        );
      }

      return finalizeClusters(clusters.values());
    },
  };
}

export function formatClusterLocation(cluster: Pick<ErrorCluster, "primaryLocation">): string {
  const location = cluster.primaryLocation;
  if (!location) return "";
  let formatted = location.className ?? "";
  if (location.methodName) formatted += `.${location.methodName}`;
  if (location.lineNumber !== null) formatted += `:${location.lineNumber}`;
  return formatted;
}

export function mostRecentRecord(cluster: Pick<ErrorCluster, "records">): LogRecord | undefined {
  let latest: LogRecord | undefined;
  for (const record of cluster.records) {
    if (!latest || compareTimestamps(record.timestamp, latest.timestamp) > 0) latest = record;
  }
  return latest;
}

export function sampleRecords(cluster: Pick<ErrorCluster, "records">, maxSamples: number): LogRecord[] {
  const records = cluster.records;
  const limit = Math.max(0, Math.trunc(maxSamples));
  if (records.length <= limit) return [...records];
  if (limit === 0) return [];
  if (limit === 1) return [records[0]];

  const step = Math.floor(records.length / (limit - 1));
  const samples = [records[0]];
  for (let index = 1; index < limit - 1; index++) {
    samples.push(records[index * step]);
  }
  samples.push(records[records.length - 1]);
  return samples;
}
