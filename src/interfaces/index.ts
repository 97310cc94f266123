export type LogLevel = "TRACE" | "DEBUG" | "INFO" | "WARN" | "ERROR" | "FATAL";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type RawLogRecord = Record<string, JsonValue | undefined>;

export type FrameLike = {
  className: string;
  methodName: string;
  fileName?: string | null;
  lineNumber?: number | null;
  nativeMethod?: boolean;
};

export type ThrowableLike = {
  type: string;
  message?: string | null;
  frames: ReadonlyArray<FrameLike>;
  cause?: ThrowableLike | null;
};

export type LogRecord = {
  timestamp: string;
  level: LogLevel;
  logger?: string;
  message: string;
  stackTrace?: string;
  throwable?: ThrowableLike;
  className?: string;
  methodName?: string;
  fileName?: string;
  lineNumber?: number;
  correlationId?: string;
};

export type StackFrame = {
  className: string;
  methodName: string;
  fileName: string | null;
  // -1 when unknown.
  lineNumber: number;
  nativeMethod: boolean;
};

export type ParsedTrace = {
  exceptionType: string;
  exceptionMessage: string | null;
  frames: StackFrame[];
  cause: ParsedTrace | null;
  // Set on the deepest kept node when further causes were dropped.
  causeTruncated?: boolean;
};

export type SourceLocation = {
  className: string | null;
  methodName: string | null;
  fileName: string | null;
  lineNumber: number | null;
};

export type ClusterSeverity = "LOW" | "MEDIUM" | "HIGH" | "CRITICAL";

export type FingerprintTier = "trace" | "location" | "message";

export type RecordFingerprint = {
  fingerprint: string;
  tier: FingerprintTier;
  trace?: ParsedTrace;
};

export type ErrorCluster = {
  id: string;
  fingerprint: string;
  exceptionType: string | null;
  messageTemplate: string | null;
  primaryLocation: SourceLocation | null;
  records: LogRecord[];
  firstSeen: string;
  lastSeen: string;
  occurrenceCount: number;
  severity: ClusterSeverity;
};

export type CodeContext = {
  filePath: string;
  targetLine: number;
  className: string | null;
  methodName: string | null;
  methodBody: string | null;
  surroundingLines: string[];
  startLine: number;
  endLine: number;
  imports: string[];
  classFields: string[];
};

export type TimeWindow = {
  from?: string;
  to?: string;
};

export type ReadReport = {
  filesScanned: number;
  linesScanned: number;
  recordsRead: number;
  recordsOutsideWindow: number;
  parseErrors: number;
  startedAt: string;
  finishedAt: string;
};

export type ClusterSummary = Omit<ErrorCluster, "records"> & {
  location: string;
  sampleMessages: string[];
  codeContext?: CodeContext;
};

export type AnalysisReport = {
  generatedAt: string;
  totalRecords: number;
  errorRecords: number;
  clusterCount: number;
  merged: boolean;
  window?: TimeWindow;
  clusters: ClusterSummary[];
};
