export * from "./interfaces/index.js";

export {
  DEFAULT_TRACELENS_CONFIG_FILE_PATH,
  resolveConfigFilePath,
  resolveTraceLensOptions,
  type ResolveTraceLensOptionsInput,
  type TraceLensOptions,
  type TraceLensOptionsInput,
} from "./application/config/resolveTraceLensOptions.js";
export {
  type AnalyzeOptions,
  ErrorAnalysisService,
  type ScanResult,
} from "./application/services/ErrorAnalysisService.js";

export { createLogger, type Logger } from "./infrastructure/frameworks/log.js";
export {
  LogFileReader,
  type LogReadResult,
  parseDuration,
  toLogRecord,
  windowForLast,
} from "./infrastructure/indexing/LogFileReader.js";
export {
  CodeContextResolver,
  type CodeContextResolverOptions,
  DEFAULT_SOURCE_EXTENSIONS,
} from "./infrastructure/source/CodeContextResolver.js";
export { SourceReadError } from "./infrastructure/source/sourceFiles.js";

export {
  applyRecord,
  classifySeverity,
  type ClusterEngine,
  createClusterEngine,
  formatClusterLocation,
  mostRecentRecord,
  sampleRecords,
} from "./usecases/clustering.js";
export {
  DEFAULT_CONTEXT_LINES,
  extractCodeContext,
  formatCodeContext,
} from "./usecases/codeContext.js";
export {
  computeShortId,
  createFingerprintEngine,
  DEFAULT_FINGERPRINT_FRAMES,
  type FingerprintEngine,
  type FingerprintOptions,
  normalizeMessage,
} from "./usecases/fingerprinting.js";
export {
  createFrameClassifier,
  DEFAULT_FRAMEWORK_PREFIXES,
  type FrameClassifier,
} from "./usecases/frameClassification.js";
export { isErrorLevel, parseLogLevel } from "./usecases/logLevels.js";
export {
  DEFAULT_SIMILARITY_THRESHOLD,
  levenshteinDistance,
  mergeSimilarClusters,
  messageSimilarity,
  shouldMergeClusters,
} from "./usecases/merging.js";
export {
  causeChain,
  DEFAULT_MAX_CAUSE_DEPTH,
  extractExceptionType,
  formatStackTrace,
  parseStackTrace,
  parseThrowable,
  rootCause,
  type TraceParseOptions,
} from "./usecases/traceParsing.js";
