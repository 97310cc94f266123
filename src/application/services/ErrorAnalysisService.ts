import type { LogReadResult, LogFileReader } from "../../infrastructure/indexing/LogFileReader.js";
import type { CodeContextResolver } from "../../infrastructure/source/CodeContextResolver.js";
import type {
  AnalysisReport,
  ClusterSummary,
  ErrorCluster,
  LogRecord,
  TimeWindow,
} from "../../interfaces/index.js";

import { createLogger, type Logger } from "../../infrastructure/frameworks/log.js";
import {
  type ClusterEngine,
  createClusterEngine,
  formatClusterLocation,
  sampleRecords,
} from "../../usecases/clustering.js";
import { createFingerprintEngine } from "../../usecases/fingerprinting.js";
import { createFrameClassifier } from "../../usecases/frameClassification.js";
import { isErrorLevel } from "../../usecases/logLevels.js";
import { mergeSimilarClusters } from "../../usecases/merging.js";

import type { TraceLensOptions } from "../config/resolveTraceLensOptions.js";

export type AnalyzeOptions = {
  clusterLimit?: number;
  includeCodeContext?: boolean;
  mergeSimilar?: boolean;
  window?: TimeWindow;
};

export type ScanResult = {
  analysis: AnalysisReport;
  read: LogReadResult["report"];
};

type ErrorAnalysisServiceDependencies = {
  contextResolver?: CodeContextResolver;
  logger?: Logger;
  reader?: LogFileReader;
};

const SAMPLE_MESSAGES = 3;

type AnalysisSettings = Pick<
  TraceLensOptions,
  "clusterLimit" | "fingerprintFrames" | "frameworkPrefixes" | "maxCauseDepth" | "mergeSimilar" | "similarityThreshold"
>;

export class ErrorAnalysisService {
  private readonly engine: ClusterEngine;
  private readonly logger: Logger;

  constructor(
    private readonly settings: AnalysisSettings,
    private readonly dependencies: ErrorAnalysisServiceDependencies = {},
  ) {
    const fingerprinter = createFingerprintEngine({
      classifier: createFrameClassifier(settings.frameworkPrefixes),
      frameCount: settings.fingerprintFrames,
      maxCauseDepth: settings.maxCauseDepth,
    });
    this.engine = createClusterEngine(fingerprinter);
    this.logger = dependencies.logger ?? createLogger("analysis");
  }

  clusterRecords(records: ReadonlyArray<LogRecord>, mergeSimilar = this.settings.mergeSimilar): ErrorCluster[] {
    const clusters = this.engine.cluster(records);
    if (!mergeSimilar) return clusters;

    const merged = mergeSimilarClusters(clusters, {
      similarityThreshold: this.settings.similarityThreshold,
    });
    this.logger.debug("merged similar clusters", { before: clusters.length, after: merged.length });
    return merged;
  }

  async analyze(records: ReadonlyArray<LogRecord>, options: AnalyzeOptions = {}): Promise<AnalysisReport> {
    const mergeSimilar = options.mergeSimilar ?? this.settings.mergeSimilar;
    const limit = Math.max(1, Math.trunc(options.clusterLimit ?? this.settings.clusterLimit));
    const includeCodeContext = options.includeCodeContext ?? true;

    const clusters = this.clusterRecords(records, mergeSimilar);
    const summaries: ClusterSummary[] = [];
    for (const cluster of clusters.slice(0, limit)) {
      summaries.push(await this.summarize(cluster, includeCodeContext));
    }

    return {
      generatedAt: new Date().toISOString(),
      totalRecords: records.length,
      errorRecords: records.filter((record) => isErrorLevel(record.level)).length,
      clusterCount: clusters.length,
      merged: mergeSimilar,
      window: options.window,
      clusters: summaries,
    };
  }

  async scanDirectory(logsPath: string, options: AnalyzeOptions = {}): Promise<ScanResult> {
    const reader = this.dependencies.reader;
    if (!reader) throw new Error("ErrorAnalysisService.scanDirectory requires a LogFileReader.");

    const { records, report } = await reader.readDirectory(logsPath, options.window);
    if (report.parseErrors > 0) {
      this.logger.warn("skipped unparseable log lines", { logsPath, parseErrors: report.parseErrors });
    }

    return {
      analysis: await this.analyze(records, options),
      read: report,
    };
  }

  private async summarize(cluster: ErrorCluster, includeCodeContext: boolean): Promise<ClusterSummary> {
    const { records, ...rest } = cluster;
    const summary: ClusterSummary = {
      ...rest,
      location: formatClusterLocation(cluster),
      sampleMessages: sampleRecords({ records }, SAMPLE_MESSAGES).map((record) => record.message),
    };

    const resolver = this.dependencies.contextResolver;
    if (!includeCodeContext || !resolver || !cluster.primaryLocation) return summary;

    const codeContext = await resolver.resolveLocation(cluster.primaryLocation);
    if (codeContext) summary.codeContext = codeContext;
    return summary;
  }
}
