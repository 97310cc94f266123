import { MikroConf } from "mikroconf";

import { DEFAULT_SOURCE_EXTENSIONS } from "../../infrastructure/source/CodeContextResolver.js";
import { DEFAULT_CONTEXT_LINES } from "../../usecases/codeContext.js";
import { DEFAULT_FINGERPRINT_FRAMES } from "../../usecases/fingerprinting.js";
import { DEFAULT_FRAMEWORK_PREFIXES } from "../../usecases/frameClassification.js";
import { DEFAULT_SIMILARITY_THRESHOLD } from "../../usecases/merging.js";
import { DEFAULT_MAX_CAUSE_DEPTH } from "../../usecases/traceParsing.js";

export type TraceLensOptions = {
  clusterLimit: number;
  contextLines: number;
  fingerprintFrames: number;
  frameworkPrefixes: string[];
  logsPath: string;
  maxCauseDepth: number;
  mergeSimilar: boolean;
  similarityThreshold: number;
  sourceExtensions: string[];
  sourceRoots: string[];
};

export type TraceLensOptionsInput = {
  [Key in keyof TraceLensOptions]?: TraceLensOptions[Key] extends string[]
    ? string[] | string
    : TraceLensOptions[Key];
};

export type ResolveTraceLensOptionsInput = {
  configFilePath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: TraceLensOptionsInput;
};

export const DEFAULT_TRACELENS_CONFIG_FILE_PATH = "tracelens.config.json";

const DEFAULT_OPTIONS: TraceLensOptions = {
  clusterLimit: 10,
  contextLines: DEFAULT_CONTEXT_LINES,
  fingerprintFrames: DEFAULT_FINGERPRINT_FRAMES,
  frameworkPrefixes: [...DEFAULT_FRAMEWORK_PREFIXES],
  logsPath: "./logs",
  maxCauseDepth: DEFAULT_MAX_CAUSE_DEPTH,
  mergeSimilar: false,
  similarityThreshold: DEFAULT_SIMILARITY_THRESHOLD,
  sourceExtensions: [...DEFAULT_SOURCE_EXTENSIONS],
  sourceRoots: ["./src/main/java"],
};

function asTrimmedString(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function asBoolean(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") {
    if (value === 1) return true;
    if (value === 0) return false;
    return undefined;
  }
  if (typeof value !== "string") return undefined;

  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(normalized)) return true;
  if (["false", "0", "no", "off"].includes(normalized)) return false;
  return undefined;
}

function asNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  if (trimmed.length === 0) return undefined;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function asInteger(value: unknown): number | undefined {
  const parsed = asNumber(value);
  if (parsed === undefined) return undefined;
  return Math.trunc(parsed);
}

function asStringList(value: unknown): string[] | undefined {
  const items = Array.isArray(value)
    ? value.filter((item): item is string => typeof item === "string")
    : typeof value === "string"
      ? value.split(",")
      : undefined;
  if (!items) return undefined;

  const trimmed = items.map((item) => item.trim()).filter((item) => item.length > 0);
  return trimmed.length > 0 ? trimmed : undefined;
}

function withoutUndefined(value: TraceLensOptionsInput): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== undefined));
}

function readEnvOptions(env: NodeJS.ProcessEnv): Record<string, unknown> {
  return withoutUndefined({
    clusterLimit: asInteger(env.TRACELENS_CLUSTER_LIMIT),
    contextLines: asInteger(env.TRACELENS_CONTEXT_LINES),
    fingerprintFrames: asInteger(env.TRACELENS_FINGERPRINT_FRAMES),
    frameworkPrefixes: asStringList(env.TRACELENS_FRAMEWORK_PREFIXES),
    logsPath: asTrimmedString(env.TRACELENS_LOGS_PATH),
    maxCauseDepth: asInteger(env.TRACELENS_MAX_CAUSE_DEPTH),
    mergeSimilar: asBoolean(env.TRACELENS_MERGE_SIMILAR),
    similarityThreshold: asNumber(env.TRACELENS_SIMILARITY_THRESHOLD),
    sourceExtensions: asStringList(env.TRACELENS_SOURCE_EXTENSIONS),
    sourceRoots: asStringList(env.TRACELENS_SOURCE_ROOTS),
  });
}

function positiveInteger(value: unknown, fallback: number, minimum = 1): number {
  const parsed = asInteger(value);
  return parsed !== undefined && parsed >= minimum ? parsed : fallback;
}

function normalizeOptions(value: Record<string, unknown>): TraceLensOptions {
  const threshold = asNumber(value.similarityThreshold);

  return {
    clusterLimit: positiveInteger(value.clusterLimit, DEFAULT_OPTIONS.clusterLimit),
    contextLines: positiveInteger(value.contextLines, DEFAULT_OPTIONS.contextLines, 0),
    fingerprintFrames: positiveInteger(value.fingerprintFrames, DEFAULT_OPTIONS.fingerprintFrames),
    frameworkPrefixes: asStringList(value.frameworkPrefixes) ?? DEFAULT_OPTIONS.frameworkPrefixes,
    logsPath: asTrimmedString(value.logsPath) ?? DEFAULT_OPTIONS.logsPath,
    maxCauseDepth: positiveInteger(value.maxCauseDepth, DEFAULT_OPTIONS.maxCauseDepth, 0),
    mergeSimilar: asBoolean(value.mergeSimilar) ?? DEFAULT_OPTIONS.mergeSimilar,
    similarityThreshold:
      threshold !== undefined && threshold >= 0 && threshold <= 1
        ? threshold
        : DEFAULT_OPTIONS.similarityThreshold,
    sourceExtensions: asStringList(value.sourceExtensions) ?? DEFAULT_OPTIONS.sourceExtensions,
    sourceRoots: asStringList(value.sourceRoots) ?? DEFAULT_OPTIONS.sourceRoots,
  };
}

function defaultsAsConfigOptions() {
  return Object.entries(DEFAULT_OPTIONS).map(([path, defaultValue]) => ({
    defaultValue: Array.isArray(defaultValue) ? defaultValue.join(",") : defaultValue,
    path,
  }));
}

export function resolveConfigFilePath(args: string[], env: NodeJS.ProcessEnv = process.env): string {
  for (let index = 0; index < args.length; index++) {
    if (args[index] !== "--config") continue;
    const candidate = args[index + 1];
    if (candidate && !candidate.startsWith("-")) {
      return candidate;
    }
  }

  return asTrimmedString(env.TRACELENS_CONFIG_PATH) ?? DEFAULT_TRACELENS_CONFIG_FILE_PATH;
}

// Precedence: defaults < config file < environment < direct overrides.
export function resolveTraceLensOptions(input: ResolveTraceLensOptionsInput = {}): TraceLensOptions {
  const env = input.env ?? process.env;
  const configFilePath =
    input.configFilePath ??
    asTrimmedString(env.TRACELENS_CONFIG_PATH) ??
    DEFAULT_TRACELENS_CONFIG_FILE_PATH;

  const config = new MikroConf({
    config: {
      ...readEnvOptions(env),
      ...withoutUndefined(input.overrides ?? {}),
    },
    configFilePath,
    options: defaultsAsConfigOptions(),
  });

  return normalizeOptions(config.get<Record<string, unknown>>());
}
