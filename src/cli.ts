import { readFile } from "node:fs/promises";

import {
  type TraceLensOptionsInput,
  resolveConfigFilePath,
  resolveTraceLensOptions,
} from "./application/config/resolveTraceLensOptions.js";
import { ErrorAnalysisService } from "./application/services/ErrorAnalysisService.js";

import { LogFileReader, windowForLast } from "./infrastructure/indexing/LogFileReader.js";
import { CodeContextResolver } from "./infrastructure/source/CodeContextResolver.js";

import type { TimeWindow } from "./interfaces/index.js";

import { formatCodeContext } from "./usecases/codeContext.js";
import { parseStackTrace } from "./usecases/traceParsing.js";

type ParsedArgs = {
  _: string[];
  [key: string]: string | undefined | string[];
};

function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { _: [] };

  for (let i = 0; i < argv.length; i++) {
    const current = argv[i];
    if (!current.startsWith("--")) {
      parsed._.push(current);
      continue;
    }

    const key = current.slice(2);
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) {
      parsed[key] = "true";
      continue;
    }

    parsed[key] = next;
    i++;
  }

  return parsed;
}

function getOptionalArg(args: ParsedArgs, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function getOptionalNumberArg(args: ParsedArgs, key: string): number | undefined {
  const value = args[key];
  if (typeof value !== "string") return undefined;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0) return undefined;
  return parsed;
}

function getOptionalBooleanArg(args: ParsedArgs, key: string): boolean | undefined {
  const value = args[key];
  if (typeof value !== "string" || value.length === 0) return undefined;
  const normalized = value.toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return undefined;
}

function printHelp(): void {
  process.stdout.write(
    [
      "TraceLens CLI",
      "",
      "Commands:",
      "  scan     Read NDJSON logs, cluster error records and attach code context",
      "  parse    Parse a stack trace (from --file or stdin) into JSON",
      "  context  Show the code around a class/file and line",
      "",
      "Flags:",
      "  --config JSON configuration file path (default: ./tracelens.config.json when present)",
      "  --logs   NDJSON log directory (default: ./logs)",
      "  --source-roots Comma separated source roots (default: ./src/main/java)",
      "  --context-lines Lines shown around the target line (default: 10)",
      "  --frames Leading application frames used in a fingerprint (default: 5)",
      "  --last   Only records from the last 45s|30m|1h|7d (scan)",
      "  --from   ISO timestamp lower bound (scan)",
      "  --to     ISO timestamp upper bound (scan)",
      "  --merge  Merge near-duplicate clusters (scan, default: false)",
      "  --threshold Message similarity needed to merge, 0..1 (scan, default: 0.7)",
      "  --limit  Clusters reported (scan, default: 10)",
      "  --no-context Skip code context resolution (scan)",
      "  --file   Stack trace file (parse)",
      "  --class  Fully qualified class name (context)",
      "  --file-name Source file name searched under the roots (context)",
      "  --line   Target line number (context)",
      "",
    ].join("\n"),
  );
}

function resolveOptions(args: ParsedArgs) {
  const overrides: TraceLensOptionsInput = {
    clusterLimit: getOptionalNumberArg(args, "limit"),
    contextLines: getOptionalNumberArg(args, "context-lines"),
    fingerprintFrames: getOptionalNumberArg(args, "frames"),
    logsPath: getOptionalArg(args, "logs"),
    mergeSimilar: getOptionalBooleanArg(args, "merge"),
    similarityThreshold: getOptionalArg(args, "threshold") ? Number(getOptionalArg(args, "threshold")) : undefined,
    sourceRoots: getOptionalArg(args, "source-roots"),
  };

  return resolveTraceLensOptions({
    configFilePath: resolveConfigFilePath(process.argv.slice(2), process.env),
    env: process.env,
    overrides,
  });
}

function resolveWindow(args: ParsedArgs): TimeWindow | undefined {
  const last = getOptionalArg(args, "last");
  if (last) return windowForLast(last);

  const from = getOptionalArg(args, "from");
  const to = getOptionalArg(args, "to");
  if (!from && !to) return undefined;
  return { from, to };
}

async function runScan(args: ParsedArgs): Promise<void> {
  const options = resolveOptions(args);
  const service = new ErrorAnalysisService(options, {
    contextResolver: new CodeContextResolver({
      contextLines: options.contextLines,
      sourceExtensions: options.sourceExtensions,
      sourceRoots: options.sourceRoots,
    }),
    reader: new LogFileReader(),
  });

  const result = await service.scanDirectory(options.logsPath, {
    includeCodeContext: getOptionalBooleanArg(args, "no-context") !== true,
    window: resolveWindow(args),
  });
  process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

async function runParse(args: ParsedArgs): Promise<void> {
  const options = resolveOptions(args);
  const file = getOptionalArg(args, "file");
  const text = file ? await readFile(file, "utf8") : await readStdin();

  const trace = parseStackTrace(text, { maxCauseDepth: options.maxCauseDepth });
  process.stdout.write(`${JSON.stringify({ trace: trace ?? null }, null, 2)}\n`);
}

async function runContext(args: ParsedArgs): Promise<void> {
  const options = resolveOptions(args);
  const line = getOptionalNumberArg(args, "line");
  if (line === undefined) throw new Error("Missing or invalid --line.");

  const resolver = new CodeContextResolver({
    contextLines: options.contextLines,
    sourceExtensions: options.sourceExtensions,
    sourceRoots: options.sourceRoots,
  });

  const className = getOptionalArg(args, "class");
  const fileName = getOptionalArg(args, "file-name");
  if (!className && !fileName) throw new Error("Provide --class or --file-name.");

  const context = className
    ? await resolver.resolveByClass(className, line)
    : await resolver.resolveByFileName(fileName ?? "", line);

  process.stdout.write(
    `${JSON.stringify({ context: context ?? null, excerpt: context ? formatCodeContext(context) : null }, null, 2)}\n`,
  );
  if (!context) process.exitCode = 2;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const command = args._[0];

  if (!command || command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return;
  }

  if (command === "scan") {
    await runScan(args);
    return;
  }

  if (command === "parse") {
    await runParse(args);
    return;
  }

  if (command === "context") {
    await runContext(args);
    return;
  }

  printHelp();
  process.exitCode = 1;
}

main().catch((error) => {
  process.stderr.write(
    `[tracelens] fatal: ${error instanceof Error ? error.stack || error.message : String(error)}\n`,
  );
  process.exit(1);
});
