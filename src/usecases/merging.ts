import type { ErrorCluster } from "../interfaces/index.js";

import { compareTimestamps, finalizeClusters } from "./clustering.js";
import { normalizeMessage } from "./fingerprinting.js";

export type MergeOptions = {
  similarityThreshold?: number;
};

export const DEFAULT_SIMILARITY_THRESHOLD = 0.7;

export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, index) => index);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    current[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a.charCodeAt(i - 1) === b.charCodeAt(j - 1) ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length];
}

export function messageSimilarity(a: string | null | undefined, b: string | null | undefined): number {
  if (a === null || a === undefined || b === null || b === undefined) return 0;
  if (a === b) return 1;
  const maxLength = Math.max(a.length, b.length);
  return 1 - levenshteinDistance(a, b) / maxLength;
}

function sameLocation(a: ErrorCluster, b: ErrorCluster): boolean {
  const left = a.primaryLocation;
  const right = b.primaryLocation;
  if (!left || !right || left.className === null) return false;
  return (
    left.className === right.className &&
    left.methodName === right.methodName &&
    left.lineNumber === right.lineNumber
  );
}

export function shouldMergeClusters(
  primary: ErrorCluster,
  secondary: ErrorCluster,
  similarityThreshold = DEFAULT_SIMILARITY_THRESHOLD,
): boolean {
  if (primary.exceptionType === secondary.exceptionType) {
    const similarity = messageSimilarity(
      primary.messageTemplate === null ? null : normalizeMessage(primary.messageTemplate),
      secondary.messageTemplate === null ? null : normalizeMessage(secondary.messageTemplate),
    );
    if (similarity >= similarityThreshold) return true;
  }

  return sameLocation(primary, secondary);
}

function absorbCluster(survivor: ErrorCluster, absorbed: ErrorCluster): void {
  survivor.records.push(...absorbed.records);
  survivor.occurrenceCount = survivor.records.length;

  if (absorbed.firstSeen && (!survivor.firstSeen || compareTimestamps(absorbed.firstSeen, survivor.firstSeen) < 0)) {
    survivor.firstSeen = absorbed.firstSeen;
  }
  if (absorbed.lastSeen && (!survivor.lastSeen || compareTimestamps(absorbed.lastSeen, survivor.lastSeen) > 0)) {
    survivor.lastSeen = absorbed.lastSeen;
  }

  survivor.exceptionType ??= absorbed.exceptionType;
  survivor.messageTemplate ??= absorbed.messageTemplate;
  survivor.primaryLocation ??= absorbed.primaryLocation;
}

export function mergeSimilarClusters(
  clusters: ReadonlyArray<ErrorCluster>,
  options: MergeOptions = {},
): ErrorCluster[] {
  const threshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  if (clusters.length <= 1) return finalizeClusters(clusters);

  const absorbed = new Set<number>();
  const survivors: ErrorCluster[] = [];

  for (let i = 0; i < clusters.length; i++) {
    if (absorbed.has(i)) continue;
    const primary = clusters[i];

    for (let j = i + 1; j < clusters.length; j++) {
      if (absorbed.has(j)) continue;
      const secondary = clusters[j];
      if (!shouldMergeClusters(primary, secondary, threshold)) continue;
      absorbCluster(primary, secondary);
      absorbed.add(j);
    }

    survivors.push(primary);
  }

  return finalizeClusters(survivors);
}
