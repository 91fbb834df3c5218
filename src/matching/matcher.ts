import { ComparisonStatus, type ComparisonResult, type Snippet, type SnippetCollection } from "../types.js";
import {
  DuplicateSnippetIdError,
  SnippetIdMismatchError,
  ThresholdInvalidError
} from "../errors/input.errors.js";
import { DEFAULT_MIN_PAIR_SCORE } from "../config/defaults.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import { assertCode, normalize } from "./normalize.js";
import { scoreTokens } from "./similarity.js";
import { tokenize } from "./tokenize.js";

export interface CompareOptions {
  /** Pairs scoring below this are never committed; their snippets end up NotFound / Added. */
  minPairScore?: number;
  logger?: Logger;
}

type ScoredPair = { oldIndex: number; newIndex: number; score: number };

const isPercent = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 100;

export function assertThreshold(value: unknown, label = "threshold"): asserts value is number {
  if (!isPercent(value)) {
    throw new ThresholdInvalidError(label, value);
  }
}

export function toSnippetCollection(snippets: readonly Snippet[]): SnippetCollection {
  const collection = new Map<string, Snippet>();
  for (const snippet of snippets) {
    if (collection.has(snippet.id)) {
      throw new DuplicateSnippetIdError(snippet.id);
    }
    collection.set(snippet.id, snippet);
  }
  return collection;
}

const byCodeUnit = (a: string, b: string): number => (a === b ? 0 : a < b ? -1 : 1);

function sortedIds(collection: SnippetCollection, side: "old" | "new"): string[] {
  for (const [key, snippet] of collection) {
    if (key !== snippet.id) {
      throw new SnippetIdMismatchError(key, snippet.id);
    }
    assertCode(snippet.code, `${side} snippet ${key}`);
  }
  return [...collection.keys()].sort(byCodeUnit);
}

const classify = (oldId: string, newId: string, score: number, threshold: number): ComparisonResult =>
  Object.freeze({
    oldId,
    newId,
    score,
    status: score >= threshold ? ComparisonStatus.Reviewed : ComparisonStatus.NeedsReview
  });

/**
 * Pairs findings across two scans by snippet similarity and classifies each one.
 *
 * Ids present in both scans are taken as unchanged. The rest are scored all-against-all and
 * paired greedily, best score first, each snippet used at most once. Ties resolve by old id,
 * then new id. Every input id appears in exactly one result.
 */
export function compare(
  oldSnippets: SnippetCollection,
  newSnippets: SnippetCollection,
  threshold: number,
  options: CompareOptions = {}
): ComparisonResult[] {
  assertThreshold(threshold);
  const minPairScore = options.minPairScore ?? DEFAULT_MIN_PAIR_SCORE;
  assertThreshold(minPairScore, "minPairScore");
  const logger = options.logger ?? noopLogger;

  const oldIds = sortedIds(oldSnippets, "old");
  const newIds = sortedIds(newSnippets, "new");

  const unchanged = new Set(oldIds.filter((id) => newSnippets.has(id)));
  const remainingOld = oldIds.filter((id) => !unchanged.has(id));
  const remainingNew = newIds.filter((id) => !unchanged.has(id));

  const tokensOf = (collection: SnippetCollection, id: string): string[] => {
    const snippet = collection.get(id);
    return snippet ? tokenize(normalize(snippet.code)) : [];
  };
  const oldTokens = remainingOld.map((id) => tokensOf(oldSnippets, id));
  const newTokens = remainingNew.map((id) => tokensOf(newSnippets, id));

  // The whole matrix is scored before any pairing is committed.
  const pairs: ScoredPair[] = [];
  oldTokens.forEach((a, oldIndex) => {
    newTokens.forEach((b, newIndex) => {
      pairs.push({ oldIndex, newIndex, score: scoreTokens(a, b) });
    });
  });
  pairs.sort((x, y) => y.score - x.score || x.oldIndex - y.oldIndex || x.newIndex - y.newIndex);

  const pairedOld = new Map<number, ScoredPair>();
  const pairedNew = new Set<number>();
  for (const pair of pairs) {
    if (pair.score < minPairScore) break;
    if (pairedOld.has(pair.oldIndex) || pairedNew.has(pair.newIndex)) continue;
    pairedOld.set(pair.oldIndex, pair);
    pairedNew.add(pair.newIndex);
  }

  const remainingIndex = new Map(remainingOld.map((id, index) => [id, index]));
  const results: ComparisonResult[] = [];
  for (const oldId of oldIds) {
    if (unchanged.has(oldId)) {
      results.push(classify(oldId, oldId, 100, threshold));
      continue;
    }
    const pair = pairedOld.get(remainingIndex.get(oldId) ?? -1);
    if (pair) {
      results.push(classify(oldId, remainingNew[pair.newIndex], pair.score, threshold));
    } else {
      results.push(Object.freeze({ oldId, status: ComparisonStatus.NotFound }));
    }
  }
  remainingNew.forEach((newId, index) => {
    if (!pairedNew.has(index)) {
      results.push(Object.freeze({ newId, status: ComparisonStatus.Added }));
    }
  });

  logger.debug("Snippet comparison complete", {
    oldCount: oldIds.length,
    newCount: newIds.length,
    unchanged: unchanged.size,
    scoredPairs: pairs.length,
    committedPairs: pairedOld.size,
    threshold,
    minPairScore
  });
  return results;
}
