import { assertCode, normalize } from "./normalize.js";
import { toFrequencyMap, tokenize } from "./tokenize.js";

export const SEQUENCE_WEIGHT = 0.6;
export const JACCARD_WEIGHT = 0.4;

export type MatchBlock = { a: number; b: number; size: number; weight: number };

const tokenWeight = (token: string): number => token.length;

const totalWeight = (tokens: readonly string[]): number =>
  tokens.reduce((sum, token) => sum + tokenWeight(token), 0);

function tokensFor(code: unknown, label: string): string[] {
  assertCode(code, label);
  return tokenize(normalize(code));
}

type RunBuffers = {
  prevWeight: number[];
  prevSize: number[];
  curWeight: number[];
  curSize: number[];
};

function indexPositions(tokens: readonly string[]): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  tokens.forEach((token, index) => {
    const list = positions.get(token);
    if (list) {
      list.push(index);
    } else {
      positions.set(token, [index]);
    }
  });
  return positions;
}

// Heaviest common run of a[alo..ahi) and b[blo..bhi). Ties keep the run found first,
// scanning a then b, so the result is stable for a given argument order.
// Buffers are indexed by b position + 1 and are all zero between calls.
function longestBlock(
  a: readonly string[],
  bPositions: Map<string, number[]>,
  buffers: RunBuffers,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): MatchBlock {
  let best: MatchBlock = { a: alo, b: blo, size: 0, weight: 0 };
  let { prevWeight, prevSize, curWeight, curSize } = buffers;
  let prevTouched: number[] = [];
  let curTouched: number[] = [];
  for (let i = alo; i < ahi; i += 1) {
    const positions = bPositions.get(a[i]) ?? [];
    const weight = tokenWeight(a[i]);
    for (const j of positions) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = j + 1;
      curWeight[k] = prevWeight[j] + weight;
      curSize[k] = prevSize[j] + 1;
      curTouched.push(k);
      if (curWeight[k] > best.weight) {
        best = { a: i - curSize[k] + 1, b: j - curSize[k] + 1, size: curSize[k], weight: curWeight[k] };
      }
    }
    for (const k of prevTouched) {
      prevWeight[k] = 0;
      prevSize[k] = 0;
    }
    [prevWeight, curWeight] = [curWeight, prevWeight];
    [prevSize, curSize] = [curSize, prevSize];
    [prevTouched, curTouched] = [curTouched, prevTouched];
    curTouched.length = 0;
  }
  for (const k of prevTouched) {
    prevWeight[k] = 0;
    prevSize[k] = 0;
  }
  return best;
}

/** Greedy longest-block alignment: take the heaviest common run, then recurse on both sides of it. */
export function matchingBlocks(a: readonly string[], b: readonly string[]): MatchBlock[] {
  const blocks: MatchBlock[] = [];
  const bPositions = indexPositions(b);
  const buffers: RunBuffers = {
    prevWeight: new Array<number>(b.length + 1).fill(0),
    prevSize: new Array<number>(b.length + 1).fill(0),
    curWeight: new Array<number>(b.length + 1).fill(0),
    curSize: new Array<number>(b.length + 1).fill(0)
  };
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  while (queue.length > 0) {
    const next = queue.pop();
    if (!next) break;
    const [alo, ahi, blo, bhi] = next;
    if (alo >= ahi || blo >= bhi) continue;
    const block = longestBlock(a, bPositions, buffers, alo, ahi, blo, bhi);
    if (block.size === 0) continue;
    blocks.push(block);
    queue.push([alo, block.a, blo, block.b]);
    queue.push([block.a + block.size, ahi, block.b + block.size, bhi]);
  }
  return blocks.sort((x, y) => x.a - y.a || x.b - y.b);
}

const compareTokenLists = (a: readonly string[], b: readonly string[]): number => {
  const joinedA = a.join(" ");
  const joinedB = b.join(" ");
  if (joinedA === joinedB) return 0;
  return joinedA < joinedB ? -1 : 1;
};

export function sequenceRatioOfTokens(a: readonly string[], b: readonly string[]): number {
  const total = totalWeight(a) + totalWeight(b);
  if (total === 0) return 1;
  const [first, second] = compareTokenLists(a, b) <= 0 ? [a, b] : [b, a];
  const matched = matchingBlocks(first, second).reduce((sum, block) => sum + block.weight, 0);
  return (2 * matched) / total;
}

export function jaccardOfTokens(a: readonly string[], b: readonly string[]): number {
  const countsA = toFrequencyMap(a);
  const countsB = toFrequencyMap(b);
  const vocabulary = new Set([...countsA.keys(), ...countsB.keys()]);
  let intersection = 0;
  let union = 0;
  for (const token of vocabulary) {
    const left = countsA.get(token) ?? 0;
    const right = countsB.get(token) ?? 0;
    intersection += Math.min(left, right);
    union += Math.max(left, right);
  }
  return union > 0 ? intersection / union : 1;
}

export function seqRatio(a: string, b: string): number {
  return sequenceRatioOfTokens(tokensFor(a, "seqRatio"), tokensFor(b, "seqRatio"));
}

export function jaccard(a: string, b: string): number {
  return jaccardOfTokens(tokensFor(a, "jaccard"), tokensFor(b, "jaccard"));
}

export function scoreTokens(a: readonly string[], b: readonly string[]): number {
  const combined = SEQUENCE_WEIGHT * sequenceRatioOfTokens(a, b) + JACCARD_WEIGHT * jaccardOfTokens(a, b);
  return Math.min(100, Math.max(0, Math.round(100 * combined)));
}

/** Similarity of two snippets as an integer percentage. Symmetric; identical code scores 100. */
export function score(oldCode: string, newCode: string): number {
  return scoreTokens(tokensFor(oldCode, "old snippet"), tokensFor(newCode, "new snippet"));
}
