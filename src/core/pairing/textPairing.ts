import type { DiffLineRecord, DiffPairWithConnection } from "../ribbons/types.js";
import { PairBuilder } from "./pairBuilder.js";

type IndexPair = [number, number];

const LCS_CELL_LIMIT = 8_000_000;

const compactLine = (line: string): string => line.replace(/\s+/g, "");

const splitLines = (text: string): string[] => {
  if (text.length === 0) return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
};

/** Longest run of pairs increasing in both indices (pairs arrive sorted by the first). */
const longestIncreasing = (pairs: IndexPair[]): IndexPair[] => {
  if (pairs.length === 0) return [];
  const predecessors = new Array<number>(pairs.length).fill(-1);
  const tails: number[] = [];
  for (let i = 0; i < pairs.length; i++) {
    const target = pairs[i][1];
    let lo = 0;
    let hi = tails.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if (pairs[tails[mid]][1] < target) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    if (lo > 0) predecessors[i] = tails[lo - 1];
    if (lo === tails.length) tails.push(i);
    else tails[lo] = i;
  }
  const seq: IndexPair[] = [];
  let k = tails[tails.length - 1] ?? -1;
  while (k !== -1) {
    seq.push(pairs[k]);
    k = predecessors[k];
  }
  return seq.reverse();
};

const matchLines = (oldKeys: string[], newKeys: string[]): IndexPair[] => {
  const lcsWindow = (aStart: number, aEnd: number, bStart: number, bEnd: number): IndexPair[] => {
    const aLen = aEnd - aStart;
    const bLen = bEnd - bStart;
    if (aLen <= 0 || bLen <= 0) return [];
    if (aLen * bLen > LCS_CELL_LIMIT) {
      // Greedy forward scan instead of a table that would not fit.
      const result: IndexPair[] = [];
      let j = bStart;
      for (let i = aStart; i < aEnd; i++) {
        let probe = j;
        while (probe < bEnd && newKeys[probe] !== oldKeys[i]) probe += 1;
        if (probe < bEnd) {
          result.push([i, probe]);
          j = probe + 1;
        }
      }
      return result;
    }
    const dp: number[][] = Array.from({ length: aLen + 1 }, () => new Array<number>(bLen + 1).fill(0));
    for (let i = 1; i <= aLen; i++) {
      for (let j = 1; j <= bLen; j++) {
        dp[i][j] = oldKeys[aStart + i - 1] === newKeys[bStart + j - 1]
          ? dp[i - 1][j - 1] + 1
          : Math.max(dp[i - 1][j], dp[i][j - 1]);
      }
    }
    const pairs: IndexPair[] = [];
    let i = aLen;
    let j = bLen;
    while (i > 0 && j > 0) {
      if (oldKeys[aStart + i - 1] === newKeys[bStart + j - 1]) {
        pairs.push([aStart + i - 1, bStart + j - 1]);
        i -= 1;
        j -= 1;
      } else if (dp[i - 1][j] >= dp[i][j - 1]) {
        i -= 1;
      } else {
        j -= 1;
      }
    }
    return pairs.reverse();
  };

  const patience = (aStart: number, aEnd: number, bStart: number, bEnd: number): IndexPair[] => {
    if (aStart >= aEnd || bStart >= bEnd) return [];
    const oldCounts = new Map<string, number>();
    const newCounts = new Map<string, number>();
    const newPos = new Map<string, number>();
    for (let i = aStart; i < aEnd; i++) {
      oldCounts.set(oldKeys[i], (oldCounts.get(oldKeys[i]) ?? 0) + 1);
    }
    for (let j = bStart; j < bEnd; j++) {
      newCounts.set(newKeys[j], (newCounts.get(newKeys[j]) ?? 0) + 1);
      newPos.set(newKeys[j], j);
    }

    const unique: IndexPair[] = [];
    for (let i = aStart; i < aEnd; i++) {
      const key = oldKeys[i];
      if (oldCounts.get(key) !== 1 || newCounts.get(key) !== 1) continue;
      const j = newPos.get(key);
      if (j !== undefined) unique.push([i, j]);
    }

    const anchors = longestIncreasing(unique);
    if (anchors.length === 0) return lcsWindow(aStart, aEnd, bStart, bEnd);

    const result: IndexPair[] = [];
    let prevA = aStart;
    let prevB = bStart;
    for (const [aIdx, bIdx] of anchors) {
      result.push(...patience(prevA, aIdx, prevB, bIdx), [aIdx, bIdx]);
      prevA = aIdx + 1;
      prevB = bIdx + 1;
    }
    result.push(...patience(prevA, aEnd, prevB, bEnd));
    return result;
  };

  return patience(0, oldKeys.length, 0, newKeys.length);
};

/**
 * Row-aligns two whole texts. Lines equal after whitespace removal become
 * context rows; the unmatched lines between them are zipped into
 * change/deletion/addition rows.
 */
export const pairTexts = (oldText: string, newText: string): DiffPairWithConnection[] => {
  const oldLines = splitLines(oldText);
  const newLines = splitLines(newText);
  const matches = matchLines(oldLines.map(compactLine), newLines.map(compactLine));
  const builder = new PairBuilder();

  const deletion = (i: number): DiffLineRecord => ({
    kind: "deletion",
    content: oldLines[i],
    oldLineNumber: i + 1,
    newLineNumber: null,
  });
  const addition = (j: number): DiffLineRecord => ({
    kind: "addition",
    content: newLines[j],
    oldLineNumber: null,
    newLineNumber: j + 1,
  });

  let oi = 0;
  let ni = 0;
  const flushUntil = (oldEnd: number, newEnd: number): void => {
    const deletions: DiffLineRecord[] = [];
    const additions: DiffLineRecord[] = [];
    for (; oi < oldEnd; oi += 1) deletions.push(deletion(oi));
    for (; ni < newEnd; ni += 1) additions.push(addition(ni));
    builder.changeRun(deletions, additions);
  };

  for (const [matchOld, matchNew] of matches) {
    flushUntil(matchOld, matchNew);
    const lineNumbers = { oldLineNumber: matchOld + 1, newLineNumber: matchNew + 1 };
    builder.context(
      { kind: "context", content: oldLines[matchOld], ...lineNumbers },
      { kind: "context", content: newLines[matchNew], ...lineNumbers },
    );
    oi = matchOld + 1;
    ni = matchNew + 1;
  }
  flushUntil(oldLines.length, newLines.length);

  return builder.build();
};
