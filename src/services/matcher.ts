import type { AnnouncementCandidate, MatchResult } from "../types/monitor.js";

export const DEFAULT_SIMILARITY_THRESHOLD = 0.6;

export function normalizeForMatch(input: string): string {
  return input.toLowerCase().replace(/\s+/g, " ").trim();
}

interface Block {
  aStart: number;
  bStart: number;
  size: number;
}

/** Longest common substring of a[aLo, aHi) and b[bLo, bHi); earliest in `a` wins ties. */
function longestCommonBlock(a: string, aLo: number, aHi: number, b: string, bLo: number, bHi: number): Block {
  const width = bHi - bLo;
  let previous = new Array<number>(width + 1).fill(0);
  let best: Block = { aStart: aLo, bStart: bLo, size: 0 };

  for (let i = aLo; i < aHi; i += 1) {
    const current = new Array<number>(width + 1).fill(0);
    for (let j = bLo; j < bHi; j += 1) {
      if (a[i] !== b[j]) continue;
      const size = (previous[j - bLo] ?? 0) + 1;
      current[j - bLo + 1] = size;
      if (size > best.size) {
        best = { aStart: i - size + 1, bStart: j - size + 1, size };
      }
    }
    previous = current;
  }

  return best;
}

function countMatchingCharacters(a: string, b: string): number {
  let matched = 0;
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (pending.length > 0) {
    const range = pending.pop();
    if (!range) break;
    const [aLo, aHi, bLo, bHi] = range;
    if (aLo >= aHi || bLo >= bHi) continue;

    const block = longestCommonBlock(a, aLo, aHi, b, bLo, bHi);
    if (block.size === 0) continue;

    matched += block.size;
    pending.push([aLo, block.aStart, bLo, block.bStart]);
    pending.push([block.aStart + block.size, aHi, block.bStart + block.size, bHi]);
  }

  return matched;
}

/**
 * Ratcliff/Obershelp similarity of two strings after normalisation:
 * 2 * matched / (len(a) + len(b)), always within [0, 1].
 */
export function textSimilarity(left: string, right: string): number {
  const a = normalizeForMatch(left);
  const b = normalizeForMatch(right);
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * countMatchingCharacters(a, b)) / total;
}

/** A keyword that appears verbatim in the text is a full match. */
export function scoreText(text: string, keyword: string): number {
  const haystack = normalizeForMatch(text);
  const needle = normalizeForMatch(keyword);
  if (!needle) return 0;
  if (haystack.includes(needle)) return 1;
  return textSimilarity(haystack, needle);
}

export function scoreCandidate(text: string, keywords: readonly string[]): number {
  let best = 0;
  for (const keyword of keywords) {
    if (!normalizeForMatch(keyword)) continue;
    const score = scoreText(text, keyword);
    if (score > best) best = score;
    if (best === 1) break;
  }
  return best;
}

export function findBestMatch(
  candidates: Iterable<AnnouncementCandidate>,
  keywords: readonly string[],
  threshold: number = DEFAULT_SIMILARITY_THRESHOLD,
): MatchResult {
  let bestCandidate: AnnouncementCandidate | null = null;
  let bestScore = 0;

  for (const candidate of candidates) {
    const score = scoreCandidate(candidate.text, keywords);
    // strict comparison keeps the earliest candidate on ties
    if (bestCandidate === null || score > bestScore) {
      bestCandidate = candidate;
      bestScore = score;
    }
  }

  if (bestCandidate === null || bestScore < threshold) {
    return { candidate: null, score: bestScore };
  }
  return { candidate: bestCandidate, score: bestScore };
}
