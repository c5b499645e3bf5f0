import type { ChunkRecord, TScoredResult, TSearchMode } from "@shared/retrieval";
import type { SearchWeights } from "../../config/retrieval";
import type { ScoredChunkId } from "./index-store";
import { termFrequencies } from "./keywords";

export type FusedCandidate = {
  chunkId: string;
  semanticScore: number;
  keywordScore: number;
  fusedScore: number;
};

/**
 * Min-max scaling over one leg's candidates. When every score is equal the leg
 * carries no ordering signal: positive scores map to 1, anything else to 0.
 */
export function minMaxNormalize(hits: ScoredChunkId[]): Map<string, number> {
  const out = new Map<string, number>();
  if (hits.length === 0) return out;
  let min = Infinity;
  let max = -Infinity;
  for (const hit of hits) {
    min = Math.min(min, hit.score);
    max = Math.max(max, hit.score);
  }
  const span = max - min;
  for (const hit of hits) {
    out.set(hit.chunkId, span > 0 ? (hit.score - min) / span : hit.score > 0 ? 1 : 0);
  }
  return out;
}

export const weightsForMode = (mode: TSearchMode, weights: SearchWeights): SearchWeights => {
  if (mode === "semantic") return { semantic: 1, keyword: 0 };
  if (mode === "keyword") return { semantic: 0, keyword: 1 };
  return weights;
};

/** Union of both legs; a chunk missing from a leg scores 0 there. */
export function fuseScores(
  semantic: ScoredChunkId[],
  keyword: ScoredChunkId[],
  weights: SearchWeights,
): FusedCandidate[] {
  const semanticNorm = minMaxNormalize(semantic);
  const keywordNorm = minMaxNormalize(keyword);
  const semanticRaw = new Map(semantic.map((hit) => [hit.chunkId, hit.score]));
  const keywordRaw = new Map(keyword.map((hit) => [hit.chunkId, hit.score]));
  const ids = new Set([...semanticRaw.keys(), ...keywordRaw.keys()]);

  return [...ids].map((chunkId) => ({
    chunkId,
    semanticScore: semanticRaw.get(chunkId) ?? 0,
    keywordScore: keywordRaw.get(chunkId) ?? 0,
    fusedScore: weights.semantic * (semanticNorm.get(chunkId) ?? 0) + weights.keyword * (keywordNorm.get(chunkId) ?? 0),
  }));
}

type Ranked = { candidate: FusedCandidate; chunk: ChunkRecord };

const compareRanked = (a: Ranked, b: Ranked): number =>
  b.candidate.fusedScore - a.candidate.fusedScore ||
  a.chunk.sequenceIndex - b.chunk.sequenceIndex ||
  (a.chunk.id < b.chunk.id ? -1 : a.chunk.id > b.chunk.id ? 1 : 0);

const countOccurrences = (haystack: string, needle: string): number => {
  if (!needle) return 0;
  let count = 0;
  for (let at = haystack.indexOf(needle); at !== -1; at = haystack.indexOf(needle, at + needle.length)) {
    count += 1;
  }
  return count;
};

/**
 * Window of `windowChars` around the densest run of `terms`, scanned in steps of a
 * quarter window. `...` marks a cut on either side.
 */
export function buildContext(text: string, terms: string[], windowChars: number): string {
  if (text.length <= windowChars) return text.trim();
  const lower = text.toLowerCase();
  const step = Math.max(1, Math.floor(windowChars / 4));
  let bestStart = 0;
  let bestCount = -1;
  for (let start = 0; start < text.length; start += step) {
    const end = Math.min(text.length, start + windowChars);
    const window = lower.slice(start, end);
    const count = terms.reduce((sum, term) => sum + countOccurrences(window, term), 0);
    if (count > bestCount) {
      bestCount = count;
      bestStart = start;
    }
    if (end >= text.length) break;
  }
  const end = Math.min(text.length, bestStart + windowChars);
  const snippet = text.slice(bestStart, end).trim();
  return `${bestStart > 0 ? "..." : ""}${snippet}${end < text.length ? "..." : ""}`;
}

export const matchedTerms = (text: string, queryTerms: string[]): string[] => {
  const counts = termFrequencies(text, queryTerms);
  return queryTerms.filter((term) => counts.has(term));
};

/**
 * Final ordering: fused score desc, then sequence index asc, then chunk id asc.
 * Candidates whose chunk no longer exists are dropped before truncation.
 */
export function rankResults(
  candidates: FusedCandidate[],
  chunks: ChunkRecord[],
  limit: number,
  decorate: (chunk: ChunkRecord) => Pick<TScoredResult, "matchedKeywords" | "context">,
): TScoredResult[] {
  const byId = new Map(chunks.map((chunk) => [chunk.id, chunk]));
  const ranked: Ranked[] = [];
  for (const candidate of candidates) {
    const chunk = byId.get(candidate.chunkId);
    if (chunk) ranked.push({ candidate, chunk });
  }
  return ranked
    .sort(compareRanked)
    .slice(0, limit)
    .map(({ candidate, chunk }) => ({
      chunkId: chunk.id,
      documentId: chunk.documentId,
      sequenceIndex: chunk.sequenceIndex,
      content: chunk.text,
      semanticScore: candidate.semanticScore,
      keywordScore: candidate.keywordScore,
      fusedScore: candidate.fusedScore,
      ...decorate(chunk),
    }));
}
