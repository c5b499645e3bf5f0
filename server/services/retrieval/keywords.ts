import stopwordList from "./stopwords.json";

const STOP_WORDS: ReadonlySet<string> = new Set(stopwordList);
const MIN_TERM_LENGTH = 3;
const TOKEN_SPLIT = /[^\p{L}\p{N}]+/u;
const DIGITS_ONLY = /^\p{N}+$/u;

export const isStopWord = (term: string): boolean => STOP_WORDS.has(term);

/** Lowercased NFKC tokens that qualify as index terms, in text order with repeats. */
export function tokenize(text: string): string[] {
  return text
    .normalize("NFKC")
    .toLowerCase()
    .split(TOKEN_SPLIT)
    .filter(
      (token) =>
        token.length >= MIN_TERM_LENGTH && !DIGITS_ONLY.test(token) && !STOP_WORDS.has(token),
    );
}

export function termCounts(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokenize(text)) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

/**
 * Most frequent terms first, ties broken alphabetically, capped at `max`.
 * Texts differing only in case or punctuation give the same list.
 */
export function extractKeywords(text: string, max: number): string[] {
  if (max <= 0) return [];
  return [...termCounts(text).entries()]
    .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
    .slice(0, max)
    .map(([term]) => term);
}

/** Counts of each requested term in `text`; terms that never occur are omitted. */
export function termFrequencies(text: string, terms: Iterable<string>): Map<string, number> {
  const counts = termCounts(text);
  const out = new Map<string, number>();
  for (const term of terms) {
    const count = counts.get(term);
    if (count) out.set(term, count);
  }
  return out;
}
