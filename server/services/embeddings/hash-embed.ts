const NGRAM_RANGE = [3, 4, 5] as const;
const HASH_SEEDS = [0x9e3779b1, 0x85ebca77, 0xc2b2ae3d];
const WORD_SEED = 0x27d4eb2f;
const WORD_WEIGHT = 2;

const rotate32 = (value: number, shift: number) => (value << shift) | (value >>> (32 - shift));

const hashString = (input: string, seed: number): number => {
  let hash = seed | 0;
  for (let i = 0; i < input.length; i += 1) {
    hash = Math.imul(hash ^ input.charCodeAt(i), 0x27d4eb2d);
    hash = rotate32(hash, 13);
  }
  return hash | 0;
};

const sanitize = (input: string): string =>
  input
    .normalize("NFKC")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .trim();

const bump = (vector: number[], hash: number, weight: number): void => {
  const index = Math.abs(hash) % vector.length;
  vector[index] += (hash & 1) === 0 ? weight : -weight;
};

/**
 * Signed feature hashing of whole words plus character 3/4/5-grams, L2-normalized.
 * Deterministic for a given dimension; blank input gives the zero vector.
 */
export function hashEmbed(text: string, dim: number): number[] {
  const vector = new Array<number>(dim).fill(0);
  const cleaned = sanitize(text);
  if (!cleaned) return vector;

  for (const word of cleaned.split(" ")) {
    bump(vector, hashString(word, WORD_SEED), WORD_WEIGHT);
  }
  const padded = ` ${cleaned} `;
  NGRAM_RANGE.forEach((n, s) => {
    const seed = HASH_SEEDS[s % HASH_SEEDS.length];
    for (let i = 0; i <= padded.length - n; i += 1) {
      bump(vector, hashString(padded.slice(i, i + n), seed), 1);
    }
  });

  let sum = 0;
  for (const value of vector) sum += value * value;
  const norm = Math.sqrt(sum);
  return norm === 0 ? vector : vector.map((value) => value / norm);
}
