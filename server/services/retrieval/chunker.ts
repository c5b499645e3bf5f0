import { ValidationError } from "./errors";

export type ChunkOptions = {
  chunkSize: number;
  chunkOverlap: number;
};

/**
 * One chunk as a slice of the source text. `text === source.slice(start, end)`;
 * the first `overlap` characters repeat the tail of the previous chunk.
 */
export type ChunkSpan = {
  text: string;
  start: number;
  end: number;
  overlap: number;
};

type Span = { start: number; end: number };

const PARAGRAPH_BREAK = /\n[ \t]*\n\s*/g;
const SENTENCE_END = /[.!?]+["')\]]*\s+/g;
const OVERSIZE_FACTOR = 2;

const spanLength = (span: Span): number => span.end - span.start;

const splitAfter = (text: string, span: Span, pattern: RegExp): Span[] => {
  const out: Span[] = [];
  const slice = text.slice(span.start, span.end);
  const re = new RegExp(pattern.source, "g");
  let cursor = 0;
  for (let match = re.exec(slice); match; match = re.exec(slice)) {
    const cut = match.index + match[0].length;
    if (cut >= slice.length) break;
    out.push({ start: span.start + cursor, end: span.start + cut });
    cursor = cut;
  }
  out.push({ start: span.start + cursor, end: span.end });
  return out;
};

const isSpace = (ch: string | undefined): boolean => ch !== undefined && /\s/.test(ch);

// Last resort: fixed-width pieces, ending at whitespace when the piece has any.
const hardCut = (text: string, span: Span, width: number): Span[] => {
  const out: Span[] = [];
  let start = span.start;
  while (span.end - start > width) {
    let end = start + width;
    let cut = end;
    while (cut > start && !isSpace(text[cut - 1])) cut -= 1;
    if (cut > start) end = cut;
    out.push({ start, end });
    start = end;
  }
  if (start < span.end) out.push({ start, end: span.end });
  return out;
};

const buildUnits = (text: string, { chunkSize, chunkOverlap }: ChunkOptions): Span[] => {
  const units: Span[] = [];
  const paragraphs = splitAfter(text, { start: 0, end: text.length }, PARAGRAPH_BREAK);
  for (const paragraph of paragraphs) {
    if (spanLength(paragraph) <= chunkSize) {
      units.push(paragraph);
      continue;
    }
    for (const sentence of splitAfter(text, paragraph, SENTENCE_END)) {
      if (spanLength(sentence) <= chunkSize * OVERSIZE_FACTOR) {
        units.push(sentence);
      } else {
        units.push(...hardCut(text, sentence, chunkSize - chunkOverlap));
      }
    }
  }
  return units;
};

const packUnits = (units: Span[], budget: number): Span[] => {
  const cores: Span[] = [];
  let current: Span | null = null;
  for (const unit of units) {
    if (current && unit.end - current.start <= budget) {
      current = { start: current.start, end: unit.end };
      continue;
    }
    if (current) cores.push(current);
    current = { ...unit };
  }
  if (current) cores.push(current);
  return cores;
};

const overlapStart = (text: string, core: Span, floor: number, allowed: number): number => {
  const earliest = Math.max(floor, core.start - allowed);
  for (let pos = earliest; pos < core.start; pos += 1) {
    const wordStart = (pos === 0 || isSpace(text[pos - 1])) && !isSpace(text[pos]);
    if (wordStart) return pos;
  }
  // No word boundary inside the allowance: skip the overlap rather than cut a word.
  return core.start;
};

/**
 * Splits text into overlapping chunks. Paragraph breaks are preferred, then
 * sentence ends, then whitespace cuts. A single sentence up to twice the chunk size
 * is kept whole even though it overflows.
 */
export function chunkText(text: string, options: ChunkOptions): ChunkSpan[] {
  const { chunkSize, chunkOverlap } = options;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ValidationError(`chunk size must be a positive integer (got ${chunkSize})`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new ValidationError(
      `chunk overlap must be an integer in [0, ${chunkSize}) (got ${chunkOverlap})`,
    );
  }
  if (!text.trim()) return [];

  const cores = packUnits(buildUnits(text, options), chunkSize - chunkOverlap);
  return cores.map((core, index) => {
    if (index === 0) {
      return { text: text.slice(core.start, core.end), start: core.start, end: core.end, overlap: 0 };
    }
    const allowed = Math.max(0, Math.min(chunkOverlap, chunkSize - spanLength(core)));
    const start = allowed > 0 ? overlapStart(text, core, cores[index - 1].start, allowed) : core.start;
    return {
      text: text.slice(start, core.end),
      start,
      end: core.end,
      overlap: core.start - start,
    };
  });
}

/** Inverse of {@link chunkText}: drops each overlap prefix and concatenates. */
export const joinChunks = (chunks: ChunkSpan[]): string =>
  chunks.map((chunk) => chunk.text.slice(chunk.overlap)).join("");
