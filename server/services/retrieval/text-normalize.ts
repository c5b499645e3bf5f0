import type { TDocumentFormat } from "@shared/retrieval";

const stripMarkdown = (input: string): string =>
  input
    .replace(/^#{1,6}\s+/gm, "")
    .replace(/\*\*(.*?)\*\*/g, "$1")
    .replace(/\*(.*?)\*/g, "$1")
    .replace(/`(.*?)`/g, "$1")
    .replace(/\[([^\]]+)\]\([^)]+\)/g, "$1");

/**
 * Text that gets chunked and hashed. Line endings become `\n`, blank-line runs collapse
 * to one paragraph break, runs of spaces and tabs collapse to one space.
 */
export function normalizeDocumentText(raw: string, format: TDocumentFormat): string {
  let text = raw.replace(/\r\n?/g, "\n");
  if (format === "markdown") {
    text = stripMarkdown(text);
  }
  return text
    .replace(/[ \t]+/g, " ")
    .replace(/ *\n */g, "\n")
    .replace(/\n\s*\n/g, "\n\n")
    .trim();
}

/** Query form used for cache fingerprints: NFKC, lowercase, single spaces. */
export const normalizeQuery = (query: string): string =>
  query.normalize("NFKC").toLowerCase().replace(/\s+/g, " ").trim();
