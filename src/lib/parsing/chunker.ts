/**
 * Lossless text chunking for material ingestion.
 *
 * Strategy (in order of preference), searched backwards from the size cap:
 *  1. Paragraph boundary (blank line)
 *  2. Sentence boundary (.!? plus closing quotes/brackets, then whitespace)
 *  3. Whitespace
 *  4. Hard cut at the cap, moved back so no surrogate pair is split
 *
 * Text is never normalized. Every chunk after the first starts with the last
 * `overlapChars` characters of the chunk before it, so `joinChunks` restores
 * the input exactly.
 */

import { ConfigurationError } from "@/lib/errors";

export type ChunkingOptions = {
  maxChars: number;
  overlapChars: number;
};

const PARAGRAPH_BOUNDARY = /\n[ \t]*(?:\r?\n)+/g;
const SENTENCE_BOUNDARY = /[.!?]+["'”’)\]]*\s+/g;
const WHITESPACE_BOUNDARY = /\s+/g;

export function assertChunkingOptions(options: ChunkingOptions): void {
  if (!Number.isInteger(options.maxChars) || options.maxChars <= 0) {
    throw new ConfigurationError(`Chunk size must be a positive integer, got ${options.maxChars}`);
  }
  if (!Number.isInteger(options.overlapChars) || options.overlapChars < 0) {
    throw new ConfigurationError(`Chunk overlap must be a non-negative integer, got ${options.overlapChars}`);
  }
  if (options.overlapChars >= options.maxChars) {
    throw new ConfigurationError(
      `Chunk overlap (${options.overlapChars}) must be smaller than chunk size (${options.maxChars})`,
    );
  }
}

// End offset of the last match that ends at or after `minEnd`, or -1.
function lastBoundaryEnd(window: string, pattern: RegExp, minEnd: number): number {
  let best = -1;
  for (const match of window.matchAll(pattern)) {
    const end = (match.index ?? 0) + match[0].length;
    if (end >= minEnd) {
      best = end;
    }
  }
  return best;
}

// True when `index` falls between the two halves of a surrogate pair.
function splitsSurrogatePair(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) return false;
  const before = text.charCodeAt(index - 1);
  const after = text.charCodeAt(index);
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}

function findCut(window: string, minEnd: number): number {
  for (const pattern of [PARAGRAPH_BOUNDARY, SENTENCE_BOUNDARY, WHITESPACE_BOUNDARY]) {
    const end = lastBoundaryEnd(window, pattern, minEnd);
    if (end > 0) {
      return end;
    }
  }
  return window.length;
}

export function splitIntoChunks(text: string, options: ChunkingOptions): string[] {
  assertChunkingOptions(options);
  if (!text) return [];
  if (text.length <= options.maxChars) return [text];

  const { maxChars, overlapChars } = options;
  const chunks: string[] = [];
  let start = 0;

  while (text.length - start > maxChars) {
    const window = text.slice(start, start + maxChars);
    // the cut must land past the overlap so the next chunk starts further along
    let cut = findCut(window, overlapChars + 1);
    while (
      cut > overlapChars + 1 &&
      (splitsSurrogatePair(text, start + cut) || splitsSurrogatePair(text, start + cut - overlapChars))
    ) {
      cut -= 1;
    }
    chunks.push(window.slice(0, cut));
    start += cut - overlapChars;
  }

  chunks.push(text.slice(start));
  return chunks;
}

export function joinChunks(chunks: string[], overlapChars: number): string {
  return chunks.map((chunk, index) => (index === 0 ? chunk : chunk.slice(overlapChars))).join("");
}
