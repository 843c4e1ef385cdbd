import { ParseError } from '../lib/errors.js';

export const PARAGRAPH_SEPARATOR = '[[__PARAGRAPH_BREAK__]]';

export interface ChunkLimits {
  maxParagraphs: number;
  maxWords: number;
}

const CJK_WORD_WEIGHT = 0.7;

function isCjk(ch: string): boolean {
  const code = ch.codePointAt(0) ?? 0;
  return code >= 0x4e00 && code <= 0x9fff;
}

/**
 * Length in English-word terms: each whitespace-separated run counts 1 and
 * each CJK ideograph counts 0.7 on its own.
 */
export function equivalentWords(text: string): number {
  let count = 0;
  let inWord = false;

  for (const ch of text) {
    if (/\s/.test(ch)) {
      if (inWord) count += 1;
      inWord = false;
    } else if (isCjk(ch)) {
      if (inWord) count += 1;
      inWord = false;
      count += CJK_WORD_WEIGHT;
    } else {
      inWord = true;
    }
  }

  return inWord ? count + 1 : count;
}

export function splitParagraphs(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * Groups paragraph indices into chunks sent as one request. A blank paragraph
 * always ends a chunk; otherwise a chunk closes before it would pass either limit.
 */
export function planChunks(paragraphs: readonly string[], limits: ChunkLimits): number[][] {
  const chunks: number[][] = [];
  let current: number[] = [];
  let words = 0;

  const close = () => {
    if (current.length > 0) chunks.push(current);
    current = [];
    words = 0;
  };

  paragraphs.forEach((paragraph, index) => {
    const trimmed = paragraph.trim();
    if (!trimmed) {
      close();
      return;
    }

    const size = equivalentWords(trimmed);
    if (current.length > 0 && (current.length >= limits.maxParagraphs || words + size > limits.maxWords)) {
      close();
    }
    current.push(index);
    words += size;
  });

  close();
  return chunks;
}

export function joinChunk(paragraphs: readonly string[], indices: readonly number[]): string {
  return indices.map(index => (paragraphs[index] ?? '').trim()).join(PARAGRAPH_SEPARATOR);
}

/** Splits a translated chunk back into paragraphs; the count must match what was sent. */
export function splitTranslation(text: string, expected: number): string[] {
  const parts = text.split(PARAGRAPH_SEPARATOR).map(part => part.trim());
  if (parts.length !== expected) {
    throw new ParseError(`translation returned ${parts.length} segments but ${expected} were expected`);
  }
  if (parts.every(part => part.length === 0)) {
    throw new ParseError('translation is empty');
  }
  return parts;
}
