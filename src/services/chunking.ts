// src/services/chunking.ts
// What: Fixed-window character chunking with overlap.
// How: Window i starts at i * (chunkSize - overlap) and spans up to chunkSize characters; windows are emitted
//      while the start is inside the text. Passages are raw slices, so [charStart, charEnd) always points back
//      at the exact source text. The returned iterable is lazy and can be iterated again from the start.

import { ConfigError } from '../errors.js';

export interface TextChunk {
  ordinal: number;
  text: string;
  charStart: number;
  charEnd: number;
}

export function chunkText(text: string, chunkSize: number, overlap: number): Iterable<TextChunk> {
  validateChunking(chunkSize, overlap);

  const step = chunkSize - overlap;
  const blank = text.trim().length === 0;

  return {
    *[Symbol.iterator]() {
      if (blank) return;
      let ordinal = 0;
      for (let start = 0; start < text.length; start += step) {
        const end = Math.min(start + chunkSize, text.length);
        yield { ordinal, text: text.slice(start, end), charStart: start, charEnd: end };
        ordinal += 1;
      }
    },
  };
}

export function validateChunking(chunkSize: number, overlap: number): void {
  const issues: string[] = [];
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    issues.push(`chunkSize must be a positive integer (got ${chunkSize})`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    issues.push(`overlap must be a non-negative integer (got ${overlap})`);
  } else if (overlap >= chunkSize) {
    issues.push(`overlap must be smaller than chunkSize (got ${overlap} >= ${chunkSize})`);
  }
  if (issues.length > 0) {
    throw new ConfigError(`Invalid chunking parameters: ${issues.join('; ')}`, {
      operation: 'chunk',
      details: { chunkSize, overlap },
    });
  }
}
