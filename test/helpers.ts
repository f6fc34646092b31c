// test/helpers.ts
// Shared fakes: a keyword embedder, a scripted generator and a silent logger.

import pino from 'pino';
import { resolveRagSettings, type RagSettings, type RagSettingsInput } from '../src/config/settings.js';
import type { EmbeddingFunction } from '../src/services/embeddings.js';
import type { GenerationFunction } from '../src/services/generation.js';

export const silentLogger = pino({ level: 'silent' });

export const VOCABULARY = ['alpha', 'beta', 'gamma', 'delta'] as const;

/** One axis per vocabulary word (occurrence count) plus a small constant axis so no vector is zero. */
export function keywordVector(text: string): number[] {
  const lower = text.toLowerCase();
  const counts = VOCABULARY.map((w) => lower.split(w).length - 1);
  return [...counts, 0.1];
}

export class KeywordEmbedder implements EmbeddingFunction {
  readonly calls: string[][] = [];

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map(keywordVector);
  }

  get embeddedTexts(): string[] {
    return this.calls.flat();
  }
}

export class ScriptedGenerator implements GenerationFunction {
  readonly modelName = 'scripted-model';
  readonly prompts: string[] = [];

  constructor(private readonly reply: (prompt: string) => string | Promise<string>) {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.reply(prompt);
  }
}

export function testSettings(overrides: RagSettingsInput = {}): RagSettings {
  return resolveRagSettings({
    chunkSize: 40,
    overlap: 10,
    embeddingRetryBaseMs: 0,
    embeddingTimeoutMs: 1000,
    generationTimeoutMs: 1000,
    ...overrides,
  });
}

export function unitVector(values: number[]): number[] {
  const norm = Math.sqrt(values.reduce((s, x) => s + x * x, 0));
  return values.map((x) => x / norm);
}
