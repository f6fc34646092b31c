// src/services/generation.ts
// What: Context assembly and the single generation call that produces a cited answer.
// How: assembleContext() walks passages by descending score and stops at the first one that would push the
//      token count past the budget; passages are never cut. The prompt tags each passage with [chunkId].
//      AnswerOrchestrator calls the generation function once under a deadline and reports the markers the
//      answer actually uses. Generation is billed and not idempotent, so it is never retried here.

import type OpenAI from 'openai';
import type { Logger } from 'pino';
import { GenerationServiceError, InvalidArgumentError, errorMessage } from '../errors.js';
import type { AnswerResult, Citation, RetrievedChunk } from '../models/types.js';
import { estimateTokens, type TokenCounter } from '../util/tokens.js';
import { withTimeout } from '../util/timeout.js';

export interface GenerationFunction {
  // Recorded with each conversation; 'unknown' when absent.
  readonly modelName?: string;
  generate(prompt: string, options: { signal: AbortSignal }): Promise<string>;
}

export const NOT_IN_CONTEXT = 'The answer is not available in the provided documents.';

export const COULD_NOT_ANSWER = 'Sorry, I could not answer this question right now. Please try again later.';

export function citationMarker(chunkId: string): string {
  return `[${chunkId}]`;
}

export function formatPassage(r: RetrievedChunk): string {
  return `${citationMarker(r.chunk.id)}\n${r.chunk.text}`;
}

export interface AssembledContext {
  included: RetrievedChunk[];
  tokens: number;
}

export function assembleContext(
  retrieved: readonly RetrievedChunk[],
  maxContextTokens: number,
  countTokens: TokenCounter = estimateTokens,
): AssembledContext {
  // Stable sort keeps retrieval order among equal scores.
  const ordered = [...retrieved].sort((a, b) => b.score - a.score);
  const included: RetrievedChunk[] = [];
  let tokens = 0;
  for (const r of ordered) {
    const cost = countTokens(formatPassage(r));
    if (tokens + cost > maxContextTokens) break;
    included.push(r);
    tokens += cost;
  }
  return { included, tokens };
}

export function buildPrompt(question: string, included: readonly RetrievedChunk[]): string {
  const passages = included.length > 0 ? included.map(formatPassage).join('\n\n') : '(no passages)';
  return [
    'Answer the question using only the document passages below.',
    'Each passage starts with a citation marker such as [report-2024#3]. Cite the marker of every passage you rely on, inline, exactly as written.',
    `If the passages do not contain the answer, reply exactly: "${NOT_IN_CONTEXT}"`,
    '',
    'Passages:',
    passages,
    '',
    `Question: ${question}`,
    'Answer:',
  ].join('\n');
}

/** Included passages whose marker appears in the answer, in order of first appearance. */
export function extractCitations(answer: string, included: readonly RetrievedChunk[]): Citation[] {
  const found: Array<{ at: number; citation: Citation }> = [];
  for (const r of included) {
    const marker = citationMarker(r.chunk.id);
    const at = answer.indexOf(marker);
    if (at < 0) continue;
    found.push({
      at,
      citation: {
        marker,
        chunkId: r.chunk.id,
        documentId: r.chunk.documentId,
        score: r.score,
        charStart: r.chunk.charStart,
        charEnd: r.chunk.charEnd,
      },
    });
  }
  return found.sort((a, b) => a.at - b.at).map((f) => f.citation);
}

export interface AnswerOrchestratorOptions {
  timeoutMs: number;
  countTokens?: TokenCounter;
}

export class AnswerOrchestrator {
  constructor(
    private readonly generator: GenerationFunction,
    private readonly options: AnswerOrchestratorOptions,
    private readonly logger: Logger,
  ) {}

  async answer(
    queryText: string,
    retrieved: readonly RetrievedChunk[],
    maxContextTokens: number,
    signal?: AbortSignal,
  ): Promise<AnswerResult> {
    if (!Number.isInteger(maxContextTokens) || maxContextTokens <= 0) {
      throw new InvalidArgumentError(`maxContextTokens must be a positive integer (got ${maxContextTokens})`, {
        operation: 'answer',
        details: { maxContextTokens },
      });
    }

    const { included, tokens } = assembleContext(retrieved, maxContextTokens, this.options.countTokens);
    if (included.length < retrieved.length) {
      this.logger.debug(
        { retrieved: retrieved.length, included: included.length, tokens, maxContextTokens },
        'Context budget reached; dropped lower-ranked passages',
      );
    }
    const prompt = buildPrompt(queryText, included);

    let raw: string;
    try {
      raw = await withTimeout((s) => this.generator.generate(prompt, { signal: s }), this.options.timeoutMs, signal);
    } catch (err) {
      throw new GenerationServiceError(`Generation failed: ${errorMessage(err)}`, {
        operation: 'answer',
        details: { passages: included.length, promptChars: prompt.length },
        cause: err,
      });
    }

    const answer = typeof raw === 'string' ? raw.trim() : '';
    if (answer.length === 0) {
      throw new GenerationServiceError('Generation returned an empty response', { operation: 'answer' });
    }

    return {
      answer,
      citations: extractCitations(answer, included),
      contextChunkIds: included.map((r) => r.chunk.id),
    };
  }
}

const SYSTEM_PROMPT =
  'You are a careful assistant answering questions about a library of PDF documents. ' +
  'Use only the passages you are given and cite them with their markers.';

/** Generation function backed by OpenAI chat completions. */
export class OpenAIGenerationFunction implements GenerationFunction {
  constructor(
    private readonly client: OpenAI,
    readonly modelName: string,
    private readonly temperature: number,
  ) {}

  async generate(prompt: string, options: { signal: AbortSignal }): Promise<string> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.modelName,
        temperature: this.temperature,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
      },
      { signal: options.signal },
    );
    const content = completion.choices[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new Error('Malformed completion: no message content');
    }
    return content;
  }
}
