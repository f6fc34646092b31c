// src/util/tokens.ts
// What: Token counting for prompt budgets.
// How: Roughly four characters per token for English prose; swap in a real tokenizer through TokenCounter.

export type TokenCounter = (text: string) => number;

export const estimateTokens: TokenCounter = (text) => Math.ceil(text.length / 4);
