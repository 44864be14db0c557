/**
 * Embedding cost estimate.
 *
 * Tokens are estimated at ~4 characters each; the embeddings API bills
 * input tokens only.
 */

/** USD per 1M input tokens (update when prices change) */
const PRICING: Record<string, number> = {
  'text-embedding-3-small': 0.02,
  'text-embedding-3-large': 0.13,
  'text-embedding-ada-002': 0.1,
};

export interface UsageEstimate {
  model: string;
  /** Texts sent to the API (cache hits and repeats excluded) */
  texts: number;
  tokens: number;
  /** Undefined for a model without a known price */
  costUsd?: number;
}

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Price of `tokens` input tokens, or undefined for an unknown model.
 */
export function estimateCost(tokens: number, model: string): number | undefined {
  const perMillion = PRICING[model];
  return perMillion === undefined ? undefined : (tokens / 1_000_000) * perMillion;
}

/**
 * @param texts - Texts billed by the API, each counted once
 */
export function estimateUsage(texts: Iterable<string>, model: string): UsageEstimate {
  let count = 0;
  let tokens = 0;
  for (const text of texts) {
    count++;
    tokens += estimateTokens(text);
  }
  return { model, texts: count, tokens, costUsd: estimateCost(tokens, model) };
}
