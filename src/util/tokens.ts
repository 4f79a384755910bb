/**
 * Character-based token estimate.
 *
 * Uses a rough approximation: ~4 characters per token.
 * Actual tokenization varies by model; callers that need exact counts
 * should inject a real tokenizer through the model capability.
 */

export const CHARS_PER_TOKEN = 4

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN)
}
