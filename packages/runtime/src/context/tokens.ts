// Token estimation

/**
 * Characters per token used by the estimate
 */
export const CHARS_PER_TOKEN = 4;

/**
 * Rough token count of a text: one token per four characters, rounded up.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Longest prefix of `text` whose estimate fits in `tokens`
 */
export function truncateToTokens(text: string, tokens: number): string {
  if (tokens <= 0) return '';
  return text.slice(0, tokens * CHARS_PER_TOKEN);
}
