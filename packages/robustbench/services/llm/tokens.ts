import { get_encoding } from "tiktoken";

let encoder: ReturnType<typeof get_encoding> | null = null;

/**
 * Get or create the tiktoken encoder. The evaluated models are not OpenAI
 * models, so cl100k_base is used as a rough proxy for their tokenizers.
 */
function getEncoder() {
  if (!encoder) {
    encoder = get_encoding("cl100k_base");
  }
  return encoder;
}

/**
 * Estimate the number of tokens in a text string
 */
export function estimateTokens(text: string): number {
  return getEncoder().encode(text).length;
}

/**
 * Cleanup the encoder to free memory
 * Call this when done with token estimation
 */
export function cleanupEncoder(): void {
  encoder?.free();
  encoder = null;
}
