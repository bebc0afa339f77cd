/**
 * Whitespace word count, at least 1. A display metric for throughput figures;
 * it bears no relation to any backend's tokenizer.
 */
export function countTokens(text: string): number {
  const words = text.split(/\s+/).filter((w) => w.length > 0)
  return Math.max(1, words.length)
}
