// Tokenizer: lowercase a-z runs of a text, in order, repeats kept.

const WORD_PATTERN = /[a-z]+/g;

/**
 * Extract every maximal run of unaccented Roman letters, lowercased.
 * Digits, punctuation and accented letters act as separators and are dropped.
 * Not deduplicated: repeats matter for frequency counting.
 */
export function extractWords(text: string): string[] {
  return text.toLowerCase().match(WORD_PATTERN) ?? [];
}
