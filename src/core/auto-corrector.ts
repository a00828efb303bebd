// Auto-correction: rewrite a text with the top suggestion for each suspected word.

import type { MatchMode, SpellCheckItem } from '../types.js';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function occurrencePattern(word: string, mode: MatchMode): RegExp {
  const escaped = escapeRegExp(word);
  // With the i flag [a-z] also covers A-Z.
  const source = mode === 'word' ? `(?<![a-z])${escaped}(?![a-z])` : escaped;
  return new RegExp(source, 'gi');
}

function startsUppercase(value: string): boolean {
  return /^[A-Z]/.test(value);
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * Apply check results to a text, item by item, in order.
 *
 * Replacements are written in lowercase; an occurrence that started with a
 * capital keeps its initial capital. Each item is matched against the text
 * as already rewritten by the items before it.
 *
 * In `substring` mode a suspected word is also replaced inside longer words
 * ("teh" in "tehran"). `word` mode only replaces whole letter runs.
 */
export function applyCorrections(
  text: string,
  items: readonly SpellCheckItem[],
  mode: MatchMode = 'substring'
): string {
  let result = text;
  for (const item of items) {
    const top = item.suggestedAlternatives[0];
    if (top === undefined) continue;
    const replacement = top.toLowerCase();
    result = result.replace(occurrencePattern(item.suspectedWord, mode), (original: string) =>
      startsUppercase(original) ? capitalize(replacement) : replacement
    );
  }
  return result;
}
