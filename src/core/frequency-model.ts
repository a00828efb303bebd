// Frequency model: word -> occurrence count, rebuilt wholesale from corpus text.

import { extractWords } from './tokenizer.js';
import { NotInitializedError, UnknownWordError } from '../utils/errors.js';
import { logInfo } from '../utils/log.js';
import type { CorpusStats, WordCount } from '../types.js';

interface Snapshot {
  readonly counts: ReadonlyMap<string, number>;
  readonly totalWords: number;
}

/**
 * Known words and their corpus frequency.
 *
 * The counts live in one immutable snapshot. `build` computes a new snapshot
 * and swaps the reference, so a reader sees either the previous corpus or the
 * new one in full. Queries before the first build throw NotInitializedError.
 */
export class FrequencyModel {
  private snapshot: Snapshot | null = null;

  build(text: string): void {
    const words = extractWords(text);
    const counts = new Map<string, number>();
    for (const word of words) {
      counts.set(word, (counts.get(word) ?? 0) + 1);
    }
    this.snapshot = { counts, totalWords: words.length };
    logInfo('model', 'Corpus built', { distinctWords: counts.size, totalWords: words.length });
  }

  get isBuilt(): boolean {
    return this.snapshot !== null;
  }

  /** Number of distinct known words. */
  get size(): number {
    return this.current().counts.size;
  }

  get totalWords(): number {
    return this.current().totalWords;
  }

  isKnown(word: string): boolean {
    return this.current().counts.has(word.toLowerCase());
  }

  /** Count for a known word. Guard with isKnown: unknown words throw. */
  frequency(word: string): number {
    const lower = word.toLowerCase();
    const count = this.current().counts.get(lower);
    if (count === undefined) throw new UnknownWordError(lower);
    return count;
  }

  filterKnown(words: Iterable<string>): Set<string> {
    return this.filter(words, true);
  }

  filterUnknown(words: Iterable<string>): Set<string> {
    return this.filter(words, false);
  }

  entries(): Iterable<[string, number]> {
    return this.current().counts.entries();
  }

  /** Most frequent words first; equal counts in alphabetical order. */
  stats(top = 10): CorpusStats {
    const { counts, totalWords } = this.current();
    const topWords: WordCount[] = [...counts]
      .map(([word, count]) => ({ word, count }))
      .sort((a, b) => b.count - a.count || compareWords(a.word, b.word))
      .slice(0, Math.max(0, top));
    return { distinctWords: counts.size, totalWords, topWords };
  }

  private filter(words: Iterable<string>, known: boolean): Set<string> {
    const { counts } = this.current();
    const result = new Set<string>();
    for (const word of words) {
      const lower = word.toLowerCase();
      if (counts.has(lower) === known) result.add(lower);
    }
    return result;
  }

  private current(): Snapshot {
    if (!this.snapshot) throw new NotInitializedError();
    return this.snapshot;
  }
}

/** Plain code-unit order, independent of locale. */
export function compareWords(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
