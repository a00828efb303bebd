// Suggestion search: nearest known words within two edit generations,
// ranked by corpus frequency.

import { CandidateGenerator } from './candidates.js';
import { FrequencyModel, compareWords } from './frequency-model.js';
import { logDebug } from '../utils/log.js';

export interface SuggesterOptions {
  /** Words longer than this skip the search. Unbounded when omitted. */
  maxWordLength?: number;
}

export class Suggester {
  constructor(
    private readonly model: FrequencyModel,
    private readonly generator: CandidateGenerator = new CandidateGenerator(),
    private readonly options: SuggesterOptions = {}
  ) {}

  /**
   * Ranked alternatives for a word. A known word comes back as itself;
   * an unknown word with no known word within two edits gives [].
   *
   * Some misspellings are real words themselves, so false positives are possible.
   */
  suggest(word: string): string[] {
    const lower = word.toLowerCase();
    if (this.model.isKnown(lower)) return [lower];

    const { maxWordLength } = this.options;
    if (maxWordLength !== undefined && lower.length > maxWordLength) {
      logDebug('suggest', 'Word exceeds maxWordLength, skipping search', { word: lower, maxWordLength });
      return [];
    }

    const firstGeneration = this.generator.generate(lower);
    const known = this.model.filterKnown(firstGeneration);
    if (known.size > 0) {
      logDebug('suggest', 'Matched in first generation', { word: lower, matches: known.size });
      return this.rank(known);
    }

    // Expand every first-generation candidate, known or not.
    for (const candidate of firstGeneration) {
      for (const match of this.model.filterKnown(this.generator.generate(candidate))) {
        known.add(match);
      }
    }
    logDebug('suggest', 'Searched second generation', { word: lower, matches: known.size });
    return this.rank(known);
  }

  private rank(words: Set<string>): string[] {
    const { model } = this;
    return [...words].sort((a, b) => model.frequency(b) - model.frequency(a) || compareWords(a, b));
  }
}
