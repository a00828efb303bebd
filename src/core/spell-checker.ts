// SpellChecker: one corpus model plus the operations built on it.
// Independent instances can coexist, e.g. one per language.

import { FrequencyModel } from './frequency-model.js';
import { CandidateGenerator } from './candidates.js';
import { Suggester } from './suggester.js';
import { checkText } from './checker.js';
import { applyCorrections } from './auto-corrector.js';
import type { CorpusStats, MatchMode, SpellCheckItem } from '../types.js';

export interface SpellCheckerOptions {
  alphabet?: string;
  omitFinalLetter?: boolean;
  matchMode?: MatchMode;
  maxWordLength?: number;
}

export class SpellChecker {
  private readonly model = new FrequencyModel();
  private readonly suggester: Suggester;
  private readonly matchMode: MatchMode;

  constructor(options: SpellCheckerOptions = {}) {
    const generator = new CandidateGenerator({
      alphabet: options.alphabet,
      omitFinalLetter: options.omitFinalLetter,
    });
    this.suggester = new Suggester(this.model, generator, { maxWordLength: options.maxWordLength });
    this.matchMode = options.matchMode ?? 'substring';
  }

  /** Replace the model with one built from the given sample text. */
  buildCorpus(text: string): void {
    this.model.build(text);
  }

  get isBuilt(): boolean {
    return this.model.isBuilt;
  }

  isKnown(word: string): boolean {
    return this.model.isKnown(word);
  }

  frequency(word: string): number {
    return this.model.frequency(word);
  }

  findKnownWords(words: Iterable<string>): Set<string> {
    return this.model.filterKnown(words);
  }

  findUnknownWords(words: Iterable<string>): Set<string> {
    return this.model.filterUnknown(words);
  }

  suggestAlternatives(word: string): string[] {
    return this.suggester.suggest(word);
  }

  check(text: string): SpellCheckItem[] {
    return checkText(text, this.model, this.suggester);
  }

  /** Corrections are lowercase apart from initial capitals, which are kept. */
  autoCorrect(text: string): string {
    return applyCorrections(text, this.check(text), this.matchMode);
  }

  stats(top?: number): CorpusStats {
    return this.model.stats(top);
  }
}
