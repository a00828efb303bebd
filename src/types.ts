// Types for corpus-spell

export type MatchMode = 'substring' | 'word';

export interface Config {
  corpus: string[];
  encoding: BufferEncoding;
  alphabet: string;
  omitFinalLetter: boolean;
  matchMode: MatchMode;
  maxWordLength: number;
  suggestionLimit: number;
}

/** An unknown word found in a text, paired with ranked corrections. */
export interface SpellCheckItem {
  readonly suspectedWord: string;
  readonly suggestedAlternatives: readonly string[];
}

export interface WordCount {
  word: string;
  count: number;
}

export interface CorpusStats {
  distinctWords: number;
  totalWords: number;
  topWords: WordCount[];
}

export interface CorpusSource {
  text: string;
  files: string[];
}
