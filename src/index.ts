// Library exports

export { SpellChecker, type SpellCheckerOptions } from './core/spell-checker.js';
export { FrequencyModel } from './core/frequency-model.js';
export { CandidateGenerator, DEFAULT_ALPHABET, type CandidateOptions } from './core/candidates.js';
export { Suggester, type SuggesterOptions } from './core/suggester.js';
export { checkText } from './core/checker.js';
export { applyCorrections } from './core/auto-corrector.js';
export { extractWords } from './core/tokenizer.js';
export { readCorpus, loadCorpus, type CorpusReadOptions } from './storage/corpus.js';
export { SpellError, NotInitializedError, CorpusLoadError, UnknownWordError } from './utils/errors.js';
export { loadConfig, saveConfig } from './utils/config.js';
export type { Config, MatchMode, SpellCheckItem, CorpusStats, WordCount, CorpusSource } from './types.js';
