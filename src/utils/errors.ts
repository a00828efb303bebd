// Error taxonomy shared by the model, the corpus loader and the CLI

export type SpellErrorCode = 'NOT_INITIALIZED' | 'CORPUS_LOAD_FAILED' | 'UNKNOWN_WORD';

export class SpellError extends Error {
  readonly code: SpellErrorCode;

  constructor(message: string, code: SpellErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SpellError';
    this.code = code;
  }
}

/** Raised by every model query made before a corpus has been built. */
export class NotInitializedError extends SpellError {
  constructor() {
    super('Corpus not built. Call buildCorpus() before querying the model.', 'NOT_INITIALIZED');
    this.name = 'NotInitializedError';
  }
}

export class CorpusLoadError extends SpellError {
  readonly source: string;

  constructor(source: string, cause?: unknown) {
    super(`Could not load corpus from ${source}`, 'CORPUS_LOAD_FAILED', { cause });
    this.name = 'CorpusLoadError';
    this.source = source;
  }
}

export class UnknownWordError extends SpellError {
  readonly word: string;

  constructor(word: string) {
    super(`"${word}" is not in the corpus`, 'UNKNOWN_WORD');
    this.name = 'UnknownWordError';
    this.word = word;
  }
}
