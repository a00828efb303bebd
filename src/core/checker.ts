// Text checker: distinct unknown words of a text, each with its suggestions.

import { extractWords } from './tokenizer.js';
import type { FrequencyModel } from './frequency-model.js';
import type { Suggester } from './suggester.js';
import type { SpellCheckItem } from '../types.js';

export function checkText(text: string, model: FrequencyModel, suggester: Suggester): SpellCheckItem[] {
  const items: SpellCheckItem[] = [];
  for (const word of model.filterUnknown(extractWords(text))) {
    items.push(Object.freeze({
      suspectedWord: word,
      suggestedAlternatives: Object.freeze(suggester.suggest(word)),
    }));
  }
  return items;
}
