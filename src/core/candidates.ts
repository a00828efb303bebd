// Candidate generator: every string one edit away from a word.
//
// Possible misspellings are a missing letter (tday), a swapped pair (teh),
// a wrong letter (dzte) and an extra letter (dzate). Each split of the word
// into left/right halves seeds one variant of each kind.

export const DEFAULT_ALPHABET = 'abcdefghijklmnopqrstuvwxyz';

export interface CandidateOptions {
  alphabet?: string;
  /**
   * Leave the alphabet's last letter out of substitutions and insertions.
   * Only for reproducing results from older builds that had this bound.
   */
  omitFinalLetter?: boolean;
}

export class CandidateGenerator {
  readonly letters: readonly string[];

  constructor(options: CandidateOptions = {}) {
    const letters = [...(options.alphabet ?? DEFAULT_ALPHABET)];
    this.letters = options.omitFinalLetter ? letters.slice(0, -1) : letters;
  }

  /**
   * All strings reachable by one deletion, transposition, substitution or
   * insertion. Iteration order is fixed: deletions, transpositions,
   * substitutions, insertions; each by split position, then alphabet order.
   */
  generate(word: string): Set<string> {
    const splits: Array<[string, string]> = [];
    for (let i = 0; i <= word.length; i++) {
      splits.push([word.slice(0, i), word.slice(i)]);
    }

    const result = new Set<string>();

    for (const [left, right] of splits) {
      if (right.length > 0) result.add(left + right.slice(1));
    }

    for (const [left, right] of splits) {
      if (right.length > 1) result.add(left + right[1] + right[0] + right.slice(2));
    }

    for (const [left, right] of splits) {
      if (right.length === 0) continue;
      for (const c of this.letters) result.add(left + c + right.slice(1));
    }

    for (const [left, right] of splits) {
      for (const c of this.letters) result.add(left + c + right);
    }

    return result;
  }
}
