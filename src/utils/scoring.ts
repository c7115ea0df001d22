import { PremiumSquare } from './models';

const LETTER_MULTIPLIERS: Partial<Record<PremiumSquare, number>> = { d: 2, t: 3 };
const WORD_MULTIPLIERS: Partial<Record<PremiumSquare, number>> = { D: 2, T: 3 };

// Points per word length in Boggle; anything longer than 8 scores as 8
export const BOGGLE_SCHEME: Readonly<Record<number, number>> = {
  0: 0, 1: 0, 2: 0, 3: 1, 4: 1, 5: 2, 6: 3, 7: 5, 8: 11,
};

export function letterMultiplier(square: PremiumSquare): number {
  return LETTER_MULTIPLIERS[square] ?? 1;
}

export function wordMultiplier(square: PremiumSquare): number {
  return WORD_MULTIPLIERS[square] ?? 1;
}

// Lower case letters are blanks and are worth nothing
export function letterValue(values: Readonly<Record<string, number>>, letter: string): number {
  return values[letter] ?? 0;
}

/**
 * Score of the main word of a move. `squares[n]` is the premium square under
 * letter n when that letter is newly placed, or null when the letter was
 * already on the board (premiums only count the turn they are covered).
 */
export function scoreMajorWord(
  word: string,
  squares: readonly (PremiumSquare | null)[],
  values: Readonly<Record<string, number>>
): number {
  let total = 0;
  let multiplier = 1;

  for (let n = 0; n < word.length; n++) {
    const square = squares[n];
    if (square === null) {
      total += letterValue(values, word[n]);
    } else {
      total += letterValue(values, word[n]) * letterMultiplier(square);
      multiplier *= wordMultiplier(square);
    }
  }

  return total * multiplier;
}

/**
 * Scores of the crossing word made by placing each candidate letter on
 * `square`. `existing` are the letters already on the board in that word.
 * Upper case keys are tiles from the rack, lower case keys are blanks.
 */
export function scoreCrossLetters(
  existing: readonly string[],
  candidates: Iterable<string>,
  square: PremiumSquare,
  values: Readonly<Record<string, number>>
): Map<string, number> {
  const base = existing.reduce((sum, letter) => sum + letterValue(values, letter.toUpperCase()), 0);
  const multiplier = wordMultiplier(square);
  const scores = new Map<string, number>();

  for (const letter of candidates) {
    scores.set(letter, multiplier * (base + letterMultiplier(square) * letterValue(values, letter)));
    scores.set(letter.toLowerCase(), multiplier * base);
  }

  return scores;
}

export function scoreBoggleWord(word: string): number {
  return BOGGLE_SCHEME[Math.min(word.length, 8)] ?? 0;
}

export function scoreBoggleWords(words: Iterable<string>): number {
  let total = 0;
  for (const word of words) {
    total += scoreBoggleWord(word);
  }
  return total;
}
