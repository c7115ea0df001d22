import { debugLog } from './debug';
import { loadWordsFile } from './dictionary';
import { SolvingError } from './errors';
import { LetterProbability } from './models';
import { PositionalIndex } from './positionalIndex';
import { isAlphabetic, isLetter, validateCollection, validateIncorrectLetters, validatePattern } from './validation';

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

type Pattern = string | readonly string[];
type IncorrectLetters = string | readonly string[] | ReadonlySet<string>;

interface Reduction {
  candidates: Set<string>;
  known: Set<string>;
  incorrect: Set<string>;
}

/**
 * Narrows a dictionary down to the words that fit a partially revealed
 * Hangman pattern, and ranks the letters worth guessing next.
 */
export class HangmanSolver {
  private readonly index = new PositionalIndex();

  constructor(collection: Iterable<string>) {
    for (const entry of validateCollection(collection)) {
      if (isAlphabetic(entry)) {
        this.index.add(entry.toUpperCase());
      }
    }
    debugLog(`hangman solver indexed ${this.index.size} words`);
  }

  static async fromFile(path: string): Promise<HangmanSolver> {
    return new HangmanSolver(await loadWordsFile(path));
  }

  get wordCount(): number {
    return this.index.size;
  }

  solve(attempt: Pattern, incorrect: IncorrectLetters = []): string[] {
    const { candidates } = this.reduce(attempt, incorrect);
    debugLog(`hangman solve left ${candidates.size} candidates`);
    return Array.from(candidates).sort();
  }

  guessDistribution(attempt: Pattern, incorrect: IncorrectLetters = []): LetterProbability[] {
    const { candidates, known, incorrect: missed } = this.reduce(attempt, incorrect);
    if (candidates.size === 0) {
      throw new SolvingError('No words in the collection fit the pattern');
    }

    const distribution: LetterProbability[] = [];
    for (const letter of ALPHABET) {
      if (known.has(letter) || missed.has(letter)) continue;

      let count = 0;
      for (const word of candidates) {
        if (word.includes(letter)) count++;
      }
      distribution.push({ letter, probability: count / candidates.size });
    }

    return distribution.sort((a, b) => b.probability - a.probability || (a.letter < b.letter ? -1 : 1));
  }

  private reduce(attempt: Pattern, incorrect: IncorrectLetters): Reduction {
    const pattern = validatePattern(attempt);
    const missed = validateIncorrectLetters(incorrect);
    const length = pattern.length;

    const required = new Map<string, Set<number>>();
    pattern.forEach((character, position) => {
      if (!isLetter(character)) return;
      const positions = required.get(character) ?? new Set<number>();
      positions.add(position);
      required.set(character, positions);
    });

    const requirements = Array.from(required, ([letter, positions]) =>
      Array.from(positions, (position): readonly [string, number] => [letter, position])
    ).flat();
    const candidates = new Set(this.index.find(length, requirements));

    // A revealed letter shows every place it occurs, so it is absent from the other positions
    const forbidden: (readonly [string, number])[] = [];
    for (const [letter, positions] of required) {
      for (let position = 0; position < length; position++) {
        if (!positions.has(position)) forbidden.push([letter, position]);
      }
    }
    for (const letter of missed) {
      for (let position = 0; position < length; position++) {
        forbidden.push([letter, position]);
      }
    }

    for (const [letter, position] of forbidden) {
      for (const word of this.index.lookup(length, letter, position)) {
        candidates.delete(word);
      }
    }

    return { candidates, known: new Set(required.keys()), incorrect: missed };
  }
}
