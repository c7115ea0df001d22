import { LetterRequirement } from './models';

const EMPTY: ReadonlySet<string> = new Set<string>();

function hashKey(length: number, letter: string, position: number): string {
  return `${length}:${letter}:${position}`;
}

/**
 * Reverse lookup from (word length, letter, index) to every word of that
 * length with that letter at that index. A word sits under one key per letter
 * it contains, and also in a plain length index.
 */
export class PositionalIndex {
  private table = new Map<string, Set<string>>();
  private lengths = new Map<number, Set<string>>();
  private words = new Set<string>();

  add(word: string): void {
    const length = word.length;
    for (let position = 0; position < length; position++) {
      const key = hashKey(length, word[position], position);
      let bucket = this.table.get(key);
      if (!bucket) {
        bucket = new Set();
        this.table.set(key, bucket);
      }
      bucket.add(word);
    }

    let sameLength = this.lengths.get(length);
    if (!sameLength) {
      sameLength = new Set();
      this.lengths.set(length, sameLength);
    }
    sameLength.add(word);
    this.words.add(word);
  }

  lookup(length: number, letter: string, position: number): ReadonlySet<string> {
    return this.table.get(hashKey(length, letter, position)) ?? EMPTY;
  }

  wordsOfLength(length: number): ReadonlySet<string> {
    return this.lengths.get(length) ?? EMPTY;
  }

  // Words of the given length meeting every requirement; all of them when there are none
  find(length: number, requirements: readonly LetterRequirement[]): ReadonlySet<string> {
    if (requirements.length === 0) {
      return this.wordsOfLength(length);
    }

    const matches = requirements
      .map(([letter, position]) => this.lookup(length, letter, position))
      .sort((a, b) => a.size - b.size);

    const [smallest, ...rest] = matches;
    const result = new Set<string>();
    for (const word of smallest) {
      if (rest.every(bucket => bucket.has(word))) {
        result.add(word);
      }
    }
    return result;
  }

  has(word: string): boolean {
    return this.words.has(word);
  }

  get size(): number {
    return this.words.size;
  }

  clear(): void {
    this.table = new Map();
    this.lengths = new Map();
    this.words = new Set();
  }
}
