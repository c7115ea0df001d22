import { debugLog } from './debug';
import { loadWordsFile } from './dictionary';
import { Board, Direction, DirectionInput, Position, WordSearchHit } from './models';
import { PrefixTrie } from './trie';
import { validateCollection, validateDirections, validateGrid } from './validation';

type SliceGenerator = (width: number, height: number) => Generator<Position[]>;

function* northSlices(width: number, height: number): Generator<Position[]> {
  for (let col = 0; col < width; col++) {
    const slice: Position[] = [];
    for (let row = height - 1; row >= 0; row--) {
      slice.push({ row, col });
    }
    yield slice;
  }
}

function* northEastSlices(width: number, height: number): Generator<Position[]> {
  for (let diag = 0; diag < width + height - 1; diag++) {
    const slice: Position[] = [];
    for (let col = Math.max(0, diag - height + 1); col < Math.min(width, diag + 1); col++) {
      slice.push({ row: diag - col, col });
    }
    yield slice;
  }
}

function* eastSlices(width: number, height: number): Generator<Position[]> {
  for (let row = 0; row < height; row++) {
    const slice: Position[] = [];
    for (let col = 0; col < width; col++) {
      slice.push({ row, col });
    }
    yield slice;
  }
}

function* southEastSlices(width: number, height: number): Generator<Position[]> {
  for (let diag = 0; diag < width + height - 1; diag++) {
    const slice: Position[] = [];
    for (let col = Math.max(0, diag - height + 1); col < Math.min(width, diag + 1); col++) {
      slice.push({ row: col - diag + height - 1, col });
    }
    yield slice;
  }
}

function* southSlices(width: number, height: number): Generator<Position[]> {
  for (let col = 0; col < width; col++) {
    const slice: Position[] = [];
    for (let row = 0; row < height; row++) {
      slice.push({ row, col });
    }
    yield slice;
  }
}

function* southWestSlices(width: number, height: number): Generator<Position[]> {
  for (let diag = 0; diag < width + height - 1; diag++) {
    const slice: Position[] = [];
    for (let col = Math.min(width, diag + 1) - 1; col >= Math.max(0, diag - height + 1); col--) {
      slice.push({ row: diag - col, col });
    }
    yield slice;
  }
}

function* westSlices(width: number, height: number): Generator<Position[]> {
  for (let row = 0; row < height; row++) {
    const slice: Position[] = [];
    for (let col = width - 1; col >= 0; col--) {
      slice.push({ row, col });
    }
    yield slice;
  }
}

function* northWestSlices(width: number, height: number): Generator<Position[]> {
  for (let diag = 0; diag < width + height - 1; diag++) {
    const slice: Position[] = [];
    for (let col = Math.min(width, diag + 1) - 1; col >= Math.max(0, diag - height + 1); col--) {
      slice.push({ row: col - diag + height - 1, col });
    }
    yield slice;
  }
}

export const SLICE_GENERATORS: Readonly<Record<Direction, SliceGenerator>> = {
  [Direction.North]: northSlices,
  [Direction.NorthEast]: northEastSlices,
  [Direction.East]: eastSlices,
  [Direction.SouthEast]: southEastSlices,
  [Direction.South]: southSlices,
  [Direction.SouthWest]: southWestSlices,
  [Direction.West]: westSlices,
  [Direction.NorthWest]: northWestSlices,
};

export class WordSearchSolver {
  private readonly trie = new PrefixTrie();

  constructor(collection: Iterable<string>) {
    for (const word of validateCollection(collection)) {
      this.trie.add(word.toUpperCase());
    }
    debugLog(`word search solver indexed ${this.trie.size} words`);
  }

  static async fromFile(path: string): Promise<WordSearchSolver> {
    return new WordSearchSolver(await loadWordsFile(path));
  }

  get wordCount(): number {
    return this.trie.size;
  }

  solve(grid: Board, directions: readonly DirectionInput[] | ReadonlySet<DirectionInput> = ['ALL']): WordSearchHit[] {
    const letters = validateGrid('grid', grid, cell => cell.toUpperCase());
    const requested = validateDirections(directions);

    const height = letters.length;
    const width = height > 0 ? letters[0].length : 0;

    const hits: WordSearchHit[] = [];
    for (const direction of requested) {
      for (const slice of SLICE_GENERATORS[direction](width, height)) {
        hits.push(...this.scanSlice(letters, slice, direction));
      }
    }

    debugLog(`word search found ${hits.length} hits`);
    return hits;
  }

  // Words of two or more letters read forwards along the slice from any offset
  private scanSlice(letters: string[][], slice: Position[], direction: Direction): WordSearchHit[] {
    const hits: WordSearchHit[] = [];

    for (let begin = 0; begin < slice.length; begin++) {
      const start = slice[begin];
      let node = this.trie.getChild(this.trie.root, letters[start.row][start.col]);

      for (let end = begin + 1; node && end < slice.length; end++) {
        const cell = slice[end];
        node = this.trie.getChild(node, letters[cell.row][cell.col]);
        if (node?.word) {
          hits.push({ word: node.word, start, end: cell, direction });
        }
      }
    }

    return hits;
  }
}
