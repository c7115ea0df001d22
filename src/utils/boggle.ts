import { DEFAULT_MIN_LENGTH, DEFAULT_SUBSTITUTIONS } from './config';
import { debugLog } from './debug';
import { loadWordsFile } from './dictionary';
import { Board, BoggleAnswer, Position } from './models';
import { PrefixTrie, TrieNode } from './trie';
import { isAlphabetic, validateBoolean, validateCollection, validateGrid, validateMinLength } from './validation';

export interface BoggleOptions {
  minLength?: number;
  substitutions?: Readonly<Record<string, string>>;
}

interface PartialPath {
  node: TrieNode;
  path: Position[];
}

export function isAdjacent(pos1: Position, pos2: Position): boolean {
  const rowDiff = Math.abs(pos1.row - pos2.row);
  const colDiff = Math.abs(pos1.col - pos2.col);
  return (rowDiff <= 1 && colDiff <= 1) && !(rowDiff === 0 && colDiff === 0);
}

// Neighbours of the last position of the path that the path has not used yet
function getAdjacent(board: string[][], path: Position[]): Position[] {
  const last = path[path.length - 1];
  const adjacent: Position[] = [];

  for (let row = Math.max(0, last.row - 1); row < Math.min(board.length, last.row + 2); row++) {
    for (let col = Math.max(0, last.col - 1); col < Math.min(board[0].length, last.col + 2); col++) {
      if (!path.some(pos => pos.row === row && pos.col === col)) {
        adjacent.push({ row, col });
      }
    }
  }

  return adjacent;
}

/**
 * Finds every dictionary word that can be traced on a Boggle board through
 * adjacent cells without reusing a cell.
 */
export class BoggleSolver {
  readonly minLength: number;
  readonly substitutions: Readonly<Record<string, string>>;
  private readonly trie = new PrefixTrie();

  constructor(collection: Iterable<string>, options: BoggleOptions = {}) {
    const {
      minLength = DEFAULT_MIN_LENGTH,
      substitutions = DEFAULT_SUBSTITUTIONS,
    } = options;

    this.minLength = validateMinLength(minLength);
    this.substitutions = { ...substitutions };

    for (const entry of validateCollection(collection)) {
      const word = entry.toUpperCase();
      if (!isAlphabetic(word) || word.length < this.minLength) continue;

      const substituted = this.substitute(word);
      // e.g. "QAT" cannot be spelled when every Q cell reads as "QU"
      if (this.restore(substituted) !== word) continue;
      this.trie.add(substituted);
    }

    debugLog(`boggle solver indexed ${this.trie.size} words`);
  }

  static async fromFile(path: string, options: BoggleOptions = {}): Promise<BoggleSolver> {
    return new BoggleSolver(await loadWordsFile(path), options);
  }

  get wordCount(): number {
    return this.trie.size;
  }

  solve(board: Board, withPositions?: false): string[];
  solve(board: Board, withPositions: true): BoggleAnswer[];
  solve(board: Board, withPositions: boolean = false): string[] | BoggleAnswer[] {
    const grid = validateGrid('board', board, cell => this.substitute(cell.toUpperCase()));
    validateBoolean('withPositions', withPositions);

    const wordPaths = new Map<string, Position[][]>();
    for (let row = 0; row < grid.length; row++) {
      for (let col = 0; col < grid[row].length; col++) {
        this.searchFrom(grid, row, col, wordPaths);
      }
    }

    debugLog(`boggle solve found ${wordPaths.size} words`);

    if (withPositions) {
      return Array.from(wordPaths, ([word, paths]) => ({ word, paths }))
        .sort((a, b) => b.word.length - a.word.length);
    }
    return Array.from(wordPaths.keys()).sort((a, b) => b.length - a.length);
  }

  private searchFrom(board: string[][], row: number, col: number, wordPaths: Map<string, Position[][]>): void {
    const firstNode = this.trie.getChild(this.trie.root, board[row][col]);
    if (!firstNode) return;

    const start: Position[] = [{ row, col }];
    this.record(firstNode, start, wordPaths);

    const stack: PartialPath[] = [{ node: firstNode, path: start }];
    while (stack.length > 0) {
      const current = stack.pop();
      if (!current) break;

      for (const next of getAdjacent(board, current.path)) {
        const nextNode = this.trie.getChild(current.node, board[next.row][next.col]);
        if (!nextNode) continue;

        const nextPath = [...current.path, next];
        this.record(nextNode, nextPath, wordPaths);
        stack.push({ node: nextNode, path: nextPath });
      }
    }
  }

  private record(node: TrieNode, path: Position[], wordPaths: Map<string, Position[][]>): void {
    if (node.word === null) return;

    const word = this.restore(node.word);
    // Paths from one start cell share Position objects while searching
    const copy = path.map(pos => ({ ...pos }));
    const paths = wordPaths.get(word);
    if (paths) {
      paths.push(copy);
    } else {
      wordPaths.set(word, [copy]);
    }
  }

  private substitute(text: string): string {
    let result = text;
    for (const [sequence, symbol] of Object.entries(this.substitutions)) {
      result = result.replaceAll(sequence, symbol);
    }
    return result;
  }

  private restore(text: string): string {
    let result = text;
    for (const [sequence, symbol] of Object.entries(this.substitutions)) {
      result = result.replaceAll(symbol, sequence);
    }
    return result;
  }
}
