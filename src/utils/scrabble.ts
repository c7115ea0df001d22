import { BINGO_BONUS, BINGO_TILES, BLANK_TILE, STANDARD_PREMIUM, STANDARD_VALUES } from './config';
import { debugLog } from './debug';
import { loadWordsFile } from './dictionary';
import { InvalidParameterError } from './errors';
import { LetterRequirement, Orientation, Placement, PremiumSquare, Rack, ScrabbleBoard, ScrabbleSolution } from './models';
import { PositionalIndex } from './positionalIndex';
import { scoreCrossLetters, scoreMajorWord } from './scoring';
import { isAlphabetic, isLetter, validateAttempt, validateCollection, validateRack, validateScrabbleBoard } from './validation';

export const INVALID_PLACEMENT_SCORE = -1;

const FREE = '*';
const OFF_BOARD = '';
const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

type CrossScores = ReadonlyMap<string, number>;
type PremiumLayout = readonly (readonly PremiumSquare[])[];

// A free square with nothing above or below takes any tile and forms no crossing word
const ALLOW_ALL: CrossScores = new Map(
  Array.from(ALPHABET + ALPHABET.toLowerCase(), (letter): [string, number] => [letter, 0])
);
const OCCUPIED: CrossScores = new Map();

export interface ScrabbleOptions {
  values?: Readonly<Record<string, number>>;
  premium?: PremiumLayout;
  blank?: string;
  bingoBonus?: number;
  bingoTiles?: number;
}

// Everything a single axis of one solve needs; vertical moves use the transposed board
interface AxisContext {
  board: string[][];
  premium: PremiumLayout;
  minor: CrossScores[][];
  rack: string[];
}

interface AxisMove {
  word: string;
  x: number;
  y: number;
  score: number;
}

export function transpose<T>(grid: readonly (readonly T[])[]): T[][] {
  if (grid.length === 0) return [];
  return grid[0].map((_, col) => grid.map(row => row[col]));
}

function getTile(context: AxisContext, x: number, y: number): string {
  const row = context.board[y];
  if (!row || x < 0 || x >= row.length) return OFF_BOARD;
  return row[x];
}

function isVerticallyAdjacent(context: AxisContext, x: number, y: number): boolean {
  const height = context.board.length;
  const width = context.board[0].length;
  if (x * 2 === width - 1 && y * 2 === height - 1) return true;
  return isLetter(getTile(context, x, y - 1)) || isLetter(getTile(context, x, y + 1));
}

// Tiles used for the placed letters: the rack's own tile when it has one, the blank otherwise
function takeRackTiles(rack: readonly string[], letters: readonly string[], blank: string): string[] | null {
  const remaining = [...rack];
  const tiles: string[] = [];

  for (const letter of letters) {
    const upper = letter.toUpperCase();
    let index = letter === upper ? remaining.indexOf(upper) : -1;
    if (index >= 0) {
      tiles.push(upper);
    } else {
      index = remaining.indexOf(blank);
      if (index < 0) return null;
      tiles.push(letter.toLowerCase());
    }
    remaining.splice(index, 1);
  }

  return tiles;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareSolutions(a: ScrabbleSolution, b: ScrabbleSolution): number {
  return b.score - a.score
    || compareStrings(a.word, b.word)
    || a.y - b.y
    || a.x - b.x
    || compareStrings(a.orientation, b.orientation);
}

/**
 * Finds every legal move for a rack on a Scrabble board and scores it,
 * including the crossing words each newly placed tile forms.
 */
export class ScrabbleSolver {
  readonly values: Readonly<Record<string, number>>;
  readonly premium: PremiumLayout;
  readonly blank: string;
  readonly bingoBonus: number;
  readonly bingoTiles: number;
  private readonly index = new PositionalIndex();

  constructor(collection: Iterable<string>, options: ScrabbleOptions = {}) {
    const {
      values = STANDARD_VALUES,
      premium = STANDARD_PREMIUM,
      blank = BLANK_TILE,
      bingoBonus = BINGO_BONUS,
      bingoTiles = BINGO_TILES,
    } = options;

    if (premium.length === 0 || premium[0].length === 0) {
      throw new InvalidParameterError('premium', 'the layout has no squares');
    }
    if (premium.some(row => row.length !== premium[0].length)) {
      throw new InvalidParameterError('premium', 'not all rows are the same size');
    }
    if (blank.length !== 1 || isLetter(blank)) {
      throw new InvalidParameterError('blank', `'${blank}' must be a single non-letter character`);
    }

    this.values = values;
    this.premium = premium;
    this.blank = blank;
    this.bingoBonus = bingoBonus;
    this.bingoTiles = bingoTiles;

    for (const entry of validateCollection(collection)) {
      if (isAlphabetic(entry)) {
        this.index.add(entry.toUpperCase());
      }
    }

    debugLog(`scrabble solver indexed ${this.index.size} words`);
  }

  static async fromFile(path: string, options: ScrabbleOptions = {}): Promise<ScrabbleSolver> {
    return new ScrabbleSolver(await loadWordsFile(path), options);
  }

  get wordCount(): number {
    return this.index.size;
  }

  get height(): number {
    return this.premium.length;
  }

  get width(): number {
    return this.premium[0].length;
  }

  solve(board: ScrabbleBoard, rack: Rack): ScrabbleSolution[] {
    const grid = validateScrabbleBoard(board, this.height, this.width);
    const tiles = validateRack(rack, this.blank);
    if (tiles.length === 0) return [];

    const solutions = new Map<string, ScrabbleSolution>();
    const collect = (solution: ScrabbleSolution) => {
      const { word, x, y, orientation, score } = solution;
      solutions.set(`${word}|${x}|${y}|${orientation}|${score}`, solution);
    };

    const horizontal = this.prepare(grid, this.premium, tiles);
    for (const { word, x, y, score } of this.axisMoves(horizontal)) {
      collect({ word, x, y, orientation: Orientation.Horizontal, score });
    }

    const vertical = this.prepare(transpose(grid), transpose(this.premium), tiles);
    for (const { word, x, y, score } of this.axisMoves(vertical)) {
      collect({ word, x: y, y: x, orientation: Orientation.Vertical, score });
    }

    debugLog(`scrabble solve found ${solutions.size} moves`);
    return Array.from(solutions.values()).sort(compareSolutions);
  }

  /**
   * Score of a single move, or INVALID_PLACEMENT_SCORE when the move is not
   * legal on this board with this rack. Lower case letters in the word are
   * played with blanks.
   */
  getScore(board: ScrabbleBoard, rack: Rack, attempt: Placement): number {
    const grid = validateScrabbleBoard(board, this.height, this.width);
    const tiles = validateRack(rack, this.blank);
    const { word, x, y, orientation } = validateAttempt(attempt);

    if (orientation === Orientation.Vertical) {
      return this.scorePlacement(this.prepare(transpose(grid), transpose(this.premium), tiles), word, y, x);
    }
    return this.scorePlacement(this.prepare(grid, this.premium, tiles), word, x, y);
  }

  private prepare(board: string[][], premium: PremiumLayout, rack: string[]): AxisContext {
    const context: AxisContext = { board, premium, minor: [], rack };
    context.minor = board.map((row, y) => row.map((_, x) => this.crossScores(context, x, y)));
    return context;
  }

  // Letters that can go on (x, y) given the column it sits in, with the crossing word's score
  private crossScores(context: AxisContext, x: number, y: number): CrossScores {
    if (context.board[y][x] !== FREE) return OCCUPIED;

    const above: string[] = [];
    for (let row = y - 1; isLetter(getTile(context, x, row)); row--) {
      above.unshift(getTile(context, x, row));
    }
    const below: string[] = [];
    for (let row = y + 1; isLetter(getTile(context, x, row)); row++) {
      below.push(getTile(context, x, row));
    }
    if (above.length === 0 && below.length === 0) return ALLOW_ALL;

    const offset = above.length;
    const requirements: LetterRequirement[] = [
      ...above.map((letter, n): LetterRequirement => [letter.toUpperCase(), n]),
      ...below.map((letter, n): LetterRequirement => [letter.toUpperCase(), offset + 1 + n]),
    ];

    const candidates = new Set<string>();
    for (const word of this.index.find(offset + 1 + below.length, requirements)) {
      candidates.add(word[offset]);
    }

    return scoreCrossLetters([...above, ...below], candidates, context.premium[y][x], this.values);
  }

  private *axisMoves(context: AxisContext): Generator<AxisMove> {
    for (let y = 0; y < context.board.length; y++) {
      for (let x = 0; x < context.board[y].length; x++) {
        for (const { word, score } of this.movesFrom(context, x, y)) {
          yield { word, x, y, score };
        }
      }
    }
  }

  // Words starting at (x, y) and running right, one candidate length per free square reached
  private *movesFrom(context: AxisContext, x: number, y: number): Generator<{ word: string; score: number }> {
    if (isLetter(getTile(context, x - 1, y))) return;

    const width = context.board[y].length;
    const placements: number[] = [];
    const requirements: LetterRequirement[] = [];
    let adjacent = false;

    for (let n = 0; x + n <= width; n++) {
      const tile = getTile(context, x + n, y);

      if (isLetter(tile)) {
        requirements.push([tile.toUpperCase(), n]);
      } else if (requirements.length > 0 || adjacent) {
        yield* this.placeWords(context, this.index.find(n, requirements), x, y, placements);
      }

      if (tile === OFF_BOARD) break;
      if (tile === FREE) {
        if (placements.length === context.rack.length) break;
        placements.push(n);
        adjacent = adjacent || isVerticallyAdjacent(context, x + n, y);
      }
    }
  }

  private *placeWords(
    context: AxisContext,
    words: Iterable<string>,
    x: number,
    y: number,
    placements: readonly number[]
  ): Generator<{ word: string; score: number }> {
    if (placements.length === 0) return;

    for (const word of words) {
      const tiles = takeRackTiles(context.rack, placements.map(n => word[n]), this.blank);
      if (!tiles) continue;

      const letters = Array.from(word.toUpperCase());
      const squares: (PremiumSquare | null)[] = letters.map(() => null);
      let score = 0;
      let legal = true;

      for (let i = 0; i < placements.length; i++) {
        const n = placements[i];
        const cross = context.minor[y][x + n].get(tiles[i]);
        if (cross === undefined) {
          legal = false;
          break;
        }
        score += cross;
        letters[n] = tiles[i];
        squares[n] = context.premium[y][x + n];
      }
      if (!legal) continue;

      const played = letters.join('');
      score += scoreMajorWord(played, squares, this.values);
      if (placements.length === this.bingoTiles) {
        score += this.bingoBonus;
      }
      yield { word: played, score };
    }
  }

  private scorePlacement(context: AxisContext, word: string, x: number, y: number): number {
    if (isLetter(getTile(context, x - 1, y))) return INVALID_PLACEMENT_SCORE;
    if (isLetter(getTile(context, x + word.length, y))) return INVALID_PLACEMENT_SCORE;
    if (!this.index.has(word.toUpperCase())) return INVALID_PLACEMENT_SCORE;

    const placements: number[] = [];
    let adjacent = false;

    for (let n = 0; n < word.length; n++) {
      const tile = getTile(context, x + n, y);
      if (tile === OFF_BOARD) return INVALID_PLACEMENT_SCORE;

      if (isLetter(tile)) {
        if (tile.toUpperCase() !== word[n].toUpperCase()) return INVALID_PLACEMENT_SCORE;
        adjacent = true;
      } else {
        if (placements.length === context.rack.length) return INVALID_PLACEMENT_SCORE;
        placements.push(n);
        adjacent = adjacent || isVerticallyAdjacent(context, x + n, y);
      }
    }

    if (!adjacent) return INVALID_PLACEMENT_SCORE;
    for (const move of this.placeWords(context, [word], x, y, placements)) {
      return move.score;
    }
    return INVALID_PLACEMENT_SCORE;
  }
}
