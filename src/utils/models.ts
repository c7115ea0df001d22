export interface Position {
  row: number;
  col: number;
}

export type Board = readonly (readonly string[])[];

// Scrabble boards also accept null for a free square
export type ScrabbleBoard = readonly (readonly (string | null)[])[];

export type Rack = readonly string[] | ReadonlySet<string> | string;

export enum Direction {
  North = 'N',
  NorthEast = 'NE',
  East = 'E',
  SouthEast = 'SE',
  South = 'S',
  SouthWest = 'SW',
  West = 'W',
  NorthWest = 'NW'
}

export type DirectionInput = Direction | `${Direction}` | Lowercase<Direction> | 'ALL' | 'all';

export enum Orientation {
  Horizontal = 'Horizontal',
  Vertical = 'Vertical'
}

// '*' plain, 'd' double letter, 't' triple letter, 'D' double word, 'T' triple word
export type PremiumSquare = '*' | 'd' | 't' | 'D' | 'T';

export interface Placement {
  word: string;
  x: number;
  y: number;
  orientation: Orientation;
}

export interface ScrabbleSolution extends Placement {
  score: number;
}

export interface BoggleAnswer {
  word: string;
  paths: Position[][];
}

export interface WordSearchHit {
  word: string;
  start: Position;
  end: Position;
  direction: Direction;
}

export interface LetterProbability {
  letter: string;
  probability: number;
}

// A letter the word must have at the given index
export type LetterRequirement = readonly [letter: string, position: number];
