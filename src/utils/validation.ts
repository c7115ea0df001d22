import { InvalidParameterError } from './errors';
import { Direction, Orientation, Placement } from './models';

const SINGLE_LETTER = /^[A-Za-z]$/;
const ALPHABETIC = /^[A-Za-z]+$/;

const DIRECTION_ORDER: readonly Direction[] = [
  Direction.North,
  Direction.NorthEast,
  Direction.East,
  Direction.SouthEast,
  Direction.South,
  Direction.SouthWest,
  Direction.West,
  Direction.NorthWest
];

export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Set) return 'set';
  return typeof value;
}

export function isLetter(value: string): boolean {
  return SINGLE_LETTER.test(value);
}

export function isAlphabetic(value: string): boolean {
  return ALPHABETIC.test(value);
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return typeof value === 'object' && value !== null && Symbol.iterator in value;
}

// Word collections: arrays, sets or any other iterable of strings
export const validateCollection = (collection: unknown): string[] => {
  if (typeof collection === 'string') {
    throw new InvalidParameterError(
      'collection',
      'expected an iterable of words, received a string (use loadWordsFile or tokenizeWords for text)'
    );
  }
  if (!isIterable(collection)) {
    throw new InvalidParameterError('collection', `expected an iterable of words, received ${describeType(collection)}`);
  }

  const words: string[] = [];
  let index = 0;
  for (const entry of collection) {
    if (typeof entry !== 'string') {
      throw new InvalidParameterError('collection', `entry ${index} is ${describeType(entry)}, expected a string`);
    }
    words.push(entry);
    index++;
  }
  return words;
};

export const validateMinLength = (minLength: unknown): number => {
  if (typeof minLength !== 'number' || !Number.isInteger(minLength)) {
    throw new InvalidParameterError('minLength', `expected an integer, received ${describeType(minLength)}`);
  }
  if (minLength < 0) {
    throw new InvalidParameterError('minLength', 'value must be non-negative');
  }
  return minLength;
};

export const validateBoolean = (parameter: string, value: unknown): boolean => {
  if (typeof value !== 'boolean') {
    throw new InvalidParameterError(parameter, `expected a boolean, received ${describeType(value)}`);
  }
  return value;
};

function validateRows(parameter: string, grid: unknown): unknown[][] {
  if (!Array.isArray(grid)) {
    throw new InvalidParameterError(parameter, `expected an array of rows, received ${describeType(grid)}`);
  }

  const rows: unknown[][] = [];
  const widths = new Set<number>();
  grid.forEach((row: unknown, index: number) => {
    if (!Array.isArray(row)) {
      throw new InvalidParameterError(parameter, `row ${index} is ${describeType(row)}, expected an array`);
    }
    rows.push(row);
    widths.add(row.length);
  });

  if (widths.size > 1) {
    throw new InvalidParameterError(parameter, 'not all rows are the same size');
  }
  return rows;
}

/**
 * Checks a rectangular grid of strings and returns a normalised copy. Each
 * cell goes through `normalize` and must come out as a single character.
 */
export const validateGrid = (
  parameter: string,
  grid: unknown,
  normalize: (cell: string) => string
): string[][] => {
  const rows = validateRows(parameter, grid);

  const normalized = rows.map((row, index) => row.map(cell => {
    if (typeof cell !== 'string') {
      throw new InvalidParameterError(parameter, `row ${index} contains ${describeType(cell)}, expected strings`);
    }
    return normalize(cell);
  }));

  normalized.forEach((row, index) => {
    for (const cell of row) {
      if (cell.length !== 1) {
        throw new InvalidParameterError(parameter, `row ${index}: cannot convert '${cell}' into a letter`);
      }
    }
  });

  return normalized;
};

/**
 * Scrabble boards: upper case tiles, lower case blanks, anything else (or
 * null) is a free square and becomes '*'.
 */
export const validateScrabbleBoard = (board: unknown, height: number, width: number): string[][] => {
  const rows = validateRows('board', board);
  if (rows.length !== height) {
    throw new InvalidParameterError('board', `expected ${height} rows, received ${rows.length}`);
  }
  if (rows.some(row => row.length !== width)) {
    throw new InvalidParameterError('board', `not all rows are ${width} squares long`);
  }

  return rows.map((row, index) => row.map(cell => {
    if (cell === null) return '*';
    if (typeof cell !== 'string') {
      throw new InvalidParameterError('board', `row ${index} contains ${describeType(cell)}, expected strings`);
    }
    if (!isAlphabetic(cell)) return '*';
    if (cell.length !== 1) {
      throw new InvalidParameterError('board', `row ${index}: cannot convert '${cell}' into a letter`);
    }
    return cell;
  }));
};

export const validateRack = (rack: unknown, blank: string): string[] => {
  let tiles: unknown[];
  if (typeof rack === 'string') {
    tiles = rack.split(/\s+/).filter(tile => tile.length > 0);
  } else if (Array.isArray(rack)) {
    tiles = rack;
  } else if (rack instanceof Set) {
    tiles = Array.from(rack);
  } else {
    throw new InvalidParameterError('rack', `expected an array, set or string, received ${describeType(rack)}`);
  }

  return tiles.map((tile, index) => {
    if (typeof tile !== 'string') {
      throw new InvalidParameterError('rack', `tile ${index} is ${describeType(tile)}, expected a string`);
    }
    if (tile === blank) return blank;
    if (!isLetter(tile)) {
      throw new InvalidParameterError('rack', `tile ${index} ('${tile}') is neither a letter nor the blank '${blank}'`);
    }
    return tile.toUpperCase();
  });
};

function isOrientation(value: unknown): value is Orientation {
  return value === Orientation.Horizontal || value === Orientation.Vertical;
}

export const validateAttempt = (attempt: unknown): Placement => {
  if (typeof attempt !== 'object' || attempt === null || Array.isArray(attempt)) {
    throw new InvalidParameterError('attempt', `expected a placement object, received ${describeType(attempt)}`);
  }

  const word = 'word' in attempt ? attempt.word : undefined;
  const x = 'x' in attempt ? attempt.x : undefined;
  const y = 'y' in attempt ? attempt.y : undefined;
  const orientation = 'orientation' in attempt ? attempt.orientation : undefined;

  if (typeof word !== 'string' || !isAlphabetic(word)) {
    throw new InvalidParameterError('attempt', 'the word value is not an alphabetical string');
  }
  if (typeof x !== 'number' || !Number.isInteger(x)) {
    throw new InvalidParameterError('attempt', 'the x value is not an integer');
  }
  if (typeof y !== 'number' || !Number.isInteger(y)) {
    throw new InvalidParameterError('attempt', 'the y value is not an integer');
  }
  if (!isOrientation(orientation)) {
    throw new InvalidParameterError('attempt', `the orientation value must be '${Orientation.Horizontal}' or '${Orientation.Vertical}'`);
  }

  return { word, x, y, orientation };
};

export const validateDirections = (directions: unknown): Direction[] => {
  let entries: unknown[];
  if (Array.isArray(directions)) {
    entries = directions;
  } else if (directions instanceof Set) {
    entries = Array.from(directions);
  } else {
    throw new InvalidParameterError('directions', `expected an array or set, received ${describeType(directions)}`);
  }

  const requested = new Set<string>();
  entries.forEach((entry, index) => {
    if (typeof entry !== 'string') {
      throw new InvalidParameterError('directions', `entry ${index} is ${describeType(entry)}, expected a string`);
    }
    requested.add(entry.toUpperCase());
  });

  for (const code of requested) {
    if (code !== 'ALL' && !DIRECTION_ORDER.some(direction => direction === code)) {
      throw new InvalidParameterError('directions', `'${code}' is not one of N, NE, E, SE, S, SW, W, NW or ALL`);
    }
  }

  if (requested.has('ALL')) {
    return [...DIRECTION_ORDER];
  }
  return DIRECTION_ORDER.filter(direction => requested.has(direction));
};

// Hangman patterns: known letters, anything else marks an unknown position
export const validatePattern = (attempt: unknown): string[] => {
  let characters: unknown[];
  if (typeof attempt === 'string') {
    characters = Array.from(attempt);
  } else if (Array.isArray(attempt)) {
    characters = attempt;
  } else {
    throw new InvalidParameterError('attempt', `expected a string or array, received ${describeType(attempt)}`);
  }

  if (characters.length === 0) {
    throw new InvalidParameterError('attempt', 'the pattern is empty');
  }

  return characters.map((character, index) => {
    if (typeof character !== 'string') {
      throw new InvalidParameterError('attempt', `position ${index} is ${describeType(character)}, expected a string`);
    }
    if (character.length !== 1) {
      throw new InvalidParameterError('attempt', `position ${index} ('${character}') is not a single character`);
    }
    return character.toUpperCase();
  });
};

export const validateIncorrectLetters = (incorrect: unknown): Set<string> => {
  let letters: unknown[];
  if (typeof incorrect === 'string') {
    letters = Array.from(incorrect);
  } else if (Array.isArray(incorrect)) {
    letters = incorrect;
  } else if (incorrect instanceof Set) {
    letters = Array.from(incorrect);
  } else {
    throw new InvalidParameterError('incorrect', `expected a string, array or set, received ${describeType(incorrect)}`);
  }

  const result = new Set<string>();
  letters.forEach((letter, index) => {
    if (typeof letter !== 'string' || !isLetter(letter)) {
      throw new InvalidParameterError('incorrect', `entry ${index} is not a single letter`);
    }
    result.add(letter.toUpperCase());
  });
  return result;
};
