import standardTables from '../data/scrabbleStandard.json';
import { InvalidParameterError } from './errors';
import { PremiumSquare } from './models';

export const DEFAULT_MIN_LENGTH = 3;

// Multi-letter strings a single board cell stands for, e.g. the Boggle "Qu" cube face
export const DEFAULT_SUBSTITUTIONS: Readonly<Record<string, string>> = Object.freeze({ QU: 'Q' });

export const BLANK_TILE = '#';
export const BINGO_BONUS = 50;
export const BINGO_TILES = 7;

const PREMIUM_SQUARES: readonly PremiumSquare[] = ['*', 'd', 't', 'D', 'T'];

export function isPremiumSquare(symbol: string): symbol is PremiumSquare {
  return PREMIUM_SQUARES.some(square => square === symbol);
}

export function parsePremiumLayout(rows: readonly string[]): PremiumSquare[][] {
  return rows.map((row, index) => Array.from(row, symbol => {
    if (!isPremiumSquare(symbol)) {
      throw new InvalidParameterError('premium', `unknown square '${symbol}' in row ${index}`);
    }
    return symbol;
  }));
}

export const STANDARD_VALUES: Readonly<Record<string, number>> = Object.freeze({ ...standardTables.values });

export const STANDARD_PREMIUM: readonly (readonly PremiumSquare[])[] = parsePremiumLayout(standardTables.premium);

export const BOARD_SIZE = STANDARD_PREMIUM.length;

export function emptyBoard(size: number = BOARD_SIZE): string[][] {
  return Array.from({ length: size }, () => Array<string>(size).fill('*'));
}

export const EMPTY_BOARD: readonly (readonly string[])[] = emptyBoard();
