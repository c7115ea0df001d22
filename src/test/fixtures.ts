import { fileURLToPath } from 'node:url'

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url))
}

export const BOGGLE_BOARD: string[][] = [
  ['C', 'A', 'T'],
  ['O', 'R', 'S'],
  ['D', 'E', 'N']
]

export const WORD_SEARCH_GRID: string[][] = [
  ['A', 'C', 'T'],
  ['C', 'R', 'E'],
  ['T', 'E', 'A']
]

// Tiles in upper case, a blank on the board in lower case ("CATcH" on row 7)
const SCRABBLE_ROWS = [
  'TEST***********',
  '*BOARD*********',
  '*O*P*O*********',
  '*N***I*********',
  '*Y***N*********',
  '*****GREET*****',
  '*******R*******',
  '******CATcH****',
  '********O******',
  '********P******',
  '***************',
  '***************',
  '***************',
  '***************',
  '***************'
]

export function scrabbleBoard(): string[][] {
  return SCRABBLE_ROWS.map(row => Array.from(row))
}

export const SCRABBLE_WORDS = ['CAT', 'DOG', 'CATCHT', 'TOO', 'TOOT', 'TAPING', 'RETAINS', 'GREET', 'TOP']
