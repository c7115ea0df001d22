export { BoggleSolver, isAdjacent } from './utils/boggle';
export type { BoggleOptions } from './utils/boggle';
export { STANDARD_CUBES, shakeBoard } from './utils/boardGeneration';
export {
  BINGO_BONUS,
  BINGO_TILES,
  BLANK_TILE,
  BOARD_SIZE,
  DEFAULT_MIN_LENGTH,
  DEFAULT_SUBSTITUTIONS,
  EMPTY_BOARD,
  STANDARD_PREMIUM,
  STANDARD_VALUES,
  emptyBoard,
  parsePremiumLayout
} from './utils/config';
export { loadWordsFile, tokenizeWords } from './utils/dictionary';
export { ExternalResourceError, InvalidParameterError, SolverError, SolvingError } from './utils/errors';
export { HangmanSolver } from './utils/hangman';
export { Direction, Orientation } from './utils/models';
export type {
  Board,
  BoggleAnswer,
  DirectionInput,
  LetterProbability,
  LetterRequirement,
  Placement,
  Position,
  PremiumSquare,
  Rack,
  ScrabbleBoard,
  ScrabbleSolution,
  WordSearchHit
} from './utils/models';
export { PositionalIndex } from './utils/positionalIndex';
export { INVALID_PLACEMENT_SCORE, ScrabbleSolver, transpose } from './utils/scrabble';
export type { ScrabbleOptions } from './utils/scrabble';
export { BOGGLE_SCHEME, scoreBoggleWord, scoreBoggleWords, scoreCrossLetters, scoreMajorWord } from './utils/scoring';
export { PrefixTrie, TrieNode } from './utils/trie';
export { WordSearchSolver } from './utils/wordSearch';
