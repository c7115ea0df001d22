import { describe, expect, it } from 'vitest'
import { EMPTY_BOARD, parsePremiumLayout } from '../utils/config'
import { InvalidParameterError } from '../utils/errors'
import { Orientation, Placement, ScrabbleSolution } from '../utils/models'
import { INVALID_PLACEMENT_SCORE, ScrabbleSolver, transpose } from '../utils/scrabble'
import { SCRABBLE_WORDS, fixturePath, scrabbleBoard } from './fixtures'

function vertical(word: string, x: number, y: number): Placement {
  return { word, x, y, orientation: Orientation.Vertical }
}

function horizontal(word: string, x: number, y: number): Placement {
  return { word, x, y, orientation: Orientation.Horizontal }
}

function flipped(solution: ScrabbleSolution): ScrabbleSolution {
  return {
    ...solution,
    x: solution.y,
    y: solution.x,
    orientation: solution.orientation === Orientation.Horizontal ? Orientation.Vertical : Orientation.Horizontal
  }
}

function solutionKey({ word, x, y, orientation, score }: ScrabbleSolution): string {
  return `${word}|${x}|${y}|${orientation}|${score}`
}

describe('ScrabbleSolver', () => {
  const solver = new ScrabbleSolver(SCRABBLE_WORDS)

  describe('getScore', () => {
    it('should score the crossing word through an existing blank', () => {
      expect(solver.getScore(scrabbleBoard(), ['#', '#', 'T'], vertical('Too', 11, 7))).toBe(16)
    })

    it('should reject a word the rack cannot cover', () => {
      expect(solver.getScore(scrabbleBoard(), ['#', '#', 'T'], vertical('TOOT', 11, 7))).toBe(INVALID_PLACEMENT_SCORE)
    })

    it('should score a word extending existing tiles on a double word square', () => {
      expect(solver.getScore(scrabbleBoard(), ['I', 'N', 'G'], vertical('TAPING', 3, 0))).toBe(18)
    })

    it('should add the bingo bonus when seven tiles are placed', () => {
      const rack = ['R', 'E', 'T', 'A', 'I', 'N', 'S']
      expect(solver.getScore(EMPTY_BOARD, rack, horizontal('RETAINS', 1, 7))).toBe(66)
    })

    it('should return the sentinel for illegal placements', () => {
      const board = scrabbleBoard()
      const rack = ['C', 'A', 'T', 'D', 'O', 'G']
      // not connected to anything
      expect(solver.getScore(EMPTY_BOARD, rack, horizontal('CAT', 0, 0))).toBe(INVALID_PLACEMENT_SCORE)
      // not in the dictionary
      expect(solver.getScore(EMPTY_BOARD, rack, horizontal('ACT', 6, 7))).toBe(INVALID_PLACEMENT_SCORE)
      // runs off the board
      expect(solver.getScore(EMPTY_BOARD, rack, horizontal('CAT', 13, 7))).toBe(INVALID_PLACEMENT_SCORE)
      // a board tile differs from the word
      expect(solver.getScore(board, ['I', 'N', 'G'], vertical('TOO', 3, 0))).toBe(INVALID_PLACEMENT_SCORE)
      // nothing new is placed
      expect(solver.getScore(board, rack, vertical('TOP', 8, 7))).toBe(INVALID_PLACEMENT_SCORE)
      // the square after the word holds a tile
      expect(solver.getScore(board, rack, horizontal('CAT', 3, 7))).toBe(INVALID_PLACEMENT_SCORE)
    })

    it('should reject malformed attempts', () => {
      const attempt = { word: 'CAT', x: 5, y: 7, orientation: 'Diagonal' } as unknown as Placement
      expect(() => solver.getScore(EMPTY_BOARD, ['C', 'A', 'T'], attempt)).toThrow(InvalidParameterError)
      expect(() => solver.getScore(EMPTY_BOARD, ['C', 'A', 'T'], horizontal('C4T', 5, 7))).toThrow(InvalidParameterError)
    })
  })

  describe('solve', () => {
    it('should find every placement through the centre of an empty board', () => {
      const solutions = solver.solve(EMPTY_BOARD, ['C', 'A', 'T', 'D', 'O', 'G'])

      expect(solutions).toHaveLength(12)
      expect(solutions.every(solution => solution.score === 10)).toBe(true)
      expect(solutions.slice(0, 6)).toEqual([
        { word: 'CAT', x: 7, y: 5, orientation: Orientation.Vertical, score: 10 },
        { word: 'CAT', x: 7, y: 6, orientation: Orientation.Vertical, score: 10 },
        { word: 'CAT', x: 5, y: 7, orientation: Orientation.Horizontal, score: 10 },
        { word: 'CAT', x: 6, y: 7, orientation: Orientation.Horizontal, score: 10 },
        { word: 'CAT', x: 7, y: 7, orientation: Orientation.Horizontal, score: 10 },
        { word: 'CAT', x: 7, y: 7, orientation: Orientation.Vertical, score: 10 }
      ])
      expect(solutions.slice(6).every(solution => solution.word === 'DOG')).toBe(true)
    })

    it('should play blanks as lower case letters worth nothing', () => {
      const solutions = solver.solve(EMPTY_BOARD, ['#', 'A', 'T'])

      expect(solutions).toHaveLength(6)
      expect(solutions.every(solution => solution.word === 'cAT' && solution.score === 4)).toBe(true)
    })

    it('should accept the rack as a string', () => {
      expect(solver.solve(EMPTY_BOARD, 'C A T D O G')).toEqual(solver.solve(EMPTY_BOARD, ['C', 'A', 'T', 'D', 'O', 'G']))
    })

    it('should include placements built on existing tiles', () => {
      const board = scrabbleBoard()
      expect(solver.solve(board, ['I', 'N', 'G'])).toContainEqual(
        { word: 'TAPING', x: 3, y: 0, orientation: Orientation.Vertical, score: 18 }
      )
      expect(solver.solve(board, ['#', '#', 'T'])).toContainEqual(
        { word: 'Too', x: 11, y: 7, orientation: Orientation.Vertical, score: 16 }
      )
    })

    it('should agree with getScore for every solution', () => {
      const board = scrabbleBoard()
      const rack = ['#', 'O', 'T']
      for (const { score, ...placement } of solver.solve(board, rack)) {
        expect(solver.getScore(board, rack, placement)).toBe(score)
      }
    })

    it('should mirror solutions on a transposed board', () => {
      const board = scrabbleBoard()
      const rack = ['#', 'O', 'T']
      const direct = solver.solve(board, rack).map(flipped).map(solutionKey).sort()
      const mirrored = solver.solve(transpose(board), rack).map(solutionKey).sort()

      expect(direct.length).toBeGreaterThan(0)
      expect(mirrored).toEqual(direct)
    })

    it('should return the same result on repeated calls', () => {
      const board = scrabbleBoard()
      const rack = ['#', 'O', 'T']
      expect(solver.solve(board, rack)).toEqual(solver.solve(board, rack))
    })

    it('should return nothing for an empty rack', () => {
      expect(solver.solve(EMPTY_BOARD, [])).toEqual([])
      expect(solver.solve(scrabbleBoard(), '')).toEqual([])
    })

    it('should not modify the board passed in', () => {
      const board = scrabbleBoard()
      solver.solve(board, ['#', 'O', 'T'])
      expect(board).toEqual(scrabbleBoard())
    })

    it('should use a custom premium layout', () => {
      const small = new ScrabbleSolver(['cat'], { premium: parsePremiumLayout(['***', '***', '***']) })
      const board = [['*', '*', '*'], ['*', '*', '*'], ['*', '*', '*']]

      expect(small.solve(board, ['C', 'A', 'T'])).toEqual([
        { word: 'CAT', x: 1, y: 0, orientation: Orientation.Vertical, score: 5 },
        { word: 'CAT', x: 0, y: 1, orientation: Orientation.Horizontal, score: 5 }
      ])
    })

    it('should reject malformed boards and racks', () => {
      expect(() => solver.solve([['*']], ['C'])).toThrow(InvalidParameterError)
      expect(() => solver.solve(EMPTY_BOARD, ['C', '?'])).toThrow(InvalidParameterError)
    })
  })

  it('should load its words from a file', async () => {
    const fromFile = await ScrabbleSolver.fromFile(fixturePath('words.txt'))
    expect(fromFile.wordCount).toBe(9)
    expect(fromFile.solve(EMPTY_BOARD, ['C', 'A', 'T'])).toHaveLength(6)
  })

  it('should reject a letter as the blank placeholder', () => {
    expect(() => new ScrabbleSolver(SCRABBLE_WORDS, { blank: 'A' })).toThrow(InvalidParameterError)
  })
})

describe('transpose', () => {
  it('should swap rows and columns', () => {
    expect(transpose([['A', 'B', 'C'], ['D', 'E', 'F']])).toEqual([['A', 'D'], ['B', 'E'], ['C', 'F']])
    expect(transpose([])).toEqual([])
  })
})
