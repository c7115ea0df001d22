import { describe, expect, it } from 'vitest'
import { loadWordsFile, tokenizeWords } from '../utils/dictionary'
import { ExternalResourceError } from '../utils/errors'
import { fixturePath } from './fixtures'

describe('tokenizeWords', () => {
  it('should split on anything but word characters and apostrophes', () => {
    expect(tokenizeWords("Don't panic, it's 42!")).toEqual(["DON'T", 'PANIC', "IT'S", '42'])
  })

  it('should return nothing for blank text', () => {
    expect(tokenizeWords('  \n ')).toEqual([])
  })
})

describe('loadWordsFile', () => {
  it('should read and tokenize a word file', async () => {
    await expect(loadWordsFile(fixturePath('words.txt'))).resolves.toEqual([
      'CAT', 'CATS', 'CAR', 'CARS', 'ART', 'ROD', 'RED', 'QUIT', 'QUITE', "DON'T"
    ])
  })

  it('should wrap read failures', async () => {
    const path = fixturePath('missing.txt')
    await expect(loadWordsFile(path)).rejects.toThrow(ExternalResourceError)
    await expect(loadWordsFile(path)).rejects.toMatchObject({ path })
  })
})
