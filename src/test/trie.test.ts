import { describe, expect, it } from 'vitest'
import { PrefixTrie } from '../utils/trie'

describe('PrefixTrie', () => {
  it('should mark only completed words', () => {
    const trie = new PrefixTrie()
    trie.add('CAT')
    trie.add('CATS')

    expect(trie.has('CAT')).toBe(true)
    expect(trie.has('CATS')).toBe(true)
    expect(trie.has('CA')).toBe(false)
    expect(trie.has('DOG')).toBe(false)
    expect(trie.size).toBe(2)
  })

  it('should share prefix nodes between words', () => {
    const trie = new PrefixTrie()
    trie.add('CAT')
    trie.add('CAR')

    const c = trie.getChild(trie.root, 'C')
    const a = c && trie.getChild(c, 'A')
    expect(trie.root.children.size).toBe(1)
    expect(a?.children.size).toBe(2)
    expect(a && trie.getChild(a, 'R')?.word).toBe('CAR')
    expect(a?.word).toBeNull()
  })

  it('should return undefined for a missing child', () => {
    const trie = new PrefixTrie()
    trie.add('CAT')
    expect(trie.getChild(trie.root, 'X')).toBeUndefined()
  })

  it('should treat adding a word twice as a single word', () => {
    const trie = new PrefixTrie()
    trie.add('CAT')
    trie.add('CAT')
    expect(trie.size).toBe(1)
    expect(trie.has('CAT')).toBe(true)
  })

  it('should forget everything after clear', () => {
    const trie = new PrefixTrie()
    trie.add('CAT')
    trie.add('DOG')
    trie.clear()

    expect(trie.size).toBe(0)
    expect(trie.has('CAT')).toBe(false)
    expect(trie.root.children.size).toBe(0)
  })
})
