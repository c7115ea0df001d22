export class TrieNode {
  readonly letter: string;
  readonly children = new Map<string, TrieNode>();
  // Set when the path from the root to this node spells a whole word
  word: string | null = null;

  constructor(letter: string = '') {
    this.letter = letter;
  }

  getChild(letter: string): TrieNode | undefined {
    return this.children.get(letter);
  }

  addChild(letter: string): TrieNode {
    const child = new TrieNode(letter);
    this.children.set(letter, child);
    return child;
  }
}

/**
 * Prefix tree of words. Every word added is a path of letter nodes from the
 * root, so a search can stop as soon as no child matches the next letter.
 */
export class PrefixTrie {
  readonly root = new TrieNode();
  private wordCount = 0;

  add(word: string): void {
    let current = this.root;
    for (const letter of word) {
      current = current.getChild(letter) ?? current.addChild(letter);
    }
    if (current.word === null) {
      this.wordCount++;
    }
    current.word = word;
  }

  getChild(node: TrieNode, letter: string): TrieNode | undefined {
    return node.getChild(letter);
  }

  has(word: string): boolean {
    let current: TrieNode | undefined = this.root;
    for (const letter of word) {
      current = current.getChild(letter);
      if (!current) return false;
    }
    return current.word !== null;
  }

  get size(): number {
    return this.wordCount;
  }

  clear(): void {
    this.root.children.clear();
    this.root.word = null;
    this.wordCount = 0;
  }
}
