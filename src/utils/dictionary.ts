import { readFile } from 'node:fs/promises';
import { debugLog } from './debug';
import { ExternalResourceError } from './errors';

const WORD_PATTERN = /[\w']+/g;

// Splits text into runs of word characters and apostrophes, upper-cased
export function tokenizeWords(text: string): string[] {
  return text.toUpperCase().match(WORD_PATTERN) ?? [];
}

export async function loadWordsFile(path: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new ExternalResourceError(path, err);
  }

  const words = tokenizeWords(text);
  debugLog(`loaded ${words.length} words from ${path}`);
  return words;
}
