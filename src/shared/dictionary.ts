import fs from "node:fs";

import type { DictionaryOracle } from "../splitter/types.js";

/**
 * Word-list dictionary. Membership is case-insensitive.
 */
export class WordListDictionary implements DictionaryOracle {
  private readonly words: Set<string>;

  constructor(words: Iterable<string> = []) {
    this.words = new Set();
    for (const word of words) {
      this.add(word);
    }
  }

  add(word: string): void {
    const normalized = word.trim().toLowerCase();
    if (normalized.length > 0) {
      this.words.add(normalized);
    }
  }

  isWord(token: string): boolean {
    if (!token) {
      return false;
    }
    return this.words.has(token.toLowerCase());
  }

  get size(): number {
    return this.words.size;
  }
}

/**
 * Loads one word per line from each file into a single dictionary.
 * Blank lines and `#` comments are skipped.
 */
export function loadWordList(filePaths: readonly string[]): WordListDictionary {
  const dictionary = new WordListDictionary();
  for (const filePath of filePaths) {
    if (!fs.existsSync(filePath)) {
      throw new Error(`Dictionary word list not found at ${filePath} → check the path or configuration`);
    }
    const lines = fs.readFileSync(filePath, "utf8").split(/\r?\n/);
    for (const line of lines) {
      const word = line.trim();
      if (word.length === 0 || word.startsWith("#")) {
        continue;
      }
      dictionary.add(word);
    }
  }
  return dictionary;
}
