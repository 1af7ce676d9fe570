// kanaroma/decodeTable - Romaji literal table (decode direction)
//
// The literal list is ordered by hand: three-letter literals first, then two-letter
// morae, then single vowels, then "n" and "-". The first listed literal that prefixes
// the input wins. LiteralTrie answers the same question without scanning the list:
// it returns the longest literal on the input's path, and for a literal listed twice
// (ji, zu) the first listing's kana.

import { defineTable, getDecodeTable } from './tables.js';

export interface LiteralMatch {
  /** Number of code points consumed */
  length: number;
  kana: string;
}

class TrieNode {
  children: Map<string, TrieNode> = new Map();
  // Kana for the literal ending at this node
  kana: string | null = null;
}

export class LiteralTrie {
  private root = new TrieNode();
  private size = 0;

  /**
   * Insert a literal. A literal that is already present keeps its first kana.
   */
  insert(literal: string, kana: string): void {
    let node = this.root;

    for (const char of literal) {
      let child = node.children.get(char);
      if (!child) {
        child = new TrieNode();
        node.children.set(char, child);
      }
      node = child;
    }

    if (node.kana === null) {
      node.kana = kana;
      this.size++;
    }
  }

  get literalCount(): number {
    return this.size;
  }

  /**
   * Longest literal that prefixes `chars` starting at `offset`
   */
  match(chars: readonly string[], offset = 0): LiteralMatch | null {
    let node = this.root;
    let best: LiteralMatch | null = null;

    for (let i = offset; i < chars.length; i++) {
      const next = node.children.get(chars[i]);
      if (!next) break;
      node = next;
      if (node.kana !== null) {
        best = { length: i - offset + 1, kana: node.kana };
      }
    }

    return best;
  }

  static fromLiterals(literals: ReadonlyArray<readonly [string, string]>): LiteralTrie {
    const trie = new LiteralTrie();
    for (const [literal, kana] of literals) {
      trie.insert(literal, kana);
    }
    return trie;
  }
}

const getLiteralTrie = defineTable('decode-trie', () => LiteralTrie.fromLiterals(getDecodeTable().literals));

/**
 * Ordered [literal, kana] entries backing the decoder
 */
export function decodeLiterals(): ReadonlyArray<readonly [string, string]> {
  return getDecodeTable().literals;
}

export function longestLiteralMatch(text: string | readonly string[], offset = 0): LiteralMatch | null {
  const chars = typeof text === 'string' ? Array.from(text) : text;
  return getLiteralTrie().match(chars, offset);
}
