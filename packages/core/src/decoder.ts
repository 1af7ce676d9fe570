// kanaroma/decoder - Romaji to hiragana

import { SOKUON_CHARACTERS, isGeminableLetter, toCodePoints } from './characters.js';
import { longestLiteralMatch } from './decodeTable.js';

/**
 * Convert romaji to hiragana.
 *
 * Longest literal match first; a doubled consonant other than "n" becomes っ
 * followed by the second letter's mora; anything else is copied through.
 *
 * @example
 * decodeRomajiToHiragana('gakkou')   // 'がっこう'
 * decodeRomajiToHiragana('konnichi') // 'こんにち'
 */
export function decodeRomajiToHiragana(text: string): string {
  const chars = toCodePoints(text);
  let out = '';
  let i = 0;

  while (i < chars.length) {
    const match = longestLiteralMatch(chars, i);
    if (match) {
      out += match.kana;
      i += match.length;
      continue;
    }

    const current = chars[i];
    if (i + 1 < chars.length && chars[i + 1] === current && isGeminableLetter(current)) {
      out += SOKUON_CHARACTERS.hiragana;
      i += 1;
      continue;
    }

    out += current;
    i += 1;
  }

  return out;
}
