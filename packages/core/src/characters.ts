// kanaroma/characters - Character sets shared by the encoder and decoder

export const SOKUON_CHARACTERS = { katakana: 'ッ', hiragana: 'っ' } as const;

export const HIRAGANA_REGEX = /[ぁ-ゖゝゞ]/;

const VOWELS = new Set(['a', 'i', 'u', 'e', 'o']);

/**
 * Consonant test used on romaji produced by the encoder.
 * Output is lowercase, so only lowercase letters qualify.
 */
export function isRomajiConsonant(char: string): boolean {
  return /^[a-z]$/.test(char) && !VOWELS.has(char);
}

/**
 * Consonant test used on raw decoder input. Any ASCII letter counts except the
 * lowercase vowels and `n` (a doubled `n` is two ん, never a geminate).
 */
export function isGeminableLetter(char: string): boolean {
  return /^[A-Za-z]$/.test(char) && !VOWELS.has(char) && char !== 'n';
}

/**
 * Split a string into Unicode scalar values (not UTF-16 code units)
 */
export function toCodePoints(text: string): string[] {
  return Array.from(text);
}
