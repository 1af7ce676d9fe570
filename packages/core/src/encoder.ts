// kanaroma/encoder - Katakana to romaji

import { SOKUON_CHARACTERS, toCodePoints } from './characters.js';
import { getRuleTable, type RuleTable } from './rules.js';
import type { RomanizationSystem } from './system.js';

/**
 * Romaji of the mora starting at `index`: a yoon pair when the next two
 * characters form one, otherwise the single character.
 */
export function resolveNextRomaji(
  rules: RuleTable,
  chars: readonly string[],
  index: number
): { romaji: string; consumed: number } {
  if (index >= chars.length) {
    return { romaji: '', consumed: 0 };
  }
  if (index + 1 < chars.length) {
    const combo = rules.digraphLookup(chars[index], chars[index + 1]);
    if (combo !== null) {
      return { romaji: combo, consumed: 2 };
    }
  }
  return { romaji: rules.singleLookup(chars[index]), consumed: 1 };
}

/**
 * Convert katakana to romaji under the given system.
 *
 * One left-to-right pass, one mora of lookahead. Characters outside the
 * katakana table (hiragana included) produce no output.
 *
 * @example
 * encodeKatakanaToRomaji('チケット', 'hepburn') // 'chiketto'
 * encodeKatakanaToRomaji('チケット', 'kunrei')  // 'tiketto'
 */
export function encodeKatakanaToRomaji(text: string, system: RomanizationSystem): string {
  const rules = getRuleTable(system);
  const chars = toCodePoints(text);
  let out = '';
  let i = 0;

  while (i < chars.length) {
    if (i + 1 < chars.length) {
      const combo = rules.digraphLookup(chars[i], chars[i + 1]);
      if (combo !== null) {
        out += combo;
        i += 2;
        continue;
      }
    }

    if (chars[i] === SOKUON_CHARACTERS.katakana && i + 1 < chars.length) {
      const { romaji } = resolveNextRomaji(rules, chars, i + 1);
      if (romaji.length > 0) {
        // Only the marker is consumed; the next mora is emitted on the next pass
        out += rules.geminationPrefix(romaji);
        i += 1;
        continue;
      }
    }

    out += rules.singleLookup(chars[i]);
    i += 1;
  }

  return out;
}

export function kanaToRomajiHepburn(text: string): string {
  return encodeKatakanaToRomaji(text, 'hepburn');
}

export function kanaToRomajiKunrei(text: string): string {
  return encodeKatakanaToRomaji(text, 'kunrei');
}
