// kanaroma/verb/infer - Guess a verb's conjugation class from its surface form

import { fail, ok, type ConjugationClass, type VerbResult } from './types.js';

// Godan verbs ending in -iru/-eru that the vowel heuristic would call ichidan
export const GODAN_EXCEPTIONS = new Set([
  '入る', '要る', 'いる', '切る', '千切る', '限る', 'かぎる', '握る', 'にぎる',
  '知る', 'しる', '走る', 'はしる', '交じる', '混じる', 'まじる', '散る', 'ちる',
  '帰る', '蹴る', 'ける', '焦る', 'あせる', '減る', 'へる', '滑る', 'すべる',
  '喋る', 'しゃべる'
]);

const GODAN_ENDINGS = new Set(['う', 'く', 'ぐ', 'す', 'つ', 'ぬ', 'ぶ', 'む']);

// Kana of the i column, plus 見 (みる)
const I_SOUNDS = new Set(['い', 'き', 'ぎ', 'し', 'じ', 'ち', 'ぢ', 'に', 'ひ', 'び', 'ぴ', 'み', 'り', '見']);

// Kana of the e column, plus 出 (でる) and 寝 (ねる)
const E_SOUNDS = new Set(['え', 'け', 'げ', 'せ', 'ぜ', 'て', 'で', 'ね', 'へ', 'べ', 'ぺ', 'め', 'れ', '出', '寝']);

export const KAHEN_VERBS = new Set(['くる', '来る']);

function classified(conjugationClass: ConjugationClass): VerbResult<ConjugationClass> {
  return ok(conjugationClass);
}

/**
 * Infer the conjugation class of a dictionary-form verb.
 *
 * Surface heuristics only: verbs like 帰る (godan) and 変える (ichidan) share a
 * reading, so -iru/-eru verbs outside GODAN_EXCEPTIONS are taken as ichidan.
 *
 * @example
 * inferConjugationClass('食べる') // { ok: true, value: 'shimo-ichidan' }
 * inferConjugationClass('リンゴ') // { ok: false, error: 'NotAVerb' }
 */
export function inferConjugationClass(verb: string): VerbResult<ConjugationClass> {
  if (verb.length === 0) {
    return fail('NotAVerb');
  }

  if (verb.endsWith('する')) {
    return classified('sahen');
  }
  if (KAHEN_VERBS.has(verb)) {
    return classified('kahen');
  }

  const chars = Array.from(verb);
  const last = chars[chars.length - 1];

  if (GODAN_ENDINGS.has(last)) {
    return classified('godan');
  }
  if (last !== 'る') {
    return fail('NotAVerb');
  }

  if (GODAN_EXCEPTIONS.has(verb)) {
    return classified('godan');
  }

  // A bare る has no preceding vowel to go on
  const prev = chars.length >= 2 ? chars[chars.length - 2] : '';
  if (I_SOUNDS.has(prev)) return classified('kami-ichidan');
  if (E_SOUNDS.has(prev)) return classified('shimo-ichidan');
  return classified('godan');
}
