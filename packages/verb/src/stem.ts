// kanaroma/verb/stem - Irrealis (未然形) and continuative (連用形) stems

import { inferConjugationClass, KAHEN_VERBS } from './infer.js';
import { fail, ok, type ConjugationClass, type StemForm, type VerbResult } from './types.js';

// Final u-row kana → [a-row (irrealis), i-row (continuative)]
const GODAN_STEM_ENDINGS = new Map<string, Record<StemForm, string>>([
  ['う', { irrealis: 'わ', continuative: 'い' }],
  ['く', { irrealis: 'か', continuative: 'き' }],
  ['ぐ', { irrealis: 'が', continuative: 'ぎ' }],
  ['す', { irrealis: 'さ', continuative: 'し' }],
  ['つ', { irrealis: 'た', continuative: 'ち' }],
  ['ぬ', { irrealis: 'な', continuative: 'に' }],
  ['ふ', { irrealis: 'は', continuative: 'ひ' }],
  ['ぶ', { irrealis: 'ば', continuative: 'び' }],
  ['む', { irrealis: 'ま', continuative: 'み' }],
  ['る', { irrealis: 'ら', continuative: 'り' }]
]);

const KAHEN_STEMS: Record<StemForm, string> = { irrealis: 'こ', continuative: 'き' };

/**
 * Derive the stem of `verb` for the given form, trusting `conjugationClass`.
 * Fails with UnknownConjugation when the verb's ending cannot belong to that class.
 *
 * @example
 * deriveStem('書く', 'godan', 'irrealis')     // { ok: true, value: '書か' }
 * deriveStem('来る', 'kahen', 'continuative') // { ok: true, value: 'き' }
 */
export function deriveStem(verb: string, conjugationClass: ConjugationClass, form: StemForm): VerbResult<string> {
  if (verb.length === 0) {
    return fail('NotAVerb');
  }

  switch (conjugationClass) {
    case 'godan': {
      const chars = Array.from(verb);
      const last = chars[chars.length - 1];
      const endings = GODAN_STEM_ENDINGS.get(last);
      if (!endings) return fail('UnknownConjugation');
      return ok(chars.slice(0, -1).join('') + endings[form]);
    }
    case 'kami-ichidan':
    case 'shimo-ichidan':
      if (!verb.endsWith('る')) return fail('UnknownConjugation');
      return ok(verb.slice(0, -1));
    case 'sahen':
      if (!verb.endsWith('する')) return fail('UnknownConjugation');
      return ok(verb.slice(0, -2) + 'し');
    case 'kahen':
      if (!KAHEN_VERBS.has(verb)) return fail('UnknownConjugation');
      return ok(KAHEN_STEMS[form]);
  }
}

export function irrealisForm(verb: string, conjugationClass: ConjugationClass): VerbResult<string> {
  return deriveStem(verb, conjugationClass, 'irrealis');
}

export function continuativeForm(verb: string, conjugationClass: ConjugationClass): VerbResult<string> {
  return deriveStem(verb, conjugationClass, 'continuative');
}

/**
 * Derive a stem, inferring the conjugation class when none is given.
 * The first failure (inference or derivation) is returned as is.
 */
export function inferAndDeriveStem(
  verb: string,
  form: StemForm,
  conjugationClass?: ConjugationClass
): VerbResult<string> {
  if (conjugationClass) {
    return deriveStem(verb, conjugationClass, form);
  }

  const inferred = inferConjugationClass(verb);
  if (!inferred.ok) return inferred;
  return deriveStem(verb, inferred.value, form);
}
