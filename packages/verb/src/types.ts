// kanaroma/verb/types - Shared verb morphology types

export const CONJUGATION_CLASSES = ['godan', 'kami-ichidan', 'shimo-ichidan', 'sahen', 'kahen'] as const;

/**
 * 五段, 上一段, 下一段, サ変 (する), カ変 (来る)
 */
export type ConjugationClass = (typeof CONJUGATION_CLASSES)[number];

export const STEM_FORMS = ['irrealis', 'continuative'] as const;

/**
 * irrealis: 未然形 (nai-form stem), continuative: 連用形 (masu-form stem)
 */
export type StemForm = (typeof STEM_FORMS)[number];

export type VerbError = 'NotAVerb' | 'UnknownConjugation';

export type VerbResult<T> = { ok: true; value: T } | { ok: false; error: VerbError };

export function ok<T>(value: T): VerbResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: VerbError): VerbResult<T> {
  return { ok: false, error };
}

export function isConjugationClass(value: unknown): value is ConjugationClass {
  return typeof value === 'string' && CONJUGATION_CLASSES.some((cls) => cls === value);
}

export function isStemForm(value: unknown): value is StemForm {
  return typeof value === 'string' && STEM_FORMS.some((form) => form === value);
}

const VERB_ERROR_MESSAGES: Record<VerbError, string> = {
  NotAVerb: 'not a verb',
  UnknownConjugation: 'ending does not match the conjugation class',
};

export class VerbFormError extends Error {
  constructor(public verb: string, public error: VerbError) {
    super(`"${verb}": ${VERB_ERROR_MESSAGES[error]}`);
    this.name = 'VerbFormError';
  }
}

/**
 * Return the value of a successful result or throw VerbFormError
 */
export function unwrapVerbResult<T>(verb: string, result: VerbResult<T>): T {
  if (!result.ok) {
    throw new VerbFormError(verb, result.error);
  }
  return result.value;
}
