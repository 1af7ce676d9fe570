// @kanaroma/verb - Verb conjugation class inference and stems

export * from './types.js';
export { inferConjugationClass, GODAN_EXCEPTIONS } from './infer.js';
export { deriveStem, irrealisForm, continuativeForm, inferAndDeriveStem } from './stem.js';
