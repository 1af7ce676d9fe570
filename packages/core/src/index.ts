// @kanaroma/core - Rule tables, encoder and decoder

// Encode / decode
export {
  encodeKatakanaToRomaji,
  kanaToRomajiHepburn,
  kanaToRomajiKunrei,
  resolveNextRomaji
} from './encoder.js';
export { decodeRomajiToHiragana } from './decoder.js';

// Rule tables
export { type RuleTable, getRuleTable, singleLookup, digraphLookup } from './rules.js';
export { type LiteralMatch, LiteralTrie, longestLiteralMatch, decodeLiterals } from './decodeTable.js';
export { RuleTableError, initAllTables, DATA_DIR } from './tables.js';

// System selector
export {
  type RomanizationSystem,
  ROMANIZATION_SYSTEMS,
  UnknownSystemError,
  isRomanizationSystem,
  parseRomanizationSystem
} from './system.js';

// Character utilities
export {
  SOKUON_CHARACTERS,
  HIRAGANA_REGEX,
  isRomajiConsonant,
  isGeminableLetter
} from './characters.js';

// Config and logging
export { type KanaromaConfig, ConfigError, readConfig, parseBooleanFlag, parsePositiveInt } from './config.js';
export { setDebug, dp, DEBUG } from './debug.js';
