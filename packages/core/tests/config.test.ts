// System selector and configuration tests
import { describe, test, expect } from 'vitest';
import {
  parseRomanizationSystem,
  isRomanizationSystem,
  UnknownSystemError,
  readConfig,
  ConfigError,
  parsePositiveInt
} from '../src/index.js';

describe('parseRomanizationSystem', () => {
  test('accepts names case-insensitively', () => {
    expect(parseRomanizationSystem('hepburn')).toBe('hepburn');
    expect(parseRomanizationSystem('HEPBURN')).toBe('hepburn');
    expect(parseRomanizationSystem(' Kunrei ')).toBe('kunrei');
  });

  test('accepts aliases', () => {
    expect(parseRomanizationSystem('hebon')).toBe('hepburn');
    expect(parseRomanizationSystem('kunrei-shiki')).toBe('kunrei');
    expect(parseRomanizationSystem('kunrei-siki')).toBe('kunrei');
  });

  test('rejects unknown systems', () => {
    expect(() => parseRomanizationSystem('nihon')).toThrow(UnknownSystemError);
    expect(() => parseRomanizationSystem('nihon')).toThrow(
      'Unknown romanization system "nihon" (expected one of: hepburn, kunrei)'
    );
  });

  test('isRomanizationSystem', () => {
    expect(isRomanizationSystem('kunrei')).toBe(true);
    expect(isRomanizationSystem('Kunrei')).toBe(false);
    expect(isRomanizationSystem(42)).toBe(false);
  });
});

describe('readConfig', () => {
  test('defaults', () => {
    expect(readConfig({})).toEqual({ defaultSystem: 'hepburn', debug: false });
  });

  test('reads system and debug flag', () => {
    expect(readConfig({ KANAROMA_SYSTEM: 'Kunrei-Shiki', KANAROMA_DEBUG: 'true' })).toEqual({
      defaultSystem: 'kunrei',
      debug: true
    });
  });

  test('rejects an unknown system', () => {
    expect(() => readConfig({ KANAROMA_SYSTEM: 'wapuro' })).toThrow(ConfigError);
  });

  test('rejects a malformed debug flag', () => {
    expect(() => readConfig({ KANAROMA_DEBUG: 'maybe' })).toThrow(
      'Invalid KANAROMA_DEBUG="maybe": expected a boolean (1/0, true/false)'
    );
  });

  test('parsePositiveInt', () => {
    expect(parsePositiveInt('PORT', undefined, 3000)).toBe(3000);
    expect(parsePositiveInt('PORT', '8080', 3000)).toBe(8080);
    expect(() => parsePositiveInt('PORT', '-1', 3000)).toThrow(ConfigError);
  });
});
