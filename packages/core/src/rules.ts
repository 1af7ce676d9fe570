// kanaroma/rules - Per-system kana lookup (encode direction)

import { isRomajiConsonant } from './characters.js';
import { getHepburnTable, getKunreiTable, type EncodeTableData } from './tables.js';
import type { RomanizationSystem } from './system.js';

export interface RuleTable {
  readonly system: RomanizationSystem;
  /** Romaji for one kana, or '' when the character is not in the table */
  singleLookup(char: string): string;
  /** Romaji for a yoon pair, or null when the pair is not a known combination */
  digraphLookup(first: string, second: string): string | null;
  /**
   * What a small tsu contributes before a mora romanized as `nextRomaji`
   */
  geminationPrefix(nextRomaji: string): string;
}

class GenericRules implements RuleTable {
  readonly system: RomanizationSystem;
  protected single: ReadonlyMap<string, string>;
  protected digraphs: ReadonlyMap<string, string>;

  constructor(data: EncodeTableData) {
    this.system = data.system;
    this.single = data.single;
    this.digraphs = data.digraphs;
  }

  singleLookup(char: string): string {
    return this.single.get(char) ?? '';
  }

  digraphLookup(first: string, second: string): string | null {
    return this.digraphs.get(first + second) ?? null;
  }

  geminationPrefix(nextRomaji: string): string {
    const first = nextRomaji.charAt(0);
    return isRomajiConsonant(first) ? first : '';
  }
}

class HepburnRules extends GenericRules {
  // ッチ is "tchi", not "cchi"
  geminationPrefix(nextRomaji: string): string {
    if (nextRomaji.startsWith('ch')) return 't';
    return super.geminationPrefix(nextRomaji);
  }
}

class KunreiRules extends GenericRules {}

let hepburnRules: HepburnRules | null = null;
let kunreiRules: KunreiRules | null = null;

export function getRuleTable(system: RomanizationSystem): RuleTable {
  switch (system) {
    case 'hepburn':
      hepburnRules ??= new HepburnRules(getHepburnTable());
      return hepburnRules;
    case 'kunrei':
      kunreiRules ??= new KunreiRules(getKunreiTable());
      return kunreiRules;
  }
}

export function singleLookup(system: RomanizationSystem, char: string): string {
  return getRuleTable(system).singleLookup(char);
}

export function digraphLookup(system: RomanizationSystem, first: string, second: string): string | null {
  return getRuleTable(system).digraphLookup(first, second);
}
