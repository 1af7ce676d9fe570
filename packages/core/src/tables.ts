// kanaroma/tables - Rule table data files and their one-time loading

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { dp } from './debug.js';
import { isRomanizationSystem, type RomanizationSystem } from './system.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DATA_DIR = join(__dirname, '..', 'data');

export interface EncodeTableData {
  system: RomanizationSystem;
  single: ReadonlyMap<string, string>;
  digraphs: ReadonlyMap<string, string>;
}

export interface DecodeTableData {
  literals: ReadonlyArray<readonly [literal: string, kana: string]>;
}

export class RuleTableError extends Error {
  constructor(public file: string, public reason: string) {
    super(`Invalid rule table ${file}: ${reason}`);
    this.name = 'RuleTableError';
  }
}

// Table registry
interface Table<T> {
  data: T | null;
  init: () => T;
}

const tables = new Map<string, Table<unknown>>();

/**
 * Register a table that is built on first access and never rebuilt
 */
export function defineTable<T>(name: string, initFn: () => T): () => T {
  const table: Table<T> = { data: null, init: initFn };
  tables.set(name, table);

  return () => {
    if (table.data === null) {
      table.data = table.init();
      dp(`Loaded table ${name}`);
    }
    return table.data;
  };
}

/**
 * Build every registered table now instead of on first use
 */
export function initAllTables(): string[] {
  const loaded: string[] = [];
  for (const [name, table] of tables) {
    if (table.data === null) {
      table.data = table.init();
      dp(`Loaded table ${name}`);
    }
    loaded.push(name);
  }
  return loaded;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readJson(file: string): unknown {
  return JSON.parse(readFileSync(join(DATA_DIR, file), 'utf-8'));
}

function toStringMap(file: string, field: string, value: unknown, keyLength: number): Map<string, string> {
  if (!isRecord(value)) {
    throw new RuleTableError(file, `"${field}" must be an object`);
  }

  const map = new Map<string, string>();
  for (const [key, romaji] of Object.entries(value)) {
    if (typeof romaji !== 'string') {
      throw new RuleTableError(file, `${field}["${key}"] is not a string`);
    }
    if (Array.from(key).length !== keyLength) {
      throw new RuleTableError(file, `${field} key "${key}" must be ${keyLength} character(s)`);
    }
    map.set(key, romaji);
  }
  return map;
}

export function loadEncodeTable(file: string): EncodeTableData {
  const raw = readJson(file);
  if (!isRecord(raw)) {
    throw new RuleTableError(file, 'top level must be an object');
  }
  if (!isRomanizationSystem(raw.system)) {
    throw new RuleTableError(file, `unknown system ${String(raw.system)}`);
  }

  const single = toStringMap(file, 'single', raw.single, 1);
  const digraphs = toStringMap(file, 'digraphs', raw.digraphs, 2);
  dp(`${file}: ${single.size} single, ${digraphs.size} digraph entries`);

  return { system: raw.system, single, digraphs };
}

export function loadDecodeTable(file: string): DecodeTableData {
  const raw = readJson(file);
  if (!isRecord(raw) || !Array.isArray(raw.literals)) {
    throw new RuleTableError(file, '"literals" must be an array');
  }

  const literals: Array<readonly [string, string]> = [];
  for (const entry of raw.literals) {
    if (!Array.isArray(entry) || entry.length !== 2) {
      throw new RuleTableError(file, `entry ${JSON.stringify(entry)} is not a [literal, kana] pair`);
    }
    const [literal, kana] = entry;
    if (typeof literal !== 'string' || typeof kana !== 'string' || literal.length === 0) {
      throw new RuleTableError(file, `entry ${JSON.stringify(entry)} is not a [literal, kana] pair`);
    }
    literals.push([literal, kana]);
  }
  dp(`${file}: ${literals.length} literals`);

  return { literals };
}

export const getHepburnTable = defineTable('encode-hepburn', () => loadEncodeTable('encode-hepburn.json'));
export const getKunreiTable = defineTable('encode-kunrei', () => loadEncodeTable('encode-kunrei.json'));
export const getDecodeTable = defineTable('decode-hiragana', () => loadDecodeTable('decode-hiragana.json'));
