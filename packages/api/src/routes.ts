// kanaroma/api/routes - Request routing, independent of node:http

import {
  decodeRomajiToHiragana,
  encodeKatakanaToRomaji,
  parseRomanizationSystem,
  UnknownSystemError,
  type RomanizationSystem
} from '@kanaroma/core';
import {
  inferAndDeriveStem,
  inferConjugationClass,
  isConjugationClass,
  isStemForm,
  VerbFormError,
  unwrapVerbResult,
  type ConjugationClass,
  type StemForm
} from '@kanaroma/verb';
import type { ConversionCache } from './cache.js';

export type ApiErrorCode =
  | 'MissingField'
  | 'InvalidField'
  | 'UnknownSystem'
  | 'InvalidBody'
  | 'PayloadTooLarge'
  | 'NotFound';

export class ApiError extends Error {
  status: number;
  code: ApiErrorCode;

  constructor(message: string, code: ApiErrorCode, status = 400) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
    this.code = code;
  }
}

export class JsonBodyError extends ApiError {
  constructor(message: string, status = 400) {
    super(message, status === 413 ? 'PayloadTooLarge' : 'InvalidBody', status);
    this.name = 'JsonBodyError';
  }
}

export interface ApiResponse {
  status: number;
  body: unknown;
}

export interface RouteContext {
  defaultSystem: RomanizationSystem;
  cache: ConversionCache;
}

export const API_DOCS = {
  name: 'kanaroma REST API',
  version: '0.1.0',
  endpoints: {
    'GET /health': 'Health check',
    'POST /api/encode': 'Katakana to romaji (body: {text: string, system?: "hepburn" | "kunrei"})',
    'POST /api/decode': 'Romaji to hiragana (body: {text: string})',
    'POST /api/verb/classify': 'Conjugation class of a verb (body: {verb: string})',
    'POST /api/verb/stem':
      'Irrealis or continuative stem (body: {verb: string, form?: "irrealis" | "continuative", conjugationClass?: string})'
  },
  examples: {
    encode: { url: '/api/encode', body: { text: 'チケット', system: 'kunrei' } },
    decode: { url: '/api/decode', body: { text: 'gakkou' } },
    stem: { url: '/api/verb/stem', body: { verb: '書く', form: 'continuative' } }
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (typeof value !== 'string') {
    throw new ApiError(`Missing required field: ${field}`, 'MissingField');
  }
  return value;
}

function readSystem(body: Record<string, unknown>, fallback: RomanizationSystem): RomanizationSystem {
  const value = body.system;
  if (value === undefined) return fallback;
  if (typeof value !== 'string') {
    throw new ApiError('Invalid field: system', 'InvalidField');
  }
  try {
    return parseRomanizationSystem(value);
  } catch (error) {
    if (error instanceof UnknownSystemError) {
      throw new ApiError(error.message, 'UnknownSystem');
    }
    throw error;
  }
}

function readForm(body: Record<string, unknown>): StemForm {
  const value = body.form;
  if (value === undefined) return 'irrealis';
  if (!isStemForm(value)) {
    throw new ApiError('Invalid field: form (expected irrealis or continuative)', 'InvalidField');
  }
  return value;
}

function readConjugationClass(body: Record<string, unknown>): ConjugationClass | undefined {
  const value = body.conjugationClass;
  if (value === undefined) return undefined;
  if (!isConjugationClass(value)) {
    throw new ApiError('Invalid field: conjugationClass', 'InvalidField');
  }
  return value;
}

async function readBodyRecord(readBody: () => Promise<unknown>): Promise<Record<string, unknown>> {
  const body = await readBody();
  if (!isRecord(body)) {
    throw new JsonBodyError('Body must be a JSON object');
  }
  return body;
}

async function dispatch(
  method: string,
  pathname: string,
  readBody: () => Promise<unknown>,
  ctx: RouteContext
): Promise<ApiResponse> {
  if (pathname === '/health' && method === 'GET') {
    return {
      status: 200,
      body: { status: 'ok', cache: ctx.cache.getStats(), timestamp: new Date().toISOString() }
    };
  }

  if (pathname === '/api' && method === 'GET') {
    return { status: 200, body: API_DOCS };
  }

  // Katakana → romaji: POST /api/encode
  if (pathname === '/api/encode' && method === 'POST') {
    const body = await readBodyRecord(readBody);
    const text = requireString(body, 'text');
    const system = readSystem(body, ctx.defaultSystem);
    const romaji = ctx.cache.getOrCompute('encode', system, text, () => encodeKatakanaToRomaji(text, system));
    return { status: 200, body: { text, system, romaji } };
  }

  // Romaji → hiragana: POST /api/decode
  if (pathname === '/api/decode' && method === 'POST') {
    const body = await readBodyRecord(readBody);
    const text = requireString(body, 'text');
    const kana = ctx.cache.getOrCompute('decode', '', text, () => decodeRomajiToHiragana(text));
    return { status: 200, body: { text, kana } };
  }

  if (pathname === '/api/verb/classify' && method === 'POST') {
    const body = await readBodyRecord(readBody);
    const verb = requireString(body, 'verb');
    const conjugationClass = unwrapVerbResult(verb, inferConjugationClass(verb));
    return { status: 200, body: { verb, conjugationClass } };
  }

  if (pathname === '/api/verb/stem' && method === 'POST') {
    const body = await readBodyRecord(readBody);
    const verb = requireString(body, 'verb');
    const form = readForm(body);
    const stem = unwrapVerbResult(verb, inferAndDeriveStem(verb, form, readConjugationClass(body)));
    return { status: 200, body: { verb, form, stem } };
  }

  throw new ApiError('Not found', 'NotFound', 404);
}

/**
 * Route one request. Client errors become 4xx responses; anything else is rethrown.
 */
export async function routeRequest(
  method: string,
  pathname: string,
  readBody: () => Promise<unknown>,
  ctx: RouteContext
): Promise<ApiResponse> {
  try {
    return await dispatch(method, pathname, readBody, ctx);
  } catch (error) {
    if (error instanceof ApiError) {
      return { status: error.status, body: { error: error.message, code: error.code } };
    }
    if (error instanceof VerbFormError) {
      return { status: 422, body: { error: error.message, code: error.error } };
    }
    throw error;
  }
}
