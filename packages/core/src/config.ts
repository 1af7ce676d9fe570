// kanaroma/config - Environment configuration shared by the CLI and API

import { parseRomanizationSystem, UnknownSystemError, type RomanizationSystem } from './system.js';

export interface KanaromaConfig {
  defaultSystem: RomanizationSystem;
  debug: boolean;
}

export class ConfigError extends Error {
  constructor(public variable: string, public value: string, reason: string) {
    super(`Invalid ${variable}=${JSON.stringify(value)}: ${reason}`);
    this.name = 'ConfigError';
  }
}

export function parseBooleanFlag(variable: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;

  const normalized = value.toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigError(variable, value, 'expected a boolean (1/0, true/false)');
}

export function parsePositiveInt(variable: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(variable, value, 'expected a positive integer');
  }
  return parsed;
}

/**
 * Read KANAROMA_* settings. Callers load .env (dotenv) before calling this.
 */
export function readConfig(env: NodeJS.ProcessEnv = process.env): KanaromaConfig {
  const systemValue = env.KANAROMA_SYSTEM;
  let defaultSystem: RomanizationSystem = 'hepburn';

  if (systemValue) {
    try {
      defaultSystem = parseRomanizationSystem(systemValue);
    } catch (error) {
      if (error instanceof UnknownSystemError) {
        throw new ConfigError('KANAROMA_SYSTEM', systemValue, error.message);
      }
      throw error;
    }
  }

  return {
    defaultSystem,
    debug: parseBooleanFlag('KANAROMA_DEBUG', env.KANAROMA_DEBUG, false),
  };
}
