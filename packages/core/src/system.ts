// kanaroma/system - Romanization system selector

export const ROMANIZATION_SYSTEMS = ['hepburn', 'kunrei'] as const;

export type RomanizationSystem = (typeof ROMANIZATION_SYSTEMS)[number];

const SYSTEM_ALIASES = new Map<string, RomanizationSystem>([
  ['hepburn', 'hepburn'],
  ['hebon', 'hepburn'],
  ['kunrei', 'kunrei'],
  ['kunrei-shiki', 'kunrei'],
  ['kunrei-siki', 'kunrei'],
]);

export class UnknownSystemError extends Error {
  constructor(public value: string) {
    super(`Unknown romanization system "${value}" (expected one of: ${ROMANIZATION_SYSTEMS.join(', ')})`);
    this.name = 'UnknownSystemError';
  }
}

export function isRomanizationSystem(value: unknown): value is RomanizationSystem {
  return typeof value === 'string' && ROMANIZATION_SYSTEMS.some((system) => system === value);
}

/**
 * Parse a user-supplied system name (case-insensitive, common aliases accepted)
 */
export function parseRomanizationSystem(value: string): RomanizationSystem {
  const system = SYSTEM_ALIASES.get(value.trim().toLowerCase());
  if (!system) {
    throw new UnknownSystemError(value);
  }
  return system;
}
