const KEY_PREFIX = {
  GENERATION: 'GEN#',
  TYPE: 'TYPE#',
} as const;

export const META_KEY = {
  pk: 'META',
  sk: 'GENERATION',
} as const;

export function buildGenerationKey(generation: number): string {
  return `${KEY_PREFIX.GENERATION}${generation}`;
}

export function buildEventTypeKey(eventType: string): string {
  return `${KEY_PREFIX.TYPE}${eventType}`;
}
