import { DEFAULT_MAX_CHUNK_CHARS } from './lib/synthesis/textChunker';

export interface StudioConfig {
  translationEnabled: boolean;
  maxChunkChars: number;
}

type EnvSource = Partial<Record<'VITE_TRANSLATION_ENABLED' | 'VITE_MAX_CHUNK_CHARS', string>>;

export function parseBooleanFlag(value: string | undefined): boolean | undefined {
  if (!value) return undefined;
  const val = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(val)) return true;
  if (['0', 'false', 'no', 'off'].includes(val)) return false;
  throw new Error(`Invalid boolean '${value}'`);
}

export function parsePositiveInteger(value: string | undefined, fallback: number): number {
  if (!value || !value.trim()) {
    return fallback;
  }
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid positive integer '${value}'`);
  }
  return parsed;
}

export function resolveStudioConfig(env: EnvSource = import.meta.env): StudioConfig {
  return {
    translationEnabled: parseBooleanFlag(env.VITE_TRANSLATION_ENABLED) ?? false,
    maxChunkChars: parsePositiveInteger(env.VITE_MAX_CHUNK_CHARS, DEFAULT_MAX_CHUNK_CHARS),
  };
}
