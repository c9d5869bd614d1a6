import { describe, expect, it } from 'vitest';
import { parseBooleanFlag, parsePositiveInteger, resolveStudioConfig } from '../config';

describe('resolveStudioConfig', () => {
  it('defaults to no translation and the standard chunk size', () => {
    expect(resolveStudioConfig({})).toEqual({ translationEnabled: false, maxChunkChars: 2000 });
  });

  it('reads translation and chunk size overrides', () => {
    expect(
      resolveStudioConfig({ VITE_TRANSLATION_ENABLED: 'yes', VITE_MAX_CHUNK_CHARS: ' 500 ' }),
    ).toEqual({ translationEnabled: true, maxChunkChars: 500 });
  });

  it('rejects malformed values', () => {
    expect(() => resolveStudioConfig({ VITE_TRANSLATION_ENABLED: 'maybe' })).toThrow("Invalid boolean 'maybe'");
    expect(() => resolveStudioConfig({ VITE_MAX_CHUNK_CHARS: '-5' })).toThrow("Invalid positive integer '-5'");
  });
});

describe('parseBooleanFlag', () => {
  it('treats missing values as unset', () => {
    expect(parseBooleanFlag(undefined)).toBeUndefined();
    expect(parseBooleanFlag('')).toBeUndefined();
    expect(parseBooleanFlag('OFF')).toBe(false);
  });
});

describe('parsePositiveInteger', () => {
  it('falls back for blank input and rejects fractions', () => {
    expect(parsePositiveInteger('  ', 42)).toBe(42);
    expect(() => parsePositiveInteger('1.5', 42)).toThrow();
  });
});
