import { afterEach, describe, expect, it, vi } from 'vitest';
import { relayTranslator, resolveTranslator, translateText } from '../translate';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('translateText', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the translation field', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ translation: 'Good evening' }));
    vi.stubGlobal('fetch', fetchMock);

    await expect(translateText({ text: 'Bonsoir', source: 'auto', target: 'en' })).resolves.toBe('Good evening');
    expect(fetchMock).toHaveBeenCalledWith(
      expect.stringMatching(/\/api\/translate$/),
      expect.objectContaining({
        method: 'POST',
        body: JSON.stringify({ text: 'Bonsoir', source: 'auto', target: 'en' }),
      }),
    );
  });

  it('rejects payloads without a translation', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ result: 'Good evening' })));

    await expect(translateText({ text: 'Bonsoir', source: 'auto', target: 'en' })).rejects.toThrow(
      'Unexpected response payload',
    );
  });

  it('rejects error responses', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('Translation quota exceeded', { status: 429 })));

    await expect(translateText({ text: 'Bonsoir', source: 'auto', target: 'en' })).rejects.toThrow(
      'Translation quota exceeded',
    );
  });
});

describe('resolveTranslator', () => {
  it('exposes the relay only when translation is enabled', () => {
    expect(resolveTranslator(true)).toBe(relayTranslator);
    expect(resolveTranslator(false)).toBeNull();
  });
});
