import type { Translator } from './types';
import { getErrorMessage } from './errors';

export type TranslationResult =
  | { ok: true; text: string; cached: boolean }
  | { ok: false; text: string; error: string };

export interface TranslationAdapter {
  /** Whether a translation collaborator is configured at all. */
  readonly isAvailable: boolean;
  translate: (text: string) => Promise<TranslationResult>;
  /** Never rejects; falls back to the input text. */
  translateToEnglish: (text: string) => Promise<string>;
  clearCache: () => void;
}

export type TranslationAdapterOptions = {
  targetLanguage?: string;
  onFailure?: (error: unknown, text: string) => void;
};

function logTranslationFailure(error: unknown): void {
  console.warn('Translation failed, using the original text', error);
}

/**
 * Wrap an optional translator with the session fallback policy: blank input
 * short-circuits, a missing translator or a failed call yields the original
 * text, and successful translations are memoized by exact input.
 */
export function createTranslationAdapter(
  translator: Translator | null,
  { targetLanguage = 'en', onFailure = logTranslationFailure }: TranslationAdapterOptions = {},
): TranslationAdapter {
  const cache = new Map<string, string>();
  const inFlight = new Map<string, Promise<string>>();

  const translate = async (text: string): Promise<TranslationResult> => {
    if (!text.trim()) {
      return { ok: true, text: '', cached: false };
    }
    if (!translator) {
      return { ok: true, text, cached: false };
    }

    const cached = cache.get(text);
    if (cached !== undefined) {
      return { ok: true, text: cached, cached: true };
    }

    let pending = inFlight.get(text);
    const shared = pending !== undefined;
    if (!pending) {
      pending = translator.translate({ text, source: 'auto', target: targetLanguage });
      inFlight.set(text, pending);
    }

    try {
      const translated = await pending;
      cache.set(text, translated);
      return { ok: true, text: translated, cached: shared };
    } catch (error) {
      if (!shared) {
        onFailure(error, text);
      }
      return { ok: false, text, error: getErrorMessage(error) };
    } finally {
      if (inFlight.get(text) === pending) {
        inFlight.delete(text);
      }
    }
  };

  return {
    isAvailable: translator !== null,
    translate,
    translateToEnglish: async (text: string) => (await translate(text)).text,
    clearCache: () => {
      cache.clear();
    },
  };
}
