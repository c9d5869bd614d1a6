/**
 * Translation relay endpoint.
 */

import type { TranslationRequestPayload, TranslationResponse } from '../dtos';
import type { Translator } from '../../lib/synthesis/types';
import { handleResponse, postJson } from './base';

function isTranslationResponse(value: unknown): value is TranslationResponse {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, 'translation') === 'string';
}

export async function translateText(payload: TranslationRequestPayload): Promise<string> {
  const response = await postJson('/api/translate', payload);
  const body = await handleResponse(response, isTranslationResponse);
  return body.translation;
}

export const relayTranslator: Translator = {
  translate: translateText,
};

/** The translator capability, or null when translation is not configured. */
export function resolveTranslator(enabled: boolean): Translator | null {
  return enabled ? relayTranslator : null;
}
