/**
 * API Client - Modular exports
 *
 * Re-exports the relay endpoints from their domain-specific modules.
 */

// Base utilities
export {
  API_BASE_URL,
  resolveApiBaseUrl,
  withBase,
  apiFetch,
  postJson,
  ensureOk,
  handleResponse,
} from './base';

// Speech synthesis
export {
  decodeBase64,
  parseFrameLine,
  streamSynthesize,
  relaySynthesizer,
} from './tts';

// Translation
export {
  translateText,
  relayTranslator,
  resolveTranslator,
} from './translate';
