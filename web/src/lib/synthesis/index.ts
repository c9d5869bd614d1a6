export { chunkText, splitSentences, DEFAULT_MAX_CHUNK_CHARS } from './textChunker';

export {
  buildVoiceProfile,
  clampPitch,
  clampRate,
  findPresetByLabel,
  formatPitchSpec,
  formatRateSpec,
  resolveVoiceId,
} from './voiceProfile';

export {
  concatBytes,
  synthesizeSegment,
  synthesizeSpeech,
  type SynthesizeSpeechOptions,
} from './synthesisOrchestrator';

export {
  createTranslationAdapter,
  type TranslationAdapter,
  type TranslationAdapterOptions,
  type TranslationResult,
} from './translationAdapter';

export { EmptyInputError, SynthesisError, getErrorMessage } from './errors';

export type {
  SpeechSynthesizer,
  SynthesisProgress,
  SynthesisResult,
  Translator,
  VoiceProfile,
} from './types';
