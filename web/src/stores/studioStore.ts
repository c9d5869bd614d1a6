import { create } from 'zustand';
import { devtools } from 'zustand/middleware';
import { relaySynthesizer, resolveTranslator } from '../api/client';
import { resolveStudioConfig } from '../config';
import { DEFAULT_VOICE_PRESET, SAMPLE_SENTENCE } from '../constants/voicePresets';
import {
  buildVoiceProfile,
  createTranslationAdapter,
  DEFAULT_MAX_CHUNK_CHARS,
  getErrorMessage,
  resolveVoiceId,
  synthesizeSpeech,
} from '../lib/synthesis';
import type {
  SpeechSynthesizer,
  SynthesisProgress,
  SynthesisResult,
  TranslationAdapter,
} from '../lib/synthesis';
import { defaultOutputBaseName } from '../utils/downloads';

export const EMPTY_INPUT_WARNING = 'Paste some text first.';
export const AUDIO_MIME_TYPE = 'audio/mpeg';

export type GenerationStatus = 'idle' | 'translating' | 'synthesizing' | 'success' | 'error';

/** The single generated audio of the session. Replaced wholesale, never mutated. */
export interface AudioArtifact {
  bytes: Uint8Array;
  blob: Blob;
  url: string;
  byteLength: number;
  segmentCount: number;
  voiceId: string;
  createdAt: number;
}

export interface StudioServices {
  synthesizer: SpeechSynthesizer;
  translation: TranslationAdapter;
  maxChunkChars: number;
  now: () => number;
}

/**
 * Studio Store - form values, generation lifecycle and the current audio.
 *
 * Features:
 * - In-memory only; nothing survives a reload
 * - The artifact is swapped only after a generation fully succeeds
 * - A failed generation leaves the previous artifact in place
 * - Object URLs of replaced audio are revoked
 */
interface StudioState {
  // Form
  text: string;
  translateEnabled: boolean;
  voiceLabel: string;
  customVoice: string;
  rate: number;
  pitch: number;
  outputName: string;
  setText: (text: string) => void;
  setTranslateEnabled: (enabled: boolean) => void;
  setVoiceLabel: (label: string) => void;
  setCustomVoice: (voice: string) => void;
  setRate: (rate: number) => void;
  setPitch: (pitch: number) => void;
  setOutputName: (name: string) => void;

  // Capabilities
  /** Whether a translation endpoint is configured. */
  translationAvailable: boolean;

  // Generation
  status: GenerationStatus;
  progress: SynthesisProgress | null;
  warning: string | null;
  error: string | null;
  artifact: AudioArtifact | null;
  /** Translate (when enabled), synthesize and replace the artifact on success. */
  generate: () => Promise<void>;
  dismissMessages: () => void;

  // Preview
  previewUrl: string | null;
  isPreviewing: boolean;
  /** Speak the sample sentence with the selected voice at neutral tone. */
  previewSample: () => Promise<void>;
}

function toAudioBlob(bytes: Uint8Array): Blob {
  // Copy into a view backed by a plain ArrayBuffer.
  return new Blob([bytes.slice()], { type: AUDIO_MIME_TYPE });
}

function revokeUrl(url: string | null | undefined): void {
  if (!url) {
    return;
  }
  try {
    URL.revokeObjectURL(url);
  } catch (error) {
    console.warn('Unable to revoke audio URL', error);
  }
}

export function createAudioArtifact(result: SynthesisResult, voiceId: string, createdAt: number): AudioArtifact {
  const blob = toAudioBlob(result.bytes);
  return {
    bytes: result.bytes,
    blob,
    url: URL.createObjectURL(blob),
    byteLength: result.bytes.byteLength,
    segmentCount: result.segmentCount,
    voiceId,
    createdAt,
  };
}

export function createDefaultServices(): StudioServices {
  const config = resolveStudioConfig();
  return {
    synthesizer: relaySynthesizer,
    translation: createTranslationAdapter(resolveTranslator(config.translationEnabled)),
    maxChunkChars: config.maxChunkChars,
    now: () => Date.now(),
  };
}

export function createStudioStore(services: StudioServices) {
  return create<StudioState>()(
    devtools(
      (set, get) => ({
        // Initial state
        text: '',
        translateEnabled: false,
        voiceLabel: DEFAULT_VOICE_PRESET.label,
        customVoice: '',
        rate: 0,
        pitch: 0,
        outputName: defaultOutputBaseName(services.now()),
        translationAvailable: services.translation.isAvailable,
        status: 'idle',
        progress: null,
        warning: null,
        error: null,
        artifact: null,
        previewUrl: null,
        isPreviewing: false,

        // Form
        setText: (text: string) => set({ text }),
        setTranslateEnabled: (translateEnabled: boolean) =>
          set({ translateEnabled: translateEnabled && services.translation.isAvailable }),
        setVoiceLabel: (voiceLabel: string) => set({ voiceLabel }),
        setCustomVoice: (customVoice: string) => set({ customVoice }),
        setRate: (rate: number) => set({ rate }),
        setPitch: (pitch: number) => set({ pitch }),
        setOutputName: (outputName: string) => set({ outputName }),

        // Generation
        generate: async () => {
          const state = get();
          if (state.status === 'translating' || state.status === 'synthesizing') {
            return;
          }
          if (!state.text.trim()) {
            set({ warning: EMPTY_INPUT_WARNING, error: null });
            return;
          }

          const voice = buildVoiceProfile({
            selectedLabel: state.voiceLabel,
            customVoice: state.customVoice,
            rate: state.rate,
            pitch: state.pitch,
          });
          const shouldTranslate = state.translateEnabled && services.translation.isAvailable;

          set({
            status: shouldTranslate ? 'translating' : 'synthesizing',
            progress: null,
            warning: null,
            error: null,
          });

          try {
            const finalText = shouldTranslate
              ? await services.translation.translateToEnglish(state.text)
              : state.text;
            set({ status: 'synthesizing' });

            const result = await synthesizeSpeech(finalText, voice, {
              synthesizer: services.synthesizer,
              maxChars: services.maxChunkChars,
              onProgress: (progress) => set({ progress }),
            });

            const previous = get().artifact;
            const artifact = createAudioArtifact(result, voice.id, services.now());
            set({ artifact, status: 'success', progress: null });
            revokeUrl(previous?.url);
          } catch (error) {
            console.error('Speech synthesis failed', error);
            set({ status: 'error', progress: null, error: getErrorMessage(error) });
          }
        },

        dismissMessages: () => set({ warning: null, error: null }),

        // Preview
        previewSample: async () => {
          if (get().isPreviewing) {
            return;
          }
          const { voiceLabel, customVoice } = get();
          set({ isPreviewing: true, error: null });
          try {
            const result = await synthesizeSpeech(
              SAMPLE_SENTENCE,
              { id: resolveVoiceId(voiceLabel, customVoice), rate: 0, pitch: 0 },
              { synthesizer: services.synthesizer, maxChars: DEFAULT_MAX_CHUNK_CHARS },
            );
            const previous = get().previewUrl;
            set({ previewUrl: URL.createObjectURL(toAudioBlob(result.bytes)) });
            revokeUrl(previous);
          } catch (error) {
            console.error('Voice preview failed', error);
            set({ error: getErrorMessage(error) });
          } finally {
            set({ isPreviewing: false });
          }
        },
      }),
      { name: 'studio-store' }
    )
  );
}

export type StudioStore = ReturnType<typeof createStudioStore>;

export const useStudioStore = createStudioStore(createDefaultServices());
