import type { SynthesisFrame, SynthesisRequestPayload, TranslationRequestPayload } from '../../api/dtos';

export interface VoiceProfile {
  id: string;
  /** Percentage in [-50, 50]. */
  rate: number;
  /** Hertz in [-300, 300]. */
  pitch: number;
}

/** Streaming speech-synthesis collaborator. */
export interface SpeechSynthesizer {
  streamSynthesize(request: SynthesisRequestPayload): AsyncIterable<SynthesisFrame>;
}

/** Machine-translation collaborator. */
export interface Translator {
  translate(request: TranslationRequestPayload): Promise<string>;
}

export type SynthesisProgress = {
  completed: number;
  total: number;
};

export type SynthesisResult = {
  bytes: Uint8Array;
  segmentCount: number;
};
