export interface SynthesisRequestPayload {
  text: string;
  voice: string;
  /** Signed percentage, e.g. "+10%". */
  rate: string;
  /** Signed hertz offset, e.g. "-20Hz". */
  pitch: string;
}

/** One newline-delimited JSON line of the relay's synthesis stream. */
export interface SynthesisStreamLine {
  type: string;
  data?: string | null;
  offset?: number | null;
  duration?: number | null;
  text?: string | null;
}

export interface AudioFrame {
  type: 'audio';
  data: Uint8Array;
}

export interface MetadataFrame {
  type: string;
  data?: undefined;
  offset?: number | null;
  duration?: number | null;
  text?: string | null;
}

export type SynthesisFrame = AudioFrame | MetadataFrame;

export type TranslationSourceLanguage = 'auto' | string;

export interface TranslationRequestPayload {
  text: string;
  source: TranslationSourceLanguage;
  target: string;
}

export interface TranslationResponse {
  translation: string;
}
