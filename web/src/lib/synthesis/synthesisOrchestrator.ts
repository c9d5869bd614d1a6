/**
 * Sequential chunk-by-chunk synthesis.
 *
 * Each segment is streamed from the synthesizer in order and only audio
 * frames are kept. The per-segment buffers are joined byte for byte, with no
 * silence or overlap between them. That yields a playable MP3 only because
 * the relay's encoder emits frame-aligned output; arbitrary encoders give no
 * such guarantee.
 */

import { chunkText, DEFAULT_MAX_CHUNK_CHARS } from './textChunker';
import { formatPitchSpec, formatRateSpec } from './voiceProfile';
import { EmptyInputError, SynthesisError } from './errors';
import type {
  SpeechSynthesizer,
  SynthesisProgress,
  SynthesisResult,
  VoiceProfile,
} from './types';

export type SynthesizeSpeechOptions = {
  synthesizer: SpeechSynthesizer;
  maxChars?: number;
  onProgress?: (progress: SynthesisProgress) => void;
};

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.byteLength, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.byteLength;
  }
  return result;
}

export async function synthesizeSegment(
  synthesizer: SpeechSynthesizer,
  segment: string,
  voice: VoiceProfile,
): Promise<Uint8Array> {
  const frames: Uint8Array[] = [];
  const stream = synthesizer.streamSynthesize({
    text: segment,
    voice: voice.id,
    rate: formatRateSpec(voice.rate),
    pitch: formatPitchSpec(voice.pitch),
  });
  for await (const frame of stream) {
    if (frame.type === 'audio' && frame.data) {
      frames.push(frame.data);
    }
  }
  if (frames.length === 0) {
    throw new Error('No audio was received');
  }
  return concatBytes(frames);
}

export async function synthesizeSpeech(
  text: string,
  voice: VoiceProfile,
  { synthesizer, maxChars = DEFAULT_MAX_CHUNK_CHARS, onProgress }: SynthesizeSpeechOptions,
): Promise<SynthesisResult> {
  if (!text.trim()) {
    throw new EmptyInputError();
  }

  const segments = chunkText(text, maxChars);
  const total = segments.length;
  const buffers: Uint8Array[] = [];
  onProgress?.({ completed: 0, total });

  for (let index = 0; index < total; index += 1) {
    const segment = segments[index] ?? '';
    try {
      buffers.push(await synthesizeSegment(synthesizer, segment, voice));
    } catch (error) {
      throw new SynthesisError(index, total, error);
    }
    onProgress?.({ completed: index + 1, total });
  }

  return { bytes: concatBytes(buffers), segmentCount: total };
}
