/**
 * Speech synthesis relay endpoints.
 *
 * The relay answers `POST /api/tts/stream` with newline-delimited JSON, one
 * frame per line. Audio frames carry base64 MP3 bytes; every other frame type
 * is metadata (word or sentence boundaries). A line that is not a typed JSON
 * frame fails the stream.
 */

import type { SynthesisFrame, SynthesisRequestPayload, SynthesisStreamLine } from '../dtos';
import type { SpeechSynthesizer } from '../../lib/synthesis/types';
import { ensureOk, postJson } from './base';

export function decodeBase64(base64: string): Uint8Array {
  const binaryString = atob(base64);
  const bytes = new Uint8Array(binaryString.length);
  for (let i = 0; i < binaryString.length; i++) {
    bytes[i] = binaryString.charCodeAt(i);
  }
  return bytes;
}

function isStreamLine(value: unknown): value is SynthesisStreamLine {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, 'type') === 'string';
}

export function parseFrameLine(line: string): SynthesisFrame | null {
  const raw = line.trim();
  if (!raw) {
    return null;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (parseError) {
    throw new Error('Malformed synthesis frame', { cause: parseError });
  }
  if (!isStreamLine(payload)) {
    throw new Error('Synthesis frame without a type');
  }

  if (payload.type === 'audio') {
    return typeof payload.data === 'string' && payload.data
      ? { type: 'audio', data: decodeBase64(payload.data) }
      : null;
  }
  return {
    type: payload.type,
    offset: payload.offset ?? null,
    duration: payload.duration ?? null,
    text: payload.text ?? null,
  };
}

async function* readLines(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let pending = '';
  let finished = false;
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        break;
      }
      if (value) {
        pending += decoder.decode(value, { stream: true });
        const lines = pending.split('\n');
        pending = lines.pop() ?? '';
        yield* lines;
      }
    }
    pending += decoder.decode();
    if (pending) {
      yield pending;
    }
  } finally {
    if (!finished) {
      // The consumer stopped early or a frame failed; close the response body.
      await reader.cancel().catch((error: unknown) => {
        console.warn('Unable to cancel synthesis stream', error);
      });
    }
    reader.releaseLock();
  }
}

export async function* streamSynthesize(payload: SynthesisRequestPayload): AsyncGenerator<SynthesisFrame> {
  const response = await ensureOk(
    await postJson('/api/tts/stream', payload, 'application/x-ndjson'),
    'Unable to synthesize speech',
  );

  if (!response.body) {
    const text = await response.text();
    for (const line of text.split('\n')) {
      const frame = parseFrameLine(line);
      if (frame) {
        yield frame;
      }
    }
    return;
  }

  for await (const line of readLines(response.body)) {
    const frame = parseFrameLine(line);
    if (frame) {
      yield frame;
    }
  }
}

export const relaySynthesizer: SpeechSynthesizer = {
  streamSynthesize,
};
