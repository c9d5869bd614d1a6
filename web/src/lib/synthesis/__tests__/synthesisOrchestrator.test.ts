import { describe, expect, it, vi } from 'vitest';
import type { SynthesisFrame, SynthesisRequestPayload } from '../../../api/dtos';
import { EmptyInputError, SynthesisError } from '../errors';
import { concatBytes, synthesizeSpeech } from '../synthesisOrchestrator';
import type { SpeechSynthesizer, VoiceProfile } from '../types';

// ─── Helpers ──────────────────────────────────────────────────────────

const voice: VoiceProfile = { id: 'en-US-GuyNeural', rate: -20, pitch: 150 };

function audio(...bytes: number[]): SynthesisFrame {
  return { type: 'audio', data: Uint8Array.from(bytes) };
}

function boundary(text: string): SynthesisFrame {
  return { type: 'WordBoundary', offset: 0, duration: 1, text };
}

/**
 * Fake synthesizer that answers each segment with the frames produced by
 * `framesFor` and records the order in which streams start and finish.
 */
function createFakeSynthesizer(
  framesFor: (request: SynthesisRequestPayload, index: number) => SynthesisFrame[] | Error,
) {
  const events: string[] = [];
  const requests: SynthesisRequestPayload[] = [];
  const synthesizer: SpeechSynthesizer = {
    streamSynthesize: vi.fn(async function* (request: SynthesisRequestPayload) {
      const index = requests.length;
      requests.push(request);
      events.push(`start:${index}`);
      const frames = framesFor(request, index);
      await Promise.resolve();
      if (frames instanceof Error) {
        throw frames;
      }
      for (const frame of frames) {
        yield frame;
      }
      events.push(`end:${index}`);
    }),
  };
  return { synthesizer, events, requests };
}

// ─── concatBytes ──────────────────────────────────────────────────────

describe('concatBytes', () => {
  it('joins buffers in order without padding', () => {
    const joined = concatBytes([Uint8Array.from([1, 2]), new Uint8Array(0), Uint8Array.from([3])]);
    expect(Array.from(joined)).toEqual([1, 2, 3]);
  });
});

// ─── synthesizeSpeech ─────────────────────────────────────────────────

describe('synthesizeSpeech', () => {
  it('sends each chunk with the formatted voice settings', async () => {
    const { synthesizer, requests } = createFakeSynthesizer(() => [audio(1)]);

    await synthesizeSpeech('Hello. This is a test.', voice, { synthesizer, maxChars: 10 });

    expect(requests).toEqual([
      { text: 'Hello.', voice: 'en-US-GuyNeural', rate: '-20%', pitch: '+150Hz' },
      { text: 'This is a test.', voice: 'en-US-GuyNeural', rate: '-20%', pitch: '+150Hz' },
    ]);
  });

  it('keeps only audio frames and concatenates segments in chunk order', async () => {
    const { synthesizer } = createFakeSynthesizer((_request, index) =>
      index === 0
        ? [boundary('Hello'), audio(0x49, 0x44), audio(0x33)]
        : [audio(0xff, 0xfb), boundary('test'), { type: 'audio' }, audio(0x90)],
    );

    const result = await synthesizeSpeech('Hello. This is a test.', voice, { synthesizer, maxChars: 10 });

    // Plain byte concatenation: valid MP3 only because the relay emits
    // frame-aligned output per segment; no general guarantee for other encoders.
    expect(Array.from(result.bytes)).toEqual([0x49, 0x44, 0x33, 0xff, 0xfb, 0x90]);
    expect(result.segmentCount).toBe(2);
  });

  it('waits for each stream to finish before requesting the next chunk', async () => {
    const { synthesizer, events } = createFakeSynthesizer(() => [audio(1), audio(2)]);

    await synthesizeSpeech('One. Two. Three.', voice, { synthesizer, maxChars: 5 });

    expect(events).toEqual(['start:0', 'end:0', 'start:1', 'end:1', 'start:2', 'end:2']);
  });

  it('reports progress before the first call and after every segment', async () => {
    const { synthesizer } = createFakeSynthesizer(() => [audio(1)]);
    const onProgress = vi.fn();

    await synthesizeSpeech('One. Two.', voice, { synthesizer, maxChars: 5, onProgress });

    expect(onProgress.mock.calls).toEqual([
      [{ completed: 0, total: 2 }],
      [{ completed: 1, total: 2 }],
      [{ completed: 2, total: 2 }],
    ]);
  });

  it('aborts the whole run when one segment fails', async () => {
    const { synthesizer, requests } = createFakeSynthesizer((_request, index) =>
      index === 1 ? new Error('Invalid voice') : [audio(1)],
    );

    const promise = synthesizeSpeech('One. Two. Three.', voice, { synthesizer, maxChars: 5 });

    await expect(promise).rejects.toBeInstanceOf(SynthesisError);
    await expect(promise).rejects.toMatchObject({
      segmentIndex: 1,
      segmentCount: 3,
      message: 'Synthesis failed on segment 2 of 3: Invalid voice',
    });
    expect(requests).toHaveLength(2);
  });

  it('fails a segment that streams no audio at all', async () => {
    const { synthesizer, requests } = createFakeSynthesizer((_request, index) =>
      index === 0 ? [boundary('One')] : [audio(1)],
    );

    const promise = synthesizeSpeech('One. Two.', voice, { synthesizer, maxChars: 5 });

    await expect(promise).rejects.toMatchObject({
      segmentIndex: 0,
      segmentCount: 2,
      message: 'Synthesis failed on segment 1 of 2: No audio was received',
    });
    expect(requests).toHaveLength(1);
  });

  it('fails the run when the stream breaks mid-segment', async () => {
    const synthesizer: SpeechSynthesizer = {
      async *streamSynthesize() {
        yield audio(1);
        throw new Error('Malformed synthesis frame');
      },
    };

    await expect(synthesizeSpeech('Hello.', voice, { synthesizer })).rejects.toMatchObject({
      message: 'Synthesis failed on segment 1 of 1: Malformed synthesis frame',
    });
  });

  it('rejects blank text without calling the synthesizer', async () => {
    const { synthesizer } = createFakeSynthesizer(() => [audio(1)]);

    await expect(synthesizeSpeech('  \n ', voice, { synthesizer })).rejects.toBeInstanceOf(EmptyInputError);
    expect(synthesizer.streamSynthesize).not.toHaveBeenCalled();
  });
});
