import { describe, expect, it } from 'vitest';
import { VOICE_PRESETS } from '../../../constants/voicePresets';
import {
  buildVoiceProfile,
  clampPitch,
  clampRate,
  formatPitchSpec,
  formatRateSpec,
  resolveVoiceId,
} from '../voiceProfile';

describe('formatRateSpec / formatPitchSpec', () => {
  it('formats signed rate percentages', () => {
    expect(formatRateSpec(-20)).toBe('-20%');
    expect(formatRateSpec(15)).toBe('+15%');
    expect(formatRateSpec(0)).toBe('+0%');
  });

  it('formats signed pitch offsets in hertz', () => {
    expect(formatPitchSpec(150)).toBe('+150Hz');
    expect(formatPitchSpec(-300)).toBe('-300Hz');
    expect(formatPitchSpec(0)).toBe('+0Hz');
  });

  it('rounds fractional values and never emits negative zero', () => {
    expect(formatRateSpec(-0.4)).toBe('+0%');
    expect(formatPitchSpec(12.6)).toBe('+13Hz');
  });
});

describe('clampRate / clampPitch', () => {
  it('keeps values inside the slider ranges', () => {
    expect(clampRate(75)).toBe(50);
    expect(clampRate(-75)).toBe(-50);
    expect(clampPitch(301)).toBe(300);
    expect(clampPitch(-1000)).toBe(-300);
    expect(clampPitch(42)).toBe(42);
  });

  it('falls back to neutral for non-finite input', () => {
    expect(clampRate(Number.NaN)).toBe(0);
    expect(clampPitch(Number.POSITIVE_INFINITY)).toBe(0);
  });
});

describe('resolveVoiceId', () => {
  it('maps a catalog label to its voice id', () => {
    const libby = VOICE_PRESETS[3];
    expect(libby?.id).toBe('en-GB-LibbyNeural');
    expect(resolveVoiceId(libby?.label ?? '')).toBe('en-GB-LibbyNeural');
  });

  it('prefers a trimmed custom voice id over the selection', () => {
    expect(resolveVoiceId(VOICE_PRESETS[1]?.label ?? '', '  en-US-AndrewNeural ')).toBe('en-US-AndrewNeural');
  });

  it('ignores a blank custom voice id', () => {
    expect(resolveVoiceId(VOICE_PRESETS[2]?.label ?? '', '   ')).toBe('en-US-JennyNeural');
  });

  it('falls back to the first preset for an unknown label', () => {
    expect(resolveVoiceId('Unknown voice')).toBe('en-US-AriaNeural');
  });
});

describe('buildVoiceProfile', () => {
  it('builds an immutable, clamped profile', () => {
    const profile = buildVoiceProfile({
      selectedLabel: VOICE_PRESETS[0]?.label ?? '',
      rate: 80,
      pitch: -20,
    });

    expect(profile).toEqual({ id: 'en-US-AriaNeural', rate: 50, pitch: -20 });
    expect(Object.isFrozen(profile)).toBe(true);
  });
});
