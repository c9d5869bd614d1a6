import { PITCH_RANGE, RATE_RANGE, VOICE_PRESETS, DEFAULT_VOICE_PRESET } from '../../constants/voicePresets';
import type { VoicePreset } from '../../constants/voicePresets';
import type { VoiceProfile } from './types';

function formatSigned(value: number): string {
  const rounded = Math.round(value);
  // Avoid "-0".
  if (rounded === 0) {
    return '+0';
  }
  return rounded > 0 ? `+${rounded}` : `${rounded}`;
}

export function formatRateSpec(rate: number): string {
  return `${formatSigned(rate)}%`;
}

export function formatPitchSpec(pitch: number): string {
  return `${formatSigned(pitch)}Hz`;
}

function clampInteger(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(max, Math.max(min, Math.round(value)));
}

export function clampRate(value: number): number {
  return clampInteger(value, RATE_RANGE.min, RATE_RANGE.max);
}

export function clampPitch(value: number): number {
  return clampInteger(value, PITCH_RANGE.min, PITCH_RANGE.max);
}

export function findPresetByLabel(
  label: string,
  presets: readonly VoicePreset[] = VOICE_PRESETS,
): VoicePreset | null {
  return presets.find((preset) => preset.label === label) ?? null;
}

/**
 * Resolve the voice identifier sent to the relay. A non-blank custom id wins
 * over the catalog selection; an unknown label falls back to the default voice.
 */
export function resolveVoiceId(
  selectedLabel: string,
  customVoice: string = '',
  presets: readonly VoicePreset[] = VOICE_PRESETS,
): string {
  const custom = customVoice.trim();
  if (custom) {
    return custom;
  }
  return findPresetByLabel(selectedLabel, presets)?.id ?? presets[0]?.id ?? DEFAULT_VOICE_PRESET.id;
}

export function buildVoiceProfile(input: {
  selectedLabel: string;
  customVoice?: string;
  rate: number;
  pitch: number;
}): VoiceProfile {
  return Object.freeze({
    id: resolveVoiceId(input.selectedLabel, input.customVoice),
    rate: clampRate(input.rate),
    pitch: clampPitch(input.pitch),
  });
}
