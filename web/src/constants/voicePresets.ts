export interface VoicePreset {
  label: string;
  id: string;
}

export const DEFAULT_VOICE_PRESET: VoicePreset = {
  label: 'Aria · US (clear, friendly, female)',
  id: 'en-US-AriaNeural',
};

export const VOICE_PRESETS: readonly VoicePreset[] = [
  DEFAULT_VOICE_PRESET,
  { label: 'Guy · US (neutral, baritone, male)', id: 'en-US-GuyNeural' },
  { label: 'Jenny · US (bright, conversational)', id: 'en-US-JennyNeural' },
  { label: 'Libby · UK (articulate, female)', id: 'en-GB-LibbyNeural' },
  { label: 'Natasha · AU (warm, female)', id: 'en-AU-NatashaNeural' },
  { label: 'Neerja · IN (exam-neutral, female)', id: 'en-IN-NeerjaNeural' },
];

export const SAMPLE_SENTENCE =
  'I wake up early, review my goals, and build tiny habits that compound over time.';

export const RATE_RANGE = { min: -50, max: 50 } as const;
export const PITCH_RANGE = { min: -300, max: 300 } as const;
