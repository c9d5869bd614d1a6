import { useId } from 'react';
import { VOICE_PRESETS } from '../constants/voicePresets';
import type { VoicePreset } from '../constants/voicePresets';
import { resolveVoiceId } from '../lib/synthesis';

type Props = {
  selectedLabel: string;
  customVoice: string;
  onSelectLabel: (label: string) => void;
  onCustomVoiceChange: (voice: string) => void;
  presets?: readonly VoicePreset[];
  disabled?: boolean;
};

export function VoiceSelector({
  selectedLabel,
  customVoice,
  onSelectLabel,
  onCustomVoiceChange,
  presets = VOICE_PRESETS,
  disabled = false,
}: Props) {
  const autoId = useId();
  const selectId = `voice-select-${autoId}`;
  const customId = `voice-custom-${autoId}`;
  const effectiveVoice = resolveVoiceId(selectedLabel, customVoice, presets);
  const isOverridden = customVoice.trim().length > 0;

  return (
    <fieldset className="voice-selector" disabled={disabled}>
      <label htmlFor={selectId}>Voice</label>
      <select
        id={selectId}
        value={selectedLabel}
        onChange={(event) => onSelectLabel(event.target.value)}
      >
        {presets.map((preset) => (
          <option key={preset.id} value={preset.label}>
            {preset.label}
          </option>
        ))}
      </select>

      <label htmlFor={customId}>Or custom voice id (optional)</label>
      <input
        id={customId}
        type="text"
        value={customVoice}
        placeholder="e.g. en-US-AndrewNeural"
        onChange={(event) => onCustomVoiceChange(event.target.value)}
      />

      <p className="voice-selector__effective" data-testid="effective-voice">
        {isOverridden ? `Using custom voice ${effectiveVoice}` : `Using ${effectiveVoice}`}
      </p>
    </fieldset>
  );
}
