import { useId } from 'react';
import { PITCH_RANGE, RATE_RANGE } from '../constants/voicePresets';
import { clampPitch, clampRate, formatPitchSpec, formatRateSpec } from '../lib/synthesis';

type Props = {
  rate: number;
  pitch: number;
  onRateChange: (rate: number) => void;
  onPitchChange: (pitch: number) => void;
  disabled?: boolean;
};

export function ToneControls({ rate, pitch, onRateChange, onPitchChange, disabled = false }: Props) {
  const autoId = useId();
  const rateId = `tone-rate-${autoId}`;
  const pitchId = `tone-pitch-${autoId}`;

  return (
    <fieldset className="tone-controls" disabled={disabled}>
      <legend>Tone controls (synthesis)</legend>
      <div className="tone-controls__row">
        <label htmlFor={rateId}>Rate (%)</label>
        <input
          id={rateId}
          type="range"
          min={RATE_RANGE.min}
          max={RATE_RANGE.max}
          step={1}
          value={rate}
          onChange={(event) => onRateChange(clampRate(Number(event.target.value)))}
        />
        <output htmlFor={rateId} data-testid="rate-spec">
          {formatRateSpec(rate)}
        </output>
      </div>
      <div className="tone-controls__row">
        <label htmlFor={pitchId}>Pitch (Hz)</label>
        <input
          id={pitchId}
          type="range"
          min={PITCH_RANGE.min}
          max={PITCH_RANGE.max}
          step={1}
          value={pitch}
          onChange={(event) => onPitchChange(clampPitch(Number(event.target.value)))}
        />
        <output htmlFor={pitchId} data-testid="pitch-spec">
          {formatPitchSpec(pitch)}
        </output>
      </div>
    </fieldset>
  );
}
