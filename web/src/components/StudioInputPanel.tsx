import { useId } from 'react';
import type { FormEvent } from 'react';
import type { SynthesisProgress } from '../lib/synthesis';
import type { GenerationStatus } from '../stores/studioStore';
import { ToneControls } from './ToneControls';
import { VoiceSelector } from './VoiceSelector';

type Props = {
  text: string;
  translateEnabled: boolean;
  translationAvailable: boolean;
  voiceLabel: string;
  customVoice: string;
  rate: number;
  pitch: number;
  status: GenerationStatus;
  progress: SynthesisProgress | null;
  onTextChange: (text: string) => void;
  onTranslateChange: (enabled: boolean) => void;
  onVoiceLabelChange: (label: string) => void;
  onCustomVoiceChange: (voice: string) => void;
  onRateChange: (rate: number) => void;
  onPitchChange: (pitch: number) => void;
  onGenerate: () => void;
};

export function describeGeneration(status: GenerationStatus, progress: SynthesisProgress | null): string | null {
  if (status === 'translating') {
    return 'Translating…';
  }
  if (status !== 'synthesizing') {
    return null;
  }
  if (!progress || progress.total <= 1) {
    return 'Synthesizing…';
  }
  return `Synthesizing… ${progress.completed}/${progress.total}`;
}

export function StudioInputPanel({
  text,
  translateEnabled,
  translationAvailable,
  voiceLabel,
  customVoice,
  rate,
  pitch,
  status,
  progress,
  onTextChange,
  onTranslateChange,
  onVoiceLabelChange,
  onCustomVoiceChange,
  onRateChange,
  onPitchChange,
  onGenerate,
}: Props) {
  const autoId = useId();
  const textId = `studio-text-${autoId}`;
  const translateId = `studio-translate-${autoId}`;
  const isBusy = status === 'translating' || status === 'synthesizing';
  const busyLabel = describeGeneration(status, progress);

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    onGenerate();
  };

  return (
    <form className="studio-panel studio-panel--input" onSubmit={handleSubmit} aria-busy={isBusy}>
      <h2 className="studio-panel__title">Input &amp; Voice</h2>

      <label htmlFor={textId}>Paste your text</label>
      <textarea
        id={textId}
        className="studio-input__text"
        rows={14}
        value={text}
        placeholder="Paste the text you want to hear…"
        onChange={(event) => onTextChange(event.target.value)}
      />

      <div className="studio-input__translate">
        <input
          id={translateId}
          type="checkbox"
          checked={translateEnabled}
          disabled={!translationAvailable || isBusy}
          onChange={(event) => onTranslateChange(event.target.checked)}
        />
        <label htmlFor={translateId}>Translate to English</label>
        {!translationAvailable ? (
          <span className="studio-input__hint">Translation is not configured.</span>
        ) : null}
      </div>

      <VoiceSelector
        selectedLabel={voiceLabel}
        customVoice={customVoice}
        onSelectLabel={onVoiceLabelChange}
        onCustomVoiceChange={onCustomVoiceChange}
        disabled={isBusy}
      />

      <ToneControls
        rate={rate}
        pitch={pitch}
        onRateChange={onRateChange}
        onPitchChange={onPitchChange}
        disabled={isBusy}
      />

      <button type="submit" className="studio-button studio-button--primary" disabled={isBusy}>
        Generate MP3
      </button>
      {busyLabel ? (
        <p className="studio-input__progress" role="status">
          {busyLabel}
        </p>
      ) : null}
    </form>
  );
}
