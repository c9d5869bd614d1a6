import { render, screen } from '@testing-library/react';
import userEvent from '@testing-library/user-event';
import { vi } from 'vitest';
import { describeGeneration, StudioInputPanel } from '../StudioInputPanel';
import { VOICE_PRESETS } from '../../constants/voicePresets';

function renderPanel(overrides: Partial<Parameters<typeof StudioInputPanel>[0]> = {}) {
  const props = {
    text: '',
    translateEnabled: false,
    translationAvailable: true,
    voiceLabel: VOICE_PRESETS[0]?.label ?? '',
    customVoice: '',
    rate: 0,
    pitch: 0,
    status: 'idle' as const,
    progress: null,
    onTextChange: vi.fn(),
    onTranslateChange: vi.fn(),
    onVoiceLabelChange: vi.fn(),
    onCustomVoiceChange: vi.fn(),
    onRateChange: vi.fn(),
    onPitchChange: vi.fn(),
    onGenerate: vi.fn(),
    ...overrides,
  };
  render(<StudioInputPanel {...props} />);
  return props;
}

describe('describeGeneration', () => {
  it('describes each busy phase', () => {
    expect(describeGeneration('translating', null)).toBe('Translating…');
    expect(describeGeneration('synthesizing', { completed: 0, total: 1 })).toBe('Synthesizing…');
    expect(describeGeneration('synthesizing', { completed: 1, total: 3 })).toBe('Synthesizing… 1/3');
    expect(describeGeneration('success', null)).toBeNull();
  });
});

describe('StudioInputPanel', () => {
  it('submits the form to generate', async () => {
    const user = userEvent.setup();
    const props = renderPanel({ text: 'Hello.' });

    await user.click(screen.getByRole('button', { name: 'Generate MP3' }));

    expect(props.onGenerate).toHaveBeenCalledTimes(1);
  });

  it('forwards voice selection', async () => {
    const user = userEvent.setup();
    const props = renderPanel();
    const libby = VOICE_PRESETS[3]?.label ?? '';

    await user.selectOptions(screen.getByLabelText('Voice'), libby);

    expect(props.onVoiceLabelChange).toHaveBeenCalledWith(libby);
  });

  it('locks the form while synthesizing and shows progress', () => {
    renderPanel({ status: 'synthesizing', progress: { completed: 2, total: 4 } });

    expect(screen.getByRole('button', { name: 'Generate MP3' })).toBeDisabled();
    expect(screen.getByLabelText('Translate to English')).toBeDisabled();
    expect(screen.getByRole('status')).toHaveTextContent('Synthesizing… 2/4');
  });
});
