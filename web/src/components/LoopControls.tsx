import { useId } from 'react';
import { MAX_REPEAT_COUNT, MIN_REPEAT_COUNT } from '../lib/playback';
import type { LoopState } from '../lib/playback';
import { formatLoopPoint } from '../utils/timeFormatters';

type Props = {
  state: LoopState;
  warning: string | null;
  disabled?: boolean;
  onMarkPointA: () => void;
  onMarkPointB: () => void;
  onToggleLoop: () => void;
  onClear: () => void;
  onRepeatCountChange: (count: number) => void;
};

export function LoopControls({
  state,
  warning,
  disabled = false,
  onMarkPointA,
  onMarkPointB,
  onToggleLoop,
  onClear,
  onRepeatCountChange,
}: Props) {
  const autoId = useId();
  const repeatId = `loop-repeat-${autoId}`;
  const isLooping = state.status === 'looping';

  return (
    <div className="loop-controls" role="group" aria-label="A/B loop">
      <div className="loop-controls__points">
        <button type="button" className="studio-button" onClick={onMarkPointA} disabled={disabled}>
          Set A
        </button>
        <span className="loop-controls__point" data-testid="loop-point-a">
          A {formatLoopPoint(state.pointA)}
        </span>
        <button type="button" className="studio-button" onClick={onMarkPointB} disabled={disabled}>
          Set B
        </button>
        <span className="loop-controls__point" data-testid="loop-point-b">
          B {formatLoopPoint(state.pointB)}
        </span>
      </div>

      <div className="loop-controls__repeat">
        <label htmlFor={repeatId}>Repeats</label>
        <input
          id={repeatId}
          type="number"
          min={MIN_REPEAT_COUNT}
          max={MAX_REPEAT_COUNT}
          step={1}
          value={state.repeatCount}
          disabled={disabled}
          onChange={(event) => onRepeatCountChange(Number(event.target.value))}
        />
        <button
          type="button"
          className="studio-button studio-button--primary"
          aria-pressed={isLooping}
          onClick={onToggleLoop}
          disabled={disabled}
        >
          {isLooping ? 'Stop loop' : 'Start loop'}
        </button>
        <button type="button" className="studio-button" onClick={onClear} disabled={disabled}>
          Clear
        </button>
      </div>

      {isLooping ? (
        <p className="loop-controls__status" role="status">
          Looping, {state.remaining} {state.remaining === 1 ? 'pass' : 'passes'} left
        </p>
      ) : null}
      {warning ? (
        <p className="loop-controls__warning" role="alert">
          {warning}
        </p>
      ) : null}
      <p className="loop-controls__hint">Shortcuts: A sets start, B sets end, R starts or stops the loop.</p>
    </div>
  );
}
