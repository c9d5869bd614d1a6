import type { PlaybackControls } from './playbackActions';

export type LoopStatus = 'idle' | 'looping';

export type LoopState = {
  pointA: number | null;
  pointB: number | null;
  repeatCount: number;
  /** Traversals left in the running loop; 0 while idle. */
  remaining: number;
  status: LoopStatus;
};

export type LoopStartResult = { ok: true } | { ok: false; warning: string };

export type LoopControllerOpts = {
  controls?: PlaybackControls | null;
  repeatCount?: number;
  onWarning?: (message: string) => void;
};

export const DEFAULT_REPEAT_COUNT = 5;
export const MIN_REPEAT_COUNT = 1;
export const MAX_REPEAT_COUNT = 50;

export type LoopRangeCheck = { ok: true; start: number; end: number } | { ok: false; warning: string };

export const MISSING_POINTS_WARNING = 'Set both A and B before starting the loop.';
export const INVALID_RANGE_WARNING = 'B must be later than A.';
export const NO_AUDIO_WARNING = 'Generate audio before starting the loop.';

const LOOP_STATE_KEYS: Array<keyof LoopState> = ['pointA', 'pointB', 'repeatCount', 'remaining', 'status'];

export function clampRepeatCount(value: number): number {
  if (!Number.isFinite(value)) {
    return DEFAULT_REPEAT_COUNT;
  }
  return Math.min(MAX_REPEAT_COUNT, Math.max(MIN_REPEAT_COUNT, Math.round(value)));
}

function normalizePoint(value: number | null): number | null {
  if (value === null || !Number.isFinite(value)) {
    return null;
  }
  return Math.max(0, value);
}

export function validateLoopRange(pointA: number | null, pointB: number | null): LoopRangeCheck {
  if (pointA === null || pointB === null) {
    return { ok: false, warning: MISSING_POINTS_WARNING };
  }
  if (pointB <= pointA) {
    return { ok: false, warning: INVALID_RANGE_WARNING };
  }
  return { ok: true, start: pointA, end: pointB };
}

/**
 * A/B repeat state machine.
 *
 * `idle --start(B > A)--> looping`, and while looping every position sample
 * at or past B uses up one repeat: playback jumps back to A until none are
 * left, then pauses and returns to idle. Points can be moved in either state
 * without affecting playback.
 */
export class LoopController {
  private controls: PlaybackControls | null;
  private state: LoopState;
  private listeners = new Set<(state: LoopState) => void>();

  onWarning?: (message: string) => void;

  constructor(opts: LoopControllerOpts = {}) {
    this.controls = opts.controls ?? null;
    this.onWarning = opts.onWarning;
    this.state = {
      pointA: null,
      pointB: null,
      repeatCount: clampRepeatCount(opts.repeatCount ?? DEFAULT_REPEAT_COUNT),
      remaining: 0,
      status: 'idle',
    };
  }

  getState(): LoopState {
    return this.state;
  }

  subscribe(listener: (state: LoopState) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  setControls(controls: PlaybackControls | null) {
    this.controls = controls;
    if (!controls && this.state.status === 'looping') {
      this.update({ status: 'idle', remaining: 0 });
    }
  }

  setPointA(time: number | null) {
    this.update({ pointA: normalizePoint(time) });
  }

  setPointB(time: number | null) {
    this.update({ pointB: normalizePoint(time) });
  }

  /** Set A from the current playback position. */
  markPointA(): number | null {
    if (!this.controls) {
      return null;
    }
    this.setPointA(this.controls.currentTime());
    return this.state.pointA;
  }

  /** Set B from the current playback position. */
  markPointB(): number | null {
    if (!this.controls) {
      return null;
    }
    this.setPointB(this.controls.currentTime());
    return this.state.pointB;
  }

  setRepeatCount(count: number) {
    this.update({ repeatCount: clampRepeatCount(count) });
  }

  start(): LoopStartResult {
    const range = validateLoopRange(this.state.pointA, this.state.pointB);
    if (!range.ok) {
      return this.reject(range.warning);
    }
    if (!this.controls) {
      return this.reject(NO_AUDIO_WARNING);
    }
    this.controls.seek(range.start);
    this.controls.play();
    this.update({ status: 'looping', remaining: this.state.repeatCount });
    return { ok: true };
  }

  /** Feed the latest playback position (e.g. from `timeupdate`). */
  sample(position: number) {
    const { status, pointA, pointB, remaining } = this.state;
    if (status !== 'looping' || pointA === null || pointB === null) {
      return;
    }
    if (!Number.isFinite(position) || position < pointB) {
      return;
    }

    const left = Math.max(0, remaining - 1);
    if (left > 0) {
      // The element may already have paused at the end of the media.
      this.controls?.seek(pointA);
      this.controls?.play();
      this.update({ remaining: left });
      return;
    }
    this.controls?.pause();
    this.update({ status: 'idle', remaining: 0 });
  }

  stop() {
    if (this.state.status === 'looping') {
      this.controls?.pause();
    }
    this.update({ status: 'idle', remaining: 0 });
  }

  /** Start when idle, stop when looping. */
  toggle(): LoopStartResult {
    if (this.state.status === 'looping') {
      this.stop();
      return { ok: true };
    }
    return this.start();
  }

  clear() {
    this.stop();
    this.update({ pointA: null, pointB: null });
  }

  private reject(warning: string): LoopStartResult {
    this.onWarning?.(warning);
    return { ok: false, warning };
  }

  private update(patch: Partial<LoopState>) {
    const next = { ...this.state, ...patch };
    const changed = LOOP_STATE_KEYS.some((key) => next[key] !== this.state[key]);
    if (!changed) {
      return;
    }
    this.state = next;
    this.listeners.forEach((listener) => listener(next));
  }
}
