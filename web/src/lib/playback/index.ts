export {
  type PlaybackControls,
  createMediaElementControls,
} from './playbackActions';

export {
  LoopController,
  clampRepeatCount,
  validateLoopRange,
  DEFAULT_REPEAT_COUNT,
  MIN_REPEAT_COUNT,
  MAX_REPEAT_COUNT,
  MISSING_POINTS_WARNING,
  INVALID_RANGE_WARNING,
  NO_AUDIO_WARNING,
  type LoopControllerOpts,
  type LoopRangeCheck,
  type LoopStartResult,
  type LoopState,
  type LoopStatus,
} from './loopController';
