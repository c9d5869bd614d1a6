/**
 * Canonical playback control interface.
 *
 * The loop controller drives playback only through this surface so it can
 * run against an <audio> element in the browser or a plain fake in tests.
 */

export interface PlaybackControls {
  pause: () => void;
  play: () => void;
  /** Seek to an absolute time in seconds. */
  seek: (time: number) => void;
  /** Current playback position in seconds. */
  currentTime: () => number;
}

/**
 * Adapt a media element to {@link PlaybackControls}.
 */
export function createMediaElementControls(element: HTMLMediaElement): PlaybackControls {
  return {
    pause: () => {
      element.pause();
    },
    play: () => {
      const playResult = element.play();
      if (playResult && typeof playResult.catch === 'function') {
        playResult.catch((error: unknown) => {
          // Autoplay policies reject play() without a user gesture.
          console.warn('Audio playback was blocked', error);
        });
      }
    },
    seek: (time: number) => {
      element.currentTime = Math.max(0, time);
    },
    currentTime: () => (Number.isFinite(element.currentTime) ? element.currentTime : 0),
  };
}
