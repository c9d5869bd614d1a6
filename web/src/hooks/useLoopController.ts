import { useCallback, useEffect, useRef, useState } from 'react';
import type { MutableRefObject } from 'react';
import { LoopController, createMediaElementControls } from '../lib/playback';
import type { LoopState } from '../lib/playback';

export interface LoopControllerBindings {
  state: LoopState;
  warning: string | null;
  markPointA: () => void;
  markPointB: () => void;
  toggleLoop: () => void;
  clearLoop: () => void;
  setRepeatCount: (count: number) => void;
}

/**
 * Bind a {@link LoopController} to an audio element. Position samples come
 * from the element's `timeupdate` events. A new `sourceKey` (a new audio
 * artifact) resets the loop points.
 */
export function useLoopController(
  audioRef: MutableRefObject<HTMLAudioElement | null>,
  sourceKey: string | null,
): LoopControllerBindings {
  const controllerRef = useRef<LoopController | null>(null);
  if (!controllerRef.current) {
    controllerRef.current = new LoopController();
  }
  const controller = controllerRef.current;

  const [state, setState] = useState<LoopState>(() => controller.getState());
  const [warning, setWarning] = useState<string | null>(null);

  useEffect(() => controller.subscribe(setState), [controller]);

  useEffect(() => {
    controller.onWarning = setWarning;
    return () => {
      controller.onWarning = undefined;
    };
  }, [controller]);

  useEffect(() => {
    const element = audioRef.current;
    if (!element || !sourceKey) {
      controller.setControls(null);
      return undefined;
    }

    controller.setControls(createMediaElementControls(element));
    const handleTimeUpdate = () => {
      controller.sample(element.currentTime);
    };
    element.addEventListener('timeupdate', handleTimeUpdate);

    return () => {
      element.removeEventListener('timeupdate', handleTimeUpdate);
      controller.clear();
      controller.setControls(null);
      setWarning(null);
    };
  }, [audioRef, controller, sourceKey]);

  const markPointA = useCallback(() => {
    if (controller.markPointA() !== null) {
      setWarning(null);
    }
  }, [controller]);

  const markPointB = useCallback(() => {
    if (controller.markPointB() !== null) {
      setWarning(null);
    }
  }, [controller]);

  const toggleLoop = useCallback(() => {
    if (controller.toggle().ok) {
      setWarning(null);
    }
  }, [controller]);

  const clearLoop = useCallback(() => {
    controller.clear();
    setWarning(null);
  }, [controller]);

  const setRepeatCount = useCallback(
    (count: number) => {
      controller.setRepeatCount(count);
    },
    [controller]
  );

  return {
    state,
    warning,
    markPointA,
    markPointB,
    toggleLoop,
    clearLoop,
    setRepeatCount,
  };
}
