/**
 * Global A/B/R shortcuts for the loop controls.
 *
 * `A` marks the loop start, `B` the loop end and `R` starts or stops the
 * loop. Keys typed into form fields are left alone.
 */

import { useCallback, useEffect } from 'react';

export interface LoopShortcutHandlers {
  onMarkPointA: () => void;
  onMarkPointB: () => void;
  onToggleLoop: () => void;
}

interface UseLoopKeyboardShortcutsOptions {
  handlers: LoopShortcutHandlers;
  enabled?: boolean;
}

/**
 * Checks if the event target is an editable element (input, textarea, contenteditable).
 */
export function isTypingTarget(target: EventTarget | null): boolean {
  if (!target || !(target instanceof HTMLElement)) {
    return false;
  }
  const tag = target.tagName;
  if (!tag) {
    return false;
  }
  return target.isContentEditable || tag === 'INPUT' || tag === 'TEXTAREA' || tag === 'SELECT';
}

export function useLoopKeyboardShortcuts({ handlers, enabled = true }: UseLoopKeyboardShortcutsOptions): void {
  const { onMarkPointA, onMarkPointB, onToggleLoop } = handlers;

  const handleKeyDown = useCallback(
    (event: KeyboardEvent) => {
      if (!enabled) return;
      if (
        event.defaultPrevented ||
        event.altKey ||
        event.metaKey ||
        event.ctrlKey ||
        isTypingTarget(event.target)
      ) {
        return;
      }

      const key = event.key.toLowerCase();
      if (key === 'a') {
        onMarkPointA();
        event.preventDefault();
        return;
      }
      if (key === 'b') {
        onMarkPointB();
        event.preventDefault();
        return;
      }
      if (key === 'r') {
        onToggleLoop();
        event.preventDefault();
      }
    },
    [enabled, onMarkPointA, onMarkPointB, onToggleLoop]
  );

  useEffect(() => {
    if (typeof window === 'undefined' || !enabled) {
      return undefined;
    }
    window.addEventListener('keydown', handleKeyDown);
    return () => {
      window.removeEventListener('keydown', handleKeyDown);
    };
  }, [enabled, handleKeyDown]);
}
