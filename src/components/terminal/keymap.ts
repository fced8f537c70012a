import type { Key } from 'ink';
import type { SessionEvent } from '@/session/reducer';

export type ScrollAction = 'line-up' | 'line-down' | 'page-up' | 'page-down';

export type KeyAction =
  | { kind: 'session'; event: SessionEvent }
  | { kind: 'scroll'; action: ScrollAction };

/**
 * Map a keypress to what it does. Returns null for keys the text input owns.
 * Enter is handled by the input's submit callback, not here.
 */
export function resolveKeyAction(input: string, key: Key): KeyAction | null {
  if (key.escape || (key.ctrl && input === 'c')) {
    return { kind: 'session', event: { type: 'QUIT_REQUESTED' } };
  }
  if (key.tab) {
    return {
      kind: 'session',
      event: key.shift ? { type: 'CHANNEL_PREVIOUS' } : { type: 'CHANNEL_NEXT' },
    };
  }
  if (key.upArrow) {
    return { kind: 'scroll', action: 'line-up' };
  }
  if (key.downArrow) {
    return { kind: 'scroll', action: 'line-down' };
  }
  if (key.pageUp) {
    return { kind: 'scroll', action: 'page-up' };
  }
  if (key.pageDown) {
    return { kind: 'scroll', action: 'page-down' };
  }
  return null;
}

/** New offset from the bottom after a scroll action on a pane of `height` rows. */
export function applyScroll(offset: number, action: ScrollAction, height: number): number {
  const page = Math.max(1, height - 1);
  switch (action) {
    case 'line-up':
      return offset + 1;
    case 'line-down':
      return Math.max(0, offset - 1);
    case 'page-up':
      return offset + page;
    case 'page-down':
      return Math.max(0, offset - page);
  }
}
