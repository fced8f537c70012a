import type { Message } from '@/shared/chat-types';

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local wall-clock time as HH:MM. */
export function formatClock(timestamp: string): string {
  const date = new Date(timestamp);
  if (Number.isNaN(date.getTime())) {
    return '--:--';
  }
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

export function formatMessageLine(message: Message): string {
  return `[${formatClock(message.createdAt)}] ${message.username}: ${message.content}`;
}

export interface VisibleWindow<T> {
  lines: T[];
  /** Offset actually applied, after clamping. */
  offset: number;
  maxOffset: number;
}

/**
 * Pick the lines a pane of `height` rows shows when scrolled `offset` lines up
 * from the bottom. Offsets outside the scrollable range are clamped.
 */
export function sliceVisibleLines<T>(
  lines: readonly T[],
  height: number,
  offset: number
): VisibleWindow<T> {
  const rows = Math.max(1, height);
  const maxOffset = Math.max(0, lines.length - rows);
  const clamped = Math.min(Math.max(0, offset), maxOffset);
  const end = lines.length - clamped;
  return {
    lines: lines.slice(Math.max(0, end - rows), end),
    offset: clamped,
    maxOffset,
  };
}

export function sortedUsernames(users: Iterable<string>): string[] {
  return [...users].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}
