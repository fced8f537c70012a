import type { Channel, ChannelCategory, Message } from '@/shared/chat-types';

/**
 * Flatten every category's channels into one list ordered by channel position.
 * The sort is stable, so equal positions keep server order.
 */
export function flattenChannels(categories: readonly ChannelCategory[]): Channel[] {
  const flat = categories.flatMap((category) => category.channels);
  return flat
    .map((channel, index) => ({ channel, index }))
    .sort((a, b) => a.channel.position - b.channel.position || a.index - b.index)
    .map(({ channel }) => channel);
}

/**
 * Install a channel's history (oldest first).
 *
 * Live messages that reached the buffer before the history did are kept after
 * it unless the history already contains them, so a message is never dropped
 * or shown twice whichever of the two arrives first.
 */
export function installHistory(
  existing: readonly Message[] | undefined,
  history: readonly Message[]
): Message[] {
  const installed = dedupeById(history);
  if (!existing || existing.length === 0) {
    return installed;
  }
  const seen = new Set(installed.map((message) => message.id));
  for (const message of existing) {
    if (!seen.has(message.id)) {
      seen.add(message.id);
      installed.push(message);
    }
  }
  return installed;
}

/**
 * Append a live message to a buffer, creating it if absent.
 * @returns The same buffer when the message id is already present
 */
export function appendMessage(
  buffer: readonly Message[] | undefined,
  message: Message
): readonly Message[] {
  if (!buffer) {
    return [message];
  }
  if (buffer.some((existing) => existing.id === message.id)) {
    return buffer;
  }
  return [...buffer, message];
}

/** Move `index` by `delta`, wrapping around a list of `count` items. */
export function wrapIndex(index: number, delta: number, count: number): number {
  return (((index + delta) % count) + count) % count;
}

function dedupeById(messages: readonly Message[]): Message[] {
  const seen = new Set<number>();
  const result: Message[] = [];
  for (const message of messages) {
    if (!seen.has(message.id)) {
      seen.add(message.id);
      result.push(message);
    }
  }
  return result;
}
