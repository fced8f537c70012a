/**
 * Zod schemas for frames received on the streaming connection.
 *
 * Every frame is a JSON envelope `{ event, payload }`. Unknown event tags and
 * payloads that do not match their tag's schema are dropped, so the session
 * keeps running when the server protocol grows new events.
 */

import { z } from 'zod';
import { type Message, MessageSchema, UserListSchema } from '@/shared/chat-types';

export const STREAM_EVENT_NEW_MESSAGE = 'new_message';
export const STREAM_EVENT_PRESENCE_UPDATE = 'presence_update';

export const StreamEnvelopeSchema = z.object({
  event: z.string(),
  payload: z.unknown(),
});

export type StreamEnvelope = z.infer<typeof StreamEnvelopeSchema>;

/**
 * Events emitted by the session transport, one per decoded frame or failure.
 */
export type TransportEvent =
  | { type: 'TRANSPORT_CONNECTED' }
  | { type: 'MESSAGE_CREATED'; payload: { message: Message } }
  | { type: 'PRESENCE_CHANGED'; payload: { usernames: string[] } }
  | { type: 'TRANSPORT_ERROR'; payload: { reason: string } };

/** Frame events: the subset of transport events that come from decoded frames. */
export type FrameEvent = Extract<TransportEvent, { type: 'MESSAGE_CREATED' | 'PRESENCE_CHANGED' }>;

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function decodeEnvelope(envelope: StreamEnvelope): FrameEvent | null {
  switch (envelope.event) {
    case STREAM_EVENT_NEW_MESSAGE: {
      const parsed = MessageSchema.safeParse(envelope.payload);
      return parsed.success ? { type: 'MESSAGE_CREATED', payload: { message: parsed.data } } : null;
    }
    case STREAM_EVENT_PRESENCE_UPDATE: {
      const parsed = UserListSchema.safeParse(envelope.payload);
      return parsed.success
        ? {
            type: 'PRESENCE_CHANGED',
            payload: { usernames: parsed.data.map((user) => user.username) },
          }
        : null;
    }
    default:
      return null;
  }
}

/**
 * Decode one raw text frame.
 * @returns The event the frame carries, or null when the frame should be dropped
 */
export function decodeFrame(raw: string): FrameEvent | null {
  const envelope = StreamEnvelopeSchema.safeParse(parseJson(raw));
  if (!envelope.success) {
    return null;
  }
  return decodeEnvelope(envelope.data);
}
