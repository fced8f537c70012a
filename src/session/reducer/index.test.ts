import { describe, expect, it } from 'vitest';
import type { ChannelCategory, Message } from '@/shared/chat-types';
import {
  createInitialSessionState,
  initialCommands,
  reduceSessionEvent,
  type SessionCommand,
  type SessionEvent,
  type SessionState,
} from './index';

// =============================================================================
// Fixtures
// =============================================================================

const CATEGORIES: ChannelCategory[] = [
  {
    id: 1,
    name: 'General',
    position: 0,
    channels: [
      { id: 10, name: 'lobby', categoryId: 1, position: 0 },
      { id: 11, name: 'random', categoryId: 1, position: 1 },
      { id: 12, name: 'dev', categoryId: 1, position: 2 },
    ],
  },
];

function makeMessage(id: number, channelId: number): Message {
  return {
    id,
    channelId,
    userId: 1,
    username: 'alice',
    content: `message-${id}`,
    createdAt: '2024-03-01T09:00:00Z',
    avatarUrl: null,
  };
}

function reduceAll(state: SessionState, events: SessionEvent[]): SessionState {
  return events.reduce((current, event) => reduceSessionEvent(current, event).state, state);
}

function chattingState(): SessionState {
  return reduceSessionEvent(createInitialSessionState(), {
    type: 'TOPOLOGY_LOADED',
    payload: { categories: CATEGORIES },
  }).state;
}

function withHistory(state: SessionState, channelId: number, messages: Message[]): SessionState {
  return reduceSessionEvent(state, {
    type: 'HISTORY_LOADED',
    payload: { channelId, messages },
  }).state;
}

function messageCreated(message: Message): SessionEvent {
  return { type: 'MESSAGE_CREATED', payload: { message } };
}

// =============================================================================
// Tests
// =============================================================================

describe('reduceSessionEvent', () => {
  it('starts connecting with a topology fetch', () => {
    const state = createInitialSessionState();

    expect(state.phase).toEqual({ phase: 'connecting' });
    expect(state.activeChannelIndex).toBeNull();
    expect(initialCommands()).toEqual([{ type: 'FETCH_TOPOLOGY' }]);
  });

  describe('topology', () => {
    it('selects the first channel and loads its history', () => {
      const { state, commands } = reduceSessionEvent(createInitialSessionState(), {
        type: 'TOPOLOGY_LOADED',
        payload: { categories: CATEGORIES },
      });

      expect(state.phase).toEqual({ phase: 'chatting' });
      expect(state.channels.map((channel) => channel.id)).toEqual([10, 11, 12]);
      expect(state.activeChannelIndex).toBe(0);
      expect(commands).toEqual([{ type: 'LOAD_HISTORY', channelId: 10 }]);
    });

    it('halts with "no channels found" when the topology is empty', () => {
      const { state, commands } = reduceSessionEvent(createInitialSessionState(), {
        type: 'TOPOLOGY_LOADED',
        payload: { categories: [{ id: 1, name: 'Empty', position: 0, channels: [] }] },
      });

      expect(state.phase).toEqual({ phase: 'error', reason: 'no channels found' });
      expect(state.lastError).toBe('no channels found');
      expect(state.connectionState).toBe('error');
      expect(state.activeChannelIndex).toBeNull();
      expect(commands).toEqual([]);
    });

    it('halts when the topology fetch fails', () => {
      const { state } = reduceSessionEvent(createInitialSessionState(), {
        type: 'TOPOLOGY_FAILED',
        payload: { reason: 'request to /api/categories failed with status: 500' },
      });

      expect(state.phase).toEqual({
        phase: 'error',
        reason: 'request to /api/categories failed with status: 500',
      });
    });

    it('ignores a second topology once chatting', () => {
      const state = chattingState();

      const transition = reduceSessionEvent(state, {
        type: 'TOPOLOGY_LOADED',
        payload: { categories: [] },
      });

      expect(transition.state).toBe(state);
      expect(transition.commands).toEqual([]);
    });
  });

  describe('history', () => {
    it('installs history and marks the view dirty for the active channel', () => {
      const state = chattingState();

      const next = withHistory(state, 10, [makeMessage(1, 10), makeMessage(2, 10)]);

      expect(next.messagesByChannel.get(10)?.map((message) => message.id)).toEqual([1, 2]);
      expect(next.viewRevision).toBe(state.viewRevision + 1);
    });

    it('does not mark the view dirty for an inactive channel', () => {
      const state = chattingState();

      const next = withHistory(state, 11, [makeMessage(1, 11)]);

      expect(next.messagesByChannel.get(11)).toHaveLength(1);
      expect(next.viewRevision).toBe(state.viewRevision);
    });

    it('keeps a live message that arrived before the history', () => {
      const state = reduceAll(chattingState(), [
        messageCreated(makeMessage(3, 10)),
        { type: 'HISTORY_LOADED', payload: { channelId: 10, messages: [makeMessage(1, 10)] } },
      ]);

      expect(state.messagesByChannel.get(10)?.map((message) => message.id)).toEqual([1, 3]);
    });

    it('does not duplicate a live message the history also contains', () => {
      const state = reduceAll(chattingState(), [
        messageCreated(makeMessage(2, 10)),
        {
          type: 'HISTORY_LOADED',
          payload: { channelId: 10, messages: [makeMessage(1, 10), makeMessage(2, 10)] },
        },
      ]);

      expect(state.messagesByChannel.get(10)?.map((message) => message.id)).toEqual([1, 2]);
    });

    it('halts when a history load fails', () => {
      const { state } = reduceSessionEvent(chattingState(), {
        type: 'HISTORY_FAILED',
        payload: { channelId: 10, reason: 'failed to load history for channel 10: timeout' },
      });

      expect(state.phase).toEqual({
        phase: 'error',
        reason: 'failed to load history for channel 10: timeout',
      });
    });
  });

  describe('stream events', () => {
    it('appends messages per channel in arrival order', () => {
      const state = reduceAll(chattingState(), [
        messageCreated(makeMessage(1, 10)),
        messageCreated(makeMessage(2, 11)),
        messageCreated(makeMessage(3, 10)),
        messageCreated(makeMessage(4, 12)),
        messageCreated(makeMessage(5, 10)),
      ]);

      expect(state.messagesByChannel.get(10)?.map((message) => message.id)).toEqual([1, 3, 5]);
      expect(state.messagesByChannel.get(11)?.map((message) => message.id)).toEqual([2]);
      expect(state.messagesByChannel.get(12)?.map((message) => message.id)).toEqual([4]);
    });

    it('marks the view dirty only for the active channel', () => {
      const state = chattingState();

      const active = reduceSessionEvent(state, messageCreated(makeMessage(1, 10))).state;
      const inactive = reduceSessionEvent(state, messageCreated(makeMessage(2, 11))).state;

      expect(active.viewRevision).toBe(state.viewRevision + 1);
      expect(inactive.viewRevision).toBe(state.viewRevision);
    });

    it('accepts live messages while still connecting', () => {
      const state = reduceSessionEvent(
        createInitialSessionState(),
        messageCreated(makeMessage(1, 10))
      ).state;

      expect(state.phase).toEqual({ phase: 'connecting' });
      expect(state.messagesByChannel.get(10)).toHaveLength(1);
    });

    it('replaces presence wholesale', () => {
      const state = reduceAll(chattingState(), [
        { type: 'PRESENCE_CHANGED', payload: { usernames: ['alice', 'bob'] } },
        { type: 'PRESENCE_CHANGED', payload: { usernames: ['alice'] } },
      ]);

      expect([...state.onlineUsers]).toEqual(['alice']);
    });

    it('marks the connection live when the transport connects', () => {
      const state = reduceSessionEvent(createInitialSessionState(), {
        type: 'TRANSPORT_CONNECTED',
      }).state;

      expect(state.connectionState).toBe('live');
      expect(state.phase).toEqual({ phase: 'connecting' });
    });

    it('halts on a transport error', () => {
      const { state } = reduceSessionEvent(chattingState(), {
        type: 'TRANSPORT_ERROR',
        payload: { reason: 'heartbeat timed out' },
      });

      expect(state.phase).toEqual({ phase: 'error', reason: 'heartbeat timed out' });
      expect(state.connectionState).toBe('error');
    });
  });

  describe('navigation', () => {
    it('wraps from the last channel to the first', () => {
      const state = reduceAll(chattingState(), [{ type: 'CHANNEL_PREVIOUS' }]);
      expect(state.activeChannelIndex).toBe(2);

      const next = reduceSessionEvent(withHistory(state, 10, []), { type: 'CHANNEL_NEXT' });
      expect(next.state.activeChannelIndex).toBe(0);
    });

    it('wraps from the first channel to the last', () => {
      const { state } = reduceSessionEvent(chattingState(), { type: 'CHANNEL_PREVIOUS' });

      expect(state.activeChannelIndex).toBe(2);
    });

    it('loads history for a channel without a buffer', () => {
      const { state, commands } = reduceSessionEvent(chattingState(), { type: 'CHANNEL_NEXT' });

      expect(state.activeChannelIndex).toBe(1);
      expect(commands).toEqual([{ type: 'LOAD_HISTORY', channelId: 11 }]);
    });

    it('requests history for a channel only once while it is in flight', () => {
      let state = withHistory(chattingState(), 10, []);
      const issued: SessionCommand[] = [];
      for (let step = 0; step < 4; step++) {
        const result = reduceSessionEvent(state, { type: 'CHANNEL_NEXT' });
        state = result.state;
        issued.push(...result.commands);
      }

      expect(state.activeChannelIndex).toBe(1);
      expect(issued).toEqual([
        { type: 'LOAD_HISTORY', channelId: 11 },
        { type: 'LOAD_HISTORY', channelId: 12 },
      ]);
    });

    it('keeps a revisited channel in order once its history and live messages arrive', () => {
      const next: SessionEvent = { type: 'CHANNEL_NEXT' };
      let state = reduceAll(withHistory(chattingState(), 10, []), [next, next, next]);
      const revisit = reduceSessionEvent(state, next);
      state = withHistory(revisit.state, 11, [
        makeMessage(1, 11),
        makeMessage(2, 11),
        makeMessage(3, 11),
      ]);
      state = reduceSessionEvent(state, messageCreated(makeMessage(4, 11))).state;

      expect(revisit.commands).toEqual([]);
      expect(state.messagesByChannel.get(11)?.map((message) => message.id)).toEqual([1, 2, 3, 4]);
    });

    it('marks the view dirty when the channel is already loaded', () => {
      const loaded = withHistory(chattingState(), 11, [makeMessage(1, 11)]);

      const { state, commands } = reduceSessionEvent(loaded, { type: 'CHANNEL_NEXT' });

      expect(commands).toEqual([]);
      expect(state.viewRevision).toBe(loaded.viewRevision + 1);
    });

    it('does nothing while connecting', () => {
      const state = createInitialSessionState();

      expect(reduceSessionEvent(state, { type: 'CHANNEL_NEXT' }).state).toBe(state);
    });
  });

  describe('compose', () => {
    it('issues a send for the active channel with trimmed text', () => {
      const state = chattingState();

      const transition = reduceSessionEvent(state, {
        type: 'MESSAGE_SUBMITTED',
        payload: { text: '  hello there  ' },
      });

      expect(transition.state).toBe(state);
      expect(transition.commands).toEqual([
        { type: 'SEND_MESSAGE', channelId: 10, content: 'hello there' },
      ]);
    });

    it('ignores whitespace-only text', () => {
      const state = chattingState();

      const transition = reduceSessionEvent(state, {
        type: 'MESSAGE_SUBMITTED',
        payload: { text: ' \t\n ' },
      });

      expect(transition.state).toBe(state);
      expect(transition.commands).toEqual([]);
    });

    it('records a failed send as a notice and stays chatting', () => {
      const { state } = reduceSessionEvent(chattingState(), {
        type: 'SEND_FAILED',
        payload: { channelId: 10, reason: 'failed to send message: 403 Forbidden - read-only' },
      });

      expect(state.phase).toEqual({ phase: 'chatting' });
      expect(state.notice).toBe('send failed: failed to send message: 403 Forbidden - read-only');
      expect(state.lastError).toBeNull();
    });

    it('clears the notice after a successful send', () => {
      const state = reduceAll(chattingState(), [
        { type: 'SEND_FAILED', payload: { channelId: 10, reason: 'offline' } },
        { type: 'SEND_SUCCEEDED', payload: { channelId: 10 } },
      ]);

      expect(state.notice).toBeNull();
    });
  });

  describe('error phase', () => {
    function haltedState(): SessionState {
      return reduceSessionEvent(chattingState(), {
        type: 'TRANSPORT_ERROR',
        payload: { reason: 'websocket closed unexpectedly (code 1006)' },
      }).state;
    }

    it('ignores every event other than quit', () => {
      const state = haltedState();
      const events: SessionEvent[] = [
        messageCreated(makeMessage(1, 10)),
        { type: 'PRESENCE_CHANGED', payload: { usernames: ['bob'] } },
        { type: 'CHANNEL_NEXT' },
        { type: 'MESSAGE_SUBMITTED', payload: { text: 'hello' } },
        { type: 'TRANSPORT_ERROR', payload: { reason: 'again' } },
        { type: 'TRANSPORT_CONNECTED' },
      ];

      for (const event of events) {
        const transition = reduceSessionEvent(state, event);
        expect(transition.state).toBe(state);
        expect(transition.commands).toEqual([]);
      }
    });

    it('still exits on quit', () => {
      const state = haltedState();

      expect(reduceSessionEvent(state, { type: 'QUIT_REQUESTED' })).toEqual({
        state,
        commands: [{ type: 'EXIT' }],
      });
    });
  });
});
