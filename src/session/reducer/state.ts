import type { SessionCommand, SessionState, Transition } from './types';

export function createInitialSessionState(): SessionState {
  return {
    phase: { phase: 'connecting' },
    connectionState: 'connecting',
    channels: [],
    messagesByChannel: new Map(),
    historyRequested: new Set(),
    onlineUsers: new Set(),
    activeChannelIndex: null,
    lastError: null,
    notice: null,
    viewRevision: 0,
  };
}

/** Commands to run before the first event arrives. */
export function initialCommands(): SessionCommand[] {
  return [{ type: 'FETCH_TOPOLOGY' }];
}

export function unchanged(state: SessionState): Transition {
  return { state, commands: [] };
}

/**
 * Enter the terminal error phase. Every fatal condition funnels through here.
 */
export function haltSession(state: SessionState, reason: string): Transition {
  return {
    state: {
      ...state,
      phase: { phase: 'error', reason },
      connectionState: 'error',
      lastError: reason,
    },
    commands: [],
  };
}

export function markViewDirty(state: SessionState): SessionState {
  return { ...state, viewRevision: state.viewRevision + 1 };
}

export function activeChannelId(state: SessionState): number | null {
  if (state.activeChannelIndex === null) {
    return null;
  }
  return state.channels[state.activeChannelIndex]?.id ?? null;
}
