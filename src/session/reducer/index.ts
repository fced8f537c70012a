/**
 * Session event reducer.
 *
 * The only place session state changes. Each event from the inbound queue is
 * folded into the state and may produce commands (history loads, sends, exit)
 * that the session runtime executes outside the reducer.
 *
 * States: connecting → chatting → error. `error` is terminal: every event
 * except a quit request is ignored once it is entered.
 */

import { reduceComposeSlice } from './slices/compose';
import { reduceHistorySlice } from './slices/history';
import { reduceNavigationSlice } from './slices/navigation';
import { reduceStreamSlice } from './slices/stream';
import { reduceTopologySlice } from './slices/topology';
import { createInitialSessionState, initialCommands, unchanged } from './state';
import type { SessionEvent, SessionState, Transition } from './types';

export { createInitialSessionState, initialCommands };
export { flattenChannels, wrapIndex } from './helpers';
export { NO_CHANNELS_REASON } from './slices/topology';
export type {
  ConnectionState,
  SessionCommand,
  SessionEvent,
  SessionEventType,
  SessionPhase,
  SessionState,
  Transition,
} from './types';

// =============================================================================
// Reducer Slices
// =============================================================================

type ReducerSlice = (state: SessionState, event: SessionEvent) => Transition | null;

const sessionReducerSlices: ReducerSlice[] = [
  reduceTopologySlice,
  reduceHistorySlice,
  reduceStreamSlice,
  reduceNavigationSlice,
  reduceComposeSlice,
];

// =============================================================================
// Reducer
// =============================================================================

export function reduceSessionEvent(state: SessionState, event: SessionEvent): Transition {
  if (event.type === 'QUIT_REQUESTED') {
    return { state, commands: [{ type: 'EXIT' }] };
  }
  if (state.phase.phase === 'error') {
    return unchanged(state);
  }

  for (const reduce of sessionReducerSlices) {
    const transition = reduce(state, event);
    if (transition) {
      return transition;
    }
  }
  return unchanged(state);
}
