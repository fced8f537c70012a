import { Box, Text, useInput, useStdout } from 'ink';
import TextInput from 'ink-text-input';
import { useCallback, useEffect, useState, useSyncExternalStore } from 'react';
import type { ChatSession } from '@/session/chat-session';
import type { SessionState } from '@/session/reducer';
import { ChannelTabs } from './channel-tabs';
import { applyScroll, resolveKeyAction } from './keymap';
import { MessagePane } from './message-pane';
import { PresenceList } from './presence-list';
import { defaultTheme, type Theme } from './theme';

export const MAX_MESSAGE_LENGTH = 280;
const DEFAULT_TERMINAL_ROWS = 24;

export type SessionStore = Pick<ChatSession, 'getState' | 'subscribe' | 'dispatch'>;

interface ChatAppProps {
  session: SessionStore;
  username: string;
  theme?: Theme;
}

// =============================================================================
// Screens
// =============================================================================

function ConnectingScreen() {
  return <Text>Connecting and loading channels...</Text>;
}

function ErrorScreen({ reason, theme }: { reason: string; theme: Theme }) {
  return (
    <Box flexDirection="column">
      <Text color={theme.error} bold>
        {`An error occurred: ${reason}`}
      </Text>
      <Text> </Text>
      <Text>Press Esc or Ctrl+C to exit.</Text>
    </Box>
  );
}

interface ChatScreenProps {
  state: SessionState;
  username: string;
  theme: Theme;
  paneHeight: number;
  scrollOffset: number;
  onSubmit: (text: string) => void;
}

function ChatScreen({ state, username, theme, paneHeight, scrollOffset, onSubmit }: ChatScreenProps) {
  const [draft, setDraft] = useState('');
  const active =
    state.activeChannelIndex === null ? undefined : state.channels[state.activeChannelIndex];

  const handleChange = useCallback((value: string) => {
    setDraft(value.slice(0, MAX_MESSAGE_LENGTH));
  }, []);

  const handleSubmit = useCallback(
    (value: string) => {
      onSubmit(value);
      setDraft('');
    },
    [onSubmit]
  );

  return (
    <Box flexDirection="column">
      <Text color={theme.header.color} bold={theme.header.bold}>
        {`Logged in as: ${username}`}
      </Text>
      <ChannelTabs channels={state.channels} activeIndex={state.activeChannelIndex} theme={theme} />
      <Box>
        <MessagePane
          messages={active ? state.messagesByChannel.get(active.id) : undefined}
          currentUsername={username}
          height={paneHeight}
          scrollOffset={scrollOffset}
          theme={theme}
        />
        <PresenceList users={state.onlineUsers} height={paneHeight} theme={theme} />
      </Box>
      {state.notice ? <Text color={theme.notice}>{state.notice}</Text> : null}
      <Box>
        <Text>{'> '}</Text>
        <TextInput
          value={draft}
          onChange={handleChange}
          onSubmit={handleSubmit}
          placeholder="Type a message and press Enter..."
        />
      </Box>
    </Box>
  );
}

// =============================================================================
// App
// =============================================================================

/**
 * Root view. Renders whatever the session state says and turns keypresses
 * into session events; it never changes session state itself.
 */
export function ChatApp({ session, username, theme = defaultTheme }: ChatAppProps) {
  const state = useSyncExternalStore(session.subscribe, session.getState);
  const { stdout } = useStdout();
  const [scrollOffset, setScrollOffset] = useState(0);

  const rows = stdout.rows || DEFAULT_TERMINAL_ROWS;
  const paneHeight = Math.max(1, rows - theme.chromeRows);
  const activeChannel =
    state.activeChannelIndex === null ? undefined : state.channels[state.activeChannelIndex];
  const lineCount = activeChannel ? (state.messagesByChannel.get(activeChannel.id)?.length ?? 0) : 0;
  const maxOffset = Math.max(0, lineCount - paneHeight);

  // New content for the active channel snaps the pane back to the bottom.
  useEffect(() => {
    setScrollOffset(0);
  }, [state.viewRevision]);

  useInput((input, key) => {
    const action = resolveKeyAction(input, key);
    if (!action) {
      return;
    }
    if (action.kind === 'session') {
      session.dispatch(action.event);
      return;
    }
    setScrollOffset((offset) =>
      Math.min(applyScroll(offset, action.action, paneHeight), maxOffset)
    );
  });

  const handleSubmit = useCallback(
    (text: string) => {
      session.dispatch({ type: 'MESSAGE_SUBMITTED', payload: { text } });
      setScrollOffset(0);
    },
    [session]
  );

  switch (state.phase.phase) {
    case 'connecting':
      return <ConnectingScreen />;
    case 'error':
      return <ErrorScreen reason={state.phase.reason} theme={theme} />;
    case 'chatting':
      return (
        <ChatScreen
          state={state}
          username={username}
          theme={theme}
          paneHeight={paneHeight}
          scrollOffset={scrollOffset}
          onSubmit={handleSubmit}
        />
      );
  }
}
