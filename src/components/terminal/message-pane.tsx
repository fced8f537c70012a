import { Box, Text } from 'ink';
import type { Message } from '@/shared/chat-types';
import { formatMessageLine, sliceVisibleLines } from './format';
import type { Theme } from './theme';

interface MessagePaneProps {
  messages: readonly Message[] | undefined;
  currentUsername: string;
  height: number;
  /** Lines scrolled up from the bottom. */
  scrollOffset: number;
  theme: Theme;
}

export function MessagePane({
  messages,
  currentUsername,
  height,
  scrollOffset,
  theme,
}: MessagePaneProps) {
  if (!messages) {
    return (
      <Box flexGrow={1} height={height}>
        <Text dimColor>Loading...</Text>
      </Box>
    );
  }

  const window = sliceVisibleLines(messages, height, scrollOffset);
  return (
    <Box flexDirection="column" flexGrow={1} height={height}>
      {window.lines.map((message) => (
        <Text
          key={message.id}
          wrap="truncate-end"
          color={message.username === currentUsername ? theme.ownMessage : theme.otherMessage}
        >
          {formatMessageLine(message)}
        </Text>
      ))}
    </Box>
  );
}
