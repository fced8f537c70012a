import { Box, Text } from 'ink';
import { sortedUsernames } from './format';
import type { Theme } from './theme';

interface PresenceListProps {
  users: ReadonlySet<string>;
  height: number;
  theme: Theme;
}

export function PresenceList({ users, height, theme }: PresenceListProps) {
  return (
    <Box
      flexDirection="column"
      borderStyle="round"
      borderColor={theme.presence.borderColor}
      paddingX={1}
      width={theme.presence.width}
      height={height}
    >
      <Text bold underline>
        Users Online
      </Text>
      {sortedUsernames(users).map((username) => (
        <Text key={username} color={theme.presence.onlineUser} wrap="truncate-end">
          {`• ${username}`}
        </Text>
      ))}
    </Box>
  );
}
