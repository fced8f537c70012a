import { Box, Text } from 'ink';
import type { Channel } from '@/shared/chat-types';
import type { Theme } from './theme';

interface ChannelTabsProps {
  channels: readonly Channel[];
  activeIndex: number | null;
  theme: Theme;
}

export function ChannelTabs({ channels, activeIndex, theme }: ChannelTabsProps) {
  return (
    <Box>
      {channels.map((channel, index) => {
        const style = index === activeIndex ? theme.activeTab : theme.tab;
        return (
          <Text
            key={channel.id}
            color={style.color}
            backgroundColor={style.backgroundColor}
            bold={index === activeIndex}
          >
            {` #${channel.name} `}
          </Text>
        );
      })}
    </Box>
  );
}
