import React from 'react';
import { Text } from 'ink';
import type { ChannelInfo } from '../types.js';

export function ChannelList({ channels }: { channels: ChannelInfo[] }): React.JSX.Element {
    return (
        <>
            {channels.map((channel) => (
                <Text key={channel.nr}>
                    <Text color="yellow">#{channel.nr}</Text> {channel.path}
                    {channel.application && <Text color="gray"> ({channel.application})</Text>}
                </Text>
            ))}
        </>
    );
}
