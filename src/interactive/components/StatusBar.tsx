import React from 'react';
import { Box, Text } from 'ink';
import type { TraceSummary } from '../../tracer.js';
import type { TraceStatus } from '../types.js';

interface StatusBarProps {
    status: TraceStatus;
    stats: TraceSummary;
    /** Records held back by the view filters */
    hidden: number;
}

export function StatusBar({ status, stats, hidden }: StatusBarProps): React.JSX.Element {
    const colors = {
        waiting: 'blue',
        running: 'green',
        ended: 'yellow',
    } as const satisfies Record<TraceStatus, string>;
    const icons = {
        waiting: 'ℹ',
        running: '●',
        ended: '■',
    } as const satisfies Record<TraceStatus, string>;

    return (
        <Box paddingX={2}>
            <Text color={colors[status]} bold>
                {icons[status]} {status}
            </Text>
            <Text color="gray">
                {'  '}
                {stats.exchanges} exchange(s), {stats.resets} reset(s), {hidden} hidden
            </Text>
        </Box>
    );
}
