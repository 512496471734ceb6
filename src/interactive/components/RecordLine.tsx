import React from 'react';
import { Box, Text } from 'ink';
import type { TraceRecord } from '../../tracer.js';

interface RecordLineProps {
    record: TraceRecord;
}

export function RecordLine({ record }: RecordLineProps): React.JSX.Element {
    return (
        <Box>
            <Text color="gray">{String(record.lchan).padStart(2, '0')} </Text>
            <Text color={record.recognized ? 'cyan' : 'yellow'} bold>
                {record.name.padEnd(16)}
            </Text>
            <Text> {record.path.padEnd(35)} </Text>
            <Text color="gray">{record.colId.padEnd(8)} </Text>
            <Text color={record.successful ? 'green' : 'red'}>{record.colSw}</Text>
            <Text {...(record.degraded ? { color: 'yellow' } : {})}> {record.processed}</Text>
        </Box>
    );
}
