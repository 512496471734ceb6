import React from 'react';
import { Box, Text } from 'ink';
import Spinner from 'ink-spinner';

interface SourceSpinnerProps {
    source: string;
}

export function SourceSpinner({ source }: SourceSpinnerProps): React.JSX.Element {
    return (
        <Box paddingX={2}>
            <Text color="cyan">
                <Spinner type="dots" />
            </Text>
            <Text color="cyan"> Waiting for APDUs from {source}...</Text>
        </Box>
    );
}
