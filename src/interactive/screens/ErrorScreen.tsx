import React from 'react';
import { Box, Text, useInput, useStdin } from 'ink';
import { Footer, Header } from '../components/index.js';

interface ErrorScreenProps {
    source: string;
    message: string;
    onQuit: () => void;
    isRawModeSupported?: boolean | undefined;
}

export function ErrorScreen({
    source,
    message,
    onQuit,
    isRawModeSupported: isRawModeProp,
}: ErrorScreenProps): React.JSX.Element {
    const { isRawModeSupported: isRawModeFromStdin } = useStdin();
    const isRawModeSupported = isRawModeProp ?? isRawModeFromStdin;

    useInput(
        (input, key) => {
            if (key.return || key.escape || input === 'q') {
                onQuit();
            }
        },
        { isActive: isRawModeSupported }
    );

    return (
        <Box flexDirection="column">
            <Header source={source} />
            <Box paddingX={2}>
                <Text color="red" bold>
                    ✗{' '}
                </Text>
                <Text color="red">{message}</Text>
            </Box>
            <Footer hints={[{ keys: 'q', description: 'Quit' }]} />
        </Box>
    );
}
