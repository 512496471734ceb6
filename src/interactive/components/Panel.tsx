import React from 'react';
import { Box, Text } from 'ink';

interface PanelProps {
    title: string;
    /** Shown after the title, dimmed */
    detail?: string | undefined;
    children: React.ReactNode;
}

export function Panel({ title, detail, children }: PanelProps): React.JSX.Element {
    return (
        <Box flexDirection="column" marginTop={1} paddingX={2}>
            <Box>
                <Text color="magenta" bold>
                    ┌─ {title} ─
                </Text>
                {detail && <Text color="gray"> {detail}</Text>}
            </Box>
            <Box flexDirection="column" paddingLeft={2}>
                {children}
            </Box>
        </Box>
    );
}
