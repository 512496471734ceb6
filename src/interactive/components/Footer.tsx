import React from 'react';
import { Box, Text } from 'ink';

export interface KeyHintProps {
    keys: string;
    description: string;
    /** Current state of a toggle bound to the key */
    on?: boolean | undefined;
}

function KeyHint({ keys, description, on }: KeyHintProps): React.JSX.Element {
    return (
        <Box marginRight={2}>
            <Text color="yellow" bold>
                [{keys}]
            </Text>
            <Text color="gray"> {description}</Text>
            {on !== undefined && <Text color={on ? 'green' : 'red'}>{on ? ' on' : ' off'}</Text>}
        </Box>
    );
}

interface FooterProps {
    hints: KeyHintProps[];
}

export function Footer({ hints }: FooterProps): React.JSX.Element {
    return (
        <Box marginTop={1} paddingX={2} flexWrap="wrap">
            {hints.map((hint) => (
                <KeyHint key={hint.keys} keys={hint.keys} description={hint.description} on={hint.on} />
            ))}
        </Box>
    );
}
