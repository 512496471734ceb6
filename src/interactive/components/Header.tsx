import React from 'react';
import { Box, Text } from 'ink';
import Gradient from 'ink-gradient';

// prettier-ignore
const ASCII_ART = [
    ' █████╗ ██████╗ ██████╗ ██╗   ██╗',
    '██╔══██╗██╔══██╗██╔══██╗██║   ██║',
    '███████║██████╔╝██║  ██║██║   ██║',
    '██╔══██║██╔═══╝ ██║  ██║██║   ██║',
    '██║  ██║██║     ██████╔╝╚██████╔╝',
    '╚═╝  ╚═╝╚═╝     ╚═════╝  ╚═════╝ ',
] as const;

const WIDTH = 63;

interface HeaderProps {
    /** Name of the source being traced */
    source?: string | undefined;
}

function ArtLine({ art, note, color }: { art: string; note: string; color: string }): React.JSX.Element {
    const padding = WIDTH - 2 - art.length - note.length;
    return (
        <Text bold>
            <Text color="cyan">{'║  '}</Text>
            <Gradient name="pastel">
                <Text>{art}</Text>
            </Gradient>
            <Text color={color}>{note}</Text>
            <Text color="cyan">{' '.repeat(Math.max(0, padding))}║</Text>
        </Text>
    );
}

export function Header({ source }: HeaderProps): React.JSX.Element {
    const notes: [string, string][] = [
        ['', 'cyan'],
        ['   Trace Decoder', 'yellow'],
        ['   SIM / UICC / USIM', 'yellow'],
        ['', 'cyan'],
        [source ? `   ${source.slice(0, 24)}` : '', 'gray'],
        ['', 'cyan'],
    ];
    return (
        <Box flexDirection="column" marginBottom={1}>
            <Gradient name="rainbow">
                <Text bold>{'╔' + '═'.repeat(WIDTH) + '╗'}</Text>
            </Gradient>
            {ASCII_ART.map((art, index) => {
                const [note, color] = notes[index] ?? ['', 'cyan'];
                return <ArtLine key={index} art={art} note={note} color={color} />;
            })}
            <Gradient name="rainbow">
                <Text bold>{'╚' + '═'.repeat(WIDTH) + '╝'}</Text>
            </Gradient>
        </Box>
    );
}
