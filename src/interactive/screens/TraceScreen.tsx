import React from 'react';
import { Box, Text, useInput, useStdin } from 'ink';
import { ChannelList, Footer, Header, Panel, RecordLine, SourceSpinner, StatusBar } from '../components/index.js';
import { visibleRecords, type TraceFilters, type TraceView } from '../types.js';

export interface TraceScreenProps {
    source: string;
    view: TraceView;
    filters: TraceFilters;
    showChannels: boolean;
    /** Number of records on screen */
    rows?: number | undefined;
    onToggleSelect: () => void;
    onToggleStatus: () => void;
    onToggleChannels: () => void;
    onQuit: () => void;
    /** Override raw mode detection for testing. If not provided, uses useStdin() hook. */
    isRawModeSupported?: boolean | undefined;
}

export function TraceScreen({
    source,
    view,
    filters,
    showChannels,
    rows = 20,
    onToggleSelect,
    onToggleStatus,
    onToggleChannels,
    onQuit,
    isRawModeSupported: isRawModeProp,
}: TraceScreenProps): React.JSX.Element {
    const { isRawModeSupported: isRawModeFromStdin } = useStdin();
    const isRawModeSupported = isRawModeProp ?? isRawModeFromStdin;

    useInput(
        (input) => {
            switch (input) {
                case 'q':
                    onQuit();
                    break;
                case 's':
                    onToggleSelect();
                    break;
                case 't':
                    onToggleStatus();
                    break;
                case 'c':
                    onToggleChannels();
                    break;
            }
        },
        { isActive: isRawModeSupported }
    );

    const shown = visibleRecords(view.records, filters, rows);
    const hidden = view.records.length - visibleRecords(view.records, filters, view.records.length).length;

    return (
        <Box flexDirection="column">
            <Header source={source} />
            <StatusBar status={view.status} stats={view.stats} hidden={hidden} />
            {showChannels && (
                <Panel title="Logical Channels">
                    <ChannelList channels={view.channels} />
                </Panel>
            )}
            <Panel title="Trace" detail={`last ${String(shown.length)} of ${String(view.records.length)}`}>
                {view.status === 'waiting' ? (
                    <SourceSpinner source={source} />
                ) : shown.length === 0 ? (
                    <Text color="gray">(no records)</Text>
                ) : (
                    shown.map((record, index) => <RecordLine key={index} record={record} />)
                )}
            </Panel>
            {isRawModeSupported ? (
                <Footer
                    hints={[
                        { keys: 's', description: 'SELECT', on: filters.showSelect },
                        { keys: 't', description: 'STATUS', on: filters.showStatus },
                        { keys: 'c', description: 'Channels', on: showChannels },
                        { keys: 'q', description: 'Quit' },
                    ]}
                />
            ) : (
                <Box marginTop={1} paddingX={2}>
                    <Text color="gray">(keyboard input not available)</Text>
                </Box>
            )}
        </Box>
    );
}
