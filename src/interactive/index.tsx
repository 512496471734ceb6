/**
 * Live trace viewer in the terminal
 */

import React, { useCallback, useEffect, useState } from 'react';
import { render, useApp, useStdin } from 'ink';
import type { CommandOptions, TraceSettings } from '../commands.js';
import { errorMessage } from '../errors.js';
import { Tracer, type TraceRecord } from '../tracer.js';
import type { ApduSource } from '../types.js';
import { ErrorScreen, TraceScreen } from './screens/index.js';
import { channelInfo, MAX_RECORDS, type Screen, type TraceFilters, type TraceView } from './types.js';

export interface AppProps {
    source: ApduSource;
    settings: TraceSettings;
    options?: CommandOptions | undefined;
    onExitCode?: ((code: number) => void) | undefined;
    isRawModeSupported?: boolean | undefined;
}

const INITIAL_VIEW: TraceView = {
    records: [],
    channels: [],
    stats: { exchanges: 0, resets: 0, emitted: 0, suppressed: 0 },
    status: 'waiting',
};

export function App({ source, settings, options = {}, onExitCode, isRawModeSupported: isRawModeProp }: AppProps): React.JSX.Element {
    const { exit } = useApp();
    const { isRawModeSupported: isRawModeFromStdin } = useStdin();
    const isRawModeSupported = isRawModeProp ?? isRawModeFromStdin;
    const [screen, setScreen] = useState<Screen>('trace');
    const [view, setView] = useState<TraceView>(INITIAL_VIEW);
    const [error, setError] = useState<string | null>(null);
    const [filters, setFilters] = useState<TraceFilters>({
        showSelect: !settings.suppressSelect,
        showStatus: !settings.suppressStatus,
    });
    const [showChannels, setShowChannels] = useState(true);

    const quit = useCallback(() => {
        void source.close();
        exit();
    }, [source, exit]);

    // Run the trace; filtering happens in the view so it can be toggled while running
    useEffect(() => {
        let mounted = true;
        const received: TraceRecord[] = [];

        const update = (tracer: Tracer, status: TraceView['status']): void => {
            if (!mounted) return;
            const records = received.splice(0);
            setView((prev) => ({
                records: records.length > 0 ? [...prev.records, ...records].slice(-MAX_RECORDS) : prev.records,
                channels: channelInfo(tracer.state),
                stats: tracer.stats,
                status,
            }));
        };

        const runTrace = async (): Promise<void> => {
            try {
                const tracer = new Tracer({
                    source,
                    registry: options.registry,
                    profile: options.profile,
                    suppressSelect: false,
                    suppressStatus: false,
                    onRecord: (record) => {
                        received.push(record);
                    },
                });
                while (await tracer.step()) {
                    update(tracer, 'running');
                }
                update(tracer, 'ended');
            } catch (e: unknown) {
                if (!mounted) return;
                onExitCode?.(1);
                setError(errorMessage(e));
                setScreen('error');
            }
        };

        void runTrace();

        return () => {
            mounted = false;
        };
    }, [source, options.registry, options.profile, onExitCode]);

    // Without keyboard input there is no way to quit, so leave once there is nothing more to show
    useEffect(() => {
        if (!isRawModeSupported && (view.status === 'ended' || screen === 'error')) {
            exit();
        }
    }, [isRawModeSupported, view.status, screen, exit]);

    if (screen === 'error') {
        return (
            <ErrorScreen
                source={source.name}
                message={error ?? 'Unknown error'}
                onQuit={quit}
                isRawModeSupported={isRawModeSupported}
            />
        );
    }

    return (
        <TraceScreen
            source={source.name}
            view={view}
            filters={filters}
            showChannels={showChannels}
            onToggleSelect={() => setFilters((f) => ({ ...f, showSelect: !f.showSelect }))}
            onToggleStatus={() => setFilters((f) => ({ ...f, showStatus: !f.showStatus }))}
            onToggleChannels={() => setShowChannels((v) => !v)}
            onQuit={quit}
            isRawModeSupported={isRawModeSupported}
        />
    );
}

/**
 * Show a trace in the terminal until the user quits (or, without a TTY, until the source ends)
 */
export async function runInteractive(
    source: ApduSource,
    settings: TraceSettings,
    options: CommandOptions = {}
): Promise<number> {
    let exitCode = 0;
    const instance = render(
        <App
            source={source}
            settings={settings}
            options={options}
            onExitCode={(code) => {
                exitCode = code;
            }}
        />
    );
    try {
        await instance.waitUntilExit();
    } finally {
        await source.close();
    }
    return exitCode;
}

export { TraceScreen, ErrorScreen } from './screens/index.js';
export type { TraceScreenProps } from './screens/index.js';
export { visibleRecords, channelInfo } from './types.js';
export type { ChannelInfo, TraceFilters, TraceView } from './types.js';
