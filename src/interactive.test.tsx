import { describe, it } from 'node:test';
import assert from 'node:assert';
import { render } from 'ink-testing-library';
import { parseCommandApdu } from './apdu.js';
import type { CardMF, CardProfile } from './card-profile.js';
import { ProfileError, SourceError } from './errors.js';
import { App, ErrorScreen, TraceScreen } from './interactive.js';
import type { TraceView } from './interactive/types.js';
import { ReplaySource } from './sources/replay-source.js';
import type { TraceRecord } from './tracer.js';
import type { ApduSource, SourceEvent } from './types.js';

const noop = () => {};

function record(name: string, category: TraceRecord['category'], processed: string): TraceRecord {
    return {
        lchan: 0,
        name,
        path: 'MF/EF_ICCID',
        colId: '2FE2',
        colSw: '9000',
        processed,
        degraded: false,
        successful: true,
        recognized: true,
        category,
    };
}

function apdu(command: string, response: string): SourceEvent {
    return {
        type: 'apdu',
        exchange: parseCommandApdu(Buffer.from(command, 'hex'), Buffer.from(response, 'hex')),
    };
}

async function waitForFrame(lastFrame: () => string | undefined, text: string): Promise<string> {
    for (let i = 0; i < 200; i++) {
        const frame = lastFrame() ?? '';
        if (frame.includes(text)) {
            return frame;
        }
        await new Promise((resolve) => setTimeout(resolve, 10));
    }
    return lastFrame() ?? '';
}

const RUNNING_VIEW: TraceView = {
    records: [record('SELECT', 'select', 'EF_ICCID'), record('READ BINARY', 'other', 'offset=0 len=10')],
    channels: [{ nr: 0, path: 'MF/ADF_USIM', application: 'ADF_USIM' }],
    stats: { exchanges: 2, resets: 1, emitted: 2, suppressed: 0 },
    status: 'running',
};

describe('Interactive CLI', () => {
    describe('module exports', () => {
        it('should export runInteractive function', async () => {
            const module = await import('./interactive.js');
            assert.strictEqual(typeof module.runInteractive, 'function');
        });
    });

    describe('TraceScreen', () => {
        const props = {
            source: 'hex-file trace.txt',
            filters: { showSelect: false, showStatus: false },
            showChannels: true,
            onToggleSelect: noop,
            onToggleStatus: noop,
            onToggleChannels: noop,
            onQuit: noop,
        };

        it('should show a spinner until the first event', () => {
            const { lastFrame, unmount } = render(
                <TraceScreen
                    {...props}
                    view={{ ...RUNNING_VIEW, records: [], channels: [], status: 'waiting' }}
                    isRawModeSupported={false}
                />
            );
            const frame = lastFrame() ?? '';
            unmount();
            assert.ok(frame.includes('Waiting for APDUs from hex-file trace.txt...'));
        });

        it('should apply the filters to the records', () => {
            const { lastFrame, unmount } = render(
                <TraceScreen {...props} view={RUNNING_VIEW} isRawModeSupported={false} />
            );
            const frame = lastFrame() ?? '';
            unmount();

            assert.ok(frame.includes('2 exchange(s), 1 reset(s), 1 hidden'));
            assert.ok(frame.includes('last 1 of 2'));
            assert.ok(frame.includes('offset=0 len=10'));
            assert.ok(!frame.includes('SELECT'));
        });

        it('should list the logical channels unless hidden', () => {
            const shown = render(<TraceScreen {...props} view={RUNNING_VIEW} isRawModeSupported={false} />);
            const withChannels = shown.lastFrame() ?? '';
            shown.unmount();
            assert.ok(withChannels.includes('#0 MF/ADF_USIM (ADF_USIM)'));

            const hidden = render(
                <TraceScreen {...props} showChannels={false} view={RUNNING_VIEW} isRawModeSupported={false} />
            );
            const withoutChannels = hidden.lastFrame() ?? '';
            hidden.unmount();
            assert.ok(!withoutChannels.includes('Logical Channels'));
        });

        it('should show key hints with toggle states when raw mode is supported', () => {
            const { lastFrame, unmount } = render(
                <TraceScreen
                    {...props}
                    filters={{ showSelect: true, showStatus: false }}
                    view={RUNNING_VIEW}
                    isRawModeSupported={true}
                />
            );
            const frame = lastFrame() ?? '';
            unmount();
            assert.ok(frame.includes('[s] SELECT on'));
            assert.ok(frame.includes('[t] STATUS off'));
            assert.ok(!frame.includes('(keyboard input not available)'));
        });

        it('should show fallback message when raw mode is not supported', () => {
            const { lastFrame, unmount } = render(
                <TraceScreen {...props} view={RUNNING_VIEW} isRawModeSupported={false} />
            );
            const frame = lastFrame() ?? '';
            unmount();
            assert.ok(frame.includes('(keyboard input not available)'));
        });
    });

    describe('ErrorScreen', () => {
        it('should show the error message', () => {
            const { lastFrame, unmount } = render(
                <ErrorScreen source="gsmtap-udp 127.0.0.1:4729" message="socket closed" onQuit={noop} isRawModeSupported={false} />
            );
            const frame = lastFrame() ?? '';
            unmount();
            assert.ok(frame.includes('✗ socket closed'));
        });
    });

    describe('App', () => {
        it('should run the trace to the end and filter SELECT records', async () => {
            const source = new ReplaySource([
                apdu('00a40004022fe2', '9000'),
                apdu('00b000000a', '981032547698103254f69000'),
            ]);
            const { lastFrame, unmount } = render(
                <App
                    source={source}
                    settings={{ suppressSelect: true, suppressStatus: true }}
                    isRawModeSupported={false}
                />
            );
            const frame = await waitForFrame(lastFrame, 'ended');
            unmount();

            assert.ok(frame.includes('■ ended'));
            assert.ok(frame.includes('2 exchange(s), 0 reset(s), 1 hidden'));
            assert.ok(frame.includes('last 1 of 2'));
            assert.ok(frame.includes('#0 MF/EF_ICCID'));
        });

        it('should show source errors and report a failing exit code', async () => {
            const source: ApduSource = {
                name: 'broken',
                read: () => Promise.reject(new SourceError('capture interface went away')),
                close: () => Promise.resolve(),
            };
            const codes: number[] = [];
            const { lastFrame, unmount } = render(
                <App
                    source={source}
                    settings={{ suppressSelect: true, suppressStatus: true }}
                    onExitCode={(code) => codes.push(code)}
                    isRawModeSupported={false}
                />
            );
            const frame = await waitForFrame(lastFrame, '✗');
            unmount();

            assert.ok(frame.includes('✗ capture interface went away'));
            assert.deepStrictEqual(codes, [1]);
        });

        it('should show a card model that cannot be loaded on the error screen', async () => {
            const profile: CardProfile = {
                name: 'broken',
                get mf(): CardMF {
                    throw new ProfileError('card model has no MF');
                },
            };
            const codes: number[] = [];
            const { lastFrame, unmount } = render(
                <App
                    source={new ReplaySource([])}
                    settings={{ suppressSelect: true, suppressStatus: true }}
                    options={{ profile }}
                    onExitCode={(code) => codes.push(code)}
                    isRawModeSupported={false}
                />
            );
            const frame = await waitForFrame(lastFrame, '✗');
            unmount();

            assert.ok(frame.includes('✗ card model has no MF'));
            assert.deepStrictEqual(codes, [1]);
        });
    });
});
