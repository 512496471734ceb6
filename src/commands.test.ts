import { describe, it, mock } from 'node:test';
import assert from 'node:assert';
import { parseCommandApdu } from './apdu.js';
import { buildCardProfile } from './card-profile.js';
import { createDefaultRegistry } from './command-sets/index.js';
import {
    createLog,
    listCommands,
    openSource,
    showProfile,
    traceSource,
    type CommandContext,
    type SourceSettings,
} from './commands.js';
import { SourceError } from './errors.js';
import { HexTraceSource } from './sources/hex-trace-source.js';
import { ReplaySource } from './sources/replay-source.js';
import type { ApduSource, SourceEvent } from './types.js';

function createMockContext(
    format?: string,
    verbose?: boolean
): { ctx: CommandContext; outputs: string[]; errors: string[] } {
    const outputs: string[] = [];
    const errors: string[] = [];
    return {
        ctx: {
            output: (msg: string) => outputs.push(msg),
            error: (msg: string) => errors.push(msg),
            format,
            verbose,
        },
        outputs,
        errors,
    };
}

function apdu(command: string, response: string): SourceEvent {
    return {
        type: 'apdu',
        exchange: parseCommandApdu(Buffer.from(command, 'hex'), Buffer.from(response, 'hex')),
    };
}

const MINI_PROFILE = buildCardProfile({
    name: 'mini',
    mf: {
        children: [
            { type: 'EF', name: 'EF_ICCID', fid: '2fe2', structure: 'transparent', decoder: 'iccid' },
            { type: 'DF', name: 'DF_X', fid: '7f99', children: [] },
        ],
    },
    applications: [{ name: 'ADF_TEST', aid: 'a000000001', children: [] }],
});

const NO_SOURCE_SETTINGS: SourceSettings = { bindIp: undefined, bindPort: undefined };

describe('Commands', () => {
    describe('createLog', () => {
        it('should only debug when verbose', () => {
            assert.strictEqual(createLog(createMockContext().ctx).debug, undefined);
            assert.notStrictEqual(createLog(createMockContext(undefined, true).ctx).debug, undefined);
        });

        it('should dim diagnostics when colouring', () => {
            const { ctx, errors } = createMockContext();
            createLog({ ...ctx, color: true }).log('hello');
            assert.deepStrictEqual(errors, ['\x1b[2mhello\x1b[0m']);
        });
    });

    describe('openSource', () => {
        const registry = createDefaultRegistry();

        it('should open file sources', () => {
            const { ctx } = createMockContext();
            const source = openSource(ctx, 'hex-file', ['trace.txt'], NO_SOURCE_SETTINGS, registry);
            assert.ok(source instanceof HexTraceSource);
            assert.strictEqual(source.name, 'hex-file trace.txt');
            assert.strictEqual(
                openSource(ctx, 'gsmtap-pcap', ['capture.pcap'], NO_SOURCE_SETTINGS, registry)?.name,
                'gsmtap-pcap capture.pcap'
            );
        });

        it('should require a file argument', () => {
            const { ctx, errors } = createMockContext();
            assert.strictEqual(openSource(ctx, 'gsmtap-pcap', [], NO_SOURCE_SETTINGS, registry), undefined);
            assert.deepStrictEqual(errors, ['Usage: apdu-trace gsmtap-pcap <file>']);
        });

        it('should name the UDP source after its bind address', () => {
            const { ctx } = createMockContext();
            const source = openSource(ctx, 'gsmtap-udp', [], { bindIp: '0.0.0.0', bindPort: '4800' }, registry);
            assert.strictEqual(source?.name, 'gsmtap-udp 0.0.0.0:4800');
        });

        it('should reject invalid ports', () => {
            const { ctx, errors } = createMockContext();
            assert.strictEqual(
                openSource(ctx, 'gsmtap-udp', [], { bindIp: undefined, bindPort: 'http' }, registry),
                undefined
            );
            assert.deepStrictEqual(errors, ["Invalid port 'http'"]);
        });
    });

    describe('traceSource', () => {
        const session = [
            apdu('00a40004022fe2', '9000'),
            apdu('00b000000a', '981032547698103254f69000'),
        ];

        it('should print one JSON object per shown exchange', async () => {
            const { ctx, outputs, errors } = createMockContext('json');
            const result = await traceSource(ctx, new ReplaySource(session), {
                suppressSelect: true,
                suppressStatus: true,
            });
            assert.strictEqual(result, 0);
            assert.strictEqual(outputs.length, 1);
            const record: unknown = JSON.parse(outputs[0] ?? '');
            assert.deepStrictEqual(record, {
                lchan: 0,
                name: 'READ BINARY',
                path: 'MF/EF_ICCID',
                colId: '2FE2',
                colSw: '9000',
                processed: 'offset=0 len=10 {"iccid":"8901234567890123456"}',
                degraded: false,
                successful: true,
                recognized: true,
                category: 'other',
            });
            assert.deepStrictEqual(errors, [
                'Reading from replay',
                '2 exchange(s), 0 reset(s), 1 shown, 1 suppressed',
            ]);
        });

        it('should interpret against the given profile', async () => {
            const { ctx, outputs } = createMockContext('json');
            await traceSource(
                ctx,
                new ReplaySource([apdu('00a40004026f07', '9000')]),
                { suppressSelect: false, suppressStatus: true },
                { profile: MINI_PROFILE }
            );
            const record: unknown = JSON.parse(outputs[0] ?? '');
            assert.ok(typeof record === 'object' && record !== null && 'processed' in record);
            assert.strictEqual(record.processed, 'SELECT failed: 6F07 not found from MF');
        });

        it('should report source errors and close the source', async () => {
            const { ctx, errors } = createMockContext();
            const close = mock.fn(() => Promise.resolve());
            const source: ApduSource = {
                name: 'broken',
                read: () => Promise.reject(new SourceError('capture interface went away')),
                close,
            };
            const result = await traceSource(ctx, source, { suppressSelect: true, suppressStatus: true });
            assert.strictEqual(result, 1);
            assert.deepStrictEqual(errors, ['Reading from broken', 'Error: capture interface went away']);
            assert.strictEqual(close.mock.callCount(), 1);
        });

        it('should reject unknown formats', async () => {
            const { ctx, errors } = createMockContext('xml');
            const result = await traceSource(ctx, new ReplaySource(session), {
                suppressSelect: true,
                suppressStatus: true,
            });
            assert.strictEqual(result, 1);
            assert.deepStrictEqual(errors, ["Unknown format 'xml' (expected text or json)"]);
        });
    });

    describe('listCommands', () => {
        it('should list commands sorted by instruction', () => {
            const { ctx, outputs } = createMockContext();
            assert.strictEqual(listCommands(ctx), 0);
            assert.strictEqual(outputs[0], '52 command(s):\n');
            assert.strictEqual(outputs[1], '  04  0X,4X,6X  DEACTIVATE FILE        case 3');
            assert.strictEqual(outputs.length, 53);
        });

        it('should list commands as JSON', () => {
            const { ctx, outputs } = createMockContext('json');
            listCommands(ctx);
            const list: unknown = JSON.parse(outputs[0] ?? '');
            assert.ok(Array.isArray(list));
            assert.strictEqual(list.length, 52);
            assert.deepStrictEqual(list[0], {
                name: 'DEACTIVATE FILE',
                ins: '04',
                cla: ['0X', '4X', '6X'],
                apduCase: 3,
                category: 'other',
            });
        });
    });

    describe('showProfile', () => {
        it('should print the file tree', () => {
            const { ctx, outputs } = createMockContext();
            assert.strictEqual(showProfile(ctx, { profile: MINI_PROFILE }), 0);
            assert.deepStrictEqual(outputs, [
                'mini',
                '  MF 3F00',
                '    EF_ICCID 2FE2 transparent',
                '    DF_X 7F99',
                '    ADF_TEST a000000001',
            ]);
        });

        it('should print the file tree as JSON', () => {
            const { ctx, outputs } = createMockContext('json');
            showProfile(ctx, { profile: MINI_PROFILE });
            assert.deepStrictEqual(JSON.parse(outputs[0] ?? ''), {
                name: 'mini',
                mf: {
                    name: 'MF',
                    fid: '3F00',
                    children: [
                        { name: 'EF_ICCID', fid: '2FE2', structure: 'transparent' },
                        { name: 'DF_X', fid: '7F99', children: [] },
                        { name: 'ADF_TEST', aid: 'a000000001', children: [] },
                    ],
                },
            });
        });
    });
});
