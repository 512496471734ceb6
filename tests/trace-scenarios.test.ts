import { describe, it, expect } from 'vitest';
import {
    ApduCommand,
    createDefaultRegistry,
    defineCommand,
    emptyProfile,
    parseCommandApdu,
    ReplaySource,
    Tracer,
    type CardProfile,
    type CommandRegistry,
    type SourceEvent,
    type TraceRecord,
} from '../src/index.js';

function apdu(command: string, response: string): SourceEvent {
    return {
        type: 'apdu',
        exchange: parseCommandApdu(Buffer.from(command, 'hex'), Buffer.from(response, 'hex')),
    };
}

interface TraceOptions {
    suppressSelect?: boolean;
    suppressStatus?: boolean;
    profile?: CardProfile;
    registry?: CommandRegistry;
}

async function trace(events: SourceEvent[], options: TraceOptions = {}): Promise<TraceRecord[]> {
    const records: TraceRecord[] = [];
    await new Tracer({
        source: new ReplaySource(events),
        ...options,
        onRecord: (record) => records.push(record),
    }).run();
    return records;
}

const IMSI = '082901103254769810';
const IMSI_TEXT = 'offset=0 len=9 {"imsi":"210012345678901"}';

describe('select and status filtering', () => {
    const session: SourceEvent[] = [
        { type: 'reset' },
        apdu('00a40004023f00', '9000'),
        apdu('00a40004027f10', '9000'),
        apdu('80f20000', '9000'),
    ];

    it('hides SELECT and STATUS by default', async () => {
        expect(await trace(session)).toEqual([]);
    });

    it('shows SELECT when asked to', async () => {
        const records = await trace(session, { suppressSelect: false });
        expect(records.map((r) => r.path)).toEqual(['MF', 'MF/DF_TELECOM']);
        expect(records[1]?.processed).toBe('DF_TELECOM');
    });

    it('shows only STATUS when just that toggle is off', async () => {
        const records = await trace(session, { suppressStatus: false });
        expect(records).toHaveLength(1);
        expect(records[0]).toMatchObject({
            lchan: 0,
            name: 'STATUS',
            category: 'status',
            path: 'MF/DF_TELECOM',
            processed: 'MF/DF_TELECOM',
        });
    });

    it('shows both when neither is suppressed', async () => {
        const records = await trace(session, { suppressSelect: false, suppressStatus: false });
        expect(records.map((r) => r.name)).toEqual(['SELECT', 'SELECT', 'STATUS']);
        expect(records[2]?.processed).toBe('MF/DF_TELECOM');
    });
});

it('explains selections the card model cannot follow', async () => {
    const records = await trace([apdu('00a40004027f10', '9000')], {
        suppressSelect: false,
        profile: emptyProfile(),
    });
    expect(records).toHaveLength(1);
    expect(records[0]?.processed).toBe('SELECT failed: 7F10 not found from MF');
    expect(records[0]?.path).toBe('MF');
    expect(records[0]?.degraded).toBe(false);
});

it('keeps a separate cursor per logical channel', async () => {
    const records = await trace([
        { type: 'reset' },
        apdu('0070000001', '019000'),
        apdu('01a4040407a0000000871002', '9000'),
        apdu('00a40004027f20', '9000'),
        apdu('01b0870009', `${IMSI}9000`),
        apdu('00a40004026f07', '9000'),
        apdu('00b0000009', `${IMSI}9000`),
        apdu('00708001', '9000'),
    ]);
    expect(records.map((r) => [r.lchan, r.name, r.path, r.colId, r.processed])).toEqual([
        [0, 'MANAGE CHANNEL', 'MF', '1', 'open channel 1 at MF'],
        [1, 'READ BINARY', 'MF/ADF_USIM/EF_IMSI', '6F07', IMSI_TEXT],
        [0, 'READ BINARY', 'MF/DF_GSM/EF_IMSI', '6F07', IMSI_TEXT],
        [0, 'MANAGE CHANNEL', 'MF/DF_GSM/EF_IMSI', '1', 'close channel 1'],
    ]);
});

it('keeps going after unknown and undecodable exchanges', async () => {
    const records = await trace([
        apdu('00ff0000', '6d00'),
        apdu('0088008003100102', '9000'),
        apdu('00a40004022fe2', '9000'),
        apdu('00b000000a', '981032547698103254f69000'),
    ]);
    expect(records.map((r) => [r.name, r.recognized, r.degraded])).toEqual([
        ['UNKNOWN', false, false],
        ['AUTHENTICATE', true, true],
        ['READ BINARY', true, false],
    ]);
    expect(records[1]?.path).toBe('MF');
    expect(records[2]?.processed).toBe('offset=0 len=10 {"iccid":"8901234567890123456"}');
});

describe('custom command sets', () => {
    class FixedText extends ApduCommand {
        protected override processOnLchan(): string {
            return 'vendor read';
        }
    }

    it('adds commands for new instructions', async () => {
        const registry = createDefaultRegistry().register(defineCommand('GET DATA', 0xca, ['8X'], 2, ApduCommand));
        const records = await trace([apdu('80ca010202', 'aabb9000')], { registry });
        expect(records[0]?.name).toBe('GET DATA');
        expect(records[0]?.recognized).toBe(true);
        expect(records[0]?.processed).toBe('{"p1":"01","p2":"02","response":"aabb"}');
    });

    it('lets the latest registration win', async () => {
        const registry = createDefaultRegistry().register(defineCommand('VENDOR READ', 0xb0, ['0X'], 2, FixedText));
        const records = await trace([apdu('00b0000002', 'aabb9000')], { registry });
        expect(records[0]?.name).toBe('VENDOR READ');
        expect(records[0]?.processed).toBe('vendor read');
    });

    it('prefers the more specific class pattern', async () => {
        const registry = createDefaultRegistry().register(defineCommand('VENDOR READ', 0xb0, ['XX'], 2, FixedText));
        const records = await trace([apdu('00b0000002', 'aabb9000')], { registry });
        expect(records[0]?.name).toBe('READ BINARY');
    });
});
