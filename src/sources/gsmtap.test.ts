import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ApduFormatError } from '../errors.js';
import type { ApduCase } from '../types.js';
import { decodeGsmtapPacket, GsmtapSimSubType, parseGsmtapHeader } from './gsmtap.js';

/** GSMTAP v2 header (16 bytes) followed by the payload */
function gsmtap(subType: number, payload: string, type = 0x04): Buffer {
    const header = Buffer.alloc(16);
    header[0] = 2;
    header[1] = 4;
    header[2] = type;
    header[12] = subType;
    return Buffer.concat([header, Buffer.from(payload, 'hex')]);
}

const always =
    (apduCase: ApduCase) =>
    (): ApduCase =>
        apduCase;

describe('GSMTAP', () => {
    describe('parseGsmtapHeader', () => {
        it('should read version, length, type and sub-type', () => {
            assert.deepStrictEqual(parseGsmtapHeader(gsmtap(GsmtapSimSubType.ATR, '3b00')), {
                version: 2,
                headerLength: 16,
                type: 4,
                subType: 1,
            });
        });

        it('should reject short packets and other versions', () => {
            assert.throws(() => parseGsmtapHeader(Buffer.from('020404', 'hex')), {
                name: 'ApduFormatError',
                message: 'GSMTAP packet too short (3 bytes)',
            });
            const v3 = gsmtap(0, '');
            v3[0] = 3;
            assert.throws(() => parseGsmtapHeader(v3), ApduFormatError);
        });

        it('should reject a header length beyond the packet', () => {
            const packet = gsmtap(0, '');
            packet[1] = 8;
            assert.throws(() => parseGsmtapHeader(packet), { message: 'Invalid GSMTAP header length 32' });
        });
    });

    describe('decodeGsmtapPacket', () => {
        it('should turn an ATR into a reset event', () => {
            const event = decodeGsmtapPacket(gsmtap(GsmtapSimSubType.ATR, '3b9f96'), always(4));
            assert.deepStrictEqual(event, { type: 'reset', atr: Buffer.from('3b9f96', 'hex') });
        });

        it('should split a case 4 exchange', () => {
            const event = decodeGsmtapPacket(gsmtap(GsmtapSimSubType.APDU, '00a40004023f009000'), always(4));
            assert.strictEqual(event?.type, 'apdu');
            if (event?.type !== 'apdu') return;
            assert.strictEqual(event.exchange.ins, 0xa4);
            assert.deepStrictEqual(event.exchange.data, Buffer.from('3f00', 'hex'));
            assert.strictEqual(event.exchange.le, undefined);
            assert.strictEqual(event.exchange.response?.sw, 0x9000);
        });

        it('should split a case 2 exchange', () => {
            const event = decodeGsmtapPacket(gsmtap(GsmtapSimSubType.APDU, '00b0000002aabb9000'), always(2));
            assert.strictEqual(event?.type, 'apdu');
            if (event?.type !== 'apdu') return;
            assert.strictEqual(event.exchange.data.length, 0);
            assert.strictEqual(event.exchange.le, 2);
            assert.deepStrictEqual(event.exchange.response?.data, Buffer.from('aabb', 'hex'));
        });

        it('should fall back to case 2 when case 4 does not fit', () => {
            const event = decodeGsmtapPacket(gsmtap(GsmtapSimSubType.APDU, '00ca9f7f05aabb9000'), always(4));
            assert.strictEqual(event?.type, 'apdu');
            if (event?.type !== 'apdu') return;
            assert.strictEqual(event.exchange.le, 5);
            assert.deepStrictEqual(event.exchange.response?.data, Buffer.from('aabb', 'hex'));
        });

        it('should ignore other types and sub-types', () => {
            assert.strictEqual(decodeGsmtapPacket(gsmtap(0, '00a40004023f009000', 0x01), always(4)), undefined);
            assert.strictEqual(decodeGsmtapPacket(gsmtap(GsmtapSimSubType.TPDU_HDR, '00a4000402'), always(4)), undefined);
        });

        it('should throw for truncated exchanges', () => {
            assert.throws(() => decodeGsmtapPacket(gsmtap(GsmtapSimSubType.APDU, '00a49000'), always(4)), {
                name: 'ApduFormatError',
                message: 'Exchange too short (4 bytes)',
            });
        });
    });
});
