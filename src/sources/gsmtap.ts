import { parseTpduExchange } from '../apdu.js';
import { ApduFormatError } from '../errors.js';
import type { ApduCaseResolver, SourceEvent } from '../types.js';

/** Well-known GSMTAP UDP port */
export const GSMTAP_PORT = 4729;

export const GSMTAP_VERSION = 2;
export const GSMTAP_TYPE_SIM = 0x04;

/**
 * GSMTAP-SIM sub-types
 */
export const GsmtapSimSubType = {
    APDU: 0x00,
    ATR: 0x01,
    PPS_REQ: 0x02,
    PPS_RSP: 0x03,
    TPDU_HDR: 0x04,
    TPDU_CMD: 0x05,
    TPDU_RSP: 0x06,
    TPDU_SW: 0x07,
} as const;

export interface GsmtapHeader {
    version: number;
    /** Header length in bytes */
    headerLength: number;
    type: number;
    subType: number;
}

/**
 * Parse the fixed GSMTAP v2 header
 */
export function parseGsmtapHeader(packet: Buffer): GsmtapHeader {
    if (packet.length < 16) {
        throw new ApduFormatError(`GSMTAP packet too short (${String(packet.length)} bytes)`);
    }
    const version = packet[0] ?? 0;
    if (version !== GSMTAP_VERSION) {
        throw new ApduFormatError(`Unsupported GSMTAP version ${String(version)}`);
    }
    const headerLength = (packet[1] ?? 0) * 4;
    if (headerLength < 16 || headerLength > packet.length) {
        throw new ApduFormatError(`Invalid GSMTAP header length ${String(headerLength)}`);
    }
    return { version, headerLength, type: packet[2] ?? 0, subType: packet[12] ?? 0 };
}

/**
 * Turn one GSMTAP packet into a source event.
 * Returns undefined for packets that carry no exchange (other types and sub-types);
 * throws ApduFormatError for malformed ones.
 */
export function decodeGsmtapPacket(packet: Buffer, apduCase: ApduCaseResolver): SourceEvent | undefined {
    const header = parseGsmtapHeader(packet);
    if (header.type !== GSMTAP_TYPE_SIM) {
        return undefined;
    }
    const body = packet.subarray(header.headerLength);
    switch (header.subType) {
        case GsmtapSimSubType.ATR:
            return { type: 'reset', atr: Buffer.from(body) };
        case GsmtapSimSubType.APDU: {
            const [cla = 0, ins = 0] = body;
            const resolved = apduCase(cla, ins);
            try {
                return { type: 'apdu', exchange: parseTpduExchange(body, resolved) };
            } catch (error: unknown) {
                // an unknown command guessed as case 4 may really be a case 2 one
                if (resolved === 4 && error instanceof ApduFormatError && body.length >= 7) {
                    return { type: 'apdu', exchange: parseTpduExchange(body, 2) };
                }
                throw error;
            }
        }
        default:
            return undefined;
    }
}
