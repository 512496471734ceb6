import { ApduFormatError } from './errors.js';
import type { ApduCase, ApduResponse, RawExchange } from './types.js';

/**
 * Class byte pattern: a command matches when (cla & mask) === value
 */
export interface ClaPattern {
    readonly value: number;
    readonly mask: number;
}

/**
 * Parse a class pattern such as '0X', 'A0' or '8X' (X = any nibble)
 */
export function claPattern(expr: string): ClaPattern {
    if (!/^[0-9a-fA-FxX]{2}$/.test(expr)) {
        throw new RangeError(`Invalid CLA pattern '${expr}'`);
    }
    let value = 0;
    let mask = 0;
    for (const ch of expr) {
        value <<= 4;
        mask <<= 4;
        if (ch !== 'x' && ch !== 'X') {
            value |= parseInt(ch, 16);
            mask |= 0x0f;
        }
    }
    return { value, mask };
}

export function matchesCla(pattern: ClaPattern, cla: number): boolean {
    return (cla & pattern.mask) === pattern.value;
}

/**
 * Render a class pattern back into its 'X'-wildcard notation
 */
export function formatClaPattern(pattern: ClaPattern): string {
    const nibble = (shift: number): string =>
        ((pattern.mask >> shift) & 0x0f) === 0x0f
            ? ((pattern.value >> shift) & 0x0f).toString(16).toUpperCase()
            : 'X';
    return nibble(4) + nibble(0);
}

/**
 * Logical channel number encoded in a class byte, or undefined
 * for class bytes that carry no channel information
 */
export function logicalChannelFromCla(cla: number): number | undefined {
    const high = cla >> 4;
    if (high === 0x0 || high === 0x8 || high === 0xa) {
        return cla & 0x03;
    }
    const masked = cla & 0xd0;
    if (masked === 0x40 || masked === 0xc0) {
        return 4 + (cla & 0x0f);
    }
    return undefined;
}

/**
 * Format a byte as two upper-case hex digits
 */
export function hexByte(value: number): string {
    return value.toString(16).padStart(2, '0').toUpperCase();
}

/**
 * Format a status word as four upper-case hex digits
 */
export function formatSw(sw: number): string {
    return sw.toString(16).padStart(4, '0').toUpperCase();
}

/**
 * Status words that report a (possibly pending) successful outcome
 */
export function isSuccessfulSw(sw: number): boolean {
    const sw1 = sw >> 8;
    return sw1 === 0x90 || sw1 === 0x91 || sw1 === 0x92 || sw1 === 0x9f || sw1 === 0x61;
}

/**
 * Status words announcing that response data must be fetched with GET RESPONSE
 */
export function isResponsePendingSw(sw: number): boolean {
    const sw1 = sw >> 8;
    return sw1 === 0x61 || sw1 === 0x9f;
}

/**
 * Parse a hex string (whitespace and colons allowed) into a buffer
 */
export function parseHex(text: string): Buffer {
    const cleaned = text.replace(/[\s:]/g, '');
    if (!/^[0-9a-fA-F]*$/.test(cleaned) || cleaned.length % 2 !== 0) {
        throw new ApduFormatError(`Invalid hex string '${text}'`);
    }
    return Buffer.from(cleaned, 'hex');
}

/**
 * Split a response (data followed by SW1 SW2) into its parts
 */
export function parseResponseApdu(bytes: Buffer): ApduResponse {
    if (bytes.length < 2) {
        throw new ApduFormatError(`Response too short (${String(bytes.length)} bytes)`);
    }
    return {
        data: bytes.subarray(0, bytes.length - 2),
        sw: bytes.readUInt16BE(bytes.length - 2),
    };
}

/**
 * Parse a short command APDU (header, optional Lc + data, optional Le)
 * and pair it with an optional response.
 */
export function parseCommandApdu(bytes: Buffer, response?: Buffer): RawExchange {
    const [cla, ins, p1, p2] = bytes;
    if (cla === undefined || ins === undefined || p1 === undefined || p2 === undefined) {
        throw new ApduFormatError(`Command APDU too short (${String(bytes.length)} bytes)`);
    }

    let data: Buffer = Buffer.alloc(0);
    let le: number | undefined;
    const body = bytes.subarray(4);

    if (body.length === 1) {
        // case 2: Le only (0x00 means 256)
        le = body[0] === 0 ? 256 : body[0];
    } else if (body.length > 1) {
        const lc = body[0] ?? 0;
        if (lc === 0 || body.length < 1 + lc || body.length > 2 + lc) {
            throw new ApduFormatError(
                `Lc=${String(lc)} does not match ${String(body.length - 1)} byte(s) of command data`
            );
        }
        data = body.subarray(1, 1 + lc);
        if (body.length === 2 + lc) {
            const leByte = body[1 + lc] ?? 0;
            le = leByte === 0 ? 256 : leByte;
        }
    }

    return {
        cla,
        ins,
        p1,
        p2,
        data,
        le,
        response: response ? parseResponseApdu(response) : undefined,
    };
}

/**
 * Split a T=0 style exchange as carried by GSMTAP-SIM
 * (5-byte header, command data, response data, SW1 SW2)
 * using the APDU case of the command.
 */
export function parseTpduExchange(bytes: Buffer, apduCase: ApduCase): RawExchange {
    if (bytes.length < 7) {
        throw new ApduFormatError(`Exchange too short (${String(bytes.length)} bytes)`);
    }
    const [cla = 0, ins = 0, p1 = 0, p2 = 0, p3 = 0] = bytes;
    const hasCommandData = apduCase === 3 || apduCase === 4;
    const dataEnd = hasCommandData ? 5 + p3 : 5;

    if (dataEnd > bytes.length - 2) {
        throw new ApduFormatError(
            `P3=${String(p3)} exceeds the ${String(bytes.length - 7)} byte(s) present`
        );
    }

    return {
        cla,
        ins,
        p1,
        p2,
        data: hasCommandData ? bytes.subarray(5, dataEnd) : Buffer.alloc(0),
        le: apduCase === 2 ? (p3 === 0 ? 256 : p3) : undefined,
        response: parseResponseApdu(bytes.subarray(dataEnd)),
    };
}

/**
 * Render the command part of an exchange as hex
 */
export function formatCommandHex(exchange: RawExchange): string {
    const header = [exchange.cla, exchange.ins, exchange.p1, exchange.p2].map(hexByte).join('');
    const lc = exchange.data.length > 0 ? hexByte(exchange.data.length) : '';
    return header + lc + exchange.data.toString('hex').toUpperCase();
}
