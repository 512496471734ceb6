import { findTagInBuffer } from './fcp-tags.js';

/**
 * A decoded file body; rendered as JSON in the processed column
 */
export type DecodedContent = Record<string, unknown>;

export type ContentDecoder = (data: Buffer) => DecodedContent;

/**
 * Decode swapped-nibble BCD digits, stopping at the first 'F' filler
 */
export function decodeSwappedBcd(data: Buffer): string {
    let digits = '';
    for (const byte of data) {
        for (const nibble of [byte & 0x0f, byte >> 4]) {
            if (nibble === 0x0f) {
                return digits;
            }
            digits += nibble.toString(16);
        }
    }
    return digits;
}

/**
 * Decode a 3-byte PLMN (MCC/MNC, TS 24.008 10.5.1.3)
 */
export function decodePlmn(data: Buffer): { mcc: string; mnc: string } | undefined {
    const [b0, b1, b2] = data;
    if (b0 === undefined || b1 === undefined || b2 === undefined) {
        return undefined;
    }
    if (b0 === 0xff && b1 === 0xff && b2 === 0xff) {
        return undefined;
    }
    const digit = (nibble: number): string => nibble.toString(16);
    const mcc = digit(b0 & 0x0f) + digit(b0 >> 4) + digit(b1 & 0x0f);
    let mnc = digit(b2 & 0x0f) + digit(b2 >> 4);
    if (b1 >> 4 !== 0x0f) {
        mnc += digit(b1 >> 4);
    }
    return { mcc, mnc };
}

/**
 * Strip trailing 0xFF padding and decode the remainder as text
 */
function decodePaddedText(data: Buffer): string {
    let end = data.length;
    while (end > 0 && data[end - 1] === 0xff) {
        end--;
    }
    return data.subarray(0, end).toString('latin1');
}

function decodeIccid(data: Buffer): DecodedContent {
    return { iccid: decodeSwappedBcd(data) };
}

function decodeImsi(data: Buffer): DecodedContent {
    const length = data[0] ?? 0;
    if (length === 0 || length === 0xff) {
        return { imsi: null };
    }
    // first digit is the parity/type nibble
    const digits = decodeSwappedBcd(data.subarray(1, 1 + length));
    return { imsi: digits.substring(1) };
}

function decodeSpn(data: Buffer): DecodedContent {
    const condition = data[0] ?? 0;
    return {
        spn: decodePaddedText(data.subarray(1)),
        hide_in_oplmn: (condition & 0x02) !== 0,
        show_in_hplmn: (condition & 0x01) !== 0,
    };
}

function decodePlmnList(data: Buffer): DecodedContent {
    const plmns: string[] = [];
    for (let i = 0; i + 3 <= data.length; i += 3) {
        const plmn = decodePlmn(data.subarray(i, i + 3));
        if (plmn) {
            plmns.push(`${plmn.mcc}-${plmn.mnc}`);
        }
    }
    return { plmns };
}

function decodePlmnAccessTechList(data: Buffer): DecodedContent {
    const entries: { plmn: string; act: string }[] = [];
    for (let i = 0; i + 5 <= data.length; i += 5) {
        const plmn = decodePlmn(data.subarray(i, i + 3));
        if (plmn) {
            entries.push({
                plmn: `${plmn.mcc}-${plmn.mnc}`,
                act: data.subarray(i + 3, i + 5).toString('hex'),
            });
        }
    }
    return { entries };
}

const OPERATION_MODES = new Map<number, string>([
    [0x00, 'normal'],
    [0x80, 'type_approval'],
    [0x01, 'normal_and_specific_facilities'],
    [0x81, 'type_approval_and_specific_facilities'],
    [0x02, 'maintenance_off_line'],
    [0x04, 'cell_test'],
]);

function decodeAdministrativeData(data: Buffer): DecodedContent {
    const mode = data[0] ?? 0;
    const content: DecodedContent = {
        ms_operation_mode: OPERATION_MODES.get(mode) ?? `unknown_${String(mode)}`,
    };
    const mncLength = data[3];
    if (mncLength !== undefined) {
        content.mnc_length = mncLength & 0x0f;
    }
    return content;
}

const UPDATE_STATUS = ['updated', 'not_updated', 'plmn_not_allowed', 'location_area_not_allowed'];

function decodeLocationInfo(data: Buffer): DecodedContent {
    if (data.length < 11) {
        return { raw: data.toString('hex') };
    }
    const plmn = decodePlmn(data.subarray(4, 7));
    return {
        tmsi: data.subarray(0, 4).toString('hex'),
        lai: plmn ? `${plmn.mcc}-${plmn.mnc}` : null,
        lac: data.readUInt16BE(7),
        update_status: UPDATE_STATUS[(data[10] ?? 0) & 0x07] ?? 'reserved',
    };
}

/**
 * Service tables with one bit per service (UST, IST, EST)
 */
function decodeServiceTable(data: Buffer): DecodedContent {
    const services: number[] = [];
    data.forEach((byte, index) => {
        for (let bit = 0; bit < 8; bit++) {
            if ((byte >> bit) & 1) {
                services.push(index * 8 + bit + 1);
            }
        }
    });
    return { services };
}

/**
 * GSM SIM service table: two bits (allocated, activated) per service
 */
function decodeSimServiceTable(data: Buffer): DecodedContent {
    const services: number[] = [];
    data.forEach((byte, index) => {
        for (let pair = 0; pair < 4; pair++) {
            const bits = (byte >> (pair * 2)) & 0x03;
            if (bits === 0x03) {
                services.push(index * 4 + pair + 1);
            }
        }
    });
    return { services };
}

const TON = ['unknown', 'international', 'national', 'network_specific', 'dedicated_access'];

/**
 * Dialling number records (EF.ADN, EF.MSISDN, EF.FDN, EF.SDN)
 */
function decodeDiallingNumber(data: Buffer): DecodedContent {
    if (data.length < 14) {
        return { raw: data.toString('hex') };
    }
    const alphaLength = data.length - 14;
    const numberData = data.subarray(alphaLength);
    const bcdLength = numberData[0] ?? 0xff;
    if (bcdLength === 0xff) {
        return { alpha_id: decodePaddedText(data.subarray(0, alphaLength)), number: null };
    }
    const tonNpi = numberData[1] ?? 0xff;
    const number = decodeSwappedBcd(numberData.subarray(2, 1 + Math.min(bcdLength, 11)));
    return {
        alpha_id: decodePaddedText(data.subarray(0, alphaLength)),
        ton: TON[(tonNpi >> 4) & 0x07] ?? 'reserved',
        number: ((tonNpi >> 4) & 0x07) === 1 ? `+${number}` : number,
    };
}

/**
 * EF.DIR application template records
 */
function decodeApplicationTemplate(data: Buffer): DecodedContent {
    if (data[0] === 0xff) {
        return { empty: true };
    }
    const aid = findTagInBuffer(data, 0x4f);
    const label = findTagInBuffer(data, 0x50);
    return {
        aid: aid ? aid.toString('hex') : null,
        label: label ? label.toString('utf8') : null,
    };
}

function decodeLanguages(data: Buffer): DecodedContent {
    const languages: string[] = [];
    for (let i = 0; i + 2 <= data.length; i += 2) {
        if (data[i] === 0xff) continue;
        languages.push(data.subarray(i, i + 2).toString('latin1'));
    }
    return { languages };
}

function decodeAccessControlClass(data: Buffer): DecodedContent {
    const value = data.length >= 2 ? data.readUInt16BE(0) : 0;
    const classes: number[] = [];
    for (let bit = 0; bit < 16; bit++) {
        if ((value >> bit) & 1) {
            classes.push(bit);
        }
    }
    return { classes };
}

function decodePhase(data: Buffer): DecodedContent {
    const phase = data[0];
    const names = new Map([
        [0x00, 'phase_1'],
        [0x02, 'phase_2'],
        [0x03, 'phase_2_plus'],
    ]);
    return { phase: phase === undefined ? null : (names.get(phase) ?? `unknown_${String(phase)}`) };
}

function decodeImpi(data: Buffer): DecodedContent {
    const value = findTagInBuffer(data, 0x80);
    return { nai: value ? value.toString('utf8') : null };
}

/**
 * Decoders referenced by name from the card profile
 */
export const FILE_DECODERS: ReadonlyMap<string, ContentDecoder> = new Map<string, ContentDecoder>([
    ['iccid', decodeIccid],
    ['imsi', decodeImsi],
    ['spn', decodeSpn],
    ['plmn-list', decodePlmnList],
    ['plmn-act-list', decodePlmnAccessTechList],
    ['administrative-data', decodeAdministrativeData],
    ['location-info', decodeLocationInfo],
    ['service-table', decodeServiceTable],
    ['sim-service-table', decodeSimServiceTable],
    ['dialling-number', decodeDiallingNumber],
    ['application-template', decodeApplicationTemplate],
    ['languages', decodeLanguages],
    ['access-control-class', decodeAccessControlClass],
    ['phase', decodePhase],
    ['nai', decodeImpi],
]);

export function isKnownDecoder(name: string): boolean {
    return FILE_DECODERS.has(name);
}

/**
 * Decode file content with the named decoder
 */
export function decodeContent(decoder: string, data: Buffer): DecodedContent {
    const fn = FILE_DECODERS.get(decoder);
    if (!fn) {
        return { raw: data.toString('hex') };
    }
    return fn(data);
}
