import { parse, type Tlv } from '@tomkp/ber-tlv';
import { hexByte } from './apdu.js';

/**
 * Convert tag bytes to a single number for comparison
 */
export function tagBytesToNumber(bytes: Uint8Array): number {
    let result = 0;
    for (const byte of bytes) {
        result = (result << 8) | byte;
    }
    return result;
}

/**
 * Tag number of a parsed TLV
 */
export function tlvTag(data: Tlv): number {
    return data.tag.bytes ? tagBytesToNumber(data.tag.bytes) : data.tag.number;
}

/**
 * Tags used in File Control Parameters (ETSI TS 102 221, 11.1.1.3)
 */
export const FCP_TAGS = {
    '62': 'FCP_TEMPLATE',
    '80': 'FILE_SIZE',
    '81': 'TOTAL_FILE_SIZE',
    '82': 'FILE_DESCRIPTOR',
    '83': 'FILE_IDENTIFIER',
    '84': 'DF_NAME',
    '88': 'SHORT_FILE_ID',
    '8A': 'LIFE_CYCLE_STATUS',
    '8B': 'SECURITY_ATTR_REFERENCED',
    '8C': 'SECURITY_ATTR_COMPACT',
    A5: 'PROPRIETARY_INFO',
    AB: 'SECURITY_ATTR_EXPANDED',
    C6: 'PIN_STATUS_TEMPLATE',
} as const;

/**
 * Get the human-readable name for an FCP tag
 */
export function getTagName(tag: number): string {
    const tagHex = tag.toString(16).toUpperCase();
    if (tagHex in FCP_TAGS) {
        return FCP_TAGS[tagHex as keyof typeof FCP_TAGS];
    }
    return `UNKNOWN_${tagHex}`;
}

export type FileType = 'working_ef' | 'internal_ef' | 'df';

export type EfStructure = 'transparent' | 'linear_fixed' | 'cyclic' | 'ber_tlv';

export interface FileDescriptor {
    shareable: boolean;
    fileType: FileType | 'unknown';
    structure?: EfStructure | undefined;
    recordLength?: number | undefined;
    numberOfRecords?: number | undefined;
}

export interface PinStatus {
    keyReference: number;
    enabled: boolean;
}

/**
 * Decoded File Control Parameters
 */
export interface Fcp {
    fileDescriptor?: FileDescriptor;
    fileId?: string;
    dfName?: string;
    shortFileId?: number;
    lifeCycleStatus?: string;
    fileSize?: number;
    totalFileSize?: number;
    securityAttributes?: string;
    pinStatus?: PinStatus[];
    proprietary?: string;
}

function decodeFileDescriptor(value: Buffer): FileDescriptor {
    const fdb = value[0] ?? 0;
    const typeBits = (fdb >> 3) & 0x07;
    const fileType: FileDescriptor['fileType'] =
        typeBits === 0 ? 'working_ef' : typeBits === 1 ? 'internal_ef' : typeBits === 7 ? 'df' : 'unknown';

    const descriptor: FileDescriptor = { shareable: (fdb & 0x40) !== 0, fileType };
    if (fileType === 'df') {
        return descriptor;
    }

    if (fdb === 0x39) {
        descriptor.structure = 'ber_tlv';
    } else {
        switch (fdb & 0x07) {
            case 1:
                descriptor.structure = 'transparent';
                break;
            case 2:
                descriptor.structure = 'linear_fixed';
                break;
            case 6:
                descriptor.structure = 'cyclic';
                break;
        }
    }
    if (value.length >= 5) {
        descriptor.recordLength = value.readUInt16BE(2);
        descriptor.numberOfRecords = value[4];
    }
    return descriptor;
}

/**
 * Life cycle status integer (ISO 7816-4, 5.3.3.2)
 */
export function decodeLifeCycleStatus(lcsi: number): string {
    if (lcsi === 0x00) return 'no_information';
    if (lcsi === 0x01) return 'creation';
    if (lcsi === 0x03) return 'initialization';
    if ((lcsi & 0xfd) === 0x05) return 'operational_activated';
    if ((lcsi & 0xfd) === 0x04) return 'operational_deactivated';
    if ((lcsi & 0xfc) === 0x0c) return 'termination';
    return `proprietary_${hexByte(lcsi)}`;
}

function decodePinStatus(value: Buffer): PinStatus[] {
    const statuses: PinStatus[] = [];
    let psDo = 0;
    let psBits = 0;
    let index = 0;
    for (const tlv of parse(value)) {
        const tag = tlvTag(tlv);
        const bytes = Buffer.from(tlv.value);
        if (tag === 0x90) {
            psDo = bytes.length > 0 ? bytes.readUIntBE(0, Math.min(bytes.length, 4)) : 0;
            psBits = Math.min(bytes.length, 4) * 8;
        } else if (tag === 0x83) {
            const enabled = index < psBits && ((psDo >> (psBits - 1 - index)) & 1) === 1;
            statuses.push({ keyReference: bytes[0] ?? 0, enabled });
            index += 1;
        }
    }
    return statuses;
}

function collectFcp(fcp: Fcp, tlv: Tlv): void {
    const tag = tlvTag(tlv);
    const value = Buffer.from(tlv.value);
    switch (tag) {
        case 0x62:
            for (const child of tlv.children ?? []) {
                collectFcp(fcp, child);
            }
            break;
        case 0x82:
            fcp.fileDescriptor = decodeFileDescriptor(value);
            break;
        case 0x83:
            fcp.fileId = value.toString('hex').toUpperCase();
            break;
        case 0x84:
            fcp.dfName = value.toString('hex');
            break;
        case 0x88:
            if (value.length > 0) {
                fcp.shortFileId = (value[0] ?? 0) >> 3;
            }
            break;
        case 0x8a:
            fcp.lifeCycleStatus = decodeLifeCycleStatus(value[0] ?? 0);
            break;
        case 0x80:
            fcp.fileSize = value.length > 0 ? value.readUIntBE(0, Math.min(value.length, 6)) : 0;
            break;
        case 0x81:
            fcp.totalFileSize = value.length > 0 ? value.readUIntBE(0, Math.min(value.length, 6)) : 0;
            break;
        case 0x8b:
        case 0x8c:
        case 0xab:
            fcp.securityAttributes = `${getTagName(tag)}:${value.toString('hex')}`;
            break;
        case 0xc6:
            fcp.pinStatus = decodePinStatus(value);
            break;
        case 0xa5:
            fcp.proprietary = value.toString('hex');
            break;
    }
}

/**
 * Decode an FCP template as returned by SELECT or STATUS
 */
export function decodeFcp(buffer: Buffer): Fcp {
    const fcp: Fcp = {};
    for (const tlv of parse(buffer)) {
        collectFcp(fcp, tlv);
    }
    return fcp;
}

/**
 * Response to a GSM SIM SELECT / STATUS (TS 51.011, 9.2.1)
 */
export interface SimSelectResponse {
    fileId: string;
    fileType: 'mf' | 'df' | 'ef' | 'unknown';
    fileSize?: number;
    structure?: EfStructure;
    recordLength?: number;
    numberOfChvs?: number;
}

/**
 * Decode the fixed-layout response of a GSM SIM SELECT
 */
export function decodeSimSelectResponse(buffer: Buffer): SimSelectResponse {
    if (buffer.length < 14) {
        throw new RangeError(`SIM select response too short (${String(buffer.length)} bytes)`);
    }
    const typeByte = buffer[6];
    const fileType = typeByte === 0x01 ? 'mf' : typeByte === 0x02 ? 'df' : typeByte === 0x04 ? 'ef' : 'unknown';
    const result: SimSelectResponse = {
        fileId: buffer.subarray(4, 6).toString('hex').toUpperCase(),
        fileType,
    };

    if (fileType === 'ef') {
        result.fileSize = buffer.readUInt16BE(2);
        const structure = buffer[13];
        if (structure === 0x00) result.structure = 'transparent';
        if (structure === 0x01) result.structure = 'linear_fixed';
        if (structure === 0x03) result.structure = 'cyclic';
        if (buffer.length >= 15) {
            result.recordLength = buffer[14] ?? 0;
        }
    } else if (buffer.length >= 17) {
        result.numberOfChvs = buffer[16] ?? 0;
    }
    return result;
}

function findInTlv(data: Tlv, tag: number): Buffer | undefined {
    if (tlvTag(data) === tag) {
        return Buffer.from(data.value);
    }

    if (data.children) {
        for (const child of data.children) {
            const result = findInTlv(child, tag);
            if (result !== undefined) {
                return result;
            }
        }
    }

    return undefined;
}

/**
 * Find a specific tag in a Buffer containing TLV data
 * @param buffer - The buffer to search
 * @param tag - The tag number to find (e.g., 0x84 for DF_NAME)
 * @returns The tag value as a Buffer, or undefined if not found
 */
export function findTagInBuffer(buffer: Buffer, tag: number): Buffer | undefined {
    const parsed = parse(buffer);
    for (const tlv of parsed) {
        const result = findInTlv(tlv, tag);
        if (result !== undefined) {
            return result;
        }
    }
    return undefined;
}
