import { readFile } from 'node:fs/promises';
import { errorMessage, SourceError } from '../errors.js';
import type { ApduCaseResolver, ApduSource, LogFn, SourceEvent } from '../types.js';
import { decodeGsmtapPacket, GSMTAP_PORT } from './gsmtap.js';

const MAGIC_MICROS = 0xa1b2c3d4;
const MAGIC_NANOS = 0xa1b23c4d;

export const LinkType = {
    NULL: 0,
    ETHERNET: 1,
    RAW: 101,
    LINUX_SLL: 113,
    IPV4: 228,
} as const;

const ETHERTYPE_IPV4 = 0x0800;
const ETHERTYPE_VLAN = 0x8100;
const IPPROTO_UDP = 17;

export interface PcapHeader {
    littleEndian: boolean;
    nanoseconds: boolean;
    linkType: number;
}

/**
 * Parse the 24-byte global header of a classic pcap file
 */
export function parsePcapHeader(file: Buffer): PcapHeader {
    if (file.length < 24) {
        throw new SourceError('Not a pcap file: shorter than its global header');
    }
    const be = file.readUInt32BE(0);
    const le = file.readUInt32LE(0);
    let littleEndian: boolean;
    let nanoseconds: boolean;
    if (be === MAGIC_MICROS || be === MAGIC_NANOS) {
        littleEndian = false;
        nanoseconds = be === MAGIC_NANOS;
    } else if (le === MAGIC_MICROS || le === MAGIC_NANOS) {
        littleEndian = true;
        nanoseconds = le === MAGIC_NANOS;
    } else {
        throw new SourceError(`Not a pcap file: unknown magic ${be.toString(16)}`);
    }
    const linkType = littleEndian ? file.readUInt32LE(20) : file.readUInt32BE(20);
    return { littleEndian, nanoseconds, linkType };
}

/**
 * IPv4 packet of a captured frame, or undefined when the frame carries something else
 */
export function ipv4Payload(frame: Buffer, linkType: number, littleEndian: boolean): Buffer | undefined {
    switch (linkType) {
        case LinkType.NULL: {
            if (frame.length < 4) return undefined;
            // address family, in the byte order of the capturing host
            const family = littleEndian ? frame.readUInt32LE(0) : frame.readUInt32BE(0);
            return family === 2 ? frame.subarray(4) : undefined;
        }
        case LinkType.ETHERNET: {
            if (frame.length < 14) return undefined;
            let offset = 12;
            let etherType = frame.readUInt16BE(offset);
            while (etherType === ETHERTYPE_VLAN && frame.length >= offset + 6) {
                offset += 4;
                etherType = frame.readUInt16BE(offset);
            }
            return etherType === ETHERTYPE_IPV4 ? frame.subarray(offset + 2) : undefined;
        }
        case LinkType.LINUX_SLL:
            if (frame.length < 16) return undefined;
            return frame.readUInt16BE(14) === ETHERTYPE_IPV4 ? frame.subarray(16) : undefined;
        case LinkType.RAW:
        case LinkType.IPV4:
            return frame;
        default:
            return undefined;
    }
}

/**
 * UDP payload sent to `port`, or undefined for anything else (including fragments)
 */
export function udpPayload(packet: Buffer, port: number): Buffer | undefined {
    if (packet.length < 20 || (packet[0] ?? 0) >> 4 !== 4) {
        return undefined;
    }
    const ihl = ((packet[0] ?? 0) & 0x0f) * 4;
    const totalLength = Math.min(packet.readUInt16BE(2), packet.length);
    const fragment = packet.readUInt16BE(6);
    if (packet[9] !== IPPROTO_UDP || (fragment & 0x3fff) !== 0 || totalLength < ihl + 8) {
        return undefined;
    }
    const udp = packet.subarray(ihl, totalLength);
    if (udp.readUInt16BE(2) !== port) {
        return undefined;
    }
    const udpLength = Math.min(udp.readUInt16BE(4), udp.length);
    return udp.subarray(8, udpLength);
}

export interface PcapSourceOptions {
    port?: number | undefined;
    log?: LogFn | undefined;
}

/**
 * Replays GSMTAP-SIM packets from a classic libpcap capture file
 */
export class PcapSource implements ApduSource {
    readonly name: string;
    private readonly path: string;
    private readonly apduCase: ApduCaseResolver;
    private readonly port: number;
    private readonly log: LogFn | undefined;
    private file: Buffer | undefined;
    private header: PcapHeader | undefined;
    private offset = 24;
    private packetNo = 0;
    private closed = false;

    constructor(path: string, apduCase: ApduCaseResolver, options: PcapSourceOptions = {}) {
        this.name = `gsmtap-pcap ${path}`;
        this.path = path;
        this.apduCase = apduCase;
        this.port = options.port ?? GSMTAP_PORT;
        this.log = options.log;
    }

    private async load(): Promise<{ file: Buffer; header: PcapHeader }> {
        if (this.file === undefined || this.header === undefined) {
            let file: Buffer;
            try {
                file = await readFile(this.path);
            } catch (error: unknown) {
                throw new SourceError(`Cannot read ${this.path}: ${errorMessage(error)}`, { cause: error });
            }
            this.header = parsePcapHeader(file);
            this.file = file;
        }
        return { file: this.file, header: this.header };
    }

    private nextFrame(file: Buffer, header: PcapHeader): Buffer | undefined {
        if (this.offset + 16 > file.length) {
            return undefined;
        }
        const capturedLength = header.littleEndian
            ? file.readUInt32LE(this.offset + 8)
            : file.readUInt32BE(this.offset + 8);
        const start = this.offset + 16;
        if (start + capturedLength > file.length) {
            this.log?.(`${this.path}: truncated packet ${String(this.packetNo + 1)}, stopping`);
            this.offset = file.length;
            return undefined;
        }
        this.offset = start + capturedLength;
        this.packetNo += 1;
        return file.subarray(start, start + capturedLength);
    }

    async read(): Promise<SourceEvent> {
        if (this.closed) {
            return { type: 'end' };
        }
        const { file, header } = await this.load();
        for (let frame = this.nextFrame(file, header); frame; frame = this.nextFrame(file, header)) {
            const ip = ipv4Payload(frame, header.linkType, header.littleEndian);
            const payload = ip ? udpPayload(ip, this.port) : undefined;
            if (!payload) {
                continue;
            }
            try {
                const event = decodeGsmtapPacket(payload, this.apduCase);
                if (event) {
                    return event;
                }
            } catch (error: unknown) {
                this.log?.(`${this.path}: skipping packet ${String(this.packetNo)}: ${errorMessage(error)}`);
            }
        }
        return { type: 'end' };
    }

    close(): Promise<void> {
        this.closed = true;
        return Promise.resolve();
    }
}
