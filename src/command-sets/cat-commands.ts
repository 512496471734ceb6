import { parse, type Tlv } from '@tomkp/ber-tlv';
import { ApduCommand, type CommandFields } from '../apdu-command.js';
import { hexByte } from '../apdu.js';
import { readStringTable } from '../data-files.js';
import { tlvTag } from '../fcp-tags.js';

// Card Application Toolkit commands (ETSI TS 102 223)

let proactiveCommands: ReadonlyMap<string, string> | undefined;

/**
 * Name of a proactive command type, e.g. 0x21 → DISPLAY TEXT
 */
export function proactiveCommandName(type: number): string {
    proactiveCommands ??= readStringTable('proactive-commands.json');
    return proactiveCommands.get(hexByte(type)) ?? `UNKNOWN_${hexByte(type)}`;
}

const ENVELOPE_TAGS = new Map<number, string>([
    [0xd1, 'SMS-PP DOWNLOAD'],
    [0xd2, 'CELL BROADCAST DOWNLOAD'],
    [0xd3, 'MENU SELECTION'],
    [0xd4, 'CALL CONTROL'],
    [0xd5, 'MO SHORT MESSAGE CONTROL'],
    [0xd6, 'EVENT DOWNLOAD'],
    [0xd7, 'TIMER EXPIRATION'],
]);

const RESULT_CODES = new Map<number, string>([
    [0x00, 'performed successfully'],
    [0x01, 'performed with partial comprehension'],
    [0x02, 'performed with missing information'],
    [0x04, 'performed, requested icon could not be displayed'],
    [0x10, 'proactive session terminated by the user'],
    [0x11, 'backward move requested by the user'],
    [0x12, 'no response from user'],
    [0x20, 'terminal currently unable to process command'],
    [0x30, 'command beyond terminal capabilities'],
    [0x32, 'command data not understood by terminal'],
]);

/**
 * Find a comprehension TLV, accepting the tag with and without its CR bit
 */
function findComprehension(tlvs: readonly Tlv[], tag: number): Buffer | undefined {
    const found = tlvs.find((tlv) => (tlvTag(tlv) & 0x7f) === tag);
    return found ? Buffer.from(found.value) : undefined;
}

/**
 * Top-level BER-TLV and its children; toolkit objects come wrapped in one template
 */
function unwrap(data: Buffer): { tag: number; children: readonly Tlv[] } | undefined {
    const [outer] = parse(data);
    if (!outer) {
        return undefined;
    }
    const tag = tlvTag(outer);
    return { tag, children: outer.children ?? parse(Buffer.from(outer.value)) };
}

export class TerminalProfile extends ApduCommand {
    protected override decodeFields(): CommandFields {
        return { profile: this.data.toString('hex') };
    }

    protected override processOnLchan(): string {
        return `${String(this.data.length)} byte terminal profile`;
    }
}

export class Envelope extends ApduCommand {
    protected override decodeFields(): CommandFields {
        const template = unwrap(this.data);
        if (!template) {
            return { data: '' };
        }
        return {
            type: ENVELOPE_TAGS.get(template.tag) ?? `UNKNOWN_${hexByte(template.tag)}`,
            objects: template.children.map((tlv) => `${hexByte(tlvTag(tlv))}=${Buffer.from(tlv.value).toString('hex')}`),
        };
    }

    protected override processOnLchan(): string {
        const { type } = this.fields;
        return typeof type === 'string' ? type : 'empty envelope';
    }
}

export class Fetch extends ApduCommand {
    protected override decodeFields(): CommandFields {
        const template = this.responseData.length > 0 ? unwrap(this.responseData) : undefined;
        if (!template || template.tag !== 0xd0) {
            return {};
        }
        const details = findComprehension(template.children, 0x01);
        if (!details || details.length < 3) {
            return { proactive: 'malformed' };
        }
        const [number = 0, type = 0, qualifier = 0] = details;
        return { number, type: proactiveCommandName(type), qualifier: hexByte(qualifier) };
    }

    protected override processOnLchan(): string {
        const { type, qualifier } = this.fields;
        if (typeof type !== 'string') {
            return this.responseData.length > 0 ? this.responseData.toString('hex') : '';
        }
        return `${type} (qualifier=${String(qualifier)})`;
    }
}

export class TerminalResponse extends ApduCommand {
    protected override decodeFields(): CommandFields {
        const tlvs = this.data.length > 0 ? parse(this.data) : [];
        const fields: CommandFields = {};
        const details = findComprehension(tlvs, 0x01);
        if (details && details.length >= 3) {
            fields.type = proactiveCommandName(details[1] ?? 0);
        }
        const result = findComprehension(tlvs, 0x03);
        const general = result?.[0];
        if (general !== undefined) {
            fields.result = RESULT_CODES.get(general) ?? `result_${hexByte(general)}`;
        }
        return fields;
    }

    protected override processOnLchan(): string {
        const { type, result } = this.fields;
        const parts: string[] = [];
        if (typeof type === 'string') parts.push(type);
        if (typeof result === 'string') parts.push(result);
        return parts.join(': ');
    }
}
