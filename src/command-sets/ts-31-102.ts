import { defineCommand, describe, type CommandDescriptor, type CommandFields } from '../apdu-command.js';
import { hexByte } from '../apdu.js';
import type { RuntimeLchan } from '../runtime-state.js';
import { Authenticate } from './ts-102-221.js';

// USIM commands (3GPP TS 31.102, clause 7)

/**
 * Split a sequence of length-prefixed values
 */
export function splitLv(data: Buffer): Buffer[] {
    const values: Buffer[] = [];
    let offset = 0;
    while (offset < data.length) {
        const length = data[offset] ?? 0;
        if (offset + 1 + length > data.length) {
            throw new RangeError(`LV of ${String(length)} bytes at offset ${String(offset)} exceeds the data`);
        }
        values.push(data.subarray(offset + 1, offset + 1 + length));
        offset += 1 + length;
    }
    return values;
}

const CONTEXTS = new Map<number, string>([
    [0x80, 'gsm'],
    [0x81, '3g'],
    [0x82, 'vgcs_vbs'],
    [0x84, 'gba'],
    [0x85, 'mbms'],
]);

/**
 * AUTHENTICATE in GSM or 3G security context (7.1.2)
 */
export class UsimAuthenticate extends Authenticate {
    protected override decodeFields(): CommandFields {
        const context = CONTEXTS.get(this.p2) ?? `context_${hexByte(this.p2)}`;
        const fields: CommandFields = { context };
        if (context === 'gsm') {
            const [rand] = splitLv(this.data);
            fields.rand = rand;
            const [sres, kc] = splitLv(this.responseData);
            if (sres) fields.sres = sres;
            if (kc) fields.kc = kc;
        } else if (context === '3g') {
            const [rand, autn] = splitLv(this.data);
            fields.rand = rand;
            fields.autn = autn;
            Object.assign(fields, this.decode3gResponse());
        } else {
            fields.data = this.data.toString('hex');
        }
        return fields;
    }

    private decode3gResponse(): CommandFields {
        const tag = this.responseData[0];
        const body = this.responseData.subarray(1);
        if (tag === 0xdb) {
            const [res, ck, ik, kc] = splitLv(body);
            const result: CommandFields = { outcome: 'successful', res, ck, ik };
            if (kc) result.kc = kc;
            return result;
        }
        if (tag === 0xdc) {
            const [auts] = splitLv(body);
            return { outcome: 'sync_failure', auts };
        }
        return {};
    }

    protected override processOnLchan(lchan: RuntimeLchan): string {
        const app = lchan.selectedAdf?.name ?? 'no application';
        return `${app} ${describe(this.fields)}`;
    }
}

export const USIM_COMMANDS: readonly CommandDescriptor[] = [
    defineCommand('AUTHENTICATE', 0x88, ['0X', '4X', '6X'], 4, UsimAuthenticate),
];
