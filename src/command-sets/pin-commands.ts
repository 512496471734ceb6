import { ApduCommand, type CommandFields } from '../apdu-command.js';
import { hexByte } from '../apdu.js';

/**
 * Name of a PIN key reference (TS 102 221, 9.5.1)
 */
export function keyReferenceName(ref: number): string {
    if (ref >= 0x01 && ref <= 0x08) return `PIN${String(ref)}`;
    if (ref === 0x11) return 'UNIVERSAL_PIN';
    if (ref >= 0x81 && ref <= 0x88) return `SECOND_PIN${String(ref - 0x80)}`;
    if (ref >= 0x0a && ref <= 0x0e) return `ADM${String(ref - 0x09)}`;
    if (ref >= 0x8a && ref <= 0x8e) return `ADM${String(ref - 0x84)}`;
    return `KEY_${hexByte(ref)}`;
}

/**
 * VERIFY / CHANGE / DISABLE / ENABLE / UNBLOCK PIN and their CHV forms.
 * PIN values are never rendered.
 */
export class PinCommand extends ApduCommand {
    protected get keyReference(): string {
        return keyReferenceName(this.p2);
    }

    protected override decodeFields(): CommandFields {
        return { key_reference: this.keyReference, data_length: this.data.length };
    }

    protected override processOnLchan(): string {
        // an empty VERIFY queries the retry counter (answered with 63Cx)
        if (this.data.length === 0) {
            return `${this.keyReference} retry counter query`;
        }
        return this.keyReference;
    }
}

/**
 * The GSM SIM numbers its secrets CHV1 and CHV2
 */
export class ChvCommand extends PinCommand {
    protected override get keyReference(): string {
        return this.p2 === 0x01 || this.p2 === 0x02 ? `CHV${String(this.p2)}` : keyReferenceName(this.p2);
    }
}
