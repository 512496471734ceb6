import { ApduCommand, describe, type CommandFields } from '../apdu-command.js';
import type { CardEF } from '../card-profile.js';
import { decodeContent, type DecodedContent } from '../file-decoders.js';
import type { RuntimeLchan, SelectResult } from '../runtime-state.js';

/**
 * Decode file content with the EF's decoder, or fall back to hex
 */
export function decodeFileData(ef: CardEF, data: Buffer): DecodedContent | string {
    if (ef.decoder === undefined) {
        return data.toString('hex');
    }
    return decodeContent(ef.decoder, data);
}

function renderContent(content: DecodedContent | string): string {
    return typeof content === 'string' ? content : describe(content);
}

/**
 * Shared addressing for READ/UPDATE BINARY: P1 b8 set means P1 b5-b1 is an SFI and P2 the offset
 */
abstract class BinaryCommand extends ApduCommand {
    protected get sfid(): number | undefined {
        return (this.p1 & 0x80) !== 0 ? this.p1 & 0x1f : undefined;
    }

    protected get offset(): number {
        return this.sfid !== undefined ? this.p2 : ((this.p1 & 0x7f) << 8) | this.p2;
    }

    protected override decodeFields(): CommandFields {
        const fields: CommandFields = { offset: this.offset };
        if (this.sfid !== undefined) {
            fields.sfi = this.sfid;
        }
        return fields;
    }

    /**
     * Resolve the target EF, selecting it implicitly when addressed by SFI
     */
    protected targetEf(lchan: RuntimeLchan): { ef: CardEF } | { error: string } {
        if (this.sfid !== undefined && this.successful) {
            const result: SelectResult = lchan.selectSfid(this.sfid);
            if (!result.ok) {
                return { error: `${this.name} failed: ${result.reason}` };
            }
        }
        const ef = lchan.selectedEf;
        if (!ef) {
            return { error: `${this.name} failed: no EF selected (${lchan.selectedFile.fullyQualifiedPathStr()})` };
        }
        return { ef };
    }
}

export class ReadBinary extends BinaryCommand {
    protected override decodeFields(): CommandFields {
        return { ...super.decodeFields(), length: this.exchange.le ?? this.responseData.length };
    }

    protected override processOnLchan(lchan: RuntimeLchan): string {
        const target = this.targetEf(lchan);
        if ('error' in target) {
            return target.error;
        }
        const prefix = `offset=${String(this.offset)} len=${String(this.responseData.length)}`;
        if (!this.successful || this.responseData.length === 0) {
            return prefix;
        }
        if (this.offset !== 0) {
            return `${prefix} ${this.responseData.toString('hex')}`;
        }
        return `${prefix} ${renderContent(decodeFileData(target.ef, this.responseData))}`;
    }
}

export class UpdateBinary extends BinaryCommand {
    protected override decodeFields(): CommandFields {
        return { ...super.decodeFields(), data: this.data.toString('hex') };
    }

    protected override processOnLchan(lchan: RuntimeLchan): string {
        const target = this.targetEf(lchan);
        if ('error' in target) {
            return target.error;
        }
        const prefix = `offset=${String(this.offset)} len=${String(this.data.length)}`;
        if (this.offset !== 0) {
            return `${prefix} ${this.data.toString('hex')}`;
        }
        return `${prefix} ${renderContent(decodeFileData(target.ef, this.data))}`;
    }
}

const RECORD_MODES = new Map<number, string>([
    [0x02, 'next'],
    [0x03, 'previous'],
    [0x04, 'absolute'],
]);

/**
 * Shared addressing for record commands: P1 record number, P2 = SFI << 3 | mode
 */
abstract class RecordCommand extends ApduCommand {
    protected get sfid(): number | undefined {
        const sfid = this.p2 >> 3;
        return sfid === 0 ? undefined : sfid;
    }

    protected get mode(): string {
        return RECORD_MODES.get(this.p2 & 0x07) ?? `mode_${String(this.p2 & 0x07)}`;
    }

    protected override decodeFields(): CommandFields {
        const fields: CommandFields = { record: this.p1, mode: this.mode };
        if (this.sfid !== undefined) {
            fields.sfi = this.sfid;
        }
        return fields;
    }

    protected targetEf(lchan: RuntimeLchan): { ef: CardEF } | { error: string } {
        if (this.sfid !== undefined && this.successful) {
            const result = lchan.selectSfid(this.sfid);
            if (!result.ok) {
                return { error: `${this.name} failed: ${result.reason}` };
            }
        }
        const ef = lchan.selectedEf;
        if (!ef) {
            return { error: `${this.name} failed: no EF selected (${lchan.selectedFile.fullyQualifiedPathStr()})` };
        }
        return { ef };
    }

    /**
     * Record number the command addresses, tracking the channel's current record
     */
    protected resolveRecord(lchan: RuntimeLchan): number | undefined {
        const current = lchan.currentRecord;
        let record: number | undefined;
        switch (this.p2 & 0x07) {
            case 0x02:
                record = (current ?? 0) + 1;
                break;
            case 0x03:
                record = current !== undefined && current > 1 ? current - 1 : undefined;
                break;
            case 0x04:
                record = this.p1 === 0 ? current : this.p1;
                break;
            default:
                record = this.p1 || undefined;
        }
        if (this.successful && record !== undefined) {
            lchan.currentRecord = record;
        }
        return record;
    }
}

export class ReadRecord extends RecordCommand {
    protected override processOnLchan(lchan: RuntimeLchan): string {
        const target = this.targetEf(lchan);
        if ('error' in target) {
            return target.error;
        }
        const record = this.resolveRecord(lchan);
        const prefix = `record=${record === undefined ? '?' : String(record)}`;
        if (!this.successful || this.responseData.length === 0) {
            return prefix;
        }
        return `${prefix} ${renderContent(decodeFileData(target.ef, this.responseData))}`;
    }
}

export class UpdateRecord extends RecordCommand {
    protected override decodeFields(): CommandFields {
        return { ...super.decodeFields(), data: this.data.toString('hex') };
    }

    protected override processOnLchan(lchan: RuntimeLchan): string {
        const target = this.targetEf(lchan);
        if ('error' in target) {
            return target.error;
        }
        const record = this.resolveRecord(lchan);
        const prefix = `record=${record === undefined ? '?' : String(record)}`;
        return `${prefix} ${renderContent(decodeFileData(target.ef, this.data))}`;
    }
}

/**
 * SEARCH RECORD (UICC) / SEEK (SIM): the response lists matching record numbers
 */
export class SearchRecord extends RecordCommand {
    protected override decodeFields(): CommandFields {
        return { ...super.decodeFields(), pattern: this.data.toString('hex') };
    }

    protected override processOnLchan(lchan: RuntimeLchan): string {
        const target = this.targetEf(lchan);
        if ('error' in target) {
            return target.error;
        }
        const matches = [...this.responseData];
        return `pattern=${this.data.toString('hex')} in ${target.ef.name} matches=${describe(matches)}`;
    }
}

export class Increase extends ApduCommand {
    protected override processOnLchan(lchan: RuntimeLchan): string {
        const ef = lchan.selectedEf;
        if (!ef) {
            return `${this.name} failed: no EF selected`;
        }
        const added = this.data.length > 0 ? this.data.readUIntBE(0, Math.min(this.data.length, 6)) : 0;
        const parts = [`add=${String(added)}`];
        const half = this.responseData.length / 2;
        if (this.responseData.length > 0 && Number.isInteger(half) && half <= 6) {
            parts.push(`new_value=${String(this.responseData.readUIntBE(0, half))}`);
        }
        return parts.join(' ');
    }
}

/**
 * ACTIVATE / DEACTIVATE FILE (REHABILITATE / INVALIDATE on GSM SIMs).
 * With data the command addresses a file by FID and selects it.
 */
export class FileLifecycleCommand extends ApduCommand {
    protected override processOnLchan(lchan: RuntimeLchan): string {
        if (this.data.length === 2 && this.successful) {
            const result = lchan.selectFid(this.data.toString('hex'));
            if (!result.ok) {
                return `${this.name} failed: ${result.reason}`;
            }
        }
        return lchan.selectedFile.name;
    }
}
