import { ApduCommand, defineCommand, describe, type CommandDescriptor, type CommandFields } from '../apdu-command.js';
import { hexByte } from '../apdu.js';
import { errorMessage } from '../errors.js';
import { decodeFcp, decodeSimSelectResponse, findTagInBuffer, type Fcp } from '../fcp-tags.js';
import type { PendingResponse, RuntimeLchan, RuntimeState, SelectResult } from '../runtime-state.js';
import { Envelope, Fetch, TerminalProfile, TerminalResponse } from './cat-commands.js';
import {
    FileLifecycleCommand,
    Increase,
    ReadBinary,
    ReadRecord,
    SearchRecord,
    UpdateBinary,
    UpdateRecord,
} from './file-commands.js';
import { PinCommand } from './pin-commands.js';

// UICC commands (ETSI TS 102 221, clause 10/11)

const ISO_CLA = ['0X', '4X', '6X'] as const;
const PROPRIETARY_CLA = ['8X', 'CX', 'EX'] as const;

/**
 * Decode an FCP template, keeping the raw bytes when it cannot be parsed
 */
export function tryDecodeFcp(data: Buffer): { fcp: Fcp } | { error: string } {
    try {
        return { fcp: decodeFcp(data) };
    } catch (error: unknown) {
        return { error: `undecodable FCP ${data.toString('hex')} (${errorMessage(error)})` };
    }
}

const SELECT_MODES = new Map<number, string>([
    [0x00, 'fid'],
    [0x01, 'child_df'],
    [0x03, 'parent_df'],
    [0x04, 'df_name'],
    [0x08, 'path_from_mf'],
    [0x09, 'path_from_current_df'],
]);

function splitPath(data: Buffer): string[] {
    const path: string[] = [];
    for (let i = 0; i + 2 <= data.length; i += 2) {
        path.push(data.subarray(i, i + 2).toString('hex').toUpperCase());
    }
    return path;
}

/**
 * SELECT FILE (11.1.1)
 */
export class UiccSelect extends ApduCommand {
    protected override decodeFields(): CommandFields {
        const mode = SELECT_MODES.get(this.p1) ?? `unknown_${hexByte(this.p1)}`;
        const fields: CommandFields = { mode };
        if (this.p1 === 0x04) {
            fields.aid = this.data.toString('hex');
        } else if (this.p1 === 0x08 || this.p1 === 0x09) {
            fields.path = splitPath(this.data);
        } else if (this.data.length > 0) {
            fields.fid = this.data.toString('hex').toUpperCase();
        }
        return fields;
    }

    private get target(): string {
        const { aid, path, fid } = this.fields;
        if (typeof aid === 'string') return aid;
        if (Array.isArray(path)) return path.join('/');
        if (typeof fid === 'string') return fid;
        return this.p1 === 0x03 ? 'parent' : '3F00';
    }

    private select(lchan: RuntimeLchan): SelectResult {
        switch (this.p1) {
            case 0x00:
                return lchan.selectFid(this.data.length === 0 ? '3F00' : this.data.toString('hex'));
            case 0x01:
                return lchan.selectChild(this.data.toString('hex'), 'df');
            case 0x03:
                return lchan.selectParent();
            case 0x04:
                return lchan.selectAid(this.data.toString('hex'));
            case 0x08:
                return lchan.selectPath(splitPath(this.data), true);
            case 0x09:
                return lchan.selectPath(splitPath(this.data), false);
            default:
                return { ok: false, reason: `unsupported selection mode P1=${hexByte(this.p1)}` };
        }
    }

    protected override processOnLchan(lchan: RuntimeLchan): string {
        if (!this.successful) {
            return this.target;
        }
        // P1=04 with P2 b7 set: termination of the application session
        if (this.p1 === 0x04 && (this.p2 & 0x40) !== 0) {
            const adf = lchan.selectedAdf;
            lchan.reset();
            return `terminate ${adf?.name ?? this.target}`;
        }

        const result = this.select(lchan);
        if (!result.ok) {
            return `SELECT failed: ${result.reason}`;
        }
        if (this.responseData.length === 0) {
            return result.file.name;
        }
        const decoded = tryDecodeFcp(this.responseData);
        if ('error' in decoded) {
            return `${result.file.name} ${decoded.error}`;
        }
        lchan.selectedFcp = decoded.fcp;
        return `${result.file.name} ${describe(decoded.fcp)}`;
    }

    protected override pendingResponse(lchan: RuntimeLchan): PendingResponse {
        return { command: this.name, format: 'fcp', file: lchan.selectedFile };
    }
}

/**
 * STATUS (11.1.2): reports the current selection, never moves it
 */
export class UiccStatus extends ApduCommand {
    protected override decodeFields(): CommandFields {
        const indication = ['none', 'application_initialized', 'application_termination'][this.p1] ?? hexByte(this.p1);
        const response = this.p2 === 0x00 ? 'fcp' : this.p2 === 0x01 ? 'df_name' : 'none';
        return { indication, response };
    }

    protected override processOnLchan(lchan: RuntimeLchan): string {
        const path = lchan.selectedFile.fullyQualifiedPathStr();
        if (this.responseData.length === 0) {
            return path;
        }
        if (this.p2 === 0x01) {
            const dfName = findTagInBuffer(this.responseData, 0x84);
            const aid = dfName?.toString('hex') ?? this.responseData.toString('hex');
            const app = lchan.selectedAdf;
            return `${path} df_name=${aid}${app && aid.startsWith(app.aid) ? ' (matches)' : ''}`;
        }
        const decoded = tryDecodeFcp(this.responseData);
        return 'error' in decoded ? `${path} ${decoded.error}` : `${path} ${describe(decoded.fcp)}`;
    }
}

/**
 * MANAGE CHANNEL (11.1.17)
 */
export class ManageChannel extends ApduCommand {
    protected override decodeFields(): CommandFields {
        return { action: this.p1 === 0x80 ? 'close' : 'open', channel: this.p2 };
    }

    protected override processOnLchan(lchan: RuntimeLchan, state: RuntimeState): string {
        if (this.p1 === 0x80) {
            this.idColumn = String(this.p2);
            if (!this.successful) {
                return `close channel ${String(this.p2)}`;
            }
            if (!state.closeChannel(this.p2)) {
                return `close channel ${String(this.p2)} failed: channel not open`;
            }
            return `close channel ${String(this.p2)}`;
        }

        const assigned = this.p2 !== 0 ? this.p2 : this.responseData[0];
        this.idColumn = assigned === undefined ? '?' : String(assigned);
        if (!this.successful) {
            return 'open channel';
        }
        if (assigned === undefined) {
            return 'open channel: no channel number assigned';
        }
        const opened = state.openChannel(assigned, lchan);
        if (!opened) {
            return `open channel ${String(assigned)} failed: already open`;
        }
        return `open channel ${String(assigned)} at ${opened.selectedFile.fullyQualifiedPathStr()}`;
    }
}

/**
 * GET RESPONSE: data left over by the previous command on the same channel
 */
export class GetResponse extends ApduCommand {
    private context: PendingResponse | undefined;

    protected override decodeFields(): CommandFields {
        return { length: this.exchange.le ?? this.responseData.length };
    }

    protected override processOnLchan(lchan: RuntimeLchan): string {
        this.context = lchan.pendingResponse;
        const context = this.context;
        if (!context) {
            return this.responseData.toString('hex');
        }
        const prefix = `${context.command} ${context.file.name}`;
        if (!this.successful || this.responseData.length === 0) {
            return prefix;
        }
        switch (context.format) {
            case 'fcp': {
                const decoded = tryDecodeFcp(this.responseData);
                if ('error' in decoded) {
                    return `${prefix} ${decoded.error}`;
                }
                lchan.selectedFcp = decoded.fcp;
                return `${prefix} ${describe(decoded.fcp)}`;
            }
            case 'sim-select': {
                const response = decodeSimSelectResponse(this.responseData);
                lchan.selectedFcp = response;
                return `${prefix} ${describe(response)}`;
            }
            case 'raw':
                return `${prefix} ${this.responseData.toString('hex')}`;
        }
    }

    protected override pendingResponse(lchan: RuntimeLchan): PendingResponse {
        return this.context ?? super.pendingResponse(lchan);
    }
}

/**
 * AUTHENTICATE without application context; USIM/ISIM override it
 */
export class Authenticate extends ApduCommand {
    protected override decodeFields(): CommandFields {
        return {
            context: hexByte(this.p2),
            challenge: this.data.toString('hex'),
            response: this.responseData.toString('hex'),
        };
    }

    protected override processOnLchan(lchan: RuntimeLchan): string {
        const app = lchan.selectedAdf?.name ?? 'no application';
        return `${app} challenge=${String(this.data.length)}B response=${String(this.responseData.length)}B`;
    }
}

export class GetChallenge extends ApduCommand {
    protected override processOnLchan(): string {
        return this.responseData.length > 0 ? `random=${this.responseData.toString('hex')}` : '';
    }
}

/**
 * SUSPEND UICC (11.1.22)
 */
export class SuspendUicc extends ApduCommand {
    protected override decodeFields(): CommandFields {
        if (this.p1 === 0x01) {
            return { action: 'resume', token: this.data.toString('hex') };
        }
        const fields: CommandFields = { action: 'suspend' };
        if (this.data.length >= 4) {
            fields.min_duration = this.data.subarray(0, 2).toString('hex');
            fields.max_duration = this.data.subarray(2, 4).toString('hex');
        }
        return fields;
    }

    protected override processOnLchan(): string {
        if (this.p1 === 0x00 && this.successful && this.responseData.length > 0) {
            return `suspend, resume token ${this.responseData.toString('hex')}`;
        }
        return describe(this.fields);
    }
}

export const UICC_COMMANDS: readonly CommandDescriptor[] = [
    defineCommand('SELECT', 0xa4, ISO_CLA, 4, UiccSelect, 'select'),
    defineCommand('STATUS', 0xf2, PROPRIETARY_CLA, 2, UiccStatus, 'status'),
    defineCommand('READ BINARY', 0xb0, ISO_CLA, 2, ReadBinary),
    defineCommand('UPDATE BINARY', 0xd6, ISO_CLA, 3, UpdateBinary),
    defineCommand('READ RECORD', 0xb2, ISO_CLA, 2, ReadRecord),
    defineCommand('UPDATE RECORD', 0xdc, ISO_CLA, 3, UpdateRecord),
    defineCommand('SEARCH RECORD', 0xa2, ISO_CLA, 4, SearchRecord),
    defineCommand('INCREASE', 0x32, PROPRIETARY_CLA, 4, Increase),
    defineCommand('RETRIEVE DATA', 0xcb, PROPRIETARY_CLA, 4, ApduCommand),
    defineCommand('SET DATA', 0xdb, PROPRIETARY_CLA, 3, ApduCommand),
    defineCommand('VERIFY PIN', 0x20, ISO_CLA, 3, PinCommand),
    defineCommand('CHANGE PIN', 0x24, ISO_CLA, 3, PinCommand),
    defineCommand('DISABLE PIN', 0x26, ISO_CLA, 3, PinCommand),
    defineCommand('ENABLE PIN', 0x28, ISO_CLA, 3, PinCommand),
    defineCommand('UNBLOCK PIN', 0x2c, ISO_CLA, 3, PinCommand),
    defineCommand('DEACTIVATE FILE', 0x04, ISO_CLA, 3, FileLifecycleCommand),
    defineCommand('ACTIVATE FILE', 0x44, ISO_CLA, 3, FileLifecycleCommand),
    defineCommand('AUTHENTICATE', 0x88, ISO_CLA, 4, Authenticate),
    defineCommand('GET CHALLENGE', 0x84, ISO_CLA, 2, GetChallenge),
    defineCommand('TERMINAL CAPABILITY', 0xaa, PROPRIETARY_CLA, 3, ApduCommand),
    defineCommand('TERMINAL PROFILE', 0x10, PROPRIETARY_CLA, 3, TerminalProfile),
    defineCommand('ENVELOPE', 0xc2, PROPRIETARY_CLA, 4, Envelope),
    defineCommand('FETCH', 0x12, PROPRIETARY_CLA, 2, Fetch),
    defineCommand('TERMINAL RESPONSE', 0x14, PROPRIETARY_CLA, 3, TerminalResponse),
    defineCommand('MANAGE CHANNEL', 0x70, ISO_CLA, 2, ManageChannel),
    defineCommand('MANAGE SECURE CHANNEL', 0x73, ISO_CLA, 4, ApduCommand),
    defineCommand('TRANSACT DATA', 0x75, ISO_CLA, 4, ApduCommand),
    defineCommand('SUSPEND UICC', 0x76, PROPRIETARY_CLA, 4, SuspendUicc),
    defineCommand('GET IDENTITY', 0x78, PROPRIETARY_CLA, 4, ApduCommand),
    defineCommand('GET RESPONSE', 0xc0, ISO_CLA, 2, GetResponse),
];
