import { ApduCommand, defineCommand, describe, type CommandDescriptor, type CommandFields } from '../apdu-command.js';
import { errorMessage } from '../errors.js';
import { decodeSimSelectResponse } from '../fcp-tags.js';
import type { PendingResponse, RuntimeLchan } from '../runtime-state.js';
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
import { ChvCommand } from './pin-commands.js';
import { GetResponse } from './ts-102-221.js';

// GSM SIM commands (3GPP TS 51.011, clause 9); all use CLA A0

const SIM_CLA = ['A0'] as const;

function renderSimResponse(data: Buffer): string {
    try {
        return describe(decodeSimSelectResponse(data));
    } catch (error: unknown) {
        return `undecodable response ${data.toString('hex')} (${errorMessage(error)})`;
    }
}

/**
 * SELECT (9.2.1): always by FID, answered with 9Fxx and a GET RESPONSE
 */
export class SimSelect extends ApduCommand {
    protected override decodeFields(): CommandFields {
        return { fid: this.data.toString('hex').toUpperCase() };
    }

    protected override processOnLchan(lchan: RuntimeLchan): string {
        const fid = this.data.toString('hex').toUpperCase();
        if (!this.successful) {
            return fid;
        }
        const result = lchan.selectFid(fid);
        if (!result.ok) {
            return `SELECT failed: ${result.reason}`;
        }
        if (this.responseData.length > 0) {
            return `${result.file.name} ${renderSimResponse(this.responseData)}`;
        }
        return result.file.name;
    }

    protected override pendingResponse(lchan: RuntimeLchan): PendingResponse {
        return { command: this.name, format: 'sim-select', file: lchan.selectedFile };
    }
}

/**
 * STATUS (9.2.2): the response describes the current DF
 */
export class SimStatus extends ApduCommand {
    protected override processOnLchan(lchan: RuntimeLchan): string {
        const path = lchan.selectedFile.fullyQualifiedPathStr();
        if (this.responseData.length === 0) {
            return path;
        }
        return `${path} ${renderSimResponse(this.responseData)}`;
    }
}

/**
 * RUN GSM ALGORITHM (9.2.16): RAND in, SRES and Kc out
 */
export class RunGsmAlgorithm extends ApduCommand {
    protected override decodeFields(): CommandFields {
        const fields: CommandFields = { rand: this.data.toString('hex') };
        if (this.responseData.length >= 12) {
            fields.sres = this.responseData.subarray(0, 4).toString('hex');
            fields.kc = this.responseData.subarray(4, 12).toString('hex');
        }
        return fields;
    }

    protected override processOnLchan(): string {
        return describe(this.fields);
    }
}

export class Sleep extends ApduCommand {
    protected override processOnLchan(): string {
        return '';
    }
}

export const SIM_COMMANDS: readonly CommandDescriptor[] = [
    defineCommand('SELECT', 0xa4, SIM_CLA, 4, SimSelect, 'select'),
    defineCommand('STATUS', 0xf2, SIM_CLA, 2, SimStatus, 'status'),
    defineCommand('READ BINARY', 0xb0, SIM_CLA, 2, ReadBinary),
    defineCommand('UPDATE BINARY', 0xd6, SIM_CLA, 3, UpdateBinary),
    defineCommand('READ RECORD', 0xb2, SIM_CLA, 2, ReadRecord),
    defineCommand('UPDATE RECORD', 0xdc, SIM_CLA, 3, UpdateRecord),
    defineCommand('SEEK', 0xa2, SIM_CLA, 4, SearchRecord),
    defineCommand('INCREASE', 0x32, SIM_CLA, 4, Increase),
    defineCommand('VERIFY CHV', 0x20, SIM_CLA, 3, ChvCommand),
    defineCommand('CHANGE CHV', 0x24, SIM_CLA, 3, ChvCommand),
    defineCommand('DISABLE CHV', 0x26, SIM_CLA, 3, ChvCommand),
    defineCommand('ENABLE CHV', 0x28, SIM_CLA, 3, ChvCommand),
    defineCommand('UNBLOCK CHV', 0x2c, SIM_CLA, 3, ChvCommand),
    defineCommand('INVALIDATE', 0x04, SIM_CLA, 1, FileLifecycleCommand),
    defineCommand('REHABILITATE', 0x44, SIM_CLA, 1, FileLifecycleCommand),
    defineCommand('RUN GSM ALGORITHM', 0x88, SIM_CLA, 4, RunGsmAlgorithm),
    defineCommand('SLEEP', 0xfa, SIM_CLA, 1, Sleep),
    defineCommand('GET RESPONSE', 0xc0, SIM_CLA, 2, GetResponse),
    defineCommand('TERMINAL PROFILE', 0x10, SIM_CLA, 3, TerminalProfile),
    defineCommand('ENVELOPE', 0xc2, SIM_CLA, 4, Envelope),
    defineCommand('FETCH', 0x12, SIM_CLA, 2, Fetch),
    defineCommand('TERMINAL RESPONSE', 0x14, SIM_CLA, 3, TerminalResponse),
];
