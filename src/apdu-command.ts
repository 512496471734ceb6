import {
    claPattern,
    formatCommandHex,
    formatSw,
    hexByte,
    isResponsePendingSw,
    isSuccessfulSw,
    type ClaPattern,
} from './apdu.js';
import { CardADF, type CardFile } from './card-profile.js';
import { errorMessage } from './errors.js';
import type { PendingResponse, RuntimeLchan, RuntimeState } from './runtime-state.js';
import { interpretSw } from './status-words.js';
import type { ApduCase, RawExchange } from './types.js';

/**
 * Coarse command classification used by output filters
 */
export type CommandCategory = 'select' | 'status' | 'other';

/**
 * Named, decoded fields of one exchange
 */
export type CommandFields = Record<string, unknown>;

export type CommandFactory = (exchange: RawExchange, lchanNr: number, descriptor: CommandDescriptor) => ApduCommand;

/**
 * Registry entry: which (CLA, INS) a command interpreter handles and how to build it
 */
export interface CommandDescriptor {
    readonly name: string;
    readonly ins: number;
    readonly cla: readonly ClaPattern[];
    readonly apduCase: ApduCase;
    readonly category: CommandCategory;
    readonly create: CommandFactory;
}

type CommandClass = new (exchange: RawExchange, lchanNr: number, descriptor: CommandDescriptor) => ApduCommand;

/**
 * Build a command descriptor for an interpreter class
 */
export function defineCommand(
    name: string,
    ins: number,
    cla: readonly string[],
    apduCase: ApduCase,
    Command: CommandClass,
    category: CommandCategory = 'other'
): CommandDescriptor {
    return Object.freeze({
        name,
        ins,
        cla: Object.freeze(cla.map(claPattern)),
        apduCase,
        category,
        create: (exchange: RawExchange, lchanNr: number, descriptor: CommandDescriptor) =>
            new Command(exchange, lchanNr, descriptor),
    });
}

/**
 * Render decoded values for the processed column
 */
export function describe(value: unknown): string {
    // the replacer sees Buffer.toJSON() output, so look at the holder's raw value
    return JSON.stringify(value, function (this: Record<string, unknown>, key: string, v: unknown): unknown {
        const raw = this[key];
        return Buffer.isBuffer(raw) ? raw.toString('hex') : v;
    });
}

/**
 * One decoded command/response exchange.
 *
 * Built by the decoder for exactly one exchange: `decode()` splits the raw
 * bytes into named fields, `process()` interprets them against the runtime
 * state of the logical channel (possibly moving its cursor) and fills in
 * `processed`. Per-exchange problems never escape: they mark the command as
 * degraded and end up in `processed`.
 */
export class ApduCommand {
    readonly exchange: RawExchange;
    readonly lchanNr: number;
    readonly name: string;
    readonly category: CommandCategory;
    readonly apduCase: ApduCase;
    fields: CommandFields = {};
    processed = '';
    degraded = false;
    /** File the command operated on, known after processing */
    protected file: CardFile | undefined;
    /** Overrides the file identifier in the ID column */
    protected idColumn: string | undefined;

    constructor(exchange: RawExchange, lchanNr: number, descriptor: CommandDescriptor) {
        this.exchange = exchange;
        this.lchanNr = lchanNr;
        this.name = descriptor.name;
        this.category = descriptor.category;
        this.apduCase = descriptor.apduCase;
    }

    get cla(): number {
        return this.exchange.cla;
    }

    get ins(): number {
        return this.exchange.ins;
    }

    get p1(): number {
        return this.exchange.p1;
    }

    get p2(): number {
        return this.exchange.p2;
    }

    /** Command data */
    get data(): Buffer {
        return this.exchange.data;
    }

    /** Response data (empty without a response) */
    get responseData(): Buffer {
        return this.exchange.response?.data ?? Buffer.alloc(0);
    }

    get sw(): number | undefined {
        return this.exchange.response?.sw;
    }

    /**
     * False only when a response is present and reports an error.
     * Exchanges captured without a response are interpreted as if they succeeded.
     */
    get successful(): boolean {
        const sw = this.sw;
        return sw === undefined || isSuccessfulSw(sw);
    }

    get pathStr(): string {
        return this.file?.fullyQualifiedPathStr() ?? '';
    }

    get colId(): string {
        if (this.idColumn !== undefined) {
            return this.idColumn;
        }
        if (this.file instanceof CardADF) {
            return '7FFF';
        }
        return this.file?.fid ?? '-';
    }

    get colSw(): string {
        const sw = this.sw;
        return sw === undefined ? '----' : formatSw(sw);
    }

    /**
     * Split parameters, command data and response data into named fields
     */
    decode(): void {
        try {
            this.fields = this.decodeFields();
        } catch (error: unknown) {
            this.degraded = true;
            this.processed = `decode error: ${errorMessage(error)} [${formatCommandHex(this.exchange)}]`;
        }
    }

    protected decodeFields(): CommandFields {
        const fields: CommandFields = { p1: hexByte(this.p1), p2: hexByte(this.p2) };
        if (this.data.length > 0) {
            fields.data = this.data.toString('hex');
        }
        if (this.responseData.length > 0) {
            fields.response = this.responseData.toString('hex');
        }
        return fields;
    }

    /**
     * Interpret the exchange against the runtime state
     */
    process(state: RuntimeState): void {
        const lchan = state.lchan(this.lchanNr);
        if (!lchan) {
            this.degraded = true;
            this.processed = `logical channel ${String(this.lchanNr)} is not open`;
            return;
        }
        if (this.degraded) {
            this.file = lchan.selectedFile;
            return;
        }

        try {
            const text = this.processOnLchan(lchan, state);
            this.trackPendingResponse(lchan);
            this.processed = this.withSwText(text);
        } catch (error: unknown) {
            this.degraded = true;
            this.processed = `processing error: ${errorMessage(error)}`;
        }
        this.file = lchan.selectedFile;
    }

    /**
     * Append the meaning of a failing status word
     */
    protected withSwText(text: string): string {
        const sw = this.sw;
        if (sw === undefined || isSuccessfulSw(sw)) {
            return text;
        }
        return `${text}${text ? ' ' : ''}(${interpretSw(sw)})`;
    }

    /**
     * Command-specific interpretation; the default renders the decoded fields
     */
    protected processOnLchan(_lchan: RuntimeLchan, _state: RuntimeState): string {
        return describe(this.fields);
    }

    /**
     * Context in which a later GET RESPONSE on this channel is decoded
     */
    protected pendingResponse(lchan: RuntimeLchan): PendingResponse {
        return { command: this.name, format: 'raw', file: lchan.selectedFile };
    }

    private trackPendingResponse(lchan: RuntimeLchan): void {
        const sw = this.sw;
        if (sw !== undefined && isResponsePendingSw(sw)) {
            lchan.pendingResponse = this.pendingResponse(lchan);
        } else {
            lchan.pendingResponse = undefined;
        }
    }
}

/**
 * Fallback for (CLA, INS) pairs no command set knows about
 */
export class UnknownCommand extends ApduCommand {
    constructor(exchange: RawExchange, lchanNr: number) {
        super(exchange, lchanNr, UNKNOWN_DESCRIPTOR);
        this.idColumn = '-';
    }

    /**
     * Never touches the runtime state. The CLA of a vendor command says nothing
     * reliable about logical channels, so a channel that is not open falls back
     * to the basic channel's path.
     */
    override process(state: RuntimeState): void {
        const lchan = state.lchan(this.lchanNr) ?? state.lchan(0);
        this.file = lchan?.selectedFile ?? state.mf;
        if (this.degraded) {
            return;
        }
        this.processed = this.withSwText(this.processOnLchan());
    }

    protected override processOnLchan(): string {
        return `unrecognized command CLA=${hexByte(this.cla)} INS=${hexByte(this.ins)} ${describe(this.fields)}`;
    }
}

const UNKNOWN_DESCRIPTOR: CommandDescriptor = {
    name: 'UNKNOWN',
    ins: -1,
    cla: [],
    apduCase: 4,
    category: 'other',
    create: (exchange, lchanNr) => new UnknownCommand(exchange, lchanNr),
};
