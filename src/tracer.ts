import { UnknownCommand, type ApduCommand, type CommandCategory } from './apdu-command.js';
import { ApduDecoder } from './apdu-decoder.js';
import { loadDefaultProfile, type CardProfile } from './card-profile.js';
import type { CommandRegistry } from './command-registry.js';
import { createDefaultRegistry } from './command-sets/index.js';
import { RuntimeState } from './runtime-state.js';
import type { ApduSource, LogFn } from './types.js';

/**
 * One decoded and processed exchange, ready for output
 */
export interface TraceRecord {
    lchan: number;
    name: string;
    path: string;
    colId: string;
    colSw: string;
    processed: string;
    degraded: boolean;
    successful: boolean;
    recognized: boolean;
    category: CommandCategory;
}

export interface TraceSummary {
    exchanges: number;
    resets: number;
    emitted: number;
    suppressed: number;
}

export interface TracerOptions {
    source: ApduSource;
    registry?: CommandRegistry | undefined;
    profile?: CardProfile | undefined;
    /** Drop SELECT records from the output (default true) */
    suppressSelect?: boolean | undefined;
    /** Drop STATUS records from the output (default true) */
    suppressStatus?: boolean | undefined;
    onRecord?: ((record: TraceRecord, command: ApduCommand) => void) | undefined;
    onReset?: ((atr: Buffer | undefined) => void) | undefined;
    debug?: LogFn | undefined;
}

export function toRecord(command: ApduCommand): TraceRecord {
    return {
        lchan: command.lchanNr,
        name: command.name,
        path: command.pathStr,
        colId: command.colId,
        colSw: command.colSw,
        processed: command.processed,
        degraded: command.degraded,
        successful: command.successful,
        recognized: !(command instanceof UnknownCommand),
        category: command.category,
    };
}

/**
 * The trace loop: pulls events from a source in arrival order, keeps the
 * runtime state in sync and emits one record per exchange that is not filtered out
 */
export class Tracer {
    readonly state: RuntimeState;
    readonly decoder: ApduDecoder;
    private readonly source: ApduSource;
    private readonly suppressSelect: boolean;
    private readonly suppressStatus: boolean;
    private readonly onRecord: ((record: TraceRecord, command: ApduCommand) => void) | undefined;
    private readonly onReset: ((atr: Buffer | undefined) => void) | undefined;
    private readonly summary: TraceSummary = { exchanges: 0, resets: 0, emitted: 0, suppressed: 0 };
    private ended = false;

    constructor(options: TracerOptions) {
        this.source = options.source;
        this.state = new RuntimeState(options.profile ?? loadDefaultProfile());
        this.decoder = new ApduDecoder(options.registry ?? createDefaultRegistry(), options.debug);
        this.suppressSelect = options.suppressSelect ?? true;
        this.suppressStatus = options.suppressStatus ?? true;
        this.onRecord = options.onRecord;
        this.onReset = options.onReset;
    }

    get stats(): Readonly<TraceSummary> {
        return { ...this.summary };
    }

    private isSuppressed(command: ApduCommand): boolean {
        return (
            (this.suppressSelect && command.category === 'select') ||
            (this.suppressStatus && command.category === 'status')
        );
    }

    /**
     * Handle the next event of the source. Resolves false once the source has ended.
     * Source errors reject; per-exchange problems never do.
     */
    async step(): Promise<boolean> {
        if (this.ended) {
            return false;
        }
        const event = await this.source.read();
        switch (event.type) {
            case 'end':
                this.ended = true;
                return false;
            case 'reset':
                // a reset between command and response drops whatever was pending
                this.state.reset();
                this.summary.resets += 1;
                this.onReset?.(event.atr);
                return true;
            case 'apdu': {
                this.summary.exchanges += 1;
                const command = this.decoder.decode(event.exchange);
                command.process(this.state);
                if (this.isSuppressed(command)) {
                    this.summary.suppressed += 1;
                } else {
                    this.summary.emitted += 1;
                    this.onRecord?.(toRecord(command), command);
                }
                return true;
            }
        }
    }

    /**
     * Run until end of stream
     */
    async run(): Promise<TraceSummary> {
        while (await this.step()) {
            // keep pulling
        }
        return this.stats;
    }
}

export interface FormatOptions {
    format?: 'text' | 'json' | undefined;
    color?: boolean | undefined;
}

const GREEN = '\x1b[32m';
const RED = '\x1b[31m';
const RESET = '\x1b[0m';

/**
 * Render a record as two text lines (record and separator) or one JSON line
 */
export function formatRecord(record: TraceRecord, options: FormatOptions = {}): string {
    if (options.format === 'json') {
        return JSON.stringify(record);
    }
    const sw = options.color ? `${record.successful ? GREEN : RED}${record.colSw}${RESET}` : record.colSw;
    const line = [
        String(record.lchan).padStart(2, '0'),
        record.name.padEnd(16),
        record.path.padEnd(35),
        record.colId.padEnd(8),
        sw,
        record.processed,
    ].join(' ');
    return `${line}\n${'='.repeat(31)}`;
}
