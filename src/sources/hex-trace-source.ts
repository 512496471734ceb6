import { readFile } from 'node:fs/promises';
import { parseCommandApdu, parseHex } from '../apdu.js';
import { errorMessage, SourceError } from '../errors.js';
import type { ApduSource, LogFn, SourceEvent } from '../types.js';

/**
 * Parse one line of a hex trace.
 * Returns undefined for blank lines and comments; throws for malformed lines.
 * A reset keeps its place in the trace even when its ATR is unreadable: the ATR
 * is dropped and `warn` is told why.
 *
 * @example
 * parseTraceLine('00a40004023f00 9000')   // SELECT MF answered with 9000
 * parseTraceLine('reset 3b9f96801fc7')     // card reset with ATR
 */
export function parseTraceLine(line: string, warn?: (message: string) => void): SourceEvent | undefined {
    const text = line.replace(/#.*$/, '').trim();
    if (text.length === 0) {
        return undefined;
    }
    const [first = '', ...rest] = text.split(/\s+/);
    if (first.toLowerCase() === 'reset') {
        return { type: 'reset', atr: rest.length > 0 ? parseAtr(rest.join(''), warn) : undefined };
    }
    if (rest.length > 1) {
        throw new SyntaxError(`Expected '<command> [<response>]', got ${String(rest.length + 1)} fields`);
    }
    const response = rest[0];
    return {
        type: 'apdu',
        exchange: parseCommandApdu(parseHex(first), response === undefined ? undefined : parseHex(response)),
    };
}

function parseAtr(hex: string, warn?: (message: string) => void): Buffer | undefined {
    try {
        return parseHex(hex);
    } catch (error: unknown) {
        warn?.(`dropping ATR: ${errorMessage(error)}`);
        return undefined;
    }
}

/**
 * Source replaying a text file of hex-encoded exchanges, one per line
 */
export class HexTraceSource implements ApduSource {
    readonly name: string;
    private readonly path: string;
    private readonly log: LogFn | undefined;
    private lines: string[] | undefined;
    private lineNo = 0;
    private closed = false;

    constructor(path: string, log?: LogFn) {
        this.name = `hex-file ${path}`;
        this.path = path;
        this.log = log;
    }

    private async load(): Promise<string[]> {
        if (this.lines === undefined) {
            try {
                this.lines = (await readFile(this.path, 'utf8')).split(/\r?\n/);
            } catch (error: unknown) {
                throw new SourceError(`Cannot read ${this.path}: ${errorMessage(error)}`, { cause: error });
            }
        }
        return this.lines;
    }

    async read(): Promise<SourceEvent> {
        if (this.closed) {
            return { type: 'end' };
        }
        const lines = await this.load();
        while (this.lineNo < lines.length) {
            const line = lines[this.lineNo] ?? '';
            this.lineNo += 1;
            try {
                const event = parseTraceLine(line, (message) =>
                    this.log?.(`${this.path}:${String(this.lineNo)}: ${message}`)
                );
                if (event) {
                    return event;
                }
            } catch (error: unknown) {
                this.log?.(`${this.path}:${String(this.lineNo)}: skipping line: ${errorMessage(error)}`);
            }
        }
        return { type: 'end' };
    }

    close(): Promise<void> {
        this.closed = true;
        return Promise.resolve();
    }
}
