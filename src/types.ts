/**
 * Response half of an APDU exchange
 */
export interface ApduResponse {
    /** Response data without the status word */
    readonly data: Buffer;
    /** Status word (SW1 << 8 | SW2) */
    readonly sw: number;
}

/**
 * A captured command APDU with its (optional) response
 */
export interface RawExchange {
    readonly cla: number;
    readonly ins: number;
    readonly p1: number;
    readonly p2: number;
    /** Command data (empty for case 1 and 2 commands) */
    readonly data: Buffer;
    /** Expected response length, when the command carried one */
    readonly le?: number | undefined;
    readonly response?: ApduResponse | undefined;
}

/**
 * ISO 7816-4 command cases
 * 1: no data, no response data; 2: response data; 3: command data; 4: both
 */
export type ApduCase = 1 | 2 | 3 | 4;

export interface ExchangeEvent {
    type: 'apdu';
    exchange: RawExchange;
}

export interface ResetEvent {
    type: 'reset';
    /** Answer to Reset, when the capture includes it */
    atr?: Buffer | undefined;
}

export interface EndEvent {
    type: 'end';
}

/**
 * Events yielded by an ApduSource
 */
export type SourceEvent = ExchangeEvent | ResetEvent | EndEvent;

/**
 * Pull-based source of APDU exchanges and card resets.
 * Once 'end' has been returned, every further read returns 'end'.
 */
export interface ApduSource {
    readonly name: string;
    read(): Promise<SourceEvent>;
    close(): Promise<void>;
}

/**
 * Resolves the APDU case of a command, used to split T=0 byte streams
 */
export type ApduCaseResolver = (cla: number, ins: number) => ApduCase;

/**
 * Callback for diagnostics emitted by sources and the tracer
 */
export type LogFn = (message: string) => void;
