import { createSocket, type RemoteInfo, type Socket } from 'node:dgram';
import type { AddressInfo } from 'node:net';
import { errorMessage, SourceError } from '../errors.js';
import type { ApduCaseResolver, ApduSource, LogFn, SourceEvent } from '../types.js';
import { decodeGsmtapPacket, GSMTAP_PORT } from './gsmtap.js';

export interface GsmtapUdpOptions {
    bindIp?: string | undefined;
    bindPort?: number | undefined;
    log?: LogFn | undefined;
}

interface Waiter {
    resolve: (event: SourceEvent) => void;
    reject: (error: Error) => void;
}

/**
 * Live GSMTAP-SIM capture on a UDP socket.
 *
 * Datagrams are decoded as they arrive and queued in arrival order;
 * `read()` takes the oldest event or waits for the next one.
 */
export class GsmtapUdpSource implements ApduSource {
    readonly name: string;
    private readonly bindIp: string;
    private readonly bindPort: number;
    private readonly apduCase: ApduCaseResolver;
    private readonly log: LogFn | undefined;
    private socket: Socket | null = null;
    private opening: Promise<AddressInfo> | null = null;
    private readonly queue: SourceEvent[] = [];
    private readonly waiters: Waiter[] = [];
    private failure: SourceError | null = null;
    private closed = false;
    private bound = false;

    constructor(apduCase: ApduCaseResolver, options: GsmtapUdpOptions = {}) {
        this.bindIp = options.bindIp ?? '127.0.0.1';
        this.bindPort = options.bindPort ?? GSMTAP_PORT;
        this.name = `gsmtap-udp ${this.bindIp}:${String(this.bindPort)}`;
        this.apduCase = apduCase;
        this.log = options.log;
    }

    /**
     * Bind the socket; resolves with the bound address
     */
    open(): Promise<AddressInfo> {
        this.opening ??= new Promise<AddressInfo>((resolve, reject) => {
            const socket = createSocket('udp4');
            this.socket = socket;

            const onStartupError = (error: Error): void => {
                socket.close();
                reject(new SourceError(`Cannot bind ${this.bindIp}:${String(this.bindPort)}: ${error.message}`, { cause: error }));
            };
            socket.once('error', onStartupError);
            socket.on('message', (packet: Buffer, remote: RemoteInfo) => this.handlePacket(packet, remote));
            socket.bind(this.bindPort, this.bindIp, () => {
                this.bound = true;
                socket.off('error', onStartupError);
                socket.on('error', (error: Error) => this.fail(error));
                resolve(socket.address());
            });
        });
        return this.opening;
    }

    private handlePacket(packet: Buffer, remote: RemoteInfo): void {
        if (this.closed) {
            return;
        }
        let event: SourceEvent | undefined;
        try {
            event = decodeGsmtapPacket(packet, this.apduCase);
        } catch (error: unknown) {
            this.log?.(`Skipping packet from ${remote.address}:${String(remote.port)}: ${errorMessage(error)}`);
            return;
        }
        if (event) {
            this.push(event);
        }
    }

    private push(event: SourceEvent): void {
        const waiter = this.waiters.shift();
        if (waiter) {
            waiter.resolve(event);
        } else {
            this.queue.push(event);
        }
    }

    private fail(error: Error): void {
        this.failure = new SourceError(`GSMTAP socket error: ${error.message}`, { cause: error });
        for (const waiter of this.waiters.splice(0)) {
            waiter.reject(this.failure);
        }
    }

    async read(): Promise<SourceEvent> {
        const queued = this.queue.shift();
        if (queued) {
            return queued;
        }
        if (this.closed) {
            return { type: 'end' };
        }
        if (this.failure) {
            throw this.failure;
        }
        await this.open();
        if (this.closed) {
            return { type: 'end' };
        }
        return new Promise<SourceEvent>((resolve, reject) => {
            this.waiters.push({ resolve, reject });
        });
    }

    async close(): Promise<void> {
        if (this.closed) {
            return;
        }
        this.closed = true;
        for (const waiter of this.waiters.splice(0)) {
            waiter.resolve({ type: 'end' });
        }
        const socket = this.socket;
        this.socket = null;
        if (socket && this.opening) {
            // a failed bind was already reported by open(); only a bound socket needs closing
            await this.opening.then(
                () => undefined,
                () => undefined
            );
            if (this.bound) {
                await new Promise<void>((resolve) => socket.close(() => resolve()));
            }
        }
    }
}
