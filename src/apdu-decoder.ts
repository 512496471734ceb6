import { UnknownCommand, type ApduCommand } from './apdu-command.js';
import { hexByte, logicalChannelFromCla } from './apdu.js';
import type { CommandRegistry } from './command-registry.js';
import type { LogFn, RawExchange } from './types.js';

/**
 * Turns raw exchanges into decoded command interpreters
 */
export class ApduDecoder {
    readonly registry: CommandRegistry;
    private readonly debug: LogFn | undefined;

    constructor(registry: CommandRegistry, debug?: LogFn) {
        this.registry = registry;
        this.debug = debug;
    }

    /**
     * Look up the interpreter for an exchange and run its field decoding.
     * Never throws: unknown commands yield an UnknownCommand, decode problems a degraded command.
     */
    decode(exchange: RawExchange, lchan?: number): ApduCommand {
        const lchanNr = lchan ?? logicalChannelFromCla(exchange.cla) ?? 0;
        const descriptor = this.registry.lookup(exchange.cla, exchange.ins);

        let command: ApduCommand;
        if (descriptor) {
            command = descriptor.create(exchange, lchanNr, descriptor);
        } else {
            this.debug?.(`No interpreter for CLA=${hexByte(exchange.cla)} INS=${hexByte(exchange.ins)}`);
            command = new UnknownCommand(exchange, lchanNr);
        }
        command.decode();
        return command;
    }
}
