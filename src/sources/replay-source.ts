import type { ApduSource, SourceEvent } from '../types.js';

/**
 * Source replaying a fixed list of events, then end-of-stream
 */
export class ReplaySource implements ApduSource {
    readonly name: string;
    private readonly events: SourceEvent[];
    private position = 0;

    constructor(events: readonly SourceEvent[], name = 'replay') {
        this.name = name;
        this.events = [...events];
    }

    read(): Promise<SourceEvent> {
        const event = this.events[this.position];
        if (!event || event.type === 'end') {
            this.position = this.events.length;
            return Promise.resolve({ type: 'end' });
        }
        this.position += 1;
        return Promise.resolve(event);
    }

    close(): Promise<void> {
        this.position = this.events.length;
        return Promise.resolve();
    }
}
