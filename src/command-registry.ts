import { formatClaPattern, matchesCla, type ClaPattern } from './apdu.js';
import type { CommandDescriptor } from './apdu-command.js';
import type { ApduCase } from './types.js';

interface RegistryEntry {
    readonly pattern: ClaPattern;
    readonly descriptor: CommandDescriptor;
    /** Registration order, used to break ties between equally specific patterns */
    readonly order: number;
}

function keyOf(pattern: ClaPattern, ins: number): string {
    return `${formatClaPattern(pattern)}:${ins.toString(16).padStart(2, '0')}`;
}

function specificity(pattern: ClaPattern): number {
    let bits = 0;
    for (let mask = pattern.mask; mask !== 0; mask >>= 1) {
        bits += mask & 1;
    }
    return bits;
}

/**
 * Table mapping (class pattern, instruction) keys to command descriptors.
 *
 * Every class pattern of a descriptor is its own key. Registering a key that
 * already exists replaces the earlier entry, so merging command sets in order
 * lets later sets override instructions of earlier ones.
 */
export class CommandRegistry {
    readonly name: string;
    private readonly entries = new Map<string, RegistryEntry>();
    private counter = 0;

    constructor(name: string, descriptors: readonly CommandDescriptor[] = []) {
        this.name = name;
        for (const descriptor of descriptors) {
            this.register(descriptor);
        }
    }

    get size(): number {
        return this.entries.size;
    }

    /**
     * Add a descriptor under each of its class patterns; later registrations win
     */
    register(descriptor: CommandDescriptor): this {
        for (const pattern of descriptor.cla) {
            const key = keyOf(pattern, descriptor.ins);
            // delete first so iteration order follows the latest registration
            this.entries.delete(key);
            this.entries.set(key, { pattern, descriptor, order: this.counter++ });
        }
        return this;
    }

    /**
     * Register all descriptors of another registry, in its registration order
     */
    merge(other: CommandRegistry): this {
        for (const descriptor of other.descriptors()) {
            this.register(descriptor);
        }
        return this;
    }

    /**
     * Find the descriptor for a class and instruction byte.
     * The most specific matching class pattern wins; among equally specific ones the latest.
     */
    lookup(cla: number, ins: number): CommandDescriptor | undefined {
        let best: RegistryEntry | undefined;
        for (const entry of this.entries.values()) {
            if (entry.descriptor.ins !== ins || !matchesCla(entry.pattern, cla)) continue;
            if (
                !best ||
                specificity(entry.pattern) > specificity(best.pattern) ||
                (specificity(entry.pattern) === specificity(best.pattern) && entry.order > best.order)
            ) {
                best = entry;
            }
        }
        return best?.descriptor;
    }

    /**
     * APDU case of a command, falling back to case 4 for unknown commands
     */
    apduCase(cla: number, ins: number): ApduCase {
        return this.lookup(cla, ins)?.apduCase ?? 4;
    }

    /**
     * Distinct descriptors, in registration order
     */
    descriptors(): CommandDescriptor[] {
        const seen = new Set<CommandDescriptor>();
        for (const entry of this.entries.values()) {
            seen.add(entry.descriptor);
        }
        return [...seen];
    }
}
