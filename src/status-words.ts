import { formatSw } from './apdu.js';
import { readStringTable } from './data-files.js';

let table: ReadonlyMap<string, string> | undefined;

function statusWordTable(): ReadonlyMap<string, string> {
    table ??= readStringTable('status-words.json');
    return table;
}

/**
 * Does a table key such as '63CX' or '61XX' match a formatted status word?
 */
function matchesPattern(pattern: string, swHex: string): boolean {
    for (let i = 0; i < 4; i++) {
        const p = pattern[i];
        if (p !== 'X' && p !== swHex[i]) {
            return false;
        }
    }
    return true;
}

function wildcardCount(pattern: string): number {
    return pattern.split('X').length - 1;
}

/**
 * Human-readable meaning of a status word (TS 102 221 / TS 51.011 / ISO 7816-4).
 * 'X' nibbles in the description are replaced by the decimal value
 * of the matching status word bits.
 */
export function interpretSw(sw: number): string {
    const swHex = formatSw(sw);
    const exact = statusWordTable().get(swHex);
    if (exact !== undefined) {
        return exact;
    }

    let best: [string, string] | undefined;
    for (const entry of statusWordTable()) {
        const [pattern] = entry;
        if (!pattern.includes('X') || !matchesPattern(pattern, swHex)) continue;
        if (!best || wildcardCount(pattern) < wildcardCount(best[0])) {
            best = entry;
        }
    }
    if (!best) {
        return 'unknown status word';
    }

    const [pattern, description] = best;
    const wildcards = wildcardCount(pattern);
    const value = sw & ((1 << (4 * wildcards)) - 1);
    return description.replace(wildcards === 1 ? /\bX\b/ : /\bXX\b/, String(value));
}
