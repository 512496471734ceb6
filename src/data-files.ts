import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Directory holding the JSON lookup tables shipped with the package
 * (resolved the same way from src/ and dist/)
 */
export const DATA_DIR = join(__dirname, '..', 'data');

/**
 * Read and parse a JSON file from the data directory
 */
export function readDataFile(name: string): unknown {
    return JSON.parse(readFileSync(join(DATA_DIR, name), 'utf8')) as unknown;
}

/**
 * Read a JSON object whose values are all strings
 */
export function readStringTable(name: string): ReadonlyMap<string, string> {
    const parsed = readDataFile(name);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new TypeError(`${name}: expected a JSON object`);
    }
    const table = new Map<string, string>();
    for (const [key, value] of Object.entries(parsed)) {
        if (typeof value !== 'string') {
            throw new TypeError(`${name}: value of '${key}' is not a string`);
        }
        table.set(key.toUpperCase(), value);
    }
    return table;
}
