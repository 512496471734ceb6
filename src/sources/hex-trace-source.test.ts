import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SourceError } from '../errors.js';
import { HexTraceSource, parseTraceLine } from './hex-trace-source.js';

describe('parseTraceLine', () => {
    it('should skip blank lines and comments', () => {
        assert.strictEqual(parseTraceLine(''), undefined);
        assert.strictEqual(parseTraceLine('   # select MF'), undefined);
    });

    it('should parse a command with its response', () => {
        const event = parseTraceLine('00a40004023f00 9000  # select MF');
        assert.strictEqual(event?.type, 'apdu');
        if (event?.type !== 'apdu') return;
        assert.deepStrictEqual(event.exchange.data, Buffer.from('3f00', 'hex'));
        assert.strictEqual(event.exchange.response?.sw, 0x9000);
    });

    it('should parse a command without a response', () => {
        const event = parseTraceLine('00b0000002');
        assert.strictEqual(event?.type, 'apdu');
        if (event?.type !== 'apdu') return;
        assert.strictEqual(event.exchange.le, 2);
        assert.strictEqual(event.exchange.response, undefined);
    });

    it('should parse resets with and without ATR', () => {
        assert.deepStrictEqual(parseTraceLine('RESET'), { type: 'reset', atr: undefined });
        assert.deepStrictEqual(parseTraceLine('reset 3b:9f:96'), { type: 'reset', atr: Buffer.from('3b9f96', 'hex') });
    });

    it('should keep a reset whose ATR is malformed', () => {
        const warnings: string[] = [];
        assert.deepStrictEqual(
            parseTraceLine('reset 3b9z', (message) => warnings.push(message)),
            { type: 'reset', atr: undefined }
        );
        assert.deepStrictEqual(warnings, ["dropping ATR: Invalid hex string '3b9z'"]);
    });

    it('should reject lines with extra fields', () => {
        assert.throws(() => parseTraceLine('00a40004023f00 9000 9000'), {
            name: 'SyntaxError',
            message: "Expected '<command> [<response>]', got 3 fields",
        });
    });
});

describe('HexTraceSource', () => {
    let dir: string;

    before(async () => {
        dir = await mkdtemp(join(tmpdir(), 'hex-trace-'));
    });

    after(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should replay events in file order and log skipped lines', async () => {
        const path = join(dir, 'trace.txt');
        await writeFile(path, ['reset', '# comment', '00a40004023f00 9000', 'zz 9000', '80f20000 9000', ''].join('\n'));
        const messages: string[] = [];
        const source = new HexTraceSource(path, (message) => messages.push(message));

        assert.strictEqual(source.name, `hex-file ${path}`);
        assert.strictEqual((await source.read()).type, 'reset');
        const select = await source.read();
        assert.strictEqual(select.type === 'apdu' && select.exchange.ins, 0xa4);
        const status = await source.read();
        assert.strictEqual(status.type === 'apdu' && status.exchange.ins, 0xf2);
        assert.deepStrictEqual(await source.read(), { type: 'end' });
        assert.deepStrictEqual(await source.read(), { type: 'end' });
        assert.deepStrictEqual(messages, [`${path}:4: skipping line: Invalid hex string 'zz'`]);
    });

    it('should replay a reset with an unreadable ATR without it', async () => {
        const path = join(dir, 'bad-atr.txt');
        await writeFile(path, ['00a40004023f00 9000', 'reset zz', '80f20000 9000'].join('\n'));
        const messages: string[] = [];
        const source = new HexTraceSource(path, (message) => messages.push(message));

        assert.strictEqual((await source.read()).type, 'apdu');
        assert.deepStrictEqual(await source.read(), { type: 'reset', atr: undefined });
        assert.strictEqual((await source.read()).type, 'apdu');
        assert.deepStrictEqual(await source.read(), { type: 'end' });
        assert.deepStrictEqual(messages, [`${path}:2: dropping ATR: Invalid hex string 'zz'`]);
    });

    it('should end after close', async () => {
        const path = join(dir, 'closed.txt');
        await writeFile(path, '00a40004023f00 9000\n');
        const source = new HexTraceSource(path);
        await source.close();
        assert.deepStrictEqual(await source.read(), { type: 'end' });
    });

    it('should fail with a SourceError for unreadable files', async () => {
        const source = new HexTraceSource(join(dir, 'missing.txt'));
        await assert.rejects(source.read(), SourceError);
    });
});
