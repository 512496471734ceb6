import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import type { ApduCommand } from '../apdu-command.js';
import { ApduDecoder } from '../apdu-decoder.js';
import { parseCommandApdu } from '../apdu.js';
import { loadDefaultProfile } from '../card-profile.js';
import { RuntimeState } from '../runtime-state.js';
import { createDefaultRegistry } from './index.js';
import { splitLv } from './ts-31-102.js';

const profile = loadDefaultProfile();
const decoder = new ApduDecoder(createDefaultRegistry());

const RAND = '00112233445566778899aabbccddeeff';
const AUTN = 'ffeeddccbbaa99887766554433221100';

describe('splitLv', () => {
    it('should split length-prefixed values', () => {
        assert.deepStrictEqual(splitLv(Buffer.from('02aabb0001cc', 'hex')), [
            Buffer.from('aabb', 'hex'),
            Buffer.alloc(0),
            Buffer.from('cc', 'hex'),
        ]);
    });

    it('should reject values running past the data', () => {
        assert.throws(() => splitLv(Buffer.from('03aabb', 'hex')), {
            name: 'RangeError',
            message: 'LV of 3 bytes at offset 0 exceeds the data',
        });
    });
});

describe('USIM AUTHENTICATE', () => {
    let state: RuntimeState;

    const run = (command: string, response = '9000'): ApduCommand => {
        const decoded = decoder.decode(parseCommandApdu(Buffer.from(command, 'hex'), Buffer.from(response, 'hex')));
        decoded.process(state);
        return decoded;
    };

    beforeEach(() => {
        state = new RuntimeState(profile);
    });

    it('should decode a successful 3G authentication', () => {
        run('00a4040407a0000000871002');
        const response =
            'db' + '08' + '11'.repeat(8) + '10' + '22'.repeat(16) + '10' + '33'.repeat(16) + '08' + '44'.repeat(8);
        const auth = run(`0088008122` + `10${RAND}` + `10${AUTN}`, response + '9000');
        assert.strictEqual(auth.name, 'AUTHENTICATE');
        assert.strictEqual(
            auth.processed,
            'ADF_USIM {"context":"3g",' +
                `"rand":"${RAND}","autn":"${AUTN}","outcome":"successful",` +
                `"res":"${'11'.repeat(8)}","ck":"${'22'.repeat(16)}","ik":"${'33'.repeat(16)}","kc":"${'44'.repeat(8)}"}`
        );
    });

    it('should decode a synchronisation failure', () => {
        run('00a4040407a0000000871002');
        const auth = run(`0088008122` + `10${RAND}` + `10${AUTN}`, 'dc0e' + '55'.repeat(14) + '9000');
        assert.deepStrictEqual(auth.fields, {
            context: '3g',
            rand: Buffer.from(RAND, 'hex'),
            autn: Buffer.from(AUTN, 'hex'),
            outcome: 'sync_failure',
            auts: Buffer.from('55'.repeat(14), 'hex'),
        });
    });

    it('should decode the GSM context without an application', () => {
        const auth = run(`0088008011` + `10${RAND}`, '04aabbccdd' + '080102030405060708' + '9000');
        assert.strictEqual(
            auth.processed,
            `no application {"context":"gsm","rand":"${RAND}","sres":"aabbccdd","kc":"0102030405060708"}`
        );
    });

    it('should degrade on malformed challenge data', () => {
        const auth = run('0088008003100102');
        assert.strictEqual(auth.degraded, true);
        assert.strictEqual(auth.processed, 'decode error: LV of 16 bytes at offset 0 exceeds the data [0088008003100102]');
    });
});
