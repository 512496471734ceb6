import { describe, it } from 'node:test';
import assert from 'node:assert';
import { buildCardProfile, CardADF, CardDF, CardEF, emptyProfile, loadDefaultProfile } from './card-profile.js';
import { ProfileError } from './errors.js';

describe('card profile', () => {
    describe('loadDefaultProfile', () => {
        const profile = loadDefaultProfile();

        it('should load the bundled UICC profile', () => {
            assert.strictEqual(profile.name, 'UICC-SIM with USIM and ISIM');
            assert.strictEqual(profile.mf.fid, '3F00');
            assert.deepStrictEqual(
                profile.mf.applications.map((app) => app.name),
                ['ADF_USIM', 'ADF_ISIM']
            );
        });

        it('should link files to their parents', () => {
            const telecom = profile.mf.childByFid('7F10');
            assert.ok(telecom instanceof CardDF);
            const adn = telecom.childByFid('6f3a');
            assert.ok(adn instanceof CardEF);
            assert.strictEqual(adn.fullyQualifiedPathStr(), 'MF/DF_TELECOM/EF_ADN');
            assert.strictEqual(adn.structure, 'linear_fixed');
            assert.strictEqual(adn.decoder, 'dialling-number');
            assert.strictEqual(adn.currentDf(), telecom);
        });

        it('should find EFs by short file identifier', () => {
            const usim = profile.mf.childByName('ADF_USIM');
            assert.ok(usim instanceof CardADF);
            assert.strictEqual(usim.childBySfid(7)?.name, 'EF_IMSI');
            assert.strictEqual(usim.childBySfid(29), undefined);
        });

        it('should find applications by partial or extended AID', () => {
            assert.strictEqual(profile.mf.applicationByAid('A0000000871002')?.name, 'ADF_USIM');
            assert.strictEqual(profile.mf.applicationByAid('a000000087')?.name, 'ADF_USIM');
            assert.strictEqual(profile.mf.applicationByAid('a0000000871004ff49ff89')?.name, 'ADF_ISIM');
            assert.strictEqual(profile.mf.applicationByAid('a0000000091234'), undefined);
            assert.strictEqual(profile.mf.applicationByAid(''), undefined);
        });
    });

    describe('buildCardProfile', () => {
        it('should build a minimal profile', () => {
            const profile = buildCardProfile({
                name: 'mini',
                mf: {
                    children: [
                        { type: 'EF', name: 'EF_ICCID', fid: '2fe2', structure: 'transparent', decoder: 'iccid' },
                        { type: 'DF', name: 'DF_X', fid: '7f99', children: [] },
                    ],
                },
                applications: [{ name: 'ADF_TEST', aid: 'a000000001', children: [] }],
            });
            assert.strictEqual(profile.mf.children.length, 3);
            assert.strictEqual(profile.mf.childByFid('2FE2')?.fullyQualifiedPathStr(), 'MF/EF_ICCID');
            assert.strictEqual(profile.mf.child('DF_X')?.fid, '7F99');
        });

        it('should reject a non-object', () => {
            assert.throws(() => buildCardProfile([]), {
                name: 'ProfileError',
                message: 'Card profile must be a JSON object',
            });
        });

        it('should reject invalid FIDs', () => {
            assert.throws(
                () =>
                    buildCardProfile({
                        name: 'bad',
                        mf: { children: [{ type: 'EF', name: 'EF_X', fid: '2F', structure: 'transparent' }] },
                    }),
                { message: "MF/EF_X: invalid FID '2F'" }
            );
        });

        it('should reject unknown structures and decoders', () => {
            assert.throws(
                () =>
                    buildCardProfile({
                        name: 'bad',
                        mf: { children: [{ type: 'EF', name: 'EF_X', fid: '2F00', structure: 'tree' }] },
                    }),
                { message: "MF/EF_X: unknown structure 'tree'" }
            );
            assert.throws(
                () =>
                    buildCardProfile({
                        name: 'bad',
                        mf: {
                            children: [
                                { type: 'EF', name: 'EF_X', fid: '2F00', structure: 'transparent', decoder: 'nope' },
                            ],
                        },
                    }),
                ProfileError
            );
        });

        it('should reject duplicate FIDs in one DF', () => {
            assert.throws(
                () =>
                    buildCardProfile({
                        name: 'bad',
                        mf: {
                            children: [
                                { type: 'EF', name: 'EF_A', fid: '2F00', structure: 'transparent' },
                                { type: 'EF', name: 'EF_B', fid: '2f00', structure: 'transparent' },
                            ],
                        },
                    }),
                { message: 'MF already contains a file with FID 2F00' }
            );
        });

        it('should reject malformed AIDs', () => {
            assert.throws(
                () => buildCardProfile({ name: 'bad', mf: {}, applications: [{ name: 'ADF_X', aid: 'a0' }] }),
                { message: 'ADF_X: AID must be 5-16 bytes of hex' }
            );
        });
    });

    it('should provide an empty profile', () => {
        const profile = emptyProfile();
        assert.strictEqual(profile.mf.children.length, 0);
        assert.strictEqual(profile.mf.fullyQualifiedPathStr(), 'MF');
    });
});
