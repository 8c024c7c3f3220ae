import { beforeEach, describe, expect, test } from '@jest/globals';
import { PracticeLogErrorCode } from '../errors';
import { TxScope } from '../ledger/TxScope';
import { ModerationStatus } from '../models/PracticeLogEntry';
import { PracticeLog, registryVerification } from '../practice/PracticeLog';
import { FarmerRegistry } from '../registry/FarmerRegistry';
import { MemoryLedger } from './support/MemoryLedger';

const OWNER = 'deployer';
const FEE = 1000000;

const registry = (scope: TxScope) => new FarmerRegistry(scope);
const practiceLog = (scope: TxScope) => new PracticeLog(scope, registryVerification(scope.state));

describe('registry and practice log on one ledger', () => {
    let ledger: MemoryLedger;

    const onboard = async (farmer: string) => {
        await ledger.submit(OWNER, (s) => registry(s).fundAccount(farmer, FEE));
        return ledger.submit(farmer, (s) => registry(s).register('John Doe', 'Rural Area', 100, 'Organic farm'));
    };

    beforeEach(async () => {
        ledger = new MemoryLedger();
        await ledger.submit(OWNER, (s) => registry(s).initialize(FEE));
        await ledger.submit(OWNER, (s) => practiceLog(s).initialize());
    });

    test('a farmer goes from registration to an approved practice', async () => {
        expect(await onboard('farmer1')).toEqual({ ok: true, value: 1 });

        expect(await ledger.submit(OWNER, (s) => registry(s).verify('farmer1', 'verified'))).toEqual({ ok: true, value: true });
        const profile = await ledger.evaluate((s) => registry(s).getProfile('farmer1'));
        expect(profile?.verificationStatus).toBe('verified');

        const logged = await ledger.submit('farmer1', (s) => practiceLog(s).log('Cover Cropping', 'Soil Health', 'Planted rye'));
        expect(logged).toEqual({ ok: true, value: 0 });

        const moderated = await ledger.submit(OWNER, (s) => practiceLog(s).moderate('farmer1', 0, 'approved', 'Good practice'));
        expect(moderated).toEqual({ ok: true, value: true });

        const entry = await ledger.evaluate((s) => practiceLog(s).getEntry('farmer1', 0));
        expect(entry?.moderationStatus).toBe(ModerationStatus.APPROVED);
    });

    test('pending and rejected farmers cannot log', async () => {
        await onboard('farmer1');
        const log = () => ledger.submit('farmer1', (s) => practiceLog(s).log('Composting', 'Waste', 'Started a compost pile'));

        expect(await log()).toEqual({ ok: false, error: PracticeLogErrorCode.NotVerified });

        await ledger.submit(OWNER, (s) => registry(s).verify('farmer1', 'rejected'));
        expect(await log()).toEqual({ ok: false, error: PracticeLogErrorCode.NotVerified });
    });

    test('concurrent submissions are applied one at a time', async () => {
        await ledger.submit(OWNER, (s) => registry(s).fundAccount('farmer1', FEE));
        await ledger.submit(OWNER, (s) => registry(s).fundAccount('farmer2', FEE));

        const ids = await Promise.all(['farmer1', 'farmer2'].map((farmer) =>
            ledger.submit(farmer, (s) => registry(s).register('Grower', 'Delta', 10, ''))));
        expect(ids).toEqual([{ ok: true, value: 1 }, { ok: true, value: 2 }]);

        await ledger.submit(OWNER, (s) => registry(s).verify('farmer1', 'verified'));
        const sequences = await Promise.all([0, 1, 2].map(() =>
            ledger.submit('farmer1', (s) => practiceLog(s).log('Mulching', 'Water', 'Straw mulch on beds'))));
        expect(sequences).toEqual([
            { ok: true, value: 0 },
            { ok: true, value: 1 },
            { ok: true, value: 2 },
        ]);
    });
});
