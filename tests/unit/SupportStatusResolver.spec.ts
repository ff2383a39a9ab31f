/**
 * Unit Tests: Support Status Resolver
 *
 * @see libs/support/supportStatusResolver.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { UnsupportedVersionError } from '../../libs/errors/profileErrors.js';
import { defineProfileType } from '../../libs/schema/profileTypeSchema.js';
import { SupportStatusEntry, supportStatusIndex } from '../../libs/schema/supportStatus.js';
import { resolveSupportStatus } from '../../libs/support/supportStatusResolver.js';
import { expectError } from '../fixtures/expectError.js';
import { heatStackSchema } from '../fixtures/heatStack.js';

function schemaWithLedger(supportStatus: SupportStatusEntry[]) {
    return defineProfileType({ typeName: 'test.ledger', version: '1.0', fields: {}, supportStatus });
}

const lifecycle = schemaWithLedger([
    { status: 'SUPPORTED', since: '2016.04' },
    { status: 'DEPRECATED', since: '2017.10' },
    { status: 'UNSUPPORTED', since: '2018.08' }
]);

describe('resolveSupportStatus', () => {
    it('should resolve the heat stack type as SUPPORTED after its first release', () => {
        const resolved = resolveSupportStatus(heatStackSchema(), '2017.01');

        assert.deepStrictEqual(resolved, { status: 'SUPPORTED', since: '2016.04' });
    });

    it('should fail for a release before the first entry', () => {
        const err = expectError(() => resolveSupportStatus(heatStackSchema(), '2015.01'), UnsupportedVersionError);

        assert.strictEqual(err.release, '2015.01');
        assert.strictEqual(
            err.message,
            'Profile type os.heat.stack-1.0 is not usable at release 2015.01: first available in release 2016.04'
        );
    });

    it('should apply an entry from its own release on', () => {
        assert.strictEqual(resolveSupportStatus(lifecycle, '2016.04').status, 'SUPPORTED');
        assert.strictEqual(resolveSupportStatus(lifecycle, '2017.09').status, 'SUPPORTED');
        assert.strictEqual(resolveSupportStatus(lifecycle, '2017.10').status, 'DEPRECATED');
        assert.strictEqual(resolveSupportStatus(lifecycle, '2018.08').status, 'UNSUPPORTED');
        assert.deepStrictEqual(resolveSupportStatus(lifecycle, '2030.01'), { status: 'UNSUPPORTED', since: '2018.08' });
    });

    it('should compare release segments numerically', () => {
        const ledger = schemaWithLedger([
            { status: 'SUPPORTED', since: '2017.2' },
            { status: 'DEPRECATED', since: '2017.10' }
        ]);

        assert.strictEqual(resolveSupportStatus(ledger, '2017.9').status, 'SUPPORTED');
        assert.strictEqual(resolveSupportStatus(ledger, '2017.10.1').status, 'DEPRECATED');
    });

    it('should never move back to an earlier status for a monotonic ledger', () => {
        const releases = ['2016.04', '2016.10', '2017.04', '2017.10', '2018.02', '2018.08', '2019.04'];
        let previous = -1;

        for (const release of releases) {
            const index = supportStatusIndex(resolveSupportStatus(lifecycle, release).status);
            assert.ok(index >= previous, `status went back at ${release}`);
            previous = index;
        }
    });

    it('should let a later entry bring an UNSUPPORTED version back', () => {
        const revived = schemaWithLedger([
            { status: 'SUPPORTED', since: '2016.04' },
            { status: 'UNSUPPORTED', since: '2017.04' },
            { status: 'SUPPORTED', since: '2018.04' }
        ]);

        assert.strictEqual(resolveSupportStatus(revived, '2017.06').status, 'UNSUPPORTED');
        assert.deepStrictEqual(resolveSupportStatus(revived, '2018.04'), { status: 'SUPPORTED', since: '2018.04' });
    });

    it('should reject a malformed release identifier', () => {
        for (const release of ['', 'latest', '2017.', '2017..04']) {
            const err = expectError(() => resolveSupportStatus(lifecycle, release), UnsupportedVersionError);
            assert.strictEqual(err.message, `Profile type test.ledger-1.0 is not usable at release ${release}: malformed release identifier`);
        }
    });
});
