/**
 * Unit Tests: Profile Type Engine facade
 *
 * Exercises the operations through the public exports, including the
 * support status gate and error sanitization.
 *
 * @see libs/engine/profileTypeEngine.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
    EngineResult,
    ProfileSpec,
    ProfileTypeEngine,
    ProfileTypeError,
    RegistryHolder,
    SchemaRegistry,
    defineProfileType
} from '../../libs/engine/index.js';
import { HEAT_STACK_DEFAULTS, loadHeatStackDefinition } from '../fixtures/heatStack.js';

function expectSuccess<T>(result: EngineResult<T>): { value: T; warnings: readonly string[] } {
    if (!result.success) {
        throw new assert.AssertionError({ message: `expected success, got ${result.error.message}` });
    }
    return result;
}

function expectFailure<T>(result: EngineResult<T>): ProfileTypeError {
    if (result.success) {
        throw new assert.AssertionError({ message: 'expected failure' });
    }
    return result.error;
}

const lifecycleType = defineProfileType({
    typeName: 'test.lifecycle',
    version: '1.0',
    fields: { size: { type: 'Integer', default: 1, updatable: true } },
    supportStatus: [
        { status: 'SUPPORTED', since: '2016.04' },
        { status: 'DEPRECATED', since: '2017.10' },
        { status: 'UNSUPPORTED', since: '2018.08' }
    ]
});

function catalog(): SchemaRegistry {
    const registry = new SchemaRegistry();
    registry.registerDefinition(loadHeatStackDefinition());
    registry.register(lifecycleType);
    return registry;
}

describe('ProfileTypeEngine', () => {
    describe('validate', () => {
        it('should return the normalized spec', () => {
            const engine = new ProfileTypeEngine(catalog());

            const { value, warnings } = expectSuccess(engine.validate('os.heat.stack', '1.0', { timeout: '30' }));

            assert.deepStrictEqual(value.properties, { ...HEAT_STACK_DEFAULTS, timeout: 30 });
            assert.deepStrictEqual(warnings, []);
        });

        it('should return errors from the taxonomy as failed results', () => {
            const engine = new ProfileTypeEngine(catalog());

            assert.strictEqual(expectFailure(engine.validate('os.nova.server', '1.0', {})).code, 'UNKNOWN_SCHEMA');
            assert.strictEqual(expectFailure(engine.validate('os.heat.stack', '1.0', { bogus: 1 })).code, 'UNKNOWN_FIELD');
            assert.strictEqual(expectFailure(engine.validate('os.heat.stack', '1.0', { timeout: 'soon' })).code, 'TYPE_MISMATCH');
        });

        it('should validate against the latest version', () => {
            const engine = new ProfileTypeEngine(catalog());

            const { value } = expectSuccess(engine.validateLatest('os.heat.stack', {}));

            assert.strictEqual(value.version, '1.0');
        });
    });

    describe('authorizeUpdate', () => {
        const engine = new ProfileTypeEngine(catalog());
        const current: ProfileSpec = expectSuccess(engine.validate('os.heat.stack', '1.0', {})).value;

        it('should coerce the patch and merge it', () => {
            const { value } = expectSuccess(engine.authorizeUpdate('os.heat.stack', '1.0', current, { timeout: '45' }));

            assert.strictEqual(value.properties.timeout, 45);
        });

        it('should leave the caller\'s patch unfrozen', () => {
            const patch = { parameters: { flavor: 'm1.small' } };

            const { value } = expectSuccess(engine.authorizeUpdate('os.heat.stack', '1.0', current, patch));

            assert.strictEqual(Object.isFrozen(patch.parameters), false);
            assert.notStrictEqual(value.properties.parameters, patch.parameters);
            assert.deepStrictEqual(value.properties.parameters, { flavor: 'm1.small' });
        });

        it('should refuse a non-updatable change', () => {
            const error = expectFailure(engine.authorizeUpdate('os.heat.stack', '1.0', current, { context: { a: 1 } }));

            assert.strictEqual(error.code, 'IMMUTABLE_FIELD_CHANGED');
        });

        it('should type-check the patch first', () => {
            const error = expectFailure(engine.authorizeUpdate('os.heat.stack', '1.0', current, { disable_rollback: 'no' }));

            assert.strictEqual(error.code, 'TYPE_MISMATCH');
        });
    });

    describe('resolveSupport', () => {
        it('should resolve without a configured release', () => {
            const engine = new ProfileTypeEngine(catalog());

            const { value } = expectSuccess(engine.resolveSupport('test.lifecycle', '1.0', '2018.01'));

            assert.deepStrictEqual(value, { status: 'DEPRECATED', since: '2017.10' });
            assert.strictEqual(expectFailure(engine.resolveSupport('os.heat.stack', '1.0', '2015.01')).code, 'UNSUPPORTED_VERSION');
        });
    });

    describe('Support status gate', () => {
        it('should warn about a deprecated version', () => {
            const engine = new ProfileTypeEngine(catalog(), { currentRelease: '2018.01' });

            const { warnings } = expectSuccess(engine.validate('test.lifecycle', '1.0', {}));

            assert.deepStrictEqual(warnings, ['Profile type test.lifecycle-1.0 is DEPRECATED since 2017.10']);
        });

        it('should only warn about an unsupported version by default', () => {
            const engine = new ProfileTypeEngine(catalog(), { currentRelease: '2019.01' });

            const { warnings } = expectSuccess(engine.validate('test.lifecycle', '1.0', {}));

            assert.deepStrictEqual(warnings, ['Profile type test.lifecycle-1.0 is UNSUPPORTED since 2018.08']);
        });

        it('should refuse an unsupported version under the fatal policy', () => {
            const engine = new ProfileTypeEngine(catalog(), { currentRelease: '2019.01', unsupportedPolicy: 'fatal' });

            const error = expectFailure(engine.validate('test.lifecycle', '1.0', {}));

            assert.strictEqual(error.code, 'UNSUPPORTED_VERSION');
            assert.strictEqual(
                error.message,
                'Profile type test.lifecycle-1.0 is not usable at release 2019.01: UNSUPPORTED since 2018.08'
            );
        });

        it('should refuse a version used before its first release', () => {
            const engine = new ProfileTypeEngine(catalog(), { currentRelease: '2015.01' });

            assert.strictEqual(expectFailure(engine.validate('os.heat.stack', '1.0', {})).code, 'UNSUPPORTED_VERSION');
        });

        it('should not warn about a supported version', () => {
            const engine = new ProfileTypeEngine(catalog(), { currentRelease: '2017.01' });

            assert.deepStrictEqual(expectSuccess(engine.validate('test.lifecycle', '1.0', {})).warnings, []);
        });
    });

    describe('register', () => {
        it('should register into an open registry', () => {
            const engine = new ProfileTypeEngine(new SchemaRegistry());

            expectSuccess(engine.register(lifecycleType));

            assert.strictEqual(engine.registry().lookup('test.lifecycle', '1.0'), lifecycleType);
        });

        it('should report a sealed snapshot', () => {
            const engine = new ProfileTypeEngine(new RegistryHolder(new SchemaRegistry()));

            assert.strictEqual(expectFailure(engine.register(lifecycleType)).code, 'REGISTRY_SEALED');
            assert.strictEqual(expectFailure(engine.registerDefinition(loadHeatStackDefinition())).code, 'REGISTRY_SEALED');
        });

        it('should report an invalid definition document', () => {
            const engine = new ProfileTypeEngine(new SchemaRegistry());

            assert.strictEqual(expectFailure(engine.registerDefinition({ type_name: 'x' })).code, 'INVALID_SCHEMA');
        });
    });

    describe('Registry snapshots', () => {
        it('should read the snapshot in effect', async () => {
            const holder = new RegistryHolder(new SchemaRegistry());
            const engine = new ProfileTypeEngine(holder);

            assert.strictEqual(expectFailure(engine.validate('os.heat.stack', '1.0', {})).code, 'UNKNOWN_SCHEMA');

            await holder.replace(catalog);

            expectSuccess(engine.validate('os.heat.stack', '1.0', {}));
        });
    });

    describe('Unexpected failures', () => {
        it('should wrap them into an internal error with an incident id', () => {
            class BrokenRegistry extends SchemaRegistry {
                lookup(): never {
                    throw new TypeError('index corrupted');
                }
            }
            const engine = new ProfileTypeEngine(new BrokenRegistry());

            const error = expectFailure(engine.validate('os.heat.stack', '1.0', {}));

            assert.strictEqual(error.code, 'ENGINE_INTERNAL');
            assert.match(error.message, /^An internal error occurred in ProfileTypeEngine\.validate\. Incident ID: [0-9a-f-]{36}$/);
            assert.ok(!error.message.includes('index corrupted'));
        });
    });
});
