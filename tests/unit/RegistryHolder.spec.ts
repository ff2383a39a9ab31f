/**
 * Unit Tests: Registry snapshot holder
 *
 * @see libs/registry/registryHolder.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { RegistryHolder } from '../../libs/registry/registryHolder.js';
import { SchemaRegistry } from '../../libs/registry/schemaRegistry.js';
import { defineProfileType } from '../../libs/schema/profileTypeSchema.js';

function registryWith(...versions: string[]): SchemaRegistry {
    const registry = new SchemaRegistry();
    for (const version of versions) {
        registry.register(defineProfileType({
            typeName: 'test.widget',
            version,
            fields: {},
            supportStatus: [{ status: 'SUPPORTED', since: '2016.04' }]
        }));
    }
    return registry;
}

describe('RegistryHolder', () => {
    it('should seal the initial registry', () => {
        const holder = new RegistryHolder(registryWith('1.0'));

        assert.ok(holder.current().isSealed);
        assert.strictEqual(holder.currentGeneration, 1);
    });

    it('should swap in a sealed replacement', async () => {
        const holder = new RegistryHolder(registryWith('1.0'));
        const before = holder.current();

        const next = await holder.replace(() => registryWith('1.0', '1.1'));

        assert.strictEqual(holder.current(), next);
        assert.ok(next.isSealed);
        assert.strictEqual(holder.currentGeneration, 2);
        // a snapshot taken earlier is unaffected
        assert.strictEqual(before.size, 1);
        assert.strictEqual(next.lookupLatest('test.widget').version, '1.1');
    });

    it('should keep the current snapshot when the builder fails', async () => {
        const holder = new RegistryHolder(registryWith('1.0'));
        const before = holder.current();

        await assert.rejects(holder.replace(() => {
            throw new Error('definition directory missing');
        }), /definition directory missing/);

        assert.strictEqual(holder.current(), before);
        assert.strictEqual(holder.currentGeneration, 1);
    });

    it('should run replacements one at a time in call order', async () => {
        const holder = new RegistryHolder(registryWith('1.0'));
        const events: string[] = [];

        const slow = holder.replace(async () => {
            events.push('slow:start');
            await new Promise(resolve => setTimeout(resolve, 20));
            events.push('slow:end');
            return registryWith('1.0', '1.1');
        });
        const fast = holder.replace(() => {
            events.push('fast:start');
            return registryWith('1.0', '1.1', '1.2');
        });

        await Promise.all([slow, fast]);

        assert.deepStrictEqual(events, ['slow:start', 'slow:end', 'fast:start']);
        assert.strictEqual(holder.current().size, 3);
        assert.strictEqual(holder.currentGeneration, 3);
    });

    it('should keep serving after a failed replacement', async () => {
        const holder = new RegistryHolder(registryWith('1.0'));

        const failed = holder.replace(() => Promise.reject(new Error('bad definition')));
        const next = holder.replace(() => registryWith('2.0'));

        await assert.rejects(failed);
        assert.strictEqual(await next, holder.current());
        assert.strictEqual(holder.currentGeneration, 2);
    });
});
