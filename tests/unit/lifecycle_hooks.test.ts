// tests/unit/lifecycle_hooks.test.ts

import { Module } from '../../src/core/modules/Module';
import { runLifecycleHooks } from '../../src/core/modules/hooks';
import { HookError } from '../../src/core/errors';
import { delay } from '../helpers/test-utils';

describe('Lifecycle hooks', () => {
    it('should run hooks in module order, then hook order', async () => {
        const calls: string[] = [];
        const first = new Module('first', 'First')
            .onStart(() => { calls.push('first:1'); })
            .onStart(async () => {
                await delay(20);
                calls.push('first:2');
            });
        const second = new Module('second', 'Second')
            .onStart(() => { calls.push('second:1'); });

        const failures = await runLifecycleHooks('start', [first, second]);

        expect(failures).toEqual([]);
        expect(calls).toEqual(['first:1', 'first:2', 'second:1']);
    });

    it('should collect failures and keep going', async () => {
        const calls: string[] = [];
        const broken = new Module('broken', 'Broken')
            .onShutdown(() => { throw new Error('disk gone'); })
            .onShutdown(() => { calls.push('broken:2'); });
        const healthy = new Module('healthy', 'Healthy')
            .onShutdown(async () => { throw 'plain string'; })
            .onShutdown(() => { calls.push('healthy:2'); });

        const failures = await runLifecycleHooks('shutdown', [broken, healthy]);

        expect(calls).toEqual(['broken:2', 'healthy:2']);
        expect(failures).toHaveLength(2);
        expect(failures[0]).toBeInstanceOf(HookError);
        expect(failures.map(f => f.message)).toEqual([
            'shutdown hook #0 of module broken failed: disk gone',
            'shutdown hook #0 of module healthy failed: plain string',
        ]);
        expect(failures[0].context.details).toEqual({ moduleId: 'broken', index: 0 });
    });

    it('should only run hooks of the requested phase', async () => {
        const calls: string[] = [];
        const module = new Module('phases', 'Phases')
            .onStart(() => { calls.push('start'); })
            .onShutdown(() => { calls.push('shutdown'); });

        await runLifecycleHooks('shutdown', [module]);

        expect(calls).toEqual(['shutdown']);
    });
});
