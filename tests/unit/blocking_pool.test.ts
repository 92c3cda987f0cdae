// tests/unit/blocking_pool.test.ts

import { BlockingHandlerPool } from '../../src/core/dispatch/BlockingHandlerPool';
import { HandlerError } from '../../src/core/errors';
import { FIXTURE_FILE } from '../helpers/test-utils';

describe('BlockingHandlerPool', () => {
    let pool: BlockingHandlerPool;

    beforeEach(() => {
        pool = new BlockingHandlerPool({ size: 2, timeoutMs: 2000 });
    });

    afterEach(async () => {
        await pool.close();
    });

    it('should run the named export on a worker thread', async () => {
        await expect(pool.run({ file: FIXTURE_FILE, exportName: 'sum', params: { values: [1, 2, 3.5] } }))
            .resolves.toEqual({ total: 6.5 });
        await expect(pool.run({ file: FIXTURE_FILE, exportName: 'threadInfo', params: {} }))
            .resolves.toEqual({ isMainThread: false });
    });

    it('should surface the thrown message as a HandlerError', async () => {
        const run = pool.run({ file: FIXTURE_FILE, exportName: 'fail', params: {} });

        await expect(run).rejects.toBeInstanceOf(HandlerError);
        await expect(run).rejects.toThrow('blocking failure');
    });

    it('should refuse exports that are not functions', async () => {
        await expect(pool.run({ file: FIXTURE_FILE, exportName: 'notAFunction', params: {} }))
            .rejects.toThrow(`Export 'notAFunction' of ${FIXTURE_FILE} is not a function`);
    });

    it('should spread concurrent jobs over separate workers', async () => {
        const first = pool.run({ file: FIXTURE_FILE, exportName: 'slowDouble', params: { value: 1, delayMs: 200 } });
        const second = pool.run({ file: FIXTURE_FILE, exportName: 'slowDouble', params: { value: 2, delayMs: 200 } });

        expect(pool.getSnapshot()).toEqual({ workers: 2, inflight: 2, queued: 0, closed: false });
        await expect(Promise.all([first, second])).resolves.toEqual([{ result: 2 }, { result: 4 }]);
        expect(pool.getSnapshot().inflight).toBe(0);
    });

    it('should queue jobs while every worker is busy without charging the wait to their deadline', async () => {
        const singlePool = new BlockingHandlerPool({ size: 1, timeoutMs: 1000 });
        try {
            const first = singlePool.run({ file: FIXTURE_FILE, exportName: 'slowDouble', params: { value: 1, delayMs: 700 } });
            const second = singlePool.run({ file: FIXTURE_FILE, exportName: 'slowDouble', params: { value: 2, delayMs: 700 } });

            expect(singlePool.getSnapshot()).toEqual({ workers: 1, inflight: 1, queued: 1, closed: false });
            await expect(Promise.all([first, second])).resolves.toEqual([{ result: 2 }, { result: 4 }]);
            expect(singlePool.getSnapshot()).toEqual({ workers: 1, inflight: 0, queued: 0, closed: false });
        } finally {
            await singlePool.close();
        }
    });

    it('should fail queued jobs when the pool closes', async () => {
        const singlePool = new BlockingHandlerPool({ size: 1, timeoutMs: 2000 });
        const running = singlePool.run({ file: FIXTURE_FILE, exportName: 'slowDouble', params: { value: 1, delayMs: 100 } });
        const queued = singlePool.run({ file: FIXTURE_FILE, exportName: 'sum', params: { values: [1] } });

        const runningRejected = expect(running).rejects.toThrow('Blocking handler pool closed');
        const queuedRejected = expect(queued).rejects.toThrow('Blocking handler pool closed');

        await singlePool.close();

        await runningRejected;
        await queuedRejected;
    });

    it('should time out a stuck handler and replace its worker', async () => {
        const shortPool = new BlockingHandlerPool({ size: 1, timeoutMs: 200 });
        try {
            await expect(shortPool.run({ file: FIXTURE_FILE, exportName: 'hang', params: {} }))
                .rejects.toThrow('Blocking handler timed out after 200ms');
            expect(shortPool.getSnapshot().workers).toBe(0);

            await expect(shortPool.run({ file: FIXTURE_FILE, exportName: 'sum', params: { values: [4] } }))
                .resolves.toEqual({ total: 4 });
        } finally {
            await shortPool.close();
        }
    });

    it('should reject work after close', async () => {
        await pool.close();

        expect(pool.getSnapshot().closed).toBe(true);
        await expect(pool.run({ file: FIXTURE_FILE, exportName: 'sum', params: { values: [] } }))
            .rejects.toThrow('Blocking handler pool is closed');
    });
});
