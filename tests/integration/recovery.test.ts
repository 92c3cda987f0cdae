// tests/integration/recovery.test.ts

import fs from 'fs';
import net from 'net';
import path from 'path';
import { RpcClient } from '../../src/client/RpcClient';
import { Logger } from '../../src/core/logging/Logger';
import { Module } from '../../src/core/modules/Module';
import { RpcServer, ServerState } from '../../src/core/server/RpcServer';
import { InitializedKey } from '../../src/modules/test';
import { buildRegistry, createSlowModule, delay, removeDir, tempSocketPath, waitFor } from '../helpers/test-utils';

function createHookModule(events: string[]): Module {
    return new Module('hooks', 'HookRecorder')
        .onStart(() => {
            events.push('start');
        })
        .onShutdown(() => {
            events.push('shutdown');
        });
}

describe('RpcServer recovery', () => {
    let dir: string;
    let socketPath: string;

    beforeEach(() => {
        ({ dir, socketPath } = tempSocketPath());
    });

    afterEach(() => {
        removeDir(dir);
    });

    it('should keep retrying a failed bind until the path becomes usable', async () => {
        const nested = path.join(dir, 'later');
        const server = new RpcServer(buildRegistry(), {
            socketPath: path.join(nested, 'rpc.sock'),
            restartBackoffMs: 50
        });
        const running = server.start();

        await waitFor(() => server.getRestartCount() >= 2, 5000, 'repeated bind failures');
        fs.mkdirSync(nested);
        await waitFor(() => server.getState() === ServerState.SERVING, 5000, 'server to serve');

        const client = await RpcClient.connect(server.getSocketPath());
        const response = await client.call('test_module', 'test_function', { value: 3 });
        expect(response.data).toEqual({ result: 6 });

        await client.close();
        await server.stop();
        await running;
        expect(server.getState()).toBe(ServerState.STOPPED);
    });

    it('should rebind after a listener error without rerunning start hooks', async () => {
        const events: string[] = [];
        const listeners: net.Server[] = [];
        const server = new RpcServer(buildRegistry(createHookModule(events)), {
            socketPath,
            restartBackoffMs: 50,
            createListener: onConnection => {
                const listener = net.createServer(onConnection);
                listeners.push(listener);
                return listener;
            }
        });
        const running = server.start();
        await waitFor(() => server.getState() === ServerState.SERVING, 5000, 'server to serve');

        listeners[0].emit('error', new Error('listener exploded'));

        await waitFor(() => listeners.length === 2 && server.getState() === ServerState.SERVING, 5000, 'rebind');
        expect(server.getRestartCount()).toBe(1);
        expect(events).toEqual(['start']);

        const client = await RpcClient.connect(socketPath);
        const response = await client.call('test_module', 'test_function', { value: 8 });
        expect(response.data).toEqual({ result: 16 });

        await client.close();
        await server.stop();
        await running;
        expect(events).toEqual(['start', 'shutdown']);
    });

    it('should stop promptly while waiting out a long backoff', async () => {
        const events: string[] = [];
        const server = new RpcServer(buildRegistry(createHookModule(events)), {
            socketPath: path.join(dir, 'missing', 'rpc.sock'),
            restartBackoffMs: 60_000
        });
        const running = server.start();
        await waitFor(() => server.getState() === ServerState.CRASHED, 5000, 'crash');

        const stoppedAt = Date.now();
        await server.stop();
        await running;

        expect(Date.now() - stoppedAt).toBeLessThan(2000);
        expect(server.getState()).toBe(ServerState.STOPPED);
        expect(events).toEqual(['start', 'shutdown']);
    });

    it('should replace a stale file left at the socket path', async () => {
        fs.writeFileSync(socketPath, 'stale');
        const server = new RpcServer(buildRegistry(), { socketPath });
        const running = server.start();
        await waitFor(() => server.getState() === ServerState.SERVING, 5000, 'server to serve');

        const client = await RpcClient.connect(socketPath);
        const response = await client.call('test_module', 'test_function', { value: 1 });
        expect(response.ok).toBe(true);
        expect(server.getRestartCount()).toBe(0);

        await client.close();
        await server.stop();
        await running;
    });

    it('should let in-flight requests finish before shutdown hooks run', async () => {
        const events: string[] = [];
        const registry = buildRegistry(
            createSlowModule(tag => events.push(`finished:${tag}`)),
            createHookModule(events)
        );
        const server = new RpcServer(registry, { socketPath, drainTimeoutMs: 5000 });
        const running = server.start();
        await waitFor(() => server.getState() === ServerState.SERVING, 5000, 'server to serve');

        const client = await RpcClient.connect(socketPath);
        const pending = client.call('slow', 'sleep', { ms: 300, tag: 'drain' });
        await waitFor(() => server.getInflightCount() === 1, 2000, 'request to be in flight');

        await server.stop();
        await running;

        expect(events).toEqual(['start', 'finished:drain', 'shutdown']);
        expect(registry.getModule('test_module')?.getContext(InitializedKey)).toBe(false);
        expect((await pending).data).toEqual({ tag: 'drain' });
        await client.close();
    });

    it('should refuse requests that arrive while draining and still wait for running ones', async () => {
        const events: string[] = [];
        const errorSpy = jest.spyOn(Logger, 'error');
        const server = new RpcServer(
            buildRegistry(createSlowModule(tag => events.push(`finished:${tag}`)), createHookModule(events)),
            { socketPath, drainTimeoutMs: 5000 }
        );
        const running = server.start();
        await waitFor(() => server.getState() === ServerState.SERVING, 5000, 'server to serve');

        try {
            const client = await RpcClient.connect(socketPath);
            const early = client.call('slow', 'sleep', { ms: 300, tag: 'early' }, 'o-early');
            await waitFor(() => server.getInflightCount() === 1, 2000, 'request to be in flight');

            const stopping = server.stop();
            await delay(50);
            const late = client.call('slow', 'sleep', { ms: 400, tag: 'late' }, 'o-late');

            await stopping;
            await running;

            expect(events).toEqual(['start', 'finished:early', 'shutdown']);
            expect((await early).data).toEqual({ tag: 'early' });
            expect(await late).toEqual({
                ok: false,
                unified_msg_origin: 'o-late',
                data: null,
                error_message: 'Server is shutting down'
            });
            expect(errorSpy).not.toHaveBeenCalledWith('Connection', 'Read loop failed', expect.anything(), expect.anything());
            await client.close();
        } finally {
            errorSpy.mockRestore();
        }
    });
});
