import fs from 'fs';
import net from 'net';
import { CONFIG } from '../../config/config';
import { BlockingHandlerPool } from '../dispatch/BlockingHandlerPool';
import { Dispatcher } from '../dispatch/Dispatcher';
import { ErrorFactory, getErrorMessage } from '../errors';
import { Logger } from '../logging/Logger';
import { runLifecycleHooks } from '../modules/hooks';
import { ModuleRegistry } from '../modules/ModuleRegistry';
import { settlesWithin, sleep } from '../utils/timers';
import { ConnectionHandler } from './ConnectionHandler';

export enum ServerState {
    STOPPED,
    STARTING,
    SERVING,
    CRASHED,
    STOPPING,
}

export type ListenerFactory = (onConnection: (socket: net.Socket) => void) => net.Server;

export interface RpcServerOptions {
    socketPath: string;
    /** Fixed wait between a crash and the next bind attempt. */
    restartBackoffMs: number;
    /** Upper bound on waiting for in-flight requests during stop. */
    drainTimeoutMs: number;
    maxFrameBytes: number;
    blockingWorkers: number;
    blockingTimeoutMs: number;
    createListener: ListenerFactory;
}

const BANNER = `
#################################
#      Logic RPC Server         #
#################################`;

export function defaultServerOptions(): RpcServerOptions {
    return {
        socketPath: CONFIG.RPC.SOCKET_PATH,
        restartBackoffMs: CONFIG.RPC.RESTART_BACKOFF_MS,
        drainTimeoutMs: CONFIG.RPC.DRAIN_TIMEOUT_MS,
        maxFrameBytes: CONFIG.RPC.MAX_FRAME_BYTES,
        blockingWorkers: CONFIG.RPC.BLOCKING_WORKERS,
        blockingTimeoutMs: CONFIG.RPC.BLOCKING_TIMEOUT_MS,
        createListener: onConnection => net.createServer(onConnection),
    };
}

function bind(listener: net.Server, socketPath: string): Promise<void> {
    return new Promise((resolve, reject) => {
        const onError = (error: Error) => {
            reject(ErrorFactory.bind(`Cannot bind ${socketPath}: ${error.message}`, {
                operation: 'listen',
                details: { socketPath }
            }));
        };
        listener.once('error', onError);
        listener.listen(socketPath, () => {
            listener.off('error', onError);
            resolve();
        });
    });
}

/**
 * Unix-socket RPC server.
 *
 * `start()` runs start hooks, then binds and serves. A bind failure or a
 * listener error puts it in CRASHED; after a fixed backoff it binds again,
 * forever. Only `stop()` leaves the loop: it drains in-flight requests for a
 * bounded time, closes connections and runs shutdown hooks.
 */
export class RpcServer {
    private state: ServerState = ServerState.STOPPED;
    private restartCount: number = 0;
    private readonly options: RpcServerOptions;
    private readonly connections: Set<ConnectionHandler> = new Set();
    private readonly inflight: Set<Promise<void>> = new Set();
    private stopController: AbortController | null = null;
    private running: Promise<void> | null = null;

    constructor(private readonly registry: ModuleRegistry, options: Partial<RpcServerOptions> = {}) {
        this.options = { ...defaultServerOptions(), ...options };
    }

    /**
     * Resolves once the server has fully stopped.
     */
    public start(): Promise<void> {
        if (this.running) {
            Logger.warn('RpcServer', 'start() called while already running');
            return this.running;
        }

        const controller = new AbortController();
        this.stopController = controller;
        this.running = this.run(controller.signal).finally(() => {
            this.running = null;
            this.stopController = null;
        });
        return this.running;
    }

    /**
     * Explicit cancellation. Resolves after shutdown hooks have run.
     */
    public async stop(): Promise<void> {
        const running = this.running;
        if (!running || !this.stopController) return;

        Logger.info('RpcServer', 'Shutting down RPC Server...');
        this.stopController.abort();
        await running;
    }

    public getState(): ServerState {
        return this.state;
    }

    public getRestartCount(): number {
        return this.restartCount;
    }

    public getInflightCount(): number {
        return this.inflight.size;
    }

    public getSocketPath(): string {
        return this.options.socketPath;
    }

    private setState(next: ServerState): void {
        if (this.state === next) return;
        Logger.debug('RpcServer', `State ${ServerState[this.state]} -> ${ServerState[next]}`);
        this.state = next;
    }

    private async run(signal: AbortSignal): Promise<void> {
        const pool = new BlockingHandlerPool({
            size: this.options.blockingWorkers,
            timeoutMs: this.options.blockingTimeoutMs
        });
        const dispatcher = new Dispatcher(this.registry, pool);

        this.setState(ServerState.STARTING);
        await runLifecycleHooks('start', this.registry.listModules());

        while (!signal.aborted) {
            this.setState(ServerState.STARTING);
            try {
                await this.serve(signal, dispatcher);
            } catch (error) {
                if (signal.aborted) break;
                this.restartCount++;
                this.setState(ServerState.CRASHED);
                Logger.error(
                    'RpcServer',
                    `Serving failed, restarting in ${this.options.restartBackoffMs}ms: ${getErrorMessage(error)}`,
                    error,
                    { attempt: this.restartCount }
                );
                await sleep(this.options.restartBackoffMs, signal);
            }
        }

        this.setState(ServerState.STOPPING);
        for (const connection of this.connections) {
            connection.stopDispatching();
        }
        await this.drain();
        for (const connection of this.connections) {
            connection.close();
        }
        await runLifecycleHooks('shutdown', this.registry.listModules());
        await pool.close();

        this.setState(ServerState.STOPPED);
        Logger.info('RpcServer', 'RPC Server stopped');
    }

    /**
     * One bind-and-serve attempt. Returns on stop, rejects on failure.
     */
    private async serve(signal: AbortSignal, dispatcher: Dispatcher): Promise<void> {
        const socketPath = this.options.socketPath;

        // Stale socket from a previous run or crash.
        await fs.promises.rm(socketPath, { force: true });

        const listener = this.options.createListener(socket => this.accept(socket, dispatcher));
        listener.on('error', (error: Error) => {
            Logger.debug('RpcServer', `Listener error: ${error.message}`);
        });

        try {
            await bind(listener, socketPath);
            if (signal.aborted) return;

            this.setState(ServerState.SERVING);
            Logger.info('RpcServer', BANNER);
            Logger.info('RpcServer', `RPC Server started at ${socketPath}`);

            await new Promise<void>((resolve, reject) => {
                const onAbort = () => resolve();
                signal.addEventListener('abort', onAbort, { once: true });
                listener.once('error', (error: Error) => {
                    signal.removeEventListener('abort', onAbort);
                    reject(error);
                });
            });
        } finally {
            // Stops accepting at once; open connections keep running.
            listener.close();
        }
    }

    private accept(socket: net.Socket, dispatcher: Dispatcher): void {
        const connection = new ConnectionHandler(socket, dispatcher, {
            maxPayloadBytes: this.options.maxFrameBytes,
            trackTask: task => this.track(task)
        });
        this.connections.add(connection);
        void connection.run().finally(() => {
            this.connections.delete(connection);
        });
    }

    private track(task: Promise<void>): void {
        this.inflight.add(task);
        void task.finally(() => {
            this.inflight.delete(task);
        });
    }

    /**
     * Waits until no request task is left, or the drain deadline passes.
     * Refusals written while draining are tasks too, so the set is re-read.
     */
    private async drain(): Promise<void> {
        if (this.inflight.size === 0) return;

        Logger.info('RpcServer', `Waiting for ${this.inflight.size} in-flight request(s)`);
        const deadline = Date.now() + this.options.drainTimeoutMs;
        let drained = true;
        while (this.inflight.size > 0) {
            const remaining = deadline - Date.now();
            if (remaining <= 0 || !(await settlesWithin(Promise.allSettled(Array.from(this.inflight)), remaining))) {
                drained = false;
                break;
            }
        }
        if (!drained) {
            Logger.warn('RpcServer', `Drain timed out after ${this.options.drainTimeoutMs}ms`, {
                remaining: this.inflight.size
            });
        }
    }
}
