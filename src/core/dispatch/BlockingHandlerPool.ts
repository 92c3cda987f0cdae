import { Worker } from 'worker_threads';
import { z } from 'zod';
import { ErrorFactory, HandlerError, getErrorMessage } from '../errors';
import { Logger } from '../logging/Logger';
import { BLOCKING_WORKER_SOURCE } from './workerSource';

export interface BlockingJob {
    file: string;
    exportName: string;
    params: unknown;
}

export interface BlockingPoolOptions {
    /** Maximum number of worker threads. */
    size: number;
    /** Deadline from the moment a worker takes the job; a worker that misses it is terminated. */
    timeoutMs: number;
}

export interface BlockingPoolSnapshot {
    workers: number;
    inflight: number;
    queued: number;
    closed: boolean;
}

const workerReplySchema = z.discriminatedUnion('ok', [
    z.object({ id: z.number(), ok: z.literal(true), result: z.unknown() }),
    z.object({
        id: z.number(),
        ok: z.literal(false),
        error: z.object({ name: z.string(), message: z.string() })
    }),
]);

interface WorkerSlot {
    worker: Worker;
    /** Job the worker is running; a worker takes one job at a time. */
    jobId: number | null;
}

interface QueuedJob {
    id: number;
    job: BlockingJob;
    resolve: (result: unknown) => void;
    reject: (error: HandlerError) => void;
}

interface RunningJob extends QueuedJob {
    timer: NodeJS.Timeout;
    slot: WorkerSlot;
}

/**
 * Runs synchronous handlers on worker threads so a slow one cannot stall the
 * event loop that serves every connection.
 *
 * Jobs wait in a queue until a worker is free. The timeout covers only the
 * time a job spends on its worker.
 */
export class BlockingHandlerPool {
    private readonly slots: WorkerSlot[] = [];
    private readonly queue: QueuedJob[] = [];
    private readonly running = new Map<number, RunningJob>();
    private jobCounter = 0;
    private closed = false;

    constructor(private readonly options: BlockingPoolOptions) {
        if (options.size < 1) {
            throw ErrorFactory.validation('Blocking pool size must be at least 1');
        }
    }

    public run(job: BlockingJob): Promise<unknown> {
        if (this.closed) {
            return Promise.reject(ErrorFactory.handler('Blocking handler pool is closed'));
        }

        const id = ++this.jobCounter;
        return new Promise<unknown>((resolve, reject) => {
            this.queue.push({ id, job, resolve, reject });
            this.pump();
        });
    }

    public getSnapshot(): BlockingPoolSnapshot {
        return {
            workers: this.slots.length,
            inflight: this.running.size,
            queued: this.queue.length,
            closed: this.closed,
        };
    }

    /**
     * Terminates all workers and fails whatever is queued or running.
     */
    public async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;

        for (const queued of this.queue.splice(0)) {
            queued.reject(ErrorFactory.handler('Blocking handler pool closed'));
        }
        for (const id of Array.from(this.running.keys())) {
            this.settle(id)?.reject(ErrorFactory.handler('Blocking handler pool closed'));
        }

        const slots = this.slots.splice(0);
        await Promise.all(slots.map(slot => this.terminate(slot)));
    }

    /**
     * Hands queued jobs to idle workers, spawning up to the pool size.
     */
    private pump(): void {
        while (!this.closed && this.queue.length > 0) {
            const slot = this.slots.find(candidate => candidate.jobId === null)
                ?? (this.slots.length < this.options.size ? this.spawn() : undefined);
            if (!slot) return;

            const next = this.queue.shift();
            if (!next) return;
            this.start(slot, next);
        }
    }

    private start(slot: WorkerSlot, queued: QueuedJob): void {
        const { id, job } = queued;
        const timer = setTimeout(() => {
            this.settle(id)?.reject(
                ErrorFactory.handler(`Blocking handler timed out after ${this.options.timeoutMs}ms`, {
                    operation: 'BlockingHandlerPool.run',
                    details: { file: job.file, exportName: job.exportName }
                })
            );
            this.retire(slot, 'terminated after a timeout');
        }, this.options.timeoutMs);

        slot.jobId = id;
        this.running.set(id, { ...queued, timer, slot });

        try {
            slot.worker.postMessage({ id, file: job.file, exportName: job.exportName, params: job.params });
        } catch (error) {
            this.settle(id)?.reject(ErrorFactory.handler(`Cannot send job to worker: ${getErrorMessage(error)}`));
            this.pump();
        }
    }

    private spawn(): WorkerSlot {
        const worker = new Worker(BLOCKING_WORKER_SOURCE, { eval: true });
        const slot: WorkerSlot = { worker, jobId: null };

        worker.on('message', (message: unknown) => this.onMessage(message));
        worker.on('error', (error: Error) => {
            Logger.error('BlockingHandlerPool', `Worker ${worker.threadId} crashed`, error);
            this.retire(slot, `crashed: ${error.message}`);
        });
        worker.on('exit', (code: number) => {
            if (this.slots.includes(slot)) {
                Logger.warn('BlockingHandlerPool', `Worker ${worker.threadId} exited unexpectedly`, { code });
                this.retire(slot, `exited with code ${code}`);
            }
        });
        // Idle workers must not keep the process alive; running jobs hold a timer.
        worker.unref();

        this.slots.push(slot);
        Logger.debug('BlockingHandlerPool', `Spawned worker ${worker.threadId}`, { workers: this.slots.length });
        return slot;
    }

    private onMessage(message: unknown): void {
        const parsed = workerReplySchema.safeParse(message);
        if (!parsed.success) {
            Logger.warn('BlockingHandlerPool', 'Dropping malformed worker reply');
            return;
        }

        const reply = parsed.data;
        const job = this.settle(reply.id);
        if (!job) return; // already timed out

        if (reply.ok) {
            job.resolve(reply.result);
        } else {
            job.reject(ErrorFactory.handler(reply.error.message, { details: { name: reply.error.name } }));
        }
        this.pump();
    }

    /**
     * Removes a running job from the books and frees its worker, once.
     */
    private settle(id: number): RunningJob | undefined {
        const job = this.running.get(id);
        if (!job) return undefined;

        clearTimeout(job.timer);
        this.running.delete(id);
        if (job.slot.jobId === id) {
            job.slot.jobId = null;
        }
        return job;
    }

    private retire(slot: WorkerSlot, reason: string): void {
        const index = this.slots.indexOf(slot);
        if (index === -1) return;
        this.slots.splice(index, 1);

        if (slot.jobId !== null) {
            this.settle(slot.jobId)?.reject(ErrorFactory.handler(`Blocking worker ${reason}`));
        }

        void this.terminate(slot);
        this.pump();
    }

    private async terminate(slot: WorkerSlot): Promise<void> {
        try {
            await slot.worker.terminate();
        } catch (error) {
            Logger.warn('BlockingHandlerPool', 'Worker terminate failed', { error: getErrorMessage(error) });
        }
    }
}
