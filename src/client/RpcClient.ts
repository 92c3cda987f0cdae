import net from 'net';
import { ErrorFactory, RpcError, getErrorMessage } from '../core/errors';
import { Logger } from '../core/logging/Logger';
import { MAX_U32, encodeFrame, readFrames } from '../core/protocol/FrameCodec';
import { CallResponse, decodeCallResponse, encodeCallRequest } from '../core/protocol/envelope';

interface PendingCall {
    resolve: (response: CallResponse) => void;
    reject: (error: Error) => void;
}

export interface RpcClientOptions {
    maxPayloadBytes?: number;
}

/**
 * Multiplexing client for the local socket protocol.
 *
 * Many calls may be outstanding on one connection; each gets a request id
 * that is free until its response arrives.
 */
export class RpcClient {
    private readonly pending = new Map<number, PendingCall>();
    private nextId = 1;
    private closed = false;
    private readonly readLoop: Promise<void>;

    private constructor(private readonly socket: net.Socket, maxPayloadBytes: number) {
        this.readLoop = this.read(maxPayloadBytes);
    }

    public static connect(socketPath: string, options: RpcClientOptions = {}): Promise<RpcClient> {
        return new Promise((resolve, reject) => {
            const socket = net.createConnection({ path: socketPath });
            const onError = (error: Error) => {
                reject(ErrorFactory.transport(`Cannot connect to ${socketPath}: ${error.message}`));
            };
            socket.once('error', onError);
            socket.once('connect', () => {
                socket.off('error', onError);
                resolve(new RpcClient(socket, options.maxPayloadBytes ?? MAX_U32));
            });
        });
    }

    public call(
        moduleId: string,
        method: string,
        params: Record<string, unknown> = {},
        origin: string = ''
    ): Promise<CallResponse> {
        if (this.closed) {
            return Promise.reject(ErrorFactory.transport('Client connection is closed'));
        }

        let requestId: number;
        let frame: Buffer;
        try {
            requestId = this.allocateId();
            frame = encodeFrame(requestId, encodeCallRequest({
                module_id: moduleId,
                method,
                unified_msg_origin: origin,
                params
            }));
        } catch (error) {
            return Promise.reject(error);
        }

        return new Promise<CallResponse>((resolve, reject) => {
            this.pending.set(requestId, { resolve, reject });
            this.socket.write(frame, (error?: Error | null) => {
                if (error) {
                    this.fail(requestId, ErrorFactory.transport(`Write failed: ${error.message}`));
                }
            });
        });
    }

    public getPendingCount(): number {
        return this.pending.size;
    }

    public async close(): Promise<void> {
        if (!this.closed) {
            this.closed = true;
            this.socket.end();
        }
        await this.readLoop;
    }

    private allocateId(): number {
        for (let attempt = 0; attempt <= this.pending.size; attempt++) {
            const id = this.nextId;
            this.nextId = id >= MAX_U32 ? 0 : id + 1;
            if (!this.pending.has(id)) return id;
        }
        throw ErrorFactory.transport('No free request id');
    }

    private async read(maxPayloadBytes: number): Promise<void> {
        let reason: RpcError = ErrorFactory.transport('Connection closed');

        try {
            for await (const frame of readFrames(this.socket, maxPayloadBytes)) {
                const call = this.pending.get(frame.requestId);
                if (!call) {
                    Logger.warn('RpcClient', `Response for unknown request id ${frame.requestId}`);
                    continue;
                }
                this.pending.delete(frame.requestId);

                try {
                    call.resolve(decodeCallResponse(frame.payload));
                } catch (error) {
                    call.reject(error instanceof Error ? error : new Error(String(error)));
                }
            }
        } catch (error) {
            reason = error instanceof RpcError ? error : ErrorFactory.transport(getErrorMessage(error));
        } finally {
            this.closed = true;
            for (const id of Array.from(this.pending.keys())) {
                this.fail(id, reason);
            }
        }
    }

    private fail(requestId: number, error: Error): void {
        const call = this.pending.get(requestId);
        if (!call) return;
        this.pending.delete(requestId);
        call.reject(error);
    }
}
