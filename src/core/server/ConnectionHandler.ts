import net from 'net';
import { Mutex } from 'async-mutex';
import { v4 as uuidv4 } from 'uuid';
import { Dispatcher } from '../dispatch/Dispatcher';
import { TransportError, getErrorMessage } from '../errors';
import { Logger } from '../logging/Logger';
import { Frame, encodeFrame, readFrames } from '../protocol/FrameCodec';
import {
    CallResponse,
    decodePayload,
    encodeCallResponse,
    failureResponse,
    parseCallRequest,
    peekOrigin
} from '../protocol/envelope';

export enum ConnectionState {
    READING = 'READING',
    DRAINING = 'DRAINING',
    CLOSED = 'CLOSED',
}

export const SHUTTING_DOWN_MESSAGE = 'Server is shutting down';

export interface ConnectionHandlerOptions {
    maxPayloadBytes: number;
    /** Called with every spawned dispatch task so the server can drain them. */
    trackTask?: (task: Promise<void>) => void;
}

/**
 * Serves one accepted socket.
 *
 * The read loop never waits for a dispatch: each frame becomes its own task,
 * so responses may leave in any order. Writes share one mutex per connection
 * so two finishing tasks cannot interleave their frames.
 */
export class ConnectionHandler {
    public readonly id: string = uuidv4();
    private state: ConnectionState = ConnectionState.READING;
    private readonly writeMutex: Mutex = new Mutex();
    private droppedWriteLogged = false;

    constructor(
        private readonly socket: net.Socket,
        private readonly dispatcher: Dispatcher,
        private readonly options: ConnectionHandlerOptions
    ) {
        // Write-side failures surface here after the read loop is gone.
        socket.on('error', (error: Error) => {
            Logger.debug('Connection', `Socket error: ${error.message}`, { connectionId: this.id });
        });
    }

    /**
     * Reads until the peer closes or the stream breaks. Never rejects.
     */
    public async run(): Promise<void> {
        Logger.debug('Connection', 'Accepted connection', { connectionId: this.id });

        try {
            for await (const frame of readFrames(this.socket, this.options.maxPayloadBytes)) {
                this.spawn(frame);
            }
            Logger.debug('Connection', 'Peer closed connection', { connectionId: this.id });
        } catch (error) {
            if (this.state === ConnectionState.CLOSED) {
                Logger.debug('Connection', `Read loop ended by close: ${getErrorMessage(error)}`, { connectionId: this.id });
            } else if (error instanceof TransportError) {
                Logger.warn('Connection', `Transport error: ${error.message}`, { connectionId: this.id });
            } else {
                Logger.error('Connection', 'Read loop failed', error, { connectionId: this.id });
            }
        } finally {
            this.close();
        }
    }

    /**
     * Frames read from now on are answered with a shutdown failure instead of
     * being dispatched. Tasks already running finish normally.
     */
    public stopDispatching(): void {
        if (this.state === ConnectionState.READING) {
            this.state = ConnectionState.DRAINING;
        }
    }

    /**
     * Tears down the socket. Tasks already spawned still finish; their writes are dropped.
     */
    public close(): void {
        if (this.state === ConnectionState.CLOSED) return;
        this.state = ConnectionState.CLOSED;
        this.socket.destroy();
    }

    private spawn(frame: Frame): void {
        const task = this.handleFrame(frame).catch((error: unknown) => {
            Logger.error('Connection', 'Request task failed', error, {
                connectionId: this.id,
                requestId: frame.requestId
            });
        });
        this.options.trackTask?.(task);
    }

    private async handleFrame(frame: Frame): Promise<void> {
        const response = this.state === ConnectionState.READING
            ? await this.respond(frame)
            : this.refuse(frame);
        await this.write(frame.requestId, response);
    }

    private refuse(frame: Frame): CallResponse {
        Logger.debug('Connection', 'Refusing request during shutdown', {
            connectionId: this.id,
            requestId: frame.requestId
        });
        let raw: unknown;
        try {
            raw = decodePayload(frame.payload);
        } catch (error) {
            Logger.debug('Connection', `Undecodable payload during shutdown: ${getErrorMessage(error)}`);
        }
        return failureResponse(peekOrigin(raw), SHUTTING_DOWN_MESSAGE);
    }

    private async respond(frame: Frame): Promise<CallResponse> {
        let raw: unknown;
        try {
            raw = decodePayload(frame.payload);
            const request = parseCallRequest(raw);
            return await this.dispatcher.dispatch(request, {
                requestId: frame.requestId,
                connectionId: this.id
            });
        } catch (error) {
            // Frame boundary is intact, so the caller still gets an answer.
            Logger.warn('Connection', `Rejected request: ${getErrorMessage(error)}`, {
                connectionId: this.id,
                requestId: frame.requestId
            });
            return failureResponse(peekOrigin(raw), getErrorMessage(error));
        }
    }

    private async write(requestId: number, response: CallResponse): Promise<void> {
        let bytes: Buffer;
        try {
            bytes = encodeFrame(requestId, encodeCallResponse(response));
        } catch (error) {
            Logger.error('Connection', 'Cannot encode response', error, { connectionId: this.id, requestId });
            bytes = encodeFrame(requestId, encodeCallResponse(
                failureResponse(response.unified_msg_origin, `Cannot encode response: ${getErrorMessage(error)}`)
            ));
        }

        await this.writeMutex.runExclusive(async () => {
            if (this.state === ConnectionState.CLOSED || this.socket.destroyed || !this.socket.writable) {
                this.logDroppedWrite(requestId);
                return;
            }

            try {
                await new Promise<void>((resolve, reject) => {
                    this.socket.write(bytes, (error?: Error | null) => (error ? reject(error) : resolve()));
                });
            } catch (error) {
                this.logDroppedWrite(requestId, error);
            }
        });
    }

    private logDroppedWrite(requestId: number, error?: unknown): void {
        if (this.droppedWriteLogged) return;
        this.droppedWriteLogged = true;
        Logger.warn('Connection', 'Connection gone, dropping response', {
            connectionId: this.id,
            requestId,
            error: error === undefined ? undefined : getErrorMessage(error)
        });
    }
}
