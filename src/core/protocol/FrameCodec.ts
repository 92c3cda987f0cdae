// src/core/protocol/FrameCodec.ts

/**
 * Length-prefixed framing, big-endian:
 *
 *   request_id (u32) | payload_length (u32) | payload
 *
 * Requests and responses share the layout; a response echoes the request id.
 */

import { ErrorFactory } from '../errors';

export const FRAME_HEADER_BYTES = 8;
export const MAX_U32 = 0xffff_ffff;

export interface Frame {
    requestId: number;
    payload: Uint8Array;
}

export function encodeFrame(requestId: number, payload: Uint8Array): Buffer {
    if (!Number.isInteger(requestId) || requestId < 0 || requestId > MAX_U32) {
        throw ErrorFactory.transport(`Invalid request id: ${requestId}`, { operation: 'encodeFrame' });
    }
    if (payload.length > MAX_U32) {
        throw ErrorFactory.transport('Frame too large for u32 length prefix', { operation: 'encodeFrame' });
    }

    const frame = Buffer.alloc(FRAME_HEADER_BYTES + payload.length);
    frame.writeUInt32BE(requestId, 0);
    frame.writeUInt32BE(payload.length, 4);
    frame.set(payload, FRAME_HEADER_BYTES);
    return frame;
}

/**
 * Yields frames from a chunked byte stream in arrival order.
 *
 * Ends quietly on EOF at a frame boundary; EOF anywhere else, or a declared
 * length above `maxPayloadBytes`, throws a TransportError.
 */
export async function* readFrames(
    source: AsyncIterable<Uint8Array>,
    maxPayloadBytes: number = MAX_U32
): AsyncGenerator<Frame, void, undefined> {
    let buf: Buffer = Buffer.alloc(0);

    for await (const chunk of source) {
        buf = buf.length === 0 ? Buffer.from(chunk) : Buffer.concat([buf, chunk]);

        while (buf.length >= FRAME_HEADER_BYTES) {
            const requestId = buf.readUInt32BE(0);
            const payloadLength = buf.readUInt32BE(4);

            if (payloadLength > maxPayloadBytes) {
                throw ErrorFactory.transport(
                    `Frame payload of ${payloadLength} bytes exceeds limit of ${maxPayloadBytes}`,
                    { operation: 'readFrames', details: { requestId } }
                );
            }

            const needed = FRAME_HEADER_BYTES + payloadLength;
            if (buf.length < needed) break;

            const payload = new Uint8Array(buf.subarray(FRAME_HEADER_BYTES, needed));
            buf = buf.subarray(needed);
            yield { requestId, payload };
        }
    }

    if (buf.length === 0) return;

    if (buf.length < FRAME_HEADER_BYTES) {
        throw ErrorFactory.transport(
            `Truncated frame header: got ${buf.length} of ${FRAME_HEADER_BYTES} bytes`,
            { operation: 'readFrames' }
        );
    }
    const requestId = buf.readUInt32BE(0);
    const payloadLength = buf.readUInt32BE(4);
    throw ErrorFactory.transport(
        `Truncated frame payload: got ${buf.length - FRAME_HEADER_BYTES} of ${payloadLength} bytes`,
        { operation: 'readFrames', details: { requestId } }
    );
}
