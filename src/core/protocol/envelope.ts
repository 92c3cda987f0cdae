// src/core/protocol/envelope.ts

import { z } from 'zod';
import { decode, encode } from '@msgpack/msgpack';
import { ErrorFactory, getErrorMessage } from '../errors';
import { formatZodIssues } from '../schema/schemas';

export const callRequestSchema = z.object({
    module_id: z.string(),
    method: z.string(),
    unified_msg_origin: z.string(),
    params: z.record(z.unknown()),
});

export const callResponseSchema = z.object({
    ok: z.boolean(),
    unified_msg_origin: z.string(),
    data: z.record(z.unknown()).nullable(),
    error_message: z.string(),
});

export type CallRequest = z.infer<typeof callRequestSchema>;
export type CallResponse = z.infer<typeof callResponseSchema>;

/**
 * MessagePack-encodes a payload map.
 */
export function encodePayload(value: unknown): Uint8Array {
    return encode(value);
}

/**
 * Decodes MessagePack bytes. The frame boundary is already known here, so a
 * bad payload is a per-request validation failure rather than a broken stream.
 */
export function decodePayload(bytes: Uint8Array): unknown {
    try {
        return decode(bytes);
    } catch (error) {
        throw ErrorFactory.validation(`Malformed payload: ${getErrorMessage(error)}`, {
            operation: 'decodePayload'
        });
    }
}

export function parseCallRequest(raw: unknown): CallRequest {
    const result = callRequestSchema.safeParse(raw);
    if (!result.success) {
        throw ErrorFactory.validation(`Invalid call request: ${formatZodIssues(result.error)}`, {
            operation: 'parseCallRequest'
        });
    }
    return result.data;
}

export function parseCallResponse(raw: unknown): CallResponse {
    const result = callResponseSchema.safeParse(raw);
    if (!result.success) {
        throw ErrorFactory.validation(`Invalid call response: ${formatZodIssues(result.error)}`, {
            operation: 'parseCallResponse'
        });
    }
    return result.data;
}

export function encodeCallRequest(request: CallRequest): Uint8Array {
    return encodePayload(request);
}

export function encodeCallResponse(response: CallResponse): Uint8Array {
    return encodePayload(response);
}

export function decodeCallResponse(bytes: Uint8Array): CallResponse {
    return parseCallResponse(decodePayload(bytes));
}

/**
 * Best-effort read of `unified_msg_origin` from an envelope that failed validation.
 */
export function peekOrigin(raw: unknown): string {
    if (typeof raw === 'object' && raw !== null && 'unified_msg_origin' in raw) {
        const origin = raw.unified_msg_origin;
        if (typeof origin === 'string') return origin;
    }
    return '';
}

export function successResponse(origin: string, data: Record<string, unknown>): CallResponse {
    return { ok: true, unified_msg_origin: origin, data, error_message: '' };
}

export function failureResponse(origin: string, message: string): CallResponse {
    return { ok: false, unified_msg_origin: origin, data: null, error_message: message };
}
