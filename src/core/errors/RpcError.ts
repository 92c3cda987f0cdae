// src/core/errors/RpcError.ts

import { ErrorContext } from './ErrorContext';

/**
 * Base error class for everything the RPC server raises itself.
 * Only `message` ever crosses the wire; the context stays in the logs.
 */
export class RpcError extends Error {
    public readonly context: ErrorContext;

    constructor(message: string, context: ErrorContext = {}) {
        super(message);
        this.name = 'RpcError';
        this.context = context;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    public get code(): string {
        return this.context.code ?? 'RPC_ERROR';
    }
}

/**
 * Extracts a message from any thrown value.
 */
export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }

    return String(error);
}
