// src/core/errors/errors.ts

import { RpcError } from './RpcError';
import { ErrorContext } from './ErrorContext';

/**
 * Thrown for malformed, truncated or oversized frames. Ends the connection.
 */
export class TransportError extends RpcError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'TRANSPORT_ERROR',
            component: 'TRANSPORT',
            ...context
        });
        this.name = 'TransportError';
    }
}

/**
 * Thrown when a request names a module that was never registered.
 */
export class UnknownModuleError extends RpcError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'UNKNOWN_MODULE',
            component: 'DISPATCH',
            ...context
        });
        this.name = 'UnknownModuleError';
    }
}

/**
 * Thrown when the module exists but has no such method.
 */
export class UnknownMethodError extends RpcError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'UNKNOWN_METHOD',
            component: 'DISPATCH',
            ...context
        });
        this.name = 'UnknownMethodError';
    }
}

/**
 * Thrown when a payload or envelope does not fit its schema.
 */
export class ValidationError extends RpcError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'VALIDATION_ERROR',
            component: 'CORE_VALIDATION',
            ...context
        });
        this.name = 'ValidationError';
    }
}

/**
 * Wraps whatever a handler threw. The message is the handler's own text.
 */
export class HandlerError extends RpcError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'HANDLER_ERROR',
            component: 'HANDLER',
            ...context
        });
        this.name = 'HandlerError';
    }
}

/**
 * Thrown when a handler returns a value outside its declared response schema.
 */
export class TypeMismatchError extends RpcError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'TYPE_MISMATCH',
            component: 'DISPATCH',
            ...context
        });
        this.name = 'TypeMismatchError';
    }
}

/**
 * Thrown at registration when a method name is already taken in its module.
 */
export class DuplicateMethodError extends RpcError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'DUPLICATE_METHOD',
            component: 'REGISTRY',
            ...context
        });
        this.name = 'DuplicateMethodError';
    }
}

/**
 * Thrown at registration when a schema is not of the expected root kind.
 */
export class SchemaKindError extends RpcError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'SCHEMA_KIND',
            component: 'REGISTRY',
            ...context
        });
        this.name = 'SchemaKindError';
    }
}

/**
 * Thrown when the listener cannot bind its socket path.
 */
export class BindError extends RpcError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'BIND_ERROR',
            component: 'SERVER',
            ...context
        });
        this.name = 'BindError';
    }
}

/**
 * A start or shutdown hook failed. Collected, never rethrown by the server.
 */
export class HookError extends RpcError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'HOOK_ERROR',
            component: 'LIFECYCLE',
            ...context
        });
        this.name = 'HookError';
    }
}
