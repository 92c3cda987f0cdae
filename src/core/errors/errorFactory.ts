// src/core/errors/errorFactory.ts

import * as Errors from './errors';
import { ErrorContext } from './ErrorContext';

/**
 * Factory class to create consistent error instances across the server.
 */
export class ErrorFactory {
    static transport(message: string, context?: ErrorContext) {
        return new Errors.TransportError(message, context);
    }

    static unknownModule(moduleId: string, context?: ErrorContext) {
        return new Errors.UnknownModuleError(`Unknown module: ${moduleId}`, {
            details: { moduleId },
            ...context
        });
    }

    static unknownMethod(moduleId: string, method: string, context?: ErrorContext) {
        return new Errors.UnknownMethodError(`Unknown method: ${method} (module ${moduleId})`, {
            details: { moduleId, method },
            ...context
        });
    }

    static validation(message: string, context?: ErrorContext) {
        return new Errors.ValidationError(message, context);
    }

    static handler(message: string, context?: ErrorContext) {
        return new Errors.HandlerError(message, context);
    }

    static typeMismatch(moduleId: string, method: string, context?: ErrorContext) {
        return new Errors.TypeMismatchError(`Return type mismatch for ${moduleId}.${method}`, context);
    }

    static duplicateMethod(moduleId: string, method: string, context?: ErrorContext) {
        return new Errors.DuplicateMethodError(`Method '${method}' already registered in module '${moduleId}'`, context);
    }

    static schemaKind(message: string, context?: ErrorContext) {
        return new Errors.SchemaKindError(message, context);
    }

    static bind(message: string, context?: ErrorContext) {
        return new Errors.BindError(message, context);
    }

    static hook(message: string, context?: ErrorContext) {
        return new Errors.HookError(message, context);
    }
}
