// src/core/errors/ErrorContext.ts

/**
 * Metadata carried by an error for logs and callers.
 */
export interface ErrorContext {
    code?: string;           // Machine-readable error code (e.g., 'UNKNOWN_MODULE')
    operation?: string;      // The function or process that failed
    component?: string;      // The layer where the error occurred
    details?: Record<string, unknown>;
}
