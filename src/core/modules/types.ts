import { z } from 'zod';
import { FieldDescriptor } from '../schema/schemas';

/**
 * Typed token used as a key into a module's context map.
 * The type parameter only exists at compile time.
 */
export class ContextKey<T> {
    private readonly phantom?: T;

    constructor(public readonly name: string) { }

    public toString(): string {
        return `ContextKey(${this.name})`;
    }
}

/** Start and shutdown hooks may be sync or async. */
export type LifecycleHook = () => void | Promise<void>;

/**
 * Promise-returning handler that runs on the event loop.
 * Declared as a method so typed handlers stay assignable.
 */
export interface InlineHandler {
    readonly kind: 'inline';
    invoke(params: unknown): Promise<unknown>;
}

/**
 * Blocking handler that a worker thread loads by path and export name.
 * `file` must be absolute and loadable by plain `require`.
 */
export interface WorkerHandler {
    readonly kind: 'worker';
    readonly file: string;
    readonly exportName: string;
}

export type HandlerTarget = InlineHandler | WorkerHandler;

/**
 * Metadata bound to one API method of a module.
 */
export interface ApiMeta {
    readonly methodName: string;
    readonly handler: HandlerTarget;
    readonly paramType: z.AnyZodObject;
    readonly responseType: z.AnyZodObject;
    /** `false` means the handler runs on the blocking worker pool. */
    readonly isAsync: boolean;
}

/**
 * Typed form accepted by `Module.api`.
 */
export interface ApiDefinition<P extends z.AnyZodObject, R extends z.AnyZodObject> {
    methodName: string;
    params: P;
    response: R;
    handler: (params: z.output<P>) => Promise<z.input<R>>;
}

/**
 * Typed form accepted by `Module.blockingApi`.
 */
export interface BlockingApiDefinition<P extends z.AnyZodObject, R extends z.AnyZodObject> {
    methodName: string;
    params: P;
    response: R;
    file: string;
    exportName: string;
}

export interface MethodDescriptor {
    methodName: string;
    isAsync: boolean;
    params: FieldDescriptor[];
    response: FieldDescriptor[];
}

/**
 * Read-only view of a module for interface generators.
 */
export interface ModuleDescriptor {
    id: string;
    name: string;
    description: string;
    methods: MethodDescriptor[];
}
