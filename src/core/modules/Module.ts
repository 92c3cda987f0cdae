import path from 'path';
import { z } from 'zod';
import { ErrorFactory } from '../errors';
import { isParametersSchema, isResponseSchema } from '../schema/schemas';
import { Logger } from '../logging/Logger';
import {
    ApiDefinition,
    ApiMeta,
    BlockingApiDefinition,
    ContextKey,
    LifecycleHook
} from './types';

/**
 * A named bundle of API handlers, lifecycle hooks and context values.
 * Built during bootstrap and handed to a ModuleRegistry.
 */
export class Module {
    public readonly apis: Map<string, ApiMeta> = new Map();
    public readonly startHooks: LifecycleHook[] = [];
    public readonly shutdownHooks: LifecycleHook[] = [];
    private readonly context: Map<ContextKey<unknown>, unknown> = new Map();

    constructor(
        public readonly id: string,
        public readonly name: string,
        public readonly description: string = ''
    ) {
        if (!id) {
            throw ErrorFactory.validation('Module id cannot be empty', { operation: 'Module' });
        }
    }

    /**
     * Registers a promise-returning handler that runs on the event loop.
     */
    public api<P extends z.AnyZodObject, R extends z.AnyZodObject>(definition: ApiDefinition<P, R>): this {
        this.addApi({
            methodName: definition.methodName,
            handler: { kind: 'inline', invoke: definition.handler },
            paramType: definition.params,
            responseType: definition.response,
            isAsync: true,
        });
        return this;
    }

    /**
     * Registers a synchronous handler that runs on a worker thread.
     */
    public blockingApi<P extends z.AnyZodObject, R extends z.AnyZodObject>(definition: BlockingApiDefinition<P, R>): this {
        if (!path.isAbsolute(definition.file)) {
            throw ErrorFactory.validation(
                `Blocking handler file for '${definition.methodName}' must be an absolute path: ${definition.file}`,
                { operation: 'blockingApi' }
            );
        }
        this.addApi({
            methodName: definition.methodName,
            handler: { kind: 'worker', file: definition.file, exportName: definition.exportName },
            paramType: definition.params,
            responseType: definition.response,
            isAsync: false,
        });
        return this;
    }

    /**
     * Adds prepared metadata. Method names are unique within a module.
     */
    public addApi(meta: ApiMeta): void {
        if (this.apis.has(meta.methodName)) {
            throw ErrorFactory.duplicateMethod(this.id, meta.methodName);
        }
        this.checkSchemas(meta.methodName, meta.paramType, meta.responseType);
        Logger.debug('Module', `Registering API method: ${this.id}.${meta.methodName}`);
        this.apis.set(meta.methodName, meta);
    }

    public onStart(hook: LifecycleHook): this {
        this.startHooks.push(hook);
        return this;
    }

    public onShutdown(hook: LifecycleHook): this {
        this.shutdownHooks.push(hook);
        return this;
    }

    public setContext<T>(key: ContextKey<T>, value: T): void {
        this.context.set(key, value);
    }

    public getContext<T>(key: ContextKey<T>): T | undefined {
        return this.context.get(key) as T | undefined;
    }

    private checkSchemas(methodName: string, params: z.ZodTypeAny, response: z.ZodTypeAny): void {
        if (!methodName) {
            throw ErrorFactory.validation(`Method name cannot be empty in module '${this.id}'`);
        }
        if (!isParametersSchema(params)) {
            throw ErrorFactory.schemaKind(
                `Parameters of '${this.id}.${methodName}' must be declared with defineParameters`
            );
        }
        if (!isResponseSchema(response)) {
            throw ErrorFactory.schemaKind(
                `Response of '${this.id}.${methodName}' must be declared with defineResponse`
            );
        }
    }
}
