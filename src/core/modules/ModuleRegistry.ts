import { ErrorFactory } from '../errors';
import { Logger } from '../logging/Logger';
import { describeSchema } from '../schema/schemas';
import { Module } from './Module';
import { ApiMeta, ModuleDescriptor } from './types';

export type ResolveResult =
    | { status: 'found'; module: Module; meta: ApiMeta }
    | { status: 'unknown_module'; moduleId: string }
    | { status: 'unknown_method'; module: Module; method: string };

/**
 * Registers one module into a registry during bootstrap.
 */
export type ModuleInstaller = (registry: ModuleRegistry) => void;

/**
 * Owns every module for the life of the process.
 *
 * Registration happens in the single bootstrap pass before the server starts;
 * afterwards the registry is only read, so it takes no locks.
 */
export class ModuleRegistry {
    private modules: Map<string, Module> = new Map();

    /**
     * Registers a module. A second registration under the same id is skipped.
     */
    public registerModule(module: Module): void {
        if (this.modules.has(module.id)) {
            Logger.info('ModuleRegistry', `Module ${module.id} is already registered. Skipping.`);
            return;
        }

        this.modules.set(module.id, module);
        Logger.info('ModuleRegistry', `Module ${module.id} registered`, {
            name: module.name,
            methods: Array.from(module.apis.keys())
        });
    }

    /**
     * Adds an API to an already registered module.
     */
    public registerApi(moduleId: string, meta: ApiMeta): void {
        const module = this.modules.get(moduleId);
        if (!module) {
            throw ErrorFactory.unknownModule(moduleId, { operation: 'registerApi' });
        }
        module.addApi(meta);
    }

    public resolve(moduleId: string, method: string): ResolveResult {
        const module = this.modules.get(moduleId);
        if (!module) {
            return { status: 'unknown_module', moduleId };
        }

        const meta = module.apis.get(method);
        if (!meta) {
            return { status: 'unknown_method', module, method };
        }

        return { status: 'found', module, meta };
    }

    public getModule(moduleId: string): Module | undefined {
        return this.modules.get(moduleId);
    }

    /**
     * Modules in registration order.
     */
    public listModules(): Module[] {
        return Array.from(this.modules.values());
    }

    /**
     * Read-only traversal for interface generators.
     */
    public describe(): ModuleDescriptor[] {
        return this.listModules().map(module => ({
            id: module.id,
            name: module.name,
            description: module.description,
            methods: Array.from(module.apis.values()).map(meta => ({
                methodName: meta.methodName,
                isAsync: meta.isAsync,
                params: describeSchema(meta.paramType),
                response: describeSchema(meta.responseType),
            })),
        }));
    }
}

/**
 * Runs installers in order. This is the explicit replacement for
 * registration-on-import.
 */
export function installModules(registry: ModuleRegistry, installers: readonly ModuleInstaller[]): ModuleRegistry {
    for (const install of installers) {
        install(registry);
    }
    return registry;
}
