import { ErrorFactory, HookError, getErrorMessage } from '../errors';
import { Logger } from '../logging/Logger';
import { Module } from './Module';

export type HookPhase = 'start' | 'shutdown';

/**
 * Runs every module's hooks for a phase, in module order and then hook order.
 * A failing hook is logged and collected; the pass never stops early.
 */
export async function runLifecycleHooks(phase: HookPhase, modules: readonly Module[]): Promise<HookError[]> {
    const failures: HookError[] = [];

    for (const module of modules) {
        const hooks = phase === 'start' ? module.startHooks : module.shutdownHooks;

        for (const [index, hook] of hooks.entries()) {
            try {
                await hook();
            } catch (error) {
                const failure = ErrorFactory.hook(
                    `${phase} hook #${index} of module ${module.id} failed: ${getErrorMessage(error)}`,
                    { operation: `${phase}Hook`, details: { moduleId: module.id, index } }
                );
                Logger.error('Lifecycle', failure.message, error);
                failures.push(failure);
            }
        }
    }

    if (failures.length > 0) {
        Logger.warn('Lifecycle', `${failures.length} ${phase} hook(s) failed`);
    }
    return failures;
}
