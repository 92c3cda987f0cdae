import { ModuleRegistry, installModules } from '../core/modules/ModuleRegistry';
import { MODULES } from '../modules';

/**
 * Prints every module's methods and field kinds as JSON, for client stub generators.
 */
function describeInterface(): void {
    const registry = installModules(new ModuleRegistry(), MODULES);
    process.stdout.write(`${JSON.stringify(registry.describe(), null, 2)}\n`);
}

describeInterface();
