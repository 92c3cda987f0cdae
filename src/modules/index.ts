import { ModuleInstaller } from '../core/modules/ModuleRegistry';
import { installTestModule } from './test';

/**
 * Modules installed at bootstrap, in registration order.
 * Start and shutdown hooks run in this order too.
 */
export const MODULES: readonly ModuleInstaller[] = [
    installTestModule,
];
