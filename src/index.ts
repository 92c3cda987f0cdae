import { CONFIG } from './config/config';
import { Logger } from './core/logging/Logger';
import { ModuleRegistry, installModules } from './core/modules/ModuleRegistry';
import { RpcServer } from './core/server/RpcServer';
import { MODULES } from './modules';

/**
 * Process entry point: builds the registry in one ordered pass, then serves
 * until SIGINT or SIGTERM.
 */
async function main(): Promise<void> {
    Logger.info('Main', `${CONFIG.SERVER.NAME} v${CONFIG.SERVER.VERSION} starting`);

    const registry = installModules(new ModuleRegistry(), MODULES);
    const server = new RpcServer(registry);

    const shutdown = (signal: NodeJS.Signals) => {
        Logger.info('Main', `Received ${signal}`);
        server.stop().catch(error => {
            Logger.error('Main', 'Error during shutdown', error);
            process.exitCode = 1;
        });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    await server.start();
}

main().catch((error) => {
    Logger.error('Main', 'Fatal error in main():', error);
    process.exit(1);
});
