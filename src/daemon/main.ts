#!/usr/bin/env node
import { DEFAULT_CONFIG_PATH, loadPluginConfig } from './config.js';
import { createConsoleLogger } from './logger.js';
import { PltxDaemon } from './server.js';
import { errorMessage } from '../pltx/errors.js';

async function main(): Promise<void> {
    const configPath = process.env.PLTX_CONFIG_PATH ?? DEFAULT_CONFIG_PATH;
    const config = await loadPluginConfig(configPath);
    const logger = createConsoleLogger(config.logLevel);

    const daemon = new PltxDaemon(config, { logger });
    await daemon.start();

    const shutdown = (signal: string) => {
        logger.info?.(`${signal} received, shutting down`);
        daemon.stop().then(
            () => process.exit(0),
            (e: unknown) => {
                logger.error?.(`Shutdown failed: ${errorMessage(e)}`);
                process.exit(1);
            }
        );
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((e: unknown) => {
    console.error(`[PLTX] Startup failed: ${errorMessage(e)}`);
    process.exit(1);
});
