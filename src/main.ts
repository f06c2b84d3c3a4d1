// src/main.ts

import 'reflect-metadata';
import config from './config';
import { registerDependencies } from './register';

// === REGISTER DEPENDENCIES IMMEDIATELY ===
registerDependencies();
// ==========================================

import { container } from 'tsyringe';
import { Logger } from 'winston';
import { AliasTableProvider } from './infrastructure/alias-table/alias-table.provider';
import { LOGGER_TOKEN } from './infrastructure/logger';
import { Server } from './infrastructure/webserver/server';

async function bootstrap() {
    const logger = container.resolve<Logger>(LOGGER_TOKEN);

    try {
        logger.info(`Application starting in ${config.nodeEnv} mode...`);
        logger.info(`Using port: ${config.port}`);
        logger.info(`Log level set to: ${config.logLevel}`);
        logger.info(`Report thresholds: late start after ${config.report.lateStartAfter}, worked late after ${config.report.workedLateAfter}, deadline ${config.report.timeoutMs} ms`);

        // --- STEP 1: Load the district alias table ---
        const aliasTables = container.resolve(AliasTableProvider);
        try {
            await aliasTables.load(config.aliasTablePath);
        } catch (tableError) {
            logger.error('FATAL: Failed to load the district alias table. Exiting.', {
                message: tableError instanceof Error ? tableError.message : String(tableError),
            });
            process.exit(1);
        }

        // Operators edit the table in place and send SIGHUP; runs in flight keep their snapshot
        process.on('SIGHUP', () => {
            logger.info('Received SIGHUP. Reloading district alias table...');
            aliasTables.reload(config.aliasTablePath).then(
                reloaded => logger.info(`Alias table ${reloaded ? 'reloaded' : 'left unchanged'}.`),
                (reloadError: unknown) => logger.error('Unexpected error while reloading alias table:', reloadError)
            );
        });

        // --- STEP 2: Resolve and start the server ---
        logger.info('Resolving main application server...');
        const server = container.resolve(Server);

        logger.info('Starting HTTP server...');
        await server.start(config.port);
        logger.info(`Server listening successfully on port ${config.port}`);

    } catch (error) {
        if (error instanceof Error) {
            logger.error('Failed to bootstrap application:', { message: error.message, stack: error.stack });
        } else {
            logger.error('Failed to bootstrap application with unknown error:', error);
        }
        process.exit(1);
    }
}

async function gracefulShutdown(signal: string) {
    const logger = container.resolve<Logger>(LOGGER_TOKEN);
    const server = container.resolve(Server);

    logger.warn(`Received ${signal}. Initiating graceful shutdown...`);

    try {
        // Stop accepting connections; requests in flight finish first
        await server.stop();
        logger.info('Application shut down gracefully.');
        process.exit(0);
    } catch (error) {
        logger.error('Error during graceful shutdown:', error);
        process.exit(1);
    }
}

// Listen for termination signals
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT')); // Catches Ctrl+C

// Start the application
void bootstrap();
