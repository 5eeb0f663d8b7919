// src/main.ts

import 'reflect-metadata';
import config from './config';
import { registerDependencies } from './register';

// === REGISTER DEPENDENCIES IMMEDIATELY ===
registerDependencies();
// ==========================================

import { container } from 'tsyringe';
import { Logger } from 'winston';
import { errorMessage } from './core/common/errors';
import { AppDataSource } from './infrastructure/database/providers/data-source.provider';
import { LOGGER_TOKEN } from './infrastructure/logger';
import { Server } from './infrastructure/webserver/server';

async function bootstrap(): Promise<void> {
    const logger = container.resolve<Logger>(LOGGER_TOKEN);

    logger.info(`Application starting in ${config.nodeEnv} mode...`);
    logger.info(`Using port: ${config.port}`);
    logger.info(`Log level set to: ${config.logLevel}`);
    logger.info(`Database: ${config.database.database} (synchronize=${config.database.synchronize})`);
    logger.info(`Upload limit: ${config.upload.maxFileSizeMb} MB`);

    // --- STEP 1: Database ---
    const dataSourceProvider = container.resolve(AppDataSource);
    logger.info('Initializing database connection...');
    await dataSourceProvider.init();

    // --- STEP 2: HTTP server ---
    const server = container.resolve(Server);
    await server.start(config.port);
}

async function gracefulShutdown(signal: string): Promise<void> {
    const logger = container.resolve<Logger>(LOGGER_TOKEN);
    const server = container.resolve(Server);
    const dataSourceProvider = container.resolve(AppDataSource);

    logger.warn(`Received ${signal}. Initiating graceful shutdown...`);

    try {
        // Stop the server first to prevent new connections
        await server.stop();
        await dataSourceProvider.close();
        logger.info('Application shut down gracefully.');
        process.exit(0);
    } catch (error) {
        logger.error('Error during graceful shutdown:', { message: errorMessage(error) });
        process.exit(1);
    }
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT')); // Catches Ctrl+C

bootstrap().catch((error: unknown) => {
    const logger = container.resolve<Logger>(LOGGER_TOKEN);
    logger.error('Failed to bootstrap application:', {
        message: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined
    });
    process.exit(1);
});
