// src/infrastructure/logger/index.ts
import 'reflect-metadata';
import { container } from 'tsyringe';
import winston from 'winston';
import config, { AppConfig } from '../../config';

// --- Define Logger Creation Function ---
export const createAppLogger = (appConfig: AppConfig = config): winston.Logger => {
    const logFormat = winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true }), // Log stack traces
        appConfig.nodeEnv === 'production'
            ? winston.format.json()
            : winston.format.printf(info => `${info.timestamp} ${info.level}: ${info.message} ${info.stack ? `\n${String(info.stack)}` : ''}`)
    );

    const transports: winston.transport[] = [
        new winston.transports.Console({
            format: appConfig.nodeEnv === 'development'
                ? winston.format.combine(
                    winston.format.colorize(),
                    logFormat
                )
                : logFormat,
            level: appConfig.logLevel,
            handleExceptions: appConfig.nodeEnv !== 'test',
            handleRejections: appConfig.nodeEnv !== 'test',
        }),
    ];

    const logger = winston.createLogger({
        level: appConfig.logLevel,
        format: logFormat,
        transports: transports,
        exitOnError: false,
    });

    logger.info(`Logger initialized in ${appConfig.nodeEnv} mode (Level: ${appConfig.logLevel}).`);
    return logger;
};

const loggerInstance = createAppLogger();

// --- Dependency Injection Registration ---
export const LOGGER_TOKEN = Symbol.for('AppLogger');

container.register(LOGGER_TOKEN, {
    useValue: loggerInstance
});

export default loggerInstance;
