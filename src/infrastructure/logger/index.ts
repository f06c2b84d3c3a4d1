// src/infrastructure/logger/index.ts
import 'reflect-metadata';
import { container } from 'tsyringe';
import winston from 'winston';
import config from '../../config';

// --- Define Logger Creation Function ---
export const createAppLogger = (): winston.Logger => {
    const logFormat = winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true }), // Log stack traces
        config.nodeEnv === 'production'
            ? winston.format.json()
            : winston.format.printf(info => `${String(info.timestamp)} ${info.level}: ${String(info.message)} ${info.stack ? `\n${String(info.stack)}` : ''}`)
    );

    const transports: winston.transport[] = [
        new winston.transports.Console({
            format: config.nodeEnv === 'development'
                ? winston.format.combine(
                    winston.format.colorize(),
                    logFormat
                )
                : logFormat,
            level: config.logLevel,
            handleExceptions: true,
            handleRejections: true,
        }),
    ];

    const logger = winston.createLogger({
        level: config.logLevel,
        format: logFormat,
        transports: transports,
        exitOnError: false,
        // Jest sets NODE_ENV=test; keep test output clean
        silent: config.nodeEnv === 'test',
    });

    logger.debug(`Logger initialized in ${config.nodeEnv} mode (Level: ${config.logLevel}).`);
    return logger;
};


// --- Create Logger Instance ---
const loggerInstance = createAppLogger();


// --- Dependency Injection Registration ---
export const LOGGER_TOKEN = Symbol.for('AppLogger');

container.register(LOGGER_TOKEN, {
    useValue: loggerInstance
});


// --- Export ---
export default loggerInstance;
