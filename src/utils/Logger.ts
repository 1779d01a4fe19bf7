// edge-twin-allocator/src/utils/Logger.ts

import { createLogger, format, transports, Logger as WinstonLogger } from 'winston';
import path from 'path';
import fs from 'fs';
import config from '../config';

export type LogMeta = Record<string, unknown>;

function createWinstonLogger(): WinstonLogger {
    const { level, dir, toFile } = config.logging;

    const logger = createLogger({
        level,
        format: format.combine(
            format.timestamp({
                format: 'YYYY-MM-DD HH:mm:ss'
            }),
            format.errors({ stack: true }),
            format.splat(),
            format.json()
        ),
        defaultMeta: { service: config.app.name },
        transports: [
            // Write logs to console
            new transports.Console({
                format: format.combine(
                    format.colorize(),
                    format.printf(info => {
                        const { timestamp, level, message, context, service, ...meta } = info;
                        const metaStr = Object.keys(meta).length ?
                            JSON.stringify(meta, null, 2) : '';
                        return `[${timestamp}] [${level}] [${context ?? 'Global'}] ${message} ${metaStr}`;
                    })
                )
            })
        ]
    });

    if (toFile) {
        // Create logs directory if it doesn't exist
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }
        logger.add(new transports.File({
            filename: path.join(dir, 'error.log'),
            level: 'error',
            maxsize: 10 * 1024 * 1024, // 10MB
            maxFiles: 5,
            tailable: true
        }));
        logger.add(new transports.File({
            filename: path.join(dir, 'combined.log'),
            maxsize: 10 * 1024 * 1024, // 10MB
            maxFiles: 5,
            tailable: true
        }));
    }

    if (config.app.environment !== 'production') {
        logger.on('error', (error: Error) => {
            console.error('Logger error:', error);
        });
    }

    return logger;
}

export class Logger {
    private static instance: Logger;

    private constructor(
        private readonly logger: WinstonLogger,
        private context: string = 'Global'
    ) {}

    public static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger(createWinstonLogger());
        }
        return Logger.instance;
    }

    public setContext(context: string): void {
        this.context = context;
    }

    public info(message: string, meta?: LogMeta): void {
        this.logger.info(message, { context: this.context, ...meta });
    }

    public error(message: string, error?: Error, meta?: LogMeta): void {
        this.logger.error(message, {
            context: this.context,
            error: error?.stack ?? error?.message,
            ...meta
        });
    }

    public warn(message: string, meta?: LogMeta): void {
        this.logger.warn(message, { context: this.context, ...meta });
    }

    public debug(message: string, meta?: LogMeta): void {
        this.logger.debug(message, { context: this.context, ...meta });
    }

    public startTimer(id: string): void {
        const meta = { context: this.context, timerId: id, start: Date.now() };
        this.logger.debug(`Timer started: ${id}`, meta);
    }

    public endTimer(id: string): void {
        const meta = { context: this.context, timerId: id, end: Date.now() };
        this.logger.debug(`Timer ended: ${id}`, meta);
    }

    public logMetric(name: string, value: number, unit: string): void {
        const meta = { context: this.context, metric: name, value, unit };
        this.logger.info(`Metric: ${name}=${value}${unit}`, meta);
    }

    // Children share the underlying winston logger and its transports.
    public child(childContext: string): Logger {
        const context = this.context === 'Global' ? childContext : `${this.context}:${childContext}`;
        return new Logger(this.logger, context);
    }

    public flush(): Promise<void> {
        return new Promise((resolve, reject) => {
            try {
                this.logger.end(() => resolve());
            } catch (error) {
                reject(error);
            }
        });
    }
}
