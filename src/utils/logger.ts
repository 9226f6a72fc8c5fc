import winston from 'winston';

export interface LogContext {
    chatId?: number;
    userId?: number | null;
    updateId?: number;
    itemId?: number;
    count?: number;
    durationMs?: number;
    state?: string;
    action?: string;
    errorType?: string;
    errorMessage?: string;
}

export interface LoggerOptions {
    level?: string;
    file?: string;
    silent?: boolean;
}

export class Logger {
    private logger: winston.Logger;

    constructor(options: LoggerOptions = {}) {
        const transports: winston.transport[] = [
            new winston.transports.Console({
                format: winston.format.combine(
                    winston.format.colorize(),
                    winston.format.timestamp({ format: 'HH:mm:ss' }),
                    winston.format.printf(({ timestamp, level, message, context }) => {
                        const ctxStr = context ? ` [${JSON.stringify(context)}]` : '';
                        return `${timestamp} ${level}: ${message}${ctxStr}`;
                    })
                )
            })
        ];

        if (options.file) {
            transports.push(
                new winston.transports.File({
                    filename: options.file,
                    format: winston.format.combine(
                        winston.format.timestamp(),
                        winston.format.json()
                    )
                })
            );
        }

        this.logger = winston.createLogger({
            level: options.level ?? 'info',
            silent: options.silent ?? false,
            transports,
            defaultMeta: { service: 'inventory-organizer-bot' }
        });
    }

    info(message: string, context?: LogContext): void {
        this.logger.info(message, { context });
    }

    error(message: string, context?: LogContext): void {
        this.logger.error(message, { context });
    }

    warn(message: string, context?: LogContext): void {
        this.logger.warn(message, { context });
    }

    debug(message: string, context?: LogContext): void {
        this.logger.debug(message, { context });
    }
}

/** Error type and message only; stack traces and payloads stay out of the logs. */
export const describeError = (error: unknown): Pick<LogContext, 'errorType' | 'errorMessage'> => {
    if (error instanceof Error) {
        return { errorType: error.name, errorMessage: error.message };
    }
    return { errorType: typeof error, errorMessage: String(error) };
};
