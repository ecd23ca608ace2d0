import pino, { Logger, LoggerOptions } from 'pino';

export type LogMeta = Record<string, unknown>;

export class LoggerService {
    private static instance: LoggerService | undefined;

    private constructor(private readonly logger: Logger) {}

    static getInstance(): LoggerService {
        if (!LoggerService.instance) {
            LoggerService.instance = new LoggerService(LoggerService.createLogger());
        }
        return LoggerService.instance;
    }

    private static createLogger(): Logger {
        const isDevelopment = process.env.NODE_ENV === 'development';
        const logLevel = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

        const baseOptions: LoggerOptions = {
            level: logLevel,
            base: { service: 'spendings-api' },
            timestamp: pino.stdTimeFunctions.isoTime,
            formatters: {
                level: (label) => ({ level: label })
            }
        };

        if (isDevelopment) {
            return pino({
                ...baseOptions,
                transport: {
                    target: 'pino-pretty',
                    options: {
                        colorize: true,
                        translateTime: 'HH:MM:ss Z',
                        ignore: 'pid,hostname'
                    }
                }
            });
        }

        return pino({
            ...baseOptions,
            serializers: {
                error: pino.stdSerializers.err
            }
        });
    }

    trace(message: string, meta: LogMeta = {}): void {
        this.logger.trace(meta, message);
    }

    debug(message: string, meta: LogMeta = {}): void {
        this.logger.debug(meta, message);
    }

    info(message: string, meta: LogMeta = {}): void {
        this.logger.info(meta, message);
    }

    warn(message: string, meta: LogMeta = {}): void {
        this.logger.warn(meta, message);
    }

    error(message: string, error?: unknown, meta: LogMeta = {}): void {
        this.logger.error({ ...meta, ...LoggerService.describeError(error) }, message);
    }

    fatal(message: string, error?: unknown, meta: LogMeta = {}): void {
        this.logger.fatal({ ...meta, ...LoggerService.describeError(error) }, message);
    }

    http(message: string, meta?: LogMeta): void {
        this.info(`[HTTP] ${message}`, meta);
    }

    database(message: string, meta?: LogMeta): void {
        this.debug(`[DATABASE] ${message}`, meta);
    }

    /**
     * Child logger with `context` bound to every line it writes.
     */
    child(context: LogMeta): LoggerService {
        return new LoggerService(this.logger.child(context));
    }

    flush(): void {
        this.logger.flush();
    }

    private static describeError(error: unknown): LogMeta {
        if (error instanceof Error) {
            return {
                error: {
                    name: error.name,
                    message: error.message,
                    stack: error.stack
                }
            };
        }
        return error === undefined ? {} : { error: String(error) };
    }
}

export const logger = LoggerService.getInstance();
