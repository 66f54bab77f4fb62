// Console logging with a module prefix and a JSON context

export interface LogContext {
    jobId?: string;
    frame?: number;
    segmentIndex?: number;
    [key: string]: unknown;
}

export class Logger {
    private prefix: string;

    constructor(prefix: string = '') {
        this.prefix = prefix;
    }

    private formatMessage(level: string, message: string, context?: LogContext): string {
        const timestamp = new Date().toISOString();
        const contextStr = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
        const prefix = this.prefix ? ` [${this.prefix}]` : '';
        return `[${timestamp}]${prefix} [${level}] ${message}${contextStr}`;
    }

    info(message: string, context?: LogContext): void {
        console.log(this.formatMessage('INFO', message, context));
    }

    warn(message: string, context?: LogContext): void {
        console.warn(this.formatMessage('WARN', message, context));
    }

    error(message: string, error?: unknown, context?: LogContext): void {
        const errorDetails = error instanceof Error
            ? { error: error.message, name: error.name, stack: error.stack }
            : error === undefined ? {} : { error: String(error) };
        console.error(this.formatMessage('ERROR', message, { ...context, ...errorDetails }));
    }

    debug(message: string, context?: LogContext): void {
        if (process.env.DEBUG) console.log(this.formatMessage('DEBUG', message, context));
    }

    // Runs a step and logs how long it took, rethrowing failures
    async timed<T>(name: string, fn: () => Promise<T>, context?: LogContext): Promise<T> {
        const startTime = Date.now();
        this.info(`${name} started`, context);
        try {
            const result = await fn();
            this.info(`${name} finished`, { ...context, duration: `${Date.now() - startTime}ms` });
            return result;
        } catch (error) {
            this.error(`${name} failed`, error, { ...context, duration: `${Date.now() - startTime}ms` });
            throw error;
        }
    }
}

export const serverLogger = new Logger('Render Server');
export const rendererLogger = new Logger('Renderer');
export const encoderLogger = new Logger('Encoder');
