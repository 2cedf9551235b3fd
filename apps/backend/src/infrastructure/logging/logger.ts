import { trace } from '@opentelemetry/api';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

interface LogContext {
    component?: string;
    collection?: string;
    documentId?: string;
    operation?: string;
    [key: string]: unknown;
}

// Shared by a logger and all of its children so setLevel applies everywhere.
interface LoggerState {
    level: LogLevel;
}

function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && Object.hasOwn(LEVEL_ORDER, value);
}

export class Logger {
    private context: LogContext = {};

    constructor(private readonly state: LoggerState = { level: 'info' }) {}

    child(context: LogContext): Logger {
        const child = new Logger(this.state);
        child.context = { ...this.context, ...context };
        return child;
    }

    setLevel(level: LogLevel): void {
        this.state.level = level;
    }

    getLevel(): LogLevel {
        return this.state.level;
    }

    isLevelEnabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.state.level];
    }

    private log(level: LogLevel, message: string, data?: Record<string, unknown>) {
        if (!this.isLevelEnabled(level)) {
            return;
        }

        // Correlate with the active span, if any
        const spanContext = trace.getActiveSpan()?.spanContext();

        const entry = {
            timestamp: new Date().toISOString(),
            level,
            message,
            trace_id: spanContext?.traceId,
            span_id: spanContext?.spanId,
            ...this.context,
            ...data,
        };

        console.log(JSON.stringify(entry));
    }

    debug(message: string, data?: Record<string, unknown>) {
        this.log('debug', message, data);
    }

    info(message: string, data?: Record<string, unknown>) {
        this.log('info', message, data);
    }

    warn(message: string, data?: Record<string, unknown>) {
        this.log('warn', message, data);
    }

    error(message: string, error?: unknown, data?: Record<string, unknown>) {
        let errorData: Record<string, unknown> | undefined;

        if (error instanceof Error) {
            errorData = { message: error.message, stack: error.stack, name: error.name };
        } else if (error !== undefined) {
            errorData = { message: String(error) };
        }

        this.log('error', message, {
            ...data,
            error: errorData,
        });
    }
}

const envLevel = process.env.LOG_LEVEL;

export const logger = new Logger({ level: isLogLevel(envLevel) ? envLevel : 'info' });
