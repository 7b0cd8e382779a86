import { randomUUID } from 'crypto';
import { trace } from '@opentelemetry/api';
import type { MiddlewareHandler } from 'hono';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

interface LogContext {
    correlationId?: string;
    operation?: string;
    provider?: string;
    [key: string]: unknown;
}

export class Logger {
    private context: LogContext = {};
    private threshold: { level: LogLevel };

    constructor(threshold: { level: LogLevel } = { level: 'info' }) {
        this.threshold = threshold;
    }

    child(context: LogContext): Logger {
        // Children share the parent's threshold so setLevel applies everywhere
        const child = new Logger(this.threshold);
        child.context = { ...this.context, ...context };
        return child;
    }

    setLevel(level: LogLevel): void {
        this.threshold.level = level;
    }

    private log(level: LogLevel, message: string, data?: Record<string, unknown>) {
        if (LOG_LEVELS[level] < LOG_LEVELS[this.threshold.level]) {
            return;
        }

        // Get trace context from OpenTelemetry
        const span = trace.getActiveSpan();
        const spanContext = span?.spanContext();

        const entry = {
            timestamp: new Date().toISOString(),
            level,
            message,
            trace_id: spanContext?.traceId,
            span_id: spanContext?.spanId,
            ...this.context,
            ...data,
        };

        // stdout carries the MCP stdio channel, so structured JSON goes to stderr
        console.error(JSON.stringify(entry));
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

export const logger = new Logger();

export type CorrelationVariables = {
    correlationId: string;
    logger: Logger;
};

// Middleware to add correlation ID
export const correlationMiddleware: MiddlewareHandler<{ Variables: CorrelationVariables }> = async (
    c,
    next
) => {
    const correlationId = c.req.header('x-correlation-id') || randomUUID();
    c.set('correlationId', correlationId);
    c.set('logger', logger.child({ correlationId }));
    c.header('x-correlation-id', correlationId);
    await next();
};
