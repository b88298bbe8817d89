import { getRuntimeSettings } from './runtime-settings.js';

/**
 * Per-component loggers for the completion core.
 *
 * Lines carry a `[Completion:<component>]` prefix and an optional JSON
 * context. Info lines are printed only while the `infoLogs` runtime setting
 * is on; warnings and errors always are. Everything goes to stderr, leaving
 * stdout to the host.
 */

export interface LogContext {
    /** Printed as its last path segment. */
    uri?: string;
    [key: string]: unknown;
}

export interface Logger {
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, context?: LogContext): void;
    /** Runs `fn` and logs how long it took, or that it threw. */
    timed<T>(label: string, fn: () => T): T;
}

function formatContext(context: LogContext | undefined): string {
    if (!context || Object.keys(context).length === 0) {
        return '';
    }
    const uri = typeof context.uri === 'string' ? context.uri.split('/').at(-1) : context.uri;
    return ` ${JSON.stringify({ ...context, uri })}`;
}

export function createLogger(component: string): Logger {
    const prefix = `[Completion:${component}]`;
    const line = (tag: string, message: string, context?: LogContext): string =>
        `${prefix} ${tag}${message}${formatContext(context)}`;
    const infoEnabled = (): boolean => getRuntimeSettings().infoLogs;

    return {
        info(message: string, context?: LogContext): void {
            if (infoEnabled()) {
                console.warn(line('', message, context));
            }
        },
        warn(message: string, context?: LogContext): void {
            console.warn(line('WARN ', message, context));
        },
        error(message: string, context?: LogContext): void {
            console.error(line('ERROR ', message, context));
        },
        timed<T>(label: string, fn: () => T): T {
            const started = performance.now();
            const elapsed = (): string => (performance.now() - started).toFixed(1);
            try {
                const result = fn();
                if (infoEnabled()) {
                    console.warn(line('', `${label} completed in ${elapsed()}ms`));
                }
                return result;
            } catch (error) {
                console.error(line('', `${label} failed after ${elapsed()}ms`));
                throw error;
            }
        },
    };
}

/** Message of a caught value, whatever was thrown. */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
