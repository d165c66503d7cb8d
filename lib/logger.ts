/**
 * logger.ts
 * Context-tagged console logger shared by the CLI, stores and feeds.
 *
 * Output shape: `[context] message <data>`; data objects are rendered as JSON
 * with nested Error objects expanded.
 */

import type { EngineLogger } from '../engine/src/types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export interface LogSink {
    debug(line: string): void;
    info(line: string): void;
    warn(line: string): void;
    error(line: string): void;
}

const consoleSink: LogSink = {
    debug: line => console.debug(line),
    info: line => console.info(line),
    warn: line => console.warn(line),
    error: line => console.error(line),
};

export function formatData(data?: unknown): string {
    if (data === undefined || data === null) return '';
    if (typeof data === 'string') return data;
    if (data instanceof Error) return `${data.name}: ${data.message}`;

    if (typeof data === 'object') {
        try {
            return JSON.stringify(data, (_key, value: unknown) => {
                if (value instanceof Error) {
                    return { name: value.name, message: value.message };
                }
                return value;
            });
        } catch {
            return String(data);
        }
    }
    return String(data);
}

export class Logger implements EngineLogger {
    constructor(
        private level: LogLevel = 'info',
        private readonly sink: LogSink = consoleSink,
    ) {}

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
        return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
    }

    private line(context: string, message: string, data?: unknown): string {
        const dataStr = formatData(data);
        return dataStr ? `[${context}] ${message} ${dataStr}` : `[${context}] ${message}`;
    }

    debug(context: string, message: string, data?: unknown): void {
        if (this.enabled('debug')) this.sink.debug(this.line(context, message, data));
    }

    info(context: string, message: string, data?: unknown): void {
        if (this.enabled('info')) this.sink.info(this.line(context, message, data));
    }

    warn(context: string, message: string, data?: unknown): void {
        if (this.enabled('warn')) this.sink.warn(this.line(context, message, data));
    }

    error(context: string, message: string, data?: unknown): void {
        if (this.enabled('error')) this.sink.error(this.line(context, message, data));
    }
}

export const logger = new Logger();
