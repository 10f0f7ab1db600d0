import { appendFileSync, mkdirSync } from 'node:fs';
import path from 'node:path';
import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
    level: LogLevel;
    message: string;
    scope?: string;
    timestamp: string;
    data?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
    level?: LogLevel;
    scope?: string;
    /** Append every entry to this file as well */
    filePath?: string;
    /** Replaces the console sink (tests, embedding) */
    sink?: LogSink;
}

/**
 * Logger — one instance is built at startup and handed to every subsystem.
 *
 * Console output goes to stderr so stdout stays reserved for command output.
 */
export class Logger {
    private readonly level: LogLevel;
    private readonly scope?: string;
    private sinks: LogSink[];

    constructor(options: LoggerOptions = {}) {
        this.level = options.level ?? 'info';
        this.scope = options.scope;
        this.sinks = [options.sink ?? consoleSink];

        if (options.filePath) {
            this.sinks.push(fileSink(options.filePath));
        }
    }

    /**
     * Create a scoped logger sharing this logger's level and sinks
     */
    child(scope: string): Logger {
        const child = new Logger({
            level: this.level,
            scope: this.scope ? `${this.scope}.${scope}` : scope,
        });
        child.sinks = this.sinks;
        return child;
    }

    debug(message: string, data?: Record<string, unknown>): void {
        this.log('debug', message, data);
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.log('info', message, data);
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.log('warn', message, data);
    }

    error(message: string, data?: Record<string, unknown>): void {
        this.log('error', message, data);
    }

    isEnabled(level: LogLevel): boolean {
        return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
    }

    private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
        if (!this.isEnabled(level)) return;

        const entry: LogEntry = {
            level,
            message,
            scope: this.scope,
            timestamp: new Date().toISOString(),
            data,
        };
        for (const sink of this.sinks) {
            sink(entry);
        }
    }
}

// ─── Sinks ───

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
    debug: chalk.dim,
    info: chalk.cyan,
    warn: chalk.yellow,
    error: chalk.red,
};

/**
 * Render an entry as a single plain-text line
 */
export function formatEntry(entry: LogEntry): string {
    const scope = entry.scope ? ` [${entry.scope}]` : '';
    const data = entry.data && Object.keys(entry.data).length > 0 ? ` ${JSON.stringify(entry.data)}` : '';
    return `[${entry.timestamp}] ${entry.level.toUpperCase()}${scope} ${entry.message}${data}`;
}

export function consoleSink(entry: LogEntry): void {
    const color = LEVEL_COLORS[entry.level];
    const scope = entry.scope ? chalk.dim(` [${entry.scope}]`) : '';
    const data = entry.data && Object.keys(entry.data).length > 0 ? chalk.dim(` ${JSON.stringify(entry.data)}`) : '';
    process.stderr.write(`${chalk.dim(entry.timestamp.slice(11, 19))} ${color(entry.level.padEnd(5))}${scope} ${entry.message}${data}\n`);
}

export function fileSink(filePath: string): LogSink {
    mkdirSync(path.dirname(filePath), { recursive: true });
    return (entry) => {
        appendFileSync(filePath, formatEntry(entry) + '\n', 'utf-8');
    };
}
