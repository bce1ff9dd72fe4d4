import { appendFileSync, mkdirSync } from 'fs';
import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40
};

export interface LoggerOptions {
    level?: LogLevel;
    file?: string;
}

// stdout carries the MCP protocol, so every line goes to stderr.
export class Logger {
    private level: LogLevel = 'info';
    private file: string | null = null;

    configure(options: LoggerOptions): void {
        if (options.level) {
            this.level = options.level;
        }
        if (options.file) {
            mkdirSync(path.dirname(options.file), { recursive: true });
            this.file = options.file;
        }
    }

    debug(message: string, category = 'app'): void {
        this.write('debug', message, category);
    }

    info(message: string, category = 'app'): void {
        this.write('info', message, category);
    }

    warn(message: string, category = 'app'): void {
        this.write('warn', message, category);
    }

    error(message: string, category = 'app'): void {
        this.write('error', message, category);
    }

    private write(level: LogLevel, message: string, category: string): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
            return;
        }
        const line = `[${level.toUpperCase()}] [${category}] ${message}\n`;
        process.stderr.write(line);
        if (this.file) {
            appendFileSync(this.file, `${new Date().toISOString()} ${line}`);
        }
    }
}

export const logger = new Logger();
