import { EventEmitter } from 'events';
import { CONFIG } from './config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogEntry {
    level: Exclude<LogLevel, 'silent'>;
    tag: string;
    message: string;
    timestamp: number;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

const LEVEL_COLOR: Record<LogEntry['level'], string> = {
    debug: '\x1b[90m',
    info: '\x1b[36m',
    warn: '\x1b[33m',
    error: '\x1b[31m',
};

// Tags that keep their own colour whatever the level.
const TAG_COLOR: Record<string, string> = {
    SECURE: '\x1b[32m',
    SYSTEM: '\x1b[32m',
    CRYPTO: '\x1b[35m',
};

const isLogLevel = (value: string): value is LogLevel => Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);

export const parseLogLevel = (value: string): LogLevel => {
    const lower = value.toLowerCase();
    return isLogLevel(lower) ? lower : 'info';
};

/**
 * Terminal logger. Output goes to the console only; the last few entries are
 * kept in memory for the dashboard and nothing ever reaches the disk.
 */
export class Logger extends EventEmitter {
    private history: LogEntry[] = [];

    constructor(
        private level: LogLevel = parseLogLevel(CONFIG.LOG.LEVEL),
        private historySize: number = CONFIG.LOG.HISTORY,
        private sink: (line: string) => void = (line) => console.log(line),
    ) {
        super();
    }

    public setLevel(level: LogLevel): void {
        this.level = level;
    }

    public debug(tag: string, message: string): void {
        this.write('debug', tag, message);
    }

    public info(tag: string, message: string): void {
        this.write('info', tag, message);
    }

    public warn(tag: string, message: string): void {
        this.write('warn', tag, message);
    }

    public error(tag: string, message: string): void {
        this.write('error', tag, message);
    }

    public recent(): LogEntry[] {
        return [...this.history];
    }

    private write(level: LogEntry['level'], tag: string, message: string): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

        const entry: LogEntry = { level, tag, message, timestamp: Date.now() };
        this.history.push(entry);
        if (this.history.length > this.historySize) this.history.shift();

        const color = TAG_COLOR[tag] ?? LEVEL_COLOR[level];
        this.sink(`${color}[${tag}]\x1b[0m ${message}`);
        this.emit('entry', entry);
    }
}

export const shortId = (instanceId: string): string => instanceId.slice(0, 8);
