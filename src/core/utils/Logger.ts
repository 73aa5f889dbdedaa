export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
    timestamp: number;
    level: LogLevel;
    message: string;
    data?: unknown;
}

type LogListener = (entry: LogEntry) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3
};

function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && Object.hasOwn(LEVEL_ORDER, value);
}

class LoggerService {
    private listeners: LogListener[] = [];
    private minimumLevel: LogLevel;

    constructor() {
        const fromEnv = process.env.CAPTION_LOG_LEVEL?.toLowerCase();
        this.minimumLevel = isLogLevel(fromEnv) ? fromEnv : 'info';
    }

    public subscribe(listener: LogListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    public setLevel(level: LogLevel) {
        this.minimumLevel = level;
    }

    public getLevel(): LogLevel {
        return this.minimumLevel;
    }

    private emit(level: LogLevel, message: string, data?: unknown) {
        // Listeners see everything; the threshold only gates console output
        const entry: LogEntry = {
            timestamp: Date.now(),
            level,
            message,
            data
        };

        if (LEVEL_ORDER[level] >= LEVEL_ORDER[this.minimumLevel]) {
            console[level](`[${level.toUpperCase()}] ${message}`, data ?? '');
        }

        this.listeners.forEach(l => l(entry));
    }

    public info(msg: string, data?: unknown) { this.emit('info', msg, data); }
    public warn(msg: string, data?: unknown) { this.emit('warn', msg, data); }
    public error(msg: string, data?: unknown) { this.emit('error', msg, data); }
    public debug(msg: string, data?: unknown) { this.emit('debug', msg, data); }
}

export const Logger = new LoggerService();
