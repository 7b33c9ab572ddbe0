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

class LoggerService {
    private listeners: LogListener[] = [];
    private minLevel: LogLevel = 'info';
    private writeToStderr = true;

    public subscribe(listener: LogListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    public setLevel(level: LogLevel) {
        this.minLevel = level;
    }

    /**
     * Console output can be switched off (tests subscribe instead).
     */
    public setConsoleOutput(enabled: boolean) {
        this.writeToStderr = enabled;
    }

    private emit(level: LogLevel, message: string, data?: unknown) {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

        const entry: LogEntry = {
            timestamp: Date.now(),
            level,
            message,
            data
        };
        // stdout belongs to dump output, so everything goes to stderr
        if (this.writeToStderr) {
            const suffix = data === undefined ? '' : ` ${formatData(data)}`;
            process.stderr.write(`[chaptag] ${message}${suffix}\n`);
        }

        this.listeners.forEach(l => l(entry));
    }

    public info(msg: string, data?: unknown) { this.emit('info', msg, data); }
    public warn(msg: string, data?: unknown) { this.emit('warn', msg, data); }
    public error(msg: string, data?: unknown) { this.emit('error', msg, data); }
    public debug(msg: string, data?: unknown) { this.emit('debug', msg, data); }
}

function formatData(data: unknown): string {
    if (data instanceof Error) return data.message;
    if (typeof data === 'string') return data;
    return JSON.stringify(data);
}

export const Logger = new LoggerService();
