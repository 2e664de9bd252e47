// Централизованный модуль логирования ingestion-слоя.
// Уровни, сменные sinks (console по умолчанию), flush/close при shutdown.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
    level: LogLevel;
    ts: number;
    iso: string;
    message: string;
}

export interface LogSink {
    kind: 'console' | 'file' | 'memory' | 'custom';
    write(entry: LogEntry, formatted: string): void;
    flush?(): void | Promise<void>;
    close?(): void | Promise<void>;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_WEIGHT;

const readLevel = (): LogLevel => {
    const raw = (process.env.LOG_LEVEL ?? 'info').trim().toLowerCase();
    return isLogLevel(raw) ? raw : 'info';
};

const formatError = (err: unknown): string => {
    if (err instanceof Error) {
        const shortStack = err.stack?.split('\n').slice(0, 3).join('\n');
        return shortStack ?? `${err.name}: ${err.message}`;
    }
    if (err === undefined) return '';
    try {
        return JSON.stringify(err);
    } catch {
        return String(err);
    }
};

const consoleSink: LogSink = {
    kind: 'console',
    write: (entry, formatted) => {
        if (entry.level === 'error' || entry.level === 'warn') {
            console.error(formatted);
        } else {
            console.log(formatted);
        }
    },
};

class Logger {
    private level: LogLevel = readLevel();
    private sinks: LogSink[] = [consoleSink];

    debug(msg: string): void {
        this.write('debug', msg);
    }

    info(msg: string): void {
        this.write('info', msg);
    }

    warn(msg: string): void {
        this.write('warn', msg);
    }

    error(msg: string, err?: unknown): void {
        const detail = formatError(err);
        this.write('error', detail ? `${msg}\n${detail}` : msg);
    }

    getLevel(): LogLevel {
        return this.level;
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    isEnabled(level: LogLevel): boolean {
        return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.level];
    }

    setSink(write: LogSink['write']): void {
        this.sinks = [{ kind: 'custom', write }];
    }

    setSinks(sinks: LogSink[]): void {
        this.sinks = [...sinks];
    }

    resetSinkToConsole(): void {
        this.sinks = [consoleSink];
    }

    async flush(): Promise<void> {
        for (const sink of this.sinks) {
            await sink.flush?.();
        }
    }

    async close(): Promise<void> {
        for (const sink of this.sinks) {
            await sink.close?.();
        }
    }

    private write(level: LogLevel, message: string): void {
        if (!this.isEnabled(level)) return;
        const ts = Date.now();
        const entry: LogEntry = { level, ts, iso: new Date(ts).toISOString(), message };
        const formatted = `[${entry.iso}] ${level.toUpperCase()}: ${message}`;
        for (const sink of this.sinks) {
            try {
                sink.write(entry, formatted);
            } catch (err) {
                console.error(`[Logger] ${sink.kind} sink failed: ${err instanceof Error ? err.message : String(err)}`);
            }
        }
    }
}

export const logger = new Logger();
