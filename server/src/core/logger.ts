export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levelPrefix: Record<LogLevel, string> = {
    debug: '[debug]',
    info: '[info]',
    warn: '[warn]',
    error: '[error]'
};

const levelRank: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40
};

let threshold: LogLevel = parseLevel(process.env.OFFLOAD_LOG_LEVEL) ?? 'info';
let sink: (line: string) => void = (line) => {
    console.error(line);
};

export function parseLevel(raw: string | undefined): LogLevel | undefined {
    const value = (raw ?? '').trim().toLowerCase();
    return value === 'debug' || value === 'info' || value === 'warn' || value === 'error' ? value : undefined;
}

function write(level: LogLevel, message: string, details?: unknown) {
    if (levelRank[level] < levelRank[threshold]) {
        return;
    }
    const payload = details === undefined ? message : `${message} ${stringify(details)}`;
    // stdout carries the MCP stdio transport; every diagnostic line goes to stderr.
    sink(`[offload] ${levelPrefix[level]} ${payload}`);
}

function stringify(value: unknown) {
    if (value instanceof Error) {
        return `${value.name}: ${value.message}`;
    }
    try {
        return JSON.stringify(value);
    } catch {
        return String(value);
    }
}

export const logger = {
    debug(message: string, details?: unknown) {
        write('debug', message, details);
    },
    info(message: string, details?: unknown) {
        write('info', message, details);
    },
    warn(message: string, details?: unknown) {
        write('warn', message, details);
    },
    error(message: string, details?: unknown) {
        write('error', message, details);
    },
    setLevel(level: LogLevel) {
        threshold = level;
    },
    // testing helper
    _setSinkForTests(next: ((line: string) => void) | undefined) {
        sink =
            next ??
            ((line) => {
                console.error(line);
            });
    }
};
