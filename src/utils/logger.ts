import process from 'node:process';

export const LOG_LEVELS = ['debug', 'info', 'notice', 'warning', 'error', 'critical', 'alert', 'emergency'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

let minimumLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
    minimumLevel = level;
}

function shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minimumLevel);
}

/**
 * Write directly to stderr. Safe before the MCP connection exists, and the
 * only channel that never touches the JSON-RPC stream on stdout.
 */
export function logToStderr(level: LogLevel, message: string): void {
    if (!shouldLog(level)) {
        return;
    }
    process.stderr.write(`[pattern-edit] [${level.toUpperCase()}] ${message}\n`);
}

function formatArgs(args: unknown[]): string {
    return args.map(arg => {
        if (arg instanceof Error) {
            return arg.message;
        }
        if (typeof arg === 'object' && arg !== null) {
            try {
                return JSON.stringify(arg);
            } catch {
                return String(arg);
            }
        }
        return String(arg);
    }).join(' ');
}

function send(level: LogLevel, message: string, args: unknown[]): void {
    if (!shouldLog(level)) {
        return;
    }
    const text = args.length > 0 ? `${message} ${formatArgs(args)}` : message;
    const transport = global.mcpTransport;
    if (transport && transport.isNotificationsEnabled) {
        transport.sendLog(level, text);
    } else {
        logToStderr(level, text);
    }
}

/**
 * Application logger. Messages go to the client as MCP log notifications
 * once it has initialized, and to stderr before that.
 */
export const logger = {
    debug: (message: string, ...args: unknown[]) => send('debug', message, args),
    info: (message: string, ...args: unknown[]) => send('info', message, args),
    warning: (message: string, ...args: unknown[]) => send('warning', message, args),
    error: (message: string, ...args: unknown[]) => send('error', message, args),
};
