/**
 * Console logger. Everything goes to stderr: stdout carries CLI output and the MCP transport.
 */

export interface Logger {
    debug(message: string, details?: Record<string, unknown>): void;
    info(message: string, details?: Record<string, unknown>): void;
    warn(message: string, details?: Record<string, unknown>): void;
    error(message: string, details?: Record<string, unknown>): void;
}

export interface LoggerOptions {
    /** Emit debug and info messages too */
    verbose?: boolean;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
    const write = (level: string, message: string, details?: Record<string, unknown>) => {
        const line = `[${scope}] ${level}: ${message}`;
        if (details && Object.keys(details).length > 0) {
            console.error(line, details);
        } else {
            console.error(line);
        }
    };

    return {
        debug: (message, details) => { if (options.verbose) write('debug', message, details); },
        info: (message, details) => { if (options.verbose) write('info', message, details); },
        warn: (message, details) => write('warn', message, details),
        error: (message, details) => write('error', message, details),
    };
}

export const silentLogger: Logger = {
    debug: () => { },
    info: () => { },
    warn: () => { },
    error: () => { },
};
