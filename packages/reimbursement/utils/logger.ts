// Scoped diagnostics logger. Everything goes to stderr so stdout stays
// free for CLI output and the MCP stdio transport.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Logger = (level: LogLevel, message: string, data?: Record<string, unknown>) => void;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function threshold(): number {
  const env = process.env.LOG_LEVEL?.toLowerCase() ?? 'info';
  return LEVEL_ORDER[isLogLevel(env) ? env : 'info'];
}

/**
 * Create a logger that prefixes lines with `[Scope:LEVEL]`.
 * LOG_LEVEL is read on every call.
 */
export function createLogger(scope: string): Logger {
  return (level, message, data) => {
    if (LEVEL_ORDER[level] < threshold()) return;
    const prefix = `[${scope}:${level.toUpperCase()}]`;
    if (data) {
      console.error(`${prefix} ${message}`, JSON.stringify(data));
    } else {
      console.error(`${prefix} ${message}`);
    }
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = () => {};
