// Structured logging interface
//
// Core code logs through BridgeLogger only. The server backs it with pino;
// tests use the silent or capturing variants.

export type BridgeLogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMethod = (message: string, data?: Record<string, unknown>) => void;

/**
 * Structured logger: a message plus an optional flat payload
 * (commandId, type, durations, described errors).
 */
export type BridgeLogger = Record<BridgeLogLevel, LogMethod>;

export const silentLogger: BridgeLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export type LogEntry = {
  level: BridgeLogLevel;
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
};

/**
 * Logger that keeps every entry in memory, for assertions.
 */
export function createCapturingLogger(
  clock: () => Date = () => new Date()
): BridgeLogger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const method =
    (level: BridgeLogLevel): LogMethod =>
    (message, data) => {
      entries.push({ level, message, data, timestamp: clock().toISOString() });
    };

  return {
    entries,
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
  };
}

/**
 * Render an unknown thrown value for a log payload.
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { message: String(error) };
}
