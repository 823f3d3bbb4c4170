/**
 * Logger contract shared by the client, orchestrator and server.
 * Components take a plain function so tests can capture or silence output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Logger = (level: LogLevel, message: string, data?: Record<string, unknown>) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export const silentLogger: Logger = () => {};

/**
 * Console logger with `[correlationId]` prefixes, as the pipeline logs read
 */
export function createConsoleLogger(minLevel: LogLevel = 'info'): Logger {
  return (level, message, data) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
      return;
    }

    const { correlationId, ...rest } = data ?? {};
    const prefix = typeof correlationId === 'string' ? `[${correlationId}] ` : '';
    const line = `${new Date().toISOString()} ${level.toUpperCase()} ${prefix}${message}`;
    const extras = Object.keys(rest).length > 0 ? [rest] : [];

    switch (level) {
      case 'debug':
        console.debug(line, ...extras);
        break;
      case 'info':
        console.log(line, ...extras);
        break;
      case 'warn':
        console.warn(line, ...extras);
        break;
      case 'error':
        console.error(line, ...extras);
        break;
    }
  };
}

