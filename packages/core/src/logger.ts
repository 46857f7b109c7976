/**
 * Logger interface shared by every relgate package.
 * Components receive a Logger explicitly instead of writing to the console
 * themselves, so embedding callers decide where output goes.
 */
export interface Logger {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';
export type LogFormat = 'text' | 'json';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 3,
};

/**
 * Simple console-based logger.
 */
export const consoleLogger: Logger = {
  info: (message: string) => console.log(`[info] ${message}`),
  warning: (message: string) => console.warn(`[warning] ${message}`),
  error: (message: string) => console.error(`[error] ${message}`),
  debug: (message: string) => console.debug(`[debug] ${message}`),
};

function writeJson(level: string, message: string): void {
  const entry = JSON.stringify({
    level,
    message,
    timestamp: new Date().toISOString(),
    service: 'relgate',
  });
  process.stderr.write(entry + '\n');
}

/**
 * Structured JSON logger for log aggregation.
 * Writes to stderr so stdout stays free for results.
 */
export const jsonLogger: Logger = {
  info: (message: string) => writeJson('info', message),
  warning: (message: string) => writeJson('warn', message),
  error: (message: string) => writeJson('error', message),
  debug: (message: string) => writeJson('debug', message),
};

/**
 * A no-op logger. Swallows all output.
 */
export const silentLogger: Logger = {
  info: () => {},
  warning: () => {},
  error: () => {},
  debug: () => {},
};

/**
 * Wrap a logger so that messages below `level` are dropped.
 */
export function withLevel(base: Logger, level: LogLevel): Logger {
  const min = LEVEL_ORDER[level];
  const gate =
    (lvl: LogLevel, write: (message: string) => void) =>
    (message: string): void => {
      if (LEVEL_ORDER[lvl] >= min) write(message);
    };

  return {
    debug: gate('debug', m => base.debug(m)),
    info: gate('info', m => base.info(m)),
    warning: gate('warning', m => base.warning(m)),
    error: gate('error', m => base.error(m)),
  };
}

/**
 * Build the logger described by the logging section of the config.
 */
export function createLogger(options: { level: LogLevel; format: LogFormat }): Logger {
  const base = options.format === 'json' ? jsonLogger : consoleLogger;
  return withLevel(base, options.level);
}
