export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, details?: Record<string, unknown>): void;
  info(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, details?: Record<string, unknown>): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return (
    typeof value === 'string' &&
    Object.prototype.hasOwnProperty.call(LEVEL_RANK, value)
  );
}

function format(
  level: Exclude<LogLevel, 'silent'>,
  message: string,
  details?: Record<string, unknown>
): string {
  const suffix =
    details && Object.keys(details).length > 0
      ? ` ${JSON.stringify(details)}`
      : '';
  return `[routedoc] ${level}: ${message}${suffix}\n`;
}

/**
 * Line-oriented stderr logger, one `[routedoc]`-prefixed line per event.
 */
export function createConsoleLogger(level: LogLevel = 'warn'): Logger {
  const threshold = LEVEL_RANK[level];
  const emit =
    (lvl: Exclude<LogLevel, 'silent'>) =>
    (message: string, details?: Record<string, unknown>): void => {
      if (LEVEL_RANK[lvl] < threshold) return;
      process.stderr.write(format(lvl, message, details));
    };
  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}

export const silentLogger: Logger = createConsoleLogger('silent');
