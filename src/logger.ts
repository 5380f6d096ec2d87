import chalk from 'chalk';
import { format } from 'date-fns';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string[];
  /** Defaults to the global console. */
  sink?: Pick<Console, 'log' | 'error'>;
  now?: () => Date;
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', scope = [], sink = console, now = () => new Date() } = options;
  const threshold = LOG_LEVELS.indexOf(level);
  const prefix = scope.length > 0 ? `[${scope.join(':')}] ` : '';

  const write =
    (messageLevel: LogLevel) =>
    (message: string, ...details: unknown[]) => {
      if (LOG_LEVELS.indexOf(messageLevel) < threshold) return;
      const timestamp = format(now(), 'yyyy-MM-dd HH:mm:ss,SSS');
      const line = `${chalk.dim(timestamp)} - ${LEVEL_COLORS[messageLevel](messageLevel.toUpperCase())} - ${prefix}${message}`;
      if (messageLevel === 'warn' || messageLevel === 'error') {
        sink.error(line, ...details);
      } else {
        sink.log(line, ...details);
      }
    };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    child: (name) => createLogger({ ...options, scope: [...scope, name] }),
  };
}

/** Drops everything; handy for tests and library use. */
export const silentLogger: Logger = createLogger({ sink: { log: () => {}, error: () => {} } });
