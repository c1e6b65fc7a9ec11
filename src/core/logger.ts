import pino from 'pino';
import { dirname } from 'node:path';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
  /** Human-readable output through pino-pretty. */
  pretty?: boolean;
  /** Write JSON lines to this file instead of stderr. */
  file?: string;
}

const LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function levelFromEnv(): LogLevel | undefined {
  const value = process.env.PROMPTGATE_LOG_LEVEL?.toLowerCase();
  return LEVELS.find(level => level === value);
}

export function createLogger(name: string = 'promptgate', options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? levelFromEnv() ?? 'info';

  if (options.pretty) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    });
  }

  if (options.file) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino/file',
        options: { destination: options.file, mkdir: dirname(options.file) !== '.' },
      },
    });
  }

  // stdout belongs to command output
  return pino({ name, level }, pino.destination(2));
}

let _logger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: pino.Logger): void {
  _logger = logger;
}
