import pino, { type Logger, type TransportTargetOptions } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
const DEFAULT_LOG_LEVEL: LogLevel = 'info';

export interface LoggerOptions {
  level?: string;
  /** Also append plain JSON lines to this file. */
  logFile?: string;
}

function shouldColorizeLogs(): boolean {
  if (process.env.NO_COLOR === '1' || process.env.NO_COLOR === 'true') {
    return false;
  }
  return Boolean(process.stdout.isTTY);
}

export function normalizeLogLevel(level: string | undefined): LogLevel | undefined {
  const normalized = (level ?? '').trim().toLowerCase();
  // syslog-style aliases
  const alias = normalized === 'warning' ? 'warn' : normalized === 'critical' ? 'fatal' : normalized;
  return LOG_LEVELS.find((candidate) => candidate === alias);
}

function createLogger(level: LogLevel, logFile?: string): Logger {
  const targets: TransportTargetOptions[] = [
    {
      target: 'pino-pretty',
      level,
      options: {
        colorize: shouldColorizeLogs(),
        ignore: 'pid,hostname',
      },
    },
  ];
  if (logFile) {
    targets.push({ target: 'pino/file', level, options: { destination: logFile, mkdir: true } });
  }
  return pino({ level, transport: { targets } });
}

export let logger: Logger = createLogger(normalizeLogLevel(process.env.LOG_LEVEL) ?? DEFAULT_LOG_LEVEL);

export function configureLogger(options: LoggerOptions = {}): void {
  const level = normalizeLogLevel(options.level ?? process.env.LOG_LEVEL);
  if (options.level && !level) {
    logger.warn(`Invalid log level "${options.level}"; keeping ${logger.level}`);
  }

  if (options.logFile) {
    logger = createLogger(level ?? normalizeLogLevel(logger.level) ?? DEFAULT_LOG_LEVEL, options.logFile);
    return;
  }
  if (level) {
    logger.level = level;
  }
}
