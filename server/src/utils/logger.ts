import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const VALID_LOG_LEVELS: ReadonlySet<string> = new Set([
  'fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent',
]);

function isLogLevel(value: string): value is LogLevel {
  return VALID_LOG_LEVELS.has(value);
}

export function parseLogLevel(envValue: string | undefined): LogLevel {
  if (!envValue) return 'info';
  const normalized = envValue.toLowerCase().trim();
  if (isLogLevel(normalized)) return normalized;
  return 'info';
}

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
  /** Append log lines to this file in addition to stdout. */
  destination?: string;
}

type TransportTarget = pino.TransportTargetOptions;

function consoleTarget(level: LogLevel, pretty: boolean): TransportTarget {
  return pretty
    ? { target: 'pino-pretty', level, options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l' } }
    : { target: 'pino/file', level, options: { destination: 1 } };
}

export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const isDev = process.env.NODE_ENV !== 'production';
  const level = options.level ?? parseLogLevel(process.env.LOG_LEVEL);
  const pretty = options.pretty ?? isDev;

  if (!options.destination) {
    const transport = pretty ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l' } } : undefined;
    return pino({ level, transport });
  }

  const targets: TransportTarget[] = [
    consoleTarget(level, pretty),
    { target: 'pino/file', level, options: { destination: options.destination, mkdir: true, append: true } },
  ];

  return pino({ level, transport: { targets } });
}

const logger = createLogger();

export default logger;
