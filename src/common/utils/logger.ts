import { isRecord } from './object.utils';
import { redactSensitiveData } from './pii-redaction';

/**
 * Service logger.
 * Production: JSON lines (stderr for errors). Development: styled output with ANSI colors,
 * a metadata box and a framed stack trace for errors.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogType = 'system' | 'http' | 'cache' | 'render' | 'artifact';

export interface LogMeta {
  type?: LogType;
  method?: string;
  duration?: number;
  context?: string;
  [key: string]: unknown;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const INDICATORS: Record<LogLevel | LogType, string> = {
  error: '[ERROR]',
  warn: '[WARN ]',
  info: '[INFO ]',
  debug: '[DEBUG]',
  system: '[SYS  ]',
  http: '[HTTP ]',
  cache: '[CACHE]',
  render: '[PDF  ]',
  artifact: '[FILE ]',
};

const ANSI = {
  reset: '\x1b[0m',
  gray: '\x1b[90m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  bold: '\x1b[1m',
};

function printBanner(): void {
  console.log(
    `${ANSI.gray}${'='.repeat(80)}${ANSI.reset}\n` +
      `${ANSI.green}${ANSI.bold}> STOCK CATALOG PRINT // ${new Date().toISOString()}${ANSI.reset}\n` +
      `${ANSI.gray}${'='.repeat(80)}${ANSI.reset}\n`,
  );
}

function getLogLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'production' ? 'info' : 'debug');
  if (raw === 'log') return 'info';
  return isLogLevel(raw) ? raw : 'info';
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

function shouldLog(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[getLogLevel()];
}

function getTimestamp(): string {
  const now = new Date();
  return (
    now.toTimeString().split(' ')[0] +
    '.' +
    String(now.getMilliseconds()).padStart(3, '0')
  );
}

function formatMetaForDisplay(meta?: LogMeta): string {
  const safeMeta = sanitizeMeta(meta);
  if (!safeMeta) {
    return '';
  }
  const filtered = { ...safeMeta };
  delete filtered.type;
  delete filtered.method;
  if (Object.keys(filtered).length === 0) return '';
  return (
    '\n+-[DATA]\n| ' +
    JSON.stringify(filtered, null, 2).split('\n').join('\n| ') +
    '\n+--------'
  );
}

function sanitizeMeta(meta?: LogMeta): LogMeta | undefined {
  if (!meta) {
    return undefined;
  }

  const redacted = redactSensitiveData(meta);
  if (!isRecord(redacted)) {
    return undefined;
  }

  return redacted as LogMeta;
}

function log(level: LogLevel, message: string, meta?: LogMeta, context?: string): void {
  if (!shouldLog(level)) return;

  const type = meta?.type;
  const indicator = type ? INDICATORS[type] : INDICATORS[level];

  if (process.env.NODE_ENV === 'production') {
    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(context && { context }),
      ...sanitizeMeta(meta),
    });
    if (level === 'error') process.stderr.write(line + '\n');
    else process.stdout.write(line + '\n');
    return;
  }

  const methodPrefix = meta?.method ? `[${meta.method}] ` : '';
  const ctx = context ? `[${context}] ` : '';
  const msgStyle = level === 'error' ? ANSI.red : level === 'warn' ? ANSI.yellow : '';
  const out = `${ANSI.gray}[${getTimestamp()}]${ANSI.reset} ${indicator} ${msgStyle}${ctx}${methodPrefix}${message}${formatMetaForDisplay(meta)}${ANSI.reset}`;

  switch (level) {
    case 'error':
      console.error(out);
      break;
    case 'warn':
      console.warn(out);
      break;
    default:
      console.log(out);
  }
}

function createLogFn(level: LogLevel, context?: string) {
  return (message: string, meta?: LogMeta) => log(level, message, meta, context);
}

function createTypedLogFn(level: LogLevel, type: LogType, context?: string) {
  return (message: string, meta?: Omit<LogMeta, 'type'>) =>
    log(level, message, { ...meta, type }, context);
}

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, error?: Error, meta?: LogMeta) => void;
  http: (message: string, meta?: Omit<LogMeta, 'type'>) => void;
  cache: (message: string, meta?: Omit<LogMeta, 'type'>) => void;
  render: (message: string, meta?: Omit<LogMeta, 'type'>) => void;
  artifact: (message: string, meta?: Omit<LogMeta, 'type'>) => void;
  performance: (operation: string, startTime: number, meta?: Omit<LogMeta, 'type' | 'duration'>) => void;
  boot: () => void;
}

function createLoggerImpl(context?: string): Logger {
  const isDev = process.env.NODE_ENV !== 'production';

  return {
    debug: createLogFn('debug', context),
    info: createLogFn('info', context),
    warn: createLogFn('warn', context),
    error: (message: string, error?: Error, meta?: LogMeta) => {
      const errorMeta: LogMeta = {
        ...meta,
        errorName: error?.name,
        errorMessage: error?.message,
      };
      log('error', message, errorMeta, context);
      if (isDev && error?.stack && shouldLog('error')) {
        const stackBox =
          `${ANSI.red}+== STACK TRACE ==+${ANSI.reset}\n` +
          error.stack
            .split('\n')
            .map((line, i) =>
              i === 0 ? `${ANSI.red}|${ANSI.reset} ${line}` : `${ANSI.red}|${ANSI.reset}  +- ${line.trim()}`,
            )
            .join('\n') +
          `\n${ANSI.red}+=================+${ANSI.reset}`;
        console.error(stackBox);
      }
    },
    http: createTypedLogFn('debug', 'http', context),
    cache: createTypedLogFn('info', 'cache', context),
    render: createTypedLogFn('info', 'render', context),
    artifact: createTypedLogFn('info', 'artifact', context),
    performance: (operation: string, startTime: number, meta?: Omit<LogMeta, 'type' | 'duration'>) => {
      if (!shouldLog('debug')) return;
      const duration = Date.now() - startTime;
      log('debug', `Performance: ${operation}`, { ...meta, duration, type: 'system' }, context);
    },
    boot: (): void => {
      if (process.env.NODE_ENV === 'production') return;
      printBanner();
    },
  };
}

export const logger: Logger = createLoggerImpl();

export function createLogger(context: string): Logger {
  return createLoggerImpl(context);
}
