export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  write?: (level: LogLevel, line: string) => void;
  now?: () => Date;
}

function normalize(meta: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}

function defaultWrite(level: LogLevel, line: string) {
  if (level === 'error') process.stderr.write(line + '\n');
  else process.stdout.write(line + '\n');
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = options.level ?? 'info';
  const format = options.format ?? 'text';
  const write = options.write ?? defaultWrite;
  const now = options.now ?? (() => new Date());

  function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVELS[level] < LEVELS[threshold]) return;
    const ts = now().toISOString();
    const data = meta ? normalize(meta) : undefined;
    const out = format === 'json'
      ? JSON.stringify({ timestamp: ts, level, message, ...data })
      : data ? `[${ts}] [${level.toUpperCase()}] ${message} ${JSON.stringify(data)}`
             : `[${ts}] [${level.toUpperCase()}] ${message}`;
    write(level, out);
  }

  return {
    debug: (msg, meta) => log('debug', msg, meta),
    info:  (msg, meta) => log('info',  msg, meta),
    warn:  (msg, meta) => log('warn',  msg, meta),
    error: (msg, meta) => log('error', msg, meta),
  };
}

export const silentLogger: Logger = createLogger({ write: () => undefined });
