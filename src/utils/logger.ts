export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(raw: string | undefined): LogLevel | null {
  const v = String(raw || '')
    .trim()
    .toLowerCase();
  if (v === 'debug' || v === 'info' || v === 'warn' || v === 'error') return v;
  return null;
}

function getMinLevel(): LogLevel {
  return parseLogLevel(process.env.LOG_LEVEL) ?? 'info';
}

function safeJsonStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return JSON.stringify({ error: 'LOG_SERIALIZATION_FAILED' });
  }
}

export type LogMeta = Record<string, unknown>;
export type LogSink = (line: string) => void;

export type Logger = {
  debug: (event: string, meta?: LogMeta) => void;
  info: (event: string, meta?: LogMeta) => void;
  warn: (event: string, meta?: LogMeta) => void;
  error: (event: string, meta?: LogMeta) => void;
};

export type LoggerOptions = {
  /** Fixed minimum level. When omitted, LOG_LEVEL is read on every call. */
  level?: LogLevel;
  stdout?: LogSink;
  stderr?: LogSink;
};

/**
 * Each call produces exactly one newline-terminated JSON line, handed to the sink in a single write,
 * so lines from concurrent documents never interleave.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  // Use stdout/stderr directly so logs are not affected by console overrides.
  const stdout: LogSink = options.stdout ?? ((line) => process.stdout.write(line));
  const stderr: LogSink = options.stderr ?? ((line) => process.stderr.write(line));

  const log = (level: LogLevel, event: string, meta: LogMeta = {}): void => {
    const minLevel = options.level ?? getMinLevel();
    if (levelOrder[level] < levelOrder[minLevel]) return;

    const payload = {
      ts: new Date().toISOString(),
      level,
      event,
      ...meta,
    };
    const line = safeJsonStringify(payload) + '\n';

    if (level === 'error') {
      stderr(line);
    } else {
      stdout(line);
    }
  };

  return {
    debug: (event, meta) => log('debug', event, meta),
    info: (event, meta) => log('info', event, meta),
    warn: (event, meta) => log('warn', event, meta),
    error: (event, meta) => log('error', event, meta),
  };
}

export const logger = createLogger();
