// Leveled logger. Everything goes to stderr so JSON on stdout stays clean.

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function getLevel(): LogLevel {
  const env = process.env.SPELL_LOG_LEVEL?.toLowerCase();
  if (env && isLogLevel(env)) return env;
  return 'info';
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[getLevel()];
}

function formatMessage(level: LogLevel, context: string, message: string, extra?: Record<string, unknown>): string {
  const ts = new Date().toISOString();
  let line = `[${ts}] [${level.toUpperCase()}] [${context}] ${message}`;
  if (extra && Object.keys(extra).length > 0) {
    line += ' ' + JSON.stringify(extra);
  }
  return line;
}

function write(level: LogLevel, context: string, message: string, extra?: Record<string, unknown>): void {
  if (shouldLog(level)) process.stderr.write(formatMessage(level, context, message, extra) + '\n');
}

export function logDebug(context: string, message: string, extra?: Record<string, unknown>): void {
  write('debug', context, message, extra);
}

export function logInfo(context: string, message: string, extra?: Record<string, unknown>): void {
  write('info', context, message, extra);
}

export function logWarn(context: string, message: string, extra?: Record<string, unknown>): void {
  write('warn', context, message, extra);
}

export function logError(context: string, message: string, extra?: Record<string, unknown>): void {
  write('error', context, message, extra);
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.cause instanceof Error ? `${err.message}: ${err.cause.message}` : err.message;
  }
  return String(err);
}
