import pino, { type Logger } from 'pino';

// All log output goes to stderr: stdout carries the MCP protocol and the CLI's JSON.

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// Unknown values fall back to "info"
function resolveLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? '').trim().toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

let logger: Logger | undefined;

// Built on first use so LOG_LEVEL from .env is already loaded
function getLogger(): Logger {
  logger ??= pino(
    { level: resolveLevel(), base: { service: 'dealer-fraud-check-mcp' } },
    pino.destination({ dest: 2, sync: true }),
  );
  return logger;
}

function write(level: LogLevel, message: string, args: unknown[]): void {
  const target = getLogger();
  if (args.length === 0) {
    target[level](message);
    return;
  }
  const details = args.map((arg) => (arg instanceof Error ? arg.message : arg));
  target[level]({ details }, message);
}

export function logDebug(message: string, ...args: unknown[]): void {
  write('debug', message, args);
}

export function logInfo(message: string, ...args: unknown[]): void {
  write('info', message, args);
}

export function logWarn(message: string, ...args: unknown[]): void {
  write('warn', message, args);
}

export function logError(message: string, ...args: unknown[]): void {
  write('error', message, args);
}
