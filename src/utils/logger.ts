export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function thresholdFromEnv(): number {
  const raw = (process.env.SHELLQ_LOG_LEVEL ?? 'info').toLowerCase();
  return isLogLevel(raw) ? LEVELS[raw] : LEVELS.info;
}

function write(level: LogLevel, ctx: string, msg: string, meta: Record<string, unknown>): void {
  if (LEVELS[level] < thresholdFromEnv()) return;
  const line = JSON.stringify({
    ts: new Date().toISOString(),
    level,
    ctx,
    msg,
    meta,
  });
  if (level === 'error' || level === 'warn') console.error(line);
  else console.log(line);
}

/**
 * One-line JSON logger bound to a context such as `worker:2` or `supervisor`.
 */
export function createLogger(ctx: string): Logger {
  return {
    debug: (msg, meta = {}) => write('debug', ctx, msg, meta),
    info: (msg, meta = {}) => write('info', ctx, msg, meta),
    warn: (msg, meta = {}) => write('warn', ctx, msg, meta),
    error: (msg, meta = {}) => write('error', ctx, msg, meta),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
