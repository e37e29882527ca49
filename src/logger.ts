/**
 * Levelled console logger
 * @module Logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none';

type OutputLevel = Exclude<LogLevel, 'none'>;

const rank: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 4,
};

// console method and prefix per level; debug goes to console.log
const channels: Record<OutputLevel, { write: (...data: unknown[]) => void; prefix: string }> = {
  debug: { write: (...data) => console.log(...data), prefix: '🔍' },
  info: { write: (...data) => console.info(...data), prefix: 'ℹ️ ' },
  warn: { write: (...data) => console.warn(...data), prefix: '⚠️ ' },
  error: { write: (...data) => console.error(...data), prefix: '❌' },
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(rank, value);
}

/**
 * Minimum level for an environment: an explicit LOG_LEVEL if it names a
 * level, otherwise info in production and debug everywhere else.
 */
export function resolveLevel(env: NodeJS.ProcessEnv): LogLevel {
  const requested = env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(requested)) return requested;
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

const threshold = rank[resolveLevel(process.env)];

function emit(level: OutputLevel, message: string, args: unknown[]): void {
  if (rank[level] < threshold) return;
  const { write, prefix } = channels[level];
  write(`${prefix} [${new Date().toISOString()}] ${message}`, ...args);
}

type Details = Record<string, unknown>;

interface ReplayLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  /** A pair of traces flagged as similar */
  comparison(ownerA: string, ownerB: string, details?: Details): void;
  batchEvent(event: string, details?: Details): void;
  security(event: string, ip: string, details?: Details): void;
}

const Logger: ReplayLogger = {
  debug: (message, ...args) => emit('debug', message, args),
  info: (message, ...args) => emit('info', message, args),
  warn: (message, ...args) => emit('warn', message, args),
  error: (message, ...args) => emit('error', message, args),

  comparison(ownerA, ownerB, details = {}) {
    emit('info', `Similar replays [${ownerA}] vs [${ownerB}]`, [details]);
  },

  batchEvent(event, details = {}) {
    emit('info', `Batch: ${event}`, [details]);
  },

  security(event, ip, details = {}) {
    emit('warn', `Security [${ip}]: ${event}`, [details]);
  },
};

export default Logger;
