export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

let minimumLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];
}

function write(
  level: LogLevel,
  sink: (...args: unknown[]) => void,
  message: string,
  meta?: unknown
): void {
  if (!enabled(level)) {
    return;
  }
  if (meta === undefined) {
    sink(`[${level}] ${message}`);
    return;
  }
  sink(`[${level}] ${message}`, meta);
}

export const log = {
  debug: (message: string, meta?: unknown): void => write('debug', console.debug, message, meta),
  info: (message: string, meta?: unknown): void => write('info', console.info, message, meta),
  warn: (message: string, meta?: unknown): void => write('warn', console.warn, message, meta),
  error: (message: string, meta?: unknown): void => write('error', console.error, message, meta)
};
