export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

function ts(): string {
  return new Date().toISOString();
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

export function logDebug(message: string, meta?: unknown): void {
  if (!enabled('debug')) {
    return;
  }
  if (meta !== undefined) {
    console.log(`[${ts()}] DEBUG ${message}`, meta);
    return;
  }
  console.log(`[${ts()}] DEBUG ${message}`);
}

export function logInfo(message: string, meta?: unknown): void {
  if (!enabled('info')) {
    return;
  }
  if (meta !== undefined) {
    console.log(`[${ts()}] INFO ${message}`, meta);
    return;
  }
  console.log(`[${ts()}] INFO ${message}`);
}

export function logWarn(message: string, meta?: unknown): void {
  if (!enabled('warn')) {
    return;
  }
  if (meta !== undefined) {
    console.warn(`[${ts()}] WARN ${message}`, meta);
    return;
  }
  console.warn(`[${ts()}] WARN ${message}`);
}

export function logError(message: string, meta?: unknown): void {
  if (meta !== undefined) {
    console.error(`[${ts()}] ERROR ${message}`, meta);
    return;
  }
  console.error(`[${ts()}] ERROR ${message}`);
}
