type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

let debugEnabled = true;

/**
 * Active ou coupe les logs `debug` (option `debugLogging`, modifiable à chaud
 * via /api/launch/configure).
 */
export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

function baseLog(level: LogLevel, message: string, context?: LogContext): void {
  const payload = {
    level,
    message,
    time: new Date().toISOString(),
    ...context
  };

  const serialized = JSON.stringify(payload);

  if (level === 'error') {
    // eslint-disable-next-line no-console
    console.error(serialized);
  } else {
    // eslint-disable-next-line no-console
    console.log(serialized);
  }
}

export function logDebug(message: string, context?: LogContext): void {
  if (debugEnabled) {
    baseLog('debug', message, context);
  }
}

export function logInfo(message: string, context?: LogContext): void {
  baseLog('info', message, context);
}

export function logWarn(message: string, context?: LogContext): void {
  baseLog('warn', message, context);
}

export function logError(message: string, context?: LogContext): void {
  baseLog('error', message, context);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
