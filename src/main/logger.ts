/**
 * Tagged logger for the mirror's services.
 * Lines go to the console and to a ring buffer served by GET /api/logs. Proxy credentials and
 * key-like query parameters are masked first, since request URLs are logged verbatim.
 */
import { DiagLogLevel, type DiagLogEntry } from '@shared/diagnostic';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: Error): void;
}

const MASK = '***MASKED***';

/** user:pass@ in a proxy or upstream URL */
const URL_CREDENTIALS = /(\/\/)[^/\s:@]+:[^/\s@]+@/g;

/** Header dumps from proxy errors */
const AUTH_HEADER = /((?:proxy-)?authorization:\s*)(?:(?:basic|bearer)\s+)?[^\s;,]+/gi;

/** ?key=, &api_key=, token=, password= in query strings and messages */
const SECRET_PARAM = /\b(api_?key|key|token|password)([=:]\s*)[^\s;&]+/gi;

export function maskSensitive(message: string): string {
  return message
    .replace(URL_CREDENTIALS, `$1${MASK}@`)
    .replace(AUTH_HEADER, `$1${MASK}`)
    .replace(SECRET_PARAM, `$1$2${MASK}`);
}

// ---------------------------------------------------------------------------
// Level threshold (LOG_LEVEL)
// ---------------------------------------------------------------------------

const LEVEL_RANK: Readonly<Record<DiagLogLevel, number>> = {
  [DiagLogLevel.Info]: 0,
  [DiagLogLevel.Warn]: 1,
  [DiagLogLevel.Error]: 2,
};

let minLevel: DiagLogLevel = DiagLogLevel.Info;

/** Entries below level are neither printed nor buffered */
export function setLogLevel(level: DiagLogLevel): void {
  minLevel = level;
}

// ---------------------------------------------------------------------------
// Ring buffer for GET /api/logs
// ---------------------------------------------------------------------------

const LOG_BUFFER_MAX = 1000;
const logBuffer: DiagLogEntry[] = [];

function pushEntry(level: DiagLogLevel, tag: string, message: string): void {
  if (logBuffer.length >= LOG_BUFFER_MAX) {
    logBuffer.shift();
  }
  logBuffer.push({ timestamp: new Date().toISOString(), level, tag, message });
}

/** Oldest first */
export function getLogBuffer(): readonly DiagLogEntry[] {
  return [...logBuffer];
}

export function clearLogBuffer(): void {
  logBuffer.length = 0;
}

// ---------------------------------------------------------------------------
// Logger factory
// ---------------------------------------------------------------------------

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;

  const emit = (level: DiagLogLevel, message: string, detail?: string): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;
    const line = `${prefix} ${level.toUpperCase()}: ${message}`;
    if (level === DiagLogLevel.Warn) {
      console.warn(line);
    } else if (detail !== undefined) {
      console.error(line, detail);
    } else {
      // stdout stays free for piping
      console.error(line);
    }
    pushEntry(level, tag, detail !== undefined ? `${message} ${detail}` : message);
  };

  return {
    info(message) {
      emit(DiagLogLevel.Info, maskSensitive(message));
    },
    warn(message) {
      emit(DiagLogLevel.Warn, maskSensitive(message));
    },
    error(message, err) {
      emit(
        DiagLogLevel.Error,
        maskSensitive(message),
        err !== undefined ? maskSensitive(err.message) : undefined,
      );
    },
  };
}

/** Normalize an unknown thrown value */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
