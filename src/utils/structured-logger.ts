/**
 * Structured Logger
 *
 * Outputs one JSON line per entry to stdout/stderr for log aggregation.
 * Only the HTTP layer logs; the analytics engine returns everything as
 * data.
 *
 * Usage:
 *   import { structuredLog, errorContext } from '../utils/structured-logger';
 *
 *   structuredLog('INFO', 'Request processed', { endpoint: '/v1/analytics/attribution', status: 200 });
 *
 *   try { ... } catch (err) {
 *     structuredLog('ERROR', 'Scoring failed', { endpoint, ...errorContext(err) });
 *   }
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'CRITICAL';

export interface LogContext {
  request_id?: string;
  endpoint?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  service: 'influencer-campaign-analytics';
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  INFO: 0,
  WARN: 1,
  ERROR: 2,
  CRITICAL: 3,
};

let threshold: LogLevel = 'INFO';

/**
 * Entries below `level` are dropped. Set once at startup from LOG_LEVEL.
 */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

// =============================================================================
// Core Logger
// =============================================================================

/**
 * JSON.stringify with circular reference protection.
 */
function safeStringify(obj: unknown): string {
  const seen = new WeakSet();
  return JSON.stringify(obj, (_key, value) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) return '[Circular]';
      seen.add(value);
    }
    if (typeof value === 'bigint') return value.toString();
    if (typeof value === 'function') return '[Function]';
    return value;
  });
}

/**
 * Emit a structured JSON log entry.
 *
 * Routes to the appropriate console method based on severity:
 *   - CRITICAL / ERROR  -> console.error  (stderr)
 *   - WARN              -> console.warn   (stderr)
 *   - INFO              -> console.log    (stdout)
 */
export function structuredLog(level: LogLevel, message: string, context?: LogContext): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    service: 'influencer-campaign-analytics',
    ...context,
  };

  const json = safeStringify(entry);

  switch (level) {
    case 'CRITICAL':
    case 'ERROR':
      console.error(json);
      break;
    case 'WARN':
      console.warn(json);
      break;
    default:
      console.log(json);
  }
}

/**
 * Extract error details including a short stack for structured logging.
 */
export function errorContext(error: unknown): { error: string; error_type: string; stack?: string } {
  if (error instanceof Error) {
    return {
      error: error.message,
      error_type: error.constructor.name,
      ...(error.stack ? { stack: error.stack.split('\n').slice(1, 4).join(' | ') } : {}),
    };
  }
  return { error: String(error), error_type: typeof error };
}
