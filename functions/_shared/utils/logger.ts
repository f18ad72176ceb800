// ============================================================================
// STRUCTURED LOGGING
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  request_id?: string;
  task?: string;
  scope?: string;
  scope_id?: string;
  metric?: string;
  method?: string;
  path?: string;
  status?: number;
  duration_ms?: number;
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger whose entries always carry `context`. */
  child(context: LogContext): Logger;
  /** One line per HTTP exchange; 4xx logs at warn, 5xx at error. */
  request(request: Request, response: Response, context: LogContext & { duration_ms: number }): void;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minimumLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

function write(level: LogLevel, message: string, context: LogContext): void {
  if (levelRank[level] < levelRank[minimumLevel]) {
    return;
  }

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    context,
  };

  // Output as single-line JSON for log aggregation
  const output = JSON.stringify(entry);

  switch (level) {
    case 'error':
      console.error(output);
      break;
    case 'warn':
      console.warn(output);
      break;
    default:
      console.log(output);
  }
}

function createLogger(base: LogContext): Logger {
  const at = (level: LogLevel) => (message: string, context: LogContext = {}) =>
    write(level, message, { ...base, ...context });

  return {
    debug: at('debug'),
    info: at('info'),
    warn: at('warn'),
    error: at('error'),
    child: (context) => createLogger({ ...base, ...context }),
    request: (request, response, context) => {
      const { pathname } = new URL(request.url);
      const level: LogLevel = response.status >= 500 ? 'error' : response.status >= 400 ? 'warn' : 'info';

      write(level, `${request.method} ${pathname} ${response.status}`, {
        ...base,
        method: request.method,
        path: pathname,
        status: response.status,
        ...context,
      });
    },
  };
}

export const logger = createLogger({});
