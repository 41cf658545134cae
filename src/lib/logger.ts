/**
 * Structured Logger with Request Correlation
 *
 * - JSON lines in production, colourised single lines elsewhere
 * - Levels: debug, info, warn, error (threshold via LOG_LEVEL)
 * - Context metadata, child loggers, request/user correlation
 * - Accepts both error(message, Error, context) and error(message, { error })
 */

const isProduction = process.env.NODE_ENV === 'production';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  requestId?: string;
  userId?: string;
  [key: string]: unknown;
}

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  service: string;
  env: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function minimumLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(configured)) {
    return configured;
  }
  return isProduction ? 'info' : 'debug';
}

function formatPretty(entry: LogEntry): string {
  const color = LEVEL_COLORS[entry.level];
  const levelUpper = entry.level.toUpperCase().padEnd(5);
  const timestamp = COLORS.dim + entry.timestamp + COLORS.reset;

  let output = `${timestamp} ${color}${levelUpper}${COLORS.reset} ${entry.message}`;

  if (entry.context) {
    const contextStr = Object.entries(entry.context)
      .map(([k, v]) => `${COLORS.cyan}${k}${COLORS.reset}=${JSON.stringify(v)}`)
      .join(' ');
    if (contextStr) {
      output += ` ${COLORS.dim}[${contextStr}]${COLORS.reset}`;
    }
  }

  if (entry.error) {
    output += `\n  ${COLORS.red}Error: ${entry.error.message}${COLORS.reset}`;
    if (entry.error.stack) {
      const stackLines = entry.error.stack.split('\n').slice(1, 5);
      output += `\n  ${COLORS.gray}${stackLines.join('\n  ')}${COLORS.reset}`;
    }
  }

  return output;
}

function formatEntry(entry: LogEntry): string {
  return isProduction ? JSON.stringify(entry) : formatPretty(entry);
}

function compactContext(context: LogContext): LogContext | undefined {
  const clean: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    if (value !== undefined) {
      clean[key] = value;
    }
  }
  return Object.keys(clean).length > 0 ? clean : undefined;
}

export interface Logger {
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  // error(message, Error, context) or legacy error(message, { error, ...context })
  error(message: string, error?: Error | LogContext, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
  withRequestId(requestId: string): Logger;
  withUserId(userId: string): Logger;
}

function createLogger(baseContext: LogContext = {}): Logger {
  const log = (
    level: LogLevel,
    message: string,
    error?: Error,
    additionalContext?: LogContext
  ): void => {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[minimumLevel()]) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      service: process.env.SERVICE_NAME || 'api-analytics',
      env: process.env.NODE_ENV || 'development',
      context: compactContext({ ...baseContext, ...additionalContext }),
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: isProduction ? undefined : error.stack,
      };
    }

    const output = formatEntry(entry);

    switch (level) {
      case 'debug':
        console.debug(output);
        break;
      case 'info':
        console.info(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      case 'error':
        console.error(output);
        break;
    }
  };

  return {
    info: (message, context) => log('info', message, undefined, context),
    warn: (message, context) => log('warn', message, undefined, context),

    error: (message, errorOrContext, context) => {
      if (errorOrContext instanceof Error) {
        log('error', message, errorOrContext, context);
        return;
      }
      if (errorOrContext && !context) {
        const { error: errorValue, ...restContext } = errorOrContext;
        if (errorValue instanceof Error) {
          log('error', message, errorValue, restContext);
        } else if (typeof errorValue === 'string' && errorValue) {
          log('error', message, new Error(errorValue), restContext);
        } else {
          log('error', message, undefined, errorOrContext);
        }
        return;
      }
      log('error', message, undefined, context);
    },

    debug: (message, context) => log('debug', message, undefined, context),

    child: (context) => createLogger({ ...baseContext, ...context }),
    withRequestId: (requestId) => createLogger({ ...baseContext, requestId }),
    withUserId: (userId) => createLogger({ ...baseContext, userId }),
  };
}

export const logger = createLogger();

export const createLoggerWithContext = (context: LogContext): Logger => createLogger(context);

export default logger;
