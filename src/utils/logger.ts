import { performance } from 'perf_hooks';
import chalk from './chalk.js';

/**
 * Structured logger for the search gateway.
 * JSON lines by default; a coloured single-line form when pretty output is on.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface LogContext {
  correlationId?: string;
  clientId?: string;
  region?: string;
  searchType?: string;
  query?: string;
  operation?: string;
  duration?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string | number;
  };
  metrics?: Record<string, number>;
}

const LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.cyan,
  debug: chalk.gray,
  trace: chalk.dim,
};

function errorCode(error: Error): string | number | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' || typeof code === 'number' ? code : undefined;
}

class Logger {
  private logLevel: LogLevel;
  private pretty: boolean;
  private readonly serviceName: string;
  private readonly environment: string;
  private readonly version: string;
  private readonly baseContext: LogContext;

  constructor(
    serviceName: string = 'adventurer-search-gateway',
    logLevel: LogLevel = 'info',
    environment: string = process.env.NODE_ENV || 'development',
    version: string = process.env.npm_package_version || '1.0.0',
    baseContext: LogContext = {}
  ) {
    this.serviceName = serviceName;
    this.logLevel = logLevel;
    this.environment = environment;
    this.version = version;
    this.baseContext = baseContext;
    this.pretty = false;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) <= LEVELS.indexOf(this.logLevel);
  }

  private formatLogEntry(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: Error,
    metrics?: Record<string, number>
  ): LogEntry {
    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: {
        ...this.baseContext,
        ...context,
        service: this.serviceName,
        environment: this.environment,
        version: this.version,
      },
    };

    if (error) {
      logEntry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
        code: errorCode(error),
      };
    }

    if (metrics) {
      logEntry.metrics = metrics;
    }

    return logEntry;
  }

  private render(logEntry: LogEntry): string {
    if (!this.pretty) {
      return JSON.stringify(logEntry);
    }

    const { service: _service, environment: _environment, version: _version, ...rest } = logEntry.context ?? {};
    const color = LEVEL_COLORS[logEntry.level];
    const details = Object.keys(rest).length > 0 ? ' ' + chalk.gray(JSON.stringify(rest)) : '';
    const failure = logEntry.error ? ' ' + chalk.red(`${logEntry.error.name}: ${logEntry.error.message}`) : '';
    return `${chalk.dim(logEntry.timestamp)} ${color(logEntry.level.toUpperCase().padEnd(5))} ${logEntry.message}${details}${failure}`;
  }

  private writeLog(logEntry: LogEntry): void {
    const output = this.render(logEntry);
    if (logEntry.level === 'error' || logEntry.level === 'warn') {
      console.error(output);
    } else {
      console.log(output);
    }
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog('error')) return;
    this.writeLog(this.formatLogEntry('error', message, context, error));
  }

  warn(message: string, context?: LogContext): void {
    if (!this.shouldLog('warn')) return;
    this.writeLog(this.formatLogEntry('warn', message, context));
  }

  info(message: string, context?: LogContext): void {
    if (!this.shouldLog('info')) return;
    this.writeLog(this.formatLogEntry('info', message, context));
  }

  debug(message: string, context?: LogContext): void {
    if (!this.shouldLog('debug')) return;
    this.writeLog(this.formatLogEntry('debug', message, context));
  }

  trace(message: string, context?: LogContext): void {
    if (!this.shouldLog('trace')) return;
    this.writeLog(this.formatLogEntry('trace', message, context));
  }

  /**
   * Log with custom metrics
   */
  metric(message: string, metrics: Record<string, number>, context?: LogContext): void {
    if (!this.shouldLog('info')) return;
    this.writeLog(this.formatLogEntry('info', message, context, undefined, metrics));
  }

  /**
   * Time a function execution and log the result
   */
  async timeAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: LogContext
  ): Promise<T> {
    const startTime = performance.now();
    const operationContext = { ...context, operation };

    this.debug(`Starting operation: ${operation}`, operationContext);

    try {
      const result = await fn();
      const duration = performance.now() - startTime;

      this.debug(`Operation completed: ${operation}`, { ...operationContext, duration });

      return result;
    } catch (error) {
      const duration = performance.now() - startTime;

      this.error(`Operation failed: ${operation}`,
        { ...operationContext, duration },
        error instanceof Error ? error : new Error(String(error))
      );

      throw error;
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: LogContext): Logger {
    const childLogger = new Logger(
      this.serviceName,
      this.logLevel,
      this.environment,
      this.version,
      { ...this.baseContext, ...additionalContext }
    );
    childLogger.setPretty(this.pretty);
    return childLogger;
  }

  setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLogLevel(): LogLevel {
    return this.logLevel;
  }

  setPretty(pretty: boolean): void {
    this.pretty = pretty;
  }
}

// Create default logger instance
export const logger = new Logger();

// Export Logger class for custom instances
export { Logger };

/**
 * Helper function to create operation-specific loggers
 */
export function createOperationLogger(operation: string, context?: LogContext): Logger {
  return logger.child({ operation, ...context });
}

/**
 * Helper function to log HTTP requests
 */
export function logHttpRequest(
  method: string,
  path: string,
  statusCode: number,
  duration: number,
  context?: LogContext
): void {
  const message = `HTTP ${method} ${path} ${statusCode}`;

  logger.metric(message, {
    http_status_code: statusCode,
    http_duration_ms: duration,
    http_success: statusCode < 400 ? 1 : 0
  }, {
    ...context,
    http_method: method,
    http_path: path,
    http_status_code: statusCode
  });
}

/**
 * Helper function to log cache operations
 */
export function logCacheOperation(
  operation: 'hit' | 'miss' | 'set',
  key: string,
  duration?: number,
  context?: LogContext
): void {
  logger.debug(`Cache ${operation} for ${key}`, {
    ...context,
    cache_operation: operation,
    cache_key: key,
    cache_duration_ms: duration || 0
  });
}
