/**
 * Logging Service
 *
 * Structured logging for the form layer and its host process. Every entry
 * carries the dotted name of the logger that wrote it
 * (`form-processor.form.book`, `form-processor.store`), so a form's
 * validation dumps can be told apart from the store's row writes.
 *
 * Entries go to the sink (stderr by default), or to the attached MCP
 * server as notifications/message once one is connected.
 */

/**
 * Log level type matching MCP specification (RFC 5424)
 */
export type LogLevel =
  | 'debug'
  | 'info'
  | 'notice'
  | 'warning'
  | 'error'
  | 'critical'
  | 'alert'
  | 'emergency';

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  notice: 2,
  warning: 3,
  error: 4,
  critical: 5,
  alert: 6,
  emergency: 7,
};

/**
 * Type guard for log level names coming from env, CLI or logging/setLevel
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(SEVERITY, value);
}

export interface LogEntry {
  level: LogLevel;
  /** Dotted logger name */
  logger: string;
  message: string;
  timestamp: number;
  context?: Record<string, unknown>;
  error?: Error;
}

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  readonly name: string;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warning(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  critical(message: string, error?: Error, context?: Record<string, unknown>): void;
  /** Logger named `<this name>.<scope>`, sharing level and output */
  child(scope: string): Logger;
}

/**
 * MCP Notification sender interface
 */
export interface McpNotificationSender {
  sendLoggingMessage(params: {
    level: LogLevel;
    logger?: string;
    data: Record<string, unknown>;
  }): Promise<void>;
}

// ============================================================================
// Output
// ============================================================================

/**
 * Default sink. stdout is reserved for the MCP transport.
 */
export function writeToStderr(entry: LogEntry): void {
  const timestamp = new Date(entry.timestamp).toISOString();
  let output = `[${timestamp}] ${entry.level.toUpperCase().padEnd(8)} ${entry.logger}: ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    output += `\n  Context: ${JSON.stringify(entry.context)}`;
  }
  if (entry.error) {
    output += `\n  Error: ${entry.error.message}`;
    if (entry.error.stack) {
      output += `\n  Stack: ${entry.error.stack}`;
    }
  }

  console.error(output);
}

function notificationData(entry: LogEntry): Record<string, unknown> {
  const data: Record<string, unknown> = {
    message: entry.message,
    timestamp: new Date(entry.timestamp).toISOString(),
  };
  if (entry.context && Object.keys(entry.context).length > 0) {
    data.context = entry.context;
  }
  if (entry.error) {
    data.error = { message: entry.error.message, name: entry.error.name, stack: entry.error.stack };
  }
  return data;
}

// ============================================================================
// Loggers
// ============================================================================

/**
 * Root logger. Holds the minimum level, the sink and the MCP connection
 * for itself and every child.
 */
export class LoggingService implements Logger {
  readonly name: string;
  private minLevel: LogLevel;
  private readonly sink: LogSink;
  private mcpServer: McpNotificationSender | null = null;

  constructor(minLevel: LogLevel = 'info', sink: LogSink = writeToStderr, name = 'form-processor') {
    this.minLevel = minLevel;
    this.sink = sink;
    this.name = name;
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  /**
   * Forward entries to `server` instead of the sink; `null` detaches.
   */
  setMcpServer(server: McpNotificationSender | null): void {
    this.mcpServer = server;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', this.name, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', this.name, message, context);
  }

  warning(message: string, context?: Record<string, unknown>): void {
    this.write('warning', this.name, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.write('error', this.name, message, context, error);
  }

  critical(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.write('critical', this.name, message, context, error);
  }

  child(scope: string): Logger {
    return new ScopedLogger(this, `${this.name}.${scope}`);
  }

  /**
   * Record one entry under `logger`, if `level` passes the minimum.
   */
  write(
    level: LogLevel,
    logger: string,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
  ): void {
    if (SEVERITY[level] < SEVERITY[this.minLevel]) return;

    const entry: LogEntry = { level, logger, message, timestamp: Date.now(), context, error };
    if (this.mcpServer) {
      void this.notify(this.mcpServer, entry);
    } else {
      this.sink(entry);
    }
  }

  private async notify(server: McpNotificationSender, entry: LogEntry): Promise<void> {
    try {
      await server.sendLoggingMessage({ level: entry.level, logger: entry.logger, data: notificationData(entry) });
    } catch (error) {
      // Not through write(): the server is the thing failing
      console.error('[LoggingService] Failed to send MCP notification:', error);
      this.sink(entry);
    }
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly root: LoggingService,
    readonly name: string,
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.root.write('debug', this.name, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.root.write('info', this.name, message, context);
  }

  warning(message: string, context?: Record<string, unknown>): void {
    this.root.write('warning', this.name, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.root.write('error', this.name, message, context, error);
  }

  critical(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.root.write('critical', this.name, message, context, error);
  }

  child(scope: string): Logger {
    return new ScopedLogger(this.root, `${this.name}.${scope}`);
  }
}

// Singleton instance
let globalLogger: LoggingService | null = null;

/**
 * Get or create the root logger. Level from LOG_LEVEL, else info.
 */
export function getLogger(): LoggingService {
  const envLevel = process.env.LOG_LEVEL;
  globalLogger ??= new LoggingService(isLogLevel(envLevel) ? envLevel : 'info');
  return globalLogger;
}

/**
 * Replace the root logger. Loggers already handed out by `child()` keep
 * writing to the one they came from.
 */
export function setLogger(logger: LoggingService): void {
  globalLogger = logger;
}
