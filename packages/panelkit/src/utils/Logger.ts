/**
 * Logging System
 *
 * Consistent logging across panelkit components with context and level
 * filtering. Entries are kept in a bounded in-memory buffer so hosts can
 * inspect recent activity without a console.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SYSTEM = 4,
}

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  system?: string;
  error?: Error;
}

export interface LoggerConfig {
  minLevel: LogLevel;
  enableConsole: boolean;
  enableSystemLogs: boolean;
  maxLogEntries: number;
}

class LoggerImpl {
  private config: LoggerConfig;
  private logs: LogEntry[] = [];
  private systemStats = new Map<
    string,
    { errors: number; warnings: number; messages: number }
  >();

  constructor(config?: Partial<LoggerConfig>) {
    this.config = {
      minLevel: LogLevel.INFO,
      enableConsole: true,
      enableSystemLogs: true,
      maxLogEntries: 10000,
      ...config,
    };
  }

  public configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  public debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  public info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  public error(
    message: string,
    error?: Error,
    context?: Record<string, unknown>,
  ): void {
    this.log(LogLevel.ERROR, message, { ...context }, error);
  }

  public system(
    systemName: string,
    message: string,
    context?: Record<string, unknown>,
  ): void {
    if (!this.config.enableSystemLogs) return;
    this.bumpStats(systemName, "messages");
    this.log(
      LogLevel.SYSTEM,
      `[${systemName}] ${message}`,
      context,
      undefined,
      systemName,
    );
  }

  public systemDebug(
    systemName: string,
    message: string,
    context?: Record<string, unknown>,
  ): void {
    if (!this.config.enableSystemLogs) return;
    this.log(
      LogLevel.DEBUG,
      `[${systemName}] ${message}`,
      context,
      undefined,
      systemName,
    );
  }

  public systemError(
    systemName: string,
    message: string,
    error?: Error,
    context?: Record<string, unknown>,
  ): void {
    if (!this.config.enableSystemLogs) return;
    this.bumpStats(systemName, "errors");
    this.log(
      LogLevel.ERROR,
      `[${systemName}] ${message}`,
      context,
      error,
      systemName,
    );
  }

  public systemWarn(
    systemName: string,
    message: string,
    context?: Record<string, unknown>,
  ): void {
    if (!this.config.enableSystemLogs) return;
    this.bumpStats(systemName, "warnings");
    this.log(
      LogLevel.WARN,
      `[${systemName}] ${message}`,
      context,
      undefined,
      systemName,
    );
  }

  private bumpStats(
    systemName: string,
    field: "errors" | "warnings" | "messages",
  ): void {
    const stats = this.systemStats.get(systemName) || {
      errors: 0,
      warnings: 0,
      messages: 0,
    };
    stats[field]++;
    this.systemStats.set(systemName, stats);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
    system?: string,
  ): void {
    if (level < this.config.minLevel) return;

    const entry: LogEntry = {
      timestamp: Date.now(),
      level,
      message,
      context,
      error,
      system,
    };

    this.logs.push(entry);
    if (this.logs.length > this.config.maxLogEntries) {
      this.logs.splice(0, this.logs.length - this.config.maxLogEntries);
    }

    if (this.config.enableConsole) {
      this.outputToConsole(entry);
    }
  }

  private outputToConsole(entry: LogEntry): void {
    const timestamp = new Date(entry.timestamp).toISOString();
    const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : "";
    const logMessage = `[${timestamp}] ${entry.message}${contextStr}`;

    switch (entry.level) {
      case LogLevel.DEBUG:
        console.debug(logMessage);
        break;
      case LogLevel.INFO:
      case LogLevel.SYSTEM:
        console.info(logMessage);
        break;
      case LogLevel.WARN:
        console.warn(logMessage);
        break;
      case LogLevel.ERROR:
        if (entry.error) {
          console.error(logMessage, entry.error);
        } else {
          console.error(logMessage);
        }
        break;
    }
  }

  public getSystemStats(): Map<
    string,
    { errors: number; warnings: number; messages: number }
  > {
    return new Map(this.systemStats);
  }

  public getRecentLogs(count: number = 100): LogEntry[] {
    return this.logs.slice(-count);
  }

  public getSystemLogs(systemName: string, count: number = 100): LogEntry[] {
    return this.logs.filter((log) => log.system === systemName).slice(-count);
  }

  public clearLogs(): void {
    this.logs = [];
    this.systemStats.clear();
  }

  public setLogLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  public isLevelEnabled(level: LogLevel): boolean {
    return level >= this.config.minLevel;
  }
}

export const Logger = new LoggerImpl();

// Convenience logger for components
export class SystemLogger {
  constructor(private systemName: string) {}

  debug(message: string, context?: Record<string, unknown>): void {
    Logger.systemDebug(this.systemName, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    Logger.system(this.systemName, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    Logger.systemWarn(this.systemName, message, context);
  }

  error(
    message: string,
    error?: Error,
    context?: Record<string, unknown>,
  ): void {
    Logger.systemError(this.systemName, message, error, context);
  }
}

function parseLogLevel(name: string): LogLevel | undefined {
  switch (name.toUpperCase()) {
    case "DEBUG":
      return LogLevel.DEBUG;
    case "INFO":
      return LogLevel.INFO;
    case "WARN":
      return LogLevel.WARN;
    case "ERROR":
      return LogLevel.ERROR;
    case "SYSTEM":
      return LogLevel.SYSTEM;
    default:
      return undefined;
  }
}

// Environment-based configuration
if (typeof process !== "undefined" && process.env) {
  if (process.env.NODE_ENV === "production") {
    Logger.configure({ minLevel: LogLevel.WARN });
  } else if (process.env.NODE_ENV === "test") {
    Logger.configure({ minLevel: LogLevel.ERROR, enableConsole: false });
  } else {
    Logger.configure({ minLevel: LogLevel.DEBUG, enableConsole: true });
  }

  // An explicit level wins over the environment default
  const logLevel = process.env.LOG_LEVEL;
  const level = logLevel ? parseLogLevel(logLevel) : undefined;
  if (level !== undefined) {
    Logger.setLogLevel(level);
  }
}

export default Logger;
