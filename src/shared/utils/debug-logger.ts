// Debug Logging Utility
// Centralized logging with environment-aware output

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  data?: unknown;
  timestamp: string;
  component?: string;
  device?: string;
}

class DebugLogger {
  private static instance: DebugLogger;
  private currentLevel: LogLevel = LogLevel.INFO;
  private logs: LogEntry[] = [];
  private maxLogs: number = 1000;

  static getInstance(): DebugLogger {
    if (!DebugLogger.instance) {
      DebugLogger.instance = new DebugLogger();
    }
    return DebugLogger.instance;
  }

  constructor() {
    this.setLogLevel(this.getEnvironmentLogLevel());
  }

  private getEnvironmentLogLevel(): LogLevel {
    const env = process.env.NODE_ENV;
    const debugMode = process.env.DEBUG_LOGGING === 'true';

    if (debugMode) return LogLevel.DEBUG;
    if (env === 'development') return LogLevel.DEBUG;
    if (env === 'test') return LogLevel.WARN;
    return LogLevel.ERROR;
  }

  setLogLevel(level: LogLevel): void {
    this.currentLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= this.currentLevel;
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    data?: unknown,
    component?: string,
    device?: string
  ): LogEntry {
    return {
      level,
      message,
      data,
      timestamp: new Date().toISOString(),
      component,
      device,
    };
  }

  private addToLog(entry: LogEntry): void {
    this.logs.push(entry);

    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }
  }

  private formatMessage(entry: LogEntry): string {
    const timestamp = new Date(entry.timestamp).toLocaleTimeString();
    const component = entry.component ? `[${entry.component}]` : '';
    const device = entry.device ? `[Device:${entry.device}]` : '';

    return `${timestamp} ${component}${device} ${entry.message}`;
  }

  debug(message: string, data?: unknown, component?: string, device?: string): void {
    if (!this.shouldLog(LogLevel.DEBUG)) return;

    const entry = this.createLogEntry(LogLevel.DEBUG, message, data, component, device);
    this.addToLog(entry);

    console.debug(this.formatMessage(entry), data ?? '');
  }

  info(message: string, data?: unknown, component?: string, device?: string): void {
    if (!this.shouldLog(LogLevel.INFO)) return;

    const entry = this.createLogEntry(LogLevel.INFO, message, data, component, device);
    this.addToLog(entry);

    console.info(this.formatMessage(entry), data ?? '');
  }

  warn(message: string, data?: unknown, component?: string, device?: string): void {
    if (!this.shouldLog(LogLevel.WARN)) return;

    const entry = this.createLogEntry(LogLevel.WARN, message, data, component, device);
    this.addToLog(entry);

    console.warn(this.formatMessage(entry), data ?? '');
  }

  error(message: string, data?: unknown, component?: string, device?: string): void {
    if (!this.shouldLog(LogLevel.ERROR)) return;

    const entry = this.createLogEntry(LogLevel.ERROR, message, data, component, device);
    this.addToLog(entry);

    console.error(this.formatMessage(entry), data ?? '');
  }

  // Device boundary helpers
  deviceOperation(operation: string, device: string, data?: unknown): void {
    this.info(`Device ${operation}`, data, 'PrinterService', device);
  }

  transferOperation(byteCount: number, device: string): void {
    this.debug(`Wrote ${byteCount} bytes`, { byteCount }, 'PrinterService', device);
  }

  getLogs(level?: LogLevel, component?: string, limit?: number): LogEntry[] {
    let filteredLogs = this.logs;

    if (level !== undefined) {
      filteredLogs = filteredLogs.filter(log => log.level >= level);
    }

    if (component) {
      filteredLogs = filteredLogs.filter(log => log.component === component);
    }

    if (limit) {
      filteredLogs = filteredLogs.slice(-limit);
    }

    return filteredLogs;
  }

  clearLogs(): void {
    this.logs = [];
  }
}

export const debugLogger = DebugLogger.getInstance();
