/**
 * Console logger with terminal formatting
 */
import { colors, formatCategory, formatLogLevel } from './terminal-ui.js';

enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogLevelName = keyof typeof LogLevel;

export function isLogLevelName(value: string): value is LogLevelName {
  return value === 'DEBUG' || value === 'INFO' || value === 'WARN' || value === 'ERROR';
}

const LEVEL_NAMES: Record<LogLevel, LogLevelName> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
};

function serialize(data: unknown): string {
  if (data instanceof Error) {
    return JSON.stringify({ name: data.name, message: data.message });
  }
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

class Logger {
  private level: LogLevel = LogLevel.INFO;

  setLevel(level: LogLevelName): void {
    this.level = LogLevel[level];
  }

  private log(level: LogLevel, category: string, message: string, data?: unknown): void {
    if (level < this.level) return;
    const ts = new Date().toISOString();
    const timestamp = `${colors.gray}${ts}${colors.reset}`;
    const levelStr = formatLogLevel(LEVEL_NAMES[level]);
    const categoryStr = formatCategory(category);
    const messageStr = `${colors.bright}${message}${colors.reset}`;
    const dataStr = data !== undefined ? ` ${colors.dim}${serialize(data)}${colors.reset}` : '';

    console.log(`${timestamp} ${levelStr} ${categoryStr} ${messageStr}${dataStr}`);
  }

  debug(category: string, message: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, category, message, data);
  }

  info(category: string, message: string, data?: unknown): void {
    this.log(LogLevel.INFO, category, message, data);
  }

  warn(category: string, message: string, data?: unknown): void {
    this.log(LogLevel.WARN, category, message, data);
  }

  error(category: string, message: string, data?: unknown): void {
    this.log(LogLevel.ERROR, category, message, data);
  }

  // Specialized loggers
  http(method: string, path: string, status: number, duration?: number): void {
    const durationStr = duration ? ` (${duration}ms)` : '';
    this.info('HTTP', `${method} ${path} ${status}${durationStr}`);
  }

  websocket(event: string, clientId: string, data?: unknown): void {
    this.info('WebSocket', `${event} - Client: ${clientId}`, data);
  }

  trigger(event: string, source: string, data?: unknown): void {
    this.info('Trigger', `${event} - Source: ${source}`, data);
  }

  task(event: string, taskId: string, data?: unknown): void {
    this.info('Scheduler', `${event} - Task: ${taskId}`, data);
  }
}

export const logger = new Logger();
