/**
 * Console logger with a bracketed component prefix, e.g. "[Ingestion] Upload recebido".
 */

import type { LogLevel, WorkflowConfig } from './config.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export function createLogger(component: string, options: WorkflowConfig['logging']): Logger {
  const threshold = LEVEL_ORDER[options.level];

  function write(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < threshold) return;

    const sink =
      level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;

    if (options.json) {
      sink(
        JSON.stringify({
          timestamp: new Date().toISOString(),
          level,
          component,
          message,
          ...context,
        })
      );
      return;
    }

    if (context && Object.keys(context).length > 0) {
      sink(`[${component}] ${message}`, context);
    } else {
      sink(`[${component}] ${message}`);
    }
  }

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  };
}
