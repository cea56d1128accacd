import { config } from '../config.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogContext = Record<string, unknown>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SERVICE_NAME = 'cfp-backend';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, meta?: LogContext): void;
  info(message: string, meta?: LogContext): void;
  warn(message: string, meta?: LogContext): void;
  error(message: string, meta?: LogContext): void;
  // Logger whose entries always carry the given fields (request_id, conference_id, ...)
  child(context: LogContext): Logger;
}

function should_log(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[config.log_level];
}

function write(level: LogLevel, message: string, context: LogContext, meta?: LogContext): void {
  if (!should_log(level)) {
    return;
  }

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    service: SERVICE_NAME,
    env: config.node_env,
    ...context,
    ...meta,
  };

  const output = JSON.stringify(entry);

  if (level === 'error' || level === 'warn') {
    console.error(output);
  } else {
    console.log(output);
  }
}

function create_logger(context: LogContext): Logger {
  return {
    debug: (message, meta) => write('debug', message, context, meta),
    info: (message, meta) => write('info', message, context, meta),
    warn: (message, meta) => write('warn', message, context, meta),
    error: (message, meta) => write('error', message, context, meta),
    child: (extra) => create_logger({ ...context, ...extra }),
  };
}

export const logger = create_logger({});
