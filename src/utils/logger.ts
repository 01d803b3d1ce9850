// src/utils/logger.ts
import { getLoggerProvider } from './otel_provider';
import { SeverityNumber } from '@opentelemetry/api-logs';

enum LogLevel {
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  DEBUG = 'DEBUG',
}

const LOG_LEVEL_TO_SEVERITY: Record<LogLevel, SeverityNumber> = {
  [LogLevel.DEBUG]: SeverityNumber.DEBUG,
  [LogLevel.INFO]: SeverityNumber.INFO,
  [LogLevel.WARN]: SeverityNumber.WARN,
  [LogLevel.ERROR]: SeverityNumber.ERROR,
};

export type LogAttributes = Record<string, string | number | boolean>;

export interface ProjectContext {
  root: string;
}

function log(level: LogLevel, message: string, metadata: LogAttributes = {}, project?: ProjectContext) {
  // Silent mode: skip console output in test environment
  if (process.env.NODE_ENV !== 'test') {
    const timestamp = new Date().toISOString();
    console.log(`[${timestamp}] [${level}] ${message}`);
  }

  // Send to OTel if enabled
  const loggerProvider = getLoggerProvider();
  if (loggerProvider) {
    const logger = loggerProvider.getLogger('default');

    const attributes: LogAttributes = { ...metadata };
    if (project) {
      attributes['project.root'] = project.root;
    }

    logger.emit({
      severityNumber: LOG_LEVEL_TO_SEVERITY[level],
      severityText: level,
      body: message,
      attributes,
    });
  }
}

export type Logger = ReturnType<typeof createLogger>;

export function createLogger(project?: ProjectContext) {
  return {
    info: (message: string, metadata?: LogAttributes) => log(LogLevel.INFO, message, metadata, project),
    warn: (message: string, metadata?: LogAttributes) => log(LogLevel.WARN, message, metadata, project),
    error: (message: string, metadata?: LogAttributes) => log(LogLevel.ERROR, message, metadata, project),
    debug: (message: string, metadata?: LogAttributes) => log(LogLevel.DEBUG, message, metadata, project),
  };
}

export const logger = createLogger();
