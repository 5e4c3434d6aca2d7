import path from 'path';
import winston from 'winston';
import type { ILogger, LogMeta } from '../interfaces/IService';

export interface LoggerOptions {
  level?: string;
  // When set, error.log and combined.log are written here
  directory?: string;
  silent?: boolean;
}

export class Logger implements ILogger {
  private logger: winston.Logger;

  constructor(options: LoggerOptions = {}) {
    const fileTransports = options.directory ? [
      new winston.transports.File({
        filename: path.join(options.directory, 'error.log'),
        level: 'error'
      }),
      new winston.transports.File({
        filename: path.join(options.directory, 'combined.log')
      })
    ] : [];

    this.logger = winston.createLogger({
      level: options.level ?? 'info',
      silent: options.silent ?? false,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      defaultMeta: { service: 'collision-avoidance' },
      transports: [
        ...fileTransports,
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.colorize(),
            winston.format.simple()
          )
        })
      ]
    });
  }

  info(message: string, meta?: LogMeta): void {
    this.logger.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, meta);
  }

  error(message: string, error?: Error, meta?: LogMeta): void {
    const logData = {
      ...meta,
      error: error ? {
        message: error.message,
        stack: error.stack,
        name: error.name
      } : undefined
    };
    this.logger.error(message, logData);
  }

  debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, meta);
  }

  // Get the underlying winston logger for advanced usage
  getWinstonLogger(): winston.Logger {
    return this.logger;
  }
}
