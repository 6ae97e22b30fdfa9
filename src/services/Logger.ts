import { ILogger } from '../interfaces/services';
import winston from 'winston';

export interface LoggerOptions {
  level?: string;
  logToFile?: boolean;
}

// winston-backed logger; one instance per service label
export class Logger implements ILogger {
  private logger: winston.Logger;

  constructor(serviceName: string = 'document-client', options: LoggerOptions = {}) {
    this.logger = winston.createLogger({
      level: options.level || process.env.LOG_LEVEL || 'info',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.label({ label: serviceName }),
        winston.format.json()
      ),
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.colorize(),
            winston.format.simple()
          )
        }),
        // File output only when LOG_TO_FILE is set
        ...(options.logToFile
          ? [
              new winston.transports.File({
                filename: `logs/${serviceName}.log`,
                level: 'info'
              }),
              new winston.transports.File({
                filename: `logs/${serviceName}-error.log`,
                level: 'error'
              })
            ]
          : [])
      ]
    });
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      this.logger.error(message, { error: error.message, name: error.name, stack: error.stack });
      return;
    }
    this.logger.error(message, { error });
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  static create(serviceName: string, options?: LoggerOptions): Logger {
    return new Logger(serviceName, options);
  }
}
