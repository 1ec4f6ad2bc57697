// src/observability/Logger.ts

import winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerConfig {
  level?: LogLevel;
  format?: 'json' | 'pretty';
  file?: string; // Additional JSON log file (e.g. scraper.log)
  silent?: boolean;
}

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'pretty'
        ? winston.format.combine(
            winston.format.colorize(),
            winston.format.timestamp(),
            winston.format.simple()
          )
        : winston.format.combine(winston.format.timestamp(), winston.format.json());

    const transports: winston.transport[] = [new winston.transports.Console({ format })];
    if (config.file) {
      transports.push(
        new winston.transports.File({
          filename: config.file,
          format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        })
      );
    }

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      silent: config.silent ?? false,
      transports,
    });
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta ?? {});
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta ?? {});
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta ?? {});
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta ?? {});
  }

  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    this.logger.log(level, message, meta ?? {});
  }

  /**
   * Flush file transports before the process exits.
   */
  async close(): Promise<void> {
    await new Promise<void>((resolve) => {
      this.logger.on('finish', () => resolve());
      this.logger.end();
    });
  }
}
