import winston from 'winston';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import type { Config } from '../config/schema.js';
import { NetStateError } from '../errors/index.js';

// stdout carries the MCP stdio transport, so every level goes to stderr
const STDERR_LEVELS = ['error', 'warn', 'info', 'debug'];

export type LogTransport =
  | winston.transports.ConsoleTransportInstance
  | winston.transports.FileTransportInstance
  | winston.transports.StreamTransportInstance;

/**
 * Structured logging on top of winston
 */
export class Logger {
  private logger: winston.Logger;
  private readonly config: Config['logging'];

  constructor(config: Config['logging'], transports?: LogTransport[]) {
    this.config = config;
    this.logger = winston.createLogger({
      level: config.level,
      format: this.getFormats(),
      transports: transports ?? this.getTransports(),
      exitOnError: false,
    });
  }

  private getFormats(): winston.Logform.Format {
    const timestamp = winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss.SSS',
    });

    const errors = winston.format.errors({ stack: true });

    switch (this.config.format) {
      case 'json':
        return winston.format.combine(timestamp, errors, winston.format.json());

      case 'pretty':
        return winston.format.combine(
          timestamp,
          errors,
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, ...metadata }) => {
            let msg = `${timestamp} [${level}]: ${message}`;
            if (Object.keys(metadata).length > 0) {
              msg += ` ${JSON.stringify(metadata, null, 2)}`;
            }
            return msg;
          })
        );

      case 'simple':
      default:
        return winston.format.combine(
          timestamp,
          errors,
          winston.format.printf(({ timestamp, level, message }) => `${timestamp} [${level}]: ${message}`)
        );
    }
  }

  private getTransports(): LogTransport[] {
    const transports: LogTransport[] = [
      new winston.transports.Console({ stderrLevels: STDERR_LEVELS }),
    ];

    const dir = this.config.dir;
    if (dir) {
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }

      transports.push(
        new winston.transports.File({
          filename: join(dir, 'sriov-state-combined.log'),
          maxsize: parseSize(this.config.maxSize),
          maxFiles: this.config.maxFiles,
        }),
        new winston.transports.File({
          filename: join(dir, 'sriov-state-error.log'),
          level: 'error',
          maxsize: parseSize(this.config.maxSize),
          maxFiles: this.config.maxFiles,
        })
      );
    }

    return transports;
  }

  debug(message: string, metadata?: object): void {
    this.logger.debug(message, metadata);
  }

  info(message: string, metadata?: object): void {
    this.logger.info(message, metadata);
  }

  warn(message: string, metadata?: object): void {
    this.logger.warn(message, metadata);
  }

  /**
   * Log an error; NetStateErrors contribute their code and severity
   */
  error(message: string, error?: unknown, metadata?: object): void {
    if (error === undefined) {
      this.logger.error(message, metadata);
      return;
    }

    const details =
      error instanceof Error
        ? {
            message: error.message,
            stack: error.stack,
            ...(error instanceof NetStateError ? { code: error.code, severity: error.severity } : {}),
          }
        : { message: String(error) };

    this.logger.error(message, { error: details, ...metadata });
  }

  child(metadata: object): Logger {
    const childLogger = new Logger(this.config, []);
    childLogger.logger = this.logger.child(metadata);
    return childLogger;
  }
}

/**
 * "10m" style size to bytes; 10MB when unparseable
 */
export function parseSize(size: string): number {
  const units: Record<string, number> = {
    b: 1,
    k: 1024,
    m: 1024 * 1024,
    g: 1024 * 1024 * 1024,
  };

  const match = size.toLowerCase().match(/^(\d+)([bkmg])$/);
  const num = match?.[1];
  const unit = match?.[2];
  if (!num || !unit) {
    return 10 * 1024 * 1024;
  }

  return parseInt(num, 10) * (units[unit] ?? 1);
}

let loggerInstance: Logger | null = null;

export function getLogger(config?: Config['logging']): Logger {
  if (!loggerInstance && config) {
    loggerInstance = new Logger(config);
  } else if (!loggerInstance) {
    throw new Error('Logger not initialized. Call getLogger with config first.');
  }
  return loggerInstance;
}

/**
 * Reset logger (useful for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}
