import winston from 'winston';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import type { Config } from '../config/schema.js';

const LEVELS = ['error', 'warn', 'info', 'debug'];

/**
 * Logger module using Winston
 * Console output always goes to stderr; stdout is reserved for the inventory document.
 */
export class Logger {
  private logger: winston.Logger;
  private config: Config['logging'];

  /**
   * @param instance - existing winston logger to wrap instead of creating one with its own transports
   */
  constructor(config: Config['logging'], instance?: winston.Logger) {
    this.config = config;
    if (instance) {
      this.logger = instance;
    } else {
      this.ensureLogDirectory();
      this.logger = this.createLogger();
    }
  }

  /**
   * Ensure the directory of the optional log file exists
   */
  private ensureLogDirectory(): void {
    if (!this.config.file) {
      return;
    }
    const dir = dirname(this.config.file);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  /**
   * Create Winston logger instance
   */
  private createLogger(): winston.Logger {
    return winston.createLogger({
      level: this.config.level,
      format: this.getFormats(),
      transports: this.getTransports(),
      silent: this.config.silent,
      exitOnError: false,
    });
  }

  /**
   * Get log formats based on configuration
   */
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
            let msg = `${String(timestamp)} [${level}]: ${String(message)}`;
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
          winston.format.printf(({ timestamp, level, message }) => {
            return `${String(timestamp)} [${level}]: ${String(message)}`;
          })
        );
    }
  }

  /**
   * Get transports based on configuration
   */
  private getTransports(): winston.transport[] {
    const transports: winston.transport[] = [];

    transports.push(
      new winston.transports.Console({
        stderrLevels: LEVELS,
      })
    );

    if (this.config.file) {
      transports.push(
        new winston.transports.File({
          filename: this.config.file,
          format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        })
      );
    }

    return transports;
  }

  /**
   * Log debug message
   */
  debug(message: string, metadata?: object): void {
    this.logger.debug(message, metadata);
  }

  /**
   * Log info message
   */
  info(message: string, metadata?: object): void {
    this.logger.info(message, metadata);
  }

  /**
   * Log warning message
   */
  warn(message: string, metadata?: object): void {
    this.logger.warn(message, metadata);
  }

  /**
   * Create child logger with additional metadata
   */
  child(metadata: object): Logger {
    return new Logger(this.config, this.logger.child(metadata));
  }
}

// Singleton instance
let loggerInstance: Logger | null = null;

/**
 * Get logger singleton
 */
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
