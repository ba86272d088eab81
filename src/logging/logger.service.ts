import { Injectable, LoggerService, LogLevel, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@config/config.service';
import * as winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';

export interface CustomLoggerOptions {
  enableFileLogging?: boolean;
  logDirectory?: string;
  level?: string;
}

@Injectable()
export class CustomLoggerService implements LoggerService, OnApplicationShutdown {
  private readonly winstonLogger: winston.Logger;
  private readonly logDirectory: string;
  private readonly enableFileLogging: boolean;
  private context = 'CustomLogger';

  constructor(
    private readonly configService?: ConfigService,
    options: CustomLoggerOptions = {},
  ) {
    this.logDirectory = options.logDirectory ?? path.join(process.cwd(), 'logs');
    this.enableFileLogging = options.enableFileLogging ?? this.configService?.enableFileLogging ?? true;
    this.winstonLogger = this.createWinstonLogger(
      options.level ?? this.configService?.getLogLevel() ?? process.env.LOG_LEVEL ?? 'info',
    );
  }

  /**
   * Create the Winston logger with console and, when enabled, daily file transports
   */
  private createWinstonLogger(logLevel: string): winston.Logger {
    const printLine = (withLevelBrackets: boolean) =>
      winston.format.printf(({ timestamp, level, message, context, stack, ...meta }) => {
        const contextStr = context ? `[${String(context)}] ` : '';
        const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
        const stackStr = stack ? `\n${String(stack)}` : '';
        const levelStr = withLevelBrackets ? `[${level.toUpperCase()}]` : level;
        return `${String(timestamp)} ${levelStr} ${contextStr}${String(message)}${metaStr}${stackStr}`;
      });

    // Custom format for log files
    const fileFormat = winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      printLine(true),
    );

    // Console format with colors
    const consoleFormat = winston.format.combine(
      winston.format.colorize({ all: true }),
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      printLine(false),
    );

    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: consoleFormat,
        handleExceptions: true,
        handleRejections: true,
      }),
    ];

    let dailyLogDirectory: string | null = null;
    if (this.enableFileLogging) {
      // Daily log directory structure: logs/YYYY-MM-DD/
      const today = new Date().toISOString().split('T')[0];
      dailyLogDirectory = path.join(this.logDirectory, today);
      fs.mkdirSync(dailyLogDirectory, { recursive: true });

      transports.push(
        // Combined logs file (all levels)
        new winston.transports.File({
          filename: path.join(dailyLogDirectory, 'combined.log'),
          format: fileFormat,
          handleExceptions: true,
          handleRejections: true,
        }),

        // Error logs file (errors only)
        new winston.transports.File({
          filename: path.join(dailyLogDirectory, 'error.log'),
          level: 'error',
          format: fileFormat,
        }),

        // GMP exchanges and other debug output
        ...(logLevel === 'debug'
          ? [
              new winston.transports.File({
                filename: path.join(dailyLogDirectory, 'debug.log'),
                level: 'debug',
                format: fileFormat,
              }),
            ]
          : []),
      );
    }

    const logger = winston.createLogger({
      level: logLevel,
      transports,
      exitOnError: false,
    });

    logger.info(`Logger initialized with level: ${logLevel}`, { context: this.context });
    if (dailyLogDirectory) {
      logger.info(`Daily logs directory: ${dailyLogDirectory}`, { context: this.context });
    }

    return logger;
  }

  private formatMessage(message: unknown): string {
    if (typeof message === 'string') return message;
    if (message instanceof Error) return message.message;
    return JSON.stringify(message);
  }

  /**
   * Log a message at info level
   */
  log(message: unknown, context?: string): void {
    this.winstonLogger.info(this.formatMessage(message), { context: context || this.context });
  }

  /**
   * Log an error message
   */
  error(message: unknown, stack?: string, context?: string): void {
    const contextName = context || this.context;

    if (stack) {
      this.winstonLogger.error(this.formatMessage(message), { context: contextName, stack });
    } else if (message instanceof Error) {
      this.winstonLogger.error(message.message, { context: contextName, stack: message.stack });
    } else {
      this.winstonLogger.error(this.formatMessage(message), { context: contextName });
    }
  }

  warn(message: unknown, context?: string): void {
    this.winstonLogger.warn(this.formatMessage(message), { context: context || this.context });
  }

  debug(message: unknown, context?: string): void {
    this.winstonLogger.debug(this.formatMessage(message), { context: context || this.context });
  }

  verbose(message: unknown, context?: string): void {
    this.winstonLogger.verbose(this.formatMessage(message), { context: context || this.context });
  }

  /**
   * Map Nest log levels onto the winston level (the most verbose one wins)
   */
  setLogLevels(levels: LogLevel[]): void {
    const order: LogLevel[] = ['verbose', 'debug', 'log', 'warn', 'error', 'fatal'];
    const mostVerbose = order.find(level => levels.includes(level));
    if (mostVerbose) {
      this.winstonLogger.level = mostVerbose === 'log' ? 'info' : mostVerbose === 'fatal' ? 'error' : mostVerbose;
    }
  }

  /**
   * Flush and close the transports once every module has shut down
   */
  onApplicationShutdown(): void {
    this.winstonLogger.close();
  }

  /**
   * Log application startup information
   */
  logStartupInfo(port: number, environment: string, engine: string): void {
    this.log('='.repeat(60), this.context);
    this.log('🚀 GVM SCAN BROKER STARTED', this.context);
    this.log('='.repeat(60), this.context);
    this.log(`📍 Port: ${port}`, this.context);
    this.log(`🌍 Environment: ${environment}`, this.context);
    this.log(`🛰️  Engine: ${engine}`, this.context);
    this.log(`📂 Logs Directory: ${this.enableFileLogging ? this.logDirectory : 'disabled'}`, this.context);
    this.log(`📊 Log Level: ${this.winstonLogger.level}`, this.context);
    this.log(`⏰ Started at: ${new Date().toISOString()}`, this.context);
    this.log('='.repeat(60), this.context);
  }

  /**
   * Log application shutdown information
   */
  logShutdownInfo(): void {
    this.log('='.repeat(60), this.context);
    this.log('🛑 GVM SCAN BROKER SHUTTING DOWN', this.context);
    this.log(`⏰ Shutdown at: ${new Date().toISOString()}`, this.context);
    this.log('='.repeat(60), this.context);
  }
}
