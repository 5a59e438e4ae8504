import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { appConfig } from '../connections/config/app.config';

export interface LoggingOptions {
  level: string;
  logDir: string;
  rotation?: string;
  retention?: string;
  compression?: boolean;
  /** Console output is muted and no files are written. */
  quiet?: boolean;
  /** Defaults to the opposite of `quiet`. */
  files?: boolean;
  /** Console lines go here instead of stdout/stderr. */
  consoleStream?: NodeJS.WritableStream;
}

class LoggingConfig {
  private logLevel: string;
  private rotation: string;
  private retention: string;
  private compression: boolean;
  private logDir: string;
  private quiet: boolean;
  private files: boolean;
  private consoleStream?: NodeJS.WritableStream;

  constructor(options: LoggingOptions) {
    this.logLevel = options.level;
    this.rotation = options.rotation ?? '10MB';
    this.retention = options.retention ?? '30d';
    this.compression = options.compression ?? true;
    this.logDir = options.logDir;
    this.quiet = options.quiet ?? false;
    this.files = options.files ?? !this.quiet;
    this.consoleStream = options.consoleStream;
  }

  private formatLine(info: winston.Logform.TransformableInfo, stackPrefix: string): string {
    const { timestamp, level, message, stack, ...meta } = info;
    const stackStr = stack ? `\n${stackPrefix}${String(stack)}` : '';
    const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} | ${level} | ${String(message)}${metaStr}${stackStr}`;
  }

  private createConsoleFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.colorize({ all: true }),
      winston.format.printf(info => this.formatLine(info, ''))
    );
  }

  private createFileFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf(info => this.formatLine(info, 'Stack: '))
    );
  }

  parseRotation(rotation: string): { maxSize?: string; datePattern?: string } {
    if (rotation.includes('MB') || rotation.includes('KB') || rotation.includes('GB')) {
      return { maxSize: rotation };
    } else if (rotation.includes('day') || rotation.includes('hour')) {
      return { datePattern: 'YYYY-MM-DD' };
    }
    return { maxSize: '10MB' };
  }

  parseRetention(retention: string): string {
    // "30 days" -> "30d"
    const match = retention.match(/(\d+)\s*(day|days|d|hour|hours|h)/i);
    if (match) {
      const num = match[1];
      const unit = match[2].toLowerCase();
      if (unit.startsWith('d')) return `${num}d`;
      if (unit.startsWith('h')) return `${num}h`;
    }
    return '30d';
  }

  private createFileTransport(prefix: string, level?: string): DailyRotateFile {
    const rotationConfig = this.parseRotation(this.rotation);
    return new DailyRotateFile({
      filename: path.join(this.logDir, `${prefix}-%DATE%.log`),
      datePattern: rotationConfig.datePattern || 'YYYY-MM-DD',
      maxSize: rotationConfig.maxSize,
      maxFiles: this.parseRetention(this.retention),
      zippedArchive: this.compression,
      level,
      format: this.createFileFormat(),
    });
  }

  private createConsoleTransport() {
    const options = {
      level: this.logLevel,
      format: this.createConsoleFormat(),
      silent: this.quiet,
    };
    return this.consoleStream
      ? new winston.transports.Stream({ ...options, stream: this.consoleStream })
      : new winston.transports.Console(options);
  }

  private createTransports() {
    const transports = [this.createConsoleTransport()];

    if (!this.files) {
      return transports;
    }

    if (!fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }

    return [
      ...transports,
      this.createFileTransport('sys'),
      this.createFileTransport('error', 'error'),
    ];
  }

  setupLogging(): winston.Logger {
    return winston.createLogger({
      level: this.logLevel,
      format: this.createFileFormat(),
      transports: this.createTransports(),
      exitOnError: false,
    });
  }

  /** Rebuilds the transports of `logger` so console lines are written to `stream`. */
  redirectConsole(logger: winston.Logger, stream: NodeJS.WritableStream): void {
    this.consoleStream = stream;
    logger.configure({
      level: this.logLevel,
      format: this.createFileFormat(),
      transports: this.createTransports(),
      exitOnError: false,
    });
  }
}

export const loggingConfig = new LoggingConfig({
  level: appConfig.logLevel,
  logDir: appConfig.logDir,
  quiet: appConfig.nodeEnv === 'test',
});

export const logger = loggingConfig.setupLogging();

export { LoggingConfig };
