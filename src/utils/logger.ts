import winston from 'winston';
import { ConfigManager } from '../config/index.js';
import { Config } from '../config/types.js';
import { mkdir } from 'fs/promises';
import { dirname } from 'path';

// Console output goes to stderr so the CLI progress line owns stdout.
const ALL_LEVELS = ['error', 'warn', 'info', 'debug'];

export class Logger {
  private static instance: Logger | undefined;
  private logger: winston.Logger;

  private constructor() {
    const config = ConfigManager.getInstance().getConfig();
    this.logger = this.createLogger(config.logging);
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  public static reset(): void {
    Logger.instance = undefined;
  }

  private createLogger(loggingConfig: Config['logging']): winston.Logger {
    const transports: winston.transport[] = [
      new winston.transports.Console({
        stderrLevels: ALL_LEVELS,
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.timestamp(),
          winston.format.printf(({ timestamp, level, message, ...meta }) => {
            const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta, errorReplacer)}` : '';
            return `${String(timestamp)} [${String(level)}]: ${String(message)}${metaStr}`;
          })
        ),
      }),
    ];

    if (loggingConfig.file) {
      transports.push(this.createFileTransport(loggingConfig.file));
    }

    return winston.createLogger({
      level: loggingConfig.level,
      transports,
    });
  }

  private createFileTransport(filename: string): winston.transports.FileTransportInstance {
    return new winston.transports.File({
      filename,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
    });
  }

  public async setLogFile(filepath: string): Promise<void> {
    await mkdir(dirname(filepath), { recursive: true });

    const fileTransport = this.logger.transports.find(
      (transport) => transport instanceof winston.transports.File
    );
    if (fileTransport) {
      this.logger.remove(fileTransport);
    }

    this.logger.add(this.createFileTransport(filepath));
  }

  public error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  public warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  public info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  public debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  public setLevel(level: Config['logging']['level']): void {
    this.logger.level = level;
  }

  public getLogger(): winston.Logger {
    return this.logger;
  }
}

// Error instances serialize to {} by default
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export const logger = (): Logger => Logger.getInstance();
