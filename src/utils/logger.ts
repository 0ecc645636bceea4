import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { emergencyWarn } from './emergencyLog.js';

/**
 * Clean Winston metadata by removing internal symbols and keeping only string keys
 */
function cleanWinstonMeta(
  info: Record<string | symbol, unknown>
): Record<string, unknown> {
  const meta = { ...info };

  delete meta.level;
  delete meta.message;
  delete meta.timestamp;
  delete meta.context;
  delete meta.stack;

  const winstonSymbols = [
    Symbol.for('level'),
    Symbol.for('message'),
    Symbol.for('splat'),
  ];

  winstonSymbols.forEach((symbol) => {
    if (symbol in meta) {
      delete meta[symbol];
    }
  });

  // Only include string keys for JSON serialization
  const cleanMeta: Record<string, unknown> = {};
  Object.keys(meta).forEach((key) => {
    cleanMeta[key] = meta[key];
  });

  return cleanMeta;
}

function text(value: unknown): string {
  return typeof value === 'string' ? value : String(value);
}

/**
 * Remove ANSI escape codes from a string
 */
function stripAnsiColors(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\u001b\[[0-9;]*m/g, '');
}

/**
 * Format metadata string for debug logs
 */
function formatMetaString(
  info: Record<string | symbol, unknown>,
  levelStr: string
): string {
  if (levelStr !== 'debug') {
    return '';
  }

  const cleanMeta = cleanWinstonMeta(info);
  if (Object.keys(cleanMeta).length > 0) {
    return `\nMeta: ${JSON.stringify(cleanMeta, null, 2)}`;
  }
  return '';
}

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export enum LogTarget {
  CONSOLE = 'console',
  FILE = 'file',
  BOTH = 'both',
}

export interface LoggerConfig {
  level?: LogLevel;
  target?: LogTarget;
  context?: string;
  logDir?: string;
}

const LEVEL_ORDER = ['error', 'warn', 'info', 'debug'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return (
    value !== undefined &&
    Object.values<string>(LogLevel).includes(value)
  );
}

function isLogTarget(value: string | undefined): value is LogTarget {
  return (
    value !== undefined &&
    Object.values<string>(LogTarget).includes(value)
  );
}

// Logger class wrapper around winston
export class Logger {
  private winstonLogger: winston.Logger;
  private config: Required<LoggerConfig>;

  constructor(config?: LoggerConfig) {
    this.config = {
      level: config?.level ?? this.getDefaultLogLevel(),
      target: config?.target ?? this.detectLogTarget(),
      context: config?.context ?? 'mcp-proxy-client',
      logDir:
        config?.logDir ??
        process.env.MCP_PROXY_CLIENT_LOG_DIR ??
        path.join(process.cwd(), '.logs'),
    };

    const transports: winston.transport[] = [];

    if (
      this.config.target === LogTarget.CONSOLE ||
      this.config.target === LogTarget.BOTH
    ) {
      transports.push(this.createConsoleTransport());
    }

    if (
      this.config.target === LogTarget.FILE ||
      this.config.target === LogTarget.BOTH
    ) {
      const fileTransport = this.createFileTransportSync();
      if (fileTransport) {
        transports.push(fileTransport);
      } else {
        emergencyWarn(
          'File transport creation failed, falling back to console transport to prevent log loss'
        );
        transports.push(this.createConsoleTransport(' [FILE-TRANSPORT-FAILED]'));
      }
    }

    this.winstonLogger = winston.createLogger({
      level: this.config.level,
      defaultMeta: { context: this.config.context },
      transports,
      exitOnError: false,
    });
  }

  get level(): LogLevel {
    return this.config.level;
  }

  get target(): LogTarget {
    return this.config.target;
  }

  get context(): string {
    return this.config.context;
  }

  private getDefaultLogLevel(): LogLevel {
    const envLevel = process.env.MCP_PROXY_CLIENT_LOG_LEVEL?.toLowerCase();
    return isLogLevel(envLevel) ? envLevel : LogLevel.INFO;
  }

  private detectLogTarget(): LogTarget {
    const envTarget = process.env.MCP_PROXY_CLIENT_LOG_TARGET?.toLowerCase();
    return isLogTarget(envTarget) ? envTarget : LogTarget.CONSOLE;
  }

  /**
   * Console output always goes to stderr; stdout belongs to command results
   */
  private createConsoleTransport(suffix = ''): winston.transport {
    return new winston.transports.Console({
      stderrLevels: LEVEL_ORDER,
      format: winston.format.combine(
        // Dynamic level filtering based on effective log level - BEFORE colorize
        winston.format((info) => {
          const currentLevelIndex = LEVEL_ORDER.indexOf(this.config.level);
          const messageLevelIndex = LEVEL_ORDER.indexOf(info.level);
          return messageLevelIndex <= currentLevelIndex ? info : false;
        })(),
        winston.format.colorize(),
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.printf((info) => {
          const contextStr = info.context
            ? ` [${text(info.context)}]`
            : '';
          const stackStr = info.stack ? `\n${text(info.stack)}` : '';
          const metaStr = formatMetaString(
            info,
            stripAnsiColors(info.level)
          );

          return `${text(info.timestamp)} ${info.level}${contextStr}: ${text(info.message)}${stackStr}${metaStr}${suffix}`;
        })
      ),
    });
  }

  private createFileTransportSync(): winston.transports.FileTransportInstance | null {
    try {
      if (!fs.existsSync(this.config.logDir)) {
        fs.mkdirSync(this.config.logDir, { recursive: true });
      }

      const timestamp = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
      const logFile = path.join(
        this.config.logDir,
        `mcp-proxy-client-${timestamp ?? 'unknown'}.log`
      );

      return new winston.transports.File({
        filename: logFile,
        maxsize: 10 * 1024 * 1024, // 10MB
        maxFiles: 5,
        tailable: true,
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.errors({ stack: true }),
          winston.format.printf((info) => {
            const contextStr = info.context
              ? ` [${text(info.context)}]`
              : '';
            const stackStr = info.stack ? `\n${text(info.stack)}` : '';
            const levelStr = stripAnsiColors(info.level);
            const metaStr = formatMetaString(
              info,
              levelStr
            );

            return `${text(info.timestamp)} [${levelStr}]${contextStr} ${text(info.message)}${stackStr}${metaStr}`;
          })
        ),
      });
    } catch (error) {
      emergencyWarn('Failed to create file transport', error);
      return null;
    }
  }

  public debug(message: string, meta?: Record<string, unknown>): void {
    this.winstonLogger.debug(message, meta);
  }

  public info(message: string, meta?: Record<string, unknown>): void {
    this.winstonLogger.info(message, meta);
  }

  public warn(message: string, meta?: Record<string, unknown>): void {
    this.winstonLogger.warn(message, meta);
  }

  public error(message: string | Error, meta?: Record<string, unknown>): void {
    if (message instanceof Error) {
      this.winstonLogger.error(message.message, {
        ...meta,
        stack: message.stack,
      });
    } else {
      this.winstonLogger.error(message, meta);
    }
  }

  public setLevel(level: LogLevel): void {
    this.config.level = level;
    this.winstonLogger.level = level;
  }

  // Create a new logger with the same config but a different context
  public child(context: string): Logger {
    return new Logger({ ...this.config, context });
  }

  public end(): void {
    this.winstonLogger.end();
  }
}

export const logger = new Logger();

// Module-level child loggers, kept so a level change reaches all of them
const childLoggers: Logger[] = [];

export function createChildLogger(context: string): Logger {
  const child = logger.child(context);
  childLoggers.push(child);
  return child;
}

/**
 * Change the level of the root logger and every logger made by createChildLogger
 */
export function setLogLevel(level: LogLevel): void {
  logger.setLevel(level);
  for (const child of childLoggers) {
    child.setLevel(level);
  }
}
