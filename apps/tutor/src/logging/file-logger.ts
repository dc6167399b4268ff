import { ConsoleLogger, type LogLevel } from '@nestjs/common';
import { createWriteStream, existsSync, mkdirSync, type WriteStream } from 'node:fs';
import { dirname, resolve } from 'node:path';

export const DEFAULT_LOG_LEVELS: LogLevel[] = ['log', 'error', 'warn'];

const KNOWN_LEVELS = new Set<string>(['log', 'error', 'warn', 'debug', 'verbose', 'fatal']);

const isLogLevel = (level: string): level is LogLevel => KNOWN_LEVELS.has(level);

/** "log,warn, debug" → ['log', 'warn', 'debug']; unknown names are dropped. */
export function parseLogLevels(raw: string | undefined): LogLevel[] {
  if (!raw) return DEFAULT_LOG_LEVELS;
  const levels = raw
    .split(',')
    .map((level) => level.trim().toLowerCase())
    .filter(isLogLevel);
  return levels.length > 0 ? levels : DEFAULT_LOG_LEVELS;
}

export interface FileLoggerOptions {
  logFilePath?: string;
  levels?: LogLevel[];
  mirrorToConsole?: boolean;
}

export class FileLogger extends ConsoleLogger {
  private readonly stream: WriteStream;
  private readonly mirrorToConsole: boolean;
  private readonly levels: Set<LogLevel>;

  constructor(context?: string, options: FileLoggerOptions = {}) {
    super(context ?? 'FileLogger', { logLevels: options.levels ?? DEFAULT_LOG_LEVELS });

    const targetPath = resolve(process.cwd(), options.logFilePath ?? 'logs/tutor.log');
    const dir = dirname(targetPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    this.stream = createWriteStream(targetPath, { flags: 'a' });
    this.mirrorToConsole = options.mirrorToConsole !== false;
    this.levels = new Set(options.levels ?? DEFAULT_LOG_LEVELS);
  }

  log(message: unknown, ...optionalParams: unknown[]) {
    this.write('log', message, optionalParams);
    if (this.mirrorToConsole) super.log(message, ...optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]) {
    this.write('error', message, optionalParams);
    if (this.mirrorToConsole) super.error(message, ...optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]) {
    this.write('warn', message, optionalParams);
    if (this.mirrorToConsole) super.warn(message, ...optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]) {
    this.write('debug', message, optionalParams);
    if (this.mirrorToConsole) super.debug(message, ...optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]) {
    this.write('verbose', message, optionalParams);
    if (this.mirrorToConsole) super.verbose(message, ...optionalParams);
  }

  fatal(message: unknown, ...optionalParams: unknown[]) {
    this.write('fatal', message, optionalParams);
    if (this.mirrorToConsole) super.fatal(message, ...optionalParams);
  }

  close(): Promise<void> {
    return new Promise((resolveClose) => {
      this.stream.end(() => resolveClose());
    });
  }

  private write(level: LogLevel, message: unknown, optionalParams: unknown[]) {
    if (!this.levels.has(level)) return;
    const ts = new Date().toISOString();
    const serialized = [message, ...optionalParams]
      .map((entry) => {
        if (entry instanceof Error) return entry.stack ?? entry.message;
        if (typeof entry === 'object' && entry !== null) {
          try {
            return JSON.stringify(entry);
          } catch {
            return String(entry);
          }
        }
        return String(entry);
      })
      .join(' ');
    this.stream.write(`[${ts}] [${level.toUpperCase()}] ${serialized}\n`);
  }
}
