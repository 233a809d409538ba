import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import pino from 'pino';
import { ResultAsync } from 'neverthrow';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: string;
  data?: unknown;
}

interface LoggerConfig {
  sessionId: string;
  keepSessions?: number; // Number of old sessions to keep (default: 5)
  directory?: string;
}

const SESSION_PREFIX = 'dockhand-session-';

class Logger {
  private pinoLogger: pino.Logger;
  private sessionId: string;
  private directory: string;
  private logFilePath: string;
  private keepSessions: number;

  constructor(config: LoggerConfig) {
    this.sessionId = config.sessionId;
    this.keepSessions = config.keepSessions ?? 5;
    this.directory = config.directory ?? tmpdir();
    this.logFilePath = join(this.directory, `${SESSION_PREFIX}${this.sessionId}.log`);

    this.pinoLogger = pino({
      level: 'debug',
      timestamp: pino.stdTimeFunctions.isoTime,
    }, pino.destination({
      dest: this.logFilePath,
      sync: false,
    }));
  }

  debug(message: string, context?: string, data?: unknown): void {
    this.pinoLogger.debug({ context, data }, message);
  }

  info(message: string, context?: string, data?: unknown): void {
    this.pinoLogger.info({ context, data }, message);
  }

  warn(message: string, context?: string, data?: unknown): void {
    this.pinoLogger.warn({ context, data }, message);
  }

  error(message: string, context?: string, data?: unknown): void {
    this.pinoLogger.error({ context, data }, message);
  }

  getSessionId(): string {
    return this.sessionId;
  }

  getLogFilePath(): string {
    return this.logFilePath;
  }

  // Clean up old session files, keeping only the most recent N sessions
  cleanupOldSessions(): ResultAsync<void, { message: string }> {
    return Logger.listSessionFiles(this.directory)
      .andThen(sessionFiles => {
        if (sessionFiles.length <= this.keepSessions) {
          return ResultAsync.fromSafePromise(Promise.resolve());
        }

        const deletions = sessionFiles.slice(this.keepSessions).map(file =>
          ResultAsync.fromPromise(
            fs.unlink(join(this.directory, file)),
            () => ({ message: `Failed to delete old log file: ${file}` })
          )
        );

        return ResultAsync.combine(deletions).map(() => undefined);
      });
  }

  // Session files, newest first (names embed the start timestamp)
  static listSessionFiles(directory: string = tmpdir()): ResultAsync<string[], { message: string }> {
    return ResultAsync.fromPromise(fs.readdir(directory), () => ({
      message: 'Failed to read log directory'
    }))
      .map(files =>
        files
          .filter(f => f.startsWith(SESSION_PREFIX) && f.endsWith('.log'))
          .sort((a, b) => b.localeCompare(a))
      );
  }

  // Flush any pending writes
  close(): ResultAsync<void, { message: string }> {
    return ResultAsync.fromPromise(
      new Promise<void>((resolve, reject) => {
        this.pinoLogger.flush((error) => {
          if (error) reject(error);
          else resolve();
        });
      }),
      (error) => ({ message: error instanceof Error ? error.message : 'Failed to flush logger' })
    );
  }
}

// Singleton logger instance
let globalLogger: Logger | null = null;

// Initialize the global logger with a session ID based on current timestamp
export function initializeLogger(sessionId?: string, directory?: string): ResultAsync<Logger, { message: string }> {
  const id = sessionId || new Date().toISOString().replace(/[:.]/g, '-').replace('T', '-').split('Z')[0];

  return ResultAsync.fromPromise(
    Promise.resolve().then(() => new Logger({ sessionId: id, directory })),
    (error) => ({ message: error instanceof Error ? error.message : 'Logger initialization failed' })
  ).map(logger => {
    globalLogger = logger;

    // Clean up old sessions in the background
    void logger.cleanupOldSessions()
      .mapErr(error => {
        logger.warn('Failed to cleanup old log sessions', 'logger', { message: error.message });
      });

    return logger;
  });
}

// Convenience functions for logging; no-ops until initializeLogger has run
export const log = {
  debug: (message: string, context?: string, data?: unknown) => globalLogger?.debug(message, context, data),
  info: (message: string, context?: string, data?: unknown) => globalLogger?.info(message, context, data),
  warn: (message: string, context?: string, data?: unknown) => globalLogger?.warn(message, context, data),
  error: (message: string, context?: string, data?: unknown) => globalLogger?.error(message, context, data),
};

export { Logger };
