import fs from 'node:fs/promises';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry extends LogContext {
  ts: string;
  level: LogLevel;
  scope?: string;
  message: string;
}

export interface StructuredLoggerOptions {
  mirrorToConsole?: boolean;
  scope?: string;
}

interface LogSink {
  filePath: string;
  writeQueue: Promise<void>;
}

export class StructuredLogger {
  private constructor(
    private readonly sink: LogSink,
    private readonly options: StructuredLoggerOptions
  ) {}

  public static async create(
    logDir: string,
    options: StructuredLoggerOptions = {}
  ): Promise<StructuredLogger> {
    await fs.mkdir(logDir, { recursive: true });

    const datePrefix = new Date().toISOString().slice(0, 10);
    const filePath = path.join(logDir, `longscribe-${datePrefix}.log`);

    return new StructuredLogger(
      { filePath, writeQueue: Promise.resolve() },
      { mirrorToConsole: true, ...options }
    );
  }

  /** Shares the file sink, tags every entry with `scope`. */
  public child(scope: string): StructuredLogger {
    return new StructuredLogger(this.sink, { ...this.options, scope });
  }

  public getLogPath(): string {
    return this.sink.filePath;
  }

  /** Resolves once every entry queued so far has reached the file. */
  public async flush(): Promise<void> {
    await this.sink.writeQueue;
  }

  public debug(message: string, context: LogContext = {}): void {
    this.write('debug', message, context);
  }

  public info(message: string, context: LogContext = {}): void {
    this.write('info', message, context);
  }

  public warn(message: string, context: LogContext = {}): void {
    this.write('warn', message, context);
  }

  public error(message: string, context: LogContext = {}): void {
    this.write('error', message, context);
  }

  private write(level: LogLevel, message: string, context: LogContext): void {
    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      ...(this.options.scope ? { scope: this.options.scope } : {}),
      message,
      ...context
    };

    const line = `${JSON.stringify(entry)}\n`;

    this.sink.writeQueue = this.sink.writeQueue
      .then(async () => {
        await fs.appendFile(this.sink.filePath, line, 'utf8');
      })
      .catch((error) => {
        const detail = error instanceof Error ? error.message : String(error);
        console.error(`[Longscribe] Failed to write log file: ${detail}`);
      });

    if (!this.options.mirrorToConsole || level === 'debug') {
      return;
    }

    const prefix = this.options.scope ? `[Longscribe:${this.options.scope}]` : '[Longscribe]';

    if (level === 'error') {
      console.error(`${prefix} ${message}`, context);
      return;
    }

    if (level === 'warn') {
      console.warn(`${prefix} ${message}`, context);
      return;
    }

    console.log(`${prefix} ${message}`, context);
  }
}
