export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level: LogLevel;
  format: 'json' | 'pretty';
  scope?: string;
  sink?: LogSink;
}

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const consoleSink: LogSink = (level, line) => {
  const stream = level === 'error' || level === 'warn' ? process.stderr : process.stdout;
  stream.write(`${line}\n`);
};

export class Logger {
  private readonly level: LogLevel;
  private readonly format: 'json' | 'pretty';
  private readonly scope?: string;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.format = options.format;
    this.scope = options.scope;
    this.sink = options.sink ?? consoleSink;
  }

  static silent(): Logger {
    return new Logger({ level: 'error', format: 'json', sink: () => undefined });
  }

  child(scope: string): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      sink: this.sink
    });
  }

  private shouldLog(level: LogLevel): boolean {
    return levelWeights[level] >= levelWeights[this.level];
  }

  private formatMessage(level: LogLevel, message: string, metadata?: Record<string, unknown>) {
    if (this.format === 'json') {
      const payload = {
        level,
        scope: this.scope ?? null,
        message,
        metadata: metadata ?? null,
        timestamp: new Date().toISOString()
      };
      return JSON.stringify(payload);
    }

    const scopeText = this.scope ? ` [${this.scope}]` : '';
    const metadataText = metadata ? ` ${JSON.stringify(metadata)}` : '';
    return `[${new Date().toISOString()}] [${level.toUpperCase()}]${scopeText} ${message}${metadataText}`;
  }

  private write(level: LogLevel, message: string, metadata?: Record<string, unknown>) {
    if (!this.shouldLog(level)) return;
    this.sink(level, this.formatMessage(level, message, metadata));
  }

  debug(message: string, metadata?: Record<string, unknown>) {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>) {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>) {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata?: Record<string, unknown>) {
    this.write('error', message, metadata);
  }
}
