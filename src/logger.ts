import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const SENSITIVE_KEY_PATTERN = /(token|authorization|password|secret)/i;

export interface LogRecord {
  time: string;
  level: LogLevel;
  scope: string;
  message: string;
  context?: Record<string, unknown>;
}

export interface LogTransport {
  write(record: LogRecord): void;
}

export class ConsoleTransport implements LogTransport {
  private readonly minLevel: LogLevel;

  constructor(minLevel: LogLevel = 'warn') {
    this.minLevel = minLevel;
  }

  write(record: LogRecord): void {
    if (LEVEL_WEIGHT[record.level] < LEVEL_WEIGHT[this.minLevel]) return;
    const ctx = record.context ? ` ${JSON.stringify(record.context)}` : '';
    process.stderr.write(
      `[${record.level}] ${record.scope}: ${record.message}${ctx}\n`,
    );
  }
}

export const DEFAULT_LOG_MAX_BYTES = 1024 * 1024;

/**
 * Appends JSON lines to `filePath`. Once the file would pass `maxBytes` it is
 * moved to `<filePath>.1`, replacing the previous backup.
 */
export class FileTransport implements LogTransport {
  readonly filePath: string;
  private readonly maxBytes: number;
  private size: number | null = null;
  private failed = false;

  constructor(filePath: string, maxBytes = DEFAULT_LOG_MAX_BYTES) {
    this.filePath = filePath;
    this.maxBytes = maxBytes;
  }

  get backupPath(): string {
    return `${this.filePath}.1`;
  }

  write(record: LogRecord): void {
    if (this.failed) return;
    try {
      if (this.size === null) {
        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
        this.size = fs.existsSync(this.filePath) ? fs.statSync(this.filePath).size : 0;
      }
      const line = JSON.stringify(record) + '\n';
      const bytes = Buffer.byteLength(line);
      if (this.size > 0 && this.size + bytes > this.maxBytes) {
        fs.renameSync(this.filePath, this.backupPath);
        this.size = 0;
      }
      fs.appendFileSync(this.filePath, line);
      this.size += bytes;
    } catch (err) {
      this.failed = true;
      process.stderr.write(
        `fluxreader: cannot write ${this.filePath}: ${err instanceof Error ? err.message : String(err)}\n`,
      );
    }
  }
}

function sanitize(
  context: Record<string, unknown>,
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    out[key] =
      SENSITIVE_KEY_PATTERN.test(key) && typeof value === 'string' && value
        ? '***'
        : value;
  }
  return out;
}

export class Logger {
  private readonly scope: string;
  private readonly state: { level: LogLevel; transports: LogTransport[] };

  constructor(
    scope = 'fluxreader',
    state?: { level: LogLevel; transports: LogTransport[] },
  ) {
    this.scope = scope;
    this.state = state ?? { level: 'info', transports: [] };
  }

  /** Child loggers share level and transports with their parent. */
  child(scope: string): Logger {
    return new Logger(scope, this.state);
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  addTransport(transport: LogTransport): void {
    this.state.transports.push(transport);
  }

  clearTransports(): void {
    this.state.transports.length = 0;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
  ): void {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.state.level]) return;
    const record: LogRecord = {
      time: new Date().toISOString(),
      level,
      scope: this.scope,
      message,
      ...(context ? { context: sanitize(context) } : {}),
    };
    for (const transport of this.state.transports) {
      transport.write(record);
    }
  }
}

export const logger = new Logger();

export function logFilePath(root: string): string {
  return path.join(root, 'logs', 'fluxreader.log');
}

export function configureLogging(
  root: string,
  opts: { level: LogLevel; verbose?: boolean },
): void {
  logger.clearTransports();
  logger.setLevel(opts.verbose ? 'debug' : opts.level);
  logger.addTransport(new ConsoleTransport(opts.verbose ? 'debug' : 'warn'));
  logger.addTransport(new FileTransport(logFilePath(root)));
}
