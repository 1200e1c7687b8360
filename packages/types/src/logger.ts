/**
 * Structured logging for SoulRelay.
 *
 * A zero-dependency logger that emits one JSON object per entry. Child
 * loggers extend the component path and may carry bound fields (a session
 * id, a category) that are merged into every entry they emit. Fields whose
 * names mark key material or signatures are redacted before output.
 *
 * @packageDocumentation
 */

// ─── Log levels ─────────────────────────────────────────────────────────────────

/**
 * Numeric log levels. An entry is emitted only when its level is at or
 * above the logger's threshold; {@link SILENT} suppresses everything.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

// ─── Types ──────────────────────────────────────────────────────────────────────

/** A single structured log entry. */
export interface LogEntry {
  /** Level name (e.g. "DEBUG", "INFO"). */
  level: string;
  message: string;
  /** ISO 8601 timestamp. */
  timestamp: string;
  /** Dotted component path, e.g. `server.dispatcher`. */
  component?: string;
  [key: string]: unknown;
}

/** Sink that receives every emitted entry. */
export type LogOutput = (entry: LogEntry) => void;

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

const LEVELS_BY_NAME: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/** Field names whose values never reach the output. */
const REDACTED_FIELDS = new Set(['privateKey', 'privateKeyHex', 'signature', 'proof', 'seed']);

const defaultOutput: LogOutput = (entry: LogEntry): void => {
  console.log(JSON.stringify(entry));
};

/**
 * Parse a level name (`debug`, `info`, `warn`, `error`, `silent`,
 * case-insensitive). Returns undefined for anything else.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  return LEVELS_BY_NAME[name.trim().toLowerCase()];
}

/** Options accepted by the {@link Logger} constructor. */
export interface LoggerOptions {
  /** Minimum level to emit. Defaults to {@link LogLevel.INFO}. */
  level?: LogLevel;
  component?: string;
  /** Defaults to JSON via `console.log`. */
  output?: LogOutput;
  /** Fields merged into every entry. */
  bindings?: Record<string, unknown>;
}

// ─── Logger class ───────────────────────────────────────────────────────────────

/**
 * Structured logger with level filtering, bound fields and child loggers.
 *
 * ```ts
 * const log = new Logger({ level: LogLevel.DEBUG, component: 'server' });
 * const sessionLog = log.child('session', { sessionId: 'a1b2' });
 * sessionLog.info('authenticated', { soulId });
 * ```
 */
export class Logger {
  private level: LogLevel;
  private readonly component: string | undefined;
  private readonly output: LogOutput;
  private readonly bindings: Record<string, unknown>;

  constructor(options?: LoggerOptions) {
    this.level = options?.level ?? LogLevel.INFO;
    this.component = options?.component;
    this.output = options?.output ?? defaultOutput;
    this.bindings = options?.bindings ?? {};
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, fields);
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, fields);
  }

  /**
   * Create a child logger sharing this logger's level and output. The
   * child's component is `parent.child`; its bindings extend the parent's.
   */
  child(component: string, bindings?: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      component: this.component ? `${this.component}.${component}` : component,
      output: this.output,
      bindings: { ...this.bindings, ...bindings },
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (level < this.level) {
      return;
    }

    const entry: LogEntry = {
      level: LEVEL_NAMES[level],
      message,
      timestamp: new Date().toISOString(),
      ...(this.component !== undefined ? { component: this.component } : {}),
    };
    for (const [key, value] of Object.entries({ ...this.bindings, ...fields })) {
      if (key === 'level' || key === 'message' || key === 'timestamp' || key === 'component') {
        continue;
      }
      entry[key] = REDACTED_FIELDS.has(key) ? '[redacted]' : value;
    }

    this.output(entry);
  }
}

// ─── Factory & default instance ─────────────────────────────────────────────────

export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}

/** Logger that discards everything; the default for components built without one. */
export const silentLogger: Logger = createLogger({ level: LogLevel.SILENT });
