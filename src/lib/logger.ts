/**
 * Structured logger for page lookups
 *
 * Entries carry the module context, an optional operation name and the
 * lookup (word, language, revision) they belong to. Level comes from
 * LOG_LEVEL, format from LOG_FORMAT (`json` or text).
 */

/** Log levels in order of severity */
export type LogLevel = 'debug' | 'info' | 'warn';

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_VALUES;
}

/** The lookup an entry belongs to */
export interface LookupFields {
  word: string;
  language?: string;
  revision?: number;
}

/** Log entry structure */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Module the entry came from */
  context: string;
  message: string;
  operation?: string;
  lookup?: LookupFields;
  data?: Record<string, unknown>;
}

export interface LoggerOptions {
  context: string;
  /** Defaults to LOG_LEVEL, then `info` */
  level?: LogLevel;
  /** Defaults to `json` when LOG_FORMAT=json, otherwise `text` */
  format?: 'text' | 'json';
  operation?: string;
  lookup?: LookupFields;
}

function levelFromEnv(): LogLevel {
  const level = process.env['LOG_LEVEL']?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : 'info';
}

function formatFromEnv(): 'text' | 'json' {
  return process.env['LOG_FORMAT']?.toLowerCase() === 'json' ? 'json' : 'text';
}

function formatLookup(lookup: LookupFields): string {
  const parts = [lookup.word];
  if (lookup.language !== undefined) parts.push(lookup.language);
  if (lookup.revision !== undefined) parts.push(`rev ${lookup.revision}`);
  return parts.join(' / ');
}

function formatText(entry: LogEntry): string {
  const scope = entry.operation ? `${entry.context}:${entry.operation}` : entry.context;
  let line = `${entry.timestamp} ${entry.level.toUpperCase().padEnd(5)} [${scope}] ${entry.message}`;
  if (entry.lookup) {
    line += ` (${formatLookup(entry.lookup)})`;
  }
  if (entry.data && Object.keys(entry.data).length > 0) {
    line += ` ${JSON.stringify(entry.data)}`;
  }
  return line;
}

/**
 * Logger bound to a module context
 */
export class Logger {
  readonly context: string;
  readonly level: LogLevel;
  readonly format: 'text' | 'json';
  private readonly operation: string | undefined;
  private readonly lookup: LookupFields | undefined;

  constructor(options: LoggerOptions) {
    this.context = options.context;
    this.level = options.level ?? levelFromEnv();
    this.format = options.format ?? formatFromEnv();
    this.operation = options.operation;
    this.lookup = options.lookup;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  /** Same logger, tagging entries with an operation name */
  withOperation(operation: string): Logger {
    return new Logger({ ...this.options(), operation });
  }

  /** Same logger, tagging entries with the lookup they belong to */
  forLookup(lookup: LookupFields): Logger {
    return new Logger({ ...this.options(), lookup });
  }

  private options(): LoggerOptions {
    return {
      context: this.context,
      level: this.level,
      format: this.format,
      operation: this.operation,
      lookup: this.lookup,
    };
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVEL_VALUES[level] < LOG_LEVEL_VALUES[this.level]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.context,
      message,
      ...(this.operation !== undefined && { operation: this.operation }),
      ...(this.lookup !== undefined && { lookup: this.lookup }),
      ...(data !== undefined && { data }),
    };

    const output = this.format === 'json' ? JSON.stringify(entry) : formatText(entry);
    if (level === 'warn') {
      console.error(output);
    } else {
      console.log(output);
    }
  }
}

// ============================================================================
// Provider
// ============================================================================

/** Creates the logger behind each module context */
export interface LoggerProvider {
  createLogger(context: string): Logger;
}

const defaultProvider: LoggerProvider = {
  createLogger: (context) => new Logger({ context }),
};

let currentProvider: LoggerProvider = defaultProvider;

/**
 * Replace the provider. Returns the previous one.
 */
export function setLoggerProvider(provider: LoggerProvider): LoggerProvider {
  const previous = currentProvider;
  currentProvider = provider;
  return previous;
}

export function resetLoggerProvider(): void {
  currentProvider = defaultProvider;
}

export function createLogger(context: string): Logger {
  return currentProvider.createLogger(context);
}

/** Module loggers, resolved through the current provider on each access */
export const loggers = {
  get fetch(): Logger {
    return createLogger('fetch');
  },
  get page(): Logger {
    return createLogger('page');
  },
  get parse(): Logger {
    return createLogger('parse');
  },
};
