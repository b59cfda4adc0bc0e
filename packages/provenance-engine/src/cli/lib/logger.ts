/**
 * CLI Structured Logging
 *
 * JSON lines for machine consumption, colored lines for interactive use.
 * Command context and duration are attached to the start and end entries.
 *
 * @module cli/lib/logger
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

interface StructuredLogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly command?: string;
  readonly [key: string]: unknown;
}

export interface CLILoggerConfig {
  /** Minimum log level to output */
  readonly level: LogLevel;
  readonly json: boolean;
  readonly service: string;
}

/**
 * Where formatted lines go; console by default
 */
export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

const CONSOLE_SINK: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

// ============================================================================
// CLI Logger Class
// ============================================================================

export class CLILogger {
  private readonly config: CLILoggerConfig;
  private readonly sink: LogSink;
  private startTime: number;
  private commandContext: string | null = null;

  constructor(config: CLILoggerConfig, sink: LogSink = CONSOLE_SINK) {
    this.config = config;
    this.sink = sink;
    this.startTime = Date.now();
  }

  get isJson(): boolean {
    return this.config.json;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private formatJson(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.config.service,
      ...(this.commandContext !== null && { command: this.commandContext }),
      ...(metadata && Object.keys(metadata).length > 0 ? metadata : {}),
    };
    return JSON.stringify(entry);
  }

  private formatHuman(level: LogLevel, message: string, metadata?: LogMetadata): string {
    let line = `${COLORS.dim}${new Date().toISOString()}${COLORS.reset} `;
    line += `${LEVEL_COLORS[level]}${LEVEL_LABELS[level]}${COLORS.reset} `;
    line += message;

    if (metadata && Object.keys(metadata).length > 0) {
      const metaStr = Object.entries(metadata)
        .map(([key, value]) => {
          const valueStr = typeof value === 'object' ? JSON.stringify(value) : String(value);
          return `${COLORS.cyan}${key}${COLORS.reset}=${valueStr}`;
        })
        .join(' ');
      line += ` ${COLORS.dim}(${metaStr})${COLORS.reset}`;
    }

    return line;
  }

  // Log entries go to stderr so stdout carries only command output
  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;
    this.sink.err(
      this.config.json
        ? this.formatJson(level, message, metadata)
        : this.formatHuman(level, message, metadata)
    );
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  commandStart(command: string, options?: LogMetadata): void {
    this.commandContext = command;
    this.startTime = Date.now();
    this.debug(`Starting ${command}`, options);
  }

  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const baseMetadata = { duration_ms: Date.now() - this.startTime, ...metadata };
    if (success) {
      this.debug('Command completed', baseMetadata);
    } else {
      this.error('Command failed', baseMetadata);
    }
  }

  /**
   * Command output: a JSON document, or plain text lines
   */
  output(value: unknown, lines: () => readonly string[]): void {
    if (this.config.json) {
      this.sink.out(JSON.stringify(value, null, 2));
      return;
    }
    for (const line of lines()) {
      this.sink.out(line);
    }
  }

  /**
   * Print rows as an aligned table (JSON array in JSON mode)
   */
  table(data: readonly Record<string, unknown>[], columns?: readonly string[]): void {
    if (this.config.json) {
      this.sink.out(JSON.stringify(data));
      return;
    }

    const first = data[0];
    if (!first) {
      this.sink.out('No data to display');
      return;
    }

    const cols = columns ?? Object.keys(first);
    const widths = new Map<string, number>();
    for (const col of cols) {
      let width = col.length;
      for (const row of data) {
        width = Math.max(width, cell(row[col]).length);
      }
      widths.set(col, width);
    }

    const pad = (col: string, value: string) => value.padEnd(widths.get(col) ?? 0);
    this.sink.out(cols.map((col) => pad(col, col)).join(' | '));
    this.sink.out(cols.map((col) => '-'.repeat(widths.get(col) ?? 0)).join('-+-'));
    for (const row of data) {
      this.sink.out(cols.map((col) => pad(col, cell(row[col]))).join(' | '));
    }
  }
}

function cell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createCLILogger(
  config: Partial<CLILoggerConfig> = {},
  sink?: LogSink
): CLILogger {
  return new CLILogger(
    {
      level: config.level ?? 'info',
      json: config.json ?? false,
      service: config.service ?? 'provenance-engine',
    },
    sink
  );
}
