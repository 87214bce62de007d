import { jsonReplacer } from '../reporting/formatting.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = Object.freeze(['debug', 'info', 'warn', 'error']);

export interface StructuredLogEvent {
  readonly level: LogLevel;
  readonly name: string;
  readonly event: string;
  readonly elapsedMs?: number;
  readonly context?: Readonly<Record<string, unknown>>;
  readonly data?: Readonly<Record<string, unknown>>;
}

export interface StructuredLogger {
  log(entry: StructuredLogEvent): void;
}

export interface JsonLineLoggerOptions {
  /** Entries below this level are dropped. Defaults to `info`. */
  readonly level?: LogLevel;
}

/**
 * Writes log entries as newline-delimited JSON, stamping each line with an ISO timestamp.
 * RegExp values are written as their `/source/flags` literal.
 */
export class JsonLineLogger implements StructuredLogger {
  private readonly threshold: number;

  constructor(
    private readonly output: { write(line: string): void },
    options: JsonLineLoggerOptions = {},
  ) {
    this.threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
  }

  log(entry: StructuredLogEvent): void {
    if (LOG_LEVELS.indexOf(entry.level) < this.threshold) {
      return;
    }
    const payload = JSON.stringify(
      {
        ...entry,
        timestamp: new Date().toISOString(),
      },
      jsonReplacer,
    );
    this.output.write(`${payload}\n`);
  }
}

export const noopLogger: StructuredLogger = {
  log() {
    // noop
  },
};
