// =============================================================================
// TYPES
// =============================================================================

export interface Logger {
  /** Progress line for a phase transition. */
  log(message: string): void;
  /** Request/response detail, shown only with --debug. */
  debug(message: string): void;
  /** Raw line relayed from a running container. */
  output(line: string): void;
}

export type ConsoleLoggerOptions = {
  debug?: boolean;
  write?: (line: string) => void;
  now?: () => Date;
};

// =============================================================================
// LOGGER
// =============================================================================

export class ConsoleLogger implements Logger {
  private readonly isDebugEnabled: boolean;
  private readonly write: (line: string) => void;
  private readonly now: () => Date;

  constructor(opts: ConsoleLoggerOptions = {}) {
    this.isDebugEnabled = opts.debug ?? false;
    this.write = opts.write ?? ((line) => console.log(line));
    this.now = opts.now ?? (() => new Date());
  }

  log(message: string): void {
    this.write(`${this.timestamp()} ${message}`);
  }

  debug(message: string): void {
    if (!this.isDebugEnabled) return;
    this.write(`${this.timestamp()} [DEBUG] ${message}`);
  }

  output(line: string): void {
    this.write(line);
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function formatLogEventLine(timestampMs: number | undefined, message: string): string {
  const ts = timestampMs === undefined ? "-" : new Date(timestampMs).toISOString();
  return `${ts} ${message.trimEnd()}`;
}

export function stringifyForDebug(value: unknown): string {
  return JSON.stringify(value) ?? String(value);
}
