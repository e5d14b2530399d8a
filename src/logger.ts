// ---------------------------------------------------------------------------
// Structured logging
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogThreshold = LogLevel | 'silent';

export interface LogEntry {
  level: LogLevel;
  action: string;
  customerId?: string | undefined;
  orderId?: string | undefined;
  durationMs?: number | undefined;
  [key: string]: unknown;
}

export type Logger = (entry: LogEntry) => void;

const SEVERITY: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogThreshold(value: string): value is LogThreshold {
  return Object.prototype.hasOwnProperty.call(SEVERITY, value);
}

/**
 * One JSON object per line. Lines go to stderr: stdout belongs to the menus.
 */
export function createLogger(
  threshold: LogThreshold,
  write: (line: string) => void = line => console.error(line),
): Logger {
  return entry => {
    if (SEVERITY[entry.level] < SEVERITY[threshold]) return;
    write(JSON.stringify(entry));
  };
}

export const silentLogger: Logger = () => undefined;

export function describeError(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}
