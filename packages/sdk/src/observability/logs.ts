/**
 * Pass-level logging for the entity map pipeline
 *
 * The fold, aggregation and index passes report per-entity decisions at debug
 * level (`aggregate.drop`, `index.skip`, `index.collision`) and one summary
 * per batch (`update.applied`). Debug lines are written only while
 * FACTMAP_DEBUG is set.
 *
 * Line format: `[timestamp] [LEVEL] [event] entity/field message {details}`
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  entity?: string | number;
  field?: string;
  message?: string;
  details?: Record<string, unknown>;
}

type Sink = (line: string) => void;

// Resolved per call: console methods may be replaced at run time
const SINKS: Record<LogLevel, Sink> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function stringifyDetails(details: Record<string, unknown>): string {
  return JSON.stringify(details, (_key, value: unknown) =>
    typeof value === "bigint" ? value.toString() : value
  );
}

/**
 * Render an entry as one line
 */
export function formatEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

  if (entry.entity !== undefined || entry.field !== undefined) {
    parts.push(`${entry.entity ?? ""}/${entry.field ?? ""}`);
  }
  if (entry.message) parts.push(entry.message);
  if (entry.details) parts.push(stringifyDetails(entry.details));

  return parts.join(" ");
}

class Logger {
  #enabled = true;

  /**
   * Whether a debug entry would be written. The passes check this before
   * building per-entity messages.
   */
  get debugEnabled(): boolean {
    return this.#enabled && Boolean(process.env.FACTMAP_DEBUG);
  }

  log(level: LogLevel, event: string, data?: Partial<Omit<LogEntry, "level" | "event">>): void {
    if (!this.#enabled) return;
    if (level === "debug" && !this.debugEnabled) return;

    SINKS[level](formatEntry({ timestamp: new Date().toISOString(), ...data, level, event }));
  }

  debug(event: string, data?: Partial<Omit<LogEntry, "level" | "event">>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<Omit<LogEntry, "level" | "event">>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<Omit<LogEntry, "level" | "event">>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<Omit<LogEntry, "level" | "event">>): void {
    this.log("error", event, data);
  }

  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

export const logger = new Logger();
