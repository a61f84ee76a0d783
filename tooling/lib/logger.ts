/**
 * Structured logging for prompt generation runs.
 * Entries are kept in memory so callers and tests can inspect a run.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const CONSOLE_WRITERS: Record<LogLevel, (message: string) => void> = {
  debug: (message) => console.debug(message),
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

/**
 * Where a message came from: the run phase, the component, and the prompt
 * number and attempt being worked on
 */
export interface LogContext {
  phase?: string;
  component?: string;
  item?: number;
  attempt?: number;
}

export type LogData = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  data?: LogData;
}

function formatValue(key: string, value: unknown): string {
  if (key === "duration" && typeof value === "number") return `${value}ms`;
  if (Array.isArray(value)) return `[${value.length} items]`;
  if (typeof value === "object" && value !== null) return JSON.stringify(value);
  return String(value);
}

export class Logger {
  private readonly entries: LogEntry[] = [];
  private readonly timers = new Map<string, number>();
  private context: LogContext = {};

  constructor(private readonly level: LogLevel = "info", private readonly echo: boolean = true) {}

  setContext(context: Partial<LogContext>): void {
    this.context = { ...this.context, ...context };
  }

  popContext(keys: (keyof LogContext)[]): void {
    const next = { ...this.context };
    for (const key of keys) {
      delete next[key];
    }
    this.context = next;
  }

  startTimer(name: string): void {
    this.timers.set(name, Date.now());
  }

  /**
   * Logs `message` with the elapsed time and returns it; 0 for an unknown timer
   */
  endTimer(name: string, message: string, level: LogLevel = "debug"): number {
    const start = this.timers.get(name);
    if (start === undefined) {
      this.warn(`Timer "${name}" not found`);
      return 0;
    }

    this.timers.delete(name);
    const duration = Date.now() - start;
    this.write(level, message, { duration });
    return duration;
  }

  debug(message: string, data?: LogData): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: LogData): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: LogData): void {
    this.write("warn", message, data);
  }

  error(message: string, data?: LogData): void {
    this.write("error", message, data);
  }

  /**
   * "[phase] <component> Prompt N Attempt M: message", data on a second line
   */
  formatLog(entry: LogEntry): string {
    const { context, data } = entry;
    const prefix = [
      context?.phase && `[${context.phase}]`,
      context?.component && `<${context.component}>`,
      context?.item !== undefined && `Prompt ${context.item}`,
      context?.attempt !== undefined && `Attempt ${context.attempt}`,
    ].filter((part): part is string => typeof part === "string" && part.length > 0);

    const head = prefix.length > 0 ? `${prefix.join(" ")}: ${entry.message}` : entry.message;
    if (!data) return head;

    const details = Object.entries(data).map(([key, value]) => `${key}: ${formatValue(key, value)}`);
    return `${head}\n  ${details.join(", ")}`;
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesForItem(item: number): LogEntry[] {
    return this.entries.filter(entry => entry.context?.item === item);
  }

  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter(entry => LEVEL_RANK[entry.level] >= LEVEL_RANK[level]);
  }

  getMessages(): string[] {
    return this.entries.map(entry => entry.message);
  }

  private write(level: LogLevel, message: string, data?: LogData): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: Object.keys(this.context).length > 0 ? { ...this.context } : undefined,
      data: data && Object.keys(data).length > 0 ? { ...data } : undefined,
    };
    this.entries.push(entry);

    if (this.echo) {
      CONSOLE_WRITERS[level](this.formatLog(entry));
    }
  }
}

/**
 * Shared logger used by the command-line entry point
 */
export const globalLogger = new Logger("info", true);
