/**
 * Leveled console logging shared by the event-loop side and the workers.
 */
import { format } from "node:util";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

/** Map an environment string (any case) to a level; unknown values fall back to the default. */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const wanted = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === wanted) ?? DEFAULT_LOG_LEVEL;
}

export interface LoggerOptions {
  /**
   * Minimum level to output.
   * @default "warn"
   */
  level?: LogLevel;

  /** Rendered as `[sqlbridge:<scope>]` in front of every line. */
  scope?: string;

  /** @default console.log */
  stdout?: (line: string) => void;

  /** @default console.error */
  stderr?: (line: string) => void;
}

export class Logger {
  readonly level: LogLevel;
  private readonly scope: string | undefined;
  private readonly stdout: (line: string) => void;
  private readonly stderr: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? DEFAULT_LOG_LEVEL;
    this.scope = options.scope;
    this.stdout = options.stdout ?? ((line) => console.log(line));
    this.stderr = options.stderr ?? ((line) => console.error(line));
  }

  /** A logger with the same sinks and level under another scope. */
  child(scope: string): Logger {
    return new Logger({
      level: this.level,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      stdout: this.stdout,
      stderr: this.stderr,
    });
  }

  enabled(level: LogLevel): boolean {
    return level !== "silent" && LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled("debug")) this.stdout(this.render("debug", message, args));
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled("info")) this.stdout(this.render("info", message, args));
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled("warn")) this.stderr(this.render("warn", message, args));
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled("error")) this.stderr(this.render("error", message, args));
  }

  private render(level: LogLevel, message: string, args: unknown[]): string {
    const prefix = this.scope ? `[sqlbridge:${this.scope}]` : "[sqlbridge]";
    return `${prefix} ${level.toUpperCase()} ${format(message, ...args)}`;
  }
}
