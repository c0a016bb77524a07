import type { OutputChannel, UiHost } from "./host-api.js";
import { errorMessage } from "./errors.js";

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug", "trace"];

const LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

export interface LoggerSettings {
  level: LogLevel;
  timestamps: boolean;
}

export interface WriteOptions {
  /** Skip the level/scope prefix. */
  raw?: boolean;
  /** Write even when the level is filtered out. */
  force?: boolean;
}

export type LogContext = Record<string, unknown>;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

interface LoggerState {
  channel: OutputChannel;
  settings: LoggerSettings;
}

export class ClientLogger {
  #state: LoggerState;
  #scope: string | undefined;

  constructor(channelName: string, host: Pick<UiHost, "createOutputChannel">);
  constructor(parent: ClientLogger, scope: string);
  constructor(source: string | ClientLogger, hostOrScope: Pick<UiHost, "createOutputChannel"> | string) {
    if (source instanceof ClientLogger) {
      this.#state = source.#state;
      this.#scope = typeof hostOrScope === "string" ? hostOrScope : undefined;
      return;
    }
    if (typeof hostOrScope === "string") {
      throw new TypeError("ClientLogger needs a host to create its output channel");
    }
    this.#state = {
      channel: hostOrScope.createOutputChannel(source),
      settings: { level: "info", timestamps: false },
    };
  }

  get channel(): OutputChannel {
    return this.#state.channel;
  }

  get level(): LogLevel {
    return this.#state.settings.level;
  }

  updateSettings(settings: Partial<LoggerSettings>): void {
    this.#state.settings = { ...this.#state.settings, ...settings };
  }

  child(scope: string): ClientLogger {
    const nested = this.#scope ? `${this.#scope}.${scope}` : scope;
    return new ClientLogger(this, nested);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] <= LEVEL_RANK[this.#state.settings.level];
  }

  log(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: LogContext, error?: unknown): void {
    const suffix = error === undefined ? "" : `: ${errorMessage(error)}`;
    this.write("error", `${message}${suffix}`, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write("debug", message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.write("trace", message, context);
  }

  show(preserveFocus = true): void {
    this.#state.channel.show?.(preserveFocus);
  }

  write(level: LogLevel, message: string, context?: LogContext, options: WriteOptions = {}): void {
    if (!options.force && !this.isEnabled(level)) return;
    if (options.raw) {
      this.#state.channel.appendLine(message);
      return;
    }

    const parts: string[] = [];
    if (this.#state.settings.timestamps) parts.push(new Date().toISOString());
    parts.push(`[${level.toUpperCase()}]`);
    if (this.#scope) parts.push(`[${this.#scope}]`);
    parts.push(message);
    const fields = formatContext(context);
    if (fields) parts.push(fields);
    this.#state.channel.appendLine(parts.join(" "));
  }
}

function formatContext(context: LogContext | undefined): string {
  if (!context) return "";
  return Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === "string" ? value : JSON.stringify(value)}`)
    .join(" ");
}
