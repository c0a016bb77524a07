import {
  DEBUG_ENV,
  configureDebug,
  getDebugChannel,
  refreshDebugChannels,
  type DebugChannel,
} from "@syntax-enable/shared";
import type { UiHost } from "../host-api.js";
import type { ClientLogger } from "../log.js";
import { errorMessage } from "../errors.js";
import type { GlobalConfig } from "../types.js";

export const NOTIFY_PREFIX = "[syntax-enable]";

export interface ErrorReportOptions {
  notify?: boolean;
  context?: Record<string, unknown>;
}

export type CaptureResult<T> = { ok: true; value: T } | { ok: false };

export class ErrorReporter {
  #logger: ClientLogger;
  #host: Pick<UiHost, "notify">;

  constructor(logger: ClientLogger, host: Pick<UiHost, "notify">) {
    this.#logger = logger;
    this.#host = host;
  }

  report(error: unknown, label: string, options: ErrorReportOptions = {}): void {
    this.#logger.error(label, options.context, error);
    if (options.notify) {
      this.#host.notify(`${NOTIFY_PREFIX} ${label}: ${errorMessage(error)}`, "error");
    }
  }

  guard<T>(label: string, fn: () => T, options?: ErrorReportOptions): CaptureResult<T> {
    try {
      return { ok: true, value: fn() };
    } catch (err) {
      this.report(err, label, options);
      return { ok: false };
    }
  }

  async capture<T>(label: string, fn: () => Promise<T>, options?: ErrorReportOptions): Promise<CaptureResult<T>> {
    try {
      const value = await fn();
      return { ok: true, value };
    } catch (err) {
      this.report(err, label, options);
      return { ok: false };
    }
  }
}

export class DebugService {
  #logger: ClientLogger;
  #channelCache = new Map<string, DebugChannel>();
  #baseEnv: string | undefined;

  constructor(logger: ClientLogger) {
    this.#logger = logger;
    this.#baseEnv = process.env[DEBUG_ENV];
  }

  /** Merge the configured channels into the environment and rebuild the channels. */
  update(config: GlobalConfig): void {
    const channels = new Set(
      [...(this.#baseEnv ?? "").split(","), ...config.debug]
        .map((channel) => channel.trim().toLowerCase())
        .filter((channel) => channel && channel !== "0" && channel !== "false"),
    );
    process.env[DEBUG_ENV] = channels.size ? [...channels].join(",") : "0";

    configureDebug({
      output: (message) => {
        this.#logger.write("debug", message, undefined, { raw: true, force: true });
      },
    });
    refreshDebugChannels();
    this.#channelCache.clear();
  }

  channel(name: string): DebugChannel {
    const key = name.trim().toLowerCase();
    if (!key) return () => {};
    const existing = this.#channelCache.get(key);
    if (existing) return existing;
    const proxy: DebugChannel = (point, data) => {
      getDebugChannel(key)(point, data);
    };
    this.#channelCache.set(key, proxy);
    return proxy;
  }
}

export class ObservabilityService {
  #logger: ClientLogger;
  #debug: DebugService;
  #errors: ErrorReporter;

  constructor(host: Pick<UiHost, "notify">, logger: ClientLogger, config: GlobalConfig) {
    this.#logger = logger;
    this.#debug = new DebugService(logger);
    this.#errors = new ErrorReporter(logger, host);
    this.update(config);
  }

  get logger(): ClientLogger {
    return this.#logger;
  }

  get debug(): DebugService {
    return this.#debug;
  }

  get errors(): ErrorReporter {
    return this.#errors;
  }

  update(config: GlobalConfig): void {
    this.#logger.updateSettings({ level: config.log_level });
    this.#debug.update(config);
  }
}
