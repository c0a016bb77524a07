import { SimpleEmitter, debug, type DisposableLike, type Listener } from "@syntax-enable/shared";
import type { UiHost } from "../host-api.js";
import { isLogLevel, type ClientLogger } from "../log.js";
import type { EffectiveConfig, GlobalConfig, LanguageOverride, SyntaxEnableOptions } from "../types.js";

export const CONFIG_SECTION = "syntaxEnable";

export const DEFAULT_CONFIG: GlobalConfig = {
  parsers: [],
  auto_install: false,
  highlights: false,
  folds: false,
  indents: false,
  parser_settings: {},
  create_autocmd: true,
  log_level: "info",
  debug: [],
};

/**
 * Effective switches for `language`. A `parser_settings` entry, even an empty
 * one, replaces the global switches; fields it leaves out are false.
 */
export function resolveConfig(global: GlobalConfig, language: string): EffectiveConfig {
  const override = Object.hasOwn(global.parser_settings, language) ? global.parser_settings[language] : undefined;
  const source: LanguageOverride = override ?? global;
  return {
    auto_install: source.auto_install === true,
    highlights: source.highlights === true,
    folds: source.folds === true,
    indents: source.indents === true,
  };
}

/**
 * Normalize loosely-typed options into a complete record. Unknown or
 * malformed values fall back to the defaults.
 */
export function normalizeConfig(options: unknown): GlobalConfig {
  const input = isRecord(options) ? options : {};
  return {
    parsers: normalizeStringArray(input["parsers"]),
    auto_install: input["auto_install"] === true,
    highlights: input["highlights"] === true,
    folds: input["folds"] === true,
    indents: input["indents"] === true,
    parser_settings: normalizeParserSettings(input["parser_settings"]),
    create_autocmd: typeof input["create_autocmd"] === "boolean" ? input["create_autocmd"] : DEFAULT_CONFIG.create_autocmd,
    log_level: isLogLevel(input["log_level"]) ? input["log_level"] : DEFAULT_CONFIG.log_level,
    debug: normalizeStringArray(input["debug"]),
  };
}

function readConfig(host: Pick<UiHost, "getConfiguration">): GlobalConfig {
  const cfg = host.getConfiguration ? host.getConfiguration(CONFIG_SECTION) : undefined;
  if (!cfg) return normalizeConfig({});

  return normalizeConfig({
    parsers: cfg.get<unknown>("parsers", DEFAULT_CONFIG.parsers),
    auto_install: cfg.get("auto_install", DEFAULT_CONFIG.auto_install),
    highlights: cfg.get("highlights", DEFAULT_CONFIG.highlights),
    folds: cfg.get("folds", DEFAULT_CONFIG.folds),
    indents: cfg.get("indents", DEFAULT_CONFIG.indents),
    parser_settings: cfg.get<unknown>("parser_settings", DEFAULT_CONFIG.parser_settings),
    create_autocmd: cfg.get("create_autocmd", DEFAULT_CONFIG.create_autocmd),
    log_level: cfg.get<unknown>("log_level", DEFAULT_CONFIG.log_level),
    debug: cfg.get<unknown>("debug", DEFAULT_CONFIG.debug),
  });
}

function normalizeStringArray(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.map((entry) => String(entry).trim()).filter(Boolean);
  }
  if (typeof value === "string") {
    return value
      .split(",")
      .map((entry) => entry.trim())
      .filter(Boolean);
  }
  return [];
}

function normalizeParserSettings(value: unknown): Record<string, LanguageOverride> {
  if (!isRecord(value)) return {};
  const result: Record<string, LanguageOverride> = {};
  for (const [language, entry] of Object.entries(value)) {
    if (!isRecord(entry)) continue;
    const override: LanguageOverride = {};
    for (const key of ["auto_install", "highlights", "folds", "indents"] as const) {
      const flag = entry[key];
      if (typeof flag === "boolean") override[key] = flag;
    }
    result[language] = override;
  }
  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class ConfigService implements DisposableLike {
  #host: Pick<UiHost, "getConfiguration" | "onDidChangeConfiguration">;
  #logger?: ClientLogger;
  #current: GlobalConfig;
  #emitter: SimpleEmitter<GlobalConfig>;
  #watcher: DisposableLike | undefined;

  constructor(host: Pick<UiHost, "getConfiguration" | "onDidChangeConfiguration">, logger?: ClientLogger) {
    this.#host = host;
    this.#logger = logger;
    this.#emitter = new SimpleEmitter((err) => logger?.error("config listener failed", undefined, err));
    this.#current = readConfig(host);
    this.#watch();
  }

  get current(): GlobalConfig {
    return this.#current;
  }

  /** Replace the whole configuration record. */
  setup(options: SyntaxEnableOptions | Record<string, unknown>): GlobalConfig {
    this.#current = normalizeConfig(options);
    debug.config("setup", { parsers: this.#current.parsers });
    this.#emitter.emit(this.#current);
    return this.#current;
  }

  refresh(): GlobalConfig {
    this.#current = readConfig(this.#host);
    this.#emitter.emit(this.#current);
    return this.#current;
  }

  resolve(language: string): EffectiveConfig {
    return resolveConfig(this.#current, language);
  }

  onDidChange(listener: Listener<GlobalConfig>): DisposableLike {
    return this.#emitter.on(listener);
  }

  dispose(): void {
    this.#watcher?.dispose();
    this.#watcher = undefined;
  }

  #watch(): void {
    if (!this.#host.onDidChangeConfiguration) return;
    this.#watcher = this.#host.onDidChangeConfiguration(() => {
      this.refresh();
      this.#logger?.debug("config refreshed");
    });
  }
}
