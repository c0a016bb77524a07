import type { LogLevel } from "./log.js";

/**
 * Per-filetype availability of a grammar. `Unknown` until checked; the other
 * two states are terminal for the lifetime of the process.
 */
export const LanguageAvailability = {
  Unknown: "unknown",
  Available: "available",
  Unavailable: "unavailable",
} as const;

export type LanguageAvailability = (typeof LanguageAvailability)[keyof typeof LanguageAvailability];

/** Feature switches resolved for a single language. */
export interface EffectiveConfig {
  auto_install: boolean;
  highlights: boolean;
  folds: boolean;
  indents: boolean;
}

export type LanguageOverride = Partial<EffectiveConfig>;

export interface GlobalConfig extends EffectiveConfig {
  /** Languages managed by this plugin; only their filetypes are ever attached. */
  parsers: string[];
  /** Per-language records that replace the global switches entirely. */
  parser_settings: Record<string, LanguageOverride>;
  create_autocmd: boolean;
  log_level: LogLevel;
  debug: string[];
}

/** Shape accepted by `setup()` and read from the host configuration. */
export type SyntaxEnableOptions = Partial<GlobalConfig>;

export type AttachResult =
  | { kind: "unmanaged"; filetype: string }
  | { kind: "no-language"; filetype: string }
  | { kind: "started"; filetype: string; language: string }
  | { kind: "unavailable"; filetype: string; language: string }
  | { kind: "deferred"; filetype: string; language: string }
  | { kind: "installing"; filetype: string; language: string; completion: Promise<void> }
  | { kind: "failed"; filetype: string };

export type ToggleResult = "started" | "stopped";
