/**
 * Debug Channels
 *
 * Targeted debug logging for following availability transitions, install
 * dispatch and option overrides. Channels are always present in code and
 * become no-ops unless enabled.
 *
 * ## Usage
 *
 * Enable via environment variable:
 * ```bash
 * SYNTAX_ENABLE_DEBUG=attach npm test          # Just the attach transitions
 * SYNTAX_ENABLE_DEBUG=attach,install npm test  # Multiple channels
 * SYNTAX_ENABLE_DEBUG=* npm test               # Everything
 * ```
 *
 * In code:
 * ```typescript
 * debug.attach("state", { filetype, state });
 * debug.install("dispatch", { language });
 * ```
 */

export const DEBUG_ENV = "SYNTAX_ENABLE_DEBUG";

/** Debug data can be any serializable value */
export type DebugData = Record<string, unknown>;

/** A debug channel function - logs when enabled, no-op when disabled */
export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  output: (message: string) => void;
}

let config: DebugConfig = { output: console.log };

export function parseDebugEnv(value: string | undefined = process.env[DEBUG_ENV]): Set<string> {
  const env = value ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") {
    return new Set(["*"]);
  }
  return new Set(
    env
      .split(",")
      .map((s) => s.trim().toLowerCase())
      .filter(Boolean),
  );
}

let enabledChannels = parseDebugEnv();

const extraChannels = new Map<string, DebugChannel>();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

/** `[channel.point] { key=value, ... }`; strings quoted, nested records inlined. */
export function formatDebugMessage(channel: string, point: string, data?: DebugData): string {
  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) return label;
  return `${label} ${formatRecord(data)}`;
}

function formatRecord(record: Record<string, unknown>): string {
  const fields = Object.entries(record).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `{ ${fields.join(", ")} }`;
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (Array.isArray(value)) return `[${value.map(formatValue).join(", ")}]`;
  if (typeof value === "object" && value !== null) return formatRecord(Object.fromEntries(Object.entries(value)));
  return String(value);
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point: string, data?: DebugData) => {
    config.output(formatDebugMessage(name, point, data));
  };
}

/**
 * Get or create a debug channel by name.
 * Channels are rebuilt when refreshDebugChannels() is called.
 */
export function getDebugChannel(name: string): DebugChannel {
  const key = name.trim().toLowerCase();
  if (!key) return () => {};
  const existing = extraChannels.get(key);
  if (existing) return existing;
  const channel = createChannel(key);
  extraChannels.set(key, channel);
  return channel;
}

/**
 * Re-read SYNTAX_ENABLE_DEBUG and rebuild every channel.
 */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.config = createChannel("config");
  debug.registry = createChannel("registry");
  debug.attach = createChannel("attach");
  debug.install = createChannel("install");
  debug.features = createChannel("features");
  for (const name of extraChannels.keys()) {
    extraChannels.set(name, createChannel(name));
  }
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

export const debug = {
  /** Configuration reads and setup() replacements */
  config: createChannel("config"),

  /** Availability registry seeding and transitions */
  registry: createChannel("registry"),

  /** Per-document attach decisions */
  attach: createChannel("attach"),

  /** Installer dispatch and completion */
  install: createChannel("install"),

  /** Feature apply/revert and option overrides */
  features: createChannel("features"),
};

export type Debug = typeof debug;
