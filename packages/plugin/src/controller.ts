import { getEditorHost, type DocumentId, type EditorHost } from "./host-api.js";
import { ClientLogger } from "./log.js";
import { ConfigService } from "./core/config.js";
import { EnableContext } from "./core/context.js";
import { EnablementEngine } from "./core/enablement-engine.js";
import { FeatureApplier, type AppliedFeatures } from "./core/feature-applier.js";
import type { InstallOutcome } from "./core/installer-gateway.js";
import { ObservabilityService } from "./core/observability.js";
import type {
  AttachResult,
  EffectiveConfig,
  GlobalConfig,
  LanguageAvailability,
  ToggleResult,
} from "./types.js";

export const OUTPUT_CHANNEL_NAME = "syntax-enable";

export interface SyntaxEnableControllerOptions {
  host?: EditorHost;
  logger?: ClientLogger;
}

/**
 * Public operations for one editor host: start/stop/toggle features on a
 * document, attach documents as their filetype is set, and configuration.
 */
export class SyntaxEnableController {
  readonly context: EnableContext;
  #applier: FeatureApplier;
  #engine: EnablementEngine;
  #attachEnabled = true;

  constructor(options: SyntaxEnableControllerOptions = {}) {
    const host = options.host ?? getEditorHost();
    const logger = options.logger ?? new ClientLogger(OUTPUT_CHANNEL_NAME, host);
    const config = new ConfigService(host, logger);
    const observability = new ObservabilityService(host, logger, config.current);
    this.context = new EnableContext({ host, logger, observability, config });
    this.#applier = new FeatureApplier(host, logger.child("features"), observability.errors);
    this.#engine = new EnablementEngine(this.context, this.#applier);
  }

  get host(): EditorHost {
    return this.context.host;
  }

  get config(): GlobalConfig {
    return this.context.config.current;
  }

  /** Whether filetype events should still attach documents. Cleared by detach(). */
  get attachEnabled(): boolean {
    return this.#attachEnabled;
  }

  /**
   * Replace the configuration. Non-object input is ignored. The registry and
   * builtin index keep the languages they were seeded with.
   */
  setup(options?: unknown): GlobalConfig {
    if (isOptionsRecord(options)) {
      return this.context.config.setup(options);
    }
    return this.context.config.current;
  }

  start(document?: DocumentId, language?: string, config?: EffectiveConfig): AppliedFeatures {
    this.context.ensureInitialized();
    const buffer = document ?? this.host.currentDocument();
    const lang = language ?? this.host.getFiletype(buffer);
    return this.#applier.start(buffer, lang, config ?? this.context.config.resolve(lang));
  }

  stop(document?: DocumentId): boolean {
    return this.#applier.stop(document ?? this.host.currentDocument());
  }

  toggle(): ToggleResult {
    const document = this.host.currentDocument();
    if (this.#applier.isActive(document)) {
      this.stop(document);
      this.host.notify("syntax-enable stopped", "info");
      return "stopped";
    }
    this.start(document);
    this.host.notify("syntax-enable started", "info");
    return "started";
  }

  attach(document?: DocumentId, filetype?: string): AttachResult {
    const buffer = document ?? this.host.currentDocument();
    return this.#engine.attach(buffer, filetype ?? this.host.getFiletype(buffer));
  }

  /** Stop the current document and ignore further filetype events. */
  detach(): void {
    this.#attachEnabled = false;
    this.stop();
  }

  ensureInstalled(): Promise<InstallOutcome> {
    return this.#engine.ensureInstalled();
  }

  isActive(document?: DocumentId): boolean {
    return this.#applier.isActive(document ?? this.host.currentDocument());
  }

  isInstalling(language: string): boolean {
    return this.#engine.isInstalling(language);
  }

  availability(filetype: string): LanguageAvailability | undefined {
    return this.context.ensureInitialized().registry.get(filetype);
  }

  dispose(): void {
    this.context.disposables.dispose();
  }
}

function isOptionsRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
