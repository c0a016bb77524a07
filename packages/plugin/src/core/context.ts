import { DisposableStore } from "@syntax-enable/shared";
import type { EditorHost } from "../host-api.js";
import type { ClientLogger } from "../log.js";
import { AvailabilityRegistry } from "./availability-registry.js";
import { BuiltinIndex } from "./builtin-index.js";
import type { ConfigService } from "./config.js";
import { InstallerGateway } from "./installer-gateway.js";
import type { DebugService, ErrorReporter, ObservabilityService } from "./observability.js";

/** State computed once on first use and kept for the life of the process. */
export interface ProcessState {
  registry: AvailabilityRegistry;
  builtins: BuiltinIndex;
  installer: InstallerGateway;
}

export interface EnableContextOptions {
  host: EditorHost;
  logger: ClientLogger;
  observability: ObservabilityService;
  config: ConfigService;
}

export class EnableContext {
  readonly host: EditorHost;
  readonly logger: ClientLogger;
  readonly observability: ObservabilityService;
  readonly config: ConfigService;
  readonly disposables = new DisposableStore();
  #state: ProcessState | null = null;

  constructor(options: EnableContextOptions) {
    this.host = options.host;
    this.logger = options.logger;
    this.observability = options.observability;
    this.config = options.config;
    this.disposables.add(this.config);
    this.disposables.add(this.config.onDidChange((next) => this.observability.update(next)));
  }

  get debug(): DebugService {
    return this.observability.debug;
  }

  get errors(): ErrorReporter {
    return this.observability.errors;
  }

  get initialized(): boolean {
    return this.#state !== null;
  }

  /**
   * Build the registry, builtin index and installer gateway from the
   * configuration current at first use. Later setup() calls do not rebuild them.
   */
  ensureInitialized(): ProcessState {
    if (this.#state) return this.#state;
    const host = this.host;
    const parsers = this.config.current.parsers;
    const registry = this.errors.guard("registry.seed", () => AvailabilityRegistry.fromLanguages(parsers, host));
    const builtins = this.errors.guard("builtins.scan", () => BuiltinIndex.scan(host));
    this.#state = {
      registry: registry.ok ? registry.value : new AvailabilityRegistry(),
      builtins: builtins.ok ? builtins.value : new BuiltinIndex([]),
      installer: new InstallerGateway(() => host.loadInstaller(), this.logger.child("installer"), this.errors),
    };
    this.logger.debug("initialized", {
      filetypes: this.#state.registry.filetypes().length,
      builtins: this.#state.builtins.size,
    });
    return this.#state;
  }
}
