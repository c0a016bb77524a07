import { debug } from "@syntax-enable/shared";
import type { GrammarInstaller } from "../host-api.js";
import type { ClientLogger } from "../log.js";
import type { ErrorReporter } from "./observability.js";

export type InstallOutcome = { ok: true } | { ok: false; reason: "skipped" | "failed" };

/**
 * Boundary to the external grammar installer. The installer is located once;
 * when it cannot be found every install resolves as skipped.
 */
export class InstallerGateway {
  #locate: () => GrammarInstaller | undefined;
  #logger: ClientLogger;
  #errors: ErrorReporter;
  #installer: GrammarInstaller | undefined;
  #checked = false;

  constructor(locate: () => GrammarInstaller | undefined, logger: ClientLogger, errors: ErrorReporter) {
    this.#locate = locate;
    this.#logger = logger;
    this.#errors = errors;
  }

  get skipInstaller(): boolean {
    return !this.isPresent();
  }

  isPresent(): boolean {
    if (!this.#checked) {
      this.#checked = true;
      const located = this.#errors.guard("installer.locate", () => this.#locate());
      this.#installer = located.ok ? located.value : undefined;
      if (!this.#installer) {
        this.#logger.warn("grammar installer not found; automatic installation is disabled");
      }
    }
    return this.#installer !== undefined;
  }

  /** Never rejects; failures resolve as `{ ok: false }`. */
  async install(languages: string | readonly string[]): Promise<InstallOutcome> {
    const installer = this.isPresent() ? this.#installer : undefined;
    if (!installer) return { ok: false, reason: "skipped" };

    const list = typeof languages === "string" ? [languages] : [...languages];
    debug.install("dispatch", { languages: list });
    const result = await this.#errors.capture(
      "installer.install",
      () => installer.install(typeof languages === "string" ? languages : list),
      { context: { languages: list.join(",") } },
    );
    debug.install("settled", { languages: list, ok: result.ok });
    return result.ok ? { ok: true } : { ok: false, reason: "failed" };
  }
}
