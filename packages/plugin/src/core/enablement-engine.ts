import type { DocumentId } from "../host-api.js";
import { LanguageAvailability, type AttachResult, type EffectiveConfig } from "../types.js";
import type { EnableContext, ProcessState } from "./context.js";
import type { FeatureApplier } from "./feature-applier.js";
import type { InstallOutcome } from "./installer-gateway.js";

interface Waiter {
  document: DocumentId;
  filetype: string;
}

/** One in-flight install per language; later attaches join it. Batched installs share `completion`. */
interface PendingInstall {
  language: string;
  waiters: Waiter[];
  completion: Promise<void>;
}

export class EnablementEngine {
  #ctx: EnableContext;
  #applier: FeatureApplier;
  #pending = new Map<string, PendingInstall>();

  constructor(ctx: EnableContext, applier: FeatureApplier) {
    this.#ctx = ctx;
    this.#applier = applier;
  }

  isInstalling(language: string): boolean {
    return this.#pending.has(language);
  }

  /**
   * Decide what to do with `document` of `filetype`: start features now,
   * install the grammar first, fall back to bundled queries, or nothing.
   * Never throws.
   */
  attach(document: DocumentId, filetype: string): AttachResult {
    const result = this.#ctx.errors.guard("attach", () => this.#transition(document, filetype), {
      context: { document, filetype },
    });
    return result.ok ? result.value : { kind: "failed", filetype };
  }

  /**
   * Install every configured language now, independent of any document.
   * Each language sent is registered as pending, so attaches made meanwhile
   * join this install.
   */
  async ensureInstalled(): Promise<InstallOutcome> {
    const state = this.#ctx.ensureInitialized();
    const languages = this.#ctx.config.current.parsers.filter((language) => !this.#pending.has(language));
    if (languages.length === 0) return { ok: true };
    this.#ctx.logger.info(`installing ${languages.join(", ")}`);
    const { outcome, completion } = this.#dispatch(languages, state);
    await completion;
    return outcome;
  }

  #transition(document: DocumentId, filetype: string): AttachResult {
    const state = this.#ctx.ensureInitialized();
    const { registry, builtins } = state;
    const debug = this.#ctx.debug.channel("attach");
    const host = this.#ctx.host;

    let availability = registry.get(filetype);
    if (availability === undefined) {
      debug("unmanaged", { document, filetype });
      return { kind: "unmanaged", filetype };
    }

    const language = host.getLanguage(filetype);
    if (!language) {
      debug("no-language", { document, filetype });
      return { kind: "no-language", filetype };
    }

    const config = this.#ctx.config.resolve(language);

    if (availability === LanguageAvailability.Unknown) {
      const pending = this.#pending.get(language);
      if (pending) {
        if (!pending.waiters.some((w) => w.document === document)) {
          pending.waiters.push({ document, filetype });
        }
        debug("install.joined", { document, filetype, language });
        return { kind: "installing", filetype, language, completion: pending.completion };
      }

      // A bundled language goes through the installer whenever one can run.
      const preferInstaller = builtins.contains(language) && this.#installerUsable(config, state);
      if (!preferInstaller && host.addLanguage(language)) {
        registry.set(filetype, LanguageAvailability.Available);
        availability = LanguageAvailability.Available;
      }
    }

    if (availability === LanguageAvailability.Available) {
      this.#applier.start(document, language, config);
      debug("started", { document, filetype, language });
      return { kind: "started", filetype, language };
    }

    if (availability === LanguageAvailability.Unavailable) {
      debug("unavailable", { document, filetype, language });
      return { kind: "unavailable", filetype, language };
    }

    if (this.#installerUsable(config, state)) {
      const completion = this.#install(language, { document, filetype }, state);
      return { kind: "installing", filetype, language, completion };
    }

    if (builtins.contains(language)) {
      registry.set(filetype, LanguageAvailability.Available);
      this.#applier.start(document, language, config);
      debug("builtin.fallback", { document, filetype, language });
      return { kind: "started", filetype, language };
    }

    debug("deferred", { document, filetype, language });
    return { kind: "deferred", filetype, language };
  }

  #installerUsable(config: EffectiveConfig, state: ProcessState): boolean {
    return config.auto_install && state.installer.isPresent();
  }

  #install(language: string, waiter: Waiter, state: ProcessState): Promise<void> {
    this.#ctx.logger.info(`installing grammar for ${language}`);
    const { batch, completion } = this.#dispatch(language, state);
    for (const pending of batch) pending.waiters.push(waiter);
    return completion;
  }

  /** Send one installer request and register each of its languages as pending until it settles. */
  #dispatch(
    request: string | readonly string[],
    state: ProcessState,
  ): { batch: PendingInstall[]; outcome: Promise<InstallOutcome>; completion: Promise<void> } {
    const languages = typeof request === "string" ? [request] : request;
    const outcome = state.installer.install(request);
    const batch: PendingInstall[] = [];
    const completion = outcome.then((result) => {
      for (const pending of batch) this.#settle(pending, result, state);
    });
    for (const language of languages) {
      const pending: PendingInstall = { language, waiters: [], completion };
      batch.push(pending);
      this.#pending.set(language, pending);
    }
    return { batch, outcome, completion };
  }

  #settle(pending: PendingInstall, outcome: InstallOutcome, state: ProcessState): void {
    this.#pending.delete(pending.language);

    const { language, waiters } = pending;
    if (waiters.length === 0) return;
    const host = this.#ctx.host;
    const debug = this.#ctx.debug.channel("install");

    this.#ctx.errors.guard(
      "install.complete",
      () => {
        const installed = outcome.ok && host.addLanguage(language);
        const usable = installed || state.builtins.contains(language);
        const next = usable ? LanguageAvailability.Available : LanguageAvailability.Unavailable;
        for (const { filetype } of waiters) {
          state.registry.set(filetype, next);
        }
        debug("complete", { language, installed, next });

        if (!usable) {
          this.#ctx.logger.warn(`grammar for ${language} is unavailable`);
          return;
        }
        const config = this.#ctx.config.resolve(language);
        for (const { document, filetype } of waiters) {
          if (!host.isDocumentValid(document) || host.getFiletype(document) !== filetype) continue;
          this.#applier.start(document, language, config);
        }
      },
      { context: { language } },
    );
  }
}
