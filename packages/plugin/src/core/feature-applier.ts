import { debug } from "@syntax-enable/shared";
import type {
  DocumentId,
  DocumentOptionName,
  EditorHost,
  QueryKind,
  ViewId,
  ViewOptionName,
} from "../host-api.js";
import type { ClientLogger } from "../log.js";
import { errorMessage } from "../errors.js";
import type { EffectiveConfig } from "../types.js";
import type { ErrorReporter } from "./observability.js";

export const TREE_FOLD_METHOD = "expr";

type OptionTarget =
  | { scope: "view"; view: ViewId; name: ViewOptionName }
  | { scope: "document"; document: DocumentId; name: DocumentOptionName };

/** A single option this plugin overrode, with the value to put back. */
export interface OptionOverride {
  target: OptionTarget;
  priorValue: string;
  applied: boolean;
}

export interface DocumentFeatureState {
  active: boolean;
  overrides: Map<string, OptionOverride>;
}

export interface AppliedFeatures {
  highlights: boolean;
  folds: boolean;
  indents: boolean;
}

function targetKey(target: OptionTarget): string {
  return target.scope === "view" ? `view:${target.view}:${target.name}` : `document:${target.document}:${target.name}`;
}

/**
 * Capability probe for a query. A host that throws while loading the query is
 * treated the same as a missing query.
 */
export function probeQuery(
  host: Pick<EditorHost, "hasQuery">,
  language: string,
  kind: QueryKind,
  logger?: ClientLogger,
): boolean {
  try {
    return host.hasQuery(language, kind);
  } catch (err) {
    logger?.debug(`query probe failed: ${language}/${kind}`, { error: errorMessage(err) });
    return false;
  }
}

export class FeatureApplier {
  #host: EditorHost;
  #logger: ClientLogger;
  #errors: ErrorReporter;
  #documents = new Map<DocumentId, DocumentFeatureState>();

  constructor(host: EditorHost, logger: ClientLogger, errors: ErrorReporter) {
    this.#host = host;
    this.#logger = logger;
    this.#errors = errors;
  }

  isActive(document: DocumentId): boolean {
    return this.#documents.get(document)?.active === true;
  }

  state(document: DocumentId): Readonly<DocumentFeatureState> | undefined {
    return this.#documents.get(document);
  }

  start(document: DocumentId, language: string, config: EffectiveConfig): AppliedFeatures {
    const state = this.#stateFor(document);
    state.active = true;

    const applied: AppliedFeatures = { highlights: false, folds: false, indents: false };
    const host = this.#host;

    if (config.highlights && this.#hasQuery(language, "highlights")) {
      applied.highlights = this.#errors.guard("features.highlights", () =>
        host.startHighlighting(document, language),
      ).ok;
    }

    if (config.folds && this.#hasQuery(language, "folds")) {
      const folded = this.#errors.guard("features.folds", () => {
        const view = host.viewForDocument(document);
        if (view === undefined) return false;
        this.#override(state, { scope: "view", view, name: "foldmethod" }, TREE_FOLD_METHOD);
        this.#override(state, { scope: "view", view, name: "foldexpr" }, host.treeFoldExpression);
        return true;
      });
      applied.folds = folded.ok && folded.value;
    }

    if (config.indents && this.#hasQuery(language, "indents")) {
      applied.indents = this.#errors.guard("features.indents", () => {
        this.#override(state, { scope: "document", document, name: "indentexpr" }, host.treeIndentExpression);
      }).ok;
    }

    debug.features("start", { document, language, ...applied });
    return applied;
  }

  /** Revert overrides and forget the document. Safe on documents never started. */
  stop(document: DocumentId): boolean {
    const host = this.#host;
    const state = this.#documents.get(document);
    const wasActive = state?.active === true;

    this.#errors.guard("features.highlights.stop", () => {
      if (host.isHighlighting(document)) host.stopHighlighting(document);
    });

    if (state) {
      for (const override of state.overrides.values()) {
        if (!override.applied) continue;
        this.#errors.guard("features.restore", () => this.#write(override.target, override.priorValue), {
          context: { option: override.target.name },
        });
        override.applied = false;
      }
    }
    this.#documents.delete(document);

    debug.features("stop", { document, wasActive });
    return wasActive;
  }

  #stateFor(document: DocumentId): DocumentFeatureState {
    let state = this.#documents.get(document);
    if (!state) {
      state = { active: false, overrides: new Map() };
      this.#documents.set(document, state);
    }
    return state;
  }

  #hasQuery(language: string, kind: QueryKind): boolean {
    const present = probeQuery(this.#host, language, kind, this.#logger);
    if (!present) debug.features("query.missing", { language, kind });
    return present;
  }

  /** Save the prior value once per activation, then write `value` if it differs. */
  #override(state: DocumentFeatureState, target: OptionTarget, value: string): void {
    const current = this.#read(target);
    if (current === value) return;

    const key = targetKey(target);
    if (!state.overrides.get(key)?.applied) {
      state.overrides.set(key, { target, priorValue: current, applied: true });
    }
    this.#write(target, value);
  }

  #read(target: OptionTarget): string {
    return target.scope === "view"
      ? this.#host.getViewOption(target.view, target.name)
      : this.#host.getDocumentOption(target.document, target.name);
  }

  #write(target: OptionTarget, value: string): void {
    if (target.scope === "view") {
      this.#host.setViewOption(target.view, target.name, value);
    } else {
      this.#host.setDocumentOption(target.document, target.name, value);
    }
  }
}
