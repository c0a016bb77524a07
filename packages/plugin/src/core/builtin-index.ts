import type { LanguageHost } from "../host-api.js";

export const BUNDLED_HIGHLIGHTS_PATTERN = "queries/*/highlights.scm";

const QUERY_DIR = /(?:^|\/)queries\/([^/]+)\/highlights\.scm$/;

/**
 * Languages whose highlight queries ship with the host, whether or not a
 * grammar binary is installed for them.
 */
export class BuiltinIndex {
  readonly #languages: ReadonlySet<string>;

  constructor(languages: Iterable<string>) {
    this.#languages = new Set(languages);
  }

  static scan(host: Pick<LanguageHost, "listRuntimeFiles">): BuiltinIndex {
    const languages = new Set<string>();
    for (const file of host.listRuntimeFiles(BUNDLED_HIGHLIGHTS_PATTERN)) {
      const match = QUERY_DIR.exec(file.replace(/\\/g, "/"));
      if (match?.[1]) languages.add(match[1]);
    }
    return new BuiltinIndex(languages);
  }

  contains(language: string): boolean {
    return this.#languages.has(language);
  }

  get size(): number {
    return this.#languages.size;
  }
}
