import { debug } from "@syntax-enable/shared";
import type { LanguageHost } from "../host-api.js";
import { LanguageAvailability } from "../types.js";

/**
 * Availability of a grammar per filetype. Only filetypes of configured
 * languages have entries; anything else is not managed.
 */
export class AvailabilityRegistry {
  #entries = new Map<string, LanguageAvailability>();

  static fromLanguages(languages: readonly string[], host: Pick<LanguageHost, "getFiletypes">): AvailabilityRegistry {
    const registry = new AvailabilityRegistry();
    for (const language of languages) {
      for (const filetype of host.getFiletypes(language)) {
        registry.#entries.set(filetype, LanguageAvailability.Unknown);
      }
    }
    debug.registry("seeded", { languages: [...languages], filetypes: registry.#entries.size });
    return registry;
  }

  get(filetype: string): LanguageAvailability | undefined {
    return this.#entries.get(filetype);
  }

  has(filetype: string): boolean {
    return this.#entries.has(filetype);
  }

  /**
   * Record an outcome. `Unavailable` is terminal and unmanaged filetypes are
   * never added; both return false.
   */
  set(filetype: string, state: LanguageAvailability): boolean {
    const previous = this.#entries.get(filetype);
    if (previous === undefined || previous === LanguageAvailability.Unavailable) return false;
    this.#entries.set(filetype, state);
    if (previous !== state) {
      debug.registry("transition", { filetype, from: previous, to: state });
    }
    return true;
  }

  filetypes(): string[] {
    return Array.from(this.#entries.keys());
  }
}
