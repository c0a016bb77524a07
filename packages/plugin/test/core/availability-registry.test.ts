import { describe, test, expect } from "vitest";
import { AvailabilityRegistry } from "../../src/core/availability-registry.js";
import { BuiltinIndex } from "../../src/core/builtin-index.js";
import { LanguageAvailability } from "../../src/types.js";
import { createHostStub } from "../helpers/host-stub.js";

describe("AvailabilityRegistry", () => {
  test("seeds every filetype of the configured languages as unknown", () => {
    const host = createHostStub({ filetypes: { javascript: ["javascript", "javascriptreact"], lua: ["lua"] } });
    const registry = AvailabilityRegistry.fromLanguages(["javascript", "lua"], host);

    expect(registry.filetypes()).toEqual(["javascript", "javascriptreact", "lua"]);
    expect(registry.get("javascriptreact")).toBe(LanguageAvailability.Unknown);
  });

  test("unlisted filetypes have no entry and are never added", () => {
    const registry = AvailabilityRegistry.fromLanguages(["lua"], createHostStub());

    expect(registry.get("python")).toBeUndefined();
    expect(registry.set("python", LanguageAvailability.Available)).toBe(false);
    expect(registry.has("python")).toBe(false);
  });

  test("unavailable is terminal", () => {
    const registry = AvailabilityRegistry.fromLanguages(["gleam"], createHostStub());

    expect(registry.set("gleam", LanguageAvailability.Unavailable)).toBe(true);
    expect(registry.set("gleam", LanguageAvailability.Available)).toBe(false);
    expect(registry.get("gleam")).toBe(LanguageAvailability.Unavailable);
  });
});

describe("BuiltinIndex", () => {
  test("collects languages from bundled highlight query paths", () => {
    const host = createHostStub({
      runtimeFiles: [
        "/usr/share/editor/runtime/queries/json/highlights.scm",
        "C:\\editor\\runtime\\queries\\lua\\highlights.scm",
        "queries/markdown/highlights.scm",
        "/usr/share/editor/runtime/queries/json/folds.scm",
        "/home/user/notes/highlights.scm",
      ],
    });
    const index = BuiltinIndex.scan(host);

    expect(index.contains("json")).toBe(true);
    expect(index.contains("lua")).toBe(true);
    expect(index.contains("markdown")).toBe(true);
    expect(index.contains("notes")).toBe(false);
    expect(index.size).toBe(3);
  });
});
