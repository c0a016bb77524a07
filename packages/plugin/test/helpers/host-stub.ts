import type {
  CommandInput,
  CommandOptions,
  ConfigurationSection,
  DocumentId,
  DocumentOptionName,
  EditorHost,
  FiletypeEvent,
  GrammarInstaller,
  NotifyLevel,
  QueryKind,
  ViewId,
  ViewOptionName,
} from "../../src/host-api.js";
import type { DisposableLike } from "@syntax-enable/shared";

// =============================================================================
// Types
// =============================================================================

export interface StubDocument {
  id: DocumentId;
  filetype: string;
  view?: ViewId;
  valid: boolean;
  highlighting: boolean;
  options: Record<DocumentOptionName, string>;
}

export interface StubOutputChannel {
  name: string;
  lines: string[];
  shown: number;
  appendLine(line: string): void;
  show(): void;
  dispose(): void;
}

/** Installer whose installs resolve when the test says so. */
export interface ControlledInstaller extends GrammarInstaller {
  calls: Array<string | readonly string[]>;
  resolveNext(value?: unknown): void;
  rejectNext(error: unknown): void;
  readonly pending: number;
}

export interface HostStubOptions {
  /** language -> filetypes; languages missing here map to themselves. */
  filetypes?: Record<string, string[]>;
  /** filetype -> language; filetypes missing here map to themselves. */
  languages?: Record<string, string | undefined>;
  /** Languages whose grammar binary is installed. */
  installed?: string[];
  /** language -> queries it provides. */
  queries?: Record<string, QueryKind[]>;
  /** Languages whose query probes throw. */
  brokenQueries?: string[];
  /** Runtime highlight query files bundled with the host. */
  runtimeFiles?: string[];
  installer?: GrammarInstaller;
  configuration?: Record<string, unknown>;
}

export interface RecordedHost {
  notifications: Array<{ message: string; level: NotifyLevel }>;
  highlightStarts: Array<{ document: DocumentId; language: string }>;
  highlightStops: DocumentId[];
  optionWrites: Array<{ target: string; name: string; value: string }>;
  addLanguageCalls: string[];
  loadInstallerCalls: number;
  commands: Map<string, { handler: (input: CommandInput) => void; options?: CommandOptions }>;
  channels: StubOutputChannel[];
}

export interface HostStub extends EditorHost {
  recorded: RecordedHost;
  documents: Map<DocumentId, StubDocument>;
  viewOptions: Map<ViewId, Record<ViewOptionName, string>>;
  current: DocumentId;
  installed: Set<string>;
  openDocument(filetype: string, init?: { view?: ViewId; indentexpr?: string }): StubDocument;
  setFiletype(document: DocumentId, filetype: string): void;
  setConfiguration(values: Record<string, unknown>): void;
  fireConfigurationChange(): void;
}

export const TREE_FOLD_EXPR = "tree.foldexpr()";
export const TREE_INDENT_EXPR = "tree.indentexpr()";

// =============================================================================
// Installer
// =============================================================================

export function createControlledInstaller(onInstall?: (languages: string | readonly string[]) => void): ControlledInstaller {
  const queue: Array<{ resolve: (value: unknown) => void; reject: (error: unknown) => void }> = [];
  const calls: Array<string | readonly string[]> = [];
  return {
    calls,
    install(languages) {
      calls.push(languages);
      return new Promise((resolve, reject) => {
        queue.push({ resolve, reject });
        onInstall?.(languages);
      });
    },
    resolveNext(value?: unknown) {
      queue.shift()?.resolve(value);
    },
    rejectNext(error: unknown) {
      queue.shift()?.reject(error);
    },
    get pending() {
      return queue.length;
    },
  };
}

// =============================================================================
// Host
// =============================================================================

let nextDocument = 1;
let nextView = 100;

export function createHostStub(options: HostStubOptions = {}): HostStub {
  const documents = new Map<DocumentId, StubDocument>();
  const viewOptions = new Map<ViewId, Record<ViewOptionName, string>>();
  const installed = new Set(options.installed ?? []);
  const filetypeListeners = new Set<(event: FiletypeEvent) => void>();
  const configListeners = new Set<() => void>();
  let configuration = options.configuration;

  const recorded: RecordedHost = {
    notifications: [],
    highlightStarts: [],
    highlightStops: [],
    optionWrites: [],
    addLanguageCalls: [],
    loadInstallerCalls: 0,
    commands: new Map(),
    channels: [],
  };

  const disposable = (fn: () => void): DisposableLike => ({ dispose: fn });

  function doc(id: DocumentId): StubDocument {
    const found = documents.get(id);
    if (!found) throw new Error(`unknown document ${id}`);
    return found;
  }

  function view(id: ViewId): Record<ViewOptionName, string> {
    const found = viewOptions.get(id);
    if (!found) throw new Error(`unknown view ${id}`);
    return found;
  }

  const host: HostStub = {
    recorded,
    documents,
    viewOptions,
    current: 0,
    installed,
    treeFoldExpression: TREE_FOLD_EXPR,
    treeIndentExpression: TREE_INDENT_EXPR,

    openDocument(filetype, init = {}) {
      const id = nextDocument++;
      const viewId = init.view ?? nextView++;
      if (!viewOptions.has(viewId)) {
        viewOptions.set(viewId, { foldmethod: "manual", foldexpr: "0" });
      }
      const created: StubDocument = {
        id,
        filetype,
        view: viewId,
        valid: true,
        highlighting: false,
        options: { indentexpr: init.indentexpr ?? "" },
      };
      documents.set(id, created);
      host.current = id;
      return created;
    },
    setFiletype(document, filetype) {
      doc(document).filetype = filetype;
      for (const listener of [...filetypeListeners]) listener({ document, filetype });
    },
    setConfiguration(values) {
      configuration = values;
    },
    fireConfigurationChange() {
      for (const listener of [...configListeners]) listener();
    },

    getFiletypes: (language) => options.filetypes?.[language] ?? [language],
    getLanguage: (filetype) =>
      options.languages && filetype in options.languages ? options.languages[filetype] : filetype,
    addLanguage(language) {
      recorded.addLanguageCalls.push(language);
      return installed.has(language);
    },
    hasQuery(language, kind) {
      if (options.brokenQueries?.includes(language)) throw new Error(`invalid ${kind} query for ${language}`);
      return options.queries?.[language]?.includes(kind) ?? false;
    },
    listRuntimeFiles: () => options.runtimeFiles ?? [],

    currentDocument: () => host.current,
    getFiletype: (document) => doc(document).filetype,
    isDocumentValid: (document) => documents.get(document)?.valid === true,
    viewForDocument: (document) => documents.get(document)?.view,

    startHighlighting(document, language) {
      recorded.highlightStarts.push({ document, language });
      doc(document).highlighting = true;
    },
    stopHighlighting(document) {
      recorded.highlightStops.push(document);
      doc(document).highlighting = false;
    },
    isHighlighting: (document) => documents.get(document)?.highlighting === true,

    getViewOption: (viewId, name) => view(viewId)[name],
    setViewOption(viewId, name, value) {
      recorded.optionWrites.push({ target: `view:${viewId}`, name, value });
      view(viewId)[name] = value;
    },
    getDocumentOption: (document, name) => doc(document).options[name],
    setDocumentOption(document, name, value) {
      recorded.optionWrites.push({ target: `document:${document}`, name, value });
      doc(document).options[name] = value;
    },

    loadInstaller() {
      recorded.loadInstallerCalls += 1;
      return options.installer;
    },

    notify(message, level) {
      recorded.notifications.push({ message, level });
    },
    createOutputChannel(name) {
      const channel: StubOutputChannel = {
        name,
        lines: [],
        shown: 0,
        appendLine(line) {
          channel.lines.push(line);
        },
        show() {
          channel.shown += 1;
        },
        dispose() {
          channel.lines.splice(0, channel.lines.length);
        },
      };
      recorded.channels.push(channel);
      return channel;
    },
    getConfiguration(section): ConfigurationSection | undefined {
      if (!configuration || section !== "syntaxEnable") return undefined;
      const values = configuration;
      return {
        get<T>(key: string, defaultValue: T): T {
          return key in values ? (values[key] as T) : defaultValue;
        },
      };
    },
    onDidChangeConfiguration(listener) {
      configListeners.add(listener);
      return disposable(() => configListeners.delete(listener));
    },

    registerCommand(name, handler, commandOptions) {
      recorded.commands.set(name, { handler, options: commandOptions });
      return disposable(() => recorded.commands.delete(name));
    },
    onDidSetFiletype(listener) {
      filetypeListeners.add(listener);
      return disposable(() => filetypeListeners.delete(listener));
    },
  };

  return host;
}

/** Let every queued promise callback run. */
export function flushMicrotasks(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
