import type { DisposableLike } from "@syntax-enable/shared";
import { SyntaxEnableError } from "./errors.js";

/** A host-managed open document (buffer). */
export type DocumentId = number;

/** One on-screen presentation of a document (window). */
export type ViewId = number;

export type QueryKind = "highlights" | "folds" | "indents";

export type ViewOptionName = "foldmethod" | "foldexpr";
export type DocumentOptionName = "indentexpr";

export type NotifyLevel = "info" | "warn" | "error";

export interface OutputChannel {
  readonly name: string;
  appendLine(line: string): void;
  show?(preserveFocus?: boolean): void;
  dispose?(): void;
}

export interface ConfigurationSection {
  get<T>(key: string, defaultValue: T): T;
}

/** External service that downloads and compiles grammars. */
export interface GrammarInstaller {
  install(languages: string | readonly string[]): Promise<unknown>;
}

export interface FiletypeEvent {
  document: DocumentId;
  filetype: string;
}

export interface CommandInput {
  args: string;
  bang: boolean;
}

export interface CommandOptions {
  complete?: (prefix: string) => string[];
}

export interface LanguageHost {
  getFiletypes(language: string): string[];
  getLanguage(filetype: string): string | undefined;
  /** Registers the grammar for `language`; false when no grammar binary can be found. */
  addLanguage(language: string): boolean;
  /** May throw when the query file exists but fails to load. */
  hasQuery(language: string, kind: QueryKind): boolean;
  listRuntimeFiles(pattern: string): string[];
}

export interface DocumentHost {
  currentDocument(): DocumentId;
  getFiletype(document: DocumentId): string;
  isDocumentValid(document: DocumentId): boolean;
  viewForDocument(document: DocumentId): ViewId | undefined;
}

export interface HighlightHost {
  startHighlighting(document: DocumentId, language: string): void;
  stopHighlighting(document: DocumentId): void;
  isHighlighting(document: DocumentId): boolean;
}

export interface OptionHost {
  readonly treeFoldExpression: string;
  readonly treeIndentExpression: string;
  getViewOption(view: ViewId, name: ViewOptionName): string;
  setViewOption(view: ViewId, name: ViewOptionName, value: string): void;
  getDocumentOption(document: DocumentId, name: DocumentOptionName): string;
  setDocumentOption(document: DocumentId, name: DocumentOptionName, value: string): void;
}

export interface UiHost {
  notify(message: string, level: NotifyLevel): void;
  createOutputChannel(name: string): OutputChannel;
  getConfiguration?(section: string): ConfigurationSection | undefined;
  onDidChangeConfiguration?(listener: () => void): DisposableLike;
}

export interface WiringHost {
  registerCommand(name: string, handler: (input: CommandInput) => void, options?: CommandOptions): DisposableLike;
  onDidSetFiletype(listener: (event: FiletypeEvent) => void): DisposableLike;
}

export interface EditorHost extends LanguageHost, DocumentHost, HighlightHost, OptionHost, UiHost, WiringHost {
  /** Locates the installer service; undefined when it is not loadable. */
  loadInstaller(): GrammarInstaller | undefined;
}

let current: EditorHost | null = null;

/**
 * Provide the editor host used when callers do not pass one explicitly.
 */
export function useEditorHost(host: EditorHost | null): void {
  current = host;
}

export function getEditorHost(): EditorHost {
  if (current) return current;
  throw new SyntaxEnableError("host-missing", "No editor host registered; call useEditorHost() first");
}
