export { SyntaxEnableController, OUTPUT_CHANNEL_NAME } from "./controller.js";
export type { SyntaxEnableControllerOptions } from "./controller.js";
export { registerPlugin } from "./plugin.js";
export type { PluginRegistration, RegisterPluginOptions } from "./plugin.js";
export { COMMAND_NAME, SUB_COMMANDS, completeSubCommand, dispatchCommand, isSubCommand } from "./commands.js";
export type { DispatchOptions, SubCommand } from "./commands.js";
export { getEditorHost, useEditorHost } from "./host-api.js";
export type {
  CommandInput,
  CommandOptions,
  ConfigurationSection,
  DocumentId,
  EditorHost,
  FiletypeEvent,
  GrammarInstaller,
  NotifyLevel,
  OutputChannel,
  QueryKind,
  ViewId,
} from "./host-api.js";
export { ClientLogger, LOG_LEVELS } from "./log.js";
export type { LogLevel } from "./log.js";
export { SyntaxEnableError } from "./errors.js";
export { LanguageAvailability } from "./types.js";
export type {
  AttachResult,
  EffectiveConfig,
  GlobalConfig,
  LanguageOverride,
  SyntaxEnableOptions,
  ToggleResult,
} from "./types.js";
export { CONFIG_SECTION, DEFAULT_CONFIG, ConfigService, normalizeConfig, resolveConfig } from "./core/config.js";
export { AvailabilityRegistry } from "./core/availability-registry.js";
export { BuiltinIndex } from "./core/builtin-index.js";
export { InstallerGateway } from "./core/installer-gateway.js";
export type { InstallOutcome } from "./core/installer-gateway.js";
export { FeatureApplier, probeQuery } from "./core/feature-applier.js";
export type { AppliedFeatures, DocumentFeatureState, OptionOverride } from "./core/feature-applier.js";
