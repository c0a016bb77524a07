export {
  DEBUG_ENV,
  configureDebug,
  debug,
  formatDebugMessage,
  getDebugChannel,
  parseDebugEnv,
  refreshDebugChannels,
} from "./debug.js";
export type { Debug, DebugChannel, DebugConfig, DebugData } from "./debug.js";
export { DisposableStore, combineDisposables, toDisposable } from "./disposables.js";
export type { DisposableLike } from "./disposables.js";
export { SimpleEmitter } from "./events.js";
export type { Listener } from "./events.js";
