export { type Logger, nullLogger } from "./logger.js";
export {
  type Debug,
  type DebugChannel,
  type DebugConfig,
  type DebugData,
  DEBUG_ENV_VAR,
  configureDebug,
  debug,
  formatDebugMessage,
  isDebugEnabled,
  refreshDebugChannels,
  resetDebugConfig,
} from "./debug.js";
export { escapesBase, toSlashPath } from "./paths.js";
