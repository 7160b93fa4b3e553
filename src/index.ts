export * from "./agent/index.js";
export { MemoryStore, MEMORY_KINDS, isMemoryKind } from "./memory/memory-store.js";
export { StateStore, type AgentState } from "./runtime/state-store.js";
export { resolveWorkspacePaths, ensureWorkspacePaths, type WorkspacePaths } from "./runtime/paths.js";
export { registerBuiltInTools, BUILT_IN_TOOLS } from "./tools/built-in/index.js";
export {
  loadConfig,
  loadCredentials,
  parseCredentials,
  resolveConfigPath,
  resolveCredentialsPath,
  DEFAULT_FALLBACK_ORDER,
  type ServantConfig,
} from "./config.js";
export { createLogger, createSilentLogger, type Logger, type LogLevel } from "./log.js";
