export {
  buildGatewayConfig,
  defineProjectConfig,
  findConfigFile,
  loadCliConfig,
  loadProjectEnvFiles,
  projectConfigSchema,
  resolveProjectConfig
} from "./config.js";
export type { LoadedCliConfig, ProjectConfig, ResolvedProjectConfig } from "./config.js";
export { importConfigModule, importTypeScriptModule, unwrapModuleDefault } from "./module-loader.js";
export { SHUTDOWN_SIGNALS, runStart, waitForShutdownSignal } from "./start.js";
export type { RunStartOptions, ShutdownSignal } from "./start.js";
