import type { AgentBackend } from "./agent.js";
import type { ChannelAdapter } from "./channels.js";
import type { LogLevel } from "./logger.js";

export interface GatewayHooks {
  onStart?: () => Promise<void> | void;
  onShutdown?: () => Promise<void> | void;
}

export interface GatewayHealthConfig {
  enabled?: boolean;
  host?: string;
  port?: number;
  path?: string;
}

export interface GatewayLogConfig {
  level?: LogLevel;
  pretty?: boolean;
}

export interface GatewayAgentConfig {
  backend?: AgentBackend;
  progressEnabled?: boolean;
  pollIntervalMs?: number;
}

export interface GatewayConfig {
  channels?: ChannelAdapter[];
  agent?: GatewayAgentConfig;
  health?: GatewayHealthConfig;
  log?: GatewayLogConfig;
  hooks?: GatewayHooks;
}
