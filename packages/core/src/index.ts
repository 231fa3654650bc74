export { createGateway, GatewayRuntime } from "./gateway.js";
export type { GatewayState, GatewayStatus } from "./gateway.js";
export type {
  GatewayConfig,
  GatewayAgentConfig,
  GatewayHealthConfig,
  GatewayHooks,
  GatewayLogConfig
} from "./config.js";

export type { ChannelAdapter, ChannelAdapterContext } from "./channels.js";

export { MessageBus } from "./bus.js";
export type { OutboundHandler } from "./bus.js";
export { AsyncQueue } from "./queue.js";
export type { QueueReceiveOptions, QueueReceiveResult } from "./queue.js";

export { AgentWorker, AGENT_ERROR_NOTICE, createEchoBackend } from "./agent.js";
export type { AgentBackend, AgentTurnRequest, AgentWorkerOptions } from "./agent.js";

export type {
  AgentStreamEvent,
  AgentStreamEventHandler,
  AgentStreamEventType,
  GatewayRuntimeEvent,
  GatewayRuntimeEventEmitter,
  GatewayRuntimeEventType
} from "./events.js";

export {
  PROGRESS_METADATA_KEY,
  isProgressMessage,
  isRecord,
  sessionKeyFor
} from "./messages.js";
export type { InboundMessage, MessageMetadata, OutboundMessage, ProgressMetadata } from "./messages.js";

export {
  BusClosedError,
  ChannelError,
  ConfigError,
  DuplicateChannelError,
  ParleyError,
  errorToString
} from "./errors.js";

export { configureLogger, currentLoggerSettings, getLogger, isLogLevel } from "./logger.js";
export type { LogLevel, Logger, LoggerSettings } from "./logger.js";

export {
  DEFAULT_JSON_BODY_MAX_BYTES,
  RequestBodyTooLargeError,
  closeServer,
  listen,
  nowIso,
  readRequestBody,
  requestPath,
  writeJson
} from "./gateway/helpers.js";
