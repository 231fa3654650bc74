import type { GatewayRuntimeEventEmitter } from "./events.js";
import type { Logger } from "./logger.js";
import type { InboundMessage, OutboundMessage } from "./messages.js";

export interface ChannelAdapterContext {
  /** Hand an inbound message to the agent. Throws when the bus cannot take it. */
  publish: (message: InboundMessage) => Promise<void> | void;
  emitEvent: GatewayRuntimeEventEmitter;
  logger: Logger;
}

export interface ChannelAdapter {
  id: string;
  start: (context: ChannelAdapterContext) => Promise<void> | void;
  /** Receives every outbound message addressed to this channel id. */
  send: (message: OutboundMessage) => Promise<void> | void;
  stop?: () => Promise<void> | void;
}
