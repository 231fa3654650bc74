import type { AsyncQueue, Logger, OutboundMessage } from "@parley/core";

export const HTTP_RELAY_CHANNEL_ID = "http_relay";
/** Metadata namespace holding the relay's correlation id on inbound messages. */
export const RELAY_METADATA_KEY = "http_relay";

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 18790;
export const DEFAULT_MESSAGE_PATH = "/message";
export const DEFAULT_RESPONSE_TIMEOUT_MS = 900_000;
export const DEFAULT_MAX_BODY_BYTES = 512_000;

export const PUBLISH_FAILURE_NOTICE = "I could not process this message. Please retry.";
export const TIMEOUT_NOTICE = "Upstream response timed out.";
export const SHUTDOWN_NOTICE = "Relay is shutting down.";
export const MISSING_FIELDS_ERROR = "Missing sender_id/chat_id/content";

export interface HttpRelayChannelOptions {
  host?: string;
  port?: number;
  path?: string;
  /** Idle window per request; restarts after every delivered message. */
  responseTimeoutMs?: number;
  maxBodyBytes?: number;
  /** Defaults to a fresh 128-bit hex token per request. */
  mintCorrelationId?: () => string;
  logger?: Logger;
}

export type RelayEventType = "progress" | "response";

export interface RelayEventPayload {
  content: string;
  [key: string]: unknown;
}

/** Sink the delivery loop writes events to; rejects with TransportWriteFailureError once the client is gone. */
export interface RelayEventWriter {
  write(event: RelayEventType, payload: RelayEventPayload): Promise<void>;
}

/** Per-request FIFO of outbound messages, fed by the dispatcher. */
export type DeliveryChannel = AsyncQueue<OutboundMessage>;

export type DeliveryLoopState = "AWAITING" | "EMITTING_PROGRESS" | "TERMINATED";

export type DeliveryTermination = "response" | "timeout" | "transport_error" | "cancelled";
