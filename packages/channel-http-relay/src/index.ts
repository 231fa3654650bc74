export { HttpRelayChannelAdapter, createHttpRelayChannel } from "./http-relay-channel.js";
export type { RelayRequestOutcome } from "./http-relay-channel.js";
export { mintCorrelationId, resolveCorrelationId, withCorrelationId } from "./http-relay-channel/correlation.js";
export { CorrelationRegistry } from "./http-relay-channel/registry.js";
export { RelayEventStream, formatRelayEvent } from "./http-relay-channel/event-stream.js";
export {
  abortOnClientDisconnect,
  runDeliveryLoop,
  CLIENT_DISCONNECTED,
  RELAY_STOPPING
} from "./http-relay-channel/delivery-loop.js";
export type { DeliveryLoopParams } from "./http-relay-channel/delivery-loop.js";
export { parseRelayRequest, parseRelayRequestBody, validateRelayRequest } from "./http-relay-channel/request.js";
export type { RelayRequest } from "./http-relay-channel/request.js";
export {
  DuplicateIdentifierError,
  PublishFailureError,
  RelayError,
  RelayValidationError,
  TimeoutExceededError,
  TransportWriteFailureError
} from "./http-relay-channel/errors.js";
export {
  DEFAULT_HOST,
  DEFAULT_MAX_BODY_BYTES,
  DEFAULT_MESSAGE_PATH,
  DEFAULT_PORT,
  DEFAULT_RESPONSE_TIMEOUT_MS,
  HTTP_RELAY_CHANNEL_ID,
  MISSING_FIELDS_ERROR,
  PUBLISH_FAILURE_NOTICE,
  RELAY_METADATA_KEY,
  SHUTDOWN_NOTICE,
  TIMEOUT_NOTICE
} from "./http-relay-channel/types.js";
export type {
  DeliveryChannel,
  DeliveryLoopState,
  DeliveryTermination,
  HttpRelayChannelOptions,
  RelayEventPayload,
  RelayEventType,
  RelayEventWriter
} from "./http-relay-channel/types.js";
