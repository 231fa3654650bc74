import http from "node:http";
import {
  RequestBodyTooLargeError,
  closeServer,
  errorToString,
  getLogger,
  listen,
  nowIso,
  readRequestBody,
  requestPath,
  writeJson
} from "@parley/core";
import type {
  ChannelAdapter,
  ChannelAdapterContext,
  InboundMessage,
  Logger,
  OutboundMessage
} from "@parley/core";
import { mintCorrelationId, resolveCorrelationId, withCorrelationId } from "./http-relay-channel/correlation.js";
import { RELAY_STOPPING, abortOnClientDisconnect, runDeliveryLoop } from "./http-relay-channel/delivery-loop.js";
import {
  DuplicateIdentifierError,
  PublishFailureError,
  RelayValidationError,
  TransportWriteFailureError
} from "./http-relay-channel/errors.js";
import { RelayEventStream } from "./http-relay-channel/event-stream.js";
import { CorrelationRegistry } from "./http-relay-channel/registry.js";
import { parseRelayRequest, type RelayRequest } from "./http-relay-channel/request.js";
import {
  DEFAULT_HOST,
  DEFAULT_MAX_BODY_BYTES,
  DEFAULT_MESSAGE_PATH,
  DEFAULT_PORT,
  DEFAULT_RESPONSE_TIMEOUT_MS,
  HTTP_RELAY_CHANNEL_ID,
  PUBLISH_FAILURE_NOTICE,
  type DeliveryChannel,
  type DeliveryTermination,
  type HttpRelayChannelOptions
} from "./http-relay-channel/types.js";

export type RelayRequestOutcome = DeliveryTermination | "publish_failed" | "error";

/**
 * Channel that answers `POST /message` with a Server-Sent Events stream.
 *
 * Each request gets a fresh correlation id and its own delivery channel in
 * the registry. Outbound messages carrying that id are queued onto the
 * channel by `send()` and streamed until a non-progress message, the idle
 * timeout, a client disconnect, or `stop()`.
 */
export class HttpRelayChannelAdapter implements ChannelAdapter {
  readonly id = HTTP_RELAY_CHANNEL_ID;

  private readonly host: string;
  private readonly port: number;
  private readonly path: string;
  private readonly responseTimeoutMs: number;
  private readonly maxBodyBytes: number;
  private readonly mintId: () => string;
  private readonly configuredLogger?: Logger;

  private readonly registry = new CorrelationRegistry();
  private readonly inFlight = new Map<string, AbortController>();
  private readonly activeRelays = new Set<Promise<RelayRequestOutcome>>();
  private context: ChannelAdapterContext | null = null;
  private logger: Logger;
  private server: http.Server | null = null;
  private starting: Promise<void> | null = null;
  private baseUrl: string | undefined;
  private accepting = false;

  constructor(options: HttpRelayChannelOptions = {}) {
    this.host = options.host?.trim() || DEFAULT_HOST;
    this.port = options.port ?? DEFAULT_PORT;
    this.path = options.path?.trim() || DEFAULT_MESSAGE_PATH;
    this.responseTimeoutMs = Math.max(1, options.responseTimeoutMs ?? DEFAULT_RESPONSE_TIMEOUT_MS);
    this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
    this.mintId = options.mintCorrelationId ?? mintCorrelationId;
    this.configuredLogger = options.logger;
    this.logger = options.logger ?? getLogger(HTTP_RELAY_CHANNEL_ID);
  }

  /** Full endpoint URL once listening. */
  get url(): string | undefined {
    return this.baseUrl ? `${this.baseUrl}${this.path}` : undefined;
  }

  get isAccepting(): boolean {
    return this.accepting;
  }

  get pendingCount(): number {
    return this.registry.size;
  }

  hasPending(correlationId: string): boolean {
    return this.registry.has(correlationId);
  }

  pendingIds(): string[] {
    return this.registry.ids();
  }

  async start(context: ChannelAdapterContext): Promise<void> {
    if (this.server) {
      return;
    }
    if (this.starting) {
      return this.starting;
    }
    this.context = context;
    this.logger = this.configuredLogger ?? context.logger;
    this.starting = this.listen();
    try {
      await this.starting;
    } finally {
      this.starting = null;
    }
  }

  async stop(): Promise<void> {
    this.accepting = false;

    const pendingStart = this.starting;
    if (pendingStart) {
      try {
        await pendingStart;
      } catch (error) {
        this.logger.debug({ error: errorToString(error) }, "http_relay_stop_after_failed_start");
      }
    }

    const discarded = this.registry.drainAll();
    const cancelled = this.inFlight.size;
    for (const controller of this.inFlight.values()) {
      controller.abort(RELAY_STOPPING);
    }
    this.inFlight.clear();
    await Promise.allSettled(Array.from(this.activeRelays));

    const server = this.server;
    this.server = null;
    this.baseUrl = undefined;
    if (server) {
      await closeServer(server);
      this.logger.info({ discarded, cancelled }, "http_relay_stopped");
    }
    this.context = null;
  }

  /** Outbound dispatcher: queue the message for its pending request, if any. */
  send(message: OutboundMessage): void {
    const correlationId = resolveCorrelationId(message.metadata);
    if (!correlationId) {
      return;
    }
    const channel = this.registry.lookup(correlationId);
    if (!channel) {
      this.logger.debug({ requestId: correlationId }, "http_relay_no_pending_request");
      return;
    }
    channel.put(message);
  }

  private async listen(): Promise<void> {
    const server = http.createServer((request, response) => {
      void this.handleRequest(request, response).catch((error: unknown) => {
        this.logger.error({ error: errorToString(error) }, "http_relay_request_failed");
        if (!response.headersSent) {
          writeJson(response, 500, { error: "Internal relay error" });
        } else if (!response.writableEnded) {
          response.end();
        }
      });
    });

    this.accepting = true;
    try {
      this.baseUrl = await listen(server, this.port, this.host);
    } catch (error) {
      this.accepting = false;
      throw error;
    }
    this.server = server;
    this.logger.info({ url: this.url }, "http_relay_started");
  }

  private async handleRequest(request: http.IncomingMessage, response: http.ServerResponse): Promise<void> {
    if (requestPath(request) !== this.path) {
      writeJson(response, 404, { error: "not_found" });
      return;
    }
    if ((request.method ?? "GET").toUpperCase() !== "POST") {
      response.setHeader("allow", "POST");
      writeJson(response, 405, { error: "method_not_allowed" });
      return;
    }
    if (!this.accepting) {
      writeJson(response, 503, { error: "Relay is not accepting requests" });
      return;
    }

    let bodyText: string;
    try {
      bodyText = await readRequestBody(request, this.maxBodyBytes);
    } catch (error) {
      if (error instanceof RequestBodyTooLargeError) {
        writeJson(response, 413, { error: error.message });
        return;
      }
      throw error;
    }

    let relayRequest: RelayRequest;
    try {
      relayRequest = parseRelayRequest(bodyText);
    } catch (error) {
      if (error instanceof RelayValidationError) {
        this.logger.warn({ error: error.message }, "http_relay_invalid_request");
        writeJson(response, error.statusCode, { error: error.message });
        return;
      }
      throw error;
    }

    const context = this.context;
    if (!this.accepting || !context) {
      writeJson(response, 503, { error: "Relay is not accepting requests" });
      return;
    }
    const task = this.relay(context, relayRequest, response);
    this.activeRelays.add(task);
    try {
      await task;
    } finally {
      this.activeRelays.delete(task);
    }
  }

  private async relay(
    context: ChannelAdapterContext,
    relayRequest: RelayRequest,
    response: http.ServerResponse
  ): Promise<RelayRequestOutcome> {
    const correlationId = this.mintId();
    let channel: DeliveryChannel;
    try {
      channel = this.registry.register(correlationId);
    } catch (error) {
      if (error instanceof DuplicateIdentifierError) {
        this.logger.error({ requestId: correlationId, error: error.message }, "http_relay_duplicate_request_id");
        writeJson(response, 500, { error: "Internal relay error" });
        return "error";
      }
      throw error;
    }

    const controller = new AbortController();
    this.inFlight.set(correlationId, controller);
    const detachDisconnect = abortOnClientDisconnect(response, controller);

    const stream = new RelayEventStream(response);
    const openedAt = Date.now();
    let outcome: RelayRequestOutcome = "error";
    context.emitEvent("relay.request.opened", {
      requestId: correlationId,
      senderId: relayRequest.senderId,
      chatId: relayRequest.chatId
    });

    try {
      stream.open();

      const inbound: InboundMessage = {
        channel: this.id,
        senderId: relayRequest.senderId,
        chatId: relayRequest.chatId,
        content: relayRequest.content,
        media: [],
        metadata: withCorrelationId(relayRequest.metadata, correlationId),
        receivedAt: nowIso()
      };
      try {
        await context.publish(inbound);
      } catch (error) {
        throw new PublishFailureError(correlationId, error);
      }

      outcome = await runDeliveryLoop({
        correlationId,
        channel,
        stream,
        timeoutMs: this.responseTimeoutMs,
        signal: controller.signal,
        logger: this.logger
      });
      return outcome;
    } catch (error) {
      if (error instanceof TransportWriteFailureError) {
        outcome = "transport_error";
        return outcome;
      }
      if (error instanceof PublishFailureError) {
        outcome = "publish_failed";
        this.logger.error({ requestId: correlationId, error: errorToString(error.cause) }, "http_relay_publish_failed");
      } else {
        outcome = "error";
        this.logger.error({ requestId: correlationId, error: errorToString(error) }, "http_relay_stream_failed");
      }
      await this.writeFailureNotice(stream, correlationId);
      return outcome;
    } finally {
      this.registry.remove(correlationId);
      this.inFlight.delete(correlationId);
      detachDisconnect();
      await stream.end();
      context.emitEvent("relay.request.closed", {
        requestId: correlationId,
        outcome,
        durationMs: Date.now() - openedAt
      });
    }
  }

  private async writeFailureNotice(stream: RelayEventStream, correlationId: string): Promise<void> {
    if (!stream.isWritable) {
      return;
    }
    try {
      await stream.write("response", { content: PUBLISH_FAILURE_NOTICE });
    } catch (error) {
      this.logger.debug({ requestId: correlationId, error: errorToString(error) }, "http_relay_stream_closed_by_client");
    }
  }
}

export function createHttpRelayChannel(options: HttpRelayChannelOptions = {}): HttpRelayChannelAdapter {
  return new HttpRelayChannelAdapter(options);
}
