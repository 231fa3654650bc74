import type http from "node:http";
import { errorToString, isProgressMessage, type Logger } from "@parley/core";
import { TimeoutExceededError, TransportWriteFailureError } from "./errors.js";
import {
  SHUTDOWN_NOTICE,
  TIMEOUT_NOTICE,
  type DeliveryChannel,
  type DeliveryLoopState,
  type DeliveryTermination,
  type RelayEventWriter
} from "./types.js";

/** Abort reasons understood by the delivery loop. */
export const RELAY_STOPPING = "relay_stopping";
export const CLIENT_DISCONNECTED = "client_disconnected";

/**
 * Aborts `controller` with {@link CLIENT_DISCONNECTED} once the response
 * closes before finishing. A response already destroyed when this is
 * called aborts immediately. Returns the detach function.
 */
export function abortOnClientDisconnect(response: http.ServerResponse, controller: AbortController): () => void {
  const onClose = () => {
    if (!response.writableFinished) {
      controller.abort(CLIENT_DISCONNECTED);
    }
  };
  response.on("close", onClose);
  if (response.destroyed || response.socket?.destroyed === true) {
    onClose();
  }
  return () => {
    response.off("close", onClose);
  };
}

export interface DeliveryLoopParams {
  correlationId: string;
  channel: DeliveryChannel;
  stream: RelayEventWriter;
  timeoutMs: number;
  signal: AbortSignal;
  logger: Logger;
  onStateChange?: (state: DeliveryLoopState) => void;
}

/**
 * Streams delivered messages until the first terminal condition:
 * a non-progress message, the idle timeout, a transport failure, or
 * cancellation. The idle timer restarts with every dequeue.
 */
export async function runDeliveryLoop(params: DeliveryLoopParams): Promise<DeliveryTermination> {
  const { correlationId, channel, stream, timeoutMs, signal, logger } = params;
  const transition = (state: DeliveryLoopState) => {
    params.onStateChange?.(state);
  };

  try {
    while (true) {
      transition("AWAITING");
      const received = await channel.get({ timeoutMs, signal });

      if (received.kind === "aborted") {
        if (signal.reason === RELAY_STOPPING) {
          await stream.write("response", { content: SHUTDOWN_NOTICE });
          return "cancelled";
        }
        return "transport_error";
      }

      if (received.kind === "timeout") {
        const timeout = new TimeoutExceededError(correlationId, timeoutMs);
        logger.warn({ requestId: correlationId, error: timeout.message }, "relay_response_timeout");
        await stream.write("response", { content: TIMEOUT_NOTICE });
        return "timeout";
      }

      const message = received.value;
      if (isProgressMessage(message)) {
        transition("EMITTING_PROGRESS");
        await stream.write("progress", { content: message.content });
        continue;
      }
      await stream.write("response", { content: message.content });
      return "response";
    }
  } catch (error) {
    if (error instanceof TransportWriteFailureError) {
      logger.debug({ requestId: correlationId, error: errorToString(error) }, "relay_stream_closed_by_client");
      return "transport_error";
    }
    throw error;
  } finally {
    transition("TERMINATED");
  }
}
