import crypto from "node:crypto";
import { PROGRESS_METADATA_KEY, isRecord, type MessageMetadata } from "@parley/core";
import { RELAY_METADATA_KEY } from "./types.js";

/** 128 random bits as 32 lowercase hex characters. */
export function mintCorrelationId(): string {
  return crypto.randomBytes(16).toString("hex");
}

function requestIdIn(metadata: MessageMetadata, namespace: string): string | undefined {
  const scope = metadata[namespace];
  if (!isRecord(scope)) {
    return undefined;
  }
  const requestId = scope.request_id;
  return typeof requestId === "string" && requestId.length > 0 ? requestId : undefined;
}

/**
 * Correlation id carried by an outbound message.
 *
 * Precedence: `progress.request_id`, then `http_relay.request_id`. When both
 * are present and disagree, the progress namespace still wins.
 */
export function resolveCorrelationId(metadata: MessageMetadata | undefined): string | undefined {
  if (!metadata) {
    return undefined;
  }
  return requestIdIn(metadata, PROGRESS_METADATA_KEY) ?? requestIdIn(metadata, RELAY_METADATA_KEY);
}

/**
 * Copy of the caller's metadata with `http_relay.request_id` set. Other keys,
 * including other keys of a caller-supplied `http_relay` object, are kept.
 */
export function withCorrelationId(metadata: MessageMetadata, correlationId: string): MessageMetadata {
  const existing = metadata[RELAY_METADATA_KEY];
  return {
    ...metadata,
    [RELAY_METADATA_KEY]: {
      ...(isRecord(existing) ? existing : {}),
      request_id: correlationId
    }
  };
}
