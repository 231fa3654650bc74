import { isRecord, type MessageMetadata } from "@parley/core";
import { z } from "zod";
import { RelayValidationError } from "./errors.js";
import { MISSING_FIELDS_ERROR } from "./types.js";

export interface RelayRequest {
  senderId: string;
  chatId: string;
  content: string;
  metadata: MessageMetadata;
}

/** Non-empty string or non-zero finite number; booleans are not identifiers. */
const identifierSchema = z
  .union([z.string().min(1), z.number().finite().refine((value) => value !== 0)])
  .transform((value) => String(value));

const relayRequestSchema = z.object({
  senderId: identifierSchema,
  chatId: identifierSchema,
  content: z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value)),
  metadata: z.unknown().transform((value): MessageMetadata => (isRecord(value) ? { ...value } : {}))
});

/** camelCase wins over snake_case unless it is empty. */
function pickAlias(body: Record<string, unknown>, camel: string, snake: string): unknown {
  const preferred = body[camel];
  return preferred ? preferred : body[snake];
}

export function parseRelayRequestBody(bodyText: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(bodyText);
  } catch {
    throw new RelayValidationError("Invalid JSON body");
  }
  if (!isRecord(parsed)) {
    throw new RelayValidationError("Payload must be an object");
  }
  return parsed;
}

export function validateRelayRequest(body: Record<string, unknown>): RelayRequest {
  const result = relayRequestSchema.safeParse({
    senderId: pickAlias(body, "senderId", "sender_id"),
    chatId: pickAlias(body, "chatId", "chat_id"),
    content: body.content,
    metadata: body.metadata
  });
  if (result.success) {
    return result.data;
  }

  const contentPresent = body.content !== undefined && body.content !== null;
  const contentMistyped = result.error.issues.every((issue) => issue.path[0] === "content");
  if (contentPresent && contentMistyped) {
    throw new RelayValidationError("content must be text");
  }
  throw new RelayValidationError(MISSING_FIELDS_ERROR);
}

export function parseRelayRequest(bodyText: string): RelayRequest {
  return validateRelayRequest(parseRelayRequestBody(bodyText));
}
