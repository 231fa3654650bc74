/**
 * Message shapes carried on the bus between channel adapters and the agent worker.
 */

export type MessageMetadata = Record<string, unknown>;

/** Message received by a channel adapter and published for the agent. */
export interface InboundMessage {
  channel: string;
  senderId: string;
  chatId: string;
  content: string;
  media?: string[];
  metadata: MessageMetadata;
  receivedAt: string;
}

/** Message produced by the agent, routed back to the channel named by `channel`. */
export interface OutboundMessage {
  channel: string;
  chatId: string;
  content: string;
  metadata: MessageMetadata;
}

/** Metadata namespace carrying progress state on outbound messages. */
export const PROGRESS_METADATA_KEY = "progress";

export interface ProgressMetadata {
  is_progress?: boolean;
  request_id?: string;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function sessionKeyFor(message: Pick<InboundMessage, "channel" | "chatId">): string {
  return `${message.channel}:${message.chatId}`;
}

/** True when the outbound message announces that more messages will follow. */
export function isProgressMessage(message: Pick<OutboundMessage, "metadata">): boolean {
  const progress = message.metadata[PROGRESS_METADATA_KEY];
  if (!isRecord(progress)) {
    return false;
  }
  return Boolean(progress.is_progress);
}
