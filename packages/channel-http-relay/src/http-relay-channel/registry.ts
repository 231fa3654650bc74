import { AsyncQueue, type OutboundMessage } from "@parley/core";
import { DuplicateIdentifierError } from "./errors.js";
import type { DeliveryChannel } from "./types.js";

/**
 * Correlation id → delivery channel.
 *
 * Every operation is synchronous and O(1); the event loop never interleaves
 * two of them, so the map needs no further locking.
 */
export class CorrelationRegistry {
  private readonly pending = new Map<string, DeliveryChannel>();

  get size(): number {
    return this.pending.size;
  }

  register(correlationId: string): DeliveryChannel {
    if (this.pending.has(correlationId)) {
      throw new DuplicateIdentifierError(correlationId);
    }
    const channel = new AsyncQueue<OutboundMessage>();
    this.pending.set(correlationId, channel);
    return channel;
  }

  lookup(correlationId: string): DeliveryChannel | undefined {
    return this.pending.get(correlationId);
  }

  has(correlationId: string): boolean {
    return this.pending.has(correlationId);
  }

  remove(correlationId: string): void {
    this.pending.delete(correlationId);
  }

  ids(): string[] {
    return Array.from(this.pending.keys());
  }

  /** Discards queued messages in every channel and empties the registry. Returns the number of discarded messages. */
  drainAll(): number {
    let discarded = 0;
    for (const channel of this.pending.values()) {
      discarded += channel.drain().length;
    }
    this.pending.clear();
    return discarded;
  }
}
