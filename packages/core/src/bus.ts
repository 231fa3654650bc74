/**
 * MessageBus: in-process hand-off between channel adapters and the agent.
 *
 * Inbound messages queue up for the agent worker (FIFO). Outbound messages
 * fan out synchronously to every subscriber; subscribers decide for
 * themselves whether a message concerns them.
 */
import { BusClosedError, errorToString } from "./errors.js";
import { getLogger, type Logger } from "./logger.js";
import type { InboundMessage, OutboundMessage } from "./messages.js";
import { AsyncQueue, type QueueReceiveOptions, type QueueReceiveResult } from "./queue.js";

export type OutboundHandler = (message: OutboundMessage) => Promise<void> | void;

export class MessageBus {
  private readonly inbound = new AsyncQueue<InboundMessage>();
  private readonly outboundHandlers = new Set<OutboundHandler>();
  private readonly logger: Logger;
  private running = false;

  constructor(opts: { logger?: Logger } = {}) {
    this.logger = opts.logger ?? getLogger("message_bus");
  }

  get isRunning(): boolean {
    return this.running;
  }

  get pendingInbound(): number {
    return this.inbound.size;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.logger.info("message_bus_started");
  }

  stop(): void {
    if (!this.running) {
      return;
    }
    this.running = false;
    const dropped = this.inbound.drain();
    if (dropped.length > 0) {
      this.logger.warn({ dropped: dropped.length }, "inbound_messages_dropped_on_stop");
    }
    this.logger.info("message_bus_stopped");
  }

  // ── Inbound ──

  publishInbound(message: InboundMessage): void {
    if (!this.running) {
      throw new BusClosedError();
    }
    this.inbound.put(message);
    this.logger.debug({ channel: message.channel, chatId: message.chatId }, "inbound_published");
  }

  consumeInbound(options: QueueReceiveOptions = {}): Promise<QueueReceiveResult<InboundMessage>> {
    return this.inbound.get(options);
  }

  // ── Outbound ──

  onOutbound(handler: OutboundHandler): () => void {
    this.outboundHandlers.add(handler);
    return () => {
      this.outboundHandlers.delete(handler);
    };
  }

  publishOutbound(message: OutboundMessage): void {
    if (this.outboundHandlers.size === 0) {
      this.logger.debug({ channel: message.channel }, "outbound_no_handlers");
      return;
    }
    for (const handler of Array.from(this.outboundHandlers)) {
      try {
        const result = handler(message);
        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            this.logger.error({ error: errorToString(error), channel: message.channel }, "outbound_handler_error");
          });
        }
      } catch (error) {
        this.logger.error({ error: errorToString(error), channel: message.channel }, "outbound_handler_error");
      }
    }
  }
}
