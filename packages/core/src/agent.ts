import type { MessageBus } from "./bus.js";
import { errorToString } from "./errors.js";
import { nowIso } from "./gateway/helpers.js";
import type { AgentStreamEvent, AgentStreamEventHandler } from "./events.js";
import { getLogger, type Logger } from "./logger.js";
import {
  PROGRESS_METADATA_KEY,
  sessionKeyFor,
  type InboundMessage,
  type OutboundMessage,
  type ProgressMetadata
} from "./messages.js";

export const AGENT_ERROR_NOTICE = "Sorry, I hit an error while handling that message.";
const DEFAULT_POLL_INTERVAL_MS = 1_000;

export interface AgentTurnRequest {
  message: InboundMessage;
  sessionKey: string;
  emit: AgentStreamEventHandler;
  signal: AbortSignal;
}

/** Produces the reply stream for one inbound message. */
export interface AgentBackend {
  readonly id: string;
  runTurn(request: AgentTurnRequest): Promise<void>;
}

export interface AgentWorkerOptions {
  bus: MessageBus;
  backend: AgentBackend;
  /** Publish `response.delta` events as progress messages. Defaults to true. */
  progressEnabled?: boolean;
  pollIntervalMs?: number;
  logger?: Logger;
}

function buildOutbound(inbound: InboundMessage, content: string, isProgress: boolean): OutboundMessage {
  const progress: ProgressMetadata = { is_progress: isProgress };
  return {
    channel: inbound.channel,
    chatId: inbound.chatId,
    content,
    metadata: {
      ...inbound.metadata,
      [PROGRESS_METADATA_KEY]: progress
    }
  };
}

/**
 * Pulls inbound messages off the bus one at a time and publishes the
 * backend's replies as outbound messages. The last message of every turn has
 * `progress.is_progress` false.
 */
export class AgentWorker {
  private readonly bus: MessageBus;
  private readonly backend: AgentBackend;
  private readonly progressEnabled: boolean;
  private readonly pollIntervalMs: number;
  private readonly logger: Logger;
  private controller: AbortController | null = null;
  private loopPromise: Promise<void> | null = null;

  constructor(options: AgentWorkerOptions) {
    this.bus = options.bus;
    this.backend = options.backend;
    this.progressEnabled = options.progressEnabled ?? true;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.logger = options.logger ?? getLogger("agent_worker");
  }

  get isRunning(): boolean {
    return this.controller !== null;
  }

  start(): void {
    if (this.controller) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loopPromise = this.consumeLoop(controller.signal);
    this.logger.info({ backend: this.backend.id }, "agent_worker_started");
  }

  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) {
      return;
    }
    this.controller = null;
    controller.abort();
    await this.loopPromise;
    this.loopPromise = null;
    this.logger.info("agent_worker_stopped");
  }

  async handleMessage(message: InboundMessage, signal: AbortSignal = new AbortController().signal): Promise<void> {
    const sessionKey = sessionKeyFor(message);
    let streamed = "";
    let finished = false;

    const publish = (content: string, isProgress: boolean) => {
      this.bus.publishOutbound(buildOutbound(message, content, isProgress));
    };

    const emit = (event: AgentStreamEvent) => {
      if (finished) {
        return;
      }
      if (event.type === "response.delta") {
        const text = event.payload.text ?? "";
        if (!text) {
          return;
        }
        streamed += text;
        if (this.progressEnabled) {
          publish(text, true);
        }
        return;
      }
      finished = true;
      if (event.type === "response.completed") {
        publish(event.payload.text ?? streamed, false);
        return;
      }
      this.logger.warn({ sessionKey, error: event.payload.error }, "agent_turn_provider_error");
      publish(AGENT_ERROR_NOTICE, false);
    };

    try {
      await this.backend.runTurn({ message, sessionKey, emit, signal });
    } catch (error) {
      this.logger.error({ sessionKey, error: errorToString(error) }, "agent_turn_failed");
      if (!finished) {
        finished = true;
        publish(AGENT_ERROR_NOTICE, false);
      }
    }

    if (!finished) {
      finished = true;
      publish(streamed, false);
    }
  }

  private async consumeLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const received = await this.bus.consumeInbound({ timeoutMs: this.pollIntervalMs, signal });
      if (received.kind !== "item") {
        continue;
      }
      await this.handleMessage(received.value, signal);
    }
  }
}

/** Reference backend for local runs: one progress update, then the echoed input. */
export function createEchoBackend(options: { progressText?: string } = {}): AgentBackend {
  const progressText = options.progressText ?? "thinking...";
  return {
    id: "echo",
    async runTurn(request: AgentTurnRequest): Promise<void> {
      request.emit({
        type: "response.delta",
        sessionKey: request.sessionKey,
        timestamp: nowIso(),
        payload: { text: progressText }
      });
      request.emit({
        type: "response.completed",
        sessionKey: request.sessionKey,
        timestamp: nowIso(),
        payload: { text: `echo:${request.message.content}` }
      });
    }
  };
}
