import http from "node:http";
import { AgentWorker } from "./agent.js";
import { MessageBus } from "./bus.js";
import type { ChannelAdapter, ChannelAdapterContext } from "./channels.js";
import type { GatewayConfig } from "./config.js";
import { ChannelError, DuplicateChannelError, errorToString } from "./errors.js";
import type { GatewayRuntimeEvent, GatewayRuntimeEventType } from "./events.js";
import { closeServer, listen, nowIso, requestPath } from "./gateway/helpers.js";
import { configureLogger, getLogger, type Logger } from "./logger.js";
import type { InboundMessage, OutboundMessage } from "./messages.js";

export type GatewayState = "stopped" | "running" | "degraded";

export interface GatewayStatus {
  state: GatewayState;
  startedAt?: string;
  degradedReasons: string[];
  channels: string[];
  agentBackend?: string;
  healthUrl?: string;
}

const MAX_RUNTIME_EVENTS = 500;

export class GatewayRuntime {
  private readonly config: GatewayConfig;
  private readonly logger: Logger;
  readonly bus: MessageBus;

  private state: GatewayState = "stopped";
  private startedAt: string | undefined;
  private degradedReasons: string[] = [];
  private worker: AgentWorker | null = null;
  private channelAdapters = new Map<string, ChannelAdapter>();
  private startedChannels = new Set<string>();
  private detachOutbound: (() => void) | null = null;
  private healthServer: http.Server | null = null;
  private healthUrl: string | undefined;
  private runtimeEventHandlers = new Set<(event: GatewayRuntimeEvent) => void>();
  private runtimeEvents: GatewayRuntimeEvent[] = [];

  constructor(params: { config: GatewayConfig; logger?: Logger }) {
    this.config = params.config;
    if (params.config.log) {
      configureLogger(params.config.log);
    }
    this.logger = params.logger ?? getLogger("gateway");
    this.bus = new MessageBus({ logger: this.logger.child({ component: "bus" }) });
    for (const adapter of this.config.channels ?? []) {
      this.registerChannelAdapter(adapter);
    }
  }

  getStatus(): GatewayStatus {
    return {
      state: this.state,
      startedAt: this.startedAt,
      degradedReasons: [...this.degradedReasons],
      channels: this.listChannelAdapterIds(),
      agentBackend: this.config.agent?.backend?.id,
      healthUrl: this.healthUrl
    };
  }

  registerChannelAdapter(adapter: ChannelAdapter): void {
    const id = adapter.id.trim();
    if (!id) {
      throw new ChannelError("Channel adapter id is required");
    }
    if (this.channelAdapters.has(id)) {
      throw new DuplicateChannelError(id);
    }
    this.channelAdapters.set(id, adapter);
  }

  listChannelAdapterIds(): string[] {
    return Array.from(this.channelAdapters.keys()).sort((left, right) => left.localeCompare(right));
  }

  onRuntimeEvent(handler: (event: GatewayRuntimeEvent) => void): () => void {
    this.runtimeEventHandlers.add(handler);
    return () => {
      this.runtimeEventHandlers.delete(handler);
    };
  }

  listRuntimeEvents(limit = 100): GatewayRuntimeEvent[] {
    if (limit <= 0) {
      return [];
    }
    return this.runtimeEvents.slice(-limit);
  }

  async start(): Promise<GatewayStatus> {
    if (this.state === "running" || this.state === "degraded") {
      return this.getStatus();
    }
    this.emitRuntimeEvent("gateway.starting", {
      channels: this.listChannelAdapterIds()
    });
    this.degradedReasons = [];

    try {
      this.bus.start();
      this.detachOutbound = this.bus.onOutbound((message) => this.routeOutbound(message));

      const backend = this.config.agent?.backend;
      if (backend) {
        this.worker = new AgentWorker({
          bus: this.bus,
          backend,
          progressEnabled: this.config.agent?.progressEnabled,
          pollIntervalMs: this.config.agent?.pollIntervalMs,
          logger: this.logger.child({ component: "agent_worker" })
        });
        this.worker.start();
      } else {
        this.degradedReasons.push("No agent backend configured");
      }

      await this.startChannels();

      try {
        await this.startHealthServer();
      } catch (error) {
        this.degradedReasons.push(`Health endpoint failed to start: ${errorToString(error)}`);
      }

      await this.config.hooks?.onStart?.();
    } catch (error) {
      this.logger.error({ error: errorToString(error) }, "gateway_start_failed");
      await this.teardown();
      throw error;
    }

    this.startedAt = nowIso();
    this.state = this.degradedReasons.length > 0 ? "degraded" : "running";
    this.emitRuntimeEvent("gateway.started", {
      state: this.state,
      startedAt: this.startedAt,
      healthUrl: this.healthUrl
    });
    if (this.degradedReasons.length > 0) {
      this.emitRuntimeEvent("gateway.degraded", {
        reasons: [...this.degradedReasons]
      });
    }
    return this.getStatus();
  }

  async stop(): Promise<void> {
    if (this.state === "stopped") {
      return;
    }
    this.emitRuntimeEvent("gateway.stopping", {
      state: this.state
    });

    await this.teardown();

    this.state = "stopped";
    this.emitRuntimeEvent("gateway.stopped", {
      state: this.state
    });
  }

  /** Releases whatever `start()` brought up; safe on a partial start. */
  private async teardown(): Promise<void> {
    await this.stopChannels();
    await this.worker?.stop();
    this.worker = null;
    this.detachOutbound?.();
    this.detachOutbound = null;
    this.bus.stop();
    await this.stopHealthServer();
    await this.config.hooks?.onShutdown?.();
  }

  private channelContext(adapter: ChannelAdapter): ChannelAdapterContext {
    return {
      publish: (message: InboundMessage) => this.bus.publishInbound(message),
      emitEvent: (type, payload) => this.emitRuntimeEvent(type, { channel: adapter.id, ...payload }),
      logger: this.logger.child({ channel: adapter.id })
    };
  }

  private async startChannels(): Promise<void> {
    for (const adapter of this.channelAdapters.values()) {
      try {
        await adapter.start(this.channelContext(adapter));
        this.startedChannels.add(adapter.id);
        this.emitRuntimeEvent("channel.started", { channel: adapter.id });
      } catch (error) {
        const message = errorToString(error);
        this.degradedReasons.push(`Channel ${adapter.id} failed to start: ${message}`);
        this.emitRuntimeEvent("channel.start_failed", { channel: adapter.id, error: message });
      }
    }
  }

  private async stopChannels(): Promise<void> {
    for (const adapter of this.channelAdapters.values()) {
      if (!this.startedChannels.has(adapter.id)) {
        continue;
      }
      this.startedChannels.delete(adapter.id);
      try {
        await adapter.stop?.();
        this.emitRuntimeEvent("channel.stopped", { channel: adapter.id });
      } catch (error) {
        this.logger.error({ channel: adapter.id, error: errorToString(error) }, "channel_stop_failed");
      }
    }
  }

  private routeOutbound(message: OutboundMessage): Promise<void> | void {
    const adapter = this.channelAdapters.get(message.channel);
    if (!adapter || !this.startedChannels.has(adapter.id)) {
      this.logger.debug({ channel: message.channel }, "outbound_unknown_channel");
      return;
    }
    return adapter.send(message);
  }

  private emitRuntimeEvent(type: GatewayRuntimeEventType, payload: Record<string, unknown>): void {
    const event: GatewayRuntimeEvent = {
      type,
      timestamp: nowIso(),
      payload
    };
    this.runtimeEvents.push(event);
    if (this.runtimeEvents.length > MAX_RUNTIME_EVENTS) {
      this.runtimeEvents.splice(0, this.runtimeEvents.length - MAX_RUNTIME_EVENTS);
    }
    for (const handler of this.runtimeEventHandlers) {
      handler(event);
    }
    this.logger.debug({ eventType: type, ...payload }, "runtime_event");
  }

  private async startHealthServer(): Promise<void> {
    if (this.healthServer) {
      return;
    }

    const enabled = this.config.health?.enabled ?? false;
    if (!enabled) {
      this.healthUrl = undefined;
      return;
    }

    const host = this.config.health?.host?.trim() || "127.0.0.1";
    const port = this.config.health?.port ?? 8787;
    const endpointPath = this.config.health?.path?.trim() || "/healthz";

    const server = http.createServer((request, response) => {
      response.setHeader("content-type", "application/json; charset=utf-8");
      if (requestPath(request) !== endpointPath) {
        response.statusCode = 404;
        response.end(JSON.stringify({ ok: false, error: "not_found" }));
        return;
      }

      const status = this.getStatus();
      const startedAtMs = status.startedAt ? Date.parse(status.startedAt) : NaN;
      const uptimeSec =
        Number.isFinite(startedAtMs) && startedAtMs > 0
          ? Math.max(0, Math.floor((Date.now() - startedAtMs) / 1000))
          : 0;

      response.statusCode = status.state === "degraded" ? 503 : 200;
      response.end(
        JSON.stringify({
          ok: status.state === "running",
          state: status.state,
          startedAt: status.startedAt,
          uptimeSec,
          degradedReasons: status.degradedReasons,
          channels: status.channels
        })
      );
    });

    const baseUrl = await listen(server, port, host);
    this.healthUrl = `${baseUrl}${endpointPath}`;
    this.healthServer = server;
  }

  private async stopHealthServer(): Promise<void> {
    const server = this.healthServer;
    this.healthServer = null;
    this.healthUrl = undefined;
    if (!server) {
      return;
    }
    await closeServer(server);
  }
}

export function createGateway(config: GatewayConfig, options: { logger?: Logger } = {}): GatewayRuntime {
  return new GatewayRuntime({ config, logger: options.logger });
}
