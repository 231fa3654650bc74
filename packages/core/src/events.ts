export type AgentStreamEventType = "response.delta" | "response.completed" | "provider.error";

export interface AgentStreamEvent {
  type: AgentStreamEventType;
  sessionKey: string;
  timestamp: string;
  payload: {
    text?: string;
    error?: string;
  };
}

export type AgentStreamEventHandler = (event: AgentStreamEvent) => void;

export type GatewayRuntimeEventType =
  | "gateway.starting"
  | "gateway.started"
  | "gateway.degraded"
  | "gateway.stopping"
  | "gateway.stopped"
  | "channel.started"
  | "channel.start_failed"
  | "channel.stopped"
  | "relay.request.opened"
  | "relay.request.closed";

export interface GatewayRuntimeEvent {
  type: GatewayRuntimeEventType;
  timestamp: string;
  payload: Record<string, unknown>;
}

export type GatewayRuntimeEventEmitter = (
  type: GatewayRuntimeEventType,
  payload: Record<string, unknown>
) => void;
