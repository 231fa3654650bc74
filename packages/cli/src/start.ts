import type { EventEmitter } from "node:events";
import {
  createGateway,
  errorToString,
  getLogger,
  type GatewayRuntime,
  type GatewayStatus
} from "@parley/core";
import type { LoadedCliConfig } from "./config.js";

export const SHUTDOWN_SIGNALS = ["SIGINT", "SIGTERM"] as const;
export type ShutdownSignal = (typeof SHUTDOWN_SIGNALS)[number];

export interface RunStartOptions {
  /** Source of shutdown signals. Defaults to `process`. */
  signals?: EventEmitter;
  onStarted?: (gateway: GatewayRuntime, status: GatewayStatus) => void;
}

export function waitForShutdownSignal(target: EventEmitter): Promise<ShutdownSignal> {
  return new Promise((resolve) => {
    const handlers = new Map<ShutdownSignal, () => void>();
    const detach = () => {
      for (const [name, handler] of handlers) {
        target.off(name, handler);
      }
    };
    for (const signal of SHUTDOWN_SIGNALS) {
      const handler = () => {
        detach();
        resolve(signal);
      };
      handlers.set(signal, handler);
      target.once(signal, handler);
    }
  });
}

export async function runStart(loaded: LoadedCliConfig, options: RunStartOptions = {}): Promise<number> {
  const gateway = createGateway(loaded.gatewayConfig);
  const logger = getLogger("cli");

  let status: GatewayStatus;
  try {
    status = await gateway.start();
  } catch (error) {
    logger.error({ error: errorToString(error) }, "gateway_start_failed");
    await gateway.stop();
    return 1;
  }

  logger.info(
    {
      state: status.state,
      channels: status.channels,
      degradedReasons: status.degradedReasons,
      healthUrl: status.healthUrl,
      configPath: loaded.configPath
    },
    "gateway_ready"
  );
  const shutdown = waitForShutdownSignal(options.signals ?? process);
  options.onStarted?.(gateway, status);

  const signal = await shutdown;
  logger.info({ signal }, "gateway_shutdown_requested");
  await gateway.stop();
  return 0;
}
