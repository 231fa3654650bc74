import { defineProjectConfig } from "@parley/cli";

export default defineProjectConfig({
  log: {
    pretty: process.env.PARLEY_LOG_PRETTY === "true"
  },
  health: {
    enabled: true,
    host: "127.0.0.1",
    port: 8787,
    path: "/healthz"
  },
  agent: {
    backend: "echo",
    progressEnabled: true
  },
  httpRelay: {
    enabled: true,
    host: "127.0.0.1",
    port: 18790,
    path: "/message",
    responseTimeoutMs: 900_000
  }
});
