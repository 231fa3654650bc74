import fs from "node:fs";
import path from "node:path";
import {
  ConfigError,
  createEchoBackend,
  isRecord,
  type AgentBackend,
  type ChannelAdapter,
  type GatewayConfig
} from "@parley/core";
import {
  DEFAULT_HOST,
  DEFAULT_MAX_BODY_BYTES,
  DEFAULT_MESSAGE_PATH,
  DEFAULT_PORT,
  DEFAULT_RESPONSE_TIMEOUT_MS,
  createHttpRelayChannel
} from "@parley/channel-http-relay";
import { parse as parseDotEnv } from "dotenv";
import { z } from "zod";
import { importConfigModule, unwrapModuleDefault } from "./module-loader.js";

const CONFIG_CANDIDATES = [
  "parley.config.ts",
  "parley.config.mts",
  "parley.config.js",
  "parley.config.mjs",
  "parley.config.json"
];

const ENV_FILES = [".env", ".env.local"];

const portSchema = z.number().int().min(0).max(65535);
const endpointPathSchema = z.string().startsWith("/");

const logConfigSchema = z
  .object({
    level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
    pretty: z.boolean().optional()
  })
  .strict();

const healthConfigSchema = z
  .object({
    enabled: z.boolean().default(false),
    host: z.string().min(1).default("127.0.0.1"),
    port: portSchema.default(8787),
    path: endpointPathSchema.default("/healthz")
  })
  .strict();

const agentConfigSchema = z
  .object({
    backend: z.literal("echo").default("echo"),
    progressEnabled: z.boolean().default(true),
    pollIntervalMs: z.number().int().positive().optional()
  })
  .strict();

const httpRelayConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    host: z.string().min(1).default(DEFAULT_HOST),
    port: portSchema.default(DEFAULT_PORT),
    path: endpointPathSchema.default(DEFAULT_MESSAGE_PATH),
    responseTimeoutMs: z.number().int().positive().default(DEFAULT_RESPONSE_TIMEOUT_MS),
    maxBodyBytes: z.number().int().positive().default(DEFAULT_MAX_BODY_BYTES)
  })
  .strict();

export const projectConfigSchema = z
  .object({
    log: logConfigSchema.default({}),
    health: healthConfigSchema.default({}),
    agent: agentConfigSchema.default({}),
    httpRelay: httpRelayConfigSchema.default({})
  })
  .strict();

/** Shape accepted in `parley.config.*`. */
export type ProjectConfig = z.input<typeof projectConfigSchema>;
export type ResolvedProjectConfig = z.output<typeof projectConfigSchema>;

export function defineProjectConfig(config: ProjectConfig): ProjectConfig {
  return config;
}

export interface LoadedCliConfig {
  projectRoot: string;
  configPath: string | null;
  projectConfig: ResolvedProjectConfig;
  gatewayConfig: GatewayConfig;
}

function isFile(filePath: string): boolean {
  return fs.existsSync(filePath) && fs.statSync(filePath).isFile();
}

export function loadProjectEnvFiles(projectRoot: string, env: NodeJS.ProcessEnv = process.env): void {
  // Keep explicit shell/CI env vars authoritative over local files.
  const shellDefined = new Set(Object.keys(env));
  const merged: Record<string, string> = {};
  for (const candidate of ENV_FILES) {
    const filePath = path.join(projectRoot, candidate);
    if (!isFile(filePath)) {
      continue;
    }
    Object.assign(merged, parseDotEnv(fs.readFileSync(filePath, "utf8")));
  }

  for (const [key, value] of Object.entries(merged)) {
    if (shellDefined.has(key)) {
      continue;
    }
    env[key] = value;
  }
}

export function findConfigFile(projectRoot: string): string | null {
  for (const candidate of CONFIG_CANDIDATES) {
    const absolute = path.join(projectRoot, candidate);
    if (isFile(absolute)) {
      return absolute;
    }
  }
  return null;
}

async function readConfigFile(configPath: string): Promise<unknown> {
  if (configPath.endsWith(".json")) {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(configPath, "utf8"));
      return parsed;
    } catch (error) {
      throw new ConfigError(
        `Invalid JSON in ${configPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  const loaded = await importConfigModule(configPath);
  if (isRecord(loaded)) {
    return unwrapModuleDefault(loaded.config ?? loaded.default ?? loaded);
  }
  return unwrapModuleDefault(loaded);
}

function sectionOf(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const section = raw[key];
  return isRecord(section) ? { ...section } : {};
}

function applyEnvOverrides(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const next = { ...raw };

  const relayHost = env.PARLEY_HTTP_RELAY_HOST?.trim();
  const relayPort = env.PARLEY_HTTP_RELAY_PORT?.trim();
  if (relayHost || relayPort) {
    const httpRelay = sectionOf(raw, "httpRelay");
    if (relayHost) {
      httpRelay.host = relayHost;
    }
    if (relayPort) {
      httpRelay.port = Number(relayPort);
    }
    next.httpRelay = httpRelay;
  }

  const logLevel = env.PARLEY_LOG_LEVEL?.trim().toLowerCase();
  if (logLevel) {
    const log = sectionOf(raw, "log");
    log.level = logLevel;
    next.log = log;
  }

  return next;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export function resolveProjectConfig(
  raw: unknown,
  options: { source?: string; env?: NodeJS.ProcessEnv } = {}
): ResolvedProjectConfig {
  const source = options.source ?? "config";
  let fileConfig: Record<string, unknown>;
  if (raw === undefined) {
    fileConfig = {};
  } else if (isRecord(raw)) {
    fileConfig = raw;
  } else {
    throw new ConfigError(`Invalid config export from ${source}: expected an object`);
  }
  const withEnv = applyEnvOverrides(fileConfig, options.env ?? process.env);
  const result = projectConfigSchema.safeParse(withEnv);
  if (!result.success) {
    throw new ConfigError(`Invalid config in ${source}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function createAgentBackend(config: ResolvedProjectConfig["agent"]): AgentBackend {
  if (config.backend === "echo") {
    return createEchoBackend();
  }
  throw new ConfigError(`Unsupported agent backend: ${String(config.backend)}`);
}

export function buildGatewayConfig(project: ResolvedProjectConfig): GatewayConfig {
  const channels: ChannelAdapter[] = [];
  if (project.httpRelay.enabled) {
    channels.push(
      createHttpRelayChannel({
        host: project.httpRelay.host,
        port: project.httpRelay.port,
        path: project.httpRelay.path,
        responseTimeoutMs: project.httpRelay.responseTimeoutMs,
        maxBodyBytes: project.httpRelay.maxBodyBytes
      })
    );
  }

  return {
    channels,
    agent: {
      backend: createAgentBackend(project.agent),
      progressEnabled: project.agent.progressEnabled,
      pollIntervalMs: project.agent.pollIntervalMs
    },
    health: project.health,
    log: project.log
  };
}

export async function loadCliConfig(
  projectRoot = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): Promise<LoadedCliConfig> {
  const resolvedRoot = path.resolve(projectRoot);
  loadProjectEnvFiles(resolvedRoot, env);

  const configPath = findConfigFile(resolvedRoot);
  const raw = configPath ? await readConfigFile(configPath) : {};
  const projectConfig = resolveProjectConfig(raw, {
    source: configPath ?? "defaults",
    env
  });

  return {
    projectRoot: resolvedRoot,
    configPath,
    projectConfig,
    gatewayConfig: buildGatewayConfig(projectConfig)
  };
}
