/**
 * Structured logger: a thin pino wrapper.
 *
 * Log format: JSON with a human-readable `level` label and ISO 8601 `time`.
 * Console rendering through pino-pretty is opt-in.
 *
 * Components take their logger when they are constructed, so loggers created
 * after `configureLogger()` pick up the configured level and destination.
 */
import pino from "pino";

export type Logger = pino.Logger;

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface LoggerSettings {
  level?: LogLevel;
  pretty?: boolean;
}

const LOG_LEVELS: ReadonlySet<string> = new Set([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent"
]);

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.has(value);
}

function createLoggerOptions(settings: Required<LoggerSettings>): pino.LoggerOptions {
  const opts: pino.LoggerOptions = {
    level: settings.level,
    base: undefined, // no pid/hostname
    timestamp: pino.stdTimeFunctions.isoTime
  };
  if (settings.pretty) {
    // pino rejects `formatters.level` together with a transport; pino-pretty labels levels itself.
    opts.transport = {
      target: "pino-pretty",
      options: { colorize: true }
    };
  } else {
    opts.formatters = {
      level(label) {
        return { level: label };
      }
    };
  }
  return opts;
}

// Bootstrap phase: config is not loaded yet, so read the environment.
function settingsFromEnv(): Required<LoggerSettings> {
  const envLevel = process.env["PARLEY_LOG_LEVEL"]?.trim().toLowerCase();
  return {
    level: isLogLevel(envLevel) ? envLevel : "info",
    pretty: process.env["PARLEY_LOG_PRETTY"] === "true"
  };
}

let activeSettings = settingsFromEnv();
let rootLogger: Logger = pino(createLoggerOptions(activeSettings));

/** Child logger tagged with a module name. */
export function getLogger(name: string): Logger {
  return rootLogger.child({ module: name });
}

/**
 * Rebuild the root logger from loaded configuration.
 * Unset fields keep their current value.
 */
export function configureLogger(settings: LoggerSettings): void {
  activeSettings = {
    level: settings.level ?? activeSettings.level,
    pretty: settings.pretty ?? activeSettings.pretty
  };
  rootLogger = pino(createLoggerOptions(activeSettings));
}

export function currentLoggerSettings(): Readonly<Required<LoggerSettings>> {
  return { ...activeSettings };
}
