/**
 * Error hierarchy for Parley.
 *
 * ParleyError (base)
 * ├── ConfigError
 * ├── BusClosedError
 * └── ChannelError
 *     └── DuplicateChannelError
 */

export class ParleyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ParleyError";
  }
}

export class ConfigError extends ParleyError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class BusClosedError extends ParleyError {
  constructor(message = "Message bus is not running") {
    super(message);
    this.name = "BusClosedError";
  }
}

// ── Channels ─────────────────────────────────────

export class ChannelError extends ParleyError {
  constructor(message: string) {
    super(message);
    this.name = "ChannelError";
  }
}

export class DuplicateChannelError extends ChannelError {
  constructor(channelId: string) {
    super(`Channel adapter already registered: ${channelId}`);
    this.name = "DuplicateChannelError";
  }
}

/**
 * Extract a loggable string from an unknown caught value.
 *
 * pino serializes log fields as JSON, and an Error's `message` is not
 * enumerable, so `logger.warn({ error: err })` would log `{}`.
 */
export function errorToString(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
