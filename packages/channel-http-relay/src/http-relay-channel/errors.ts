import { ParleyError } from "@parley/core";

/**
 * Relay failure taxonomy.
 *
 * Only RelayValidationError reaches the caller as-is (4xx body, before the
 * stream opens). The others end the request with a terminal stream event or,
 * when the caller is gone, with nothing at all.
 */
export class RelayError extends ParleyError {
  constructor(message: string) {
    super(message);
    this.name = "RelayError";
  }
}

export class RelayValidationError extends RelayError {
  readonly statusCode: number;

  constructor(message: string, statusCode = 400) {
    super(message);
    this.name = "RelayValidationError";
    this.statusCode = statusCode;
  }
}

export class PublishFailureError extends RelayError {
  constructor(correlationId: string, cause: unknown) {
    super(`Failed to publish inbound message for relay request ${correlationId}`);
    this.name = "PublishFailureError";
    this.cause = cause;
  }
}

export class TimeoutExceededError extends RelayError {
  constructor(correlationId: string, timeoutMs: number) {
    super(`No delivery for relay request ${correlationId} within ${timeoutMs}ms`);
    this.name = "TimeoutExceededError";
  }
}

export class TransportWriteFailureError extends RelayError {
  constructor(message = "Relay stream is no longer writable", cause?: unknown) {
    super(message);
    this.name = "TransportWriteFailureError";
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class DuplicateIdentifierError extends RelayError {
  constructor(correlationId: string) {
    super(`Correlation id already registered: ${correlationId}`);
    this.name = "DuplicateIdentifierError";
  }
}
