import http from "node:http";
import { TransportWriteFailureError } from "./errors.js";
import type { RelayEventPayload, RelayEventType, RelayEventWriter } from "./types.js";

/** One SSE frame: event line, data line, blank separator. Non-ASCII text stays unescaped. */
export function formatRelayEvent(event: RelayEventType, payload: RelayEventPayload): string {
  return `event: ${event}\ndata: ${JSON.stringify(payload)}\n\n`;
}

/**
 * Append-only event stream over one HTTP response. Every write goes straight
 * to the socket; nothing is buffered between events.
 */
export class RelayEventStream implements RelayEventWriter {
  private readonly response: http.ServerResponse;
  private opened = false;
  private ended = false;

  constructor(response: http.ServerResponse) {
    this.response = response;
  }

  get isWritable(): boolean {
    return !this.ended && !this.response.destroyed && !this.response.writableEnded;
  }

  open(): void {
    if (this.opened) {
      return;
    }
    this.opened = true;
    this.response.statusCode = 200;
    this.response.setHeader("content-type", "text/event-stream; charset=utf-8");
    this.response.setHeader("cache-control", "no-cache");
    this.response.setHeader("connection", "keep-alive");
    this.response.setHeader("x-accel-buffering", "no");
    this.response.flushHeaders();
  }

  async write(event: RelayEventType, payload: RelayEventPayload): Promise<void> {
    if (!this.isWritable) {
      throw new TransportWriteFailureError();
    }
    const frame = formatRelayEvent(event, payload);
    await new Promise<void>((resolve, reject) => {
      this.response.write(frame, (error) => {
        if (error) {
          reject(new TransportWriteFailureError(`Relay stream write failed: ${error.message}`, error));
          return;
        }
        resolve();
      });
    });
  }

  /** Ends the response; resolves once it has been flushed or the socket is gone. */
  end(): Promise<void> {
    if (this.ended) {
      return Promise.resolve();
    }
    this.ended = true;
    const response = this.response;
    if (response.writableEnded || response.destroyed) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      const done = () => {
        response.off("close", done);
        resolve();
      };
      response.once("close", done);
      response.end(done);
    });
  }
}
