import http from "node:http";
import { ParleyError } from "../errors.js";

export const DEFAULT_JSON_BODY_MAX_BYTES = 512_000;

export class RequestBodyTooLargeError extends ParleyError {
  readonly maxBytes: number;

  constructor(maxBytes: number) {
    super(`Request body exceeds ${maxBytes} bytes`);
    this.name = "RequestBodyTooLargeError";
    this.maxBytes = maxBytes;
  }
}

export function nowIso(): string {
  return new Date().toISOString();
}

export function readRequestBody(
  request: http.IncomingMessage,
  maxBytes = DEFAULT_JSON_BODY_MAX_BYTES
): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let totalBytes = 0;
    let settled = false;

    const onData = (chunk: unknown) => {
      if (!chunk) {
        return;
      }
      const normalized = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      totalBytes += normalized.length;
      if (totalBytes > maxBytes) {
        settled = true;
        request.off("data", onData);
        // Keep reading (and discarding) so the socket stays usable for the error response.
        request.resume();
        reject(new RequestBodyTooLargeError(maxBytes));
        return;
      }
      chunks.push(normalized);
    };

    request.on("data", onData);
    request.on("error", (error) => {
      if (!settled) {
        settled = true;
        reject(error);
      }
    });
    request.on("end", () => {
      if (!settled) {
        settled = true;
        resolve(Buffer.concat(chunks).toString("utf8"));
      }
    });
  });
}

export function writeJson(
  response: http.ServerResponse,
  statusCode: number,
  payload: Record<string, unknown>
): void {
  response.statusCode = statusCode;
  response.setHeader("content-type", "application/json; charset=utf-8");
  response.end(JSON.stringify(payload));
}

export function requestPath(request: http.IncomingMessage): string {
  return (request.url ?? "").split("?")[0] ?? "";
}

export async function listen(server: http.Server, port: number, host: string): Promise<string> {
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  if (address && typeof address === "object") {
    return `http://${host}:${address.port}`;
  }
  return `http://${host}:${port}`;
}

export async function closeServer(server: http.Server): Promise<void> {
  await new Promise<void>((resolve) => {
    server.close(() => resolve());
    server.closeIdleConnections();
  });
}
