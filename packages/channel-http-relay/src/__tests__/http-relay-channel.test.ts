import { afterEach, describe, expect, it } from "vitest";
import {
  getLogger,
  type ChannelAdapterContext,
  type GatewayRuntimeEvent,
  type InboundMessage,
  type OutboundMessage
} from "@parley/core";
import {
  HttpRelayChannelAdapter,
  MISSING_FIELDS_ERROR,
  PUBLISH_FAILURE_NOTICE,
  SHUTDOWN_NOTICE,
  TIMEOUT_NOTICE,
  resolveCorrelationId,
  type HttpRelayChannelOptions
} from "../index.js";

interface RelayFrame {
  event: string;
  data: unknown;
}

interface RelayHarness {
  adapter: HttpRelayChannelAdapter;
  url: string;
  published: InboundMessage[];
  events: Array<Pick<GatewayRuntimeEvent, "type" | "payload">>;
}

const activeAdapters: HttpRelayChannelAdapter[] = [];

afterEach(async () => {
  while (activeAdapters.length > 0) {
    const next = activeAdapters.pop();
    if (!next) {
      continue;
    }
    await next.stop();
  }
});

async function waitFor(condition: () => boolean, timeoutMs = 1000): Promise<void> {
  const started = Date.now();
  while (Date.now() - started < timeoutMs) {
    if (condition()) {
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
  throw new Error("Timed out waiting for condition");
}

async function startRelay(
  options: HttpRelayChannelOptions = {},
  publish?: (message: InboundMessage) => Promise<void> | void
): Promise<RelayHarness> {
  const adapter = new HttpRelayChannelAdapter({ host: "127.0.0.1", port: 0, ...options });
  activeAdapters.push(adapter);
  const published: InboundMessage[] = [];
  const events: RelayHarness["events"] = [];
  const context: ChannelAdapterContext = {
    publish: (message) => {
      published.push(message);
      return publish?.(message);
    },
    emitEvent: (type, payload) => {
      events.push({ type, payload });
    },
    logger: getLogger("http-relay-test")
  };
  await adapter.start(context);
  if (!adapter.url) {
    throw new Error("relay did not start listening");
  }
  return { adapter, url: adapter.url, published, events };
}

function post(url: string, body: unknown, init: RequestInit = {}): Promise<Response> {
  return fetch(url, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
    ...init
  });
}

async function readFrames(response: Response): Promise<RelayFrame[]> {
  const text = await response.text();
  return text
    .split("\n\n")
    .filter((block) => block.length > 0)
    .map((block) => {
      const [eventLine = "", dataLine = ""] = block.split("\n");
      return {
        event: eventLine.slice("event: ".length),
        data: JSON.parse(dataLine.slice("data: ".length))
      };
    });
}

function reply(requestId: string, content: string, isProgress: boolean): OutboundMessage {
  return {
    channel: "http_relay",
    chatId: "c1",
    content,
    metadata: {
      http_relay: { request_id: requestId },
      progress: { is_progress: isProgress }
    }
  };
}

function requestIdOf(message: InboundMessage | undefined): string {
  const requestId = message ? resolveCorrelationId(message.metadata) : undefined;
  if (!requestId) {
    throw new Error("inbound message carries no request id");
  }
  return requestId;
}

const validBody = { sender_id: "u1", chat_id: "c1", content: "hi", metadata: { trace: "t-1" } };

describe("http relay channel", () => {
  it("streams progress then the final response and clears the pending request", async () => {
    const { adapter, url, published, events } = await startRelay();

    const response = await post(url, validBody);
    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("text/event-stream; charset=utf-8");
    expect(response.headers.get("cache-control")).toBe("no-cache");
    expect(response.headers.get("x-accel-buffering")).toBe("no");

    await waitFor(() => published.length === 1);
    const requestId = requestIdOf(published[0]);
    expect(requestId).toMatch(/^[0-9a-f]{32}$/);
    expect(adapter.pendingIds()).toEqual([requestId]);
    expect(published[0]).toMatchObject({
      channel: "http_relay",
      senderId: "u1",
      chatId: "c1",
      content: "hi",
      media: [],
      metadata: { trace: "t-1", http_relay: { request_id: requestId } }
    });

    adapter.send({
      channel: "http_relay",
      chatId: "c1",
      content: "thinking...",
      metadata: { progress: { is_progress: true, request_id: requestId } }
    });
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(adapter.hasPending(requestId)).toBe(true);
    adapter.send({
      channel: "http_relay",
      chatId: "c1",
      content: "hello back",
      metadata: { progress: { is_progress: false, request_id: requestId } }
    });

    expect(await readFrames(response)).toEqual([
      { event: "progress", data: { content: "thinking..." } },
      { event: "response", data: { content: "hello back" } }
    ]);
    expect(adapter.pendingCount).toBe(0);
    await waitFor(() => events.length === 2);
    expect(events.map((event) => event.type)).toEqual(["relay.request.opened", "relay.request.closed"]);
    expect(events[1]?.payload).toMatchObject({ requestId, outcome: "response" });
  });

  it("accepts camelCase fields and keeps caller relay metadata", async () => {
    const { adapter, url, published } = await startRelay({ mintCorrelationId: () => "req-fixed" });

    const response = await post(url, {
      senderId: "u2",
      chatId: "c2",
      content: "héllo",
      metadata: { http_relay: { source: "cli" } }
    });
    await waitFor(() => published.length === 1);
    expect(published[0]?.metadata).toEqual({ http_relay: { source: "cli", request_id: "req-fixed" } });

    adapter.send(reply("req-fixed", "réponse ✓", false));
    expect(await readFrames(response)).toEqual([{ event: "response", data: { content: "réponse ✓" } }]);
  });

  it("rejects missing fields before registering anything", async () => {
    const { adapter, url, published } = await startRelay();

    const response = await post(url, { sender_id: "u1", chat_id: "c1" });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: MISSING_FIELDS_ERROR });
    expect(published).toEqual([]);
    expect(adapter.pendingCount).toBe(0);
  });

  it("rejects malformed JSON and non-object payloads", async () => {
    const { url } = await startRelay();

    const malformed = await post(url, "{oops");
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toEqual({ error: "Invalid JSON body" });

    const list = await post(url, "[1]");
    expect(list.status).toBe(400);
    expect(await list.json()).toEqual({ error: "Payload must be an object" });
  });

  it("rejects oversized bodies", async () => {
    const { url } = await startRelay({ maxBodyBytes: 16 });

    const response = await post(url, { ...validBody, content: "x".repeat(64) });

    expect(response.status).toBe(413);
    expect(await response.json()).toEqual({ error: "Request body exceeds 16 bytes" });
  });

  it("answers 404 for other paths and 405 for other methods", async () => {
    const { url } = await startRelay();

    const missing = await fetch(url.replace("/message", "/other"), { method: "POST", body: "{}" });
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: "not_found" });

    const wrongMethod = await fetch(url);
    expect(wrongMethod.status).toBe(405);
    expect(wrongMethod.headers.get("allow")).toBe("POST");
    expect(await wrongMethod.json()).toEqual({ error: "method_not_allowed" });
  });

  it("emits the timeout notice when no reply arrives in time", async () => {
    const { adapter, url, events } = await startRelay({ responseTimeoutMs: 50 });

    const response = await post(url, validBody);

    expect(await readFrames(response)).toEqual([{ event: "response", data: { content: TIMEOUT_NOTICE } }]);
    expect(adapter.pendingCount).toBe(0);
    await waitFor(() => events.length === 2);
    expect(events[1]?.payload).toMatchObject({ outcome: "timeout" });
  });

  it("emits the failure notice when publishing throws", async () => {
    const { adapter, url, events } = await startRelay({}, () => {
      throw new Error("bus closed");
    });

    const response = await post(url, validBody);

    expect(await readFrames(response)).toEqual([{ event: "response", data: { content: PUBLISH_FAILURE_NOTICE } }]);
    expect(adapter.pendingCount).toBe(0);
    await waitFor(() => events.length === 2);
    expect(events[1]?.payload).toMatchObject({ outcome: "publish_failed" });
  });

  it("emits the failure notice when publishing rejects", async () => {
    const { adapter, url } = await startRelay({}, async () => {
      throw new Error("bus closed");
    });

    const response = await post(url, validBody);

    expect(await readFrames(response)).toEqual([{ event: "response", data: { content: PUBLISH_FAILURE_NOTICE } }]);
    expect(adapter.pendingCount).toBe(0);
  });

  it("drops outbound messages without a pending request", async () => {
    const { adapter, url, published } = await startRelay({ mintCorrelationId: () => "req-live" });
    const response = await post(url, validBody);
    await waitFor(() => published.length === 1);

    adapter.send(reply("req-unknown", "stray", false));
    adapter.send({ channel: "http_relay", chatId: "c1", content: "no id", metadata: {} });
    adapter.send({ channel: "http_relay", chatId: "c1", content: "bad id", metadata: { http_relay: { request_id: 5 } } });
    expect(adapter.hasPending("req-live")).toBe(true);

    adapter.send(reply("req-live", "mine", false));
    expect(await readFrames(response)).toEqual([{ event: "response", data: { content: "mine" } }]);
  });

  it("routes by progress.request_id ahead of http_relay.request_id", async () => {
    const { adapter, url, published } = await startRelay({ mintCorrelationId: () => "req-progress" });
    const response = await post(url, validBody);
    await waitFor(() => published.length === 1);

    adapter.send({
      channel: "http_relay",
      chatId: "c1",
      content: "via progress",
      metadata: {
        progress: { request_id: "req-progress", is_progress: false },
        http_relay: { request_id: "req-elsewhere" }
      }
    });

    expect(await readFrames(response)).toEqual([{ event: "response", data: { content: "via progress" } }]);
  });

  it("keeps concurrent requests isolated", async () => {
    const ids = ["req-a", "req-b"];
    const { adapter, url, published } = await startRelay({
      mintCorrelationId: () => ids.shift() ?? "req-extra"
    });

    const first = await post(url, { ...validBody, content: "first" });
    await waitFor(() => published.length === 1);
    const second = await post(url, { ...validBody, content: "second" });
    await waitFor(() => published.length === 2);
    expect(adapter.pendingIds().sort()).toEqual(["req-a", "req-b"]);

    adapter.send(reply("req-b", "for b (progress)", true));
    adapter.send(reply("req-a", "for a", false));
    adapter.send(reply("req-b", "for b", false));

    expect(await readFrames(first)).toEqual([{ event: "response", data: { content: "for a" } }]);
    expect(await readFrames(second)).toEqual([
      { event: "progress", data: { content: "for b (progress)" } },
      { event: "response", data: { content: "for b" } }
    ]);
    expect(adapter.pendingCount).toBe(0);
  });

  it("fails a request whose minted id is already pending", async () => {
    const { adapter, url, published } = await startRelay({ mintCorrelationId: () => "req-same" });
    const first = await post(url, validBody);
    await waitFor(() => published.length === 1);

    const second = await post(url, validBody);
    expect(second.status).toBe(500);
    expect(await second.json()).toEqual({ error: "Internal relay error" });
    expect(published).toHaveLength(1);
    expect(adapter.hasPending("req-same")).toBe(true);

    adapter.send(reply("req-same", "still fine", false));
    expect(await readFrames(first)).toEqual([{ event: "response", data: { content: "still fine" } }]);
  });

  it("cleans up when the client disconnects", async () => {
    const { adapter, url, published, events } = await startRelay({ mintCorrelationId: () => "req-gone" });
    const controller = new AbortController();
    await post(url, validBody, { signal: controller.signal });
    await waitFor(() => published.length === 1);

    controller.abort();

    await waitFor(() => adapter.pendingCount === 0);
    await waitFor(() => events.length === 2);
    expect(events[1]?.payload).toMatchObject({ requestId: "req-gone", outcome: "transport_error" });
    adapter.send(reply("req-gone", "too late", false));
    expect(adapter.hasPending("req-gone")).toBe(false);
  });

  it("ends open streams with the shutdown notice on stop", async () => {
    const { adapter, url, published } = await startRelay();
    const response = await post(url, validBody);
    await waitFor(() => published.length === 1);

    const frames = readFrames(response);
    await adapter.stop();

    expect(await frames).toEqual([{ event: "response", data: { content: SHUTDOWN_NOTICE } }]);
    expect(adapter.pendingCount).toBe(0);
    expect(adapter.isAccepting).toBe(false);
    expect(adapter.url).toBeUndefined();
  });

  it("discards replies still queued when stop begins", async () => {
    let releasePublish: () => void = () => undefined;
    const { adapter, url, published, events } = await startRelay(
      { mintCorrelationId: () => "req-queued" },
      () =>
        new Promise<void>((resolve) => {
          releasePublish = resolve;
        })
    );
    const response = await post(url, validBody);
    await waitFor(() => published.length === 1);
    adapter.send(reply("req-queued", "queued answer", false));
    expect(adapter.hasPending("req-queued")).toBe(true);

    const frames = readFrames(response);
    const stopping = adapter.stop();
    releasePublish();
    await stopping;

    expect(await frames).toEqual([{ event: "response", data: { content: SHUTDOWN_NOTICE } }]);
    expect(events.at(-1)).toMatchObject({
      type: "relay.request.closed",
      payload: { requestId: "req-queued", outcome: "cancelled" }
    });
  });

  it("starts once and stops safely without a start", async () => {
    const { adapter, url } = await startRelay();
    await adapter.start({
      publish: () => undefined,
      emitEvent: () => undefined,
      logger: getLogger("http-relay-test")
    });
    expect(adapter.url).toBe(url);

    const idle = new HttpRelayChannelAdapter({ port: 0 });
    await idle.stop();
    expect(idle.isAccepting).toBe(false);
  });
});
