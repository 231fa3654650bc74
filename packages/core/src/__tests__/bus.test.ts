import { describe, expect, it } from "vitest";
import { BusClosedError, MessageBus, type InboundMessage, type OutboundMessage } from "../index.js";

function inbound(content: string): InboundMessage {
  return {
    channel: "test",
    senderId: "u1",
    chatId: "c1",
    content,
    metadata: {},
    receivedAt: new Date().toISOString()
  };
}

function outbound(content: string): OutboundMessage {
  return {
    channel: "test",
    chatId: "c1",
    content,
    metadata: {}
  };
}

describe("MessageBus", () => {
  it("rejects inbound messages while stopped", () => {
    const bus = new MessageBus();
    expect(() => bus.publishInbound(inbound("hi"))).toThrow(BusClosedError);
  });

  it("queues inbound messages in order", async () => {
    const bus = new MessageBus();
    bus.start();
    bus.publishInbound(inbound("first"));
    bus.publishInbound(inbound("second"));

    const first = await bus.consumeInbound({ timeoutMs: 100 });
    const second = await bus.consumeInbound({ timeoutMs: 100 });
    expect(first.kind === "item" ? first.value.content : null).toBe("first");
    expect(second.kind === "item" ? second.value.content : null).toBe("second");
    bus.stop();
  });

  it("drops queued inbound messages on stop", async () => {
    const bus = new MessageBus();
    bus.start();
    bus.publishInbound(inbound("lost"));
    expect(bus.pendingInbound).toBe(1);

    bus.stop();

    expect(bus.pendingInbound).toBe(0);
    expect(bus.isRunning).toBe(false);
    expect(await bus.consumeInbound({ timeoutMs: 5 })).toEqual({ kind: "timeout" });
  });

  it("fans outbound messages out to every subscriber and isolates failures", async () => {
    const bus = new MessageBus();
    const seen: string[] = [];
    bus.onOutbound(() => {
      throw new Error("sync failure");
    });
    bus.onOutbound(async () => {
      throw new Error("async failure");
    });
    const unsubscribe = bus.onOutbound((message) => {
      seen.push(message.content);
    });

    bus.publishOutbound(outbound("one"));
    unsubscribe();
    bus.publishOutbound(outbound("two"));
    await new Promise((resolve) => setImmediate(resolve));

    expect(seen).toEqual(["one"]);
  });
});
