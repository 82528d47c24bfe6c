import { IncomingMessage } from "node:http";
import { Socket } from "node:net";
import { describe, expect, it, vi } from "vitest";
import { WebSocket } from "ws";
import { collectEvents } from "../testing/fakes.js";
import { ListenerHub, userFromStreamRequest, type ListenerSocket } from "./hub.js";
import { HubNotifier, NOTIFY_ROUTING_KEY } from "./notifier.js";

function socket(readyState: number = WebSocket.OPEN) {
  const sent: string[] = [];
  const s: ListenerSocket = {
    readyState,
    send: (data) => {
      sent.push(data);
    },
  };
  return { s, sent };
}

function request(url: string): IncomingMessage {
  const req = new IncomingMessage(new Socket());
  req.url = url;
  return req;
}

describe("ListenerHub", () => {
  it("counts only open sockets as listening", async () => {
    const hub = new ListenerHub();
    const closing = socket(WebSocket.CLOSING);
    hub.add("alice", closing.s);

    await expect(hub.isListening("alice")).resolves.toBe(false);

    const open = socket();
    hub.add("alice", open.s);
    expect(hub.listenerCount("alice")).toBe(1);
    await expect(hub.isListening("alice")).resolves.toBe(true);

    hub.remove("alice", open.s);
    await expect(hub.isListening("alice")).resolves.toBe(false);
  });

  it("fans a message out to every open socket of the user", async () => {
    const hub = new ListenerHub(() => 1234);
    const a = socket();
    const b = socket();
    const other = socket();
    hub.add("alice", a.s);
    hub.add("alice", b.s);
    hub.add("bob", other.s);

    await expect(hub.publish("alice", "ping", { ok: true })).resolves.toBe(true);

    const expected = '{"type":"ping","ts":1234,"payload":{"ok":true}}';
    expect(a.sent).toEqual([expected]);
    expect(b.sent).toEqual([expected]);
    expect(other.sent).toEqual([]);
  });

  it("reports undelivered when no socket accepts the message", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const hub = new ListenerHub();
    await expect(hub.publish("alice", "ping", null)).resolves.toBe(false);

    hub.add("alice", {
      readyState: WebSocket.OPEN,
      send: () => {
        throw new Error("socket hung up");
      },
    });
    await expect(hub.publish("alice", "ping", null)).resolves.toBe(false);
    expect(console.warn).toHaveBeenCalledWith("[stream] send to alice failed: socket hung up");
  });
});

describe("userFromStreamRequest", () => {
  it("reads the user from the stream path", () => {
    expect(userFromStreamRequest(request("/stream?user=alice"))).toBe("alice");
    expect(userFromStreamRequest(request("/stream?user=%20%20"))).toBeNull();
    expect(userFromStreamRequest(request("/other?user=alice"))).toBeNull();
  });
});

describe("HubNotifier", () => {
  it("publishes user notices on the notify routing key", async () => {
    const hub = new ListenerHub(() => 1);
    const s = socket();
    hub.add("alice", s.s);
    const { sink } = collectEvents();

    new HubNotifier(hub, sink).notifyUser("alice", "Deployed", "all good");
    await vi.waitFor(() => expect(s.sent).toHaveLength(1));

    expect(JSON.parse(s.sent[0] ?? "null")).toEqual({
      type: NOTIFY_ROUTING_KEY,
      ts: 1,
      payload: { subject: "Deployed", body: "all good" },
    });
  });

  it("records admin notices in the audit log", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const { events, sink } = collectEvents();

    new HubNotifier(new ListenerHub(), sink).notifyAdmin("Backend disabled", "b-1");

    expect(events).toEqual([{ type: "ADMIN_NOTICE", subject: "Backend disabled", body: "b-1" }]);
  });
});
