import type { IncomingMessage, Server } from "node:http";
import { WebSocket, WebSocketServer } from "ws";
import type { JsonValue } from "../json.js";
import type { PresenceOracle, ResultPublisher } from "./types.js";

/** The part of a socket the hub needs. */
export interface ListenerSocket {
  readyState: number;
  send(data: string): void;
}

export interface StreamMessage {
  type: string;
  ts: number;
  payload: JsonValue;
}

/**
 * Tracks every open result stream per user. Presence is "has at least one
 * open socket"; publishing fans out to all of them.
 */
export class ListenerHub implements PresenceOracle, ResultPublisher {
  private readonly listeners = new Map<string, Set<ListenerSocket>>();

  constructor(private readonly now: () => number = Date.now) {}

  add(user: string, socket: ListenerSocket): void {
    let set = this.listeners.get(user);
    if (!set) {
      set = new Set();
      this.listeners.set(user, set);
    }
    set.add(socket);
  }

  remove(user: string, socket: ListenerSocket): void {
    const set = this.listeners.get(user);
    if (!set) return;
    set.delete(socket);
    if (set.size === 0) this.listeners.delete(user);
  }

  listenerCount(user: string): number {
    return this.openSockets(user).length;
  }

  async isListening(user: string): Promise<boolean> {
    return this.openSockets(user).length > 0;
  }

  async publish(user: string, routingKey: string, payload: JsonValue): Promise<boolean> {
    const sockets = this.openSockets(user);
    if (sockets.length === 0) return false;

    const message: StreamMessage = { type: routingKey, ts: this.now(), payload };
    const data = JSON.stringify(message);
    let delivered = 0;
    for (const socket of sockets) {
      try {
        socket.send(data);
        delivered++;
      } catch (e) {
        console.warn(`[stream] send to ${user} failed: ${e instanceof Error ? e.message : String(e)}`);
      }
    }
    return delivered > 0;
  }

  private openSockets(user: string): ListenerSocket[] {
    const set = this.listeners.get(user);
    if (!set) return [];
    return [...set].filter((s) => s.readyState === WebSocket.OPEN);
  }
}

export function userFromStreamRequest(req: IncomingMessage): string | null {
  const url = new URL(req.url ?? "/", "http://localhost");
  if (url.pathname !== "/stream") return null;
  const user = (url.searchParams.get("user") ?? "").trim();
  return user || null;
}

/** Accept result streams at `/stream?user=<id>` on an existing HTTP server. */
export function attachStreamServer(server: Server, hub: ListenerHub): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  server.on("upgrade", (req, socket, head) => {
    const user = userFromStreamRequest(req);
    if (!user) {
      socket.write("HTTP/1.1 400 Bad Request\r\n\r\n");
      socket.destroy();
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      hub.add(user, ws);
      ws.on("close", () => hub.remove(user, ws));
      ws.on("error", (err) => {
        console.warn(`[stream] socket error for ${user}: ${err.message}`);
        hub.remove(user, ws);
      });
    });
  });

  return wss;
}
