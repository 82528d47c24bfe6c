import type { JsonValue } from "../json.js";

/** Answers whether any client is still waiting on results for a user. */
export interface PresenceOracle {
  isListening(user: string): Promise<boolean>;
}

/** Delivers a result to every listener of a user; false when none received it. */
export interface ResultPublisher {
  publish(user: string, routingKey: string, payload: JsonValue): Promise<boolean>;
}

/** Out-of-band notices. Fire-and-forget: callers never wait on delivery. */
export interface Notifier {
  notifyUser(user: string, subject: string, body?: string): void;
  notifyAdmin(subject: string, body?: string): void;
}
