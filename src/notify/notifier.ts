import type { TaskEventSink } from "../tasks/audit.js";
import type { Notifier, ResultPublisher } from "./types.js";

export const NOTIFY_ROUTING_KEY = "notify";

/**
 * User notices go out on the user's result streams; admin notices land in
 * the audit log and the process log.
 */
export class HubNotifier implements Notifier {
  constructor(
    private readonly publisher: ResultPublisher,
    private readonly events: TaskEventSink
  ) {}

  notifyUser(user: string, subject: string, body = ""): void {
    this.publisher.publish(user, NOTIFY_ROUTING_KEY, { subject, body }).then(
      (delivered) => {
        if (!delivered) console.log(`[notify] no open stream for ${user}: ${subject}`);
      },
      (err: unknown) => {
        console.error(`[notify] delivery to ${user} failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    );
  }

  notifyAdmin(subject: string, body = ""): void {
    console.warn(`[notify] admin: ${subject}`);
    this.events({ type: "ADMIN_NOTICE", subject, body });
  }
}
