import { describe, expect, it, vi } from "vitest";
import { ShellConnectionError } from "../errors.js";
import { FakeBackend, RecordingNotifier } from "../testing/fakes.js";
import type { TaskCall } from "../tasks/types.js";
import { sshCommandHandler } from "./sshCommand.js";

const call: TaskCall = {
  user: "alice",
  args: [{ backendId: "b-1", machineId: "m-1", host: "203.0.113.10", command: "uptime", username: "root" }],
  kwargs: {},
};
const ctx = { nowMs: 0, workerId: "w", taskId: "t-1" };

function setup() {
  vi.spyOn(console, "warn").mockImplementation(() => {});
  const backend = new FakeBackend();
  const notifier = new RecordingNotifier();
  return { backend, notifier, handler: sshCommandHandler(backend.services().shell, notifier) };
}

describe("sshCommandHandler", () => {
  it("stays quiet when the command succeeds", async () => {
    const { backend, notifier, handler } = setup();
    backend.shellResults.push({ exitCode: 0, output: "up 3 days" });

    await handler(call, ctx);

    expect(backend.shellCommands[0]).toEqual({
      target: {
        backendId: "b-1",
        machineId: "m-1",
        host: "203.0.113.10",
        keyId: null,
        username: "root",
        password: null,
        port: 22,
      },
      command: "uptime",
    });
    expect(notifier.user).toEqual([]);
  });

  it("sends the output of a failed command to the user", async () => {
    const { backend, notifier, handler } = setup();
    backend.shellResults.push({ exitCode: 127, output: "uptime: not found" });

    await handler(call, ctx);

    expect(notifier.user).toEqual([
      { user: "alice", subject: "Async command failed for machine m-1 (203.0.113.10)", body: "uptime: not found" },
    ]);
  });

  it("reports connection errors the same way", async () => {
    const { backend, notifier, handler } = setup();
    backend.shellResults.push(new ShellConnectionError("cannot connect to 203.0.113.10: timed out"));

    await handler(call, ctx);

    expect(notifier.user[0]?.body).toBe("cannot connect to 203.0.113.10: timed out");
  });
});
