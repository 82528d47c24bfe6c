import { errorMessage } from "../errors.js";
import type { Notifier } from "../notify/types.js";
import type { RemoteShell, ShellTarget } from "../services/types.js";
import type { TaskHandler } from "../tasks/types.js";
import { parseTaskArgs } from "./postDeploy.js";
import { sshCommandArgsSchema } from "./schemas.js";

export const SSH_COMMAND_TASK = "ssh_command";

/** Fire-and-forget command on a machine; the user hears about failures only. */
export function sshCommandHandler(shell: RemoteShell, notifier: Notifier): TaskHandler {
  return async (call) => {
    const [args] = parseTaskArgs(SSH_COMMAND_TASK, sshCommandArgsSchema, call.args);
    const subject = `Async command failed for machine ${args.machineId} (${args.host})`;

    let output: string;
    try {
      const target: ShellTarget = {
        backendId: args.backendId,
        machineId: args.machineId,
        host: args.host,
        keyId: args.keyId,
        username: args.username,
        password: args.password,
        port: args.port,
      };
      const result = await shell.run(call.user, target, args.command);
      if (result.exitCode === 0) return;
      output = result.output;
    } catch (e) {
      output = errorMessage(e);
    }

    console.warn(`[deploy] ${subject} user=${call.user}`);
    notifier.notifyUser(call.user, subject, output);
  };
}
