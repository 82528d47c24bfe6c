import { z } from "zod";
import { constantBackoff, exponentialBackoff } from "../chains/backoff.js";
import { defineTask, type TaskDefinition } from "../chains/definition.js";
import type { MachineProbe } from "../services/types.js";

const MINUTE_MS = 60_000;

const machineArgs = z.tuple([z.string().min(1), z.string().min(1), z.string().min(1)]);

/** SSH reachability probe. Backs off 2, 4, 8, 16, 32, 32... minutes and never gives up. */
export function probeTask(probe: MachineProbe): TaskDefinition {
  return defineTask({
    name: "probe",
    resultFreshMs: 2 * MINUTE_MS,
    resultExpiresMs: 2 * 60 * MINUTE_MS,
    polling: true,
    args: machineArgs,
    async execute(user, [backendId, machineId, host]) {
      const result = await probe.probeSsh(user, backendId, machineId, host);
      return { backendId, machineId, host, result };
    },
    backoff: exponentialBackoff(2 * MINUTE_MS, 32 * MINUTE_MS),
  });
}

export function pingTask(probe: MachineProbe): TaskDefinition {
  const resultFreshMs = 15 * MINUTE_MS;

  return defineTask({
    name: "ping",
    resultFreshMs,
    resultExpiresMs: 2 * 60 * MINUTE_MS,
    polling: true,
    args: machineArgs,
    async execute(_user, [backendId, machineId, host]) {
      const result = await probe.ping(host);
      return { backendId, machineId, host, result };
    },
    backoff: constantBackoff(resultFreshMs),
  });
}
