import { z } from "zod";
import { jsonObjectSchema, jsonValueSchema, type JsonValue } from "../json.js";

export const machineSchema = z.object({
  id: z.string(),
  name: z.string(),
  state: z.string(),
  publicIps: z.array(z.string()).default([]),
  privateIps: z.array(z.string()).default([]),
  extra: jsonObjectSchema.default({}),
});

export type Machine = z.infer<typeof machineSchema>;

export const listingSchema = z.array(jsonValueSchema);

export const shellResultSchema = z.object({
  exitCode: z.number().int(),
  output: z.string(),
});

export type ShellResult = z.infer<typeof shellResultSchema>;

export const monitoringEnrolmentSchema = z.object({
  command: z.string(),
});

export interface ShellTarget {
  backendId: string;
  machineId: string;
  host: string;
  keyId: string | null;
  username: string | null;
  password: string | null;
  port: number;
}

/** Provider inventory for one user's backends. */
export interface CloudInventory {
  listSizes(user: string, backendId: string): Promise<JsonValue[]>;
  listLocations(user: string, backendId: string): Promise<JsonValue[]>;
  listImages(user: string, backendId: string): Promise<JsonValue[]>;
  listMachines(user: string, backendId: string): Promise<Machine[]>;
  /** Stop using a backend that keeps failing. */
  disableBackend(user: string, backendId: string): Promise<void>;
}

export interface MachineProbe {
  probeSsh(user: string, backendId: string, machineId: string, host: string): Promise<JsonValue>;
  ping(host: string): Promise<JsonValue>;
}

export interface RemoteShell {
  run(user: string, target: ShellTarget, command: string): Promise<ShellResult>;
}

export interface MonitoringService {
  /** Returns the command that installs the monitoring agent on the machine. */
  enable(user: string, backendId: string, machine: Machine, publicIps: string[]): Promise<{ command: string }>;
}

export interface BackendServices {
  inventory: CloudInventory;
  probe: MachineProbe;
  shell: RemoteShell;
  monitoring: MonitoringService;
}
