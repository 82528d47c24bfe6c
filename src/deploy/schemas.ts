import { z } from "zod";

const shellAccess = {
  keyId: z.string().nullable().default(null),
  username: z.string().nullable().default(null),
  password: z.string().nullable().default(null),
  port: z.number().int().min(1).max(65535).default(22),
};

export const postDeployArgsSchema = z.tuple([
  z.object({
    backendId: z.string().min(1),
    machineId: z.string().min(1),
    command: z.string().min(1),
    monitoring: z.boolean().default(false),
    ...shellAccess,
  }),
]);

export type PostDeployArgs = z.infer<typeof postDeployArgsSchema>[0];

export const sshCommandArgsSchema = z.tuple([
  z.object({
    backendId: z.string().min(1),
    machineId: z.string().min(1),
    host: z.string().min(1),
    command: z.string().min(1),
    ...shellAccess,
  }),
]);

export type SshCommandArgs = z.infer<typeof sshCommandArgsSchema>[0];

export const retryKwargsSchema = z.object({
  retries: z.number().int().min(0).default(0),
});
