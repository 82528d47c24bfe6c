import { z } from "zod";
import { defineTask, type TaskDefinition } from "../chains/definition.js";
import type { CloudInventory } from "../services/types.js";

const HOUR_MS = 60 * 60_000;
const DAY_MS = 24 * HOUR_MS;

/** Consecutive list_machines failures tolerated before the backend is disabled. */
export const LIST_MACHINES_MAX_RETRIES = 6;

const backendArgs = z.tuple([z.string().min(1)]);

export function listSizesTask(inventory: CloudInventory): TaskDefinition {
  return defineTask({
    name: "list_sizes",
    resultFreshMs: HOUR_MS,
    resultExpiresMs: 7 * DAY_MS,
    polling: false,
    args: backendArgs,
    async execute(user, [backendId]) {
      const sizes = await inventory.listSizes(user, backendId);
      return { backendId, sizes };
    },
  });
}

export function listLocationsTask(inventory: CloudInventory): TaskDefinition {
  return defineTask({
    name: "list_locations",
    resultFreshMs: HOUR_MS,
    resultExpiresMs: 7 * DAY_MS,
    polling: false,
    args: backendArgs,
    async execute(user, [backendId]) {
      const locations = await inventory.listLocations(user, backendId);
      return { backendId, locations };
    },
  });
}

export function listImagesTask(inventory: CloudInventory): TaskDefinition {
  return defineTask({
    name: "list_images",
    resultFreshMs: HOUR_MS,
    resultExpiresMs: 7 * DAY_MS,
    polling: false,
    args: backendArgs,
    async execute(user, [backendId]) {
      const images = await inventory.listImages(user, backendId);
      return { backendId, images };
    },
  });
}

/**
 * Polls a backend's machines every 10s while the user is watching. A backend
 * that keeps failing is retried at the polling cadence, then disabled.
 */
export function listMachinesTask(inventory: CloudInventory): TaskDefinition {
  const resultFreshMs = 10_000;

  return defineTask({
    name: "list_machines",
    resultFreshMs,
    resultExpiresMs: DAY_MS,
    polling: true,
    args: backendArgs,
    async execute(user, [backendId]) {
      const machines = await inventory.listMachines(user, backendId);
      return { backendId, machines };
    },
    async backoff(failureOffsetsMs, user, [backendId]) {
      if (failureOffsetsMs.length <= LIST_MACHINES_MAX_RETRIES) return resultFreshMs;

      console.warn(
        `[chain:list_machines] disabling backend ${backendId} for ${user} after ${failureOffsetsMs.length} failures`
      );
      await inventory.disableBackend(user, backendId);
      return null;
    },
  });
}
