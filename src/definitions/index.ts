import { buildTaskTable, type TaskTable } from "../chains/definition.js";
import type { BackendServices } from "../services/types.js";
import { listImagesTask, listLocationsTask, listMachinesTask, listSizesTask } from "./inventory.js";
import { pingTask, probeTask } from "./probe.js";

export function buildTaskDefinitions(services: Pick<BackendServices, "inventory" | "probe">): TaskTable {
  return buildTaskTable([
    listSizesTask(services.inventory),
    listLocationsTask(services.inventory),
    listImagesTask(services.inventory),
    listMachinesTask(services.inventory),
    probeTask(services.probe),
    pingTask(services.probe),
  ]);
}
