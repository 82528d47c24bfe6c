import type { CacheStore } from "./cache/cacheStore.js";
import type { TaskTable } from "./chains/definition.js";
import { ChainRunner } from "./chains/runner.js";
import { POST_DEPLOY_TASK, PostDeploySteps } from "./deploy/postDeploy.js";
import { SSH_COMMAND_TASK, sshCommandHandler } from "./deploy/sshCommand.js";
import type { Notifier, PresenceOracle, ResultPublisher } from "./notify/types.js";
import type { BackendServices } from "./services/types.js";
import type { TaskEventSink } from "./tasks/audit.js";
import type { TaskQueue } from "./tasks/types.js";
import { HandlerRegistry } from "./tasks/workerRegistry.js";

export interface WorkerDeps {
  definitions: TaskTable;
  services: BackendServices;
  cache: CacheStore;
  queue: TaskQueue;
  presence: PresenceOracle;
  publisher: ResultPublisher;
  notifier: Notifier;
  events: TaskEventSink;
  leaseTtlMs: number;
  now?: () => number;
}

export interface Worker {
  runners: ReadonlyMap<string, ChainRunner>;
  registry: HandlerRegistry;
  jobTypes: ReadonlySet<string>;
}

/** One chain runner per task definition, plus the deployment workflows. */
export function buildWorker(deps: WorkerDeps): Worker {
  const runners = new Map<string, ChainRunner>();
  const registry = new HandlerRegistry();

  for (const definition of deps.definitions.values()) {
    const runner = new ChainRunner(definition, {
      cache: deps.cache,
      queue: deps.queue,
      presence: deps.presence,
      publisher: deps.publisher,
      events: deps.events,
      leaseTtlMs: deps.leaseTtlMs,
      now: deps.now,
    });
    runners.set(definition.name, runner);
    registry.register(definition.name, runner.handler());
  }

  const postDeploy = new PostDeploySteps({
    services: deps.services,
    queue: deps.queue,
    notifier: deps.notifier,
    events: deps.events,
    now: deps.now,
  });
  registry.register(POST_DEPLOY_TASK, postDeploy.handler());
  registry.register(SSH_COMMAND_TASK, sshCommandHandler(deps.services.shell, deps.notifier));

  return { runners, registry, jobTypes: new Set([POST_DEPLOY_TASK, SSH_COMMAND_TASK]) };
}
