import type { TaskHandler } from "./types.js";

/** Static table of queue handlers, keyed by task name. */
export class HandlerRegistry {
  private readonly handlers = new Map<string, TaskHandler>();

  register(taskType: string, handler: TaskHandler): this {
    if (this.handlers.has(taskType)) throw new Error(`Handler already registered for type: ${taskType}`);
    this.handlers.set(taskType, handler);
    return this;
  }

  get(taskType: string): TaskHandler | undefined {
    return this.handlers.get(taskType);
  }

  types(): string[] {
    return [...this.handlers.keys()].sort();
  }
}
