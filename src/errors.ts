/**
 * Error classes shared by the queue, the chain runner and the deployment
 * workflows.
 *
 * Transient errors are the only ones the bounded-retry workflows retry;
 * chain tasks treat every domain error alike and leave the decision to the
 * task's backoff policy.
 */

export class ServiceUnavailableError extends Error {
  readonly transient = true;

  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = "ServiceUnavailableError";
  }
}

export class ShellConnectionError extends Error {
  readonly transient = true;

  constructor(message: string, readonly host?: string) {
    super(message);
    this.name = "ShellConnectionError";
  }
}

export class InvalidTaskPayloadError extends Error {
  constructor(readonly taskType: string, detail: string) {
    super(`Invalid payload for task ${taskType}: ${detail}`);
    this.name = "InvalidTaskPayloadError";
  }
}

export class UnknownTaskError extends Error {
  constructor(readonly taskType: string) {
    super(`No handler registered for type=${taskType}`);
    this.name = "UnknownTaskError";
  }
}

export function isTransientError(err: unknown): boolean {
  return err instanceof ServiceUnavailableError || err instanceof ShellConnectionError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
