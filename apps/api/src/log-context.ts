import { AsyncLocalStorage } from "node:async_hooks";

export type LogContext = {
  requestId?: string;
  /** Staff user id for privileged requests. */
  actor?: string;
};

const storage = new AsyncLocalStorage<LogContext>();

export function setLogContext(context: LogContext): void {
  storage.enterWith(context);
}

/** Attach the authenticated actor to the current request's context. */
export function setLogActor(actor: string): void {
  const current = storage.getStore();
  if (current) {
    current.actor = actor;
    return;
  }
  storage.enterWith({ actor });
}

export function getLogContext(): LogContext | undefined {
  return storage.getStore();
}

/** Run background work with a copy of the context it was scheduled from. */
export function runWithLogContext<T>(context: LogContext | undefined, fn: () => T): T {
  return storage.run({ ...(context ?? {}) }, fn);
}
