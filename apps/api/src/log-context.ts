import { AsyncLocalStorage } from "node:async_hooks";

export type LogContext = {
  requestId?: string;
  /** Set for background work that runs outside a request, such as an auto-apply sweep. */
  jobId?: string;
};

const storage = new AsyncLocalStorage<LogContext>();

export function setLogContext(context: LogContext): void {
  storage.enterWith(context);
}

export function runWithLogContext<T>(context: LogContext, fn: () => T): T {
  return storage.run(context, fn);
}

export function getLogContext(): LogContext | undefined {
  return storage.getStore();
}
