import { AsyncLocalStorage } from "async_hooks";

export type RequestContext = {
  requestId: string;
  route?: string;
};

const storage = new AsyncLocalStorage<RequestContext>();

export function getRequestId(): string | undefined {
  return storage.getStore()?.requestId;
}

export function getRequestRoute(): string | undefined {
  return storage.getStore()?.route;
}

/**
 * Runs `fn` with its own request id and route. Background work (the job
 * executor, the retention sweep) uses this so its log lines are traceable.
 */
export function runWithRequestContext<T>(ctx: RequestContext, fn: () => T): T {
  return storage.run({ requestId: ctx.requestId, route: ctx.route }, fn);
}
