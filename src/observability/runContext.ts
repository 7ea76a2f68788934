import { AsyncLocalStorage } from "async_hooks";

export type RunContextStore = {
  runId: string;
  customer?: string;
  startTime: number;
};

export type RunContextInput = {
  runId: string;
  customer?: string;
  startTime?: number;
};

const storage = new AsyncLocalStorage<RunContextStore>();

export function getRunContext(): RunContextStore | undefined {
  return storage.getStore();
}

export function getRunDurationMs(now: number = Date.now()): number | undefined {
  const store = storage.getStore();
  return store ? now - store.startTime : undefined;
}

export function withRunContext<T>(ctx: RunContextInput, fn: () => T): T {
  const parent = storage.getStore();
  const store: RunContextStore = {
    runId: ctx.runId,
    startTime: ctx.startTime ?? parent?.startTime ?? Date.now(),
  };
  const customer = ctx.customer ?? parent?.customer;
  if (customer !== undefined) {
    store.customer = customer;
  }
  return storage.run(store, fn);
}
