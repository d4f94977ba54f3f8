import { WorkflowAbortError } from "../errors.js";

export const createRunId = () => `run_${Math.random().toString(36).slice(2, 10)}`;

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export const createDeferred = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;

  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });

  return { promise, resolve, reject };
};

export const mergeSignals = (signals: AbortSignal[]): AbortSignal => {
  const [first] = signals;

  if (first === undefined) {
    return new AbortController().signal;
  }

  if (signals.length === 1) {
    return first;
  }

  const controller = new AbortController();
  const listeners: Array<{ signal: AbortSignal; handler: () => void }> = [];

  const abort = (reason: unknown) => {
    if (!controller.signal.aborted) {
      controller.abort(reason);
    }
  };

  const cleanup = () => {
    for (const { signal, handler } of listeners) {
      signal.removeEventListener("abort", handler);
    }
    listeners.length = 0;
  };

  for (const signal of signals) {
    if (signal.aborted) {
      abort(signal.reason ?? new WorkflowAbortError());
      cleanup();
      break;
    }

    const handler = () => {
      abort(signal.reason ?? new WorkflowAbortError());
      cleanup();
    };

    signal.addEventListener("abort", handler, { once: true });
    listeners.push({ signal, handler });
  }

  controller.signal.addEventListener("abort", cleanup, { once: true });

  return controller.signal;
};
