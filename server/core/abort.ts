import { TimeoutError } from './errors.js';

export type LinkedSignal = {
  signal: AbortSignal;
  dispose: () => void;
};

/**
 * Abort as soon as any source aborts, carrying that source's reason.
 * `dispose` detaches the listeners once the guarded call settles.
 */
export function combineSignals(...signals: (AbortSignal | undefined)[]): LinkedSignal {
  const active = signals.filter((s): s is AbortSignal => s !== undefined);
  const ctrl = new AbortController();
  const already = active.find((s) => s.aborted);
  if (already) {
    ctrl.abort(already.reason);
    return { signal: ctrl.signal, dispose: () => {} };
  }
  const detach: Array<() => void> = [];
  for (const s of active) {
    const onAbort = () => ctrl.abort(s.reason);
    s.addEventListener('abort', onAbort, { once: true });
    detach.push(() => s.removeEventListener('abort', onAbort));
  }
  return {
    signal: ctrl.signal,
    dispose: () => {
      for (const fn of detach) fn();
      detach.length = 0;
    },
  };
}

/** Signal that aborts with a TimeoutError after `ms`. */
export function timeoutSignal(ms: number, label = 'operation'): LinkedSignal {
  const ctrl = new AbortController();
  const timer = setTimeout(() => ctrl.abort(new TimeoutError(`${label} exceeded ${ms}ms`)), ms);
  timer.unref?.();
  return { signal: ctrl.signal, dispose: () => clearTimeout(timer) };
}

/**
 * Run `fn` under `signal` plus a deadline, releasing both afterwards.
 *
 * Once either aborts, `fn` has `graceMs` to settle by itself; after that the
 * call rejects with the abort reason whether or not `fn` ever returns.
 */
export async function withDeadline<T>(
  ms: number,
  label: string,
  signal: AbortSignal | undefined,
  fn: (signal: AbortSignal) => Promise<T>,
  graceMs = 0,
): Promise<T> {
  const deadline = timeoutSignal(ms, label);
  const linked = combineSignals(signal, deadline.signal);
  let graceTimer: NodeJS.Timeout | undefined;
  let onAbort = () => {};
  const abandoned = new Promise<never>((_resolve, reject) => {
    onAbort = () => {
      graceTimer = setTimeout(() => reject(linked.signal.reason), graceMs);
    };
  });
  try {
    if (linked.signal.aborted) throw linked.signal.reason;
    linked.signal.addEventListener('abort', onAbort, { once: true });
    return await Promise.race([fn(linked.signal), abandoned]);
  } finally {
    linked.signal.removeEventListener('abort', onAbort);
    if (graceTimer) clearTimeout(graceTimer);
    linked.dispose();
    deadline.dispose();
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
