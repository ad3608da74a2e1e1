export interface LinkedSignal {
  signal: AbortSignal;
  dispose(): void;
}

/**
 * A signal that aborts when any of the given signals does. Call dispose()
 * once it is no longer needed so the sources drop their listeners.
 */
export function linkSignals(...signals: AbortSignal[]): LinkedSignal {
  const controller = new AbortController();
  const abort = (): void => controller.abort();
  for (const signal of signals) {
    if (signal.aborted) {
      controller.abort();
      break;
    }
    signal.addEventListener("abort", abort, { once: true });
  }
  return {
    signal: controller.signal,
    dispose: () => {
      for (const signal of signals) {
        signal.removeEventListener("abort", abort);
      }
    },
  };
}
