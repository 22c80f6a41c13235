// =============================================================================
// RUN STOP SIGNALS
// =============================================================================

export type StopSignal = "SIGINT" | "SIGTERM";

const STOP_SIGNALS: StopSignal[] = ["SIGINT", "SIGTERM"];

export type RunStopSignalHandler = {
  signal: AbortSignal;
  cleanup: () => void;
  isStopped: () => boolean;
};

export type RunStopSignalHandlerOptions = {
  onSignal?: (signal: StopSignal) => void;
};

/**
 * Turn SIGINT/SIGTERM into an abort of the run's shared signal. The first
 * signal aborts; later ones are ignored until `cleanup` restores the defaults.
 */
export function createRunStopSignalHandler(
  opts: RunStopSignalHandlerOptions = {},
): RunStopSignalHandler {
  const controller = new AbortController();
  const listeners = new Map<StopSignal, () => void>();

  for (const signal of STOP_SIGNALS) {
    const listener = (): void => {
      if (controller.signal.aborted) return;
      opts.onSignal?.(signal);
      controller.abort(new Error(`Received ${signal}`));
    };
    listeners.set(signal, listener);
    process.on(signal, listener);
  }

  return {
    signal: controller.signal,
    cleanup: () => {
      for (const [signal, listener] of listeners) {
        process.off(signal, listener);
      }
      listeners.clear();
    },
    isStopped: () => controller.signal.aborted,
  };
}
