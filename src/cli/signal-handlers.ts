export type StopSignalHandler = {
  signal: AbortSignal;
  cleanup: () => void;
};

type SignalListener = (signal: NodeJS.Signals) => void;

export type SignalSource = {
  on(event: NodeJS.Signals, listener: SignalListener): unknown;
  off(event: NodeJS.Signals, listener: SignalListener): unknown;
};

export type StopSignalOptions = {
  // First signal: the run stops at its next state transition.
  onStop?: (signal: NodeJS.Signals) => void;
  // Second signal while stopping: leave immediately.
  onForce?: (signal: NodeJS.Signals) => void;
  signals?: NodeJS.Signals[];
  target?: SignalSource;
};

const FORCE_EXIT_CODE = 130;

export function createRunStopSignalHandler(opts: StopSignalOptions = {}): StopSignalHandler {
  const controller = new AbortController();
  const signals = opts.signals ?? ["SIGINT", "SIGTERM"];
  const target = opts.target ?? process;

  const onSignal = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      cleanup();
      if (opts.onForce) {
        opts.onForce(signal);
      } else {
        process.exit(FORCE_EXIT_CODE);
      }
      return;
    }

    opts.onStop?.(signal);
    controller.abort(new Error(`Received ${signal}`));
  };

  let attached = true;
  const cleanup = (): void => {
    if (!attached) return;
    attached = false;
    for (const signal of signals) target.off(signal, onSignal);
  };

  for (const signal of signals) target.on(signal, onSignal);

  return { signal: controller.signal, cleanup };
}
