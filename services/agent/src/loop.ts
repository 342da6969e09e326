export type SignalSource = {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
};

export type LoopOptions = {
  interval_ms: number;
  tick: () => Promise<void>;
  shutdown: (signal: NodeJS.Signals) => Promise<void>;
  signals?: SignalSource;
};

export type Loop = {
  stop(): void;
};

/**
 * Runs `tick` now and then every `interval_ms`, skipping a tick while the
 * previous one is still in flight. SIGINT and SIGTERM stop the timer and call
 * `shutdown`; they are registered before the first tick starts.
 */
export async function runLoop(opts: LoopOptions): Promise<Loop> {
  const signals = opts.signals ?? process;

  let inFlight = false;
  const guarded = async (): Promise<void> => {
    if (inFlight) return;
    inFlight = true;
    try {
      await opts.tick();
    } finally {
      inFlight = false;
    }
  };

  const timer = setInterval(() => {
    void guarded();
  }, opts.interval_ms);
  const stop = (): void => clearInterval(timer);

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    signals.on(signal, () => {
      stop();
      void opts.shutdown(signal);
    });
  }

  await guarded();
  return { stop };
}
