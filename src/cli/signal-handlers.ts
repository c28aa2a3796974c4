export type StopSignal = "SIGINT" | "SIGTERM";

export type StopSignalHandler = {
  signal: AbortSignal;
  cleanup: () => void;
};

const STOP_SIGNALS: readonly StopSignal[] = ["SIGINT", "SIGTERM"];

// Aborts on the first SIGINT/SIGTERM; a second signal falls through to the default handler.
export function createStopSignalHandler(options: {
  onSignal?: (signal: StopSignal) => void;
  processRef?: Pick<NodeJS.Process, "once" | "off">;
} = {}): StopSignalHandler {
  const processRef = options.processRef ?? process;
  const controller = new AbortController();

  const handlers = STOP_SIGNALS.map((name) => {
    const handler = () => {
      options.onSignal?.(name);
      controller.abort(name);
    };
    processRef.once(name, handler);
    return { name, handler };
  });

  return {
    signal: controller.signal,
    cleanup: () => {
      for (const { name, handler } of handlers) {
        processRef.off(name, handler);
      }
    },
  };
}

export function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();

  return new Promise((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}
