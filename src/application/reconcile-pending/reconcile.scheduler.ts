import { toErrorMessage } from "../../core/errors";

export type ReconcileLoop = {
  stop: () => Promise<void>;
};

/**
 * Runs `sweep` every `intervalMs`. A tick is skipped while the previous sweep is still
 * running; `stop` waits for an in-flight sweep to settle.
 */
export const startReconcileLoop = (sweep: () => Promise<unknown>, intervalMs: number): ReconcileLoop => {
  if (intervalMs <= 0) {
    return { stop: async () => undefined };
  }

  let inFlight: Promise<void> | undefined;

  const tick = () => {
    if (inFlight) return;
    inFlight = sweep()
      .then(() => undefined)
      .catch((error: unknown) => {
        // eslint-disable-next-line no-console
        console.error(JSON.stringify({ event: "reconcile.failed", reason: toErrorMessage(error) }));
      })
      .finally(() => {
        inFlight = undefined;
      });
  };

  const timer = setInterval(tick, intervalMs);
  timer.unref();

  return {
    stop: async () => {
      clearInterval(timer);
      await inFlight;
    }
  };
};
