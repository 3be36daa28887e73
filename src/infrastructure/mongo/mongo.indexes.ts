/**
 * Index plan, applied idempotently on first use:
 * - { status: 1, createdAt: 1 } serves the pending-count and stale-pending sweeps.
 * Lookups by scan id use the built-in _id index.
 */
export const mongoIndexes = {
  scanCollection: [
    { keys: { status: 1, createdAt: 1 }, options: { name: "status_createdAt" } }
  ]
};
