export const CHECK_INTERVAL_MS = 1000;

/**
 * Cooperative cancel flag. The progress view (or SIGINT) requests; the
 * workflow observes it at checkpoints and clears it once the user chose to
 * go on.
 */
export class CancellationToken {
  private requested = false;

  get isRequested(): boolean {
    return this.requested;
  }

  request(): void {
    this.requested = true;
  }

  reset(): void {
    this.requested = false;
  }
}

/**
 * True at most once per interval. The first call only starts the clock.
 */
export function createThrottle(
  intervalMs: number = CHECK_INTERVAL_MS,
  now: () => number = Date.now,
): () => boolean {
  let last = now();
  return () => {
    const t = now();
    if (t - last > intervalMs) {
      last = t;
      return true;
    }
    return false;
  };
}
